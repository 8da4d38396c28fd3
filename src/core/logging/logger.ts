/**
 * Structured Logger
 *
 * Diagnostics only. Everything goes to stderr so the router's own output on
 * stdout stays clean for the delegated programs and the status report.
 */

import fs from 'node:fs';
import path from 'node:path';
import chalk from 'chalk';
import { nanoid } from 'nanoid';
import type { LoggingConfig } from '../config/schema.js';

export type LogLevel = LoggingConfig['level'];
export type LogFields = Record<string, unknown>;

interface LogEntry extends LogFields {
  timestamp: string;
  level: LogLevel;
  message: string;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_STYLE: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

function renderPretty(entry: LogEntry): string {
  const { timestamp: _timestamp, level, message, run_id, ...fields } = entry;
  const runId = typeof run_id === 'string' ? ` [${run_id.slice(0, 8)}]` : '';
  const extras = Object.entries(fields).map(
    ([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`
  );
  return [`${LEVEL_STYLE[level](`[${level.toUpperCase()}]`)}${runId} ${message}`, ...extras].join(' ');
}

/**
 * Children share their parent's settings, so a child taken before
 * `configure` still follows the configured level and sinks.
 */
export class Logger {
  constructor(
    private readonly settings: LoggingConfig = { level: 'warn', format: 'pretty' },
    private fields: LogFields = {}
  ) {}

  configure(options: LoggingConfig, fields: LogFields = {}): void {
    if (options.file) {
      fs.mkdirSync(path.dirname(options.file), { recursive: true });
    }
    this.settings.level = options.level;
    this.settings.format = options.format;
    this.settings.file = options.file;
    this.fields = { ...this.fields, ...fields };
  }

  child(fields: LogFields): Logger {
    return new Logger(this.settings, { ...this.fields, ...fields });
  }

  debug(message: string, fields?: LogFields): void {
    this.write('debug', message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.write('error', message, fields);
  }

  private write(level: LogLevel, message: string, fields: LogFields = {}): void {
    if (SEVERITY[level] < SEVERITY[this.settings.level]) return;

    const entry: LogEntry = {
      ...this.fields,
      ...fields,
      timestamp: new Date().toISOString(),
      level,
      message,
    };
    const json = JSON.stringify(entry);

    console.error(this.settings.format === 'json' ? json : renderPretty(entry));
    if (this.settings.file) {
      fs.appendFileSync(this.settings.file, `${json}\n`);
    }
  }
}

export const logger = new Logger();

export function createRunId(): string {
  return nanoid();
}
