/**
 * Status Command - probe configuration, database and interpreter
 *
 * Every probe is independent. A probe that cannot complete degrades to a
 * placeholder in the report; the command itself always succeeds.
 */

import fs from 'node:fs';
import path from 'node:path';
import chalk from 'chalk';
import dotenv from 'dotenv';
import { CREDENTIAL_KEYS, CredentialsSchema, type CredentialKey } from '../core/config/schema.js';
import { getLastCollectionDate } from '../core/db/database.js';
import { errorMessage } from '../core/errors.js';
import { logger } from '../core/logging/logger.js';
import type { Handler, RouterContext } from '../router/context.js';
import { renderBanner } from '../router/help.js';

const RULE_WIDTH = 60;
const LABEL_WIDTH = 24;

type DatabaseProbe =
  | { exists: false }
  | { exists: true; sizeBytes: number | null; lastCollection: string | null };

type CredentialsProbe =
  | { readable: true; values: Partial<Record<CredentialKey, string>>; issues: string[] }
  | { readable: false; error: string };

export interface StatusReport {
  envFile: boolean;
  database: DatabaseProbe;
  virtualEnv: string | null;
  pythonVersion: string | null;
  /** Null when there is no .env to inspect. */
  credentials: CredentialsProbe | null;
}

const UNITS = ['B', 'KB', 'MB', 'GB'] as const;

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;

  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(1)} ${UNITS[unit]}`;
}

export function maskSecret(secret: string): string {
  if (secret.length <= 2) return '*'.repeat(secret.length);
  return `${secret[0]}${'*'.repeat(secret.length - 2)}${secret[secret.length - 1]}`;
}

function probeDatabase(dbPath: string): DatabaseProbe {
  if (!fs.existsSync(dbPath)) {
    return { exists: false };
  }

  let sizeBytes: number | null = null;
  try {
    sizeBytes = fs.statSync(dbPath).size;
  } catch (error) {
    logger.debug(`Could not stat database: ${errorMessage(error)}`);
  }

  let lastCollection: string | null = null;
  try {
    lastCollection = getLastCollectionDate(dbPath);
  } catch (error) {
    logger.debug(`Last collection query failed: ${errorMessage(error)}`);
  }

  return { exists: true, sizeBytes, lastCollection };
}

function probeCredentials(envPath: string): CredentialsProbe {
  let parsed: Record<string, string>;
  try {
    parsed = dotenv.parse(fs.readFileSync(envPath));
  } catch (error) {
    return { readable: false, error: errorMessage(error) };
  }

  const values: Partial<Record<CredentialKey, string>> = {};
  for (const key of CREDENTIAL_KEYS) {
    const value = parsed[key];
    if (value) values[key] = value;
  }

  const result = CredentialsSchema.safeParse(values);
  const issues = result.success
    ? []
    : result.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`);

  return { readable: true, values, issues };
}

export function collectStatus(ctx: RouterContext): StatusReport {
  const { envPath, dbPath } = ctx.config;
  const envFile = fs.existsSync(envPath);

  let pythonVersion: string | null = null;
  try {
    pythonVersion = ctx.runner.version();
  } catch (error) {
    logger.debug(`Version probe failed: ${errorMessage(error)}`);
  }

  const virtualEnv = ctx.env.VIRTUAL_ENV;

  return {
    envFile,
    database: probeDatabase(dbPath),
    virtualEnv: virtualEnv ? path.basename(virtualEnv) : null,
    pythonVersion,
    credentials: envFile ? probeCredentials(envPath) : null,
  };
}

function line(label: string, value: string): string {
  return `  ${label.padEnd(LABEL_WIDTH)}${value}`;
}

function section(title: string): string[] {
  return [chalk.bold(title), '-'.repeat(RULE_WIDTH)];
}

function displayCredential(key: CredentialKey, value: string | undefined): string {
  if (!value) return chalk.yellow('not set');
  switch (key) {
    case 'FACTOR_EMAIL':
    case 'FACTOR_RECIPIENTS':
    case 'PORTFOLIO_VALUE':
      return value;
    case 'FACTOR_EMAIL_PASSWORD':
      return `${maskSecret(value)} (length: ${value.length})`;
    default:
      return 'set';
  }
}

export function renderStatus(report: StatusReport): string {
  const { database } = report;
  const lines = [
    ...section('Environment'),
    line('Configuration (.env)', report.envFile ? chalk.green('Found') : chalk.red('Missing')),
    line(
      'Database',
      database.exists
        ? chalk.green(database.sizeBytes === null ? 'Found' : `Found (${formatBytes(database.sizeBytes)})`)
        : chalk.yellow('Not created yet')
    ),
    line(
      'Virtual environment',
      report.virtualEnv ? chalk.green(`Active (${report.virtualEnv})`) : chalk.yellow('Not active')
    ),
    line('Python version', report.pythonVersion ?? chalk.red('Unknown')),
  ];

  if (database.exists) {
    lines.push(line('Last data collection', database.lastCollection ?? 'Never'));
  }

  const { credentials } = report;
  if (credentials) {
    lines.push('', ...section('Credentials'));
    if (!credentials.readable) {
      lines.push(line('.env', chalk.red(`Unreadable (${credentials.error})`)));
    } else {
      for (const key of CREDENTIAL_KEYS) {
        lines.push(line(key, displayCredential(key, credentials.values[key])));
      }
      for (const issue of credentials.issues) {
        lines.push(chalk.yellow(`  [WARN] ${issue}`));
      }
    }
  }

  return lines.join('\n');
}

export const statusHandler: Handler = async (ctx) => {
  console.log(renderBanner());
  console.log(chalk.bold('System Status'));
  console.log();
  console.log(renderStatus(collectStatus(ctx)));
  console.log('='.repeat(RULE_WIDTH));
  return 0;
};
