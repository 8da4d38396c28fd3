/**
 * Program Runner - runs the Python programs the router delegates to
 */

import { spawnSync } from 'node:child_process';
import os from 'node:os';
import path from 'node:path';
import { isErrnoCode } from '../errors.js';
import { logger } from '../logging/logger.js';

export const VERSION_PROBE_TIMEOUT_MS = 5000;

export interface RunResult {
  exitCode: number;
  /** Set when the program could not be started or was killed by a signal. */
  error?: string;
}

export interface ProgramRunner {
  /** Runs `script` with no arguments, blocking until it exits. */
  run(script: string): RunResult;
  /** Interpreter version (e.g. `3.11.4`), or null when it cannot be determined. */
  version(): string | null;
}

export interface PythonRunnerOptions {
  python: string;
  home: string;
}

export class PythonRunner implements ProgramRunner {
  constructor(private readonly options: PythonRunnerOptions) {}

  run(script: string): RunResult {
    const scriptPath = path.join(this.options.home, script);
    logger.debug(`Spawning ${this.options.python} ${scriptPath}`, { script });

    const result = spawnSync(this.options.python, [scriptPath], {
      cwd: this.options.home,
      stdio: 'inherit',
    });

    if (result.error) {
      return {
        exitCode: isErrnoCode(result.error, 'ENOENT') ? 127 : 1,
        error: result.error.message,
      };
    }

    if (result.signal) {
      return {
        exitCode: 128 + (os.constants.signals[result.signal] ?? 0),
        error: `terminated by ${result.signal}`,
      };
    }

    return { exitCode: result.status ?? 0 };
  }

  version(): string | null {
    const result = spawnSync(this.options.python, ['--version'], {
      encoding: 'utf-8',
      timeout: VERSION_PROBE_TIMEOUT_MS,
    });

    if (result.error) {
      logger.debug(`Version probe failed: ${result.error.message}`);
      return null;
    }

    // Python 2 printed its version on stderr
    return parseVersionOutput(`${result.stdout ?? ''} ${result.stderr ?? ''}`);
  }
}

/** Second whitespace-delimited token of `Python 3.11.4`. */
export function parseVersionOutput(output: string): string | null {
  return output.trim().split(/\s+/)[1] ?? null;
}
