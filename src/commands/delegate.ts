/**
 * Delegating commands - announce, run one Python program, forward its exit code
 */

import chalk from 'chalk';
import { logger } from '../core/logging/logger.js';
import type { Handler, RouterContext } from '../router/context.js';
import { DASHBOARD_URL, renderBanner } from '../router/help.js';

export interface DelegateSpec {
  script: string;
  announcement: string;
  notes?: readonly string[];
}

/**
 * Runs `script` and returns its exit code. Launch failures and non-zero exits
 * are reported on stdout.
 */
export function runProgram(ctx: RouterContext, script: string): number {
  const result = ctx.runner.run(script);

  if (result.error) {
    logger.debug(`${script} did not complete: ${result.error}`, { script });
    console.log(chalk.red(`[FAIL] Could not run ${script}: ${result.error}`));
  } else if (result.exitCode !== 0) {
    console.log(chalk.yellow(`[WARN] ${script} exited with code ${result.exitCode}`));
  }

  return result.exitCode;
}

export function createDelegateHandler(spec: DelegateSpec): Handler {
  return async (ctx) => {
    console.log(renderBanner());
    console.log(chalk.bold(spec.announcement));
    for (const note of spec.notes ?? []) {
      console.log(chalk.gray(note));
    }
    console.log();

    return runProgram(ctx, spec.script);
  };
}

export const runAnalysis = createDelegateHandler({
  script: 'run_analysis.py',
  announcement: 'Running factor analysis...',
});

export const runSchwabEnhanced = createDelegateHandler({
  script: 'schwab_factor_system.py',
  announcement: 'Running Schwab-enhanced portfolio analysis...',
});

export const runDiagnostics = createDelegateHandler({
  script: 'run_diagnostics.py',
  announcement: 'Running system diagnostics...',
});

export const testEmail = createDelegateHandler({
  script: 'test_email.py',
  announcement: 'Testing email configuration...',
});

export const testSchwab = createDelegateHandler({
  script: 'test_schwab_connection.py',
  announcement: 'Testing Schwab API connection...',
});

export const collectData = createDelegateHandler({
  script: 'factor_data_collection.py',
  announcement: 'Collecting factor data...',
});

export const startDashboard = createDelegateHandler({
  script: 'monitoring_dashboard.py',
  announcement: 'Starting monitoring dashboard...',
  notes: [`Dashboard will be available at ${DASHBOARD_URL}`, 'Press Ctrl+C to stop'],
});
