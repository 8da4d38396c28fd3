/**
 * Setup Command - bootstrap .env, set up the database, run diagnostics
 */

import fs from 'node:fs';
import chalk from 'chalk';
import ora from 'ora';
import { writeEnvTemplate } from '../core/config/template.js';
import { errorMessage } from '../core/errors.js';
import { logger } from '../core/logging/logger.js';
import type { Handler, RouterContext } from '../router/context.js';
import { renderBanner } from '../router/help.js';
import { runProgram } from './delegate.js';

export const DATABASE_SETUP_SCRIPT = 'setup_database.py';
export const DIAGNOSTICS_SCRIPT = 'run_diagnostics.py';

async function ensureEnvFile(ctx: RouterContext): Promise<void> {
  const { envPath } = ctx.config;

  if (fs.existsSync(envPath)) {
    console.log(chalk.green(`[OK] Found ${envPath}`));
    return;
  }

  console.log(chalk.yellow(`No .env file found at ${envPath}`));
  let create = false;
  try {
    create = await ctx.confirm('Create a .env template now?');
  } catch (error) {
    logger.debug(`Confirmation prompt failed: ${errorMessage(error)}`);
    console.log(chalk.yellow(`No answer to the prompt (${errorMessage(error)}); treating it as no`));
  }

  if (!create) {
    console.log(chalk.gray('Skipped .env creation'));
    return;
  }

  const spinner = ora('Writing .env template...').start();
  try {
    if (writeEnvTemplate(envPath) === 'created') {
      spinner.succeed(`Created ${chalk.cyan(envPath)}`);
      console.log(chalk.gray('Edit it with your email and Schwab credentials before running analysis.'));
    } else {
      spinner.info('.env was created by another process; left unchanged');
    }
  } catch (error) {
    spinner.fail(`Could not write .env: ${errorMessage(error)}`);
    logger.error('Template write failed', { error: errorMessage(error) });
  }
}

/**
 * The two program steps are independent: a database setup failure is
 * reported and diagnostics still run. The exit code is the diagnostics one.
 */
export const setupHandler: Handler = async (ctx) => {
  console.log(renderBanner());
  console.log(chalk.bold('Setting up Factor Investment System'));
  console.log();

  await ensureEnvFile(ctx);

  console.log();
  console.log(chalk.bold('Setting up database...'));
  const dbExitCode = runProgram(ctx, DATABASE_SETUP_SCRIPT);
  if (dbExitCode !== 0) {
    console.log(chalk.yellow('Database setup did not succeed; continuing with diagnostics'));
  }

  console.log();
  console.log(chalk.bold('Running diagnostics...'));
  return runProgram(ctx, DIAGNOSTICS_SCRIPT);
};
