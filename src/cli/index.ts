#!/usr/bin/env node

/**
 * Factor CLI - command router for the factor investment toolkit
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../core/config/loader.js';
import type { RouterConfig } from '../core/config/schema.js';
import { errorMessage } from '../core/errors.js';
import { createRunId, logger } from '../core/logging/logger.js';
import { createContext } from '../router/context.js';
import { dispatch } from '../router/dispatch.js';
import { PROGRAM_NAME } from '../router/help.js';

const program = new Command();

program
  .name(PROGRAM_NAME)
  .description('Run factor analysis, data collection, the dashboard and setup tasks')
  .argument('[command]', 'command or alias (default: run)')
  // Help tokens and unknown tokens are the router's business, not commander's
  .helpOption(false)
  .allowUnknownOption()
  .allowExcessArguments()
  .action(async (command: string | undefined) => {
    let config: RouterConfig;
    try {
      config = loadConfig();
    } catch (error) {
      console.error(chalk.red(`Configuration error: ${errorMessage(error)}`));
      process.exitCode = 1;
      return;
    }

    logger.configure(config.logging, { run_id: createRunId() });

    process.exitCode = await dispatch(command === undefined ? [] : [command], createContext(config));
  });

await program.parseAsync();
