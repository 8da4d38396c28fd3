/**
 * Command Router
 */

import chalk from 'chalk';
import { HANDLERS } from '../commands/index.js';
import { errorMessage } from '../core/errors.js';
import { logger } from '../core/logging/logger.js';
import { DEFAULT_TOKEN, resolveAction } from './actions.js';
import type { HandlerTable, RouterContext } from './context.js';
import { renderHelp } from './help.js';

/**
 * Runs the handler bound to `argv[0]` (the default token when absent) and
 * returns its exit code. Unknown tokens print help and return 1.
 */
export async function dispatch(
  argv: readonly string[],
  ctx: RouterContext,
  handlers: HandlerTable = HANDLERS
): Promise<number> {
  const token = argv[0] ?? DEFAULT_TOKEN;
  const action = resolveAction(token);

  if (!action) {
    logger.debug(`Unknown command token: ${token}`);
    console.log(chalk.red(`Unknown command: ${token}`));
    console.log();
    console.log(renderHelp());
    return 1;
  }

  const log = logger.child({ action });
  log.debug(`Dispatching "${token}"`);

  try {
    const exitCode = await handlers[action](ctx);
    log.debug(`Finished with exit code ${exitCode}`);
    return exitCode;
  } catch (error) {
    log.error(`Handler failed: ${errorMessage(error)}`);
    console.log(chalk.red(`Error: ${errorMessage(error)}`));
    return 1;
  }
}
