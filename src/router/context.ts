/**
 * Router context - everything a handler touches outside its own process
 */

import type { RouterConfig } from '../core/config/schema.js';
import { PythonRunner, type ProgramRunner } from '../core/process/runner.js';
import { askYesNo, type ConfirmPrompt } from '../core/prompt.js';
import type { Action } from './actions.js';

export interface RouterContext {
  config: RouterConfig;
  runner: ProgramRunner;
  confirm: ConfirmPrompt;
  /** Read for display only (`VIRTUAL_ENV`). */
  env: NodeJS.ProcessEnv;
}

export type Handler = (ctx: RouterContext) => Promise<number>;

export type HandlerTable = Record<Action, Handler>;

export function createContext(config: RouterConfig, overrides: Partial<RouterContext> = {}): RouterContext {
  return {
    config,
    runner: new PythonRunner({ python: config.python, home: config.home }),
    confirm: askYesNo,
    env: process.env,
    ...overrides,
  };
}
