/**
 * Help Command
 */

import type { Handler } from '../router/context.js';
import { renderHelp } from '../router/help.js';

export const helpHandler: Handler = async () => {
  console.log(renderHelp());
  return 0;
};
