/**
 * Configuration Loader - process environment to validated router settings
 */

import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { RouterConfigSchema, type RouterConfig } from './schema.js';

/** Directory the router ships in; `.env`, the database and the programs live here by default. */
export const PACKAGE_ROOT = fileURLToPath(new URL('../../../', import.meta.url));

export const ENV_FILE_NAME = '.env';

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RouterConfig {
  const raw = {
    home: env.FACTOR_HOME || PACKAGE_ROOT,
    python: env.FACTOR_PYTHON || undefined,
    db_path: env.FACTOR_DB_PATH || undefined,
    logging: {
      level: env.LOG_LEVEL || undefined,
      format: env.LOG_FORMAT || undefined,
      file: env.LOG_FILE || undefined,
    },
  };

  const result = RouterConfigSchema.safeParse(raw);

  if (!result.success) {
    const details = result.error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Configuration validation failed: ${details}`);
  }

  const home = path.resolve(result.data.home);
  return {
    home,
    python: result.data.python,
    envPath: path.join(home, ENV_FILE_NAME),
    dbPath: path.resolve(home, result.data.db_path),
    logging: result.data.logging,
  };
}
