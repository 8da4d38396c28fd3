/**
 * Configuration Schema - Zod validation for router settings and the .env file
 */

import { z } from 'zod';

export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('warn'),
  format: z.enum(['json', 'pretty']).default('pretty'),
  file: z.string().optional(),
});

export const RouterConfigSchema = z.object({
  home: z.string().min(1),
  python: z.string().min(1).default('python3'),
  db_path: z.string().min(1).default('factor_monitoring.db'),
  logging: LoggingConfigSchema.default({}),
});

const REQUIRED = { required_error: 'missing required variable' };

/**
 * Keys the Python programs read from `.env`. The email account is required
 * for reports to go out; the Schwab and portfolio keys are optional.
 */
export const CredentialsSchema = z.object({
  FACTOR_EMAIL: z.string(REQUIRED).email(),
  FACTOR_EMAIL_PASSWORD: z.string(REQUIRED).min(1),
  FACTOR_RECIPIENTS: z.string().optional(),
  SCHWAB_CLIENT_ID: z.string().optional(),
  SCHWAB_CLIENT_SECRET: z.string().optional(),
  SCHWAB_REFRESH_TOKEN: z.string().optional(),
  PORTFOLIO_VALUE: z.coerce.number().positive().optional(),
});

export const CREDENTIAL_KEYS = CredentialsSchema.keyof().options;

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type CredentialKey = (typeof CREDENTIAL_KEYS)[number];

/** Router settings with every path resolved against `home`. */
export interface RouterConfig {
  home: string;
  python: string;
  envPath: string;
  dbPath: string;
  logging: LoggingConfig;
}
