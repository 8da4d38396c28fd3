/**
 * Bootstrap .env template
 */

import fs from 'node:fs';
import path from 'node:path';
import { nanoid } from 'nanoid';
import { isErrnoCode } from '../errors.js';

export const ENV_TEMPLATE = `# Email settings
FACTOR_EMAIL=your_email@gmail.com
FACTOR_EMAIL_PASSWORD=your_app_password
FACTOR_RECIPIENTS=recipient1@email.com,recipient2@email.com

# Schwab API (optional)
SCHWAB_CLIENT_ID=your_client_id
SCHWAB_CLIENT_SECRET=your_client_secret
SCHWAB_REFRESH_TOKEN=your_refresh_token

# Portfolio
PORTFOLIO_VALUE=100000
`;

export type TemplateWriteResult = 'created' | 'exists';

/**
 * Writes the template to a temp file beside `envPath` and hard-links it into
 * place. The link fails with EEXIST instead of replacing a file that appeared
 * after the caller's existence check. Filesystems without hard links (EPERM)
 * get an exclusive-create write of the target instead.
 */
export function writeEnvTemplate(envPath: string): TemplateWriteResult {
  const tmpPath = path.join(path.dirname(envPath), `.${path.basename(envPath)}.${nanoid(8)}.tmp`);

  try {
    fs.writeFileSync(tmpPath, ENV_TEMPLATE, { flag: 'wx' });
    fs.linkSync(tmpPath, envPath);
    return 'created';
  } catch (error) {
    if (isErrnoCode(error, 'EEXIST')) {
      return 'exists';
    }
    if (isErrnoCode(error, 'EPERM')) {
      return writeExclusive(envPath);
    }
    throw error;
  } finally {
    fs.rmSync(tmpPath, { force: true });
  }
}

function writeExclusive(envPath: string): TemplateWriteResult {
  try {
    fs.writeFileSync(envPath, ENV_TEMPLATE, { flag: 'wx' });
    return 'created';
  } catch (error) {
    if (isErrnoCode(error, 'EEXIST')) {
      return 'exists';
    }
    throw error;
  }
}
