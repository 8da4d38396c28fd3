/**
 * Status Command Tests
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import Database from 'better-sqlite3';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { collectStatus, formatBytes, maskSecret, renderStatus } from '../../src/commands/status.js';
import { loadConfig } from '../../src/core/config/loader.js';
import { createContext, type RouterContext } from '../../src/router/context.js';
import { dispatch } from '../../src/router/dispatch.js';
import { FakeRunner } from '../helpers/fake-runner.js';
import { captureConsole } from '../helpers/console.js';

describe('formatBytes', () => {
  it('should keep small sizes in bytes', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(1023)).toBe('1023 B');
  });

  it('should scale by 1024 with one decimal', () => {
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(12288)).toBe('12.0 KB');
    expect(formatBytes(1024 * 1024)).toBe('1.0 MB');
    expect(formatBytes(5 * 1024 ** 3)).toBe('5.0 GB');
  });

  it('should cap at gigabytes', () => {
    expect(formatBytes(1024 ** 4)).toBe('1024.0 GB');
  });
});

describe('maskSecret', () => {
  it('should keep only the first and last characters', () => {
    expect(maskSecret('test-secret')).toBe('t*********t');
  });

  it('should mask short secrets entirely', () => {
    expect(maskSecret('ab')).toBe('**');
  });
});

describe('status', () => {
  let home: string;
  let ctx: RouterContext;
  let output: ReturnType<typeof captureConsole>;

  const contextWith = (overrides: Partial<RouterContext> = {}): RouterContext =>
    createContext(loadConfig({ FACTOR_HOME: home }), { runner: new FakeRunner(), env: {}, ...overrides });

  const createDatabase = (withRows: boolean): string => {
    const dbPath = path.join(home, 'factor_monitoring.db');
    const db = new Database(dbPath);
    if (withRows) {
      db.exec('CREATE TABLE factor_data (date TEXT, factor TEXT, value REAL)');
      const insert = db.prepare('INSERT INTO factor_data (date, factor, value) VALUES (?, ?, ?)');
      insert.run('2024-03-01', 'momentum', 0.12);
      insert.run('2024-03-15', 'value_pe', 0.08);
      insert.run('2024-02-28', 'quality_roe', 0.05);
    } else {
      db.exec('CREATE TABLE alerts_log (timestamp TEXT)');
    }
    db.close();
    return dbPath;
  };

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), 'factor-status-'));
    ctx = contextWith();
    output = captureConsole();
  });

  afterEach(() => {
    output.restore();
    fs.rmSync(home, { recursive: true, force: true });
  });

  it('should report placeholders for an empty home', async () => {
    const exitCode = await dispatch(['status'], ctx);
    const lines = output.text().split('\n');

    expect(exitCode).toBe(0);
    expect(lines).toContain('  Configuration (.env)    Missing');
    expect(lines).toContain('  Database                Not created yet');
    expect(lines).toContain('  Virtual environment     Not active');
    expect(lines).toContain('  Python version          3.11.4');
    expect(output.text()).not.toContain('Last data collection');
    expect(output.text()).not.toContain('Credentials');
  });

  it('should show the active virtual environment by basename', () => {
    const report = collectStatus(contextWith({ env: { VIRTUAL_ENV: '/home/trader/factor/.venv' } }));

    expect(report.virtualEnv).toBe('.venv');
    expect(renderStatus(report).split('\n')).toContain('  Virtual environment     Active (.venv)');
  });

  it('should fall back to Unknown when the interpreter cannot be probed', () => {
    const report = collectStatus(contextWith({ runner: new FakeRunner({}, null) }));

    expect(renderStatus(report).split('\n')).toContain('  Python version          Unknown');
  });

  it('should report database size and last collection date', () => {
    const dbPath = createDatabase(true);
    const report = collectStatus(ctx);
    const lines = renderStatus(report).split('\n');

    expect(report.database).toEqual({
      exists: true,
      sizeBytes: fs.statSync(dbPath).size,
      lastCollection: '2024-03-15',
    });
    expect(lines).toContain(`  Database                Found (${formatBytes(fs.statSync(dbPath).size)})`);
    expect(lines).toContain('  Last data collection    2024-03-15');
  });

  it('should report Never when the factor_data table is missing', () => {
    createDatabase(false);
    const lines = renderStatus(collectStatus(ctx)).split('\n');

    expect(lines).toContain('  Last data collection    Never');
  });

  it('should report Never for a file that is not a database', () => {
    fs.writeFileSync(path.join(home, 'factor_monitoring.db'), 'not sqlite');
    const lines = renderStatus(collectStatus(ctx)).split('\n');

    expect(lines).toContain('  Database                Found (10 B)');
    expect(lines).toContain('  Last data collection    Never');
  });

  it('should list credentials from .env with the password masked', () => {
    fs.writeFileSync(
      path.join(home, '.env'),
      'FACTOR_EMAIL=trader@example.com\nFACTOR_EMAIL_PASSWORD=test-secret\nSCHWAB_CLIENT_ID=test-client\nPORTFOLIO_VALUE=250000\n'
    );
    const lines = renderStatus(collectStatus(ctx)).split('\n');

    expect(lines).toContain('  Configuration (.env)    Found');
    expect(lines).toContain('  FACTOR_EMAIL            trader@example.com');
    expect(lines).toContain('  FACTOR_EMAIL_PASSWORD   t*********t (length: 11)');
    expect(lines).toContain('  FACTOR_RECIPIENTS       not set');
    expect(lines).toContain('  SCHWAB_CLIENT_ID        set');
    expect(lines).toContain('  SCHWAB_CLIENT_SECRET    not set');
    expect(lines).toContain('  PORTFOLIO_VALUE         250000');
    expect(lines.some((line) => line.includes('[WARN]'))).toBe(false);
  });

  it('should warn about invalid credential values', () => {
    fs.writeFileSync(path.join(home, '.env'), 'FACTOR_EMAIL=not-an-email\nFACTOR_EMAIL_PASSWORD=test-secret\nPORTFOLIO_VALUE=100000\n');
    const report = collectStatus(ctx);

    expect(report.credentials).toMatchObject({ readable: true });
    if (report.credentials?.readable) {
      expect(report.credentials.issues).toHaveLength(1);
      expect(report.credentials.issues[0]).toMatch(/^FACTOR_EMAIL: /);
    }
  });

  it('should warn when the email account is missing', () => {
    fs.writeFileSync(path.join(home, '.env'), 'SCHWAB_CLIENT_ID=test-client\n');
    const lines = renderStatus(collectStatus(ctx)).split('\n');

    expect(lines).toContain('  FACTOR_EMAIL            not set');
    expect(lines.filter((line) => line.includes('[WARN]'))).toEqual([
      '  [WARN] FACTOR_EMAIL: missing required variable',
      '  [WARN] FACTOR_EMAIL_PASSWORD: missing required variable',
    ]);
  });

  it('should degrade to Unreadable when .env is a directory', () => {
    fs.mkdirSync(path.join(home, '.env'));
    const report = collectStatus(ctx);
    const lines = renderStatus(report).split('\n');

    expect(report.envFile).toBe(true);
    expect(report.credentials).toMatchObject({ readable: false });
    expect(lines.some((line) => line.startsWith('  .env                    Unreadable ('))).toBe(true);
  });
});
