/**
 * Help and banner text
 */

import chalk from 'chalk';
import { ACTION_SPECS } from './actions.js';

export const PROGRAM_NAME = 'factor';
export const DASHBOARD_URL = 'http://localhost:8050';

const RULE_WIDTH = 60;

const EXAMPLES: ReadonlyArray<[string, string]> = [
  [PROGRAM_NAME, 'Run factor analysis'],
  [`${PROGRAM_NAME} data`, 'Collect the latest factor data'],
  [`${PROGRAM_NAME} dashboard`, `Start the dashboard on ${DASHBOARD_URL}`],
  [`${PROGRAM_NAME} setup`, 'Create .env, set up the database, run diagnostics'],
  [`${PROGRAM_NAME} status`, 'Check configuration and last data collection'],
];

export function renderBanner(): string {
  const rule = '='.repeat(RULE_WIDTH);
  return [
    chalk.cyan(rule),
    chalk.cyan.bold('  Factor Investment System'),
    chalk.cyan(rule),
  ].join('\n');
}

export function renderHelp(): string {
  const rows = ACTION_SPECS.map((spec) => [spec.aliases.join(', '), spec.description] as const);
  const width = Math.max(...rows.map(([aliases]) => aliases.length)) + 2;
  const exampleWidth = Math.max(...EXAMPLES.map(([command]) => command.length)) + 2;

  const lines = [
    renderBanner(),
    '',
    `${chalk.bold('Usage:')} ${PROGRAM_NAME} [command]`,
    '',
    chalk.bold('Commands:'),
    ...rows.map(([aliases, description]) => `  ${chalk.green(aliases.padEnd(width))}${description}`),
    '',
    chalk.bold('Examples:'),
    ...EXAMPLES.map(([command, description]) => `  ${command.padEnd(exampleWidth)}${chalk.gray(`# ${description}`)}`),
  ];

  return lines.join('\n');
}
