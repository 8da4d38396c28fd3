/**
 * Action table - every command token the router accepts
 */

export type Action =
  | 'run'
  | 'schwab_enhanced'
  | 'diagnostics'
  | 'test_email'
  | 'test_schwab'
  | 'collect_data'
  | 'dashboard'
  | 'setup'
  | 'status'
  | 'help';

export interface ActionSpec {
  action: Action;
  aliases: readonly string[];
  description: string;
}

/** Listed in help order. The first alias is the canonical token. */
export const ACTION_SPECS: readonly ActionSpec[] = [
  { action: 'run', aliases: ['run', 'r'], description: 'Run factor analysis (default)' },
  {
    action: 'schwab_enhanced',
    aliases: ['schwab-enhanced', 'schwab-full', 'portfolio'],
    description: 'Run Schwab-enhanced portfolio analysis',
  },
  {
    action: 'diagnostics',
    aliases: ['test', 't', 'diagnostic', 'diagnostics'],
    description: 'Run system diagnostics',
  },
  { action: 'test_email', aliases: ['email', 'e'], description: 'Test email configuration' },
  { action: 'test_schwab', aliases: ['schwab', 's', 'api'], description: 'Test Schwab API connection' },
  { action: 'collect_data', aliases: ['data', 'd', 'collect'], description: 'Collect factor data' },
  {
    action: 'dashboard',
    aliases: ['dashboard', 'dash', 'monitor', 'm'],
    description: 'Start the monitoring dashboard',
  },
  { action: 'setup', aliases: ['setup', 'install', 'init'], description: 'First-time setup (.env, database, diagnostics)' },
  { action: 'status', aliases: ['status', 'stat', 'info'], description: 'Show system status' },
  { action: 'help', aliases: ['help', 'h', '-h', '--help'], description: 'Show this help' },
];

export const DEFAULT_TOKEN = 'run';

function buildAliasTable(specs: readonly ActionSpec[]): ReadonlyMap<string, Action> {
  const table = new Map<string, Action>();
  for (const spec of specs) {
    for (const alias of spec.aliases) {
      const existing = table.get(alias);
      if (existing) {
        throw new Error(`Alias "${alias}" is bound to both ${existing} and ${spec.action}`);
      }
      table.set(alias, spec.action);
    }
  }
  return table;
}

export const ALIAS_TABLE = buildAliasTable(ACTION_SPECS);

/** Case-sensitive exact match; no prefixes. */
export function resolveAction(token: string): Action | undefined {
  return ALIAS_TABLE.get(token);
}
