import type { HandlerTable } from '../router/context.js';
import {
  collectData,
  runAnalysis,
  runDiagnostics,
  runSchwabEnhanced,
  startDashboard,
  testEmail,
  testSchwab,
} from './delegate.js';
import { helpHandler } from './help.js';
import { setupHandler } from './setup.js';
import { statusHandler } from './status.js';

export const HANDLERS: HandlerTable = {
  run: runAnalysis,
  schwab_enhanced: runSchwabEnhanced,
  diagnostics: runDiagnostics,
  test_email: testEmail,
  test_schwab: testSchwab,
  collect_data: collectData,
  dashboard: startDashboard,
  setup: setupHandler,
  status: statusHandler,
  help: helpHandler,
};
