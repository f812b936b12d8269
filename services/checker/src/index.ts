/**
 * Checker Service Entry Point
 *
 * Public API: `checkMessage` returns display text, `runCheck` the structured outcome.
 */

export {
  checkMessage,
  runCheck,
  formatOutcome,
  resolveCheckOptions,
  FAILURE_MESSAGE,
  type CheckOptions,
  type CheckOutcome,
  type CheckDependencies,
  type EnvironmentState,
  type ResolvedCheckOptions,
} from './orchestrator';
export { loadCheckerConfigFromEnv, validateConfig, type CheckerConfig } from './config';
export { invokeScript, parseScriptOutput, scriptResultSchema, type ScriptResult } from './integrations';
