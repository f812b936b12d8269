/**
 * Threat Check Orchestrator
 *
 * Validate -> look up -> provision (when missing) -> invoke -> format.
 * Each external call runs once; nothing is retried.
 */

import { validateMessage } from '@threatcheck/security/message-validator';
import {
  MicromambaClient,
  EnvironmentProvisioningError,
  createLogger,
  describeMicromambaConfig,
  type CommandRunner,
  type Logger,
} from '@threatcheck/environments';
import { config as defaultConfig, type CheckerConfig } from './config';
import { invokeScript, type ScriptResult } from './integrations/script-invoker';

export const FAILURE_MESSAGE = 'Failed to retrieve result from the Python script.';

export interface CheckOptions {
  message: string | null | undefined;
  scriptPath: string;
  pythonVersion?: string;
  environmentName?: string;
  rootPrefix?: string;
  packages?: string[];
  trustedHost?: boolean;
}

export type ResolvedCheckOptions = Required<CheckOptions>;

export type EnvironmentState = 'existing' | 'created';

export type CheckOutcome =
  | { status: 'scored'; result: ScriptResult; environment: EnvironmentState }
  | { status: 'no-result'; environment: EnvironmentState };

export interface CheckDependencies {
  config?: CheckerConfig;
  runner?: CommandRunner;
  logger?: Logger;
}

/**
 * Fills unset options from the service config.
 */
export function resolveCheckOptions(
  options: CheckOptions,
  config: CheckerConfig = defaultConfig
): ResolvedCheckOptions {
  return {
    message: options.message,
    scriptPath: options.scriptPath,
    pythonVersion: options.pythonVersion ?? config.check.pythonVersion,
    environmentName: (options.environmentName ?? config.check.environmentName).trim(),
    rootPrefix: options.rootPrefix ?? config.micromamba.rootPrefix,
    packages: options.packages ?? config.check.packages,
    trustedHost: options.trustedHost ?? config.check.trustedHost,
  };
}

export function formatOutcome(outcome: CheckOutcome): string {
  if (outcome.status === 'scored') {
    return `Score: ${outcome.result.score}\n\nReason: ${outcome.result.reason}`;
  }
  return FAILURE_MESSAGE;
}

/**
 * Runs a check and returns the structured outcome.
 *
 * @throws MessageValidationError when the message is rejected
 * @throws EnvironmentProvisioningError when a missing environment cannot be created
 */
export async function runCheck(options: CheckOptions, deps: CheckDependencies = {}): Promise<CheckOutcome> {
  const config = deps.config ?? defaultConfig;
  const level = config.logging.level;
  const logger = deps.logger ?? createLogger('Checker', level);
  const resolved = resolveCheckOptions(options, config);

  const client = new MicromambaClient(
    { ...config.micromamba, rootPrefix: resolved.rootPrefix },
    { runner: deps.runner, logger: deps.logger ?? createLogger('Micromamba', level) }
  );
  logger.debug(`Using ${describeMicromambaConfig(client.config)}`);

  const message = validateMessage(resolved.message);

  let environment: EnvironmentState = 'existing';

  if (await client.environmentExists(resolved.environmentName)) {
    logger.debug(`Environment ${resolved.environmentName} already exists`);
  } else {
    logger.info(`Environment ${resolved.environmentName} not found, provisioning`);
    const provisioned = await client.provisionEnvironment(
      { name: resolved.environmentName, pythonVersion: resolved.pythonVersion },
      { packages: resolved.packages, trustedHost: resolved.trustedHost }
    );

    if (!provisioned.created) {
      throw new EnvironmentProvisioningError(resolved.environmentName, provisioned.error);
    }

    const failed = provisioned.packages.filter((item) => !item.success);
    if (failed.length > 0) {
      logger.warn(
        `${failed.length} of ${provisioned.packages.length} packages failed to install:`,
        failed.map((item) => item.packageName).join(', ')
      );
    }
    environment = 'created';
  }

  const result = await invokeScript(
    client,
    { scriptPath: resolved.scriptPath, environmentName: resolved.environmentName, message },
    deps.logger ?? createLogger('ScriptInvoker', level)
  );

  return result ? { status: 'scored', result, environment } : { status: 'no-result', environment };
}

/**
 * Single entry point: returns the human-readable score/reason text, or the
 * fixed failure message when the script produced no result.
 */
export async function checkMessage(options: CheckOptions, deps: CheckDependencies = {}): Promise<string> {
  return formatOutcome(await runCheck(options, deps));
}
