/**
 * Checker Configuration
 *
 * Environment-based configuration for the checker service.
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  loadMicromambaConfigFromEnv,
  parseList,
  parseLogLevel,
  type LogLevel,
  type MicromambaConfig,
  type PlatformInfo,
} from '@threatcheck/environments';

// Load environment variables from root .env
const configDir = dirname(fileURLToPath(import.meta.url));
dotenvConfig({ path: resolve(configDir, '../../../.env') });

export const DEFAULT_PYTHON_VERSION = '3.11';
export const DEFAULT_ENVIRONMENT_NAME = 'langchain';

export interface CheckerConfig {
  // Scoring script
  check: {
    scriptPath?: string;
    pythonVersion: string;
    environmentName: string;
    packages: string[];
    trustedHost: boolean;
  };

  // Environment manager
  micromamba: MicromambaConfig;

  // Logging
  logging: {
    level: LogLevel;
  };
}

export function loadCheckerConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  platformInfo?: PlatformInfo
): CheckerConfig {
  return {
    check: {
      scriptPath: env.THREATCHECK_SCRIPT_PATH || undefined,
      pythonVersion: env.THREATCHECK_PYTHON_VERSION || DEFAULT_PYTHON_VERSION,
      environmentName: env.THREATCHECK_ENV_NAME || DEFAULT_ENVIRONMENT_NAME,
      packages: parseList(env.THREATCHECK_PACKAGES),
      trustedHost: env.THREATCHECK_TRUSTED_HOST === 'true',
    },

    micromamba: loadMicromambaConfigFromEnv(env, platformInfo),

    logging: {
      level: parseLogLevel(env.LOG_LEVEL),
    },
  };
}

export const config: CheckerConfig = loadCheckerConfigFromEnv();

/**
 * Validate configuration
 */
export function validateConfig(candidate: CheckerConfig = config): string[] {
  const errors: string[] = [];

  if (!candidate.check.environmentName.trim()) {
    errors.push('Environment name must not be empty (THREATCHECK_ENV_NAME)');
  }

  if (!/^\d+(\.\d+)*$/.test(candidate.check.pythonVersion)) {
    errors.push(
      `Python version "${candidate.check.pythonVersion}" is not a dotted version number (THREATCHECK_PYTHON_VERSION)`
    );
  }

  if (!candidate.micromamba.rootPrefix) {
    errors.push('Root prefix not configured (MAMBA_ROOT_PREFIX)');
  }

  if (candidate.micromamba.timeoutMs < 0) {
    errors.push('Command timeout must not be negative (THREATCHECK_COMMAND_TIMEOUT_MS)');
  }

  return errors;
}
