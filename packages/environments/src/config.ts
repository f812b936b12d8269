import { homedir } from 'node:os';
import { join } from 'node:path';
import type { MicromambaConfig } from './types';

export const DEFAULT_TRUSTED_HOSTS = ['pypi.org', 'pypi.python.org', 'files.pythonhosted.org'];

export interface PlatformInfo {
  platform: NodeJS.Platform;
  homeDir: string;
}

function currentPlatform(): PlatformInfo {
  return { platform: process.platform, homeDir: homedir() };
}

/**
 * Per-user application data directory for the current platform.
 */
export function resolveAppDataDir(
  env: NodeJS.ProcessEnv = process.env,
  { platform, homeDir }: PlatformInfo = currentPlatform()
): string {
  if (platform === 'win32') {
    return env.APPDATA || join(homeDir, 'AppData', 'Roaming');
  }
  if (platform === 'darwin') {
    return join(homeDir, 'Library', 'Application Support');
  }
  return env.XDG_DATA_HOME || join(homeDir, '.local', 'share');
}

export function defaultRootPrefix(
  env: NodeJS.ProcessEnv = process.env,
  platformInfo?: PlatformInfo
): string {
  return join(resolveAppDataDir(env, platformInfo), 'micromamba');
}

export function parseList(value?: string): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

export function parseTimeout(value?: string): number {
  const parsed = parseInt(value || '0', 10);
  return Number.isNaN(parsed) ? 0 : parsed;
}

export function loadMicromambaConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  platformInfo?: PlatformInfo
): MicromambaConfig {
  const trustedHosts = parseList(env.THREATCHECK_TRUSTED_HOSTS);

  return {
    executable: env.MICROMAMBA_EXE || 'micromamba',
    rootPrefix: env.MAMBA_ROOT_PREFIX || defaultRootPrefix(env, platformInfo),
    channel: env.THREATCHECK_CHANNEL || 'conda-forge',
    trustedHosts: trustedHosts.length > 0 ? trustedHosts : [...DEFAULT_TRUSTED_HOSTS],
    timeoutMs: parseTimeout(env.THREATCHECK_COMMAND_TIMEOUT_MS),
  };
}

export function describeMicromambaConfig(config: MicromambaConfig): string {
  return `${config.executable}@${config.rootPrefix} (channel ${config.channel})`;
}
