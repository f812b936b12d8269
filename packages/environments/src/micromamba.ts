/**
 * Micromamba Integration
 *
 * Looks up, creates and populates named Python environments through the
 * micromamba CLI. The root prefix is passed to each child explicitly;
 * the parent process environment is never modified.
 */

import { basename, dirname, join, resolve } from 'node:path';
import { runCommand } from './command-runner';
import { createLogger, type Logger } from './logger';
import type {
  CommandResult,
  CommandRunner,
  EnvironmentDescriptor,
  MicromambaConfig,
  PackageInstallResult,
  ProvisionOptions,
  ProvisionResult,
} from './types';

export interface MicromambaClientOptions {
  runner?: CommandRunner;
  logger?: Logger;
}

/**
 * Parses the plain-text `env list` output into environment names.
 * Each non-comment line contributes its first column, trimmed.
 */
export function parseEnvironmentListing(stdout: string): string[] {
  const names: string[] = [];

  for (const rawLine of stdout.split('\n')) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) {
      continue;
    }
    const [name] = line.split(/\s+/);
    names.push(name);
  }

  return names;
}

function isObjectLike(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Parses `env list --json` output. Only environments that `run -n` can reach
 * under `rootPrefix` are returned: `<rootPrefix>/envs/<name>` as `name`, and
 * the root prefix itself as `base`. Returns null when the output is not the
 * expected `{ "envs": [path, ...] }` document.
 */
export function parseEnvironmentListingJson(stdout: string, rootPrefix: string): string[] | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch {
    return null;
  }

  if (!isObjectLike(parsed) || !Array.isArray(parsed.envs)) {
    return null;
  }

  const root = resolve(rootPrefix);
  const envsDir = join(root, 'envs');
  const names: string[] = [];

  for (const entry of parsed.envs) {
    if (typeof entry !== 'string' || !entry.trim()) {
      continue;
    }
    const location = resolve(entry.trim());
    if (location === root) {
      names.push('base');
    } else if (dirname(location) === envsDir) {
      names.push(basename(location));
    }
  }

  return names;
}

export class MicromambaClient {
  readonly config: MicromambaConfig;
  private runner: CommandRunner;
  private logger: Logger;

  constructor(config: MicromambaConfig, options: MicromambaClientOptions = {}) {
    this.config = config;
    this.runner = options.runner || runCommand;
    this.logger = options.logger || createLogger('Micromamba');
  }

  /**
   * Runs a micromamba subcommand against the configured root prefix.
   */
  exec(args: string[]): Promise<CommandResult> {
    return this.runner(this.config.executable, ['--root-prefix', this.config.rootPrefix, ...args], {
      env: { MAMBA_ROOT_PREFIX: this.config.rootPrefix },
      timeoutMs: this.config.timeoutMs,
    });
  }

  /**
   * Runs a command inside a named environment.
   */
  runIn(environmentName: string, command: string[]): Promise<CommandResult> {
    return this.exec(['run', '-n', environmentName, ...command]);
  }

  async listEnvironments(): Promise<string[]> {
    const result = await this.exec(['env', 'list', '--json']);

    if (!result.success) {
      this.logger.warn(`Environment listing failed (exit ${result.exitCode}):`, result.stderr.trim());
      return [];
    }

    const structured = parseEnvironmentListingJson(result.stdout, this.config.rootPrefix);
    if (structured) {
      return structured;
    }

    this.logger.debug('Listing was not JSON, falling back to text parsing');
    return parseEnvironmentListing(result.stdout);
  }

  /**
   * True only when an environment name matches exactly; prefixes do not count.
   */
  async environmentExists(name: string): Promise<boolean> {
    const wanted = name.trim();
    const environments = await this.listEnvironments();
    return environments.some((environment) => environment.trim() === wanted);
  }

  async createEnvironment(
    descriptor: EnvironmentDescriptor,
    options: Pick<ProvisionOptions, 'trustedHost'> = {}
  ): Promise<CommandResult> {
    const args = [
      'create',
      '-y',
      '-n',
      descriptor.name,
      `python=${descriptor.pythonVersion}`,
      '-c',
      this.config.channel,
    ];
    if (options.trustedHost) {
      args.push('--ssl-verify', 'false');
    }

    this.logger.info(`Creating environment ${descriptor.name} (python ${descriptor.pythonVersion})`);
    const result = await this.exec(args);

    if (!result.success) {
      this.logger.error(
        `Failed to create environment ${descriptor.name} (exit ${result.exitCode}):`,
        result.stderr.trim()
      );
    }

    return result;
  }

  /**
   * Installs each package independently. A failed install is recorded and the
   * remaining packages are still attempted.
   */
  async installPackages(
    environmentName: string,
    packages: string[],
    options: Pick<ProvisionOptions, 'trustedHost'> = {}
  ): Promise<PackageInstallResult[]> {
    const hostArgs = options.trustedHost
      ? this.config.trustedHosts.flatMap((host) => ['--trusted-host', host])
      : [];

    const results: PackageInstallResult[] = [];

    for (const packageName of packages) {
      const result = await this.runIn(environmentName, [
        'python',
        '-m',
        'pip',
        'install',
        ...hostArgs,
        packageName,
      ]);

      if (result.success) {
        this.logger.info(`Installed ${packageName} into ${environmentName}`);
      } else {
        this.logger.warn(`Failed to install ${packageName} (exit ${result.exitCode}):`, result.stderr.trim());
      }

      results.push({
        packageName,
        success: result.success,
        exitCode: result.exitCode,
        stderr: result.stderr,
      });
    }

    return results;
  }

  /**
   * Creates the environment and, if that succeeds, installs the extra packages.
   * Failures are reported in the result, never thrown.
   */
  async provisionEnvironment(
    descriptor: EnvironmentDescriptor,
    options: ProvisionOptions = {}
  ): Promise<ProvisionResult> {
    const created = await this.createEnvironment(descriptor, options);

    if (!created.success) {
      return {
        created: false,
        packages: [],
        error: created.stderr.trim() || `exit code ${created.exitCode}`,
      };
    }

    const packages = options.packages?.length
      ? await this.installPackages(descriptor.name, options.packages, options)
      : [];

    return { created: true, packages };
  }
}
