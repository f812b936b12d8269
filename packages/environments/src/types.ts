export interface EnvironmentDescriptor {
  name: string;
  pythonVersion: string;
}

/**
 * Outcome of a single external process run.
 */
export interface CommandResult {
  success: boolean;
  command: string;
  stdout: string;
  stderr: string;
  exitCode: number | null;
  timedOut: boolean;
}

export interface RunCommandOptions {
  /** Extra variables merged over the parent environment for this child only */
  env?: Record<string, string>;
  cwd?: string;
  /** Kill the child after this many ms; 0 or undefined disables the timeout */
  timeoutMs?: number;
}

export type CommandRunner = (
  cmd: string,
  args: string[],
  options?: RunCommandOptions
) => Promise<CommandResult>;

export interface PackageInstallResult {
  packageName: string;
  success: boolean;
  exitCode: number | null;
  stderr: string;
}

export interface ProvisionResult {
  created: boolean;
  packages: PackageInstallResult[];
  error?: string;
}

export interface ProvisionOptions {
  packages?: string[];
  trustedHost?: boolean;
}

export interface MicromambaConfig {
  executable: string;
  rootPrefix: string;
  channel: string;
  trustedHosts: string[];
  timeoutMs: number;
}
