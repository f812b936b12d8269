export class EnvironmentProvisioningError extends Error {
  readonly environmentName: string;

  constructor(environmentName: string, detail?: string) {
    super(
      `Failed to create environment "${environmentName}"${detail ? `: ${detail}` : ''}`
    );
    this.name = 'EnvironmentProvisioningError';
    this.environmentName = environmentName;
  }
}

export class CommandTimeoutError extends Error {
  readonly command: string;
  readonly timeoutMs: number;

  constructor(command: string, timeoutMs: number) {
    super(`Command timed out after ${timeoutMs}ms: ${command}`);
    this.name = 'CommandTimeoutError';
    this.command = command;
    this.timeoutMs = timeoutMs;
  }
}
