/**
 * External Command Runner
 *
 * Spawns a child process without a shell and collects its output.
 * Never rejects: launch errors and timeouts are folded into the result.
 */

import { spawn } from 'node:child_process';
import { CommandTimeoutError } from './errors';
import type { CommandResult, CommandRunner, RunCommandOptions } from './types';

export function renderCommand(cmd: string, args: string[]): string {
  return [cmd, ...args].join(' ');
}

export const runCommand: CommandRunner = (
  cmd: string,
  args: string[],
  options: RunCommandOptions = {}
): Promise<CommandResult> => {
  const rendered = renderCommand(cmd, args);

  return new Promise((resolve) => {
    const child = spawn(cmd, args, {
      cwd: options.cwd,
      env: options.env ? { ...process.env, ...options.env } : process.env,
      shell: false,
    });

    let stdout = '';
    let stderr = '';
    let spawnError: string | null = null;
    let timedOut = false;
    let settled = false;
    let timer: NodeJS.Timeout | undefined;

    const finish = (exitCode: number | null): void => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      const combinedStderr = spawnError ? `${stderr}\n${spawnError}`.trim() : stderr;
      resolve({
        success: exitCode === 0 && !timedOut && spawnError === null,
        command: rendered,
        stdout,
        stderr: combinedStderr,
        exitCode,
        timedOut,
      });
    };

    if (options.timeoutMs && options.timeoutMs > 0) {
      const timeoutMs = options.timeoutMs;
      timer = setTimeout(() => {
        timedOut = true;
        spawnError = new CommandTimeoutError(rendered, timeoutMs).message;
        child.kill('SIGTERM');
        // A grandchild may still hold the pipes open; stop waiting on them
        child.stdout?.destroy();
        child.stderr?.destroy();
      }, timeoutMs);
    }

    child.stdout?.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    child.stderr?.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });
    child.on('error', (error) => {
      spawnError = error.message;
    });
    child.on('exit', (exitCode) => {
      // 'close' waits for every pipe to close; after a timeout the exit is enough
      if (timedOut) finish(exitCode);
    });
    child.on('close', (exitCode) => {
      finish(exitCode);
    });
  });
};
