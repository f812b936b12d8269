import type { CommandResult, CommandRunner, RunCommandOptions } from './types';

export interface RecordedCall {
  cmd: string;
  args: string[];
  options?: RunCommandOptions;
}

export type ScriptedResponse = Partial<CommandResult> | ((call: RecordedCall) => Partial<CommandResult>);

/**
 * In-process stand-in for the micromamba CLI. Each call consumes the first
 * matcher whose predicate accepts the rendered argument list.
 */
export class FakeCommandRunner {
  readonly calls: RecordedCall[] = [];
  private routes: { match: (args: string[]) => boolean; response: ScriptedResponse }[] = [];

  on(match: (args: string[]) => boolean, response: ScriptedResponse): this {
    this.routes.push({ match, response });
    return this;
  }

  onSubcommand(subcommand: string[], response: ScriptedResponse): this {
    return this.on((args) => startsWithSubcommand(args, subcommand), response);
  }

  readonly run: CommandRunner = async (cmd, args, options) => {
    const call: RecordedCall = { cmd, args, options };
    this.calls.push(call);

    const route = this.routes.find((candidate) => candidate.match(args));
    const partial = route
      ? typeof route.response === 'function'
        ? route.response(call)
        : route.response
      : { success: false, exitCode: 127, stderr: `unexpected command: ${args.join(' ')}` };

    const exitCode = partial.exitCode ?? (partial.success === false ? 1 : 0);
    return {
      success: partial.success ?? exitCode === 0,
      command: [cmd, ...args].join(' '),
      stdout: partial.stdout ?? '',
      stderr: partial.stderr ?? '',
      exitCode,
      timedOut: partial.timedOut ?? false,
    };
  };

  /** Calls with the leading `--root-prefix <path>` pair removed. */
  subcommands(): string[][] {
    return this.calls.map((call) => stripRootPrefix(call.args));
  }
}

export function stripRootPrefix(args: string[]): string[] {
  return args[0] === '--root-prefix' ? args.slice(2) : args;
}

function startsWithSubcommand(args: string[], subcommand: string[]): boolean {
  const rest = stripRootPrefix(args);
  return subcommand.every((part, index) => rest[index] === part);
}

export const silentLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
