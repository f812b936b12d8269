#!/usr/bin/env node
import { fileURLToPath } from 'node:url';
import { resolve } from 'node:path';
import { MessageValidationError } from '@threatcheck/security/message-validator';
import { EnvironmentProvisioningError, type CommandRunner } from '@threatcheck/environments';
import { config as defaultConfig, validateConfig, type CheckerConfig } from './config';
import { formatOutcome, runCheck, type CheckOptions } from './orchestrator';

export const USAGE =
  'Usage: threatcheck --message <text> --script <path> [--python <version>] [--env <name>] ' +
  '[--root-prefix <dir>] [--package <name>]... [--trusted-host] [--json]';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_NO_RESULT = 2;

export interface CliArgs {
  options: CheckOptions;
  json: boolean;
}

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

function getArg(argv: string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  if (index === -1) return undefined;
  return argv[index + 1];
}

function getAllArgs(argv: string[], flag: string): string[] {
  const values: string[] = [];
  argv.forEach((arg, index) => {
    const next = argv[index + 1];
    if (arg === flag && next !== undefined) {
      values.push(next);
    }
  });
  return values;
}

function hasFlag(argv: string[], flag: string): boolean {
  return argv.includes(flag);
}

/**
 * Parses CLI arguments; unset values fall back to the service config.
 */
export function parseCliArgs(argv: string[], config: CheckerConfig = defaultConfig): CliArgs {
  const scriptPath = getArg(argv, '--script') ?? config.check.scriptPath;
  if (!scriptPath) {
    throw new Error('--script is required (or set THREATCHECK_SCRIPT_PATH)');
  }

  const packages = getAllArgs(argv, '--package');

  return {
    options: {
      message: getArg(argv, '--message'),
      scriptPath: resolve(scriptPath),
      pythonVersion: getArg(argv, '--python'),
      environmentName: getArg(argv, '--env'),
      rootPrefix: getArg(argv, '--root-prefix'),
      packages: packages.length > 0 ? packages : undefined,
      trustedHost: hasFlag(argv, '--trusted-host') ? true : undefined,
    },
    json: hasFlag(argv, '--json'),
  };
}

const processIO: CliIO = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
};

export async function main(
  argv: string[],
  io: CliIO = processIO,
  deps: { config?: CheckerConfig; runner?: CommandRunner } = {}
): Promise<number> {
  const config = deps.config ?? defaultConfig;

  if (hasFlag(argv, '--help') || hasFlag(argv, '-h')) {
    io.stdout(USAGE);
    return EXIT_OK;
  }

  const configErrors = validateConfig(config);
  if (configErrors.length > 0) {
    io.stderr('[Checker] Invalid configuration:');
    for (const error of configErrors) {
      io.stderr(`- ${error}`);
    }
    return EXIT_FAILURE;
  }

  let args: CliArgs;
  try {
    args = parseCliArgs(argv, config);
  } catch (error) {
    io.stderr(error instanceof Error ? error.message : String(error));
    io.stderr(USAGE);
    return EXIT_FAILURE;
  }

  try {
    const outcome = await runCheck(args.options, { config, runner: deps.runner });
    io.stdout(args.json ? JSON.stringify(outcome, null, 2) : formatOutcome(outcome));
    return outcome.status === 'scored' ? EXIT_OK : EXIT_NO_RESULT;
  } catch (error) {
    if (error instanceof MessageValidationError || error instanceof EnvironmentProvisioningError) {
      io.stderr(`[Checker] ${error.message}`);
      return EXIT_FAILURE;
    }
    throw error;
  }
}

const invokedDirectly = process.argv[1] !== undefined && resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (invokedDirectly) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('[Checker] Unexpected failure:', error);
      process.exitCode = EXIT_FAILURE;
    });
}
