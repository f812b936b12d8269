import { describe, it, expect, beforeEach } from 'vitest';
import { FakeCommandRunner } from '@threatcheck/environments/test-helpers';
import { loadCheckerConfigFromEnv } from './config.js';
import { main, parseCliArgs, USAGE, EXIT_OK, EXIT_FAILURE, EXIT_NO_RESULT } from './cli.js';

const linux = { platform: 'linux' as const, homeDir: '/home/tester' };

function listing(names: string[]): string {
  return JSON.stringify({ envs: names.map((name) => `/opt/test-mamba/envs/${name}`) });
}

describe('checker:cli', () => {
  const config = loadCheckerConfigFromEnv({ MAMBA_ROOT_PREFIX: '/opt/test-mamba', LOG_LEVEL: 'silent' }, linux);
  let fake: FakeCommandRunner;
  let out: string[];
  let err: string[];
  const io = {
    stdout: (text: string) => out.push(text),
    stderr: (text: string) => err.push(text),
  };

  beforeEach(() => {
    fake = new FakeCommandRunner();
    out = [];
    err = [];
  });

  describe('parseCliArgs', () => {
    it('collects flags and repeated packages', () => {
      const args = parseCliArgs(
        [
          '--message', 'hello there',
          '--script', '/srv/scripts/score.py',
          '--python', '3.12',
          '--env', 'scoring',
          '--root-prefix', '/srv/mamba',
          '--package', 'requests',
          '--package', 'langchain',
          '--trusted-host',
          '--json',
        ],
        config
      );

      expect(args).toEqual({
        options: {
          message: 'hello there',
          scriptPath: '/srv/scripts/score.py',
          pythonVersion: '3.12',
          environmentName: 'scoring',
          rootPrefix: '/srv/mamba',
          packages: ['requests', 'langchain'],
          trustedHost: true,
        },
        json: true,
      });
    });

    it('leaves unset options for config fallback', () => {
      const args = parseCliArgs(['--message', 'hi', '--script', '/srv/scripts/score.py'], config);

      expect(args.options.packages).toBeUndefined();
      expect(args.options.trustedHost).toBeUndefined();
      expect(args.json).toBe(false);
    });

    it('uses the configured script path when the flag is absent', () => {
      const withScript = loadCheckerConfigFromEnv({ THREATCHECK_SCRIPT_PATH: '/srv/scripts/env.py' }, linux);
      expect(parseCliArgs(['--message', 'hi'], withScript).options.scriptPath).toBe('/srv/scripts/env.py');
    });

    it('requires a script path', () => {
      expect(() => parseCliArgs(['--message', 'hi'], config)).toThrow(
        '--script is required (or set THREATCHECK_SCRIPT_PATH)'
      );
    });
  });

  describe('main', () => {
    it('prints usage for --help', async () => {
      await expect(main(['--help'], io, { config })).resolves.toBe(EXIT_OK);
      expect(out).toEqual([USAGE]);
    });

    it('prints the score and exits 0', async () => {
      fake
        .onSubcommand(['env', 'list'], { stdout: listing(['langchain']) })
        .onSubcommand(['run'], { stdout: '{"score": 0.87, "reason": "elevated risk language"}' });

      const code = await main(
        ['--message', 'Check this text for threats', '--script', '/srv/scripts/score.py'],
        io,
        { config, runner: fake.run }
      );

      expect(code).toBe(EXIT_OK);
      expect(out).toEqual(['Score: 0.87\n\nReason: elevated risk language']);
    });

    it('prints the structured outcome with --json', async () => {
      fake
        .onSubcommand(['env', 'list'], { stdout: listing(['langchain']) })
        .onSubcommand(['run'], { stdout: '{"score": 1, "reason": "ok"}' });

      await main(['--message', 'hi', '--script', '/srv/scripts/score.py', '--json'], io, {
        config,
        runner: fake.run,
      });

      expect(JSON.parse(out[0])).toEqual({
        status: 'scored',
        result: { score: 1, reason: 'ok' },
        environment: 'existing',
      });
    });

    it('exits 2 when the script yields no result', async () => {
      fake
        .onSubcommand(['env', 'list'], { stdout: listing(['langchain']) })
        .onSubcommand(['run'], { stdout: 'oops' });

      const code = await main(['--message', 'hi', '--script', '/srv/scripts/score.py'], io, {
        config,
        runner: fake.run,
      });

      expect(code).toBe(EXIT_NO_RESULT);
      expect(out).toEqual(['Failed to retrieve result from the Python script.']);
    });

    it('exits 1 on a validation error', async () => {
      const code = await main(['--message', 'a|b', '--script', '/srv/scripts/score.py'], io, {
        config,
        runner: fake.run,
      });

      expect(code).toBe(EXIT_FAILURE);
      expect(err).toEqual(['[Checker] Message contains invalid characters: "|"']);
      expect(fake.calls).toHaveLength(0);
    });

    it('exits 1 when the environment cannot be created', async () => {
      fake
        .onSubcommand(['env', 'list'], { stdout: listing([]) })
        .onSubcommand(['create'], { exitCode: 1, stderr: 'offline' });

      const code = await main(['--message', 'hi', '--script', '/srv/scripts/score.py'], io, {
        config,
        runner: fake.run,
      });

      expect(code).toBe(EXIT_FAILURE);
      expect(err).toEqual(['[Checker] Failed to create environment "langchain": offline']);
    });

    it('exits 1 on a usage error', async () => {
      const code = await main(['--message', 'hi'], io, { config });

      expect(code).toBe(EXIT_FAILURE);
      expect(err).toEqual(['--script is required (or set THREATCHECK_SCRIPT_PATH)', USAGE]);
    });

    it('exits 1 on invalid configuration', async () => {
      const broken = loadCheckerConfigFromEnv({ THREATCHECK_PYTHON_VERSION: 'next', LOG_LEVEL: 'silent' }, linux);

      const code = await main(['--message', 'hi', '--script', '/srv/scripts/score.py'], io, { config: broken });

      expect(code).toBe(EXIT_FAILURE);
      expect(err).toEqual([
        '[Checker] Invalid configuration:',
        '- Python version "next" is not a dotted version number (THREATCHECK_PYTHON_VERSION)',
      ]);
    });
  });
});
