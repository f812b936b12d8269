import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

class FakeChild extends EventEmitter {
  stdout = new PassThrough();
  stderr = new PassThrough();
  kill = vi.fn((_signal?: string) => {
    this.emit('close', null);
    return true;
  });
}

/** Exits on kill but leaves the pipes open, as when a grandchild still holds them. */
class PipeHoldingChild extends FakeChild {
  kill = vi.fn((signal?: string) => {
    this.emit('exit', null, signal);
    return true;
  });
}

const spawnMock = vi.hoisted(() => vi.fn());

vi.mock('node:child_process', () => ({
  spawn: spawnMock,
}));

import { runCommand, renderCommand } from './command-runner.js';

describe('environments:command-runner', () => {
  let child: FakeChild;

  beforeEach(() => {
    child = new FakeChild();
    spawnMock.mockReset();
    spawnMock.mockReturnValue(child);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('renders the command line for logs', () => {
    expect(renderCommand('micromamba', ['env', 'list'])).toBe('micromamba env list');
  });

  it('spawns without a shell and collects output', async () => {
    const pending = runCommand('micromamba', ['env', 'list']);

    child.stdout.emit('data', Buffer.from('langchain\n'));
    child.stderr.emit('data', Buffer.from('note\n'));
    child.emit('close', 0);

    const result = await pending;
    expect(result).toEqual({
      success: true,
      command: 'micromamba env list',
      stdout: 'langchain\n',
      stderr: 'note\n',
      exitCode: 0,
      timedOut: false,
    });
    expect(spawnMock).toHaveBeenCalledWith(
      'micromamba',
      ['env', 'list'],
      expect.objectContaining({ shell: false })
    );
  });

  it('merges per-call env over the parent environment', async () => {
    const pending = runCommand('micromamba', ['env', 'list'], {
      env: { MAMBA_ROOT_PREFIX: '/tmp/mamba-root' },
    });
    child.emit('close', 0);
    await pending;

    const options = spawnMock.mock.calls[0][2];
    expect(options.env.MAMBA_ROOT_PREFIX).toBe('/tmp/mamba-root');
    expect(process.env.MAMBA_ROOT_PREFIX).not.toBe('/tmp/mamba-root');
  });

  it('reports non-zero exit as failure', async () => {
    const pending = runCommand('micromamba', ['create']);
    child.stderr.emit('data', Buffer.from('solver failed'));
    child.emit('close', 1);

    const result = await pending;
    expect(result.success).toBe(false);
    expect(result.exitCode).toBe(1);
    expect(result.stderr).toBe('solver failed');
  });

  it('folds launch errors into stderr instead of rejecting', async () => {
    const pending = runCommand('missing-binary', []);
    child.emit('error', new Error('spawn missing-binary ENOENT'));
    child.emit('close', -2);

    const result = await pending;
    expect(result.success).toBe(false);
    expect(result.stderr).toBe('spawn missing-binary ENOENT');
  });

  it('kills the child when the timeout elapses', async () => {
    vi.useFakeTimers();
    const pending = runCommand('micromamba', ['create'], { timeoutMs: 1000 });

    vi.advanceTimersByTime(1000);
    const result = await pending;

    expect(child.kill).toHaveBeenCalledWith('SIGTERM');
    expect(result.timedOut).toBe(true);
    expect(result.success).toBe(false);
    expect(result.stderr).toBe('Command timed out after 1000ms: micromamba create');
  });

  it('stops waiting once the child exits after a timeout even if the pipes stay open', async () => {
    vi.useFakeTimers();
    const holder = new PipeHoldingChild();
    spawnMock.mockReturnValue(holder);
    const pending = runCommand('micromamba', ['run', '-n', 'langchain', 'python', 'slow.py'], { timeoutMs: 500 });

    holder.stdout.emit('data', Buffer.from('partial'));
    vi.advanceTimersByTime(500);
    const result = await pending;

    expect(holder.kill).toHaveBeenCalledWith('SIGTERM');
    expect(holder.stdout.destroyed).toBe(true);
    expect(holder.stderr.destroyed).toBe(true);
    expect(result).toEqual({
      success: false,
      command: 'micromamba run -n langchain python slow.py',
      stdout: 'partial',
      stderr: 'Command timed out after 500ms: micromamba run -n langchain python slow.py',
      exitCode: null,
      timedOut: true,
    });
  });

  it('resolves only once when close follows exit', async () => {
    vi.useFakeTimers();
    const pending = runCommand('micromamba', ['create'], { timeoutMs: 100 });

    vi.advanceTimersByTime(100);
    child.emit('exit', 0);
    child.emit('close', 0);
    const result = await pending;

    expect(result.exitCode).toBeNull();
    expect(result.timedOut).toBe(true);
  });
});
