import { EventEmitter } from 'node:events';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { ProgressSample } from '@transcoder/core';

const spawn = vi.hoisted(() => vi.fn());
vi.mock('node:child_process', () => ({ spawn }));

import { FFmpegEngine } from './engine.js';

class FakeStream extends EventEmitter {
  setEncoding = vi.fn();
}

class FakeChild extends EventEmitter {
  readonly pid = 777;
  readonly stdout = new FakeStream();
  readonly stderr = new FakeStream();
  readonly kill = vi.fn((_signal?: NodeJS.Signals) => true);
}

describe('FFmpegEngine', () => {
  let child: FakeChild;

  beforeEach(() => {
    child = new FakeChild();
    spawn.mockReset();
    spawn.mockReturnValue(child);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('spawns ffmpeg with progress reporting ahead of the plan arguments', () => {
    const engine = new FFmpegEngine({ ffmpegPath: '/opt/bin/ffmpeg' });
    const handle = engine.execute(['-y', '-i', 'in.mp4', 'out.mp3']);

    expect(spawn).toHaveBeenCalledWith(
      '/opt/bin/ffmpeg',
      ['-hide_banner', '-nostats', '-progress', 'pipe:1', '-y', '-i', 'in.mp4', 'out.mp3'],
      { stdio: ['ignore', 'pipe', 'pipe'] }
    );
    expect(handle.pid).toBe(777);
  });

  it('forwards timed progress blocks as telemetry', () => {
    const samples: ProgressSample[] = [];
    const engine = new FFmpegEngine();
    engine.execute(['out.mp3'], { onTelemetry: sample => samples.push(sample) });

    child.stdout.emit('data', 'out_time_us=N/A\nprogress=continue\n');
    child.stdout.emit('data', 'out_time_us=2000000\nprogress=continue\nout_time_us=3500000\n');
    child.stdout.emit('data', 'progress=end\n');

    expect(samples).toEqual([{ elapsedMs: 2000 }, { elapsedMs: 3500 }]);
  });

  it('resolves completion with the exit status and stderr', async () => {
    const engine = new FFmpegEngine();
    const handle = engine.execute(['out.mp3']);

    child.stderr.emit('data', 'Conversion failed!\n');
    child.emit('close', 1, null);

    await expect(handle.completion).resolves.toEqual({
      exitCode: 1,
      signal: null,
      log: 'Conversion failed!\n',
    });
  });

  it('keeps only the tail of a long stderr', async () => {
    const engine = new FFmpegEngine({ maxLogChars: 8 });
    const handle = engine.execute(['out.mp3']);

    child.stderr.emit('data', 'abcdefgh');
    child.stderr.emit('data', 'ijkl');
    child.emit('close', 0, null);

    expect((await handle.completion).log).toBe('efghijkl');
  });

  it('resolves instead of rejecting when the spawn fails', async () => {
    const engine = new FFmpegEngine();
    const handle = engine.execute(['out.mp3']);

    child.emit('error', new Error('spawn ffmpeg ENOENT'));
    child.emit('close', -2, null);

    await expect(handle.completion).resolves.toEqual({
      exitCode: null,
      signal: null,
      log: 'spawn ffmpeg ENOENT',
    });
  });

  it('escalates to SIGKILL when SIGTERM is ignored', () => {
    vi.useFakeTimers();
    const engine = new FFmpegEngine({ killGraceMs: 1000 });
    const handle = engine.execute(['out.mp3']);

    engine.terminate(handle);
    engine.terminate(handle);
    expect(child.kill).toHaveBeenCalledTimes(1);
    expect(child.kill).toHaveBeenLastCalledWith('SIGTERM');

    vi.advanceTimersByTime(1000);
    expect(child.kill).toHaveBeenLastCalledWith('SIGKILL');
  });

  it('does not escalate once the process has exited', async () => {
    vi.useFakeTimers();
    const engine = new FFmpegEngine({ killGraceMs: 1000 });
    const handle = engine.execute(['out.mp3']);

    engine.terminate(handle);
    child.emit('close', null, 'SIGTERM');
    await expect(handle.completion).resolves.toMatchObject({ signal: 'SIGTERM' });

    vi.advanceTimersByTime(5000);
    expect(child.kill).toHaveBeenCalledTimes(1);
  });

  it('ignores termination of finished runs', () => {
    const engine = new FFmpegEngine();
    const handle = engine.execute(['out.mp3']);
    child.emit('close', 0, null);

    engine.terminate(handle);
    expect(child.kill).not.toHaveBeenCalled();
  });
});
