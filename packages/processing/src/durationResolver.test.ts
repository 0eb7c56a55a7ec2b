import { describe, expect, it, vi } from 'vitest';
import { parseProbedDuration, resolveDuration } from './durationResolver.js';
import type { MediaProber, ProbeMetadata } from './types.js';

function proberReturning(metadata: ProbeMetadata) {
  return { probe: vi.fn(async (_inputPath: string) => metadata) };
}

describe('parseProbedDuration', () => {
  it('converts decimal seconds to milliseconds', () => {
    expect(parseProbedDuration({ format: { duration: '12.3456' } })).toBe(12346);
    expect(parseProbedDuration({ format: { duration: ' 60 ' } })).toBe(60000);
  });

  it('returns null for missing or unusable durations', () => {
    expect(parseProbedDuration({})).toBeNull();
    expect(parseProbedDuration({ format: {} })).toBeNull();
    expect(parseProbedDuration({ format: { duration: 'N/A' } })).toBeNull();
    expect(parseProbedDuration({ format: { duration: '0' } })).toBeNull();
    expect(parseProbedDuration({ format: { duration: '-3' } })).toBeNull();
  });
});

describe('resolveDuration', () => {
  it('uses the clip length without probing', async () => {
    const prober = proberReturning({ format: { duration: '100' } });
    const duration = await resolveDuration(
      { inputPath: 'a.mp4', outputPath: 'b.mp4', format: 'mp4', clip: { startMs: 2000, endMs: 9500 } },
      prober
    );

    expect(duration).toBe(7500);
    expect(prober.probe).not.toHaveBeenCalled();
  });

  it('probes full-file jobs', async () => {
    const prober = proberReturning({ format: { duration: '42.5' } });
    const duration = await resolveDuration({ inputPath: 'a.mp4', outputPath: 'b.mp3', format: 'mp3' }, prober);

    expect(duration).toBe(42500);
    expect(prober.probe).toHaveBeenCalledWith('a.mp4');
  });

  it('degrades to null when probing fails', async () => {
    const prober: MediaProber = {
      probe: async () => {
        throw new Error('ffprobe not found');
      },
    };

    await expect(resolveDuration({ inputPath: 'a.wav', outputPath: 'b.mp3', format: 'mp3' }, prober)).resolves.toBeNull();
  });
});
