/**
 * Duration Resolver
 *
 * Finds the progress denominator for a request: the clip length for clips,
 * otherwise the probed duration of the whole input. Probe trouble is never
 * fatal; the job just runs without progress.
 */

import type { ConversionRequest } from '@transcoder/core';
import { isNonEmptyString, logger, type Logger } from '@transcoder/utils';
import type { MediaProber, ProbeMetadata } from './types.js';

/**
 * Read `format.duration` (decimal seconds) as milliseconds
 */
export function parseProbedDuration(metadata: ProbeMetadata): number | null {
  const raw = metadata.format?.duration;
  if (!isNonEmptyString(raw)) return null;

  const seconds = Number(raw.trim());
  if (!Number.isFinite(seconds) || seconds <= 0) return null;

  return Math.round(seconds * 1000);
}

export async function resolveDuration(
  request: ConversionRequest,
  prober: MediaProber,
  log: Logger = logger
): Promise<number | null> {
  if (request.clip) {
    return request.clip.endMs - request.clip.startMs;
  }

  try {
    const metadata = await prober.probe(request.inputPath);
    const durationMs = parseProbedDuration(metadata);
    if (durationMs === null) {
      log.warn({ input: request.inputPath }, 'Probe returned no usable duration; progress disabled');
    }
    return durationMs;
  } catch (error) {
    log.warn(
      { input: request.inputPath, err: error },
      'Could not determine media duration; progress disabled'
    );
    return null;
  }
}
