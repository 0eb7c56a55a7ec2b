/**
 * Argument Parsing
 *
 * commander option parsers. Each throws InvalidArgumentError so commander
 * reports the bad value and exits.
 */

import { InvalidArgumentError } from 'commander';
import type { ClipWindow, Outcome } from '@transcoder/core';
import { parseTimecode } from '@transcoder/utils';

const SECONDS_PATTERN = /^\d+(\.\d+)?$/;

export const EXIT_CODES = {
  success: 0,
  failure: 1,
  cancelled: 130,
} as const;

/**
 * Seconds (`12.5`) or a timecode (`00:01:02.500`) to milliseconds
 */
export function parseTimeArg(value: string): number {
  const trimmed = value.trim();

  if (SECONDS_PATTERN.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000);
  }

  try {
    return parseTimecode(trimmed);
  } catch {
    throw new InvalidArgumentError(`Expected seconds or HH:MM:SS.mmm, got "${value}"`);
  }
}

/**
 * Clip window from --start/--end. A missing start means the beginning of
 * the input; a start without an end cannot be planned.
 */
export function buildClipWindow(startMs?: number, endMs?: number): ClipWindow | undefined {
  if (startMs === undefined && endMs === undefined) return undefined;
  if (endMs === undefined) {
    throw new InvalidArgumentError('--start requires --end');
  }
  return { startMs: startMs ?? 0, endMs };
}

export function exitCodeFor(outcome: Outcome): number {
  switch (outcome.reason) {
    case 'completed':
      return EXIT_CODES.success;
    case 'cancelled':
      return EXIT_CODES.cancelled;
    case 'engine-failure':
      return EXIT_CODES.failure;
  }
}
