/**
 * Outcome Classifier
 *
 * Maps an engine's terminal status to a structured Outcome. The log tail is
 * attached for operators and is never inspected for decisions.
 */

import type { Outcome, TerminalStatus } from '@transcoder/core';

export const DIAGNOSTIC_TAIL_LINES = 20;

export function logTail(log: string, lines: number = DIAGNOSTIC_TAIL_LINES): string {
  return log
    .split(/\r?\n/)
    .map(line => line.trimEnd())
    .filter(line => line.length > 0)
    .slice(-lines)
    .join('\n');
}

export function classifyOutcome(
  status: TerminalStatus,
  cancelRequested: boolean,
  log: string
): Outcome {
  let outcome: Outcome;

  if (cancelRequested) {
    outcome = { succeeded: false, reason: 'cancelled', exitCode: status.exitCode };
  } else if (status.exitCode === 0) {
    outcome = { succeeded: true, reason: 'completed', exitCode: 0 };
  } else {
    const fallback = status.signal
      ? `Engine terminated by ${status.signal}`
      : `Engine exited with code ${status.exitCode ?? 'unknown'}`;

    outcome = {
      succeeded: false,
      reason: 'engine-failure',
      exitCode: status.exitCode,
      diagnostic: logTail(log) || fallback,
    };
  }

  return Object.freeze(outcome);
}
