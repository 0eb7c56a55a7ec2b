/**
 * Job Session
 *
 * Single-owner state for one transcode: lifecycle state, engine handle,
 * progress denominator and the monotonic progress tracker. The session is
 * discarded once it reaches a terminal state.
 */

import {
  SessionStateMachine,
  type ConversionRequest,
  type EncodePlan,
  type Outcome,
  type SessionState,
  type SessionStateTransition,
  type TerminalSessionState,
} from '@transcoder/core';
import { ProgressTracker } from './progressTracker.js';
import type { EngineHandle } from './types.js';

export type CancelRequestResult =
  | 'cancelling'  // engine running; termination must be confirmed
  | 'cancelled'   // no engine yet; cancelled on the spot
  | 'rejected';   // already terminal or already cancelling

function terminalStateFor(outcome: Outcome): TerminalSessionState {
  switch (outcome.reason) {
    case 'completed':
      return 'COMPLETED';
    case 'cancelled':
      return 'CANCELLED';
    case 'engine-failure':
      return 'FAILED';
  }
}

export class JobSession {
  readonly id: string;
  readonly request: Readonly<ConversionRequest>;
  readonly plan: EncodePlan;
  readonly createdAt = new Date();

  private readonly machine: SessionStateMachine;
  private handle: EngineHandle | null = null;
  private denominatorMs: number | null = null;
  private tracker = new ProgressTracker(null);
  private outcome: Outcome | null = null;

  constructor(id: string, request: Readonly<ConversionRequest>, plan: EncodePlan) {
    this.id = id;
    this.request = request;
    this.plan = plan;
    this.machine = new SessionStateMachine(id);
  }

  get status(): SessionState {
    return this.machine.getState();
  }

  get processHandle(): EngineHandle | null {
    return this.handle;
  }

  get progressDenominatorMs(): number | null {
    return this.denominatorMs;
  }

  get lastEmittedProgress(): number {
    return this.tracker.lastEmitted;
  }

  get cancelRequested(): boolean {
    const state = this.machine.getState();
    return state === 'CANCELLING' || state === 'CANCELLED';
  }

  get result(): Outcome | null {
    return this.outcome;
  }

  isTerminal(): boolean {
    return this.machine.isTerminal();
  }

  history(): ReadonlyArray<SessionStateTransition> {
    return this.machine.getHistory();
  }

  beginProbing(): void {
    this.machine.transitionTo('PROBING');
  }

  /**
   * Fix the progress denominator; only meaningful before the engine starts
   */
  setDenominator(durationMs: number | null): void {
    if (this.machine.getState() !== 'PROBING') return;
    this.denominatorMs = durationMs;
    this.tracker = new ProgressTracker(durationMs);
  }

  /**
   * Take ownership of the engine handle and move to RUNNING
   */
  attach(handle: EngineHandle): boolean {
    if (!this.machine.compareAndSet('PROBING', 'RUNNING', 'engine started')) {
      return false;
    }
    this.handle = handle;
    return true;
  }

  /**
   * Normalize a telemetry sample; returns the value to emit or null
   */
  recordSample(elapsedMs: number): number | null {
    if (this.machine.getState() !== 'RUNNING') return null;
    return this.tracker.offer(elapsedMs);
  }

  /**
   * Final progress on success
   */
  completeProgress(): number | null {
    if (this.machine.getState() !== 'RUNNING') return null;
    return this.tracker.complete();
  }

  requestCancel(): CancelRequestResult {
    switch (this.machine.getState()) {
      case 'IDLE':
        return this.machine.compareAndSet('IDLE', 'CANCELLED', 'cancelled before start') ? 'cancelled' : 'rejected';
      case 'PROBING':
        return this.machine.compareAndSet('PROBING', 'CANCELLED', 'cancelled while probing') ? 'cancelled' : 'rejected';
      case 'RUNNING':
        return this.machine.compareAndSet('RUNNING', 'CANCELLING', 'cancel requested') ? 'cancelling' : 'rejected';
      default:
        return 'rejected';
    }
  }

  /**
   * Record the terminal outcome. The first outcome wins; later ones are
   * discarded and the recorded one is returned.
   */
  settle(outcome: Outcome): Outcome {
    if (this.outcome) return this.outcome;

    const target = terminalStateFor(outcome);
    if (this.machine.getState() !== target) {
      this.machine.transitionTo(target, outcome.reason);
    }
    this.outcome = outcome;
    return outcome;
  }
}
