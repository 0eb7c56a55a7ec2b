/**
 * Session State Machine
 *
 * Lifecycle of a single transcode session.
 *
 * State Flow:
 * IDLE → PROBING → RUNNING → COMPLETED
 *                        ↘ FAILED
 *                        ↘ CANCELLING → CANCELLED
 * PROBING may fail (spawn error) or be cancelled before a process exists.
 *
 * Rules:
 * - Terminal states have no exits; a session is never reused
 * - Invalid transitions throw
 * - Racing signals use compareAndSet; the loser is discarded
 */

import { StateTransitionError } from './errors/index.js';

export const SESSION_STATES = [
  'IDLE',
  'PROBING',
  'RUNNING',
  'CANCELLING',
  'COMPLETED',
  'FAILED',
  'CANCELLED',
] as const;

export type SessionState = typeof SESSION_STATES[number];

export type TerminalSessionState = 'COMPLETED' | 'FAILED' | 'CANCELLED';

export interface SessionStateTransition {
  from: SessionState;
  to: SessionState;
  timestamp: Date;
  reason?: string;
}

const validTransitions: Record<SessionState, ReadonlySet<SessionState>> = {
  IDLE: new Set<SessionState>(['PROBING', 'CANCELLED']),
  PROBING: new Set<SessionState>(['RUNNING', 'FAILED', 'CANCELLED']),
  RUNNING: new Set<SessionState>(['COMPLETED', 'FAILED', 'CANCELLING']),
  CANCELLING: new Set<SessionState>(['CANCELLED']),
  COMPLETED: new Set<SessionState>(),
  FAILED: new Set<SessionState>(),
  CANCELLED: new Set<SessionState>(),
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: SessionState, to: SessionState): boolean {
  return validTransitions[from].has(to);
}

export function isTerminalState(state: SessionState): state is TerminalSessionState {
  return validTransitions[state].size === 0;
}

export class SessionStateMachine {
  private currentState: SessionState = 'IDLE';
  private readonly history: SessionStateTransition[] = [];
  private readonly sessionId: string;

  constructor(sessionId: string) {
    this.sessionId = sessionId;
  }

  getState(): SessionState {
    return this.currentState;
  }

  getHistory(): ReadonlyArray<SessionStateTransition> {
    return [...this.history];
  }

  canTransitionTo(targetState: SessionState): boolean {
    return isValidTransition(this.currentState, targetState);
  }

  /**
   * Transition to a new state
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(targetState: SessionState, reason?: string): SessionStateTransition {
    if (!this.canTransitionTo(targetState)) {
      throw new StateTransitionError(this.sessionId, this.currentState, targetState);
    }

    const transition: SessionStateTransition = {
      from: this.currentState,
      to: targetState,
      timestamp: new Date(),
      reason,
    };

    this.history.push(transition);
    this.currentState = targetState;

    return transition;
  }

  /**
   * Transition only if the machine is still in `expected`.
   * Returns false instead of throwing when another signal got there first.
   */
  compareAndSet(expected: SessionState, targetState: SessionState, reason?: string): boolean {
    if (this.currentState !== expected || !this.canTransitionTo(targetState)) {
      return false;
    }
    this.transitionTo(targetState, reason);
    return true;
  }

  isTerminal(): boolean {
    return isTerminalState(this.currentState);
  }
}
