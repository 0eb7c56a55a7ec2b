import { describe, expect, it } from 'vitest';
import { StateTransitionError } from './errors/index.js';
import {
  SessionStateMachine,
  isTerminalState,
  isValidTransition,
} from './stateMachine.js';

describe('SessionStateMachine', () => {
  it('starts idle and walks the happy path', () => {
    const machine = new SessionStateMachine('job-1');
    expect(machine.getState()).toBe('IDLE');

    machine.transitionTo('PROBING');
    machine.transitionTo('RUNNING');
    machine.transitionTo('COMPLETED', 'exit 0');

    expect(machine.getState()).toBe('COMPLETED');
    expect(machine.isTerminal()).toBe(true);
    expect(machine.getHistory().map(t => t.to)).toEqual(['PROBING', 'RUNNING', 'COMPLETED']);
    expect(machine.getHistory()[2]?.reason).toBe('exit 0');
  });

  it('routes cancellation of a running session through CANCELLING', () => {
    expect(isValidTransition('RUNNING', 'CANCELLED')).toBe(false);
    expect(isValidTransition('RUNNING', 'CANCELLING')).toBe(true);
    expect(isValidTransition('CANCELLING', 'CANCELLED')).toBe(true);
    expect(isValidTransition('CANCELLING', 'COMPLETED')).toBe(false);
  });

  it('throws on invalid transitions', () => {
    const machine = new SessionStateMachine('job-2');
    expect(() => machine.transitionTo('RUNNING')).toThrow(StateTransitionError);
    expect(() => machine.transitionTo('RUNNING')).toThrow('Invalid state transition from IDLE to RUNNING');
  });

  it('never leaves a terminal state', () => {
    const machine = new SessionStateMachine('job-3');
    machine.transitionTo('CANCELLED');
    for (const state of ['IDLE', 'PROBING', 'RUNNING', 'FAILED'] as const) {
      expect(machine.canTransitionTo(state)).toBe(false);
    }
    expect(isTerminalState('CANCELLED')).toBe(true);
    expect(isTerminalState('CANCELLING')).toBe(false);
  });

  it('lets only the first of two racing signals win with compareAndSet', () => {
    const machine = new SessionStateMachine('job-4');
    machine.transitionTo('PROBING');
    machine.transitionTo('RUNNING');

    expect(machine.compareAndSet('RUNNING', 'CANCELLING')).toBe(true);
    expect(machine.compareAndSet('RUNNING', 'COMPLETED')).toBe(false);
    expect(machine.getState()).toBe('CANCELLING');
  });

  it('returns false from compareAndSet for a disallowed target', () => {
    const machine = new SessionStateMachine('job-5');
    expect(machine.compareAndSet('IDLE', 'COMPLETED')).toBe(false);
    expect(machine.getState()).toBe('IDLE');
  });
});
