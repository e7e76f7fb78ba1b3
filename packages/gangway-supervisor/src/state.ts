import { SupervisorError } from './errors';
import { HealthState } from './types';

/**
 * unknown → pending (launched) | failed (could not launch)
 * pending → ready (probe ok) | failed (exited first) | stopped (stopped on request)
 * ready   → stopped (exited)
 * failed, stopped: terminal
 */
const TRANSITIONS: Record<HealthState, readonly HealthState[]> = {
  [HealthState.UNKNOWN]: [HealthState.PENDING, HealthState.FAILED],
  [HealthState.PENDING]: [HealthState.READY, HealthState.FAILED, HealthState.STOPPED],
  [HealthState.READY]: [HealthState.STOPPED],
  [HealthState.FAILED]: [],
  [HealthState.STOPPED]: []
};

export function canTransition(from: HealthState, to: HealthState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(name: string, from: HealthState, to: HealthState): HealthState {
  if (!canTransition(from, to)) {
    throw new SupervisorError(`${name}: illegal health transition ${from} → ${to}`, 'ILLEGAL_TRANSITION');
  }
  return to;
}

export function isTerminal(state: HealthState): boolean {
  return TRANSITIONS[state].length === 0;
}

/**
 * State a process lands in when it exits. A process that was never ready only
 * counts as stopped when the exit follows a stop request.
 */
export function exitState(current: HealthState, stopRequested = false): HealthState {
  if (current === HealthState.READY || (current === HealthState.PENDING && stopRequested)) {
    return HealthState.STOPPED;
  }
  return HealthState.FAILED;
}
