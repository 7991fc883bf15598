/**
 * Application Lifecycle
 * @module applications/state-machine
 */

import { InvalidStateTransitionError } from '../errors/index.js';
import { ApplicationPhase } from '../types/application.js';

/**
 * Phases reachable from each phase. Syncing may fall back to Pending when a
 * cycle ends without executing (cancelled, or waiting for approval).
 */
export const PHASE_TRANSITIONS: Readonly<Record<ApplicationPhase, readonly ApplicationPhase[]>> = {
  [ApplicationPhase.PENDING]: [ApplicationPhase.SYNCING],
  [ApplicationPhase.SYNCING]: [ApplicationPhase.SYNCED, ApplicationPhase.DEGRADED, ApplicationPhase.PENDING],
  [ApplicationPhase.SYNCED]: [ApplicationPhase.PENDING, ApplicationPhase.SYNCING],
  [ApplicationPhase.DEGRADED]: [ApplicationPhase.PENDING, ApplicationPhase.SYNCING],
};

/** Severity used for aggregation, best first */
const PHASE_SEVERITY: Readonly<Record<ApplicationPhase, number>> = {
  [ApplicationPhase.SYNCED]: 0,
  [ApplicationPhase.SYNCING]: 1,
  [ApplicationPhase.PENDING]: 2,
  [ApplicationPhase.DEGRADED]: 3,
};

export function canTransition(from: ApplicationPhase, to: ApplicationPhase): boolean {
  return from === to || PHASE_TRANSITIONS[from].includes(to);
}

/**
 * Returns `to`, or throws when the move is not allowed
 */
export function applyTransition(
  application: string,
  from: ApplicationPhase,
  to: ApplicationPhase
): ApplicationPhase {
  if (!canTransition(from, to)) {
    throw new InvalidStateTransitionError(application, from, to);
  }
  return to;
}

export function worstPhase(phases: Iterable<ApplicationPhase>): ApplicationPhase {
  let worst: ApplicationPhase = ApplicationPhase.SYNCED;
  for (const phase of phases) {
    if (PHASE_SEVERITY[phase] > PHASE_SEVERITY[worst]) {
      worst = phase;
    }
  }
  return worst;
}
