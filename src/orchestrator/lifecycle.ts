import { InvalidTransitionError } from '../common/errors/index.js';
import type { LifecycleState } from '../common/types/instance.js';

/**
 * Allowed lifecycle transitions.
 *
 *   stopped ──► starting ──► running ──► stopping ──► stopped
 *                  │            │
 *                  ▼            ▼
 *                error ◄────────┘
 *
 * `error → starting` is a fresh start, `error → stopped` happens when an
 * errored instance is deleted, and `stopped → error` records a restart whose
 * start half was rejected before anything connected.
 */
const TRANSITIONS: Readonly<Record<LifecycleState, readonly LifecycleState[]>> = {
  stopped: ['starting', 'error'],
  starting: ['running', 'error'],
  running: ['stopping', 'error'],
  stopping: ['stopped'],
  error: ['starting', 'stopped'],
};

export function canTransition(from: LifecycleState, to: LifecycleState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(instanceId: string, from: LifecycleState, to: LifecycleState): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(instanceId, from, to);
  }
}
