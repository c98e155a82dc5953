import { type LifecycleState, LIFECYCLE_STATES } from '@plm/shared';

/** Legal state changes. Rollbacks out of shutting_down are listed too. */
export const LIFECYCLE_TRANSITIONS: Readonly<Record<LifecycleState, readonly LifecycleState[]>> = {
  unregistered: ['registered'],
  registered: ['initialized', 'shutdown', 'unregistered'],
  initialized: ['installed', 'shutting_down'],
  installed: ['initialized', 'shutting_down'],
  shutting_down: ['shutdown', 'initialized', 'installed'],
  shutdown: ['unregistered'],
};

export function canTransition(from: LifecycleState, to: LifecycleState): boolean {
  return LIFECYCLE_TRANSITIONS[from].includes(to);
}

/** Entries in a terminal state accept no operations and free their name. */
export function isTerminal(state: LifecycleState): boolean {
  return state === 'unregistered' || state === 'shutdown';
}

export function isLifecycleState(value: unknown): value is LifecycleState {
  return typeof value === 'string' && LIFECYCLE_STATES.some(s => s === value);
}
