import type { RolloutEvent, RolloutStatus } from '../../types/index.js'

/**
 * State transition definition
 */
export interface RolloutTransitionRule {
  from: RolloutStatus
  to: RolloutStatus
  event: RolloutEvent
}

/**
 * Legal rollout transitions.
 * Nothing leaves a terminal state; a new plan is needed to retry.
 */
export const ROLLOUT_TRANSITIONS: readonly RolloutTransitionRule[] = [
  // Normal flow
  { from: 'advancing', to: 'advancing', event: 'ADVANCE' },
  { from: 'advancing', to: 'completed', event: 'COMPLETE' },

  // Operator control
  { from: 'advancing', to: 'paused', event: 'PAUSE' },
  { from: 'paused', to: 'advancing', event: 'RESUME' },
  { from: 'advancing', to: 'rolling_back', event: 'ROLLBACK' },
  { from: 'paused', to: 'rolling_back', event: 'ROLLBACK' },

  // Health regression while traffic is being evaluated
  { from: 'advancing', to: 'rolling_back', event: 'REGRESSION' },

  // Cancellation before any traffic reached the new version
  { from: 'advancing', to: 'failed', event: 'ABORT' },
  { from: 'paused', to: 'failed', event: 'ABORT' },

  { from: 'rolling_back', to: 'failed', event: 'ROLLBACK_COMPLETE' }
]

/**
 * Terminal states that cannot transition to any other state
 */
export const TERMINAL_STATES: readonly RolloutStatus[] = ['completed', 'failed']

export function isTerminal(status: RolloutStatus): boolean {
  return TERMINAL_STATES.includes(status)
}

/**
 * Get the target state for a status and event, or null if the event is not allowed
 */
export function getTargetState(status: RolloutStatus, event: RolloutEvent): RolloutStatus | null {
  const transition = ROLLOUT_TRANSITIONS.find(t => t.from === status && t.event === event)
  return transition?.to ?? null
}

export function canTransition(status: RolloutStatus, event: RolloutEvent): boolean {
  return getTargetState(status, event) !== null
}

/**
 * Get all valid events for a given status
 */
export function getValidEvents(status: RolloutStatus): RolloutEvent[] {
  return ROLLOUT_TRANSITIONS
    .filter(t => t.from === status)
    .map(t => t.event)
}

/**
 * Raised when an event is not allowed in the current status
 */
export class InvalidTransitionError extends Error {
  constructor(
    public readonly from: RolloutStatus,
    public readonly event: RolloutEvent
  ) {
    super(
      isTerminal(from)
        ? `Cannot transition from terminal state: ${from}`
        : `Invalid transition: ${from} + ${event}`
    )
    this.name = 'InvalidTransitionError'
  }
}
