/**
 * Traffic shifting strategy
 */
export type RolloutStrategy = 'canary' | 'blue-green'

/**
 * Latency percentiles in milliseconds
 */
export interface LatencyPercentiles {
  p50?: number
  p95?: number
  p99?: number
}

/**
 * Health signals reported by the deployment target for one window
 */
export interface HealthSignals {
  /** Fraction of failed requests, 0..1 */
  errorRate: number
  latencyPercentiles: LatencyPercentiles
}

/**
 * Success criteria a stage must meet before traffic advances
 */
export interface HealthCriteria {
  maxErrorRate: number
  maxLatencyMs: LatencyPercentiles
}

export interface RolloutStage {
  /** Percentage of traffic on the new version, 0..100 */
  readonly weight: number
  /** Evaluation window in milliseconds */
  readonly windowMs: number
  readonly criteria: HealthCriteria
}

export interface RolloutPlan {
  readonly id: string
  readonly service: string
  readonly environment: string
  readonly artifactDigest: string
  readonly versionTag: string
  readonly strategy: RolloutStrategy
  readonly stages: readonly RolloutStage[]
}

export type RolloutStatus = 'advancing' | 'paused' | 'rolling_back' | 'completed' | 'failed'

export type RolloutEvent =
  | 'ADVANCE'
  | 'COMPLETE'
  | 'PAUSE'
  | 'RESUME'
  | 'REGRESSION'
  | 'ROLLBACK'
  | 'ABORT'
  | 'ROLLBACK_COMPLETE'

export interface HealthSample {
  stageIndex: number
  weight: number
  signals: HealthSignals | null
  violations: string[]
  sampledAt: string
}

export interface RolloutTransition {
  from: RolloutStatus
  to: RolloutStatus
  event: RolloutEvent
  stageIndex: number
  weight: number
  at: string
}

/**
 * Why a rollout ended in the failed state
 */
export interface RolloutFailure {
  kind: 'health_regression' | 'manual_rollback' | 'cancelled' | 'actuation_error'
  stageIndex: number
  weight: number
  signals?: HealthSignals
  violations: string[]
  message: string
}

/**
 * Mutable rollout state, owned by one RolloutController
 */
export interface RolloutState {
  planId: string
  stageIndex: number
  weight: number
  samples: HealthSample[]
  status: RolloutStatus
  history: RolloutTransition[]
  failure?: RolloutFailure
}
