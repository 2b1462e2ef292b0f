import type {
  HealthSample,
  HealthSignals,
  RolloutEvent,
  RolloutFailure,
  RolloutPlan,
  RolloutStage,
  RolloutState,
  RolloutStatus
} from '../../types/index.js'
import { createLogger, type Logger } from '../../utils/logger.js'
import { sleep, withRetry, type WaitFn } from '../../utils/retry.js'
import { evaluateCriteria } from './health.js'
import { RolloutPlanError, validatePlan } from './plan.js'
import { getTargetState, InvalidTransitionError, isTerminal } from './state-machine.js'
import type { DeploymentTarget } from './target.js'

const rolloutLogger = createLogger('rollout')

export interface RolloutControllerOptions {
  /** Timed wait for stage windows and restore retries */
  wait?: WaitFn
  now?: () => Date
  /** Retry policy for restoring traffic during rollback */
  restoreRetry?: { attempts: number; baseDelayMs: number; maxDelayMs: number }
}

const DEFAULT_RESTORE_RETRY = { attempts: 3, baseDelayMs: 1000, maxDelayMs: 10000 }

/**
 * Raised when traffic could not be moved back to the stable version.
 * The rollout stays in rolling_back and needs an operator.
 */
export class RolloutActuationError extends Error {
  constructor(
    public readonly planId: string,
    message: string
  ) {
    super(message)
    this.name = 'RolloutActuationError'
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Drives one rollout plan through its stages.
 *
 * The controller is the only writer of its RolloutState. Each stage holds its
 * weight for the stage window, then samples health from the deployment target:
 * healthy stages advance by exactly one, a violation rolls traffic back to 0%
 * for the new version and ends in `failed`.
 */
export class RolloutController {
  private readonly state: RolloutState
  private readonly logger: Logger
  private readonly wait: WaitFn
  private readonly now: () => Date
  private started = false
  private running = false
  private entered = false
  private trafficShifted = false
  private interruption?: AbortController
  private wake?: () => void

  constructor(
    readonly plan: RolloutPlan,
    private readonly target: DeploymentTarget,
    private readonly options: RolloutControllerOptions = {}
  ) {
    const problems = validatePlan(plan)
    if (problems.length > 0) {
      throw new RolloutPlanError(plan.id, problems)
    }

    this.logger = rolloutLogger.child(plan.id)
    this.wait = options.wait ?? sleep
    this.now = options.now ?? (() => new Date())
    this.state = {
      planId: plan.id,
      stageIndex: 0,
      weight: plan.stages[0].weight,
      samples: [],
      status: 'advancing',
      history: []
    }
  }

  /**
   * Snapshot of the current state
   */
  getState(): RolloutState {
    return structuredClone(this.state)
  }

  /**
   * Run the plan until it completes or fails.
   * Aborting `signal` cancels the rollout.
   */
  async run(signal?: AbortSignal): Promise<RolloutState> {
    if (this.started) {
      throw new Error(`Rollout ${this.plan.id} already started`)
    }
    this.started = true
    this.running = true

    const onAbort = (): void => this.cancel()
    if (signal?.aborted) {
      this.cancel()
    }
    signal?.addEventListener('abort', onAbort, { once: true })

    try {
      while (!isTerminal(this.current())) {
        switch (this.current()) {
          case 'paused':
            await this.untilWoken()
            break
          case 'rolling_back':
            await this.restore()
            break
          case 'advancing':
            await this.evaluateStage()
            break
        }
      }

      return this.getState()
    } finally {
      this.running = false
      signal?.removeEventListener('abort', onAbort)
    }
  }

  /**
   * Retry restoring traffic after a run ended with RolloutActuationError
   */
  async recover(): Promise<RolloutState> {
    if (this.running || this.current() !== 'rolling_back') {
      throw new Error(`Rollout ${this.plan.id} is not waiting for traffic to be restored`)
    }
    await this.restore()
    return this.getState()
  }

  /**
   * Hold traffic at the current stage
   */
  pause(): void {
    this.transition('PAUSE')
    this.logger.info(`Paused at stage ${this.state.stageIndex}`)
    this.interrupt()
  }

  /**
   * Continue from the current stage; its window starts over
   */
  resume(): void {
    this.transition('RESUME')
    this.logger.info(`Resumed at stage ${this.state.stageIndex}`)
    this.interrupt()
  }

  /**
   * Operator switch-back to the stable version
   */
  rollback(reason: string): void {
    this.beginRollback('ROLLBACK', {
      kind: 'manual_rollback',
      stageIndex: this.state.stageIndex,
      weight: this.state.weight,
      violations: [],
      message: reason
    })
  }

  /**
   * Stop the rollout. Before any traffic reached the new version the plan
   * fails at once; afterwards traffic is rolled back first.
   */
  cancel(): void {
    const status = this.current()
    if (isTerminal(status) || status === 'rolling_back') {
      return
    }

    if (!this.trafficShifted) {
      this.state.failure = {
        kind: 'cancelled',
        stageIndex: this.state.stageIndex,
        weight: 0,
        violations: [],
        message: 'Cancelled before any traffic shift'
      }
      this.state.weight = 0
      this.transition('ABORT')
      this.logger.info('Cancelled before any traffic shift')
      this.interrupt()
      return
    }

    this.beginRollback('ROLLBACK', {
      kind: 'cancelled',
      stageIndex: this.state.stageIndex,
      weight: this.state.weight,
      violations: [],
      message: 'Cancelled after traffic shift'
    })
  }

  private current(): RolloutStatus {
    return this.state.status
  }

  private async enterFirstStage(): Promise<void> {
    const stage = this.plan.stages[0]
    try {
      await this.shift(stage.weight)
      this.logger.info(`${this.plan.service}: stage 0 at ${stage.weight}% (${this.plan.strategy})`)
    } catch (error) {
      this.actuationFailed(stage.weight, error)
    }
  }

  private async evaluateStage(): Promise<void> {
    if (!this.entered) {
      this.entered = true
      await this.enterFirstStage()
      if (this.current() !== 'advancing') {
        return
      }
    }

    const index = this.state.stageIndex
    const stage = this.plan.stages[index]

    const elapsed = await this.waitWindow(stage.windowMs)
    if (!elapsed || this.current() !== 'advancing') {
      return
    }

    const sample = await this.sample(index, stage)
    if (this.current() !== 'advancing') {
      return
    }

    if (sample.violations.length > 0) {
      this.beginRollback('REGRESSION', {
        kind: 'health_regression',
        stageIndex: index,
        weight: this.state.weight,
        ...(sample.signals ? { signals: sample.signals } : {}),
        violations: sample.violations,
        message: `Health criteria violated at stage ${index} (${this.state.weight}% traffic)`
      })
      return
    }

    if (index === this.plan.stages.length - 1) {
      this.transition('COMPLETE')
      this.logger.info('Completed')
      return
    }

    const next = this.plan.stages[index + 1]
    try {
      await this.shift(next.weight)
    } catch (error) {
      this.actuationFailed(next.weight, error)
      return
    }

    this.state.stageIndex = index + 1
    this.state.weight = next.weight
    if (this.current() === 'advancing') {
      this.transition('ADVANCE')
    }
    this.logger.info(`${this.plan.service}: stage ${index + 1} at ${next.weight}%`)
  }

  private async shift(weight: number): Promise<void> {
    if (weight > 0) {
      this.trafficShifted = true
    }
    await this.target.setTrafficWeight(this.plan.service, this.plan.artifactDigest, weight)
  }

  private actuationFailed(weight: number, error: unknown): void {
    const status = this.current()
    if (status !== 'advancing' && status !== 'paused') {
      return
    }
    this.beginRollback('ROLLBACK', {
      kind: 'actuation_error',
      stageIndex: this.state.stageIndex,
      weight: this.state.weight,
      violations: [],
      message: `Could not set traffic weight to ${weight}%: ${errorMessage(error)}`
    })
  }

  private async sample(index: number, stage: RolloutStage): Promise<HealthSample> {
    let signals: HealthSignals | null = null
    let violations: string[]

    try {
      signals = await this.target.getHealthSignals(this.plan.service, this.plan.artifactDigest, stage.windowMs)
      violations = evaluateCriteria(signals, stage.criteria)
    } catch (error) {
      violations = [`health signals unavailable: ${errorMessage(error)}`]
    }

    const sample: HealthSample = {
      stageIndex: index,
      weight: this.state.weight,
      signals,
      violations,
      sampledAt: this.now().toISOString()
    }
    this.state.samples.push(sample)
    return sample
  }

  private beginRollback(event: RolloutEvent, failure: RolloutFailure): void {
    this.transition(event)
    this.state.failure = failure
    this.logger.warn(`Rolling back: ${failure.message}`)
    this.interrupt()
  }

  private async restore(): Promise<void> {
    const retry = this.options.restoreRetry ?? DEFAULT_RESTORE_RETRY
    try {
      await withRetry(
        () => this.target.setTrafficWeight(this.plan.service, this.plan.artifactDigest, 0),
        { ...retry, wait: this.wait }
      )
    } catch (error) {
      throw new RolloutActuationError(
        this.plan.id,
        `Could not restore traffic for ${this.plan.service}: ${errorMessage(error)}`
      )
    }

    this.state.weight = 0
    this.trafficShifted = false
    this.transition('ROLLBACK_COMPLETE')
    this.logger.error(`Failed: ${this.state.failure?.message ?? 'rolled back'}`)
  }

  private transition(event: RolloutEvent): void {
    const from = this.state.status
    const to = getTargetState(from, event)
    if (to === null) {
      throw new InvalidTransitionError(from, event)
    }

    this.state.status = to
    this.state.history.push({
      from,
      to,
      event,
      stageIndex: this.state.stageIndex,
      weight: this.state.weight,
      at: this.now().toISOString()
    })
    this.logger.debug(`${from} -> ${to} (${event})`)
  }

  /**
   * Wait out a stage window; false when interrupted by an operator or cancellation
   */
  private async waitWindow(ms: number): Promise<boolean> {
    const interruption = new AbortController()
    this.interruption = interruption
    try {
      await this.wait(ms, interruption.signal)
      return true
    } catch (error) {
      if (interruption.signal.aborted) {
        return false
      }
      throw error
    } finally {
      this.interruption = undefined
    }
  }

  private untilWoken(): Promise<void> {
    return new Promise(resolve => {
      this.wake = resolve
    })
  }

  private interrupt(): void {
    this.interruption?.abort()
    const wake = this.wake
    this.wake = undefined
    wake?.()
  }
}
