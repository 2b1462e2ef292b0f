import type { RolloutPlan, RolloutState } from '../../types/index.js'
import { createLogger } from '../../utils/logger.js'
import { RolloutController, type RolloutControllerOptions } from './controller.js'
import { isTerminal } from './state-machine.js'
import type { DeploymentTarget } from './target.js'

const logger = createLogger('rollout')

/**
 * What to do when the service+environment already has an active rollout
 */
export type ConflictPolicy = 'wait' | 'supersede' | 'reject'

export interface StartOptions {
  onConflict?: ConflictPolicy
  signal?: AbortSignal
}

/**
 * Raised when a rollout is requested for a busy service+environment under `reject`
 */
export class RolloutConflictError extends Error {
  constructor(
    public readonly key: string,
    public readonly activePlanId: string,
    public readonly stuck = false
  ) {
    super(
      stuck
        ? `Rollout ${activePlanId} could not restore traffic for ${key}; recover it before starting another`
        : `Rollout ${activePlanId} is already active for ${key}`
    )
    this.name = 'RolloutConflictError'
  }
}

interface ActiveRollout {
  controller: RolloutController
  done: Promise<RolloutState>
  /** Run ended without reaching a terminal state; traffic may still be shifted */
  stuck: boolean
}

export function rolloutKey(service: string, environment: string): string {
  return `${service}/${environment}`
}

/**
 * Admits at most one active rollout per service+environment
 */
export class RolloutCoordinator {
  private readonly active = new Map<string, ActiveRollout>()

  constructor(
    private readonly target: DeploymentTarget,
    private readonly options: RolloutControllerOptions = {}
  ) {}

  /**
   * Controller of the active rollout, if any
   */
  get(service: string, environment: string): RolloutController | undefined {
    return this.active.get(rolloutKey(service, environment))?.controller
  }

  /**
   * Start a plan once its service+environment is free
   */
  async start(plan: RolloutPlan, options: StartOptions = {}): Promise<RolloutState> {
    const key = rolloutKey(plan.service, plan.environment)
    const policy = options.onConflict ?? 'wait'

    for (let current = this.active.get(key); current; current = this.active.get(key)) {
      if (current.stuck) {
        throw new RolloutConflictError(key, current.controller.plan.id, true)
      }
      if (policy === 'reject') {
        throw new RolloutConflictError(key, current.controller.plan.id)
      }
      if (policy === 'supersede') {
        logger.warn(`Superseding rollout ${current.controller.plan.id} with ${plan.id}`)
        current.controller.cancel()
      } else {
        logger.info(`Waiting for rollout ${current.controller.plan.id} before ${plan.id}`)
      }
      // Failures of the previous rollout belong to its own caller
      await current.done.then(() => undefined, () => undefined)
    }

    const controller = new RolloutController(plan, this.target, this.options)
    const entry: ActiveRollout = {
      controller,
      stuck: false,
      done: controller.run(options.signal).finally(() => {
        if (this.active.get(key) !== entry) {
          return
        }
        if (isTerminal(controller.getState().status)) {
          this.active.delete(key)
        } else {
          entry.stuck = true
          logger.error(`Rollout ${plan.id} holds ${key} until traffic is restored`)
        }
      })
    }
    this.active.set(key, entry)
    return entry.done
  }

  /**
   * Retry the traffic restore of a stuck rollout and free its service+environment
   */
  async recover(service: string, environment: string): Promise<RolloutState> {
    const key = rolloutKey(service, environment)
    const entry = this.active.get(key)
    if (!entry?.stuck) {
      throw new Error(`No rollout is waiting for traffic to be restored on ${key}`)
    }

    const state = await entry.controller.recover()
    this.active.delete(key)
    logger.info(`Recovered rollout ${entry.controller.plan.id}; ${key} is free`)
    return state
  }
}
