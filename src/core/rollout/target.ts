import type { HealthSignals } from '../../types/index.js'

/**
 * The environment a rollout acts on and observes.
 * `version` is the artifact digest of the new release.
 */
export interface DeploymentTarget {
  /** Route `weight` percent of the service's traffic to `version` */
  setTrafficWeight(service: string, version: string, weight: number): Promise<void>
  /** Health of `version` over the trailing window */
  getHealthSignals(service: string, version: string, windowMs: number): Promise<HealthSignals>
}

export interface WeightChange {
  service: string
  version: string
  weight: number
}

type SignalSource = HealthSignals | Error | ((weight: number) => HealthSignals)

/**
 * Deployment target kept in memory.
 * Signals are queued per call; the last one repeats once the queue runs dry.
 */
export class InMemoryDeploymentTarget implements DeploymentTarget {
  readonly changes: WeightChange[] = []
  private readonly weights = new Map<string, number>()
  private readonly signals: SignalSource[] = []
  private failWeights = 0

  constructor(private readonly healthy: HealthSignals = { errorRate: 0, latencyPercentiles: {} }) {}

  /** Queue the signals returned by the next health reads */
  queueSignals(...sources: SignalSource[]): this {
    this.signals.push(...sources)
    return this
  }

  /** Make the next `count` weight changes fail */
  failNextWeightChanges(count: number): this {
    this.failWeights = count
    return this
  }

  weightOf(service: string, version: string): number {
    return this.weights.get(`${service}|${version}`) ?? 0
  }

  async setTrafficWeight(service: string, version: string, weight: number): Promise<void> {
    if (this.failWeights > 0) {
      this.failWeights--
      throw new Error(`Traffic router rejected weight ${weight} for ${service}`)
    }
    this.weights.set(`${service}|${version}`, weight)
    this.changes.push({ service, version, weight })
  }

  async getHealthSignals(service: string, version: string): Promise<HealthSignals> {
    const source = this.signals.length > 1 ? this.signals.shift() : this.signals[0]
    if (source === undefined) {
      return this.healthy
    }
    if (source instanceof Error) {
      throw source
    }
    if (typeof source === 'function') {
      return source(this.weightOf(service, version))
    }
    return source
  }
}
