import type { HealthCriteria, HealthSignals, LatencyPercentiles } from '../../types/index.js'

const PERCENTILES: ReadonlyArray<keyof LatencyPercentiles> = ['p50', 'p95', 'p99']

/**
 * List every way the signals miss the stage criteria.
 * An empty list means the stage is healthy.
 */
export function evaluateCriteria(signals: HealthSignals, criteria: HealthCriteria): string[] {
  const violations: string[] = []

  if (!Number.isFinite(signals.errorRate)) {
    violations.push('error rate not reported')
  } else if (signals.errorRate > criteria.maxErrorRate) {
    violations.push(`error rate ${signals.errorRate} exceeds ${criteria.maxErrorRate}`)
  }

  for (const percentile of PERCENTILES) {
    const limit = criteria.maxLatencyMs[percentile]
    if (limit === undefined) {
      continue
    }
    const observed = signals.latencyPercentiles[percentile]
    if (observed === undefined) {
      violations.push(`${percentile} latency not reported`)
    } else if (observed > limit) {
      violations.push(`${percentile} latency ${observed}ms exceeds ${limit}ms`)
    }
  }

  return violations
}
