import { describe, it, expect } from 'vitest'
import { evaluateCriteria } from './health.js'

const criteria = { maxErrorRate: 0.01, maxLatencyMs: { p95: 500 } }

describe('evaluateCriteria', () => {
  it('should pass healthy signals', () => {
    expect(evaluateCriteria({ errorRate: 0.005, latencyPercentiles: { p95: 420 } }, criteria)).toEqual([])
  })

  it('should accept values equal to the limit', () => {
    expect(evaluateCriteria({ errorRate: 0.01, latencyPercentiles: { p95: 500 } }, criteria)).toEqual([])
  })

  it('should report each violated criterion', () => {
    expect(evaluateCriteria({ errorRate: 0.2, latencyPercentiles: { p95: 900 } }, criteria)).toEqual([
      'error rate 0.2 exceeds 0.01',
      'p95 latency 900ms exceeds 500ms'
    ])
  })

  it('should treat a missing percentile as a violation', () => {
    expect(evaluateCriteria({ errorRate: 0, latencyPercentiles: { p50: 10 } }, criteria)).toEqual([
      'p95 latency not reported'
    ])
  })

  it('should ignore percentiles without a limit', () => {
    expect(evaluateCriteria({ errorRate: 0, latencyPercentiles: { p95: 100, p99: 5000 } }, criteria)).toEqual([])
  })

  it('should reject a non-numeric error rate', () => {
    expect(evaluateCriteria({ errorRate: Number.NaN, latencyPercentiles: { p95: 100 } }, criteria)).toEqual([
      'error rate not reported'
    ])
  })
})
