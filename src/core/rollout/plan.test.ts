import { describe, it, expect } from 'vitest'
import type { RolloutPlan } from '../../types/index.js'
import { RolloutPlanError, createBlueGreenPlan, createCanaryPlan, validatePlan } from './plan.js'

const request = {
  service: 'checkout-service',
  environment: 'production',
  artifactDigest: 'sha256:d1',
  versionTag: 'abc123'
}

const criteria = { maxErrorRate: 0.01, maxLatencyMs: {} }

describe('rollout plans', () => {
  it('should create a canary plan with a derived id', () => {
    const plan = createCanaryPlan(request, [
      { weight: 10, windowMs: 1000, criteria },
      { weight: 100, windowMs: 1000, criteria }
    ])

    expect(plan.id).toBe('checkout-service@production:sha256:d1')
    expect(plan.strategy).toBe('canary')
    expect(plan.stages.map(s => s.weight)).toEqual([10, 100])
  })

  it('should create a blue-green plan as verify then cutover', () => {
    const plan = createBlueGreenPlan(
      { ...request, id: 'bg-1' },
      { windowMs: 60000, criteria },
      { windowMs: 120000, criteria }
    )

    expect(plan.id).toBe('bg-1')
    expect(plan.stages).toEqual([
      { weight: 0, windowMs: 60000, criteria },
      { weight: 100, windowMs: 120000, criteria }
    ])
  })

  it('should reject decreasing weights', () => {
    expect(() => createCanaryPlan(request, [
      { weight: 50, windowMs: 1000, criteria },
      { weight: 10, windowMs: 1000, criteria },
      { weight: 100, windowMs: 1000, criteria }
    ])).toThrow('stage 1 weight 10 is below stage 0 weight 50')
  })

  it('should reject a plan that never reaches 100%', () => {
    expect(() => createCanaryPlan(request, [{ weight: 50, windowMs: 1000, criteria }]))
      .toThrow(RolloutPlanError)
  })

  it('should report every problem', () => {
    const plan: RolloutPlan = {
      id: 'bad',
      ...request,
      strategy: 'blue-green',
      stages: [{ weight: 20, windowMs: -1, criteria }]
    }

    expect(validatePlan(plan)).toEqual([
      'stage 0 window must be >= 0',
      'last stage must shift 100% of traffic',
      'blue-green plans have exactly two stages: 0% then 100%'
    ])
  })

  it('should reject an empty plan', () => {
    expect(validatePlan({ id: 'empty', ...request, strategy: 'canary', stages: [] })).toEqual(['plan has no stages'])
  })
})
