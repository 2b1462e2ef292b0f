import type { HealthCriteria, RolloutPlan, RolloutStage, RolloutStrategy } from '../../types/index.js'

/**
 * What is being deployed, and where
 */
export interface PlanRequest {
  service: string
  environment: string
  artifactDigest: string
  versionTag: string
  id?: string
}

export interface StageWindow {
  windowMs: number
  criteria: HealthCriteria
}

/**
 * Raised when a plan's stages cannot be driven to completion
 */
export class RolloutPlanError extends Error {
  constructor(
    public readonly planId: string,
    public readonly problems: string[]
  ) {
    super(`Invalid rollout plan ${planId}: ${problems.join('; ')}`)
    this.name = 'RolloutPlanError'
  }
}

/**
 * Problems that make a plan unusable; empty when the plan is valid
 */
export function validatePlan(plan: RolloutPlan): string[] {
  const problems: string[] = []
  const { stages } = plan

  if (stages.length === 0) {
    return ['plan has no stages']
  }

  stages.forEach((stage, index) => {
    if (stage.weight < 0 || stage.weight > 100) {
      problems.push(`stage ${index} weight ${stage.weight} is outside 0..100`)
    }
    if (stage.windowMs < 0) {
      problems.push(`stage ${index} window must be >= 0`)
    }
    const previous = stages[index - 1]
    if (previous && stage.weight < previous.weight) {
      problems.push(`stage ${index} weight ${stage.weight} is below stage ${index - 1} weight ${previous.weight}`)
    }
  })

  if (stages[stages.length - 1].weight !== 100) {
    problems.push('last stage must shift 100% of traffic')
  }

  if (plan.strategy === 'blue-green' && (stages.length !== 2 || stages[0].weight !== 0)) {
    problems.push('blue-green plans have exactly two stages: 0% then 100%')
  }

  return problems
}

/**
 * Build a plan and reject it if invalid
 */
export function createPlan(
  request: PlanRequest,
  strategy: RolloutStrategy,
  stages: readonly RolloutStage[]
): RolloutPlan {
  const plan: RolloutPlan = {
    id: request.id ?? `${request.service}@${request.environment}:${request.artifactDigest}`,
    service: request.service,
    environment: request.environment,
    artifactDigest: request.artifactDigest,
    versionTag: request.versionTag,
    strategy,
    stages: stages.map(stage => ({ ...stage }))
  }

  const problems = validatePlan(plan)
  if (problems.length > 0) {
    throw new RolloutPlanError(plan.id, problems)
  }

  return plan
}

/**
 * Progressive traffic shift through the given stages
 */
export function createCanaryPlan(request: PlanRequest, stages: readonly RolloutStage[]): RolloutPlan {
  return createPlan(request, 'canary', stages)
}

/**
 * Two-stage plan: verify at 0%, then cut over to 100%
 */
export function createBlueGreenPlan(
  request: PlanRequest,
  verify: StageWindow,
  cutover: StageWindow
): RolloutPlan {
  return createPlan(request, 'blue-green', [
    { weight: 0, ...verify },
    { weight: 100, ...cutover }
  ])
}
