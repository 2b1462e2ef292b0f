import type { GateDecision, GateReason } from '../../types/index.js'

/**
 * Exit codes for CLI
 */
export const ExitCodes = {
  proceed: 0,
  blocked: 1,
  rolled_back: 2,
  error: 3
} as const

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes]

/**
 * Human-readable form of a gate decision
 */
export interface GateSummary {
  summary: string
  reasons: string[]
}

function reasonKey(reason: GateReason): string {
  return `${reason.stage}:${reason.taskId}:${reason.kind}`
}

/**
 * Combine the source and image stage decisions into the release decision.
 * Pure: proceed only when both proceed, otherwise blocked with the union of reasons.
 */
export function decide(source: GateDecision, image: GateDecision): GateDecision {
  const seen = new Set<string>()
  const reasons: GateReason[] = []

  for (const reason of [...source.reasons, ...image.reasons]) {
    const key = reasonKey(reason)
    if (!seen.has(key)) {
      seen.add(key)
      reasons.push(reason)
    }
  }

  const proceed = source.outcome === 'proceed' && image.outcome === 'proceed'
  const decision: GateDecision = {
    stage: 'release',
    outcome: proceed ? 'proceed' : 'blocked',
    reasons: Object.freeze(reasons)
  }
  return Object.freeze(decision)
}

/**
 * Render a decision with one line per blocking reason
 */
export function summarize(decision: GateDecision): GateSummary {
  const reasons = decision.reasons.map(
    reason => `[${reason.stage}] ${reason.taskId}: ${reason.detail}`
  )

  if (decision.outcome === 'proceed') {
    return { summary: `PROCEED (${decision.stage}): all required checks passed`, reasons }
  }

  const tasks = [...new Set(decision.reasons.map(r => r.taskId))]
  const summary = tasks.length > 0
    ? `BLOCKED (${decision.stage}): ${decision.reasons.length} blocking result(s) from ${tasks.join(', ')}`
    : `BLOCKED (${decision.stage})`
  return { summary, reasons }
}

export class ReleaseGate {
  decide(source: GateDecision, image: GateDecision): GateDecision {
    return decide(source, image)
  }

  summarize(decision: GateDecision): GateSummary {
    return summarize(decision)
  }

  exitCode(decision: GateDecision): ExitCode {
    return decision.outcome === 'proceed' ? ExitCodes.proceed : ExitCodes.blocked
  }
}

/**
 * Create a release gate
 */
export function createReleaseGate(): ReleaseGate {
  return new ReleaseGate()
}
