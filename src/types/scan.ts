import type { Artifact } from './artifact.js'
import type { Finding, Severity, SeverityHistogram } from './finding.js'

/**
 * Pipeline stage a scan task runs in
 */
export type ScanStage = 'source' | 'image'

/**
 * One configured check against a source tree or an artifact
 */
export interface ScanTask {
  /** Unique task identifier (e.g. 'gitleaks') */
  readonly id: string
  /** Identifier of the external tool the task invokes */
  readonly tool: string
  readonly stage: ScanStage
  /** Required tasks gate the pipeline; advisory tasks never do */
  readonly required: boolean
  /** Treat a tool error as a blocking result */
  readonly failClosed: boolean
  /** Lowest severity that blocks a required task */
  readonly threshold: Severity
  readonly timeoutMs: number
}

/**
 * What a scan task runs against
 */
export type ScanTarget =
  | {
      readonly kind: 'source'
      readonly service: string
      readonly commitSha: string
      readonly path?: string
      /** Digest identifying the source revision */
      readonly digest: string
    }
  | {
      readonly kind: 'artifact'
      readonly artifact: Artifact
      readonly digest: string
    }

/**
 * Why a tool produced no usable report
 */
export type ToolErrorReason = 'crash' | 'timeout' | 'cancelled'

export type ScanStatus =
  | { readonly kind: 'success' }
  | {
      readonly kind: 'findings'
      readonly histogram: SeverityHistogram
      readonly findings: readonly Finding[]
    }
  | {
      readonly kind: 'tool_error'
      readonly reason: ToolErrorReason
      readonly message: string
    }

/**
 * Normalized outcome of one scan task. Immutable once produced.
 */
export interface ScanResult {
  readonly taskId: string
  readonly tool: string
  readonly required: boolean
  readonly status: ScanStatus
  /** Reference to the raw report in durable storage */
  readonly reportRef?: string
  readonly timestamp: string
  /** Execution time in milliseconds */
  readonly duration: number
}

export type GateStage = ScanStage | 'release'

export type GateOutcome = 'proceed' | 'blocked'

/**
 * A scan result that contributed to a blocked decision
 */
export interface GateReason {
  readonly kind: 'findings_blocked' | 'tool_error'
  readonly stage: ScanStage
  readonly taskId: string
  readonly detail: string
  readonly result: ScanResult
}

/**
 * Derived gate decision, never mutated after creation
 */
export interface GateDecision {
  readonly stage: GateStage
  readonly outcome: GateOutcome
  /** Ordered by task id */
  readonly reasons: readonly GateReason[]
}
