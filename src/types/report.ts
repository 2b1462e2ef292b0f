import type { Artifact, ArtifactStatus } from './artifact.js'
import type { ChangeEvent } from './change.js'
import type { RolloutState } from './rollout.js'
import type { GateDecision, ScanResult } from './scan.js'

/**
 * How a pipeline run ended. `passed` marks a scan-only run whose gate proceeded.
 */
export type PipelineOutcome =
  | 'passed'
  | 'skipped'
  | 'superseded'
  | 'blocked'
  | 'build_failed'
  | 'deployed'
  | 'rolled_back'

/**
 * Complete record of one pipeline run
 */
export interface PipelineReport {
  /** Report version */
  version: string

  /** Timestamp the run finished */
  timestamp: string

  change: ChangeEvent

  outcome: PipelineOutcome

  /** Service pipeline selected from the changed paths */
  service?: string
  environment?: string

  sourceResults: ScanResult[]
  sourceDecision?: GateDecision

  artifact?: Artifact
  artifactStatus?: ArtifactStatus
  imageResults: ScanResult[]
  imageDecision?: GateDecision

  releaseDecision?: GateDecision

  rollout?: RolloutState

  /** Run duration in milliseconds */
  duration: number

  /** Configuration used for the run */
  configName: string

  /** Errors that stopped or degraded the run */
  errors: string[]
}

/**
 * Options for report generation
 */
export interface ReportOptions {
  format: 'json' | 'markdown'
  output?: string
  quiet?: boolean
}
