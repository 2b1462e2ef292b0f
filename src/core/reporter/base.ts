import type { GateDecision, PipelineReport, ReportOptions, ScanResult } from '../../types/index.js'
import { maskFindingEvidence } from '../../utils/mask.js'

/**
 * Base interface for all reporters
 */
export interface Reporter {
  /**
   * Generate a report from a pipeline run
   */
  generate(report: PipelineReport, options?: Partial<ReportOptions>): string

  /**
   * Write report to file or stdout
   */
  write(report: PipelineReport, options?: Partial<ReportOptions>): Promise<void>
}

/**
 * Extended report options with format-specific settings
 */
export interface JsonReportOptions extends ReportOptions {
  /** Pretty print JSON with indentation */
  pretty?: boolean
  /** Mask sensitive data in evidence fields */
  maskSecrets?: boolean
}

function maskResult(result: ScanResult): ScanResult {
  if (result.status.kind !== 'findings') {
    return result
  }
  return {
    ...result,
    status: { ...result.status, findings: result.status.findings.map(maskFindingEvidence) }
  }
}

function maskDecision(decision: GateDecision | undefined): GateDecision | undefined {
  if (!decision) {
    return undefined
  }
  return {
    ...decision,
    reasons: decision.reasons.map(reason => ({ ...reason, result: maskResult(reason.result) }))
  }
}

/**
 * Mask evidence everywhere findings appear in a pipeline report
 */
export function maskReport(report: PipelineReport): PipelineReport {
  return {
    ...report,
    sourceResults: report.sourceResults.map(maskResult),
    imageResults: report.imageResults.map(maskResult),
    sourceDecision: maskDecision(report.sourceDecision),
    imageDecision: maskDecision(report.imageDecision),
    releaseDecision: maskDecision(report.releaseDecision)
  }
}
