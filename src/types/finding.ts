/**
 * Severity levels for scanner findings, most severe first
 */
export type Severity = 'critical' | 'high' | 'medium' | 'low' | 'info'

export const SEVERITY_ORDER: readonly Severity[] = ['critical', 'high', 'medium', 'low', 'info']

const SEVERITY_RANK: Record<Severity, number> = {
  critical: 4,
  high: 3,
  medium: 2,
  low: 1,
  info: 0
}

/**
 * Check whether a severity is at or above a threshold
 */
export function meetsThreshold(severity: Severity, threshold: Severity): boolean {
  return SEVERITY_RANK[severity] >= SEVERITY_RANK[threshold]
}

/**
 * Location information for a finding
 */
export interface FindingLocation {
  file: string
  line?: number
  column?: number
}

/**
 * A single normalized finding reported by an external tool
 */
export interface Finding {
  /** Rule identifier that triggered this finding */
  rule: string

  /** Severity level */
  severity: Severity

  /** Human-readable message describing the finding */
  message: string

  /** Location, when the tool reports one (image findings usually don't) */
  location?: FindingLocation

  /** Evidence (masked before it leaves the process) */
  evidence?: string
}

/**
 * Count of findings by severity
 */
export type SeverityHistogram = Record<Severity, number>

/**
 * Build a severity histogram from findings
 */
export function buildHistogram(findings: readonly Finding[]): SeverityHistogram {
  const histogram: SeverityHistogram = { critical: 0, high: 0, medium: 0, low: 0, info: 0 }
  for (const finding of findings) {
    histogram[finding.severity]++
  }
  return histogram
}
