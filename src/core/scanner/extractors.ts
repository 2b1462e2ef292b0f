import { z } from 'zod'
import type { Finding, Severity } from '../../types/index.js'

export type ReportFormat = 'normalized' | 'sarif'

/**
 * Turns the stdout of a tool into normalized findings
 */
export interface ReportExtractor {
  readonly format: ReportFormat
  extract(output: string): { findings: Finding[]; raw: unknown }
}

/**
 * Raised when tool output cannot be read as a report
 */
export class ReportParseError extends Error {
  constructor(
    message: string,
    public readonly format: ReportFormat
  ) {
    super(message)
    this.name = 'ReportParseError'
  }
}

const SeveritySchema = z.enum(['critical', 'high', 'medium', 'low', 'info'])

const NormalizedReportSchema = z.object({
  findings: z.array(z.object({
    rule: z.string().min(1),
    severity: SeveritySchema,
    message: z.string(),
    location: z.object({
      file: z.string(),
      line: z.number().int().optional(),
      column: z.number().int().optional()
    }).optional(),
    evidence: z.string().optional()
  }))
})

const SarifReportSchema = z.object({
  runs: z.array(z.object({
    results: z.array(z.object({
      ruleId: z.string().optional(),
      level: z.enum(['none', 'note', 'warning', 'error']).optional(),
      message: z.object({ text: z.string().optional() }).default({}),
      locations: z.array(z.object({
        physicalLocation: z.object({
          artifactLocation: z.object({ uri: z.string() }).optional(),
          region: z.object({
            startLine: z.number().int().optional(),
            startColumn: z.number().int().optional()
          }).optional()
        }).optional()
      })).default([]),
      properties: z.record(z.unknown()).optional()
    })).default([])
  }))
})

type SarifResult = z.infer<typeof SarifReportSchema>['runs'][number]['results'][number]

function parseJson(output: string, format: ReportFormat): unknown {
  try {
    return JSON.parse(output)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ReportParseError(`Tool output is not JSON: ${message}`, format)
  }
}

function describeIssues(error: z.ZodError): string {
  return error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join('; ')
}

/**
 * Reads `{ "findings": [...] }` as printed by tool wrappers
 */
export const normalizedExtractor: ReportExtractor = {
  format: 'normalized',
  extract(output) {
    const raw = parseJson(output, 'normalized')
    const parsed = NormalizedReportSchema.safeParse(raw)
    if (!parsed.success) {
      throw new ReportParseError(`Invalid normalized report: ${describeIssues(parsed.error)}`, 'normalized')
    }
    return { findings: parsed.data.findings, raw }
  }
}

/**
 * Map a SARIF result to a severity.
 * A numeric `security-severity` property (CVSS-like, 0-10) wins over `level`.
 */
export function sarifSeverity(result: Pick<SarifResult, 'level' | 'properties'>): Severity {
  const score = Number(result.properties?.['security-severity'])
  if (Number.isFinite(score) && score > 0) {
    if (score >= 9) return 'critical'
    if (score >= 7) return 'high'
    if (score >= 4) return 'medium'
    return 'low'
  }

  switch (result.level) {
    case 'error':
      return 'high'
    case 'note':
      return 'low'
    case 'none':
      return 'info'
    case 'warning':
    default:
      return 'medium'
  }
}

/**
 * Reads SARIF 2.1 logs
 */
export const sarifExtractor: ReportExtractor = {
  format: 'sarif',
  extract(output) {
    const raw = parseJson(output, 'sarif')
    const parsed = SarifReportSchema.safeParse(raw)
    if (!parsed.success) {
      throw new ReportParseError(`Invalid SARIF log: ${describeIssues(parsed.error)}`, 'sarif')
    }

    const findings = parsed.data.runs.flatMap(run =>
      run.results.map((result): Finding => {
        const physical = result.locations[0]?.physicalLocation
        const finding: Finding = {
          rule: result.ruleId ?? 'unknown',
          severity: sarifSeverity(result),
          message: result.message.text ?? result.ruleId ?? 'SARIF result'
        }
        if (physical?.artifactLocation) {
          finding.location = {
            file: physical.artifactLocation.uri,
            line: physical.region?.startLine,
            column: physical.region?.startColumn
          }
        }
        return finding
      })
    )
    return { findings, raw }
  }
}

const EXTRACTORS: Record<ReportFormat, ReportExtractor> = {
  normalized: normalizedExtractor,
  sarif: sarifExtractor
}

export function getExtractor(format: ReportFormat): ReportExtractor {
  return EXTRACTORS[format]
}
