import { writeFile } from 'node:fs/promises'
import type {
  Finding,
  GateDecision,
  HealthSignals,
  PipelineOutcome,
  PipelineReport,
  RolloutState,
  ScanResult,
  ScanStatus
} from '../../types/index.js'
import { maskFindingEvidence } from '../../utils/mask.js'
import type { Reporter, JsonReportOptions } from './base.js'

/**
 * Extended report options for Markdown reporter
 */
export type MarkdownReportOptions = JsonReportOptions

const OUTCOME_BADGES: Record<PipelineOutcome, { emoji: string; label: string }> = {
  passed: { emoji: '✅', label: 'PASSED' },
  deployed: { emoji: '✅', label: 'DEPLOYED' },
  blocked: { emoji: '🚫', label: 'BLOCKED' },
  build_failed: { emoji: '❌', label: 'BUILD FAILED' },
  rolled_back: { emoji: '⏪', label: 'ROLLED BACK' },
  superseded: { emoji: '⏭️', label: 'SUPERSEDED' },
  skipped: { emoji: '➖', label: 'SKIPPED' }
}

/**
 * Format duration in seconds
 */
function formatDuration(ms: number): string {
  return (ms / 1000).toFixed(2)
}

function formatStatus(status: ScanStatus): string {
  switch (status.kind) {
    case 'success':
      return 'success'
    case 'findings':
      return `${status.findings.length} finding(s)`
    case 'tool_error':
      return `tool error (${status.reason})`
  }
}

/**
 * Render health signals as a single line
 */
export function formatSignals(signals: HealthSignals): string {
  const parts = [`error rate ${(signals.errorRate * 100).toFixed(2)}%`]
  for (const percentile of ['p50', 'p95', 'p99'] as const) {
    const value = signals.latencyPercentiles[percentile]
    if (value !== undefined) {
      parts.push(`${percentile} ${value}ms`)
    }
  }
  return parts.join(', ')
}

function generateChangeSection(report: PipelineReport): string {
  const lines: string[] = [
    '## Change',
    '',
    '| Property | Value |',
    '|----------|-------|',
    `| Change | \`${report.change.id}\` |`,
    `| Service | ${report.service ?? report.change.service} |`,
    `| Branch | ${report.change.branch} |`,
    `| Commit | \`${report.change.commitSha}\` |`
  ]

  if (report.environment) {
    lines.push(`| Environment | ${report.environment} |`)
  }

  lines.push(`| Config | ${report.configName} |`)
  lines.push(`| Duration | ${formatDuration(report.duration)}s |`)
  lines.push('')

  return lines.join('\n')
}

function generateDecisionsSection(report: PipelineReport): string {
  const rows: Array<[string, GateDecision | undefined]> = [
    ['Source', report.sourceDecision],
    ['Image', report.imageDecision],
    ['Release', report.releaseDecision]
  ]
  const present = rows.filter((row): row is [string, GateDecision] => row[1] !== undefined)
  if (present.length === 0) {
    return ''
  }

  const lines: string[] = ['## Gate Decisions', '', '| Gate | Outcome |', '|------|---------|']
  for (const [label, decision] of present) {
    lines.push(`| ${label} | ${decision.outcome.toUpperCase()} |`)
  }
  lines.push('')

  return lines.join('\n')
}

function generateFindingItem(finding: Finding, maskSecrets: boolean): string {
  const processed = maskSecrets ? maskFindingEvidence(finding) : finding
  const location = processed.location
    ? ` at \`${processed.location.line ? `${processed.location.file}:${processed.location.line}` : processed.location.file}\``
    : ''

  const lines = [`  - **${processed.severity}** \`${processed.rule}\`${location}: ${processed.message}`]
  if (processed.evidence) {
    lines.push(`    \`${processed.evidence}\``)
  }
  return lines.join('\n')
}

/**
 * The decision that stopped the run, if any
 */
function blockingDecision(report: PipelineReport): GateDecision | undefined {
  return [report.releaseDecision, report.sourceDecision, report.imageDecision]
    .find(decision => decision?.outcome === 'blocked')
}

function generateBlockingSection(report: PipelineReport, maskSecrets: boolean): string {
  const decision = blockingDecision(report)
  if (!decision) {
    return ''
  }

  const lines: string[] = ['## Blocking Reasons', '']
  for (const reason of decision.reasons) {
    lines.push(`- **[${reason.stage}] ${reason.taskId}**: ${reason.detail}`)
    if (reason.result.status.kind === 'findings') {
      for (const finding of reason.result.status.findings) {
        lines.push(generateFindingItem(finding, maskSecrets))
      }
    }
  }
  lines.push('')

  return lines.join('\n')
}

function generateResultsSection(report: PipelineReport): string {
  const rows: Array<[string, ScanResult]> = [
    ...report.sourceResults.map((result): [string, ScanResult] => ['source', result]),
    ...report.imageResults.map((result): [string, ScanResult] => ['image', result])
  ]
  if (rows.length === 0) {
    return ''
  }

  const lines: string[] = [
    '## Scan Results',
    '',
    '| Task | Stage | Required | Status | Duration |',
    '|------|-------|----------|--------|----------|'
  ]
  for (const [stage, result] of rows) {
    lines.push(
      `| ${result.taskId} | ${stage} | ${result.required ? 'yes' : 'no'} | ${formatStatus(result.status)} | ${formatDuration(result.duration)}s |`
    )
  }
  lines.push('')

  return lines.join('\n')
}

function generateArtifactSection(report: PipelineReport): string {
  if (!report.artifact) {
    return ''
  }

  const lines: string[] = [
    '## Artifact',
    '',
    '| Property | Value |',
    '|----------|-------|',
    `| Digest | \`${report.artifact.digest}\` |`,
    `| Version | ${report.artifact.versionTag} |`,
    `| Status | ${report.artifactStatus ?? 'built'} |`,
    ''
  ]

  return lines.join('\n')
}

function generateRolloutSection(rollout: RolloutState | undefined): string {
  if (!rollout) {
    return ''
  }

  const lines: string[] = [
    '## Rollout',
    '',
    `**Status:** ${rollout.status} (stage ${rollout.stageIndex}, ${rollout.weight}% traffic)`,
    ''
  ]

  const failure = rollout.failure
  if (failure) {
    lines.push(`Rolled back from stage ${failure.stageIndex} at ${failure.weight}% traffic: ${failure.message}`)
    lines.push('')
    if (failure.signals) {
      lines.push(`- Signals: ${formatSignals(failure.signals)}`)
    }
    for (const violation of failure.violations) {
      lines.push(`- Violation: ${violation}`)
    }
    lines.push('')
  }

  return lines.join('\n')
}

function generateErrorsSection(errors: readonly string[]): string {
  if (errors.length === 0) {
    return ''
  }

  const lines: string[] = ['## Errors', '']
  for (const error of errors) {
    lines.push(`- ${error}`)
  }
  lines.push('')

  return lines.join('\n')
}

/**
 * Markdown Reporter for pipeline runs
 *
 * Human-readable summary with full blocking reasons and rollback details.
 */
export class MarkdownReporter implements Reporter {
  private readonly defaultOptions: MarkdownReportOptions = {
    format: 'markdown',
    maskSecrets: true
  }

  generate(report: PipelineReport, options?: Partial<MarkdownReportOptions>): string {
    const opts = { ...this.defaultOptions, ...options }
    const { emoji, label } = OUTCOME_BADGES[report.outcome]

    const sections: string[] = [
      '# Release Report',
      '',
      `**Outcome:** ${emoji} **${label}**`,
      '',
      `*Generated: ${report.timestamp}*`,
      `*Version: ${report.version}*`,
      '',
      '---',
      '',
      generateChangeSection(report),
      generateDecisionsSection(report),
      generateBlockingSection(report, opts.maskSecrets ?? true),
      generateResultsSection(report),
      generateArtifactSection(report),
      generateRolloutSection(report.rollout),
      generateErrorsSection(report.errors),
      '---',
      '',
      '*Report generated by shipgate*'
    ]

    return sections.filter(Boolean).join('\n')
  }

  async write(report: PipelineReport, options?: Partial<MarkdownReportOptions>): Promise<void> {
    const opts = { ...this.defaultOptions, ...options }
    const markdown = this.generate(report, opts)

    if (opts.output) {
      await writeFile(opts.output, markdown, 'utf-8')
    } else if (!opts.quiet) {
      process.stdout.write(markdown + '\n')
    }
  }
}

export function createMarkdownReporter(): MarkdownReporter {
  return new MarkdownReporter()
}
