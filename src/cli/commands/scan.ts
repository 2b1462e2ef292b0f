/**
 * Scan command implementation
 *
 * Runs the configured source-stage tasks against a local tree:
 * Config → Scan tasks (parallel) → Source gate → Reporter
 */

import { stat } from 'fs/promises'
import { basename, resolve } from 'path'
import type { Command } from 'commander'
import type { GlobalOptions } from '../index.js'
import { createLogger, finding, outcome } from '../../utils/logger.js'
import { hashDirectory } from '../../utils/hash.js'
import { VERSION } from '../../version.js'
import { ConfigLoader } from '../../core/config/loader.js'
import type { Config } from '../../core/config/schema.js'
import { ExitCodes, ReleaseGate } from '../../core/gate/index.js'
import {
  FileReportStore,
  ScanAggregator,
  ScanRunner,
  commandAdapters,
  tasksForStage
} from '../../core/scanner/index.js'
import { JsonReporter } from '../../core/reporter/json.js'
import { MarkdownReporter } from '../../core/reporter/markdown.js'
import type { ChangeEvent, GateDecision, PipelineReport, ScanResult } from '../../types/index.js'

const logger = createLogger('scan')

/**
 * Scan command options
 */
export interface ScanOptions {
  output?: string
  format?: 'json' | 'markdown'
  /** Service the tree belongs to; defaults to the directory name */
  service?: string
  /** Commit the tree was checked out at */
  commit?: string
  /** Directory for raw tool reports */
  reports?: string
}

/**
 * Load the config named by --config, or the bundled template
 */
export async function loadConfig(globalOptions: GlobalOptions): Promise<Config> {
  const loader = new ConfigLoader()
  return globalOptions.config
    ? loader.load(globalOptions.config)
    : loader.loadDefault()
}

function toolErrors(results: readonly ScanResult[]): string[] {
  const errors: string[] = []
  for (const result of results) {
    if (result.status.kind === 'tool_error') {
      errors.push(`${result.taskId}: ${result.status.message}`)
    }
  }
  return errors
}

function printDecision(decision: GateDecision, gate: ReleaseGate): void {
  const { summary } = gate.summarize(decision)
  outcome(decision.outcome === 'proceed', summary)

  for (const reason of decision.reasons) {
    logger.info(`  - ${reason.taskId}: ${reason.detail}`)
    if (reason.result.status.kind !== 'findings') {
      continue
    }
    for (const item of reason.result.status.findings) {
      const location = item.location
        ? `${item.location.file}${item.location.line !== undefined ? `:${item.location.line}` : ''}`
        : reason.taskId
      finding(item.severity, `${item.rule}: ${item.message}`, location)
    }
  }
}

/**
 * Execute scan command
 */
export async function executeScan(
  source: string,
  options: ScanOptions,
  globalOptions: GlobalOptions
): Promise<number> {
  const startTime = Date.now()
  const receivedAt = new Date(startTime).toISOString()
  const root = resolve(source)

  try {
    const info = await stat(root).catch(() => undefined)
    if (!info?.isDirectory()) {
      if (!globalOptions.quiet) {
        logger.error(`Source is not a directory: ${root}`)
      }
      return ExitCodes.error
    }

    const config = await loadConfig(globalOptions)
    const tasks = tasksForStage(config.scanners, 'source')

    if (tasks.length === 0 && !globalOptions.quiet) {
      logger.warn(`No source-stage scanners configured in ${config.name}`)
    }

    const runner = new ScanRunner({
      adapters: commandAdapters(config.scanners),
      store: options.reports ? new FileReportStore(options.reports) : undefined
    })
    const aggregator = new ScanAggregator(runner)

    const service = options.service ?? basename(root)
    const digest = await hashDirectory(root)
    const commitSha = options.commit ?? digest

    if (globalOptions.verbose) {
      logger.info(`Running ${tasks.length} task(s) against ${root}`)
    }

    const { results, decision } = await aggregator.evaluate(tasks, {
      kind: 'source',
      service,
      commitSha,
      path: root,
      digest
    })

    const change: ChangeEvent = {
      id: `scan-${digest.slice(0, 12)}`,
      service,
      commitSha,
      branch: 'local',
      changedPaths: [],
      sourcePath: root,
      receivedAt
    }

    const report: PipelineReport = {
      version: VERSION,
      timestamp: new Date().toISOString(),
      change,
      outcome: decision.outcome === 'proceed' ? 'passed' : 'blocked',
      service,
      sourceResults: [...results],
      sourceDecision: decision,
      imageResults: [],
      duration: Date.now() - startTime,
      configName: config.name,
      errors: toolErrors(results)
    }

    const reporter = options.format === 'markdown'
      ? new MarkdownReporter()
      : new JsonReporter()
    await reporter.write(report, {
      output: options.output,
      quiet: globalOptions.quiet
    })

    const gate = new ReleaseGate()
    if (!globalOptions.quiet && !options.output) {
      logger.info('')
      printDecision(decision, gate)
    }

    return gate.exitCode(decision)
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error'
    if (!globalOptions.quiet) {
      logger.error(`Scan failed: ${message}`)
    }
    return ExitCodes.error
  }
}

/**
 * Register scan command on the program
 */
export function registerScanCommand(program: Command): void {
  program
    .command('scan <path>')
    .description('Scan a source tree with the configured source-stage tasks')
    .option('-o, --output <file>', 'Output file path')
    .option('-f, --format <format>', 'Output format (json|markdown)', 'json')
    .option('-s, --service <id>', 'Service the tree belongs to')
    .option('--commit <sha>', 'Commit the tree was checked out at')
    .option('--reports <dir>', 'Directory for raw tool reports')
    .action(async (source: string, options: ScanOptions) => {
      const globalOpts = program.opts<GlobalOptions>()
      const exitCode = await executeScan(source, options, globalOpts)
      process.exit(exitCode)
    })
}
