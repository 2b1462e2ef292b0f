/**
 * plan command - Print the rollout plan configured for a service
 */

import type { Command } from 'commander'
import type { GlobalOptions } from '../index.js'
import { createLogger } from '../../utils/logger.js'
import { ExitCodes } from '../../core/gate/index.js'
import { createPlan } from '../../core/rollout/plan.js'
import type { HealthCriteria, RolloutPlan } from '../../types/index.js'
import { loadConfig } from './scan.js'

const logger = createLogger('plan')

export interface PlanOptions {
  digest?: string
  version?: string
  format?: 'text' | 'json'
}

const UNBUILT = 'unbuilt'

export function formatWindow(ms: number): string {
  if (ms > 0 && ms % 60000 === 0) {
    return `${ms / 60000}m`
  }
  if (ms > 0 && ms % 1000 === 0) {
    return `${ms / 1000}s`
  }
  return `${ms}ms`
}

function formatCriteria(criteria: HealthCriteria): string {
  const parts = [`error rate <= ${(criteria.maxErrorRate * 100).toFixed(2)}%`]
  for (const percentile of ['p50', 'p95', 'p99'] as const) {
    const limit = criteria.maxLatencyMs[percentile]
    if (limit !== undefined) {
      parts.push(`${percentile} <= ${limit}ms`)
    }
  }
  return parts.join(', ')
}

/**
 * One line for the plan, then one per stage
 */
export function formatPlan(plan: RolloutPlan): string[] {
  return [
    `${plan.service} → ${plan.environment} (${plan.strategy}, ${plan.stages.length} stage(s))`,
    ...plan.stages.map((stage, index) =>
      `  stage ${index}: ${stage.weight}% for ${formatWindow(stage.windowMs)}, ${formatCriteria(stage.criteria)}`
    )
  ]
}

/**
 * Execute plan command
 */
export async function executePlan(
  serviceId: string,
  options: PlanOptions,
  globalOptions: GlobalOptions
): Promise<number> {
  try {
    const config = await loadConfig(globalOptions)
    const service = config.services.find(s => s.id === serviceId)

    if (!service) {
      if (!globalOptions.quiet) {
        const known = config.services.map(s => s.id).join(', ') || 'none'
        logger.error(`Unknown service: ${serviceId} (configured: ${known})`)
      }
      return ExitCodes.error
    }

    const plan = createPlan(
      {
        service: service.id,
        environment: service.environment,
        artifactDigest: options.digest ?? UNBUILT,
        versionTag: options.version ?? options.digest?.slice(0, 12) ?? UNBUILT
      },
      service.rollout.strategy,
      service.rollout.stages
    )

    if (!globalOptions.quiet) {
      const output = options.format === 'json'
        ? JSON.stringify(plan, null, 2)
        : formatPlan(plan).join('\n')
      process.stdout.write(output + '\n')
    }

    return ExitCodes.proceed
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error'
    if (!globalOptions.quiet) {
      logger.error(`Plan failed: ${message}`)
    }
    return ExitCodes.error
  }
}

/**
 * Register plan command on the program
 */
export function registerPlanCommand(program: Command): void {
  program
    .command('plan <service>')
    .description('Print the rollout plan configured for a service')
    .option('-d, --digest <digest>', 'Artifact digest to plan for')
    .option('--version-tag <tag>', 'Version tag of the artifact')
    .option('-f, --format <format>', 'Output format (text|json)', 'text')
    .action(async (service: string, options: { digest?: string; versionTag?: string; format?: 'text' | 'json' }) => {
      const globalOpts = program.opts<GlobalOptions>()
      const exitCode = await executePlan(
        service,
        { digest: options.digest, version: options.versionTag, format: options.format },
        globalOpts
      )
      process.exit(exitCode)
    })
}
