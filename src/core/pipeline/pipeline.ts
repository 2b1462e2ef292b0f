import type {
  Artifact,
  ChangeEvent,
  GateDecision,
  PipelineOutcome,
  PipelineReport,
  ScanTarget
} from '../../types/index.js'
import { VERSION } from '../../version.js'
import { createLogger } from '../../utils/logger.js'
import { withRetry, type WaitFn } from '../../utils/retry.js'
import { BuildFailure, type ArtifactBuilder } from '../artifact/index.js'
import type { Config, ServiceConfig } from '../config/schema.js'
import { ReleaseGate } from '../gate/index.js'
import type { VulnerabilityReporter } from '../reporter/vulnerability.js'
import { createPlan, type ConflictPolicy, type RolloutCoordinator } from '../rollout/index.js'
import { tasksForStage, type ScanAggregator } from '../scanner/index.js'
import type { GitOpsDispatcher } from './gitops.js'
import { selectService } from './select.js'

const logger = createLogger('pipeline')

export interface ReleasePipelineOptions {
  config: Config
  aggregator: ScanAggregator
  reporter: VulnerabilityReporter
  builder: ArtifactBuilder
  rollouts: RolloutCoordinator
  gitops: GitOpsDispatcher
  gate?: ReleaseGate
  /** Policy for a rollout already active on the same service+environment */
  onConflict?: ConflictPolicy
  /** Timed wait for GitOps retries */
  wait?: WaitFn
}

type Draft = Omit<PipelineReport, 'version' | 'timestamp' | 'duration' | 'outcome'>

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Runs a change through source scans, build, image scans, the release gate
 * and the rollout. Only blocked gates and build failures stop a run early.
 *
 * A newer change for the same service and branch cancels the run in flight.
 */
export class ReleasePipeline {
  private readonly inFlight = new Map<string, AbortController>()
  private readonly gate: ReleaseGate

  constructor(private readonly options: ReleasePipelineOptions) {
    this.gate = options.gate ?? new ReleaseGate()
  }

  async run(change: ChangeEvent): Promise<PipelineReport> {
    const start = Date.now()
    const { config } = this.options
    const draft: Draft = {
      change,
      sourceResults: [],
      imageResults: [],
      configName: config.name,
      errors: []
    }
    const finish = (outcome: PipelineOutcome): PipelineReport => {
      logger.info(`${change.id}: ${outcome}`)
      return {
        version: VERSION,
        timestamp: new Date().toISOString(),
        outcome,
        duration: Date.now() - start,
        ...draft
      }
    }

    const service = selectService(config.services, change)
    if (!service) {
      logger.info(`${change.id}: no service pipeline matches ${change.changedPaths.length} changed path(s)`)
      return finish('skipped')
    }
    draft.service = service.id
    draft.environment = service.environment

    const key = `${service.id}|${change.branch}`
    const previous = this.inFlight.get(key)
    if (previous) {
      logger.warn(`Superseding in-flight run for ${service.id} on ${change.branch}`)
      previous.abort()
    }
    const controller = new AbortController()
    this.inFlight.set(key, controller)

    try {
      return finish(await this.execute(change, service, draft, controller.signal))
    } finally {
      if (this.inFlight.get(key) === controller) {
        this.inFlight.delete(key)
      }
    }
  }

  private async execute(
    change: ChangeEvent,
    service: ServiceConfig,
    draft: Draft,
    signal: AbortSignal
  ): Promise<PipelineOutcome> {
    const { config, aggregator, reporter, builder } = this.options

    const sourceTarget: ScanTarget = {
      kind: 'source',
      service: service.id,
      commitSha: change.commitSha,
      digest: change.commitSha,
      ...(change.sourcePath ? { path: change.sourcePath } : {})
    }
    const source = await aggregator.evaluate(tasksForStage(config.scanners, 'source'), sourceTarget, signal)
    draft.sourceResults = [...source.results]
    draft.sourceDecision = source.decision
    reporter.publish(source.results, sourceTarget)

    if (signal.aborted) {
      return 'superseded'
    }
    if (source.decision.outcome === 'blocked') {
      this.logBlocked(source.decision)
      return 'blocked'
    }

    let artifact: Artifact
    try {
      artifact = await builder.build(change, signal)
    } catch (error) {
      if (signal.aborted) {
        return 'superseded'
      }
      if (error instanceof BuildFailure) {
        draft.errors.push(error.message)
        return 'build_failed'
      }
      throw error
    }
    draft.artifact = artifact
    draft.artifactStatus = builder.status(artifact.digest)

    const image = await builder.scanImage(artifact, tasksForStage(config.scanners, 'image'), signal)
    const imageTarget: ScanTarget = { kind: 'artifact', artifact, digest: artifact.digest }
    draft.imageResults = [...image.results]
    draft.imageDecision = image.decision
    draft.artifactStatus = image.status
    reporter.publish(image.results, imageTarget)

    if (signal.aborted) {
      return 'superseded'
    }

    const release = this.gate.decide(source.decision, image.decision)
    draft.releaseDecision = release
    if (release.outcome === 'blocked') {
      this.logBlocked(release)
      return 'blocked'
    }

    // A digest quarantined by an earlier run stays out of rotation
    if (image.status !== 'deployable') {
      const message = `Artifact ${artifact.digest} is ${image.status} and cannot be promoted`
      draft.errors.push(message)
      logger.warn(message)
      return 'blocked'
    }

    await this.dispatch(change, service, artifact.digest, artifact.versionTag, draft)

    const plan = createPlan(
      {
        service: service.id,
        environment: service.environment,
        artifactDigest: artifact.digest,
        versionTag: artifact.versionTag
      },
      service.rollout.strategy,
      service.rollout.stages
    )

    try {
      const state = await this.options.rollouts.start(plan, {
        onConflict: this.options.onConflict ?? 'wait',
        signal
      })
      draft.rollout = state
      if (state.status === 'completed') {
        return 'deployed'
      }
      return state.failure?.kind === 'cancelled' && signal.aborted ? 'superseded' : 'rolled_back'
    } catch (error) {
      draft.errors.push(errorMessage(error))
      logger.error(`Rollout of ${artifact.digest} did not finish: ${errorMessage(error)}`)
      return 'rolled_back'
    }
  }

  /**
   * Trigger the GitOps pipeline with at-least-once delivery.
   * Exhausted retries are recorded and do not stop the rollout.
   */
  private async dispatch(
    change: ChangeEvent,
    service: ServiceConfig,
    digest: string,
    versionTag: string,
    draft: Draft
  ): Promise<void> {
    const retry = this.options.config.gitops
    try {
      await withRetry(
        () => this.options.gitops.dispatch({
          service: service.id,
          environment: service.environment,
          digest,
          versionTag,
          changeId: change.id
        }),
        {
          ...retry,
          wait: this.options.wait,
          onRetry: (attempt, error, delayMs) =>
            logger.warn(`GitOps dispatch attempt ${attempt} failed: ${errorMessage(error)}; retrying in ${delayMs}ms`)
        }
      )
      logger.info(`Dispatched ${service.id} ${digest} to GitOps`)
    } catch (error) {
      draft.errors.push(`GitOps dispatch failed: ${errorMessage(error)}`)
      logger.error(`GitOps dispatch for ${service.id} failed: ${errorMessage(error)}`)
    }
  }

  private logBlocked(decision: GateDecision): void {
    const summary = this.gate.summarize(decision)
    logger.warn(summary.summary)
    for (const reason of summary.reasons) {
      logger.warn(`  ${reason}`)
    }
  }
}
