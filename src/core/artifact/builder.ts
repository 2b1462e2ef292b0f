import type {
  Artifact,
  ArtifactStatus,
  ChangeEvent,
  GateDecision,
  ScanResult,
  ScanTarget,
  ScanTask
} from '../../types/index.js'
import { createLogger } from '../../utils/logger.js'
import type { ScanAggregator } from '../scanner/index.js'
import type { BuildBackend } from './backend.js'
import type { ArtifactRegistry } from './registry.js'

const logger = createLogger('builder')

/**
 * The builder could not produce a verified digest. Aborts the pipeline run.
 */
export class BuildFailure extends Error {
  constructor(
    public readonly service: string,
    public readonly commitSha: string,
    public readonly reason: string
  ) {
    super(`Build failed for ${service}@${commitSha}: ${reason}`)
    this.name = 'BuildFailure'
  }
}

export interface ArtifactBuilderOptions {
  backend: BuildBackend
  registry: ArtifactRegistry
  /** Runs image-stage scan tasks */
  aggregator: ScanAggregator
  now?: () => Date
}

export interface ImageScanOutcome {
  artifact: Artifact
  status: ArtifactStatus
  results: readonly ScanResult[]
  decision: GateDecision
}

interface ArtifactRecord {
  artifact: Artifact
  status: ArtifactStatus
}

/**
 * Builds content-addressed artifacts and gates them on image scans.
 * Quarantined artifacts are kept for inspection and never promoted.
 */
export class ArtifactBuilder {
  private readonly records = new Map<string, ArtifactRecord>()
  private readonly now: () => Date

  constructor(private readonly options: ArtifactBuilderOptions) {
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Build, push and verify an artifact for the change
   */
  async build(change: ChangeEvent, signal?: AbortSignal): Promise<Artifact> {
    let digest: string
    try {
      const image = await this.options.backend.build(change, signal)
      digest = await this.options.registry.push(image)

      const pulled = await this.options.registry.pull(digest)
      if (!pulled) {
        throw new Error(`Registry has no image for ${digest}`)
      }
      if (pulled.content !== image.content) {
        throw new Error(`Registry content does not match ${digest}`)
      }
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      logger.error(`Build failed for ${change.service}: ${reason}`)
      throw new BuildFailure(change.service, change.commitSha, reason)
    }

    const existing = this.records.get(digest)
    if (existing) {
      logger.info(`${change.service}: source unchanged, reusing ${digest}`)
      return existing.artifact
    }

    const artifact: Artifact = Object.freeze({
      serviceId: change.service,
      digest,
      versionTag: change.commitSha.slice(0, 12),
      commitSha: change.commitSha,
      builtAt: this.now().toISOString()
    })
    this.records.set(digest, { artifact, status: 'built' })
    logger.info(`Built ${change.service} ${artifact.versionTag} as ${digest}`)

    return artifact
  }

  /**
   * Run image-stage tasks against the artifact and record the verdict.
   * A cancelled scan leaves the status untouched.
   */
  async scanImage(artifact: Artifact, tasks: readonly ScanTask[], signal?: AbortSignal): Promise<ImageScanOutcome> {
    const target: ScanTarget = { kind: 'artifact', artifact, digest: artifact.digest }
    const { results, decision } = await this.options.aggregator.evaluate(tasks, target, signal)

    const record: ArtifactRecord = this.records.get(artifact.digest) ?? { artifact, status: 'built' }
    if (!signal?.aborted && record.status !== 'quarantined') {
      record.status = decision.outcome === 'proceed' ? 'deployable' : 'quarantined'
      if (record.status === 'quarantined') {
        logger.warn(`Quarantined ${artifact.digest}: image scan blocked`)
      }
    }
    this.records.set(artifact.digest, record)

    return { artifact: record.artifact, status: record.status, results, decision }
  }

  get(digest: string): Artifact | undefined {
    return this.records.get(digest)?.artifact
  }

  status(digest: string): ArtifactStatus | undefined {
    return this.records.get(digest)?.status
  }

  /**
   * Artifacts kept for forensic inspection
   */
  quarantined(): Artifact[] {
    return [...this.records.values()]
      .filter(record => record.status === 'quarantined')
      .map(record => record.artifact)
  }
}
