import type { ScanResult, ScanTarget } from '../../types/index.js'
import { hashJson } from '../../utils/hash.js'
import { createLogger } from '../../utils/logger.js'
import { maskFindingEvidence } from '../../utils/mask.js'
import { withRetry, type WaitFn } from '../../utils/retry.js'
import type { VulnerabilityBatch, VulnerabilitySink } from './sink.js'

const logger = createLogger('reporter')

export interface VulnerabilityReporterOptions {
  attempts: number
  baseDelayMs: number
  maxDelayMs: number
  wait?: WaitFn
}

/**
 * A batch that could not be delivered after every retry
 */
export interface ReportingFailure {
  key: string
  taskId: string
  message: string
  at: string
}

/**
 * Pushes findings to the vulnerability sink on a side channel.
 * publish() never blocks or fails the caller.
 */
export class VulnerabilityReporter {
  private readonly delivered = new Set<string>()
  private readonly inFlight = new Set<string>()
  private readonly pending = new Set<Promise<void>>()
  private readonly failureLog: ReportingFailure[] = []

  constructor(
    private readonly sink: VulnerabilitySink,
    private readonly options: VulnerabilityReporterOptions
  ) {}

  /**
   * Queue results with findings for upload.
   * A batch already delivered or in flight for the same content is skipped.
   */
  publish(results: readonly ScanResult[], target: ScanTarget): void {
    for (const result of results) {
      if (result.status.kind !== 'findings') {
        continue
      }

      const findings = result.status.findings.map(maskFindingEvidence)
      const contentDigest = hashJson(findings)
      const key = `${result.taskId}|${target.digest}|${contentDigest}`
      if (this.delivered.has(key) || this.inFlight.has(key)) {
        logger.debug(`Skipping duplicate batch for ${result.taskId}`)
        continue
      }

      const batch: VulnerabilityBatch = {
        key,
        taskId: result.taskId,
        tool: result.tool,
        stage: target.kind === 'source' ? 'source' : 'image',
        service: target.kind === 'source' ? target.service : target.artifact.serviceId,
        targetDigest: target.digest,
        contentDigest,
        findings,
        timestamp: result.timestamp,
        ...(result.reportRef ? { reportRef: result.reportRef } : {})
      }

      this.inFlight.add(key)
      const delivery: Promise<void> = this.deliver(batch).finally(() => {
        this.inFlight.delete(key)
        this.pending.delete(delivery)
      })
      this.pending.add(delivery)
    }
  }

  /**
   * Wait for every queued upload to finish or give up
   */
  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending])
    }
  }

  get failures(): readonly ReportingFailure[] {
    return this.failureLog
  }

  private async deliver(batch: VulnerabilityBatch): Promise<void> {
    try {
      await withRetry(() => this.sink.upload(batch), {
        attempts: this.options.attempts,
        baseDelayMs: this.options.baseDelayMs,
        maxDelayMs: this.options.maxDelayMs,
        wait: this.options.wait,
        onRetry: (attempt, error, delayMs) => {
          const message = error instanceof Error ? error.message : String(error)
          logger.debug(`Upload of ${batch.taskId} failed (attempt ${attempt}): ${message}; retrying in ${delayMs}ms`)
        }
      })
      this.delivered.add(batch.key)
      logger.debug(`Uploaded ${batch.findings.length} finding(s) from ${batch.taskId}`)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      this.failureLog.push({
        key: batch.key,
        taskId: batch.taskId,
        message,
        at: new Date().toISOString()
      })
      logger.error(`Reporting failure for ${batch.taskId}: ${message}`)
    }
  }
}
