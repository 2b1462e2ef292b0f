import type {
  ScanResult,
  ScanStatus,
  ScanTarget,
  ScanTask,
  ToolErrorReason
} from '../../types/index.js'
import { buildHistogram } from '../../types/index.js'
import { createLogger } from '../../utils/logger.js'
import type { ScanAdapter, ToolReport } from './adapter.js'
import type { ReportStore } from './store.js'

const logger = createLogger('scanner')

class TaskInterrupt extends Error {
  constructor(public readonly reason: Exclude<ToolErrorReason, 'crash'>, message: string) {
    super(message)
    this.name = 'TaskInterrupt'
  }
}

export interface ScanRunnerOptions {
  /** Adapters keyed by task id */
  adapters: ReadonlyMap<string, ScanAdapter>
  /** Durable storage for raw reports; reports are not persisted without one */
  store?: ReportStore
}

/**
 * Runs one scan task against a target.
 * Never rejects: crashes, timeouts and cancellations become tool errors.
 */
export class ScanRunner {
  private readonly adapters: ReadonlyMap<string, ScanAdapter>
  private readonly store?: ReportStore

  constructor(options: ScanRunnerOptions) {
    this.adapters = options.adapters
    this.store = options.store
  }

  async run(task: ScanTask, target: ScanTarget, signal?: AbortSignal): Promise<ScanResult> {
    const start = Date.now()
    const adapter = this.adapters.get(task.id)

    if (!adapter) {
      return this.result(task, start, {
        kind: 'tool_error',
        reason: 'crash',
        message: `No adapter registered for task ${task.id}`
      })
    }

    if (signal?.aborted) {
      return this.result(task, start, {
        kind: 'tool_error',
        reason: 'cancelled',
        message: 'Cancelled before start'
      })
    }

    logger.debug(`Running ${task.id} (${task.tool}) against ${target.digest}`)

    let report: ToolReport
    try {
      report = await this.invoke(adapter, task, target, signal)
    } catch (error) {
      const reason: ToolErrorReason = error instanceof TaskInterrupt ? error.reason : 'crash'
      const message = error instanceof Error ? error.message : String(error)
      logger.warn(`${task.id} failed (${reason}): ${message}`)
      return this.result(task, start, { kind: 'tool_error', reason, message })
    }

    const status: ScanStatus = report.findings.length === 0
      ? { kind: 'success' }
      : { kind: 'findings', histogram: buildHistogram(report.findings), findings: report.findings }

    const reportRef = await this.persist(task, target, report.raw)
    return this.result(task, start, status, reportRef)
  }

  /**
   * Race the adapter against the task timeout and the caller's signal.
   * The adapter's own signal aborts in both cases so it can release resources.
   */
  private async invoke(
    adapter: ScanAdapter,
    task: ScanTask,
    target: ScanTarget,
    signal?: AbortSignal
  ): Promise<ToolReport> {
    const controller = new AbortController()
    let timer: NodeJS.Timeout | undefined
    let onAbort: (() => void) | undefined

    const interrupted = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new TaskInterrupt('timeout', `Timed out after ${task.timeoutMs}ms`))
      }, task.timeoutMs)

      onAbort = () => reject(new TaskInterrupt('cancelled', 'Cancelled by a newer change'))
      signal?.addEventListener('abort', onAbort, { once: true })
    })

    try {
      return await Promise.race([adapter.scan(task, target, controller.signal), interrupted])
    } finally {
      clearTimeout(timer)
      if (onAbort) {
        signal?.removeEventListener('abort', onAbort)
      }
      controller.abort()
    }
  }

  private async persist(task: ScanTask, target: ScanTarget, raw: unknown): Promise<string | undefined> {
    if (!this.store) {
      return undefined
    }
    try {
      return await this.store.put({
        taskId: task.id,
        targetDigest: target.digest,
        timestamp: new Date().toISOString(),
        raw
      })
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      logger.warn(`Could not persist raw report for ${task.id}: ${message}`)
      return undefined
    }
  }

  private result(task: ScanTask, start: number, status: ScanStatus, reportRef?: string): ScanResult {
    const result: ScanResult = {
      taskId: task.id,
      tool: task.tool,
      required: task.required,
      status,
      timestamp: new Date().toISOString(),
      duration: Date.now() - start,
      ...(reportRef ? { reportRef } : {})
    }
    return Object.freeze(result)
  }
}
