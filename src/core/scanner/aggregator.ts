import type {
  GateDecision,
  GateReason,
  ScanResult,
  ScanStage,
  ScanTarget,
  ScanTask,
  SeverityHistogram
} from '../../types/index.js'
import { SEVERITY_ORDER, meetsThreshold } from '../../types/index.js'
import { createLogger } from '../../utils/logger.js'
import type { ScanRunner } from './runner.js'

const logger = createLogger('aggregator')

/**
 * Results of one aggregation batch and the gate decision derived from them
 */
export interface AggregateResult {
  /** Sorted by task id */
  results: readonly ScanResult[]
  decision: GateDecision
}

function byTaskId(a: { taskId: string }, b: { taskId: string }): number {
  return a.taskId < b.taskId ? -1 : a.taskId > b.taskId ? 1 : 0
}

export function stageOf(target: ScanTarget): ScanStage {
  return target.kind === 'source' ? 'source' : 'image'
}

function formatHistogram(histogram: Partial<SeverityHistogram>): string {
  return SEVERITY_ORDER
    .filter(severity => (histogram[severity] ?? 0) > 0)
    .map(severity => `${severity}: ${histogram[severity]}`)
    .join(', ')
}

/**
 * Explain why a result blocks its task, or return undefined when it doesn't
 */
function blockingReason(stage: ScanStage, task: ScanTask, result: ScanResult): GateReason | undefined {
  if (!task.required) {
    return undefined
  }

  const { status } = result
  if (status.kind === 'findings') {
    const blocking: Partial<SeverityHistogram> = {}
    let count = 0
    for (const severity of SEVERITY_ORDER) {
      if (meetsThreshold(severity, task.threshold) && status.histogram[severity] > 0) {
        blocking[severity] = status.histogram[severity]
        count += status.histogram[severity]
      }
    }
    if (count === 0) {
      return undefined
    }
    return {
      kind: 'findings_blocked',
      stage,
      taskId: task.id,
      detail: `${count} finding(s) at or above ${task.threshold} (${formatHistogram(blocking)})`,
      result
    }
  }

  if (status.kind === 'tool_error' && task.failClosed) {
    return {
      kind: 'tool_error',
      stage,
      taskId: task.id,
      detail: `Tool error (${status.reason}) on fail-closed task: ${status.message}`,
      result
    }
  }

  return undefined
}

/**
 * Derive the gate decision for one stage.
 * Blocked iff a required task has findings at or above its threshold,
 * or a required fail-closed task produced a tool error.
 */
export function classify(
  stage: ScanStage,
  tasks: readonly ScanTask[],
  results: readonly ScanResult[]
): GateDecision {
  const tasksById = new Map(tasks.map(task => [task.id, task]))
  const reasons: GateReason[] = []

  for (const result of [...results].sort(byTaskId)) {
    const task = tasksById.get(result.taskId)
    if (!task) {
      continue
    }
    const reason = blockingReason(stage, task, result)
    if (reason) {
      reasons.push(Object.freeze(reason))
    }
  }

  const decision: GateDecision = {
    stage,
    outcome: reasons.length > 0 ? 'blocked' : 'proceed',
    reasons: Object.freeze(reasons)
  }
  return Object.freeze(decision)
}

/**
 * Runs a set of scan tasks concurrently and joins on all of them.
 * There is no early exit: every result is collected for reporting.
 */
export class ScanAggregator {
  constructor(private readonly runner: ScanRunner) {}

  async evaluate(
    tasks: readonly ScanTask[],
    target: ScanTarget,
    signal?: AbortSignal
  ): Promise<AggregateResult> {
    const ids = new Set(tasks.map(task => task.id))
    if (ids.size !== tasks.length) {
      throw new Error('Scan task ids must be unique within a batch')
    }

    const stage = stageOf(target)
    logger.info(`Running ${tasks.length} ${stage} task(s) against ${target.digest}`)

    const results = await Promise.all(
      tasks.map(task => this.runner.run(task, target, signal))
    )
    const sorted = Object.freeze([...results].sort(byTaskId))
    const decision = classify(stage, tasks, sorted)

    logger.info(
      `${stage} gate: ${decision.outcome}` +
      (decision.reasons.length > 0 ? ` (${decision.reasons.map(r => r.taskId).join(', ')})` : '')
    )

    return { results: sorted, decision }
  }
}
