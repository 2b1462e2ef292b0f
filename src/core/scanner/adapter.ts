import type { Finding, ScanTarget, ScanTask } from '../../types/index.js'

/**
 * Report produced by one tool invocation, already normalized
 */
export interface ToolReport {
  findings: Finding[]
  /** Raw tool output kept for durable storage */
  raw: unknown
}

/**
 * Bridge between the orchestrator and one external tool.
 * Adapters translate tool-specific output; the core never branches on tool identity.
 */
export interface ScanAdapter {
  scan(task: ScanTask, target: ScanTarget, signal: AbortSignal): Promise<ToolReport>
}

/**
 * Wrap a function as an adapter
 */
export function createAdapter(
  scan: (task: ScanTask, target: ScanTarget, signal: AbortSignal) => Promise<ToolReport>
): ScanAdapter {
  return { scan }
}
