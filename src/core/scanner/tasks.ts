import type { ScanStage, ScanTask } from '../../types/index.js'
import type { ScannerConfig } from '../config/schema.js'
import type { ScanAdapter } from './adapter.js'
import { CommandScanAdapter } from './command.js'

/**
 * Scan tasks for one stage, in config order
 */
export function tasksForStage(scanners: readonly ScannerConfig[], stage: ScanStage): ScanTask[] {
  return scanners
    .filter(scanner => scanner.stage === stage)
    .map(scanner => ({
      id: scanner.id,
      tool: scanner.tool,
      stage: scanner.stage,
      required: scanner.required,
      failClosed: scanner.failClosed,
      threshold: scanner.threshold,
      timeoutMs: scanner.timeoutMs
    }))
}

/**
 * One command adapter per configured scanner, keyed by task id
 */
export function commandAdapters(scanners: readonly ScannerConfig[]): Map<string, ScanAdapter> {
  return new Map(
    scanners.map((scanner): [string, ScanAdapter] => [
      scanner.id,
      new CommandScanAdapter({ command: scanner.command, args: scanner.args, format: scanner.format })
    ])
  )
}
