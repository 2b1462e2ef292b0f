import { execFile } from 'child_process'
import { promisify } from 'util'
import type { ScanTarget, ScanTask } from '../../types/index.js'
import type { ScanAdapter, ToolReport } from './adapter.js'
import { getExtractor, ReportParseError, type ReportExtractor, type ReportFormat } from './extractors.js'

const execFileAsync = promisify(execFile)

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024

export interface CommandDefinition {
  command: string
  args: readonly string[]
  format: ReportFormat
  /** Working directory; defaults to the source path for source targets */
  cwd?: string
}

interface ExecFailure extends Error {
  code?: number | string
  stdout?: string
  stderr?: string
}

function isExecFailure(error: unknown): error is ExecFailure {
  return error instanceof Error && ('stdout' in error || 'code' in error)
}

/**
 * Replace {path}, {digest}, {service} and {commit} placeholders
 */
export function substituteArgs(args: readonly string[], target: ScanTarget): string[] {
  const values: Record<string, string> = target.kind === 'source'
    ? {
        path: target.path ?? '.',
        digest: target.digest,
        service: target.service,
        commit: target.commitSha
      }
    : {
        path: target.artifact.digest,
        digest: target.artifact.digest,
        service: target.artifact.serviceId,
        commit: target.artifact.commitSha
      }

  return args.map(arg =>
    arg.replace(/\{(path|digest|service|commit)\}/g, (match, key: string) => values[key] ?? match)
  )
}

/**
 * Invokes an external tool as an opaque command and reads its report from stdout.
 * Tools commonly exit non-zero when they report issues, so a readable
 * report wins over the exit status.
 */
export class CommandScanAdapter implements ScanAdapter {
  private readonly extractor: ReportExtractor

  constructor(private readonly definition: CommandDefinition) {
    this.extractor = getExtractor(definition.format)
  }

  async scan(_task: ScanTask, target: ScanTarget, signal: AbortSignal): Promise<ToolReport> {
    const args = substituteArgs(this.definition.args, target)
    const cwd = this.definition.cwd ?? (target.kind === 'source' ? target.path : undefined)

    let stdout: string
    try {
      const output = await execFileAsync(this.definition.command, args, {
        cwd,
        signal,
        maxBuffer: MAX_OUTPUT_BYTES,
        encoding: 'utf-8'
      })
      stdout = output.stdout
    } catch (error) {
      if (!isExecFailure(error) || typeof error.code !== 'number' || !error.stdout) {
        throw error
      }
      try {
        return this.extractor.extract(error.stdout)
      } catch (parseError) {
        if (parseError instanceof ReportParseError) {
          const stderr = error.stderr?.trim()
          throw new Error(
            `${this.definition.command} exited with code ${error.code}${stderr ? `: ${stderr}` : ''}`
          )
        }
        throw parseError
      }
    }

    return this.extractor.extract(stdout)
  }
}
