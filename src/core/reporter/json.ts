import { writeFile } from 'node:fs/promises'
import type { PipelineReport } from '../../types/index.js'
import { maskReport, type Reporter, type JsonReportOptions } from './base.js'

/**
 * JSON Reporter for pipeline runs
 *
 * Outputs the full run record for machine consumption.
 * Evidence is masked unless `maskSecrets` is turned off.
 */
export class JsonReporter implements Reporter {
  private readonly defaultOptions: JsonReportOptions = {
    format: 'json',
    pretty: true,
    maskSecrets: true
  }

  generate(report: PipelineReport, options?: Partial<JsonReportOptions>): string {
    const opts = { ...this.defaultOptions, ...options }

    const outputReport = opts.maskSecrets ? maskReport(report) : report

    if (opts.pretty) {
      return JSON.stringify(outputReport, null, 2)
    }

    return JSON.stringify(outputReport)
  }

  async write(report: PipelineReport, options?: Partial<JsonReportOptions>): Promise<void> {
    const opts = { ...this.defaultOptions, ...options }
    const json = this.generate(report, opts)

    if (opts.output) {
      await writeFile(opts.output, json, 'utf-8')
    } else if (!opts.quiet) {
      process.stdout.write(json + '\n')
    }
  }
}

export function createJsonReporter(): JsonReporter {
  return new JsonReporter()
}
