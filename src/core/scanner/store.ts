import { mkdir, readFile, writeFile } from 'fs/promises'
import { join, resolve } from 'path'
import { z } from 'zod'

/**
 * Raw tool output persisted for a scan result
 */
export interface RawReportEntry {
  taskId: string
  targetDigest: string
  timestamp: string
  raw: unknown
}

/**
 * Durable storage for raw tool reports
 */
export interface ReportStore {
  /** Persist an entry and return its reference */
  put(entry: RawReportEntry): Promise<string>
  get(ref: string): Promise<RawReportEntry | undefined>
}

const RawReportEntrySchema = z.object({
  taskId: z.string(),
  targetDigest: z.string(),
  timestamp: z.string(),
  raw: z.unknown()
})

function safeSegment(value: string): string {
  return value.replace(/[^a-zA-Z0-9._-]/g, '_')
}

/** Unparseable content yields undefined, which the schema then rejects */
function parseJson(content: string): unknown {
  try {
    return JSON.parse(content)
  } catch {
    return undefined
  }
}

/**
 * Writes one JSON file per report under a directory
 */
export class FileReportStore implements ReportStore {
  private readonly directory: string

  constructor(directory: string) {
    this.directory = resolve(directory)
  }

  async put(entry: RawReportEntry): Promise<string> {
    await mkdir(this.directory, { recursive: true })
    const name = [
      safeSegment(entry.taskId),
      safeSegment(entry.targetDigest).slice(0, 24),
      safeSegment(entry.timestamp)
    ].join('-')
    const path = join(this.directory, `${name}.json`)
    await writeFile(path, JSON.stringify(entry, null, 2), 'utf-8')
    return path
  }

  async get(ref: string): Promise<RawReportEntry | undefined> {
    let content: string
    try {
      content = await readFile(ref, 'utf-8')
    } catch {
      return undefined
    }
    const parsed = RawReportEntrySchema.safeParse(parseJson(content))
    return parsed.success ? { ...parsed.data, raw: parsed.data.raw } : undefined
  }
}

/**
 * Keeps reports in memory; for tests and dry runs
 */
export class InMemoryReportStore implements ReportStore {
  private readonly entries = new Map<string, RawReportEntry>()

  async put(entry: RawReportEntry): Promise<string> {
    const ref = `memory://${entry.taskId}/${this.entries.size + 1}`
    this.entries.set(ref, entry)
    return ref
  }

  async get(ref: string): Promise<RawReportEntry | undefined> {
    return this.entries.get(ref)
  }

  get size(): number {
    return this.entries.size
  }
}
