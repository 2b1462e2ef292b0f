import type { Finding, ScanStage } from '../../types/index.js'

/**
 * One upload to the vulnerability-management sink
 */
export interface VulnerabilityBatch {
  /** Deduplication key: task id, target digest and findings digest */
  key: string
  taskId: string
  tool: string
  stage: ScanStage
  service: string
  targetDigest: string
  contentDigest: string
  findings: Finding[]
  reportRef?: string
  timestamp: string
}

/**
 * External vulnerability-management system.
 * Uploads are keyed by (task id, target digest); replaying a batch is idempotent.
 */
export interface VulnerabilitySink {
  upload(batch: VulnerabilityBatch): Promise<void>
}

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>

export interface HttpSinkOptions {
  endpoint: string
  token?: string
  fetch?: FetchFn
}

/**
 * Posts batches as JSON to `<endpoint>/batches/<taskId>/<targetDigest>`
 */
export class HttpVulnerabilitySink implements VulnerabilitySink {
  private readonly fetchFn: FetchFn

  constructor(private readonly options: HttpSinkOptions) {
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init))
  }

  async upload(batch: VulnerabilityBatch): Promise<void> {
    const url = [
      this.options.endpoint.replace(/\/+$/, ''),
      'batches',
      encodeURIComponent(batch.taskId),
      encodeURIComponent(batch.targetDigest)
    ].join('/')

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'Idempotency-Key': batch.key
    }
    if (this.options.token) {
      headers.Authorization = `Bearer ${this.options.token}`
    }

    const response = await this.fetchFn(url, {
      method: 'PUT',
      headers,
      body: JSON.stringify(batch)
    })

    if (!response.ok) {
      throw new Error(`Vulnerability sink responded ${response.status} for ${batch.taskId}`)
    }
  }
}

/**
 * Keeps uploaded batches in memory, keyed like the real sink
 */
export class InMemoryVulnerabilitySink implements VulnerabilitySink {
  readonly batches = new Map<string, VulnerabilityBatch>()
  uploads = 0
  private failuresLeft = 0

  /** Make the next `count` uploads fail */
  failNext(count: number): void {
    this.failuresLeft = count
  }

  async upload(batch: VulnerabilityBatch): Promise<void> {
    this.uploads++
    if (this.failuresLeft > 0) {
      this.failuresLeft--
      throw new Error('Sink unavailable')
    }
    this.batches.set(`${batch.taskId}|${batch.targetDigest}`, batch)
  }
}
