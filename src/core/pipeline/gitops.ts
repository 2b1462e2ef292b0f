import type { FetchFn } from '../reporter/sink.js'

/**
 * Deployment request for the GitOps repository
 */
export interface GitOpsDispatch {
  service: string
  environment: string
  digest: string
  versionTag: string
  changeId: string
}

/**
 * Outbound trigger of the GitOps pipeline.
 * Delivery is at-least-once; receivers treat (service, digest) as idempotent.
 */
export interface GitOpsDispatcher {
  dispatch(event: GitOpsDispatch): Promise<void>
}

export interface HttpGitOpsOptions {
  /** Repository dispatch endpoint */
  endpoint: string
  token?: string
  eventType?: string
  fetch?: FetchFn
}

/**
 * Sends a repository-dispatch style POST
 */
export class HttpGitOpsDispatcher implements GitOpsDispatcher {
  private readonly fetchFn: FetchFn

  constructor(private readonly options: HttpGitOpsOptions) {
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init))
  }

  async dispatch(event: GitOpsDispatch): Promise<void> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'Idempotency-Key': `${event.service}:${event.digest}`
    }
    if (this.options.token) {
      headers.Authorization = `Bearer ${this.options.token}`
    }

    const response = await this.fetchFn(this.options.endpoint, {
      method: 'POST',
      headers,
      body: JSON.stringify({
        event_type: this.options.eventType ?? 'deploy',
        client_payload: event
      })
    })

    if (!response.ok) {
      throw new Error(`GitOps dispatch responded ${response.status} for ${event.service}`)
    }
  }
}

/**
 * Records dispatches in memory
 */
export class InMemoryGitOpsDispatcher implements GitOpsDispatcher {
  readonly dispatched: GitOpsDispatch[] = []
  attempts = 0
  private failuresLeft = 0

  failNext(count: number): void {
    this.failuresLeft = count
  }

  async dispatch(event: GitOpsDispatch): Promise<void> {
    this.attempts++
    if (this.failuresLeft > 0) {
      this.failuresLeft--
      throw new Error('GitOps endpoint unavailable')
    }
    this.dispatched.push({ ...event })
  }
}
