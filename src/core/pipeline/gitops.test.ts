import { describe, it, expect, vi } from 'vitest'
import type { FetchFn } from '../reporter/sink.js'
import { HttpGitOpsDispatcher, InMemoryGitOpsDispatcher, type GitOpsDispatch } from './gitops.js'

const event: GitOpsDispatch = {
  service: 'checkout-service',
  environment: 'production',
  digest: 'sha256:d1',
  versionTag: 'abc123',
  changeId: 'change-1'
}

describe('HttpGitOpsDispatcher', () => {
  it('should post a repository dispatch', async () => {
    const fetch = vi.fn<FetchFn>(async () => new Response(null, { status: 204 }))
    const dispatcher = new HttpGitOpsDispatcher({
      endpoint: 'https://gitops.example.test/dispatches',
      token: 'test-secret',
      fetch
    })

    await dispatcher.dispatch(event)

    const [url, init] = fetch.mock.calls[0]
    expect(url).toBe('https://gitops.example.test/dispatches')
    expect(init.method).toBe('POST')
    expect(init.headers).toEqual({
      'Content-Type': 'application/json',
      'Idempotency-Key': 'checkout-service:sha256:d1',
      Authorization: 'Bearer test-secret'
    })
    expect(JSON.parse(String(init.body))).toEqual({ event_type: 'deploy', client_payload: event })
  })

  it('should throw on error responses', async () => {
    const fetch = vi.fn<FetchFn>(async () => new Response('', { status: 502 }))
    const dispatcher = new HttpGitOpsDispatcher({ endpoint: 'https://gitops.example.test', fetch })

    await expect(dispatcher.dispatch(event)).rejects.toThrow('GitOps dispatch responded 502 for checkout-service')
  })
})

describe('InMemoryGitOpsDispatcher', () => {
  it('should fail the requested number of times', async () => {
    const dispatcher = new InMemoryGitOpsDispatcher()
    dispatcher.failNext(1)

    await expect(dispatcher.dispatch(event)).rejects.toThrow('GitOps endpoint unavailable')
    await dispatcher.dispatch(event)

    expect(dispatcher.attempts).toBe(2)
    expect(dispatcher.dispatched).toEqual([event])
  })
})
