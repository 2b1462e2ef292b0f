import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import { FileReportStore, InMemoryReportStore } from './store.js'

const entry = {
  taskId: 'gitleaks',
  targetDigest: 'sha256:0123456789abcdef0123456789abcdef',
  timestamp: '2026-01-01T00:00:00.000Z',
  raw: { findings: [] }
}

describe('FileReportStore', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'shipgate-store-'))
  })

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true })
  })

  it('writes a JSON file and reads it back by reference', async () => {
    const store = new FileReportStore(join(tempDir, 'reports'))

    const ref = await store.put(entry)

    expect(ref).toBe(join(tempDir, 'reports', 'gitleaks-sha256_0123456789abcdef0-2026-01-01T00_00_00.000Z.json'))
    expect(await store.get(ref)).toEqual(entry)
  })

  it('returns undefined for unknown references', async () => {
    const store = new FileReportStore(tempDir)

    expect(await store.get(join(tempDir, 'missing.json'))).toBeUndefined()
  })

  it('returns undefined for a file that is not JSON', async () => {
    const store = new FileReportStore(tempDir)
    const ref = join(tempDir, 'truncated.json')
    await writeFile(ref, '{"taskId": "gitleaks", "raw": {', 'utf-8')

    expect(await store.get(ref)).toBeUndefined()
  })

  it('returns undefined for JSON that is not a report entry', async () => {
    const store = new FileReportStore(tempDir)
    const ref = join(tempDir, 'other.json')
    await writeFile(ref, JSON.stringify({ taskId: 'gitleaks' }), 'utf-8')

    expect(await store.get(ref)).toBeUndefined()
  })
})

describe('InMemoryReportStore', () => {
  it('hands out sequential references', async () => {
    const store = new InMemoryReportStore()

    expect(await store.put(entry)).toBe('memory://gitleaks/1')
    expect(await store.put({ ...entry, taskId: 'trivy' })).toBe('memory://trivy/2')
    expect(store.size).toBe(2)
  })
})
