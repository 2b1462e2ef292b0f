import { describe, it, expect } from 'vitest'
import type { GateDecision, GateReason, ScanStage } from '../../types/index.js'
import { ExitCodes, ReleaseGate, createReleaseGate, decide, summarize } from './index.js'

const reason = (stage: ScanStage, taskId: string, detail = 'finding'): GateReason => ({
  kind: 'findings_blocked',
  stage,
  taskId,
  detail,
  result: {
    taskId,
    tool: taskId,
    required: true,
    status: {
      kind: 'findings',
      histogram: { critical: 1, high: 0, medium: 0, low: 0, info: 0 },
      findings: [{ rule: 'r', severity: 'critical', message: 'm' }]
    },
    timestamp: '2026-01-01T00:00:00.000Z',
    duration: 1
  }
})

const proceed = (stage: ScanStage): GateDecision => ({ stage, outcome: 'proceed', reasons: [] })
const blocked = (stage: ScanStage, ...reasons: GateReason[]): GateDecision => ({
  stage,
  outcome: 'blocked',
  reasons
})

describe('ExitCodes', () => {
  it('has correct exit codes', () => {
    expect(ExitCodes.proceed).toBe(0)
    expect(ExitCodes.blocked).toBe(1)
    expect(ExitCodes.rolled_back).toBe(2)
    expect(ExitCodes.error).toBe(3)
  })
})

describe('decide', () => {
  const cases: Array<[GateDecision, GateDecision, 'proceed' | 'blocked']> = [
    [proceed('source'), proceed('image'), 'proceed'],
    [blocked('source', reason('source', 'gitleaks')), proceed('image'), 'blocked'],
    [proceed('source'), blocked('image', reason('image', 'trivy')), 'blocked'],
    [blocked('source', reason('source', 'gitleaks')), blocked('image', reason('image', 'trivy')), 'blocked']
  ]

  it.each(cases)('combines %#', (source, image, expected) => {
    const decision = decide(source, image)

    expect(decision.stage).toBe('release')
    expect(decision.outcome).toBe(expected)
  })

  it('carries the union of blocking reasons, source first', () => {
    const decision = decide(
      blocked('source', reason('source', 'semgrep'), reason('source', 'gitleaks')),
      blocked('image', reason('image', 'trivy'))
    )

    expect(decision.reasons.map(r => `${r.stage}/${r.taskId}`)).toEqual([
      'source/semgrep',
      'source/gitleaks',
      'image/trivy'
    ])
  })

  it('drops duplicate reasons', () => {
    const shared = reason('source', 'gitleaks')

    const decision = decide(blocked('source', shared, shared), proceed('image'))

    expect(decision.reasons).toHaveLength(1)
  })

  it('does not modify its inputs', () => {
    const source = blocked('source', reason('source', 'gitleaks'))
    const image = proceed('image')

    decide(source, image)

    expect(source.reasons).toHaveLength(1)
    expect(image.reasons).toHaveLength(0)
  })

  it('returns a frozen decision', () => {
    expect(Object.isFrozen(decide(proceed('source'), proceed('image')))).toBe(true)
  })
})

describe('summarize', () => {
  it('summarizes a proceed decision', () => {
    expect(summarize(proceed('source'))).toEqual({
      summary: 'PROCEED (source): all required checks passed',
      reasons: []
    })
  })

  it('lists every blocking reason', () => {
    const decision = decide(
      blocked('source', reason('source', 'gitleaks', 'Tool error (crash) on fail-closed task: down')),
      blocked('image', reason('image', 'trivy', '1 finding(s) at or above critical (critical: 1)'))
    )

    expect(summarize(decision)).toEqual({
      summary: 'BLOCKED (release): 2 blocking result(s) from gitleaks, trivy',
      reasons: [
        '[source] gitleaks: Tool error (crash) on fail-closed task: down',
        '[image] trivy: 1 finding(s) at or above critical (critical: 1)'
      ]
    })
  })
})

describe('ReleaseGate', () => {
  it('maps decisions to exit codes', () => {
    const gate = createReleaseGate()

    expect(gate).toBeInstanceOf(ReleaseGate)
    expect(gate.exitCode(gate.decide(proceed('source'), proceed('image')))).toBe(0)
    expect(gate.exitCode(gate.decide(proceed('source'), blocked('image', reason('image', 'trivy'))))).toBe(1)
  })
})
