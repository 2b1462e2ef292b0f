import { describe, it, expect } from 'vitest'
import type { ScannerConfig } from '../config/schema.js'
import { CommandScanAdapter } from './command.js'
import { commandAdapters, tasksForStage } from './tasks.js'

const scanners: ScannerConfig[] = [
  {
    id: 'gitleaks',
    tool: 'gitleaks',
    command: 'gitleaks',
    args: ['detect', '--source', '{path}'],
    format: 'normalized',
    stage: 'source',
    required: true,
    failClosed: true,
    threshold: 'high',
    timeoutMs: 60000
  },
  {
    id: 'trivy',
    tool: 'trivy',
    command: 'trivy',
    args: ['image', '{digest}'],
    format: 'sarif',
    stage: 'image',
    required: true,
    failClosed: false,
    threshold: 'critical',
    timeoutMs: 120000
  }
]

describe('tasksForStage', () => {
  it('should select the tasks of one stage', () => {
    expect(tasksForStage(scanners, 'source')).toEqual([{
      id: 'gitleaks',
      tool: 'gitleaks',
      stage: 'source',
      required: true,
      failClosed: true,
      threshold: 'high',
      timeoutMs: 60000
    }])
    expect(tasksForStage(scanners, 'image').map(t => t.id)).toEqual(['trivy'])
  })
})

describe('commandAdapters', () => {
  it('should key a command adapter by scanner id', () => {
    const adapters = commandAdapters(scanners)

    expect([...adapters.keys()]).toEqual(['gitleaks', 'trivy'])
    expect(adapters.get('trivy')).toBeInstanceOf(CommandScanAdapter)
  })
})
