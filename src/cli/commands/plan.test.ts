import { describe, it, expect, vi, afterEach } from 'vitest'
import { dirname, join } from 'path'
import { fileURLToPath } from 'url'
import { executePlan, formatPlan, formatWindow } from './plan.js'
import { ExitCodes } from '../../core/gate/index.js'
import type { RolloutPlan } from '../../types/index.js'

const configPath = join(
  dirname(fileURLToPath(import.meta.url)),
  '../../core/config/__fixtures__/valid-config.yaml'
)

describe('plan command', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('formatWindow', () => {
    it('should use the largest whole unit', () => {
      expect(formatWindow(300000)).toBe('5m')
      expect(formatWindow(90000)).toBe('90s')
      expect(formatWindow(1500)).toBe('1500ms')
      expect(formatWindow(0)).toBe('0ms')
    })
  })

  describe('formatPlan', () => {
    it('should render one line per stage with its criteria', () => {
      const plan: RolloutPlan = {
        id: 'plan-1',
        service: 'checkout-service',
        environment: 'production',
        artifactDigest: 'sha256:d1',
        versionTag: 'v1',
        strategy: 'canary',
        stages: [
          { weight: 10, windowMs: 300000, criteria: { maxErrorRate: 0.01, maxLatencyMs: { p95: 500 } } },
          { weight: 100, windowMs: 60000, criteria: { maxErrorRate: 0.02, maxLatencyMs: { p50: 100, p99: 900 } } }
        ]
      }

      expect(formatPlan(plan)).toEqual([
        'checkout-service → production (canary, 2 stage(s))',
        '  stage 0: 10% for 5m, error rate <= 1.00%, p95 <= 500ms',
        '  stage 1: 100% for 1m, error rate <= 2.00%, p50 <= 100ms, p99 <= 900ms'
      ])
    })
  })

  describe('executePlan', () => {
    it('should print the configured plan', async () => {
      const mockStdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)

      const exitCode = await executePlan('checkout-service', {}, { config: configPath })

      expect(exitCode).toBe(ExitCodes.proceed)
      expect(mockStdout).toHaveBeenCalledWith(
        'checkout-service → staging (blue-green, 2 stage(s))\n' +
        '  stage 0: 0% for 1s, error rate <= 5.00%\n' +
        '  stage 1: 100% for 1s, error rate <= 5.00%\n'
      )
    })

    it('should print the plan as JSON', async () => {
      const mockStdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)

      const exitCode = await executePlan(
        'checkout-service',
        { digest: 'sha256:0123456789abcdef', format: 'json' },
        { config: configPath }
      )

      expect(exitCode).toBe(ExitCodes.proceed)
      const written = mockStdout.mock.calls[0]?.[0]
      expect(typeof written).toBe('string')
      const plan = JSON.parse(String(written))
      expect(plan.id).toBe('checkout-service@staging:sha256:0123456789abcdef')
      expect(plan.versionTag).toBe('sha256:01234')
      expect(plan.strategy).toBe('blue-green')
      expect(plan.stages.map((s: { weight: number }) => s.weight)).toEqual([0, 100])
    })

    it('should return error (3) for an unknown service', async () => {
      const mockError = vi.spyOn(console, 'error').mockImplementation(() => {})
      const mockStdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)

      const exitCode = await executePlan('billing-service', {}, { config: configPath })

      expect(exitCode).toBe(ExitCodes.error)
      expect(mockError).toHaveBeenCalledWith(
        expect.stringContaining('Unknown service: billing-service (configured: checkout-service)')
      )
      expect(mockStdout).not.toHaveBeenCalled()
    })

    it('should return error (3) for a missing config file', async () => {
      const exitCode = await executePlan('checkout-service', {}, {
        config: '/non-existent/shipgate.yaml',
        quiet: true
      })

      expect(exitCode).toBe(ExitCodes.error)
    })

    it('should print nothing in quiet mode', async () => {
      const mockStdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)

      const exitCode = await executePlan('checkout-service', {}, { config: configPath, quiet: true })

      expect(exitCode).toBe(ExitCodes.proceed)
      expect(mockStdout).not.toHaveBeenCalled()
    })
  })
})
