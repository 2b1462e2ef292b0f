import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import * as fs from 'fs'
import { initCommand, InitOptions, DEFAULT_OUTPUT_FILENAME } from './init.js'

vi.mock('fs')

const TEMPLATE = `version: '1.0.0'
name: default
services:
  - id: checkout-service
    paths: ['services/checkout/**']
    environment: production
    rollout:
      strategy: canary
      stages:
        - weight: 100
          windowMs: 1000
          criteria: { maxErrorRate: 0.01 }
`

describe('init command', () => {
  const mockFs = vi.mocked(fs)

  beforeEach(() => {
    vi.clearAllMocks()
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('DEFAULT_OUTPUT_FILENAME', () => {
    it('should be shipgate.config.yaml', () => {
      expect(DEFAULT_OUTPUT_FILENAME).toBe('shipgate.config.yaml')
    })
  })

  describe('initCommand', () => {
    it('should write the template at the default location', async () => {
      mockFs.existsSync.mockReturnValue(false)
      mockFs.readFileSync.mockReturnValue(TEMPLATE)
      mockFs.writeFileSync.mockImplementation(() => {})

      const result = await initCommand({})

      expect(result.success).toBe(true)
      expect(result.outputPath).toContain('shipgate.config.yaml')
      expect(result.services).toEqual(['checkout-service'])
      expect(mockFs.writeFileSync).toHaveBeenCalledWith(
        expect.stringContaining('shipgate.config.yaml'),
        TEMPLATE,
        'utf-8'
      )
    })

    it('should read the bundled template', async () => {
      mockFs.existsSync.mockReturnValue(false)
      mockFs.readFileSync.mockReturnValue(TEMPLATE)
      mockFs.writeFileSync.mockImplementation(() => {})

      await initCommand({})

      expect(mockFs.readFileSync).toHaveBeenCalledWith(
        expect.stringMatching(/config[\\/]default\.yaml$/),
        'utf-8'
      )
    })

    it('should write the template at a custom location', async () => {
      mockFs.existsSync.mockReturnValue(false)
      mockFs.readFileSync.mockReturnValue(TEMPLATE)
      mockFs.writeFileSync.mockImplementation(() => {})

      const options: InitOptions = { output: 'custom.yaml' }
      const result = await initCommand(options)

      expect(result.success).toBe(true)
      expect(result.outputPath).toContain('custom.yaml')
    })

    it('should fail if file exists without force flag', async () => {
      mockFs.existsSync.mockReturnValue(true)

      const result = await initCommand({})

      expect(result.success).toBe(false)
      expect(result.error).toContain('already exists')
      expect(mockFs.writeFileSync).not.toHaveBeenCalled()
    })

    it('should overwrite file with force flag', async () => {
      mockFs.existsSync.mockReturnValue(true)
      mockFs.readFileSync.mockReturnValue(TEMPLATE)
      mockFs.writeFileSync.mockImplementation(() => {})

      const options: InitOptions = { force: true }
      const result = await initCommand(options)

      expect(result.success).toBe(true)
      expect(mockFs.writeFileSync).toHaveBeenCalled()
    })

    it('should report write errors', async () => {
      mockFs.existsSync.mockReturnValue(false)
      mockFs.readFileSync.mockReturnValue(TEMPLATE)
      mockFs.writeFileSync.mockImplementation(() => {
        throw new Error('Permission denied')
      })

      const result = await initCommand({})

      expect(result.success).toBe(false)
      expect(result.error).toBe('Permission denied')
    })

    it('should report a missing template', async () => {
      mockFs.existsSync.mockReturnValue(false)
      mockFs.readFileSync.mockImplementation(() => {
        throw new Error('ENOENT: no such file or directory')
      })

      const result = await initCommand({})

      expect(result.success).toBe(false)
      expect(result.error).toBe('ENOENT: no such file or directory')
    })

    it('should refuse a template that does not validate', async () => {
      mockFs.existsSync.mockReturnValue(false)
      mockFs.readFileSync.mockReturnValue("version: '1.0.0'\nname: ''\n")

      const result = await initCommand({})

      expect(result.success).toBe(false)
      expect(result.error).toBe('Template is invalid:\nname: Config name is required')
      expect(mockFs.writeFileSync).not.toHaveBeenCalled()
    })

    it('should refuse a template that is not YAML', async () => {
      mockFs.existsSync.mockReturnValue(false)
      mockFs.readFileSync.mockReturnValue('name: [unclosed')

      const result = await initCommand({})

      expect(result.success).toBe(false)
      expect(result.error).toMatch(/^Template is not valid YAML: /)
      expect(mockFs.writeFileSync).not.toHaveBeenCalled()
    })

    it('should create parent directories if needed', async () => {
      mockFs.existsSync.mockReturnValue(false)
      mockFs.readFileSync.mockReturnValue(TEMPLATE)
      mockFs.writeFileSync.mockImplementation(() => {})
      mockFs.mkdirSync.mockImplementation(() => undefined)

      const options: InitOptions = { output: 'deploy/shipgate/config.yaml' }
      const result = await initCommand(options)

      expect(result.success).toBe(true)
      expect(mockFs.mkdirSync).toHaveBeenCalledWith(
        expect.stringContaining('deploy/shipgate'),
        { recursive: true }
      )
    })
  })
})
