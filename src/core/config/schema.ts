import { z } from 'zod'

/**
 * Severity levels
 */
export const SeveritySchema = z.enum(['critical', 'high', 'medium', 'low', 'info'])

/**
 * Scanner task definition
 */
export const ScannerSchema = z.object({
  id: z.string()
    .min(1, 'Scanner id is required')
    .regex(/^[a-z0-9][a-z0-9_-]*$/, 'Scanner id must be lowercase alphanumeric')
    .describe('Unique task identifier'),
  tool: z.string()
    .min(1, 'Tool is required')
    .describe('External tool identifier'),
  command: z.string()
    .min(1, 'Command is required')
    .describe('Executable invoked for this task'),
  args: z.array(z.string())
    .default([])
    .describe('Arguments; {path}, {digest}, {service} and {commit} are substituted'),
  format: z.enum(['normalized', 'sarif'])
    .default('normalized')
    .describe('Report format printed on stdout'),
  stage: z.enum(['source', 'image'])
    .describe('Pipeline stage the task gates'),
  required: z.boolean()
    .describe('Whether the task gates the pipeline'),
  failClosed: z.boolean()
    .default(false)
    .describe('Treat a tool error as blocking'),
  threshold: SeveritySchema
    .describe('Lowest severity that blocks a required task'),
  timeoutMs: z.number()
    .int()
    .positive('Timeout must be positive')
    .describe('Per-task timeout in milliseconds')
})

export type ScannerConfig = z.infer<typeof ScannerSchema>

const LatencySchema = z.object({
  p50: z.number().positive().optional(),
  p95: z.number().positive().optional(),
  p99: z.number().positive().optional()
})

/**
 * Health criteria for a rollout stage
 */
export const CriteriaSchema = z.object({
  maxErrorRate: z.number()
    .min(0, 'Error rate must be >= 0')
    .max(1, 'Error rate must be <= 1'),
  maxLatencyMs: LatencySchema.default({})
})

export const StageSchema = z.object({
  weight: z.number()
    .min(0, 'Weight must be >= 0')
    .max(100, 'Weight must be <= 100'),
  windowMs: z.number()
    .int()
    .nonnegative('Window must be >= 0'),
  criteria: CriteriaSchema
})

export type StageConfig = z.infer<typeof StageSchema>

/**
 * Rollout definition for one service
 */
export const RolloutSchema = z.object({
  strategy: z.enum(['canary', 'blue-green']),
  stages: z.array(StageSchema)
    .min(1, 'At least one stage is required')
}).refine(
  data => data.stages.every((stage, i) => i === 0 || stage.weight >= data.stages[i - 1].weight),
  { message: 'Stage weights must not decrease', path: ['stages'] }
).refine(
  data => data.stages[data.stages.length - 1]?.weight === 100,
  { message: 'Last stage must shift 100% of traffic', path: ['stages'] }
).refine(
  data => data.strategy !== 'blue-green' ||
    (data.stages.length === 2 && data.stages[0].weight === 0),
  { message: 'Blue-green rollouts have exactly two stages: 0% then 100%', path: ['stages'] }
)

export type RolloutConfig = z.infer<typeof RolloutSchema>

/**
 * Service pipeline definition
 */
export const ServiceSchema = z.object({
  id: z.string()
    .min(1, 'Service id is required'),
  paths: z.array(z.string())
    .min(1, 'At least one path pattern is required')
    .describe('Glob patterns selecting this pipeline from changed paths'),
  environment: z.string()
    .min(1, 'Environment is required'),
  rollout: RolloutSchema
})

export type ServiceConfig = z.infer<typeof ServiceSchema>

export const RetrySchema = z.object({
  attempts: z.number().int().min(1).max(10).default(3),
  baseDelayMs: z.number().int().nonnegative().default(500),
  maxDelayMs: z.number().int().nonnegative().default(10000)
})

export type RetryConfig = z.infer<typeof RetrySchema>

/**
 * Complete orchestrator configuration
 */
export const ConfigSchema = z.object({
  version: z.string()
    .regex(/^\d+\.\d+(?:\.\d+)?$/, 'Version must be semver format')
    .describe('Config version in semver format'),

  name: z.string()
    .min(1, 'Config name is required')
    .max(50, 'Config name too long'),

  description: z.string()
    .optional(),

  extends: z.string()
    .optional()
    .describe('Base config to extend'),

  scanners: z.array(ScannerSchema)
    .default([]),

  services: z.array(ServiceSchema)
    .default([]),

  reporter: RetrySchema.default({}),

  gitops: RetrySchema.default({})
}).refine(
  data => new Set(data.scanners.map(s => s.id)).size === data.scanners.length,
  { message: 'Scanner ids must be unique', path: ['scanners'] }
).refine(
  data => new Set(data.services.map(s => s.id)).size === data.services.length,
  { message: 'Service ids must be unique', path: ['services'] }
)

export type Config = z.infer<typeof ConfigSchema>

/**
 * Validate config content
 */
export function validateConfig(data: unknown): Config {
  return ConfigSchema.parse(data)
}

/**
 * Validate config with detailed errors
 */
export function validateConfigSafe(data: unknown):
  | { success: true; data: Config }
  | { success: false; errors: z.ZodError } {
  const result = ConfigSchema.safeParse(data)
  if (result.success) {
    return { success: true, data: result.data }
  }
  return { success: false, errors: result.error }
}

/**
 * Format validation errors for display
 */
export function formatValidationErrors(errors: z.ZodError): string[] {
  return errors.errors.map(err => {
    const path = err.path.join('.')
    return `${path}: ${err.message}`
  })
}
