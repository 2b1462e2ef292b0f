import { readFile } from 'fs/promises'
import { join, dirname, resolve } from 'path'
import { fileURLToPath } from 'url'
import yaml from 'js-yaml'
import {
  type Config,
  validateConfig,
  validateConfigSafe,
  formatValidationErrors
} from './schema.js'

export interface LoaderOptions {
  basePath?: string
  allowExtends?: boolean
}

/**
 * Path of the config template bundled with the package
 */
export function defaultConfigPath(): string {
  // src/core/config (or dist/core/config) -> config/default.yaml
  const here = dirname(fileURLToPath(import.meta.url))
  return resolve(here, '..', '..', '..', 'config', 'default.yaml')
}

export class ConfigLoader {
  private cache = new Map<string, Config>()
  private basePath: string
  private allowExtends: boolean

  constructor(options: LoaderOptions = {}) {
    this.basePath = options.basePath || process.cwd()
    this.allowExtends = options.allowExtends ?? true
  }

  /**
   * Load config from file path. The returned object is frozen.
   */
  async load(configPath: string): Promise<Config> {
    const absolutePath = resolve(this.basePath, configPath)

    const cached = this.cache.get(absolutePath)
    if (cached) {
      return cached
    }

    const rawConfig = await this.loadRaw(absolutePath)

    const validation = validateConfigSafe(rawConfig)
    if (!validation.success) {
      const errors = formatValidationErrors(validation.errors)
      throw new ConfigLoadError(
        `Invalid config file: ${configPath}\n${errors.join('\n')}`,
        absolutePath,
        errors
      )
    }

    const config = validation.data

    const frozen = deepFreeze(config)
    this.cache.set(absolutePath, frozen)
    return frozen
  }

  /**
   * Load the bundled config template
   */
  async loadDefault(): Promise<Config> {
    return this.load(defaultConfigPath())
  }

  /**
   * Load config from string content
   */
  loadFromString(content: string): Config {
    return deepFreeze(validateConfig(yaml.load(content)))
  }

  /**
   * Validate config file without caching it
   */
  async validate(configPath: string): Promise<{
    valid: boolean
    errors: string[]
  }> {
    try {
      const absolutePath = resolve(this.basePath, configPath)
      const content = await this.readConfigFile(absolutePath)
      const validation = validateConfigSafe(this.parseYaml(content, absolutePath))

      if (validation.success) {
        return { valid: true, errors: [] }
      }

      return {
        valid: false,
        errors: formatValidationErrors(validation.errors)
      }
    } catch (error) {
      if (error instanceof ConfigLoadError) {
        return { valid: false, errors: error.validationErrors }
      }
      return {
        valid: false,
        errors: [error instanceof Error ? error.message : String(error)]
      }
    }
  }

  /**
   * Clear the config cache
   */
  clearCache(): void {
    this.cache.clear()
  }

  /**
   * Read a config file and fold in its `extends` chain before any defaults apply
   */
  private async loadRaw(absolutePath: string): Promise<unknown> {
    const content = await this.readConfigFile(absolutePath)
    const rawConfig = this.parseYaml(content, absolutePath)

    if (!isRecord(rawConfig) || !this.allowExtends) {
      return rawConfig
    }
    const parent = rawConfig.extends
    if (typeof parent !== 'string') {
      return rawConfig
    }

    const baseConfig = await this.loadRaw(join(dirname(absolutePath), parent))
    return isRecord(baseConfig) ? mergeConfig(baseConfig, rawConfig) : rawConfig
  }

  private async readConfigFile(absolutePath: string): Promise<string> {
    try {
      return await readFile(absolutePath, 'utf-8')
    } catch (error) {
      const code = error instanceof Error && 'code' in error ? String(error.code) : 'UNKNOWN'
      throw new ConfigLoadError(
        `Failed to read config file: ${absolutePath}`,
        absolutePath,
        [code]
      )
    }
  }

  private parseYaml(content: string, absolutePath: string): unknown {
    try {
      return yaml.load(content)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      throw new ConfigLoadError(
        `Malformed YAML in config file: ${absolutePath}`,
        absolutePath,
        [message]
      )
    }
  }
}

type RawConfig = Record<string, unknown>

function isRecord(value: unknown): value is RawConfig {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Merge a child config document over its base, before validation.
 * List entries are replaced by id; retry settings are merged field by field.
 */
export function mergeConfig(base: RawConfig, override: RawConfig): RawConfig {
  const merged: RawConfig = { ...base, ...override }

  for (const key of ['scanners', 'services']) {
    if (key in base || key in override) {
      merged[key] = mergeById(base[key], override[key])
    }
  }
  for (const key of ['reporter', 'gitops']) {
    const baseValue = base[key]
    const overrideValue = override[key]
    if (isRecord(baseValue) && isRecord(overrideValue)) {
      merged[key] = { ...baseValue, ...overrideValue }
    }
  }

  return merged
}

function mergeById(base: unknown, override: unknown): unknown {
  if (!Array.isArray(base) || !Array.isArray(override)) {
    return override ?? base
  }

  const merged = new Map<string, unknown>()
  for (const [index, item] of [...base, ...override].entries()) {
    // Entries without an id are kept as they are and rejected by the schema
    const key = isRecord(item) && typeof item.id === 'string' ? `id:${item.id}` : `#${index}`
    merged.set(key, item)
  }
  return Array.from(merged.values())
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const child of Object.values(value)) {
      deepFreeze(child)
    }
  }
  return value
}

/**
 * Custom error for config loading failures
 */
export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly configPath: string,
    public readonly validationErrors: string[]
  ) {
    super(message)
    this.name = 'ConfigLoadError'
  }
}

/**
 * Create a loader instance
 */
export function createConfigLoader(options?: LoaderOptions): ConfigLoader {
  return new ConfigLoader(options)
}
