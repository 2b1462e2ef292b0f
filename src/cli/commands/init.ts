/**
 * init command - Write the bundled configuration template
 */

import * as fs from 'fs'
import * as path from 'path'
import yaml from 'js-yaml'
import { defaultConfigPath } from '../../core/config/loader.js'
import { formatValidationErrors, validateConfigSafe } from '../../core/config/schema.js'

export const DEFAULT_OUTPUT_FILENAME = 'shipgate.config.yaml'

export interface InitOptions {
  output?: string
  force?: boolean
}

export interface InitResult {
  success: boolean
  outputPath?: string
  /** Services the written config rolls out */
  services?: string[]
  error?: string
}

/**
 * Check the template before it lands in a repository
 */
function checkTemplate(template: string): { services: string[] } | { error: string } {
  let document: unknown
  try {
    document = yaml.load(template)
  } catch (error) {
    return { error: `Template is not valid YAML: ${error instanceof Error ? error.message : String(error)}` }
  }

  const validation = validateConfigSafe(document)
  if (!validation.success) {
    return { error: `Template is invalid:\n${formatValidationErrors(validation.errors).join('\n')}` }
  }
  return { services: validation.data.services.map(service => service.id) }
}

/**
 * Execute the init command
 */
export async function initCommand(options: InitOptions): Promise<InitResult> {
  const outputPath = path.resolve(
    process.cwd(),
    options.output ?? DEFAULT_OUTPUT_FILENAME
  )

  try {
    if (fs.existsSync(outputPath) && !options.force) {
      return {
        success: false,
        outputPath,
        error: `File already exists: ${outputPath}. Use --force to overwrite.`
      }
    }

    const template = fs.readFileSync(defaultConfigPath(), 'utf-8')
    const checked = checkTemplate(template)
    if ('error' in checked) {
      return { success: false, outputPath, error: checked.error }
    }

    fs.mkdirSync(path.dirname(outputPath), { recursive: true })
    fs.writeFileSync(outputPath, template, 'utf-8')

    return {
      success: true,
      outputPath,
      services: checked.services
    }
  } catch (error) {
    return {
      success: false,
      outputPath,
      error: error instanceof Error ? error.message : String(error)
    }
  }
}
