#!/usr/bin/env node
/**
 * shipgate CLI entry point
 *
 * Security-gated release orchestration for service changes
 */

import { Command } from 'commander'
import { configureLogger, createLogger } from '../utils/logger.js'
import { VERSION } from '../version.js'
import { createConfigLoader } from '../core/config/loader.js'
import { ExitCodes } from '../core/gate/index.js'
import { initCommand, DEFAULT_OUTPUT_FILENAME } from './commands/init.js'
import { registerScanCommand } from './commands/scan.js'
import { registerPlanCommand } from './commands/plan.js'

export { ExitCodes }

/**
 * Global CLI options
 */
export type GlobalOptions = {
  verbose?: boolean
  quiet?: boolean
  config?: string
}

const logger = createLogger('cli')

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()

  program
    .name('shipgate')
    .description('Security-gated release orchestrator')
    .version(VERSION)
    .option('-v, --verbose', 'Enable verbose output')
    .option('-q, --quiet', 'Suppress output except errors')
    .option('-c, --config <path>', 'Path to orchestrator configuration file')
    .hook('preAction', () => {
      const globalOpts = program.opts<GlobalOptions>()
      configureLogger({
        level: globalOpts.verbose ? 'debug' : 'info',
        quiet: globalOpts.quiet ?? false
      })
    })

  registerScanCommand(program)
  registerPlanCommand(program)

  program
    .command('init')
    .description('Generate a configuration file from the bundled template')
    .option('-o, --output <file>', 'Output file path', DEFAULT_OUTPUT_FILENAME)
    .option('--force', 'Overwrite existing file')
    .action(async (options: { output?: string; force?: boolean }) => {
      const globalOpts = program.opts<GlobalOptions>()

      const result = await initCommand({
        output: options.output,
        force: options.force
      })

      if (result.success) {
        if (!globalOpts.quiet) {
          logger.info(`Created config file: ${result.outputPath} (services: ${result.services?.join(', ') || 'none'})`)
        }
        process.exit(ExitCodes.proceed)
      } else {
        if (!globalOpts.quiet) {
          logger.error(`Failed to create config file: ${result.error}`)
        }
        process.exit(ExitCodes.error)
      }
    })

  program
    .command('validate <config>')
    .description('Validate an orchestrator configuration file')
    .action(async (configPath: string) => {
      const globalOpts = program.opts<GlobalOptions>()
      const result = await createConfigLoader().validate(configPath)

      if (result.valid) {
        if (!globalOpts.quiet) {
          logger.info(`✓ Config file is valid: ${configPath}`)
        }
        process.exit(ExitCodes.proceed)
      } else {
        if (!globalOpts.quiet) {
          logger.error(`✗ Config file is invalid: ${configPath}`)
          for (const error of result.errors) {
            logger.error(`  - ${error}`)
          }
        }
        process.exit(ExitCodes.error)
      }
    })

  return program
}

/**
 * Run the CLI
 */
export async function run(args: string[] = process.argv): Promise<void> {
  const program = createProgram()

  try {
    await program.parseAsync(args)
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error'
    logger.error(`CLI error: ${message}`)
    process.exit(ExitCodes.error)
  }
}

// Run CLI when executed directly (not when imported as a module)
// Use decodeURIComponent to handle paths with spaces or special characters
const isMainModule =
  import.meta.url === `file://${process.argv[1]}` ||
  decodeURIComponent(import.meta.url) === `file://${process.argv[1]}`
if (isMainModule) {
  void run()
}
