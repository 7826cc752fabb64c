#!/usr/bin/env node
import { loggerOptionsFor, parseArgs, type CommandAction } from './cli/args.js'
import { loadConfigWithEnv } from './config/config-loader.js'
import { reportCommand, dashboardCommand } from './cli/commands/index.js'
import { createFormatter } from './cli/output.js'
import { createRunDependencies } from './pipeline/run-report.js'
import { createLogger } from './shared/logger.js'
import { errorMessage, isAppError } from './shared/errors.js'

const runCliCommand = async (action: CommandAction) => {
  const { options } = action
  const logger = createLogger(loggerOptionsFor(action))

  // Load config with env var support
  const { config, source, notes } = await loadConfigWithEnv(process.env, options.config)
  logger.debug(`Configuration loaded from ${source}`)
  for (const note of notes) logger.warn(note)

  const deps = createRunDependencies(config, logger)

  // Execute the command
  switch (action.command) {
    case 'report':
      await reportCommand(action.options, config, deps)
      break
    case 'dashboard':
      await dashboardCommand(action.options, config, deps)
      break
  }
}

const main = async () => {
  let action: CommandAction | null = null
  try {
    // Parse command line arguments
    action = parseArgs(process.argv)

    // If null, --help or --version was displayed
    if (!action) {
      process.exit(0)
    }

    await runCliCommand(action)
  } catch (error) {
    const format = action?.command === 'report' ? action.options.format : 'text'
    const details = isAppError(error) ? { code: error.code, details: error.details } : undefined
    createFormatter(format).error(errorMessage(error), details)
  }
}

void main()
