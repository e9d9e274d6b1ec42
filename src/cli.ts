#!/usr/bin/env node

import { Command } from 'commander'
import chalk from 'chalk'
import { PipUpgradeInteractive } from './index'
import { CONDA_PREFIX_ENV, DEFAULT_PYTHON, EXIT_CANCELLED, EXIT_FAILURE } from './constants'

interface CliOptions {
  user?: boolean
  dryRun?: boolean
  tui: boolean
  python: string
}

const program = new Command()

program
  .name('pip-upgrade-interactive')
  .description('Interactive upgrader for pip-installed packages (excluding conda-installed)')
  .version('1.0.0')
  .option('--user', "use 'pip install --user' (when you cannot write to the system site-packages)")
  .option('--dry-run', 'show what would be upgraded, but do not run pip install')
  .option('--no-tui', 'disable the full-screen menu and use numbered selection')
  .option('-p, --python <path>', 'python interpreter whose packages to upgrade', DEFAULT_PYTHON)
  .argument('[pip-args...]', "extra args passed to pip install (use '--' before them)")
  .action(async (pipArgs: string[]) => {
    const options = program.opts<CliOptions>()
    console.log(chalk.bold.blue('🚀 pip-upgrade-interactive\n'))

    // Commander.js: boolean flags are undefined if not provided, --no-tui sets tui to false
    const upgrader = new PipUpgradeInteractive({
      python: options.python,
      user: options.user === true,
      dryRun: options.dryRun === true,
      tui: options.tui !== false,
      extraArgs: pipArgs,
      condaPrefixEnv: process.env[CONDA_PREFIX_ENV],
    })
    process.exitCode = await upgrader.run()
  })

// Handle uncaught errors gracefully
process.on('uncaughtException', (error) => {
  console.error(chalk.red('Uncaught Exception:'), error.message)
  process.exit(EXIT_FAILURE)
})

process.on('unhandledRejection', (reason) => {
  console.error(chalk.red('Unhandled Rejection:'), reason)
  process.exit(EXIT_FAILURE)
})

// Ctrl+C outside the full-screen menu counts as a cancellation
process.on('SIGINT', () => {
  console.log(chalk.yellow('\n\nOperation cancelled by user.'))
  process.exit(EXIT_CANCELLED)
})

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`))
  process.exit(EXIT_FAILURE)
})
