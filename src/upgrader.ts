import chalk from 'chalk'
import { EXIT_CANCELLED, EXIT_SUCCESS } from './constants'
import { UpgradeCandidate, UpgradeOptions } from './types'
import { renderInstallCommand } from './ui'
import { CommandEnv, pipEnv, runStream } from './utils'

/**
 * `python -m pip install --upgrade [--user] name==latest ... [extra args]`
 */
export function buildInstallCommand(
  python: string,
  chosen: readonly UpgradeCandidate[],
  options: UpgradeOptions = {}
): string[] {
  const command = [python, '-m', 'pip', 'install', '--upgrade']
  if (options.user) {
    command.push('--user')
  }
  command.push(...chosen.map((candidate) => `${candidate.name}==${candidate.latestVersion}`))
  command.push(...(options.extraArgs ?? []))
  return command
}

export interface UpgraderHooks {
  confirm: () => Promise<boolean>
  run?: (command: string, args: string[], env?: CommandEnv) => Promise<number>
}

export class PackageUpgrader {
  private python: string
  private hooks: UpgraderHooks

  constructor(python: string, hooks: UpgraderHooks) {
    this.python = python
    this.hooks = hooks
  }

  /**
   * Pin every chosen package to its reported latest version in one pip call.
   * Resolves with pip's exit status, or EXIT_CANCELLED when the user declines.
   */
  public async upgradePackages(
    chosen: readonly UpgradeCandidate[],
    options: UpgradeOptions = {}
  ): Promise<number> {
    if (chosen.length === 0) {
      console.log(chalk.yellow('No packages selected. Nothing to do.'))
      return EXIT_SUCCESS
    }

    const [command, ...args] = buildInstallCommand(this.python, chosen, options)
    console.log(renderInstallCommand([command, ...args]))

    if (options.dryRun) {
      console.log(chalk.gray('\n--dry-run enabled: not executing pip.'))
      return EXIT_SUCCESS
    }

    console.log('')
    if (!(await this.hooks.confirm())) {
      console.log(chalk.yellow('Cancelled.'))
      return EXIT_CANCELLED
    }

    const run = this.hooks.run ?? runStream
    const exitCode = await run(command, args, pipEnv())
    if (exitCode === 0) {
      console.log(chalk.green(`\n✅ Successfully upgraded ${chosen.length} package(s)!`))
    } else {
      console.error(chalk.red(`\npip exited with status ${exitCode}`))
    }
    return exitCode
  }
}
