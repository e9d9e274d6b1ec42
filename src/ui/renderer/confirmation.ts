import chalk from 'chalk'
import { UpgradeCandidate } from '../../types'
import { ColorUtils, VersionUtils } from '../utils'

/**
 * Summary of the packages about to be pinned
 */
export function renderSelectionSummary(chosen: readonly UpgradeCandidate[]): string {
  let output = chalk.bold(`\n🚀 Ready to upgrade ${chosen.length} package(s):\n`)
  chosen.forEach((candidate) => {
    const color = ColorUtils.getUpdateTypeColor(
      VersionUtils.getUpdateType(candidate.currentVersion, candidate.latestVersion)
    )
    output += `  • ${chalk.cyan(candidate.name)} ${chalk.gray(candidate.currentVersion)} → ${color(candidate.latestVersion)}\n`
  })
  return output
}

/**
 * The install invocation exactly as it will be run
 */
export function renderInstallCommand(command: readonly string[]): string {
  return `\nWill run:\n  ${command.join(' ')}`
}
