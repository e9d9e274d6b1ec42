import chalk from 'chalk'
import { UpgradeCandidate } from '../../types'
import { ColorUtils, VersionUtils } from '../utils'

export const FALLBACK_PROMPT = 'Enter numbers to upgrade (e.g. 1 3 4), or blank to cancel:'

/**
 * Numbered listing for terminals without full-screen support
 */
export function renderNumberedList(candidates: readonly UpgradeCandidate[]): string[] {
  const lines = ['', chalk.bold('Upgradeable packages:')]

  candidates.forEach((candidate, index) => {
    const color = ColorUtils.getUpdateTypeColor(
      VersionUtils.getUpdateType(candidate.currentVersion, candidate.latestVersion)
    )
    const number = String(index + 1).padStart(3)
    lines.push(
      `  ${number}. ${chalk.cyan(candidate.name.padEnd(30))} ${candidate.currentVersion.padEnd(12)} -> ${color(candidate.latestVersion)}`
    )
  })

  return lines
}

/**
 * Turn "1 3, 4" into zero-based indices. Tokens that are not plain numbers or
 * fall outside 1..count are ignored. A blank answer means cancel.
 */
export function parseIndexSelection(answer: string, count: number): number[] | null {
  const trimmed = answer.trim()
  if (!trimmed) {
    return null
  }

  const picks = new Set<number>()
  for (const token of trimmed.replace(/,/g, ' ').split(/\s+/)) {
    if (!/^\d+$/.test(token)) continue
    const pick = Number(token)
    if (pick >= 1 && pick <= count) {
      picks.add(pick - 1)
    }
  }

  return Array.from(picks).sort((a, b) => a - b)
}
