import { TerminalSize, UpgradeCandidate } from '../../types'
import { SelectionState } from '../state'
import * as PackageList from './package-list'
import * as Fallback from './fallback'
import * as Confirmation from './confirmation'

/**
 * Main UI renderer class that composes all rendering parts
 */
export class UIRenderer {
  renderMenu(
    state: SelectionState,
    candidates: readonly UpgradeCandidate[],
    size: TerminalSize
  ): PackageList.DrawCommand[] {
    return PackageList.renderMenu(state, candidates, size)
  }

  renderNumberedList(candidates: readonly UpgradeCandidate[]): string[] {
    return Fallback.renderNumberedList(candidates)
  }

  renderSelectionSummary(chosen: readonly UpgradeCandidate[]): string {
    return Confirmation.renderSelectionSummary(chosen)
  }
}

// Re-export all functions for direct use if needed
export * from './package-list'
export * from './fallback'
export * from './confirmation'
