import { TerminalSize, UpgradeCandidate } from '../../types'
import { bodyHeightFor, fitViewport, selectedCount, SelectionState } from '../state'
import { VersionUtils } from '../utils'

export interface DrawCommand {
  row: number
  col: number
  text: string
  inverse: boolean
}

export const KEY_LEGEND =
  'SPACE=toggle  ↑/↓/PgUp/PgDn=move  Home/End=jump  a=all  n=none  Enter=upgrade  q=quit'

/**
 * Render a single package line
 */
export function renderPackageLine(candidate: UpgradeCandidate, isSelected: boolean): string {
  const mark = isSelected ? '[x]' : '[ ]'
  return `${mark} ${candidate.name}  ${candidate.currentVersion} -> ${candidate.latestVersion}`
}

export function renderStatus(state: SelectionState): string {
  return `Selected: ${selectedCount(state)}/${state.selected.length}`
}

/**
 * Lay out one frame of the full-screen menu.
 * Pure: the caller paints the commands and re-reads the terminal size each frame.
 */
export function renderMenu(
  state: SelectionState,
  candidates: readonly UpgradeCandidate[],
  size: TerminalSize
): DrawCommand[] {
  const width = Math.max(0, size.columns - 1)
  const bodyHeight = bodyHeightFor(size.rows)
  const view = fitViewport(state, bodyHeight)
  const status = renderStatus(view)

  const commands: DrawCommand[] = [
    { row: 0, col: 0, text: VersionUtils.truncate(KEY_LEGEND, width), inverse: false },
    {
      row: 0,
      col: Math.max(0, size.columns - 1 - status.length),
      text: VersionUtils.truncate(status, width),
      inverse: false,
    },
  ]

  for (let row = 0; row < bodyHeight; row++) {
    const index = view.top + row
    if (index >= candidates.length) break

    commands.push({
      row: 1 + row,
      col: 0,
      text: VersionUtils.truncate(renderPackageLine(candidates[index], view.selected[index]), width),
      inverse: index === view.cursor,
    })
  }

  return commands
}
