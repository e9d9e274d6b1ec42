export interface SelectionState {
  readonly selected: readonly boolean[] // Index-aligned with the displayed candidates
  readonly cursor: number
  readonly top: number // First visible row
}

export type MenuEvent =
  | { type: 'quit' }
  | { type: 'navigate_up' }
  | { type: 'navigate_down' }
  | { type: 'page_up' }
  | { type: 'page_down' }
  | { type: 'home' }
  | { type: 'end' }
  | { type: 'toggle' }
  | { type: 'select_all' }
  | { type: 'select_none' }
  | { type: 'confirm' }

// Chosen indices in display order, or null when the user quit
export type MenuResult = number[] | null

export type Transition =
  | { type: 'continue'; state: SelectionState }
  | { type: 'done'; result: MenuResult }

export function clamp(n: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, n))
}

export function createSelectionState(count: number): SelectionState {
  return { selected: new Array<boolean>(count).fill(false), cursor: 0, top: 0 }
}

/**
 * Rows available for candidates: one header line, one spare line
 */
export function bodyHeightFor(terminalRows: number): number {
  return Math.max(1, terminalRows - 2)
}

/**
 * Scroll just enough to keep the cursor visible, never past the last full page
 */
export function fitViewport(state: SelectionState, bodyHeight: number): SelectionState {
  const count = state.selected.length
  const cursor = clamp(state.cursor, 0, Math.max(0, count - 1))
  let top = state.top

  if (cursor < top) {
    top = cursor
  }
  if (cursor >= top + bodyHeight) {
    top = cursor - bodyHeight + 1
  }
  top = clamp(top, 0, Math.max(0, count - bodyHeight))

  if (cursor === state.cursor && top === state.top) {
    return state
  }
  return { ...state, cursor, top }
}

export function selectedIndices(state: SelectionState): number[] {
  const indices: number[] = []
  state.selected.forEach((isSelected, index) => {
    if (isSelected) indices.push(index)
  })
  return indices
}

export function selectedCount(state: SelectionState): number {
  return state.selected.filter(Boolean).length
}

function moveTo(state: SelectionState, cursor: number): SelectionState {
  return { ...state, cursor: clamp(cursor, 0, Math.max(0, state.selected.length - 1)) }
}

/**
 * Apply one key event to the menu state
 */
export function reduce(state: SelectionState, event: MenuEvent, bodyHeight: number): Transition {
  const last = state.selected.length - 1
  let next: SelectionState = state

  switch (event.type) {
    case 'quit':
      return { type: 'done', result: null }
    case 'confirm':
      return { type: 'done', result: selectedIndices(state) }
    case 'navigate_up':
      next = moveTo(state, state.cursor - 1)
      break
    case 'navigate_down':
      next = moveTo(state, state.cursor + 1)
      break
    case 'page_up':
      next = moveTo(state, state.cursor - bodyHeight)
      break
    case 'page_down':
      next = moveTo(state, state.cursor + bodyHeight)
      break
    case 'home':
      next = moveTo(state, 0)
      break
    case 'end':
      next = moveTo(state, last)
      break
    case 'toggle':
      if (last < 0) {
        next = state
        break
      }
      next = {
        ...state,
        selected: state.selected.map((value, index) => (index === state.cursor ? !value : value)),
      }
      break
    case 'select_all':
      next = { ...state, selected: state.selected.map(() => true) }
      break
    case 'select_none':
      next = { ...state, selected: state.selected.map(() => false) }
      break
  }

  return { type: 'continue', state: fitViewport(next, bodyHeight) }
}
