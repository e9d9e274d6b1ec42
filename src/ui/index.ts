export { VersionUtils, ColorUtils, type UpdateType } from './utils'
export {
  bodyHeightFor,
  createSelectionState,
  fitViewport,
  reduce,
  selectedIndices,
  type MenuEvent,
  type MenuResult,
  type SelectionState,
  type Transition,
} from './state'
export {
  UIRenderer,
  parseIndexSelection,
  renderInstallCommand,
  FALLBACK_PROMPT,
  type DrawCommand,
} from './renderer'
export { ConfirmationInputHandler, InputHandler, keyToConfirmation, keyToEvent } from './input-handler'
