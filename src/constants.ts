/**
 * Installer identifiers, environment markers and UI timings
 */

export const SECONDARY_INSTALLER = 'conda'

export const CONDA_PREFIX_ENV = 'CONDA_PREFIX'
export const CONDA_META_DIR = 'conda-meta'

export const DEFAULT_PYTHON = 'python3'

// Progress estimate is cosmetic; completion comes from the query itself
export const PROGRESS_MS_PER_PACKAGE = 100
export const PROGRESS_MIN_ESTIMATE_MS = 3000
export const PROGRESS_REDRAW_MS = 50
export const PROGRESS_HOLD_MS = 100
export const PROGRESS_BAR_WIDTH = 30

export const EXIT_SUCCESS = 0
export const EXIT_FAILURE = 1
export const EXIT_CANCELLED = 2
