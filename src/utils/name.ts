const SEPARATOR_RUN = /[-_.]+/g

/**
 * Canonical form used to compare package names across pip and conda metadata.
 * Runs of `-`, `_` and `.` collapse to a single `-`.
 */
export function normalizeName(raw: string): string {
  return raw.replace(SEPARATOR_RUN, '-').toLowerCase().trim()
}
