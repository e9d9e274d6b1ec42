import { readFileSync, readdirSync, statSync } from 'fs'

/**
 * True when the path exists and is a directory
 */
export function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory()
  } catch {
    return false
  }
}

/**
 * Read a UTF-8 file, or null when it is missing or unreadable
 */
export function readTextIfExists(path: string): string | null {
  try {
    return readFileSync(path, 'utf-8')
  } catch {
    return null
  }
}

/**
 * Names of the entries in a directory, or an empty list when it cannot be listed
 */
export function listDirectory(dir: string): string[] {
  try {
    return readdirSync(dir)
  } catch {
    return []
  }
}
