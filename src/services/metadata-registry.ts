import { join } from 'path'
import { InstalledUnit, UnitReadResult } from '../types'
import { isDirectory, listDirectory, readTextIfExists } from '../utils'

/**
 * Source of installed distributions
 */
export interface MetadataRegistry {
  readUnits(): UnitReadResult[]
}

/**
 * Parse the RFC 822 style header block of a METADATA / PKG-INFO file.
 * Keys are lowercased; the first occurrence of a key wins.
 */
export function parseMetadataHeaders(text: string): Map<string, string> {
  const headers = new Map<string, string>()
  for (const line of text.split(/\r?\n/)) {
    if (line.trim() === '') break
    // Continuation lines belong to multi-line fields we do not read
    if (/^\s/.test(line)) continue

    const colon = line.indexOf(':')
    if (colon <= 0) continue
    const key = line.slice(0, colon).trim().toLowerCase()
    if (!headers.has(key)) {
      headers.set(key, line.slice(colon + 1).trim())
    }
  }
  return headers
}

/**
 * Contents of the INSTALLER file, lowercased, or '' when absent
 */
export function readInstaller(distInfoDir: string): string {
  return (readTextIfExists(join(distInfoDir, 'INSTALLER')) ?? '').trim().toLowerCase()
}

/**
 * Read one `.dist-info` or `.egg-info` entry
 */
export function readDistEntry(entryPath: string): UnitReadResult {
  const isDistInfo = entryPath.endsWith('.dist-info')
  let metadataText: string | null

  if (isDistInfo) {
    metadataText = readTextIfExists(join(entryPath, 'METADATA'))
  } else if (isDirectory(entryPath)) {
    metadataText = readTextIfExists(join(entryPath, 'PKG-INFO'))
  } else {
    // Legacy single-file egg-info
    metadataText = readTextIfExists(entryPath)
  }

  if (metadataText === null) {
    return { ok: false, source: entryPath, reason: 'metadata file missing or unreadable' }
  }

  const headers = parseMetadataHeaders(metadataText)
  const name = (headers.get('name') ?? '').trim()
  if (!name) {
    return { ok: false, source: entryPath, reason: 'metadata has no Name field' }
  }

  const unit: InstalledUnit = {
    name,
    version: headers.get('version') ?? '',
    installer: isDistInfo ? readInstaller(entryPath) : '',
  }
  return { ok: true, unit }
}

/**
 * Keep readable units, drop the skipped ones
 */
export function collectUnits(results: UnitReadResult[]): InstalledUnit[] {
  return results.reduce<InstalledUnit[]>((units, result) => {
    if (result.ok) {
      units.push(result.unit)
    }
    return units
  }, [])
}

/**
 * Registry backed by the metadata directories found on an interpreter's sys.path
 */
export class DistInfoRegistry implements MetadataRegistry {
  private searchPaths: string[]

  constructor(searchPaths: string[]) {
    this.searchPaths = searchPaths
  }

  public readUnits(): UnitReadResult[] {
    const results: UnitReadResult[] = []
    for (const dir of this.searchPaths) {
      for (const entry of listDirectory(dir)) {
        if (!entry.endsWith('.dist-info') && !entry.endsWith('.egg-info')) continue
        results.push(readDistEntry(join(dir, entry)))
      }
    }
    return results
  }
}
