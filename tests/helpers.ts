import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { dirname, join } from 'path'
import { InstalledUnit, UnitReadResult, UpgradeCandidate } from '../src/types'

/**
 * Temporary directory tree for filesystem fixtures
 */
export class FixtureDir {
  public readonly root: string

  constructor(prefix = 'pip-upgrade-test-') {
    this.root = mkdtempSync(join(tmpdir(), prefix))
  }

  path(...segments: string[]): string {
    return join(this.root, ...segments)
  }

  write(relativePath: string, content: string): string {
    const target = this.path(relativePath)
    mkdirSync(dirname(target), { recursive: true })
    writeFileSync(target, content)
    return target
  }

  mkdir(relativePath: string): string {
    const target = this.path(relativePath)
    mkdirSync(target, { recursive: true })
    return target
  }

  cleanup(): void {
    rmSync(this.root, { recursive: true, force: true })
  }
}

export function unit(name: string, installer: string, version = '1.0'): UnitReadResult {
  const installed: InstalledUnit = { name, version, installer }
  return { ok: true, unit: installed }
}

export function candidate(name: string, currentVersion: string, latestVersion: string): UpgradeCandidate {
  return { name, currentVersion, latestVersion }
}

export function stripAnsi(text: string): string {
  return text.replace(/\u001b\[[0-9;]*m/g, '')
}
