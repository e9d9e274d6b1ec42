import { QueryFailedError } from '../errors'
import { UpgradeCandidate } from '../types'
import { CommandEnv, pipEnv, runCapture } from '../utils'

export interface OutdatedQuery {
  query(): Promise<UpgradeCandidate[]>
}

function fieldText(record: object, key: string): string | null {
  const value: unknown = Reflect.get(record, key)
  if (value === undefined || value === null || value === '' || value === false || value === 0) {
    return null
  }
  return String(value)
}

/**
 * Parse `pip list --outdated --format=json` output:
 * `[{"name": "pkg", "version": "1.0", "latest_version": "2.0", ...}, ...]`.
 * Anything unexpected yields fewer candidates rather than an error.
 */
export function parseOutdatedJson(output: string): UpgradeCandidate[] {
  if (!output.trim()) {
    return []
  }

  let data: unknown
  try {
    data = JSON.parse(output)
  } catch {
    return []
  }
  if (!Array.isArray(data)) {
    return []
  }

  const items: unknown[] = data
  const candidates: UpgradeCandidate[] = []
  for (const item of items) {
    if (typeof item !== 'object' || item === null || Array.isArray(item)) continue

    const name = fieldText(item, 'name')
    const currentVersion = fieldText(item, 'version')
    const latestVersion = fieldText(item, 'latest_version')
    if (name && currentVersion && latestVersion) {
      candidates.push({ name, currentVersion, latestVersion })
    }
  }
  return candidates
}

/**
 * Lists outdated packages through the target interpreter's pip
 */
export class PipOutdatedQuery implements OutdatedQuery {
  private python: string
  private env?: CommandEnv

  constructor(python: string, env?: CommandEnv) {
    this.python = python
    this.env = env
  }

  public async query(): Promise<UpgradeCandidate[]> {
    const { exitCode, stdout, stderr } = await runCapture(
      this.python,
      ['-m', 'pip', 'list', '--outdated', '--format=json'],
      pipEnv(this.env)
    )
    if (exitCode !== 0) {
      throw new QueryFailedError(exitCode, stderr.trim())
    }
    return parseOutdatedJson(stdout)
  }
}
