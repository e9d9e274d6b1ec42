import { join } from 'path'
import { CONDA_META_DIR } from '../constants'
import { EnvironmentConfig } from '../types'
import { isDirectory, listDirectory, normalizeName, readTextIfExists } from '../utils'

function hasCondaMeta(root: string): boolean {
  return isDirectory(join(root, CONDA_META_DIR))
}

/**
 * Locate the active conda environment root.
 * CONDA_PREFIX wins when it points at a directory holding conda-meta/;
 * otherwise the interpreter's own prefix is checked.
 */
export function detectCondaPrefix(config: EnvironmentConfig): string | null {
  if (config.condaPrefixEnv && hasCondaMeta(config.condaPrefixEnv)) {
    return config.condaPrefixEnv
  }
  if (hasCondaMeta(config.runtimePrefix)) {
    return config.runtimePrefix
  }
  return null
}

/**
 * Normalized names declared by conda-meta/*.json.
 * Conda names do not always match PyPI names, so this is a secondary signal only.
 */
export function readCondaMetaNames(condaPrefix: string): Set<string> {
  const metaDir = join(condaPrefix, CONDA_META_DIR)
  const names = new Set<string>()

  for (const entry of listDirectory(metaDir)) {
    if (!entry.endsWith('.json')) continue
    const text = readTextIfExists(join(metaDir, entry))
    if (text === null) continue

    let data: unknown
    try {
      data = JSON.parse(text)
    } catch {
      continue
    }
    if (typeof data !== 'object' || data === null) continue

    const name: unknown = Reflect.get(data, 'name')
    if (typeof name === 'string' && name.trim()) {
      names.add(normalizeName(name))
    }
  }
  return names
}
