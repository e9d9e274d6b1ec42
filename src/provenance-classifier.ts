import { SECONDARY_INSTALLER } from './constants'
import { detectCondaPrefix, readCondaMetaNames } from './services/conda-environment'
import { collectUnits, MetadataRegistry } from './services/metadata-registry'
import { ClassificationResult, EnvironmentConfig, InstalledUnit } from './types'
import { normalizeName } from './utils'

export type Provenance = 'eligible' | 'excluded'

/**
 * Decide who owns a single installed unit.
 *
 * INSTALLER == conda is the primary signal. Membership in conda-meta only
 * counts when a conda environment was actually found. Everything else,
 * including units with no INSTALLER file and third-party installers such as
 * uv, is treated as pip's to upgrade.
 */
export function classifyUnit(
  unit: InstalledUnit,
  condaPrefix: string | null,
  condaNames: ReadonlySet<string>
): Provenance {
  if (unit.installer === SECONDARY_INSTALLER) {
    return 'excluded'
  }
  if (condaPrefix !== null && condaNames.has(normalizeName(unit.name))) {
    return 'excluded'
  }
  return 'eligible'
}

/**
 * Splits installed distributions into pip-owned and conda-owned
 */
export class ProvenanceClassifier {
  private config: EnvironmentConfig
  private registry: MetadataRegistry

  constructor(config: EnvironmentConfig, registry: MetadataRegistry) {
    this.config = config
    this.registry = registry
  }

  public classify(): ClassificationResult {
    const condaPrefix = detectCondaPrefix(this.config)
    const condaNames = condaPrefix ? readCondaMetaNames(condaPrefix) : new Set<string>()

    const eligible = new Set<string>()
    let excludedCount = 0

    for (const unit of this.readUnits()) {
      if (classifyUnit(unit, condaPrefix, condaNames) === 'excluded') {
        excludedCount++
      } else {
        eligible.add(normalizeName(unit.name))
      }
    }

    return {
      eligible,
      eligibleCount: eligible.size,
      excludedCount,
      condaPrefix,
    }
  }

  private readUnits(): InstalledUnit[] {
    try {
      return collectUnits(this.registry.readUnits())
    } catch {
      // A registry that cannot be enumerated at all leaves nothing eligible
      return []
    }
  }
}
