import chalk from 'chalk'
import { DEFAULT_PYTHON, EXIT_CANCELLED, EXIT_FAILURE, EXIT_SUCCESS } from '../constants'
import { PipUpgradeError, QueryFailedError, UsageError } from '../errors'
import { InteractiveUI } from '../interactive-ui'
import { ProgressReporter } from '../progress-reporter'
import { ProvenanceClassifier } from '../provenance-classifier'
import { DistInfoRegistry, MetadataRegistry } from '../services/metadata-registry'
import { OutdatedQuery, PipOutdatedQuery } from '../services/pip-outdated'
import { isVirtualEnv, probePythonRuntime } from '../services/python-runtime'
import { PackageUpgrader } from '../upgrader'
import { EligibilitySet, PipUpgradeOptions, PythonRuntime, UpgradeCandidate } from '../types'
import { normalizeName } from '../utils'

export interface Collaborators {
  probeRuntime: (python: string) => Promise<PythonRuntime>
  createRegistry: (runtime: PythonRuntime) => MetadataRegistry
  createQuery: (runtime: PythonRuntime) => OutdatedQuery
  progress: Pick<ProgressReporter, 'run'>
  ui: Pick<InteractiveUI, 'selectPackagesToUpgrade' | 'confirmUpgrade' | 'showSummary'>
  createUpgrader: (runtime: PythonRuntime, confirm: () => Promise<boolean>) => Pick<PackageUpgrader, 'upgradePackages'>
}

function defaultCollaborators(): Collaborators {
  return {
    probeRuntime: probePythonRuntime,
    createRegistry: (runtime) => new DistInfoRegistry(runtime.sysPath),
    createQuery: (runtime) => new PipOutdatedQuery(runtime.executable),
    progress: new ProgressReporter(),
    ui: new InteractiveUI(),
    createUpgrader: (runtime, confirm) => new PackageUpgrader(runtime.executable, { confirm }),
  }
}

/**
 * Candidates whose normalized name pip owns, sorted by normalized name
 */
export function selectEligibleCandidates(
  candidates: readonly UpgradeCandidate[],
  eligible: EligibilitySet
): UpgradeCandidate[] {
  return candidates
    .map((candidate) => ({ candidate, key: normalizeName(candidate.name) }))
    .filter(({ key }) => eligible.has(key))
    .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
    .map(({ candidate }) => candidate)
}

/**
 * Main orchestrator for the pip upgrade interactive process
 */
export class PipUpgradeInteractive {
  private options: PipUpgradeOptions
  private collaborators: Collaborators

  constructor(options: PipUpgradeOptions = {}, collaborators: Partial<Collaborators> = {}) {
    this.options = options
    this.collaborators = { ...defaultCollaborators(), ...collaborators }
  }

  /**
   * Run the whole flow and resolve with the process exit code
   */
  public async run(): Promise<number> {
    const { probeRuntime, createRegistry, createQuery, progress, ui, createUpgrader } = this.collaborators

    try {
      const runtime = await probeRuntime(this.options.python ?? DEFAULT_PYTHON)
      this.checkPrerequisites(runtime)

      const classifier = new ProvenanceClassifier(
        { condaPrefixEnv: this.options.condaPrefixEnv, runtimePrefix: runtime.prefix },
        createRegistry(runtime)
      )
      const classification = classifier.classify()
      if (classification.condaPrefix) {
        console.log(chalk.gray(`Conda environment detected at: ${classification.condaPrefix}`))
      }
      console.log(
        `Detected ${classification.eligibleCount} pip-installed packages (excluded ${classification.excludedCount} conda-installed).`
      )

      const query = createQuery(runtime)
      const allCandidates = await progress.run(classification.eligibleCount, () => query.query())
      const candidates = selectEligibleCandidates(allCandidates, classification.eligible)

      if (candidates.length === 0) {
        console.log(chalk.green('✅ No upgradeable pip-installed packages found (excluding conda-installed).'))
        return EXIT_SUCCESS
      }

      const chosen = await ui.selectPackagesToUpgrade(candidates, {
        fullscreen: this.options.tui !== false,
      })

      if (chosen === null) {
        console.log(chalk.yellow('Cancelled.'))
        return EXIT_CANCELLED
      }
      if (chosen.length === 0) {
        console.log(chalk.yellow('No packages selected. Nothing to do.'))
        return EXIT_SUCCESS
      }

      ui.showSummary(chosen)
      const upgrader = createUpgrader(runtime, () => ui.confirmUpgrade())
      return await upgrader.upgradePackages(chosen, {
        user: this.options.user,
        extraArgs: this.options.extraArgs,
        dryRun: this.options.dryRun,
      })
    } catch (error) {
      return this.handleError(error)
    }
  }

  private checkPrerequisites(runtime: PythonRuntime): void {
    if (this.options.user && isVirtualEnv(runtime)) {
      throw new UsageError(
        '--user cannot be used inside a virtual environment.',
        'omit --user when running inside venv/pyenv/virtualenv.'
      )
    }
  }

  private handleError(error: unknown): number {
    if (error instanceof QueryFailedError) {
      if (error.stderr) {
        console.error(error.stderr)
      }
      return error.exitCode
    }

    if (error instanceof UsageError) {
      console.error(chalk.red(`Error: ${error.message}`))
      if (error.hint) {
        console.error(chalk.gray(`Tip: ${error.hint}`))
      }
      return error.exitCode
    }

    if (error instanceof PipUpgradeError) {
      console.error(chalk.red(`Error: ${error.message}`))
      return error.exitCode
    }

    const message = error instanceof Error ? error.message : String(error)
    console.error(chalk.red(`Error: ${message}`))
    return EXIT_FAILURE
  }
}
