export interface InstalledUnit {
  readonly name: string // Display name from the dist metadata
  readonly version: string
  readonly installer: string // Lowercased INSTALLER contents, '' when unknown
}

export type UnitReadResult =
  | { ok: true; unit: InstalledUnit }
  | { ok: false; source: string; reason: string }

// Normalized package names
export type EligibilitySet = ReadonlySet<string>

export interface ClassificationResult {
  eligible: EligibilitySet
  eligibleCount: number
  excludedCount: number
  condaPrefix: string | null
}

export interface UpgradeCandidate {
  readonly name: string
  readonly currentVersion: string
  readonly latestVersion: string
}

export interface EnvironmentConfig {
  condaPrefixEnv?: string // Value of CONDA_PREFIX, if set
  runtimePrefix: string // sys.prefix of the target interpreter
}

export interface PythonRuntime {
  executable: string
  prefix: string
  basePrefix: string
  sysPath: string[]
}

export interface UpgradeOptions {
  user?: boolean
  extraArgs?: string[]
  dryRun?: boolean
}

export interface PipUpgradeOptions extends UpgradeOptions {
  python?: string
  tui?: boolean
  condaPrefixEnv?: string
}

export interface TerminalSize {
  columns: number
  rows: number
}
