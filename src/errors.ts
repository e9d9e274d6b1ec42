import { EXIT_CANCELLED } from './constants'

/**
 * Fatal condition that ends the run with a specific exit status
 */
export class PipUpgradeError extends Error {
  public exitCode: number

  constructor(message: string, exitCode: number) {
    super(message)
    this.name = 'PipUpgradeError'
    this.exitCode = exitCode
  }
}

/**
 * `pip list --outdated` exited nonzero. Carries pip's own status and stderr.
 */
export class QueryFailedError extends PipUpgradeError {
  public stderr: string

  constructor(exitCode: number, stderr: string) {
    super(`pip list --outdated exited with status ${exitCode}`, exitCode)
    this.name = 'QueryFailedError'
    this.stderr = stderr
  }
}

/**
 * Invalid combination of command-line options
 */
export class UsageError extends PipUpgradeError {
  public hint?: string

  constructor(message: string, hint?: string) {
    super(message, EXIT_CANCELLED)
    this.name = 'UsageError'
    this.hint = hint
  }
}
