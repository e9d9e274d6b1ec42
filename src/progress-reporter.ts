import ora from 'ora'
import { setTimeout as sleep } from 'timers/promises'
import {
  PROGRESS_BAR_WIDTH,
  PROGRESS_HOLD_MS,
  PROGRESS_MIN_ESTIMATE_MS,
  PROGRESS_MS_PER_PACKAGE,
  PROGRESS_REDRAW_MS,
} from './constants'

export type Settled<T> = { status: 'fulfilled'; value: T } | { status: 'rejected'; reason: unknown }

/**
 * Settle a promise into a tagged result. The result is published exactly once.
 */
export function settle<T>(promise: Promise<T>): Promise<Settled<T>> {
  return promise.then(
    (value): Settled<T> => ({ status: 'fulfilled', value }),
    (reason: unknown): Settled<T> => ({ status: 'rejected', reason })
  )
}

export function estimateDurationMs(unitCount: number): number {
  return Math.max(unitCount * PROGRESS_MS_PER_PACKAGE, PROGRESS_MIN_ESTIMATE_MS)
}

export function progressPercent(elapsedMs: number, estimateMs: number): number {
  if (estimateMs <= 0) return 100
  return Math.max(0, Math.min(100, Math.floor((elapsedMs / estimateMs) * 100)))
}

export function renderProgressBar(percent: number, width: number = PROGRESS_BAR_WIDTH): string {
  const filled = Math.floor((width * percent) / 100)
  return '█'.repeat(filled) + '░'.repeat(width - filled)
}

export function progressLine(unitCount: number, percent: number): string {
  return `Checking ${unitCount} packages [${renderProgressBar(percent)}] ${percent}%`
}

export interface ProgressReporterOptions {
  stream?: NodeJS.WritableStream
  isEnabled?: boolean
  redrawMs?: number
  holdMs?: number
  now?: () => number
}

/**
 * Shows a time-based progress bar while a slow task runs.
 * The bar only estimates; the task settling is what ends it.
 */
export class ProgressReporter {
  private options: ProgressReporterOptions
  private now: () => number

  constructor(options: ProgressReporterOptions = {}) {
    this.options = options
    this.now = options.now ?? Date.now
  }

  public async run<T>(unitCount: number, task: () => Promise<T>): Promise<T> {
    const estimateMs = estimateDurationMs(unitCount)
    const startedAt = this.now()

    const spinner = ora({
      text: progressLine(unitCount, 0),
      stream: this.options.stream ?? process.stdout,
      isEnabled: this.options.isEnabled,
      interval: this.options.redrawMs ?? PROGRESS_REDRAW_MS,
      discardStdin: false,
    }).start()

    const timer = setInterval(() => {
      spinner.text = progressLine(unitCount, progressPercent(this.now() - startedAt, estimateMs))
    }, this.options.redrawMs ?? PROGRESS_REDRAW_MS)

    const outcome = await settle(Promise.resolve().then(task))
    clearInterval(timer)

    spinner.text = progressLine(unitCount, 100)
    await sleep(this.options.holdMs ?? PROGRESS_HOLD_MS)
    spinner.stop()

    if (outcome.status === 'rejected') {
      throw outcome.reason
    }
    return outcome.value
  }
}
