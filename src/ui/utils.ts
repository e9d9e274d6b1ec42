import chalk from 'chalk'
import * as semver from 'semver'

export type UpdateType = 'major' | 'minor' | 'patch' | 'other' | 'unknown'

export class VersionUtils {
  /**
   * Cut plain text to at most `width` characters
   */
  static truncate(text: string, width: number): string {
    if (width <= 0) return ''
    return text.length > width ? text.slice(0, width) : text
  }

  /**
   * Rough size of an update. Python versions are not semver, so both sides
   * are coerced first and anything that does not coerce is 'unknown'.
   */
  static getUpdateType(current: string, latest: string): UpdateType {
    const from = semver.coerce(current)
    const to = semver.coerce(latest)
    if (!from || !to) {
      return 'unknown'
    }

    switch (semver.diff(from, to)) {
      case 'major':
      case 'premajor':
        return 'major'
      case 'minor':
      case 'preminor':
        return 'minor'
      case 'patch':
      case 'prepatch':
        return 'patch'
      default:
        return 'other'
    }
  }
}

export class ColorUtils {
  static getUpdateTypeColor(type: UpdateType): (text: string) => string {
    switch (type) {
      case 'major':
        return chalk.red
      case 'minor':
        return chalk.yellow
      case 'patch':
        return chalk.green
      case 'other':
        return chalk.magenta
      default:
        return chalk.gray
    }
  }
}
