import chalk from 'chalk'

/**
 * Logger interface used across the generator.
 * The CLI plugs in a colored implementation, library callers get silence by default.
 */
export interface Logger {
  debug(message: string, data?: unknown): void
  info(message: string, data?: unknown): void
  warn(message: string, data?: unknown): void
  error(message: string, data?: unknown): void
}

/** Default wherever a caller passes no logger. */
export class NoOpLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

export interface ChalkLoggerOptions {
  /** Print debug lines. Off unless --verbose or SCHEMABIND_DEBUG is set. */
  verbose?: boolean
}

/**
 * CLI logger that uses chalk for colored output
 */
export class ChalkLogger implements Logger {
  private readonly verbose: boolean

  constructor(options: ChalkLoggerOptions = {}) {
    this.verbose = options.verbose ?? false
  }

  debug(message: string, data?: unknown): void {
    if (!this.verbose) return
    if (data !== undefined) {
      console.log(chalk.gray(`[DEBUG] ${message}`), data)
    } else {
      console.log(chalk.gray(`[DEBUG] ${message}`))
    }
  }

  info(message: string, data?: unknown): void {
    if (data !== undefined) {
      console.log(chalk.blue(`[INFO] ${message}`), data)
    } else {
      console.log(chalk.blue(`[INFO] ${message}`))
    }
  }

  warn(message: string, data?: unknown): void {
    if (data !== undefined) {
      console.warn(chalk.yellow(`[WARN] ${message}`), data)
    } else {
      console.warn(chalk.yellow(`[WARN] ${message}`))
    }
  }

  error(message: string, data?: unknown): void {
    if (data !== undefined) {
      console.error(chalk.red(`[ERROR] ${message}`), data)
    } else {
      console.error(chalk.red(`[ERROR] ${message}`))
    }
  }
}
