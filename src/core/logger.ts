/**
 * Minimal logger used across the relay
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

export interface ConsoleLoggerOptions {
  /** Print debug messages (default: false) */
  verbose?: boolean
  /** Tag prepended to every line, e.g. "relay" */
  scope?: string
}

/**
 * Console-backed logger; debug output only when verbose
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const prefix = options.scope ? `[${options.scope}] ` : ''
  const verbose = options.verbose ?? false

  return {
    debug: (message, ...args) => {
      if (verbose) {
        console.debug(`${prefix}${message}`, ...args)
      }
    },
    info: (message, ...args) => console.log(`${prefix}${message}`, ...args),
    warn: (message, ...args) => console.warn(`${prefix}${message}`, ...args),
    error: (message, ...args) => console.error(`${prefix}${message}`, ...args)
  }
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
}
