import createDebug from 'debug'

/**
 * Internal Debug Logger for sort-bench
 *
 * Usage:
 * - Enable with: DEBUG=sort-bench:* npm run benchmark
 * - The CLI enables every namespace when started with --verbose
 *
 * Sorting functions themselves never log; only the benchmark harness,
 * dataset generation, report output and the CLI do.
 */

export const LOGGER_PREFIX = 'sort-bench'

/**
 * Factory for creating debug loggers with consistent namespacing
 */
export class LoggerFactory {
  private static debuggers = new Map<string, createDebug.Debugger>()

  /**
   * Creates a debug logger with the specified namespace
   * @param namespace - The namespace for the logger (will be prefixed with sort-bench:)
   */
  static create(namespace: string): createDebug.Debugger {
    const fullNamespace = `${LOGGER_PREFIX}:${namespace}`

    let logger = this.debuggers.get(fullNamespace)
    if (!logger) {
      logger = createDebug(fullNamespace)
      this.debuggers.set(fullNamespace, logger)
    }

    return logger
  }

  /**
   * Turns on every sort-bench namespace, keeping whatever DEBUG already enabled
   */
  static enableAll(): void {
    const current = createDebug.disable()
    const namespaces = [current, `${LOGGER_PREFIX}:*`].filter((value) => value.length > 0)
    createDebug.enable(namespaces.join(','))
  }

  /**
   * Clears all cached debuggers
   */
  static clear(): void {
    this.debuggers.clear()
  }
}

export const createLogger = (namespace: string): createDebug.Debugger =>
  LoggerFactory.create(namespace)

// Pre-defined loggers for common namespaces
export const coreLogger = (): createDebug.Debugger => LoggerFactory.create('core')
export const benchmarkLogger = (): createDebug.Debugger => LoggerFactory.create('benchmark')
export const errorLogger = (): createDebug.Debugger => LoggerFactory.create('error')
