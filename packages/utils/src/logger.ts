import type { ConsolaInstance, LogLevel } from 'consola'
import { createConsola, LogLevels } from 'consola'

export const logger: ConsolaInstance = createConsola({ level: LogLevels.info })

// .withTag() copies options into a new instance, so level changes are
// applied to every tagged logger handed out. The list is never pruned:
// create loggers once at module level, not per call.
const tagged: ConsolaInstance[] = []

// Scoped logger with [tag] prefix
export function createLogger(tag: string): ConsolaInstance {
  const child = logger.withTag(tag)
  tagged.push(child)
  return child
}

// The CLI may stream a GML document to stdout, so its diagnostics get
// independent roots bound to stderr.
export function createStderrLogger(tag: string): ConsolaInstance {
  const root = createConsola({
    level: logger.level,
    stdout: process.stderr,
    stderr: process.stderr,
  })
  const child = root.withTag(tag)
  tagged.push(child)
  return child
}

export function setLogLevel(level: LogLevel): void {
  logger.level = level
  for (const child of tagged) {
    child.level = level
  }
}

/**
 * Resolve a level name as accepted by `--log-level` into a consola level.
 * Returns `undefined` for names consola does not know.
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  switch (name.toLowerCase()) {
    case 'silent':
      return LogLevels.silent
    case 'error':
      return LogLevels.error
    case 'warn':
      return LogLevels.warn
    case 'info':
      return LogLevels.info
    case 'debug':
      return LogLevels.debug
    case 'trace':
      return LogLevels.trace
    default:
      return undefined
  }
}

export { LogLevels } from 'consola'
export type { ConsolaInstance } from 'consola'
