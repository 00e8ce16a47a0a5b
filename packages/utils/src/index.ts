export { createLogger, createStderrLogger, logger, LogLevels, parseLogLevel, setLogLevel } from './logger'
export type { ConsolaInstance } from './logger'
