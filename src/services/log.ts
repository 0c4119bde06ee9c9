/**
 * Logging service.
 *
 * All services log through electron-log's Node entry so console and file output share
 * one configuration. Each module takes its own scope.
 */

import log from 'electron-log/node'

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly'

export type ScopedLogger = ReturnType<typeof log.scope>

/**
 * Configure transports. Call once, as early as possible in the entry point.
 * @param level - Minimum level written to the console
 * @param writeFile - Also write to the default log file
 */
export function setupLogService(level: LogLevel = 'info', writeFile = true): void {
  log.transports.console.level = level
  log.transports.file.level = writeFile ? 'debug' : false
  log.transports.console.format = '[{h}:{i}:{s}.{ms}] [{level}]{scope} {text}'
}

/**
 * Logger bound to a module scope, e.g. `createLogger('TransportWorker')`.
 */
export function createLogger(scope: string): ScopedLogger {
  return log.scope(scope)
}

/**
 * Silence every transport (tests).
 */
export function silenceLogService(): void {
  log.transports.console.level = false
  log.transports.file.level = false
}
