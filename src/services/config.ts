/**
 * Console configuration from environment variables.
 *
 * Nothing is persisted; every run starts from defaults plus whatever the environment
 * overrides. Validation follows the result-union style: a loader never throws, it returns
 * either the config or an error naming the offending variable.
 *
 * @example
 * ```typescript
 * const result = loadConsoleConfig(process.env)
 * if (!result.success) {
 *   console.error(result.error)
 * }
 * ```
 */

import type { LogLevel } from './log'
import { DEFAULT_BAUD_RATE, DEFAULT_VARIANT_ID, INBOX_POLL_INTERVAL_MS, isProtocolVariantId } from './transmitter-protocol'
import type { ProtocolVariantId } from '../types/transmitter'

export interface ConsoleConfig {
  /** Port to connect to at startup, if any */
  port: string | null
  baudRate: number
  variant: ProtocolVariantId
  logLevel: LogLevel
  pollIntervalMs: number
}

export interface LoadedConsoleConfig {
  success: true
  config: ConsoleConfig
}

export interface ConsoleConfigError {
  success: false
  error: string
}

export type ConsoleConfigResult = LoadedConsoleConfig | ConsoleConfigError

export const ENV_PORT = 'TX_CONSOLE_PORT'
export const ENV_BAUD = 'TX_CONSOLE_BAUD'
export const ENV_VARIANT = 'TX_CONSOLE_VARIANT'
export const ENV_LOG_LEVEL = 'TX_CONSOLE_LOG_LEVEL'
export const ENV_POLL_MS = 'TX_CONSOLE_POLL_MS'

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'verbose', 'debug', 'silly']

const STANDARD_BAUD_RATES = new Set([9600, 19200, 38400, 57600, 115200, 230400, 460800, 921600])

/**
 *
 * @param value
 */
function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

/**
 * Unset and blank variables both count as absent.
 */
function readVar(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim()
  return value ? value : undefined
}

/**
 * Build the console configuration.
 *
 * Rules:
 * - TX_CONSOLE_BAUD must be a standard rate (default 115200)
 * - TX_CONSOLE_VARIANT must be 'sx1280-tx' or 'sx1280-jitter'
 * - TX_CONSOLE_LOG_LEVEL must be an electron-log level
 * - TX_CONSOLE_POLL_MS must be an integer from 10 to 1000
 * @param env - Usually process.env
 */
export function loadConsoleConfig(env: NodeJS.ProcessEnv): ConsoleConfigResult {
  const port = readVar(env, ENV_PORT) ?? null

  let baudRate = DEFAULT_BAUD_RATE
  const baudText = readVar(env, ENV_BAUD)
  if (baudText !== undefined) {
    baudRate = Number(baudText)
    if (!STANDARD_BAUD_RATES.has(baudRate)) {
      return { success: false, error: `${ENV_BAUD} must be a standard baud rate, got '${baudText}'` }
    }
  }

  let variant: ProtocolVariantId = DEFAULT_VARIANT_ID
  const variantText = readVar(env, ENV_VARIANT)
  if (variantText !== undefined) {
    if (!isProtocolVariantId(variantText)) {
      return { success: false, error: `${ENV_VARIANT} must be 'sx1280-tx' or 'sx1280-jitter', got '${variantText}'` }
    }
    variant = variantText
  }

  let logLevel: LogLevel = 'info'
  const levelText = readVar(env, ENV_LOG_LEVEL)
  if (levelText !== undefined) {
    if (!isLogLevel(levelText)) {
      return { success: false, error: `${ENV_LOG_LEVEL} must be one of ${LOG_LEVELS.join(', ')}, got '${levelText}'` }
    }
    logLevel = levelText
  }

  let pollIntervalMs = INBOX_POLL_INTERVAL_MS
  const pollText = readVar(env, ENV_POLL_MS)
  if (pollText !== undefined) {
    pollIntervalMs = Number(pollText)
    if (!Number.isInteger(pollIntervalMs) || pollIntervalMs < 10 || pollIntervalMs > 1000) {
      return { success: false, error: `${ENV_POLL_MS} must be an integer from 10 to 1000, got '${pollText}'` }
    }
  }

  return {
    success: true,
    config: { port, baudRate, variant, logLevel, pollIntervalMs },
  }
}
