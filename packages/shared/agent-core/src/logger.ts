import { DEFAULT_LOG_LEVEL, LOG_LEVELS, type LogLevel } from '@story-refiner/config-schemas'

/**
 * Diagnostic sink passed into each pipeline stage. Every method is optional so
 * callers can subscribe to the levels they care about.
 */
export interface DiagnosticLogger {
  debug?: (...args: unknown[]) => void
  info?: (...args: unknown[]) => void
  warn?: (...args: unknown[]) => void
  error?: (...args: unknown[]) => void
}

export const isLevelEnabled = (level: LogLevel, minimum: LogLevel): boolean =>
  LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minimum)

/**
 * Forward to the sink at `level`, discarding anything the sink throws.
 * Used on failure paths, where a broken sink must not replace the fallback.
 */
export function safeLog(
  logger: DiagnosticLogger | undefined,
  level: LogLevel,
  ...args: unknown[]
): void {
  try {
    logger?.[level]?.(...args)
  } catch {
    // sink failures are dropped
  }
}

/**
 * Console-backed logger that drops anything below `minimum`.
 */
export const createConsoleLogger = (
  minimum: LogLevel = DEFAULT_LOG_LEVEL
): Required<DiagnosticLogger> => ({
  debug: (...args) => {
    if (isLevelEnabled('debug', minimum)) console.debug(...args)
  },
  info: (...args) => {
    if (isLevelEnabled('info', minimum)) console.info(...args)
  },
  warn: (...args) => {
    if (isLevelEnabled('warn', minimum)) console.warn(...args)
  },
  error: (...args) => {
    if (isLevelEnabled('error', minimum)) console.error(...args)
  }
})
