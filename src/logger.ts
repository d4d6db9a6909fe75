/**
 * Simple logger for covtree
 *
 * Logs are disabled by default (log: false in config).
 * Set log: true in the covtree config to trace tree transformations.
 * Set timing: true to show only performance timing information.
 */

import chalk from 'chalk'

let loggingEnabled = false
let timingEnabled = false

/**
 * Set whether logging is enabled
 */
export function setLogging(enabled: boolean): void {
  loggingEnabled = enabled
}

/**
 * Set whether timing logs are enabled
 */
export function setTiming(enabled: boolean): void {
  timingEnabled = enabled
}

/**
 * Check if logging is enabled
 */
export function isLoggingEnabled(): boolean {
  return loggingEnabled
}

/**
 * Check if timing is enabled
 */
export function isTimingEnabled(): boolean {
  return timingEnabled
}

/**
 * Log a message (only if logging is enabled)
 */
export function log(...args: unknown[]): void {
  if (loggingEnabled) {
    console.log(...args)
  }
}

/**
 * Log a warning (always shown)
 */
export function warn(message: string): void {
  console.log(chalk.yellow(`⚠ ${message}`))
}

/**
 * Simple timer utility for performance measurement.
 * Outputs when either logging or timing is enabled.
 */
export function createTimer(label: string): () => void {
  if (!loggingEnabled && !timingEnabled) {
    return () => {}
  }
  const start = performance.now()
  return () => {
    const duration = performance.now() - start
    console.log(chalk.dim(`  ⏱ ${label}: ${duration.toFixed(0)}ms`))
  }
}

/**
 * Format an error for logging.
 * Extracts message from Error objects, converts other types to string.
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}

/**
 * Parse JSON, logging and returning undefined on failure.
 */
export function safeJsonParse(json: string, context?: string): unknown {
  try {
    const parsed: unknown = JSON.parse(json)
    return parsed
  } catch (error) {
    const ctx = context ? ` (${context})` : ''
    log(`JSON parse failed${ctx}: ${formatError(error)}`)
    return undefined
  }
}
