/**
 * covtree Configuration
 *
 * Central configuration for the covtree library.
 * Config can be passed programmatically or read from covtree.config.json.
 */

import { join } from 'node:path'
import { existsSync } from 'node:fs'
import { promises as fs } from 'node:fs'
import { log, warn, safeJsonParse, setLogging, setTiming, formatError } from './logger.js'

/**
 * Default configuration filename, looked up in the current directory
 */
export const CONFIG_FILE_NAME = 'covtree.config.json'

/**
 * covtree configuration options
 */
export interface CoverageTreeConfig {
  /** Locale used to format percentages (default: COVTREE_LOCALE env or 'en-US') */
  locale?: string

  /** Number of fraction digits printed for percentages (default: 2) */
  fractionDigits?: number

  /**
   * Largest denominator produced when a delta has to be approximated
   * from floating-point values after an exact subtraction overflowed (default: 1000000)
   */
  maxFallbackDenominator?: number

  /** Enable logging of tree transformations (default: false) */
  log?: boolean

  /** Enable timing logs only (default: false) */
  timing?: boolean
}

/**
 * Resolved configuration with all defaults applied
 */
export interface ResolvedCoverageTreeConfig {
  locale: string
  fractionDigits: number
  maxFallbackDenominator: number
  log: boolean
  timing: boolean
}

/**
 * Locale used when none is configured or the configured one is not supported
 */
export const FALLBACK_LOCALE = 'en-US'

/**
 * Returns the locale if Intl can format numbers for it, the fallback otherwise.
 */
export function resolveLocale(locale: string | undefined, fallback: string = FALLBACK_LOCALE): string {
  if (!locale) {
    return fallback
  }
  try {
    if (Intl.NumberFormat.supportedLocalesOf(locale).length > 0) {
      return locale
    }
  } catch (error) {
    // malformed tags throw a RangeError
    log(`Invalid locale '${locale}': ${formatError(error)}`)
  }
  warn(`Unsupported locale '${locale}', using '${fallback}'`)
  return fallback
}

/**
 * Default configuration values
 */
export const DEFAULT_COVERAGE_TREE_CONFIG: ResolvedCoverageTreeConfig = {
  locale: resolveLocale(process.env.COVTREE_LOCALE),
  fractionDigits: 2,
  maxFallbackDenominator: 1_000_000,
  log: false,
  timing: false,
}

/**
 * Resolve covtree config with defaults
 */
export function resolveCoverageTreeConfig(config?: CoverageTreeConfig): ResolvedCoverageTreeConfig {
  return {
    locale: resolveLocale(config?.locale, DEFAULT_COVERAGE_TREE_CONFIG.locale),
    fractionDigits: config?.fractionDigits ?? DEFAULT_COVERAGE_TREE_CONFIG.fractionDigits,
    maxFallbackDenominator: config?.maxFallbackDenominator ?? DEFAULT_COVERAGE_TREE_CONFIG.maxFallbackDenominator,
    log: config?.log ?? DEFAULT_COVERAGE_TREE_CONFIG.log,
    timing: config?.timing ?? DEFAULT_COVERAGE_TREE_CONFIG.timing,
  }
}

let activeConfig: ResolvedCoverageTreeConfig = DEFAULT_COVERAGE_TREE_CONFIG

/**
 * Apply a configuration to the library: formatting options and logger switches.
 */
export function configureCoverageTree(config?: CoverageTreeConfig): ResolvedCoverageTreeConfig {
  activeConfig = resolveCoverageTreeConfig(config)
  setLogging(activeConfig.log)
  setTiming(activeConfig.timing)
  return activeConfig
}

/**
 * The configuration currently in effect
 */
export function getActiveConfig(): ResolvedCoverageTreeConfig {
  return activeConfig
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Keep only the recognised options with the right types.
 */
function toConfig(value: unknown): CoverageTreeConfig | undefined {
  if (!isRecord(value)) {
    return undefined
  }
  const config: CoverageTreeConfig = {}
  if (typeof value.locale === 'string') config.locale = value.locale
  if (typeof value.fractionDigits === 'number' && Number.isInteger(value.fractionDigits)
    && value.fractionDigits >= 0 && value.fractionDigits <= 20) {
    config.fractionDigits = value.fractionDigits
  }
  if (typeof value.maxFallbackDenominator === 'number' && Number.isSafeInteger(value.maxFallbackDenominator)
    && value.maxFallbackDenominator > 0) {
    config.maxFallbackDenominator = value.maxFallbackDenominator
  }
  if (typeof value.log === 'boolean') config.log = value.log
  if (typeof value.timing === 'boolean') config.timing = value.timing
  return config
}

// Cache for loaded config
let cachedConfig: ResolvedCoverageTreeConfig | null = null
let cachedConfigPath: string | null = null

/**
 * Load covtree config from covtree.config.json
 *
 * Falls back to defaults when the file does not exist or cannot be parsed.
 *
 * @param configPath - Path to the config file (optional, defaults to covtree.config.json in cwd)
 */
export async function loadCoverageTreeConfig(configPath?: string): Promise<ResolvedCoverageTreeConfig> {
  const searchPath = configPath || join(process.cwd(), CONFIG_FILE_NAME)

  if (cachedConfig && cachedConfigPath === searchPath) {
    return cachedConfig
  }

  let config: CoverageTreeConfig | undefined
  if (existsSync(searchPath)) {
    try {
      const content = await fs.readFile(searchPath, 'utf-8')
      config = toConfig(safeJsonParse(content, searchPath))
    } catch (error) {
      log(`Failed to read ${searchPath}: ${formatError(error)}`)
    }
  }

  cachedConfig = resolveCoverageTreeConfig(config)
  cachedConfigPath = searchPath
  return cachedConfig
}

/**
 * Clear cached configuration (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null
  cachedConfigPath = null
}
