/**
 * Internal constants for covtree.
 *
 * Names and separators shared by the tree algorithms.
 * For user-configurable options, see config.ts.
 */

// =============================================================================
// Node Names
// =============================================================================

/**
 * Name reported by getParentName() for a node without a parent.
 */
export const ROOT_NAME = '^'

/**
 * Synthetic name of the default (unnamed) package. Contributes an empty path segment.
 */
export const DEFAULT_PACKAGE_NAME = '-'

/**
 * Name of the group node that holds modules with different names after a combine.
 */
export const COMBINED_REPORT_NAME = 'Combined Report'

// =============================================================================
// Separators
// =============================================================================

/**
 * Separator between the segments of a flat package name (e.g. `com.example.app`).
 */
export const PACKAGE_SEPARATOR = '.'

/**
 * Separator between the segments of a node path.
 */
export const PATH_SEPARATOR = '/'

/**
 * Text printed instead of a percentage when a counter has no occurrences.
 */
export const NOT_AVAILABLE = 'n/a'
