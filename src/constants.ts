/**
 * Shared constants used across the treestore codebase.
 */

// ============================================================================
// Object Identifiers
// ============================================================================

/** Length of a full SHA-1 object id in hex characters */
export const DIGEST_LENGTH = 40

/**
 * Shortest abbreviation the object store accepts. Shorter keys are too
 * ambiguous to be useful and always resolve to "not found".
 */
export const MIN_ABBREV_LENGTH = 5

/** Hex characters used as the fan-out directory name of a loose object */
export const FANOUT_PREFIX_LENGTH = 2

// ============================================================================
// Pack Files
// ============================================================================

/** Deepest delta chain the pack reader follows before declaring corruption */
export const MAX_DELTA_CHAIN_DEPTH = 50

/** Size of the SHA-1 trailer at the end of every pack file */
export const PACK_TRAILER_LENGTH = 20

// ============================================================================
// Repository Defaults
// ============================================================================

/** Branch used when none is configured */
export const DEFAULT_BRANCH = 'master'

/** Interval between attempts to create a held lock file (ms) */
export const DEFAULT_LOCK_POLL_INTERVAL = 50

/** Name of the external version-control executable */
export const DEFAULT_GIT_BINARY = 'git'

/** Number of history records returned by `log()` when no limit is given */
export const DEFAULT_LOG_LIMIT = 10
