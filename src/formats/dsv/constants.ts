/**
 * DSV Format Constants
 *
 * Delimiters, quoting modes, limits and line endings for the DSV module.
 */

// =============================================================================
// CONSTANTS
// =============================================================================

/**
 * Default delimiter for different formats
 */
export const DEFAULT_DELIMITERS = {
  csv: ",",
  tsv: "\t",
  psv: "|",
  ssv: ";",
} as const;

/**
 * Default quote character (RFC 4180 compliant)
 */
export const DEFAULT_QUOTE = '"';

/**
 * Quoting modes
 *
 * - `MINIMAL`: quote only fields that contain special characters
 * - `ALL`: quote every field
 * - `NON_NUMERIC`: quote every non-number on write; unquoted fields read as numbers
 * - `NONE`: never quote; escape special characters instead
 */
export const Quoting = {
  MINIMAL: "minimal",
  ALL: "all",
  NON_NUMERIC: "nonnumeric",
  NONE: "none",
} as const;

/**
 * Line endings
 */
export const LINE_ENDINGS = {
  unix: "\n",
  windows: "\r\n",
  classic_mac: "\r",
} as const;

/**
 * Default line terminator for written rows, whatever the platform
 */
export const DEFAULT_LINE_TERMINATOR = LINE_ENDINGS.windows;

/**
 * Default maximum field length in characters
 */
export const DEFAULT_FIELD_SIZE_LIMIT = 131_072;

/**
 * Delimiters tried by detection when none are given
 */
export const CANDIDATE_DELIMITERS = [",", "\t", ";", "|", ":"] as const;

/**
 * Maximum number of lines to sample for delimiter/header detection
 */
export const MAX_DETECTION_LINES = 100;
