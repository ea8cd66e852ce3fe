/**
 * DSV Format Type Definitions
 *
 * All types and interfaces for the DSV (Delimiter-Separated Values) module.
 */

import type { ParserOptions } from "../../types";
import type { Quoting } from "./constants";

// =============================================================================
// TYPES
// =============================================================================

/**
 * Supported delimiter types for DSV formats
 */
export type DelimiterType = "," | "\t" | "|" | ";" | string;

/**
 * Quoting policy shared by readers and writers
 */
export type QuotingMode = (typeof Quoting)[keyof typeof Quoting];

/**
 * A single field value
 *
 * Readers produce `number` only for unquoted fields under the `nonnumeric`
 * quoting mode; writers leave `number` values unquoted under that mode.
 */
export type FieldValue = string | number;

/**
 * A positional row: one value per field, in line order
 */
export type DSVRow = FieldValue[];

/**
 * A header-mapped row
 *
 * `fields` has one entry per column in header order. Columns the line did not
 * reach hold the parser's `restValue` (`null` unless configured). Values past
 * the last column are collected in `rest`.
 */
export interface DSVRecord {
  /** Physical line count when the record was completed (header is line 1) */
  lineNumber: number;
  fields: Record<string, FieldValue | null>;
  rest?: FieldValue[];
}

/**
 * Input accepted by record writers: column name to value, key order irrelevant
 */
export type RecordInput = Readonly<Record<string, FieldValue | null | undefined>>;

/**
 * Formatting parameters shared by readers and writers
 */
export interface Dialect {
  delimiter: DelimiterType;
  quote: string;
  /** Makes the next character literal; unset by default */
  escapeChar?: string;
  /** Represent a quote inside a quoted field as two quotes */
  doubleQuote: boolean;
  /** Skip spaces following a delimiter while reading */
  skipInitialSpace: boolean;
  lineTerminator: string;
  quoting: QuotingMode;
  /** Reject characters after a closing quote instead of keeping them */
  strict: boolean;
}

/**
 * Dialect fields a caller may override
 */
export type DialectOptions = Partial<Dialect>;

/**
 * Parser state for the field tokenizer
 */
export enum CSVParseState {
  FIELD_START,
  UNQUOTED_FIELD,
  QUOTED_FIELD,
  QUOTE_IN_QUOTED,
  ESCAPED_CHAR,
  ESCAPE_IN_QUOTED,
}

/**
 * A field as it came out of the tokenizer, before type conversion
 */
export interface FieldToken {
  value: string;
  quoted: boolean;
}

/**
 * DSV parser options extending base parser options
 */
export interface DSVParserOptions extends ParserOptions, DialectOptions {
  /** Registered dialect name or dialect object to start from (default: "excel") */
  dialect?: string | DialectOptions;
  /** Detect the delimiter from the first lines of input */
  autoDetectDelimiter?: boolean;
  /** Maximum characters in one field (default: 131072) */
  fieldSizeLimit?: number;
}

/**
 * Named-row parser options
 */
export interface DSVRecordParserOptions extends DSVParserOptions {
  /** Column names; when given, the first line is data rather than a header */
  columns?: string[];
  /** Value for columns a short line does not reach (default: null) */
  restValue?: FieldValue | null;
  /** "pad" fills/collects mismatched rows; "error" rejects them (default: "pad") */
  raggedRows?: "pad" | "error";
}

/**
 * DSV writer options
 */
export interface DSVWriterOptions extends DialectOptions {
  /** Registered dialect name or dialect object to start from (default: "excel") */
  dialect?: string | DialectOptions;
}

/**
 * Named-row writer options
 */
export interface DSVRecordWriterOptions extends DSVWriterOptions {
  /** Value written for a configured column a record lacks; unset means error */
  restValue?: FieldValue | null;
  /** What to do with record keys outside the columns (default: "ignore") */
  extrasAction?: "ignore" | "raise";
}
