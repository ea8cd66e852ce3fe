/**
 * DSV Utility Functions Module
 *
 * Text normalization and number conversion shared by readers and writers.
 */

import { DSVParseError, FieldConversionError } from "../../errors";
import type { DSVRecord, FieldToken, FieldValue } from "./types";

/**
 * Remove Byte Order Mark (BOM) from text
 *
 * @param text - Text potentially containing BOM
 * @returns Text without BOM
 */
export function removeBOM(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

const NUMERIC_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

const SPECIAL_NUMBERS: ReadonlyMap<string, number> = new Map([
  ["nan", Number.NaN],
  ["+nan", Number.NaN],
  ["-nan", Number.NaN],
  ["inf", Number.POSITIVE_INFINITY],
  ["+inf", Number.POSITIVE_INFINITY],
  ["-inf", Number.NEGATIVE_INFINITY],
  ["infinity", Number.POSITIVE_INFINITY],
  ["+infinity", Number.POSITIVE_INFINITY],
  ["-infinity", Number.NEGATIVE_INFINITY],
]);

/**
 * Read decimal text as a number
 *
 * Accepts optional surrounding whitespace, a sign, integer or decimal digits
 * with an optional exponent, and (case-insensitively) `nan`, `inf` and
 * `infinity`. Anything else, including the empty string, is not a number.
 *
 * @returns The number, or undefined if the text is not numeric
 */
export function parseNumber(text: string): number | undefined {
  const trimmed = text.trim();
  if (NUMERIC_PATTERN.test(trimmed)) {
    return Number(trimmed);
  }
  return SPECIAL_NUMBERS.get(trimmed.toLowerCase());
}

/**
 * Text written for a numeric value; `parseNumber` reads it back
 */
export function formatNumber(value: number): string {
  return Object.is(value, -0) ? "-0" : String(value);
}

/**
 * Convert tokens to row values
 *
 * With `convertUnquoted` set (the `nonnumeric` quoting mode), every non-empty
 * unquoted field must be a number. Empty fields stay text.
 *
 * @throws {FieldConversionError} for an unquoted non-numeric field
 */
export function convertTokens(
  tokens: readonly FieldToken[],
  convertUnquoted: boolean,
  lineNumber?: number
): FieldValue[] {
  if (!convertUnquoted) {
    return tokens.map((token) => token.value);
  }

  return tokens.map((token, index) => {
    if (token.quoted || token.value === "") return token.value;
    const value = parseNumber(token.value);
    if (value === undefined) {
      throw new FieldConversionError(token.value, lineNumber, index + 1);
    }
    return value;
  });
}

/**
 * Map a row onto column names
 *
 * Short rows are filled with `restValue`; values past the last column go in
 * `rest`. With `raggedRows` set to "error" any length mismatch is rejected.
 *
 * @throws {DSVParseError} for a mismatched row when ragged rows are rejected
 */
export function zipRecord(
  columns: readonly string[],
  values: readonly FieldValue[],
  lineNumber: number,
  restValue: FieldValue | null = null,
  raggedRows: "pad" | "error" = "pad"
): DSVRecord {
  if (raggedRows === "error" && values.length !== columns.length) {
    throw new DSVParseError(
      `Row has ${values.length} fields, expected ${columns.length}`,
      lineNumber
    );
  }

  // Object.fromEntries keeps a "__proto__" column as an ordinary key
  const fields: Record<string, FieldValue | null> = Object.fromEntries(
    columns.map((column, index): [string, FieldValue | null] => [
      column,
      index < values.length ? (values[index] ?? restValue) : restValue,
    ])
  );

  const record: DSVRecord = { lineNumber, fields };
  if (values.length > columns.length) {
    record.rest = values.slice(columns.length);
  }
  return record;
}

/**
 * Display name for a delimiter, used in messages
 */
export function formatNameFor(delimiter: string): "CSV" | "TSV" | "DSV" {
  switch (delimiter) {
    case ",":
      return "CSV";
    case "\t":
      return "TSV";
    default:
      return "DSV";
  }
}
