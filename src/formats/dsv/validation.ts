/**
 * @module formats/dsv/validation
 * @description Validation utilities for DSV parsing and writing
 *
 * This module contains:
 * - ArkType schemas for dialects, parser options and writer options
 * - Field size validation
 */

import { type } from "arktype";
import { DSVParseError, ValidationError } from "../../errors";
import { DEFAULT_FIELD_SIZE_LIMIT } from "./constants";
import type { Dialect } from "./types";

// =============================================================================
// FIELD SIZE VALIDATION
// =============================================================================

/**
 * Validate that a field doesn't exceed the maximum allowed length
 * @throws {DSVParseError} if field exceeds size limit
 */
export function validateFieldSize(
  field: string,
  maxSize: number = DEFAULT_FIELD_SIZE_LIMIT,
  lineNumber?: number
): void {
  if (field.length > maxSize) {
    throw new DSVParseError(
      `Field larger than field limit (${field.length} > ${maxSize} characters)`,
      lineNumber
    );
  }
}

// =============================================================================
// ARKTYPE VALIDATION SCHEMAS
// =============================================================================

const QuotingModeSchema = type('"minimal"|"all"|"nonnumeric"|"none"');

/**
 * Dialect fields as callers may supply them
 */
export const DialectOptionsSchema = type({
  "delimiter?": "string | undefined",
  "quote?": "string | undefined",
  "escapeChar?": "string | undefined",
  "doubleQuote?": "boolean | undefined",
  "skipInitialSpace?": "boolean | undefined",
  "lineTerminator?": "string | undefined",
  "quoting?": QuotingModeSchema.or("undefined"),
  "strict?": "boolean | undefined",
});

/**
 * A fully resolved dialect
 */
export const DialectSchema = type({
  delimiter: "string",
  quote: "string",
  "escapeChar?": "string",
  doubleQuote: "boolean",
  skipInitialSpace: "boolean",
  lineTerminator: "string > 0",
  quoting: QuotingModeSchema,
  strict: "boolean",
}).narrow((dialect, ctx) => {
  if (dialect.delimiter.length !== 1) {
    return ctx.reject({
      path: ["delimiter"],
      expected: "single character delimiter",
      actual: `${dialect.delimiter.length} characters`,
    });
  }

  if (dialect.quote.length !== 1) {
    return ctx.reject({
      path: ["quote"],
      expected: "single character quote",
      actual: `${dialect.quote.length} characters`,
    });
  }

  if (dialect.escapeChar !== undefined && dialect.escapeChar.length !== 1) {
    return ctx.reject({
      path: ["escapeChar"],
      expected: "single character escape",
      actual: `${dialect.escapeChar.length} characters`,
    });
  }

  if (
    dialect.escapeChar !== undefined &&
    (dialect.escapeChar === dialect.quote || dialect.escapeChar === dialect.delimiter)
  ) {
    return ctx.reject({
      path: ["escapeChar"],
      expected: "an escape character distinct from quote and delimiter",
      actual: JSON.stringify(dialect.escapeChar),
    });
  }

  if (dialect.quote === dialect.delimiter) {
    return ctx.reject({
      path: ["quote", "delimiter"],
      expected: "different quote and delimiter characters",
      actual: "same character for both",
    });
  }

  for (const [name, char] of [
    ["delimiter", dialect.delimiter],
    ["quote", dialect.quote],
  ] as const) {
    if (char === "\r" || char === "\n") {
      return ctx.reject({
        path: [name],
        expected: "a character other than a line break",
        actual: JSON.stringify(char),
      });
    }
  }

  return true;
});

/**
 * ArkType validation schema for DSV parser options
 */
export const DSVParserOptionsSchema = DialectOptionsSchema.and({
  "dialect?": "string | object | undefined",
  "autoDetectDelimiter?": "boolean | undefined",
  "fieldSizeLimit?": "number > 0 | undefined",
  "columns?": "string[] | undefined",
  "restValue?": "string | number | null | undefined",
  "raggedRows?": '"pad" | "error" | undefined',
});

/**
 * ArkType validation schema for DSV writer options
 */
export const DSVWriterOptionsSchema = DialectOptionsSchema.and({
  "dialect?": "string | object | undefined",
  "restValue?": "string | number | null | undefined",
  "extrasAction?": '"ignore" | "raise" | undefined',
});

/**
 * Validate caller options against a schema
 * @throws {ValidationError} with the ArkType summary
 */
export function validateOptions(
  schema: (data: unknown) => unknown,
  options: object,
  kind: "parser" | "writer"
): void {
  const validation = schema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid DSV ${kind} options: ${validation.summary}`);
  }
}

/**
 * Validate a resolved dialect
 * @throws {ValidationError} with the ArkType summary
 */
export function validateDialect(dialect: Dialect): Dialect {
  const validation = DialectSchema(dialect);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid DSV dialect: ${validation.summary}`);
  }
  return dialect;
}
