/**
 * @module formats/dsv/dialect
 * @description Named formatting dialects
 *
 * A dialect bundles the delimiter, quoting and escaping parameters shared by
 * readers and writers. Three dialects are built in:
 *
 * - `excel`: comma-delimited, minimal quoting, CRLF line endings
 * - `excel-tab`: like `excel` with a tab delimiter
 * - `unix`: like `excel` but quoting every field and ending lines with LF
 *
 * @example
 * ```typescript
 * registerDialect("pipes", { delimiter: "|", quoting: "all" });
 * const writer = new DSVWriter(sink, { dialect: "pipes" });
 * ```
 */

import { ValidationError } from "../../errors";
import { DEFAULT_DELIMITERS, DEFAULT_LINE_TERMINATOR, DEFAULT_QUOTE, Quoting } from "./constants";
import type { Dialect, DialectOptions } from "./types";
import { validateDialect } from "./validation";

const EXCEL: Readonly<Dialect> = Object.freeze({
  delimiter: DEFAULT_DELIMITERS.csv,
  quote: DEFAULT_QUOTE,
  doubleQuote: true,
  skipInitialSpace: false,
  lineTerminator: DEFAULT_LINE_TERMINATOR,
  quoting: Quoting.MINIMAL,
  strict: false,
});

const BUILT_IN_DIALECTS: ReadonlyArray<[string, Readonly<Dialect>]> = [
  ["excel", EXCEL],
  ["excel-tab", Object.freeze({ ...EXCEL, delimiter: DEFAULT_DELIMITERS.tsv })],
  ["unix", Object.freeze({ ...EXCEL, lineTerminator: "\n", quoting: Quoting.ALL })],
];

const registry = new Map<string, Readonly<Dialect>>(BUILT_IN_DIALECTS);

/**
 * Name of the dialect used when none is given
 */
export const DEFAULT_DIALECT = "excel";

/**
 * Overlay the defined fields of `overrides` on `base`
 */
function overlay(base: Readonly<Dialect>, overrides: DialectOptions): Dialect {
  const dialect: Dialect = {
    delimiter: overrides.delimiter ?? base.delimiter,
    quote: overrides.quote ?? base.quote,
    doubleQuote: overrides.doubleQuote ?? base.doubleQuote,
    skipInitialSpace: overrides.skipInitialSpace ?? base.skipInitialSpace,
    lineTerminator: overrides.lineTerminator ?? base.lineTerminator,
    quoting: overrides.quoting ?? base.quoting,
    strict: overrides.strict ?? base.strict,
  };

  const escapeChar = overrides.escapeChar ?? base.escapeChar;
  return escapeChar === undefined ? dialect : { ...dialect, escapeChar };
}

/**
 * Register a dialect under a name, replacing any previous one
 *
 * Unset fields take their values from `base` (default: `excel`).
 *
 * @throws {ValidationError} if the resulting dialect is invalid
 */
export function registerDialect(
  name: string,
  dialect: DialectOptions = {},
  base: string = DEFAULT_DIALECT
): Dialect {
  if (!name) {
    throw new ValidationError("Dialect name must not be empty");
  }

  const resolved = validateDialect(overlay(getDialect(base), dialect));
  registry.set(name, Object.freeze(resolved));
  return { ...resolved };
}

/**
 * Look up a registered dialect
 *
 * @throws {ValidationError} if no dialect has that name
 */
export function getDialect(name: string): Dialect {
  const dialect = registry.get(name);
  if (!dialect) {
    throw new ValidationError(`Unknown dialect: "${name}"`);
  }
  return { ...dialect };
}

/**
 * Remove a registered dialect
 *
 * @throws {ValidationError} if no dialect has that name
 */
export function unregisterDialect(name: string): void {
  if (!registry.delete(name)) {
    throw new ValidationError(`Unknown dialect: "${name}"`);
  }
}

/**
 * Names of all registered dialects, in registration order
 */
export function listDialects(): string[] {
  return [...registry.keys()];
}

/**
 * Resolve reader/writer options into a complete, validated dialect
 *
 * The starting point is `options.dialect` (a registered name or a partial
 * dialect on top of `excel`); dialect fields set directly on `options` win.
 *
 * @throws {ValidationError} for unknown names or invalid combinations
 */
export function resolveDialect(
  options: DialectOptions & { dialect?: string | DialectOptions }
): Dialect {
  const base =
    typeof options.dialect === "string"
      ? getDialect(options.dialect)
      : overlay(EXCEL, options.dialect ?? {});

  return validateDialect(overlay(base, options));
}
