/**
 * DSV Format Detection Module
 *
 * Infers the delimiter, quote character, leading-space convention and header
 * presence of delimited text from a sample of its lines.
 */

import { DSVParseError, ParseError } from "../../errors";
import { splitLines } from "../../io/stream-utils";
import {
  CANDIDATE_DELIMITERS,
  DEFAULT_DELIMITERS,
  DEFAULT_QUOTE,
  MAX_DETECTION_LINES,
} from "./constants";
import { resolveDialect } from "./dialect";
import { parseCSVRow, splitTerminator } from "./state-machine";
import type { Dialect } from "./types";
import { parseNumber, removeBOM } from "./utils";

/**
 * Result of sniffing a sample
 */
export interface SniffResult {
  dialect: Dialect;
  hasHeaders: boolean;
  format: "csv" | "tsv" | "psv" | "ssv" | "dsv";
  /** Non-blank lines in the sample */
  rows: number;
  /** Fields in the first sampled line */
  columns: number;
}

const QUOTE_CANDIDATES = ['"', "'"] as const;

/** Bytes read from a stream for sniffing */
const MAX_SNIFF_BYTES = 10_000;

/**
 * Non-blank sample lines without terminators
 */
export function sampleLines(text: string, limit: number = MAX_DETECTION_LINES): string[] {
  return splitLines(removeBOM(text))
    .map((line) => splitTerminator(line).body)
    .filter((line) => line.trim() !== "")
    .slice(0, limit);
}

/**
 * Fields of one sampled line, or null when its quotes do not balance (a line
 * that starts or continues a multi-line field)
 */
function tryParseRow(line: string, delimiter: string, quote: string): string[] | null {
  try {
    return parseCSVRow(line, delimiter, quote);
  } catch (error) {
    if (error instanceof DSVParseError) return null;
    throw error;
  }
}

/**
 * Number of delimiters outside quoted fields, or raw occurrences when the
 * line's quotes do not balance
 */
function countDelimiters(line: string, delimiter: string, quote: string): number {
  const fields = tryParseRow(line, delimiter, quote);
  return fields === null ? line.split(delimiter).length - 1 : fields.length - 1;
}

/**
 * Detect the delimiter used in DSV content
 *
 * Scores each candidate on how consistently it splits the lines, how many
 * fields it yields on average, and how little the field count varies.
 * Occurrences inside quoted fields do not count.
 *
 * @param lines - Sample lines
 * @param candidates - Delimiters to test
 * @returns The detected delimiter or null if no candidate appears consistently
 */
export function detectDelimiter(
  lines: readonly string[],
  candidates: readonly string[] = CANDIDATE_DELIMITERS,
  quote: string = DEFAULT_QUOTE
): string | null {
  let bestDelimiter: string | null = null;
  let bestScore = 0;

  for (const delimiter of candidates) {
    const counts: number[] = [];
    for (const line of lines) {
      if (!line.trim()) continue;
      counts.push(countDelimiters(line, delimiter, quote));
    }

    const present = counts.filter((count) => count > 0);
    if (present.length === 0) continue;

    const first = counts[0] ?? 0;
    const consistent = counts.filter((count) => count === first).length;
    const avgCount = present.reduce((a, b) => a + b, 0) / present.length;
    const variance = counts.reduce((sum, val) => sum + (val - avgCount) ** 2, 0) / counts.length;

    const score = (consistent / counts.length) * avgCount * (1 / (1 + variance));
    if (score > bestScore) {
      bestScore = score;
      bestDelimiter = delimiter;
    }
  }

  return bestDelimiter;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Detect the quote character wrapping whole fields
 *
 * Counts values of the form `<q>...<q>` bounded by the delimiter (or line
 * start/end) for each candidate quote.
 *
 * @returns The most frequent quote, or null if no field is quoted
 */
export function detectQuote(lines: readonly string[], delimiter: string): string | null {
  const d = escapeRegExp(delimiter);
  let best: string | null = null;
  let bestCount = 0;

  for (const quote of QUOTE_CANDIDATES) {
    const pattern = new RegExp(`(?:^|${d}) *${quote}[^${quote}]*${quote} *(?=${d}|$)`, "g");
    const count = lines.reduce((sum, line) => sum + (line.match(pattern)?.length ?? 0), 0);
    if (count > bestCount) {
      bestCount = count;
      best = quote;
    }
  }

  return best;
}

/**
 * Detect whether fields conventionally start with a space after the delimiter
 */
export function detectSkipInitialSpace(lines: readonly string[], delimiter: string): boolean {
  const withDelimiter = lines.filter((line) => line.includes(delimiter));
  return (
    withDelimiter.length > 0 &&
    withDelimiter.every((line) =>
      line
        .split(delimiter)
        .slice(1)
        .every((part) => part.startsWith(" "))
    )
  );
}

/**
 * Detect if the first row contains headers
 *
 * Each column whose data values share a type (all numeric, or all the same
 * length) casts a vote: the header cell matching that type votes against a
 * header row, a mismatch votes for one. Rows whose length differs from the
 * first row's, and lines inside multi-line fields, are ignored.
 *
 * @param lines - Sample lines (minimum 2)
 * @param delimiter - The delimiter to use for parsing
 * @returns True if first row appears to be headers
 *
 * @example
 * ```typescript
 * detectHeaders(["name,age", "Sam,18", "Ann,42"], ","); // true
 * detectHeaders(["1,2,3", "4,5,6"], ","); // false
 * ```
 */
export function detectHeaders(
  lines: readonly string[],
  delimiter: string,
  quote: string = DEFAULT_QUOTE
): boolean {
  const [firstLine, ...dataLines] = lines;
  if (firstLine === undefined || dataLines.length === 0) return false;

  const header = tryParseRow(firstLine, delimiter, quote);
  if (header === null) return false;

  const rows = dataLines
    .map((line) => tryParseRow(line, delimiter, quote))
    .filter((row): row is string[] => row !== null && row.length === header.length);
  if (rows.length === 0) return false;

  let votes = 0;
  header.forEach((name, column) => {
    const values = rows.map((row) => row[column] ?? "");

    if (values.every((value) => parseNumber(value) !== undefined)) {
      votes += parseNumber(name) === undefined ? 1 : -1;
      return;
    }

    const length = values[0]?.length ?? 0;
    if (values.every((value) => value.length === length)) {
      votes += name.length === length ? -1 : 1;
    }
  });

  return votes > 0;
}

const FORMAT_BY_DELIMITER = new Map<string, SniffResult["format"]>([
  [DEFAULT_DELIMITERS.csv, "csv"],
  [DEFAULT_DELIMITERS.tsv, "tsv"],
  [DEFAULT_DELIMITERS.psv, "psv"],
  [DEFAULT_DELIMITERS.ssv, "ssv"],
]);

function formatFor(delimiter: string): SniffResult["format"] {
  return FORMAT_BY_DELIMITER.get(delimiter) ?? "dsv";
}

/**
 * Infer a dialect and header presence from a text sample
 *
 * @throws {ParseError} if no candidate delimiter fits the sample
 *
 * @example
 * ```typescript
 * const { dialect, hasHeaders } = sniff(text);
 * const parser = new DSVRecordParser({ dialect });
 * ```
 */
export function sniff(sample: string, candidates?: readonly string[]): SniffResult {
  const lines = sampleLines(sample);

  // The quote is needed to count delimiters; guess it per candidate first
  const probe = detectDelimiter(lines, candidates);
  const quote = (probe !== null && detectQuote(lines, probe)) || DEFAULT_QUOTE;
  const delimiter = detectDelimiter(lines, candidates, quote);
  if (delimiter === null) {
    throw new ParseError("Could not determine delimiter", "DSV");
  }

  const firstLine = lines[0];
  return {
    dialect: resolveDialect({
      delimiter,
      quote,
      skipInitialSpace: detectSkipInitialSpace(lines, delimiter),
    }),
    hasHeaders: detectHeaders(lines, delimiter, quote),
    format: formatFor(delimiter),
    rows: lines.length,
    columns: firstLine === undefined ? 0 : countDelimiters(firstLine, delimiter, quote) + 1,
  };
}

/**
 * Sniff the first bytes of a stream
 *
 * Reads up to 10 KB and releases the reader lock afterwards; the stream is
 * not closed.
 */
export async function sniffStream(
  stream: ReadableStream<Uint8Array>,
  candidates?: readonly string[]
): Promise<SniffResult> {
  const reader = stream.getReader();
  const decoder = new TextDecoder("utf-8");
  let text = "";
  let totalBytes = 0;

  try {
    while (totalBytes < MAX_SNIFF_BYTES) {
      const { done, value } = await reader.read();
      if (done) break;
      text += decoder.decode(value, { stream: true });
      totalBytes += value.length;
    }
    text += decoder.decode();
  } finally {
    reader.releaseLock();
  }

  // Drop the possibly truncated last line
  const lastBreak = Math.max(text.lastIndexOf("\n"), text.lastIndexOf("\r"));
  const sample = totalBytes >= MAX_SNIFF_BYTES && lastBreak > 0 ? text.slice(0, lastBreak) : text;
  return sniff(sample, candidates);
}
