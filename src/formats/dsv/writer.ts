/**
 * @module formats/dsv/writer
 * @description DSV (Delimiter-Separated Values) writers
 *
 * Provides positional and header-mapped writers with:
 * - Quoting modes `minimal`, `all`, `nonnumeric` and `none`
 * - Doubled or escaped quote characters
 * - In-memory, file and web-stream targets
 */

// =============================================================================
// IMPORTS
// =============================================================================

import { DSVWriteError, ExtraFieldError, MissingFieldError, ValidationError } from "../../errors";
import { openForWriting } from "../../io/file-writer";
import type { WriteOptions } from "../../types";
import { Quoting } from "./constants";
import { resolveDialect } from "./dialect";
import { FileSink, StreamSink, type TextSink } from "./sinks";
import type {
  Dialect,
  DSVRecordWriterOptions,
  DSVWriterOptions,
  FieldValue,
  RecordInput,
} from "./types";
import { formatNameFor, formatNumber } from "./utils";
import { DSVWriterOptionsSchema, validateOptions } from "./validation";

// =============================================================================
// TYPES
// =============================================================================

/**
 * A row as accepted by writers; null and undefined become empty fields
 */
export type WritableRow = readonly (FieldValue | null | undefined)[];

type RowSource<T> = Iterable<T> | AsyncIterable<T>;

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Validate writer options and resolve their dialect
 */
function resolveWriterDialect(options: DSVWriterOptions): Dialect {
  validateOptions(DSVWriterOptionsSchema, options, "writer");
  return resolveDialect(options);
}

/**
 * Warn when quoting `none` has no escape character to fall back on
 */
function warnOnUnescapable(dialect: Dialect): void {
  if (dialect.quoting === Quoting.NONE && dialect.escapeChar === undefined) {
    console.warn(
      `${formatNameFor(dialect.delimiter)} Warning: quoting "none" without an escape character; ` +
        "fields containing special characters cannot be written"
    );
  }
}

// =============================================================================
// CLASSES - POSITIONAL WRITER
// =============================================================================

/**
 * DSVWriter - positional writer
 *
 * Every row becomes one line ending in the dialect's line terminator.
 *
 * @example
 * ```typescript
 * const sink = new StringSink();
 * const writer = new DSVWriter(sink, { delimiter: "\t", quoting: "nonnumeric" });
 * writer.writeRow(["Sam", 18, "Baker"]);
 * sink.toString(); // '"Sam"\t18\t"Baker"\r\n'
 * ```
 */
export class DSVWriter {
  private readonly resolved: Dialect;
  private readonly specials: readonly string[];

  constructor(
    protected readonly sink: TextSink,
    options: DSVWriterOptions = {}
  ) {
    this.resolved = resolveWriterDialect(options);
    warnOnUnescapable(this.resolved);
    const { delimiter, quote, escapeChar } = this.resolved;
    this.specials = [delimiter, quote, "\r", "\n", ...(escapeChar === undefined ? [] : [escapeChar])];
  }

  get dialect(): Dialect {
    return { ...this.resolved };
  }

  /**
   * Format a row as one line, terminator included, without writing it
   *
   * @throws {DSVWriteError} if a field cannot be represented in the dialect
   */
  formatRow(row: WritableRow): string {
    const lone = row.length === 1;
    const fields = row.map((value) => this.formatField(value, lone));
    return fields.join(this.resolved.delimiter) + this.resolved.lineTerminator;
  }

  /**
   * Write one row
   *
   * The row is formatted completely before anything reaches the sink.
   */
  writeRow(row: WritableRow): void {
    this.sink.write(this.formatRow(row));
  }

  /**
   * Write rows in order; equivalent to calling `writeRow` for each
   */
  writeRows(rows: Iterable<WritableRow>): void {
    for (const row of rows) {
      this.writeRow(row);
    }
  }

  /**
   * Push anything the sink has buffered to its destination
   */
  async flush(): Promise<void> {
    await this.sink.flush?.();
  }

  private formatField(value: FieldValue | null | undefined, lone: boolean): string {
    const { quoting, escapeChar } = this.resolved;
    const numeric = typeof value === "number";
    const text = numeric ? formatNumber(value) : (value ?? "");

    if (quoting === Quoting.NONE) {
      if (lone && text === "") {
        throw new DSVWriteError("Single empty field record must be quoted", text);
      }
      return this.escapeSpecials(text);
    }

    const quoted =
      quoting === Quoting.ALL ||
      (quoting === Quoting.NON_NUMERIC && !numeric) ||
      (lone && text === "") ||
      this.needsQuotes(text);

    if (!quoted) {
      return escapeChar === undefined ? text : text.split(escapeChar).join(escapeChar + escapeChar);
    }

    return this.resolved.quote + this.escapeQuoted(text) + this.resolved.quote;
  }

  private needsQuotes(text: string): boolean {
    const { delimiter, quote } = this.resolved;
    return (
      text.includes(delimiter) || text.includes(quote) || text.includes("\r") || text.includes("\n")
    );
  }

  private escapeQuoted(text: string): string {
    const { quote, escapeChar, doubleQuote } = this.resolved;
    let result = "";

    for (const char of text) {
      if (char === quote) {
        if (doubleQuote) {
          result += quote + quote;
        } else if (escapeChar !== undefined) {
          result += escapeChar + quote;
        } else {
          throw new DSVWriteError(
            "Quote character in field needs doubleQuote or an escape character",
            text
          );
        }
      } else if (char === escapeChar) {
        result += escapeChar + escapeChar;
      } else {
        result += char;
      }
    }

    return result;
  }

  private escapeSpecials(text: string): string {
    const { escapeChar } = this.resolved;
    let result = "";

    for (const char of text) {
      if (this.specials.includes(char)) {
        if (escapeChar === undefined) {
          throw new DSVWriteError(
            `Need to escape ${JSON.stringify(char)} but no escape character is set`,
            text
          );
        }
        result += escapeChar + char;
      } else {
        result += char;
      }
    }

    return result;
  }
}

// =============================================================================
// CLASSES - RECORD WRITER
// =============================================================================

/**
 * DSVRecordWriter - header-mapped writer
 *
 * Writes values in the order of the columns given at construction, whatever
 * the key order of each record.
 *
 * @example
 * ```typescript
 * const writer = new DSVRecordWriter(sink, ["Name", "Age"], { quoting: "nonnumeric" });
 * writer.writeHeader();
 * writer.writeRecord({ Age: 18, Name: "Sam" });
 * ```
 */
export class DSVRecordWriter {
  private readonly rowWriter: DSVWriter;
  private readonly columnNames: readonly string[];
  private readonly columnSet: ReadonlySet<string>;
  private readonly hasRestValue: boolean;
  private readonly restValue: FieldValue | null | undefined;
  private readonly extrasAction: "ignore" | "raise";

  constructor(sink: TextSink, columns: readonly string[], options: DSVRecordWriterOptions = {}) {
    if (columns.length === 0) {
      throw new ValidationError("Record writer needs at least one column");
    }

    const { restValue, extrasAction, ...writerOptions } = options;
    validateOptions(DSVWriterOptionsSchema, { restValue, extrasAction }, "writer");

    this.rowWriter = new DSVWriter(sink, writerOptions);
    this.columnNames = [...columns];
    this.columnSet = new Set(columns);
    this.hasRestValue = restValue !== undefined;
    this.restValue = restValue;
    this.extrasAction = extrasAction ?? "ignore";
  }

  get columns(): string[] {
    return [...this.columnNames];
  }

  get dialect(): Dialect {
    return this.rowWriter.dialect;
  }

  /**
   * Write the column names as one line
   */
  writeHeader(): void {
    this.rowWriter.writeRow(this.columnNames);
  }

  /**
   * Format a record as one line without writing it
   *
   * @throws {MissingFieldError} if a column is absent and no restValue is set
   * @throws {ExtraFieldError} for unknown keys when extrasAction is "raise"
   */
  formatRecord(record: RecordInput): string {
    return this.rowWriter.formatRow(this.toRow(record));
  }

  writeRecord(record: RecordInput): void {
    this.rowWriter.writeRow(this.toRow(record));
  }

  /**
   * Write records in order; equivalent to calling `writeRecord` for each
   */
  writeRecords(records: Iterable<RecordInput>): void {
    for (const record of records) {
      this.writeRecord(record);
    }
  }

  async flush(): Promise<void> {
    await this.rowWriter.flush();
  }

  private toRow(record: RecordInput): WritableRow {
    if (this.extrasAction === "raise") {
      const extras = Object.keys(record).filter((key) => !this.columnSet.has(key));
      if (extras.length > 0) {
        throw new ExtraFieldError(extras);
      }
    }

    return this.columnNames.map((column) => {
      if (Object.prototype.hasOwnProperty.call(record, column)) {
        return record[column];
      }
      if (!this.hasRestValue) {
        throw new MissingFieldError(column);
      }
      return this.restValue;
    });
  }
}

// =============================================================================
// CLASSES - CONVENIENCE WRITERS
// =============================================================================

/**
 * CSVWriter - starts from the `excel` dialect
 */
export class CSVWriter extends DSVWriter {
  constructor(sink: TextSink, options: DSVWriterOptions = {}) {
    super(sink, { dialect: "excel", ...options });
  }
}

/**
 * TSVWriter - starts from the `excel-tab` dialect
 */
export class TSVWriter extends DSVWriter {
  constructor(sink: TextSink, options: DSVWriterOptions = {}) {
    super(sink, { dialect: "excel-tab", ...options });
  }
}

// =============================================================================
// FILE AND STREAM TARGETS
// =============================================================================

/**
 * Open a file and write to it through a positional writer
 *
 * The file is created (or truncated) before the callback runs. Buffered lines
 * are flushed and the file closed when the callback settles, also when it
 * throws; lines written before a failure stay in the file.
 *
 * @throws {ValidationError} for invalid options, before the file is touched
 * @throws {FileError} when the file cannot be opened or written
 *
 * @example
 * ```typescript
 * await openWriter("people.csv", {}, (writer) => {
 *   writer.writeRow(["Name", "Age"]);
 *   writer.writeRow(["Sam", 18]);
 * });
 * ```
 */
export async function openWriter<T>(
  path: string,
  options: DSVWriterOptions,
  callback: (writer: DSVWriter) => T | Promise<T>,
  fileOptions: WriteOptions = {}
): Promise<T> {
  resolveWriterDialect(options);

  return openForWriting(
    path,
    async (handle) => {
      const sink = new FileSink(handle);
      try {
        return await callback(new DSVWriter(sink, options));
      } finally {
        await sink.flush();
      }
    },
    fileOptions
  );
}

/**
 * Open a file and write to it through a record writer
 *
 * Same lifecycle as `openWriter`. The header is not written automatically.
 */
export async function openRecordWriter<T>(
  path: string,
  columns: readonly string[],
  options: DSVRecordWriterOptions,
  callback: (writer: DSVRecordWriter) => T | Promise<T>,
  fileOptions: WriteOptions = {}
): Promise<T> {
  const { restValue: _restValue, extrasAction: _extrasAction, ...writerOptions } = options;
  resolveWriterDialect(writerOptions);

  return openForWriting(
    path,
    async (handle) => {
      const sink = new FileSink(handle);
      try {
        return await callback(new DSVRecordWriter(sink, columns, options));
      } finally {
        await sink.flush();
      }
    },
    fileOptions
  );
}

/**
 * Write a sequence of rows to a file
 *
 * @returns Number of rows written
 */
export async function writeFile(
  path: string,
  rows: RowSource<WritableRow>,
  options: DSVWriterOptions = {},
  fileOptions: WriteOptions = {}
): Promise<number> {
  return openWriter(
    path,
    options,
    async (writer) => {
      let count = 0;
      for await (const row of rows) {
        writer.writeRow(row);
        count++;
      }
      return count;
    },
    fileOptions
  );
}

/**
 * Write rows to a web stream, one chunk per row
 *
 * The stream's writer lock is released on every exit path; the stream itself
 * is left open.
 *
 * @returns Number of rows written
 */
export async function writeToStream(
  rows: RowSource<WritableRow>,
  stream: WritableStream<Uint8Array>,
  options: DSVWriterOptions = {}
): Promise<number> {
  const streamWriter = stream.getWriter();
  let count = 0;

  try {
    const sink = new StreamSink(streamWriter);
    const writer = new DSVWriter(sink, options);
    for await (const row of rows) {
      writer.writeRow(row);
      await sink.flush();
      count++;
    }
  } finally {
    streamWriter.releaseLock();
  }

  return count;
}
