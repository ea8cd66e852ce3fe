/**
 * @module formats/dsv/parser
 * @description DSV (Delimiter-Separated Values) readers
 *
 * Provides positional and header-mapped readers with:
 * - Multi-line quoted fields
 * - Configurable dialects and quoting modes
 * - Optional delimiter detection
 * - In-memory (synchronous) and stream/file (asynchronous) entry points
 */

// =============================================================================
// IMPORTS
// =============================================================================

import { DelimitError } from "../../errors";
import { createStream } from "../../io/file-reader";
import { readLines, splitLines } from "../../io/stream-utils";
import { AbstractParser } from "../abstract-parser";
import { CANDIDATE_DELIMITERS, DEFAULT_FIELD_SIZE_LIMIT, MAX_DETECTION_LINES, Quoting } from "./constants";
import { detectDelimiter } from "./detection";
import { resolveDialect } from "./dialect";
import { DSVTokenizer, splitTerminator } from "./state-machine";
import type {
  Dialect,
  DSVParserOptions,
  DSVRecord,
  DSVRecordParserOptions,
  DSVRow,
} from "./types";
import { convertTokens, formatNameFor, removeBOM, zipRecord } from "./utils";
import { DSVParserOptionsSchema, validateDialect, validateOptions } from "./validation";

// =============================================================================
// HELPERS
// =============================================================================

function* replay(sample: readonly string[], rest: Iterator<string>): Generator<string> {
  yield* sample;
  for (let next = rest.next(); !next.done; next = rest.next()) {
    yield next.value;
  }
}

async function* replayAsync(
  sample: readonly string[],
  rest: AsyncIterator<string>
): AsyncGenerator<string> {
  yield* sample;
  for (let next = await rest.next(); !next.done; next = await rest.next()) {
    yield next.value;
  }
}

// =============================================================================
// CLASSES - POSITIONAL PARSER
// =============================================================================

/**
 * DSVParser - positional reader
 *
 * Produces one `DSVRow` per logical record. Under the `nonnumeric` quoting
 * mode unquoted fields are read as numbers; otherwise every field is text.
 *
 * @example
 * ```typescript
 * const parser = new DSVParser({ delimiter: "\t", quoting: "nonnumeric" });
 * for (const row of parser.parseString('"Sam"\t18\r\n')) {
 *   console.log(row); // ["Sam", 18]
 * }
 * ```
 */
export class DSVParser extends AbstractParser<DSVRow, DSVParserOptions> {
  private readonly configuredDialect: Dialect;
  private activeDialect: Dialect;
  private tokenizer: DSVTokenizer;
  private currentLine = 0;

  protected getDefaultOptions(): Partial<DSVParserOptions> {
    return {
      autoDetectDelimiter: false,
      fieldSizeLimit: DEFAULT_FIELD_SIZE_LIMIT,
    };
  }

  constructor(options: DSVParserOptions = {}) {
    validateOptions(DSVParserOptionsSchema, options, "parser");
    super(options);

    this.configuredDialect = resolveDialect(this.options);
    this.activeDialect = this.configuredDialect;
    this.tokenizer = this.createTokenizer();
  }

  /**
   * Physical lines consumed by the current (or last) parse
   */
  get lineNumber(): number {
    return this.currentLine;
  }

  /**
   * The dialect in effect, including a detected delimiter
   */
  get dialect(): Dialect {
    return { ...this.activeDialect };
  }

  protected getFormatName(): string {
    return formatNameFor(this.activeDialect.delimiter);
  }

  // ---------------------------------------------------------------------------
  // Synchronous entry points
  // ---------------------------------------------------------------------------

  /**
   * Parse a sequence of lines
   *
   * Lines may keep their terminators or not. A line without one that ends
   * inside a quoted field continues it with "\n".
   */
  *parseLines(lines: Iterable<string>): Generator<DSVRow> {
    this.beginParse();

    let source: Iterable<string> = lines;
    if (this.options.autoDetectDelimiter) {
      const iterator = lines[Symbol.iterator]();
      const sample: string[] = [];
      for (let next = iterator.next(); !next.done; next = iterator.next()) {
        sample.push(next.value);
        if (sample.length >= MAX_DETECTION_LINES) break;
      }
      this.detectFromSample(sample);
      source = replay(sample, iterator);
    }

    for (const line of source) {
      const row = this.processLine(line);
      if (row) yield row;
    }
    this.endParse();
  }

  /**
   * Parse in-memory text
   */
  *parseString(data: string): Generator<DSVRow> {
    yield* this.parseLines(splitLines(data));
  }

  // ---------------------------------------------------------------------------
  // Asynchronous entry points
  // ---------------------------------------------------------------------------

  /**
   * Parse an asynchronous sequence of lines
   */
  async *parseAsync(lines: AsyncIterable<string>): AsyncGenerator<DSVRow> {
    this.beginParse();

    let source: AsyncIterable<string> = lines;
    if (this.options.autoDetectDelimiter) {
      const iterator = lines[Symbol.asyncIterator]();
      const sample: string[] = [];
      for (let next = await iterator.next(); !next.done; next = await iterator.next()) {
        sample.push(next.value);
        if (sample.length >= MAX_DETECTION_LINES) break;
      }
      this.detectFromSample(sample);
      source = replayAsync(sample, iterator);
    }

    for await (const line of source) {
      const row = this.processLine(line);
      if (row) yield row;
    }
    this.endParse();
  }

  /**
   * Parse a UTF-8 byte stream
   */
  async *parse(stream: ReadableStream<Uint8Array>): AsyncGenerator<DSVRow> {
    yield* this.parseAsync(readLines(stream));
  }

  /**
   * Parse a file from a path
   *
   * @throws {FileError} if the file cannot be opened
   */
  async *parseFile(path: string): AsyncGenerator<DSVRow> {
    const stream = await createStream(path);
    yield* this.parse(stream);
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private createTokenizer(): DSVTokenizer {
    return new DSVTokenizer(
      this.activeDialect,
      this.options.fieldSizeLimit ?? DEFAULT_FIELD_SIZE_LIMIT
    );
  }

  private beginParse(): void {
    this.currentLine = 0;
    if (this.activeDialect !== this.configuredDialect) {
      this.activeDialect = this.configuredDialect;
      this.tokenizer = this.createTokenizer();
    }
    this.tokenizer.reset();
  }

  private detectFromSample(sample: readonly string[]): void {
    const lines = sample
      .map((line, index) => splitTerminator(index === 0 ? removeBOM(line) : line).body)
      .filter((line) => line.trim() !== "");
    const detected = detectDelimiter(lines, CANDIDATE_DELIMITERS, this.activeDialect.quote);

    if (detected === null) {
      this.warn(
        `Could not detect delimiter; using ${JSON.stringify(this.activeDialect.delimiter)}`
      );
      return;
    }

    if (detected !== this.activeDialect.delimiter) {
      this.activeDialect = validateDialect({ ...this.activeDialect, delimiter: detected });
      this.tokenizer = this.createTokenizer();
    }
  }

  /**
   * Tokenize one physical line
   *
   * @returns The completed row, or undefined while a record spans lines or
   *   when a failed row was handed to `onError`
   */
  private processLine(line: string): DSVRow | undefined {
    if (!this.tokenizer.pending) {
      this.checkAborted();
    }

    this.currentLine++;
    const text = this.currentLine === 1 ? removeBOM(line) : line;

    try {
      const tokens = this.tokenizer.feed(text, this.currentLine);
      if (tokens === null) return undefined;
      return convertTokens(
        tokens,
        this.activeDialect.quoting === Quoting.NON_NUMERIC,
        this.currentLine
      );
    } catch (error) {
      if (!(error instanceof DelimitError)) throw error;
      this.tokenizer.reset();
      this.reportError(error);
      return undefined;
    }
  }

  private endParse(): void {
    try {
      this.tokenizer.finish(this.currentLine);
    } catch (error) {
      if (!(error instanceof DelimitError)) throw error;
      this.reportError(error);
    }
  }
}

// =============================================================================
// CLASSES - RECORD PARSER
// =============================================================================

/**
 * Row reader behind DSVRecordParser: a row that fails before the header has
 * been read is fatal, whatever `onError` says
 */
class RecordRowParser extends DSVParser {
  constructor(
    options: DSVParserOptions,
    private readonly headerPending: () => boolean
  ) {
    super(options);
  }

  protected override reportError(error: DelimitError): void {
    if (this.headerPending()) {
      throw error;
    }
    super.reportError(error);
  }
}

/**
 * DSVRecordParser - header-mapped reader
 *
 * The first non-blank row supplies the column names unless `columns` is
 * given. Later rows are zipped with the columns: short rows are filled with
 * `restValue`, surplus values land in `rest`. Blank lines are skipped but
 * still counted. A header row that cannot be read is always thrown, even
 * with `onError` set.
 *
 * @example
 * ```typescript
 * const parser = new DSVRecordParser({ delimiter: "\t", quoting: "nonnumeric" });
 * for (const record of parser.parseString(text)) {
 *   console.log(record.lineNumber, record.fields.Name);
 * }
 * ```
 */
export class DSVRecordParser extends AbstractParser<DSVRecord, DSVRecordParserOptions> {
  private readonly rowParser: RecordRowParser;
  private readonly configuredColumns: string[] | null;
  private header: string[] | null;

  protected getDefaultOptions(): Partial<DSVRecordParserOptions> {
    return {
      restValue: null,
      raggedRows: "pad",
    };
  }

  constructor(options: DSVRecordParserOptions = {}) {
    validateOptions(DSVParserOptionsSchema, options, "parser");
    super(options);

    const { columns, restValue: _restValue, raggedRows: _raggedRows, ...rowOptions } = options;
    this.rowParser = new RecordRowParser(rowOptions, () => this.header === null);
    this.configuredColumns = columns ? [...columns] : null;
    this.header = this.configuredColumns;
  }

  /**
   * Column names, in order; empty until the header has been read
   */
  get columns(): string[] {
    return this.header ? [...this.header] : [];
  }

  /**
   * Physical lines consumed, header included
   */
  get lineNumber(): number {
    return this.rowParser.lineNumber;
  }

  get dialect(): Dialect {
    return this.rowParser.dialect;
  }

  protected getFormatName(): string {
    return formatNameFor(this.rowParser.dialect.delimiter);
  }

  *parseLines(lines: Iterable<string>): Generator<DSVRecord> {
    this.header = this.configuredColumns;
    for (const row of this.rowParser.parseLines(lines)) {
      const record = this.toRecord(row);
      if (record) yield record;
    }
  }

  *parseString(data: string): Generator<DSVRecord> {
    yield* this.parseLines(splitLines(data));
  }

  async *parseAsync(lines: AsyncIterable<string>): AsyncGenerator<DSVRecord> {
    this.header = this.configuredColumns;
    for await (const row of this.rowParser.parseAsync(lines)) {
      const record = this.toRecord(row);
      if (record) yield record;
    }
  }

  async *parse(stream: ReadableStream<Uint8Array>): AsyncGenerator<DSVRecord> {
    yield* this.parseAsync(readLines(stream));
  }

  /**
   * @throws {FileError} if the file cannot be opened
   */
  async *parseFile(path: string): AsyncGenerator<DSVRecord> {
    const stream = await createStream(path);
    yield* this.parse(stream);
  }

  private toRecord(row: DSVRow): DSVRecord | undefined {
    if (row.length === 0) return undefined;

    if (this.header === null) {
      this.header = row.map(String);
      return undefined;
    }

    try {
      return zipRecord(
        this.header,
        row,
        this.lineNumber,
        this.options.restValue ?? null,
        this.options.raggedRows ?? "pad"
      );
    } catch (error) {
      if (!(error instanceof DelimitError)) throw error;
      this.reportError(error);
      return undefined;
    }
  }
}

// =============================================================================
// CLASSES - CONVENIENCE PARSERS
// =============================================================================

/**
 * CSVParser - starts from the `excel` dialect
 */
export class CSVParser extends DSVParser {
  constructor(options: DSVParserOptions = {}) {
    super({ dialect: "excel", ...options });
  }
}

/**
 * TSVParser - starts from the `excel-tab` dialect
 */
export class TSVParser extends DSVParser {
  constructor(options: DSVParserOptions = {}) {
    super({ dialect: "excel-tab", ...options });
  }
}
