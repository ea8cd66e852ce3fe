/**
 * @module formats/dsv
 * @description DSV (Delimiter-Separated Values) format support
 *
 * Parsing and writing of CSV, TSV and other delimiter-separated formats.
 *
 * Features:
 * - Positional rows and header-mapped records
 * - Quoting modes `minimal`, `all`, `nonnumeric` and `none`
 * - Named dialects with a registry for custom ones
 * - Delimiter, quote and header detection
 * - Multi-line quoted fields
 * - String, file and web-stream targets
 *
 * @example Reading records
 * ```typescript
 * import { DSVRecordParser } from './formats/dsv';
 *
 * const parser = new DSVRecordParser({ dialect: "excel-tab" });
 * for await (const record of parser.parseFile("people.tsv")) {
 *   console.log(record.lineNumber, record.fields);
 * }
 * ```
 *
 * @example Detection
 * ```typescript
 * import { sniff } from './formats/dsv';
 *
 * const { dialect, hasHeaders } = sniff(sample);
 * ```
 */

// =============================================================================
// RE-EXPORTS - TYPES
// =============================================================================

export type {
  DelimiterType,
  Dialect,
  DialectOptions,
  DSVParserOptions,
  DSVRecord,
  DSVRecordParserOptions,
  DSVRecordWriterOptions,
  DSVRow,
  DSVWriterOptions,
  FieldToken,
  FieldValue,
  QuotingMode,
  RecordInput,
} from "./types";

export { CSVParseState } from "./types";

// =============================================================================
// RE-EXPORTS - MAIN CLASSES
// =============================================================================

export { CSVParser, DSVParser, DSVRecordParser, TSVParser } from "./parser";
export {
  CSVWriter,
  DSVRecordWriter,
  DSVWriter,
  openRecordWriter,
  openWriter,
  TSVWriter,
  type WritableRow,
  writeFile,
  writeToStream,
} from "./writer";
export { FileSink, StreamSink, StringSink, type TextSink } from "./sinks";

// =============================================================================
// RE-EXPORTS - DIALECTS, DETECTION AND TOKENIZING
// =============================================================================

export {
  DEFAULT_DIALECT,
  getDialect,
  listDialects,
  registerDialect,
  resolveDialect,
  unregisterDialect,
} from "./dialect";
export {
  detectDelimiter,
  detectHeaders,
  detectQuote,
  detectSkipInitialSpace,
  type SniffResult,
  sniff,
  sniffStream,
} from "./detection";
export { DSVTokenizer, parseCSVRow } from "./state-machine";
export { formatNumber, parseNumber, removeBOM } from "./utils";

// =============================================================================
// RE-EXPORTS - CONSTANTS
// =============================================================================

export {
  CANDIDATE_DELIMITERS,
  DEFAULT_DELIMITERS,
  DEFAULT_FIELD_SIZE_LIMIT,
  DEFAULT_LINE_TERMINATOR,
  DEFAULT_QUOTE,
  LINE_ENDINGS,
  Quoting,
} from "./constants";
