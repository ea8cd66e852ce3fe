/**
 * DSV State Machine Module
 *
 * Line-fed tokenizer for delimited text. Handles quoted fields, doubled and
 * escaped quotes, and quoted fields that span several physical lines.
 */

import { DSVParseError } from "../../errors";
import { splitLines } from "../../io/stream-utils";
import { DEFAULT_FIELD_SIZE_LIMIT, LINE_ENDINGS, Quoting } from "./constants";
import { resolveDialect } from "./dialect";
import { CSVParseState, type Dialect, type FieldToken } from "./types";
import { validateFieldSize } from "./validation";

// CRLF before its halves
const TERMINATORS = [LINE_ENDINGS.windows, LINE_ENDINGS.unix, LINE_ENDINGS.classic_mac] as const;

/**
 * Split a physical line into its content and its terminator ("" if none)
 */
export function splitTerminator(line: string): { body: string; terminator: string } {
  const terminator = TERMINATORS.find((ending) => line.endsWith(ending));
  if (terminator === undefined) {
    return { body: line, terminator: "" };
  }
  return { body: line.slice(0, -terminator.length), terminator };
}

/**
 * Incremental field tokenizer
 *
 * Feed it one physical line at a time. `feed` returns the tokens of the
 * record the line completes, or `null` when a quoted (or escaped) line break
 * carries the record onto the next line. A blank line outside a record is an
 * empty record.
 *
 * Tokens remember whether their field was quoted so that callers can apply
 * the `nonnumeric` typing rule.
 */
export class DSVTokenizer {
  private fields: FieldToken[] = [];
  private field = "";
  private quoted = false;
  private state = CSVParseState.FIELD_START;
  private inRecord = false;
  private readonly quoteIsSpecial: boolean;

  constructor(
    private readonly dialect: Dialect,
    private readonly fieldSizeLimit: number = DEFAULT_FIELD_SIZE_LIMIT
  ) {
    this.quoteIsSpecial = dialect.quoting !== Quoting.NONE;
  }

  /**
   * Whether a record is open across a line break
   */
  get pending(): boolean {
    return this.inRecord;
  }

  /**
   * Tokenize one physical line
   *
   * @param line - Line text, with or without its terminator
   * @param lineNumber - Line number used in error reports
   * @returns The completed record's tokens, or null if the record continues
   * @throws {DSVParseError} for stray characters after a closing quote in
   *   strict mode, or a field over the size limit
   */
  feed(line: string, lineNumber?: number): FieldToken[] | null {
    const { body, terminator } = splitTerminator(line);

    if (!this.inRecord && body === "") {
      return [];
    }
    this.inRecord = true;

    for (let i = 0; i < body.length; i++) {
      const char = body.charAt(i);
      this.step(char, lineNumber, i + 1);
    }

    return this.endOfLine(terminator, lineNumber);
  }

  /**
   * Signal end of input
   *
   * @throws {DSVParseError} if a quoted field or escape is still open
   */
  finish(lineNumber?: number): void {
    if (!this.inRecord) return;

    const reason =
      this.state === CSVParseState.ESCAPED_CHAR || this.state === CSVParseState.ESCAPE_IN_QUOTED
        ? "escape character at end of input"
        : "unclosed quoted field";
    const field = this.field;
    this.reset();
    throw new DSVParseError(`Unexpected end of data: ${reason}`, lineNumber, undefined, field);
  }

  /**
   * Drop any partially tokenized record
   */
  reset(): void {
    this.fields = [];
    this.field = "";
    this.quoted = false;
    this.state = CSVParseState.FIELD_START;
    this.inRecord = false;
  }

  private step(char: string, lineNumber: number | undefined, column: number): void {
    const { delimiter, quote, escapeChar } = this.dialect;

    switch (this.state) {
      case CSVParseState.FIELD_START:
        if (char === quote && this.quoteIsSpecial) {
          this.quoted = true;
          this.state = CSVParseState.QUOTED_FIELD;
        } else if (char === escapeChar) {
          this.state = CSVParseState.ESCAPED_CHAR;
        } else if (char === " " && this.dialect.skipInitialSpace) {
          // Leading space dropped
        } else if (char === delimiter) {
          this.saveField(lineNumber);
        } else {
          this.field += char;
          this.state = CSVParseState.UNQUOTED_FIELD;
        }
        break;

      case CSVParseState.UNQUOTED_FIELD:
        if (char === escapeChar) {
          this.state = CSVParseState.ESCAPED_CHAR;
        } else if (char === delimiter) {
          this.saveField(lineNumber);
        } else {
          this.field += char;
        }
        break;

      case CSVParseState.ESCAPED_CHAR:
        this.field += char;
        this.state = CSVParseState.UNQUOTED_FIELD;
        break;

      case CSVParseState.QUOTED_FIELD:
        if (char === escapeChar) {
          this.state = CSVParseState.ESCAPE_IN_QUOTED;
        } else if (char === quote) {
          this.state = CSVParseState.QUOTE_IN_QUOTED;
        } else {
          this.field += char;
        }
        break;

      case CSVParseState.ESCAPE_IN_QUOTED:
        this.field += char;
        this.state = CSVParseState.QUOTED_FIELD;
        break;

      case CSVParseState.QUOTE_IN_QUOTED:
        if (char === quote && this.dialect.doubleQuote) {
          // Doubled quote
          this.field += quote;
          this.state = CSVParseState.QUOTED_FIELD;
        } else if (char === delimiter) {
          this.saveField(lineNumber);
        } else if (this.dialect.strict) {
          throw new DSVParseError(
            `Delimiter expected after closing quote, found ${JSON.stringify(char)}`,
            lineNumber,
            column,
            this.field
          );
        } else {
          // Lenient: keep the stray character as part of the field
          this.field += char;
          this.state = CSVParseState.UNQUOTED_FIELD;
        }
        break;
    }
  }

  private endOfLine(terminator: string, lineNumber: number | undefined): FieldToken[] | null {
    const lineBreak = terminator || "\n";

    switch (this.state) {
      case CSVParseState.QUOTED_FIELD:
        this.field += lineBreak;
        validateFieldSize(this.field, this.fieldSizeLimit, lineNumber);
        return null;

      case CSVParseState.ESCAPE_IN_QUOTED:
        this.field += lineBreak;
        this.state = CSVParseState.QUOTED_FIELD;
        validateFieldSize(this.field, this.fieldSizeLimit, lineNumber);
        return null;

      case CSVParseState.ESCAPED_CHAR:
        this.field += lineBreak;
        this.state = CSVParseState.UNQUOTED_FIELD;
        validateFieldSize(this.field, this.fieldSizeLimit, lineNumber);
        return null;

      default: {
        this.saveField(lineNumber);
        const fields = this.fields;
        this.fields = [];
        this.inRecord = false;
        return fields;
      }
    }
  }

  private saveField(lineNumber: number | undefined): void {
    validateFieldSize(this.field, this.fieldSizeLimit, lineNumber);
    this.fields.push({ value: this.field, quoted: this.quoted });
    this.field = "";
    this.quoted = false;
    this.state = CSVParseState.FIELD_START;
  }
}

/**
 * Parse a single delimited record into its text fields
 *
 * The record may span several lines when a quoted field contains line breaks.
 * Text after the first record is ignored.
 *
 * @throws {DSVParseError} if a quoted field is never closed
 */
export function parseCSVRow(
  line: string,
  delimiter: string = ",",
  quote: string = '"',
  escapeChar?: string
): string[] {
  const tokenizer = new DSVTokenizer(resolveDialect({ delimiter, quote, escapeChar }));
  let lineNumber = 0;

  for (const physicalLine of splitLines(line)) {
    lineNumber++;
    const tokens = tokenizer.feed(physicalLine, lineNumber);
    if (tokens) {
      return tokens.map((token) => token.value);
    }
  }

  tokenizer.finish(lineNumber);
  return [];
}
