/**
 * Abstract base parser with shared option merging, error routing and
 * interrupt handling
 *
 * Each reader keeps its own parsing logic; the base only supplies the
 * behaviour every reader has in common.
 */

import { type DelimitError, ParseError } from "../errors";
import type { ParserOptions } from "../types";

type ErrorHandler = (error: string, lineNumber?: number) => void;
type WarningHandler = (warning: string, lineNumber?: number) => void;

/**
 * Options after defaults have been merged: the warning hook is always set
 */
export type ResolvedOptions<TOptions extends ParserOptions> = TOptions & {
  onWarning: WarningHandler;
};

/**
 * Abstract parser base class
 *
 * @template T - The value type this parser produces
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: ResolvedOptions<TOptions>;
  private readonly errorHandler: ErrorHandler | undefined;
  private readonly interruptHandler: InterruptHandler;

  constructor(options: TOptions) {
    const defaultWarning: WarningHandler = (warning, lineNumber) => {
      const where = lineNumber === undefined ? "" : ` (line ${lineNumber})`;
      console.warn(`${this.getFormatName()} Warning${where}: ${warning}`);
    };

    // Merge in order: format defaults -> user options
    this.options = {
      ...this.getDefaultOptions(),
      ...options,
      onWarning: options.onWarning ?? defaultWarning,
    };
    this.errorHandler = options.onError;
    this.interruptHandler = new InterruptHandler(options.signal);
  }

  /**
   * Format-specific default options
   */
  protected abstract getDefaultOptions(): Partial<TOptions>;

  // ============================================================================
  // SHARED BEHAVIOUR
  // ============================================================================

  /**
   * Check if parsing operation should be aborted
   * Call this at row boundaries
   */
  protected checkAborted(): void {
    this.interruptHandler.checkAborted(this.getFormatName());
  }

  /**
   * Route a row-level failure
   *
   * With an `onError` handler the handler receives the message and line and
   * the caller skips the row; without one the error is thrown as-is.
   */
  protected reportError(error: DelimitError): void {
    if (this.errorHandler === undefined) {
      throw error;
    }
    this.errorHandler(error.message, error.lineNumber);
  }

  /**
   * Emit a warning through `onWarning`
   */
  protected warn(warning: string, lineNumber?: number): void {
    this.options.onWarning(warning, lineNumber);
  }

  // ============================================================================
  // ABSTRACT METHODS
  // ============================================================================

  /**
   * Parse in-memory text
   */
  abstract parseString(data: string): Iterable<T>;

  /**
   * Parse a file by path
   */
  abstract parseFile(filePath: string): AsyncIterable<T>;

  /**
   * Parse a byte stream
   */
  abstract parse(stream: ReadableStream<Uint8Array>): AsyncIterable<T>;

  /**
   * Format name for error messages and logging (e.g. "CSV", "TSV")
   */
  protected abstract getFormatName(): string;
}

/**
 * AbortSignal integration for parsers
 */
class InterruptHandler {
  constructor(private readonly signal?: AbortSignal) {}

  /**
   * @throws {ParseError} If operation was aborted
   */
  checkAborted(format: string): void {
    if (this.signal?.aborted) {
      throw new ParseError("Operation was aborted", format);
    }
  }
}
