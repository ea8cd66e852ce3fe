/**
 * Error handling for delimited-text reading and writing
 *
 * Every failure raised by the library is a DelimitError subclass carrying a
 * stable `code`, the line number when one is known, and optional context.
 */

/**
 * Base error class for all delimit errors
 */
export class DelimitError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "DelimitError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Invalid options, dialects or arguments
 */
export class ValidationError extends DelimitError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends DelimitError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * Malformed delimited input, with line and column context
 */
export class DSVParseError extends ParseError {
  constructor(
    message: string,
    public readonly line?: number,
    public readonly column?: number,
    public readonly field?: string
  ) {
    const context = [
      line !== undefined && `line ${line}`,
      column !== undefined && `column ${column}`,
      field !== undefined && `field "${field}"`,
    ]
      .filter(Boolean)
      .join(", ");

    super(context ? `${message} (${context})` : message, "DSV", line);
    this.name = "DSVParseError";
  }
}

/**
 * An unquoted field that the quoting mode requires to be numeric did not parse
 */
export class FieldConversionError extends DSVParseError {
  constructor(
    public readonly value: string,
    line?: number,
    column?: number
  ) {
    super(`Could not convert field to number: "${value}"`, line, column);
    this.name = "FieldConversionError";
  }
}

/**
 * A row or field that cannot be emitted under the writer's dialect
 */
export class DSVWriteError extends DelimitError {
  constructor(
    message: string,
    public readonly field?: string,
    context?: string
  ) {
    super(message, "WRITE_ERROR", undefined, context);
    this.name = "DSVWriteError";
  }
}

/**
 * A record handed to a record writer lacks a configured column
 */
export class MissingFieldError extends DSVWriteError {
  constructor(public readonly column: string) {
    super(`Record is missing a value for column "${column}"`, column);
    this.name = "MissingFieldError";
  }
}

/**
 * A record handed to a record writer has keys outside the configured columns
 */
export class ExtraFieldError extends DSVWriteError {
  constructor(public readonly extras: readonly string[]) {
    super(
      `Record contains fields not in columns: ${extras.map((key) => `"${key}"`).join(", ")}`,
      extras[0]
    );
    this.name = "ExtraFieldError";
  }
}

/**
 * File I/O errors with detailed context
 */
export class FileError extends DelimitError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "open" | "close",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    if (systemError instanceof FileError) {
      return systemError;
    }

    const errorMessage = describeSystemError(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file") || msg.includes("notfound")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("emfile") || msg.includes("too many open files")) {
      return "Close unused file handles or increase system limits";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different location";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();

    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }

    return msg;
  }
}

// Effect platform errors are plain objects with a `message` and sometimes a
// `reason`; Node errors are Error instances with a `code`.
function describeSystemError(systemError: unknown): string {
  if (systemError instanceof Error) {
    return systemError.message;
  }
  if (typeof systemError === "object" && systemError !== null) {
    const parts: string[] = [];
    if ("reason" in systemError && typeof systemError.reason === "string") {
      parts.push(systemError.reason);
    }
    if ("message" in systemError && typeof systemError.message === "string") {
      parts.push(systemError.message);
    }
    if (parts.length > 0) {
      return parts.join(": ");
    }
  }
  return String(systemError);
}
