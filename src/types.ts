/**
 * Shared type definitions
 *
 * Parser options common to every reader, and the file I/O types used by the
 * io layer. Format-specific types live beside their format module.
 */

import { type } from "arktype";

// =============================================================================
// PARSER OPTIONS
// =============================================================================

/**
 * Options understood by every parser
 */
export interface ParserOptions {
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom error handler; the default throws */
  onError?: (error: string, lineNumber?: number) => void;
  /** Custom warning handler; the default writes to console.warn */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

// =============================================================================
// FILE I/O TYPES
// =============================================================================

/**
 * Branded type for validated file paths
 * Ensures file paths have been validated before use in I/O operations
 */
export type FilePath = string & {
  readonly __brand: "FilePath";
};

/**
 * File reading configuration options
 */
export interface FileReaderOptions {
  /** Buffer size for streaming reads (default: 64KB) */
  readonly bufferSize?: number;
  /** Maximum file size accepted by readToString (default: 100MB) */
  readonly maxFileSize?: number;
}

/**
 * File writing configuration options
 */
export interface WriteOptions {
  /** Create missing parent directories (default: false) */
  readonly createDirectories?: boolean;
  /** File mode for newly created files (default: 0o644) */
  readonly mode?: number;
}

/**
 * File metadata used for validation
 */
export interface FileMetadata {
  readonly path: FilePath;
  readonly size: number;
  readonly lastModified: Date;
  readonly extension: string;
}

/**
 * File validation result with detailed feedback
 */
export interface FileValidationResult {
  readonly isValid: boolean;
  readonly metadata?: FileMetadata;
  readonly error?: string;
}

/**
 * Line splitting result for streamed text
 * Handles incomplete lines and buffer management
 */
export interface LineProcessingResult {
  /** Complete lines extracted from buffer, terminators included */
  readonly lines: string[];
  /** Incomplete line remainder to carry forward */
  readonly remainder: string;
}

// =============================================================================
// FILE I/O SCHEMAS
// =============================================================================

const SENSITIVE_PATH_PREFIXES = ["/etc/", "/proc/", "/sys/", "/dev/"] as const;

/**
 * File path validation schema
 * Rejects null bytes, directory traversal and system directories, and
 * normalizes separators
 */
export const FilePathSchema = type("string > 0")
  .narrow((path, ctx) => {
    if (path.includes("\0")) {
      return ctx.reject({ expected: "a path without null characters", actual: "" });
    }

    const normalized = normalizeSeparators(path);
    if (normalized.split("/").includes("..")) {
      return ctx.reject({ expected: "a path without directory traversal", actual: path });
    }
    if (SENSITIVE_PATH_PREFIXES.some((prefix) => normalized.startsWith(prefix))) {
      return ctx.reject({ expected: "a path outside system directories", actual: path });
    }

    return true;
  })
  .pipe((path) => normalizeSeparators(path) as FilePath);

/**
 * File reader options validation schema
 */
export const FileReaderOptionsSchema = type({
  "bufferSize?": "1024 <= number <= 1048576",
  "maxFileSize?": "number >= 0",
});

/**
 * File writer options validation schema
 */
export const WriteOptionsSchema = type({
  "createDirectories?": "boolean",
  "mode?": "number >= 0",
});

function normalizeSeparators(path: string): string {
  return path.replace(/[\\/]+/g, "/");
}
