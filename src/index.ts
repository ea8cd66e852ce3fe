/**
 * delimit - configurable reading and writing of delimiter-separated text
 *
 * Positional and header-mapped readers and writers for CSV, TSV and other
 * delimited formats, with named dialects, detection and file/stream targets.
 */

// Error types
export {
  DelimitError,
  DSVParseError,
  DSVWriteError,
  ExtraFieldError,
  FieldConversionError,
  FileError,
  MissingFieldError,
  ParseError,
  ValidationError,
} from "./errors";
// Readers, writers, dialects and detection
export * from "./formats";
// File I/O
export {
  createStream,
  exists,
  getMetadata,
  getSize,
  readToString,
  validatePath,
} from "./io/file-reader";
export {
  appendString,
  deleteFile,
  type FileWriteHandle,
  openForWriting,
  writeString,
} from "./io/file-writer";
export { detectRuntime, type Runtime } from "./io/runtime";
export { processBuffer, readLines, splitLines } from "./io/stream-utils";
// Core types
export type {
  FileMetadata,
  FilePath,
  FileReaderOptions,
  FileValidationResult,
  ParserOptions,
  WriteOptions,
} from "./types";
