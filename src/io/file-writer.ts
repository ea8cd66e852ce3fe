/**
 * File writing operations using Effect Platform
 *
 * Effect is hidden behind Promise-based APIs. Failures coming from the
 * platform surface as FileError; errors thrown by caller callbacks are
 * rethrown unchanged.
 *
 * @module file-writer
 */

import { FileSystem, Path } from "@effect/platform";
import { type } from "arktype";
import { Cause, Effect, Exit } from "effect";
import { FileError } from "../errors";
import type { FilePath, WriteOptions } from "../types";
import { WriteOptionsSchema } from "../types";
import { validatePath } from "./file-reader";
import { getPlatform } from "./runtime";

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

/**
 * Run a platform program, rethrowing the original failure instead of
 * Effect's FiberFailure wrapper
 */
async function runWithPlatform<A, E>(
  program: Effect.Effect<A, E, FileSystem.FileSystem | Path.Path>
): Promise<A> {
  const exit = await Effect.runPromiseExit(program.pipe(Effect.provide(getPlatform())));
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  throw Cause.squash(exit.cause);
}

function resolveWriteOptions(options: WriteOptions, path: string): Required<WriteOptions> {
  const validation = WriteOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new FileError(`Invalid write options: ${validation.summary}`, path, "write");
  }

  return {
    createDirectories: options.createDirectories ?? false,
    mode: options.mode ?? 0o644,
  };
}

/**
 * Create the parent directory of a path when asked to
 */
const ensureParentDirectory = (
  path: FilePath,
  options: Required<WriteOptions>
): Effect.Effect<void, FileError, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    if (!options.createDirectories) return;

    const fs = yield* FileSystem.FileSystem;
    const pathService = yield* Path.Path;
    const parentDir = pathService.dirname(path);

    if (!(yield* fs.exists(parentDir))) {
      yield* fs.makeDirectory(parentDir, { recursive: true });
    }
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("write", path, error)));

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Handle for writing to a file multiple times within a scope
 *
 * The file is closed when the callback completes or throws.
 */
export interface FileWriteHandle {
  /** Path of the open file */
  readonly path: FilePath;

  /**
   * Write string content (UTF-8) at the current position
   */
  writeString(content: string): Promise<void>;

  /**
   * Write binary data at the current position
   */
  writeBytes(content: Uint8Array): Promise<void>;
}

/**
 * Write string to file (overwrites if exists, creates if not)
 *
 * @throws {FileError} When write operation fails or path is invalid
 *
 * @example
 * ```typescript
 * await writeString("people.tsv", '"Name"\t"Age"\r\n');
 * ```
 */
export async function writeString(
  path: string,
  content: string,
  options: WriteOptions = {}
): Promise<void> {
  const validatedPath = validatePath(path);
  const writeOptions = resolveWriteOptions(options, validatedPath);

  const program = Effect.gen(function* () {
    yield* ensureParentDirectory(validatedPath, writeOptions);

    const fs = yield* FileSystem.FileSystem;
    yield* fs
      .writeFileString(validatedPath, content, { mode: writeOptions.mode })
      .pipe(Effect.mapError((error) => FileError.fromSystemError("write", validatedPath, error)));
  });

  await runWithPlatform(program);
}

/**
 * Append string to file (creates if not exists)
 *
 * @throws {FileError} When append operation fails
 */
export async function appendString(
  path: string,
  content: string,
  options: WriteOptions = {}
): Promise<void> {
  const validatedPath = validatePath(path);
  const writeOptions = resolveWriteOptions(options, validatedPath);

  const program = Effect.gen(function* () {
    yield* ensureParentDirectory(validatedPath, writeOptions);

    const fs = yield* FileSystem.FileSystem;
    yield* fs
      .writeFileString(validatedPath, content, { flag: "a", mode: writeOptions.mode })
      .pipe(Effect.mapError((error) => FileError.fromSystemError("write", validatedPath, error)));
  });

  await runWithPlatform(program);
}

/**
 * Open file for writing and execute callback with write handle
 *
 * The file is opened before the callback runs and closed through Effect's
 * scoped resource management when the callback settles, whether it resolves
 * or rejects. Whatever was written before a failure stays in the file.
 *
 * @param path - File path to open (creates if not exists, truncates if exists)
 * @param callback - Function that receives write handle and returns result
 * @param options - Write options
 * @returns Promise resolving to callback's return value
 * @throws {FileError} When file operations fail or path is invalid
 * @throws Whatever the callback throws, unchanged
 *
 * @example
 * ```typescript
 * await openForWriting("out.csv", async (handle) => {
 *   await handle.writeString("a,b\r\n");
 *   await handle.writeString("1,2\r\n");
 * });
 * // File is closed here
 * ```
 */
export async function openForWriting<T>(
  path: string,
  callback: (handle: FileWriteHandle) => Promise<T>,
  options: WriteOptions = {}
): Promise<T> {
  const validatedPath = validatePath(path);
  const writeOptions = resolveWriteOptions(options, validatedPath);

  const program = Effect.gen(function* () {
    yield* ensureParentDirectory(validatedPath, writeOptions);

    const fs = yield* FileSystem.FileSystem;
    const file = yield* fs
      .open(validatedPath, { flag: "w", mode: writeOptions.mode })
      .pipe(Effect.mapError((error) => FileError.fromSystemError("open", validatedPath, error)));

    const writeBytes = async (content: Uint8Array): Promise<void> => {
      const exit = await Effect.runPromiseExit(file.writeAll(content));
      if (Exit.isFailure(exit)) {
        throw FileError.fromSystemError("write", validatedPath, Cause.squash(exit.cause));
      }
    };

    const encoder = new TextEncoder();
    const handle: FileWriteHandle = {
      path: validatedPath,
      writeString: (content) => writeBytes(encoder.encode(content)),
      writeBytes,
    };

    // The scope closes the file once this settles
    return yield* Effect.tryPromise({
      try: () => callback(handle),
      catch: (error) => error,
    });
  });

  return runWithPlatform(program.pipe(Effect.scoped));
}

/**
 * Delete file from filesystem
 *
 * Does not throw if the file doesn't exist.
 *
 * @throws {FileError} When deletion fails for another reason
 */
export async function deleteFile(path: string): Promise<void> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    if (yield* fs.exists(validatedPath)) {
      yield* fs.remove(validatedPath);
    }
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("write", validatedPath, error)));

  await runWithPlatform(program);
}
