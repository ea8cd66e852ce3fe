/**
 * Stream processing utilities for line-oriented text
 *
 * Splits decoded byte streams into lines while keeping each line's
 * terminator, so that a reader can tell a line break that ends a record from
 * one embedded in a quoted field.
 */

import type { LineProcessingResult } from "../types";

/**
 * Convert ReadableStream<Uint8Array> to async iterable of lines
 *
 * Each yielded line keeps its terminator (`\n`, `\r\n` or `\r`); only the
 * final line of a stream without a trailing newline has none. A `\r` that ends
 * a chunk is held back until the next chunk shows whether a `\n` follows.
 *
 * @example
 * ```typescript
 * const stream = await createStream("people.tsv");
 * for await (const line of readLines(stream)) {
 *   console.log(JSON.stringify(line));
 * }
 * ```
 */
export async function* readLines(stream: ReadableStream<Uint8Array>): AsyncIterable<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder("utf-8");
  let buffer = "";

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });

      const result = processBuffer(buffer);
      buffer = result.remainder;
      yield* result.lines;
    }

    buffer += decoder.decode();
    const result = processBuffer(buffer, true);
    yield* result.lines;
    if (result.remainder) {
      yield result.remainder;
    }
  } finally {
    reader.releaseLock();
  }
}

/**
 * Process text buffer to extract complete lines
 *
 * Handles `\n`, `\r\n` and `\r` endings and preserves the incomplete tail for
 * the next processing cycle. Unless `final` is set, a trailing `\r` stays in
 * the remainder because it may be the first half of `\r\n`.
 */
export function processBuffer(buffer: string, final = false): LineProcessingResult {
  const lines: string[] = [];
  let lineStart = 0;

  for (let i = 0; i < buffer.length; i++) {
    const char = buffer[i];

    if (char === "\n") {
      lines.push(buffer.slice(lineStart, i + 1));
      lineStart = i + 1;
    } else if (char === "\r") {
      const next = buffer[i + 1];
      if (next === "\n") {
        lines.push(buffer.slice(lineStart, i + 2));
        i++;
        lineStart = i + 1;
      } else if (next !== undefined || final) {
        lines.push(buffer.slice(lineStart, i + 1));
        lineStart = i + 1;
      }
    }
  }

  return {
    lines,
    remainder: buffer.slice(lineStart),
  };
}

/**
 * Split a complete string into lines, terminators kept
 */
export function splitLines(text: string): string[] {
  const { lines, remainder } = processBuffer(text, true);
  if (remainder) {
    lines.push(remainder);
  }
  return lines;
}
