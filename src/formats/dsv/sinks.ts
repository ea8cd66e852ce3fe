/**
 * Text sinks for DSV writers
 *
 * Writers emit whole lines synchronously; a sink decides where they go.
 * Sinks backed by asynchronous I/O buffer lines until `flush` is awaited.
 */

import type { FileWriteHandle } from "../../io/file-writer";

/**
 * Destination for formatted lines
 */
export interface TextSink {
  write(text: string): void;
  /** Push buffered text to the underlying resource */
  flush?(): Promise<void>;
}

/**
 * In-memory sink
 *
 * @example
 * ```typescript
 * const sink = new StringSink();
 * new CSVWriter(sink).writeRow(["a", 1]);
 * sink.toString(); // "a,1\r\n"
 * ```
 */
export class StringSink implements TextSink {
  private readonly chunks: string[] = [];

  write(text: string): void {
    this.chunks.push(text);
  }

  /**
   * Discard everything written so far
   */
  clear(): void {
    this.chunks.length = 0;
  }

  toString(): string {
    return this.chunks.join("");
  }
}

/**
 * Sink writing to an open file handle
 *
 * Lines are buffered and written on `flush`. `openWriter` flushes when its
 * callback settles; long-running callbacks may call `writer.flush()` earlier
 * to bound memory.
 */
export class FileSink implements TextSink {
  private pending: string[] = [];

  constructor(private readonly handle: FileWriteHandle) {}

  get path(): string {
    return this.handle.path;
  }

  write(text: string): void {
    this.pending.push(text);
  }

  async flush(): Promise<void> {
    if (this.pending.length === 0) return;
    const text = this.pending.join("");
    this.pending = [];
    await this.handle.writeString(text);
  }
}

/**
 * Sink writing UTF-8 to a web `WritableStream`
 *
 * Lines are buffered and written on `flush`, which waits for the stream to
 * accept them. The caller owns the stream writer and its lock.
 */
export class StreamSink implements TextSink {
  private readonly encoder = new TextEncoder();
  private pending: string[] = [];

  constructor(private readonly writer: WritableStreamDefaultWriter<Uint8Array>) {}

  write(text: string): void {
    this.pending.push(text);
  }

  async flush(): Promise<void> {
    if (this.pending.length === 0) return;
    const text = this.pending.join("");
    this.pending = [];
    await this.writer.write(this.encoder.encode(text));
  }
}
