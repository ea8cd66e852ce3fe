/**
 * Tests for line splitting over strings and byte streams
 */

import { describe, expect, test } from "vitest";
import { processBuffer, readLines, splitLines } from "../../src/io/stream-utils";

function byteStream(...chunks: Uint8Array[]): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(chunk);
      }
      controller.close();
    },
  });
}

const encode = (text: string): Uint8Array => new TextEncoder().encode(text);

async function lines(stream: ReadableStream<Uint8Array>): Promise<string[]> {
  const result: string[] = [];
  for await (const line of readLines(stream)) {
    result.push(line);
  }
  return result;
}

describe("processBuffer", () => {
  test("keeps terminators and the incomplete tail", () => {
    expect(processBuffer("a\nb\r\nc")).toEqual({ lines: ["a\n", "b\r\n"], remainder: "c" });
  });

  test("holds back a trailing carriage return", () => {
    expect(processBuffer("a\r")).toEqual({ lines: [], remainder: "a\r" });
    expect(processBuffer("a\r", true)).toEqual({ lines: ["a\r"], remainder: "" });
  });

  test("splits on a lone carriage return inside the buffer", () => {
    expect(processBuffer("a\rb\n")).toEqual({ lines: ["a\r", "b\n"], remainder: "" });
  });
});

describe("splitLines", () => {
  test("splits mixed line endings", () => {
    expect(splitLines("Unix\nWindows\r\nMac\rEnd")).toEqual([
      "Unix\n",
      "Windows\r\n",
      "Mac\r",
      "End",
    ]);
  });

  test("keeps blank lines", () => {
    expect(splitLines("a\n\nb\n")).toEqual(["a\n", "\n", "b\n"]);
  });

  test("returns nothing for empty text", () => {
    expect(splitLines("")).toEqual([]);
  });
});

describe("readLines", () => {
  test("reassembles lines split across chunks", async () => {
    const stream = byteStream(encode("na"), encode("me,age\nSam"), encode(",18\n"));
    expect(await lines(stream)).toEqual(["name,age\n", "Sam,18\n"]);
  });

  test("joins CRLF split between chunks", async () => {
    const stream = byteStream(encode("a,b\r"), encode("\nc,d"));
    expect(await lines(stream)).toEqual(["a,b\r\n", "c,d"]);
  });

  test("ends a final lone carriage return", async () => {
    expect(await lines(byteStream(encode("a\r")))).toEqual(["a\r"]);
  });

  test("decodes multi-byte characters split across chunks", async () => {
    const bytes = encode("Zoë\n");
    const stream = byteStream(bytes.slice(0, 3), bytes.slice(3));
    expect(await lines(stream)).toEqual(["Zoë\n"]);
  });

  test("releases the reader lock", async () => {
    const stream = byteStream(encode("x\n"));
    await lines(stream);
    expect(stream.locked).toBe(false);
  });
});
