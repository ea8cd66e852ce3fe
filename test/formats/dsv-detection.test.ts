/**
 * DSV format detection tests
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { describe, expect, test } from "vitest";
import { ParseError } from "../../src/errors";
import {
  detectDelimiter,
  detectHeaders,
  detectQuote,
  detectSkipInitialSpace,
  sniff,
  sniffStream,
} from "../../src/formats/dsv";
import { sampleLines } from "../../src/formats/dsv/detection";

const MULTILINE_CSV = fileURLToPath(new URL("../fixtures/multiline.csv", import.meta.url));

function textStream(...chunks: string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(encoder.encode(chunk));
      }
      controller.close();
    },
  });
}

describe("DSV detection", () => {
  describe("sampleLines", () => {
    test("drops terminators, blank lines and the BOM", () => {
      expect(sampleLines("\uFEFFa,b\r\n\r\nc,d\n")).toEqual(["a,b", "c,d"]);
    });

    test("limits the sample", () => {
      expect(sampleLines("1\n2\n3\n", 2)).toEqual(["1", "2"]);
    });
  });

  describe("detectDelimiter", () => {
    test("finds a consistent delimiter", () => {
      expect(detectDelimiter(["a,b,c", "1,2,3"])).toBe(",");
      expect(detectDelimiter(["a\tb", "1\t2"])).toBe("\t");
    });

    test("ignores delimiters inside quoted fields", () => {
      expect(detectDelimiter(["name;note", 'x;"a,b,c"', 'y;"d,e"'])).toBe(";");
    });

    test("returns null when no candidate appears", () => {
      expect(detectDelimiter(["abc", "def"])).toBeNull();
    });

    test("only considers the given candidates", () => {
      expect(detectDelimiter(["a,b", "c,d"], ["|"])).toBeNull();
    });
  });

  describe("detectQuote", () => {
    test("finds the quote wrapping whole fields", () => {
      expect(detectQuote(["'a,b',c", "'d',e"], ",")).toBe("'");
      expect(detectQuote(['"a",b'], ",")).toBe('"');
    });

    test("returns null when nothing is quoted", () => {
      expect(detectQuote(["a,b"], ",")).toBeNull();
    });
  });

  describe("detectSkipInitialSpace", () => {
    test("detects a space after every delimiter", () => {
      expect(detectSkipInitialSpace(["a, b", "1, 2"], ",")).toBe(true);
      expect(detectSkipInitialSpace(["a, b", "1,2"], ",")).toBe(false);
      expect(detectSkipInitialSpace(["ab"], ",")).toBe(false);
    });
  });

  describe("detectHeaders", () => {
    test("recognizes a header above typed columns", () => {
      expect(detectHeaders(["name,age", "Sam,18", "Ann,42"], ",")).toBe(true);
    });

    test("rejects a numeric first row", () => {
      expect(detectHeaders(["1,2", "3,4"], ",")).toBe(false);
    });

    test("ignores lines inside multi-line fields", () => {
      const lines = ["name,note", 'Sam,"line one', 'line two"', "Ann,plain"];
      expect(detectHeaders(lines, ",")).toBe(true);
    });

    test("needs at least two lines", () => {
      expect(detectHeaders(["name,age"], ",")).toBe(false);
    });
  });

  describe("sniff", () => {
    test("infers dialect and header presence", () => {
      const result = sniff("name;age\nSam;18\nAnn;42\n");

      expect(result.dialect.delimiter).toBe(";");
      expect(result.dialect.quote).toBe('"');
      expect(result.dialect.skipInitialSpace).toBe(false);
      expect(result.hasHeaders).toBe(true);
      expect(result.format).toBe("ssv");
      expect(result.rows).toBe(3);
      expect(result.columns).toBe(2);
    });

    test("names the format after the delimiter", () => {
      expect(sniff("a|b\n1|2\n").format).toBe("psv");
      expect(sniff("a:b\n1:2\n").format).toBe("dsv");
    });

    test("detects leading spaces", () => {
      const result = sniff("a, b, c\n1, 2, 3\n");
      expect(result.dialect.delimiter).toBe(",");
      expect(result.dialect.skipInitialSpace).toBe(true);
    });

    test("detects single quotes", () => {
      const result = sniff("'x,y',1\n'z',2\n");
      expect(result.dialect.quote).toBe("'");
      expect(result.columns).toBe(2);
    });

    test("handles quoted fields spanning lines", () => {
      const result = sniff('name,note\r\nSam,"line one\r\nline two"\r\nAnn,plain\r\n');

      expect(result.dialect.delimiter).toBe(",");
      expect(result.hasHeaders).toBe(true);
      expect(result.columns).toBe(2);
    });

    test("sniffs a file with a multi-line field", () => {
      const result = sniff(readFileSync(MULTILINE_CSV, "utf8"));

      expect(result.dialect.delimiter).toBe(",");
      expect(result.format).toBe("csv");
      expect(result.hasHeaders).toBe(true);
      expect(result.columns).toBe(2);
    });

    test("fails without a delimiter", () => {
      expect(() => sniff("")).toThrow(new ParseError("Could not determine delimiter", "DSV"));
    });

    test("reads a stream sample", async () => {
      const result = await sniffStream(textStream("a\tb\n", "1\t2\n"));
      expect(result.dialect.delimiter).toBe("\t");
      expect(result.format).toBe("tsv");
    });
  });
});
