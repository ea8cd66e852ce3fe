/**
 * DSV tokenizer tests
 */

import { describe, expect, test } from "vitest";
import { DSVParseError } from "../../src/errors";
import { resolveDialect } from "../../src/formats/dsv/dialect";
import { DSVTokenizer, parseCSVRow, splitTerminator } from "../../src/formats/dsv/state-machine";

const values = (tokens: { value: string }[] | null): string[] | null =>
  tokens === null ? null : tokens.map((token) => token.value);

describe("splitTerminator", () => {
  test("separates each kind of line ending", () => {
    expect(splitTerminator("a,b\r\n")).toEqual({ body: "a,b", terminator: "\r\n" });
    expect(splitTerminator("a,b\n")).toEqual({ body: "a,b", terminator: "\n" });
    expect(splitTerminator("a,b\r")).toEqual({ body: "a,b", terminator: "\r" });
    expect(splitTerminator("a,b")).toEqual({ body: "a,b", terminator: "" });
  });
});

describe("DSVTokenizer", () => {
  const excel = resolveDialect({});

  test("splits unquoted fields", () => {
    const tokenizer = new DSVTokenizer(excel);
    expect(tokenizer.feed("a,b,c\r\n", 1)).toEqual([
      { value: "a", quoted: false },
      { value: "b", quoted: false },
      { value: "c", quoted: false },
    ]);
  });

  test("keeps delimiters inside quoted fields", () => {
    const tokenizer = new DSVTokenizer(excel);
    expect(tokenizer.feed('"a,b",c\n')).toEqual([
      { value: "a,b", quoted: true },
      { value: "c", quoted: false },
    ]);
  });

  test("collapses doubled quotes", () => {
    const tokenizer = new DSVTokenizer(excel);
    expect(values(tokenizer.feed('"say ""hi""",x'))).toEqual(['say "hi"', "x"]);
  });

  test("treats a quote inside an unquoted field as text", () => {
    const tokenizer = new DSVTokenizer(excel);
    expect(values(tokenizer.feed('5" pipe,x'))).toEqual(['5" pipe', "x"]);
  });

  test("continues a quoted field across lines", () => {
    const tokenizer = new DSVTokenizer(excel);

    expect(tokenizer.feed('1,"two\n', 1)).toBeNull();
    expect(tokenizer.pending).toBe(true);
    expect(values(tokenizer.feed('lines",3\n', 2))).toEqual(["1", "two\nlines", "3"]);
    expect(tokenizer.pending).toBe(false);
  });

  test("joins lines without terminators with a newline", () => {
    const tokenizer = new DSVTokenizer(excel);

    expect(tokenizer.feed('"a')).toBeNull();
    expect(values(tokenizer.feed('b"'))).toEqual(["a\nb"]);
  });

  test("returns an empty record for a blank line", () => {
    const tokenizer = new DSVTokenizer(excel);
    expect(tokenizer.feed("\r\n")).toEqual([]);
    expect(tokenizer.feed("")).toEqual([]);
  });

  test("keeps a trailing empty field", () => {
    const tokenizer = new DSVTokenizer(excel);
    expect(values(tokenizer.feed("a,\n"))).toEqual(["a", ""]);
    expect(values(tokenizer.feed(",\n"))).toEqual(["", ""]);
  });

  test("rejects characters after a closing quote in strict mode", () => {
    const tokenizer = new DSVTokenizer(resolveDialect({ strict: true }));

    expect(() => tokenizer.feed('"a"x,b', 3)).toThrow(
      'Delimiter expected after closing quote, found "x" (line 3, column 4, field "a")'
    );
  });

  test("keeps characters after a closing quote otherwise", () => {
    const tokenizer = new DSVTokenizer(excel);
    expect(tokenizer.feed('"a"x,b')).toEqual([
      { value: "ax", quoted: true },
      { value: "b", quoted: false },
    ]);
  });

  test("reads quote characters literally under quoting none", () => {
    const tokenizer = new DSVTokenizer(resolveDialect({ quoting: "none" }));
    expect(tokenizer.feed('"a",b')).toEqual([
      { value: '"a"', quoted: false },
      { value: "b", quoted: false },
    ]);
  });

  test("honors the escape character", () => {
    const tokenizer = new DSVTokenizer(resolveDialect({ escapeChar: "\\" }));

    expect(values(tokenizer.feed("a\\,b,c"))).toEqual(["a,b", "c"]);
    expect(values(tokenizer.feed('"q\\"x",y'))).toEqual(['q"x', "y"]);
  });

  test("continues a field after an escaped line break", () => {
    const tokenizer = new DSVTokenizer(resolveDialect({ escapeChar: "\\" }));

    expect(tokenizer.feed("a\\\n")).toBeNull();
    expect(values(tokenizer.feed("b,c\n"))).toEqual(["a\nb", "c"]);
  });

  test("skips spaces after delimiters when configured", () => {
    const tokenizer = new DSVTokenizer(resolveDialect({ skipInitialSpace: true }));

    expect(values(tokenizer.feed("a, b,  c"))).toEqual(["a", "b", "c"]);
    expect(values(tokenizer.feed('a, "b,c"'))).toEqual(["a", "b,c"]);
  });

  test("finish rejects an unclosed quoted field", () => {
    const tokenizer = new DSVTokenizer(excel);

    expect(tokenizer.feed('x,"abc\n', 1)).toBeNull();
    expect(() => tokenizer.finish(1)).toThrow(DSVParseError);
    expect(tokenizer.pending).toBe(false);
  });

  test("finish accepts a completed record", () => {
    const tokenizer = new DSVTokenizer(excel);
    tokenizer.feed("a,b\n");
    expect(() => tokenizer.finish(1)).not.toThrow();
  });

  test("enforces the field size limit", () => {
    const tokenizer = new DSVTokenizer(excel, 5);

    expect(() => tokenizer.feed("123456,a", 7)).toThrow(
      "Field larger than field limit (6 > 5 characters) (line 7)"
    );
  });

  test("reset drops a partial record", () => {
    const tokenizer = new DSVTokenizer(excel);

    tokenizer.feed('"open\n');
    tokenizer.reset();
    expect(values(tokenizer.feed("a,b\n"))).toEqual(["a", "b"]);
  });
});

describe("parseCSVRow", () => {
  test("parses a single line", () => {
    expect(parseCSVRow("x|y", "|")).toEqual(["x", "y"]);
  });

  test("parses fields with embedded newlines", () => {
    expect(parseCSVRow('a,"b\nc",d')).toEqual(["a", "b\nc", "d"]);
  });

  test("throws on an unclosed quote", () => {
    expect(() => parseCSVRow('a,"b')).toThrow(DSVParseError);
  });
});
