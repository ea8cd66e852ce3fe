/**
 * Error hierarchy tests
 */

import { describe, expect, test } from "vitest";
import {
  DelimitError,
  DSVParseError,
  DSVWriteError,
  ExtraFieldError,
  FieldConversionError,
  FileError,
  MissingFieldError,
  ParseError,
  ValidationError,
} from "../src/errors";

describe("DelimitError", () => {
  test("toString includes line and context", () => {
    const error = new ValidationError("bad option", 3, "delimiter");

    expect(error.toString()).toBe("ValidationError: bad option (line 3)\nContext: delimiter");
    expect(error.code).toBe("VALIDATION_ERROR");
    expect(error).toBeInstanceOf(DelimitError);
  });

  test("toString omits what is unknown", () => {
    expect(new ValidationError("bad option").toString()).toBe("ValidationError: bad option");
  });
});

describe("DSVParseError", () => {
  test("appends position details to the message", () => {
    const error = new DSVParseError("Bad field", 2, 5, "x");

    expect(error.message).toBe('Bad field (line 2, column 5, field "x")');
    expect(error.lineNumber).toBe(2);
    expect(error.column).toBe(5);
    expect(error.format).toBe("DSV");
    expect(error.code).toBe("PARSE_ERROR");
    expect(error).toBeInstanceOf(ParseError);
  });

  test("keeps a bare message without position", () => {
    expect(new DSVParseError("Bad field").message).toBe("Bad field");
  });

  test("FieldConversionError carries the value", () => {
    const error = new FieldConversionError("abc", 1, 2);

    expect(error.message).toBe('Could not convert field to number: "abc" (line 1, column 2)');
    expect(error.value).toBe("abc");
    expect(error).toBeInstanceOf(DSVParseError);
  });
});

describe("DSVWriteError", () => {
  test("MissingFieldError names the column", () => {
    const error = new MissingFieldError("Age");

    expect(error.message).toBe('Record is missing a value for column "Age"');
    expect(error.field).toBe("Age");
    expect(error.code).toBe("WRITE_ERROR");
    expect(error).toBeInstanceOf(DSVWriteError);
  });

  test("ExtraFieldError lists every extra key", () => {
    const error = new ExtraFieldError(["x", "y"]);

    expect(error.message).toBe('Record contains fields not in columns: "x", "y"');
    expect(error.extras).toEqual(["x", "y"]);
    expect(error.field).toBe("x");
  });
});

describe("FileError", () => {
  test("fromSystemError adds a suggestion", () => {
    const cause = new Error("ENOENT: no such file or directory");
    const error = FileError.fromSystemError("read", "people.csv", cause);

    expect(error.message).toBe(
      "read operation failed: ENOENT: no such file or directory. " +
        "Check that the file path is correct and the file exists"
    );
    expect(error.filePath).toBe("people.csv");
    expect(error.systemError).toBe(cause);
    expect(error.toString()).toContain("\nSystem Error: Error: ENOENT: no such file or directory");
  });

  test("fromSystemError describes platform error objects", () => {
    const error = FileError.fromSystemError("stat", "people.csv", {
      reason: "NotFound",
      message: "missing",
    });

    expect(error.message).toBe(
      "stat operation failed: NotFound: missing. " +
        "Check that the file path is correct and the file exists"
    );
  });

  test("fromSystemError passes FileError through", () => {
    const original = new FileError("already wrapped", "x.csv", "open");
    expect(FileError.fromSystemError("read", "y.csv", original)).toBe(original);
  });

  test("fromSystemError leaves unknown errors without a suggestion", () => {
    expect(FileError.fromSystemError("write", "x.csv", "disk on fire").message).toBe(
      "write operation failed: disk on fire"
    );
  });
});
