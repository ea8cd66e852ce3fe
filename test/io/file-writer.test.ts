/**
 * Tests for file writing
 */

import { existsSync, mkdtempSync, readFileSync, rmSync, statSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { FileError } from "../../src/errors";
import { readToString } from "../../src/io/file-reader";
import { appendString, deleteFile, openForWriting, writeString } from "../../src/io/file-writer";

let fixturesDir = "";

beforeEach(() => {
  fixturesDir = mkdtempSync(join(tmpdir(), "delimit-writer-"));
});

afterEach(() => {
  rmSync(fixturesDir, { recursive: true, force: true });
});

describe("writeString", () => {
  test("writes and overwrites", async () => {
    const path = join(fixturesDir, "out.csv");

    await writeString(path, "a,b\r\n");
    await writeString(path, "c,d\r\n");

    expect(readFileSync(path, "utf8")).toBe("c,d\r\n");
  });

  test("roundtrips through readToString", async () => {
    const path = join(fixturesDir, "utf8.csv");
    const content = "name,city\r\nZoë,Kraków\r\n";

    await writeString(path, content);

    expect(await readToString(path)).toBe(content);
  });

  test("fails for a missing directory", async () => {
    const path = join(fixturesDir, "missing", "out.csv");
    await expect(writeString(path, "x")).rejects.toThrow(FileError);
  });

  test("creates directories when asked", async () => {
    const path = join(fixturesDir, "a", "b", "out.csv");

    await writeString(path, "x", { createDirectories: true });

    expect(readFileSync(path, "utf8")).toBe("x");
  });

  test("applies the file mode", async () => {
    const path = join(fixturesDir, "private.csv");

    await writeString(path, "x", { mode: 0o600 });

    expect(statSync(path).mode & 0o777).toBe(0o600);
  });

  test("rejects invalid options", async () => {
    const path = join(fixturesDir, "out.csv");
    await expect(writeString(path, "x", { mode: -1 })).rejects.toThrow("Invalid write options");
    expect(existsSync(path)).toBe(false);
  });
});

describe("appendString", () => {
  test("creates and then appends", async () => {
    const path = join(fixturesDir, "log.csv");

    await appendString(path, "a\r\n");
    await appendString(path, "b\r\n");

    expect(readFileSync(path, "utf8")).toBe("a\r\nb\r\n");
  });
});

describe("openForWriting", () => {
  test("writes several chunks through one handle", async () => {
    const path = join(fixturesDir, "chunks.csv");

    const result = await openForWriting(path, async (handle) => {
      expect(handle.path).toBe(path);
      await handle.writeString("a,b\r\n");
      await handle.writeBytes(new TextEncoder().encode("1,2\r\n"));
      return 2;
    });

    expect(result).toBe(2);
    expect(readFileSync(path, "utf8")).toBe("a,b\r\n1,2\r\n");
  });

  test("truncates an existing file", async () => {
    const path = join(fixturesDir, "truncate.csv");
    await writeString(path, "old content\r\n");

    await openForWriting(path, async (handle) => {
      await handle.writeString("new\r\n");
    });

    expect(readFileSync(path, "utf8")).toBe("new\r\n");
  });

  test("rethrows callback errors unchanged and keeps earlier writes", async () => {
    const path = join(fixturesDir, "partial.csv");
    const failure = new Error("callback failed");

    await expect(
      openForWriting(path, async (handle) => {
        await handle.writeString("kept\r\n");
        throw failure;
      })
    ).rejects.toBe(failure);

    expect(readFileSync(path, "utf8")).toBe("kept\r\n");
  });

  test("fails with FileError when the file cannot be opened", async () => {
    const path = join(fixturesDir, "missing", "out.csv");
    await expect(openForWriting(path, async () => undefined)).rejects.toThrow(FileError);
  });
});

describe("deleteFile", () => {
  test("removes a file", async () => {
    const path = join(fixturesDir, "gone.csv");
    await writeString(path, "x");

    await deleteFile(path);

    expect(existsSync(path)).toBe(false);
  });

  test("ignores a missing file", async () => {
    await expect(deleteFile(join(fixturesDir, "never.csv"))).resolves.toBeUndefined();
  });
});
