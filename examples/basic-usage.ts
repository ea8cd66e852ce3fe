#!/usr/bin/env node
/**
 * Reading and writing delimited text
 *
 * Run with `npm run example`.
 */

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import {
  DSVParser,
  DSVRecordParser,
  DSVRecordWriter,
  DSVWriter,
  openRecordWriter,
  registerDialect,
  sniff,
  StringSink,
} from "../src";

// ============================================================================
// Example 1: Positional rows, one at a time and in a batch
// ============================================================================

function example1_positionalRows() {
  console.log("\n=== Example 1: Positional Rows ===\n");

  const sink = new StringSink();
  const writer = new DSVWriter(sink, { delimiter: "\t", quoting: "nonnumeric" });

  writer.writeRow(["Name", "Age", "Occupation"]);
  writer.writeRows([
    ["John", 30, "Plumber"],
    ["Cindy", 45, "CEO"],
  ]);

  console.log("Written:");
  console.log(JSON.stringify(sink.toString()));

  const parser = new DSVParser({ delimiter: "\t", quoting: "nonnumeric" });
  for (const row of parser.parseString(sink.toString())) {
    console.log(`  line ${parser.lineNumber}:`, row);
  }
}

// ============================================================================
// Example 2: Named records through a file
// ============================================================================

async function example2_namedRecords() {
  console.log("\n=== Example 2: Named Records ===\n");

  const dir = mkdtempSync(join(tmpdir(), "delimit-example-"));
  const path = join(dir, "people.tsv");
  const columns = ["Name", "Age", "Occupation"];

  try {
    const options = { dialect: "excel-tab", quoting: "nonnumeric" } as const;

    await openRecordWriter(path, columns, options, (writer) => {
      writer.writeHeader();
      writer.writeRecord({ Name: "Sara", Age: 28, Occupation: "Clerk" });
      writer.writeRecords([
        { Name: "James", Age: 19, Occupation: "Stock Boy" },
        { Occupation: "Baker", Name: "Sam" },
      ]);
    }).catch((error: unknown) => {
      // The last record has no Age
      console.log("  rejected:", error instanceof Error ? error.message : error);
    });

    const parser = new DSVRecordParser(options);
    for await (const record of parser.parseFile(path)) {
      console.log(`  line ${record.lineNumber}:`, record.fields);
    }
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}

// ============================================================================
// Example 3: Custom dialects and detection
// ============================================================================

function example3_dialects() {
  console.log("\n=== Example 3: Dialects and Detection ===\n");

  registerDialect("pipes", { delimiter: "|", quoting: "all", lineTerminator: "\n" });

  const sink = new StringSink();
  const writer = new DSVRecordWriter(sink, ["id", "note"], { dialect: "pipes", restValue: "" });
  writer.writeHeader();
  writer.writeRecords([{ id: 1, note: "first|second" }, { id: 2 }]);
  console.log(sink.toString());

  const { dialect, hasHeaders, format } = sniff(sink.toString());
  console.log(`  detected ${format}: delimiter ${JSON.stringify(dialect.delimiter)}`);
  console.log(`  header row: ${hasHeaders}`);
}

async function main() {
  try {
    example1_positionalRows();
    await example2_namedRecords();
    example3_dialects();
  } catch (error) {
    console.error("Error running examples:", error);
    process.exit(1);
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  await main();
}

export { main };
