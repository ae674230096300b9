// ---------------------------------------------------------------------------
// Unit Tests: table reading and CSV emission
// ---------------------------------------------------------------------------

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { parseCSV, parseNDJSON, readTable, requireColumns } from "../../analysis/utils/table.js";
import { emitCSV, formatCell, toCSV } from "../../analysis/utils/emitter.js";
import { PreconditionError } from "../../analysis/errors.js";
import { DEFAULT_COLUMNS } from "../../analysis/analyzer.types.js";

describe("parseCSV", () => {
  it("keeps every column, passthrough included", () => {
    const t = parseCSV('prefix,number,title,description,term\nCS,101,"Intro, AI",,Fall 2024\n');
    expect(t.columns).toEqual(["prefix", "number", "title", "description", "term"]);
    expect(t.rows).toEqual([
      { prefix: "CS", number: "101", title: "Intro, AI", description: "", term: "Fall 2024" },
    ]);
  });

  it("fills short rows with empty cells", () => {
    expect(parseCSV("a,b\n1\n").rows).toEqual([{ a: "1", b: "" }]);
  });

  it("is empty for empty text", () => {
    expect(parseCSV("")).toEqual({ columns: [], rows: [] });
  });
});

describe("parseNDJSON", () => {
  it("unions keys in first-seen order and stringifies values", () => {
    const t = parseNDJSON('{"prefix":"CS","number":101,"title":null}\n{"prefix":"EE","extra":true}\n');
    expect(t.columns).toEqual(["prefix", "number", "title", "extra"]);
    expect(t.rows).toEqual([
      { prefix: "CS", number: "101", title: "", extra: "" },
      { prefix: "EE", number: "", title: "", extra: "true" },
    ]);
  });
});

describe("requireColumns", () => {
  it("names the missing columns", () => {
    const t = parseCSV("prefix,number,title\n");
    expect(() => requireColumns(t, DEFAULT_COLUMNS)).toThrow("Missing required columns: description");
  });

  it("passes when all columns exist", () => {
    const t = parseCSV("prefix,number,title,description\n");
    expect(() => requireColumns(t, DEFAULT_COLUMNS)).not.toThrow();
  });
});

describe("CSV emission", () => {
  it("renders booleans the way the report tables expect", () => {
    expect(formatCell(true)).toBe("True");
    expect(formatCell(false)).toBe("False");
    expect(formatCell(4)).toBe("4");
  });

  it("quotes cells that need it", () => {
    expect(toCSV(["a", "b"], [{ a: true, b: "x,y" }])).toBe('a,b\nTrue,"x,y"\n');
  });
});

describe("file round trip", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "table-spec-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("creates the output directory and reads the file back", () => {
    const p = emitCSV(join(dir, "nested", "out.csv"), ["prefix", "total_courses"], [
      { prefix: "CS", total_courses: 2 },
      { prefix: "", total_courses: 1 },
    ]);
    expect(readFileSync(p, "utf8")).toBe("prefix,total_courses\nCS,2\n,1\n");
    expect(readTable(p).rows).toEqual([
      { prefix: "CS", total_courses: "2" },
      { prefix: "", total_courses: "1" },
    ]);
  });

  it("reads NDJSON by extension", () => {
    const p = join(dir, "courses.ndjson");
    writeFileSync(p, '{"prefix":"CS","number":"101"}\n');
    expect(readTable(p).columns).toEqual(["prefix", "number"]);
  });

  it("fails before reading a missing file", () => {
    expect(() => readTable(join(dir, "missing.csv"))).toThrow(PreconditionError);
    expect(() => readTable(join(dir, "missing.csv"))).toThrow(/Course table not found/);
  });
});
