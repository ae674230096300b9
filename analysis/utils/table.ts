import { readFileSync, existsSync } from "fs";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { PreconditionError } from "../errors.js";
import type { ColumnMap, CourseRow } from "../analyzer.types.js";

export type Table = {
  columns: string[];
  rows: CourseRow[];
};

const CsvCells = z.array(z.array(z.string()));
const NdjsonRecord = z.record(z.unknown());

function cellText(v: unknown): string {
  if (v === null || v === undefined) return "";
  return typeof v === "string" ? v : String(v);
}

export function parseCSVRows(text: string): string[][] {
  const raw: unknown = parse(text, { bom: true, skip_empty_lines: true, relax_column_count: true });
  return CsvCells.parse(raw);
}

export function parseCSV(text: string): Table {
  const [header, ...body] = parseCSVRows(text);
  if (!header) return { columns: [], rows: [] };
  const rows = body.map(cells => {
    const row: CourseRow = {};
    header.forEach((col, i) => { row[col] = cells[i] ?? ""; });
    return row;
  });
  return { columns: header, rows };
}

export function parseNDJSON(text: string): Table {
  const t = text.trim();
  if (!t) return { columns: [], rows: [] };
  const columns: string[] = [];
  const seen = new Set<string>();
  const records = t.split("\n").filter(l => l.trim()).map(l => NdjsonRecord.parse(JSON.parse(l)));
  for (const rec of records) {
    for (const k of Object.keys(rec)) {
      if (!seen.has(k)) { seen.add(k); columns.push(k); }
    }
  }
  const rows = records.map(rec => {
    const row: CourseRow = {};
    for (const c of columns) row[c] = cellText(rec[c]);
    return row;
  });
  return { columns, rows };
}

/** CSV by default; NDJSON when the path ends in .ndjson. */
export function readTable(p: string): Table {
  if (!existsSync(p)) {
    throw new PreconditionError("INPUT_NOT_FOUND", `Course table not found: ${p}`);
  }
  const text = readFileSync(p, "utf8");
  return p.endsWith(".ndjson") ? parseNDJSON(text) : parseCSV(text);
}

export function requireColumns(table: Table, cols: ColumnMap) {
  const missing = [cols.prefix, cols.number, cols.title, cols.description]
    .filter(c => !table.columns.includes(c));
  if (missing.length) {
    throw new PreconditionError("MISSING_COLUMNS", `Missing required columns: ${missing.join(", ")}`);
  }
}
