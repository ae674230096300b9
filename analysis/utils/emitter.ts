import { writeFileSync, mkdirSync } from "fs";
import { dirname } from "path";
import { stringify } from "csv-stringify/sync";

export type Cell = string | number | boolean;
export type OutRow = Record<string, Cell>;

export function ensureDir(p: string) {
  mkdirSync(p, { recursive: true });
}

export function formatCell(v: Cell): string {
  if (typeof v === "boolean") return v ? "True" : "False";
  return String(v);
}

export function toCSV(columns: string[], rows: OutRow[]): string {
  const body = rows.map(r => columns.map(c => formatCell(r[c] ?? "")));
  return stringify([columns, ...body]);
}

export function emitCSV(path: string, columns: string[], rows: OutRow[]): string {
  ensureDir(dirname(path));
  writeFileSync(path, toCSV(columns, rows));
  return path;
}
