import { readFileSync, existsSync } from "fs";
import { parseCSVRows } from "./table.js";

const HEADER_CELLS = new Set(["term", "prefix"]);

/**
 * Prefixes the scraper found no courses for. Rows are either `prefix` or
 * `term,<label>,prefix`; header rows are skipped. A missing report means no gaps.
 */
export function parseEmptyPrefixes(text: string): string[] {
  const prefixes = new Set<string>();
  for (const cells of parseCSVRows(text)) {
    if (!cells.length) continue;
    if (HEADER_CELLS.has((cells[0] ?? "").trim().toLowerCase())) continue;
    const prefix = (cells.length >= 3 ? cells[2] : cells[0]).trim();
    if (prefix) prefixes.add(prefix);
  }
  return Array.from(prefixes).sort();
}

export function readEmptyPrefixes(p: string): string[] {
  if (!existsSync(p)) {
    console.warn(`WARN empty-prefix report not found at ${p}; gap report will be empty`);
    return [];
  }
  return parseEmptyPrefixes(readFileSync(p, "utf8"));
}
