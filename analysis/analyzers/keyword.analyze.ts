import { join } from "path";
import { aggregate } from "../aggregate.js";
import { classifyTable, FLAG_COLUMNS, outputColumns } from "../pipeline.js";
import { emitCSV } from "../utils/emitter.js";
import { readEmptyPrefixes } from "../utils/gaps.js";
import { KeywordEthicsMatcher } from "../matchers/ethics.js";
import type { AnalysisConfig } from "../config.js";
import type { EthicsMatcher } from "../analyzer.types.js";

export const KEYWORD_OUTPUTS = {
  full: "courses_with_ai_flag.csv",
  aiSubset: "courses_keyword_ai_subset.csv",
  prefixSummary: "prefix_summary.csv",
  gaps: "gap_report.csv",
};

// Legacy keyword list as plain substrings, plus a per-prefix AI count and the scraper's gap list
export function analyzeKeyword(cfg: AnalysisConfig, ethics: EthicsMatcher = KeywordEthicsMatcher.build()) {
  const { table, classified } = classifyTable(cfg, "keyword", ethics);
  const { aiSubset, prefixSummary } = aggregate(classified, cfg.columns);

  const full = emitCSV(join(cfg.outdir, KEYWORD_OUTPUTS.full), outputColumns(table.columns, FLAG_COLUMNS),
    classified.map(({ row, result }) => ({
      ...row,
      is_ai_related: result.is_ai_related,
      is_ethics_related: result.is_ethics_related,
    })));

  const subsetCols = outputColumns(table.columns.filter(c => !FLAG_COLUMNS.includes(c)), ["is_ai_related"]);
  const subset = emitCSV(join(cfg.outdir, KEYWORD_OUTPUTS.aiSubset), subsetCols,
    aiSubset.map(c => ({ ...c.row, is_ai_related: c.is_ai_related })));

  const summary = emitCSV(join(cfg.outdir, KEYWORD_OUTPUTS.prefixSummary),
    ["prefix", "total_courses", "ai_related_courses"],
    prefixSummary.map(p => ({ ...p })));

  const gaps = emitCSV(join(cfg.outdir, KEYWORD_OUTPUTS.gaps), ["prefix"],
    readEmptyPrefixes(cfg.emptyPrefixes).map(prefix => ({ prefix })));

  console.log("Analysis complete.");
  console.log(`Full course list with AI flag: ${full}`);
  console.log(`AI-only subset: ${subset}`);
  console.log(`Prefix summary: ${summary}`);
  console.log(`Gap report: ${gaps}`);
}
