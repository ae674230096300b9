import { join } from "path";
import { aggregate } from "../aggregate.js";
import { classifyTable, FLAG_COLUMNS, outputColumns } from "../pipeline.js";
import { emitCSV } from "../utils/emitter.js";
import { KeywordEthicsMatcher } from "../matchers/ethics.js";
import type { AnalysisConfig } from "../config.js";
import type { EthicsMatcher } from "../analyzer.types.js";

export const PRECISE_OUTPUTS = {
  full: "courses_with_flag.csv",
  aiSubset: "courses_ai_subset.csv",
  prefixTotals: "prefix_totals.csv",
  summary: "summary.csv",
};

/**
 * Primary terms, context-gated secondary terms and a strict fuzzy
 * fallback (95 unless overridden).
 */
export function analyzePrecise(cfg: AnalysisConfig, ethics: EthicsMatcher = KeywordEthicsMatcher.build()) {
  const { table, classified } = classifyTable(cfg, "precise", ethics);
  const { uniqueCourses, aiSubset, prefixSummary, globalSummary } = aggregate(classified, cfg.columns);

  const fullCols = outputColumns(table.columns, FLAG_COLUMNS);
  const full = emitCSV(join(cfg.outdir, PRECISE_OUTPUTS.full), fullCols, classified.map(({ row, result }) => ({
    ...row,
    is_ai_related: result.is_ai_related,
    is_ethics_related: result.is_ethics_related,
  })));

  const subsetCols = outputColumns(table.columns.filter(c => !FLAG_COLUMNS.includes(c)), ["is_ai_related"]);
  const subset = emitCSV(join(cfg.outdir, PRECISE_OUTPUTS.aiSubset), subsetCols,
    aiSubset.map(c => ({ ...c.row, is_ai_related: c.is_ai_related })));

  const totals = emitCSV(join(cfg.outdir, PRECISE_OUTPUTS.prefixTotals), ["prefix", "total_courses"],
    prefixSummary.map(p => ({ prefix: p.prefix, total_courses: p.total_courses })));

  const summary = emitCSV(join(cfg.outdir, PRECISE_OUTPUTS.summary), ["metric", "value"], [{ ...globalSummary }]);

  console.log("Analysis complete.");
  console.log(`Full course list with AI flag: ${full}`);
  console.log(`AI-only subset (${aiSubset.length} of ${uniqueCourses.length} unique): ${subset}`);
  console.log(`Prefix totals: ${totals}`);
  console.log(`Summary: ${summary}`);
}
