import { join } from "path";
import { dedupeByCourse } from "../aggregate.js";
import { matchReason } from "../classify.js";
import { classifyTable, FLAG_COLUMNS, outputColumns } from "../pipeline.js";
import { emitCSV } from "../utils/emitter.js";
import { KeywordEthicsMatcher } from "../matchers/ethics.js";
import type { AnalysisConfig } from "../config.js";
import type { EthicsMatcher } from "../analyzer.types.js";

export const CANDIDATE_COLUMNS = [
  "is_ai_candidate",
  "ai_candidate_reason",
  "ai_candidate_fuzzy_phrase",
  "ai_candidate_fuzzy_score",
];

/**
 * Permissive recall pass. Output is a review list, not a verdict: every
 * candidate carries the labels (or fuzzy phrase) that put it there.
 */
export function analyzeBroad(cfg: AnalysisConfig, ethics: EthicsMatcher = KeywordEthicsMatcher.build()) {
  const { table, classified } = classifyTable(cfg, "broad", ethics);

  const candidates = dedupeByCourse(classified.filter(c => c.result.is_ai_related), cfg.columns, c => c.row);
  const cols = outputColumns(table.columns.filter(c => !FLAG_COLUMNS.includes(c)), CANDIDATE_COLUMNS);

  const out = cfg.candidatesOutput ?? join(cfg.outdir, "courses_ai_candidates.csv");
  emitCSV(out, cols, candidates.map(({ row, result }) => ({
    ...row,
    is_ai_candidate: result.is_ai_related,
    ai_candidate_reason: matchReason(result),
    ai_candidate_fuzzy_phrase: result.fuzzyMatched ? result.fuzzy.phrase : "",
    ai_candidate_fuzzy_score: result.fuzzy.score,
  })));

  console.log(`Wrote ${candidates.length} AI candidates to ${out}`);
}
