import { existsSync } from "fs";
import { join } from "path";
import { readTable } from "./utils/table.js";
import { PRECISE_OUTPUTS } from "./analyzers/precise.analyze.js";

export type QaReport = {
  rowCount: number;
  uniqueCourses: number;
  aiRelatedCourses: number;
  prefixes: number;
  prefixTotalsSum: number;
  totalsConsistent: boolean;
  pctAiRelated: number;
};

function rowsOf(p: string) {
  return existsSync(p) ? readTable(p).rows : [];
}

/** Re-reads the precise analyzer's tables and checks they agree with each other. */
export function buildQaReport(outdir: string): QaReport {
  const full = rowsOf(join(outdir, PRECISE_OUTPUTS.full));
  const subset = rowsOf(join(outdir, PRECISE_OUTPUTS.aiSubset));
  const totals = rowsOf(join(outdir, PRECISE_OUTPUTS.prefixTotals));
  const summary = rowsOf(join(outdir, PRECISE_OUTPUTS.summary));

  const uniqueCourses = Number(summary.find(r => r.metric === "total_unique_courses")?.value ?? 0);
  const prefixTotalsSum = totals.reduce((n, r) => n + Number(r.total_courses ?? 0), 0);
  const pct = uniqueCourses ? (subset.length / uniqueCourses) * 100 : 0;

  return {
    rowCount: full.length,
    uniqueCourses,
    aiRelatedCourses: subset.length,
    prefixes: totals.length,
    prefixTotalsSum,
    totalsConsistent: prefixTotalsSum === uniqueCourses,
    pctAiRelated: Number(pct.toFixed(1)),
  };
}

export function runQa(outdir: string) {
  const report = buildQaReport(outdir);
  console.log(JSON.stringify(report, null, 2));
  if (!report.totalsConsistent) {
    console.warn(`WARN prefix totals (${report.prefixTotalsSum}) do not sum to unique courses (${report.uniqueCourses})`);
  }
}
