import { loadRuleSet } from "./rules/load.js";
import { classifyRows } from "./classify.js";
import { readTable, requireColumns, type Table } from "./utils/table.js";
import type { AnalysisConfig } from "./config.js";
import type { ClassifiedRow, EthicsMatcher, FuzzyOptions, RuleSet } from "./analyzer.types.js";

export type Classification = {
  table: Table;
  ruleSet: RuleSet;
  fuzzy: FuzzyOptions;
  classified: ClassifiedRow[];
};

export const FLAG_COLUMNS = ["is_ai_related", "is_ethics_related"];

/** Input columns first, derived columns last; stale copies of derived columns are dropped. */
export function outputColumns(input: string[], derived: string[]): string[] {
  return [...input.filter(c => !derived.includes(c)), ...derived];
}

/** Load → validate → classify. Every precondition fails before the first row is touched. */
export function classifyTable(cfg: AnalysisConfig, ruleSetName: string, ethics: EthicsMatcher): Classification {
  const ruleSet = loadRuleSet(ruleSetName);
  const table = readTable(cfg.input);
  requireColumns(table, cfg.columns);

  const fuzzy: FuzzyOptions = {
    enabled: !cfg.disableFuzzy,
    threshold: cfg.fuzzyThreshold ?? ruleSet.fuzzyThreshold,
  };
  const classified = classifyRows(table.rows, cfg.columns, { ruleSet, fuzzy, ethics });
  return { table, ruleSet, fuzzy, classified };
}
