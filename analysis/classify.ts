import { courseText } from "./matchers/normalize.js";
import { classifyTiers, matchedLabels } from "./matchers/tiers.js";
import { bestFuzzyMatch, isFuzzyMatch } from "./matchers/fuzzy.js";
import type {
  ClassificationResult,
  ClassifiedRow,
  ColumnMap,
  CourseRow,
  EthicsMatcher,
  FuzzyMatch,
  FuzzyOptions,
  RuleSet,
} from "./analyzer.types.js";

const NO_FUZZY: FuzzyMatch = { score: 0, phrase: "" };

export type ClassifierOptions = {
  ruleSet: RuleSet;
  fuzzy: FuzzyOptions;
  ethics: EthicsMatcher;
};

/**
 * Flags for one course. The joined text is normalized once and shared by
 * every rule and the fuzzy pass; the ethics matcher gets the raw fields.
 */
export function classifyRow(
  title: string | null | undefined,
  description: string | null | undefined,
  opts: ClassifierOptions,
): ClassificationResult {
  const rawTitle = title ?? "";
  const rawDescription = description ?? "";
  const text = courseText(rawTitle, rawDescription);

  const labeled = opts.ruleSet.gating === "labeled";
  const labels = labeled ? matchedLabels(text, opts.ruleSet) : [];
  const tiered = labeled ? labels.length > 0 : classifyTiers(text, opts.ruleSet);
  const fuzzy = opts.fuzzy.enabled ? bestFuzzyMatch(text, opts.ruleSet.fuzzyPhrases) : NO_FUZZY;
  const fuzzyMatched = isFuzzyMatch(fuzzy, opts.fuzzy);

  return {
    is_ai_related: tiered || fuzzyMatched,
    is_ethics_related: opts.ethics.isMatch(rawTitle, rawDescription),
    matchedLabels: labels,
    fuzzy,
    fuzzyMatched,
  };
}

export function classifyRows(rows: CourseRow[], cols: ColumnMap, opts: ClassifierOptions): ClassifiedRow[] {
  return rows.map(row => ({
    row,
    result: classifyRow(row[cols.title], row[cols.description], opts),
  }));
}

/** Display form of a broad-recall match: labels, else the fuzzy phrase. */
export function matchReason(result: ClassificationResult): string {
  if (result.matchedLabels.length) return result.matchedLabels.join(",");
  if (result.fuzzyMatched && result.fuzzy.phrase) return `fuzzy:${result.fuzzy.phrase}`;
  return "";
}
