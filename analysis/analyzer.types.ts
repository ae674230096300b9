
export type CourseRow = Record<string, string>;

export type ColumnMap = {
  prefix: string;
  number: string;
  title: string;
  description: string;
};

export const DEFAULT_COLUMNS: ColumnMap = {
  prefix: "prefix",
  number: "number",
  title: "title",
  description: "description",
};

export type Tier = "primary" | "secondary" | "context";

export type PatternRule = {
  pattern: RegExp;
  tier: Tier;
  label?: string;           // broad-recall diagnostics only, never gates
};

export type RuleSet = {
  name: string;
  gating: "tiered" | "labeled";
  rules: readonly PatternRule[];
  fuzzyPhrases: readonly string[];   // already normalized
  fuzzyThreshold: number;   // default for this rule set
};

export type FuzzyOptions = {
  enabled: boolean;
  threshold: number;
};

export type FuzzyMatch = {
  score: number;
  phrase: string;           // "" when nothing scored
};

export type ClassificationResult = {
  is_ai_related: boolean;
  is_ethics_related: boolean;
  matchedLabels: string[];  // distinct, sorted; empty outside labeled rule sets
  fuzzy: FuzzyMatch;
  fuzzyMatched: boolean;
};

export type ClassifiedRow = {
  row: CourseRow;
  result: ClassificationResult;
};

export type UniqueCourse = {
  row: CourseRow;           // canonical row
  is_ai_related: boolean;   // OR across every duplicate
};

export type PrefixSummary = {
  prefix: string;
  total_courses: number;
  ai_related_courses: number;
};

export type GlobalSummary = {
  metric: "total_unique_courses";
  value: number;
};

export type Aggregation = {
  uniqueCourses: UniqueCourse[];
  aiSubset: UniqueCourse[];
  prefixSummary: PrefixSummary[];
  globalSummary: GlobalSummary;
};

export interface EthicsMatcher {
  isMatch: (title: string, description: string) => boolean;
}
