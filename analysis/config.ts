import { z } from "zod";
import { PreconditionError } from "./errors.js";
import type { ColumnMap } from "./analyzer.types.js";

/** "1"/"true" → true, "0"/"false" → false; anything else fails validation. */
const envBool = (defaultValue: boolean) =>
  z
    .preprocess((v) => {
      if (v == null || v === "") return undefined;
      if (v === "1" || v === "true" || v === true) return true;
      if (v === "0" || v === "false" || v === false) return false;
      return v;
    }, z.boolean().optional())
    .transform((v) => v ?? defaultValue);

const optionalString = z.preprocess((v) => (v === "" ? undefined : v), z.string().optional());

const EnvSchema = z.object({
  ANALYSIS_INPUT: z.string().min(1).default("outputs/courses.csv"),
  ANALYSIS_OUTDIR: z.string().min(1).default("outputs"),
  ANALYSIS_PREFIX_COL: z.string().min(1).default("prefix"),
  ANALYSIS_NUMBER_COL: z.string().min(1).default("number"),
  ANALYSIS_TITLE_COL: z.string().min(1).default("title"),
  ANALYSIS_DESCRIPTION_COL: z.string().min(1).default("description"),
  // Unset means the analyzer's own default
  ANALYSIS_FUZZY_THRESHOLD: z.preprocess(
    (v) => (typeof v === "string" && v.trim() === "") || v == null ? undefined : v,
    z.coerce.number().int().min(0).max(100).optional(),
  ),
  ANALYSIS_DISABLE_FUZZY: envBool(false),
  ANALYSIS_EMPTY_PREFIXES: z.string().min(1).default("outputs/empty_prefixes.csv"),
  ANALYSIS_CANDIDATES_OUTPUT: optionalString,
});

// --flag-name → ANALYSIS_* variable
const FLAG_TO_ENV: Record<string, keyof z.input<typeof EnvSchema>> = {
  "input": "ANALYSIS_INPUT",
  "outdir": "ANALYSIS_OUTDIR",
  "prefix-col": "ANALYSIS_PREFIX_COL",
  "number-col": "ANALYSIS_NUMBER_COL",
  "title-col": "ANALYSIS_TITLE_COL",
  "description-col": "ANALYSIS_DESCRIPTION_COL",
  "fuzzy-threshold": "ANALYSIS_FUZZY_THRESHOLD",
  "disable-fuzzy": "ANALYSIS_DISABLE_FUZZY",
  "empty-prefixes": "ANALYSIS_EMPTY_PREFIXES",
  "output": "ANALYSIS_CANDIDATES_OUTPUT",
};

export type AnalysisConfig = {
  input: string;
  outdir: string;
  columns: ColumnMap;
  fuzzyThreshold: number | undefined;
  disableFuzzy: boolean;
  emptyPrefixes: string;
  candidatesOutput: string | undefined;
};

export function parseFlags(argv: string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const arg of argv) {
    const m = arg.match(/^--([a-z-]+)(?:=(.*))?$/);
    const envKey = m && Object.hasOwn(FLAG_TO_ENV, m[1]) ? FLAG_TO_ENV[m[1]] : undefined;
    if (!m || !envKey) {
      throw new PreconditionError("INVALID_CONFIG", `Unknown argument: ${arg}`);
    }
    out[envKey] = m[2] ?? "true";
  }
  return out;
}

/** Flags win over the environment. */
export function loadConfig(argv: string[] = [], env: NodeJS.ProcessEnv = process.env): AnalysisConfig {
  const raw: Record<string, string | undefined> = {};
  for (const key of Object.values(FLAG_TO_ENV)) raw[key] = env[key];
  Object.assign(raw, parseFlags(argv));

  const parsed = EnvSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new PreconditionError("INVALID_CONFIG", `Invalid configuration: ${detail}`);
  }
  const e = parsed.data;
  return {
    input: e.ANALYSIS_INPUT,
    outdir: e.ANALYSIS_OUTDIR,
    columns: {
      prefix: e.ANALYSIS_PREFIX_COL,
      number: e.ANALYSIS_NUMBER_COL,
      title: e.ANALYSIS_TITLE_COL,
      description: e.ANALYSIS_DESCRIPTION_COL,
    },
    fuzzyThreshold: e.ANALYSIS_FUZZY_THRESHOLD,
    disableFuzzy: e.ANALYSIS_DISABLE_FUZZY,
    emptyPrefixes: e.ANALYSIS_EMPTY_PREFIXES,
    candidatesOutput: e.ANALYSIS_CANDIDATES_OUTPUT,
  };
}
