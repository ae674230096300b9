import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { z } from "zod";
import { normalize } from "../matchers/normalize.js";
import { PreconditionError } from "../errors.js";
import type { PatternRule, RuleSet } from "../analyzer.types.js";

const RULES_DIR = dirname(fileURLToPath(import.meta.url));

const RuleSchema = z.union([
  z.object({
    tier: z.enum(["primary", "secondary", "context"]),
    pattern: z.string().min(1),
    label: z.string().min(1).optional(),
  }),
  // Legacy keyword: plain substring of the normalized text
  z.object({
    tier: z.enum(["primary", "secondary", "context"]),
    keyword: z.string().min(1),
    label: z.string().min(1).optional(),
  }),
]);

export const RuleSetSchema = z.object({
  name: z.string().min(1),
  gating: z.enum(["tiered", "labeled"]),
  fuzzyThreshold: z.number().int().min(0).max(100),
  rules: z.array(RuleSchema).min(1),
  fuzzyPhrases: z.array(z.string()),
});

export type RuleSetDescriptor = z.infer<typeof RuleSetSchema>;

function escapeRegExp(s: string) {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function compile(source: string, setName: string): RegExp {
  try {
    return new RegExp(source);
  } catch (e) {
    throw new PreconditionError("INVALID_RULES", `Rule set ${setName}: bad pattern ${source} (${(e as Error).message})`);
  }
}

/** Compile a descriptor once; the resulting rule set is frozen. */
export function buildRuleSet(raw: unknown): RuleSet {
  const parsed = RuleSetSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new PreconditionError("INVALID_RULES", `Invalid rule set: ${detail}`);
  }
  const d = parsed.data;

  const rules: PatternRule[] = d.rules.map(r => {
    const source = "pattern" in r ? r.pattern : escapeRegExp(normalize(r.keyword));
    const rule: PatternRule = { pattern: compile(source, d.name), tier: r.tier };
    if (r.label) rule.label = r.label;
    return Object.freeze(rule);
  });

  const phrases = d.fuzzyPhrases.map(p => normalize(p)).filter(Boolean);

  return Object.freeze({
    name: d.name,
    gating: d.gating,
    rules: Object.freeze(rules),
    fuzzyPhrases: Object.freeze(phrases),
    fuzzyThreshold: d.fuzzyThreshold,
  });
}

export function loadRuleSet(name: string, dir = RULES_DIR): RuleSet {
  const p = join(dir, `${name}.json`);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(p, "utf8"));
  } catch (e) {
    throw new PreconditionError("INVALID_RULES", `Cannot read rule set ${p}: ${(e as Error).message}`);
  }
  return buildRuleSet(raw);
}
