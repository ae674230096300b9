import type { PatternRule, RuleSet, Tier } from "../analyzer.types.js";

export type TierHits = Record<Tier, boolean>;

function anyMatch(text: string, rules: readonly PatternRule[], tier: Tier): boolean {
  return rules.some(r => r.tier === tier && r.pattern.test(text));
}

export function tierHits(text: string, ruleSet: RuleSet): TierHits {
  if (!text) return { primary: false, secondary: false, context: false };
  return {
    primary: anyMatch(text, ruleSet.rules, "primary"),
    secondary: anyMatch(text, ruleSet.rules, "secondary"),
    context: anyMatch(text, ruleSet.rules, "context"),
  };
}

/**
 * Labels of every rule that fires, distinct and sorted. Unlabeled rules
 * report their pattern source.
 */
export function matchedLabels(text: string, ruleSet: RuleSet): string[] {
  if (!text) return [];
  const labels = new Set<string>();
  for (const rule of ruleSet.rules) {
    if (rule.pattern.test(text)) labels.add(rule.label ?? rule.pattern.source);
  }
  return Array.from(labels).sort();
}

/**
 * Tiered: primary, or secondary backed by a context term.
 * Labeled: any rule at all.
 */
export function classifyTiers(text: string, ruleSet: RuleSet): boolean {
  if (ruleSet.gating === "labeled") return matchedLabels(text, ruleSet).length > 0;
  const hits = tierHits(text, ruleSet);
  return hits.primary || (hits.secondary && hits.context);
}
