// ---------------------------------------------------------------------------
// Unit Tests: tiered and labeled rule evaluation
// ---------------------------------------------------------------------------

import { describe, expect, it } from "vitest";
import { buildRuleSet, loadRuleSet } from "../../analysis/rules/load.js";
import { classifyTiers, matchedLabels, tierHits } from "../../analysis/matchers/tiers.js";
import { normalize } from "../../analysis/matchers/normalize.js";

const precise = loadRuleSet("precise");
const broad = loadRuleSet("broad");

const synthetic = buildRuleSet({
  name: "synthetic",
  gating: "tiered",
  fuzzyThreshold: 90,
  rules: [
    { tier: "primary", pattern: "\\bneural\\b" },
    { tier: "secondary", pattern: "\\bethics\\b" },
    { tier: "context", pattern: "\\bcomputing\\b" },
  ],
  fuzzyPhrases: [],
});

describe("classifyTiers (tiered)", () => {
  it("counts a primary term on its own", () => {
    expect(classifyTiers("neural methods", synthetic)).toBe(true);
    expect(classifyTiers("intro to ai covers neural networks", precise)).toBe(true);
  });

  it("needs a context term before a secondary term counts", () => {
    expect(classifyTiers("ethics", synthetic)).toBe(false);
    expect(classifyTiers("ethics in computing", synthetic)).toBe(true);
  });

  it("does not count a context term alone", () => {
    expect(classifyTiers("computing", synthetic)).toBe(false);
  });

  it("rejects ethics without AI context", () => {
    const text = normalize("Professional Ethics Discusses moral responsibility.");
    expect(tierHits(text, precise)).toEqual({ primary: false, secondary: true, context: false });
    expect(classifyTiers(text, precise)).toBe(false);
  });

  it("accepts ethics next to artificial intelligence", () => {
    const text = normalize("This course uses artificial intelligence and raises ethics concerns.");
    expect(classifyTiers(text, precise)).toBe(true);
  });

  it("reports every tier for a mixed description", () => {
    const text = normalize("Intelligent Agents Seminar Studies artificial intelligence and autonomous systems.");
    expect(tierHits(text, precise)).toEqual({ primary: true, secondary: true, context: true });
  });

  it("is false for empty text", () => {
    expect(classifyTiers("", precise)).toBe(false);
    expect(tierHits("", precise)).toEqual({ primary: false, secondary: false, context: false });
  });

  it("never turns a match off when a primary phrase is appended", () => {
    const descriptions = ["", "studio art", "ethics of agents", "intro to ai", "autonomous systems lab"];
    for (const d of descriptions) {
      expect(classifyTiers(normalize(`${d} Machine Learning`), precise)).toBe(true);
    }
  });
});

describe("matchedLabels (labeled)", () => {
  it("returns distinct labels in sorted order", () => {
    const text = normalize("Robotics and autonomous systems with AI");
    expect(matchedLabels(text, broad)).toEqual(["ai", "autonomous", "autonomous_systems", "robotics"]);
  });

  it("collapses rules that share a label", () => {
    expect(matchedLabels("large language models and llm tools", broad)).toEqual(["llm"]);
  });

  it("falls back to the pattern source for unlabeled rules", () => {
    const rs = buildRuleSet({
      name: "unlabeled",
      gating: "labeled",
      fuzzyThreshold: 85,
      rules: [{ tier: "primary", pattern: "\\bfoo\\b" }],
      fuzzyPhrases: [],
    });
    expect(matchedLabels("foo bar", rs)).toEqual(["\\bfoo\\b"]);
    expect(classifyTiers("foo bar", rs)).toBe(true);
  });

  it("ignores secondary gating for labeled sets", () => {
    expect(classifyTiers("autonomous vehicles", broad)).toBe(true);
    expect(classifyTiers("studio art", broad)).toBe(false);
    expect(matchedLabels("", broad)).toEqual([]);
  });
});
