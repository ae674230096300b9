// ---------------------------------------------------------------------------
// Unit Tests: loadConfig()
// ---------------------------------------------------------------------------

import { describe, expect, it } from "vitest";
import { loadConfig, parseFlags } from "../../analysis/config.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig([], {})).toEqual({
      input: "outputs/courses.csv",
      outdir: "outputs",
      columns: { prefix: "prefix", number: "number", title: "title", description: "description" },
      fuzzyThreshold: undefined,
      disableFuzzy: false,
      emptyPrefixes: "outputs/empty_prefixes.csv",
      candidatesOutput: undefined,
    });
  });

  it("reads the environment", () => {
    const cfg = loadConfig([], {
      ANALYSIS_FUZZY_THRESHOLD: "90",
      ANALYSIS_DISABLE_FUZZY: "1",
      ANALYSIS_TITLE_COL: "course_title",
      ANALYSIS_CANDIDATES_OUTPUT: "",
    });
    expect(cfg.fuzzyThreshold).toBe(90);
    expect(cfg.disableFuzzy).toBe(true);
    expect(cfg.columns.title).toBe("course_title");
    expect(cfg.candidatesOutput).toBeUndefined();
  });

  it("lets flags override the environment", () => {
    const cfg = loadConfig(
      ["--fuzzy-threshold=80", "--disable-fuzzy", "--input=x.csv", "--output=out/c.csv"],
      { ANALYSIS_FUZZY_THRESHOLD: "90", ANALYSIS_INPUT: "y.csv" },
    );
    expect(cfg.fuzzyThreshold).toBe(80);
    expect(cfg.disableFuzzy).toBe(true);
    expect(cfg.input).toBe("x.csv");
    expect(cfg.candidatesOutput).toBe("out/c.csv");
  });

  it("rejects out-of-range thresholds", () => {
    expect(() => loadConfig(["--fuzzy-threshold=140"], {})).toThrow(/Invalid configuration/);
    expect(() => loadConfig([], { ANALYSIS_FUZZY_THRESHOLD: "high" })).toThrow(/Invalid configuration/);
  });

  it("treats a blank threshold as unset", () => {
    expect(loadConfig([], { ANALYSIS_FUZZY_THRESHOLD: "   " }).fuzzyThreshold).toBeUndefined();
  });

  it("rejects unreadable booleans", () => {
    expect(() => loadConfig([], { ANALYSIS_DISABLE_FUZZY: "maybe" })).toThrow(/Invalid configuration/);
  });
});

describe("parseFlags", () => {
  it("maps flags to their variables", () => {
    expect(parseFlags(["--outdir=tmp", "--prefix-col=subj"])).toEqual({
      ANALYSIS_OUTDIR: "tmp",
      ANALYSIS_PREFIX_COL: "subj",
    });
  });

  it("rejects unknown arguments", () => {
    expect(() => parseFlags(["--bogus=1"])).toThrow(/Unknown argument: --bogus=1/);
    expect(() => parseFlags(["precise"])).toThrow(/Unknown argument/);
    expect(() => parseFlags(["--constructor=x"])).toThrow(/Unknown argument: --constructor=x/);
    expect(() => parseFlags(["--to-string"])).toThrow(/Unknown argument/);
  });
});
