import "dotenv/config";
import { loadConfig, type AnalysisConfig } from "./config.js";
import { analyzePrecise } from "./analyzers/precise.analyze.js";
import { analyzeBroad } from "./analyzers/broad.analyze.js";
import { analyzeKeyword } from "./analyzers/keyword.analyze.js";
import { runQa } from "./qa.js";

const analyzers: Record<string, (cfg: AnalysisConfig) => void> = {
  precise: (cfg) => analyzePrecise(cfg),
  broad: (cfg) => analyzeBroad(cfg),
  keyword: (cfg) => analyzeKeyword(cfg),
  qa: (cfg) => runQa(cfg.outdir),
};

async function main() {
  const [target, ...flags] = process.argv.slice(2);
  const analyze = target ? analyzers[target] : undefined;
  if (!target || !analyze) {
    console.error(`Usage: npm run analyze -- <${Object.keys(analyzers).join("|")}> [--key=value ...]`);
    process.exit(1);
  }
  analyze(loadConfig(flags));
  console.log(`${target} done`);
}

main().catch(err => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
