// Load envs from .env
// npm run example [path/to/portfolio.json]
import "dotenv/config";
import { readFileSync } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { parseStockInputs } from "../../analysis/schema";
import { parsePositions } from "../../portfolio/schema";
import { configurationErrorFromZod } from "../../util/errors";
import { analyzePortfolio } from "../analyze_portfolio";
import { loadEngineConfig } from "../config";

const ExampleFileSchema = z.object({
  portfolio: z.string().optional(),
  asOf: z.string().optional(),
  storyTags: z.array(z.string()).optional(),
  positions: z.unknown(),
  stocks: z.unknown(),
});

function readExample(file: string) {
  const raw: unknown = JSON.parse(readFileSync(file, "utf8"));
  const parsed = ExampleFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw configurationErrorFromZod(`example file ${file}`, parsed.error);
  }
  return {
    ...parsed.data,
    positions: parsePositions(parsed.data.positions),
    stocks: parseStockInputs(parsed.data.stocks),
  };
}

function main() {
  const file = process.argv[2] ?? path.join(__dirname, "example_portfolio.json");
  const example = readExample(file);
  const result = analyzePortfolio(example, { config: loadEngineConfig() });

  /* eslint-disable no-console */
  console.log("=== Stocks ===");
  for (const a of result.analyses) {
    console.log(
      `${a.ticker.padEnd(6)} risk ${a.riskTotal.toFixed(1).padStart(5)} | opp ${a.opportunityTotal
        .toFixed(1)
        .padStart(5)} | ${a.phase.padEnd(8)} | ${a.scores.gated.score.overallBias}${
        a.criticalSignalsFired.length ? ` | ${a.criticalSignalsFired.join(", ")}` : ""
      }`
    );
  }

  console.log("\n=== Buckets ===");
  for (const b of result.buckets) {
    console.log(
      `${b.bucket.padEnd(12)} w ${(b.weight * 100).toFixed(1)}% / ${(b.limit * 100).toFixed(
        0
      )}% | P ${b.pressure.toFixed(2)} | ${b.phase} | R ${b.transitionRisk.toFixed(1)}`
    );
  }

  const p = result.portfolio;
  console.log(
    `\n=== Portfolio ===\nR_trans ${p.transitionRisk.toFixed(1)} | ${p.mode} | phase ${p.phase}` +
      (p.dominantStory ? ` | story ${p.dominantStory} ${(p.maxStoryWeight * 100).toFixed(0)}%` : "")
  );

  console.log("\n=== Rotation plan ===");
  for (const step of result.plan.steps) {
    const a = step.action;
    const target = a.target.kind === "bucket" ? a.target.bucket : a.target.ticker;
    console.log(
      `M${step.month}W${step.weekInMonth} ${step.stepId} ${a.kind} ${target} ${(
        a.fromWeight * 100
      ).toFixed(1)}% -> ${(a.toWeight * 100).toFixed(1)}% [${a.urgency}] ${a.reasons.join("; ")}`
    );
  }
  console.log(`Turnover ${(result.plan.totals.turnover * 100).toFixed(1)}%`);
  /* eslint-enable no-console */
}

try {
  main();
} catch (err) {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
}
