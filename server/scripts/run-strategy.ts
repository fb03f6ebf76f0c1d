#!/usr/bin/env node
/**
 * Plan a race from weighted history and print the strategy report as JSON.
 * Usage:
 *   npx tsx server/scripts/run-strategy.ts --year 2024 --gp Bahrain \
 *     --driver VER --team "Red Bull Racing" --race-laps 57 [--condition auto|dry|wet|mixed]
 *     [--pit-loss-sec 21] [--output-json report.json] [--provider local|openf1]
 */
import { writeFileSync } from "fs";
import { parseArgs } from "util";
import { ZodError } from "zod";
import { env } from "../src/config/env.js";
import { AppError } from "../src/middleware/error-handler.js";
import { getProvider, getProviderIds } from "../src/services/providers/index.js";
import { runStrategy } from "../src/services/strategy-run.js";
import { strategyRequestSchema } from "../src/utils/strategy-validators.js";

async function main() {
  const { values } = parseArgs({
    options: {
      year: { type: "string" },
      gp: { type: "string" },
      driver: { type: "string" },
      team: { type: "string" },
      "race-laps": { type: "string" },
      condition: { type: "string", default: "auto" },
      "pit-loss-sec": { type: "string" },
      "output-json": { type: "string" },
      provider: { type: "string", default: env.DATA_PROVIDER },
    },
    strict: true,
  });

  const request = strategyRequestSchema.parse({
    year: values.year,
    grandPrix: values.gp,
    driver: values.driver,
    team: values.team,
    raceLaps: values["race-laps"],
    condition: values.condition,
    pitLossSec: values["pit-loss-sec"],
  });

  const providerId = values.provider ?? env.DATA_PROVIDER;
  const provider = getProvider(providerId);
  if (!provider) {
    throw new AppError(
      400,
      `Unknown provider "${providerId}" (available: ${getProviderIds().join(", ")})`,
      "UNKNOWN_PROVIDER"
    );
  }

  // Progress goes to stderr so stdout carries only the report
  console.log = console.error;

  const report = await runStrategy(request, provider);
  const json = JSON.stringify(report, null, 2);
  process.stdout.write(json + "\n");

  const outputPath = values["output-json"];
  if (outputPath) {
    writeFileSync(outputPath, json, "utf-8");
    console.error(`✓ Report written to ${outputPath}`);
  }
}

main().catch((err) => {
  if (err instanceof ZodError) {
    for (const issue of err.errors) {
      console.error(`✗ ${issue.path.join(".") || "arguments"}: ${issue.message}`);
    }
  } else if (err instanceof AppError) {
    console.error(`✗ ${err.message}`);
  } else {
    console.error("Fatal:", err);
  }
  process.exit(1);
});
