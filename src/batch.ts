import { readFileSync, writeFileSync } from "node:fs";
import type { Logger } from "winston";
import { buildAlertLists, scoreBatch } from "./alerts";
import { loadConfig } from "./config";
import { createScoringEngines } from "./engine";
import { createLogger, setLogLevel } from "./logger";
import type { AlzheimerStrategy, HeartLabelStyle } from "./types";

/**
 * Reads a flag value from argv.
 *
 * Supports both styles:
 * - `--in records.json`
 * - `--in=records.json`
 *
 * Returns `null` if the flag is not present or has no value.
 */
export function getArgValue(argv: readonly string[], flag: string): string | null {
  const idx = argv.findIndex((a) => a === flag || a.startsWith(`${flag}=`));
  if (idx === -1) return null;
  const a = argv[idx];
  if (a.includes("=")) return a.split("=").slice(1).join("=");
  const next = argv[idx + 1];
  return next && !next.startsWith("--") ? next : null;
}

function parseStrategy(value: string | null): AlzheimerStrategy | null {
  if (value === null) return null;
  if (value === "continuous" || value === "rule_based") return value;
  throw new Error(`Unknown --strategy "${value}" (expected continuous or rule_based)`);
}

function parseLabelStyle(value: string | null): HeartLabelStyle | null {
  if (value === null) return null;
  if (value === "binary" || value === "tiered") return value;
  throw new Error(`Unknown --labels "${value}" (expected binary or tiered)`);
}

type BatchRunOptions = {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
};

/**
 * Batch pipeline behind the CLI. Returns the process exit code.
 *
 * 1) Load configuration; flags override the environment.
 * 2) Read a JSON array of batch records.
 * 3) Score every record (invalid ones are reported, not fatal).
 * 4) Build alert lists and write `{ results, alerts }`.
 */
export function runBatch(argv: readonly string[], opts: BatchRunOptions = {}): number {
  const config = loadConfig(opts.env);
  if (!opts.logger) setLogLevel(config.logLevel);

  const inPath = getArgValue(argv, "--in");
  const outPath = getArgValue(argv, "--out") || "assessments.json";

  let strategy: AlzheimerStrategy | null;
  let labels: HeartLabelStyle | null;
  try {
    strategy = parseStrategy(getArgValue(argv, "--strategy"));
    labels = parseLabelStyle(getArgValue(argv, "--labels"));
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    return 1;
  }

  if (!inPath) {
    console.error("Missing input. Pass --in <records.json>.");
    return 1;
  }

  let records: unknown;
  try {
    records = JSON.parse(readFileSync(inPath, "utf8"));
  } catch (err) {
    console.error(
      `Could not read ${inPath}: ${err instanceof Error ? err.message : String(err)}`
    );
    return 1;
  }

  if (!Array.isArray(records)) {
    console.error(`${inPath} must contain a JSON array of records.`);
    return 1;
  }

  const engines = createScoringEngines(
    {
      ...config.scoring,
      alzheimerStrategy: strategy ?? config.scoring.alzheimerStrategy,
      heartLabelStyle: labels ?? config.scoring.heartLabelStyle,
    },
    { logger: opts.logger ?? createLogger("cli") }
  );
  const results = scoreBatch(records, engines);
  const alerts = buildAlertLists(results);
  const failed = results.filter((r) => "error" in r).length;

  writeFileSync(outPath, JSON.stringify({ results, alerts }, null, 2), "utf8");
  console.log(`Scored ${results.length - failed}/${results.length} records.`);
  if (failed > 0) console.warn(`Rejected ${failed} invalid records.`);
  console.log(`\nWrote ${outPath}`);
  console.log(`High risk: ${alerts.high_risk.length}`);
  console.log(`Data-quality issues: ${alerts.data_quality_issues.length}`);
  console.log(`Degraded: ${alerts.degraded.length}`);
  return 0;
}
