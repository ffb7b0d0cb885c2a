#!/usr/bin/env node
import { runBatch } from "./batch";

/**
 * CLI entrypoint.
 *
 * `--in records.json [--out assessments.json] [--strategy continuous|rule_based]
 * [--labels binary|tiered]`
 */
export async function runCli(): Promise<void> {
  process.exitCode = runBatch(process.argv.slice(2));
}

runCli().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
