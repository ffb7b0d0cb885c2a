import { ZodError } from "zod";
import { scoreFeatures } from "./engine";
import type { ScoringEngines } from "./engine";
import { ValidationError } from "./errors";
import { batchRecordHeaderSchema, parsePredictionPayload } from "./schemas";
import type { AssessmentKind, RiskAssessment } from "./types";

export type BatchResult =
  | { id: string; type: AssessmentKind; assessment: RiskAssessment }
  | { id: string; type: AssessmentKind | null; error: string };

/**
 * The three lists written next to batch results.
 */
export type AlertLists = {
  high_risk: string[];
  data_quality_issues: string[];
  degraded: string[];
};

function describeError(err: unknown): string {
  if (err instanceof ValidationError) {
    return err.details.length > 0
      ? `${err.message} (${err.details.join(", ")})`
      : err.message;
  }
  if (err instanceof ZodError) {
    return err.issues.map((i) => `${i.path.join(".") || "record"}: ${i.message}`).join("; ");
  }
  return err instanceof Error ? err.message : String(err);
}

/**
 * Scores each record of a batch.
 *
 * Records without a usable id get the id `#<index>` so they still show up in
 * the data-quality list. Invalid records produce an error entry instead of
 * stopping the batch.
 */
export function scoreBatch(
  records: readonly unknown[],
  engines: ScoringEngines
): BatchResult[] {
  return records.map((record, index): BatchResult => {
    const header = batchRecordHeaderSchema.safeParse(record);
    if (!header.success) {
      return { id: `#${index}`, type: null, error: describeError(header.error) };
    }

    const { id, type } = header.data;
    try {
      const values = parsePredictionPayload(type, header.data);
      return { id, type, assessment: scoreFeatures(engines, type, values) };
    } catch (err) {
      if (err instanceof ValidationError || err instanceof ZodError) {
        return { id, type, error: describeError(err) };
      }
      throw err;
    }
  });
}

/**
 * Deduplicates and sorts ids for stable output.
 */
function uniqSorted(ids: string[]): string[] {
  return Array.from(new Set(ids)).sort((a, b) => a.localeCompare(b));
}

/**
 * Builds alert lists from batch results.
 *
 * - `high_risk`: risk level High
 * - `data_quality_issues`: rejected records, or vectors whose length was repaired
 * - `degraded`: scoring fell back to the placeholder result
 */
export function buildAlertLists(results: readonly BatchResult[]): AlertLists {
  const highRisk: string[] = [];
  const dq: string[] = [];
  const degraded: string[] = [];

  for (const r of results) {
    if ("error" in r) {
      dq.push(r.id);
      continue;
    }
    if (r.assessment.riskLevel === "High") highRisk.push(r.id);
    if (r.assessment.warnings.length > 0) dq.push(r.id);
    if (r.assessment.source === "error") degraded.push(r.id);
  }

  return {
    high_risk: uniqSorted(highRisk),
    data_quality_issues: uniqSorted(dq),
    degraded: uniqSorted(degraded),
  };
}
