import { z } from "zod";
import conditionsTable from "../data/conditions.json";
import type { ConditionCategory, ConditionMatch, Urgency } from "./types";

/**
 * Category order. Exact ties keep the earlier category, so this order is part
 * of the classification result.
 */
export const CONDITION_CATEGORIES = [
  "diabetes",
  "heart_disease",
  "hypertension",
  "alzheimer",
  "depression",
  "asthma",
  "fever",
  "cough_cold",
  "headache",
  "stomach_issues",
] as const satisfies readonly ConditionCategory[];

const keywordList = z.array(z.string().min(1)).min(1);

const keywordTableSchema = z.object({
  diabetes: keywordList,
  heart_disease: keywordList,
  hypertension: keywordList,
  alzheimer: keywordList,
  depression: keywordList,
  asthma: keywordList,
  fever: keywordList,
  cough_cold: keywordList,
  headache: keywordList,
  stomach_issues: keywordList,
});

/**
 * Keyword table, validated once at load.
 */
export const CONDITION_KEYWORDS: Readonly<Record<ConditionCategory, readonly string[]>> =
  keywordTableSchema.parse(conditionsTable);

export const EMERGENCY_PATTERNS: readonly RegExp[] = [
  /heart attack|chest pain|severe chest|crushing chest/,
  /stroke|facial droop|slurred speech|weakness on one side/,
  /can't breathe|difficulty breathing|choking|suffocating/,
  /unconscious|passed out|fainted|not responding/,
  /severe bleeding|heavy bleeding|bleeding won't stop/,
  /suicidal|want to die|harm myself/,
];

export const URGENT_PATTERNS: readonly RegExp[] = [
  /high fever|fever over 103|fever with rash/,
  /severe headache|worst headache|thunderclap headache/,
  /severe abdominal pain|acute abdomen/,
  /severe allergic reaction|anaphylaxis/,
  /severe dehydration|can't keep fluids down/,
];

const MAX_KEYWORDS = 8;

/**
 * Emergency patterns are checked before urgent ones; the first list with a
 * match decides.
 */
export function detectUrgency(text: string): Urgency {
  const t = text.toLowerCase();
  if (EMERGENCY_PATTERNS.some((p) => p.test(t))) return "emergency";
  if (URGENT_PATTERNS.some((p) => p.test(t))) return "urgent";
  return "normal";
}

/**
 * Picks the category with the most keyword hits (substring match on the
 * lower-cased text). Returns `"none"` when nothing matches.
 */
export function detectCondition(text: string): ConditionCategory | "none" {
  const t = text.toLowerCase();
  let best: ConditionCategory | "none" = "none";
  let bestCount = 0;

  for (const category of CONDITION_CATEGORIES) {
    const count = CONDITION_KEYWORDS[category].filter((k) => t.includes(k)).length;
    if (count > bestCount) {
      best = category;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Keywords found in the text, in table order, without duplicates, at most 8.
 */
export function matchedKeywords(text: string): string[] {
  const t = text.toLowerCase();
  const seen = new Set<string>();

  for (const category of CONDITION_CATEGORIES) {
    for (const k of CONDITION_KEYWORDS[category]) {
      if (t.includes(k)) seen.add(k);
    }
  }
  return Array.from(seen).slice(0, MAX_KEYWORDS);
}

export function classify(text: string): ConditionMatch {
  return {
    category: detectCondition(text),
    urgency: detectUrgency(text),
    keywords: matchedKeywords(text),
  };
}
