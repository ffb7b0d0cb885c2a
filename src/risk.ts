import type {
  AlzheimerAssessment,
  AssessmentKind,
  HeartAssessment,
  RiskAssessment,
  RiskLevel,
} from "./types";

/**
 * Rounds to one decimal place, the precision every percentage is reported in.
 */
export function round1(n: number): number {
  return Math.round(n * 10) / 10;
}

/** Largest tolerated drift of a model's class probabilities from 1. */
const PROBABILITY_SUM_TOLERANCE = 0.01;

/**
 * True when every entry lies in [0, 1] and the entries sum to 1.
 */
export function isProbabilityVector(p: readonly number[]): boolean {
  if (!p.every((v) => Number.isFinite(v) && v >= 0 && v <= 1)) return false;
  const total = p.reduce((sum, v) => sum + v, 0);
  return Math.abs(total - 1) <= PROBABILITY_SUM_TOLERANCE;
}

/**
 * Maps a risk percentage to a level.
 *
 * - `>= 70`: High
 * - `>= 40`: Medium
 * - otherwise: Low
 */
export function riskLevelFor(riskPercentage: number): Exclude<RiskLevel, "Unknown"> {
  if (riskPercentage >= 70) return "High";
  if (riskPercentage >= 40) return "Medium";
  return "Low";
}

/**
 * Scales a set of non-negative weights so they sum to 100.
 *
 * Returns the input unchanged when the weights sum to zero.
 */
export function normalizeTo100<K extends string>(
  weights: Record<K, number>
): Record<K, number> {
  const keys = Object.keys(weights).filter((k): k is K => k in weights);
  const total = keys.reduce((sum, k) => sum + weights[k], 0);
  if (total <= 0) return { ...weights };

  const out = { ...weights };
  for (const k of keys) out[k] = (weights[k] / total) * 100;
  return out;
}

export function degradedHeart(warnings: string[] = []): HeartAssessment {
  return {
    kind: "heart",
    label: "Prediction Error",
    riskPercentage: 50,
    riskLevel: "Unknown",
    confidence: 0,
    source: "error",
    modelUsed: "Error",
    warnings,
    probabilities: { disease: 50, noDisease: 50 },
  };
}

export function degradedAlzheimer(warnings: string[] = []): AlzheimerAssessment {
  return {
    kind: "alzheimer",
    label: "Prediction Error",
    riskPercentage: 50,
    riskLevel: "Unknown",
    severityLevel: "Unknown",
    confidence: 0,
    source: "error",
    modelUsed: "Error",
    warnings,
    probabilities: { normal: 25, mild: 25, moderate: 25, severe: 25 },
  };
}

/**
 * Placeholder result returned when scoring fails for a reason other than
 * invalid input.
 */
export function degradedAssessment(
  kind: AssessmentKind,
  warnings: string[] = []
): RiskAssessment {
  return kind === "heart" ? degradedHeart(warnings) : degradedAlzheimer(warnings);
}

/**
 * Sum of a probability breakdown, for checks and tests.
 */
export function probabilityTotal(assessment: RiskAssessment): number {
  return Object.values(assessment.probabilities).reduce((a, b) => a + b, 0);
}
