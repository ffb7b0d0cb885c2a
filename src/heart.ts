import { isProbabilityVector, riskLevelFor, round1 } from "./risk";
import type {
  HeartAssessment,
  HeartLabelStyle,
  ProbabilityModel,
  RiskLevel,
} from "./types";

/** Score at which the disease probability would reach 100%. */
const MAX_RISK_SCORE = 20;
/** Rule-based probabilities never claim certainty. */
const PROBABILITY_CAP = 95;
/** Placeholder; there is no model to derive a confidence from. */
const RULE_BASED_CONFIDENCE = 0.85;

/**
 * Positional heart inputs, in `HEART_FIELDS` order.
 */
type HeartInputs = {
  age: number;
  sex: number;
  cp: number;
  trestbps: number;
  chol: number;
  fbs: number;
  exang: number;
  oldpeak: number;
  ca: number;
  thal: number;
};

function toInputs(f: readonly number[]): HeartInputs {
  // restecg (6), thalach (7) and slope (10) do not contribute to the score.
  return {
    age: f[0],
    sex: f[1],
    cp: f[2],
    trestbps: f[3],
    chol: f[4],
    fbs: f[5],
    exang: f[8],
    oldpeak: f[9],
    ca: f[11],
    thal: f[12],
  };
}

/**
 * Additive risk score.
 *
 * Thresholds are strict (`>`), so an age of exactly 65 scores +2, not +3.
 * Chest-pain type and major-vessel count are added as-is; the engine rejects
 * values outside `FEATURE_RANGES` before scoring.
 */
export function heartRiskScore(features: readonly number[]): number {
  const x = toInputs(features);
  let score = 0;

  if (x.age > 65) score += 3;
  else if (x.age > 55) score += 2;
  else if (x.age > 45) score += 1;

  if (x.sex === 1) score += 1;

  score += x.cp;

  if (x.trestbps > 160) score += 3;
  else if (x.trestbps > 140) score += 2;
  else if (x.trestbps > 120) score += 1;

  if (x.chol > 300) score += 3;
  else if (x.chol > 240) score += 2;
  else if (x.chol > 200) score += 1;

  if (x.fbs === 1) score += 1;
  if (x.exang === 1) score += 2;

  if (x.oldpeak > 2) score += 3;
  else if (x.oldpeak > 1) score += 2;
  else if (x.oldpeak > 0.5) score += 1;

  score += x.ca;

  if (x.thal === 3) score += 2; // fixed defect
  else if (x.thal === 6) score += 1; // reversible defect

  return score;
}

/**
 * Presentation label for a heart result.
 *
 * - `binary`: detected when the disease probability is above 50
 * - `tiered`: one label per risk level
 */
export function heartLabel(
  diseaseProbability: number,
  riskLevel: RiskLevel,
  style: HeartLabelStyle
): string {
  if (style === "binary") {
    return diseaseProbability > 50 ? "Heart Disease Detected" : "No Heart Disease";
  }
  if (riskLevel === "High") return "Heart Disease Detected";
  if (riskLevel === "Medium") return "Moderate Risk of Heart Disease";
  return "No Heart Disease";
}

/**
 * Rule-based heart assessment. Expects a vector already fitted to 13 fields.
 */
export function scoreHeartRuleBased(
  features: readonly number[],
  style: HeartLabelStyle
): HeartAssessment {
  const score = heartRiskScore(features);
  const disease = Math.max(0, Math.min((score / MAX_RISK_SCORE) * 100, PROBABILITY_CAP));
  const noDisease = 100 - disease;
  const riskLevel = riskLevelFor(disease);

  return {
    kind: "heart",
    label: heartLabel(disease, riskLevel, style),
    riskPercentage: round1(disease),
    riskLevel,
    confidence: RULE_BASED_CONFIDENCE,
    source: "rule-based",
    modelUsed: "Rule-Based Analysis",
    warnings: [],
    probabilities: {
      disease: round1(disease),
      noDisease: round1(noDisease),
    },
  };
}

/**
 * Heart assessment from a trained binary classifier (`[pNo, pYes]`).
 */
export function scoreHeartWithModel(
  features: readonly number[],
  model: ProbabilityModel,
  style: HeartLabelStyle
): HeartAssessment {
  const proba = model.predictProba(features);
  if (proba.length !== 2 || !isProbabilityVector(proba)) {
    throw new Error(
      `Heart model returned [${proba.join(", ")}], expected 2 values in [0, 1] summing to 1`
    );
  }

  const disease = proba[1] * 100;
  const noDisease = proba[0] * 100;
  const riskLevel = riskLevelFor(disease);

  return {
    kind: "heart",
    label: heartLabel(disease, riskLevel, style),
    riskPercentage: round1(disease),
    riskLevel,
    confidence: Math.round(Math.max(...proba) * 1000) / 1000,
    source: "trained-model",
    modelUsed: "Trained Model",
    warnings: [],
    probabilities: {
      disease: round1(disease),
      noDisease: round1(noDisease),
    },
  };
}
