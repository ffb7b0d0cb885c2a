import { isProbabilityVector, normalizeTo100, riskLevelFor, round1 } from "./risk";
import type {
  AlzheimerAssessment,
  AlzheimerProbabilities,
  ProbabilityModel,
  SeverityLevel,
} from "./types";

type AlzheimerInputs = {
  age: number;
  educ: number;
  ses: number;
  mmse: number;
  etiv: number;
  nwbv: number;
  asf: number;
};

function toInputs(f: readonly number[]): AlzheimerInputs {
  return {
    age: f[0],
    educ: f[1],
    ses: f[2],
    mmse: f[3],
    etiv: f[4],
    nwbv: f[5],
    asf: f[6],
  };
}

/**
 * Continuous fallback score.
 *
 * `age*0.04 + ses*8 + (30-mmse)*3 + (1-nwbv)*60 + asf*30`
 */
export function continuousScore(features: readonly number[]): number {
  const x = toInputs(features);
  return (
    x.age * 0.04 +
    x.ses * 8 +
    (30 - x.mmse) * 3 +
    (1 - x.nwbv) * 60 +
    x.asf * 30
  );
}

/**
 * Strategy A: continuous score bucketed into three fixed outcomes.
 *
 * Moderate is never produced by this strategy.
 */
export function scoreAlzheimerContinuous(
  features: readonly number[]
): AlzheimerAssessment {
  const score = continuousScore(features);

  let severity: SeverityLevel;
  let confidence: number;
  let risk: number;
  if (score > 120) {
    severity = "Severe";
    confidence = 0.89;
    risk = 85;
  } else if (score > 70) {
    severity = "Mild";
    confidence = 0.73;
    risk = 60;
  } else {
    severity = "Normal";
    confidence = 0.97;
    risk = 15;
  }

  const weights = normalizeTo100<keyof AlzheimerProbabilities>({
    normal: (100 - risk) * 0.8,
    mild: risk > 30 ? risk * 0.4 : 10,
    moderate: risk > 60 ? risk * 0.3 : 5,
    severe: risk > 80 ? risk * 0.3 : 0,
  });

  return {
    kind: "alzheimer",
    label: `Alzheimer Severity: ${severity}`,
    riskPercentage: risk,
    riskLevel: riskLevelFor(risk),
    severityLevel: severity,
    confidence,
    source: "rule-based",
    modelUsed: "Hybrid Ensemble (Fallback Engine)",
    warnings: [],
    probabilities: roundProbabilities(weights),
  };
}

/**
 * Strategy B: additive score from discrete bands, led by the MMSE band.
 *
 * Returns the score and the severity implied by the MMSE band.
 */
export function bandedScore(features: readonly number[]): {
  score: number;
  severity: Exclude<SeverityLevel, "Unknown">;
} {
  const x = toInputs(features);
  let score = 0;
  let severity: Exclude<SeverityLevel, "Unknown">;

  if (x.mmse < 10) {
    score += 4;
    severity = "Severe";
  } else if (x.mmse < 18) {
    score += 3;
    severity = "Moderate";
  } else if (x.mmse < 24) {
    score += 2;
    severity = "Mild";
  } else {
    severity = "Normal";
  }

  if (x.age > 80) score += 2;
  else if (x.age > 70) score += 1;
  else if (x.age > 60) score += 0.5;

  if (x.educ < 8) score += 1;
  else if (x.educ < 12) score += 0.5;

  if (x.ses < 2) score += 1;
  else if (x.ses < 3) score += 0.5;

  if (x.nwbv < 0.7) score += 1;
  if (x.etiv > 1500) score += 0.5;

  return { score, severity };
}

const BANDED_MAX_SCORE = 10;
const BANDED_PROBABILITY_CAP = 95;
/** Placeholder, reported on the percentage scale. */
const BANDED_CONFIDENCE = 85.0;

const BANDED_LABELS: Record<Exclude<SeverityLevel, "Unknown">, string> = {
  Normal: "No Alzheimer's Disease",
  Mild: "Mild Cognitive Impairment",
  Moderate: "Moderate Alzheimer's Disease",
  Severe: "Severe Alzheimer's Disease",
};

/**
 * Splits the risk percentage across severities according to the MMSE band.
 *
 * In the Normal band the residual mild share is taken out of `normal` so the
 * breakdown still sums to 100.
 */
export function bandedProbabilities(
  risk: number,
  severity: Exclude<SeverityLevel, "Unknown">
): AlzheimerProbabilities {
  switch (severity) {
    case "Severe":
      return { normal: 100 - risk, mild: 0, moderate: 0, severe: risk };
    case "Moderate":
      return { normal: 100 - risk, mild: 0, moderate: risk * 0.7, severe: risk * 0.3 };
    case "Mild":
      return { normal: 100 - risk, mild: risk * 0.8, moderate: risk * 0.2, severe: 0 };
    case "Normal":
      return { normal: 100 - risk * 0.1, mild: risk * 0.1, moderate: 0, severe: 0 };
  }
}

/**
 * Strategy B: rule-based assessment.
 */
export function scoreAlzheimerBanded(
  features: readonly number[]
): AlzheimerAssessment {
  const { score, severity } = bandedScore(features);
  const risk = Math.min((score / BANDED_MAX_SCORE) * 100, BANDED_PROBABILITY_CAP);

  return {
    kind: "alzheimer",
    label: BANDED_LABELS[severity],
    riskPercentage: round1(risk),
    riskLevel: riskLevelFor(risk),
    severityLevel: severity,
    confidence: BANDED_CONFIDENCE,
    source: "rule-based",
    modelUsed: "Rule-Based Analysis",
    warnings: [],
    probabilities: roundProbabilities(bandedProbabilities(risk, severity)),
  };
}

const SEVERITY_ORDER = ["Normal", "Mild", "Moderate", "Severe"] as const;

/**
 * Assessment from a trained four-class model
 * (`[normal, mild, moderate, severe]`; missing trailing classes count as 0).
 */
export function scoreAlzheimerWithModel(
  features: readonly number[],
  model: ProbabilityModel
): AlzheimerAssessment {
  const raw = model.predictProba(features);
  if (
    raw.length === 0 ||
    raw.length > SEVERITY_ORDER.length ||
    !isProbabilityVector(raw)
  ) {
    throw new Error(
      `Alzheimer model returned [${raw.join(", ")}], expected 1-4 values in [0, 1] summing to 1`
    );
  }

  const p = SEVERITY_ORDER.map((_, i) => raw[i] ?? 0);
  let best = 0;
  p.forEach((v, i) => {
    if (v > p[best]) best = i;
  });

  const risk = (p[1] + p[2] + p[3]) * 100;
  const severity = SEVERITY_ORDER[best];

  return {
    kind: "alzheimer",
    label: BANDED_LABELS[severity],
    riskPercentage: round1(risk),
    riskLevel: riskLevelFor(risk),
    severityLevel: severity,
    confidence: Math.round(Math.max(...p) * 1000) / 1000,
    source: "trained-model",
    modelUsed: "Trained Model",
    warnings: [],
    probabilities: roundProbabilities({
      normal: p[0] * 100,
      mild: p[1] * 100,
      moderate: p[2] * 100,
      severe: p[3] * 100,
    }),
  };
}

function roundProbabilities(p: AlzheimerProbabilities): AlzheimerProbabilities {
  return {
    normal: round1(p.normal),
    mild: round1(p.mild),
    moderate: round1(p.moderate),
    severe: round1(p.severe),
  };
}
