/**
 * Which assessment a feature vector feeds.
 */
export type AssessmentKind = "heart" | "alzheimer";

/**
 * Coarse three-bucket classification of a risk percentage.
 *
 * `Unknown` only appears on degraded results.
 */
export type RiskLevel = "Low" | "Medium" | "High" | "Unknown";

/**
 * Alzheimer-specific four-bucket classification.
 */
export type SeverityLevel = "Normal" | "Mild" | "Moderate" | "Severe" | "Unknown";

/**
 * Which computation path produced an assessment.
 */
export type AssessmentSource = "rule-based" | "trained-model" | "error";

export type HeartProbabilities = {
  disease: number;
  noDisease: number;
};

export type AlzheimerProbabilities = {
  normal: number;
  mild: number;
  moderate: number;
  severe: number;
};

type AssessmentBase = {
  label: string;
  riskPercentage: number;
  riskLevel: RiskLevel;
  confidence: number;
  source: AssessmentSource;
  /** Human-readable name of the path, e.g. "Rule-Based Analysis". */
  modelUsed: string;
  /** Non-fatal notes about the input, such as a repaired vector length. */
  warnings: string[];
};

export type HeartAssessment = AssessmentBase & {
  kind: "heart";
  probabilities: HeartProbabilities;
};

export type AlzheimerAssessment = AssessmentBase & {
  kind: "alzheimer";
  severityLevel: SeverityLevel;
  probabilities: AlzheimerProbabilities;
};

/**
 * Result of scoring a feature vector. Always well-formed, even when degraded.
 */
export type RiskAssessment = HeartAssessment | AlzheimerAssessment;

export type ConditionCategory =
  | "diabetes"
  | "heart_disease"
  | "hypertension"
  | "alzheimer"
  | "depression"
  | "asthma"
  | "fever"
  | "cough_cold"
  | "headache"
  | "stomach_issues";

export type Urgency = "normal" | "urgent" | "emergency";

/**
 * Result of classifying free text.
 */
export type ConditionMatch = {
  category: ConditionCategory | "none";
  urgency: Urgency;
  keywords: string[];
};

/**
 * Pluggable trained classifier. Returns per-class probabilities in 0..1.
 */
export type ProbabilityModel = {
  predictProba(features: readonly number[]): number[];
};

export type HeartLabelStyle = "binary" | "tiered";

export type AlzheimerStrategy = "continuous" | "rule_based";

/**
 * Scoring configuration, built once at process start and handed to
 * `createScoringEngines(...)`.
 */
export type ScoringConfig = {
  hasTrainedModel: boolean;
  heartLabelStyle: HeartLabelStyle;
  alzheimerStrategy: AlzheimerStrategy;
  trainedModels?: {
    heart?: ProbabilityModel;
    alzheimer?: ProbabilityModel;
  };
};

export type MedicineSeverity = "mild" | "moderate" | "urgent" | "severe";

export type Medication = {
  name: string;
  dosage: string;
  type: string;
  description: string;
  sideEffects: string[];
  contraindications: string[];
  category: string;
};

export type MedicineRecommendations = {
  medications: Medication[];
  lifestyle: string[];
  monitoring: string[];
};

export type MedicineInteraction = {
  medicines: [string, string];
  severity: "High" | "Moderate";
  description: string;
  recommendation: string;
};

export type ChatReply = {
  reply: string;
  condition: ConditionCategory | "none";
  urgency: Urgency;
  keywords: string[];
  medicines: MedicineRecommendations | null;
  medicineSummary: string | null;
  interactions: MedicineInteraction[];
};
