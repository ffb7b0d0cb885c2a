import type { Logger } from "winston";
import { scoreAlzheimerBanded, scoreAlzheimerContinuous, scoreAlzheimerWithModel } from "./alzheimer";
import { ConfigError, ValidationError } from "./errors";
import { checkFeatureRanges, fitToShape, parseFeatureValues } from "./features";
import { scoreHeartRuleBased, scoreHeartWithModel } from "./heart";
import { createLogger } from "./logger";
import { degradedAlzheimer, degradedHeart, probabilityTotal } from "./risk";
import type {
  AlzheimerAssessment,
  AssessmentKind,
  HeartAssessment,
  ProbabilityModel,
  RiskAssessment,
  ScoringConfig,
} from "./types";

export type ScoringEngine<R extends RiskAssessment> = {
  readonly kind: AssessmentKind;
  /**
   * Scores a raw feature vector.
   *
   * Throws `ValidationError` for non-numeric or out-of-range entries; every
   * other failure yields a degraded result.
   */
  score(values: readonly unknown[]): R;
};

export type ScoringEngines = {
  heart: ScoringEngine<HeartAssessment>;
  alzheimer: ScoringEngine<AlzheimerAssessment>;
};

export const DEFAULT_SCORING_CONFIG: ScoringConfig = {
  hasTrainedModel: false,
  heartLabelStyle: "binary",
  alzheimerStrategy: "continuous",
};

function requireModel(
  config: ScoringConfig,
  kind: AssessmentKind
): ProbabilityModel | null {
  if (!config.hasTrainedModel) return null;
  const model = config.trainedModels?.[kind];
  if (!model) {
    throw new ConfigError(
      `hasTrainedModel is set but no trained ${kind} model was provided`
    );
  }
  return model;
}

function createEngine<R extends RiskAssessment>(
  kind: AssessmentKind,
  compute: (features: number[]) => R,
  degrade: (warnings: string[]) => R,
  logger: Logger
): ScoringEngine<R> {
  return {
    kind,
    score(values) {
      // Validation errors surface to the caller before any arithmetic.
      const parsed = parseFeatureValues(values);
      const { features, warning } = fitToShape(parsed, kind);
      const warnings = warning ? [warning] : [];
      if (warning) logger.warn(warning, { kind });
      checkFeatureRanges(features, kind);

      try {
        const result = compute(features);
        if (!Number.isFinite(result.riskPercentage) || !Number.isFinite(probabilityTotal(result))) {
          throw new Error(`Non-finite ${kind} result`);
        }
        return { ...result, warnings };
      } catch (err) {
        if (err instanceof ValidationError) throw err;
        logger.error("Scoring failed; returning degraded result", {
          kind,
          error: err instanceof Error ? err.message : String(err),
        });
        return degrade(warnings);
      }
    },
  };
}

/**
 * Builds the heart and Alzheimer engines from a configuration handle.
 *
 * The path (trained model or rule-based) is fixed here, once, from
 * `config.hasTrainedModel`.
 */
export function createScoringEngines(
  config: ScoringConfig = DEFAULT_SCORING_CONFIG,
  opts: { logger?: Logger } = {}
): ScoringEngines {
  const logger = opts.logger ?? createLogger("scoring");
  const heartModel = requireModel(config, "heart");
  const alzheimerModel = requireModel(config, "alzheimer");

  const heart = createEngine<HeartAssessment>(
    "heart",
    heartModel
      ? (f) => scoreHeartWithModel(f, heartModel, config.heartLabelStyle)
      : (f) => scoreHeartRuleBased(f, config.heartLabelStyle),
    degradedHeart,
    logger
  );

  const alzheimerFallback =
    config.alzheimerStrategy === "rule_based"
      ? scoreAlzheimerBanded
      : scoreAlzheimerContinuous;

  const alzheimer = createEngine<AlzheimerAssessment>(
    "alzheimer",
    alzheimerModel
      ? (f) => scoreAlzheimerWithModel(f, alzheimerModel)
      : alzheimerFallback,
    degradedAlzheimer,
    logger
  );

  return { heart, alzheimer };
}

/**
 * Scores with the engine matching `kind`.
 */
export function scoreFeatures(
  engines: ScoringEngines,
  kind: AssessmentKind,
  values: readonly unknown[]
): RiskAssessment {
  return kind === "heart" ? engines.heart.score(values) : engines.alzheimer.score(values);
}
