import { describe, expect, test } from "vitest";
import winston from "winston";
import { createScoringEngines, scoreFeatures } from "./engine";
import { ConfigError, ValidationError } from "./errors";
import { probabilityTotal } from "./risk";

const silent = winston.createLogger({ silent: true });
const HIGH_RISK_HEART = [70, 1, 3, 165, 310, 1, 1, 140, 1, 2.5, 2, 2, 3];

describe("scoring engines", () => {
  test("default configuration uses the rule-based heart path", () => {
    const { heart } = createScoringEngines(undefined, { logger: silent });
    const r = heart.score(HIGH_RISK_HEART);
    expect(r.source).toBe("rule-based");
    expect(r.riskPercentage).toBe(95);
    expect(r.label).toBe("Heart Disease Detected");
    expect(r.warnings).toEqual([]);
  });

  test("default Alzheimer strategy is continuous", () => {
    const { alzheimer } = createScoringEngines(undefined, { logger: silent });
    expect(alzheimer.score([75, 12, 2, 28, 1500, 0.75, 1.2]).label).toBe(
      "Alzheimer Severity: Mild"
    );
  });

  test("rule_based strategy is selectable", () => {
    const { alzheimer } = createScoringEngines(
      { hasTrainedModel: false, heartLabelStyle: "binary", alzheimerStrategy: "rule_based" },
      { logger: silent }
    );
    const r = alzheimer.score([85, 6, 1, 8, 1600, 0.65, 1.0]);
    expect(r.riskPercentage).toBe(95);
    expect(r.riskLevel).toBe("High");
    expect(r.severityLevel).toBe("Severe");
  });

  test("zero-pads short vectors with a warning", () => {
    const { heart } = createScoringEngines(undefined, { logger: silent });
    // age +3, sex +1, cp +3 = 7 -> 35%
    const r = heart.score([70, 1, 3]);
    expect(r.riskPercentage).toBe(35);
    expect(r.riskLevel).toBe("Low");
    expect(r.warnings).toEqual(["Expected 13 heart features, got 3; zero-padded to 13"]);
  });

  test("truncates long vectors with a warning", () => {
    const { heart } = createScoringEngines(undefined, { logger: silent });
    const r = heart.score([...HIGH_RISK_HEART, 9, 9]);
    const { warnings, ...rest } = r;
    const { warnings: _none, ...expected } = heart.score(HIGH_RISK_HEART);

    expect(rest).toEqual(expected);
    expect(warnings).toEqual(["Expected 13 heart features, got 15; truncated to 13"]);
  });

  test("accepts numeric strings", () => {
    const { heart } = createScoringEngines(undefined, { logger: silent });
    const r = heart.score(HIGH_RISK_HEART.map(String));
    expect(r.riskPercentage).toBe(95);
  });

  test("rejects non-numeric entries before scoring", () => {
    const { heart } = createScoringEngines(undefined, { logger: silent });
    expect(() => heart.score([70, "abc", 3])).toThrow(ValidationError);
    expect(() => heart.score([70, null, 3])).toThrow(
      "Prediction payload must contain numeric values only"
    );
  });

  test("rejects non-numeric entries even past the truncation point", () => {
    const { heart } = createScoringEngines(undefined, { logger: silent });
    expect(() => heart.score([...HIGH_RISK_HEART, "x"])).toThrow(ValidationError);
  });

  test("rejects values outside the field ranges", () => {
    const { heart, alzheimer } = createScoringEngines(undefined, { logger: silent });
    const negativeChestPain = [30, 0, -40, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0];

    try {
      heart.score(negativeChestPain);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.message).toBe("Feature values out of range for heart");
        expect(err.details).toEqual(["cp: -40 (expected an integer 0-3)"]);
      }
    }

    expect(() => heart.score([30, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, -1.7e308, 0])).toThrow(
      ValidationError
    );
    expect(() => alzheimer.score([70, 12, 2, 22, 1500, 1.5, 1.2])).toThrow(
      "Feature values out of range for alzheimer"
    );
  });

  test("degrades when a model returns an invalid distribution", () => {
    const { heart } = createScoringEngines(
      {
        hasTrainedModel: true,
        heartLabelStyle: "binary",
        alzheimerStrategy: "continuous",
        trainedModels: {
          heart: { predictProba: () => [0.3, 0.3] },
          alzheimer: { predictProba: () => [1] },
        },
      },
      { logger: silent }
    );

    const r = heart.score(HIGH_RISK_HEART);
    expect(r.source).toBe("error");
    expect(r.probabilities).toEqual({ disease: 50, noDisease: 50 });
  });

  test("requires a model when hasTrainedModel is set", () => {
    expect(() =>
      createScoringEngines(
        { hasTrainedModel: true, heartLabelStyle: "binary", alzheimerStrategy: "continuous" },
        { logger: silent }
      )
    ).toThrow(ConfigError);
  });

  test("uses trained models when configured", () => {
    const { heart, alzheimer } = createScoringEngines(
      {
        hasTrainedModel: true,
        heartLabelStyle: "tiered",
        alzheimerStrategy: "continuous",
        trainedModels: {
          heart: { predictProba: () => [0.45, 0.55] },
          alzheimer: { predictProba: () => [0.9, 0.1, 0, 0] },
        },
      },
      { logger: silent }
    );

    const h = heart.score(HIGH_RISK_HEART);
    expect(h.source).toBe("trained-model");
    expect(h.label).toBe("Moderate Risk of Heart Disease");
    expect(alzheimer.score([60, 16, 3, 29, 1400, 0.8, 1]).severityLevel).toBe("Normal");
  });

  test("degrades instead of throwing when scoring fails", () => {
    const { heart, alzheimer } = createScoringEngines(
      {
        hasTrainedModel: true,
        heartLabelStyle: "binary",
        alzheimerStrategy: "continuous",
        trainedModels: {
          heart: {
            predictProba: () => {
              throw new Error("model crashed");
            },
          },
          alzheimer: { predictProba: () => [] },
        },
      },
      { logger: silent }
    );

    expect(heart.score([1, 0, 3])).toEqual({
      kind: "heart",
      label: "Prediction Error",
      riskPercentage: 50,
      riskLevel: "Unknown",
      confidence: 0,
      source: "error",
      modelUsed: "Error",
      warnings: ["Expected 13 heart features, got 3; zero-padded to 13"],
      probabilities: { disease: 50, noDisease: 50 },
    });

    const a = alzheimer.score([70, 12, 2, 22, 1500, 0.7, 1.2]);
    expect(a.source).toBe("error");
    expect(a.severityLevel).toBe("Unknown");
    expect(a.probabilities).toEqual({ normal: 25, mild: 25, moderate: 25, severe: 25 });
  });

  test("identical input gives identical output", () => {
    const engines = createScoringEngines(undefined, { logger: silent });
    const input = [63, 1, 2, 145, 233, 1, 0, 150, 0, 2.3, 0, 0, 6];
    expect(JSON.stringify(engines.heart.score(input))).toBe(
      JSON.stringify(engines.heart.score(input))
    );
  });

  test("probability breakdowns sum to 100", () => {
    for (const strategy of ["continuous", "rule_based"] as const) {
      const engines = createScoringEngines(
        { hasTrainedModel: false, heartLabelStyle: "binary", alzheimerStrategy: strategy },
        { logger: silent }
      );
      const samples: [("heart" | "alzheimer"), number[]][] = [
        ["heart", HIGH_RISK_HEART],
        ["heart", [52, 0, 1, 125, 212, 0, 1, 168, 0, 1, 2, 2, 3]],
        ["heart", [30]],
        ["alzheimer", [85, 6, 1, 8, 1600, 0.65, 1.0]],
        ["alzheimer", [72, 10, 2, 20, 1400, 0.72, 1.1]],
        ["alzheimer", [66, 14, 3, 15, 1400, 0.75, 1.0]],
        ["alzheimer", [82, 6, 1, 27, 1600, 0.65, 1.0]],
        ["alzheimer", [80, 8, 4, 10, 1300, 0.65, 1.4]],
      ];
      for (const [kind, values] of samples) {
        const total = probabilityTotal(scoreFeatures(engines, kind, values));
        expect(Math.abs(total - 100)).toBeLessThanOrEqual(0.2);
      }
    }
  });
});
