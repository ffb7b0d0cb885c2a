import { ValidationError } from "./errors";
import type { AssessmentKind } from "./types";

export const HEART_FIELDS = [
  "age",
  "sex",
  "cp",
  "trestbps",
  "chol",
  "fbs",
  "restecg",
  "thalach",
  "exang",
  "oldpeak",
  "slope",
  "ca",
  "thal",
] as const;

export const ALZHEIMER_FIELDS = [
  "age",
  "educ",
  "ses",
  "mmse",
  "etiv",
  "nwbv",
  "asf",
] as const;

export type HeartField = (typeof HEART_FIELDS)[number];
export type AlzheimerField = (typeof ALZHEIMER_FIELDS)[number];

export const FEATURE_FIELDS: Record<AssessmentKind, readonly string[]> = {
  heart: HEART_FIELDS,
  alzheimer: ALZHEIMER_FIELDS,
};

type FieldRange = { min: number; max: number; integer?: boolean };

/**
 * Accepted values per field. Every range includes 0, the padding value.
 */
export const FEATURE_RANGES: {
  heart: Record<HeartField, FieldRange>;
  alzheimer: Record<AlzheimerField, FieldRange>;
} = {
  heart: {
    age: { min: 0, max: 120 },
    sex: { min: 0, max: 1, integer: true },
    cp: { min: 0, max: 3, integer: true },
    trestbps: { min: 0, max: 300 },
    chol: { min: 0, max: 1000 },
    fbs: { min: 0, max: 1, integer: true },
    restecg: { min: 0, max: 2, integer: true },
    thalach: { min: 0, max: 300 },
    exang: { min: 0, max: 1, integer: true },
    oldpeak: { min: -5, max: 10 },
    slope: { min: 0, max: 2, integer: true },
    ca: { min: 0, max: 4, integer: true },
    thal: { min: 0, max: 7, integer: true },
  },
  alzheimer: {
    age: { min: 0, max: 120 },
    educ: { min: 0, max: 30 },
    ses: { min: 0, max: 5 },
    mmse: { min: 0, max: 30 },
    etiv: { min: 0, max: 3000 },
    nwbv: { min: 0, max: 1 },
    asf: { min: 0, max: 3 },
  },
};

function rangesFor(kind: AssessmentKind): FieldRange[] {
  return kind === "heart"
    ? HEART_FIELDS.map((f) => FEATURE_RANGES.heart[f])
    : ALZHEIMER_FIELDS.map((f) => FEATURE_RANGES.alzheimer[f]);
}

/**
 * Rejects a fitted vector with any value outside its field's range.
 */
export function checkFeatureRanges(
  features: readonly number[],
  kind: AssessmentKind
): void {
  const fields = FEATURE_FIELDS[kind];
  const bad: string[] = [];

  rangesFor(kind).forEach((range, i) => {
    const v = features[i];
    if (v < range.min || v > range.max || (range.integer && !Number.isInteger(v))) {
      bad.push(
        `${fields[i]}: ${v} (expected ${range.integer ? "an integer " : ""}${range.min}-${range.max})`
      );
    }
  });

  if (bad.length > 0) {
    throw new ValidationError(`Feature values out of range for ${kind}`, bad);
  }
}

/**
 * Parses one feature entry.
 * - Accepts finite numbers
 * - Accepts strings that are entirely a number ("12", " 0.65 ", "1e3")
 *
 * Unlike a loose parse, "98.6F" is rejected: feature vectors are positional
 * and a unit suffix means the caller sent the wrong thing.
 */
export function parseNumeric(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return null;

  const s = value.trim();
  if (!s) return null;

  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

/**
 * Converts raw entries to numbers, rejecting the whole vector if any entry
 * is not numeric.
 */
export function parseFeatureValues(values: readonly unknown[]): number[] {
  const out: number[] = [];
  const bad: string[] = [];

  values.forEach((v, i) => {
    const n = parseNumeric(v);
    if (n === null) bad.push(`index ${i}: ${JSON.stringify(v) ?? String(v)}`);
    else out.push(n);
  });

  if (bad.length > 0) {
    throw new ValidationError(
      "Prediction payload must contain numeric values only",
      bad
    );
  }
  return out;
}

/**
 * Repairs a vector to the field count of its shape.
 *
 * Shorter vectors are zero-padded on the right, longer ones truncated. The
 * repair is lossy, so a warning is returned for the caller to surface.
 */
export function fitToShape(
  features: readonly number[],
  kind: AssessmentKind
): { features: number[]; warning: string | null } {
  const expected = FEATURE_FIELDS[kind].length;
  if (features.length === expected) {
    return { features: [...features], warning: null };
  }

  const warning = `Expected ${expected} ${kind} features, got ${features.length}; ${
    features.length < expected ? "zero-padded" : "truncated"
  } to ${expected}`;

  const fitted =
    features.length < expected
      ? [...features, ...new Array<number>(expected - features.length).fill(0)]
      : features.slice(0, expected);

  return { features: fitted, warning };
}
