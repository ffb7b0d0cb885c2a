import { z } from "zod";
import { ALZHEIMER_FIELDS, HEART_FIELDS } from "./features";
import type { AssessmentKind } from "./types";

/**
 * A named field as it arrives in JSON. The key must be present; the engine
 * converts numeric strings and rejects every other value with a
 * `ValidationError`.
 */
const featureValue = z.union([z.number(), z.string(), z.boolean(), z.null()]);

const featureArraySchema = z.object({
  features: z.array(z.unknown()),
});

export const heartFieldsSchema = z.object({
  age: featureValue,
  sex: featureValue,
  cp: featureValue,
  trestbps: featureValue,
  chol: featureValue,
  fbs: featureValue,
  restecg: featureValue,
  thalach: featureValue,
  exang: featureValue,
  oldpeak: featureValue,
  slope: featureValue,
  ca: featureValue,
  thal: featureValue,
});

export const alzheimerFieldsSchema = z.object({
  age: featureValue,
  educ: featureValue,
  ses: featureValue,
  mmse: featureValue,
  etiv: featureValue,
  nwbv: featureValue,
  asf: featureValue,
});

/**
 * Heart request body: `{ features: [...] }` or the 13 named fields.
 */
export const heartPayloadSchema = z.union([featureArraySchema, heartFieldsSchema]);

/**
 * Alzheimer request body: `{ features: [...] }` or the 7 named fields.
 */
export const alzheimerPayloadSchema = z.union([
  featureArraySchema,
  alzheimerFieldsSchema,
]);

export type HeartPayload = z.infer<typeof heartPayloadSchema>;
export type AlzheimerPayload = z.infer<typeof alzheimerPayloadSchema>;

/**
 * Validates a prediction body and returns its values in field order.
 *
 * Throws `ZodError` when the body has neither shape.
 */
export function parsePredictionPayload(
  kind: AssessmentKind,
  body: unknown
): unknown[] {
  if (kind === "heart") {
    const p = heartPayloadSchema.parse(body);
    return "features" in p ? p.features : HEART_FIELDS.map((f) => p[f]);
  }
  const p = alzheimerPayloadSchema.parse(body);
  return "features" in p ? p.features : ALZHEIMER_FIELDS.map((f) => p[f]);
}

export const classifyRequestSchema = z.object({
  text: z.string(),
});

export const chatRequestSchema = z.object({
  message: z.string().default(""),
});

/**
 * One record of a batch file: an id, the assessment kind and a prediction
 * payload (either shape) alongside.
 */
export const batchRecordHeaderSchema = z
  .object({
    id: z.string().trim().min(1),
    type: z.enum(["heart", "alzheimer"]),
  })
  .passthrough();

export type BatchRecordHeader = z.infer<typeof batchRecordHeaderSchema>;
