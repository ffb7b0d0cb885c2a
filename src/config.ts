import { z } from "zod";
import { ConfigError } from "./errors";
import type { ScoringConfig } from "./types";

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  LOG_LEVEL: z
    .enum(["error", "warn", "info", "http", "verbose", "debug", "silly"])
    .default("info"),
  HEART_LABEL_STYLE: z.enum(["binary", "tiered"]).default("binary"),
  ALZHEIMER_STRATEGY: z.enum(["continuous", "rule_based"]).default("continuous"),
});

export type AppConfig = {
  port: number;
  logLevel: string;
  scoring: ScoringConfig;
};

/**
 * Reads configuration from environment variables.
 *
 * No trained model artifacts ship with the service, so `hasTrainedModel` is
 * always false here; callers that have a model build `ScoringConfig`
 * themselves.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings count as unset.
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== "")
  );

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    scoring: {
      hasTrainedModel: false,
      heartLabelStyle: e.HEART_LABEL_STYLE,
      alzheimerStrategy: e.ALZHEIMER_STRATEGY,
    },
  };
}
