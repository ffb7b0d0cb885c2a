import express from "express";
import type { NextFunction, Request, Response } from "express";
import type { Logger } from "winston";
import { ZodError } from "zod";
import { buildChatReply } from "./chat";
import { classify } from "./classifier";
import { createScoringEngines } from "./engine";
import type { ScoringEngines } from "./engine";
import { ValidationError } from "./errors";
import { createLogger } from "./logger";
import {
  chatRequestSchema,
  classifyRequestSchema,
  parsePredictionPayload,
} from "./schemas";
import type { AssessmentKind, ScoringConfig } from "./types";

type AppOptions = {
  scoring?: ScoringConfig;
  engines?: ScoringEngines;
  logger?: Logger;
};

/**
 * Express's JSON parser reports malformed bodies as errors carrying
 * `type: "entity.parse.failed"`.
 */
function isBodyParseError(err: unknown): boolean {
  return (
    err instanceof SyntaxError &&
    "type" in err &&
    err.type === "entity.parse.failed"
  );
}

/**
 * Status of a client error raised by Express middleware (body too large,
 * unsupported charset, ...). Such errors carry `expose: true` and a 4xx
 * `status`.
 */
function exposedClientStatus(err: unknown): number | null {
  if (
    typeof err === "object" &&
    err !== null &&
    "expose" in err &&
    err.expose === true &&
    "status" in err &&
    typeof err.status === "number" &&
    err.status >= 400 &&
    err.status < 500
  ) {
    return err.status;
  }
  return null;
}

/**
 * Builds the HTTP app. Engines are created once here and shared by every
 * request; they hold no mutable state.
 */
export function createApp({ scoring, engines, logger }: AppOptions = {}): express.Express {
  const log = logger ?? createLogger("http");
  const scorers = engines ?? createScoringEngines(scoring, { logger: log });

  const app = express();
  app.disable("x-powered-by");
  app.use(express.json({ limit: "100kb" }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  function predict(kind: AssessmentKind) {
    return (req: Request, res: Response, next: NextFunction) => {
      try {
        const values = parsePredictionPayload(kind, req.body);
        const assessment =
          kind === "heart" ? scorers.heart.score(values) : scorers.alzheimer.score(values);
        res.json(assessment);
      } catch (err) {
        next(err);
      }
    };
  }

  // POST /api/predict/heart -> heart risk assessment
  app.post("/api/predict/heart", predict("heart"));

  // POST /api/predict/alzheimer -> Alzheimer risk assessment
  app.post("/api/predict/alzheimer", predict("alzheimer"));

  // POST /api/classify -> condition + urgency for free text
  app.post("/api/classify", (req, res, next) => {
    try {
      const { text } = classifyRequestSchema.parse(req.body);
      res.json(classify(text));
    } catch (err) {
      next(err);
    }
  });

  // POST /api/chat -> rule-based reply with medicine recommendations
  app.post("/api/chat", (req, res, next) => {
    try {
      const { message } = chatRequestSchema.parse(req.body ?? {});
      res.json(buildChatReply(message));
    } catch (err) {
      next(err);
    }
  });

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ValidationError) {
      return res.status(400).json({ error: err.message, details: err.details });
    }
    if (err instanceof ZodError) {
      return res.status(400).json({ error: "Invalid request body", issues: err.issues });
    }
    if (isBodyParseError(err)) {
      return res.status(400).json({ error: "Malformed JSON body" });
    }
    const status = exposedClientStatus(err);
    if (status !== null) {
      return res.status(status).json({
        error: err instanceof Error ? err.message : "Bad request",
      });
    }

    log.error("Unhandled request error", {
      method: req.method,
      path: req.path,
      error: err instanceof Error ? err.message : String(err),
    });
    return res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
