import express, { Express, NextFunction, Request, Response } from "express";
import multer from "multer";
import { createEmbeddingCapability, EmbeddingCapability } from "./ai/embeddings.capability";
import { EnvConfig } from "./config/env";
import { createLogger, errorMessage, Logger } from "./config/logger";
import { DocumentService } from "./documents/document.service";
import { MatchRequestService } from "./matching/match-request.service";
import { toMatchResponse } from "./matching/match-response";
import { MatchingEngine } from "./matching/matching.engine";
import { MatchScorer } from "./matching/scoring/match-score";
import { MatchingError } from "./shared/errors";
import { renderIndexPage, renderResultPage } from "./web/match.page";

export const SERVICE_VERSION = "1.0.0";

export interface AppContext {
  app: Express;
  logger: Logger;
  engine: MatchingEngine;
}

export interface AppOverrides {
  logger?: Logger;
  embeddings?: EmbeddingCapability | null;
}

export function createApp(env: EnvConfig, overrides: AppOverrides = {}): AppContext {
  const logger = overrides.logger ?? createLogger({ minLevel: env.logLevel });
  const embeddings =
    overrides.embeddings !== undefined ? overrides.embeddings : createEmbeddingCapability(env, logger);

  const scorer = new MatchScorer(embeddings, logger);
  const engine = new MatchingEngine(scorer, logger);
  const documentService = new DocumentService(logger);
  const matchRequestService = new MatchRequestService(documentService, engine, logger);

  const app = express();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: env.maxUploadBytes },
  });

  app.get("/", (_request: Request, response: Response) => {
    response.status(200).type("html").send(renderIndexPage(engine.isSemanticEnabled()));
  });

  app.get("/health", (_request: Request, response: Response) => {
    response.status(200).json({
      status: "healthy",
      semantic_matching: engine.isSemanticEnabled(),
      version: SERVICE_VERSION,
    });
  });

  app.post("/match", upload.single("resume"), async (request: Request, response: Response) => {
    const startedAt = Date.now();
    try {
      const jobDescription: unknown = request.body?.job_description;
      const result = await matchRequestService.handle({
        resume: request.file
          ? { buffer: request.file.buffer, fileName: request.file.originalname }
          : undefined,
        jobDescription: typeof jobDescription === "string" ? jobDescription : undefined,
      });
      const body = toMatchResponse(result);
      logger.info("Match request completed", {
        latency_ms: Date.now() - startedAt,
        overall_score: body.match_scores.overall_score,
      });

      if (wantsJson(request)) {
        response.status(200).json(body);
        return;
      }
      response.status(200).type("html").send(renderResultPage(body));
    } catch (error) {
      sendError(response, error, logger);
    }
  });

  app.use((error: unknown, _request: Request, response: Response, _next: NextFunction) => {
    if (error instanceof multer.MulterError) {
      logger.warn("Upload rejected", { code: error.code, error: error.message });
      response.status(400).json({ error: error.message });
      return;
    }
    sendError(response, error, logger);
  });

  return { app, logger, engine };
}

function wantsJson(request: Request): boolean {
  const contentType = request.header("content-type") ?? "";
  const accept = request.header("accept") ?? "";
  return contentType === "application/json" || accept.includes("application/json");
}

function sendError(response: Response, error: unknown, logger: Logger): void {
  if (error instanceof MatchingError) {
    logger.warn("Match request rejected", { code: error.code, error: error.message });
    response.status(error.statusCode).json({ error: error.message });
    return;
  }
  logger.error("Match request failed", { error: errorMessage(error) });
  response.status(500).json({ error: `An error occurred: ${errorMessage(error)}` });
}
