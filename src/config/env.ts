import dotenv from "dotenv";
import { LogLevel } from "./logger";

dotenv.config();

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  logLevel: LogLevel;
  semanticMatchingEnabled: boolean;
  openaiApiKey?: string;
  openaiEmbeddingModel: string;
  embeddingsTimeoutMs: number;
  maxUploadBytes: number;
}

function getOptionalTrimmed(source: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const portRaw = source.PORT ?? "5000";
  const port = Number(portRaw);
  const logLevelRaw = (source.LOG_LEVEL ?? "info").trim().toLowerCase();
  const semanticEnabledRaw = source.SEMANTIC_MATCHING_ENABLED ?? "true";
  const embeddingsTimeoutRaw = source.EMBEDDINGS_TIMEOUT_MS ?? "15000";
  const embeddingsTimeoutMs = Number(embeddingsTimeoutRaw);
  const maxUploadMbRaw = source.MAX_UPLOAD_MB ?? "16";
  const maxUploadMb = Number(maxUploadMbRaw);

  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid PORT value: ${portRaw}`);
  }
  if (!Number.isInteger(embeddingsTimeoutMs) || embeddingsTimeoutMs < 1000) {
    throw new Error(`Invalid EMBEDDINGS_TIMEOUT_MS value: ${embeddingsTimeoutRaw}`);
  }
  if (!Number.isInteger(maxUploadMb) || maxUploadMb <= 0) {
    throw new Error(`Invalid MAX_UPLOAD_MB value: ${maxUploadMbRaw}`);
  }

  return {
    nodeEnv: source.NODE_ENV ?? "development",
    port,
    logLevel: parseLogLevel(logLevelRaw),
    semanticMatchingEnabled: parseBoolean("SEMANTIC_MATCHING_ENABLED", semanticEnabledRaw),
    openaiApiKey: getOptionalTrimmed(source, "OPENAI_API_KEY"),
    openaiEmbeddingModel: getOptionalTrimmed(source, "OPENAI_EMBEDDINGS_MODEL") ?? "text-embedding-3-small",
    embeddingsTimeoutMs,
    maxUploadBytes: maxUploadMb * 1024 * 1024,
  };
}

function parseBoolean(name: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  throw new Error(`Invalid ${name} value: ${value}`);
}

function parseLogLevel(value: string): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new Error(`Invalid LOG_LEVEL value: ${value}`);
}
