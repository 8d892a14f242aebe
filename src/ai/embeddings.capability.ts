import { EnvConfig } from "../config/env";
import { Logger } from "../config/logger";
import { OpenAiEmbeddingsClient } from "./embeddings.client";

/**
 * Turns a block of text into an embedding vector. Implementations are shared by concurrent
 * requests and must not keep per-call state.
 */
export interface EmbeddingCapability {
  encode(text: string): Promise<number[]>;
  getModelName?(): string;
}

/**
 * Decided once at startup. `null` means semantic matching is off and scoring is keyword-only.
 */
export function createEmbeddingCapability(
  env: Pick<EnvConfig, "semanticMatchingEnabled" | "openaiApiKey" | "openaiEmbeddingModel" | "embeddingsTimeoutMs">,
  logger: Logger,
): EmbeddingCapability | null {
  if (!env.semanticMatchingEnabled) {
    logger.info("Semantic matching disabled by configuration, using keyword matching only");
    return null;
  }
  if (!env.openaiApiKey) {
    logger.warn("OPENAI_API_KEY is not set, using keyword matching only");
    return null;
  }

  const client = new OpenAiEmbeddingsClient(
    env.openaiApiKey,
    env.openaiEmbeddingModel,
    env.embeddingsTimeoutMs,
  );
  logger.info("Semantic matching enabled", { model: client.getModelName() });
  return client;
}
