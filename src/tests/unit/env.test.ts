import assert from "node:assert/strict";
import { test } from "node:test";
import { createEmbeddingCapability } from "../../ai/embeddings.capability";
import { OpenAiEmbeddingsClient } from "../../ai/embeddings.client";
import { loadEnv } from "../../config/env";
import { noopLogger } from "../../config/logger";

test("applies defaults", () => {
  assert.deepEqual(loadEnv({}), {
    nodeEnv: "development",
    port: 5000,
    logLevel: "info",
    semanticMatchingEnabled: true,
    openaiApiKey: undefined,
    openaiEmbeddingModel: "text-embedding-3-small",
    embeddingsTimeoutMs: 15000,
    maxUploadBytes: 16 * 1024 * 1024,
  });
});

test("reads overrides", () => {
  const env = loadEnv({
    PORT: "8080",
    LOG_LEVEL: "DEBUG",
    SEMANTIC_MATCHING_ENABLED: "no",
    OPENAI_API_KEY: "  test-key  ",
    MAX_UPLOAD_MB: "2",
  });
  assert.equal(env.port, 8080);
  assert.equal(env.logLevel, "debug");
  assert.equal(env.semanticMatchingEnabled, false);
  assert.equal(env.openaiApiKey, "test-key");
  assert.equal(env.maxUploadBytes, 2 * 1024 * 1024);
});

test("rejects invalid values", () => {
  assert.throws(() => loadEnv({ PORT: "abc" }), /^Error: Invalid PORT value: abc$/);
  assert.throws(() => loadEnv({ LOG_LEVEL: "loud" }), /Invalid LOG_LEVEL value: loud/);
  assert.throws(() => loadEnv({ SEMANTIC_MATCHING_ENABLED: "maybe" }), /Invalid SEMANTIC_MATCHING_ENABLED value: maybe/);
  assert.throws(() => loadEnv({ EMBEDDINGS_TIMEOUT_MS: "10" }), /Invalid EMBEDDINGS_TIMEOUT_MS value: 10/);
  assert.throws(() => loadEnv({ MAX_UPLOAD_MB: "0" }), /Invalid MAX_UPLOAD_MB value: 0/);
});

test("treats a blank API key as absent", () => {
  assert.equal(loadEnv({ OPENAI_API_KEY: "   " }).openaiApiKey, undefined);
});

test("creates the embedding capability only when enabled and configured", () => {
  assert.equal(createEmbeddingCapability(loadEnv({ OPENAI_API_KEY: "test-key", SEMANTIC_MATCHING_ENABLED: "false" }), noopLogger), null);
  assert.equal(createEmbeddingCapability(loadEnv({}), noopLogger), null);

  const capability = createEmbeddingCapability(loadEnv({ OPENAI_API_KEY: "test-key" }), noopLogger);
  assert.ok(capability instanceof OpenAiEmbeddingsClient);
  assert.equal(capability.getModelName(), "text-embedding-3-small");
});
