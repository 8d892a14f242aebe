import fetch from "node-fetch";
import { EmbeddingFailure } from "../shared/errors";
import { EmbeddingCapability } from "./embeddings.capability";

interface EmbeddingsResponse {
  data: Array<{
    embedding: number[];
  }>;
}

const MAX_INPUT_CHARS = 6000;

export class OpenAiEmbeddingsClient implements EmbeddingCapability {
  constructor(
    private readonly apiKey: string,
    private readonly model: string,
    private readonly timeoutMs: number,
  ) {}

  getModelName(): string {
    return this.model;
  }

  async encode(text: string): Promise<number[]> {
    return withTimeout(this.request(text), this.timeoutMs);
  }

  private async request(text: string): Promise<number[]> {
    const response = await fetch("https://api.openai.com/v1/embeddings", {
      method: "POST",
      headers: {
        authorization: `Bearer ${this.apiKey}`,
        "content-type": "application/json",
      },
      body: JSON.stringify({
        model: this.model,
        input: text.slice(0, MAX_INPUT_CHARS),
      }),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new EmbeddingFailure(`Embeddings API error: HTTP ${response.status} - ${body}`);
    }

    const body = (await response.json()) as EmbeddingsResponse;
    const vector = body.data[0]?.embedding;
    if (!Array.isArray(vector) || vector.length === 0) {
      throw new EmbeddingFailure("Embeddings API returned empty vector.");
    }

    return vector;
  }
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new EmbeddingFailure(`Embeddings request timeout after ${timeoutMs}ms`));
    }, timeoutMs);
    promise
      .then((value) => {
        clearTimeout(timer);
        resolve(value);
      })
      .catch((error: unknown) => {
        clearTimeout(timer);
        reject(error);
      });
  });
}
