import OpenAI from "openai";
import { log } from "../logger.js";
import { StorageUnavailableError, classifyBackendError, errorMessage } from "../errors.js";
import type { SubstrateConfig } from "../types.js";

export interface EmbeddingProvider {
  readonly model: string;
  embed(texts: string[]): Promise<number[][]>;
}

const MAX_INPUT_CHARS = 8000;

export class OpenAiEmbeddingProvider implements EmbeddingProvider {
  private readonly client: OpenAI;
  readonly model: string;

  constructor(config: Pick<SubstrateConfig, "openaiApiKey" | "openaiBaseUrl" | "embeddingModel">) {
    if (!config.openaiApiKey) {
      throw new Error("openaiApiKey is required for the OpenAI embedding provider");
    }
    this.model = config.embeddingModel;
    this.client = new OpenAI({
      apiKey: config.openaiApiKey,
      ...(config.openaiBaseUrl ? { baseURL: config.openaiBaseUrl } : {}),
    });
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    try {
      const res = await this.client.embeddings.create({
        model: this.model,
        input: texts.map((t) => t.slice(0, MAX_INPUT_CHARS)),
      });
      return [...res.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
    } catch (err) {
      log.debug(`embedding request failed: ${errorMessage(err)}`);
      throw new StorageUnavailableError(`embedding backend unavailable: ${errorMessage(err)}`, classifyBackendError(err), {
        cause: err,
      });
    }
  }
}

export function cosineSimilarity(a: number[], b: number[]): number {
  const n = Math.min(a.length, b.length);
  if (n === 0) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < n; i++) {
    const av = a[i] ?? 0;
    const bv = b[i] ?? 0;
    dot += av * bv;
    normA += av * av;
    normB += bv * bv;
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  if (denom === 0) return 0;
  return dot / denom;
}
