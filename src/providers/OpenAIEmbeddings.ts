/**
 * OpenAI Embeddings Service
 */

import OpenAI from "openai";
import type { EmbeddingService } from "./ProviderAdapter.js";

export interface OpenAIEmbeddingsConfig {
  apiKey: string;
  model: string;
  dimensions: number;
  /** Inputs per request */
  batchSize?: number;
}

export class OpenAIEmbeddings implements EmbeddingService {
  private client: OpenAI;
  private config: Required<OpenAIEmbeddingsConfig>;

  constructor(config: OpenAIEmbeddingsConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey });
    this.config = { batchSize: 96, ...config };
  }

  get dimensions(): number {
    return this.config.dimensions;
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];

    const vectors: number[][] = [];
    for (let i = 0; i < texts.length; i += this.config.batchSize) {
      const batch = texts.slice(i, i + this.config.batchSize);
      try {
        const response = await this.client.embeddings.create(
          {
            model: this.config.model,
            input: batch,
            dimensions: this.config.dimensions,
          },
          { signal },
        );
        const ordered = [...response.data].sort((a, b) => a.index - b.index);
        vectors.push(...ordered.map((item) => item.embedding));
      } catch (error) {
        console.error(
          `[Embeddings] Failed to embed batch of ${batch.length}:`,
          error,
        );
        throw error;
      }
    }
    return vectors;
  }
}
