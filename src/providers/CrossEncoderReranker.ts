/**
 * Cross-encoder reranker over a Cohere-compatible `/rerank` endpoint
 * (hosted Cohere or Jina, or a self-hosted bge-reranker server).
 */

import type { RerankService } from "./ProviderAdapter.js";

export interface CrossEncoderRerankerConfig {
  /** Base URL; `/rerank` is appended */
  url: string;
  apiKey?: string;
  model: string;
}

interface RerankResponseItem {
  index: number;
  relevance_score: number;
}

export class CrossEncoderReranker implements RerankService {
  private endpoint: string;

  constructor(private config: CrossEncoderRerankerConfig) {
    this.endpoint = `${config.url.replace(/\/+$/, "")}/rerank`;
  }

  async score(
    query: string,
    texts: string[],
    signal?: AbortSignal,
  ): Promise<number[]> {
    if (texts.length === 0) return [];

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (this.config.apiKey) {
      headers.Authorization = `Bearer ${this.config.apiKey}`;
    }

    const response = await fetch(this.endpoint, {
      method: "POST",
      headers,
      body: JSON.stringify({
        model: this.config.model,
        query,
        documents: texts,
        top_n: texts.length,
        return_documents: false,
      }),
      signal,
    });

    if (!response.ok) {
      throw new Error(
        `Rerank request failed: ${response.status} ${response.statusText}`,
      );
    }

    const items = parseResults(await response.json());
    const scores: number[] = new Array<number>(texts.length).fill(
      Number.NEGATIVE_INFINITY,
    );
    for (const item of items) {
      if (item.index >= 0 && item.index < texts.length) {
        scores[item.index] = item.relevance_score;
      }
    }
    return scores;
  }
}

function parseResults(body: unknown): RerankResponseItem[] {
  if (typeof body !== "object" || body === null || !("results" in body)) {
    throw new Error("Rerank response has no results");
  }
  const results = body.results;
  if (!Array.isArray(results)) {
    throw new Error("Rerank response results is not an array");
  }

  const items: RerankResponseItem[] = [];
  for (const result of results) {
    if (
      typeof result === "object" &&
      result !== null &&
      "index" in result &&
      "relevance_score" in result &&
      typeof result.index === "number" &&
      typeof result.relevance_score === "number"
    ) {
      items.push({ index: result.index, relevance_score: result.relevance_score });
    }
  }
  return items;
}
