/**
 * QueryExpander: multi-query retrieval.
 *
 * Paraphrases widen recall; the single rerank pass always scores the whole
 * merged pool against the original query.
 */

import type { GenerativeModel } from "../providers/ProviderAdapter.js";
import type { SearchFilters } from "../schemas/documents.js";
import { describeError, RetrievalError } from "../errors.js";
import {
  toRetrievalResult,
  type HybridRetriever,
  type RankedCandidates,
  type RetrievalOutcome,
  type SearchOptions,
} from "./HybridRetriever.js";
import type { ScoredChunk } from "./VectorStore.js";

export const DEFAULT_PARAPHRASE_COUNT = 3;

const PARAPHRASE_SYSTEM_PROMPT =
  "You rewrite search queries for a vector database about graduate admissions.";

function paraphrasePrompt(query: string, n: number): string {
  return [
    `The user's original question is: "${query}".`,
    `Write ${n} related search queries with slightly different wording, to retrieve more complete information from a vector database.`,
    "Cover different aspects of the question or use different terminology (for example both the full name and the abbreviation).",
    "Output one query per line, with no numbering and no preamble.",
  ].join("\n");
}

/** Strip list markers ("1.", "2)", "-", "*", "•") and surrounding quotes */
export function cleanParaphraseLine(line: string): string {
  return line
    .trim()
    .replace(/^(?:\d+[.)]|[-*•])\s*/, "")
    .replace(/^["']|["']$/g, "")
    .trim();
}

export function parseParaphrases(
  original: string,
  output: string,
  n: number,
): string[] {
  const queries: string[] = [original];
  for (const line of output.split(/\r?\n/)) {
    const cleaned = cleanParaphraseLine(line);
    if (cleaned && !queries.includes(cleaned)) {
      queries.push(cleaned);
    }
  }
  return queries.slice(0, n + 1);
}

export interface ExpandedSearchOptions extends SearchOptions {
  paraphraseCount?: number;
}

export class QueryExpander {
  constructor(
    private retriever: HybridRetriever,
    private model: GenerativeModel,
  ) {}

  /**
   * The original query first, then up to `n` distinct paraphrases. Falls
   * back to the original alone when generation fails.
   */
  async generateParaphrases(
    query: string,
    n: number = DEFAULT_PARAPHRASE_COUNT,
    signal?: AbortSignal,
  ): Promise<string[]> {
    if (n <= 0) return [query];
    try {
      const response = await this.model.generate({
        system: PARAPHRASE_SYSTEM_PROMPT,
        turns: [{ role: "user", content: paraphrasePrompt(query, n) }],
        temperature: 0.7,
        signal,
      });
      return parseParaphrases(query, response.text, n);
    } catch (error) {
      console.warn(
        `[QueryExpander] Paraphrase generation failed, using original only: ${describeError(error)}`,
      );
      return [query];
    }
  }

  async searchExpanded(
    query: string,
    topK: number,
    filters: SearchFilters = {},
    options: ExpandedSearchOptions = {},
  ): Promise<RetrievalOutcome> {
    const trimmed = query.trim();
    if (!trimmed || topK <= 0) {
      return { results: [], error: null };
    }

    const sessionId = options.sessionId ?? "expansion";
    const startedAt = Date.now();
    const rerank = this.retriever.isRerankEnabled() && (options.rerank ?? true);
    const queries = await this.generateParaphrases(
      trimmed,
      options.paraphraseCount ?? DEFAULT_PARAPHRASE_COUNT,
      options.signal,
    );
    console.log(`[QueryExpander] Searching ${queries.length} queries`);

    // Every paraphrase gets an oversampled pool even when the final stage
    // is a vector-score sort.
    const poolSize = topK * this.retriever.oversampleFactor;
    const settled = await Promise.all(
      queries.map((q) =>
        this.retriever
          .candidatePool(q, poolSize, filters, options.signal)
          .then(
            (pool) => ({ pool, error: null }),
            (error: unknown) => ({
              pool: [],
              error:
                error instanceof RetrievalError
                  ? error
                  : new RetrievalError(describeError(error), "storage", error),
            }),
          ),
      ),
    );

    const failures = settled.filter((entry) => entry.error !== null);
    for (const entry of failures) {
      if (entry.error) {
        this.retriever.emit("expander", sessionId, "retrieval.error", {
          query: trimmed,
          kind: entry.error.kind,
          message: entry.error.message,
        });
      }
    }
    if (failures.length === settled.length) {
      const first = failures[0]?.error;
      return {
        results: [],
        error: first ?? new RetrievalError("All expanded searches failed", "storage"),
      };
    }

    const merged = mergePools(settled.map((entry) => entry.pool));
    // Rerank ties keep the merged first-seen order.
    const ranked: RankedCandidates = rerank
      ? await this.retriever.rerankInOrder(
          trimmed,
          merged.map(toRetrievalResult),
          topK,
          options.signal,
        )
      : {
          results: [...merged]
            .sort((a, b) => b.score - a.score)
            .slice(0, topK)
            .map(toRetrievalResult),
          reranked: false,
        };

    this.retriever.emit("expander", sessionId, "retrieval.result", {
      query: trimmed,
      candidate_count: merged.length,
      result_count: ranked.results.length,
      reranked: ranked.reranked,
      duration_ms: Date.now() - startedAt,
    });

    return { results: ranked.results, error: null };
  }
}

/**
 * Concatenate pools in order, keeping the first occurrence of each chunk
 * text.
 */
export function mergePools(pools: ScoredChunk[][]): ScoredChunk[] {
  const seen = new Set<string>();
  const merged: ScoredChunk[] = [];
  for (const pool of pools) {
    for (const candidate of pool) {
      if (seen.has(candidate.chunk.text)) continue;
      seen.add(candidate.chunk.text);
      merged.push(candidate);
    }
  }
  return merged;
}
