/**
 * HybridRetriever: two-stage retrieval.
 *
 * Stage 1 embeds the query and scans the vector store for an oversampled
 * candidate pool. Stage 2 scores each (query, candidate) pair with the
 * cross-encoder and keeps the best topK. Failures never escape search():
 * the outcome carries a RetrievalError instead.
 */

import { v4 as uuidv4 } from "uuid";
import type { EventBus } from "../orchestrator/EventBus.js";
import type {
  EmbeddingService,
  RerankService,
} from "../providers/ProviderAdapter.js";
import type {
  RetrievalResult,
  SearchFilters,
} from "../schemas/documents.js";
import type { RetrievalEvent } from "../schemas/events.js";
import { describeError, RetrievalError } from "../errors.js";
import type { ScoredChunk, VectorStore } from "./VectorStore.js";

export interface RetrievalOutcome {
  results: RetrievalResult[];
  error: RetrievalError | null;
}

export interface SearchOptions {
  /** Overrides the retriever default for this call */
  rerank?: boolean;
  signal?: AbortSignal;
  sessionId?: string;
}

export interface HybridRetrieverOptions {
  oversampleFactor?: number;
  rerankEnabled?: boolean;
  eventBus?: EventBus;
}

export interface RankedCandidates {
  results: RetrievalResult[];
  reranked: boolean;
}

const DEFAULT_OVERSAMPLE_FACTOR = 3;
const DEFAULT_SESSION_ID = "retrieval";

export function toRetrievalResult(candidate: ScoredChunk): RetrievalResult {
  return {
    chunk: candidate.chunk,
    vectorScore: candidate.score,
    sanityWarnings: [],
    annotatedText: candidate.chunk.text,
  };
}

export class HybridRetriever {
  readonly oversampleFactor: number;
  private rerankEnabled: boolean;
  private eventBus?: EventBus;

  constructor(
    private store: VectorStore,
    private embeddings: EmbeddingService,
    private reranker: RerankService | null,
    options: HybridRetrieverOptions = {},
  ) {
    this.oversampleFactor = Math.max(
      1,
      options.oversampleFactor ?? DEFAULT_OVERSAMPLE_FACTOR,
    );
    this.rerankEnabled = (options.rerankEnabled ?? true) && reranker !== null;
    this.eventBus = options.eventBus;
  }

  isRerankEnabled(): boolean {
    return this.rerankEnabled;
  }

  /**
   * Candidate pool size for a final topK: oversampled only when a rerank
   * stage will consume it.
   */
  poolSize(topK: number, rerank: boolean = this.rerankEnabled): number {
    return rerank ? topK * this.oversampleFactor : topK;
  }

  async search(
    query: string,
    topK: number,
    filters: SearchFilters = {},
    options: SearchOptions = {},
  ): Promise<RetrievalOutcome> {
    const trimmed = query.trim();
    if (!trimmed || topK <= 0) {
      return { results: [], error: null };
    }

    const sessionId = options.sessionId ?? DEFAULT_SESSION_ID;
    const rerank = this.rerankEnabled && (options.rerank ?? true);
    const poolSize = this.poolSize(topK, rerank);
    const startedAt = Date.now();

    this.emit("retriever", sessionId, "retrieval.query", {
      query: trimmed,
      top_k: topK,
      pool_size: poolSize,
      filters: { owner_id: filters.ownerId, page_type: filters.pageType },
      rerank,
    });

    let pool: ScoredChunk[];
    try {
      pool = await this.candidatePool(trimmed, poolSize, filters, options.signal);
    } catch (error) {
      const retrievalError =
        error instanceof RetrievalError
          ? error
          : new RetrievalError(describeError(error), "storage", error);
      console.error(
        `[Retriever] Search failed (${retrievalError.kind}): ${retrievalError.message}`,
      );
      this.emit("retriever", sessionId, "retrieval.error", {
        query: trimmed,
        kind: retrievalError.kind,
        message: retrievalError.message,
      });
      return { results: [], error: retrievalError };
    }

    const ranked = await this.rerankCandidates(
      trimmed,
      pool,
      topK,
      rerank,
      options.signal,
    );

    this.emit("retriever", sessionId, "retrieval.result", {
      query: trimmed,
      candidate_count: pool.length,
      result_count: ranked.results.length,
      reranked: ranked.reranked,
      duration_ms: Date.now() - startedAt,
    });

    return { results: ranked.results, error: null };
  }

  /**
   * Stage 1 only: embed and scan. Throws RetrievalError.
   */
  async candidatePool(
    query: string,
    size: number,
    filters: SearchFilters = {},
    signal?: AbortSignal,
  ): Promise<ScoredChunk[]> {
    if (signal?.aborted) {
      throw new RetrievalError("Retrieval deadline exceeded", "timeout");
    }

    let vector: number[] | undefined;
    try {
      [vector] = await this.embeddings.embed([query], signal);
    } catch (error) {
      if (signal?.aborted) {
        throw new RetrievalError("Retrieval deadline exceeded", "timeout", error);
      }
      throw new RetrievalError(
        `Query embedding failed: ${describeError(error)}`,
        "embedding",
        error,
      );
    }
    if (!vector || vector.length === 0) {
      throw new RetrievalError("Query embedding was empty", "embedding");
    }

    try {
      return this.store.similaritySearch(vector, size, filters);
    } catch (error) {
      throw new RetrievalError(
        `Vector store scan failed: ${describeError(error)}`,
        "storage",
        error,
      );
    }
  }

  /**
   * Stage 2: order candidates by cross-encoder score and keep topK. Skipped
   * (vector order kept) when reranking is off or the pool already fits; a
   * reranker failure also falls back to vector order.
   */
  async rerankCandidates(
    query: string,
    candidates: ScoredChunk[],
    topK: number,
    rerank: boolean = this.rerankEnabled,
    signal?: AbortSignal,
  ): Promise<RankedCandidates> {
    const byVector = [...candidates]
      .sort((a, b) => b.score - a.score)
      .map(toRetrievalResult);

    if (!rerank || !this.reranker || candidates.length <= topK) {
      return { results: byVector.slice(0, topK), reranked: false };
    }
    return this.rerankInOrder(query, byVector, topK, signal);
  }

  /**
   * Score every result against the query in one batch and stable-sort by
   * that score over the given order, whatever the pool size. Without a
   * reranker, or when it fails, the given order is kept.
   */
  async rerankInOrder(
    query: string,
    ordered: RetrievalResult[],
    topK: number,
    signal?: AbortSignal,
  ): Promise<RankedCandidates> {
    if (!this.reranker || ordered.length === 0) {
      return { results: ordered.slice(0, topK), reranked: false };
    }

    let scores: number[];
    try {
      scores = await this.reranker.score(
        query,
        ordered.map((result) => result.chunk.text),
        signal,
      );
      if (scores.length !== ordered.length) {
        throw new Error(
          `Reranker returned ${scores.length} scores for ${ordered.length} candidates`,
        );
      }
    } catch (error) {
      console.warn("[Retriever] Rerank failed, keeping candidate order:", error);
      return { results: ordered.slice(0, topK), reranked: false };
    }

    const results = ordered
      .map((result, i) => ({ ...result, rerankScore: scores[i] }))
      .sort((a, b) => b.rerankScore - a.rerankScore)
      .slice(0, topK);

    return { results, reranked: true };
  }

  emit(
    source: RetrievalEvent["source"],
    sessionId: string,
    type: RetrievalEvent["type"],
    payload: RetrievalEvent["payload"],
  ): void {
    if (!this.eventBus) return;
    this.eventBus.emit({
      event_id: uuidv4(),
      session_id: sessionId,
      t_ms: Date.now(),
      source,
      type,
      payload,
    });
  }
}
