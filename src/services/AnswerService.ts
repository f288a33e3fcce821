/**
 * Answer Service
 *
 * Direct answers (retrieve, audit, assemble, one generation) and agent runs
 * behind one entry point for the HTTP layer.
 */

import type { HybridRetriever, RetrievalOutcome } from "../retrieval/HybridRetriever.js";
import type { QueryExpander } from "../retrieval/QueryExpander.js";
import { assembleContext } from "../retrieval/ContextAssembly.js";
import type { SanityAuditor } from "../insurance/SanityAuditor.js";
import type { AgentLoop, AgentRunResult } from "../orchestrator/AgentLoop.js";
import type { GenerativeModel } from "../providers/ProviderAdapter.js";
import type { RetrievalResult, SearchFilters } from "../schemas/documents.js";
import { describeError, GenerationError } from "../errors.js";

export const NO_RELEVANT_INFORMATION =
  "No relevant information was found in the admissions database for this question. Please check the school's official website.";

export const ADVISOR_SYSTEM_PROMPT = `You are a graduate admissions advisor. Answer the question using only the sources provided.
- Never invent numbers, dates or policies that the sources do not state.
- If the sources do not answer the question, say so and suggest the official website.
- Cite the source URL after each sentence that states a figure.
- A source with a "Suspicious data" banner may be wrong: say so if you use it.`;

export type AnswerStatus = "answered" | "empty" | "retrieval_failed";

export interface AnswerSource {
  url: string;
  ownerId: string;
  pageType: string;
  vectorScore: number;
  rerankScore?: number;
  sanityWarnings: string[];
}

export interface AnswerResult {
  status: AnswerStatus;
  answer: string;
  sources: AnswerSource[];
  error?: string;
}

export interface SearchRequestOptions {
  topK?: number;
  filters?: SearchFilters;
  expand?: boolean;
  signal?: AbortSignal;
  sessionId?: string;
}

export interface AnswerServiceConfig {
  topK: number;
  contextMaxChars: number;
  expansionCount: number;
  systemPrompt: string;
}

function toSource(result: RetrievalResult): AnswerSource {
  return {
    url: result.chunk.sourceUrl,
    ownerId: result.chunk.ownerId,
    pageType: result.chunk.pageType,
    vectorScore: result.vectorScore,
    rerankScore: result.rerankScore,
    sanityWarnings: result.sanityWarnings.map((warning) => warning.rule),
  };
}

export class AnswerService {
  private config: AnswerServiceConfig;

  constructor(
    private retriever: HybridRetriever,
    private expander: QueryExpander,
    private auditor: SanityAuditor,
    private model: GenerativeModel,
    private agent: AgentLoop,
    config: Partial<AnswerServiceConfig> = {},
  ) {
    this.config = {
      topK: 5,
      contextMaxChars: 12000,
      expansionCount: 3,
      systemPrompt: ADVISOR_SYSTEM_PROMPT,
      ...config,
    };
  }

  /**
   * Retrieve and audit. Plain or expanded retrieval, never throws.
   */
  async search(
    query: string,
    options: SearchRequestOptions = {},
  ): Promise<RetrievalOutcome> {
    const topK = options.topK ?? this.config.topK;
    const outcome = options.expand
      ? await this.expander.searchExpanded(query, topK, options.filters, {
          signal: options.signal,
          sessionId: options.sessionId,
          paraphraseCount: this.config.expansionCount,
        })
      : await this.retriever.search(query, topK, options.filters, {
          signal: options.signal,
          sessionId: options.sessionId,
        });

    return {
      results: this.auditor.annotate(outcome.results),
      error: outcome.error,
    };
  }

  async answer(
    query: string,
    options: SearchRequestOptions = {},
  ): Promise<AnswerResult> {
    const outcome = await this.search(query, options);

    if (outcome.error) {
      console.warn(
        `[AnswerService] Retrieval failed (${outcome.error.kind}): ${outcome.error.message}`,
      );
      return {
        status: "retrieval_failed",
        answer: NO_RELEVANT_INFORMATION,
        sources: [],
        error: outcome.error.message,
      };
    }
    if (outcome.results.length === 0) {
      return { status: "empty", answer: NO_RELEVANT_INFORMATION, sources: [] };
    }

    const context = assembleContext(outcome.results, {
      maxChars: this.config.contextMaxChars,
    });

    try {
      const response = await this.model.generate({
        system: this.config.systemPrompt,
        turns: [
          {
            role: "user",
            content: `Sources:\n\n${context}\n\nQuestion: ${query}`,
          },
        ],
        signal: options.signal,
      });
      return {
        status: "answered",
        answer: response.text.trim(),
        sources: outcome.results.map(toSource),
      };
    } catch (error) {
      if (error instanceof GenerationError) throw error;
      throw new GenerationError(
        `Answer generation failed: ${describeError(error)}`,
        error,
      );
    }
  }

  async runAgent(
    query: string,
    maxSteps?: number,
    options: { signal?: AbortSignal; sessionId?: string } = {},
  ): Promise<AgentRunResult> {
    return this.agent.run(query, { maxSteps, ...options });
  }
}
