/**
 * Retrieval tools exposed to the agent.
 *
 * Each call runs one retriever search, audits the results and renders them
 * as context text. Errors come back as text for the model to read; nothing
 * thrown here reaches the agent loop.
 */

import type { HybridRetriever } from "../retrieval/HybridRetriever.js";
import { assembleContext } from "../retrieval/ContextAssembly.js";
import type { SanityAuditor } from "../insurance/SanityAuditor.js";
import type { ToolCall, ToolDefinition } from "../providers/ProviderAdapter.js";
import {
  isPageType,
  PAGE_TYPES,
  type SearchFilters,
} from "../schemas/documents.js";
import { describeError, ToolExecutionError } from "../errors.js";

export const NO_RESULTS_MESSAGE = "[Search results] No relevant information found.";
export const TOOL_ERROR_PREFIX = "[tool error]";

export const TOOL_DEFINITIONS: ToolDefinition[] = [
  {
    name: "search_general",
    description:
      "Semantic search across every school's pages. Use for cross-school comparisons or when the school is unknown. Returns the most relevant passages with their sources.",
    parameters: {
      type: "object",
      properties: {
        query: {
          type: "string",
          description: "A specific search phrase; the more precise the better.",
        },
      },
      required: ["query"],
    },
  },
  {
    name: "search_school",
    description:
      "Semantic search restricted to one school. Prefer this when the question names a school.",
    parameters: {
      type: "object",
      properties: {
        query: { type: "string", description: "A specific search phrase." },
        owner_id: {
          type: "string",
          description: "School identifier, for example 'cmu', 'stanford' or 'mit'.",
        },
      },
      required: ["query", "owner_id"],
    },
  },
  {
    name: "search_page_type",
    description:
      "Semantic search restricted to one school and one page type. Deadlines live on 'admissions' pages, detailed answers on 'faq', document lists on 'checklist', applicant experiences on 'reddit'.",
    parameters: {
      type: "object",
      properties: {
        query: { type: "string", description: "A specific search phrase." },
        owner_id: { type: "string", description: "School identifier." },
        page_type: {
          type: "string",
          enum: [...PAGE_TYPES],
          description: "Page type to search.",
        },
      },
      required: ["query", "owner_id", "page_type"],
    },
  },
];

export interface ToolResult {
  callId: string;
  name: string;
  content: string;
  isError: boolean;
}

export interface RetrievalToolsOptions {
  topK: number;
  contextMaxChars: number;
}

interface ParsedCall {
  query: string;
  filters: SearchFilters;
}

function requireString(
  args: Record<string, unknown>,
  key: string,
  toolName: string,
): string {
  const value = args[key];
  if (typeof value !== "string" || !value.trim()) {
    throw new ToolExecutionError(
      `${toolName} requires a non-empty string "${key}"`,
      toolName,
    );
  }
  return value.trim();
}

export function parseToolCall(call: ToolCall): ParsedCall {
  const query = requireString(call.arguments, "query", call.name);
  switch (call.name) {
    case "search_general":
      return { query, filters: {} };
    case "search_school":
      return {
        query,
        filters: { ownerId: requireString(call.arguments, "owner_id", call.name) },
      };
    case "search_page_type": {
      const ownerId = requireString(call.arguments, "owner_id", call.name);
      const pageType = requireString(call.arguments, "page_type", call.name);
      if (!isPageType(pageType)) {
        throw new ToolExecutionError(
          `Unknown page_type "${pageType}"; expected one of ${PAGE_TYPES.join(", ")}`,
          call.name,
        );
      }
      return { query, filters: { ownerId, pageType } };
    }
    default:
      throw new ToolExecutionError(`Unknown tool: ${call.name}`, call.name);
  }
}

export class RetrievalTools {
  readonly definitions: ToolDefinition[] = TOOL_DEFINITIONS;

  constructor(
    private retriever: HybridRetriever,
    private auditor: SanityAuditor,
    private options: RetrievalToolsOptions,
  ) {}

  async execute(
    call: ToolCall,
    signal?: AbortSignal,
    sessionId?: string,
  ): Promise<ToolResult> {
    try {
      const content = await this.run(call, signal, sessionId);
      return { callId: call.id, name: call.name, content, isError: false };
    } catch (error) {
      const message =
        error instanceof ToolExecutionError
          ? error.message
          : `${call.name} failed: ${describeError(error)}`;
      console.warn(`[Tools] ${message}`);
      return {
        callId: call.id,
        name: call.name,
        content: `${TOOL_ERROR_PREFIX} ${message}`,
        isError: true,
      };
    }
  }

  private async run(
    call: ToolCall,
    signal?: AbortSignal,
    sessionId?: string,
  ): Promise<string> {
    const { query, filters } = parseToolCall(call);
    const outcome = await this.retriever.search(query, this.options.topK, filters, {
      signal,
      sessionId,
    });

    if (outcome.error) {
      throw new ToolExecutionError(
        `Search failed (${outcome.error.kind}): ${outcome.error.message}`,
        call.name,
      );
    }
    if (outcome.results.length === 0) {
      return NO_RESULTS_MESSAGE;
    }

    const annotated = this.auditor.annotate(outcome.results);
    return assembleContext(annotated, { maxChars: this.options.contextMaxChars });
  }
}
