/**
 * Canonical event schema for the admissions RAG pipeline
 */

import type { PageType } from "./documents.js";

export type EventSource =
  | "ingestion"
  | "retriever"
  | "expander"
  | "agent"
  | "api";

export interface BaseEvent {
  event_id: string;
  session_id: string;
  t_ms: number;
  source: EventSource;
  type: string;
  payload: unknown;
}

// Ingestion Events
export interface IngestPagePayload {
  page_id: string;
  url: string;
  owner_id: string;
  page_type: PageType;
  chunk_count: number;
}

export interface IngestSkippedPayload {
  url: string;
  reason: string;
}

export interface IngestPageEvent extends BaseEvent {
  type: "ingest.page";
  source: "ingestion";
  payload: IngestPagePayload;
}

export interface IngestSkippedEvent extends BaseEvent {
  type: "ingest.skipped";
  source: "ingestion";
  payload: IngestSkippedPayload;
}

// Retrieval Events
export interface RetrievalQueryPayload {
  query: string;
  top_k: number;
  pool_size: number;
  filters: {
    owner_id?: string;
    page_type?: PageType;
  };
  rerank: boolean;
}

export interface RetrievalResultPayload {
  query: string;
  candidate_count: number;
  result_count: number;
  reranked: boolean;
  duration_ms: number;
}

export interface RetrievalErrorPayload {
  query: string;
  kind: string;
  message: string;
}

export interface RetrievalEvent extends BaseEvent {
  type: "retrieval.query" | "retrieval.result" | "retrieval.error";
  source: "retriever" | "expander";
  payload: RetrievalQueryPayload | RetrievalResultPayload | RetrievalErrorPayload;
}

// Tool Events
export interface ToolCallPayload {
  tool_name: string;
  args: Record<string, unknown>;
  call_id: string;
}

export interface ToolResultPayload {
  call_id: string;
  result: unknown;
  error?: string;
}

export interface ToolEvent extends BaseEvent {
  type: "tool.call" | "tool.result";
  source: "agent";
  payload: ToolCallPayload | ToolResultPayload;
}

// Agent Events
export interface AgentTransitionPayload {
  from: string;
  to: string;
  trigger: string;
  step: number;
}

export interface AgentTransitionEvent extends BaseEvent {
  type: "agent.transition";
  source: "agent";
  payload: AgentTransitionPayload;
}

// Union type for all events
export type Event =
  | IngestPageEvent
  | IngestSkippedEvent
  | RetrievalEvent
  | ToolEvent
  | AgentTransitionEvent;
