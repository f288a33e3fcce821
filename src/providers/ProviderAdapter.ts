/**
 * Provider interfaces for the model services the pipeline depends on.
 * Implementations are created once per process and treated as stateless.
 */

export interface EmbeddingService {
  /** One vector per input text, in input order */
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
  readonly dimensions: number;
}

export interface RerankService {
  /** One relevance score per text, in input order; higher is better */
  score(query: string, texts: string[], signal?: AbortSignal): Promise<number[]>;
}

export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface ToolDefinition {
  name: string;
  description: string;
  /** JSON Schema for the arguments object */
  parameters: Record<string, unknown>;
}

export type Turn =
  | { role: "user"; content: string }
  | { role: "assistant"; content: string; toolCalls: ToolCall[] }
  | { role: "tool"; callId: string; name: string; content: string };

export interface GenerationRequest {
  system: string;
  turns: Turn[];
  /** Omitted or empty: the model must answer in text */
  tools?: ToolDefinition[];
  temperature?: number;
  signal?: AbortSignal;
}

export interface GenerationResponse {
  text: string;
  toolCalls: ToolCall[];
}

export interface GenerativeModel {
  generate(request: GenerationRequest): Promise<GenerationResponse>;
}
