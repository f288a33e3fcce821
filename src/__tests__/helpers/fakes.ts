/**
 * Test doubles for the model services
 *
 * Deterministic stand-ins: a hashed bag-of-words embedder, a scoring
 * function reranker, and a scripted generative model that records every
 * request it receives.
 */

import type {
  EmbeddingService,
  GenerationRequest,
  GenerationResponse,
  GenerativeModel,
  RerankService,
  ToolCall,
} from "../../providers/ProviderAdapter.js";

export const TEST_DIMENSIONS = 32;

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
}

function hashToken(token: string): number {
  let hash = 2166136261;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 16777619);
  }
  return hash >>> 0;
}

/**
 * Bag-of-words vector: each token adds 1 to a hashed bucket.
 */
export function bagOfWords(text: string, dimensions: number = TEST_DIMENSIONS): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  for (const token of tokenize(text)) {
    vector[hashToken(token) % dimensions] += 1;
  }
  return vector;
}

export class FakeEmbeddings implements EmbeddingService {
  readonly calls: string[][] = [];
  /** Texts for which embed() rejects */
  failOn: (text: string) => boolean = () => false;

  constructor(readonly dimensions: number = TEST_DIMENSIONS) {}

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    const failing = texts.find((text) => this.failOn(text));
    if (failing !== undefined) {
      throw new Error(`embedding service unavailable for "${failing}"`);
    }
    return texts.map((text) => bagOfWords(text, this.dimensions));
  }
}

export interface RerankCall {
  query: string;
  texts: string[];
}

export class FakeReranker implements RerankService {
  readonly calls: RerankCall[] = [];
  shouldFail = false;

  constructor(
    private scoreFn: (query: string, text: string) => number = overlapScore,
  ) {}

  async score(query: string, texts: string[]): Promise<number[]> {
    this.calls.push({ query, texts: [...texts] });
    if (this.shouldFail) {
      throw new Error("reranker unavailable");
    }
    return texts.map((text) => this.scoreFn(query, text));
  }
}

/** Number of query tokens present in the text */
export function overlapScore(query: string, text: string): number {
  const tokens = new Set(tokenize(text));
  return tokenize(query).filter((token) => tokens.has(token)).length;
}

export type ScriptStep =
  | GenerationResponse
  | ((request: GenerationRequest) => GenerationResponse);

export interface RecordedRequest {
  system: string;
  turns: GenerationRequest["turns"];
  toolNames: string[] | null;
  hadSignal: boolean;
}

/**
 * Generative model that replays a script, one step per generate() call.
 * Turns are copied on receipt since the agent keeps appending to its array.
 */
export class ScriptedModel implements GenerativeModel {
  readonly requests: RecordedRequest[] = [];
  /** Used once the script runs out */
  fallback: ScriptStep | null = null;

  constructor(private script: ScriptStep[] = []) {}

  async generate(request: GenerationRequest): Promise<GenerationResponse> {
    this.requests.push({
      system: request.system,
      turns: [...request.turns],
      toolNames: request.tools ? request.tools.map((tool) => tool.name) : null,
      hadSignal: request.signal !== undefined,
    });

    const step = this.script.shift() ?? this.fallback;
    if (!step) {
      throw new Error("ScriptedModel: script exhausted");
    }
    return typeof step === "function" ? step(request) : step;
  }
}

export function textResponse(text: string): GenerationResponse {
  return { text, toolCalls: [] };
}

let callCounter = 0;

export function toolCallResponse(
  name: string,
  args: Record<string, unknown>,
  text: string = "",
): GenerationResponse {
  callCounter++;
  const call: ToolCall = { id: `call_${callCounter}`, name, arguments: args };
  return { text, toolCalls: [call] };
}
