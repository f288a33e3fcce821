/**
 * HTTP routes
 *
 * Handlers take the parsed JSON body and return a status and body; the
 * express router only adapts them.
 */

import { Router, type Request, type Response } from "express";
import type { PipelineContext } from "../context.js";
import type { PageInput } from "../ingestion/IngestionPipeline.js";
import {
  isPageType,
  type RetrievalResult,
  type SearchFilters,
} from "../schemas/documents.js";
import { describeError, GenerationError } from "../errors.js";

export interface HttpResult {
  status: number;
  body: unknown;
}

class BadRequestError extends Error {}

type Body = Record<string, unknown>;

function asBody(raw: unknown): Body {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new BadRequestError("Request body must be a JSON object");
  }
  return Object.fromEntries(Object.entries(raw));
}

function requireQuery(body: Body): string {
  const query = body.query;
  if (typeof query !== "string" || !query.trim()) {
    throw new BadRequestError('"query" must be a non-empty string');
  }
  return query.trim();
}

function optionalPositiveInt(body: Body, key: string, max: number): number | undefined {
  const value = body[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1 || value > max) {
    throw new BadRequestError(`"${key}" must be an integer between 1 and ${max}`);
  }
  return value;
}

function optionalBoolean(body: Body, key: string): boolean {
  const value = body[key];
  if (value === undefined) return false;
  if (typeof value !== "boolean") {
    throw new BadRequestError(`"${key}" must be a boolean`);
  }
  return value;
}

function parseFilters(body: Body): SearchFilters {
  const filters: SearchFilters = {};
  if (body.ownerId !== undefined) {
    if (typeof body.ownerId !== "string" || !body.ownerId) {
      throw new BadRequestError('"ownerId" must be a non-empty string');
    }
    filters.ownerId = body.ownerId;
  }
  if (body.pageType !== undefined) {
    if (!isPageType(body.pageType)) {
      throw new BadRequestError(`Unknown pageType: ${String(body.pageType)}`);
    }
    filters.pageType = body.pageType;
  }
  return filters;
}

function serializeResult(result: RetrievalResult) {
  return {
    chunkId: result.chunk.id,
    pageId: result.chunk.pageId,
    ownerId: result.chunk.ownerId,
    pageType: result.chunk.pageType,
    sourceUrl: result.chunk.sourceUrl,
    chunkIndex: result.chunk.chunkIndex,
    vectorScore: result.vectorScore,
    rerankScore: result.rerankScore,
    sanityWarnings: result.sanityWarnings,
    text: result.annotatedText,
  };
}

/** Deadline for one request; undefined when the timeout is 0 */
function requestSignal(timeoutMs: number): AbortSignal | undefined {
  return timeoutMs > 0 ? AbortSignal.timeout(timeoutMs) : undefined;
}

async function handle(fn: () => Promise<HttpResult>): Promise<HttpResult> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof BadRequestError) {
      return { status: 400, body: { error: error.message } };
    }
    if (error instanceof GenerationError) {
      console.error("[API] Generation failed:", error);
      return { status: 502, body: { error: error.message } };
    }
    console.error("[API] Request failed:", error);
    return { status: 500, body: { error: describeError(error) } };
  }
}

export function handleIngest(ctx: PipelineContext, raw: unknown): Promise<HttpResult> {
  return handle(async () => {
    const body = asBody(raw);
    if (!Array.isArray(body.pages)) {
      throw new BadRequestError('"pages" must be an array');
    }
    const pages: PageInput[] = body.pages.map((page: unknown) =>
      typeof page === "object" && page !== null ? { ...page } : {},
    );
    const report = await ctx.ingestion.ingestBatch(pages, {
      signal: requestSignal(ctx.config.timeouts.ingestMs),
    });
    return { status: 200, body: report };
  });
}

export function handleSearch(ctx: PipelineContext, raw: unknown): Promise<HttpResult> {
  return handle(async () => {
    const body = asBody(raw);
    const query = requireQuery(body);
    const outcome = await ctx.answers.search(query, {
      topK: optionalPositiveInt(body, "topK", 50),
      filters: parseFilters(body),
      expand: optionalBoolean(body, "expand"),
      signal: requestSignal(ctx.config.timeouts.requestMs),
    });
    return {
      status: 200,
      body: {
        query,
        results: outcome.results.map(serializeResult),
        error: outcome.error
          ? { kind: outcome.error.kind, message: outcome.error.message }
          : null,
      },
    };
  });
}

export function handleAnswer(ctx: PipelineContext, raw: unknown): Promise<HttpResult> {
  return handle(async () => {
    const body = asBody(raw);
    const query = requireQuery(body);
    const result = await ctx.answers.answer(query, {
      topK: optionalPositiveInt(body, "topK", 50),
      expand: optionalBoolean(body, "expand"),
      signal: requestSignal(ctx.config.timeouts.requestMs),
    });
    return { status: 200, body: { query, ...result } };
  });
}

export function handleAgent(ctx: PipelineContext, raw: unknown): Promise<HttpResult> {
  return handle(async () => {
    const body = asBody(raw);
    const query = requireQuery(body);
    const result = await ctx.answers.runAgent(
      query,
      optionalPositiveInt(body, "maxSteps", 20),
    );
    return {
      status: 200,
      body: {
        query,
        sessionId: result.sessionId,
        answer: result.answer,
        finalState: result.finalState,
        steps: result.stepCount,
        toolCalls: result.toolCallCount,
      },
    };
  });
}

export function handleHealth(ctx: PipelineContext): HttpResult {
  return {
    status: 200,
    body: {
      status: "ok",
      timestamp: new Date().toISOString(),
      database: ctx.database.isInitialized(),
    },
  };
}

export function handleStatus(ctx: PipelineContext): HttpResult {
  return {
    status: 200,
    body: {
      status: "running",
      version: "0.1.0",
      uptimeMs: Date.now() - ctx.startedAt,
      pages: ctx.store.countPages(),
      chunks: ctx.store.countChunks(),
      activeConnections: ctx.database.getActiveConnectionCount(),
      config: {
        rerank: ctx.retriever.isRerankEnabled(),
        oversampleFactor: ctx.retriever.oversampleFactor,
        topK: ctx.config.retrieval.topK,
        agentMaxSteps: ctx.config.agent.maxSteps,
      },
    },
  };
}

function send(res: Response, result: HttpResult): void {
  res.status(result.status).json(result.body);
}

export function createRouter(ctx: PipelineContext): Router {
  const router = Router();

  router.get("/health", (_req: Request, res: Response) => {
    send(res, handleHealth(ctx));
  });
  router.get("/status", (_req: Request, res: Response) => {
    send(res, handleStatus(ctx));
  });
  router.post("/ingest", (req: Request, res: Response) => {
    void handleIngest(ctx, req.body).then((result) => send(res, result));
  });
  router.post("/search", (req: Request, res: Response) => {
    void handleSearch(ctx, req.body).then((result) => send(res, result));
  });
  router.post("/answer", (req: Request, res: Response) => {
    void handleAnswer(ctx, req.body).then((result) => send(res, result));
  });
  router.post("/agent", (req: Request, res: Response) => {
    void handleAgent(ctx, req.body).then((result) => send(res, result));
  });

  return router;
}
