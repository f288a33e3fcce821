/**
 * Pipeline fixtures: a ServerConfig for tests, a fully wired context on
 * in-memory SQLite with fake model services, and a handful of seed pages.
 */

import { resolve } from "path";
import type { ServerConfig } from "../../config/index.js";
import { createPipelineContext, type PipelineContext } from "../../context.js";
import { DatabaseAdapter } from "../../storage/Database.js";
import { EventBus } from "../../orchestrator/EventBus.js";
import type { PageInput } from "../../ingestion/IngestionPipeline.js";
import { FakeEmbeddings, FakeReranker, ScriptedModel } from "./fakes.js";

export const KNOWLEDGE_DIR = resolve(__dirname, "../../../knowledge");

export function testConfig(overrides: Partial<ServerConfig> = {}): ServerConfig {
  return {
    port: 0,
    nodeEnv: "test",
    openai: {
      apiKey: "test-secret",
      chatModel: "test-chat-model",
      embeddingModel: "test-embedding-model",
      embeddingDimensions: 32,
    },
    rerank: {
      enabled: true,
      url: "http://reranker.test",
      apiKey: "test-secret",
      model: "test-rerank-model",
    },
    retrieval: {
      topK: 5,
      oversampleFactor: 3,
      contextMaxChars: 12000,
      expansionCount: 3,
    },
    agent: {
      maxSteps: 3,
      toolTopK: 4,
      deadlineMs: 0,
    },
    timeouts: {
      requestMs: 0,
      ingestMs: 0,
    },
    storage: {
      databasePath: ":memory:",
      enableWalMode: false,
    },
    knowledgeDir: KNOWLEDGE_DIR,
    ...overrides,
  };
}

export interface TestPipeline {
  ctx: PipelineContext;
  embeddings: FakeEmbeddings;
  reranker: FakeReranker;
  model: ScriptedModel;
  eventBus: EventBus;
}

export function createTestPipeline(
  config: ServerConfig = testConfig(),
  reranker: FakeReranker = new FakeReranker(),
): TestPipeline {
  const embeddings = new FakeEmbeddings(config.openai.embeddingDimensions);
  const model = new ScriptedModel();
  const eventBus = new EventBus();
  const ctx = createPipelineContext(config, {
    database: new DatabaseAdapter({ path: ":memory:", walMode: false }),
    embeddings,
    reranker,
    model,
    eventBus,
  });
  return { ctx, embeddings, reranker, model, eventBus };
}

export const SAMPLE_PAGES: PageInput[] = [
  {
    url: "https://www.cmu.edu/graduate-admissions/deadlines",
    rawText:
      "The application deadline for the fall term is December 15. Applications submitted after the deadline are not reviewed.",
  },
  {
    url: "https://www.cmu.edu/grad/faq",
    rawText:
      "What TOEFL score do I need? International applicants need a TOEFL iBT score of at least 100 unless they qualify for a waiver.",
  },
  {
    url: "https://www.mit.edu/admissions/requirements",
    rawText:
      "Applicants submit a statement of purpose, three letters of recommendation and unofficial transcripts through the portal.",
  },
  {
    url: "https://www.stanford.edu/graduate/faq",
    rawText:
      "What is the minimum TOEFL score? Stanford lists a TOEFL iBT score of 130 for all international applicants.",
  },
];

export async function seedPipeline(ctx: PipelineContext): Promise<void> {
  const report = await ctx.ingestion.ingestBatch(SAMPLE_PAGES);
  if (report.skipped.length > 0) {
    throw new Error(`Seed pages skipped: ${JSON.stringify(report.skipped)}`);
  }
}
