/**
 * Pipeline context: the process-wide services, wired once at startup.
 */

import { resolve } from "path";
import { existsSync } from "fs";
import type { ServerConfig } from "./config/index.js";
import { DatabaseAdapter } from "./storage/Database.js";
import { eventBus as defaultEventBus, type EventBus } from "./orchestrator/EventBus.js";
import { OwnerRegistry } from "./ingestion/OwnerRegistry.js";
import { IngestionPipeline } from "./ingestion/IngestionPipeline.js";
import { VectorStore } from "./retrieval/VectorStore.js";
import { HybridRetriever } from "./retrieval/HybridRetriever.js";
import { QueryExpander } from "./retrieval/QueryExpander.js";
import { SanityAuditor } from "./insurance/SanityAuditor.js";
import { RetrievalTools } from "./orchestrator/RetrievalTools.js";
import { AgentLoop } from "./orchestrator/AgentLoop.js";
import { AnswerService } from "./services/AnswerService.js";
import { OpenAIEmbeddings } from "./providers/OpenAIEmbeddings.js";
import { OpenAIChatModel } from "./providers/OpenAIChatModel.js";
import { CrossEncoderReranker } from "./providers/CrossEncoderReranker.js";
import type {
  EmbeddingService,
  GenerativeModel,
  RerankService,
} from "./providers/ProviderAdapter.js";

export interface PipelineContext {
  config: ServerConfig;
  database: DatabaseAdapter;
  eventBus: EventBus;
  owners: OwnerRegistry;
  store: VectorStore;
  ingestion: IngestionPipeline;
  retriever: HybridRetriever;
  expander: QueryExpander;
  auditor: SanityAuditor;
  tools: RetrievalTools;
  agent: AgentLoop;
  answers: AnswerService;
  startedAt: number;
}

/** Replacements for the model services and the database, used by tests */
export interface PipelineOverrides {
  database?: DatabaseAdapter;
  embeddings?: EmbeddingService;
  reranker?: RerankService | null;
  model?: GenerativeModel;
  eventBus?: EventBus;
}

export function createPipelineContext(
  config: ServerConfig,
  overrides: PipelineOverrides = {},
): PipelineContext {
  const database =
    overrides.database ??
    new DatabaseAdapter({
      path: config.storage.databasePath,
      walMode: config.storage.enableWalMode,
    });
  database.initialize();

  const eventBus = overrides.eventBus ?? defaultEventBus;

  const embeddings =
    overrides.embeddings ??
    new OpenAIEmbeddings({
      apiKey: config.openai.apiKey,
      model: config.openai.embeddingModel,
      dimensions: config.openai.embeddingDimensions,
    });
  const reranker =
    overrides.reranker !== undefined
      ? overrides.reranker
      : config.rerank.enabled
        ? new CrossEncoderReranker({
            url: config.rerank.url,
            apiKey: config.rerank.apiKey,
            model: config.rerank.model,
          })
        : null;
  const model =
    overrides.model ??
    new OpenAIChatModel({
      apiKey: config.openai.apiKey,
      model: config.openai.chatModel,
    });

  const owners = new OwnerRegistry(resolveOwnersFile(config.knowledgeDir));
  owners.load();

  const store = new VectorStore(database, embeddings);
  const ingestion = new IngestionPipeline(store, owners, eventBus);
  const retriever = new HybridRetriever(store, embeddings, reranker, {
    oversampleFactor: config.retrieval.oversampleFactor,
    rerankEnabled: config.rerank.enabled,
    eventBus,
  });
  const expander = new QueryExpander(retriever, model);
  const auditor = new SanityAuditor();
  const tools = new RetrievalTools(retriever, auditor, {
    topK: config.agent.toolTopK,
    contextMaxChars: config.retrieval.contextMaxChars,
  });
  const agent = new AgentLoop(model, tools, {
    maxSteps: config.agent.maxSteps,
    deadlineMs: config.agent.deadlineMs,
    eventBus,
  });
  const answers = new AnswerService(retriever, expander, auditor, model, agent, {
    topK: config.retrieval.topK,
    contextMaxChars: config.retrieval.contextMaxChars,
    expansionCount: config.retrieval.expansionCount,
  });

  return {
    config,
    database,
    eventBus,
    owners,
    store,
    ingestion,
    retriever,
    expander,
    auditor,
    tools,
    agent,
    answers,
    startedAt: Date.now(),
  };
}

function resolveOwnersFile(knowledgeDir: string): string | undefined {
  const path = resolve(knowledgeDir, "owners.json");
  if (existsSync(path)) return path;
  console.warn(`[Context] Owner registry not found at ${path}`);
  return undefined;
}
