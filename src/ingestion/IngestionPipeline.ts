/**
 * Ingestion Pipeline
 *
 * Pages are written one at a time, each in its own transaction. A bad page
 * is skipped and reported; pages already written stay written.
 */

import { v4 as uuidv4 } from "uuid";
import type { EventBus } from "../orchestrator/EventBus.js";
import type { VectorStore } from "../retrieval/VectorStore.js";
import type { OwnerRegistry } from "./OwnerRegistry.js";
import { loadPageFile } from "./PageSource.js";
import { inferPageType } from "./pageTypes.js";
import {
  isPageType,
  parseMetadata,
  type Page,
} from "../schemas/documents.js";
import type {
  IngestPageEvent,
  IngestSkippedEvent,
} from "../schemas/events.js";
import { describeError, IngestionError } from "../errors.js";

export const MIN_PAGE_CHARS = 50;
export const DEADLINE_EXCEEDED = "deadline exceeded";

/** Loosely typed page as received from a page file or the HTTP API */
export interface PageInput {
  url?: unknown;
  rawText?: unknown;
  id?: unknown;
  ownerId?: unknown;
  ownerHint?: unknown;
  pageType?: unknown;
  metadata?: unknown;
}

export interface SkippedPage {
  url: string;
  reason: string;
}

export interface IngestionReport {
  pagesWritten: number;
  chunksWritten: number;
  skipped: SkippedPage[];
}

export interface IngestOptions {
  signal?: AbortSignal;
  sessionId?: string;
}

export class IngestionPipeline {
  constructor(
    private store: VectorStore,
    private owners: OwnerRegistry,
    private eventBus?: EventBus,
  ) {}

  /**
   * Validate a raw page and resolve its owner and page type.
   */
  preparePage(input: PageInput): Page {
    const url = typeof input.url === "string" ? input.url.trim() : "";
    if (!url) {
      throw new IngestionError("Page has no url", String(input.url));
    }
    if (typeof input.rawText !== "string") {
      throw new IngestionError("Page text is not a string", url);
    }
    const rawText = input.rawText;
    if (rawText.trim().length < MIN_PAGE_CHARS) {
      throw new IngestionError(
        `Page text shorter than ${MIN_PAGE_CHARS} characters`,
        url,
      );
    }

    let ownerId =
      typeof input.ownerId === "string" && input.ownerId.trim()
        ? input.ownerId.trim()
        : null;
    if (!ownerId) {
      const hint = typeof input.ownerHint === "string" ? input.ownerHint : undefined;
      ownerId = this.owners.identify(url, hint)?.ownerId ?? null;
    }
    if (!ownerId) {
      throw new IngestionError("Could not identify the page owner", url);
    }

    if (input.pageType !== undefined && !isPageType(input.pageType)) {
      throw new IngestionError(`Unknown page type: ${String(input.pageType)}`, url);
    }
    const pageType = isPageType(input.pageType)
      ? input.pageType
      : inferPageType(url);

    return {
      id: typeof input.id === "string" && input.id ? input.id : url,
      url,
      ownerId,
      pageType,
      rawText,
      metadata: input.metadata === undefined ? undefined : parseMetadata(input.metadata),
    };
  }

  async ingestBatch(
    pages: PageInput[],
    options: IngestOptions = {},
  ): Promise<IngestionReport> {
    const sessionId = options.sessionId ?? uuidv4();
    const report: IngestionReport = {
      pagesWritten: 0,
      chunksWritten: 0,
      skipped: [],
    };

    console.log(`[Ingestion] Batch ${sessionId}: ${pages.length} pages`);

    for (let i = 0; i < pages.length; i++) {
      const input = pages[i];
      const url = typeof input.url === "string" ? input.url : String(input.url);

      if (options.signal?.aborted) {
        for (const remaining of pages.slice(i)) {
          this.skip(report, sessionId, {
            url: typeof remaining.url === "string" ? remaining.url : String(remaining.url),
            reason: DEADLINE_EXCEEDED,
          });
        }
        break;
      }

      try {
        const page = this.preparePage(input);
        const chunkCount = await this.store.upsert(page, options.signal);
        report.pagesWritten++;
        report.chunksWritten += chunkCount;
        console.log(
          `[Ingestion] ${page.url} → ${chunkCount} chunks (${page.ownerId}/${page.pageType})`,
        );
        this.emitPage(sessionId, page, chunkCount);
      } catch (error) {
        const reason =
          error instanceof IngestionError
            ? error.message
            : `Upsert failed: ${describeError(error)}`;
        this.skip(report, sessionId, { url, reason });
      }
    }

    console.log(
      `[Ingestion] Batch ${sessionId} done: ${report.pagesWritten} pages, ${report.chunksWritten} chunks, ${report.skipped.length} skipped`,
    );
    return report;
  }

  /**
   * Ingest a harvested page file (url → text JSON map). The file name
   * doubles as the owner hint.
   */
  async ingestFile(path: string, options: IngestOptions = {}): Promise<IngestionReport> {
    return this.ingestBatch(loadPageFile(path), options);
  }

  private skip(report: IngestionReport, sessionId: string, skipped: SkippedPage): void {
    report.skipped.push(skipped);
    console.warn(`[Ingestion] Skipped ${skipped.url}: ${skipped.reason}`);
    if (!this.eventBus) return;
    const event: IngestSkippedEvent = {
      event_id: uuidv4(),
      session_id: sessionId,
      t_ms: Date.now(),
      source: "ingestion",
      type: "ingest.skipped",
      payload: skipped,
    };
    this.eventBus.emit(event);
  }

  private emitPage(sessionId: string, page: Page, chunkCount: number): void {
    if (!this.eventBus) return;
    const event: IngestPageEvent = {
      event_id: uuidv4(),
      session_id: sessionId,
      t_ms: Date.now(),
      source: "ingestion",
      type: "ingest.page",
      payload: {
        page_id: page.id,
        url: page.url,
        owner_id: page.ownerId,
        page_type: page.pageType,
        chunk_count: chunkCount,
      },
    };
    this.eventBus.emit(event);
  }
}
