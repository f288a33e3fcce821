/**
 * Dense vector store over SQLite.
 *
 * Chunks and their embeddings live in one row each; embeddings are stored
 * as JSON in a BLOB column and compared by cosine similarity in process.
 * Every call leases its own connection from the DatabaseAdapter.
 */

import type Database from "better-sqlite3";
import type { DatabaseAdapter } from "../storage/Database.js";
import type { EmbeddingService } from "../providers/ProviderAdapter.js";
import { chunk } from "../ingestion/Chunker.js";
import { IngestionError } from "../errors.js";
import {
  emptyMetadata,
  isPageType,
  parseMetadata,
  serializeMetadata,
  type ChunkRecord,
  type Page,
  type SearchFilters,
} from "../schemas/documents.js";

export interface ScoredChunk {
  chunk: ChunkRecord;
  score: number;
}

interface ChunkRow {
  id: number;
  page_id: string;
  owner_id: string;
  page_type: string;
  chunk_index: number;
  chunk_text: string;
  embedding: Buffer;
  metadata: string;
  source_url: string;
}

const CHUNK_COLUMNS = `
  c.id, c.page_id, c.owner_id, c.page_type, c.chunk_index, c.chunk_text,
  c.embedding, c.metadata, p.url AS source_url
`;

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function encodeEmbedding(vector: number[]): Buffer {
  return Buffer.from(JSON.stringify(vector), "utf8");
}

export function decodeEmbedding(blob: Buffer): number[] {
  const parsed: unknown = JSON.parse(blob.toString("utf8"));
  if (!Array.isArray(parsed)) return [];
  return parsed.filter((value): value is number => typeof value === "number");
}

function buildFilterClause(filters: SearchFilters): {
  where: string;
  params: string[];
} {
  const conditions: string[] = [];
  const params: string[] = [];
  if (filters.ownerId) {
    conditions.push("c.owner_id = ?");
    params.push(filters.ownerId);
  }
  if (filters.pageType) {
    conditions.push("c.page_type = ?");
    params.push(filters.pageType);
  }
  return {
    where: conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "",
    params,
  };
}

function toChunkRecord(row: ChunkRow): ChunkRecord {
  let metadata = emptyMetadata();
  try {
    metadata = parseMetadata(JSON.parse(row.metadata));
  } catch (error) {
    console.warn(`[VectorStore] Bad metadata on chunk ${row.id}:`, error);
  }
  return {
    id: row.id,
    pageId: row.page_id,
    ownerId: row.owner_id,
    chunkIndex: row.chunk_index,
    text: row.chunk_text,
    pageType: isPageType(row.page_type) ? row.page_type : "general",
    sourceUrl: row.source_url,
    metadata,
  };
}

export class VectorStore {
  constructor(
    private database: DatabaseAdapter,
    private embeddings: EmbeddingService,
  ) {}

  /**
   * Replace every chunk of a page. Chunking and embedding happen before the
   * transaction opens, so any failure leaves the previous chunks in place.
   * Returns the number of chunks written.
   */
  async upsert(page: Page, signal?: AbortSignal): Promise<number> {
    const texts = chunk(page.rawText, page.pageType);
    if (texts.length === 0) {
      throw new IngestionError("Page produced no chunks", page.url);
    }

    const vectors = await this.embeddings.embed(texts, signal);
    if (vectors.length !== texts.length) {
      throw new IngestionError(
        `Expected ${texts.length} embeddings, got ${vectors.length}`,
        page.url,
      );
    }
    const dimensions = this.embeddings.dimensions;
    const badVector = vectors.findIndex((vector) => vector.length !== dimensions);
    if (badVector !== -1) {
      throw new IngestionError(
        `Embedding ${badVector} has ${vectors[badVector].length} dimensions, expected ${dimensions}`,
        page.url,
      );
    }

    const metadataJson = JSON.stringify(
      serializeMetadata(page.metadata ?? emptyMetadata()),
    );

    this.database.transaction((db) => {
      db.prepare(
        `INSERT INTO pages (id, url, owner_id, page_type, raw_text, char_count, metadata)
         VALUES (?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET
           url = excluded.url,
           owner_id = excluded.owner_id,
           page_type = excluded.page_type,
           raw_text = excluded.raw_text,
           char_count = excluded.char_count,
           metadata = excluded.metadata,
           ingested_at = datetime('now')`,
      ).run(
        page.id,
        page.url,
        page.ownerId,
        page.pageType,
        page.rawText,
        page.rawText.length,
        metadataJson,
      );

      db.prepare("DELETE FROM chunks WHERE page_id = ?").run(page.id);

      const insert = db.prepare(
        `INSERT INTO chunks
           (page_id, owner_id, page_type, chunk_index, chunk_text, embedding, dimensions, metadata)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      );
      texts.forEach((text, index) => {
        insert.run(
          page.id,
          page.ownerId,
          page.pageType,
          index,
          text,
          encodeEmbedding(vectors[index]),
          dimensions,
          metadataJson,
        );
      });
    });

    return texts.length;
  }

  /**
   * Remove a page and its chunks. Returns the number of chunks removed.
   */
  deletePage(pageId: string): number {
    return this.database.transaction((db) => {
      const removed = db
        .prepare("DELETE FROM chunks WHERE page_id = ?")
        .run(pageId).changes;
      db.prepare("DELETE FROM pages WHERE id = ?").run(pageId);
      return removed;
    });
  }

  /**
   * Top `limit` chunks by cosine similarity, descending. Rows are scanned in
   * storage order and the sort is stable, so ties keep that order.
   */
  similaritySearch(
    vector: number[],
    limit: number,
    filters: SearchFilters = {},
  ): ScoredChunk[] {
    if (limit <= 0) return [];
    const { where, params } = buildFilterClause(filters);

    return this.database.withConnection((db) => {
      const rows = this.selectChunks(
        db,
        `SELECT ${CHUNK_COLUMNS} FROM chunks c JOIN pages p ON p.id = c.page_id
         ${where} ORDER BY c.id`,
        params,
      );

      const scored: ScoredChunk[] = [];
      for (const row of rows) {
        const embedding = decodeEmbedding(row.embedding);
        if (embedding.length !== vector.length) {
          console.warn(
            `[VectorStore] Skipping chunk ${row.id}: ${embedding.length} dims vs query ${vector.length}`,
          );
          continue;
        }
        scored.push({
          chunk: toChunkRecord(row),
          score: cosineSimilarity(vector, embedding),
        });
      }

      scored.sort((a, b) => b.score - a.score);
      return scored.slice(0, limit);
    });
  }

  getPageChunks(pageId: string): ChunkRecord[] {
    return this.database.withConnection((db) =>
      this.selectChunks(
        db,
        `SELECT ${CHUNK_COLUMNS} FROM chunks c JOIN pages p ON p.id = c.page_id
         WHERE c.page_id = ? ORDER BY c.chunk_index`,
        [pageId],
      ).map(toChunkRecord),
    );
  }

  countChunks(filters: SearchFilters = {}): number {
    const { where, params } = buildFilterClause(filters);
    return this.database.withConnection((db) => {
      const row = db
        .prepare<unknown[], { count: number }>(
          `SELECT COUNT(*) AS count FROM chunks c ${where}`,
        )
        .get(...params);
      return row?.count ?? 0;
    });
  }

  countPages(): number {
    return this.database.withConnection((db) => {
      const row = db
        .prepare<unknown[], { count: number }>("SELECT COUNT(*) AS count FROM pages")
        .get();
      return row?.count ?? 0;
    });
  }

  private selectChunks(
    db: Database.Database,
    sql: string,
    params: string[],
  ): ChunkRow[] {
    return db.prepare<unknown[], ChunkRow>(sql).all(...params);
  }
}
