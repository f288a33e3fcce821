/**
 * Database.ts - SQLite adapter for the page and chunk store
 *
 * Uses better-sqlite3 for synchronous SQLite operations.
 * Embeddings live beside their chunk rows; similarity is computed in process.
 */

import Database from "better-sqlite3";
import { resolve } from "path";
import { existsSync, mkdirSync } from "fs";

export interface DatabaseConfig {
  /** Path to SQLite database file, or ":memory:" */
  path: string;
  /** Enable WAL mode for better concurrency */
  walMode?: boolean;
  /** Enable verbose logging */
  verbose?: boolean;
}

const IN_MEMORY = ":memory:";

interface Migration {
  name: string;
  sql: string;
}

const MIGRATIONS: Migration[] = [
  {
    name: "001_create_pages",
    sql: `
      CREATE TABLE pages (
        id TEXT PRIMARY KEY,
        url TEXT NOT NULL UNIQUE,
        owner_id TEXT NOT NULL,
        page_type TEXT NOT NULL,
        raw_text TEXT NOT NULL,
        char_count INTEGER NOT NULL,
        metadata TEXT NOT NULL DEFAULT '{}',
        ingested_at TEXT NOT NULL DEFAULT (datetime('now'))
      );
      CREATE INDEX idx_pages_owner_id ON pages(owner_id);
    `,
  },
  {
    name: "002_create_chunks",
    sql: `
      CREATE TABLE chunks (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        page_id TEXT NOT NULL,
        owner_id TEXT NOT NULL,
        page_type TEXT NOT NULL,
        chunk_index INTEGER NOT NULL,
        chunk_text TEXT NOT NULL,
        embedding BLOB NOT NULL,
        dimensions INTEGER NOT NULL,
        metadata TEXT NOT NULL DEFAULT '{}',
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        UNIQUE (page_id, chunk_index),
        FOREIGN KEY (page_id) REFERENCES pages(id) ON DELETE CASCADE
      );
      CREATE INDEX idx_chunks_owner_id ON chunks(owner_id);
      CREATE INDEX idx_chunks_page_type ON chunks(page_type);
    `,
  },
];

/**
 * SQLite database adapter
 *
 * Owns the primary connection (used for migrations and for in-memory
 * databases) and hands out one scoped connection per logical request.
 */
export class DatabaseAdapter {
  private db: Database.Database | null = null;
  private config: DatabaseConfig;
  private initialized: boolean = false;
  private leases: Set<Database.Database> = new Set();

  constructor(config: DatabaseConfig) {
    this.config = {
      walMode: true,
      verbose: false,
      ...config,
    };
  }

  /**
   * Initialize database connection and run migrations
   */
  initialize(): void {
    if (this.initialized) {
      return;
    }

    if (this.config.path !== IN_MEMORY) {
      const dbDir = resolve(this.config.path, "..");
      if (!existsSync(dbDir)) {
        mkdirSync(dbDir, { recursive: true });
      }
    }

    this.db = this.open();

    if (this.config.walMode && this.config.path !== IN_MEMORY) {
      this.db.pragma("journal_mode = WAL");
    }

    this.runMigrations(this.db);

    this.initialized = true;
    console.log(`[Database] Initialized at ${this.config.path}`);
  }

  private open(): Database.Database {
    const db = new Database(this.config.path, {
      verbose: this.config.verbose ? console.log : undefined,
    });
    db.pragma("foreign_keys = ON");
    return db;
  }

  /**
   * Run database migrations
   * Creates tables if they don't exist
   */
  private runMigrations(db: Database.Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS migrations (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE,
        applied_at TEXT NOT NULL DEFAULT (datetime('now'))
      )
    `);

    const rows = db
      .prepare<unknown[], { name: string }>("SELECT name FROM migrations")
      .all();
    const applied = new Set(rows.map((row) => row.name));

    for (const migration of MIGRATIONS) {
      if (applied.has(migration.name)) continue;
      db.transaction(() => {
        db.exec(migration.sql);
        db.prepare("INSERT INTO migrations (name) VALUES (?)").run(
          migration.name,
        );
      })();
      console.log(`[Database] Applied migration: ${migration.name}`);
    }
  }

  /**
   * Get the primary database instance
   */
  getDb(): Database.Database {
    if (!this.db) {
      throw new Error("Database not initialized. Call initialize() first.");
    }
    return this.db;
  }

  /**
   * Run `fn` with a connection that is released on every exit path.
   * In-memory databases share the primary connection.
   */
  withConnection<T>(fn: (db: Database.Database) => T): T {
    const primary = this.getDb();
    const connection = this.config.path === IN_MEMORY ? primary : this.open();
    this.leases.add(connection);
    try {
      return fn(connection);
    } finally {
      this.leases.delete(connection);
      if (connection !== primary) {
        connection.close();
      }
    }
  }

  /**
   * Run `fn` in a transaction on a scoped connection
   */
  transaction<T>(fn: (db: Database.Database) => T): T {
    return this.withConnection((db) => db.transaction(() => fn(db))());
  }

  /**
   * Number of connections currently leased to requests
   */
  getActiveConnectionCount(): number {
    return this.leases.size;
  }

  /**
   * Close database connection
   */
  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
      this.initialized = false;
      console.log("[Database] Connection closed");
    }
  }

  /**
   * Check if database is initialized
   */
  isInitialized(): boolean {
    return this.initialized;
  }
}
