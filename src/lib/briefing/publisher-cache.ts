/**
 * Publisher cache
 *
 * Key-value stores mapping a sender identifier to a resolved publisher name.
 * The SQLite store is the only state shared across runs.
 *
 * @module briefing/publisher-cache
 */

import sqlite3 from "sqlite3";
import { open, type Database } from "sqlite";
import path from "path";

// ============================================================================
// TYPES
// ============================================================================

export type ResolutionMethod = "known_domain" | "display_name" | "oracle";

export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, method?: ResolutionMethod): Promise<void>;
  has(key: string): Promise<boolean>;
}

interface PublisherRow {
  identifier: string;
  publisher: string;
  resolved_at: string;
  method: string | null;
}

// ============================================================================
// IN-MEMORY STORE
// ============================================================================

export class InMemoryKeyValueStore implements KeyValueStore {
  private readonly entries = new Map<string, string>();

  async get(key: string): Promise<string | null> {
    return this.entries.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    this.entries.set(key, value);
  }

  async has(key: string): Promise<boolean> {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }
}

// ============================================================================
// SQLITE STORE
// ============================================================================

export class SqlitePublisherCache implements KeyValueStore {
  private db: Database | null = null;
  private opening: Promise<Database> | null = null;

  /** `:memory:` keeps the cache in process. */
  constructor(private readonly dbPath: string = process.env.BRIEFING_PUBLISHER_CACHE_PATH || "./publisher-cache.db") {}

  private async getDb(): Promise<Database> {
    if (this.db) return this.db;
    this.opening ??= this.openDb();
    this.db = await this.opening;
    return this.db;
  }

  private async openDb(): Promise<Database> {
    const filename = this.dbPath === ":memory:" ? ":memory:" : path.resolve(this.dbPath);
    console.log(`[PublisherCache] Opening database at ${filename}`);

    const database = await open({
      filename,
      driver: sqlite3.Database,
    });

    await database.exec(`
      CREATE TABLE IF NOT EXISTS publisher_cache (
        identifier TEXT PRIMARY KEY,
        publisher TEXT NOT NULL,
        resolved_at TEXT NOT NULL,
        method TEXT
      );
    `);
    return database;
  }

  async get(key: string): Promise<string | null> {
    const database = await this.getDb();
    const row = await database.get<PublisherRow>(
      `SELECT * FROM publisher_cache WHERE identifier = ?`,
      [key],
    );
    return row ? row.publisher : null;
  }

  async set(key: string, value: string, method?: ResolutionMethod): Promise<void> {
    const database = await this.getDb();
    await database.run(
      `INSERT INTO publisher_cache (identifier, publisher, resolved_at, method)
       VALUES (?, ?, ?, ?)
       ON CONFLICT(identifier) DO UPDATE SET
         publisher = excluded.publisher,
         resolved_at = excluded.resolved_at,
         method = excluded.method`,
      [key, value, new Date().toISOString(), method ?? null],
    );
  }

  async has(key: string): Promise<boolean> {
    return (await this.get(key)) !== null;
  }

  async count(): Promise<number> {
    const database = await this.getDb();
    const row = await database.get<{ count: number }>(`SELECT COUNT(*) as count FROM publisher_cache`);
    return row?.count ?? 0;
  }

  async close(): Promise<void> {
    if (this.db) {
      await this.db.close();
      this.db = null;
      this.opening = null;
    }
  }
}
