/**
 * SQLite session backend
 *
 * One row per (session, key). Values are stored as JSON text.
 * expires_at and updated_at are epoch milliseconds.
 */

import Database from "better-sqlite3";
import type { Database as DatabaseType } from "better-sqlite3";
import type { JsonValue, SessionBackend } from "./backend.js";

interface ValueRow {
  value: string;
}

export interface SqliteSessionBackendOptions {
  /**
   * Drop keys not written for this long on collectGarbage(); unset keeps them until they expire
   */
  lifetimeSeconds?: number;
  /** Clock in ms (default: Date.now) */
  now?: () => number;
}

export class SqliteSessionBackend implements SessionBackend {
  private readonly db: DatabaseType;
  private readonly lifetimeMs: number | null;
  private readonly now: () => number;

  /**
   * @param database - an open connection, or a file path (":memory:" for a private in-memory store)
   */
  constructor(database: DatabaseType | string, options: SqliteSessionBackendOptions = {}) {
    this.db = typeof database === "string" ? new Database(database) : database;
    this.lifetimeMs = options.lifetimeSeconds === undefined ? null : options.lifetimeSeconds * 1000;
    this.now = options.now ?? (() => Date.now());
    this.ensureSchema();
  }

  private ensureSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        session_id TEXT NOT NULL,
        key TEXT NOT NULL,
        value TEXT NOT NULL,
        expires_at INTEGER,
        updated_at INTEGER NOT NULL,
        PRIMARY KEY (session_id, key)
      );
      CREATE INDEX IF NOT EXISTS idx_sessions_expires_at
        ON sessions(expires_at);
    `);
  }

  async get(id: string, key: string): Promise<JsonValue | undefined> {
    const row = this.db
      .prepare<[string, string, number], ValueRow>(
        `
      SELECT value FROM sessions
      WHERE session_id = ? AND key = ?
        AND (expires_at IS NULL OR expires_at > ?)
    `
      )
      .get(id, key, this.now());

    if (row === undefined) return undefined;
    const value: JsonValue = JSON.parse(row.value);
    return value;
  }

  async set(id: string, key: string, value: JsonValue): Promise<void> {
    this.db
      .prepare<[string, string, string, number]>(
        `
      INSERT INTO sessions (session_id, key, value, updated_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT (session_id, key)
      DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at
    `
      )
      .run(id, key, JSON.stringify(value), this.now());
  }

  async expire(id: string, key: string, seconds: number): Promise<void> {
    if (seconds <= 0) {
      await this.remove(id, key);
      return;
    }
    this.db
      .prepare<[number, string, string]>(`UPDATE sessions SET expires_at = ? WHERE session_id = ? AND key = ?`)
      .run(this.now() + seconds * 1000, id, key);
  }

  async remove(id: string, key: string): Promise<void> {
    this.db.prepare<[string, string]>(`DELETE FROM sessions WHERE session_id = ? AND key = ?`).run(id, key);
  }

  async collectGarbage(): Promise<number> {
    const now = this.now();
    const expired = this.db
      .prepare<[number]>(`DELETE FROM sessions WHERE expires_at IS NOT NULL AND expires_at <= ?`)
      .run(now).changes;

    if (this.lifetimeMs === null) return expired;

    const stale = this.db
      .prepare<[number]>(`DELETE FROM sessions WHERE updated_at <= ?`)
      .run(now - this.lifetimeMs).changes;
    return expired + stale;
  }

  close(): void {
    this.db.close();
  }
}
