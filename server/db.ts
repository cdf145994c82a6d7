/**
 * Database Connection
 *
 * Purpose:
 * One lazily opened SQLite file per store, wrapped in Drizzle ORM. Files and
 * tables are created on first use; nothing touches the disk at import time.
 *
 * Layer: Infrastructure
 */

import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as fs from "fs";
import * as path from "path";
import { STORE_FILES, getDataDir, type StoreName } from "./config/constants";

export const IN_MEMORY = ":memory:";

/**
 * Table DDL per store. Mirrors shared/schema.ts; timestamps are epoch
 * milliseconds.
 */
export const STORE_DDL: Record<StoreName, string> = {
  INTERACTIONS: `
    CREATE TABLE IF NOT EXISTS interactions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      session_id TEXT NOT NULL,
      topic TEXT NOT NULL,
      persona TEXT NOT NULL,
      question TEXT NOT NULL,
      response TEXT NOT NULL,
      timestamp INTEGER NOT NULL
    );
    CREATE INDEX IF NOT EXISTS interactions_session_idx ON interactions (session_id);
  `,
  NOTES: `
    CREATE TABLE IF NOT EXISTS notes (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      session_id TEXT NOT NULL,
      code TEXT NOT NULL,
      content TEXT NOT NULL,
      updated_at INTEGER NOT NULL
    );
    CREATE UNIQUE INDEX IF NOT EXISTS notes_session_code_idx ON notes (session_id, code);
  `,
  CHAT_HISTORY: `
    CREATE TABLE IF NOT EXISTS chat_history (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      session_id TEXT NOT NULL,
      code TEXT NOT NULL,
      section_id TEXT NOT NULL,
      role TEXT NOT NULL,
      content TEXT NOT NULL,
      timestamp INTEGER NOT NULL
    );
    CREATE INDEX IF NOT EXISTS chat_history_key_idx ON chat_history (session_id, code, section_id);
  `,
  ACCURACY_FEEDBACK: `
    CREATE TABLE IF NOT EXISTS accuracy_feedback (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      session_id TEXT NOT NULL,
      code TEXT NOT NULL,
      section_id TEXT NOT NULL,
      rating TEXT NOT NULL,
      reason TEXT,
      updated_at INTEGER NOT NULL
    );
    CREATE UNIQUE INDEX IF NOT EXISTS accuracy_feedback_key_idx ON accuracy_feedback (session_id, code, section_id);
  `,
  USER_FEEDBACK: `
    CREATE TABLE IF NOT EXISTS feedback (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      model_used TEXT NOT NULL,
      research_type TEXT NOT NULL,
      topic TEXT NOT NULL,
      ui_rating INTEGER NOT NULL,
      content_rating INTEGER NOT NULL,
      feedback_text TEXT NOT NULL,
      submitted_at INTEGER NOT NULL
    );
  `,
};

export class SqliteStore {
  private sqlite: Database.Database | null = null;
  private database: BetterSQLite3Database | null = null;

  constructor(
    readonly name: StoreName,
    readonly filename: string,
  ) {}

  get db(): BetterSQLite3Database {
    if (!this.database) {
      this.database = this.open();
    }
    return this.database;
  }

  get isOpen(): boolean {
    return this.database !== null;
  }

  private open(): BetterSQLite3Database {
    if (this.filename !== IN_MEMORY) {
      fs.mkdirSync(path.dirname(this.filename), { recursive: true });
    }
    const sqlite = new Database(this.filename);
    if (this.filename !== IN_MEMORY) {
      sqlite.pragma("journal_mode = WAL");
    }
    sqlite.exec(STORE_DDL[this.name]);
    console.log(`[Storage] Opened ${this.name.toLowerCase()} store at ${this.filename}`);

    this.sqlite = sqlite;
    return drizzle(sqlite);
  }

  close(): void {
    this.sqlite?.close();
    this.sqlite = null;
    this.database = null;
  }
}

export type StoreSet = Record<StoreName, SqliteStore>;

/**
 * Builds the store set. Pass `IN_MEMORY` to keep every store in process.
 */
export function createStores(dataDir: string = getDataDir()): StoreSet {
  const fileFor = (name: StoreName) =>
    dataDir === IN_MEMORY ? IN_MEMORY : path.join(dataDir, STORE_FILES[name]);

  return {
    INTERACTIONS: new SqliteStore("INTERACTIONS", fileFor("INTERACTIONS")),
    NOTES: new SqliteStore("NOTES", fileFor("NOTES")),
    CHAT_HISTORY: new SqliteStore("CHAT_HISTORY", fileFor("CHAT_HISTORY")),
    ACCURACY_FEEDBACK: new SqliteStore("ACCURACY_FEEDBACK", fileFor("ACCURACY_FEEDBACK")),
    USER_FEEDBACK: new SqliteStore("USER_FEEDBACK", fileFor("USER_FEEDBACK")),
  };
}
