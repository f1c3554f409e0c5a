import Database from "better-sqlite3";
import { join } from "node:path";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS decisions (
  seq        INTEGER PRIMARY KEY AUTOINCREMENT,
  id         TEXT NOT NULL UNIQUE,
  user_id    TEXT NOT NULL,
  timestamp  INTEGER NOT NULL,
  payload    TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_decisions_user ON decisions(user_id, seq);

CREATE TABLE IF NOT EXISTS profiles (
  user_id     TEXT PRIMARY KEY,
  goal        TEXT NOT NULL,
  preferences TEXT NOT NULL DEFAULT '{}',
  target_sleep_hours REAL NOT NULL,
  updated_at  INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS adaptations (
  id         INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id    TEXT NOT NULL,
  timestamp  INTEGER NOT NULL,
  pattern    TEXT NOT NULL,
  adaptation TEXT NOT NULL,
  categories TEXT NOT NULL,
  reasoning  TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_adaptations_user ON adaptations(user_id, id);
`;

export const DB_FILENAME = "tradeoff.db";

/** Opens (or creates) the history database. Pass ":memory:" for a private in-process database. */
export class TradeoffDB {
  private db: Database.Database;

  constructor(location: string) {
    this.db = new Database(location === ":memory:" ? location : join(location, DB_FILENAME));
    this.db.pragma("journal_mode = WAL");
    this.db.exec(SCHEMA_SQL);
  }

  raw(): Database.Database {
    return this.db;
  }

  isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
