import Database from "better-sqlite3";
import type { Logger } from "../logger";
import { DatabaseError } from "../errors";

export type SqliteDatabase = Database.Database;

const SCHEMA = `
CREATE TABLE IF NOT EXISTS transactions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  description TEXT NOT NULL CHECK (length(trim(description)) > 0),
  amount_cents INTEGER NOT NULL,
  category TEXT NOT NULL CHECK (length(category) > 0),
  date TEXT NOT NULL,
  type TEXT NOT NULL CHECK (type IN ('income', 'expense')),
  currency TEXT NOT NULL DEFAULT 'USD',
  receipt_mime TEXT,
  receipt_base64 TEXT,
  created_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_transactions_date ON transactions (date);
CREATE INDEX IF NOT EXISTS idx_transactions_category ON transactions (category);
`;

export function openDatabase(path: string, log?: Logger): SqliteDatabase {
  try {
    const db = new Database(path);
    if (path !== ":memory:") db.pragma("journal_mode = WAL");
    db.exec(SCHEMA);
    log?.info(`opened ${path}`);
    return db;
  } catch (err) {
    throw new DatabaseError("open", err);
  }
}
