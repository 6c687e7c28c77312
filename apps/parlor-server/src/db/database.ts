import Database from "better-sqlite3";
import path from "node:path";
import fs from "node:fs";
import config from "../config.js";

let db: Database.Database | undefined;

export function getDb(): Database.Database {
  if (!db) {
    throw new Error("Database not initialized. Call initDb() first.");
  }
  return db;
}

/** Open (or create) the channel store. Pass ":memory:" for a throwaway database. */
export function initDb(dbPath = path.join(config.dataDir, "parlor.sqlite")): Database.Database {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  db = new Database(dbPath);
  db.pragma("journal_mode = WAL");

  runMigrations(db);
  return db;
}

function runMigrations(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS channels (
      name TEXT PRIMARY KEY,
      topic TEXT NOT NULL DEFAULT '',
      read_priv INTEGER NOT NULL DEFAULT 1,
      write_priv INTEGER NOT NULL DEFAULT 1,
      auto_join INTEGER NOT NULL DEFAULT 1,
      created_at INTEGER NOT NULL
    );
  `);
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = undefined;
  }
}
