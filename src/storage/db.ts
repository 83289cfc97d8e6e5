import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";

export type DecisionDatabase = Database.Database;

/**
 * Open (or create) the decision log database. ":memory:" stays in process.
 */
export function openDatabase(path: string): DecisionDatabase {
    const inMemory = path === ":memory:";
    const file = inMemory ? path : resolve(process.cwd(), path);
    if (!inMemory) {
        mkdirSync(dirname(file), { recursive: true });
    }

    const db = new Database(file);
    if (!inMemory) {
        // WAL lets the dashboard read while the proxy writes
        db.pragma("journal_mode = WAL");
    }
    initSchema(db);
    return db;
}

export function initSchema(db: DecisionDatabase): void {
    db.exec(`
    CREATE TABLE IF NOT EXISTS decisions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp INTEGER NOT NULL,
        requested_model TEXT,
        selected_model TEXT NOT NULL,
        tier TEXT NOT NULL,
        routing_path TEXT NOT NULL,
        score REAL,
        prefer_coder INTEGER NOT NULL DEFAULT 0,
        latency_ms INTEGER NOT NULL DEFAULT 0,
        success INTEGER NOT NULL, -- 0 or 1
        error_msg TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_decisions_timestamp ON decisions(timestamp);
    CREATE INDEX IF NOT EXISTS idx_decisions_tier ON decisions(tier);
  `);
}
