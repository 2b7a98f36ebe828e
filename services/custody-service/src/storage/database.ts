import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";

export const IN_MEMORY_DB_PATH = ":memory:";

export type SqliteDatabase = Database.Database;

/**
 * Opens the single connection shared by every store. Cross-store atomicity
 * depends on all tables living behind this one handle.
 */
export function openDatabase(dbPath: string): SqliteDatabase {
  if (dbPath !== IN_MEMORY_DB_PATH) {
    mkdirSync(dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  if (dbPath !== IN_MEMORY_DB_PATH) {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("foreign_keys = ON");
  return db;
}

interface SequenceRow {
  next_value: number;
}

/** Monotonic counters; values are never handed out twice. */
export class SqliteSequence {
  private readonly getStmt: Database.Statement<[string], SequenceRow>;
  private readonly putStmt: Database.Statement<[string, number]>;

  constructor(
    db: SqliteDatabase,
    private readonly name: string,
    private readonly start: number,
  ) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS sequences (
        name TEXT PRIMARY KEY,
        next_value INTEGER NOT NULL
      );
    `);

    this.getStmt = db.prepare<[string], SequenceRow>(`
      SELECT next_value
      FROM sequences
      WHERE name = ?
      LIMIT 1
    `);

    this.putStmt = db.prepare<[string, number]>(`
      INSERT INTO sequences (name, next_value)
      VALUES (?, ?)
      ON CONFLICT(name) DO UPDATE SET
        next_value = excluded.next_value
    `);
  }

  next(): number {
    const row = this.getStmt.get(this.name);
    const value = row ? row.next_value : this.start;
    this.putStmt.run(this.name, value + 1);
    return value;
  }
}
