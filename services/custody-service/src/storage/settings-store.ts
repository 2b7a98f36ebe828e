import type Database from "better-sqlite3";
import type { ExecutionOptions } from "@bullion/shared";
import type { SqliteDatabase } from "./database.js";

export interface SettingsStore {
  getExecutionOptions(): ExecutionOptions | null;
  putExecutionOptions(options: ExecutionOptions, updatedAt: string): void;
}

interface ExecutionOptionsRow {
  enable_onchain_transfer: number;
  enable_auto_ledger_update: number;
}

export class SqliteSettingsStore implements SettingsStore {
  private readonly getStmt: Database.Statement<[], ExecutionOptionsRow>;
  private readonly putStmt: Database.Statement<[number, number, string]>;

  constructor(db: SqliteDatabase) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS settlement_options (
        singleton_id INTEGER PRIMARY KEY CHECK (singleton_id = 1),
        enable_onchain_transfer INTEGER NOT NULL,
        enable_auto_ledger_update INTEGER NOT NULL,
        updated_at TEXT NOT NULL
      );
    `);

    this.getStmt = db.prepare<[], ExecutionOptionsRow>(`
      SELECT enable_onchain_transfer, enable_auto_ledger_update
      FROM settlement_options
      WHERE singleton_id = 1
    `);

    this.putStmt = db.prepare<[number, number, string]>(`
      INSERT INTO settlement_options (singleton_id, enable_onchain_transfer, enable_auto_ledger_update, updated_at)
      VALUES (1, ?, ?, ?)
      ON CONFLICT(singleton_id) DO UPDATE SET
        enable_onchain_transfer = excluded.enable_onchain_transfer,
        enable_auto_ledger_update = excluded.enable_auto_ledger_update,
        updated_at = excluded.updated_at
    `);
  }

  getExecutionOptions(): ExecutionOptions | null {
    const row = this.getStmt.get();
    if (!row) return null;
    return {
      enableOnChainTransfer: row.enable_onchain_transfer === 1,
      enableAutoLedgerUpdate: row.enable_auto_ledger_update === 1,
    };
  }

  putExecutionOptions(options: ExecutionOptions, updatedAt: string): void {
    this.putStmt.run(
      options.enableOnChainTransfer ? 1 : 0,
      options.enableAutoLedgerUpdate ? 1 : 0,
      updatedAt,
    );
  }
}
