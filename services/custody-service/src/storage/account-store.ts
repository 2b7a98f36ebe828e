import type Database from "better-sqlite3";
import type { GoldAccount } from "@bullion/shared";
import { type SqliteDatabase, SqliteSequence } from "./database.js";

const FIRST_ACCOUNT_NUMBER = 1000;

export interface BalanceWrite {
  accountId: string;
  balance: number;
  reason: string;
  refId: string;
  updatedAt: string;
}

export interface AccountStore {
  nextAccountNumber(): number;
  insert(account: GoldAccount): void;
  get(accountId: string): GoldAccount | null;
  writeBalance(write: BalanceWrite): void;
  listByMember(memberId: string): GoldAccount[];
  listByAddress(address: string): GoldAccount[];
  /** null when the updater has never been recorded. */
  getUpdater(updater: string): boolean | null;
  putUpdater(updater: string, enabled: boolean, updatedAt: string): void;
  listEnabledUpdaters(): string[];
}

interface AccountRow {
  account_id: string;
  member_id: string;
  address: string;
  balance: number;
  last_reason: string | null;
  last_ref_id: string | null;
  created_at: string;
  updated_at: string;
}

interface UpdaterRow {
  updater: string;
  enabled: number;
}

const ACCOUNT_COLUMNS = `
  account_id, member_id, address, balance, last_reason, last_ref_id, created_at, updated_at
`;

function toAccount(row: AccountRow): GoldAccount {
  return {
    accountId: row.account_id,
    memberId: row.member_id,
    address: row.address,
    balance: row.balance,
    lastReason: row.last_reason,
    lastRefId: row.last_ref_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class SqliteAccountStore implements AccountStore {
  private readonly sequence: SqliteSequence;
  private readonly insertStmt: Database.Statement<[string, string, string, number, string, string]>;
  private readonly getStmt: Database.Statement<[string], AccountRow>;
  private readonly writeBalanceStmt: Database.Statement<[number, string, string, string, string]>;
  private readonly listByMemberStmt: Database.Statement<[string], AccountRow>;
  private readonly listByAddressStmt: Database.Statement<[string], AccountRow>;
  private readonly getUpdaterStmt: Database.Statement<[string], UpdaterRow>;
  private readonly putUpdaterStmt: Database.Statement<[string, number, string]>;
  private readonly listUpdatersStmt: Database.Statement<[], UpdaterRow>;

  constructor(db: SqliteDatabase) {
    this.sequence = new SqliteSequence(db, "account_number", FIRST_ACCOUNT_NUMBER);
    db.exec(`
      CREATE TABLE IF NOT EXISTS accounts (
        account_id TEXT PRIMARY KEY,
        member_id TEXT NOT NULL,
        address TEXT NOT NULL,
        balance INTEGER NOT NULL CHECK (balance >= 0),
        last_reason TEXT,
        last_ref_id TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_accounts_member
      ON accounts(member_id);

      CREATE INDEX IF NOT EXISTS idx_accounts_address
      ON accounts(address);

      CREATE TABLE IF NOT EXISTS balance_updaters (
        updater TEXT PRIMARY KEY,
        enabled INTEGER NOT NULL,
        updated_at TEXT NOT NULL
      );
    `);

    this.insertStmt = db.prepare<[string, string, string, number, string, string]>(`
      INSERT INTO accounts (account_id, member_id, address, balance, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `);

    this.getStmt = db.prepare<[string], AccountRow>(`
      SELECT ${ACCOUNT_COLUMNS}
      FROM accounts
      WHERE account_id = ?
      LIMIT 1
    `);

    this.writeBalanceStmt = db.prepare<[number, string, string, string, string]>(`
      UPDATE accounts
      SET balance = ?,
          last_reason = ?,
          last_ref_id = ?,
          updated_at = ?
      WHERE account_id = ?
    `);

    this.listByMemberStmt = db.prepare<[string], AccountRow>(`
      SELECT ${ACCOUNT_COLUMNS}
      FROM accounts
      WHERE member_id = ?
      ORDER BY rowid ASC
    `);

    this.listByAddressStmt = db.prepare<[string], AccountRow>(`
      SELECT ${ACCOUNT_COLUMNS}
      FROM accounts
      WHERE address = ?
      ORDER BY rowid ASC
    `);

    this.getUpdaterStmt = db.prepare<[string], UpdaterRow>(`
      SELECT updater, enabled
      FROM balance_updaters
      WHERE updater = ?
      LIMIT 1
    `);

    this.putUpdaterStmt = db.prepare<[string, number, string]>(`
      INSERT INTO balance_updaters (updater, enabled, updated_at)
      VALUES (?, ?, ?)
      ON CONFLICT(updater) DO UPDATE SET
        enabled = excluded.enabled,
        updated_at = excluded.updated_at
    `);

    this.listUpdatersStmt = db.prepare<[], UpdaterRow>(`
      SELECT updater, enabled
      FROM balance_updaters
      WHERE enabled = 1
      ORDER BY updater ASC
    `);
  }

  nextAccountNumber(): number {
    return this.sequence.next();
  }

  insert(account: GoldAccount): void {
    this.insertStmt.run(
      account.accountId,
      account.memberId,
      account.address,
      account.balance,
      account.createdAt,
      account.updatedAt,
    );
  }

  get(accountId: string): GoldAccount | null {
    const row = this.getStmt.get(accountId);
    return row ? toAccount(row) : null;
  }

  writeBalance(write: BalanceWrite): void {
    this.writeBalanceStmt.run(write.balance, write.reason, write.refId, write.updatedAt, write.accountId);
  }

  listByMember(memberId: string): GoldAccount[] {
    return this.listByMemberStmt.all(memberId).map(toAccount);
  }

  listByAddress(address: string): GoldAccount[] {
    return this.listByAddressStmt.all(address).map(toAccount);
  }

  getUpdater(updater: string): boolean | null {
    const row = this.getUpdaterStmt.get(updater);
    if (!row) return null;
    return row.enabled === 1;
  }

  putUpdater(updater: string, enabled: boolean, updatedAt: string): void {
    this.putUpdaterStmt.run(updater, enabled ? 1 : 0, updatedAt);
  }

  listEnabledUpdaters(): string[] {
    return this.listUpdatersStmt.all().map((row) => row.updater);
  }
}
