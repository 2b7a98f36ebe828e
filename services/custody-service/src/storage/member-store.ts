import type Database from "better-sqlite3";
import type { MemberRecord, MemberStatus } from "@bullion/shared";
import type { SqliteDatabase } from "./database.js";

export interface PrincipalRow {
  address: string;
  memberId: string | null;
  roleMask: number;
  updatedAt: string;
}

export interface BlacklistRow {
  address: string;
  reason: string;
  listedAt: string;
}

export interface MemberStore {
  putMember(member: MemberRecord): void;
  getMember(memberId: string): MemberRecord | null;
  putPrincipal(principal: PrincipalRow): void;
  getPrincipal(address: string): PrincipalRow | null;
  putBlacklisted(entry: BlacklistRow): void;
  removeBlacklisted(address: string): void;
  getBlacklisted(address: string): BlacklistRow | null;
}

interface MemberDbRow {
  member_id: string;
  status: MemberStatus;
  registered_at: string;
  updated_at: string;
}

interface PrincipalDbRow {
  address: string;
  member_id: string | null;
  role_mask: number;
  updated_at: string;
}

interface BlacklistDbRow {
  address: string;
  reason: string;
  listed_at: string;
}

export class SqliteMemberStore implements MemberStore {
  private readonly putMemberStmt: Database.Statement<[string, string, string, string]>;
  private readonly getMemberStmt: Database.Statement<[string], MemberDbRow>;
  private readonly putPrincipalStmt: Database.Statement<[string, string | null, number, string]>;
  private readonly getPrincipalStmt: Database.Statement<[string], PrincipalDbRow>;
  private readonly putBlacklistStmt: Database.Statement<[string, string, string]>;
  private readonly deleteBlacklistStmt: Database.Statement<[string]>;
  private readonly getBlacklistStmt: Database.Statement<[string], BlacklistDbRow>;

  constructor(db: SqliteDatabase) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS members (
        member_id TEXT PRIMARY KEY,
        status TEXT NOT NULL,
        registered_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS principals (
        address TEXT PRIMARY KEY,
        member_id TEXT,
        role_mask INTEGER NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_principals_member
      ON principals(member_id);

      CREATE TABLE IF NOT EXISTS blacklist (
        address TEXT PRIMARY KEY,
        reason TEXT NOT NULL,
        listed_at TEXT NOT NULL
      );
    `);

    this.putMemberStmt = db.prepare<[string, string, string, string]>(`
      INSERT INTO members (member_id, status, registered_at, updated_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(member_id) DO UPDATE SET
        status = excluded.status,
        updated_at = excluded.updated_at
    `);

    this.getMemberStmt = db.prepare<[string], MemberDbRow>(`
      SELECT member_id, status, registered_at, updated_at
      FROM members
      WHERE member_id = ?
      LIMIT 1
    `);

    this.putPrincipalStmt = db.prepare<[string, string | null, number, string]>(`
      INSERT INTO principals (address, member_id, role_mask, updated_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(address) DO UPDATE SET
        member_id = excluded.member_id,
        role_mask = excluded.role_mask,
        updated_at = excluded.updated_at
    `);

    this.getPrincipalStmt = db.prepare<[string], PrincipalDbRow>(`
      SELECT address, member_id, role_mask, updated_at
      FROM principals
      WHERE address = ?
      LIMIT 1
    `);

    this.putBlacklistStmt = db.prepare<[string, string, string]>(`
      INSERT INTO blacklist (address, reason, listed_at)
      VALUES (?, ?, ?)
      ON CONFLICT(address) DO UPDATE SET
        reason = excluded.reason,
        listed_at = excluded.listed_at
    `);

    this.deleteBlacklistStmt = db.prepare<[string]>(`
      DELETE FROM blacklist WHERE address = ?
    `);

    this.getBlacklistStmt = db.prepare<[string], BlacklistDbRow>(`
      SELECT address, reason, listed_at
      FROM blacklist
      WHERE address = ?
      LIMIT 1
    `);
  }

  putMember(member: MemberRecord): void {
    this.putMemberStmt.run(member.memberId, member.status, member.registeredAt, member.updatedAt);
  }

  getMember(memberId: string): MemberRecord | null {
    const row = this.getMemberStmt.get(memberId);
    if (!row) return null;
    return {
      memberId: row.member_id,
      status: row.status,
      registeredAt: row.registered_at,
      updatedAt: row.updated_at,
    };
  }

  putPrincipal(principal: PrincipalRow): void {
    this.putPrincipalStmt.run(
      principal.address,
      principal.memberId,
      principal.roleMask,
      principal.updatedAt,
    );
  }

  getPrincipal(address: string): PrincipalRow | null {
    const row = this.getPrincipalStmt.get(address);
    if (!row) return null;
    return {
      address: row.address,
      memberId: row.member_id,
      roleMask: row.role_mask,
      updatedAt: row.updated_at,
    };
  }

  putBlacklisted(entry: BlacklistRow): void {
    this.putBlacklistStmt.run(entry.address, entry.reason, entry.listedAt);
  }

  removeBlacklisted(address: string): void {
    this.deleteBlacklistStmt.run(address);
  }

  getBlacklisted(address: string): BlacklistRow | null {
    const row = this.getBlacklistStmt.get(address);
    if (!row) return null;
    return { address: row.address, reason: row.reason, listedAt: row.listed_at };
  }
}
