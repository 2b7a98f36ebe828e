import type Database from "better-sqlite3";
import type { AssetStatus, GoldAsset } from "@bullion/shared";
import { type SqliteDatabase, SqliteSequence } from "./database.js";

const FIRST_TOKEN_ID = 1;

export interface AssetStore {
  nextTokenId(): number;
  insert(asset: GoldAsset): void;
  get(tokenId: number): GoldAsset | null;
  update(asset: GoldAsset): void;
  findTokenByWarrant(warrantId: string): number | null;
  listByOwner(owner: string): GoldAsset[];
  list(status?: AssetStatus): GoldAsset[];
}

interface AssetRow {
  token_id: number;
  serial_number: string;
  refiner: string;
  weight_grams: number;
  fineness: number;
  fine_weight_grams: number;
  product_type: string;
  certificate_hash: string;
  member_id: string;
  certified: number;
  warrant_id: string;
  owner: string;
  custodian: string | null;
  status: AssetStatus;
  status_reason: string | null;
  account_id: string;
  minted_at: string;
  updated_at: string;
}

interface WarrantRow {
  token_id: number;
}

type InsertParams = [
  number, string, string, number, number, number, string, string, string, number,
  string, string, string | null, string, string | null, string, string, string,
];

type UpdateParams = [string, string | null, string, string | null, string, number];

const ASSET_COLUMNS = `
  token_id, serial_number, refiner, weight_grams, fineness, fine_weight_grams,
  product_type, certificate_hash, member_id, certified, warrant_id, owner,
  custodian, status, status_reason, account_id, minted_at, updated_at
`;

function toAsset(row: AssetRow): GoldAsset {
  return {
    tokenId: row.token_id,
    serialNumber: row.serial_number,
    refiner: row.refiner,
    weightGrams: row.weight_grams,
    fineness: row.fineness,
    fineWeightGrams: row.fine_weight_grams,
    productType: row.product_type,
    certificateHash: row.certificate_hash,
    memberId: row.member_id,
    certified: row.certified === 1,
    warrantId: row.warrant_id,
    owner: row.owner,
    custodian: row.custodian,
    status: row.status,
    statusReason: row.status_reason,
    accountId: row.account_id,
    mintedAt: row.minted_at,
    updatedAt: row.updated_at,
  };
}

export class SqliteAssetStore implements AssetStore {
  private readonly sequence: SqliteSequence;
  private readonly insertStmt: Database.Statement<InsertParams>;
  private readonly getStmt: Database.Statement<[number], AssetRow>;
  private readonly updateStmt: Database.Statement<UpdateParams>;
  private readonly warrantStmt: Database.Statement<[string], WarrantRow>;
  private readonly listByOwnerStmt: Database.Statement<[string], AssetRow>;
  private readonly listAllStmt: Database.Statement<[], AssetRow>;
  private readonly listByStatusStmt: Database.Statement<[string], AssetRow>;

  constructor(db: SqliteDatabase) {
    this.sequence = new SqliteSequence(db, "token_id", FIRST_TOKEN_ID);
    db.exec(`
      CREATE TABLE IF NOT EXISTS assets (
        token_id INTEGER PRIMARY KEY,
        serial_number TEXT NOT NULL,
        refiner TEXT NOT NULL,
        weight_grams INTEGER NOT NULL,
        fineness INTEGER NOT NULL,
        fine_weight_grams INTEGER NOT NULL,
        product_type TEXT NOT NULL,
        certificate_hash TEXT NOT NULL,
        member_id TEXT NOT NULL,
        certified INTEGER NOT NULL,
        warrant_id TEXT NOT NULL UNIQUE,
        owner TEXT NOT NULL,
        custodian TEXT,
        status TEXT NOT NULL,
        status_reason TEXT,
        account_id TEXT NOT NULL,
        minted_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_assets_owner
      ON assets(owner, status);

      CREATE INDEX IF NOT EXISTS idx_assets_status
      ON assets(status);
    `);

    this.insertStmt = db.prepare<InsertParams>(`
      INSERT INTO assets (${ASSET_COLUMNS})
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    this.getStmt = db.prepare<[number], AssetRow>(`
      SELECT ${ASSET_COLUMNS}
      FROM assets
      WHERE token_id = ?
      LIMIT 1
    `);

    // account_id and warrant_id are write-once; update never touches them.
    this.updateStmt = db.prepare<UpdateParams>(`
      UPDATE assets
      SET owner = ?,
          custodian = ?,
          status = ?,
          status_reason = ?,
          updated_at = ?
      WHERE token_id = ?
    `);

    this.warrantStmt = db.prepare<[string], WarrantRow>(`
      SELECT token_id
      FROM assets
      WHERE warrant_id = ?
      LIMIT 1
    `);

    this.listByOwnerStmt = db.prepare<[string], AssetRow>(`
      SELECT ${ASSET_COLUMNS}
      FROM assets
      WHERE owner = ? AND status <> 'BURNED'
      ORDER BY token_id ASC
    `);

    this.listAllStmt = db.prepare<[], AssetRow>(`
      SELECT ${ASSET_COLUMNS}
      FROM assets
      ORDER BY token_id ASC
    `);

    this.listByStatusStmt = db.prepare<[string], AssetRow>(`
      SELECT ${ASSET_COLUMNS}
      FROM assets
      WHERE status = ?
      ORDER BY token_id ASC
    `);
  }

  nextTokenId(): number {
    return this.sequence.next();
  }

  insert(asset: GoldAsset): void {
    this.insertStmt.run(
      asset.tokenId,
      asset.serialNumber,
      asset.refiner,
      asset.weightGrams,
      asset.fineness,
      asset.fineWeightGrams,
      asset.productType,
      asset.certificateHash,
      asset.memberId,
      asset.certified ? 1 : 0,
      asset.warrantId,
      asset.owner,
      asset.custodian,
      asset.status,
      asset.statusReason,
      asset.accountId,
      asset.mintedAt,
      asset.updatedAt,
    );
  }

  get(tokenId: number): GoldAsset | null {
    const row = this.getStmt.get(tokenId);
    return row ? toAsset(row) : null;
  }

  update(asset: GoldAsset): void {
    this.updateStmt.run(
      asset.owner,
      asset.custodian,
      asset.status,
      asset.statusReason,
      asset.updatedAt,
      asset.tokenId,
    );
  }

  findTokenByWarrant(warrantId: string): number | null {
    const row = this.warrantStmt.get(warrantId);
    return row ? row.token_id : null;
  }

  listByOwner(owner: string): GoldAsset[] {
    return this.listByOwnerStmt.all(owner).map(toAsset);
  }

  list(status?: AssetStatus): GoldAsset[] {
    const rows = status !== undefined ? this.listByStatusStmt.all(status) : this.listAllStmt.all();
    return rows.map(toAsset);
  }
}
