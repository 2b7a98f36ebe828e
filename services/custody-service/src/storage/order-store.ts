import type Database from "better-sqlite3";
import type {
  OrderStatus,
  OrderType,
  RequestedAsset,
  SettlementOrder,
} from "@bullion/shared";
import type { SqliteDatabase } from "./database.js";

export interface OrderStore {
  insert(order: SettlementOrder): void;
  get(txRef: string): SettlementOrder | null;
  update(order: SettlementOrder): void;
  list(status?: OrderStatus): SettlementOrder[];
}

interface OrderRow {
  tx_ref: string;
  external_ref: string;
  order_type: OrderType;
  initiator_id: string;
  counterparty_id: string;
  source_account_id: string;
  dest_account_id: string;
  token_ids_json: string;
  requested_assets_json: string;
  quantity: number;
  settlement_date: string;
  currency: string;
  price: string;
  fee: string;
  metadata_json: string;
  status: OrderStatus;
  signature: string | null;
  signed_by: string | null;
  party_label: string | null;
  cancel_reason: string | null;
  created_at: string;
  signed_at: string | null;
  executed_at: string | null;
  cancelled_at: string | null;
}

type InsertParams = [
  string, string, string, string, string, string, string, string, string, number,
  string, string, string, string, string, string, string,
];

type UpdateParams = [
  string, string | null, string | null, string | null, string | null,
  string | null, string | null, string | null, string,
];

const ORDER_COLUMNS = `
  tx_ref, external_ref, order_type, initiator_id, counterparty_id,
  source_account_id, dest_account_id, token_ids_json, requested_assets_json,
  quantity, settlement_date, currency, price, fee, metadata_json, status,
  signature, signed_by, party_label, cancel_reason, created_at, signed_at,
  executed_at, cancelled_at
`;

function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function parseTokenIds(raw: string): number[] {
  const value: unknown = JSON.parse(raw);
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is number => typeof item === "number");
}

function parseRequestedAssets(raw: string): RequestedAsset[] {
  const value: unknown = JSON.parse(raw);
  if (!Array.isArray(value)) return [];
  const assets: RequestedAsset[] = [];
  for (const item of value) {
    if (!isObject(item)) continue;
    if (typeof item.productType !== "string" || typeof item.quantity !== "number") continue;
    assets.push({
      productType: item.productType,
      quantity: item.quantity,
      ...(typeof item.minFineness === "number" ? { minFineness: item.minFineness } : {}),
    });
  }
  return assets;
}

function parseMetadata(raw: string): Record<string, unknown> {
  const value: unknown = JSON.parse(raw);
  return isObject(value) ? value : {};
}

function toOrder(row: OrderRow): SettlementOrder {
  return {
    txRef: row.tx_ref,
    externalRef: row.external_ref,
    orderType: row.order_type,
    initiatorId: row.initiator_id,
    counterpartyId: row.counterparty_id,
    sourceAccountId: row.source_account_id,
    destAccountId: row.dest_account_id,
    tokenIds: parseTokenIds(row.token_ids_json),
    requestedAssets: parseRequestedAssets(row.requested_assets_json),
    quantity: row.quantity,
    settlementDate: row.settlement_date,
    currency: row.currency,
    price: row.price,
    fee: row.fee,
    metadata: parseMetadata(row.metadata_json),
    status: row.status,
    signature: row.signature,
    signedBy: row.signed_by,
    partyLabel: row.party_label,
    cancelReason: row.cancel_reason,
    createdAt: row.created_at,
    signedAt: row.signed_at,
    executedAt: row.executed_at,
    cancelledAt: row.cancelled_at,
  };
}

export class SqliteOrderStore implements OrderStore {
  private readonly insertStmt: Database.Statement<InsertParams>;
  private readonly getStmt: Database.Statement<[string], OrderRow>;
  private readonly updateStmt: Database.Statement<UpdateParams>;
  private readonly listAllStmt: Database.Statement<[], OrderRow>;
  private readonly listByStatusStmt: Database.Statement<[string], OrderRow>;

  constructor(db: SqliteDatabase) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS orders (
        tx_ref TEXT PRIMARY KEY,
        external_ref TEXT NOT NULL,
        order_type TEXT NOT NULL,
        initiator_id TEXT NOT NULL,
        counterparty_id TEXT NOT NULL,
        source_account_id TEXT NOT NULL,
        dest_account_id TEXT NOT NULL,
        token_ids_json TEXT NOT NULL,
        requested_assets_json TEXT NOT NULL,
        quantity INTEGER NOT NULL,
        settlement_date TEXT NOT NULL,
        currency TEXT NOT NULL,
        price TEXT NOT NULL,
        fee TEXT NOT NULL,
        metadata_json TEXT NOT NULL,
        status TEXT NOT NULL,
        signature TEXT,
        signed_by TEXT,
        party_label TEXT,
        cancel_reason TEXT,
        created_at TEXT NOT NULL,
        signed_at TEXT,
        executed_at TEXT,
        cancelled_at TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_orders_status
      ON orders(status, created_at DESC);
    `);

    this.insertStmt = db.prepare<InsertParams>(`
      INSERT INTO orders (
        tx_ref, external_ref, order_type, initiator_id, counterparty_id,
        source_account_id, dest_account_id, token_ids_json, requested_assets_json,
        quantity, settlement_date, currency, price, fee, metadata_json, status, created_at
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    this.getStmt = db.prepare<[string], OrderRow>(`
      SELECT ${ORDER_COLUMNS}
      FROM orders
      WHERE tx_ref = ?
      LIMIT 1
    `);

    // The settlement instruction itself is frozen at prepare time; only the
    // lifecycle columns move afterwards.
    this.updateStmt = db.prepare<UpdateParams>(`
      UPDATE orders
      SET status = ?,
          signature = ?,
          signed_by = ?,
          party_label = ?,
          cancel_reason = ?,
          signed_at = ?,
          executed_at = ?,
          cancelled_at = ?
      WHERE tx_ref = ?
    `);

    this.listAllStmt = db.prepare<[], OrderRow>(`
      SELECT ${ORDER_COLUMNS}
      FROM orders
      ORDER BY rowid ASC
    `);

    this.listByStatusStmt = db.prepare<[string], OrderRow>(`
      SELECT ${ORDER_COLUMNS}
      FROM orders
      WHERE status = ?
      ORDER BY rowid ASC
    `);
  }

  insert(order: SettlementOrder): void {
    this.insertStmt.run(
      order.txRef,
      order.externalRef,
      order.orderType,
      order.initiatorId,
      order.counterpartyId,
      order.sourceAccountId,
      order.destAccountId,
      JSON.stringify(order.tokenIds),
      JSON.stringify(order.requestedAssets),
      order.quantity,
      order.settlementDate,
      order.currency,
      order.price,
      order.fee,
      JSON.stringify(order.metadata),
      order.status,
      order.createdAt,
    );
  }

  get(txRef: string): SettlementOrder | null {
    const row = this.getStmt.get(txRef);
    return row ? toOrder(row) : null;
  }

  update(order: SettlementOrder): void {
    this.updateStmt.run(
      order.status,
      order.signature,
      order.signedBy,
      order.partyLabel,
      order.cancelReason,
      order.signedAt,
      order.executedAt,
      order.cancelledAt,
      order.txRef,
    );
  }

  list(status?: OrderStatus): SettlementOrder[] {
    const rows = status !== undefined ? this.listByStatusStmt.all(status) : this.listAllStmt.all();
    return rows.map(toOrder);
  }
}
