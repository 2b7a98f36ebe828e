import type Database from "better-sqlite3";
import type { CustodyEvent, CustodyEventType, RecordedEvent } from "@bullion/shared";
import type { SqliteDatabase } from "./database.js";

export interface EventFilter {
  ref?: string;
  type?: CustodyEventType;
  limit?: number;
}

export interface ChainHead {
  seq: number;
  eventHash: string;
}

export interface EventStore {
  head(): ChainHead | null;
  append(record: RecordedEvent): void;
  list(filter?: EventFilter): RecordedEvent[];
  all(): RecordedEvent[];
}

interface EventRow {
  seq: number;
  ref: string;
  event_json: string;
  event_hash: string;
  prev_hash: string;
}

interface ListParams {
  ref: string | null;
  type: string | null;
  limit: number;
}

interface HeadRow {
  seq: number;
  event_hash: string;
}

const DEFAULT_LIST_LIMIT = 200;

function toRecordedEvent(row: EventRow): RecordedEvent {
  return {
    seq: row.seq,
    ref: row.ref,
    event: JSON.parse(row.event_json) as CustodyEvent,
    eventHash: row.event_hash,
    prevHash: row.prev_hash,
  };
}

export class SqliteEventStore implements EventStore {
  private readonly headStmt: Database.Statement<[], HeadRow>;
  private readonly appendStmt: Database.Statement<[number, string, string, string, string, string, string]>;
  private readonly listStmt: Database.Statement<ListParams, EventRow>;
  private readonly allStmt: Database.Statement<[], EventRow>;

  constructor(db: SqliteDatabase) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS custody_events (
        seq INTEGER PRIMARY KEY,
        ref TEXT NOT NULL,
        event_type TEXT NOT NULL,
        occurred_at TEXT NOT NULL,
        event_json TEXT NOT NULL,
        event_hash TEXT NOT NULL,
        prev_hash TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_custody_events_ref
      ON custody_events(ref, seq ASC);
    `);

    this.headStmt = db.prepare<[], HeadRow>(`
      SELECT seq, event_hash
      FROM custody_events
      ORDER BY seq DESC
      LIMIT 1
    `);

    this.appendStmt = db.prepare<[number, string, string, string, string, string, string]>(`
      INSERT INTO custody_events (seq, ref, event_type, occurred_at, event_json, event_hash, prev_hash)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);

    this.listStmt = db.prepare<ListParams, EventRow>(`
      SELECT seq, ref, event_json, event_hash, prev_hash
      FROM (
        SELECT seq, ref, event_json, event_hash, prev_hash
        FROM custody_events
        WHERE (@ref IS NULL OR ref = @ref)
          AND (@type IS NULL OR event_type = @type)
        ORDER BY seq DESC
        LIMIT @limit
      )
      ORDER BY seq ASC
    `);

    this.allStmt = db.prepare<[], EventRow>(`
      SELECT seq, ref, event_json, event_hash, prev_hash
      FROM custody_events
      ORDER BY seq ASC
    `);
  }

  head(): ChainHead | null {
    const row = this.headStmt.get();
    return row ? { seq: row.seq, eventHash: row.event_hash } : null;
  }

  append(record: RecordedEvent): void {
    this.appendStmt.run(
      record.seq,
      record.ref,
      record.event.type,
      record.event.occurredAt,
      JSON.stringify(record.event),
      record.eventHash,
      record.prevHash,
    );
  }

  /** Most recent matching events, returned oldest first. */
  list(filter: EventFilter = {}): RecordedEvent[] {
    const rows = this.listStmt.all({
      ref: filter.ref ?? null,
      type: filter.type ?? null,
      limit: filter.limit ?? DEFAULT_LIST_LIMIT,
    });
    return rows.map(toRecordedEvent);
  }

  all(): RecordedEvent[] {
    return this.allStmt.all().map(toRecordedEvent);
  }
}
