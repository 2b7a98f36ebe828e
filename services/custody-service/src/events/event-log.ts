import {
  type CustodyEvent,
  eventRef,
  hashCanonical,
  type RecordedEvent,
} from "@bullion/shared";
import type { EventFilter, EventStore } from "../storage/event-store.js";

export const GENESIS_HASH = "0".repeat(64);

export interface ChainVerification {
  valid: boolean;
  length: number;
  brokenAtSeq?: number;
}

function hashRecord(seq: number, prevHash: string, event: CustodyEvent): string {
  return hashCanonical({ seq, prevHash, event });
}

/**
 * Append-only audit trail. Every record is chained to its predecessor by hash,
 * so rewriting any stored event breaks `verifyChain`.
 */
export class EventLog {
  constructor(private readonly store: EventStore) {}

  append(event: CustodyEvent): RecordedEvent {
    const head = this.store.head();
    const seq = head ? head.seq + 1 : 1;
    const prevHash = head ? head.eventHash : GENESIS_HASH;
    const record: RecordedEvent = {
      seq,
      ref: eventRef(event),
      event,
      eventHash: hashRecord(seq, prevHash, event),
      prevHash,
    };
    this.store.append(record);
    return record;
  }

  list(filter?: EventFilter): RecordedEvent[] {
    return this.store.list(filter);
  }

  verifyChain(): ChainVerification {
    const records = this.store.all();
    let prevHash = GENESIS_HASH;
    for (const record of records) {
      if (record.prevHash !== prevHash || hashRecord(record.seq, prevHash, record.event) !== record.eventHash) {
        return { valid: false, length: records.length, brokenAtSeq: record.seq };
      }
      prevHash = record.eventHash;
    }
    return { valid: true, length: records.length };
  }
}
