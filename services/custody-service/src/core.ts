import type { ExecutionOptions, RoleSet } from "@bullion/shared";
import { type Clock, systemClock } from "./clock.js";
import { AssetCustody } from "./custody/asset-custody.js";
import { EventLog } from "./events/event-log.js";
import { AccountLedger } from "./ledger/account-ledger.js";
import { type CoreLogger, silentLogger } from "./logging.js";
import { MemberRegistry } from "./registry/member-registry.js";
import { OrderSettlement } from "./settlement/order-settlement.js";
import { SqliteAccountStore } from "./storage/account-store.js";
import { SqliteAssetStore } from "./storage/asset-store.js";
import { openDatabase } from "./storage/database.js";
import { SqliteEventStore } from "./storage/event-store.js";
import { SqliteMemberStore } from "./storage/member-store.js";
import { SqliteOrderStore } from "./storage/order-store.js";
import { SqliteSettingsStore } from "./storage/settings-store.js";
import { UnitOfWork } from "./storage/unit-of-work.js";

export const CUSTODY_HOLDER = "asset-custody";
export const SETTLEMENT_HOLDER = "order-settlement";

export interface CustodyCoreOptions {
  dbPath: string;
  clock?: Clock;
  logger?: CoreLogger;
  executionDefaults?: ExecutionOptions;
  statusOperatorRoles?: RoleSet;
  bootstrapAdminAddress?: string;
}

export interface CustodyCore {
  registry: MemberRegistry;
  ledger: AccountLedger;
  custody: AssetCustody;
  settlement: OrderSettlement;
  events: EventLog;
  close(): void;
}

/**
 * Opens the database and wires the three ledgers together. Capabilities are
 * handed out here and nowhere else.
 */
export function createCustodyCore(options: CustodyCoreOptions): CustodyCore {
  const db = openDatabase(options.dbPath);
  const clock = options.clock ?? systemClock;
  const logger = options.logger ?? silentLogger;
  const uow = new UnitOfWork(db);
  const events = new EventLog(new SqliteEventStore(db));

  const registry = new MemberRegistry({
    store: new SqliteMemberStore(db),
    events,
    uow,
    clock,
    logger,
  });
  const ledger = new AccountLedger({
    store: new SqliteAccountStore(db),
    registry,
    events,
    uow,
    clock,
    logger,
  });
  const custody = new AssetCustody({
    store: new SqliteAssetStore(db),
    ledger,
    ledgerCapability: ledger.issueWriteCapability(CUSTODY_HOLDER),
    registry,
    events,
    uow,
    clock,
    logger,
    statusOperatorRoles: options.statusOperatorRoles,
  });
  const settlement = new OrderSettlement({
    store: new SqliteOrderStore(db),
    settings: new SqliteSettingsStore(db),
    ledger,
    ledgerCapability: ledger.issueWriteCapability(SETTLEMENT_HOLDER),
    custody,
    settlementCapability: custody.issueSettlementCapability(SETTLEMENT_HOLDER),
    registry,
    events,
    uow,
    clock,
    logger,
    executionDefaults: options.executionDefaults,
  });

  if (options.bootstrapAdminAddress) {
    registry.bootstrapAdmin(options.bootstrapAdminAddress);
  }

  return {
    registry,
    ledger,
    custody,
    settlement,
    events,
    close: () => db.close(),
  };
}
