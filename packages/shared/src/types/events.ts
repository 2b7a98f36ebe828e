import type { Role } from "../auth/roles.js";
import type {
  AssetStatus,
  BalanceChannel,
  MemberStatus,
  OrderType,
} from "./domain.js";

export const CUSTODY_EVENT_TYPES = [
  "AccountCreated",
  "BalanceUpdated",
  "BalanceUpdaterSet",
  "AssetMinted",
  "AssetBurned",
  "StatusChanged",
  "CustodyChanged",
  "OwnershipUpdated",
  "WarrantLinked",
  "OrderCreated",
  "OrderPrepared",
  "OrderSigned",
  "OrderExecuted",
  "OrderCancelled",
  "ExecutionOptionsSet",
  "MemberRegistered",
  "MemberStatusChanged",
  "RolesAssigned",
  "BlacklistUpdated",
] as const;

export type CustodyEventType = (typeof CUSTODY_EVENT_TYPES)[number];

export function isCustodyEventType(value: unknown): value is CustodyEventType {
  return typeof value === "string" && (CUSTODY_EVENT_TYPES as readonly string[]).includes(value);
}

export interface CustodyEventBase {
  type: CustodyEventType;
  occurredAt: string;   // ISO date
  actor: string;        // caller address or wiring-time holder
}

export interface AccountCreatedEvent extends CustodyEventBase {
  type: "AccountCreated";
  accountId: string;
  memberId: string;
  address: string;
}

export interface BalanceUpdatedEvent extends CustodyEventBase {
  type: "BalanceUpdated";
  accountId: string;
  delta: number;
  balance: number;
  reason: string;
  refId: string;
  channel: BalanceChannel;
}

export interface BalanceUpdaterSetEvent extends CustodyEventBase {
  type: "BalanceUpdaterSet";
  updater: string;
  enabled: boolean;
}

export interface AssetMintedEvent extends CustodyEventBase {
  type: "AssetMinted";
  tokenId: number;
  owner: string;
  accountId: string;
  serialNumber: string;
  refiner: string;
  fineWeightGrams: number;
  warrantId: string;
}

export interface WarrantLinkedEvent extends CustodyEventBase {
  type: "WarrantLinked";
  warrantId: string;
  tokenId: number;
  owner: string;
}

export interface AssetBurnedEvent extends CustodyEventBase {
  type: "AssetBurned";
  tokenId: number;
  owner: string;
  accountId: string;
  requestedAccountId: string;
  reason: string;
}

export interface StatusChangedEvent extends CustodyEventBase {
  type: "StatusChanged";
  tokenId: number;
  previousStatus: AssetStatus;
  status: AssetStatus;
  reason: string;
}

export interface CustodyChangedEvent extends CustodyEventBase {
  type: "CustodyChanged";
  tokenId: number;
  previousCustodian: string | null;
  custodian: string;
  method: string;
}

export interface OwnershipUpdatedEvent extends CustodyEventBase {
  type: "OwnershipUpdated";
  tokenId: number;
  from: string;
  to: string;
  reason: string;
}

export interface OrderCreatedEvent extends CustodyEventBase {
  type: "OrderCreated";
  txRef: string;
  externalRef: string;
  orderType: OrderType;
  initiatorId: string;
  counterpartyId: string;
  quantity: number;
  currency: string;
  price: string;
}

export interface OrderPreparedEvent extends CustodyEventBase {
  type: "OrderPrepared";
  txRef: string;
  tokenIds: number[];
  sourceAccountId: string;
  destAccountId: string;
}

export interface OrderSignedEvent extends CustodyEventBase {
  type: "OrderSigned";
  txRef: string;
  signer: string;
  partyLabel: string;
}

export interface OrderExecutedEvent extends CustodyEventBase {
  type: "OrderExecuted";
  txRef: string;
  quantity: number;
  tokensMoved: boolean;
  ledgerUpdated: boolean;
}

export interface OrderCancelledEvent extends CustodyEventBase {
  type: "OrderCancelled";
  txRef: string;
  reason: string;
}

export interface ExecutionOptionsSetEvent extends CustodyEventBase {
  type: "ExecutionOptionsSet";
  enableOnChainTransfer: boolean;
  enableAutoLedgerUpdate: boolean;
}

export interface MemberRegisteredEvent extends CustodyEventBase {
  type: "MemberRegistered";
  memberId: string;
  status: MemberStatus;
}

export interface MemberStatusChangedEvent extends CustodyEventBase {
  type: "MemberStatusChanged";
  memberId: string;
  previousStatus: MemberStatus;
  status: MemberStatus;
}

export interface RolesAssignedEvent extends CustodyEventBase {
  type: "RolesAssigned";
  address: string;
  memberId: string | null;
  roles: Role[];
}

export interface BlacklistUpdatedEvent extends CustodyEventBase {
  type: "BlacklistUpdated";
  address: string;
  blacklisted: boolean;
  reason: string;
}

export type CustodyEvent =
  | AccountCreatedEvent
  | BalanceUpdatedEvent
  | BalanceUpdaterSetEvent
  | AssetMintedEvent
  | WarrantLinkedEvent
  | AssetBurnedEvent
  | StatusChangedEvent
  | CustodyChangedEvent
  | OwnershipUpdatedEvent
  | OrderCreatedEvent
  | OrderPreparedEvent
  | OrderSignedEvent
  | OrderExecutedEvent
  | OrderCancelledEvent
  | ExecutionOptionsSetEvent
  | MemberRegisteredEvent
  | MemberStatusChangedEvent
  | RolesAssignedEvent
  | BlacklistUpdatedEvent;

export interface RecordedEvent {
  seq: number;
  ref: string;
  event: CustodyEvent;
  eventHash: string;
  prevHash: string;
}

/** The entity an event is filed under in the audit log. */
export function eventRef(event: CustodyEvent): string {
  switch (event.type) {
    case "AccountCreated":
    case "BalanceUpdated":
      return event.accountId;
    case "BalanceUpdaterSet":
      return event.updater;
    case "AssetMinted":
    case "WarrantLinked":
    case "AssetBurned":
    case "StatusChanged":
    case "CustodyChanged":
    case "OwnershipUpdated":
      return `token:${event.tokenId}`;
    case "OrderCreated":
    case "OrderPrepared":
    case "OrderSigned":
    case "OrderExecuted":
    case "OrderCancelled":
      return event.txRef;
    case "ExecutionOptionsSet":
      return "settlement";
    case "MemberRegistered":
    case "MemberStatusChanged":
      return event.memberId;
    case "RolesAssigned":
    case "BlacklistUpdated":
      return event.address;
  }
}
