import type { Role } from "../auth/roles.js";

export type MemberStatus = "PENDING" | "ACTIVE" | "SUSPENDED" | "TERMINATED";

export function isMemberStatus(value: unknown): value is MemberStatus {
  return value === "PENDING" || value === "ACTIVE" || value === "SUSPENDED" || value === "TERMINATED";
}

export interface MemberRecord {
  memberId: string;
  status: MemberStatus;
  registeredAt: string;
  updatedAt: string;
}

export interface PrincipalRecord {
  address: string;
  memberId: string | null;
  roles: Role[];
  blacklisted: boolean;
  updatedAt: string;
}

export interface GoldAccount {
  accountId: string;        // "IGAN-1000", "IGAN-1001", ...
  memberId: string;
  address: string;          // checksummed EVM address
  balance: number;          // whole asset units, never negative
  lastReason: string | null;
  lastRefId: string | null;
  createdAt: string;
  updatedAt: string;
}

export type BalanceChannel = "OPERATOR" | "CONTRACT";

export type AssetStatus = "REGISTERED" | "IN_VAULT" | "IN_TRANSIT" | "PLEDGED" | "BURNED";

export const LOCKED_ASSET_STATUSES: readonly AssetStatus[] = ["IN_TRANSIT", "PLEDGED"];

export const FINENESS_SCALE = 10_000;

export function isAssetStatus(value: unknown): value is AssetStatus {
  return (
    value === "REGISTERED" ||
    value === "IN_VAULT" ||
    value === "IN_TRANSIT" ||
    value === "PLEDGED" ||
    value === "BURNED"
  );
}

export function isLockedStatus(status: AssetStatus): boolean {
  return LOCKED_ASSET_STATUSES.includes(status);
}

/** weight × fineness / 10 000, truncated. */
export function computeFineWeight(weightGrams: number, fineness: number): number {
  return Number((BigInt(weightGrams) * BigInt(fineness)) / BigInt(FINENESS_SCALE));
}

export interface GoldAsset {
  tokenId: number;
  serialNumber: string;
  refiner: string;
  weightGrams: number;
  fineness: number;         // basis points out of 10 000
  fineWeightGrams: number;
  productType: string;
  certificateHash: string;
  memberId: string;
  certified: boolean;
  warrantId: string;
  owner: string;
  custodian: string | null;
  status: AssetStatus;
  statusReason: string | null;
  accountId: string;        // credited at mint, immutable
  mintedAt: string;
  updatedAt: string;
}

export type OrderStatus =
  | "PENDING_COUNTERPARTY"
  | "PENDING_EXECUTION"
  | "EXECUTED"
  | "CANCELLED";

export type OrderType = "PURCHASE" | "SALE" | "TRANSFER" | "SWAP";

export function isOrderStatus(value: unknown): value is OrderStatus {
  return (
    value === "PENDING_COUNTERPARTY" ||
    value === "PENDING_EXECUTION" ||
    value === "EXECUTED" ||
    value === "CANCELLED"
  );
}

export function isOrderType(value: unknown): value is OrderType {
  return value === "PURCHASE" || value === "SALE" || value === "TRANSFER" || value === "SWAP";
}

export interface RequestedAsset {
  productType: string;
  quantity: number;
  minFineness?: number;
}

export interface SettlementOrder {
  txRef: string;
  externalRef: string;
  orderType: OrderType;
  initiatorId: string;
  counterpartyId: string;
  sourceAccountId: string;
  destAccountId: string;
  tokenIds: number[];
  requestedAssets: RequestedAsset[];
  quantity: number;
  settlementDate: string;
  currency: string;
  price: string;
  fee: string;
  metadata: Record<string, unknown>;
  status: OrderStatus;
  signature: string | null;
  signedBy: string | null;
  partyLabel: string | null;
  cancelReason: string | null;
  createdAt: string;
  signedAt: string | null;
  executedAt: string | null;
  cancelledAt: string | null;
}

export interface ExecutionOptions {
  enableOnChainTransfer: boolean;
  enableAutoLedgerUpdate: boolean;
}
