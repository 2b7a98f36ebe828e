import type { Role } from "../auth/roles.js";
import type {
  AssetStatus,
  ExecutionOptions,
  GoldAccount,
  GoldAsset,
  MemberRecord,
  MemberStatus,
  OrderType,
  PrincipalRecord,
  RequestedAsset,
  SettlementOrder,
} from "./domain.js";
import type { RecordedEvent } from "./events.js";

export interface ErrorResponse {
  error: string;
  message?: string;
}

export interface RegisterMemberRequest {
  memberId: string;
  status?: MemberStatus;
}

export interface SetMemberStatusRequest {
  status: MemberStatus;
}

export interface MemberResponse {
  member: MemberRecord;
}

export interface AssignRolesRequest {
  address: string;
  memberId?: string;
  roles: Role[];
}

export interface SetBlacklistedRequest {
  address: string;
  blacklisted: boolean;
  reason?: string;
}

export interface PrincipalResponse {
  principal: PrincipalRecord;
}

export interface CreateAccountRequest {
  memberId: string;
  address: string;
}

export interface AccountResponse {
  account: GoldAccount;
}

export interface ListAccountsResponse {
  accounts: GoldAccount[];
}

export interface GetBalanceResponse {
  accountId: string;
  balance: number;
}

export interface UpdateBalanceRequest {
  delta: number;
  reason: string;
  refId: string;
}

export interface SetBalanceUpdaterRequest {
  updater: string;
  enabled: boolean;
}

export interface ListBalanceUpdatersResponse {
  updaters: string[];
}

export interface MintAssetRequest {
  owner: string;
  accountId: string;
  serialNumber: string;
  refiner: string;
  weightGrams: number;
  fineness: number;
  productType: string;
  certificateHash: string;
  memberId: string;
  certified: boolean;
  warrantId: string;
}

export interface AssetResponse {
  asset: GoldAsset;
}

export interface ListAssetsResponse {
  assets: GoldAsset[];
}

export interface AssetLockResponse {
  tokenId: number;
  locked: boolean;
  status: AssetStatus;
}

export interface UpdateAssetStatusRequest {
  status: AssetStatus;
  reason: string;
}

export interface UpdateCustodyBatchRequest {
  tokenIds: number[];
  custodian: string;
  method: string;
}

export interface BurnAssetRequest {
  accountId: string;
  reason: string;
}

export interface TransferAssetRequest {
  from: string;
  to: string;
  quantity: number;
}

export interface ForceTransferAssetRequest {
  from: string;
  to: string;
  reason: string;
}

export interface VerifyCertificateRequest {
  certificateHash: string;
}

export interface VerifyCertificateResponse {
  tokenId: number;
  valid: boolean;
}

export interface PrepareOrderRequest {
  externalRef: string;
  txRef: string;
  orderType: OrderType;
  initiatorId: string;
  counterpartyId: string;
  sourceAccountId: string;
  destAccountId: string;
  tokenIds: number[];
  requestedAssets: RequestedAsset[];
  settlementDate: string;
  currency: string;
  price: string;
  fee: string;
  metadata?: Record<string, unknown>;
}

export interface SignOrderRequest {
  signature: string;
  partyLabel: string;
}

export interface CancelOrderRequest {
  reason: string;
}

export interface OrderResponse {
  order: SettlementOrder;
}

export interface ListOrdersResponse {
  orders: SettlementOrder[];
}

export interface ExecutionOptionsResponse {
  options: ExecutionOptions;
}

export interface ListEventsResponse {
  events: RecordedEvent[];
}

export interface VerifyEventChainResponse {
  valid: boolean;
  length: number;
  brokenAtSeq?: number;
}
