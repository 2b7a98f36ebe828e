import {
  type AssignRolesRequest,
  type BurnAssetRequest,
  type CancelOrderRequest,
  type CreateAccountRequest,
  type ExecutionOptions,
  type ForceTransferAssetRequest,
  isAssetStatus,
  isMemberStatus,
  isOrderType,
  isRole,
  type MintAssetRequest,
  type PrepareOrderRequest,
  type RegisterMemberRequest,
  type RequestedAsset,
  type Role,
  type SetBalanceUpdaterRequest,
  type SetBlacklistedRequest,
  type SetMemberStatusRequest,
  type SignOrderRequest,
  type TransferAssetRequest,
  type UpdateAssetStatusRequest,
  type UpdateBalanceRequest,
  type UpdateCustodyBatchRequest,
  type VerifyCertificateRequest,
} from "@bullion/shared";

export function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

export function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function isInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value);
}

function isTokenId(value: unknown): value is number {
  return isInteger(value) && value > 0;
}

function isDecimal(value: unknown): value is string {
  return typeof value === "string" && /^\d+(\.\d+)?$/.test(value);
}

/** Path segments arrive as strings; token ids are positive integers. */
export function parseTokenIdParam(raw: string): number | null {
  if (!/^\d+$/.test(raw)) return null;
  const tokenId = Number(raw);
  return isTokenId(tokenId) ? tokenId : null;
}

export function parseLimit(raw: unknown): number | null | undefined {
  if (raw === undefined) return undefined;
  if (typeof raw !== "string" || !/^\d+$/.test(raw)) return null;
  const limit = Number(raw);
  return limit >= 1 && limit <= 1000 ? limit : null;
}

export function parseRegisterMemberRequest(body: unknown): RegisterMemberRequest | null {
  if (!isObject(body)) return null;
  if (!isNonEmptyString(body.memberId)) return null;
  if (body.status !== undefined && !isMemberStatus(body.status)) return null;
  return {
    memberId: body.memberId.trim(),
    ...(body.status !== undefined ? { status: body.status } : {}),
  };
}

export function parseSetMemberStatusRequest(body: unknown): SetMemberStatusRequest | null {
  if (!isObject(body)) return null;
  if (!isMemberStatus(body.status)) return null;
  return { status: body.status };
}

export function parseAssignRolesRequest(body: unknown): AssignRolesRequest | null {
  if (!isObject(body)) return null;
  if (!isNonEmptyString(body.address)) return null;
  if (body.memberId !== undefined && !isNonEmptyString(body.memberId)) return null;
  if (!Array.isArray(body.roles)) return null;
  const roles: Role[] = [];
  for (const role of body.roles) {
    if (!isRole(role)) return null;
    roles.push(role);
  }
  return {
    address: body.address,
    ...(body.memberId !== undefined ? { memberId: body.memberId } : {}),
    roles,
  };
}

export function parseSetBlacklistedRequest(body: unknown): SetBlacklistedRequest | null {
  if (!isObject(body)) return null;
  if (!isNonEmptyString(body.address)) return null;
  if (typeof body.blacklisted !== "boolean") return null;
  if (body.reason !== undefined && typeof body.reason !== "string") return null;
  return {
    address: body.address,
    blacklisted: body.blacklisted,
    ...(body.reason !== undefined ? { reason: body.reason } : {}),
  };
}

export function parseCreateAccountRequest(body: unknown): CreateAccountRequest | null {
  if (!isObject(body)) return null;
  if (!isNonEmptyString(body.memberId)) return null;
  if (!isNonEmptyString(body.address)) return null;
  return { memberId: body.memberId, address: body.address };
}

export function parseUpdateBalanceRequest(body: unknown): UpdateBalanceRequest | null {
  if (!isObject(body)) return null;
  if (!isInteger(body.delta)) return null;
  if (!isNonEmptyString(body.reason)) return null;
  // Reference ids are opaque; numeric ones are kept in their decimal form.
  const refId = isInteger(body.refId) ? String(body.refId) : body.refId;
  if (!isNonEmptyString(refId)) return null;
  return { delta: body.delta, reason: body.reason, refId };
}

export function parseSetBalanceUpdaterRequest(body: unknown): SetBalanceUpdaterRequest | null {
  if (!isObject(body)) return null;
  if (!isNonEmptyString(body.updater)) return null;
  if (typeof body.enabled !== "boolean") return null;
  return { updater: body.updater, enabled: body.enabled };
}

export function parseMintAssetRequest(body: unknown): MintAssetRequest | null {
  if (!isObject(body)) return null;
  if (!isNonEmptyString(body.owner)) return null;
  if (!isNonEmptyString(body.accountId)) return null;
  if (!isNonEmptyString(body.serialNumber)) return null;
  if (!isNonEmptyString(body.refiner)) return null;
  if (!isInteger(body.weightGrams)) return null;
  if (!isInteger(body.fineness)) return null;
  if (!isNonEmptyString(body.productType)) return null;
  if (!isNonEmptyString(body.certificateHash)) return null;
  if (!isNonEmptyString(body.memberId)) return null;
  if (typeof body.certified !== "boolean") return null;
  if (!isNonEmptyString(body.warrantId)) return null;
  return {
    owner: body.owner,
    accountId: body.accountId,
    serialNumber: body.serialNumber,
    refiner: body.refiner,
    weightGrams: body.weightGrams,
    fineness: body.fineness,
    productType: body.productType,
    certificateHash: body.certificateHash,
    memberId: body.memberId,
    certified: body.certified,
    warrantId: body.warrantId,
  };
}

export function parseUpdateAssetStatusRequest(body: unknown): UpdateAssetStatusRequest | null {
  if (!isObject(body)) return null;
  if (!isAssetStatus(body.status)) return null;
  if (typeof body.reason !== "string") return null;
  return { status: body.status, reason: body.reason };
}

export function parseUpdateCustodyBatchRequest(body: unknown): UpdateCustodyBatchRequest | null {
  if (!isObject(body)) return null;
  if (!Array.isArray(body.tokenIds) || body.tokenIds.length === 0) return null;
  const tokenIds: number[] = [];
  for (const tokenId of body.tokenIds) {
    if (!isTokenId(tokenId)) return null;
    tokenIds.push(tokenId);
  }
  if (!isNonEmptyString(body.custodian)) return null;
  if (!isNonEmptyString(body.method)) return null;
  return { tokenIds, custodian: body.custodian, method: body.method };
}

export function parseBurnAssetRequest(body: unknown): BurnAssetRequest | null {
  if (!isObject(body)) return null;
  if (!isNonEmptyString(body.accountId)) return null;
  if (!isNonEmptyString(body.reason)) return null;
  return { accountId: body.accountId, reason: body.reason };
}

export function parseTransferAssetRequest(body: unknown): TransferAssetRequest | null {
  if (!isObject(body)) return null;
  if (!isNonEmptyString(body.from)) return null;
  if (!isNonEmptyString(body.to)) return null;
  if (body.quantity !== undefined && !isInteger(body.quantity)) return null;
  return { from: body.from, to: body.to, quantity: body.quantity ?? 1 };
}

export function parseForceTransferAssetRequest(body: unknown): ForceTransferAssetRequest | null {
  if (!isObject(body)) return null;
  if (!isNonEmptyString(body.from)) return null;
  if (!isNonEmptyString(body.to)) return null;
  if (!isNonEmptyString(body.reason)) return null;
  return { from: body.from, to: body.to, reason: body.reason };
}

export function parseVerifyCertificateRequest(body: unknown): VerifyCertificateRequest | null {
  if (!isObject(body)) return null;
  if (!isNonEmptyString(body.certificateHash)) return null;
  return { certificateHash: body.certificateHash };
}

function parseRequestedAssets(value: unknown): RequestedAsset[] | null {
  if (value === undefined) return [];
  if (!Array.isArray(value)) return null;
  const assets: RequestedAsset[] = [];
  for (const item of value) {
    if (!isObject(item)) return null;
    if (!isNonEmptyString(item.productType) || !isInteger(item.quantity)) return null;
    if (item.minFineness !== undefined && !isInteger(item.minFineness)) return null;
    assets.push({
      productType: item.productType,
      quantity: item.quantity,
      ...(item.minFineness !== undefined ? { minFineness: item.minFineness } : {}),
    });
  }
  return assets;
}

export function parsePrepareOrderRequest(body: unknown): PrepareOrderRequest | null {
  if (!isObject(body)) return null;
  if (!isNonEmptyString(body.externalRef)) return null;
  if (!isNonEmptyString(body.txRef)) return null;
  if (!isOrderType(body.orderType)) return null;
  if (!isNonEmptyString(body.initiatorId)) return null;
  if (!isNonEmptyString(body.counterpartyId)) return null;
  if (!isNonEmptyString(body.sourceAccountId)) return null;
  if (!isNonEmptyString(body.destAccountId)) return null;
  if (!Array.isArray(body.tokenIds)) return null;
  const tokenIds: number[] = [];
  for (const tokenId of body.tokenIds) {
    if (!isTokenId(tokenId)) return null;
    tokenIds.push(tokenId);
  }
  const requestedAssets = parseRequestedAssets(body.requestedAssets);
  if (!requestedAssets) return null;
  if (!isNonEmptyString(body.settlementDate)) return null;
  if (!isNonEmptyString(body.currency)) return null;
  if (!isDecimal(body.price)) return null;
  if (!isDecimal(body.fee)) return null;
  if (body.metadata !== undefined && !isObject(body.metadata)) return null;
  return {
    externalRef: body.externalRef,
    txRef: body.txRef,
    orderType: body.orderType,
    initiatorId: body.initiatorId,
    counterpartyId: body.counterpartyId,
    sourceAccountId: body.sourceAccountId,
    destAccountId: body.destAccountId,
    tokenIds,
    requestedAssets,
    settlementDate: body.settlementDate,
    currency: body.currency,
    price: body.price,
    fee: body.fee,
    ...(body.metadata !== undefined ? { metadata: body.metadata } : {}),
  };
}

export function parseSignOrderRequest(body: unknown): SignOrderRequest | null {
  if (!isObject(body)) return null;
  if (!isNonEmptyString(body.signature)) return null;
  if (!isNonEmptyString(body.partyLabel)) return null;
  return { signature: body.signature, partyLabel: body.partyLabel };
}

export function parseCancelOrderRequest(body: unknown): CancelOrderRequest | null {
  if (!isObject(body)) return null;
  if (!isNonEmptyString(body.reason)) return null;
  return { reason: body.reason };
}

export function parseExecutionOptionsRequest(body: unknown): ExecutionOptions | null {
  if (!isObject(body)) return null;
  if (typeof body.enableOnChainTransfer !== "boolean") return null;
  if (typeof body.enableAutoLedgerUpdate !== "boolean") return null;
  return {
    enableOnChainTransfer: body.enableOnChainTransfer,
    enableAutoLedgerUpdate: body.enableAutoLedgerUpdate,
  };
}
