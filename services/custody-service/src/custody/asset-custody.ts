import {
  type AssetStatus,
  AuthorizationError,
  ComplianceError,
  computeFineWeight,
  DuplicateError,
  FINENESS_SCALE,
  type GoldAsset,
  InvalidStateError,
  isLockedStatus,
  type MintAssetRequest,
  normalizeAddress,
  NotFoundError,
  RoleSet,
  ValidationError,
} from "@bullion/shared";
import type { Clock } from "../clock.js";
import type { EventLog } from "../events/event-log.js";
import type { AccountLedger, LedgerWriteCapability } from "../ledger/account-ledger.js";
import type { CoreLogger } from "../logging.js";
import type { AuthorizationRegistry } from "../registry/member-registry.js";
import type { AssetStore } from "../storage/asset-store.js";
import type { UnitOfWork } from "../storage/unit-of-work.js";

const ISSUER_ROLES = RoleSet.of("REFINER", "MINTER");
const CUSTODIAN_ROLE = RoleSet.of("CUSTODIAN");
const PLATFORM_ROLE = RoleSet.of("PLATFORM");

export const DEFAULT_STATUS_OPERATOR_ROLES = RoleSet.of("PLATFORM", "CUSTODIAN", "VAULT_OPERATOR");

export const MINT_REASON = "MINT";
export const TRANSFER_REASON = "TRANSFER";
export const SETTLEMENT_REASON = "SETTLEMENT";

export type MintInput = MintAssetRequest;

/** Grants `settle`, the one ownership move that ignores custody locks. */
export interface SettlementCapability {
  readonly holder: string;
}

export interface AssetCustodyDeps {
  store: AssetStore;
  ledger: AccountLedger;
  ledgerCapability: LedgerWriteCapability;
  registry: AuthorizationRegistry;
  events: EventLog;
  uow: UnitOfWork;
  clock: Clock;
  logger: CoreLogger;
  /** Roles that may change a token's status without owning it. Empty means owner only. */
  statusOperatorRoles?: RoleSet;
}

function validateMintInput(input: MintInput): void {
  if (!Number.isSafeInteger(input.weightGrams) || input.weightGrams <= 0) {
    throw new ValidationError("weightGrams must be a positive integer");
  }
  if (!Number.isInteger(input.fineness) || input.fineness < 0 || input.fineness > FINENESS_SCALE) {
    throw new ValidationError(`fineness must be an integer between 0 and ${FINENESS_SCALE}`);
  }
  if (input.warrantId.trim().length === 0) {
    throw new ValidationError("warrantId is required");
  }
}

export class AssetCustody {
  private readonly issued = new WeakSet<SettlementCapability>();
  private readonly statusOperatorRoles: RoleSet;

  constructor(private readonly deps: AssetCustodyDeps) {
    this.statusOperatorRoles = deps.statusOperatorRoles ?? DEFAULT_STATUS_OPERATOR_ROLES;
  }

  mint(caller: string, input: MintInput): GoldAsset {
    return this.deps.uow.run(() => {
      this.requireRoles(caller, ISSUER_ROLES);
      validateMintInput(input);
      const owner = normalizeAddress(input.owner);
      const existing = this.deps.store.findTokenByWarrant(input.warrantId);
      if (existing !== null) {
        throw new DuplicateError(
          "warrant_already_used",
          `Warrant '${input.warrantId}' is already linked to token ${existing}`,
        );
      }

      const now = this.deps.clock();
      const asset: GoldAsset = {
        tokenId: this.deps.store.nextTokenId(),
        serialNumber: input.serialNumber,
        refiner: input.refiner,
        weightGrams: input.weightGrams,
        fineness: input.fineness,
        fineWeightGrams: computeFineWeight(input.weightGrams, input.fineness),
        productType: input.productType,
        certificateHash: input.certificateHash,
        memberId: input.memberId,
        certified: input.certified,
        warrantId: input.warrantId,
        owner,
        custodian: null,
        status: "REGISTERED",
        statusReason: null,
        accountId: input.accountId,
        mintedAt: now,
        updatedAt: now,
      };
      this.deps.store.insert(asset);
      this.deps.ledger.updateBalanceFromContract(this.deps.ledgerCapability, {
        accountId: asset.accountId,
        delta: 1,
        reason: MINT_REASON,
        refId: String(asset.tokenId),
      });

      this.deps.events.append({
        type: "AssetMinted",
        occurredAt: now,
        actor: caller,
        tokenId: asset.tokenId,
        owner,
        accountId: asset.accountId,
        serialNumber: asset.serialNumber,
        refiner: asset.refiner,
        fineWeightGrams: asset.fineWeightGrams,
        warrantId: asset.warrantId,
      });
      this.deps.events.append({
        type: "WarrantLinked",
        occurredAt: now,
        actor: caller,
        warrantId: asset.warrantId,
        tokenId: asset.tokenId,
        owner,
      });
      this.deps.uow.afterCommit(() => {
        this.deps.logger.info(
          { tokenId: asset.tokenId, accountId: asset.accountId, warrantId: asset.warrantId },
          "asset minted",
        );
      });
      return asset;
    });
  }

  /** Allowed for whoever owns the token right now, or for a status operator. */
  updateStatus(caller: string, tokenId: number, status: AssetStatus, reason: string): GoldAsset {
    return this.deps.uow.run(() => {
      const asset = this.getAsset(tokenId);
      if (asset.owner !== caller && !this.isStatusOperator(caller)) {
        throw new AuthorizationError(`${caller} neither owns token ${tokenId} nor operates assets`);
      }
      this.requireNotBurned(asset);
      if (status === "BURNED") {
        throw new InvalidStateError("invalid_status", "Tokens are burned through burn, not a status update");
      }

      const now = this.deps.clock();
      const updated: GoldAsset = { ...asset, status, statusReason: reason, updatedAt: now };
      this.deps.store.update(updated);
      this.deps.events.append({
        type: "StatusChanged",
        occurredAt: now,
        actor: caller,
        tokenId,
        previousStatus: asset.status,
        status,
        reason,
      });
      this.deps.uow.afterCommit(() => {
        this.deps.logger.info({ tokenId, previousStatus: asset.status, status }, "asset status changed");
      });
      return updated;
    });
  }

  updateCustodyBatch(caller: string, tokenIds: number[], custodian: string, method: string): GoldAsset[] {
    return this.deps.uow.run(() => {
      this.requireRoles(caller, CUSTODIAN_ROLE);
      if (tokenIds.length === 0) {
        throw new ValidationError("tokenIds must not be empty");
      }
      const newCustodian = normalizeAddress(custodian);
      const now = this.deps.clock();
      const updated = tokenIds.map((tokenId) => {
        const asset = this.getAsset(tokenId);
        this.requireNotBurned(asset);
        const next: GoldAsset = {
          ...asset,
          custodian: newCustodian,
          status: "IN_TRANSIT",
          statusReason: method,
          updatedAt: now,
        };
        this.deps.store.update(next);
        this.deps.events.append({
          type: "CustodyChanged",
          occurredAt: now,
          actor: caller,
          tokenId,
          previousCustodian: asset.custodian,
          custodian: newCustodian,
          method,
        });
        return next;
      });
      this.deps.uow.afterCommit(() => {
        this.deps.logger.info({ tokenIds, custodian: newCustodian, method }, "custody changed");
      });
      return updated;
    });
  }

  /**
   * Debits the account recorded at mint. `requestedAccountId` only ends up in
   * the AssetBurned event.
   */
  burn(caller: string, tokenId: number, requestedAccountId: string, reason: string): GoldAsset {
    return this.deps.uow.run(() => {
      this.requireRoles(caller, ISSUER_ROLES);
      const asset = this.getAsset(tokenId);
      this.requireNotBurned(asset);

      const now = this.deps.clock();
      const burned: GoldAsset = { ...asset, status: "BURNED", statusReason: reason, updatedAt: now };
      this.deps.store.update(burned);
      this.deps.ledger.updateBalanceFromContract(this.deps.ledgerCapability, {
        accountId: asset.accountId,
        delta: -1,
        reason,
        refId: String(tokenId),
      });
      this.deps.events.append({
        type: "AssetBurned",
        occurredAt: now,
        actor: caller,
        tokenId,
        owner: asset.owner,
        accountId: asset.accountId,
        requestedAccountId,
        reason,
      });
      this.deps.uow.afterCommit(() => {
        if (requestedAccountId !== asset.accountId) {
          this.deps.logger.warn(
            { tokenId, accountId: asset.accountId, requestedAccountId },
            "burn debited the mint account instead of the requested one",
          );
        }
        this.deps.logger.info({ tokenId, accountId: asset.accountId }, "asset burned");
      });
      return burned;
    });
  }

  transfer(caller: string, from: string, to: string, tokenId: number, quantity: number): GoldAsset {
    const sender = normalizeAddress(from);
    const recipient = normalizeAddress(to);
    if (quantity !== 1) {
      throw new ValidationError(`Token ${tokenId} is indivisible; quantity must be 1`);
    }

    return this.deps.uow.run(() => {
      if (caller !== sender) {
        throw new AuthorizationError(`${caller} cannot transfer on behalf of ${sender}`);
      }
      const asset = this.getAsset(tokenId);
      if (asset.owner !== sender) {
        throw new AuthorizationError(`${sender} does not own token ${tokenId}`);
      }
      for (const party of [sender, recipient]) {
        if (this.deps.registry.isBlacklisted(party)) throw new ComplianceError(party);
      }
      return this.moveOwnership(caller, asset, recipient, TRANSFER_REASON);
    });
  }

  /** Overrides compliance holds only; custody locks still apply. */
  forceTransfer(caller: string, tokenId: number, from: string, to: string, reason: string): GoldAsset {
    return this.deps.uow.run(() => {
      this.requireRoles(caller, PLATFORM_ROLE);
      const sender = normalizeAddress(from);
      const recipient = normalizeAddress(to);
      const asset = this.getAsset(tokenId);
      if (asset.owner !== sender) {
        throw new ValidationError(`${sender} does not own token ${tokenId}`);
      }
      const moved = this.moveOwnership(caller, asset, recipient, reason);
      this.deps.uow.afterCommit(() => {
        this.deps.logger.warn({ tokenId, from: sender, to: recipient, reason }, "asset force transferred");
      });
      return moved;
    });
  }

  issueSettlementCapability(holder: string): SettlementCapability {
    const capability: SettlementCapability = Object.freeze({ holder });
    this.issued.add(capability);
    return capability;
  }

  /**
   * Settlement delivery. The lock check is skipped; the recipient blacklist
   * check is not. The token lands IN_VAULT on the receiving side.
   */
  settle(capability: SettlementCapability, tokenId: number, to: string, txRef: string): GoldAsset {
    if (!this.issued.has(capability)) {
      this.deps.logger.warn({ holder: capability.holder, tokenId }, "rejected settlement from unknown holder");
      throw new AuthorizationError(`${capability.holder} holds no settlement capability`);
    }
    const recipient = normalizeAddress(to);

    return this.deps.uow.run(() => {
      const asset = this.getAsset(tokenId);
      this.requireNotBurned(asset);
      if (this.deps.registry.isBlacklisted(recipient)) throw new ComplianceError(recipient);

      const now = this.deps.clock();
      const settled: GoldAsset = {
        ...asset,
        owner: recipient,
        status: "IN_VAULT",
        statusReason: SETTLEMENT_REASON,
        updatedAt: now,
      };
      this.deps.store.update(settled);
      this.deps.events.append({
        type: "OwnershipUpdated",
        occurredAt: now,
        actor: capability.holder,
        tokenId,
        from: asset.owner,
        to: recipient,
        reason: SETTLEMENT_REASON,
      });
      this.deps.events.append({
        type: "StatusChanged",
        occurredAt: now,
        actor: capability.holder,
        tokenId,
        previousStatus: asset.status,
        status: "IN_VAULT",
        reason: `${SETTLEMENT_REASON} ${txRef}`,
      });
      return settled;
    });
  }

  verifyCertificate(tokenId: number, certificateHash: string): boolean {
    return this.getAsset(tokenId).certificateHash === certificateHash;
  }

  isAssetLocked(tokenId: number): boolean {
    return isLockedStatus(this.getAsset(tokenId).status);
  }

  getAsset(tokenId: number): GoldAsset {
    const asset = this.deps.store.get(tokenId);
    if (!asset) throw new NotFoundError("asset", String(tokenId));
    return asset;
  }

  tokensOf(owner: string): GoldAsset[] {
    return this.deps.store.listByOwner(normalizeAddress(owner));
  }

  listAssets(status?: AssetStatus): GoldAsset[] {
    return this.deps.store.list(status);
  }

  private moveOwnership(actor: string, asset: GoldAsset, recipient: string, reason: string): GoldAsset {
    this.requireNotBurned(asset);
    if (isLockedStatus(asset.status)) {
      throw new InvalidStateError("asset_locked", `Token ${asset.tokenId} is ${asset.status}`);
    }

    const now = this.deps.clock();
    const moved: GoldAsset = { ...asset, owner: recipient, updatedAt: now };
    this.deps.store.update(moved);
    this.deps.events.append({
      type: "OwnershipUpdated",
      occurredAt: now,
      actor,
      tokenId: asset.tokenId,
      from: asset.owner,
      to: recipient,
      reason,
    });
    this.deps.uow.afterCommit(() => {
      this.deps.logger.info({ tokenId: asset.tokenId, from: asset.owner, to: recipient, reason }, "ownership updated");
    });
    return moved;
  }

  private isStatusOperator(caller: string): boolean {
    return !this.statusOperatorRoles.isEmpty() && this.deps.registry.hasAnyRole(caller, this.statusOperatorRoles);
  }

  private requireNotBurned(asset: GoldAsset): void {
    if (asset.status === "BURNED") {
      throw new InvalidStateError("asset_burned", `Token ${asset.tokenId} is burned`);
    }
  }

  private requireRoles(caller: string, roles: RoleSet): void {
    if (!this.deps.registry.hasAnyRole(caller, roles)) {
      throw new AuthorizationError(`${caller} lacks any of ${roles.toArray().join(", ")}`);
    }
  }
}
