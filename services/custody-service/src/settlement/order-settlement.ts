import {
  AuthorizationError,
  DuplicateError,
  type ExecutionOptions,
  FINENESS_SCALE,
  type GoldAccount,
  InvalidStateError,
  isSignatureHex,
  MemberNotActiveError,
  NotFoundError,
  type OrderStatus,
  type PrepareOrderRequest,
  type RequestedAsset,
  RoleSet,
  type SettlementOrder,
  ValidationError,
} from "@bullion/shared";
import type { Clock } from "../clock.js";
import type { AssetCustody, SettlementCapability } from "../custody/asset-custody.js";
import type { EventLog } from "../events/event-log.js";
import type { AccountLedger, LedgerWriteCapability } from "../ledger/account-ledger.js";
import type { CoreLogger } from "../logging.js";
import type { AuthorizationRegistry } from "../registry/member-registry.js";
import type { OrderStore } from "../storage/order-store.js";
import type { SettingsStore } from "../storage/settings-store.js";
import type { UnitOfWork } from "../storage/unit-of-work.js";

const PLATFORM_ROLE = RoleSet.of("PLATFORM");
const EXECUTOR_ROLES = RoleSet.of("PLATFORM", "CUSTODIAN", "LOGISTICS_PROVIDER");
const PENDING_STATUSES: readonly OrderStatus[] = ["PENDING_COUNTERPARTY", "PENDING_EXECUTION"];
const DECIMAL_PATTERN = /^\d+(\.\d+)?$/;

export const ORDER_LEDGER_REASON = "ORDER";

export const DEFAULT_EXECUTION_OPTIONS: ExecutionOptions = {
  enableOnChainTransfer: true,
  enableAutoLedgerUpdate: true,
};

export type PrepareOrderInput = PrepareOrderRequest;

export interface OrderSettlementDeps {
  store: OrderStore;
  settings: SettingsStore;
  ledger: AccountLedger;
  ledgerCapability: LedgerWriteCapability;
  custody: AssetCustody;
  settlementCapability: SettlementCapability;
  registry: AuthorizationRegistry;
  events: EventLog;
  uow: UnitOfWork;
  clock: Clock;
  logger: CoreLogger;
  executionDefaults?: ExecutionOptions;
}

function validateRequestedAssets(assets: RequestedAsset[]): void {
  for (const asset of assets) {
    if (!Number.isSafeInteger(asset.quantity) || asset.quantity <= 0) {
      throw new ValidationError(`Requested quantity for ${asset.productType} must be a positive integer`);
    }
    if (
      asset.minFineness !== undefined &&
      (!Number.isInteger(asset.minFineness) || asset.minFineness < 0 || asset.minFineness > FINENESS_SCALE)
    ) {
      throw new ValidationError(`minFineness must be an integer between 0 and ${FINENESS_SCALE}`);
    }
  }
}

function validatePrepareInput(input: PrepareOrderInput): void {
  if (input.txRef.trim().length === 0) {
    throw new ValidationError("txRef is required");
  }
  if (input.tokenIds.length === 0) {
    throw new ValidationError("An order must carry at least one token");
  }
  if (new Set(input.tokenIds).size !== input.tokenIds.length) {
    throw new ValidationError("tokenIds must be distinct");
  }
  if (!DECIMAL_PATTERN.test(input.price) || !DECIMAL_PATTERN.test(input.fee)) {
    throw new ValidationError("price and fee must be non-negative decimal strings");
  }
  validateRequestedAssets(input.requestedAssets);
}

/**
 * Bilateral settlement of pre-agreed trades:
 * PENDING_COUNTERPARTY -> PENDING_EXECUTION -> EXECUTED, with CANCELLED
 * reachable from either pending state. A txRef is consumed on prepare and
 * an order executes at most once.
 */
export class OrderSettlement {
  private readonly executionDefaults: ExecutionOptions;

  constructor(private readonly deps: OrderSettlementDeps) {
    this.executionDefaults = deps.executionDefaults ?? DEFAULT_EXECUTION_OPTIONS;
  }

  getExecutionOptions(): ExecutionOptions {
    return this.deps.settings.getExecutionOptions() ?? this.executionDefaults;
  }

  setExecutionOptions(caller: string, options: ExecutionOptions): ExecutionOptions {
    return this.deps.uow.run(() => {
      this.requireRoles(caller, PLATFORM_ROLE);
      const now = this.deps.clock();
      this.deps.settings.putExecutionOptions(options, now);
      this.deps.events.append({
        type: "ExecutionOptionsSet",
        occurredAt: now,
        actor: caller,
        enableOnChainTransfer: options.enableOnChainTransfer,
        enableAutoLedgerUpdate: options.enableAutoLedgerUpdate,
      });
      this.deps.uow.afterCommit(() => {
        this.deps.logger.info({ options }, "execution options updated");
      });
      return options;
    });
  }

  /**
   * The source account must belong to the initiator and hold every listed
   * token; the destination account must belong to the counterparty.
   */
  prepareOrder(caller: string, input: PrepareOrderInput): SettlementOrder {
    return this.deps.uow.run(() => {
      this.requirePartyOrPlatform(caller, input.initiatorId, "initiator");
      validatePrepareInput(input);
      if (this.deps.store.get(input.txRef)) {
        throw new DuplicateError("order_exists", `Order '${input.txRef}' already exists`);
      }
      const source = this.partyAccount(input.sourceAccountId, input.initiatorId, "initiator");
      this.partyAccount(input.destAccountId, input.counterpartyId, "counterparty");
      for (const tokenId of input.tokenIds) {
        if (this.deps.custody.getAsset(tokenId).status === "BURNED") {
          throw new InvalidStateError("asset_burned", `Token ${tokenId} is burned`);
        }
      }
      this.requireTokensHeld(input.tokenIds, source);

      const now = this.deps.clock();
      const order: SettlementOrder = {
        txRef: input.txRef,
        externalRef: input.externalRef,
        orderType: input.orderType,
        initiatorId: input.initiatorId,
        counterpartyId: input.counterpartyId,
        sourceAccountId: input.sourceAccountId,
        destAccountId: input.destAccountId,
        tokenIds: [...input.tokenIds],
        requestedAssets: input.requestedAssets,
        quantity: input.tokenIds.length,
        settlementDate: input.settlementDate,
        currency: input.currency,
        price: input.price,
        fee: input.fee,
        metadata: input.metadata ?? {},
        status: "PENDING_COUNTERPARTY",
        signature: null,
        signedBy: null,
        partyLabel: null,
        cancelReason: null,
        createdAt: now,
        signedAt: null,
        executedAt: null,
        cancelledAt: null,
      };
      this.deps.store.insert(order);
      this.deps.events.append({
        type: "OrderCreated",
        occurredAt: now,
        actor: caller,
        txRef: order.txRef,
        externalRef: order.externalRef,
        orderType: order.orderType,
        initiatorId: order.initiatorId,
        counterpartyId: order.counterpartyId,
        quantity: order.quantity,
        currency: order.currency,
        price: order.price,
      });
      this.deps.events.append({
        type: "OrderPrepared",
        occurredAt: now,
        actor: caller,
        txRef: order.txRef,
        tokenIds: order.tokenIds,
        sourceAccountId: order.sourceAccountId,
        destAccountId: order.destAccountId,
      });
      this.deps.uow.afterCommit(() => {
        this.deps.logger.info({ txRef: order.txRef, quantity: order.quantity }, "order prepared");
      });
      return order;
    });
  }

  /** One counterparty signature moves the order to PENDING_EXECUTION. */
  signOrder(caller: string, txRef: string, signature: string, partyLabel: string): SettlementOrder {
    return this.deps.uow.run(() => {
      const order = this.getOrder(txRef);
      this.requirePartyOrPlatform(caller, order.counterpartyId, "counterparty");
      if (!isSignatureHex(signature)) {
        throw new ValidationError("signature must be 0x-prefixed hex bytes");
      }
      this.requireStatus(order, "PENDING_COUNTERPARTY");

      const now = this.deps.clock();
      const signed: SettlementOrder = {
        ...order,
        status: "PENDING_EXECUTION",
        signature,
        signedBy: caller,
        partyLabel,
        signedAt: now,
      };
      this.deps.store.update(signed);
      this.deps.events.append({
        type: "OrderSigned",
        occurredAt: now,
        actor: caller,
        txRef,
        signer: caller,
        partyLabel,
      });
      this.deps.uow.afterCommit(() => {
        this.deps.logger.info({ txRef, signer: caller, partyLabel }, "order signed");
      });
      return signed;
    });
  }

  executeOrder(caller: string, txRef: string): SettlementOrder {
    return this.deps.uow.run(() => {
      this.requireRoles(caller, EXECUTOR_ROLES);
      const order = this.getOrder(txRef);
      this.requireStatus(order, "PENDING_EXECUTION");
      const options = this.getExecutionOptions();
      // Ownership may have moved since prepare.
      this.requireTokensHeld(order.tokenIds, this.deps.ledger.getAccount(order.sourceAccountId));

      if (options.enableOnChainTransfer) {
        const recipient = this.deps.ledger.getAccount(order.destAccountId).address;
        for (const tokenId of order.tokenIds) {
          this.deps.custody.settle(this.deps.settlementCapability, tokenId, recipient, txRef);
        }
      }
      if (options.enableAutoLedgerUpdate) {
        this.deps.ledger.updateBalanceFromContract(this.deps.ledgerCapability, {
          accountId: order.sourceAccountId,
          delta: -order.quantity,
          reason: ORDER_LEDGER_REASON,
          refId: txRef,
        });
        this.deps.ledger.updateBalanceFromContract(this.deps.ledgerCapability, {
          accountId: order.destAccountId,
          delta: order.quantity,
          reason: ORDER_LEDGER_REASON,
          refId: txRef,
        });
      }

      const now = this.deps.clock();
      const executed: SettlementOrder = { ...order, status: "EXECUTED", executedAt: now };
      this.deps.store.update(executed);
      this.deps.events.append({
        type: "OrderExecuted",
        occurredAt: now,
        actor: caller,
        txRef,
        quantity: order.quantity,
        tokensMoved: options.enableOnChainTransfer,
        ledgerUpdated: options.enableAutoLedgerUpdate,
      });
      this.deps.uow.afterCommit(() => {
        this.deps.logger.info({ txRef, quantity: order.quantity, ...options }, "order executed");
      });
      return executed;
    });
  }

  cancelOrder(caller: string, txRef: string, reason: string): SettlementOrder {
    return this.deps.uow.run(() => {
      this.requireRoles(caller, PLATFORM_ROLE);
      const order = this.getOrder(txRef);
      if (!PENDING_STATUSES.includes(order.status)) {
        throw new InvalidStateError("invalid_order_state", `Order '${txRef}' is ${order.status}`);
      }

      const now = this.deps.clock();
      const cancelled: SettlementOrder = {
        ...order,
        status: "CANCELLED",
        cancelReason: reason,
        cancelledAt: now,
      };
      this.deps.store.update(cancelled);
      this.deps.events.append({
        type: "OrderCancelled",
        occurredAt: now,
        actor: caller,
        txRef,
        reason,
      });
      this.deps.uow.afterCommit(() => {
        this.deps.logger.info({ txRef, previousStatus: order.status, reason }, "order cancelled");
      });
      return cancelled;
    });
  }

  getOrder(txRef: string): SettlementOrder {
    const order = this.deps.store.get(txRef);
    if (!order) throw new NotFoundError("order", txRef);
    return order;
  }

  listOrders(status?: OrderStatus): SettlementOrder[] {
    return this.deps.store.list(status);
  }

  private requireStatus(order: SettlementOrder, expected: OrderStatus): void {
    if (order.status !== expected) {
      throw new InvalidStateError(
        "invalid_order_state",
        `Order '${order.txRef}' is ${order.status}, expected ${expected}`,
      );
    }
  }

  private requirePartyOrPlatform(caller: string, memberId: string, party: string): void {
    if (this.deps.registry.hasAnyRole(caller, PLATFORM_ROLE)) return;
    if (this.deps.registry.memberOf(caller) !== memberId) {
      throw new AuthorizationError(`${caller} is neither PLATFORM nor linked to the ${party} '${memberId}'`);
    }
    if (this.deps.registry.getMemberStatus(memberId) !== "ACTIVE") {
      throw new MemberNotActiveError(memberId);
    }
  }

  private partyAccount(accountId: string, memberId: string, party: string): GoldAccount {
    const account = this.deps.ledger.getAccount(accountId);
    if (account.memberId !== memberId) {
      throw new ValidationError(`Account '${accountId}' does not belong to the ${party} '${memberId}'`);
    }
    return account;
  }

  private requireTokensHeld(tokenIds: number[], source: GoldAccount): void {
    for (const tokenId of tokenIds) {
      if (this.deps.custody.getAsset(tokenId).owner !== source.address) {
        throw new AuthorizationError(`Token ${tokenId} is not held by account '${source.accountId}'`);
      }
    }
  }

  private requireRoles(caller: string, roles: RoleSet): void {
    if (!this.deps.registry.hasAnyRole(caller, roles)) {
      throw new AuthorizationError(`${caller} lacks any of ${roles.toArray().join(", ")}`);
    }
  }
}
