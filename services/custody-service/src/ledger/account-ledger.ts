import {
  AuthorizationError,
  type BalanceChannel,
  type GoldAccount,
  InsufficientBalanceError,
  isEvmAddress,
  MemberNotActiveError,
  normalizeAddress,
  NotFoundError,
  RoleSet,
  ValidationError,
} from "@bullion/shared";
import type { Clock } from "../clock.js";
import type { EventLog } from "../events/event-log.js";
import type { CoreLogger } from "../logging.js";
import type { AuthorizationRegistry } from "../registry/member-registry.js";
import type { AccountStore } from "../storage/account-store.js";
import type { UnitOfWork } from "../storage/unit-of-work.js";

export const ACCOUNT_ID_PREFIX = "IGAN-";

const OPERATOR_ROLES = RoleSet.of("PLATFORM", "CUSTODIAN");
const PLATFORM_ROLE = RoleSet.of("PLATFORM");
const MODULE_UPDATER_PATTERN = /^[a-z][a-z0-9-]*$/;

/**
 * Proof that the holder may move balances without an operator role. Only
 * objects handed out by `issueWriteCapability` are honoured, and only while the
 * holder stays on the updater allowlist.
 */
export interface LedgerWriteCapability {
  readonly holder: string;
}

export interface BalanceUpdate {
  accountId: string;
  delta: number;
  reason: string;
  refId: string;
}

export interface AccountLedgerDeps {
  store: AccountStore;
  registry: AuthorizationRegistry;
  events: EventLog;
  uow: UnitOfWork;
  clock: Clock;
  logger: CoreLogger;
}

export function formatAccountId(accountNumber: number): string {
  return `${ACCOUNT_ID_PREFIX}${accountNumber}`;
}

/** Updaters are EVM addresses or lower-case module names such as "asset-custody". */
export function normalizeUpdater(updater: string): string {
  if (isEvmAddress(updater)) return normalizeAddress(updater);
  if (MODULE_UPDATER_PATTERN.test(updater)) return updater;
  throw new ValidationError(`'${updater}' is neither an address nor a module name`);
}

export class AccountLedger {
  private readonly issued = new WeakSet<LedgerWriteCapability>();

  constructor(private readonly deps: AccountLedgerDeps) {}

  createAccount(caller: string, memberId: string, address: string): GoldAccount {
    const linkedAddress = normalizeAddress(address);
    return this.deps.uow.run(() => {
      this.requireRoles(caller, PLATFORM_ROLE);
      if (this.deps.registry.getMemberStatus(memberId) !== "ACTIVE") {
        throw new MemberNotActiveError(memberId);
      }

      const now = this.deps.clock();
      const account: GoldAccount = {
        accountId: formatAccountId(this.deps.store.nextAccountNumber()),
        memberId,
        address: linkedAddress,
        balance: 0,
        lastReason: null,
        lastRefId: null,
        createdAt: now,
        updatedAt: now,
      };
      this.deps.store.insert(account);
      this.deps.events.append({
        type: "AccountCreated",
        occurredAt: now,
        actor: caller,
        accountId: account.accountId,
        memberId,
        address: linkedAddress,
      });
      this.deps.uow.afterCommit(() => {
        this.deps.logger.info({ accountId: account.accountId, memberId }, "account created");
      });
      return account;
    });
  }

  /** Operator correction path (PLATFORM or CUSTODIAN). */
  updateBalance(caller: string, update: BalanceUpdate): GoldAccount {
    return this.deps.uow.run(() => {
      this.requireRoles(caller, OPERATOR_ROLES);
      return this.applyDelta(caller, "OPERATOR", update);
    });
  }

  /** Contract-driven path used by custody and settlement. */
  updateBalanceFromContract(capability: LedgerWriteCapability, update: BalanceUpdate): GoldAccount {
    return this.deps.uow.run(() => {
      if (!this.issued.has(capability) || this.deps.store.getUpdater(capability.holder) !== true) {
        this.deps.logger.warn({ holder: capability.holder }, "rejected balance update from unlisted updater");
        throw new AuthorizationError(`${capability.holder} is not an enabled balance updater`);
      }
      return this.applyDelta(capability.holder, "CONTRACT", update);
    });
  }

  setBalanceUpdater(caller: string, updater: string, enabled: boolean): void {
    const normalized = normalizeUpdater(updater);
    this.deps.uow.run(() => {
      this.requireRoles(caller, PLATFORM_ROLE);
      this.writeUpdater(caller, normalized, enabled);
    });
  }

  /**
   * Wiring-time hand-off of a write capability. The holder is put on the
   * allowlist only if it has never been recorded, so a revocation made through
   * `setBalanceUpdater` survives restarts.
   */
  issueWriteCapability(holder: string): LedgerWriteCapability {
    const normalized = normalizeUpdater(holder);
    this.deps.uow.run(() => {
      if (this.deps.store.getUpdater(normalized) === null) {
        this.writeUpdater(normalized, normalized, true);
      }
    });
    const capability: LedgerWriteCapability = Object.freeze({ holder: normalized });
    this.issued.add(capability);
    return capability;
  }

  getAccount(accountId: string): GoldAccount {
    const account = this.deps.store.get(accountId);
    if (!account) throw new NotFoundError("account", accountId);
    return account;
  }

  getAccountBalance(accountId: string): number {
    return this.getAccount(accountId).balance;
  }

  getAccountsByMember(memberId: string): GoldAccount[] {
    return this.deps.store.listByMember(memberId);
  }

  getAccountsByAddress(address: string): GoldAccount[] {
    if (!isEvmAddress(address)) return [];
    return this.deps.store.listByAddress(normalizeAddress(address));
  }

  listBalanceUpdaters(): string[] {
    return this.deps.store.listEnabledUpdaters();
  }

  private applyDelta(actor: string, channel: BalanceChannel, update: BalanceUpdate): GoldAccount {
    if (!Number.isSafeInteger(update.delta)) {
      throw new ValidationError(`Balance delta must be an integer, got ${update.delta}`);
    }
    const account = this.getAccount(update.accountId);
    const balance = account.balance + update.delta;
    if (balance < 0) {
      throw new InsufficientBalanceError(account.accountId, account.balance, update.delta);
    }

    const now = this.deps.clock();
    this.deps.store.writeBalance({
      accountId: account.accountId,
      balance,
      reason: update.reason,
      refId: update.refId,
      updatedAt: now,
    });
    this.deps.events.append({
      type: "BalanceUpdated",
      occurredAt: now,
      actor,
      accountId: account.accountId,
      delta: update.delta,
      balance,
      reason: update.reason,
      refId: update.refId,
      channel,
    });
    this.deps.uow.afterCommit(() => {
      this.deps.logger.info(
        { accountId: account.accountId, delta: update.delta, balance, channel, refId: update.refId },
        "balance updated",
      );
    });
    return {
      ...account,
      balance,
      lastReason: update.reason,
      lastRefId: update.refId,
      updatedAt: now,
    };
  }

  private writeUpdater(actor: string, updater: string, enabled: boolean): void {
    const now = this.deps.clock();
    this.deps.store.putUpdater(updater, enabled, now);
    this.deps.events.append({
      type: "BalanceUpdaterSet",
      occurredAt: now,
      actor,
      updater,
      enabled,
    });
  }

  private requireRoles(caller: string, roles: RoleSet): void {
    if (!this.deps.registry.hasAnyRole(caller, roles)) {
      throw new AuthorizationError(`${caller} lacks any of ${roles.toArray().join(", ")}`);
    }
  }
}
