import {
  AuthorizationError,
  DuplicateError,
  type MemberRecord,
  type MemberStatus,
  normalizeAddress,
  NotFoundError,
  type PrincipalRecord,
  type Role,
  RoleSet,
} from "@bullion/shared";
import type { Clock } from "../clock.js";
import type { EventLog } from "../events/event-log.js";
import type { CoreLogger } from "../logging.js";
import type { MemberStore } from "../storage/member-store.js";
import type { UnitOfWork } from "../storage/unit-of-work.js";

/**
 * Read side of the member registry. The custody core only ever consults this
 * interface; it never mutates registry state.
 */
export interface AuthorizationRegistry {
  isInRole(address: string, role: Role): boolean;
  hasAnyRole(address: string, roles: RoleSet): boolean;
  getMemberStatus(memberId: string): MemberStatus | null;
  isBlacklisted(address: string): boolean;
  memberOf(address: string): string | null;
}

const ADMIN_ROLES = RoleSet.of("GOVERNANCE", "PLATFORM");

export const SYSTEM_ACTOR = "system";

export interface MemberRegistryDeps {
  store: MemberStore;
  events: EventLog;
  uow: UnitOfWork;
  clock: Clock;
  logger: CoreLogger;
}

export class MemberRegistry implements AuthorizationRegistry {
  constructor(private readonly deps: MemberRegistryDeps) {}

  isInRole(address: string, role: Role): boolean {
    return this.rolesOf(address).has(role);
  }

  hasAnyRole(address: string, roles: RoleSet): boolean {
    return this.rolesOf(address).hasAny(roles);
  }

  getMemberStatus(memberId: string): MemberStatus | null {
    return this.deps.store.getMember(memberId)?.status ?? null;
  }

  isBlacklisted(address: string): boolean {
    return this.deps.store.getBlacklisted(address) !== null;
  }

  memberOf(address: string): string | null {
    return this.deps.store.getPrincipal(address)?.memberId ?? null;
  }

  getMember(memberId: string): MemberRecord {
    const member = this.deps.store.getMember(memberId);
    if (!member) throw new NotFoundError("member", memberId);
    return member;
  }

  getPrincipal(address: string): PrincipalRecord {
    const normalized = normalizeAddress(address);
    if (!this.deps.store.getPrincipal(normalized) && !this.isBlacklisted(normalized)) {
      throw new NotFoundError("principal", normalized);
    }
    return this.describe(normalized);
  }

  registerMember(caller: string, memberId: string, status: MemberStatus = "PENDING"): MemberRecord {
    return this.deps.uow.run(() => {
      this.requireAdmin(caller);
      if (this.deps.store.getMember(memberId)) {
        throw new DuplicateError("member_exists", `Member '${memberId}' is already registered`);
      }
      const now = this.deps.clock();
      const member: MemberRecord = { memberId, status, registeredAt: now, updatedAt: now };
      this.deps.store.putMember(member);
      this.deps.events.append({
        type: "MemberRegistered",
        occurredAt: now,
        actor: caller,
        memberId,
        status,
      });
      return member;
    });
  }

  setMemberStatus(caller: string, memberId: string, status: MemberStatus): MemberRecord {
    return this.deps.uow.run(() => {
      this.requireAdmin(caller);
      const current = this.getMember(memberId);
      const now = this.deps.clock();
      const member: MemberRecord = { ...current, status, updatedAt: now };
      this.deps.store.putMember(member);
      this.deps.events.append({
        type: "MemberStatusChanged",
        occurredAt: now,
        actor: caller,
        memberId,
        previousStatus: current.status,
        status,
      });
      return member;
    });
  }

  /** Replaces the role set of `address` and (re)links it to a member. */
  assignRoles(caller: string, address: string, memberId: string | null, roles: RoleSet): PrincipalRecord {
    return this.deps.uow.run(() => {
      this.requireAdmin(caller);
      if (memberId !== null) this.getMember(memberId);
      return this.writeRoles(caller, normalizeAddress(address), memberId, roles);
    });
  }

  setBlacklisted(caller: string, address: string, blacklisted: boolean, reason: string): PrincipalRecord {
    const normalized = normalizeAddress(address);
    this.deps.uow.run(() => {
      this.requireAdmin(caller);
      const now = this.deps.clock();
      if (blacklisted) {
        this.deps.store.putBlacklisted({ address: normalized, reason, listedAt: now });
      } else {
        this.deps.store.removeBlacklisted(normalized);
      }
      this.deps.events.append({
        type: "BlacklistUpdated",
        occurredAt: now,
        actor: caller,
        address: normalized,
        blacklisted,
        reason,
      });
    });
    return this.describe(normalized);
  }

  /**
   * Grants PLATFORM and GOVERNANCE to the configured bootstrap address when it
   * has no principal record yet.
   */
  bootstrapAdmin(address: string): void {
    const normalized = normalizeAddress(address);
    this.deps.uow.run(() => {
      if (this.deps.store.getPrincipal(normalized)) return;
      this.writeRoles(SYSTEM_ACTOR, normalized, null, ADMIN_ROLES);
      this.deps.uow.afterCommit(() => {
        this.deps.logger.info({ address: normalized }, "bootstrap admin granted");
      });
    });
  }

  private writeRoles(
    actor: string,
    address: string,
    memberId: string | null,
    roles: RoleSet,
  ): PrincipalRecord {
    const now = this.deps.clock();
    this.deps.store.putPrincipal({ address, memberId, roleMask: roles.bits, updatedAt: now });
    this.deps.events.append({
      type: "RolesAssigned",
      occurredAt: now,
      actor,
      address,
      memberId,
      roles: roles.toArray(),
    });
    return {
      address,
      memberId,
      roles: roles.toArray(),
      blacklisted: this.isBlacklisted(address),
      updatedAt: now,
    };
  }

  private describe(address: string): PrincipalRecord {
    const row = this.deps.store.getPrincipal(address);
    const listing = this.deps.store.getBlacklisted(address);
    return {
      address,
      memberId: row?.memberId ?? null,
      roles: row ? RoleSet.fromMask(row.roleMask).toArray() : [],
      blacklisted: listing !== null,
      updatedAt: row?.updatedAt ?? listing?.listedAt ?? this.deps.clock(),
    };
  }

  private rolesOf(address: string): RoleSet {
    const row = this.deps.store.getPrincipal(address);
    return row ? RoleSet.fromMask(row.roleMask) : RoleSet.EMPTY;
  }

  private requireAdmin(caller: string): void {
    if (!this.hasAnyRole(caller, ADMIN_ROLES)) {
      throw new AuthorizationError(`${caller} lacks GOVERNANCE or PLATFORM role`);
    }
  }
}
