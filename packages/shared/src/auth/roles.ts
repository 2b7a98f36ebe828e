export const ROLES = [
  "REFINER",
  "MINTER",
  "CUSTODIAN",
  "VAULT_OPERATOR",
  "LOGISTICS_PROVIDER",
  "AUDITOR",
  "PLATFORM",
  "GOVERNANCE",
] as const;

export type Role = (typeof ROLES)[number];

// Bit positions are part of the wire format of stored role masks.
const ROLE_BITS: Record<Role, number> = {
  REFINER: 0,
  MINTER: 1,
  CUSTODIAN: 2,
  VAULT_OPERATOR: 3,
  LOGISTICS_PROVIDER: 4,
  AUDITOR: 5,
  PLATFORM: 6,
  GOVERNANCE: 7,
};

const FULL_MASK = ROLES.reduce((mask, role) => mask | (1 << ROLE_BITS[role]), 0);

export function isRole(value: unknown): value is Role {
  return typeof value === "string" && (ROLES as readonly string[]).includes(value);
}

/**
 * Immutable set of roles backed by a bitmask.
 */
export class RoleSet {
  static readonly EMPTY = new RoleSet(0);

  private constructor(private readonly mask: number) {}

  static of(...roles: Role[]): RoleSet {
    return new RoleSet(roles.reduce((mask, role) => mask | (1 << ROLE_BITS[role]), 0));
  }

  static fromMask(mask: number): RoleSet {
    if (!Number.isInteger(mask) || mask < 0 || (mask & ~FULL_MASK) !== 0) {
      throw new RangeError(`Role mask ${mask} is outside 0..${FULL_MASK}`);
    }
    return new RoleSet(mask);
  }

  get bits(): number {
    return this.mask;
  }

  has(role: Role): boolean {
    return (this.mask & (1 << ROLE_BITS[role])) !== 0;
  }

  /** True when at least one role of `other` is present. */
  hasAny(other: RoleSet): boolean {
    return (this.mask & other.mask) !== 0;
  }

  union(other: RoleSet): RoleSet {
    return new RoleSet(this.mask | other.mask);
  }

  without(other: RoleSet): RoleSet {
    return new RoleSet(this.mask & ~other.mask);
  }

  isEmpty(): boolean {
    return this.mask === 0;
  }

  toArray(): Role[] {
    return ROLES.filter((role) => this.has(role));
  }
}

export function parseRoleList(raw: string | undefined, fallback: Role[]): RoleSet {
  const source = (raw || "").trim();
  if (!source) return RoleSet.of(...fallback);
  if (source.toLowerCase() === "none") return RoleSet.EMPTY;

  const roles: Role[] = [];
  for (const token of source.split(",")) {
    const normalized = token.trim().toUpperCase();
    if (normalized.length === 0) continue;
    if (!isRole(normalized)) {
      throw new RangeError(`Unknown role '${normalized}'`);
    }
    roles.push(normalized);
  }
  return RoleSet.of(...roles);
}
