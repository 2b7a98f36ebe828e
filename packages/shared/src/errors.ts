export type DomainErrorKind =
  | "authorization"
  | "member_not_active"
  | "not_found"
  | "insufficient_balance"
  | "duplicate"
  | "invalid_state"
  | "compliance"
  | "validation";

/**
 * Base class of every failure the custody core raises. A thrown DomainError
 * aborts the enclosing unit of work, so none of its effects are kept.
 */
export abstract class DomainError extends Error {
  abstract readonly kind: DomainErrorKind;

  constructor(
    readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class AuthorizationError extends DomainError {
  readonly kind = "authorization";

  constructor(message: string) {
    super("unauthorized", message);
  }
}

export class MemberNotActiveError extends DomainError {
  readonly kind = "member_not_active";

  constructor(readonly memberId: string) {
    super("member_not_active", `Member '${memberId}' is not active`);
  }
}

export type NotFoundEntity = "account" | "asset" | "order" | "member" | "principal";

export class NotFoundError extends DomainError {
  readonly kind = "not_found";

  constructor(
    readonly entity: NotFoundEntity,
    readonly id: string,
  ) {
    super(`${entity}_not_found`, `${entity} '${id}' not found`);
  }
}

export class InsufficientBalanceError extends DomainError {
  readonly kind = "insufficient_balance";

  constructor(
    readonly accountId: string,
    readonly balance: number,
    readonly delta: number,
  ) {
    super(
      "insufficient_balance",
      `Account '${accountId}' balance ${balance} cannot absorb delta ${delta}`,
    );
  }
}

export type DuplicateCode = "warrant_already_used" | "order_exists" | "member_exists";

export class DuplicateError extends DomainError {
  readonly kind = "duplicate";

  constructor(code: DuplicateCode, message: string) {
    super(code, message);
  }
}

export type InvalidStateCode =
  | "asset_locked"
  | "asset_burned"
  | "invalid_order_state"
  | "invalid_status";

export class InvalidStateError extends DomainError {
  readonly kind = "invalid_state";

  constructor(code: InvalidStateCode, message: string) {
    super(code, message);
  }
}

export class ComplianceError extends DomainError {
  readonly kind = "compliance";

  constructor(readonly address: string) {
    super("address_blacklisted", `Address ${address} is blacklisted`);
  }
}

export class ValidationError extends DomainError {
  readonly kind = "validation";

  constructor(message: string) {
    super("invalid_request", message);
  }
}

export function isDomainError(value: unknown): value is DomainError {
  return value instanceof DomainError;
}
