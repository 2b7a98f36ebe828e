import type { IncomingHttpHeaders } from "node:http";
import {
  AuthorizationError,
  CALLER_ADDRESS_HEADER,
  type DomainErrorKind,
  normalizeAddress,
  parseCallerHeader,
} from "@bullion/shared";

export const DOMAIN_ERROR_STATUS: Record<DomainErrorKind, number> = {
  authorization: 403,
  member_not_active: 403,
  not_found: 404,
  insufficient_balance: 409,
  duplicate: 409,
  invalid_state: 409,
  compliance: 403,
  validation: 400,
};

/** The acting address of a request, checksummed. */
export function callerFrom(headers: IncomingHttpHeaders): string {
  const caller = parseCallerHeader(headers[CALLER_ADDRESS_HEADER]);
  if (!caller) {
    throw new AuthorizationError(`Missing '${CALLER_ADDRESS_HEADER}' header`);
  }
  return normalizeAddress(caller);
}
