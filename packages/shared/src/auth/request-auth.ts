export const SERVICE_AUTH_HEADER = "x-service-token";
export const CALLER_ADDRESS_HEADER = "x-caller-address";

function firstHeaderValue(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (Array.isArray(value)) {
    const first = value.find((item) => typeof item === "string");
    return typeof first === "string" ? first : null;
  }
  return null;
}

export function normalizeServiceAuthToken(token: string | undefined | null): string | null {
  if (typeof token !== "string") return null;
  const trimmed = token.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function buildServiceAuthHeaders(
  token: string | undefined | null,
  callerAddress?: string,
): Record<string, string> {
  const headers: Record<string, string> = {};
  const normalized = normalizeServiceAuthToken(token);
  if (normalized) headers[SERVICE_AUTH_HEADER] = normalized;
  if (callerAddress) headers[CALLER_ADDRESS_HEADER] = callerAddress;
  return headers;
}

/** With no expected token configured every request passes. */
export function isServiceAuthAuthorized(
  providedHeader: unknown,
  expectedToken: string | undefined | null,
): boolean {
  const expected = normalizeServiceAuthToken(expectedToken);
  if (!expected) return true;

  if (Array.isArray(providedHeader)) {
    return providedHeader.some((value) => value === expected);
  }
  return typeof providedHeader === "string" && providedHeader === expected;
}

export function parseCallerHeader(value: unknown): string | null {
  const raw = firstHeaderValue(value);
  if (raw === null) return null;
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : null;
}
