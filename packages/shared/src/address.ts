import { getAddress, isAddress, isHexString } from "ethers";
import { ValidationError } from "./errors.js";

export function isEvmAddress(value: unknown): value is string {
  return typeof value === "string" && isAddress(value);
}

/**
 * Returns the EIP-55 checksummed form so that the same account never appears
 * under two spellings in indexes.
 */
export function normalizeAddress(value: string): string {
  if (!isAddress(value)) {
    throw new ValidationError(`'${value}' is not a valid address`);
  }
  return getAddress(value);
}

export function isSignatureHex(value: unknown): value is string {
  return typeof value === "string" && value.length > 2 && isHexString(value, true);
}
