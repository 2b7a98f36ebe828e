import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, utf8ToBytes } from "@noble/hashes/utils";
import { canonicalize } from "json-canonicalize";

export function sha256Hex(input: string): string {
  return bytesToHex(sha256(utf8ToBytes(input)));
}

/** RFC 8785 (JCS) form; audit hashes are taken over it so key order never matters. */
export function canonicalJson(value: unknown): string {
  return canonicalize(value);
}

export function hashCanonical(value: unknown): string {
  return sha256Hex(canonicalJson(value));
}
