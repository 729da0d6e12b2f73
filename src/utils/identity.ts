import { getAddress, isAddress, type Address } from "viem";
import { ValidationError } from "./errors.js";

/** Account identity: a checksummed 20-byte hex address. */
export type Identity = Address;

/**
 * Validate and checksum an address. Accepts any casing.
 */
export function toIdentity(raw: string, label = "identity"): Identity {
  const trimmed = raw.trim();
  if (!isAddress(trimmed, { strict: false })) {
    throw new ValidationError(
      "InvalidIdentity",
      `Invalid ${label} "${raw}". Expected a 0x-prefixed 40-hex address.`,
    );
  }
  return getAddress(trimmed);
}

export function sameIdentity(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
