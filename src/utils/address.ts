import { getAddress, isAddress } from "viem";
import type { Address } from "viem";
import { InvalidAddressError } from "./errors.js";

/** Validate and checksum-normalize an address so map lookups are case-insensitive. */
export function toAddress(value: string): Address {
  if (!isAddress(value, { strict: false })) {
    throw new InvalidAddressError(value);
  }
  return getAddress(value);
}

export type { Address };
