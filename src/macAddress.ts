import { createErr, createOk, type Result } from "option-t/plain_result";
import { InvalidAddressError } from "./errors.ts";

/** Canonical lower-case colon separated MAC address, e.g. `00:0c:29:aa:bb:cc`. */
export type MacAddress = string;

/** Anything accepted where a link-layer address is expected. */
export type MacAddressInput = string | Uint8Array | readonly number[];

const MAC_PATTERN = /^([0-9a-f]{2})([:-][0-9a-f]{2}){5}$/i;

/**
 * Format 6 raw bytes as a canonical MAC address.
 */
export function formatMacAddress(bytes: Uint8Array | readonly number[]): MacAddress {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join(":");
}

/**
 * Parse a MAC address from text (`:` or `-` separated) or raw bytes.
 */
export function parseMacAddress(
  input: MacAddressInput,
): Result<MacAddress, InvalidAddressError> {
  if (typeof input === "string") {
    if (!MAC_PATTERN.test(input)) {
      return createErr(new InvalidAddressError(input));
    }
    return createOk(input.toLowerCase().replaceAll("-", ":"));
  }
  if (
    input.length !== 6 ||
    !Array.from(input).every((b) => Number.isInteger(b) && b >= 0 && b <= 0xff)
  ) {
    return createErr(new InvalidAddressError(`[${Array.from(input).join(",")}]`));
  }
  return createOk(formatMacAddress(input));
}
