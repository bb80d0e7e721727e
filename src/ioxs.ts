/**
 * IO consumer / provider status (IOCS / IOPS) bytes.
 *
 * Bit layout, most significant first:
 * `dataState(1) | instance(2) | reserved(4) | extension(1)`.
 * An entry with the extension bit set is followed by another entry.
 */

import { createErr, createOk, type Result } from "option-t/plain_result";
import { TruncatedFrameError } from "./errors.ts";

export const IOXS_INSTANCES = ["subslot", "slot", "device", "controller"] as const;

export type IOxSInstance = (typeof IOXS_INSTANCES)[number];
export type IOxSDataState = "bad" | "good";

export interface IOxS {
  dataState: IOxSDataState;
  instance: IOxSInstance;
  /** 4 reserved bits, kept so a decoded byte re-encodes unchanged. */
  reserved: number;
  /** Another IOxS byte follows. */
  extension: boolean;
}

/** Build an IOxS entry; defaults describe a good subslot with no extension. */
export function createIOxS(fields: Partial<IOxS> = {}): IOxS {
  return {
    dataState: "good",
    extension: false,
    instance: "subslot",
    reserved: 0,
    ...fields,
  };
}

export function decodeIOxS(byte: number): IOxS {
  return {
    dataState: (byte & 0x80) !== 0 ? "good" : "bad",
    extension: (byte & 0x01) !== 0,
    instance: IOXS_INSTANCES[(byte >> 5) & 0x03],
    reserved: (byte >> 1) & 0x0f,
  };
}

export function encodeIOxS(entry: IOxS): number {
  return (
    (entry.dataState === "good" ? 0x80 : 0) |
    (IOXS_INSTANCES.indexOf(entry.instance) << 5) |
    ((entry.reserved & 0x0f) << 1) |
    (entry.extension ? 0x01 : 0)
  );
}

/**
 * Read a chain of IOxS bytes starting at `offset`, stopping after the first
 * byte whose extension bit is clear. Bytes at or past `end` are off limits.
 */
export function decodeIOxSChain(
  bytes: Uint8Array,
  offset: number,
  end: number = bytes.length,
): Result<IOxS[], TruncatedFrameError> {
  const entries: IOxS[] = [];
  let pos = offset;
  while (true) {
    if (pos >= end) {
      return createErr(new TruncatedFrameError(pos, 1, 0));
    }
    const entry = decodeIOxS(bytes[pos]);
    entries.push(entry);
    pos++;
    if (!entry.extension) return createOk(entries);
  }
}

/**
 * Serialize a chain. The extension bit is derived from position: set on
 * every entry but the last.
 */
export function encodeIOxSChain(entries: readonly IOxS[]): number[] {
  return entries.map((entry, i) =>
    encodeIOxS({ ...entry, extension: i < entries.length - 1 }),
  );
}
