/**
 * PROFIsafe safety sub-frames.
 *
 * Every shape is `[data: D bytes][control or status: 1 byte][crc: 3 or 4 bytes]`.
 * The frame has no length prefix, so D always comes from the descriptor.
 * The CRC is carried as an opaque value: it is neither generated nor checked.
 */

import { createErr, createOk, isErr, type Result, unwrapOk } from "option-t/plain_result";
import {
  InvalidDescriptorError,
  MalformedFrameError,
  TruncatedFrameError,
} from "./errors.ts";
import { decodeFlags, encodeFlags, type FlagSet } from "./flags.ts";

/** Control byte, host to device (IEC 61784-3-3, bit 0 first). */
export const PROFISAFE_CONTROL_FLAGS = [
  "iPar_EN",
  "OA_Req",
  "R_cons_nr",
  "Use_TO2",
  "activate_FV",
  "Toggle_h",
  "ChF_Ack",
  "Loopcheck",
] as const;

/** Status byte, device to host (IEC 61784-3-3, bit 0 first). */
export const PROFISAFE_STATUS_FLAGS = [
  "iPar_OK",
  "Device_Fault/ChF_Ack_Req",
  "CE_CRC",
  "WD_timeout",
  "FV_activated",
  "Toggle_d",
  "cons_nr_R",
  "reserved",
] as const;

export type ProfisafeControlFlag = (typeof PROFISAFE_CONTROL_FLAGS)[number];
export type ProfisafeStatusFlag = (typeof PROFISAFE_STATUS_FLAGS)[number];

export type ProfisafeDirection = "control" | "status";

/** Maximum F-data length with F_CRC_Seed=0. */
export const PROFISAFE_MAX_DATA_LENGTH = 12;
/** Maximum F-data length with F_CRC_Seed=1. */
export const PROFISAFE_CRC_SEED_MAX_DATA_LENGTH = 13;

export interface ProfisafeDescriptor {
  kind: "profisafe";
  direction: ProfisafeDirection;
  /** F_CRC_Seed=1: 4-byte CRC and up to 13 data bytes. */
  crcSeed: boolean;
  dataLength: number;
}

interface ProfisafeFrameBase {
  kind: "profisafe";
  crcSeed: boolean;
  data: Uint8Array;
  crc: number;
}

export interface ProfisafeControlFrame extends ProfisafeFrameBase {
  direction: "control";
  control: FlagSet<ProfisafeControlFlag>;
}

export interface ProfisafeStatusFrame extends ProfisafeFrameBase {
  direction: "status";
  status: FlagSet<ProfisafeStatusFlag>;
}

export type ProfisafeFrame = ProfisafeControlFrame | ProfisafeStatusFrame;

export function profisafeMaxDataLength(crcSeed: boolean): number {
  return crcSeed ? PROFISAFE_CRC_SEED_MAX_DATA_LENGTH : PROFISAFE_MAX_DATA_LENGTH;
}

export function profisafeCrcLength(crcSeed: boolean): number {
  return crcSeed ? 4 : 3;
}

/** Total wire length of a frame described by `descriptor`. */
export function profisafeFrameLength(
  descriptor: Pick<ProfisafeDescriptor, "crcSeed" | "dataLength">,
): number {
  return descriptor.dataLength + 1 + profisafeCrcLength(descriptor.crcSeed);
}

function checkDataLength(
  dataLength: number,
  crcSeed: boolean,
): Result<void, InvalidDescriptorError> {
  const max = profisafeMaxDataLength(crcSeed);
  if (!Number.isInteger(dataLength) || dataLength < 0 || dataLength > max) {
    return createErr(
      new InvalidDescriptorError(
        `PROFIsafe data length must be 0-${max} with F_CRC_Seed=${crcSeed ? 1 : 0}, got ${dataLength}`,
      ),
    );
  }
  return createOk(undefined);
}

/**
 * Create a PROFIsafe descriptor, rejecting data lengths over the
 * maximum for its CRC seed mode.
 */
export function createProfisafeDescriptor(params: {
  direction: ProfisafeDirection;
  crcSeed: boolean;
  dataLength: number;
}): Result<ProfisafeDescriptor, InvalidDescriptorError> {
  const check = checkDataLength(params.dataLength, params.crcSeed);
  if (isErr(check)) return check;
  const descriptor: ProfisafeDescriptor = {
    crcSeed: params.crcSeed,
    dataLength: params.dataLength,
    direction: params.direction,
    kind: "profisafe",
  };
  return createOk(descriptor);
}

/** Re-check a descriptor that may not have come from {@link createProfisafeDescriptor}. */
export function validateProfisafeDescriptor(
  descriptor: ProfisafeDescriptor,
): Result<ProfisafeDescriptor, InvalidDescriptorError> {
  return createProfisafeDescriptor(descriptor);
}

function pickFlags<N extends string>(
  requested: Iterable<string>,
  names: readonly N[],
  direction: ProfisafeDirection,
): Result<FlagSet<N>, InvalidDescriptorError> {
  const picked = new Set<N>();
  for (const flag of requested) {
    const name = names.find((n) => n === flag);
    if (name === undefined) {
      return createErr(
        new InvalidDescriptorError(`unknown PROFIsafe ${direction} flag "${flag}"`),
      );
    }
    picked.add(name);
  }
  return createOk(picked);
}

/**
 * Build a frame matching `descriptor`. Data defaults to D zero bytes.
 * Flag names must belong to the descriptor's direction.
 */
export function createProfisafeFrame(
  descriptor: ProfisafeDescriptor,
  fields: {
    data?: Uint8Array;
    flags?: Iterable<ProfisafeControlFlag | ProfisafeStatusFlag>;
    crc?: number;
  } = {},
): Result<ProfisafeFrame, InvalidDescriptorError> {
  const check = checkDataLength(descriptor.dataLength, descriptor.crcSeed);
  if (isErr(check)) return check;
  const data = fields.data ?? new Uint8Array(descriptor.dataLength);
  if (data.length !== descriptor.dataLength) {
    return createErr(
      new InvalidDescriptorError(
        `PROFIsafe data is ${data.length} bytes, descriptor expects ${descriptor.dataLength}`,
      ),
    );
  }
  const requested = fields.flags ?? [];
  const crc = fields.crc ?? 0;
  if (descriptor.direction === "control") {
    const control = pickFlags(requested, PROFISAFE_CONTROL_FLAGS, "control");
    if (isErr(control)) return control;
    const frame: ProfisafeControlFrame = {
      control: unwrapOk(control),
      crc,
      crcSeed: descriptor.crcSeed,
      data,
      direction: "control",
      kind: "profisafe",
    };
    return createOk(frame);
  }
  const status = pickFlags(requested, PROFISAFE_STATUS_FLAGS, "status");
  if (isErr(status)) return status;
  const frame: ProfisafeStatusFrame = {
    crc,
    crcSeed: descriptor.crcSeed,
    data,
    direction: "status",
    kind: "profisafe",
    status: unwrapOk(status),
  };
  return createOk(frame);
}

/**
 * Decode one PROFIsafe frame of the shape given by `descriptor` at `offset`.
 * Bytes at or past `end` are off limits.
 */
export function decodeProfisafeFrame(
  bytes: Uint8Array,
  offset: number,
  descriptor: ProfisafeDescriptor,
  end: number = bytes.length,
): Result<ProfisafeFrame, TruncatedFrameError | InvalidDescriptorError> {
  const check = checkDataLength(descriptor.dataLength, descriptor.crcSeed);
  if (isErr(check)) return check;

  const length = profisafeFrameLength(descriptor);
  const available = Math.max(0, end - offset);
  if (length > available) {
    return createErr(new TruncatedFrameError(offset, length, available));
  }

  const data = bytes.slice(offset, offset + descriptor.dataLength);
  const flagsByte = bytes[offset + descriptor.dataLength];
  let crc = 0;
  for (let i = offset + descriptor.dataLength + 1; i < offset + length; i++) {
    crc = crc * 0x100 + bytes[i];
  }

  if (descriptor.direction === "control") {
    const frame: ProfisafeControlFrame = {
      control: decodeFlags(flagsByte, PROFISAFE_CONTROL_FLAGS),
      crc,
      crcSeed: descriptor.crcSeed,
      data,
      direction: "control",
      kind: "profisafe",
    };
    return createOk(frame);
  }
  const frame: ProfisafeStatusFrame = {
    crc,
    crcSeed: descriptor.crcSeed,
    data,
    direction: "status",
    kind: "profisafe",
    status: decodeFlags(flagsByte, PROFISAFE_STATUS_FLAGS),
  };
  return createOk(frame);
}

/**
 * Serialize a PROFIsafe frame. The CRC is written big-endian as given.
 */
export function encodeProfisafeFrame(
  frame: ProfisafeFrame,
): Result<number[], InvalidDescriptorError | MalformedFrameError> {
  const check = checkDataLength(frame.data.length, frame.crcSeed);
  if (isErr(check)) return check;

  const crcLength = profisafeCrcLength(frame.crcSeed);
  const crcLimit = 2 ** (8 * crcLength);
  if (!Number.isInteger(frame.crc) || frame.crc < 0 || frame.crc >= crcLimit) {
    return createErr(
      new MalformedFrameError(
        `PROFIsafe CRC 0x${frame.crc.toString(16)} does not fit in ${crcLength} bytes`,
      ),
    );
  }

  const flagsByte =
    frame.direction === "control"
      ? encodeFlags(frame.control, PROFISAFE_CONTROL_FLAGS)
      : encodeFlags(frame.status, PROFISAFE_STATUS_FLAGS);

  const crcBytes: number[] = [];
  let crc = frame.crc;
  for (let i = 0; i < crcLength; i++) {
    crcBytes.unshift(crc % 0x100);
    crc = Math.floor(crc / 0x100);
  }
  return createOk([...frame.data, flagsByte, ...crcBytes]);
}
