/**
 * Sub-frame descriptors and the sub-frames they decode to.
 *
 * A descriptor names the shape of one data item inside an RTC PDU; the
 * shape is never on the wire, so the decoder needs the descriptor to read
 * the item back.
 */

import {
  createErr,
  createOk,
  isErr,
  type Result,
  unwrapOk,
} from "option-t/plain_result";
import {
  InvalidDescriptorError,
  MalformedFrameError,
  TruncatedFrameError,
} from "./errors.ts";
import {
  decodeIOxSChain,
  encodeIOxSChain,
  type IOxS,
} from "./ioxs.ts";
import {
  decodeProfisafeFrame,
  encodeProfisafeFrame,
  profisafeFrameLength,
  validateProfisafeDescriptor,
  type ProfisafeDescriptor,
  type ProfisafeFrame,
} from "./profisafe.ts";

/** Fixed-length opaque bytes. */
export interface RawDescriptor {
  kind: "raw";
  length: number;
}

/** A chain of IOCS / IOPS bytes. */
export interface IOxSDescriptor {
  kind: "ioxs";
}

export type SubFrameDescriptor = RawDescriptor | IOxSDescriptor | ProfisafeDescriptor;

export interface RawSubFrame {
  kind: "raw";
  data: Uint8Array;
}

export interface IOxSSubFrame {
  kind: "ioxs";
  entries: IOxS[];
}

export type SubFrame = RawSubFrame | IOxSSubFrame | ProfisafeFrame;

export function rawDescriptor(length: number): RawDescriptor {
  return { kind: "raw", length };
}

export function ioxsDescriptor(): IOxSDescriptor {
  return { kind: "ioxs" };
}

export function validateDescriptor(
  descriptor: SubFrameDescriptor,
): Result<SubFrameDescriptor, InvalidDescriptorError> {
  switch (descriptor.kind) {
    case "raw":
      if (!Number.isInteger(descriptor.length) || descriptor.length < 0) {
        return createErr(
          new InvalidDescriptorError(
            `raw length must be a non-negative integer, got ${descriptor.length}`,
          ),
        );
      }
      return createOk(descriptor);
    case "ioxs":
      return createOk(descriptor);
    case "profisafe":
      return validateProfisafeDescriptor(descriptor);
  }
}

/** Copy a descriptor list so the copy can be consumed without touching the source. */
export function cloneDescriptors(
  descriptors: readonly SubFrameDescriptor[],
): SubFrameDescriptor[] {
  return descriptors.map((d) => ({ ...d }));
}

/**
 * Decode one sub-frame at `offset`, never reading at or past `end`.
 * Returns the sub-frame and the number of bytes it took.
 */
export function decodeSubFrame(
  bytes: Uint8Array,
  offset: number,
  end: number,
  descriptor: SubFrameDescriptor,
): Result<
  { subFrame: SubFrame; length: number },
  TruncatedFrameError | InvalidDescriptorError
> {
  const valid = validateDescriptor(descriptor);
  if (isErr(valid)) return valid;

  switch (descriptor.kind) {
    case "raw": {
      const available = Math.max(0, end - offset);
      if (descriptor.length > available) {
        return createErr(
          new TruncatedFrameError(offset, descriptor.length, available),
        );
      }
      const subFrame: RawSubFrame = {
        data: bytes.slice(offset, offset + descriptor.length),
        kind: "raw",
      };
      return createOk({ length: descriptor.length, subFrame });
    }
    case "ioxs": {
      const chain = decodeIOxSChain(bytes, offset, end);
      if (isErr(chain)) return chain;
      const entries = unwrapOk(chain);
      const subFrame: IOxSSubFrame = { entries, kind: "ioxs" };
      return createOk({ length: entries.length, subFrame });
    }
    case "profisafe": {
      const frame = decodeProfisafeFrame(bytes, offset, descriptor, end);
      if (isErr(frame)) return frame;
      return createOk({
        length: profisafeFrameLength(descriptor),
        subFrame: unwrapOk(frame),
      });
    }
  }
}

/**
 * Serialize one sub-frame.
 */
export function encodeSubFrame(
  subFrame: SubFrame,
): Result<number[], InvalidDescriptorError | MalformedFrameError> {
  switch (subFrame.kind) {
    case "raw":
      return createOk(Array.from(subFrame.data));
    case "ioxs":
      if (subFrame.entries.length === 0) {
        return createErr(new MalformedFrameError("IOxS chain is empty"));
      }
      return createOk(encodeIOxSChain(subFrame.entries));
    case "profisafe":
      return encodeProfisafeFrame(subFrame);
  }
}

/** Wire length of a sub-frame. */
export function subFrameLength(subFrame: SubFrame): number {
  switch (subFrame.kind) {
    case "raw":
      return subFrame.data.length;
    case "ioxs":
      return subFrame.entries.length;
    case "profisafe":
      return profisafeFrameLength({
        crcSeed: subFrame.crcSeed,
        dataLength: subFrame.data.length,
      });
  }
}
