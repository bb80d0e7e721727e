/**
 * Unified error types for the RTC PDU and PROFIsafe codecs.
 */

/** Discriminator carried by every codec error. */
export type ProfinetErrorKind =
  | "TruncatedFrame"
  | "MalformedFrame"
  | "InvalidDescriptor"
  | "InvalidAddress";

/** Base error class for PROFINET codec errors. */
export abstract class ProfinetError extends Error {
  abstract readonly kind: ProfinetErrorKind;

  constructor(message: string) {
    super(message);
    this.name = "ProfinetError";
  }
}

/** A declared or required length runs past the bytes that are available. */
export class TruncatedFrameError extends ProfinetError {
  readonly kind = "TruncatedFrame";

  constructor(
    public readonly offset: number,
    public readonly required: number,
    public readonly available: number,
  ) {
    super(
      `Frame error: need ${required} bytes at offset ${offset}, ${available} available`,
    );
    this.name = "TruncatedFrameError";
  }
}

/** Padding or trailing status fields violate the frame constraints. */
export class MalformedFrameError extends ProfinetError {
  readonly kind = "MalformedFrame";

  constructor(
    message: string,
    public readonly padding?: number,
  ) {
    super(`Frame error: ${message}`);
    this.name = "MalformedFrameError";
  }
}

/** A sub-frame descriptor cannot describe a valid frame. */
export class InvalidDescriptorError extends ProfinetError {
  readonly kind = "InvalidDescriptor";

  constructor(message: string) {
    super(`Descriptor error: ${message}`);
    this.name = "InvalidDescriptorError";
  }
}

/** A link-layer address is not a 6-byte MAC address. */
export class InvalidAddressError extends ProfinetError {
  readonly kind = "InvalidAddress";

  constructor(public readonly address: string) {
    super(`Invalid MAC address: ${address}`);
    this.name = "InvalidAddressError";
  }
}

/** Errors the PDU decoder can report. */
export type RtcDecodeError =
  | TruncatedFrameError
  | MalformedFrameError
  | InvalidDescriptorError;

/** Errors the PDU encoder can report. */
export type RtcEncodeError = MalformedFrameError | InvalidDescriptorError;
