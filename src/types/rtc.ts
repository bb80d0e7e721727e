import type { DataStatus } from "../flags.ts";
import type { LayoutRegistry } from "../layoutRegistry.ts";
import type { MacAddressInput } from "../macAddress.ts";
import type { SubFrame } from "../subFrames.ts";

/** Logging sink used by the codec; `console` fits. Silent by default. */
export interface CodecLogger {
  debug(message: string): void;
  warn(message: string): void;
}

/** How the PDU reached us: straight on Ethernet, or inside UDP. */
export type TransportKind = "ethernet" | "udp";

/**
 * Flow the PDU belongs to. Supplied by whoever peeled off the outer
 * Ethernet / UDP framing.
 */
export interface FlowContext {
  source: MacAddressInput;
  destination: MacAddressInput;
  frameId: number;
  /** Defaults to `"ethernet"`. */
  transport?: TransportKind;
}

/**
 * One cyclic real-time PDU: C_SDU items, padding and APDU status.
 */
export interface RtcFrame {
  subFrames: SubFrame[];
  padding: Uint8Array;
  cycleCounter: number;
  /** Defaults to primary, validData, run and noProblem when encoding. */
  dataStatus?: DataStatus;
  transferStatus: number;
}

/** A decoded PDU plus whatever followed it. */
export interface RtcDecodeResult {
  frame: RtcFrame;
  /** Bytes past the 1440-byte PDU ceiling; not part of the PDU. */
  trailing: Uint8Array;
  /** True when no layout was registered and the raw fallback was used. */
  usedFallbackLayout: boolean;
}

export interface RtcDecodeOptions {
  registry?: LayoutRegistry;
  logger?: CodecLogger;
}

export interface RtcEncodeOptions {
  transport?: TransportKind;
  /**
   * Total PDU length to fill. Padding becomes
   * `budget - sub-frame bytes - 4`. When omitted the frame's own padding
   * is kept.
   */
  budget?: number;
}
