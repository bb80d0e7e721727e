/**
 * Pure functions for parsing cyclic real-time (RTC) PDUs.
 *
 * PDU layout: `[sub-frames][padding][cycleCounter:2][dataStatus:1][transferStatus:1]`.
 * Which sub-frames make up the PDU comes from the layout registered for the
 * flow; without one the whole C_SDU is read as a single raw sub-frame.
 */

import {
  createErr,
  createOk,
  isErr,
  type Result,
  unwrapOk,
} from "option-t/plain_result";
import {
  APDU_STATUS_LENGTH,
  RTC_MAX_PADDING,
  RTC_MAX_PDU_LENGTH,
  RTC_UDP_MAX_PADDING,
} from "./constants.ts";
import {
  MalformedFrameError,
  type RtcDecodeError,
  TruncatedFrameError,
} from "./errors.ts";
import { DATA_STATUS_FLAGS, decodeFlags } from "./flags.ts";
import { formatFrameId } from "./frameIds.ts";
import { defaultLayoutRegistry } from "./layoutRegistry.ts";
import { silentLogger } from "./logger.ts";
import {
  decodeSubFrame,
  rawDescriptor,
  type SubFrame,
  type SubFrameDescriptor,
} from "./subFrames.ts";
import type {
  FlowContext,
  RtcDecodeOptions,
  RtcDecodeResult,
  TransportKind,
} from "./types/rtc.ts";

/**
 * Check a padding length against the limits of the transport.
 * Non-integer lengths (including NaN) are rejected.
 */
export function validatePadding(
  padding: number,
  transport: TransportKind = "ethernet",
): Result<number, MalformedFrameError> {
  if (!Number.isInteger(padding) || padding < 0 || padding > RTC_MAX_PADDING) {
    return createErr(
      new MalformedFrameError(
        `RTC padding must be 0-${RTC_MAX_PADDING} bytes, got ${padding}`,
        padding,
      ),
    );
  }
  if (transport === "udp" && padding > RTC_UDP_MAX_PADDING) {
    return createErr(
      new MalformedFrameError(
        `RTC padding over UDP must be 0-${RTC_UDP_MAX_PADDING} bytes, got ${padding}`,
        padding,
      ),
    );
  }
  return createOk(padding);
}

/**
 * Decode sub-frames in descriptor order from `bytes[0..end)`.
 * The queue is consumed; each descriptor is used exactly once.
 */
export function parseSubFrames(
  bytes: Uint8Array,
  end: number,
  queue: SubFrameDescriptor[],
): Result<{ subFrames: SubFrame[]; consumed: number }, RtcDecodeError> {
  const subFrames: SubFrame[] = [];
  let offset = 0;
  for (let descriptor = queue.shift(); descriptor; descriptor = queue.shift()) {
    const decoded = decodeSubFrame(bytes, offset, end, descriptor);
    if (isErr(decoded)) return decoded;
    const { subFrame, length } = unwrapOk(decoded);
    subFrames.push(subFrame);
    offset += length;
  }
  return createOk({ consumed: offset, subFrames });
}

/**
 * Parse an RTC PDU.
 *
 * At most 1440 bytes belong to the PDU; anything after that is handed back
 * in `trailing` untouched.
 *
 * @param buffer - PDU bytes, starting right after the frame identifier.
 * @param flow - Addresses, frame identifier and transport of the PDU.
 */
export function parseRtcPdu(
  buffer: Uint8Array,
  flow: FlowContext,
  options: RtcDecodeOptions = {},
): Result<RtcDecodeResult, RtcDecodeError> {
  const { registry = defaultLayoutRegistry, logger = silentLogger } = options;
  const transport = flow.transport ?? "ethernet";

  const length = Math.min(RTC_MAX_PDU_LENGTH, buffer.length);
  const trailing = buffer.slice(length);
  if (trailing.length > 0) {
    logger.warn(
      `RtcParser: ${trailing.length} bytes past the ${RTC_MAX_PDU_LENGTH}-byte PDU ceiling left unparsed`,
    );
  }
  if (length < APDU_STATUS_LENGTH) {
    return createErr(new TruncatedFrameError(0, APDU_STATUS_LENGTH, length));
  }
  const dataEnd = length - APDU_STATUS_LENGTH;

  const layout = registry.lookup(flow);
  const usedFallbackLayout = layout === undefined;
  if (usedFallbackLayout) {
    logger.debug(
      `RtcParser: no layout for ${formatFrameId(flow.frameId)}, reading ${dataEnd} raw bytes`,
    );
  }
  const queue = layout ?? [rawDescriptor(dataEnd)];

  const parsed = parseSubFrames(buffer, dataEnd, queue);
  if (isErr(parsed)) return parsed;
  const { subFrames, consumed } = unwrapOk(parsed);

  const padding = validatePadding(dataEnd - consumed, transport);
  if (isErr(padding)) return padding;

  const view = new DataView(buffer.buffer, buffer.byteOffset, length);
  return createOk({
    frame: {
      cycleCounter: view.getUint16(dataEnd),
      dataStatus: decodeFlags(view.getUint8(dataEnd + 2), DATA_STATUS_FLAGS),
      padding: buffer.slice(consumed, dataEnd),
      subFrames,
      transferStatus: view.getUint8(dataEnd + 3),
    },
    trailing,
    usedFallbackLayout,
  });
}
