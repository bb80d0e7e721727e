/**
 * PROFINET IO payload dispatch.
 *
 * Every PROFINET IO payload (EtherType 0x8892, or UDP port 0x8892) starts
 * with a big-endian frame identifier. Cyclic real-time identifiers are
 * decoded here; everything else (DCP, alarms, PTCP, fragments) is handed
 * back for another decoder.
 */

import { createErr, createOk, isErr, type Result, unwrapOk } from "option-t/plain_result";
import { FRAME_ID_LENGTH } from "./constants.ts";
import { type RtcDecodeError, TruncatedFrameError } from "./errors.ts";
import { classifyFrameId, type FrameIdClass, isRtcFrameId } from "./frameIds.ts";
import { parseRtcPdu } from "./rtcParser.ts";
import type {
  FlowContext,
  RtcDecodeOptions,
  RtcDecodeResult,
} from "./types/rtc.ts";

/** Outcome of {@link dispatchFrame}. */
export type DispatchResult =
  | {
      handledAsRtc: true;
      frameClass: FrameIdClass;
      rtc: RtcDecodeResult;
    }
  | {
      handledAsRtc: false;
      frameClass: FrameIdClass;
      /** Payload for a non-cyclic decoder. */
      rest: Uint8Array;
    };

/**
 * Route a PDU by its frame identifier.
 *
 * @param frameId - Frame identifier already read from the payload.
 * @param buffer - Bytes following the frame identifier.
 */
export function dispatchFrame(
  frameId: number,
  buffer: Uint8Array,
  flow: Omit<FlowContext, "frameId">,
  options: RtcDecodeOptions = {},
): Result<DispatchResult, RtcDecodeError> {
  const frameClass = classifyFrameId(frameId);
  if (!isRtcFrameId(frameId)) {
    const passed: DispatchResult = { frameClass, handledAsRtc: false, rest: buffer };
    return createOk(passed);
  }
  const rtc = parseRtcPdu(buffer, { ...flow, frameId }, options);
  if (isErr(rtc)) return rtc;
  const handled: DispatchResult = { frameClass, handledAsRtc: true, rtc: unwrapOk(rtc) };
  return createOk(handled);
}

/**
 * Read the frame identifier off a PROFINET IO payload and dispatch the rest.
 */
export function parseProfinetIO(
  payload: Uint8Array,
  flow: Omit<FlowContext, "frameId">,
  options: RtcDecodeOptions = {},
): Result<DispatchResult & { frameId: number }, RtcDecodeError> {
  if (payload.length < FRAME_ID_LENGTH) {
    return createErr(new TruncatedFrameError(0, FRAME_ID_LENGTH, payload.length));
  }
  const frameId = (payload[0] << 8) | payload[1];
  const dispatched = dispatchFrame(
    frameId,
    payload.subarray(FRAME_ID_LENGTH),
    flow,
    options,
  );
  if (isErr(dispatched)) return dispatched;
  const result: DispatchResult & { frameId: number } = {
    ...unwrapOk(dispatched),
    frameId,
  };
  return createOk(result);
}

/**
 * Prefix a PDU with its frame identifier.
 */
export function buildProfinetIO(frameId: number, pdu: Uint8Array): Uint8Array {
  const out = new Uint8Array(FRAME_ID_LENGTH + pdu.length);
  out[0] = (frameId >> 8) & 0xff;
  out[1] = frameId & 0xff;
  out.set(pdu, FRAME_ID_LENGTH);
  return out;
}
