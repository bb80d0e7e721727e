/**
 * Pure functions for building cyclic real-time (RTC) PDUs.
 */

import { createErr, createOk, isErr, type Result, unwrapOk } from "option-t/plain_result";
import {
  APDU_STATUS_LENGTH,
  DEFAULT_DATA_STATUS,
  RTC_MAX_PDU_LENGTH,
} from "./constants.ts";
import { MalformedFrameError, type RtcEncodeError } from "./errors.ts";
import { DATA_STATUS_FLAGS, encodeFlags } from "./flags.ts";
import { validatePadding } from "./rtcParser.ts";
import { encodeSubFrame, subFrameLength } from "./subFrames.ts";
import type { RtcEncodeOptions, RtcFrame } from "./types/rtc.ts";

function dataLength(frame: Pick<RtcFrame, "subFrames">): number {
  return frame.subFrames.reduce((sum, sf) => sum + subFrameLength(sf), 0);
}

/**
 * Padding length the frame will be serialized with.
 *
 * With a `budget` the padding fills the PDU up to that length; otherwise the
 * frame's own padding is used. The result is checked against the transport.
 */
export function computePadding(
  frame: Pick<RtcFrame, "subFrames" | "padding">,
  options: RtcEncodeOptions = {},
): Result<number, MalformedFrameError> {
  const padding =
    options.budget === undefined
      ? frame.padding.length
      : options.budget - dataLength(frame) - APDU_STATUS_LENGTH;
  return validatePadding(padding, options.transport);
}

function checkStatusField(
  name: string,
  value: number,
  max: number,
): Result<number, MalformedFrameError> {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    return createErr(
      new MalformedFrameError(`${name} must be 0-${max}, got ${value}`),
    );
  }
  return createOk(value);
}

/**
 * Serialize an RTC PDU: sub-frames, padding, then the APDU status.
 *
 * Padding is zero-filled when it comes from a budget; a frame's own padding
 * bytes are written as they are. The PDU length is checked before any
 * sub-frame is encoded.
 *
 * @returns The PDU bytes, without the frame identifier.
 */
export function buildRtcPdu(
  frame: RtcFrame,
  options: RtcEncodeOptions = {},
): Result<Uint8Array, RtcEncodeError> {
  const cycleCounter = checkStatusField("cycleCounter", frame.cycleCounter, 0xffff);
  if (isErr(cycleCounter)) return cycleCounter;
  const transferStatus = checkStatusField("transferStatus", frame.transferStatus, 0xff);
  if (isErr(transferStatus)) return transferStatus;

  const padding = computePadding(frame, options);
  if (isErr(padding)) return padding;
  const paddingLength = unwrapOk(padding);

  const payloadLength = dataLength(frame);
  const total = payloadLength + paddingLength + APDU_STATUS_LENGTH;
  if (total > RTC_MAX_PDU_LENGTH) {
    return createErr(
      new MalformedFrameError(`RTC PDU is ${total} bytes, limit is ${RTC_MAX_PDU_LENGTH}`),
    );
  }

  const out = new Uint8Array(total);
  let offset = 0;
  for (const subFrame of frame.subFrames) {
    const encoded = encodeSubFrame(subFrame);
    if (isErr(encoded)) return encoded;
    const bytes = unwrapOk(encoded);
    out.set(bytes, offset);
    offset += bytes.length;
  }

  // Budget padding stays zero from the allocation.
  if (options.budget === undefined) {
    out.set(frame.padding, offset);
  }
  offset += paddingLength;

  const dataStatus =
    frame.dataStatus === undefined
      ? DEFAULT_DATA_STATUS
      : encodeFlags(frame.dataStatus, DATA_STATUS_FLAGS);
  const view = new DataView(out.buffer);
  view.setUint16(offset, unwrapOk(cycleCounter));
  view.setUint8(offset + 2, dataStatus);
  view.setUint8(offset + 3, unwrapOk(transferStatus));
  return createOk(out);
}
