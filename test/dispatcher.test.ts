import { unwrapErr, unwrapOk } from "option-t/plain_result";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { TruncatedFrameError } from "../src/errors.ts";
import { buildProfinetIO, dispatchFrame, parseProfinetIO } from "../src/dispatcher.ts";
import { LayoutRegistry } from "../src/layoutRegistry.ts";
import { rawDescriptor } from "../src/subFrames.ts";

const addresses = {
  destination: "00:0c:29:00:00:02",
  source: "00:0c:29:00:00:01",
};

describe("dispatchFrame", () => {
  let registry: LayoutRegistry;
  const logger = { debug: vi.fn(), warn: vi.fn() };

  beforeEach(() => {
    registry = new LayoutRegistry({ logger });
  });

  it("decodes RT_CLASS_1 frames", () => {
    const buffer = new Uint8Array([0x07, 0x00, 0x02, 0x35, 0x00]);
    const result = unwrapOk(dispatchFrame(0x8001, buffer, addresses, { logger, registry }));
    if (!result.handledAsRtc) throw new Error("expected an RTC frame");
    expect(result.frameClass).toEqual({ id: 0x8001, kind: "range", tag: "RT_CLASS_1" });
    expect(result.rtc.frame.subFrames).toEqual([{ data: new Uint8Array([0x07]), kind: "raw" }]);
    expect(result.rtc.frame.cycleCounter).toBe(2);
  });

  it("decodes RT_CLASS_3 frames with their registered layout", () => {
    registry.set({ ...addresses, frameId: 0x0100 }, [rawDescriptor(1)]);
    const buffer = new Uint8Array([0x07, 0xee, 0x00, 0x02, 0x35, 0x00]);
    const result = unwrapOk(dispatchFrame(0x0100, buffer, addresses, { logger, registry }));
    expect(result).toMatchObject({ handledAsRtc: true });
    if (result.handledAsRtc) {
      expect(result.rtc.frame.padding).toEqual(new Uint8Array([0xee]));
      expect(result.rtc.usedFallbackLayout).toBe(false);
    }
  });

  it("hands other frames back untouched", () => {
    const buffer = new Uint8Array([0x05, 0x04]);
    const result = unwrapOk(dispatchFrame(0xfefe, buffer, addresses, { logger, registry }));
    expect(result).toEqual({
      frameClass: { id: 0xfefe, kind: "named", name: "DCP-Identify-ReqPDU" },
      handledAsRtc: false,
      rest: buffer,
    });
  });

  it("propagates decode failures", () => {
    registry.set({ ...addresses, frameId: 0x8000 }, [rawDescriptor(8)]);
    const result = dispatchFrame(0x8000, new Uint8Array(6), addresses, { logger, registry });
    expect(unwrapErr(result)).toBeInstanceOf(TruncatedFrameError);
  });
});

describe("ProfinetIO header", () => {
  const logger = { debug: vi.fn(), warn: vi.fn() };

  it("reads the frame identifier and dispatches", () => {
    const pdu = new Uint8Array([0xaa, 0xbb, 0x00, 0x01, 0x35, 0x00]);
    const payload = buildProfinetIO(0xc001, pdu);
    expect(Array.from(payload.subarray(0, 2))).toEqual([0xc0, 0x01]);

    const result = unwrapOk(
      parseProfinetIO(payload, { ...addresses, transport: "udp" }, {
        logger,
        registry: new LayoutRegistry({ logger }),
      }),
    );
    expect(result.frameId).toBe(0xc001);
    expect(result.handledAsRtc).toBe(true);
    if (result.handledAsRtc) {
      expect(result.rtc.frame.subFrames).toEqual([
        { data: new Uint8Array([0xaa, 0xbb]), kind: "raw" },
      ]);
    }
  });

  it("passes alarm frames through", () => {
    const payload = new Uint8Array([0xfc, 0x01, 0x10, 0x20]);
    const result = unwrapOk(parseProfinetIO(payload, addresses, { logger }));
    expect(result).toMatchObject({ frameId: 0xfc01, handledAsRtc: false });
    if (!result.handledAsRtc) {
      expect(Array.from(result.rest)).toEqual([0x10, 0x20]);
    }
  });

  it("rejects payloads too short for a frame identifier", () => {
    const error = unwrapErr(parseProfinetIO(new Uint8Array([0x80]), addresses, { logger }));
    expect(error).toMatchObject({ available: 1, offset: 0, required: 2 });
  });
});
