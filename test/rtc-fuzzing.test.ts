import fc from "fast-check";
import { isOk, unwrapOk } from "option-t/plain_result";
import { describe, expect, it, vi } from "vitest";
import { RTC_MAX_PDU_LENGTH } from "../src/constants.ts";
import { DATA_STATUS_FLAGS, decodeFlags, encodeFlags } from "../src/flags.ts";
import { LayoutRegistry } from "../src/layoutRegistry.ts";
import { buildRtcPdu } from "../src/rtcBuilder.ts";
import { parseRtcPdu } from "../src/rtcParser.ts";
import { createProfisafeDescriptor } from "../src/profisafe.ts";
import {
  ioxsDescriptor,
  rawDescriptor,
  type RawSubFrame,
  type SubFrameDescriptor,
} from "../src/subFrames.ts";
import type { FlowContext } from "../src/types/rtc.ts";

const silent = () => ({ debug: vi.fn(), warn: vi.fn() });

const bytes = (maxLength: number) =>
  fc.uint8Array({ maxLength, minLength: 0 });

const descriptorArb: fc.Arbitrary<SubFrameDescriptor> = fc.oneof(
  fc.integer({ max: 24, min: 0 }).map(rawDescriptor),
  fc.constant(ioxsDescriptor()),
  fc
    .record({
      crcSeed: fc.boolean(),
      dataLength: fc.integer({ max: 12, min: 0 }),
      direction: fc.constantFrom("control" as const, "status" as const),
    })
    .map((params) => unwrapOk(createProfisafeDescriptor(params))),
);

// Numbers that are not always valid field values.
const looseNumber = (max: number) =>
  fc.oneof(
    fc.integer({ max: max * 2, min: -max }),
    fc.double(),
  );

describe("RTC fuzzing", () => {
  it("decodes what it encodes for registered raw layouts", () => {
    fc.assert(
      fc.property(
        fc.array(bytes(64), { maxLength: 6 }),
        bytes(12),
        fc.integer({ max: 0xffff, min: 0 }),
        fc.integer({ max: 0xff, min: 0 }),
        fc.integer({ max: 0xff, min: 0 }),
        fc.constantFrom<FlowContext["transport"]>("ethernet", "udp"),
        (chunks, padding, cycleCounter, statusByte, transferStatus, transport) => {
          const logger = silent();
          const registry = new LayoutRegistry({ logger });
          const flow: FlowContext = {
            destination: "02:00:00:00:00:02",
            frameId: 0x8123,
            source: "02:00:00:00:00:01",
            transport,
          };
          const layout = chunks.map((c) => rawDescriptor(c.length));
          expect(isOk(registry.set(flow, layout))).toBe(true);

          const subFrames: RawSubFrame[] = chunks.map((data) => ({ data, kind: "raw" }));
          const pdu = unwrapOk(
            buildRtcPdu(
              {
                cycleCounter,
                dataStatus: decodeFlags(statusByte, DATA_STATUS_FLAGS),
                padding,
                subFrames,
                transferStatus,
              },
              { transport },
            ),
          );
          expect(pdu.length).toBeLessThanOrEqual(RTC_MAX_PDU_LENGTH);

          const { frame, trailing, usedFallbackLayout } = unwrapOk(
            parseRtcPdu(pdu, flow, { logger, registry }),
          );
          expect(usedFallbackLayout).toBe(false);
          expect(trailing.length).toBe(0);
          expect(frame.subFrames).toEqual(subFrames);
          expect(frame.padding).toEqual(padding);
          expect(frame.cycleCounter).toBe(cycleCounter);
          expect(encodeFlags(frame.dataStatus ?? [], DATA_STATUS_FLAGS)).toBe(statusByte);
          expect(frame.transferStatus).toBe(transferStatus);
          expect(logger.warn).not.toHaveBeenCalled();
        },
      ),
      { numRuns: 200 },
    );
  });

  it("never throws on arbitrary input", () => {
    const logger = silent();
    const registry = new LayoutRegistry({ logger });
    fc.assert(
      fc.property(bytes(1500), fc.integer({ max: 0xffff, min: 0 }), (buffer, frameId) => {
        const flow: FlowContext = {
          destination: "02:00:00:00:00:02",
          frameId,
          source: "02:00:00:00:00:01",
        };
        expect(() => parseRtcPdu(buffer, flow, { logger, registry })).not.toThrow();
      }),
      { numRuns: 200 },
    );
  });

  it("re-encodes every PDU it decodes against mixed layouts", () => {
    fc.assert(
      fc.property(
        fc.array(descriptorArb, { maxLength: 5 }),
        bytes(120),
        fc.constantFrom<FlowContext["transport"]>("ethernet", "udp"),
        (layout, buffer, transport) => {
          const logger = silent();
          const registry = new LayoutRegistry({ logger });
          const flow: FlowContext = {
            destination: "02:00:00:00:00:02",
            frameId: 0x0100,
            source: "02:00:00:00:00:01",
            transport,
          };
          expect(isOk(registry.set(flow, layout))).toBe(true);

          const decoded = parseRtcPdu(buffer, flow, { logger, registry });
          if (!isOk(decoded)) return;
          const { frame, usedFallbackLayout } = unwrapOk(decoded);
          expect(usedFallbackLayout).toBe(false);
          expect(frame.subFrames.map((sf) => sf.kind)).toEqual(layout.map((d) => d.kind));
          expect(unwrapOk(buildRtcPdu(frame, { transport }))).toEqual(buffer);
        },
      ),
      { numRuns: 300 },
    );
  });

  it("returns a result instead of throwing on arbitrary encode input", () => {
    fc.assert(
      fc.property(
        fc.array(fc.integer({ max: 4000, min: 0 }), { maxLength: 4 }),
        fc.option(looseNumber(1500), { nil: undefined }),
        looseNumber(0xffff),
        looseNumber(0xff),
        fc.integer({ max: 60, min: 0 }),
        (lengths, budget, cycleCounter, transferStatus, padding) => {
          const frame = {
            cycleCounter,
            padding: new Uint8Array(padding),
            subFrames: lengths.map(
              (length): RawSubFrame => ({ data: new Uint8Array(length), kind: "raw" }),
            ),
            transferStatus,
          };
          const result = buildRtcPdu(frame, { budget });
          if (isOk(result)) {
            expect(unwrapOk(result).length).toBeLessThanOrEqual(RTC_MAX_PDU_LENGTH);
          }
        },
      ),
      { numRuns: 300 },
    );
  });
});
