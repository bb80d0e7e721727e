import { readFileSync } from "node:fs";
import { isErr, unwrapErr, unwrapOk } from "option-t/plain_result";
import { describe, expect, it, vi } from "vitest";
import { InvalidDescriptorError } from "../src/errors.ts";
import { loadLayoutConfig, parseFrameIdValue, parseLayoutConfig } from "../src/layoutConfig.ts";
import { LayoutRegistry } from "../src/layoutRegistry.ts";
import { ioxsDescriptor, rawDescriptor } from "../src/subFrames.ts";

const fixture: unknown = JSON.parse(
  readFileSync(new URL("./fixtures/layouts.json", import.meta.url), "utf8"),
);

describe("parseFrameIdValue", () => {
  it("accepts numbers, hex strings and names", () => {
    expect(parseFrameIdValue(0x8000)).toBe(0x8000);
    expect(parseFrameIdValue("0xC001")).toBe(0xc001);
    expect(parseFrameIdValue("RT_CLASS_UDP")).toBe(0xc000);
    expect(parseFrameIdValue("DCP-Hello-Req")).toBe(0xfefc);
  });

  it("rejects anything else", () => {
    expect(parseFrameIdValue("RT_CLASS_2")).toBeUndefined();
    expect(parseFrameIdValue(0x10000)).toBeUndefined();
    expect(parseFrameIdValue(null)).toBeUndefined();
  });
});

describe("parseLayoutConfig", () => {
  it("parses the fixture document", () => {
    const entries = unwrapOk(parseLayoutConfig(fixture));
    expect(entries).toHaveLength(3);
    expect(entries[0]).toEqual({
      destination: "00:0c:29:00:00:02",
      frameId: 0x8000,
      source: "00:0c:29:00:00:01",
      subFrames: [
        rawDescriptor(2),
        ioxsDescriptor(),
        { crcSeed: false, dataLength: 2, direction: "control", kind: "profisafe" },
        ioxsDescriptor(),
      ],
    });
    expect(entries[1].frameId).toBe(0x0100);
    expect(entries[2]).toMatchObject({ frameId: 0xc001, subFrames: [] });
  });

  it("points at the offending sub-frame", () => {
    const result = parseLayoutConfig({
      layouts: [
        {
          destination: "00:0c:29:00:00:02",
          frameId: 0x8000,
          source: "00:0c:29:00:00:01",
          subFrames: [{ kind: "raw", length: 1 }, { kind: "bitmap" }],
        },
      ],
    });
    const error = unwrapErr(result);
    expect(error).toBeInstanceOf(InvalidDescriptorError);
    expect(error.message).toBe(
      'Descriptor error: layouts[0].subFrames[1]: unknown sub-frame kind "bitmap"',
    );
  });

  it("rejects oversized PROFIsafe data", () => {
    const result = parseLayoutConfig({
      layouts: [
        {
          destination: "00:0c:29:00:00:02",
          frameId: 0x8000,
          source: "00:0c:29:00:00:01",
          subFrames: [{ crcSeed: false, dataLength: 13, direction: "status", kind: "profisafe" }],
        },
      ],
    });
    expect(unwrapErr(result)).toBeInstanceOf(InvalidDescriptorError);
  });

  it("rejects documents without layouts", () => {
    expect(isErr(parseLayoutConfig({}))).toBe(true);
    expect(isErr(parseLayoutConfig([]))).toBe(true);
  });
});

describe("loadLayoutConfig", () => {
  it("fills a registry", () => {
    const registry = new LayoutRegistry({ logger: { debug: vi.fn(), warn: vi.fn() } });
    expect(unwrapOk(loadLayoutConfig(registry, fixture))).toBe(3);
    expect(
      registry.lookup({
        destination: "00:0c:29:00:00:01",
        frameId: 0x0100,
        source: "00:0c:29:00:00:02",
      }),
    ).toEqual([{ crcSeed: true, dataLength: 13, direction: "status", kind: "profisafe" }]);
  });

  it("stores nothing when the address is invalid", () => {
    const registry = new LayoutRegistry({ logger: { debug: vi.fn(), warn: vi.fn() } });
    const result = loadLayoutConfig(registry, {
      layouts: [{ destination: "nope", frameId: 1, source: "00:0c:29:00:00:01", subFrames: [] }],
    });
    expect(isErr(result)).toBe(true);
    expect(registry.size).toBe(0);
  });
});
