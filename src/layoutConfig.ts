/**
 * Layout documents.
 *
 * ```json
 * {
 *   "layouts": [{
 *     "source": "00:0c:29:00:00:01",
 *     "destination": "00:0c:29:00:00:02",
 *     "frameId": "0x8000",
 *     "subFrames": [
 *       { "kind": "raw", "length": 4 },
 *       { "kind": "ioxs" },
 *       { "kind": "profisafe", "direction": "control", "crcSeed": false, "dataLength": 2 }
 *     ]
 *   }]
 * }
 * ```
 *
 * `frameId` may be a number, a `0x` hex string, or a frame name / range tag.
 */

import { createErr, createOk, isErr, type Result, unwrapOk } from "option-t/plain_result";
import { type InvalidAddressError, InvalidDescriptorError } from "./errors.ts";
import { isFrameId, resolveFrameId } from "./frameIds.ts";
import type { LayoutKey, LayoutRegistry } from "./layoutRegistry.ts";
import { createProfisafeDescriptor } from "./profisafe.ts";
import {
  ioxsDescriptor,
  rawDescriptor,
  type SubFrameDescriptor,
  validateDescriptor,
} from "./subFrames.ts";

export type LayoutConfigEntry = LayoutKey & { subFrames: SubFrameDescriptor[] };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function fail(path: string, message: string) {
  return createErr(new InvalidDescriptorError(`${path}: ${message}`));
}

/** Parse the `frameId` field of a layout. */
export function parseFrameIdValue(value: unknown): number | undefined {
  let id: unknown = value;
  if (typeof value === "string") {
    id = /^0x[0-9a-f]+$/i.test(value) ? parseInt(value, 16) : resolveFrameId(value);
  }
  return typeof id === "number" && isFrameId(id) ? id : undefined;
}

function parseDescriptor(
  value: unknown,
  path: string,
): Result<SubFrameDescriptor, InvalidDescriptorError> {
  if (!isRecord(value)) return fail(path, "expected an object");
  switch (value.kind) {
    case "raw": {
      if (typeof value.length !== "number") return fail(path, "raw needs a numeric length");
      return validateDescriptor(rawDescriptor(value.length));
    }
    case "ioxs":
      return createOk(ioxsDescriptor());
    case "profisafe": {
      const { direction, crcSeed, dataLength } = value;
      if (direction !== "control" && direction !== "status") {
        return fail(path, `direction must be "control" or "status"`);
      }
      if (typeof crcSeed !== "boolean" || typeof dataLength !== "number") {
        return fail(path, "profisafe needs boolean crcSeed and numeric dataLength");
      }
      return createProfisafeDescriptor({ crcSeed, dataLength, direction });
    }
    default:
      return fail(path, `unknown sub-frame kind ${JSON.stringify(value.kind)}`);
  }
}

/**
 * Validate a parsed layout document.
 */
export function parseLayoutConfig(
  json: unknown,
): Result<LayoutConfigEntry[], InvalidDescriptorError> {
  if (!isRecord(json) || !Array.isArray(json.layouts)) {
    return fail("$", "expected { layouts: [...] }");
  }
  const layouts: readonly unknown[] = json.layouts;
  const entries: LayoutConfigEntry[] = [];
  for (const [i, layout] of layouts.entries()) {
    const path = `layouts[${i}]`;
    if (!isRecord(layout)) return fail(path, "expected an object");
    const { source, destination } = layout;
    if (typeof source !== "string" || typeof destination !== "string") {
      return fail(path, "source and destination must be MAC address strings");
    }
    const frameId = parseFrameIdValue(layout.frameId);
    if (frameId === undefined) {
      return fail(path, `invalid frameId ${JSON.stringify(layout.frameId)}`);
    }
    if (!Array.isArray(layout.subFrames)) {
      return fail(path, "subFrames must be an array");
    }
    const subFrames: readonly unknown[] = layout.subFrames;

    const descriptors: SubFrameDescriptor[] = [];
    for (const [j, sub] of subFrames.entries()) {
      const descriptor = parseDescriptor(sub, `${path}.subFrames[${j}]`);
      if (isErr(descriptor)) return descriptor;
      descriptors.push(unwrapOk(descriptor));
    }
    entries.push({ destination, frameId, source, subFrames: descriptors });
  }
  return createOk(entries);
}

/**
 * Validate a layout document and store every layout in `registry`.
 * Nothing is stored if any layout is invalid.
 *
 * @returns Number of layouts stored.
 */
export function loadLayoutConfig(
  registry: LayoutRegistry,
  json: unknown,
): Result<number, InvalidDescriptorError | InvalidAddressError> {
  const entries = parseLayoutConfig(json);
  if (isErr(entries)) return entries;
  return registry.load(unwrapOk(entries));
}
