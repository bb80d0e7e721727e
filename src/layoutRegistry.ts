/**
 * Registry of per-flow RTC sub-frame layouts.
 *
 * The layout of a cyclic PDU is not on the wire; it is agreed out of band
 * for each (source MAC, destination MAC, frame identifier) tuple. Stored
 * layouts are frozen and replaced as a whole, and every lookup hands out a
 * fresh copy, so a decoder may consume its copy freely.
 */

import {
  createErr,
  createOk,
  isErr,
  type Result,
  unwrapErr,
  unwrapOk,
} from "option-t/plain_result";
import { type InvalidAddressError, InvalidDescriptorError } from "./errors.ts";
import { formatFrameId, isFrameId } from "./frameIds.ts";
import { silentLogger } from "./logger.ts";
import { parseMacAddress, type MacAddress, type MacAddressInput } from "./macAddress.ts";
import {
  cloneDescriptors,
  type SubFrameDescriptor,
  validateDescriptor,
} from "./subFrames.ts";
import type { CodecLogger } from "./types/rtc.ts";

/** Flow tuple a layout is registered under. */
export interface LayoutKey {
  source: MacAddressInput;
  destination: MacAddressInput;
  frameId: number;
}

/** A registered layout together with its canonical key. */
export interface LayoutEntry {
  source: MacAddress;
  destination: MacAddress;
  frameId: number;
  subFrames: SubFrameDescriptor[];
}

export interface LayoutRegistryOptions {
  logger?: CodecLogger;
}

type RegistryError = InvalidAddressError | InvalidDescriptorError;

interface CanonicalKey {
  id: string;
  source: MacAddress;
  destination: MacAddress;
  frameId: number;
}

function canonicalKey(key: LayoutKey): Result<CanonicalKey, RegistryError> {
  const source = parseMacAddress(key.source);
  if (isErr(source)) return source;
  const destination = parseMacAddress(key.destination);
  if (isErr(destination)) return destination;
  if (!isFrameId(key.frameId)) {
    return createErr(
      new InvalidDescriptorError(`frame identifier must be 0-0xffff, got ${key.frameId}`),
    );
  }
  const src = unwrapOk(source);
  const dst = unwrapOk(destination);
  return createOk({
    destination: dst,
    frameId: key.frameId,
    id: `${src}>${dst}#${key.frameId}`,
    source: src,
  });
}

/**
 * Canonical string form of a layout key.
 */
export function layoutKey(key: LayoutKey): Result<string, RegistryError> {
  const k = canonicalKey(key);
  if (isErr(k)) return k;
  return createOk(unwrapOk(k).id);
}

interface StoredLayout {
  source: MacAddress;
  destination: MacAddress;
  frameId: number;
  subFrames: readonly Readonly<SubFrameDescriptor>[];
}

export class LayoutRegistry {
  #layouts = new Map<string, StoredLayout>();
  #logger: CodecLogger;

  constructor(options: LayoutRegistryOptions = {}) {
    this.#logger = options.logger ?? silentLogger;
  }

  /** Number of registered layouts. */
  get size(): number {
    return this.#layouts.size;
  }

  /**
   * Copy of the layout registered for `key`, or undefined.
   * Unparseable keys simply have no layout.
   */
  lookup(key: LayoutKey): SubFrameDescriptor[] | undefined {
    const k = layoutKey(key);
    if (isErr(k)) return undefined;
    const stored = this.#layouts.get(unwrapOk(k));
    return stored ? cloneDescriptors(stored.subFrames) : undefined;
  }

  has(key: LayoutKey): boolean {
    const k = layoutKey(key);
    return !isErr(k) && this.#layouts.has(unwrapOk(k));
  }

  /**
   * Register (or replace) the layout for `key`. Every descriptor is checked
   * first; on failure the registry is left untouched.
   */
  set(
    key: LayoutKey,
    subFrames: readonly SubFrameDescriptor[],
  ): Result<void, RegistryError> {
    const prepared = this.#prepare(key, subFrames);
    if (isErr(prepared)) {
      this.#logger.warn(
        `LayoutRegistry: rejected layout: ${unwrapErr(prepared).message}`,
      );
      return prepared;
    }
    const [k, stored] = unwrapOk(prepared);
    this.#layouts.set(k, stored);
    return createOk(undefined);
  }

  /**
   * Register several layouts at once. Nothing is stored unless every entry
   * is valid.
   */
  load(
    entries: readonly (LayoutKey & { subFrames: readonly SubFrameDescriptor[] })[],
  ): Result<number, RegistryError> {
    const prepared: [string, StoredLayout][] = [];
    for (const entry of entries) {
      const result = this.#prepare(entry, entry.subFrames);
      if (isErr(result)) {
        this.#logger.warn(
          `LayoutRegistry: rejected layout set: ${unwrapErr(result).message}`,
        );
        return result;
      }
      prepared.push(unwrapOk(result));
    }
    for (const [k, stored] of prepared) {
      this.#layouts.set(k, stored);
    }
    return createOk(prepared.length);
  }

  delete(key: LayoutKey): boolean {
    const k = layoutKey(key);
    return !isErr(k) && this.#layouts.delete(unwrapOk(k));
  }

  clear(): void {
    this.#layouts.clear();
  }

  /** Copies of every registered layout. */
  entries(): LayoutEntry[] {
    return Array.from(this.#layouts.values(), (stored) => ({
      destination: stored.destination,
      frameId: stored.frameId,
      source: stored.source,
      subFrames: cloneDescriptors(stored.subFrames),
    }));
  }

  #prepare(
    key: LayoutKey,
    subFrames: readonly SubFrameDescriptor[],
  ): Result<[string, StoredLayout], RegistryError> {
    const canonical = canonicalKey(key);
    if (isErr(canonical)) return canonical;
    const { id, source, destination, frameId } = unwrapOk(canonical);
    for (const [index, descriptor] of subFrames.entries()) {
      const valid = validateDescriptor(descriptor);
      if (isErr(valid)) {
        this.#logger.debug(
          `LayoutRegistry: ${formatFrameId(frameId)} sub-frame ${index} is invalid`,
        );
        return valid;
      }
    }
    const stored: StoredLayout = Object.freeze({
      destination,
      frameId,
      source,
      subFrames: Object.freeze(cloneDescriptors(subFrames).map((d) => Object.freeze(d))),
    });
    const entry: [string, StoredLayout] = [id, stored];
    return createOk(entry);
  }
}

/** Process-wide registry used when a codec call is not given one. */
export const defaultLayoutRegistry = new LayoutRegistry();
