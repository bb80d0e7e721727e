/**
 * Frame identifier metadata and classification.
 *
 * A PROFINET IO frame identifier is a 16-bit value. A handful of values carry
 * a fixed name; the rest are classified by numeric range into real-time
 * transport classes.
 */

/** Frame identifiers with a fixed name. */
export const PNIO_FRAME_IDS = {
  0x0020: "PTCP-RTSyncPDU-followup",
  0x0080: "PTCP-RTSyncPDU",
  0xfc01: "Alarm High",
  0xfe01: "Alarm Low",
  0xfefc: "DCP-Hello-Req",
  0xfefd: "DCP-Get-Set",
  0xfefe: "DCP-Identify-ReqPDU",
  0xfeff: "DCP-Identify-ResPDU",
  0xff00: "PTCP-AnnouncePDU",
  0xff20: "PTCP-FollowUpPDU",
  0xff40: "PTCP-DelayReqPDU",
  0xff41: "PTCP-DelayResPDU-followup",
  0xff42: "PTCP-DelayFuResPDU",
  0xff43: "PTCP-DelayResPDU",
} as const satisfies Record<number, string>;

/** Union of the fixed frame names. */
export type FrameIdName = (typeof PNIO_FRAME_IDS)[keyof typeof PNIO_FRAME_IDS];

/** Tags of the range-based transport classes. */
export type FrameIdRangeTag =
  | "RT_CLASS_3"
  | "RT_CLASS_1"
  | "RT_CLASS_UDP"
  | "FragmentationFrameID";

interface FrameIdRange {
  tag: FrameIdRangeTag;
  /** Inclusive lower bound. */
  start: number;
  /** Exclusive upper bound. */
  end: number;
}

/** Range table in classification order. */
export const FRAME_ID_RANGES: readonly FrameIdRange[] = [
  { end: 0x1000, start: 0x0100, tag: "RT_CLASS_3" },
  { end: 0xc000, start: 0x8000, tag: "RT_CLASS_1" },
  { end: 0xfc00, start: 0xc000, tag: "RT_CLASS_UDP" },
  { end: 0xff90, start: 0xff80, tag: "FragmentationFrameID" },
];

/** Result of {@link classifyFrameId}. */
export type FrameIdClass =
  | { kind: "named"; id: number; name: FrameIdName }
  | { kind: "range"; id: number; tag: FrameIdRangeTag }
  | { kind: "raw"; id: number };

const NAME_BY_ID = new Map<number, FrameIdName>(
  Object.entries(PNIO_FRAME_IDS).map(([id, name]) => [Number(id), name]),
);

const ID_BY_NAME = new Map<string, number>(
  Array.from(NAME_BY_ID, ([id, name]) => [name, id]),
);

/**
 * Classify a frame identifier.
 *
 * Named identifiers win over ranges; anything else is returned as raw.
 */
export function classifyFrameId(id: number): FrameIdClass {
  const name = NAME_BY_ID.get(id);
  if (name !== undefined) {
    return { id, kind: "named", name };
  }
  for (const range of FRAME_ID_RANGES) {
    if (range.start <= id && id < range.end) {
      return { id, kind: "range", tag: range.tag };
    }
  }
  return { id, kind: "raw" };
}

/**
 * Turn a frame name or range tag back into an identifier.
 *
 * Range tags resolve to the lowest identifier of their range. Anything
 * unrecognised is returned unchanged; use {@link isKnownFrameIdName} first
 * when that must be an error.
 */
export function resolveFrameId(value: string): number | string {
  const named = ID_BY_NAME.get(value);
  if (named !== undefined) return named;
  const range = FRAME_ID_RANGES.find((r) => r.tag === value);
  return range ? range.start : value;
}

/** True for fixed frame names and range tags accepted by {@link resolveFrameId}. */
export function isKnownFrameIdName(value: string): boolean {
  return ID_BY_NAME.has(value) || FRAME_ID_RANGES.some((r) => r.tag === value);
}

/**
 * Display string for a frame identifier, e.g. `"RT_CLASS_1 (8000)"`.
 */
export function formatFrameId(id: number): string {
  const cls = classifyFrameId(id);
  switch (cls.kind) {
    case "named":
      return cls.name;
    case "range":
      return `${cls.tag} (${id.toString(16).padStart(4, "0")})`;
    case "raw":
      return `0x${id.toString(16).padStart(4, "0")}`;
  }
}

const RTC_RANGE_TAGS: ReadonlySet<FrameIdRangeTag> = new Set<FrameIdRangeTag>([
  "RT_CLASS_3",
  "RT_CLASS_1",
  "RT_CLASS_UDP",
]);

/**
 * True when frames with this identifier carry a cyclic real-time PDU
 * (RT_CLASS_3, RT_CLASS_1 or RT_CLASS_UDP).
 */
export function isRtcFrameId(id: number): boolean {
  return FRAME_ID_RANGES.some(
    (range) => RTC_RANGE_TAGS.has(range.tag) && range.start <= id && id < range.end,
  );
}

/** True for an integer in 0..0xFFFF. */
export function isFrameId(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0xffff;
}
