/**
 * Named 8-bit flag sets.
 *
 * Flag names are listed least significant bit first, so `names[0]` is
 * bit 0 (0x01) and `names[7]` is bit 7 (0x80). A decoded flag set holds
 * the names of the bits that are set.
 */

export type FlagSet<N extends string> = ReadonlySet<N>;

/** APDU data status bits. */
export const DATA_STATUS_FLAGS = [
  "primary",
  "redundancy",
  "validData",
  "reserved1",
  "run",
  "noProblem",
  "reserved2",
  "ignore",
] as const;

export type DataStatusFlag = (typeof DATA_STATUS_FLAGS)[number];
export type DataStatus = FlagSet<DataStatusFlag>;

/**
 * Expand a byte into the names of its set bits.
 */
export function decodeFlags<N extends string>(
  value: number,
  names: readonly N[],
): FlagSet<N> {
  return new Set(names.filter((_, bit) => (value & (1 << bit)) !== 0));
}

/**
 * Pack named flags into a byte. Names not in `names` are ignored.
 */
export function encodeFlags<N extends string>(
  flags: Iterable<N>,
  names: readonly N[],
): number {
  let value = 0;
  for (const flag of flags) {
    const bit = names.indexOf(flag);
    if (bit !== -1) value |= 1 << bit;
  }
  return value;
}
