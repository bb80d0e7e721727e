import type { CodecLogger } from "./types/rtc.ts";

/** Default codec logger: drops everything. Pass `console` to see messages. */
export const silentLogger: CodecLogger = {
  debug: () => undefined,
  warn: () => undefined,
};
