export * from "./constants.ts";
export * from "./dispatcher.ts";
export * from "./errors.ts";
export * from "./flags.ts";
export * from "./frameIds.ts";
export * from "./ioxs.ts";
export * from "./layoutConfig.ts";
export * from "./layoutRegistry.ts";
export * from "./logger.ts";
export * from "./macAddress.ts";
export * from "./profisafe.ts";
export * from "./rtcBuilder.ts";
export * from "./rtcParser.ts";
export * from "./subFrames.ts";
export type * from "./types/rtc.ts";
