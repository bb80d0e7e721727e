/**
 * Protocol constants shared by the PROFINET IO codecs.
 */

/** EtherType carrying PROFINET IO frames. */
export const PROFINET_ETHERTYPE = 0x8892;

/** UDP destination port carrying PROFINET IO frames (RT_CLASS_UDP). */
export const PROFINET_UDP_PORT = 0x8892;

/** Hard ceiling for one RTC PDU (C_SDU + padding + APDU status). */
export const RTC_MAX_PDU_LENGTH = 1440;

/** Maximum RTC padding on a direct Ethernet link. */
export const RTC_MAX_PADDING = 40;

/** Maximum RTC padding when the PDU is carried over UDP. */
export const RTC_UDP_MAX_PADDING = 12;

// cycleCounter(2) + dataStatus(1) + transferStatus(1)
export const APDU_STATUS_LENGTH = 4;

/** primary | validData | run | noProblem */
export const DEFAULT_DATA_STATUS = 0x35;

/** Length of the frame identifier that prefixes every PROFINET IO payload. */
export const FRAME_ID_LENGTH = 2;
