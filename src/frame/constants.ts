/**
 * Multiplexed frame protocol constants.
 */

/** Frame types (6-bit type code in the header) */
export enum FrameType {
  RESERVED = 0x00,
  SETUP = 0x01,
  LEASE = 0x02,
  KEEPALIVE = 0x03,
  REQUEST_RESPONSE = 0x04,
  REQUEST_FNF = 0x05,
  REQUEST_STREAM = 0x06,
  REQUEST_CHANNEL = 0x07,
  REQUEST_N = 0x08,
  CANCEL = 0x09,
  PAYLOAD = 0x0a,
  ERROR = 0x0b,
  METADATA_PUSH = 0x0c,
  RESUME = 0x0d,
  RESUME_OK = 0x0e,
  EXT = 0x3f,
}

/** Frame flags (10 bits) */
export const FrameFlags = {
  NONE: 0x000,
  NEXT: 0x020,
  COMPLETE: 0x040,
  LEASE: 0x040, // same bit as COMPLETE, SETUP only
  FOLLOWS: 0x080,
  RESPOND: 0x080, // same bit as FOLLOWS, KEEPALIVE only
  RESUME_ENABLE: 0x080, // same bit as FOLLOWS, SETUP only
  METADATA: 0x100,
  IGNORE: 0x200,
} as const;

export const FLAGS_MASK = 0x3ff;
export const FRAME_TYPE_SHIFT = 10;

/** Frame header size in bytes: stream id (4) + type and flags (2) */
export const FRAME_HEADER_SIZE = 6;

/** Length prefix used by byte-stream transports */
export const FRAME_LENGTH_SIZE = 3;

export const METADATA_LENGTH_SIZE = 3;
export const REQUEST_N_SIZE = 4;
export const ERROR_CODE_SIZE = 4;
export const KEEPALIVE_POSITION_SIZE = 8;

/** Value limits */
export const MAX_STREAM_ID = 0x7fffffff; // uint31
export const MAX_REQUEST_N = 0xffffffff; // uint32
export const MAX_ERROR_CODE = 0xffffffff; // uint32
export const MAX_METADATA_LENGTH = 0xffffff; // uint24
export const MAX_FRAME_LENGTH = 0xffffff; // uint24

/** Default values */
export const DEFAULT_MAX_FRAME_SIZE = MAX_FRAME_LENGTH;

/** Smallest budget fragmentFrame() accepts per fragment */
export const MIN_FRAGMENT_SIZE = 64;
