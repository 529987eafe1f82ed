/**
 * Frame header codec.
 *
 * Header layout (6 bytes, big-endian):
 *   +-+-------------------------------------------------------------+
 *   |R|                    Stream Identifier (31)                   |
 *   +-+---------+---------------------------------------------------+
 *   | Type (6)  |     Flags (10)    |
 *   +-----------+-------------------+
 */
import { Buffer } from "node:buffer";
import {
  FrameType,
  FrameFlags,
  FLAGS_MASK,
  FRAME_TYPE_SHIFT,
  FRAME_HEADER_SIZE,
} from "./constants.js";
import { MalformedFrameError } from "./errors.js";
import { resolveFrameType } from "./taxonomy.js";
import { isValidStreamId } from "./stream-id.js";

export interface FrameHeader {
  readonly streamId: number;
  readonly type: FrameType;
  readonly flags: number;
}

/**
 * Write a header into `buf` at `offset` and return the offset after it.
 */
export function writeHeader(
  buf: Buffer,
  streamId: number,
  type: FrameType,
  flags: number,
  offset = 0,
): number {
  if (!isValidStreamId(streamId)) {
    throw new RangeError(`Invalid stream id: ${streamId}`);
  }
  resolveFrameType(type);

  // Stream ID (31 bits, R bit = 0)
  buf.writeUInt32BE(streamId, offset);
  buf.writeUInt16BE((type << FRAME_TYPE_SHIFT) | (flags & FLAGS_MASK), offset + 4);
  return offset + FRAME_HEADER_SIZE;
}

/** Encode a standalone 6-byte header */
export function encodeHeader(streamId: number, type: FrameType, flags: number): Buffer {
  const buf = Buffer.alloc(FRAME_HEADER_SIZE);
  writeHeader(buf, streamId, type, flags);
  return buf;
}

/**
 * Read the header at the start of `buf`.
 * Throws MalformedFrameError if the buffer is too short or the type code is
 * unknown (as UnknownFrameTypeError).
 */
export function decodeHeader(buf: Buffer): FrameHeader {
  if (buf.length < FRAME_HEADER_SIZE) {
    throw new MalformedFrameError(
      `Frame too short: expected at least ${FRAME_HEADER_SIZE} bytes, got ${buf.length}`,
    );
  }

  const streamId = buf.readUInt32BE(0) & 0x7fffffff;
  const typeAndFlags = buf.readUInt16BE(4);
  const info = resolveFrameType(typeAndFlags >>> FRAME_TYPE_SHIFT);

  return { streamId, type: info.type, flags: typeAndFlags & FLAGS_MASK };
}

export function hasMetadata(header: Pick<FrameHeader, "flags">): boolean {
  return (header.flags & FrameFlags.METADATA) !== 0;
}

export function hasFollows(header: Pick<FrameHeader, "flags">): boolean {
  return (header.flags & FrameFlags.FOLLOWS) !== 0;
}

export function hasComplete(header: Pick<FrameHeader, "flags">): boolean {
  return (header.flags & FrameFlags.COMPLETE) !== 0;
}

export function hasNext(header: Pick<FrameHeader, "flags">): boolean {
  return (header.flags & FrameFlags.NEXT) !== 0;
}

export function hasIgnore(header: Pick<FrameHeader, "flags">): boolean {
  return (header.flags & FrameFlags.IGNORE) !== 0;
}
