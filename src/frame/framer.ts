/**
 * Frame serializer.
 * Encodes typed frame values into their binary wire format.
 *
 * Frame layout:
 *   +-----------------------------------------------+
 *   |         Header (6): stream id, type, flags     |
 *   +-----------------------------------------------+
 *   |   Fixed fields (type-specific, e.g. requestN)  |
 *   +-----------------------------------------------+
 *   | Metadata Length (24) | Metadata   (if METADATA)|
 *   +-----------------------------------------------+
 *   |        Data (remaining bytes, if allowed)      |
 *   +-----------------------------------------------+
 */
import { Buffer } from "node:buffer";
import {
  FrameType,
  FrameFlags,
  FLAGS_MASK,
  FRAME_HEADER_SIZE,
  FRAME_LENGTH_SIZE,
  METADATA_LENGTH_SIZE,
  MAX_REQUEST_N,
  MAX_ERROR_CODE,
  MAX_METADATA_LENGTH,
  MAX_FRAME_LENGTH,
} from "./constants.js";
import { frameTypeInfo, streamScopeAllows } from "./taxonomy.js";
import { writeHeader } from "./header.js";

interface BaseFrame {
  readonly streamId: number;
  readonly flags: number;
}

/** `metadata` is null when the METADATA flag is clear */
interface PayloadFields {
  readonly metadata: Buffer | null;
  readonly data: Buffer;
}

export interface RequestResponseFrame extends BaseFrame, PayloadFields {
  readonly type: FrameType.REQUEST_RESPONSE;
}

export interface RequestFnfFrame extends BaseFrame, PayloadFields {
  readonly type: FrameType.REQUEST_FNF;
}

export interface RequestStreamFrame extends BaseFrame, PayloadFields {
  readonly type: FrameType.REQUEST_STREAM;
  readonly requestN: number;
}

export interface RequestChannelFrame extends BaseFrame, PayloadFields {
  readonly type: FrameType.REQUEST_CHANNEL;
  readonly requestN: number;
}

export interface PayloadFrame extends BaseFrame, PayloadFields {
  readonly type: FrameType.PAYLOAD;
}

export interface RequestNFrame extends BaseFrame {
  readonly type: FrameType.REQUEST_N;
  readonly requestN: number;
}

export interface CancelFrame extends BaseFrame {
  readonly type: FrameType.CANCEL;
}

export interface ErrorFrame extends BaseFrame {
  readonly type: FrameType.ERROR;
  readonly code: number;
  /** UTF-8 error message */
  readonly data: Buffer;
}

export interface KeepAliveFrame extends BaseFrame {
  readonly type: FrameType.KEEPALIVE;
  readonly lastReceivedPosition: number;
  readonly data: Buffer;
}

export interface MetadataPushFrame extends BaseFrame {
  readonly type: FrameType.METADATA_PUSH;
  readonly metadata: Buffer;
}

/** Connection negotiation frames; the body after the header is not interpreted. */
export interface OpaqueFrame extends BaseFrame {
  readonly type:
    | FrameType.SETUP
    | FrameType.LEASE
    | FrameType.RESUME
    | FrameType.RESUME_OK
    | FrameType.EXT;
  readonly body: Buffer;
}

/** Frames that can be split into a FOLLOWS chain */
export type FragmentableFrame =
  | RequestResponseFrame
  | RequestFnfFrame
  | RequestStreamFrame
  | RequestChannelFrame
  | PayloadFrame;

export type Frame =
  | FragmentableFrame
  | RequestNFrame
  | CancelFrame
  | ErrorFrame
  | KeepAliveFrame
  | MetadataPushFrame
  | OpaqueFrame;

const EMPTY = Buffer.alloc(0);

function checkUInt32(name: string, value: number, max: number): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new RangeError(`Invalid ${name}: ${value}`);
  }
}

/** Metadata carried by a frame, or null */
export function metadataOf(frame: Frame): Buffer | null {
  return "metadata" in frame ? frame.metadata : null;
}

/** Trailing bytes after header, fixed fields and metadata */
export function dataOf(frame: Frame): Buffer {
  if ("data" in frame) return frame.data;
  if ("body" in frame) return frame.body;
  return EMPTY;
}

/**
 * Wire flags for a frame: the METADATA bit follows `metadata`, every other
 * bit is taken from `frame.flags`.
 */
export function wireFlags(frame: Frame): number {
  const flags = frame.flags & FLAGS_MASK;
  if (frameTypeInfo(frame.type).opaque) return flags;
  return metadataOf(frame) !== null
    ? flags | FrameFlags.METADATA
    : flags & ~FrameFlags.METADATA;
}

/** Byte size of the encoded frame, without a length prefix */
export function sizeOfFrame(frame: Frame): number {
  const info = frameTypeInfo(frame.type);
  const metadata = metadataOf(frame);
  return (
    FRAME_HEADER_SIZE +
    info.fixedSize +
    (metadata !== null ? METADATA_LENGTH_SIZE + metadata.length : 0) +
    dataOf(frame).length
  );
}

function writeFixedFields(frame: Frame, buf: Buffer, offset: number): number {
  switch (frame.type) {
    case FrameType.REQUEST_STREAM:
    case FrameType.REQUEST_CHANNEL:
    case FrameType.REQUEST_N:
      checkUInt32("requestN", frame.requestN, MAX_REQUEST_N);
      return buf.writeUInt32BE(frame.requestN, offset);
    case FrameType.ERROR:
      checkUInt32("error code", frame.code, MAX_ERROR_CODE);
      return buf.writeUInt32BE(frame.code, offset);
    case FrameType.KEEPALIVE: {
      const position = frame.lastReceivedPosition;
      if (!Number.isSafeInteger(position) || position < 0) {
        throw new RangeError(`Invalid lastReceivedPosition: ${position}`);
      }
      offset = buf.writeUInt32BE(Math.floor(position / 0x100000000), offset);
      return buf.writeUInt32BE(position % 0x100000000, offset);
    }
    default:
      return offset;
  }
}

/**
 * Write a 3-byte metadata length followed by the metadata bytes.
 * Returns the offset after the block.
 */
export function writeMetadata(buf: Buffer, metadata: Buffer, offset: number): number {
  if (metadata.length > MAX_METADATA_LENGTH) {
    throw new RangeError(
      `Metadata length ${metadata.length} exceeds maximum ${MAX_METADATA_LENGTH}`,
    );
  }
  offset = buf.writeUIntBE(metadata.length, offset, METADATA_LENGTH_SIZE);
  return offset + metadata.copy(buf, offset);
}

/**
 * Encode a frame into its wire format.
 */
export function encodeFrame(frame: Frame): Buffer {
  const info = frameTypeInfo(frame.type);
  if (!streamScopeAllows(info, frame.streamId)) {
    throw new RangeError(`${info.name} frame cannot be sent on stream ${frame.streamId}`);
  }
  const metadata = metadataOf(frame);
  const data = dataOf(frame);
  const buf = Buffer.alloc(sizeOfFrame(frame));

  let offset = writeHeader(buf, frame.streamId, frame.type, wireFlags(frame));
  offset = writeFixedFields(frame, buf, offset);
  if (metadata !== null) {
    offset = writeMetadata(buf, metadata, offset);
  }
  data.copy(buf, offset);

  return buf;
}

/** Encode a frame behind the 3-byte length prefix used on byte streams */
export function encodeFrameWithLength(frame: Frame): Buffer {
  const size = sizeOfFrame(frame);
  if (size > MAX_FRAME_LENGTH) {
    throw new RangeError(`Frame size ${size} exceeds maximum ${MAX_FRAME_LENGTH}`);
  }
  const encoded = encodeFrame(frame);
  const buf = Buffer.alloc(FRAME_LENGTH_SIZE + size);
  buf.writeUIntBE(size, 0, FRAME_LENGTH_SIZE);
  encoded.copy(buf, FRAME_LENGTH_SIZE);
  return buf;
}

/** Encode a PAYLOAD frame */
export function encodePayload(
  streamId: number,
  data: Buffer,
  metadata: Buffer | null = null,
  flags: number = FrameFlags.NEXT,
): Buffer {
  return encodeFrame({ type: FrameType.PAYLOAD, streamId, flags, metadata, data });
}

/** Encode a REQUEST_STREAM frame */
export function encodeRequestStream(
  streamId: number,
  requestN: number,
  data: Buffer,
  metadata: Buffer | null = null,
): Buffer {
  return encodeFrame({
    type: FrameType.REQUEST_STREAM,
    streamId,
    flags: 0,
    requestN,
    metadata,
    data,
  });
}

/** Encode a REQUEST_N frame */
export function encodeRequestN(streamId: number, requestN: number): Buffer {
  return encodeFrame({ type: FrameType.REQUEST_N, streamId, flags: 0, requestN });
}

/** Encode a CANCEL frame */
export function encodeCancel(streamId: number): Buffer {
  return encodeFrame({ type: FrameType.CANCEL, streamId, flags: 0 });
}

/** Encode an ERROR frame with a UTF-8 message */
export function encodeError(streamId: number, code: number, message: string): Buffer {
  return encodeFrame({
    type: FrameType.ERROR,
    streamId,
    flags: 0,
    code,
    data: Buffer.from(message, "utf8"),
  });
}

/** Encode a KEEPALIVE frame (always on stream 0) */
export function encodeKeepAlive(
  lastReceivedPosition: number,
  data: Buffer = EMPTY,
  respond = false,
): Buffer {
  return encodeFrame({
    type: FrameType.KEEPALIVE,
    streamId: 0,
    flags: respond ? FrameFlags.RESPOND : 0,
    lastReceivedPosition,
    data,
  });
}

/** Encode a METADATA_PUSH frame (always on stream 0) */
export function encodeMetadataPush(metadata: Buffer): Buffer {
  return encodeFrame({ type: FrameType.METADATA_PUSH, streamId: 0, flags: 0, metadata });
}
