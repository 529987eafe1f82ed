/**
 * Frame decoder and field accessors.
 *
 * Accessors work directly on an encoded frame without building a frame
 * object. Every Buffer returned here (metadata, data, body) is a view into
 * the input buffer, not a copy: it is only valid while the caller leaves that
 * buffer untouched.
 */
import { Buffer } from "node:buffer";
import {
  FrameType,
  FRAME_HEADER_SIZE,
  METADATA_LENGTH_SIZE,
} from "./constants.js";
import {
  MalformedFrameError,
  UnknownFrameTypeError,
  InconsistentPayloadSizeError,
  NoMetadataPresentError,
  DataNotSupportedError,
  RequestNNotSupportedError,
} from "./errors.js";
import { resolveFrameType, streamScopeAllows, type FrameTypeInfo } from "./taxonomy.js";
import { decodeHeader, hasMetadata, type FrameHeader } from "./header.js";
import type { Frame, ErrorFrame } from "./framer.js";

/** Offsets of the optional sections of one encoded frame */
export interface FrameLayout {
  readonly header: FrameHeader;
  readonly info: FrameTypeInfo;
  /** -1 when the METADATA flag is clear */
  readonly metadataOffset: number;
  readonly metadataLength: number;
  readonly dataOffset: number;
  readonly dataLength: number;
}

/**
 * Validate an encoded frame and locate its sections.
 *
 * dataLength = total - header - fixed fields - (METADATA ? 3 + metadataLength : 0)
 * must come out non-negative, and zero for types that carry no data.
 */
export function frameLayout(buf: Buffer): FrameLayout {
  const header = decodeHeader(buf);
  const info = resolveFrameType(header.type);

  if (!streamScopeAllows(info, header.streamId)) {
    throw new MalformedFrameError(
      `${info.name} frame not allowed on stream ${header.streamId}`,
    );
  }

  if (info.opaque) {
    return {
      header,
      info,
      metadataOffset: -1,
      metadataLength: 0,
      dataOffset: FRAME_HEADER_SIZE,
      dataLength: buf.length - FRAME_HEADER_SIZE,
    };
  }

  let offset = FRAME_HEADER_SIZE + info.fixedSize;
  if (buf.length < offset) {
    throw new InconsistentPayloadSizeError(
      `${info.name} frame truncated: expected at least ${offset} bytes, got ${buf.length}`,
    );
  }

  let metadataOffset = -1;
  let metadataLength = 0;
  if (hasMetadata(header)) {
    if (!info.canHaveMetadata) {
      throw new MalformedFrameError(`${info.name} frame cannot carry metadata`);
    }
    if (buf.length < offset + METADATA_LENGTH_SIZE) {
      throw new InconsistentPayloadSizeError(
        `${info.name} frame truncated inside metadata length`,
      );
    }
    metadataLength = buf.readUIntBE(offset, METADATA_LENGTH_SIZE);
    metadataOffset = offset + METADATA_LENGTH_SIZE;
    offset = metadataOffset + metadataLength;
  }

  const dataLength =
    buf.length -
    FRAME_HEADER_SIZE -
    info.fixedSize -
    (metadataOffset >= 0 ? METADATA_LENGTH_SIZE + metadataLength : 0);

  if (dataLength < 0) {
    throw new InconsistentPayloadSizeError(
      `${info.name} frame metadata length ${metadataLength} exceeds remaining ${
        buf.length - metadataOffset
      } bytes`,
    );
  }
  if (!info.canHaveData && dataLength !== 0) {
    throw new InconsistentPayloadSizeError(
      `${info.name} frame has ${dataLength} unexpected trailing bytes`,
    );
  }

  return { header, info, metadataOffset, metadataLength, dataOffset: offset, dataLength };
}

export function frameStreamId(buf: Buffer): number {
  return decodeHeader(buf).streamId;
}

export function frameTypeOf(buf: Buffer): FrameType {
  return decodeHeader(buf).type;
}

export function frameFlags(buf: Buffer): number {
  return decodeHeader(buf).flags;
}

/** Metadata view. Throws NoMetadataPresentError when the flag is clear. */
export function readMetadata(buf: Buffer): Buffer {
  const layout = frameLayout(buf);
  if (layout.metadataOffset < 0) {
    throw new NoMetadataPresentError(layout.info.name);
  }
  return buf.subarray(layout.metadataOffset, layout.metadataOffset + layout.metadataLength);
}

/** Data view, possibly empty. Throws DataNotSupportedError for types without data. */
export function readData(buf: Buffer): Buffer {
  const layout = frameLayout(buf);
  if (!layout.info.canHaveData) {
    throw new DataNotSupportedError(layout.info.name);
  }
  return buf.subarray(layout.dataOffset, layout.dataOffset + layout.dataLength);
}

/**
 * Initial request count (REQUEST_STREAM, REQUEST_CHANNEL) or the count of a
 * REQUEST_N frame.
 */
export function readRequestN(buf: Buffer): number {
  const layout = frameLayout(buf);
  if (!layout.info.hasRequestN) {
    throw new RequestNNotSupportedError(layout.info.name);
  }
  return buf.readUInt32BE(FRAME_HEADER_SIZE);
}

/** Length of the data section without materializing it */
export function payloadSize(buf: Buffer): number {
  return frameLayout(buf).dataLength;
}

function readPosition(buf: Buffer, offset: number): number {
  const high = buf.readUInt32BE(offset);
  const low = buf.readUInt32BE(offset + 4);
  const position = high * 0x100000000 + low;
  if (!Number.isSafeInteger(position)) {
    throw new MalformedFrameError(`KEEPALIVE position exceeds 2^53-1`);
  }
  return position;
}

/**
 * Decode one complete frame (no length prefix).
 * Throws MalformedFrameError or InconsistentPayloadSizeError on bad input.
 */
export function decodeFrame(buf: Buffer): Frame {
  const layout = frameLayout(buf);
  const { streamId, flags } = layout.header;
  const metadata =
    layout.metadataOffset >= 0
      ? buf.subarray(layout.metadataOffset, layout.metadataOffset + layout.metadataLength)
      : null;
  const data = buf.subarray(layout.dataOffset, layout.dataOffset + layout.dataLength);

  const type = layout.header.type;
  switch (type) {
    case FrameType.REQUEST_RESPONSE:
    case FrameType.REQUEST_FNF:
    case FrameType.PAYLOAD:
      return { type, streamId, flags, metadata, data };
    case FrameType.REQUEST_STREAM:
    case FrameType.REQUEST_CHANNEL:
      return {
        type,
        streamId,
        flags,
        requestN: buf.readUInt32BE(FRAME_HEADER_SIZE),
        metadata,
        data,
      };
    case FrameType.REQUEST_N:
      return { type, streamId, flags, requestN: buf.readUInt32BE(FRAME_HEADER_SIZE) };
    case FrameType.CANCEL:
      return { type, streamId, flags };
    case FrameType.ERROR:
      return { type, streamId, flags, code: buf.readUInt32BE(FRAME_HEADER_SIZE), data };
    case FrameType.KEEPALIVE:
      return {
        type,
        streamId,
        flags,
        lastReceivedPosition: readPosition(buf, FRAME_HEADER_SIZE),
        data,
      };
    case FrameType.METADATA_PUSH:
      if (metadata === null) {
        throw new MalformedFrameError("METADATA_PUSH frame without METADATA flag");
      }
      return { type, streamId, flags, metadata };
    case FrameType.SETUP:
    case FrameType.LEASE:
    case FrameType.RESUME:
    case FrameType.RESUME_OK:
    case FrameType.EXT:
      return { type, streamId, flags, body: data };
    case FrameType.RESERVED:
      throw new UnknownFrameTypeError(type);
  }
}

/** Error message of an ERROR frame */
export function errorMessage(frame: ErrorFrame): string {
  return frame.data.toString("utf8");
}
