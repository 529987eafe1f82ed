import { describe, it, expect } from "vitest";
import { Buffer } from "node:buffer";
import {
  encodeFrame,
  encodeFrameWithLength,
  sizeOfFrame,
  encodePayload,
  encodeRequestStream,
  encodeRequestN,
  encodeCancel,
  encodeError,
  encodeKeepAlive,
  encodeMetadataPush,
  type Frame,
} from "../../../src/frame/framer.js";
import { decodeFrame, frameFlags } from "../../../src/frame/decoder.js";
import {
  FrameType,
  FrameFlags,
  FRAME_HEADER_SIZE,
  MAX_METADATA_LENGTH,
} from "../../../src/frame/constants.js";

const M = FrameFlags.METADATA;
const F = FrameFlags.FOLLOWS;

/** Structured frames with wire-consistent flags */
function sampleFrames(): Frame[] {
  const frames: Frame[] = [];
  const meta = Buffer.from("route:a");
  const data = Buffer.from("body bytes");

  for (const withMetadata of [false, true]) {
    for (const follows of [false, true]) {
      const flags = (withMetadata ? M : 0) | (follows ? F : 0);
      const metadata = withMetadata ? meta : null;
      frames.push(
        { type: FrameType.REQUEST_RESPONSE, streamId: 1, flags, metadata, data },
        { type: FrameType.REQUEST_FNF, streamId: 3, flags, metadata, data },
        { type: FrameType.REQUEST_STREAM, streamId: 5, flags, requestN: 8, metadata, data },
        { type: FrameType.REQUEST_CHANNEL, streamId: 7, flags, requestN: 0, metadata, data },
        {
          type: FrameType.PAYLOAD,
          streamId: 2,
          flags: flags | FrameFlags.NEXT | FrameFlags.COMPLETE,
          metadata,
          data,
        },
      );
    }
  }

  frames.push(
    { type: FrameType.REQUEST_N, streamId: 9, flags: 0, requestN: 0xffffffff },
    { type: FrameType.CANCEL, streamId: 11, flags: 0 },
    { type: FrameType.ERROR, streamId: 0, flags: 0, code: 0x101, data: Buffer.from("bad setup") },
    {
      type: FrameType.KEEPALIVE,
      streamId: 0,
      flags: FrameFlags.RESPOND,
      lastReceivedPosition: 2 ** 40 + 3,
      data: Buffer.alloc(0),
    },
    { type: FrameType.METADATA_PUSH, streamId: 0, flags: M, metadata: Buffer.from("lease") },
    { type: FrameType.SETUP, streamId: 0, flags: 0, body: Buffer.from([0, 1, 0, 0]) },
  );
  return frames;
}

describe("Framer", () => {
  describe("encodeFrame", () => {
    it("should lay out a PAYLOAD frame with metadata", () => {
      const encoded = encodeFrame({
        type: FrameType.PAYLOAD,
        streamId: 7,
        flags: FrameFlags.NEXT,
        metadata: Buffer.from("m"),
        data: Buffer.from("hello"),
      });

      expect(encoded.length).toBe(FRAME_HEADER_SIZE + 3 + 1 + 5);
      expect(encoded.readUInt32BE(0)).toBe(7);
      expect(encoded.readUInt16BE(4)).toBe((FrameType.PAYLOAD << 10) | M | FrameFlags.NEXT);
      expect(encoded.readUIntBE(6, 3)).toBe(1);
      expect(encoded.subarray(9, 10).toString()).toBe("m");
      expect(encoded.subarray(10).toString()).toBe("hello");
    });

    it("should write the initial request count right after the header", () => {
      const encoded = encodeRequestStream(1, 2147483647, Buffer.alloc(0));

      expect(encoded.length).toBe(FRAME_HEADER_SIZE + 4);
      expect(encoded.readUInt32BE(FRAME_HEADER_SIZE)).toBe(2147483647);
    });

    it("should put the request count before the metadata block", () => {
      const encoded = encodeRequestStream(1, 3, Buffer.from("d"), Buffer.from("md"));

      expect(encoded.readUInt32BE(6)).toBe(3);
      expect(encoded.readUIntBE(10, 3)).toBe(2);
      expect(encoded.subarray(13, 15).toString()).toBe("md");
      expect(encoded.subarray(15).toString()).toBe("d");
    });

    it("should derive the METADATA flag from the metadata field", () => {
      const withoutMetadata = encodeFrame({
        type: FrameType.PAYLOAD,
        streamId: 3,
        flags: M | FrameFlags.NEXT,
        metadata: null,
        data: Buffer.from("x"),
      });
      expect(frameFlags(withoutMetadata)).toBe(FrameFlags.NEXT);

      const withEmptyMetadata = encodePayload(3, Buffer.from("x"), Buffer.alloc(0));
      expect(frameFlags(withEmptyMetadata)).toBe(FrameFlags.NEXT | M);
      expect(withEmptyMetadata.length).toBe(FRAME_HEADER_SIZE + 3 + 1);
    });

    it("should encode bare REQUEST_N and CANCEL frames", () => {
      const requestN = encodeRequestN(5, 128);
      expect(requestN.length).toBe(10);
      expect(requestN.readUInt32BE(6)).toBe(128);

      expect(encodeCancel(5).length).toBe(FRAME_HEADER_SIZE);
    });

    it("should encode ERROR, KEEPALIVE and METADATA_PUSH", () => {
      const error = encodeError(1, 0x201, "boom");
      expect(error.readUInt32BE(6)).toBe(0x201);
      expect(error.subarray(10).toString()).toBe("boom");

      const keepAlive = encodeKeepAlive(0x100000001, Buffer.from("k"), true);
      expect(keepAlive.readUInt32BE(6)).toBe(1);
      expect(keepAlive.readUInt32BE(10)).toBe(1);
      expect(frameFlags(keepAlive)).toBe(FrameFlags.RESPOND);

      const push = encodeMetadataPush(Buffer.from("abc"));
      expect(push.readUInt32BE(0)).toBe(0);
      expect(push.readUIntBE(6, 3)).toBe(3);
      expect(push.length).toBe(12);
    });

    it("should reject out-of-range fields", () => {
      expect(() => encodeRequestN(1, -1)).toThrow(RangeError);
      expect(() => encodeRequestN(1, 0x100000000)).toThrow(RangeError);
      expect(() => encodeError(1, 2 ** 32, "x")).toThrow(RangeError);
      expect(() => encodeKeepAlive(-1)).toThrow(RangeError);
      expect(() => encodePayload(-1, Buffer.alloc(0))).toThrow(RangeError);
      expect(() =>
        encodePayload(1, Buffer.alloc(0), Buffer.alloc(MAX_METADATA_LENGTH + 1)),
      ).toThrow(RangeError);
    });

    it("should reject stream ids outside the type's scope", () => {
      expect(() =>
        encodeFrame({
          type: FrameType.METADATA_PUSH,
          streamId: 1,
          flags: 0,
          metadata: Buffer.from("x"),
        }),
      ).toThrow(RangeError);
      expect(() => encodeCancel(0)).toThrow(RangeError);
    });
  });

  describe("sizeOfFrame", () => {
    it("should match the encoded length", () => {
      for (const frame of sampleFrames()) {
        expect(sizeOfFrame(frame)).toBe(encodeFrame(frame).length);
      }
    });
  });

  describe("encodeFrameWithLength", () => {
    it("should prefix the frame with its 24-bit length", () => {
      const frame: Frame = {
        type: FrameType.PAYLOAD,
        streamId: 7,
        flags: 0,
        metadata: null,
        data: Buffer.from("hello"),
      };
      const prefixed = encodeFrameWithLength(frame);

      expect(prefixed.readUIntBE(0, 3)).toBe(11);
      expect(prefixed.subarray(3).equals(encodeFrame(frame))).toBe(true);
    });
  });

  describe("round trip", () => {
    it("should decode every encoded frame to an equal value", () => {
      for (const frame of sampleFrames()) {
        expect(decodeFrame(encodeFrame(frame))).toEqual(frame);
      }
    });
  });
});
