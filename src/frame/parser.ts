/**
 * Frame parser for byte-stream transports.
 * Extracts length-prefixed frames from raw transport chunks and decodes them.
 *
 * State machine:
 *   FRAME_LENGTH (wait for 3 bytes) → FRAME_BODY (wait for length bytes) → loop
 */
import { Buffer } from "node:buffer";
import { EventEmitter } from "node:events";
import { FRAME_LENGTH_SIZE, DEFAULT_MAX_FRAME_SIZE } from "./constants.js";
import { decodeFrame } from "./decoder.js";
import { MalformedFrameError } from "./errors.js";
import type { Frame } from "./framer.js";

const enum ParserState {
  FRAME_LENGTH,
  FRAME_BODY,
}

/**
 * Feed raw data via feed(), receive decoded frames via the 'frame' event.
 *
 * The first failure (oversized frame or undecodable frame) is emitted once
 * as 'error'; the parser ignores all input after that. Decoded frames hold
 * views into the fed chunks whenever a frame lies within one chunk.
 */
export class FrameParser extends EventEmitter {
  private state: ParserState = ParserState.FRAME_LENGTH;
  private chunks: Buffer[] = [];
  private bufferLength: number = 0;
  private maxFrameSize: number;
  private errored = false;

  private frameLength = 0;

  constructor(maxFrameSize: number = DEFAULT_MAX_FRAME_SIZE) {
    super();
    this.maxFrameSize = maxFrameSize;
  }

  setMaxFrameSize(size: number): void {
    this.maxFrameSize = size;
  }

  /** Bytes received but not yet emitted as a frame */
  get buffered(): number {
    return this.bufferLength;
  }

  /** Feed raw data into the parser */
  feed(data: Buffer | Uint8Array): void {
    if (this.errored) return;
    const buf = Buffer.isBuffer(data)
      ? data
      : Buffer.from(data.buffer, data.byteOffset, data.byteLength);
    if (buf.length === 0) return;

    this.chunks.push(buf);
    this.bufferLength += buf.length;
    this.process();
  }

  private process(): void {
    while (true) {
      if (this.state === ParserState.FRAME_LENGTH) {
        if (this.bufferLength < FRAME_LENGTH_SIZE) return;

        this.frameLength = this.read(FRAME_LENGTH_SIZE).readUIntBE(0, FRAME_LENGTH_SIZE);

        if (this.frameLength > this.maxFrameSize) {
          this.fail(
            new MalformedFrameError(
              `Frame size ${this.frameLength} exceeds maximum ${this.maxFrameSize}`,
            ),
          );
          return;
        }

        this.state = ParserState.FRAME_BODY;
      }

      if (this.state === ParserState.FRAME_BODY) {
        if (this.bufferLength < this.frameLength) return;

        const body = this.read(this.frameLength);
        this.state = ParserState.FRAME_LENGTH;

        let frame: Frame;
        try {
          frame = decodeFrame(body);
        } catch (err) {
          this.fail(err instanceof Error ? err : new Error(String(err)));
          return;
        }
        this.emit("frame", frame);
      }
    }
  }

  private fail(err: Error): void {
    this.errored = true;
    this.chunks = [];
    this.bufferLength = 0;
    console.debug(`[parser] ${err.name}: ${err.message}`);
    this.emit("error", err);
  }

  /**
   * Consume `size` bytes from the chunks queue.
   * Assumes `this.bufferLength >= size`.
   */
  private read(size: number): Buffer {
    if (size === 0) return Buffer.alloc(0);

    // Fast path: a view into the first chunk
    if (this.chunks.length > 0 && this.chunks[0].length >= size) {
      const chunk = this.chunks[0];
      const ret = chunk.subarray(0, size);
      if (chunk.length === size) {
        this.chunks.shift();
      } else {
        this.chunks[0] = chunk.subarray(size);
      }
      this.bufferLength -= size;
      return ret;
    }

    // Slow path: spans multiple chunks
    const ret = Buffer.allocUnsafe(size);
    let copied = 0;
    while (copied < size) {
      const chunk = this.chunks[0];
      const remaining = size - copied;
      const len = Math.min(chunk.length, remaining);
      chunk.copy(ret, copied, 0, len);
      copied += len;
      if (len === chunk.length) {
        this.chunks.shift();
      } else {
        this.chunks[0] = chunk.subarray(len);
      }
    }
    this.bufferLength -= size;
    return ret;
  }
}
