/**
 * Fragmentation: splitting one logical message into a FOLLOWS chain and
 * reassembling chains per stream.
 *
 * A chain is the first frame (carrying the type's fixed fields) followed by
 * PAYLOAD continuations on the same stream id. Every fragment but the last
 * has FOLLOWS set. Each fragment holds a contiguous slice of metadata, then
 * data.
 */
import { Buffer } from "node:buffer";
import {
  FrameType,
  FrameFlags,
  FRAME_HEADER_SIZE,
  MAX_FRAME_LENGTH,
  METADATA_LENGTH_SIZE,
  MIN_FRAGMENT_SIZE,
} from "./constants.js";
import {
  MalformedFrameError,
  InterleavedFragmentsError,
  IncompleteFragmentChainError,
  MessageTooLargeError,
} from "./errors.js";
import { frameTypeInfo } from "./taxonomy.js";
import { hasFollows } from "./header.js";
import { encodeFrame, sizeOfFrame, type Frame, type FragmentableFrame } from "./framer.js";

export function isFragmentableFrame(frame: Frame): frame is FragmentableFrame {
  return frameTypeInfo(frame.type).fragmentable;
}

/**
 * Encode `frame` as one or more frames of at most `maxFrameSize` bytes each
 * (length prefix not counted). A frame that fits is returned as a single
 * encoding. `maxFrameSize` must lie in [MIN_FRAGMENT_SIZE, MAX_FRAME_LENGTH].
 */
export function fragmentFrame(frame: Frame, maxFrameSize: number): Buffer[] {
  if (
    !Number.isInteger(maxFrameSize) ||
    maxFrameSize < MIN_FRAGMENT_SIZE ||
    maxFrameSize > MAX_FRAME_LENGTH
  ) {
    throw new RangeError(
      `Fragment size must be an integer in [${MIN_FRAGMENT_SIZE}, ${MAX_FRAME_LENGTH}], got ${maxFrameSize}`,
    );
  }

  const size = sizeOfFrame(frame);
  if (size <= maxFrameSize) {
    return [encodeFrame(frame)];
  }
  if (!isFragmentableFrame(frame)) {
    throw new RangeError(
      `${frameTypeInfo(frame.type).name} frame of ${size} bytes exceeds ${maxFrameSize} and cannot be fragmented`,
    );
  }

  const complete = (frame.flags & FrameFlags.COMPLETE) !== 0;
  const fixedFlags = frame.flags & ~(FrameFlags.FOLLOWS | FrameFlags.COMPLETE);
  const fixedSize = frameTypeInfo(frame.type).fixedSize;
  const fragments: Buffer[] = [];

  let metadata = frame.metadata;
  let data = frame.data;
  let first = true;

  while (first || (metadata !== null && metadata.length > 0) || data.length > 0) {
    let budget = maxFrameSize - FRAME_HEADER_SIZE - (first ? fixedSize : 0);

    let metadataSlice: Buffer | null = null;
    if (metadata !== null && (first || metadata.length > 0)) {
      budget -= METADATA_LENGTH_SIZE;
      metadataSlice = metadata.subarray(0, Math.min(metadata.length, budget));
      metadata = metadata.subarray(metadataSlice.length);
      budget -= metadataSlice.length;
    }

    const dataSlice = data.subarray(0, Math.min(data.length, budget));
    data = data.subarray(dataSlice.length);

    const last = (metadata === null || metadata.length === 0) && data.length === 0;
    let flags = first ? fixedFlags : FrameFlags.NEXT;
    if (!last) flags |= FrameFlags.FOLLOWS;
    if (last && complete) flags |= FrameFlags.COMPLETE;

    const fragment: Frame = first
      ? { ...frame, flags, metadata: metadataSlice, data: dataSlice }
      : {
          type: FrameType.PAYLOAD,
          streamId: frame.streamId,
          flags,
          metadata: metadataSlice,
          data: dataSlice,
        };
    fragments.push(encodeFrame(fragment));
    first = false;
  }

  return fragments;
}

export interface FrameAssemblerOptions {
  /**
   * Whether chains on different streams may be open at the same time.
   * When false, starting a chain (a request or payload frame with FOLLOWS)
   * on another stream while a chain is open fails with
   * InterleavedFragmentsError. Whole frames always pass. Default: true.
   */
  allowInterleaving?: boolean;
  /** Maximum metadata + data bytes of a reassembled message. Default: unlimited. */
  maxMessageSize?: number;
}

interface FragmentChain {
  readonly first: FragmentableFrame;
  readonly metadata: Buffer[];
  readonly data: Buffer[];
  hasMetadata: boolean;
  size: number;
}

/**
 * Per-connection reassembly of FOLLOWS chains.
 *
 * Frames must be pushed in wire order from a single connection. Buffered
 * fragments keep their views into the decoded input buffers until the chain
 * completes; the assembled frame owns copies.
 */
export class FrameAssembler {
  private readonly chains = new Map<number, FragmentChain>();
  private readonly allowInterleaving: boolean;
  private readonly maxMessageSize: number;

  constructor(options: FrameAssemblerOptions = {}) {
    this.allowInterleaving = options.allowInterleaving ?? true;
    this.maxMessageSize = options.maxMessageSize ?? Infinity;
  }

  /** Stream ids with an open chain, in the order the chains started */
  get pendingStreamIds(): number[] {
    return [...this.chains.keys()];
  }

  /**
   * Feed one decoded frame.
   * Returns the frame (or the reassembled message) when complete, or null
   * while its chain is still open.
   */
  push(frame: Frame): Frame | null {
    const chain = this.chains.get(frame.streamId);

    if (!chain) {
      if (!isFragmentableFrame(frame)) return frame;
      if (!hasFollows(frame)) return frame;
      this.checkInterleaving(frame.streamId);

      const started: FragmentChain = {
        first: frame,
        metadata: [],
        data: [],
        hasMetadata: false,
        size: 0,
      };
      this.append(started, frame);
      this.chains.set(frame.streamId, started);
      return null;
    }

    if (frame.type === FrameType.CANCEL || frame.type === FrameType.ERROR) {
      this.discard(frame.streamId);
      return frame;
    }
    if (frame.type !== FrameType.PAYLOAD) {
      this.chains.delete(frame.streamId);
      throw new MalformedFrameError(
        `Expected PAYLOAD continuation on stream ${frame.streamId}, got ${
          frameTypeInfo(frame.type).name
        }`,
      );
    }

    this.append(chain, frame);
    if (hasFollows(frame)) return null;

    this.chains.delete(frame.streamId);
    return this.assemble(chain, frame);
  }

  /**
   * Drop the open chain of a stream (e.g. on cancellation).
   * Returns whether a chain was open.
   */
  discard(streamId: number): boolean {
    const chain = this.chains.get(streamId);
    if (!chain) return false;
    this.chains.delete(streamId);
    console.debug(
      `[fragments] discarded chain on stream ${streamId} (${chain.size} bytes buffered)`,
    );
    return true;
  }

  /**
   * Release all state at connection end.
   * Throws IncompleteFragmentChainError if any chain was still open.
   */
  close(): void {
    const open = this.pendingStreamIds;
    this.chains.clear();
    if (open.length > 0) {
      throw new IncompleteFragmentChainError(open);
    }
  }

  private checkInterleaving(streamId: number): void {
    if (this.allowInterleaving) return;
    for (const openStreamId of this.chains.keys()) {
      if (openStreamId !== streamId) {
        throw new InterleavedFragmentsError(openStreamId, streamId);
      }
    }
  }

  private append(chain: FragmentChain, frame: FragmentableFrame): void {
    const size =
      chain.size + (frame.metadata !== null ? frame.metadata.length : 0) + frame.data.length;
    if (size > this.maxMessageSize) {
      this.chains.delete(frame.streamId);
      throw new MessageTooLargeError(frame.streamId, size, this.maxMessageSize);
    }

    if (frame.metadata !== null) {
      chain.hasMetadata = true;
      chain.metadata.push(frame.metadata);
    }
    chain.data.push(frame.data);
    chain.size = size;
  }

  private assemble(chain: FragmentChain, last: FragmentableFrame): FragmentableFrame {
    const metadata = chain.hasMetadata ? Buffer.concat(chain.metadata) : null;
    let flags =
      (chain.first.flags & ~(FrameFlags.FOLLOWS | FrameFlags.COMPLETE | FrameFlags.METADATA)) |
      (last.flags & FrameFlags.COMPLETE);
    if (metadata !== null) flags |= FrameFlags.METADATA;

    return { ...chain.first, flags, metadata, data: Buffer.concat(chain.data) };
  }
}
