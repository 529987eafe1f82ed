/**
 * Frame codec error classes.
 *
 * Structural wire defects (MalformedFrameError and subclasses,
 * InconsistentPayloadSizeError) mean the connection is corrupted. The field
 * errors mean the caller asked a frame for something its type or flags do
 * not carry.
 */

export class FrameError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FrameError";
  }
}

export class MalformedFrameError extends FrameError {
  constructor(message: string) {
    super(message);
    this.name = "MalformedFrameError";
  }
}

export class UnknownFrameTypeError extends MalformedFrameError {
  readonly typeCode: number;

  constructor(typeCode: number) {
    super(`Unknown frame type: 0x${typeCode.toString(16).padStart(2, "0")}`);
    this.name = "UnknownFrameTypeError";
    this.typeCode = typeCode;
  }
}

export class InconsistentPayloadSizeError extends FrameError {
  constructor(message: string) {
    super(message);
    this.name = "InconsistentPayloadSizeError";
  }
}

export class NoMetadataPresentError extends FrameError {
  constructor(typeName: string) {
    super(`${typeName} frame has no metadata`);
    this.name = "NoMetadataPresentError";
  }
}

export class DataNotSupportedError extends FrameError {
  constructor(typeName: string) {
    super(`${typeName} frame does not support data content`);
    this.name = "DataNotSupportedError";
  }
}

export class RequestNNotSupportedError extends FrameError {
  constructor(typeName: string) {
    super(`${typeName} frame does not support requestN`);
    this.name = "RequestNNotSupportedError";
  }
}

export class InterleavedFragmentsError extends FrameError {
  constructor(openStreamId: number, streamId: number) {
    super(`Fragment for stream ${streamId} interleaved with open chain on stream ${openStreamId}`);
    this.name = "InterleavedFragmentsError";
  }
}

export class IncompleteFragmentChainError extends FrameError {
  readonly streamIds: number[];

  constructor(streamIds: number[]) {
    super(`Connection closed with incomplete fragment chains on streams: ${streamIds.join(", ")}`);
    this.name = "IncompleteFragmentChainError";
    this.streamIds = streamIds;
  }
}

export class MessageTooLargeError extends FrameError {
  constructor(streamId: number, size: number, maxSize: number) {
    super(`Reassembled message on stream ${streamId} (${size} bytes) exceeds maximum ${maxSize}`);
    this.name = "MessageTooLargeError";
  }
}
