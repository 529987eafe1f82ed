/**
 * muxframe: binary frame codec for a multiplexed request/stream protocol
 * carried over a single bidirectional connection.
 */

// Constants
export {
  FrameType,
  FrameFlags,
  FRAME_HEADER_SIZE,
  FRAME_LENGTH_SIZE,
  METADATA_LENGTH_SIZE,
  MAX_STREAM_ID,
  MAX_REQUEST_N,
  MAX_METADATA_LENGTH,
  MAX_FRAME_LENGTH,
  DEFAULT_MAX_FRAME_SIZE,
  MIN_FRAGMENT_SIZE,
} from "./frame/constants.js";

// Errors
export {
  FrameError,
  MalformedFrameError,
  UnknownFrameTypeError,
  InconsistentPayloadSizeError,
  NoMetadataPresentError,
  DataNotSupportedError,
  RequestNNotSupportedError,
  InterleavedFragmentsError,
  IncompleteFragmentChainError,
  MessageTooLargeError,
} from "./frame/errors.js";

// Frame type taxonomy
export {
  resolveFrameType,
  frameTypeInfo,
  frameTypeName,
  isKnownFrameType,
  hasInitialRequestN,
  canHaveData,
  canHaveMetadata,
  isFragmentable,
} from "./frame/taxonomy.js";
export type { FrameTypeInfo, StreamScope } from "./frame/taxonomy.js";

// Header codec
export {
  encodeHeader,
  decodeHeader,
  hasMetadata,
  hasFollows,
  hasComplete,
  hasNext,
  hasIgnore,
} from "./frame/header.js";
export type { FrameHeader } from "./frame/header.js";

// Typed frames
export {
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
} from "./frame/framer.js";
export type {
  Frame,
  FragmentableFrame,
  RequestResponseFrame,
  RequestFnfFrame,
  RequestStreamFrame,
  RequestChannelFrame,
  RequestNFrame,
  CancelFrame,
  PayloadFrame,
  ErrorFrame,
  KeepAliveFrame,
  MetadataPushFrame,
  OpaqueFrame,
} from "./frame/framer.js";
export {
  decodeFrame,
  frameLayout,
  frameStreamId,
  frameTypeOf,
  frameFlags,
  readMetadata,
  readData,
  readRequestN,
  payloadSize,
  errorMessage,
} from "./frame/decoder.js";
export type { FrameLayout } from "./frame/decoder.js";

// Byte-stream framing
export { FrameParser } from "./frame/parser.js";

// Fragmentation
export { fragmentFrame, isFragmentableFrame, FrameAssembler } from "./frame/fragmentation.js";
export type { FrameAssemblerOptions } from "./frame/fragmentation.js";

// Stream ids
export {
  isValidStreamId,
  isConnectionLevel,
  isClientInitiated,
  isServerInitiated,
  streamIdKind,
} from "./frame/stream-id.js";
export type { StreamIdKind } from "./frame/stream-id.js";
