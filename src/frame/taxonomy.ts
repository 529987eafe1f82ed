/**
 * Frame type capability table.
 *
 * Every codec decision about optional fields is made from these entries;
 * adding a frame kind means adding a FrameType member and one row here.
 */
import {
  FrameType,
  REQUEST_N_SIZE,
  ERROR_CODE_SIZE,
  KEEPALIVE_POSITION_SIZE,
} from "./constants.js";
import { UnknownFrameTypeError } from "./errors.js";

/** Which stream ids a frame type may be sent on */
export type StreamScope = "connection" | "stream" | "any";

export interface FrameTypeInfo {
  readonly type: FrameType;
  readonly name: string;
  /** A 4-byte initial request count follows the header */
  readonly hasInitialRequestN: boolean;
  /** Carries a request count at all (initial or dedicated REQUEST_N) */
  readonly hasRequestN: boolean;
  readonly canHaveMetadata: boolean;
  readonly canHaveData: boolean;
  /** Bytes of type-specific fields between header and metadata */
  readonly fixedSize: number;
  /** May start or continue a FOLLOWS chain */
  readonly fragmentable: boolean;
  readonly streamScope: StreamScope;
  /** Recognised but not interpreted; decodes to a raw body */
  readonly opaque: boolean;
}

type Capabilities = Omit<FrameTypeInfo, "type" | "name">;

const NONE: Capabilities = {
  hasInitialRequestN: false,
  hasRequestN: false,
  canHaveMetadata: false,
  canHaveData: false,
  fixedSize: 0,
  fragmentable: false,
  streamScope: "stream",
  opaque: false,
};

const REQUEST: Capabilities = {
  ...NONE,
  canHaveMetadata: true,
  canHaveData: true,
  fragmentable: true,
};

const REQUEST_MANY: Capabilities = {
  ...REQUEST,
  hasInitialRequestN: true,
  hasRequestN: true,
  fixedSize: REQUEST_N_SIZE,
};

const OPAQUE: Capabilities = { ...NONE, streamScope: "connection", opaque: true };

const ENTRIES: Array<[FrameType, Capabilities]> = [
  [FrameType.SETUP, OPAQUE],
  [FrameType.LEASE, OPAQUE],
  [
    FrameType.KEEPALIVE,
    { ...NONE, canHaveData: true, fixedSize: KEEPALIVE_POSITION_SIZE, streamScope: "connection" },
  ],
  [FrameType.REQUEST_RESPONSE, REQUEST],
  [FrameType.REQUEST_FNF, REQUEST],
  [FrameType.REQUEST_STREAM, REQUEST_MANY],
  [FrameType.REQUEST_CHANNEL, REQUEST_MANY],
  [FrameType.REQUEST_N, { ...NONE, hasRequestN: true, fixedSize: REQUEST_N_SIZE }],
  [FrameType.CANCEL, NONE],
  [FrameType.PAYLOAD, REQUEST],
  [FrameType.ERROR, { ...NONE, canHaveData: true, fixedSize: ERROR_CODE_SIZE, streamScope: "any" }],
  [FrameType.METADATA_PUSH, { ...NONE, canHaveMetadata: true, streamScope: "connection" }],
  [FrameType.RESUME, OPAQUE],
  [FrameType.RESUME_OK, OPAQUE],
  [FrameType.EXT, { ...OPAQUE, streamScope: "any" }],
];

const TABLE: ReadonlyMap<number, FrameTypeInfo> = new Map(
  ENTRIES.map(([type, caps]): [number, FrameTypeInfo] => [
    type,
    { type, name: FrameType[type], ...caps },
  ]),
);

/** Resolve a raw 6-bit type code. Throws UnknownFrameTypeError. */
export function resolveFrameType(code: number): FrameTypeInfo {
  const info = TABLE.get(code);
  if (!info) {
    throw new UnknownFrameTypeError(code);
  }
  return info;
}

export function frameTypeInfo(type: FrameType): FrameTypeInfo {
  return resolveFrameType(type);
}

export function isKnownFrameType(code: number): code is FrameType {
  return TABLE.has(code);
}

export function hasInitialRequestN(type: FrameType): boolean {
  return resolveFrameType(type).hasInitialRequestN;
}

export function canHaveData(type: FrameType): boolean {
  return resolveFrameType(type).canHaveData;
}

export function canHaveMetadata(type: FrameType): boolean {
  return resolveFrameType(type).canHaveMetadata;
}

export function isFragmentable(type: FrameType): boolean {
  return resolveFrameType(type).fragmentable;
}

export function frameTypeName(code: number): string {
  return TABLE.get(code)?.name ?? `UNKNOWN(0x${code.toString(16)})`;
}

/** Whether `streamId` is legal for a frame type's stream scope */
export function streamScopeAllows(info: FrameTypeInfo, streamId: number): boolean {
  switch (info.streamScope) {
    case "connection":
      return streamId === 0;
    case "stream":
      return streamId !== 0;
    default:
      return true;
  }
}
