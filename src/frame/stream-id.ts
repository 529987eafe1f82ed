/**
 * Stream identifier classification.
 * 0 is the connection itself, odd ids are client-initiated streams and even
 * ids are server-initiated streams. Allocation is the connection's job.
 */
import { MAX_STREAM_ID } from "./constants.js";

export type StreamIdKind = "connection" | "client" | "server";

export function isValidStreamId(id: number): boolean {
  return Number.isInteger(id) && id >= 0 && id <= MAX_STREAM_ID;
}

export function isConnectionLevel(id: number): boolean {
  return id === 0;
}

export function isClientInitiated(id: number): boolean {
  return isValidStreamId(id) && id !== 0 && id % 2 === 1;
}

export function isServerInitiated(id: number): boolean {
  return isValidStreamId(id) && id !== 0 && id % 2 === 0;
}

/** Classify a stream id. Throws RangeError outside 0..2^31-1. */
export function streamIdKind(id: number): StreamIdKind {
  if (!isValidStreamId(id)) {
    throw new RangeError(`Invalid stream id: ${id}`);
  }
  if (id === 0) return "connection";
  return id % 2 === 1 ? "client" : "server";
}
