/**
 * Fortran unformatted sequential records.
 *
 * Each record written by one Fortran WRITE statement is framed as:
 * - 4 bytes: payload length (unsigned)
 * - payload
 * - 4 bytes: payload length again
 *
 * The two markers must agree; a mismatch means the reader has lost its
 * place in the stream and nothing after it can be trusted.
 */

import { DEFAULT_READ_THRESHOLD } from "../config.js";
import { RecordMarkerMismatchError } from "./errors.js";
import type { ByteSource } from "../backend/source.js";
import type { Endian } from "../config.js";

export const RECORD_MARKER_SIZE = 4;

export interface ReadRecordOptions {
  endian?: Endian;
  /** Seek past the payload instead of reading it */
  skip?: boolean;
  /** Payloads of at most this many bytes are read even when skipping */
  readThreshold?: number;
}

export interface RecordData {
  /** null when the payload was skipped */
  data: Uint8Array | null;
  /** Declared payload length */
  length: number;
}

export function readMarker(source: ByteSource, endian: Endian = "big"): number {
  const bytes = source.read(RECORD_MARKER_SIZE);
  return new DataView(bytes.buffer, bytes.byteOffset, RECORD_MARKER_SIZE).getUint32(
    0,
    endian === "little"
  );
}

/**
 * Read one record at the current position.
 */
export function readRecord(source: ByteSource, options: ReadRecordOptions = {}): RecordData {
  const { endian = "big", skip = false, readThreshold = DEFAULT_READ_THRESHOLD } = options;
  const offset = source.tell();
  const length = readMarker(source, endian);

  let data: Uint8Array | null = null;
  if (!skip || length <= readThreshold) {
    data = source.read(length);
  } else {
    source.skip(length);
  }

  const trailing = readMarker(source, endian);
  if (trailing !== length) {
    throw new RecordMarkerMismatchError(offset, length, trailing);
  }

  return { data, length };
}

/**
 * Read one record and return its payload.
 */
export function readPayload(source: ByteSource, endian: Endian = "big"): Uint8Array {
  const { data } = readRecord(source, { endian });
  // Without skip the payload is always read
  return data ?? new Uint8Array(0);
}
