/**
 * Element codec for record payloads.
 *
 * Widths follow the Fortran kinds CASTEP writes:
 * - i4: 4-byte signed integer (also LOGICAL)
 * - f8: 8-byte IEEE double
 * - c16: two f8 values (real, imaginary)
 * - aN: N bytes of ASCII text
 */

import { MalformedRecordError } from "../core/errors.js";
import type { Endian } from "../config.js";
import type { ElementType, StringType } from "../core/types.js";

const textDecoder = new TextDecoder();

export function stringWidth(dtype: StringType): number {
  const width = Number(dtype.slice(1));
  if (!Number.isInteger(width) || width <= 0) {
    throw new RangeError(`Invalid string type: ${dtype}`);
  }
  return width;
}

export function elementWidth(dtype: ElementType): number {
  switch (dtype) {
    case "i4":
      return 4;
    case "f8":
      return 8;
    case "c16":
      return 16;
    default:
      return stringWidth(dtype);
  }
}

/** Number of whole elements of `dtype` in `bytes` */
export function elementCount(bytes: Uint8Array, dtype: ElementType): number {
  return Math.floor(bytes.length / elementWidth(dtype));
}

function viewOf(bytes: Uint8Array, dtype: ElementType, count: number): DataView {
  const needed = count * elementWidth(dtype);
  if (count < 0 || needed > bytes.length) {
    throw new MalformedRecordError(
      `Record holds ${bytes.length} bytes, ${needed} needed for ${count} x ${dtype}`
    );
  }
  return new DataView(bytes.buffer, bytes.byteOffset, needed);
}

export function decodeInt32(bytes: Uint8Array, count: number, endian: Endian): Int32Array {
  const view = viewOf(bytes, "i4", count);
  const little = endian === "little";
  const out = new Int32Array(count);
  for (let i = 0; i < count; i++) {
    out[i] = view.getInt32(i * 4, little);
  }
  return out;
}

export function decodeFloat64(bytes: Uint8Array, count: number, endian: Endian): Float64Array {
  const view = viewOf(bytes, "f8", count);
  const little = endian === "little";
  const out = new Float64Array(count);
  for (let i = 0; i < count; i++) {
    out[i] = view.getFloat64(i * 8, little);
  }
  return out;
}

/**
 * Decode `count` complex values as interleaved (re, im) pairs.
 */
export function decodeComplex(bytes: Uint8Array, count: number, endian: Endian): Float64Array {
  viewOf(bytes, "c16", count);
  return decodeFloat64(bytes, 2 * count, endian);
}

/**
 * Strip blanks and NUL padding from both ends.
 */
export function trimText(text: string): string {
  return text.replace(/^[\s\0]+|[\s\0]+$/g, "");
}

export function decodeStrings(bytes: Uint8Array, dtype: StringType, count: number): string[] {
  viewOf(bytes, dtype, count);
  const width = stringWidth(dtype);
  const out: string[] = [];
  for (let i = 0; i < count; i++) {
    out.push(trimText(textDecoder.decode(bytes.subarray(i * width, (i + 1) * width))));
  }
  return out;
}

/**
 * Decode a payload as header text if it is printable ASCII, else undefined.
 *
 * Header records may be written with surrounding single quotes.
 */
export function decodeAscii(bytes: Uint8Array): string | undefined {
  for (const byte of bytes) {
    if (byte >= 0x80) return undefined;
  }
  const text = textDecoder.decode(bytes);
  return text.trim().replace(/^'+|'+$/g, "").trim();
}
