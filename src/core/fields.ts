/**
 * Field decoding: scalars, arrays, strings, booleans and composites.
 *
 * Every field kind decodes from a record payload given the namespace built
 * so far. Composites share one record between several members, so each
 * member must know its byte size before it is decoded.
 */

import {
  decodeComplex,
  decodeFloat64,
  decodeInt32,
  decodeStrings,
  elementCount,
  elementWidth,
  stringWidth,
} from "../encoding/elements.js";
import { InvalidCompositeLayoutError } from "./errors.js";
import { sizeOf } from "./ndarray.js";
import { readPayload } from "./record.js";
import { resolveShape, shapeValue, solveMissingAxis, unknownAxes } from "./shape.js";
import type { ByteSource } from "../backend/source.js";
import type { Endian } from "../config.js";
import type { Logger } from "../log.js";
import type {
  ArrayField,
  Complex,
  CompositeField,
  DecodedValue,
  ElementType,
  MemberField,
  Namespace,
  NdArray,
  PendingLedger,
  ScalarField,
} from "./types.js";

/**
 * State threaded through every decode step of one file.
 */
export interface DecodeContext {
  source: ByteSource;
  /** Values decoded so far; later fields read their axis extents here */
  namespace: Namespace;
  endian: Endian;
  readThreshold: number;
  /** Set in deferred mode: arrays with unknown axes are stored flat here */
  ledger?: PendingLedger;
  log: Logger;
}

/**
 * Decode `count` elements into a one-dimensional array.
 */
export function decodeFlat(
  payload: Uint8Array,
  dtype: ElementType,
  count: number,
  endian: Endian
): NdArray {
  switch (dtype) {
    case "i4":
      return { dtype, shape: [count], data: decodeInt32(payload, count, endian) };
    case "f8":
      return { dtype, shape: [count], data: decodeFloat64(payload, count, endian) };
    case "c16":
      return { dtype, shape: [count], data: decodeComplex(payload, count, endian) };
    default:
      return { dtype: "str", shape: [count], data: decodeStrings(payload, dtype, count) };
  }
}

export function decodeScalar(
  field: ScalarField,
  payload: Uint8Array,
  endian: Endian
): number | Complex {
  switch (field.dtype) {
    case "i4":
      return decodeInt32(payload, 1, endian)[0];
    case "f8":
      return decodeFloat64(payload, 1, endian)[0];
    case "c16": {
      const [re, im] = decodeComplex(payload, 1, endian);
      return { re, im };
    }
  }
}

/**
 * Decode an array, resolving named axes from the namespace.
 *
 * With every axis known only that many elements are read. With one axis
 * unknown the whole payload is decoded and the axis inferred from its
 * length. In deferred mode an array with unknown axes is kept flat and
 * entered in the ledger instead.
 */
export function decodeArray(
  field: ArrayField,
  payload: Uint8Array,
  context: Pick<DecodeContext, "namespace" | "endian" | "ledger">
): NdArray | string[] {
  const { namespace, endian, ledger } = context;

  if (ledger && unknownAxes(field.shape, namespace).length > 0) {
    ledger.set(field.name, field.shape);
    return decodeFlat(payload, field.dtype, elementCount(payload, field.dtype), endian);
  }

  const resolved = resolveShape(field.name, field.shape, namespace);
  if (resolved.missing === null) {
    const flat = decodeFlat(payload, field.dtype, sizeOf(resolved.shape), endian);
    return shapeValue(flat, resolved.shape);
  }

  const total = elementCount(payload, field.dtype);
  const shape = solveMissingAxis(field.name, resolved, total, namespace);
  return shapeValue(decodeFlat(payload, field.dtype, total, endian), shape);
}

export function decodeMember(
  field: MemberField,
  payload: Uint8Array,
  context: Pick<DecodeContext, "namespace" | "endian" | "ledger">
): DecodedValue {
  switch (field.kind) {
    case "scalar":
      return decodeScalar(field, payload, context.endian);
    case "string":
      return decodeStrings(payload, field.dtype, 1)[0];
    case "bool":
      // LOGICAL: compilers agree only that 0 is .FALSE.
      return decodeInt32(payload, 1, context.endian)[0] !== 0;
    case "array":
      return decodeArray(field, payload, context);
  }
}

/**
 * Bytes a member occupies inside a composite record. Negative when an axis
 * is still unknown.
 */
export function memberByteSize(field: MemberField, namespace: Namespace): number {
  switch (field.kind) {
    case "scalar":
      return elementWidth(field.dtype);
    case "string":
      return stringWidth(field.dtype);
    case "bool":
      return 4;
    case "array":
      return elementWidth(field.dtype) * sizeOf(resolveShape(field.name, field.shape, namespace).shape);
  }
}

/**
 * Read one record and split it between the composite's members in order.
 */
export function decodeComposite(field: CompositeField, context: DecodeContext): void {
  const { namespace, endian } = context;
  const payload = readPayload(context.source, endian);

  let cursor = 0;
  for (const member of field.fields) {
    const size = memberByteSize(member, namespace);
    if (size <= 0) {
      throw new InvalidCompositeLayoutError(member.name, size);
    }
    namespace.set(
      member.name,
      decodeMember(member, payload.subarray(cursor), { namespace, endian })
    );
    cursor += size;
  }
}
