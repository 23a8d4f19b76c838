/**
 * Array shape resolution.
 *
 * Array extents in a castep_bin file are mostly not stored with the array.
 * A shape axis is either a literal or the name of a scalar decoded earlier
 * (e.g. "num_species"). One unknown axis can be inferred from the record
 * length; the solved value is written back so later fields see it.
 */

import { AmbiguousShapeError, MissingFieldError, UnresolvableShapeError } from "./errors.js";
import { isNdArray, reshape, sizeOf } from "./ndarray.js";
import { silentLogger } from "../log.js";
import type { Logger } from "../log.js";
import type { DecodedValue, Dim, NdArray, Namespace, PendingLedger } from "./types.js";

export interface ResolvedShape {
  /** Extents with the unknown axis, if any, set to -1 */
  shape: number[];
  /** Name of the unknown axis */
  missing: string | null;
}

/**
 * Look up a named axis. Only non-negative integers count as resolved.
 */
export function lookupDim(namespace: Namespace, name: string): number | undefined {
  const value = namespace.get(name);
  if (typeof value === "number" && Number.isInteger(value) && value >= 0) {
    return value;
  }
  return undefined;
}

/** Named axes of `shape` not yet in the namespace, one entry per axis */
export function unknownAxes(shape: readonly Dim[], namespace: Namespace): string[] {
  const unknown: string[] = [];
  for (const dim of shape) {
    if (typeof dim === "string" && lookupDim(namespace, dim) === undefined) {
      unknown.push(dim);
    }
  }
  return unknown;
}

/**
 * Substitute known axes; at most one axis may stay unknown.
 */
export function resolveShape(
  field: string,
  shape: readonly Dim[],
  namespace: Namespace
): ResolvedShape {
  const unknown = unknownAxes(shape, namespace);
  if (unknown.length > 1) {
    throw new AmbiguousShapeError(field, unknown);
  }
  return {
    shape: shape.map((dim) =>
      typeof dim === "number" ? dim : lookupDim(namespace, dim) ?? -1
    ),
    missing: unknown.length === 1 ? unknown[0] : null,
  };
}

function knownProduct(shape: readonly number[]): number {
  return sizeOf(shape.filter((extent) => extent >= 0));
}

/**
 * Infer the unknown axis from the element count of a whole record and store
 * it in the namespace. Returns the completed shape.
 */
export function solveMissingAxis(
  field: string,
  resolved: ResolvedShape,
  total: number,
  namespace: Namespace
): number[] {
  if (resolved.missing === null) return resolved.shape;

  const known = knownProduct(resolved.shape);
  if (known === 0 || total % known !== 0) {
    throw new UnresolvableShapeError(
      `${field}: ${total} elements are not a multiple of the known extents [${resolved.shape.join(", ")}]`,
      { [field]: [resolved.missing] }
    );
  }
  const extent = total / known;
  namespace.set(resolved.missing, extent);
  return resolved.shape.map((dim) => (dim === -1 ? extent : dim));
}

/**
 * Apply a final shape. One-dimensional string arrays become plain string
 * lists rather than arrays.
 */
export function shapeValue(flat: NdArray, shape: readonly number[]): NdArray | string[] {
  const shaped = reshape(flat, shape);
  if (shaped.dtype === "str" && shape.length === 1) {
    return shaped.data;
  }
  return shaped;
}

function elementsOf(value: DecodedValue | undefined): NdArray | undefined {
  return isNdArray(value) ? value : undefined;
}

/**
 * Reshape every array in the ledger, solving unknown axes to a fixed point.
 *
 * Each pass solves the fields whose unknowns have collapsed to a single name
 * (possibly repeated, e.g. a square matrix) and feeds the solutions to the
 * rest. A pass that starts with every field still holding two or more
 * distinct unknowns cannot progress and fails.
 */
export function resolvePending(
  namespace: Namespace,
  ledger: PendingLedger,
  log: Logger = silentLogger
): void {
  let pass = 0;
  while (ledger.size > 0) {
    pass++;
    const pending: Record<string, string[]> = {};
    let blocked = true;
    for (const [field, declared] of ledger) {
      const unknown = unknownAxes(declared, namespace);
      pending[field] = unknown;
      if (new Set(unknown).size < 2) blocked = false;
    }
    if (blocked) {
      throw new UnresolvableShapeError(
        `Too many unknown axes to resolve: ${JSON.stringify(pending)}`,
        pending
      );
    }

    for (const [field, declared] of [...ledger]) {
      const unknown = unknownAxes(declared, namespace);
      const names = new Set(unknown);
      if (names.size > 1) continue;

      const flat = elementsOf(namespace.get(field));
      if (!flat) {
        throw new MissingFieldError(field, "Deferred shape resolution");
      }
      const total = flat.dtype === "c16" ? flat.data.length / 2 : flat.data.length;
      const partial = declared.map((dim) =>
        typeof dim === "number" ? dim : lookupDim(namespace, dim) ?? -1
      );

      let extent = -1;
      if (unknown.length > 0) {
        const known = knownProduct(partial);
        extent = known === 0 ? -1 : Math.round((total / known) ** (1 / unknown.length));
      }
      const shape = partial.map((dim) => (dim === -1 ? extent : dim));
      if ((unknown.length > 0 && extent === -1) || sizeOf(shape) !== total) {
        throw new UnresolvableShapeError(
          `${field}: ${total} elements do not fit shape [${declared.join(", ")}]`,
          { [field]: unknown }
        );
      }

      if (unknown.length > 0) {
        namespace.set(unknown[0], extent);
      }
      namespace.set(field, shapeValue(flat, shape));
      ledger.delete(field);
    }
    log("resolvePending", `Pass ${pass}: ${ledger.size} fields left`);
  }
}
