/**
 * Typed lookups into a decoded namespace.
 */

import { MissingFieldError } from "./errors.js";
import { isNdArray, isWavefunctionBlock } from "./ndarray.js";
import type { FloatArray, Namespace, WavefunctionBlock } from "./types.js";

export function requireNumber(namespace: Namespace, name: string, context: string): number {
  const value = namespace.get(name);
  if (typeof value !== "number") {
    throw new MissingFieldError(name, context);
  }
  return value;
}

/** A non-negative integer such as a band or k-point count */
export function requireCount(namespace: Namespace, name: string, context: string): number {
  const value = requireNumber(namespace, name, context);
  if (!Number.isInteger(value) || value < 0) {
    throw new MissingFieldError(name, `${context} (got ${value}, expected a count)`);
  }
  return value;
}

export function requireFloatArray(
  namespace: Namespace,
  name: string,
  context: string
): FloatArray {
  const value = namespace.get(name);
  if (!isNdArray(value) || value.dtype !== "f8") {
    throw new MissingFieldError(name, context);
  }
  return value;
}

export function requireWavefunctionBlock(
  namespace: Namespace,
  name: string,
  context: string
): WavefunctionBlock {
  const value = namespace.get(name);
  if (!isWavefunctionBlock(value)) {
    throw new MissingFieldError(name, context);
  }
  return value;
}

export function requireString(namespace: Namespace, name: string, context: string): string {
  const value = namespace.get(name);
  if (typeof value !== "string") {
    throw new MissingFieldError(name, context);
  }
  return value;
}
