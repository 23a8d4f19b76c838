/**
 * Minimal column-major n-dimensional arrays.
 */

import type {
  Complex,
  ComplexArray,
  DecodedValue,
  FloatArray,
  IntArray,
  NdArray,
  NumericType,
  WavefunctionBlock,
} from "./types.js";

export function sizeOf(shape: readonly number[]): number {
  let n = 1;
  for (const extent of shape) n *= extent;
  return n;
}

export function zeros(dtype: "i4", shape: readonly number[]): IntArray;
export function zeros(dtype: "f8", shape: readonly number[]): FloatArray;
export function zeros(dtype: "c16", shape: readonly number[]): ComplexArray;
export function zeros(
  dtype: NumericType,
  shape: readonly number[]
): IntArray | FloatArray | ComplexArray {
  const n = sizeOf(shape);
  switch (dtype) {
    case "i4":
      return { dtype, shape: [...shape], data: new Int32Array(n) };
    case "f8":
      return { dtype, shape: [...shape], data: new Float64Array(n) };
    case "c16":
      return { dtype, shape: [...shape], data: new Float64Array(2 * n) };
  }
}

/**
 * Element offset of `index` in column-major order.
 */
export function flatIndex(shape: readonly number[], index: readonly number[]): number {
  if (index.length !== shape.length) {
    throw new RangeError(`Index rank ${index.length} does not match shape rank ${shape.length}`);
  }
  let offset = 0;
  let stride = 1;
  for (let axis = 0; axis < shape.length; axis++) {
    const i = index[axis];
    if (!Number.isInteger(i) || i < 0 || i >= shape[axis]) {
      throw new RangeError(`Index ${i} out of bounds for axis ${axis} with extent ${shape[axis]}`);
    }
    offset += i * stride;
    stride *= shape[axis];
  }
  return offset;
}

/**
 * Give the same elements a new shape; no data is copied.
 */
export function reshape<T extends NdArray>(array: T, shape: readonly number[]): T {
  const have = array.dtype === "c16" ? array.data.length / 2 : array.data.length;
  if (sizeOf(shape) !== have) {
    throw new RangeError(`Cannot reshape ${have} elements to [${shape.join(", ")}]`);
  }
  return { ...array, shape: [...shape] };
}

export function getValue(array: IntArray | FloatArray, index: readonly number[]): number {
  return array.data[flatIndex(array.shape, index)];
}

export function setValue(
  array: IntArray | FloatArray,
  index: readonly number[],
  value: number
): void {
  array.data[flatIndex(array.shape, index)] = value;
}

export function getComplex(array: ComplexArray, index: readonly number[]): Complex {
  const k = 2 * flatIndex(array.shape, index);
  return { re: array.data[k], im: array.data[k + 1] };
}

export function setComplex(
  array: ComplexArray,
  index: readonly number[],
  value: Complex
): void {
  const k = 2 * flatIndex(array.shape, index);
  array.data[k] = value.re;
  array.data[k + 1] = value.im;
}

export function isNdArray(value: DecodedValue | undefined): value is NdArray {
  return typeof value === "object" && !Array.isArray(value) && "dtype" in value;
}

export function isWavefunctionBlock(
  value: DecodedValue | undefined
): value is WavefunctionBlock {
  return typeof value === "object" && !Array.isArray(value) && "coeffs" in value;
}
