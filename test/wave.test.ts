import { describe, it, expect } from "vitest";
import { MissingFieldError } from "../src/core/errors.js";
import { getComplex, zeros } from "../src/core/ndarray.js";
import {
  buildWavefunction,
  coordsToIndices,
  gMeshIndices,
  gVectors,
  kpointsCartesian,
  planeWaveCoeffs,
  reciprocalGrid,
  toGrid,
} from "../src/core/wave.js";
import type { DecodedValue, IntArray, Namespace, WavefunctionBlock } from "../src/core/types.js";

function intArray(shape: number[], values: number[]): IntArray {
  return { dtype: "i4", shape, data: Int32Array.from(values) };
}

/** Three plane-wave slots, two populated, two bands at one k-point */
function checkpointNamespace(occupancies: number[]): Namespace {
  const coeffs = zeros("c16", [3, 1, 2, 1, 1]);
  coeffs.data.set([1, 0, 0, 1, 0, 0, 5, 0, 6, 0, 0, 0]);
  const block: WavefunctionBlock = {
    mesh: [4, 4, 4],
    coeffs,
    gridCoords: intArray([3, 3, 1], [0, 0, 0, -1, 0, 1, 9, 9, 9]),
    nwavesAtKp: Int32Array.from([2]),
    kpoints: { dtype: "f8", shape: [3, 1], data: Float64Array.from([0.5, 0.25, 0.5]) },
  };
  return new Map<string, DecodedValue>([
    ["wavefunction", block],
    ["real_lattice", { dtype: "f8", shape: [3, 3], data: Float64Array.from([1, 0, 0, 0, 1, 0, 0, 0, 1]) }],
    ["recip_lattice", { dtype: "f8", shape: [3, 3], data: Float64Array.from([1, 0, 0, 1, 1, 0, 0, 0, 2]) }],
    ["eigenvalues", { dtype: "f8", shape: [2, 1, 1], data: Float64Array.from([-0.5, 2]) }],
    ["occupancies", { dtype: "f8", shape: [2, 1, 1], data: Float64Array.from(occupancies) }],
    ["fermi_energy", 1],
  ]);
}

describe("coordsToIndices", () => {
  it("should wrap negative and out-of-range indices onto the mesh", () => {
    const indices = coordsToIndices(intArray([3, 1], [-1, 5, -4]), [4, 4, 4]);
    expect(Array.from(indices.data)).toEqual([3, 1, 0]);
  });

  it("should use each axis' own extent", () => {
    const indices = coordsToIndices(intArray([3, 2], [-1, -1, -1, 2, 2, 2]), [2, 3, 5]);
    expect(Array.from(indices.data)).toEqual([1, 2, 4, 0, 2, 2]);
  });
});

describe("toGrid", () => {
  it("should place a single plane wave at its wrapped index and nowhere else", () => {
    const coeffs = zeros("c16", [1, 1, 1, 1, 1]);
    coeffs.data.set([2, 3]);
    const grid = toGrid(coeffs, [1], intArray([3, 1, 1], [-1, 0, 0]), 4, 4, 4);

    expect(grid.shape).toEqual([4, 4, 4, 1, 1, 1, 1]);
    expect(getComplex(grid, [3, 0, 0, 0, 0, 0, 0])).toEqual({ re: 2, im: 3 });
    expect(grid.data.filter((value) => value !== 0)).toEqual(Float64Array.from([2, 3]));
  });

  it("should ignore slots past the plane-wave count", () => {
    const coeffs = zeros("c16", [2, 1, 1, 1, 1]);
    coeffs.data.set([1, 0, 7, 7]);
    const grid = toGrid(coeffs, [1], intArray([3, 2, 1], [0, 0, 0, 1, 1, 1]), 2, 2, 2);

    expect(getComplex(grid, [0, 0, 0, 0, 0, 0, 0])).toEqual({ re: 1, im: 0 });
    expect(getComplex(grid, [1, 1, 1, 0, 0, 0, 0])).toEqual({ re: 0, im: 0 });
  });

  it("should reject mismatched shapes", () => {
    const coeffs = zeros("c16", [2, 1, 1, 1, 1]);
    expect(() => toGrid(coeffs, [1], intArray([3, 1, 1], [0, 0, 0]), 2, 2, 2)).toThrow(RangeError);
    expect(() => toGrid(coeffs, [3], intArray([3, 2, 1], [0, 0, 0, 0, 0, 0]), 2, 2, 2)).toThrow(
      RangeError
    );
  });
});

describe("buildWavefunction", () => {
  it("should collect the block, lattices and band data", () => {
    const record = buildWavefunction(checkpointNamespace([0.5, 0.25]));

    expect(record.mesh).toEqual([4, 4, 4]);
    expect([record.nwaveMax, record.nspinors, record.nbands, record.nkpts, record.nspins]).toEqual([
      3, 1, 2, 1, 1,
    ]);
    expect(record.fermiEnergy).toBe(1);
    expect(Array.from(record.occupancies.data)).toEqual([0.5, 0.25]);
  });

  it("should occupy states below the Fermi energy when none are occupied", () => {
    const ns = checkpointNamespace([0, 0]);
    const record = buildWavefunction(ns);

    expect(Array.from(record.occupancies.data)).toEqual([1, 0]);
    const stored = ns.get("occupancies");
    expect(stored).toMatchObject({ data: Float64Array.from([0, 0]) });
  });

  it("should name the missing field", () => {
    const ns = checkpointNamespace([0, 0]);
    ns.delete("fermi_energy");
    expect(() => buildWavefunction(ns)).toThrow(MissingFieldError);
    expect(() => buildWavefunction(ns)).toThrow("Wavefunction requires field fermi_energy");
  });
});

describe("wavefunction accessors", () => {
  const record = buildWavefunction(checkpointNamespace([1, 1]));

  it("should return the populated coefficients of a band", () => {
    expect(planeWaveCoeffs(record)).toEqual({
      dtype: "c16",
      shape: [2],
      data: Float64Array.from([1, 0, 0, 1]),
    });
    expect(planeWaveCoeffs(record, { band: 1 }).data).toEqual(Float64Array.from([5, 0, 6, 0]));
  });

  it("should reject an out-of-range selection", () => {
    expect(() => planeWaveCoeffs(record, { band: 2 })).toThrow(RangeError);
    expect(() => gVectors(record, 1)).toThrow(RangeError);
  });

  it("should return signed and wrapped plane-wave indices", () => {
    expect(gVectors(record)).toEqual(intArray([3, 2], [0, 0, 0, -1, 0, 1]));
    expect(gMeshIndices(record)).toEqual(intArray([3, 2], [0, 0, 0, 3, 0, 1]));
  });

  it("should convert k-points to cartesian coordinates", () => {
    expect(Array.from(kpointsCartesian(record).data)).toEqual([0.5, 0.75, 1]);
  });

  it("should scatter every band onto the mesh", () => {
    const grid = reciprocalGrid(record);
    expect(grid.shape).toEqual([4, 4, 4, 1, 2, 1, 1]);
    expect(getComplex(grid, [3, 0, 1, 0, 0, 0, 0])).toEqual({ re: 0, im: 1 });
    expect(getComplex(grid, [3, 0, 1, 0, 1, 0, 0])).toEqual({ re: 6, im: 0 });
    expect(getComplex(grid, [0, 0, 0, 0, 1, 0, 0])).toEqual({ re: 5, im: 0 });
  });
});
