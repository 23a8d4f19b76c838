/**
 * Plane-wave wavefunctions.
 *
 * Checkpoint files store, per k-point, only the plane waves inside the
 * cutoff sphere, each tagged with its signed reciprocal-lattice index. The
 * helpers here select those coefficients and scatter them onto the full FFT
 * mesh, ready for an inverse transform.
 */

import {
  requireFloatArray,
  requireNumber,
  requireWavefunctionBlock,
} from "./namespace.js";
import { zeros } from "./ndarray.js";
import type {
  ComplexArray,
  FloatArray,
  IntArray,
  Namespace,
  WavefunctionRecord,
} from "./types.js";

const CONTEXT = "Wavefunction";

/**
 * Assemble a wavefunction record from a decoded checkpoint namespace.
 *
 * Band-structure runs store no occupancies; when all are zero every state
 * below the Fermi energy is given occupancy 1. The namespace is not changed.
 */
export function buildWavefunction(namespace: Namespace): WavefunctionRecord {
  const block = requireWavefunctionBlock(namespace, "wavefunction", CONTEXT);
  const realLattice = requireFloatArray(namespace, "real_lattice", CONTEXT);
  const recipLattice = requireFloatArray(namespace, "recip_lattice", CONTEXT);
  const eigenvalues = requireFloatArray(namespace, "eigenvalues", CONTEXT);
  const stored = requireFloatArray(namespace, "occupancies", CONTEXT);
  const fermiEnergy = requireNumber(namespace, "fermi_energy", CONTEXT);

  const occupancies: FloatArray = { ...stored, shape: [...stored.shape], data: stored.data.slice() };
  if (occupancies.data.every((value) => value === 0)) {
    for (let i = 0; i < occupancies.data.length; i++) {
      if (eigenvalues.data[i] < fermiEnergy) occupancies.data[i] = 1.0;
    }
  }

  const [nwaveMax, nspinors, nbands, nkpts, nspins] = block.coeffs.shape;
  return {
    coeffs: block.coeffs,
    gridCoords: block.gridCoords,
    nwavesAtKp: block.nwavesAtKp,
    kpoints: block.kpoints,
    mesh: block.mesh,
    nwaveMax,
    nspinors,
    nbands,
    nkpts,
    nspins,
    realLattice,
    recipLattice,
    eigenvalues,
    occupancies,
    fermiEnergy,
  };
}

/**
 * Wrap reciprocal-lattice indices onto [0, n) per axis, the usual FFT
 * convention (index -1 is n - 1). `gridCoords` has 3 as its first axis.
 */
export function coordsToIndices(
  gridCoords: IntArray,
  mesh: readonly [number, number, number]
): IntArray {
  if (gridCoords.shape[0] !== 3) {
    throw new RangeError(`Grid coordinates need 3 as first axis, got [${gridCoords.shape.join(", ")}]`);
  }
  const out = zeros("i4", gridCoords.shape);
  for (let i = 0; i < gridCoords.data.length; i++) {
    const n = mesh[i % 3];
    out.data[i] = ((gridCoords.data[i] % n) + n) % n;
  }
  return out;
}

/**
 * Scatter plane-wave coefficients onto the FFT mesh.
 *
 * @param coeffs - (npw, nspinor, nbands, nkpts, nspins)
 * @param waveCounts - populated plane-wave slots per k-point
 * @param gridCoords - (3, npw, nkpts)
 * @returns (nx, ny, nz, nspinor, nbands, nkpts, nspins), zero where no plane
 *   wave lands
 */
export function toGrid(
  coeffs: ComplexArray,
  waveCounts: ArrayLike<number>,
  gridCoords: IntArray,
  nx: number,
  ny: number,
  nz: number
): ComplexArray {
  const [npw, nspinors, nbands, nkpts, nspins] = coeffs.shape;
  if (
    gridCoords.shape.length !== 3 ||
    gridCoords.shape[1] !== npw ||
    gridCoords.shape[2] !== nkpts ||
    waveCounts.length !== nkpts
  ) {
    throw new RangeError(
      `Inconsistent wavefunction shapes: coeffs [${coeffs.shape.join(", ")}], ` +
        `grid coordinates [${gridCoords.shape.join(", ")}], ${waveCounts.length} wave counts`
    );
  }

  const indices = coordsToIndices(gridCoords, [nx, ny, nz]);
  const grid = zeros("c16", [nx, ny, nz, nspinors, nbands, nkpts, nspins]);
  const cell = nx * ny * nz;

  for (let is = 0; is < nspins; is++) {
    for (let ik = 0; ik < nkpts; ik++) {
      const nwaves = waveCounts[ik];
      if (nwaves > npw) {
        throw new RangeError(`k-point ${ik} has ${nwaves} plane waves, capacity is ${npw}`);
      }
      for (let ib = 0; ib < nbands; ib++) {
        for (let isp = 0; isp < nspinors; isp++) {
          const block = isp + nspinors * (ib + nbands * (ik + nkpts * is));
          const from = npw * block;
          const to = cell * block;
          for (let ipw = 0; ipw < nwaves; ipw++) {
            const g = 3 * (ipw + npw * ik);
            const k = 2 * (to + indices.data[g] + nx * (indices.data[g + 1] + ny * indices.data[g + 2]));
            grid.data[k] = coeffs.data[2 * (from + ipw)];
            grid.data[k + 1] = coeffs.data[2 * (from + ipw) + 1];
          }
        }
      }
    }
  }

  return grid;
}

/**
 * The wavefunction on its full reciprocal-space mesh.
 */
export function reciprocalGrid(record: WavefunctionRecord): ComplexArray {
  const [nx, ny, nz] = record.mesh;
  return toGrid(record.coeffs, record.nwavesAtKp, record.gridCoords, nx, ny, nz);
}

export interface StateSelection {
  spin?: number;
  kpoint?: number;
  band?: number;
  spinor?: number;
}

function checkIndex(name: string, value: number, extent: number): void {
  if (!Number.isInteger(value) || value < 0 || value >= extent) {
    throw new RangeError(`${name} index ${value} out of range [0, ${extent})`);
  }
}

/**
 * Coefficients of the populated plane waves of one state.
 */
export function planeWaveCoeffs(
  record: WavefunctionRecord,
  selection: StateSelection = {}
): ComplexArray {
  const { spin = 0, kpoint = 0, band = 0, spinor = 0 } = selection;
  checkIndex("spin", spin, record.nspins);
  checkIndex("k-point", kpoint, record.nkpts);
  checkIndex("band", band, record.nbands);
  checkIndex("spinor", spinor, record.nspinors);

  const nwaves = record.nwavesAtKp[kpoint];
  const from =
    record.nwaveMax *
    (spinor + record.nspinors * (band + record.nbands * (kpoint + record.nkpts * spin)));
  return {
    dtype: "c16",
    shape: [nwaves],
    data: record.coeffs.data.slice(2 * from, 2 * (from + nwaves)),
  };
}

function columnsAtKpoint(record: WavefunctionRecord, coords: IntArray, kpoint: number): IntArray {
  checkIndex("k-point", kpoint, record.nkpts);
  const nwaves = record.nwavesAtKp[kpoint];
  const from = 3 * record.nwaveMax * kpoint;
  return {
    dtype: "i4",
    shape: [3, nwaves],
    data: coords.data.slice(from, from + 3 * nwaves),
  };
}

/**
 * Reciprocal-lattice indices of the plane waves at a k-point, (3, nwaves).
 */
export function gVectors(record: WavefunctionRecord, kpoint = 0): IntArray {
  return columnsAtKpoint(record, record.gridCoords, kpoint);
}

/**
 * FFT mesh indices of the plane waves at a k-point, (3, nwaves).
 */
export function gMeshIndices(record: WavefunctionRecord, kpoint = 0): IntArray {
  return columnsAtKpoint(record, coordsToIndices(record.gridCoords, record.mesh), kpoint);
}

/**
 * Cartesian k-points, (3, nkpts), in CASTEP's internal atomic units.
 *
 * The reciprocal lattice is stored with one vector per row, so this is
 * recip_latticeᵀ · kpoints.
 */
export function kpointsCartesian(record: WavefunctionRecord): FloatArray {
  const { recipLattice, kpoints, nkpts } = record;
  const out = zeros("f8", [3, nkpts]);
  for (let k = 0; k < nkpts; k++) {
    for (let a = 0; a < 3; a++) {
      let sum = 0;
      for (let b = 0; b < 3; b++) {
        sum += recipLattice.data[b + 3 * a] * kpoints.data[b + 3 * k];
      }
      out.data[a + 3 * k] = sum;
    }
  }
  return out;
}
