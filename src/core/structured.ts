/**
 * Structured fields: multi-record blocks with their own layout.
 *
 * - Eigenvalues/occupancies: per k-point and spin, the k-point coordinate,
 *   then one record of occupancies and one of eigenvalues.
 * - Charge density: one record per (x, y) column of the fine grid, carrying
 *   its 1-based column indices and the z column of complex densities.
 * - Wavefunction (checkpoint files only): plane-wave coefficients per spin,
 *   k-point, band and spinor, with the reciprocal-lattice index of every
 *   plane wave.
 */

import { decodeComplex, decodeFloat64, decodeInt32 } from "../encoding/elements.js";
import { MalformedRecordError } from "./errors.js";
import { decodeComposite } from "./fields.js";
import { requireCount, requireFloatArray, requireNumber, requireString } from "./namespace.js";
import { zeros } from "./ndarray.js";
import { readPayload } from "./record.js";
import type { DecodeContext } from "./fields.js";
import type {
  CompositeField,
  ComplexArray,
  Namespace,
  StructuredField,
  WavefunctionBlock,
} from "./types.js";

/** spin_treatment value of a non-collinear calculation */
export const VECTOR_SPIN = "VECTOR";

const EIGEN_CONTEXT = "Eigenvalue/occupancy block";
const DENSITY_CONTEXT = "Charge density block";
const WAVE_CONTEXT = "Wavefunction block";

const WAVE_MESH: CompositeField = {
  kind: "composite",
  fields: [
    { kind: "scalar", name: "ngx", dtype: "i4" },
    { kind: "scalar", name: "ngy", dtype: "i4" },
    { kind: "scalar", name: "ngz", dtype: "i4" },
  ],
};

const WAVE_DIMENSIONS: CompositeField = {
  kind: "composite",
  fields: [
    { kind: "scalar", name: "nwave_max", dtype: "i4" },
    { kind: "scalar", name: "nspinors", dtype: "i4" },
    { kind: "scalar", name: "nbands_max", dtype: "i4" },
    { kind: "scalar", name: "nkpts", dtype: "i4" },
    { kind: "scalar", name: "nspins", dtype: "i4" },
  ],
};

const WAVE_KPOINT: CompositeField = {
  kind: "composite",
  fields: [
    { kind: "array", name: "kpoint", dtype: "f8", shape: [3] },
    { kind: "scalar", name: "nwaves", dtype: "i4" },
  ],
};

/**
 * Read band energies and occupancies.
 *
 * Writes `occupancies` and `eigenvalues` shaped (nbands, nkpts, nspins) and
 * `kpoints_of_eigenvalues` shaped (3, nkpts). The k-point order here is the
 * order the eigenvalues were written in, which can differ from the cell's
 * k-point list when k-points were distributed over processes.
 */
export function decodeEigenvaluesOccupancies(context: DecodeContext): void {
  const { namespace, source, endian } = context;
  const nbands = requireCount(namespace, "nbands", EIGEN_CONTEXT);
  const nspins = requireCount(namespace, "nspins", EIGEN_CONTEXT);
  const nkpts = requireCount(namespace, "nkpts", EIGEN_CONTEXT);

  const kpoints = zeros("f8", [3, nkpts]);
  const occupancies = zeros("f8", [nbands, nkpts, nspins]);
  const eigenvalues = zeros("f8", [nbands, nkpts, nspins]);

  for (let ik = 0; ik < nkpts; ik++) {
    for (let is = 0; is < nspins; is++) {
      // Same coordinate for every spin; the last one read is kept
      kpoints.data.set(decodeFloat64(readPayload(source, endian), 3, endian), 3 * ik);
      const column = nbands * (ik + nkpts * is);
      occupancies.data.set(decodeFloat64(readPayload(source, endian), nbands, endian), column);
      eigenvalues.data.set(decodeFloat64(readPayload(source, endian), nbands, endian), column);
    }
  }

  namespace.set("occupancies", occupancies);
  namespace.set("eigenvalues", eigenvalues);
  namespace.set("kpoints_of_eigenvalues", kpoints);
}

/**
 * Copy `count` complex values into `target` starting at element `offset`,
 * stepping `stride` elements between consecutive values.
 */
function scatterComplex(
  target: ComplexArray,
  values: Float64Array,
  offset: number,
  stride: number,
  count: number
): void {
  for (let i = 0; i < count; i++) {
    const k = 2 * (offset + i * stride);
    target.data[k] = values[2 * i];
    target.data[k + 1] = values[2 * i + 1];
  }
}

/**
 * Read the density on the fine grid.
 *
 * Writes `charge_density` (nx, ny, nz) and, for spin-polarised runs,
 * `spin_density`: (nx, ny, nz) for collinear spin, (nx, ny, nz, 3) for
 * vector spin.
 */
export function decodeChargeDensity(context: DecodeContext): void {
  const { namespace, source, endian, log } = context;
  const nx = requireCount(namespace, "ngx_fine", DENSITY_CONTEXT);
  const ny = requireCount(namespace, "ngy_fine", DENSITY_CONTEXT);
  const nz = requireCount(namespace, "ngz_fine", DENSITY_CONTEXT);
  const nspins = requireCount(namespace, "nspins", DENSITY_CONTEXT);

  const spinTreatment = requireString(namespace, "spin_treatment", DENSITY_CONTEXT);
  const vector = spinTreatment.toUpperCase() === VECTOR_SPIN;
  log("decodeChargeDensity", `${nx}x${ny}x${nz} grid, spin treatment ${spinTreatment}`);
  const collinear = nspins === 2 && !vector;

  const density = zeros("c16", [nx, ny, nz]);
  let spinDensity: ComplexArray | null = null;
  if (vector) {
    spinDensity = zeros("c16", [nx, ny, nz, 3]);
  } else if (collinear) {
    spinDensity = zeros("c16", [nx, ny, nz]);
  }

  const plane = nx * ny;
  for (let column = 0; column < plane; column++) {
    const payload = readPayload(source, endian);
    const [ix, iy] = decodeInt32(payload, 2, endian);
    const x = ix - 1;
    const y = iy - 1;
    if (x < 0 || x >= nx || y < 0 || y >= ny) {
      throw new MalformedRecordError(
        `${DENSITY_CONTEXT}: column (${ix}, ${iy}) outside fine grid ${nx} x ${ny}`
      );
    }

    const origin = x + nx * y;
    scatterComplex(density, decodeComplex(payload.subarray(8), nz, endian), origin, plane, nz);

    const spinBytes = payload.subarray(8 + 16 * nz);
    if (spinDensity && vector) {
      // Written z-major: (z0 c0, z0 c1, z0 c2, z1 c0, ...)
      const values = decodeComplex(spinBytes, 3 * nz, endian);
      for (let c = 0; c < 3; c++) {
        for (let z = 0; z < nz; z++) {
          const k = 2 * (origin + plane * (z + nz * c));
          spinDensity.data[k] = values[2 * (3 * z + c)];
          spinDensity.data[k + 1] = values[2 * (3 * z + c) + 1];
        }
      }
    } else if (spinDensity) {
      scatterComplex(spinDensity, decodeComplex(spinBytes, nz, endian), origin, plane, nz);
    }
  }

  if (spinDensity) {
    namespace.set("spin_density", spinDensity);
  }
  namespace.set("charge_density", density);
}

function decodeLocal(field: CompositeField, context: DecodeContext): Namespace {
  const local: Namespace = new Map();
  decodeComposite(field, { ...context, namespace: local, ledger: undefined });
  return local;
}

/**
 * Read the plane-wave block of a checkpoint file into `wavefunction`.
 *
 * Layout: the FFT mesh; the tensor dimensions (nwave_max, nspinors,
 * nbands_max, nkpts, nspins); then for each spin and k-point a record with
 * the k-point and its plane-wave count, three records with the x, y and z
 * grid coordinates of those plane waves, and one record of coefficients per
 * band and spinor. Slots past a k-point's plane-wave count stay zero.
 */
export function decodeWavefunction(context: DecodeContext): void {
  const { source, endian } = context;

  const meshValues = decodeLocal(WAVE_MESH, context);
  const mesh: [number, number, number] = [
    requireCount(meshValues, "ngx", WAVE_CONTEXT),
    requireCount(meshValues, "ngy", WAVE_CONTEXT),
    requireCount(meshValues, "ngz", WAVE_CONTEXT),
  ];

  const dims = decodeLocal(WAVE_DIMENSIONS, context);
  const nwaveMax = requireCount(dims, "nwave_max", WAVE_CONTEXT);
  const nspinors = requireCount(dims, "nspinors", WAVE_CONTEXT);
  const nbands = requireCount(dims, "nbands_max", WAVE_CONTEXT);
  const nkpts = requireCount(dims, "nkpts", WAVE_CONTEXT);
  const nspins = requireCount(dims, "nspins", WAVE_CONTEXT);

  const coeffs = zeros("c16", [nwaveMax, nspinors, nbands, nkpts, nspins]);
  const gridCoords = zeros("i4", [3, nwaveMax, nkpts]);
  const kpoints = zeros("f8", [3, nkpts]);
  const nwavesAtKp = new Int32Array(nkpts);

  for (let is = 0; is < nspins; is++) {
    for (let ik = 0; ik < nkpts; ik++) {
      const header = decodeLocal(WAVE_KPOINT, context);
      const kpoint = requireFloatArray(header, "kpoint", WAVE_CONTEXT);
      const nwaves = requireNumber(header, "nwaves", WAVE_CONTEXT);
      if (!Number.isInteger(nwaves) || nwaves < 0 || nwaves > nwaveMax) {
        throw new MalformedRecordError(
          `${WAVE_CONTEXT}: k-point ${ik + 1} has ${nwaves} plane waves, capacity is ${nwaveMax}`
        );
      }
      kpoints.data.set(kpoint.data, 3 * ik);
      nwavesAtKp[ik] = nwaves;

      for (let axis = 0; axis < 3; axis++) {
        const coords = decodeInt32(readPayload(source, endian), nwaves, endian);
        for (let ipw = 0; ipw < nwaves; ipw++) {
          gridCoords.data[axis + 3 * (ipw + nwaveMax * ik)] = coords[ipw];
        }
      }

      for (let ib = 0; ib < nbands; ib++) {
        for (let isp = 0; isp < nspinors; isp++) {
          const values = decodeComplex(readPayload(source, endian), nwaves, endian);
          const offset = nwaveMax * (isp + nspinors * (ib + nbands * (ik + nkpts * is)));
          coeffs.data.set(values, 2 * offset);
        }
      }
    }
  }

  const block: WavefunctionBlock = { mesh, coeffs, gridCoords, nwavesAtKp, kpoints };
  context.namespace.set("wavefunction", block);
}

export function decodeStructured(field: StructuredField, context: DecodeContext): void {
  switch (field.protocol) {
    case "eigenvalues-occupancies":
      return decodeEigenvaluesOccupancies(context);
    case "charge-density":
      return decodeChargeDensity(context);
    case "wavefunction":
      return decodeWavefunction(context);
  }
}
