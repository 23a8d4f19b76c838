/**
 * Core type definitions for castep_bin data structures.
 */

/** Numeric element types: 4-byte integer, 8-byte float, 16-byte complex */
export type NumericType = "i4" | "f8" | "c16";

/** Fixed-width ASCII block, e.g. "a8" */
export type StringType = `a${number}`;

export type ElementType = NumericType | StringType;

export interface Complex {
  re: number;
  im: number;
}

/**
 * Arrays keep their elements in Fortran (column-major) order: the first
 * axis varies fastest.
 */
export interface IntArray {
  dtype: "i4";
  shape: number[];
  data: Int32Array;
}

export interface FloatArray {
  dtype: "f8";
  shape: number[];
  data: Float64Array;
}

/** Interleaved (re, im) pairs, so `data.length === 2 * size` */
export interface ComplexArray {
  dtype: "c16";
  shape: number[];
  data: Float64Array;
}

export interface StringArray {
  dtype: "str";
  shape: number[];
  data: string[];
}

export type NumericArray = IntArray | FloatArray | ComplexArray;
export type NdArray = NumericArray | StringArray;

/** An axis extent: a literal, or the name of a scalar decoded elsewhere */
export type Dim = number | string;

/** Field specifications */
export interface ScalarField {
  kind: "scalar";
  name: string;
  dtype: NumericType;
  /** Second name the value is also stored under */
  alias?: string;
}

export interface ArrayField {
  kind: "array";
  name: string;
  dtype: ElementType;
  shape: readonly Dim[];
  alias?: string;
}

export interface StringField {
  kind: "string";
  name: string;
  dtype: StringType;
}

/** Fortran LOGICAL stored as a 4-byte integer; nonzero is true */
export interface BoolField {
  kind: "bool";
  name: string;
}

export interface SkipField {
  kind: "skip";
}

/** Fields that can share a record inside a composite */
export type MemberField = ScalarField | ArrayField | StringField | BoolField;

export interface CompositeField {
  kind: "composite";
  fields: readonly MemberField[];
}

export type StructuredProtocol =
  | "eigenvalues-occupancies"
  | "charge-density"
  | "wavefunction";

export interface StructuredField {
  kind: "structured";
  protocol: StructuredProtocol;
}

export type FieldSpec =
  | MemberField
  | SkipField
  | CompositeField
  | StructuredField;

/** The ordered fields that follow one section header */
export interface SectionSpec {
  header: string;
  fields: readonly FieldSpec[];
}

export type SpecMap = readonly SectionSpec[];

/** Plane-wave block of a checkpoint file */
export interface WavefunctionBlock {
  /** FFT mesh (ngx, ngy, ngz) */
  mesh: [number, number, number];
  /** (npw_max, nspinor, nbands, nkpts, nspins) */
  coeffs: ComplexArray;
  /** Signed reciprocal-lattice indices, (3, npw_max, nkpts) */
  gridCoords: IntArray;
  /** Populated plane-wave slots per k-point */
  nwavesAtKp: Int32Array;
  /** Fractional k-point coordinates, (3, nkpts) */
  kpoints: FloatArray;
}

export type DecodedValue =
  | number
  | boolean
  | string
  | string[]
  | Complex
  | NdArray
  | WavefunctionBlock;

/** Flat field name -> value map built up while decoding one file */
export type Namespace = Map<string, DecodedValue>;

/** Arrays still stored flat, keyed by field name, with their declared shape */
export type PendingLedger = Map<string, readonly Dim[]>;

export interface HeaderIndex {
  /** Header -> offset of the record following it */
  offsets: Map<string, number>;
  /** The file had no CASTEP_BIN title (checkpoint layout) */
  isCheckpoint: boolean;
}

/** Wavefunction with the lattice and band context needed to use it */
export interface WavefunctionRecord {
  coeffs: ComplexArray;
  gridCoords: IntArray;
  nwavesAtKp: Int32Array;
  kpoints: FloatArray;
  mesh: [number, number, number];
  nwaveMax: number;
  nspinors: number;
  nbands: number;
  nkpts: number;
  nspins: number;
  realLattice: FloatArray;
  recipLattice: FloatArray;
  eigenvalues: FloatArray;
  occupancies: FloatArray;
  fermiEnergy: number;
}
