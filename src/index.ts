/**
 * castep-bin - TypeScript reader for CASTEP castep_bin and check files.
 *
 * Decodes the Fortran unformatted records of a CASTEP binary dump into typed,
 * correctly shaped arrays and scalars.
 *
 * @packageDocumentation
 */

// Main entry points
export { CastepBinReader, decodeStandardFile } from "./reader.js";
export { DecodeOptionsSchema, DEFAULT_READ_THRESHOLD, resolveOptions } from "./config.js";
export type { DecodeOptions, Endian, ResolvedOptions } from "./config.js";

// Core types
export type {
  NumericType,
  StringType,
  ElementType,
  Complex,
  IntArray,
  FloatArray,
  ComplexArray,
  StringArray,
  NumericArray,
  NdArray,
  Dim,
  ScalarField,
  ArrayField,
  StringField,
  BoolField,
  SkipField,
  MemberField,
  CompositeField,
  StructuredField,
  StructuredProtocol,
  FieldSpec,
  SectionSpec,
  SpecMap,
  WavefunctionBlock,
  DecodedValue,
  Namespace,
  PendingLedger,
  HeaderIndex,
  WavefunctionRecord,
} from "./core/types.js";

// Errors
export {
  CastepBinError,
  RecordMarkerMismatchError,
  HeaderNotFoundError,
  AmbiguousShapeError,
  UnresolvableShapeError,
  InvalidCompositeLayoutError,
  MissingFieldError,
  MalformedRecordError,
} from "./core/errors.js";
export type { CastepBinErrorCode } from "./core/errors.js";

// Wavefunctions
export {
  buildWavefunction,
  reciprocalGrid,
  toGrid,
  coordsToIndices,
  planeWaveCoeffs,
  gVectors,
  gMeshIndices,
  kpointsCartesian,
} from "./core/wave.js";
export type { StateSelection } from "./core/wave.js";

// Arrays
export {
  zeros,
  sizeOf,
  flatIndex,
  reshape,
  getValue,
  setValue,
  getComplex,
  setComplex,
  isNdArray,
  isWavefunctionBlock,
} from "./core/ndarray.js";

// Low-level APIs for advanced usage
export { BufferSource, FileSource, openSource, isZstdFrame } from "./backend/source.js";
export type { ByteSource } from "./backend/source.js";
export { readRecord, readMarker, readPayload } from "./core/record.js";
export { buildHeaderIndex, findHeaderSuffix, isHeaderText } from "./core/header-index.js";
export { resolveShape, resolvePending, lookupDim } from "./core/shape.js";
export { decodeArray, decodeComposite, decodeMember } from "./core/fields.js";
export type { DecodeContext } from "./core/fields.js";
export { decode, decodeSection, decodeField } from "./core/decode.js";
export {
  STANDARD_SPEC_MAP,
  CHECKPOINT_SPEC_MAP,
  specMapFor,
  scalar,
  array,
  str,
  bool,
  skip,
  composite,
  structured,
} from "./core/spec-map.js";
export { createLogger } from "./log.js";
export type { Logger } from "./log.js";
