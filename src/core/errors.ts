/**
 * Error taxonomy for castep_bin decoding.
 *
 * Every failure is a deterministic consequence of the file contents, so
 * nothing here is retried: callers should treat any `CastepBinError` as
 * "malformed or unsupported input file".
 */

export type CastepBinErrorCode =
  | "RECORD_MARKER_MISMATCH"
  | "HEADER_NOT_FOUND"
  | "AMBIGUOUS_SHAPE"
  | "UNRESOLVABLE_SHAPE"
  | "INVALID_COMPOSITE_LAYOUT"
  | "MISSING_FIELD"
  | "MALFORMED_RECORD";

export class CastepBinError extends Error {
  readonly code: CastepBinErrorCode;

  constructor(code: CastepBinErrorCode, message: string) {
    super(message);
    this.name = "CastepBinError";
    this.code = code;
  }
}

/**
 * Leading and trailing record markers differ: the stream is desynchronized.
 */
export class RecordMarkerMismatchError extends CastepBinError {
  readonly offset: number;
  readonly leading: number;
  readonly trailing: number;

  constructor(offset: number, leading: number, trailing: number) {
    super(
      "RECORD_MARKER_MISMATCH",
      `Record at offset ${offset}: start marker (${leading}) and end marker (${trailing}) differ`
    );
    this.name = "RecordMarkerMismatchError";
    this.offset = offset;
    this.leading = leading;
    this.trailing = trailing;
  }
}

export class HeaderNotFoundError extends CastepBinError {
  readonly header: string;

  constructor(header: string) {
    super("HEADER_NOT_FOUND", `Unable to find requested header ${header} in file`);
    this.name = "HeaderNotFoundError";
    this.header = header;
  }
}

export class AmbiguousShapeError extends CastepBinError {
  readonly field: string;
  readonly unresolved: string[];

  constructor(field: string, unresolved: string[]) {
    super(
      "AMBIGUOUS_SHAPE",
      `Cannot resolve the shape of ${field}: unknown axes ${unresolved.join(", ")}`
    );
    this.name = "AmbiguousShapeError";
    this.field = field;
    this.unresolved = unresolved;
  }
}

export class UnresolvableShapeError extends CastepBinError {
  /** Field name -> names of the axes that are still unknown */
  readonly pending: Record<string, string[]>;

  constructor(message: string, pending: Record<string, string[]> = {}) {
    super("UNRESOLVABLE_SHAPE", message);
    this.name = "UnresolvableShapeError";
    this.pending = pending;
  }
}

export class InvalidCompositeLayoutError extends CastepBinError {
  readonly field: string;

  constructor(field: string, size: number) {
    super(
      "INVALID_COMPOSITE_LAYOUT",
      `Composite member ${field} would consume ${size} bytes`
    );
    this.name = "InvalidCompositeLayoutError";
    this.field = field;
  }
}

export class MissingFieldError extends CastepBinError {
  readonly field: string;

  constructor(field: string, context: string) {
    super("MISSING_FIELD", `${context} requires field ${field}`);
    this.name = "MissingFieldError";
    this.field = field;
  }
}

/**
 * A record is shorter than its declared contents, the stream ended inside a
 * record, or a stored index points outside its array.
 */
export class MalformedRecordError extends CastepBinError {
  constructor(message: string) {
    super("MALFORMED_RECORD", message);
    this.name = "MalformedRecordError";
  }
}
