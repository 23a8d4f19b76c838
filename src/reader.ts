/**
 * CastepBinReader - open a castep_bin or check file and decode it.
 */

import { openSource } from "./backend/source.js";
import { resolveOptions } from "./config.js";
import { decode } from "./core/decode.js";
import { buildHeaderIndex } from "./core/header-index.js";
import { specMapFor } from "./core/spec-map.js";
import { buildWavefunction } from "./core/wave.js";
import type { ByteSource } from "./backend/source.js";
import type { DecodeOptions, ResolvedOptions } from "./config.js";
import type { HeaderIndex, Namespace, SpecMap, WavefunctionRecord } from "./core/types.js";

/**
 * Reader over one file. It owns the open file until `close()`.
 *
 * @example
 * ```typescript
 * import { CastepBinReader } from 'castep-bin';
 *
 * const reader = CastepBinReader.open('Si2.castep_bin');
 * try {
 *   const data = reader.decode(['FORCES']);
 *   console.log(data.get('forces'));
 * } finally {
 *   reader.close();
 * }
 * ```
 */
export class CastepBinReader {
  private readonly source: ByteSource;
  private readonly options: DecodeOptions;
  private readonly index: HeaderIndex;

  private constructor(source: ByteSource, options: DecodeOptions, resolved: ResolvedOptions) {
    this.source = source;
    this.options = options;
    this.index = buildHeaderIndex(source, resolved);
  }

  /**
   * Open a file path or in-memory file and index its headers.
   */
  static open(input: string | Uint8Array, options: DecodeOptions = {}): CastepBinReader {
    const resolved = resolveOptions(options);
    const source = openSource(input, resolved.log);
    try {
      return new CastepBinReader(source, options, resolved);
    } catch (err) {
      source.close();
      throw err;
    }
  }

  /** True for checkpoint (.check) files, which carry a wavefunction */
  get isCheckpoint(): boolean {
    return this.index.isCheckpoint;
  }

  /** Headers found in the file, in file order */
  get headers(): string[] {
    return [...this.index.offsets.keys()];
  }

  get headerIndex(): HeaderIndex {
    return this.index;
  }

  get specMap(): SpecMap {
    return specMapFor(this.index.isCheckpoint);
  }

  /**
   * Decode the file, optionally only the given headers (CELL% headers are
   * always included). Each call builds a fresh namespace.
   */
  decode(headers?: readonly string[]): Namespace {
    const options: DecodeOptions = headers
      ? { ...this.options, headers: [...headers] }
      : this.options;
    return decode(this.source, this.specMap, this.index, options);
  }

  /**
   * Decode the whole file and assemble its wavefunction.
   */
  readWavefunction(): WavefunctionRecord {
    return buildWavefunction(this.decode());
  }

  close(): void {
    this.source.close();
  }
}

/**
 * Decode a castep_bin or check file in one call.
 */
export function decodeStandardFile(
  input: string | Uint8Array,
  options: DecodeOptions = {}
): Namespace {
  const reader = CastepBinReader.open(input, options);
  try {
    return reader.decode();
  } finally {
    reader.close();
  }
}
