/**
 * Byte sources for castep_bin files.
 *
 * Decoding is synchronous and sequential, so a source is just a cursor over
 * bytes that can skip forward and seek back. Files are read positionally
 * without loading them whole; zstd-compressed files are decompressed into
 * memory first.
 */

import { closeSync, fstatSync, openSync, readFileSync, readSync } from "node:fs";
import { decompress as zstdDecompress } from "fzstd";
import { MalformedRecordError } from "../core/errors.js";
import { silentLogger } from "../log.js";
import type { Logger } from "../log.js";

// zstd frame magic number 0xFD2FB528, stored little-endian
const ZSTD_MAGIC = new Uint8Array([0x28, 0xb5, 0x2f, 0xfd]);

export interface ByteSource {
  readonly size: number;
  tell(): number;
  seek(offset: number): void;
  /** Read exactly `length` bytes, advancing the cursor */
  read(length: number): Uint8Array;
  skip(length: number): void;
  close(): void;
}

function checkRange(position: number, length: number, size: number): void {
  if (length < 0 || position + length > size) {
    throw new MalformedRecordError(
      `Unexpected end of data: need ${length} bytes at offset ${position}, size is ${size}`
    );
  }
}

/**
 * In-memory source.
 */
export class BufferSource implements ByteSource {
  private readonly bytes: Uint8Array;
  private position = 0;

  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
  }

  get size(): number {
    return this.bytes.length;
  }

  tell(): number {
    return this.position;
  }

  seek(offset: number): void {
    checkRange(0, offset, this.size);
    this.position = offset;
  }

  read(length: number): Uint8Array {
    checkRange(this.position, length, this.size);
    const out = this.bytes.subarray(this.position, this.position + length);
    this.position += length;
    return out;
  }

  skip(length: number): void {
    checkRange(this.position, length, this.size);
    this.position += length;
  }

  close(): void {}
}

/**
 * File source using positional reads on a file descriptor.
 */
export class FileSource implements ByteSource {
  readonly path: string;
  readonly size: number;
  private fd: number | null;
  private position = 0;

  constructor(path: string) {
    this.path = path;
    this.fd = openSync(path, "r");
    this.size = fstatSync(this.fd).size;
  }

  private descriptor(): number {
    if (this.fd === null) {
      throw new Error(`File source already closed: ${this.path}`);
    }
    return this.fd;
  }

  tell(): number {
    return this.position;
  }

  seek(offset: number): void {
    checkRange(0, offset, this.size);
    this.position = offset;
  }

  read(length: number): Uint8Array {
    checkRange(this.position, length, this.size);
    const fd = this.descriptor();
    const out = new Uint8Array(length);
    let filled = 0;
    while (filled < length) {
      const n = readSync(fd, out, filled, length - filled, this.position + filled);
      if (n === 0) {
        throw new MalformedRecordError(
          `Unexpected end of file ${this.path} at offset ${this.position + filled}`
        );
      }
      filled += n;
    }
    this.position += length;
    return out;
  }

  skip(length: number): void {
    checkRange(this.position, length, this.size);
    this.position += length;
  }

  close(): void {
    if (this.fd !== null) {
      closeSync(this.fd);
      this.fd = null;
    }
  }
}

export function isZstdFrame(bytes: Uint8Array): boolean {
  if (bytes.length < ZSTD_MAGIC.length) return false;
  for (let i = 0; i < ZSTD_MAGIC.length; i++) {
    if (bytes[i] !== ZSTD_MAGIC[i]) return false;
  }
  return true;
}

/**
 * Open a path or byte array as a source, decompressing zstd input.
 */
export function openSource(
  input: string | Uint8Array,
  log: Logger = silentLogger
): ByteSource {
  if (typeof input !== "string") {
    if (isZstdFrame(input)) {
      const data = zstdDecompress(input);
      log("openSource", `Decompressed ${input.length} -> ${data.length} bytes`);
      return new BufferSource(data);
    }
    return new BufferSource(input);
  }

  const file = new FileSource(input);
  let compressed = false;
  try {
    compressed = file.size >= ZSTD_MAGIC.length && isZstdFrame(file.read(ZSTD_MAGIC.length));
    file.seek(0);
  } catch (err) {
    file.close();
    throw err;
  }
  if (!compressed) {
    log("openSource", `Opened ${input} (${file.size} bytes)`);
    return file;
  }

  file.close();
  const data = zstdDecompress(readFileSync(input));
  log("openSource", `Decompressed ${input} -> ${data.length} bytes`);
  return new BufferSource(data);
}
