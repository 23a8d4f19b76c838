import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  BufferSource,
  FileSource,
  isZstdFrame,
  openSource,
} from "../src/backend/source.js";
import { MalformedRecordError } from "../src/core/errors.js";
import { concatBytes } from "./helpers/writer.js";

/**
 * A single-segment zstd frame holding `data` as one raw block.
 */
function zstdRawFrame(data: Uint8Array): Uint8Array {
  if (data.length > 255) throw new RangeError("one-byte content size only");
  const blockHeader = (data.length << 3) | 1; // last block, raw
  return concatBytes(
    new Uint8Array([0x28, 0xb5, 0x2f, 0xfd, 0x20, data.length]),
    new Uint8Array([blockHeader & 0xff, (blockHeader >> 8) & 0xff, (blockHeader >> 16) & 0xff]),
    data
  );
}

const SAMPLE = Uint8Array.from([1, 2, 3, 4, 5, 6, 7, 8]);

describe("BufferSource", () => {
  it("should read, skip and seek", () => {
    const source = new BufferSource(SAMPLE);
    expect(Array.from(source.read(2))).toEqual([1, 2]);
    source.skip(3);
    expect(source.tell()).toBe(5);
    expect(Array.from(source.read(3))).toEqual([6, 7, 8]);
    source.seek(1);
    expect(Array.from(source.read(1))).toEqual([2]);
  });

  it("should reject reads past the end", () => {
    const source = new BufferSource(SAMPLE);
    source.seek(6);
    expect(() => source.read(3)).toThrow(MalformedRecordError);
    expect(() => source.seek(9)).toThrow(MalformedRecordError);
  });
});

describe("FileSource", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "castep-bin-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should read positionally from disk", () => {
    const path = join(dir, "sample.bin");
    writeFileSync(path, SAMPLE);

    const source = new FileSource(path);
    try {
      expect(source.size).toBe(8);
      source.seek(4);
      expect(Array.from(source.read(4))).toEqual([5, 6, 7, 8]);
      expect(() => source.read(1)).toThrow(MalformedRecordError);
    } finally {
      source.close();
    }
  });

  it("should refuse reads once closed", () => {
    const path = join(dir, "sample.bin");
    writeFileSync(path, SAMPLE);

    const source = new FileSource(path);
    source.close();
    source.close();
    expect(() => source.read(1)).toThrow("File source already closed");
  });

  it("should decompress a zstd file", () => {
    const path = join(dir, "sample.bin.zst");
    writeFileSync(path, zstdRawFrame(SAMPLE));

    const source = openSource(path);
    expect(source).toBeInstanceOf(BufferSource);
    expect(source.size).toBe(8);
    expect(Array.from(source.read(8))).toEqual(Array.from(SAMPLE));
  });

  it("should open plain files directly", () => {
    const path = join(dir, "sample.bin");
    writeFileSync(path, SAMPLE);

    const source = openSource(path);
    try {
      expect(source).toBeInstanceOf(FileSource);
      expect(source.tell()).toBe(0);
    } finally {
      source.close();
    }
  });
});

describe("openSource", () => {
  it("should wrap plain bytes", () => {
    const source = openSource(SAMPLE);
    expect(source.size).toBe(8);
    expect(Array.from(source.read(1))).toEqual([1]);
  });

  it("should decompress zstd bytes", () => {
    const source = openSource(zstdRawFrame(SAMPLE));
    expect(Array.from(source.read(source.size))).toEqual(Array.from(SAMPLE));
  });
});

describe("isZstdFrame", () => {
  it("should check the frame magic", () => {
    expect(isZstdFrame(zstdRawFrame(SAMPLE))).toBe(true);
    expect(isZstdFrame(SAMPLE)).toBe(false);
    expect(isZstdFrame(new Uint8Array([0x28, 0xb5]))).toBe(false);
  });
});
