/**
 * Section header scan.
 *
 * CASTEP writes each section as a short text record (e.g. "CELL%NUM_IONS")
 * followed by its data records. One pass over the file, skipping large
 * payloads, locates every header and the offset of the record after it.
 */

import { decodeAscii } from "../encoding/elements.js";
import { readRecord } from "./record.js";
import { silentLogger } from "../log.js";
import type { ByteSource } from "../backend/source.js";
import type { Endian } from "../config.js";
import type { Logger } from "../log.js";
import type { HeaderIndex } from "./types.js";

/** First record of a standard castep_bin file */
export const FILE_TITLE = "CASTEP_BIN";

/** Last header of every file */
export const END_HEADER = "END";

export interface HeaderIndexOptions {
  endian?: Endian;
  readThreshold?: number;
  log?: Logger;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Pick the key for a header already in the map: `<name>_NN`, one past the
 * largest suffix stored so far for that name.
 */
export function findHeaderSuffix(name: string, offsets: Map<string, number>): string {
  const pattern = new RegExp(`^${escapeRegExp(name)}_(\\d+)$`);
  let counter = 1;
  for (const key of offsets.keys()) {
    const match = pattern.exec(key);
    if (match) {
      const n = Number(match[1]);
      if (n >= counter) counter = n + 1;
    }
  }
  return `${name}_${String(counter).padStart(2, "0")}`;
}

/**
 * A header is non-empty uppercase text starting with a letter.
 */
export function isHeaderText(text: string): boolean {
  return /^[A-Za-z]/.test(text) && text.toUpperCase() === text;
}

/**
 * Scan `source` from the start and index its section headers.
 *
 * A file whose first record is not the CASTEP_BIN title is taken to be a
 * checkpoint file; scanning then restarts from byte zero so its first
 * record is considered too.
 */
export function buildHeaderIndex(
  source: ByteSource,
  options: HeaderIndexOptions = {}
): HeaderIndex {
  const { endian = "big", readThreshold, log = silentLogger } = options;
  const offsets = new Map<string, number>();

  source.seek(0);
  const first = readRecord(source, { endian, skip: true, readThreshold });
  const title = first.data ? decodeAscii(first.data) : undefined;
  const isCheckpoint = title !== FILE_TITLE;
  if (isCheckpoint) {
    source.seek(0);
  }

  let text: string | undefined;
  while (text !== END_HEADER) {
    const { data } = readRecord(source, { endian, skip: true, readThreshold });
    text = data ? decodeAscii(data) : undefined;
    if (text === undefined || !isHeaderText(text)) continue;

    // The cell is written twice: once as read, once as relaxed
    const key = offsets.has(text) ? findHeaderSuffix(text, offsets) : text;
    offsets.set(key, source.tell());
  }

  log(
    "buildHeaderIndex",
    `Found ${offsets.size} headers (${isCheckpoint ? "checkpoint" : "standard"} layout)`
  );
  return { offsets, isCheckpoint };
}
