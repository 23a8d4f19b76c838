/**
 * Reader options.
 */

import { z } from "zod";
import { createLogger } from "./log.js";
import type { Logger } from "./log.js";

/** Records at or below this many bytes are read even when skipping */
export const DEFAULT_READ_THRESHOLD = 512;

export const DecodeOptionsSchema = z.object({
  /** Byte order of record markers and payloads (CASTEP builds default to big) */
  endian: z.enum(["big", "little"]).default("big"),
  /** Only decode these headers (CELL% headers are always decoded) */
  headers: z.array(z.string().min(1)).optional(),
  /** Store arrays with unknown axes flat and solve all shapes at the end */
  deferShapes: z.boolean().default(false),
  readThreshold: z.number().int().nonnegative().default(DEFAULT_READ_THRESHOLD),
  /** Log progress through console.log */
  debug: z.boolean().default(false),
});

export type DecodeOptions = z.input<typeof DecodeOptionsSchema>;

export type Endian = z.infer<typeof DecodeOptionsSchema>["endian"];

export interface ResolvedOptions {
  endian: Endian;
  headers?: readonly string[];
  deferShapes: boolean;
  readThreshold: number;
  log: Logger;
}

/**
 * Validate user options and fill in defaults.
 */
export function resolveOptions(options: DecodeOptions = {}): ResolvedOptions {
  const parsed = DecodeOptionsSchema.parse(options);
  return {
    endian: parsed.endian,
    headers: parsed.headers,
    deferShapes: parsed.deferShapes,
    readThreshold: parsed.readThreshold,
    log: createLogger(parsed.debug),
  };
}
