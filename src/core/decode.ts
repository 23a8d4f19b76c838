/**
 * Section dispatch for castep_bin files.
 *
 * Walks a spec map in order; for each header present in the header index,
 * seeks to the record after the header and decodes the section's fields into
 * one shared namespace.
 */

import { resolveOptions } from "../config.js";
import { HeaderNotFoundError } from "./errors.js";
import { decodeComposite, decodeMember } from "./fields.js";
import { readPayload, readRecord } from "./record.js";
import { resolvePending } from "./shape.js";
import { CELL_PREFIX, ELECTRONIC_HEADER } from "./spec-map.js";
import { decodeStructured } from "./structured.js";
import type { ByteSource } from "../backend/source.js";
import type { DecodeOptions } from "../config.js";
import type { DecodeContext } from "./fields.js";
import type { FieldSpec, HeaderIndex, Namespace, PendingLedger, SectionSpec, SpecMap } from "./types.js";

/**
 * Decode one field at the current position.
 */
export function decodeField(field: FieldSpec, context: DecodeContext): void {
  const { source, endian, namespace } = context;
  switch (field.kind) {
    case "skip":
      readRecord(source, { endian, skip: true, readThreshold: context.readThreshold });
      return;
    case "scalar":
    case "array": {
      const value = decodeMember(field, readPayload(source, endian), context);
      namespace.set(field.name, value);
      if (field.alias !== undefined) {
        namespace.set(field.alias, value);
        const pending = context.ledger?.get(field.name);
        if (pending) context.ledger?.set(field.alias, pending);
      }
      return;
    }
    case "string":
    case "bool":
      namespace.set(field.name, decodeMember(field, readPayload(source, endian), context));
      return;
    case "composite":
      decodeComposite(field, context);
      return;
    case "structured":
      decodeStructured(field, context);
      return;
  }
}

/**
 * Decode a section's fields starting at `offset`.
 */
export function decodeSection(section: SectionSpec, offset: number, context: DecodeContext): void {
  context.source.seek(offset);
  for (const field of section.fields) {
    decodeField(field, context);
  }
}

function alwaysDecoded(header: string): boolean {
  return header.startsWith(CELL_PREFIX) || header === ELECTRONIC_HEADER;
}

/**
 * Decode every section of `specMap` found in the file.
 *
 * With a `headers` filter only those headers are decoded, plus the CELL%
 * headers that supply array extents to the rest and BEGIN_ELECTRONIC, whose
 * spin treatment fixes the density layout. A requested header missing
 * from the file is an error; any other missing header is skipped.
 */
export function decode(
  source: ByteSource,
  specMap: SpecMap,
  headerIndex: HeaderIndex,
  options: DecodeOptions = {}
): Namespace {
  const { endian, headers, deferShapes, readThreshold, log } = resolveOptions(options);
  const requested = headers ? new Set(headers) : null;
  const namespace: Namespace = new Map();
  const ledger: PendingLedger | undefined = deferShapes ? new Map() : undefined;
  const context: DecodeContext = { source, namespace, endian, readThreshold, ledger, log };

  for (const section of specMap) {
    const { header } = section;
    if (requested && !requested.has(header) && !alwaysDecoded(header)) {
      continue;
    }

    const offset = headerIndex.offsets.get(header);
    if (offset === undefined) {
      if (requested?.has(header)) {
        throw new HeaderNotFoundError(header);
      }
      continue;
    }

    log("decode", `Decoding ${header} at offset ${offset}`);
    decodeSection(section, offset, context);
  }

  if (ledger && ledger.size > 0) {
    log("decode", `Resolving deferred shapes of ${[...ledger.keys()].join(", ")}`);
    resolvePending(namespace, ledger, log);
  }

  return namespace;
}
