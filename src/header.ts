/**
 * colbridge — container header initialization and validation
 *
 * Every container starts with a header holding:
 *
 *   Static geometry  — magic, version, schema fingerprint, chunk size, row and
 *                      batch counts, and a CRC of those six fields (header_crc)
 *   Schema bytes     — compact binary-encoded TableSchema (type_tag + flags)
 *   Metadata region  — UTF-8 JSON { columns: ColumnMeta[] }, built from the
 *                      schema's names, zones and source offsets
 *
 * encodeTableHeader() — called once by the writer after all batches are laid out.
 * readTableHeader()   — called by readers to validate and reconstruct the
 *                       TableHeader before any batch is decoded.
 */

import {
  TABLE_MAGIC,
  TABLE_VERSION,
  OFFSET_MAGIC,
  OFFSET_VERSION,
  OFFSET_SCHEMA_FP,
  OFFSET_CHUNK_SIZE,
  OFFSET_ROW_COUNT,
  OFFSET_BATCH_COUNT,
  OFFSET_HEADER_CRC,
  OFFSET_SCHEMA_BYTE_LEN,
  OFFSET_SCHEMA_BYTES,
  MIN_CONTAINER_BYTES,
} from './constants';
import {
  encodeSchema,
  decodeSchema,
  fnv1a32,
  schemaColumns,
  schemaFingerprint,
  type ColumnMeta,
} from './schema';
import type { TableSchema } from './types';

// ─── Errors ───────────────────────────────────────────────────────────────────

export class TableHeaderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TableHeaderError';
  }
}

// ─── Types ────────────────────────────────────────────────────────────────────

export interface TableGeometry {
  /** Maximum rows per batch. */
  readonly chunk_size:  number;
  readonly row_count:   number;
  readonly batch_count: number;
}

export interface TableHeader extends TableGeometry {
  readonly schema_fingerprint: number;
  readonly schema:             TableSchema;
  /** Byte offset of the first row batch. */
  readonly header_bytes:       number;
}

// ─── Internal helpers ─────────────────────────────────────────────────────────

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

function isColumnMeta(v: unknown): v is ColumnMeta {
  if (v === null || typeof v !== 'object' || Array.isArray(v)) return false;
  const name = Reflect.get(v, 'name');
  const tz   = Reflect.get(v, 'timezone');
  const src  = Reflect.get(v, 'sourceOffset');
  return typeof name === 'string' &&
    (tz === undefined || typeof tz === 'string') &&
    (src === undefined || typeof src === 'string');
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === 'object' && !Array.isArray(v);
}

function hex32(n: number): string {
  return `0x${n.toString(16).padStart(8, '0')}`;
}

// ─── encodeTableHeader ────────────────────────────────────────────────────────

/**
 * Encode the container header for `schema` and the given geometry.
 *
 * Field names are NOT stored in the binary schema bytes; they travel in the
 * metadata region's `columns` array.
 */
export function encodeTableHeader(schema: TableSchema, geometry: TableGeometry): Uint8Array {
  for (const [label, v] of [
    ['chunk_size',  geometry.chunk_size],
    ['row_count',   geometry.row_count],
    ['batch_count', geometry.batch_count],
  ] as const) {
    if (!Number.isInteger(v) || v < 0 || v > 0xffffffff) {
      throw new TableHeaderError(`${label} must be a u32; got ${v}.`);
    }
  }

  if (geometry.chunk_size === 0) {
    throw new TableHeaderError('chunk_size must be positive; got 0.');
  }

  const schemaBytes = encodeSchema(schema);
  const metaBytes   = utf8Encoder.encode(JSON.stringify({ columns: schemaColumns(schema) }));
  const total       = OFFSET_SCHEMA_BYTES + schemaBytes.length + 4 + metaBytes.length;

  const out  = new Uint8Array(total);
  const view = new DataView(out.buffer);

  view.setUint32(OFFSET_MAGIC,       TABLE_MAGIC,                /* le */ true);
  view.setUint32(OFFSET_VERSION,     TABLE_VERSION,                       true);
  view.setUint32(OFFSET_SCHEMA_FP,   schemaFingerprint(schema),           true);
  view.setUint32(OFFSET_CHUNK_SIZE,  geometry.chunk_size,                 true);
  view.setUint32(OFFSET_ROW_COUNT,   geometry.row_count,                  true);
  view.setUint32(OFFSET_BATCH_COUNT, geometry.batch_count,                true);

  // The CRC is the last static field written so the six geometry values are
  // already stable when the hash is computed.
  view.setUint32(OFFSET_HEADER_CRC, fnv1a32(out.subarray(0, OFFSET_HEADER_CRC)), true);

  view.setUint32(OFFSET_SCHEMA_BYTE_LEN, schemaBytes.length, true);
  out.set(schemaBytes, OFFSET_SCHEMA_BYTES);

  const metaOffset = OFFSET_SCHEMA_BYTES + schemaBytes.length;
  view.setUint32(metaOffset, metaBytes.length, true);
  out.set(metaBytes, metaOffset + 4);

  return out;
}

// ─── readTableHeader ──────────────────────────────────────────────────────────

/**
 * Read and strictly validate a container header.
 *
 * Throws TableHeaderError on:
 *   - Truncation            (fewer bytes than the header declares)
 *   - Magic mismatch        (bytes were not written by colbridge)
 *   - Version mismatch      (written by an incompatible version)
 *   - Header CRC mismatch   (geometry fields corrupted)
 *   - Corrupt metadata      (not a JSON object with a valid `columns` array)
 *   - Corrupt schema        (truncated or unknown type tags)
 *   - Fingerprint mismatch  (schema bytes inconsistent with stored fingerprint)
 *
 * Validation order is fastest-to-detect-corruption first.
 */
export function readTableHeader(bytes: Uint8Array): TableHeader {
  if (bytes.byteLength < MIN_CONTAINER_BYTES) {
    throw new TableHeaderError(
      `Container is ${bytes.byteLength} bytes; a header requires at least ${MIN_CONTAINER_BYTES}.`,
    );
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  // ── Magic ──────────────────────────────────────────────────────────────────

  const magic = view.getUint32(OFFSET_MAGIC, true);
  if (magic !== TABLE_MAGIC) {
    throw new TableHeaderError(
      `Invalid magic: got ${hex32(magic).toUpperCase()}; expected ${hex32(TABLE_MAGIC).toUpperCase()} ('CBAR'). ` +
      `These bytes were not written by colbridge.`,
    );
  }

  // ── Version ────────────────────────────────────────────────────────────────

  const version = view.getUint32(OFFSET_VERSION, true);
  if (version !== TABLE_VERSION) {
    throw new TableHeaderError(
      `Unsupported container version ${version}. ` +
      `This build reads version ${TABLE_VERSION} only.`,
    );
  }

  // ── Header CRC ────────────────────────────────────────────────────────────

  const storedCRC   = view.getUint32(OFFSET_HEADER_CRC, true);
  const computedCRC = fnv1a32(bytes.subarray(0, OFFSET_HEADER_CRC));
  if (storedCRC !== computedCRC) {
    throw new TableHeaderError(
      `Header geometry CRC mismatch: stored ${hex32(storedCRC)}, computed ${hex32(computedCRC)}.`,
    );
  }

  // ── Geometry ───────────────────────────────────────────────────────────────

  const schema_fingerprint = view.getUint32(OFFSET_SCHEMA_FP,       true);
  const chunk_size         = view.getUint32(OFFSET_CHUNK_SIZE,      true);
  const row_count          = view.getUint32(OFFSET_ROW_COUNT,       true);
  const batch_count        = view.getUint32(OFFSET_BATCH_COUNT,     true);
  const schema_byte_len    = view.getUint32(OFFSET_SCHEMA_BYTE_LEN, true);

  if (chunk_size === 0) {
    throw new TableHeaderError('chunk_size is 0. The header is corrupt.');
  }

  const metaLenOffset = OFFSET_SCHEMA_BYTES + schema_byte_len;
  if (schema_byte_len < 2 || metaLenOffset + 4 > bytes.byteLength) {
    throw new TableHeaderError(
      `schema_byte_len ${schema_byte_len} is out of range for a ${bytes.byteLength}-byte container.`,
    );
  }

  // ── Producer metadata ─────────────────────────────────────────────────────
  //
  // Read meta BEFORE decoding the schema so column names are available to
  // pass to decodeSchema().

  const meta_byte_len = view.getUint32(metaLenOffset, true);
  const header_bytes  = metaLenOffset + 4 + meta_byte_len;
  if (header_bytes > bytes.byteLength) {
    throw new TableHeaderError(
      `meta_byte_len ${meta_byte_len} runs past the end of the container.`,
    );
  }

  let parsedMeta: unknown;
  try {
    parsedMeta = JSON.parse(utf8Decoder.decode(bytes.subarray(metaLenOffset + 4, header_bytes)));
  } catch (err) {
    throw new TableHeaderError(
      `Header metadata is not valid UTF-8 JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  if (!isPlainObject(parsedMeta)) {
    throw new TableHeaderError('Header metadata must be a JSON object.');
  }

  // Keys other than `columns` are ignored.
  const columns = parsedMeta['columns'];
  if (!Array.isArray(columns) || !columns.every(isColumnMeta)) {
    throw new TableHeaderError('Header metadata is missing a valid `columns` array.');
  }

  // ── Schema ─────────────────────────────────────────────────────────────────

  const schema = decodeSchema(
    bytes.subarray(OFFSET_SCHEMA_BYTES, metaLenOffset),
    columns,
  );
  if (schema === null) {
    throw new TableHeaderError(
      `Failed to decode schema descriptor (${schema_byte_len} bytes). ` +
      `The header is corrupt or was written by an incompatible version.`,
    );
  }

  if (columns.length !== schema.fields.length) {
    throw new TableHeaderError(
      `Header names ${columns.length} columns but the schema declares ${schema.fields.length} fields.`,
    );
  }

  // ── Fingerprint integrity ──────────────────────────────────────────────────

  const computedFp = schemaFingerprint(schema);
  if (computedFp !== schema_fingerprint) {
    throw new TableHeaderError(
      `Schema fingerprint mismatch: header stores ${hex32(schema_fingerprint)}, ` +
      `decoded schema hashes to ${hex32(computedFp)}.`,
    );
  }

  return {
    schema_fingerprint,
    chunk_size,
    row_count,
    batch_count,
    schema,
    header_bytes,
  };
}
