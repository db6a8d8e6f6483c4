/**
 * colbridge — TableWriter (Producer)
 *
 * Builds a complete container from a schema and one value array per field.
 *
 * ── Build cycle ──────────────────────────────────────────────────────────────
 *
 *   1. validate   — every column has the row count; every value matches its
 *                   field's type (MixedTypeError otherwise)
 *   2. batch      — rows are cut into batches of at most chunkSize rows
 *   3. encode     — each batch lays out, per field:
 *                     [body_len: u32][validity bitmap][values]
 *   4. header     — geometry, schema and metadata go in front of the batches
 *
 * Validation runs over the whole table before a single byte is produced, so
 * a failure never yields a partial container.
 *
 * The output is a pure function of (schema, values, chunkSize): the
 * same table always produces the same bytes, which is what lets the store
 * deduplicate by digest.
 */

import { DEFAULT_CHUNK_SIZE, MAX_UTF8_BATCH_BYTES } from './constants';
import { bitsetByteLength, createBitset, setBit, writeBitset } from './bitset';
import { encodeTableHeader } from './header';
import {
  FIELD_BYTE_WIDTHS,
  type FieldDescriptor,
  type FieldType,
  type TableSchema,
} from './types';

// ─── Errors ───────────────────────────────────────────────────────────────────

/** Base class for every failure to turn a table into container bytes. */
export class EncodingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EncodingError';
  }
}

/**
 * Thrown when a column holds a value its field type cannot represent:
 * a number in a utf8 field, a string in an f64 field, a mixture of kinds in
 * an untyped column. The encoder recovers from this once by coercing
 * generic columns to text.
 */
export class MixedTypeError extends EncodingError {
  readonly column: string;

  constructor(column: string, message: string) {
    super(message);
    this.name   = 'MixedTypeError';
    this.column = column;
  }
}

// ─── Public types ─────────────────────────────────────────────────────────────

/**
 * Values accepted per field type. Missing values (null / undefined) are
 * accepted for every type and clear the row's validity bit.
 *
 *   f64           number | bigint
 *   bool8         boolean
 *   utf8          string
 *   timestamp_ms  Date (an invalid Date is written as missing)
 */
export type WritableColumn = readonly unknown[];

export interface TableWriterOptions {
  /** Maximum rows per batch. Defaults to DEFAULT_CHUNK_SIZE. */
  readonly chunkSize?: number;
}

// ─── Module-level encoder ─────────────────────────────────────────────────────

const utf8Encoder = new TextEncoder();

/** Human-readable kind of a value, for error messages. */
export function describeValue(v: unknown): string {
  if (v === null) return 'null';
  if (v instanceof Date) return 'Date';
  if (Array.isArray(v)) return 'array';
  return typeof v;
}

// ─── TableWriter ──────────────────────────────────────────────────────────────

export class TableWriter {
  readonly schema:    TableSchema;
  readonly chunkSize: number;

  constructor(schema: TableSchema, options: TableWriterOptions = {}) {
    const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    if (!Number.isInteger(chunkSize) || chunkSize <= 0 || chunkSize > 0xffffffff) {
      throw new RangeError(`chunkSize must be a positive u32; got ${chunkSize}.`);
    }
    this.schema    = schema;
    this.chunkSize = chunkSize;
  }

  // ── write ─────────────────────────────────────────────────────────────────

  /**
   * Encode `columns` (one array per schema field, in field order) into a
   * container.
   *
   * @throws MixedTypeError if any value does not fit its field's type.
   * @throws RangeError     on a column count or row count mismatch.
   */
  write(columns: readonly WritableColumn[]): Uint8Array {
    const fields = this.schema.fields;
    if (columns.length !== fields.length) {
      throw new RangeError(
        `Schema declares ${fields.length} fields but ${columns.length} columns were supplied.`,
      );
    }

    const rowCount = columns[0]?.length ?? 0;
    columns.forEach((values, i) => {
      if (values.length !== rowCount) {
        throw new RangeError(
          `Column '${fields[i]?.name}' has ${values.length} rows; expected ${rowCount}.`,
        );
      }
    });
    if (rowCount > 0xffffffff) {
      throw new RangeError(`Row count ${rowCount} exceeds the u32 limit.`);
    }

    // ── Phase 1: validate everything before producing any bytes ─────────────
    fields.forEach((field, i) => validateColumn(field, columns[i] ?? []));

    // ── Phase 2 + 3: batch and encode ──────────────────────────────────────
    const parts: Uint8Array[] = [];
    let batchCount = 0;

    for (let start = 0; start < rowCount; start += this.chunkSize) {
      const rows = Math.min(this.chunkSize, rowCount - start);
      const rowsWord = new Uint8Array(4);
      new DataView(rowsWord.buffer).setUint32(0, rows, true);
      parts.push(rowsWord);

      fields.forEach((field, i) => {
        parts.push(encodeBody(field, (columns[i] ?? []).slice(start, start + rows)));
      });
      batchCount++;
    }

    // ── Phase 4: header in front ───────────────────────────────────────────
    const header = encodeTableHeader(
      this.schema,
      { chunk_size: this.chunkSize, row_count: rowCount, batch_count: batchCount },
    );

    return concatBytes([header, ...parts]);
  }
}

// ─── Private: validation ──────────────────────────────────────────────────────

function isMissing(v: unknown): v is null | undefined {
  return v === null || v === undefined;
}

function fitsFieldType(type: FieldType, v: unknown): boolean {
  switch (type) {
    case 'f64':          return typeof v === 'number' || typeof v === 'bigint';
    case 'bool8':        return typeof v === 'boolean';
    case 'utf8':         return typeof v === 'string';
    case 'timestamp_ms': return v instanceof Date;
  }
}

function validateColumn(field: FieldDescriptor, values: WritableColumn): void {
  values.forEach((v, row) => {
    if (isMissing(v) || fitsFieldType(field.type, v)) return;
    throw new MixedTypeError(
      field.name,
      `Column '${field.name}' (${field.type}) received ${describeValue(v)} at row ${row}; ` +
      `the column mixes incompatible value types.`,
    );
  });
}

// ─── Private: body encoding ───────────────────────────────────────────────────

/**
 * Encode one field's slice of a batch:
 *   [body_len: u32][validity bitmap: ceil(rows/32) u32 words][values]
 */
function encodeBody(field: FieldDescriptor, values: WritableColumn): Uint8Array {
  const rows     = values.length;
  const validity = createBitset(rows);
  values.forEach((v, j) => {
    if (!isMissing(v) && !(v instanceof Date && Number.isNaN(v.getTime()))) setBit(validity, j);
  });

  const bitmapLen = bitsetByteLength(rows);
  let valueBytes: Uint8Array;

  if (field.type === 'utf8') {
    valueBytes = encodeUtf8Values(field.name, values);
  } else {
    valueBytes = new Uint8Array(rows * FIELD_BYTE_WIDTHS[field.type]);
    const dv = new DataView(valueBytes.buffer);
    values.forEach((v, j) => {
      switch (field.type) {
        case 'f64':
          dv.setFloat64(j * 8, typeof v === 'bigint' ? Number(v) : (typeof v === 'number' ? v : 0), true);
          break;
        case 'bool8':
          dv.setUint8(j, v === true ? 1 : 0);
          break;
        case 'timestamp_ms': {
          const ms = v instanceof Date ? v.getTime() : NaN;
          dv.setBigInt64(j * 8, Number.isNaN(ms) ? 0n : BigInt(ms), true);
          break;
        }
      }
    });
  }

  const bodyLen = bitmapLen + valueBytes.length;
  const out = new Uint8Array(4 + bodyLen);
  const dv  = new DataView(out.buffer);
  dv.setUint32(0, bodyLen, true);
  writeBitset(dv, 4, validity);
  out.set(valueBytes, 4 + bitmapLen);
  return out;
}

/** (rows + 1) u32 offsets followed by the concatenated UTF-8 bytes. */
function encodeUtf8Values(name: string, values: WritableColumn): Uint8Array {
  const encoded = values.map(v => (typeof v === 'string' ? utf8Encoder.encode(v) : new Uint8Array(0)));
  const dataLen = encoded.reduce((n, b) => n + b.length, 0);

  if (dataLen > MAX_UTF8_BATCH_BYTES) {
    throw new RangeError(
      `Column '${name}' holds ${dataLen} bytes of text in one batch; ` +
      `u32 offsets address at most ${MAX_UTF8_BATCH_BYTES}. Reduce chunkSize.`,
    );
  }

  const offsetsLen = (values.length + 1) * 4;
  const out = new Uint8Array(offsetsLen + dataLen);
  const dv  = new DataView(out.buffer);

  let cursor = 0;
  encoded.forEach((bytes, j) => {
    dv.setUint32(j * 4, cursor, true);
    out.set(bytes, offsetsLen + cursor);
    cursor += bytes.length;
  });
  dv.setUint32(values.length * 4, cursor, true);

  return out;
}

function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  const total = parts.reduce((n, p) => n + p.length, 0);
  const out   = new Uint8Array(total);
  let offset  = 0;
  for (const p of parts) {
    out.set(p, offset);
    offset += p.length;
  }
  return out;
}
