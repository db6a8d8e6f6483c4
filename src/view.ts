/**
 * colbridge — TableView
 *
 * Read-only lens over container bytes produced by TableWriter.
 *
 * TableView:
 *   1. Validates the header on construction (magic → version → CRC →
 *      metadata → schema → fingerprint).
 *   2. Walks the batch directory once, checking every body length against the
 *      bytes available, and records where each field body starts.
 *   3. Decodes columns lazily on getColumn(); results are cached per name.
 *
 * Consumer pattern:
 *
 *   const view = new TableView(bytes);
 *   for (const field of view.schema.fields) {
 *     const values = view.getColumn(field.name);   // Date for timestamps
 *   }
 */

import { readBitset, bitsetByteLength, popcount, testBit } from './bitset';
import { readTableHeader, TableHeaderError, type TableHeader } from './header';
import {
  FIELD_BYTE_WIDTHS,
  type DecodedColumn,
  type DecodedValue,
  type FieldDescriptor,
  type TableSchema,
} from './types';

// Stateless when not used in streaming mode; shared by every view.
const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

/** Location of one field's body within one batch. */
interface BodyRef {
  readonly rows:   number;
  readonly offset: number; // first byte after body_len
  readonly length: number;
}

export class TableView {
  readonly header: TableHeader;

  private readonly _bytes:  Uint8Array;
  private readonly _data:   DataView;
  /** _bodies[fieldIndex][batchIndex] */
  private readonly _bodies: BodyRef[][];
  private readonly _cache = new Map<string, readonly DecodedValue[]>();

  constructor(bytes: Uint8Array) {
    this.header = readTableHeader(bytes);
    this._bytes = bytes;
    this._data  = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this._bodies = this.header.schema.fields.map(() => []);

    let cursor = this.header.header_bytes;
    let seen   = 0;

    for (let b = 0; b < this.header.batch_count; b++) {
      const rows = this.readU32(cursor, `batch ${b} row count`);
      if (rows === 0 || rows > this.header.chunk_size) {
        throw new TableHeaderError(
          `Batch ${b} declares ${rows} rows; expected 1..${this.header.chunk_size}.`,
        );
      }
      cursor += 4;

      this.header.schema.fields.forEach((field, i) => {
        const length = this.readU32(cursor, `'${field.name}' body length in batch ${b}`);
        const offset = cursor + 4;
        if (offset + length > bytes.byteLength) {
          throw new TableHeaderError(
            `Body of '${field.name}' in batch ${b} runs past the end of the container.`,
          );
        }
        if (length < minimumBodyLength(field, rows)) {
          throw new TableHeaderError(
            `Body of '${field.name}' in batch ${b} is ${length} bytes; too short for ${rows} rows.`,
          );
        }
        this._bodies[i]?.push({ rows, offset, length });
        cursor = offset + length;
      });
      seen += rows;
    }

    if (seen !== this.header.row_count) {
      throw new TableHeaderError(
        `Batches hold ${seen} rows but the header declares ${this.header.row_count}.`,
      );
    }
    if (cursor !== bytes.byteLength) {
      throw new TableHeaderError(
        `${bytes.byteLength - cursor} trailing bytes after the last batch.`,
      );
    }
  }

  get schema(): TableSchema {
    return this.header.schema;
  }

  get rowCount(): number {
    return this.header.row_count;
  }

  get batchCount(): number {
    return this.header.batch_count;
  }

  /** Rows in each batch, in order. */
  get batchSizes(): number[] {
    return (this._bodies[0] ?? []).map(ref => ref.rows);
  }

  field(name: string): FieldDescriptor | undefined {
    return this.header.schema.fields.find(f => f.name === name);
  }

  /**
   * All values of column `name` across batches. Missing cells are null;
   * timestamp_ms cells are Date instances.
   *
   * @throws RangeError when no such column exists.
   */
  getColumn(name: string): readonly DecodedValue[] {
    const cached = this._cache.get(name);
    if (cached !== undefined) return cached;

    const [index, field] = this.lookup(name);
    const values: DecodedValue[] = [];
    for (const ref of this._bodies[index] ?? []) {
      this.decodeBody(field, ref, values);
    }
    this._cache.set(name, values);
    return values;
  }

  /**
   * Missing cells in column `name`, counted from the validity bitmaps
   * without decoding any value.
   */
  nullCount(name: string): number {
    const [index] = this.lookup(name);
    let present = 0;
    for (const ref of this._bodies[index] ?? []) {
      present += popcount(readBitset(this._data, ref.offset, ref.rows), ref.rows);
    }
    return this.rowCount - present;
  }

  /** Every column, in schema order. */
  columns(): DecodedColumn[] {
    return this.header.schema.fields.map(field => ({ field, values: this.getColumn(field.name) }));
  }

  /** Rows as plain objects keyed by column name. */
  toRows(): Record<string, DecodedValue>[] {
    const cols = this.columns();
    const rows: Record<string, DecodedValue>[] = [];
    for (let r = 0; r < this.rowCount; r++) {
      const row: Record<string, DecodedValue> = {};
      for (const c of cols) row[c.field.name] = c.values[r] ?? null;
      rows.push(row);
    }
    return rows;
  }

  // ── Private ────────────────────────────────────────────────────────────────

  private lookup(name: string): [number, FieldDescriptor] {
    const index = this.header.schema.fields.findIndex(f => f.name === name);
    const field = this.header.schema.fields[index];
    if (field === undefined) {
      throw new RangeError(`No column named '${name}'.`);
    }
    return [index, field];
  }

  private readU32(offset: number, what: string): number {
    if (offset + 4 > this._bytes.byteLength) {
      throw new TableHeaderError(`Container truncated while reading ${what}.`);
    }
    return this._data.getUint32(offset, true);
  }

  private decodeBody(field: FieldDescriptor, ref: BodyRef, out: DecodedValue[]): void {
    const validity = readBitset(this._data, ref.offset, ref.rows);
    const base     = ref.offset + bitsetByteLength(ref.rows);

    if (field.type === 'utf8') {
      const dataStart = base + (ref.rows + 1) * 4;
      const end       = ref.offset + ref.length;
      for (let j = 0; j < ref.rows; j++) {
        if (!testBit(validity, j)) { out.push(null); continue; }
        const from = this._data.getUint32(base + j * 4, true);
        const to   = this._data.getUint32(base + (j + 1) * 4, true);
        if (from > to || dataStart + to > end) {
          throw new TableHeaderError(`Corrupt utf8 offsets in column '${field.name}'.`);
        }
        out.push(decodeUtf8(field.name, this._bytes.subarray(dataStart + from, dataStart + to)));
      }
      return;
    }

    for (let j = 0; j < ref.rows; j++) {
      if (!testBit(validity, j)) { out.push(null); continue; }
      switch (field.type) {
        case 'f64':
          out.push(this._data.getFloat64(base + j * 8, true));
          break;
        case 'bool8':
          out.push(this._data.getUint8(base + j) !== 0);
          break;
        case 'timestamp_ms':
          out.push(new Date(Number(this._data.getBigInt64(base + j * 8, true))));
          break;
      }
    }
  }
}

function decodeUtf8(column: string, bytes: Uint8Array): string {
  try {
    return utf8Decoder.decode(bytes);
  } catch (err) {
    throw new TableHeaderError(
      `Invalid UTF-8 in column '${column}': ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

function minimumBodyLength(field: FieldDescriptor, rows: number): number {
  const bitmap = bitsetByteLength(rows);
  return field.type === 'utf8'
    ? bitmap + (rows + 1) * 4
    : bitmap + rows * FIELD_BYTE_WIDTHS[field.type];
}

/** Decode a container in one call. */
export function decodeTable(bytes: Uint8Array): DecodedColumn[] {
  return new TableView(bytes).columns();
}
