/**
 * colbridge — binary schema and container header
 *
 * The schema bytes carry structure only (type tag + flags per field); names
 * and zones travel in the header metadata. These tests pin the byte layout
 * and the validation order of readTableHeader().
 */

import { describe, it, expect } from 'vitest';
import {
  buildSchema,
  encodeSchema,
  decodeSchema,
  schemaFingerprint,
  encodeTableHeader,
  readTableHeader,
  TableHeaderError,
  FIELD_FLAG_NULLABLE,
  TABLE_MAGIC,
} from '../src/index';

const schema = buildSchema([
  { name: 'gender', type: 'utf8', flags: FIELD_FLAG_NULLABLE },
  { name: 'height', type: 'f64',  flags: FIELD_FLAG_NULLABLE },
  { name: 'when',   type: 'timestamp_ms', timezone: 'UTC' },
]);

const geometry = { chunk_size: 1024, row_count: 10, batch_count: 1 };

// ─── Schema ───────────────────────────────────────────────────────────────────

describe('buildSchema', () => {
  it('keeps declaration order and defaults flags to 0', () => {
    expect(schema.fields.map(f => [f.name, f.type, f.flags])).toEqual([
      ['gender', 'utf8',         1],
      ['height', 'f64',          1],
      ['when',   'timestamp_ms', 0],
    ]);
    expect(schema.fields[2]?.timezone).toBe('UTC');
  });

  it('rejects duplicate field names', () => {
    expect(() => buildSchema([
      { name: 'x', type: 'f64' },
      { name: 'x', type: 'utf8' },
    ])).toThrow(TypeError);
  });

  it('rejects a timezone on a non-timestamp field', () => {
    expect(() => buildSchema([{ name: 'x', type: 'f64', timezone: 'UTC' }])).toThrow(/cannot carry a timezone/);
  });

  it('accepts an empty field list', () => {
    expect(buildSchema([]).fields).toEqual([]);
  });
});

describe('encodeSchema / decodeSchema', () => {
  it('encodes a u16 count followed by [type_tag, flags] per field', () => {
    // utf8 = 2, f64 = 0, timestamp_ms = 3
    expect(Array.from(encodeSchema(schema))).toEqual([3, 0, 2, 1, 0, 1, 3, 0]);
  });

  it('decodes with names and zones from column metadata', () => {
    const decoded = decodeSchema(encodeSchema(schema), [
      { name: 'gender' },
      { name: 'height' },
      { name: 'when', timezone: 'UTC' },
    ]);
    expect(decoded).toEqual(schema);
  });

  it('falls back to placeholder names without metadata', () => {
    const decoded = decodeSchema(encodeSchema(schema));
    expect(decoded?.fields.map(f => f.name)).toEqual(['f0', 'f1', 'f2']);
  });

  it('returns null for truncated bytes or an unknown type tag', () => {
    const bytes = encodeSchema(schema);
    expect(decodeSchema(bytes.subarray(0, 5))).toBeNull();
    expect(decodeSchema(new Uint8Array([1]))).toBeNull();

    const bad = bytes.slice();
    bad[2] = 99;
    expect(decodeSchema(bad)).toBeNull();
  });
});

describe('schemaFingerprint', () => {
  it('ignores names', () => {
    const a = buildSchema([{ name: 'a', type: 'f64' }]);
    const b = buildSchema([{ name: 'b', type: 'f64' }]);
    expect(schemaFingerprint(a)).toBe(schemaFingerprint(b));
  });

  it('changes with type or flags', () => {
    const base     = buildSchema([{ name: 'a', type: 'f64' }]);
    const retyped  = buildSchema([{ name: 'a', type: 'utf8' }]);
    const reflaged = buildSchema([{ name: 'a', type: 'f64', flags: FIELD_FLAG_NULLABLE }]);
    expect(schemaFingerprint(retyped)).not.toBe(schemaFingerprint(base));
    expect(schemaFingerprint(reflaged)).not.toBe(schemaFingerprint(base));
  });
});

// ─── Header ───────────────────────────────────────────────────────────────────

describe('container header', () => {
  it('round-trips geometry and schema', () => {
    const bytes  = encodeTableHeader(schema, geometry);
    const header = readTableHeader(bytes);

    expect(header.chunk_size).toBe(1024);
    expect(header.row_count).toBe(10);
    expect(header.batch_count).toBe(1);
    expect(header.schema).toEqual(schema);
    expect(header.schema_fingerprint).toBe(schemaFingerprint(schema));
    expect(header.header_bytes).toBe(bytes.length);
  });

  it('starts with the CBAR magic', () => {
    const bytes = encodeTableHeader(schema, geometry);
    expect(new DataView(bytes.buffer).getUint32(0, true)).toBe(TABLE_MAGIC);
    expect(String.fromCharCode(...bytes.subarray(0, 4))).toBe('CBAR');
  });

  it('writes only the column list into the metadata region', () => {
    const bytes   = encodeTableHeader(schema, geometry);
    const metaLen = new DataView(bytes.buffer).getUint32(40, true); // 32 + 8 schema bytes
    expect(new TextDecoder().decode(bytes.subarray(44, 44 + metaLen))).toBe(
      '{"columns":[{"name":"gender"},{"name":"height"},{"name":"when","timezone":"UTC"}]}',
    );
    expect(44 + metaLen).toBe(bytes.length);
  });

  it('refuses a zero chunk size', () => {
    expect(() => encodeTableHeader(schema, { ...geometry, chunk_size: 0 })).toThrow(/chunk_size/);
  });

  it('rejects foreign bytes by magic', () => {
    const bytes = encodeTableHeader(schema, geometry);
    bytes[0] = 0;
    expect(() => readTableHeader(bytes)).toThrow(/Invalid magic/);
  });

  it('rejects an unknown version before checking the CRC', () => {
    const bytes = encodeTableHeader(schema, geometry);
    new DataView(bytes.buffer).setUint32(4, 2, true);
    expect(() => readTableHeader(bytes)).toThrow(/Unsupported container version 2/);
  });

  it('detects a corrupted geometry field through the header CRC', () => {
    const bytes = encodeTableHeader(schema, geometry);
    new DataView(bytes.buffer).setUint32(16, 11, true); // row_count
    expect(() => readTableHeader(bytes)).toThrow(/CRC mismatch/);
  });

  it('detects corrupted schema bytes through the fingerprint', () => {
    const bytes = encodeTableHeader(schema, geometry);
    bytes[34] = 1; // first field: utf8 → bool8
    expect(() => readTableHeader(bytes)).toThrow(/fingerprint mismatch/);
  });

  it('rejects input shorter than a header', () => {
    expect(() => readTableHeader(new Uint8Array(8))).toThrow(TableHeaderError);
  });

  it('rejects metadata that runs past the end', () => {
    const bytes = encodeTableHeader(schema, geometry);
    expect(() => readTableHeader(bytes.subarray(0, bytes.length - 1))).toThrow(/meta_byte_len/);
  });
});
