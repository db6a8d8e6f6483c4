/**
 * colbridge — binary schema encoding, decoding, fingerprinting
 *
 * The schema is stored in binary form in the container header. The FNV-1a
 * fingerprint of this binary encoding is schema_fp. A reader validates the
 * fingerprint before touching any batch, so a corrupt schema fails fast.
 *
 * Wire format for the binary schema descriptor (all values little-endian):
 *
 *   [field_count: u16]
 *   For each field (2 bytes):
 *     [type_tag: u8]
 *     [flags:    u8]
 *
 * Field names and timestamp zones are NOT stored in the schema bytes. They
 * are carried in the header metadata region as a `columns` array, so the
 * fingerprint covers structure (type and flags sequence) rather than naming.
 */

import {
  type FieldDescriptor,
  type TableSchema,
  type FieldType,
} from './types';

// ─── Type Tag Mappings ────────────────────────────────────────────────────────

const TYPE_TO_TAG: Readonly<Record<FieldType, number>> = {
  f64: 0, bool8: 1, utf8: 2, timestamp_ms: 3,
};

const TAG_TO_TYPE: Readonly<Record<number, FieldType>> = {
  0: 'f64', 1: 'bool8', 2: 'utf8', 3: 'timestamp_ms',
};

/** Largest field count representable in the u16 count word. */
export const MAX_FIELDS = 0xffff;

// ─── FNV-1a 32-bit ────────────────────────────────────────────────────────────

/**
 * FNV-1a 32-bit hash.
 * Math.imul() is a native 32-bit integer multiply — avoids float precision loss
 * that would occur with the plain * operator on large numbers.
 */
export function fnv1a32(bytes: Uint8Array): number {
  let hash = 0x811c9dc5; // FNV offset basis
  for (const byte of bytes) {
    hash ^= byte;
    hash  = Math.imul(hash, 0x01000193); // FNV prime
  }
  return hash >>> 0; // coerce to u32
}

// ─── Encoding ─────────────────────────────────────────────────────────────────

/**
 * Encode a TableSchema to compact bytes for storage in the header.
 * 2 + 2 × fieldCount bytes. This is the canonical input to schemaFingerprint().
 */
export function encodeSchema(schema: TableSchema): Uint8Array {
  const fieldCount = schema.fields.length;
  const out = new Uint8Array(2 + fieldCount * 2);
  const dv  = new DataView(out.buffer);

  dv.setUint16(0, fieldCount, /* littleEndian */ true);

  schema.fields.forEach((f, i) => {
    const off = 2 + i * 2;
    out[off]     = TYPE_TO_TAG[f.type];
    out[off + 1] = f.flags;
  });

  return out;
}

// ─── Decoding ─────────────────────────────────────────────────────────────────

/** Per-column metadata carried in the header's JSON region. */
export interface ColumnMeta {
  readonly name:          string;
  readonly timezone?:     string;
  readonly sourceOffset?: string;
}

/**
 * Decode a binary schema descriptor read from the header.
 *
 * @param columns  Column metadata from the header `columns` array. When
 *                 absent or short, fields are named `f0`, `f1`, …
 *
 * Returns null if the bytes are truncated or contain an unknown type tag.
 */
export function decodeSchema(
  bytes:    Uint8Array,
  columns?: readonly ColumnMeta[],
): TableSchema | null {
  if (bytes.length < 2) return null;

  const dv         = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const fieldCount = dv.getUint16(0, true);

  if (bytes.length < 2 + fieldCount * 2) return null; // truncated

  const fields: FieldDescriptor[] = [];

  for (let i = 0; i < fieldCount; i++) {
    const off   = 2 + i * 2;
    const type  = TAG_TO_TYPE[bytes[off] ?? -1];
    const flags = bytes[off + 1] ?? 0;

    if (type === undefined) return null; // unknown type tag — corrupt or newer version

    const meta = columns?.[i];
    const name = meta?.name ?? `f${i}`;

    let fd: FieldDescriptor = { name, type, flags };
    if (type === 'timestamp_ms') {
      if (meta?.timezone !== undefined)     fd = { ...fd, timezone: meta.timezone };
      if (meta?.sourceOffset !== undefined) fd = { ...fd, sourceOffset: meta.sourceOffset };
    }
    fields.push(fd);
  }

  return { fields };
}

// ─── Fingerprint ──────────────────────────────────────────────────────────────

/**
 * FNV-1a 32-bit fingerprint of a TableSchema. Covers type and flags, not names.
 */
export function schemaFingerprint(schema: TableSchema): number {
  return fnv1a32(encodeSchema(schema));
}

// ─── Column metadata ──────────────────────────────────────────────────────────

/** The `columns` metadata entries for a schema, in field order. */
export function schemaColumns(schema: TableSchema): ColumnMeta[] {
  return schema.fields.map(f => {
    let meta: ColumnMeta = { name: f.name };
    if (f.timezone !== undefined)     meta = { ...meta, timezone: f.timezone };
    if (f.sourceOffset !== undefined) meta = { ...meta, sourceOffset: f.sourceOffset };
    return meta;
  });
}

// ─── Schema Builder ───────────────────────────────────────────────────────────

export interface FieldDefinition {
  readonly name:          string;
  readonly type:          FieldType;
  readonly flags?:        number;
  readonly timezone?:     string;
  readonly sourceOffset?: string;
}

/**
 * Build a TableSchema from a list of field definitions, in declaration order.
 *
 * Usage:
 *   const schema = buildSchema([
 *     { name: 'gender', type: 'utf8',  flags: FIELD_FLAG_NULLABLE },
 *     { name: 'height', type: 'f64',   flags: FIELD_FLAG_NULLABLE },
 *     { name: 'date',   type: 'timestamp_ms', timezone: 'UTC' },
 *   ]);
 */
export function buildSchema(fields: readonly FieldDefinition[]): TableSchema {
  if (fields.length > MAX_FIELDS) {
    throw new RangeError(
      `buildSchema: ${fields.length} fields exceed the maximum of ${MAX_FIELDS}.`,
    );
  }

  const seen = new Set<string>();
  const resolved: FieldDescriptor[] = [];

  for (const f of fields) {
    if (seen.has(f.name)) {
      throw new TypeError(
        `buildSchema: duplicate field name '${f.name}'. ` +
        `All field names must be unique within a schema.`,
      );
    }
    seen.add(f.name);

    if (f.type !== 'timestamp_ms' && (f.timezone !== undefined || f.sourceOffset !== undefined)) {
      throw new TypeError(
        `buildSchema: field '${f.name}' (${f.type}) cannot carry a timezone; ` +
        `only timestamp_ms fields are zoned.`,
      );
    }

    let fd: FieldDescriptor = { name: f.name, type: f.type, flags: f.flags ?? 0 };
    if (f.timezone !== undefined)     fd = { ...fd, timezone: f.timezone };
    if (f.sourceOffset !== undefined) fd = { ...fd, sourceOffset: f.sourceOffset };
    resolved.push(fd);
  }

  return { fields: resolved };
}
