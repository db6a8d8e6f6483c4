/**
 * colbridge — type definitions
 *
 * Two families of types live here:
 *
 *   Dataset side — the caller's view of a table. Each column is a tagged
 *   union on `kind`, resolved once at encode time.
 *
 *   Wire side — the container's view. Every column becomes exactly one
 *   FieldType with an explicit layout in each row batch.
 */

// ─── Dataset ──────────────────────────────────────────────────────────────────

/** A missing cell. `undefined` is accepted on input and written as null. */
export type Missing = null | undefined;

/**
 * Logical column kinds.
 *
 * temporal:    zone-naive timestamps. The Date's UTC fields carry the
 *              wall-clock reading (2024-01-15 10:30 naive is
 *              `new Date(Date.UTC(2024, 0, 15, 10, 30))`).
 * temporal_tz: absolute instants; the column names the zone they were
 *              observed in.
 * generic:     untyped cells. The wire type is inferred from the values;
 *              a mixture falls back to text once.
 */
export type ColumnKind =
  | 'numeric'
  | 'boolean'
  | 'text'
  | 'temporal'
  | 'temporal_tz'
  | 'generic';

export interface NumericColumn {
  readonly kind:   'numeric';
  readonly name:   string;
  readonly values: readonly (number | bigint | Missing)[];
}

export interface BooleanColumn {
  readonly kind:   'boolean';
  readonly name:   string;
  readonly values: readonly (boolean | Missing)[];
}

export interface TextColumn {
  readonly kind:   'text';
  readonly name:   string;
  readonly values: readonly (string | Missing)[];
}

export interface TemporalColumn {
  readonly kind:   'temporal';
  readonly name:   string;
  readonly values: readonly (Date | Missing)[];
}

export interface ZonedTemporalColumn {
  readonly kind:     'temporal_tz';
  readonly name:     string;
  readonly values:   readonly (Date | Missing)[];
  /** IANA name or fixed offset, e.g. 'America/New_York' or '+02:00'. */
  readonly timezone: string;
}

export interface GenericColumn {
  readonly kind:   'generic';
  readonly name:   string;
  readonly values: readonly unknown[];
}

export type Column =
  | NumericColumn
  | BooleanColumn
  | TextColumn
  | TemporalColumn
  | ZonedTemporalColumn
  | GenericColumn;

/**
 * An ordered set of named columns. All columns must have the same length.
 *
 * `index` is the row index. When it has a non-empty name it is materialized
 * as the first column before encoding; an unnamed index is dropped.
 */
export interface Dataset {
  readonly columns: readonly Column[];
  readonly index?:  Column;
}

// ─── Wire Field Types ─────────────────────────────────────────────────────────

/**
 * Column types in a container schema.
 *
 * f64:          8 bytes per row, IEEE-754.
 * bool8:        1 byte per row, 0 or 1.
 * utf8:         (rows + 1) u32 offsets, then the concatenated UTF-8 bytes.
 * timestamp_ms: 8 bytes per row, signed milliseconds since the epoch (UTC).
 */
export type FieldType = 'f64' | 'bool8' | 'utf8' | 'timestamp_ms';

/** Fixed per-row width of each FieldType. utf8 is variable; its offsets are 4. */
export const FIELD_BYTE_WIDTHS: Readonly<Record<FieldType, number>> = {
  f64:          8,
  bool8:        1,
  utf8:         4,
  timestamp_ms: 8,
};

// ─── Field Flags ──────────────────────────────────────────────────────────────

export const FIELD_FLAG_NULLABLE = 0b01;

// ─── Schema ───────────────────────────────────────────────────────────────────

/**
 * One field in a container schema.
 *
 * `timezone` and `sourceOffset` apply to timestamp_ms fields only.
 * timezone     — zone the instants are tagged with; absent means zone-naive.
 * sourceOffset — `±HH:MM` offset the naive readings were localized from
 *                before conversion to UTC.
 */
export interface FieldDescriptor {
  readonly name:          string;
  readonly type:          FieldType;
  readonly flags:         number;
  readonly timezone?:     string;
  readonly sourceOffset?: string;
}

export interface TableSchema {
  readonly fields: readonly FieldDescriptor[];
}

// ─── Decoded values ───────────────────────────────────────────────────────────

export type DecodedValue = number | boolean | string | Date | null;

export interface DecodedColumn {
  readonly field:  FieldDescriptor;
  readonly values: readonly DecodedValue[];
}

// ─── Store ────────────────────────────────────────────────────────────────────

export type DigestAlgorithm = 'sha1' | 'sha256' | 'sha512';

/**
 * Locator for a published artifact. The store does not serve bytes; the
 * caller delivers `url` (or `path`) to the client surface. Publishing the
 * same bytes always yields an equal reference.
 */
export interface ArtifactReference {
  /** Hex digest of the artifact bytes. */
  readonly key:  string;
  /** Absolute filesystem path of the published artifact. */
  readonly path: string;
  readonly url:  string;
}
