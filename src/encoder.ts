/**
 * colbridge — columnar encoder
 *
 * encode(dataset) turns a tabular dataset into container bytes:
 *
 *   1. index        — a named row index becomes the first column
 *   2. timezones    — naive temporal columns are resolved (see timezone.ts)
 *                     against one offset computed for the whole call
 *   3. build        — every column gets exactly one wire type; TableWriter
 *                     validates and lays out the batches
 *   4. fallback     — on MixedTypeError, generic columns are coerced to text
 *                     and the build is retried once; a second failure is
 *                     UnencodableError
 *
 * The caller's dataset is never modified. Columns that are rewritten
 * (timestamps, coerced text) are rewritten into fresh arrays.
 */

import { componentLogger, type Logger } from './logger';
import { buildSchema, type FieldDefinition } from './schema';
import { formatOffset, normalizeNaiveTemporal, standardOffsetMinutes } from './timezone';
import { FIELD_FLAG_NULLABLE, type Column, type Dataset, type FieldType } from './types';
import { EncodingError, MixedTypeError, TableWriter, describeValue } from './writer';

// ─── Errors ───────────────────────────────────────────────────────────────────

/**
 * Terminal failure for a dataset: no container is produced. `cause` holds the
 * failure of the last construction attempt.
 */
export class UnencodableError extends EncodingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UnencodableError';
  }
}

// ─── Options ──────────────────────────────────────────────────────────────────

export interface EncodeOptions {
  /** Maximum rows per batch. Defaults to DEFAULT_CHUNK_SIZE. */
  readonly chunkSize?:          number;
  /**
   * Offset (minutes east of UTC) naive date-times are read in. Defaults to
   * the process's standard offset.
   */
  readonly localOffsetMinutes?: number;
  readonly logger?:             Logger;
}

interface ResolvedColumn {
  readonly field:  FieldDefinition;
  readonly values: readonly unknown[];
}

interface LocalOffset {
  readonly minutes: number;
  readonly label:   string;
}

// ─── encode ───────────────────────────────────────────────────────────────────

/**
 * Encode `dataset` into a container.
 *
 * @throws UnencodableError when the dataset cannot be represented even after
 *         the text fallback, or is malformed (ragged or duplicate columns).
 */
export function encode(dataset: Dataset, options: EncodeOptions = {}): Uint8Array {
  const log     = options.logger ?? componentLogger('encoder');
  const columns = materializeIndex(dataset);
  const minutes = options.localOffsetMinutes ?? standardOffsetMinutes();
  const offset  = { minutes, label: formatOffset(minutes) };

  try {
    return build(columns, offset, options.chunkSize);
  } catch (err) {
    if (!(err instanceof MixedTypeError)) {
      throw new UnencodableError(`Dataset cannot be encoded: ${messageOf(err)}`, { cause: err });
    }

    const generic = columns.filter(c => c.kind === 'generic').map(c => c.name);
    if (generic.length === 0) {
      throw new UnencodableError(
        `Column '${err.column}' mixes value types and is not a generic column; ` +
        `only generic columns fall back to text.`,
        { cause: err },
      );
    }

    log.debug({ column: err.column, generic }, 'Mixed-type column; coercing generic columns to text');

    try {
      return build(columns.map(coerceGenericToText), offset, options.chunkSize);
    } catch (retryErr) {
      throw new UnencodableError(
        `Dataset cannot be encoded even after coercing generic columns to text: ${messageOf(retryErr)}`,
        { cause: retryErr },
      );
    }
  }
}

// ─── Steps ────────────────────────────────────────────────────────────────────

/** A named index becomes the first column; an unnamed one is dropped. */
function materializeIndex(dataset: Dataset): readonly Column[] {
  const index = dataset.index;
  if (index === undefined || index.name === '') return dataset.columns;
  return [index, ...dataset.columns];
}

function build(columns: readonly Column[], offset: LocalOffset, chunkSize?: number): Uint8Array {
  const resolved = columns.map(c => resolveColumn(c, offset));
  const schema   = buildSchema(resolved.map(r => r.field));
  const writer   = chunkSize === undefined
    ? new TableWriter(schema)
    : new TableWriter(schema, { chunkSize });
  return writer.write(resolved.map(r => r.values));
}

/** Pick the column's single wire type and produce the values to write. */
function resolveColumn(column: Column, offset: LocalOffset): ResolvedColumn {
  const flags = FIELD_FLAG_NULLABLE;
  const name  = column.name;

  switch (column.kind) {
    case 'numeric':
      return { field: { name, type: 'f64', flags }, values: column.values };

    case 'boolean':
      return { field: { name, type: 'bool8', flags }, values: column.values };

    case 'text':
      return { field: { name, type: 'utf8', flags }, values: column.values };

    case 'temporal':
      return resolveNaiveTemporal(name, column.values, offset);

    case 'temporal_tz':
      return {
        field:  { name, type: 'timestamp_ms', flags, timezone: column.timezone },
        values: column.values.map(v => (v instanceof Date ? new Date(v.getTime()) : v)),
      };

    case 'generic': {
      const type = inferFieldType(column.values);
      if (type === 'timestamp_ms') return resolveNaiveTemporal(name, column.values, offset);
      return { field: { name, type, flags }, values: column.values };
    }
  }
}

function resolveNaiveTemporal(
  name:   string,
  values: readonly unknown[],
  offset: LocalOffset,
): ResolvedColumn {
  if (values.some(v => v !== null && v !== undefined && !(v instanceof Date))) {
    // Leave non-Date values in place so the writer reports the mixture.
    return { field: { name, type: 'timestamp_ms', flags: FIELD_FLAG_NULLABLE }, values };
  }

  const normalized = normalizeNaiveTemporal(values, offset);
  let field: FieldDefinition = { name, type: 'timestamp_ms', flags: FIELD_FLAG_NULLABLE };
  if (normalized.timezone !== undefined)     field = { ...field, timezone: normalized.timezone };
  if (normalized.sourceOffset !== undefined) field = { ...field, sourceOffset: normalized.sourceOffset };
  return { field, values: normalized.values };
}

/**
 * Wire type of an untyped column, taken from its first present value. A
 * column with no present values is utf8. Values that disagree with the
 * choice are reported by the writer as MixedTypeError.
 */
export function inferFieldType(values: readonly unknown[]): FieldType {
  const first = values.find(v => v !== null && v !== undefined);
  if (typeof first === 'number' || typeof first === 'bigint') return 'f64';
  if (typeof first === 'boolean') return 'bool8';
  if (first instanceof Date) return 'timestamp_ms';
  return 'utf8';
}

// ─── Text fallback ────────────────────────────────────────────────────────────

function coerceGenericToText(column: Column): Column {
  if (column.kind !== 'generic') return column;
  return { kind: 'text', name: column.name, values: column.values.map(toText) };
}

/**
 * Text rendering used by the fallback. Missing stays missing; Dates render
 * as ISO-8601 so the output does not depend on the process zone; objects and
 * arrays render as JSON.
 */
export function toText(v: unknown): string | null {
  if (v === null || v === undefined) return null;
  if (typeof v === 'string') return v;
  if (v instanceof Date) return Number.isNaN(v.getTime()) ? null : v.toISOString();
  if (typeof v === 'object') {
    try {
      return JSON.stringify(v) ?? String(v);
    } catch {
      // Cyclic or bigint-bearing structure; fall back to its tag.
      return `[${describeValue(v)}]`;
    }
  }
  return String(v);
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
