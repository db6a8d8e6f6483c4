/**
 * colbridge — encode()
 *
 * Index materialization, naive timestamp resolution, and the one-shot text
 * fallback for generic columns. Every test decodes the output with TableView
 * and asserts on the decoded values.
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
  encode,
  inferFieldType,
  toText,
  TableView,
  UnencodableError,
  MixedTypeError,
  type Column,
  type Dataset,
} from '../src/index';
import { captureLogs } from './helpers/log-capture';

const utc = (...parts: [number, number, number, number?, number?]): Date =>
  new Date(Date.UTC(parts[0], parts[1], parts[2], parts[3] ?? 0, parts[4] ?? 0));

function view(dataset: Dataset, localOffsetMinutes = 0): TableView {
  return new TableView(encode(dataset, { localOffsetMinutes }));
}

function errorOf(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected the call to throw');
}

// ─── Index ────────────────────────────────────────────────────────────────────

describe('encode: index', () => {
  const columns: Column[] = [{ kind: 'text', name: 't', values: ['a', 'b'] }];

  it('prepends a named index as the first column', () => {
    const v = view({ index: { kind: 'numeric', name: 'row', values: [10, 11] }, columns });
    expect(v.schema.fields.map(f => f.name)).toEqual(['row', 't']);
    expect(v.getColumn('row')).toEqual([10, 11]);
  });

  it('drops an unnamed index', () => {
    const v = view({ index: { kind: 'numeric', name: '', values: [10, 11] }, columns });
    expect(v.schema.fields.map(f => f.name)).toEqual(['t']);
  });
});

// ─── Typed columns ────────────────────────────────────────────────────────────

describe('encode: typed columns', () => {
  it('maps each kind to one nullable wire type', () => {
    const v = view({
      columns: [
        { kind: 'numeric', name: 'n', values: [1.5, null] },
        { kind: 'boolean', name: 'b', values: [true, undefined] },
        { kind: 'text',    name: 's', values: ['x', null] },
      ],
    });
    expect(v.schema.fields.map(f => [f.name, f.type, f.flags])).toEqual([
      ['n', 'f64',   1],
      ['b', 'bool8', 1],
      ['s', 'utf8',  1],
    ]);
    expect(v.toRows()).toEqual([
      { n: 1.5,  b: true, s: 'x' },
      { n: null, b: null, s: null },
    ]);
  });

  it('honours chunkSize', () => {
    const bytes = encode(
      { columns: [{ kind: 'numeric', name: 'n', values: [1, 2, 3] }] },
      { chunkSize: 2 },
    );
    expect(new TableView(bytes).batchSizes).toEqual([2, 1]);
  });

  it('is deterministic', () => {
    const dataset: Dataset = {
      columns: [
        { kind: 'numeric', name: 'n', values: [1, 2] },
        { kind: 'generic', name: 'g', values: [1, 'x'] },
      ],
    };
    expect(encode(dataset, { localOffsetMinutes: 60 })).toEqual(encode(dataset, { localOffsetMinutes: 60 }));
  });
});

// ─── Timestamps ───────────────────────────────────────────────────────────────

describe('encode: naive timestamps', () => {
  it('tags an all-midnight column as UTC and keeps the readings', () => {
    const v = view({ columns: [{ kind: 'temporal', name: 'd', values: [utc(2024, 0, 15), null] }] }, 120);
    expect(v.field('d')).toEqual({ name: 'd', type: 'timestamp_ms', flags: 1, timezone: 'UTC' });
    expect(v.getColumn('d')).toEqual([utc(2024, 0, 15), null]);
  });

  it('localizes readings east of UTC', () => {
    const v = view({
      columns: [{ kind: 'temporal', name: 't', values: [utc(2024, 0, 15, 10, 30), utc(2024, 0, 16)] }],
    }, 120);
    expect(v.field('t')?.timezone).toBeUndefined();
    expect(v.field('t')?.sourceOffset).toBe('+02:00');
    expect(v.getColumn('t')).toEqual([utc(2024, 0, 15, 8, 30), utc(2024, 0, 15, 22)]);
  });

  it('localizes readings west of UTC', () => {
    const v = view({ columns: [{ kind: 'temporal', name: 't', values: [utc(2024, 0, 15, 10, 30)] }] }, -300);
    expect(v.field('t')?.sourceOffset).toBe('-05:00');
    expect(v.getColumn('t')).toEqual([utc(2024, 0, 15, 15, 30)]);
  });

  it('leaves the caller dates unmodified', () => {
    const reading = utc(2024, 0, 15, 10, 30);
    const before  = reading.getTime();
    view({ columns: [{ kind: 'temporal', name: 't', values: [reading] }] }, 120);
    expect(reading.getTime()).toBe(before);
  });

  it('keeps zoned columns as-is', () => {
    const v = view({
      columns: [{ kind: 'temporal_tz', name: 'z', timezone: 'America/New_York', values: [utc(2024, 0, 15, 10, 30)] }],
    }, 120);
    expect(v.field('z')?.timezone).toBe('America/New_York');
    expect(v.field('z')?.sourceOffset).toBeUndefined();
    expect(v.getColumn('z')).toEqual([utc(2024, 0, 15, 10, 30)]);
  });

  it('rejects an offset outside ±18:00', () => {
    expect(() => encode({ columns: [] }, { localOffsetMinutes: 1200 })).toThrow(RangeError);
  });
});

describe('encode: process offset', () => {
  let savedTz: string | undefined;

  beforeEach(() => {
    savedTz = process.env['TZ'];
    process.env['TZ'] = 'America/New_York';
  });

  afterEach(() => {
    if (savedTz === undefined) delete process.env['TZ'];
    else process.env['TZ'] = savedTz;
  });

  it('reads summer readings at the standard offset, not the daylight one', () => {
    const bytes = encode({ columns: [{ kind: 'temporal', name: 't', values: [utc(2024, 6, 15, 10, 30)] }] });
    const v     = new TableView(bytes);

    expect(v.field('t')?.sourceOffset).toBe('-05:00');
    expect(v.getColumn('t')).toEqual([utc(2024, 6, 15, 15, 30)]);
  });
});

// ─── Generic columns ──────────────────────────────────────────────────────────

describe('encode: generic columns', () => {
  it('infers the wire type from the first present value', () => {
    expect(inferFieldType([null, 2])).toBe('f64');
    expect(inferFieldType([undefined, false])).toBe('bool8');
    expect(inferFieldType([utc(2024, 0, 1)])).toBe('timestamp_ms');
    expect(inferFieldType(['a'])).toBe('utf8');
    expect(inferFieldType([null, null])).toBe('utf8');
  });

  it('encodes a uniform generic column with its inferred type', () => {
    const v = view({
      columns: [
        { kind: 'generic', name: 'b', values: [true, null] },
        { kind: 'generic', name: 'd', values: [utc(2024, 0, 1), utc(2024, 0, 2)] },
      ],
    });
    expect(v.field('b')?.type).toBe('bool8');
    expect(v.field('d')).toEqual({ name: 'd', type: 'timestamp_ms', flags: 1, timezone: 'UTC' });
  });

  it('coerces a mixed generic column to text', () => {
    const v = view({ columns: [{ kind: 'generic', name: 'g', values: [1, 'two', 3.5, null] }] });
    expect(v.field('g')?.type).toBe('utf8');
    expect(v.getColumn('g')).toEqual(['1', 'two', '3.5', null]);
  });

  it('coerces every generic column, leaving typed ones alone', () => {
    const v = view({
      columns: [
        { kind: 'numeric', name: 'n', values: [1, 2] },
        { kind: 'generic', name: 'clean', values: [7, 8] },
        { kind: 'generic', name: 'mixed', values: [utc(2024, 0, 1), 'later'] },
      ],
    });
    expect(v.schema.fields.map(f => f.type)).toEqual(['f64', 'utf8', 'utf8']);
    expect(v.getColumn('clean')).toEqual(['7', '8']);
    expect(v.getColumn('mixed')).toEqual(['2024-01-01T00:00:00.000Z', 'later']);
  });

  it('logs the fallback at debug level', () => {
    const { logger, lines } = captureLogs();
    encode({ columns: [{ kind: 'generic', name: 'g', values: [1, 'x'] }] }, { localOffsetMinutes: 0, logger });
    expect(lines).toHaveLength(1);
    expect(lines[0]?.level).toBe('debug');
    expect(lines[0]?.msg).toBe('Mixed-type column; coercing generic columns to text');
    expect(lines[0]?.['column']).toBe('g');
    expect(lines[0]?.['generic']).toEqual(['g']);
  });
});

// ─── Failures ─────────────────────────────────────────────────────────────────

describe('encode: failures', () => {
  // Values that slipped past the static column type, as from parsed input.
  const mixedNumbers: (number | null)[] = JSON.parse('[1, "x"]');

  it('fails without retrying when no generic column exists', () => {
    const err = errorOf(() => encode(
      { columns: [{ kind: 'numeric', name: 'n', values: mixedNumbers }] },
      { localOffsetMinutes: 0 },
    ));
    expect(err).toBeInstanceOf(UnencodableError);
    expect(err instanceof Error && err.cause).toBeInstanceOf(MixedTypeError);
  });

  it('fails when the retry fails, carrying the retry error', () => {
    const err = errorOf(() => encode({
      columns: [
        { kind: 'generic', name: 'g', values: [1, 'a'] },
        { kind: 'numeric', name: 'n', values: mixedNumbers },
      ],
    }, { localOffsetMinutes: 0 }));
    expect(err).toBeInstanceOf(UnencodableError);
    const cause = err instanceof Error ? err.cause : undefined;
    expect(cause).toBeInstanceOf(MixedTypeError);
    expect(cause instanceof MixedTypeError && cause.column).toBe('n');
  });

  it('reports duplicate column names as unencodable', () => {
    const err = errorOf(() => encode({
      columns: [
        { kind: 'numeric', name: 'x', values: [1] },
        { kind: 'text',    name: 'x', values: ['a'] },
      ],
    }, { localOffsetMinutes: 0 }));
    expect(err).toBeInstanceOf(UnencodableError);
    expect(err instanceof Error && err.cause).toBeInstanceOf(TypeError);
  });

  it('reports ragged columns as unencodable', () => {
    expect(() => encode({
      columns: [
        { kind: 'numeric', name: 'a', values: [1, 2] },
        { kind: 'numeric', name: 'b', values: [1] },
      ],
    }, { localOffsetMinutes: 0 })).toThrow(UnencodableError);
  });
});

// ─── toText ───────────────────────────────────────────────────────────────────

describe('toText', () => {
  it('renders scalars', () => {
    expect(toText(null)).toBeNull();
    expect(toText(undefined)).toBeNull();
    expect(toText('x')).toBe('x');
    expect(toText(12)).toBe('12');
    expect(toText(true)).toBe('true');
    expect(toText(5n)).toBe('5');
  });

  it('renders dates as ISO-8601 and invalid dates as missing', () => {
    expect(toText(utc(2024, 0, 15, 10, 30))).toBe('2024-01-15T10:30:00.000Z');
    expect(toText(new Date(Number.NaN))).toBeNull();
  });

  it('renders objects and arrays as JSON', () => {
    expect(toText({ a: 1 })).toBe('{"a":1}');
    expect(toText([1, 'b'])).toBe('[1,"b"]');
  });

  it('falls back to a tag for values JSON cannot render', () => {
    const cyclic: { self?: unknown } = {};
    cyclic.self = cyclic;
    expect(toText(cyclic)).toBe('[object]');
    expect(toText([1n])).toBe('[array]');
  });
});
