/**
 * colbridge — timezone normalization for zone-naive timestamp columns
 *
 * The container's timestamp_ms type stores UTC instants; it has no notion of
 * an ambiguous local reading. A naive column is resolved before encoding:
 *
 *   every reading at midnight  → a date-only column, tagged UTC
 *   any reading off midnight   → readings were local to the process's standard
 *                                offset; shift them to UTC and write them
 *                                zone-naive, recording the offset used
 *
 * This matches the client surface's date parser, which reads a bare date as
 * UTC midnight and a date-time as local time.
 */

const MS_PER_MINUTE = 60_000;

/** Largest offset any zone uses, ±18:00, in minutes. */
export const MAX_OFFSET_MINUTES = 18 * 60;

function isValidDate(v: unknown): v is Date {
  return v instanceof Date && !Number.isNaN(v.getTime());
}

/** True when the Date's UTC time of day is exactly 00:00:00.000. */
export function isMidnight(d: Date): boolean {
  return d.getUTCHours() === 0 &&
    d.getUTCMinutes() === 0 &&
    d.getUTCSeconds() === 0 &&
    d.getUTCMilliseconds() === 0;
}

/**
 * True when every present reading is at midnight. Missing and invalid
 * readings are ignored, so an empty column counts as date-only.
 */
export function isDateOnly(values: readonly unknown[]): boolean {
  return values.every(v => !isValidDate(v) || isMidnight(v));
}

/**
 * The process's standard UTC offset in minutes east of UTC, ignoring DST.
 *
 * Standard time is the smaller of the January and July offsets: in either
 * hemisphere daylight saving only ever moves clocks forward.
 */
export function standardOffsetMinutes(year: number = new Date().getFullYear()): number {
  const jan = new Date(year, 0, 1).getTimezoneOffset();
  const jul = new Date(year, 6, 1).getTimezoneOffset();
  // getTimezoneOffset() is minutes WEST of UTC.
  return -Math.max(jan, jul);
}

/** Render an offset in minutes east of UTC as `±HH:MM`. */
export function formatOffset(minutes: number): string {
  if (!Number.isInteger(minutes) || Math.abs(minutes) > MAX_OFFSET_MINUTES) {
    throw new RangeError(
      `UTC offset must be a whole number of minutes within ±${MAX_OFFSET_MINUTES}; got ${minutes}.`,
    );
  }
  const sign = minutes < 0 ? '-' : '+';
  const abs  = Math.abs(minutes);
  const hh   = String(Math.floor(abs / 60)).padStart(2, '0');
  const mm   = String(abs % 60).padStart(2, '0');
  return `${sign}${hh}:${mm}`;
}

/**
 * Interpret a naive reading (UTC fields = wall clock) as local to
 * `offsetMinutes` and return the UTC instant it denotes.
 */
export function localizeToUtc(reading: Date, offsetMinutes: number): Date {
  return new Date(reading.getTime() - offsetMinutes * MS_PER_MINUTE);
}

// ─── Column normalization ─────────────────────────────────────────────────────

export interface NormalizedTemporal {
  /** Zone the column is tagged with; absent for zone-naive output. */
  readonly timezone?:     string;
  /** Offset the readings were localized from; present only when shifted. */
  readonly sourceOffset?: string;
  /** A fresh array; the caller's values are never modified. */
  readonly values:        readonly (Date | null)[];
}

/**
 * Resolve a naive temporal column for the wire.
 *
 * @param offset  Process standard offset, computed once per encode call.
 */
export function normalizeNaiveTemporal(
  values: readonly unknown[],
  offset: { readonly minutes: number; readonly label: string },
): NormalizedTemporal {
  if (isDateOnly(values)) {
    return {
      timezone: 'UTC',
      values:   values.map(v => (isValidDate(v) ? new Date(v.getTime()) : null)),
    };
  }

  return {
    sourceOffset: offset.label,
    values:       values.map(v => (isValidDate(v) ? localizeToUtc(v, offset.minutes) : null)),
  };
}
