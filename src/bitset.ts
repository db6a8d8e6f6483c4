/**
 * colbridge — validity bitmaps
 *
 * Uint32Array bitsets marking which rows of a column batch hold a value.
 * Bit j represents row j within the batch; 1 = present, 0 = missing.
 *
 * Bit layout:
 *   word  = j >>> 5        (Math.floor(j / 32))
 *   shift = j  &  31       (j % 32)
 *   set:   bs[word] |= (1 << shift)
 *   test:  bs[word] &  (1 << shift)
 *
 * On the wire the bitmap is written as ceil(rows / 32) little-endian u32 words.
 */

/**
 * Allocate a zeroed bitset large enough to hold `bitCount` bits.
 */
export function createBitset(bitCount: number): Uint32Array {
  return new Uint32Array(Math.ceil(bitCount / 32));
}

/** Byte length of a serialized bitmap covering `bitCount` rows. */
export function bitsetByteLength(bitCount: number): number {
  return Math.ceil(bitCount / 32) * 4;
}

export function setBit(bs: Uint32Array, j: number): void {
  const w = j >>> 5;
  bs[w] = (bs[w] ?? 0) | (1 << (j & 31));
}

export function testBit(bs: Uint32Array, j: number): boolean {
  return ((bs[j >>> 5] ?? 0) & (1 << (j & 31))) !== 0;
}

// ── Population count ─────────────────────────────────────────────────────────

/**
 * Count set bits in `bs`, considering only bits 0..(limit-1).
 * If `limit` is omitted, all bits in the array are counted.
 */
export function popcount(bs: Uint32Array, limit?: number): number {
  const effectiveLimit = limit ?? bs.length * 32;
  const fullWords      = effectiveLimit >>> 5;
  const tailBits       = effectiveLimit  &  31;

  let count = 0;

  const bulk = Math.min(fullWords, bs.length);
  for (let w = 0; w < bulk; w++) {
    count += popcountWord(bs[w] ?? 0);
  }

  if (tailBits > 0 && fullWords < bs.length) {
    // Mask off bits beyond `limit` in the partial last word.
    const mask = (1 << tailBits) - 1;
    count += popcountWord((bs[fullWords] ?? 0) & mask);
  }

  return count;
}

/** Hamming weight of a single unsigned 32-bit word (parallel bit summation). */
function popcountWord(v: number): number {
  v = v - ((v >>> 1) & 0x55555555);
  v = (v & 0x33333333) + ((v >>> 2) & 0x33333333);
  return (((v + (v >>> 4)) & 0x0f0f0f0f) * 0x01010101) >>> 24;
}

// ── Serialization ─────────────────────────────────────────────────────────────

/** Write `bs` as little-endian u32 words at `offset`. Returns bytes written. */
export function writeBitset(dv: DataView, offset: number, bs: Uint32Array): number {
  for (let w = 0; w < bs.length; w++) {
    dv.setUint32(offset + w * 4, bs[w] ?? 0, /* le */ true);
  }
  return bs.length * 4;
}

/** Read a bitmap covering `bitCount` rows starting at `offset`. */
export function readBitset(dv: DataView, offset: number, bitCount: number): Uint32Array {
  const bs = createBitset(bitCount);
  for (let w = 0; w < bs.length; w++) {
    bs[w] = dv.getUint32(offset + w * 4, true);
  }
  return bs;
}
