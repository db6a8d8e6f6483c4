/**
 * colbridge — layout constants
 *
 * These constants define the binary contract of the container header.
 * Any change to byte offsets or magic values is a BREAKING CHANGE
 * requiring a version bump in TABLE_VERSION.
 *
 *   [0..3]    magic           u32  = TABLE_MAGIC ('CBAR')
 *   [4..7]    version         u32  = TABLE_VERSION
 *   [8..11]   schema_fp       u32  = FNV-1a of binary schema encoding
 *   [12..15]  chunk_size      u32  = maximum rows per batch
 *   [16..19]  row_count       u32
 *   [20..23]  batch_count     u32
 *   [24..27]  header_crc      u32  = FNV-1a of bytes 0–23
 *   [28..31]  schema_byte_len u32
 *   [32..]    binary schema descriptor
 *             [meta_byte_len: u32][meta: UTF-8 JSON]
 *             row batches
 */

// ─── Magic & Version ──────────────────────────────────────────────────────────

/** 'CBAR' as a little-endian u32. Checked first on any container. */
export const TABLE_MAGIC:   number = 0x52414243;

export const TABLE_VERSION: number = 1;

// ─── Header Layout ────────────────────────────────────────────────────────────

export const OFFSET_MAGIC           =  0; // u32
export const OFFSET_VERSION         =  4; // u32
export const OFFSET_SCHEMA_FP       =  8; // u32
export const OFFSET_CHUNK_SIZE      = 12; // u32
export const OFFSET_ROW_COUNT       = 16; // u32
export const OFFSET_BATCH_COUNT     = 20; // u32
export const OFFSET_HEADER_CRC      = 24; // u32 — covers bytes 0–23
export const OFFSET_SCHEMA_BYTE_LEN = 28; // u32
export const OFFSET_SCHEMA_BYTES    = 32; // variable

/** Smallest possible container: fixed header plus an empty meta length word. */
export const MIN_CONTAINER_BYTES = OFFSET_SCHEMA_BYTES + 2 + 4;

// ─── Encoding ─────────────────────────────────────────────────────────────────

/**
 * Default maximum rows per batch. Fixed, never derived from the data, so
 * the same table always serializes to the same bytes.
 */
export const DEFAULT_CHUNK_SIZE = 65_536;

/** Offsets in a utf8 body are u32; one batch may not exceed this many bytes. */
export const MAX_UTF8_BATCH_BYTES = 0xffffffff;

// ─── Store ────────────────────────────────────────────────────────────────────

/** Scratch subdirectory of the store root for in-progress writes. */
export const STORE_TMP_DIR = 'tmp';

export const DEFAULT_ARTIFACT_EXTENSION = 'cbar';

export const DEFAULT_STORE_ROOT = '_colbridge_data';
