// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  Missing,
  ColumnKind,
  NumericColumn,
  BooleanColumn,
  TextColumn,
  TemporalColumn,
  ZonedTemporalColumn,
  GenericColumn,
  Column,
  Dataset,
  FieldType,
  FieldDescriptor,
  TableSchema,
  DecodedValue,
  DecodedColumn,
  DigestAlgorithm,
  ArtifactReference,
} from './types';

export { FIELD_BYTE_WIDTHS, FIELD_FLAG_NULLABLE } from './types';

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  TABLE_MAGIC,
  TABLE_VERSION,
  DEFAULT_CHUNK_SIZE,
  STORE_TMP_DIR,
  DEFAULT_ARTIFACT_EXTENSION,
  DEFAULT_STORE_ROOT,
} from './constants';

// ─── Schema ───────────────────────────────────────────────────────────────────
export {
  buildSchema,
  encodeSchema,
  decodeSchema,
  schemaFingerprint,
} from './schema';
export type { FieldDefinition, ColumnMeta } from './schema';

// ─── Header ───────────────────────────────────────────────────────────────────
export { encodeTableHeader, readTableHeader, TableHeaderError } from './header';
export type { TableGeometry, TableHeader } from './header';

// ─── Writer / View ────────────────────────────────────────────────────────────
export { TableWriter, EncodingError, MixedTypeError } from './writer';
export type { WritableColumn, TableWriterOptions } from './writer';
export { TableView, decodeTable } from './view';

// ─── Encoder ──────────────────────────────────────────────────────────────────
export { encode, inferFieldType, toText, UnencodableError } from './encoder';
export type { EncodeOptions } from './encoder';
export {
  formatOffset,
  isMidnight,
  isDateOnly,
  localizeToUtc,
  standardOffsetMinutes,
} from './timezone';

// ─── Store ────────────────────────────────────────────────────────────────────
export { ArtifactStore, StoreError, publish } from './store';
export type { ArtifactStoreOptions } from './store';

// ─── Bridge ───────────────────────────────────────────────────────────────────
export { RequestBridge, BridgeError, createRequestBridge } from './bridge';
export type {
  BridgeErrorKind,
  BridgeMessage,
  ComputeRuntime,
  RequestBridgeOptions,
  SendMessage,
} from './bridge';

// ─── Transformer ──────────────────────────────────────────────────────────────
export { createDataTransformer, publishDataset } from './transformer';
export type { DataReference, DataTransformer, TransformerConfig } from './transformer';

// ─── Config / Logging ─────────────────────────────────────────────────────────
export { BridgeConfigSchema, ConfigError, loadConfig, parseConfig } from './config';
export type { BridgeConfig, BridgeConfigInput } from './config';
export { createLogger, componentLogger, configuredLogger, logger } from './logger';
export type { Logger, LogLevel, LoggerOptions } from './logger';
