/**
 * colbridge — data transformer
 *
 * Turns a chart's inline dataset into a data reference: encode, publish,
 * hand back `{ url }`. Identical datasets map to the same URL, and only the
 * first publication touches the disk.
 */

import type { BridgeConfig } from './config';
import { encode } from './encoder';
import { configuredLogger, type Logger } from './logger';
import { ArtifactStore } from './store';
import type { ArtifactReference, Dataset } from './types';

export interface DataReference {
  readonly url: string;
}

export type DataTransformer = (dataset: Dataset) => Promise<DataReference>;

export type TransformerConfig = Pick<
  BridgeConfig,
  'storeRoot' | 'chunkSize' | 'extension' | 'digest' | 'urlPrefix' | 'localOffsetMinutes' | 'logLevel'
>;

/**
 * Encode `dataset` and publish the artifact.
 *
 * @throws EncodingError or StoreError; nothing is published on failure.
 */
export async function publishDataset(
  dataset: Dataset,
  config:  TransformerConfig,
  logger:  Logger = configuredLogger(config, 'transformer'),
): Promise<ArtifactReference> {
  const bytes = encode(dataset, {
    chunkSize: config.chunkSize,
    ...(config.localOffsetMinutes !== undefined ? { localOffsetMinutes: config.localOffsetMinutes } : {}),
    logger,
  });
  const store = new ArtifactStore(config.storeRoot, {
    extension: config.extension,
    digest:    config.digest,
    ...(config.urlPrefix !== undefined ? { urlPrefix: config.urlPrefix } : {}),
    logger,
  });
  return store.publish(bytes);
}

export function createDataTransformer(
  config: TransformerConfig,
  logger: Logger = configuredLogger(config, 'transformer'),
): DataTransformer {
  return async dataset => {
    const ref = await publishDataset(dataset, config, logger);
    return { url: ref.url };
  };
}
