/**
 * colbridge — content-addressed artifact store
 *
 * Artifacts live at <root>/<key>.<ext>, where key is the hex digest of the
 * artifact bytes. Publication:
 *
 *   1. key        — digest of the bytes
 *   2. dedup      — if <root>/<key>.<ext> exists, return its reference; the
 *                   existing file is neither read nor re-hashed
 *   3. write      — bytes go to a uniquely named file under <root>/tmp/
 *   4. rename     — the temp file is renamed onto the final path
 *
 * The rename is the only step that makes an artifact visible under its final
 * name, so a listing of <root> never shows a partially written artifact.
 * Concurrent publishers of the same key each write their own temp file and
 * rename independently; every rename installs identical bytes. No locks are
 * taken. A crash mid-write leaves only a stray file under tmp/.
 *
 * tmp/ is inside the root so the rename never crosses a filesystem boundary.
 *
 * Failures are surfaced as StoreError and never retried here.
 */

import { createHash, randomUUID } from 'node:crypto';
import { promises as fs } from 'node:fs';
import { join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import {
  DEFAULT_ARTIFACT_EXTENSION,
  STORE_TMP_DIR,
} from './constants';
import { componentLogger, type Logger } from './logger';
import type { ArtifactReference, DigestAlgorithm } from './types';

// ─── Errors ───────────────────────────────────────────────────────────────────

export class StoreError extends Error {
  readonly kind = 'io';
  /** errno code of the underlying failure, e.g. 'ENOSPC'. */
  readonly code: string | undefined;
  readonly path: string;

  constructor(message: string, path: string, cause: unknown) {
    super(message, { cause });
    this.name = 'StoreError';
    this.path = path;
    this.code = errnoCode(cause);
  }
}

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ─── Options ──────────────────────────────────────────────────────────────────

export interface ArtifactStoreOptions {
  /** File extension without the dot. @default 'cbar' */
  readonly extension?: string;
  /** @default 'sha256' */
  readonly digest?:    DigestAlgorithm;
  /**
   * Reference URLs become `${urlPrefix}${key}.${ext}`. Without a prefix they
   * are `file:` URLs of the artifact path.
   */
  readonly urlPrefix?: string;
  readonly logger?:    Logger;
}

// ─── ArtifactStore ────────────────────────────────────────────────────────────

export class ArtifactStore {
  readonly root:      string;
  readonly tmpDir:    string;
  readonly extension: string;
  readonly digest:    DigestAlgorithm;
  private readonly urlPrefix: string | undefined;
  private readonly log:       Logger;

  constructor(root: string, options: ArtifactStoreOptions = {}) {
    this.root      = resolve(root);
    this.tmpDir    = join(this.root, STORE_TMP_DIR);
    this.extension = options.extension ?? DEFAULT_ARTIFACT_EXTENSION;
    this.digest    = options.digest ?? 'sha256';
    this.urlPrefix = options.urlPrefix;
    this.log       = options.logger ?? componentLogger('store');
  }

  /** Hex digest identifying `bytes`. */
  keyFor(bytes: Uint8Array): string {
    return createHash(this.digest).update(bytes).digest('hex');
  }

  pathFor(key: string): string {
    return join(this.root, `${key}.${this.extension}`);
  }

  urlFor(key: string): string {
    return this.urlPrefix !== undefined
      ? `${this.urlPrefix}${key}.${this.extension}`
      : pathToFileURL(this.pathFor(key)).href;
  }

  /**
   * Whether an artifact is published under `key`.
   *
   * @throws StoreError for failures other than absence.
   */
  async has(key: string): Promise<boolean> {
    const path = this.pathFor(key);
    try {
      await fs.access(path);
      return true;
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return false;
      throw new StoreError(`Cannot check artifact ${path}: ${describe(err)}`, path, err);
    }
  }

  /**
   * Publish `bytes` and return its reference. Publishing bytes that are
   * already present is a no-op returning the same reference.
   *
   * @throws StoreError on filesystem failure; no final artifact is left behind.
   */
  async publish(bytes: Uint8Array): Promise<ArtifactReference> {
    const key  = this.keyFor(bytes);
    const path = this.pathFor(key);

    if (await this.has(key)) {
      this.log.debug({ key, path }, 'Artifact already exists, returning existing ref');
      return this.reference(key);
    }

    const tempPath = join(this.tmpDir, `${key}.${randomUUID()}.tmp`);
    try {
      await fs.mkdir(this.tmpDir, { recursive: true });
      await fs.writeFile(tempPath, bytes);
      await fs.rename(tempPath, path);
    } catch (err) {
      await this.discard(tempPath);
      this.log.error({ err, key, path }, 'Failed to publish artifact');
      throw new StoreError(`Cannot publish artifact ${path}: ${describe(err)}`, path, err);
    }

    this.log.debug({ key, path, sizeBytes: bytes.length }, 'Artifact published');
    return this.reference(key);
  }

  private reference(key: string): ArtifactReference {
    return { key, path: this.pathFor(key), url: this.urlFor(key) };
  }

  /** Remove our own temp file after a failed write. It may never have been created. */
  private async discard(tempPath: string): Promise<void> {
    try {
      await fs.unlink(tempPath);
    } catch (err) {
      if (errnoCode(err) !== 'ENOENT') {
        this.log.warn({ err, tempPath }, 'Could not remove temporary artifact');
      }
    }
  }
}

/**
 * Publish `bytes` under `storeRoot` with default options.
 */
export function publish(
  bytes:     Uint8Array,
  storeRoot: string,
  options:   ArtifactStoreOptions = {},
): Promise<ArtifactReference> {
  return new ArtifactStore(storeRoot, options).publish(bytes);
}
