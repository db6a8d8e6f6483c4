/**
 * colbridge — request bridge
 *
 * Relays one opaque request buffer to the compute runtime and hands back its
 * response buffer, unmodified in both directions. The bridge does not read
 * the payload, queue, retry or apply backpressure: one call in, one call out.
 * The caller owns request coalescing (debounce) upstream.
 */

import { performance } from 'node:perf_hooks';
import type { BridgeConfig } from './config';
import { componentLogger, configuredLogger, type Logger } from './logger';

// ─── Errors ───────────────────────────────────────────────────────────────────

export type BridgeErrorKind = 'runtime_failure' | 'invalid_message';

export class BridgeError extends Error {
  readonly kind: BridgeErrorKind;

  constructor(kind: BridgeErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BridgeError';
    this.kind = kind;
  }
}

// ─── Collaborators ────────────────────────────────────────────────────────────

/**
 * The compute runtime: request bytes in, response bytes out. Its message
 * schema is its own business.
 */
export interface ComputeRuntime {
  processRequestBytes(request: Uint8Array): Uint8Array | Promise<Uint8Array>;
}

/** A message from the client surface; buffers travel beside it. */
export interface BridgeMessage {
  readonly type: string;
}

export type SendMessage = (message: BridgeMessage, buffers: readonly Uint8Array[]) => void;

export interface RequestBridgeOptions {
  /** Log a timing line per request. Observability only. */
  readonly verbose?: boolean;
  readonly logger?:  Logger;
}

// ─── RequestBridge ────────────────────────────────────────────────────────────

export class RequestBridge {
  readonly verbose: boolean;
  private readonly runtime: ComputeRuntime;
  private readonly log:     Logger;

  constructor(runtime: ComputeRuntime, options: RequestBridgeOptions = {}) {
    this.runtime = runtime;
    this.verbose = options.verbose ?? false;
    this.log     = options.logger ?? componentLogger('bridge');
  }

  /**
   * Forward `request` to the runtime and resolve with its response.
   *
   * @throws BridgeError (kind 'runtime_failure') wrapping whatever the
   *         runtime threw.
   */
  async handle(request: Uint8Array): Promise<Uint8Array> {
    const start = performance.now();
    if (this.verbose) this.log.info({ requestBytes: request.length }, 'Received request');

    let response: Uint8Array;
    try {
      response = await this.runtime.processRequestBytes(request);
    } catch (err) {
      throw new BridgeError(
        'runtime_failure',
        `Compute runtime failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }

    if (this.verbose) {
      const elapsedMs = performance.now() - start;
      this.log.info(
        { elapsedMs, responseBytes: response.length },
        `Sent response in ${elapsedMs.toFixed(1)}ms`,
      );
    }
    return response;
  }

  /**
   * Handle a message from the client surface. A `request` message carries
   * the request bytes in `buffers[0]` and is answered with a `response`
   * message carrying the response bytes. Other message types are ignored.
   *
   * @returns whether the message was handled.
   * @throws BridgeError (kind 'invalid_message') for a request without a buffer.
   */
  async handleMessage(
    message: BridgeMessage,
    buffers: readonly Uint8Array[],
    send:    SendMessage,
  ): Promise<boolean> {
    if (message.type !== 'request') return false;

    const request = buffers[0];
    if (request === undefined) {
      throw new BridgeError('invalid_message', 'Request message arrived without a request buffer.');
    }

    const response = await this.handle(request);
    send({ type: 'response' }, [response]);
    return true;
  }
}

/**
 * Bridge with `verbose` and the log level taken from configuration.
 */
export function createRequestBridge(
  runtime: ComputeRuntime,
  config:  Pick<BridgeConfig, 'verbose' | 'logLevel'>,
  logger:  Logger = configuredLogger(config, 'bridge'),
): RequestBridge {
  return new RequestBridge(runtime, { verbose: config.verbose, logger });
}
