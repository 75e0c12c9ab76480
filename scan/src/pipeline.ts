/**
 * Fetch-decode pipeline: one HTTP GET per resource, one decoder handle at a
 * time.
 *
 * `open` downloads a resource and opens it with the decoder, `readBatch`
 * pulls samples, `close` releases the handle and the downloaded body. Opening
 * a resource closes the previous one first, so at most one handle is ever
 * held.
 */

import {
  DecodeError,
  ErrorCode,
  RemoteFetchError,
  ScanStateError,
  createNoopLogger,
  isErr,
  type Logger,
} from '@gridscan/core';
import { DEFAULT_CONFIG } from '@gridscan/config';
import type { GridDecoder, GridHandle, SampleBatch } from './decoder.js';
import type { ResourceDescriptor } from './types.js';

/**
 * The subset of `fetch` the pipeline calls. `globalThis.fetch` satisfies it.
 */
export type FetchFunction = (url: string, init?: RequestInit) => Promise<Response>;

/**
 * Milestones of opening one resource, for progress reporting.
 */
export type ResourcePhase = 'connecting' | 'fetched' | 'opened';

export interface ResourcePipelineOptions {
  decoder: GridDecoder;
  /** HTTP client (default: globalThis.fetch) */
  fetch?: FetchFunction;
  /** Per-request timeout (default: config `api.requestTimeoutMs`) */
  requestTimeoutMs?: number;
  userAgent?: string;
  logger?: Logger;
  onPhase?: (phase: ResourcePhase, descriptor: ResourceDescriptor) => void;
}

export class ResourcePipeline {
  private readonly decoder: GridDecoder;
  private readonly fetchFn: FetchFunction;
  private readonly requestTimeoutMs: number;
  private readonly userAgent: string;
  private readonly logger: Logger;
  private readonly onPhase: (phase: ResourcePhase, descriptor: ResourceDescriptor) => void;

  private handle: GridHandle | null = null;
  private body: Uint8Array | null = null;
  private active: ResourceDescriptor | null = null;

  constructor(options: ResourcePipelineOptions) {
    this.decoder = options.decoder;
    this.fetchFn = options.fetch ?? ((url, init) => globalThis.fetch(url, init));
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_CONFIG.api.requestTimeoutMs;
    this.userAgent = options.userAgent ?? DEFAULT_CONFIG.api.userAgent;
    this.logger = options.logger ?? createNoopLogger();
    this.onPhase = options.onPhase ?? (() => {});
  }

  /**
   * The resource currently open, if any.
   */
  get current(): ResourceDescriptor | null {
    return this.active;
  }

  get isOpen(): boolean {
    return this.handle !== null;
  }

  /**
   * Size of the downloaded body held for the open resource.
   */
  get bufferedBytes(): number {
    return this.body?.byteLength ?? 0;
  }

  /**
   * Download `descriptor` and open it with the decoder.
   *
   * @throws {RemoteFetchError} On a transport failure or a non-2xx status
   * @throws {DecodeError} If the decoder rejects the body
   */
  async open(descriptor: ResourceDescriptor): Promise<void> {
    this.close();

    const started = Date.now();
    this.onPhase('connecting', descriptor);
    const body = await this.download(descriptor);
    this.onPhase('fetched', descriptor);

    const opened = this.decoder.open(body);
    if (isErr(opened)) {
      throw DecodeError.openFailed(opened.error.message, descriptor.url, descriptor.forecastHour);
    }

    this.handle = opened.value;
    this.body = body;
    this.active = descriptor;
    this.onPhase('opened', descriptor);

    this.logger.info('resource opened', {
      operation: 'open',
      forecastHour: descriptor.forecastHour,
      url: descriptor.url,
      bytesProcessed: body.byteLength,
      durationMs: Date.now() - started,
    });
  }

  /**
   * Pull up to `maxCount` samples from the open resource.
   *
   * @throws {DecodeError} If the decoder reports a malformed payload
   */
  readBatch(maxCount: number): SampleBatch {
    const { handle, active } = this;
    if (handle === null || active === null) {
      throw new ScanStateError('No resource is open', ErrorCode.INTERNAL_ERROR);
    }

    const batch = handle.readBatch(maxCount);
    if (isErr(batch)) {
      throw DecodeError.readFailed(batch.error.message, active.url, active.forecastHour);
    }
    return batch.value;
  }

  /**
   * Samples the open resource holds in total; 0 when unknown or nothing is open.
   */
  totalSampleCount(): number {
    return this.handle?.totalSampleCount() ?? 0;
  }

  /**
   * Release the decoder handle and the downloaded body. Safe to call twice.
   */
  close(): void {
    const { handle, active } = this;
    const released = this.bufferedBytes;
    this.handle = null;
    this.body = null;
    this.active = null;

    if (handle !== null) {
      handle.close();
      this.logger.debug('resource closed', {
        operation: 'close',
        bytesProcessed: released,
        ...(active !== null && { forecastHour: active.forecastHour }),
      });
    }
  }

  private async download(descriptor: ResourceDescriptor): Promise<Uint8Array> {
    const { url, forecastHour } = descriptor;

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: 'GET',
        headers: { 'User-Agent': this.userAgent },
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (cause) {
      throw RemoteFetchError.unreachable(url, forecastHour, cause);
    }

    if (!response.ok) {
      throw RemoteFetchError.badStatus(response.status, url, forecastHour);
    }

    try {
      return new Uint8Array(await response.arrayBuffer());
    } catch (cause) {
      throw RemoteFetchError.unreachable(url, forecastHour, cause);
    }
  }
}
