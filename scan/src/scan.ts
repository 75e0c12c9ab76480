/**
 * GridForecastScan - one logical row stream over many remote resources.
 *
 * States:
 *
 * ```
 * idle -> fetching -> streaming -> exhausted -> fetching ... -> finished
 *            |            |
 *            +-> failed <-+
 * ```
 *
 * Reaching the row limit moves any live state to `finished`, closing the
 * open resource mid-batch. `finished` is terminal and yields empty batches;
 * `failed` is terminal and rejects every later pull.
 *
 * @example
 * ```typescript
 * const scan = new GridForecastScan({ binding, decoder, logger });
 *
 * for await (const row of scan) {
 *   console.log(row.forecast_hour, row.latitude, row.longitude, row.value);
 * }
 * ```
 */

import {
  ErrorCode,
  ScanStateError,
  createNoopLogger,
  withContext,
  type Logger,
} from '@gridscan/core';
import { DEFAULT_CONFIG, type GridScanConfig } from '@gridscan/config';
import type { GridDecoder, SampleBatch } from './decoder.js';
import { ResourcePipeline, type FetchFunction } from './pipeline.js';
import { ProgressTracker } from './progress.js';
import { projectBatch } from './projector.js';
import { enumerateResources } from './resources.js';
import type {
  FilterBinding,
  OutputRow,
  ResourceDescriptor,
  ScanCursor,
  ScanState,
} from './types.js';

export interface GridForecastScanOptions {
  binding: FilterBinding;
  decoder: GridDecoder;
  fetch?: FetchFunction;
  config?: GridScanConfig;
  logger?: Logger;
}

type FinishReason = 'complete' | 'limit' | 'closed';

export class GridForecastScan implements AsyncIterable<OutputRow> {
  readonly binding: FilterBinding;
  /** Fixed at construction; never changes afterwards */
  readonly resources: readonly ResourceDescriptor[];

  private readonly pipeline: ResourcePipeline;
  private readonly tracker: ProgressTracker;
  private readonly logger: Logger;
  private readonly batchSize: number;
  private readonly cursor: ScanCursor = {
    state: 'idle',
    resourceIndex: 0,
    rowsEmitted: 0,
    samplesRead: 0,
  };

  private failure: Error | undefined;
  private closed = false;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: GridForecastScanOptions) {
    const config = options.config ?? DEFAULT_CONFIG;

    this.binding = options.binding;
    this.resources = enumerateResources(options.binding, { baseUrl: config.api.baseUrl });
    this.batchSize = config.scan.batchSize;
    this.tracker = new ProgressTracker(this.resources.length);
    this.logger = withContext(options.logger ?? createNoopLogger(), {
      service: 'grid-forecast-scan',
      runDate: options.binding.runDate,
    });
    this.pipeline = new ResourcePipeline({
      decoder: options.decoder,
      fetch: options.fetch,
      requestTimeoutMs: config.api.requestTimeoutMs,
      userAgent: config.api.userAgent,
      logger: this.logger,
      onPhase: phase => this.tracker.enterPhase(phase),
    });
  }

  get state(): ScanState {
    return this.cursor.state;
  }

  get rowsEmitted(): number {
    return this.cursor.rowsEmitted;
  }

  /**
   * Whether a decoder handle is currently held.
   */
  get hasOpenResource(): boolean {
    return this.pipeline.isOpen;
  }

  /**
   * The error that moved the scan to `failed`.
   */
  get error(): Error | undefined {
    return this.failure;
  }

  /**
   * Advisory completion percentage; -1 when there is nothing to measure.
   */
  progress(): number {
    return this.tracker.percent();
  }

  /**
   * Pull the next batch of rows. An empty batch means the scan is finished.
   * Concurrent pulls run one after another.
   *
   * @throws {RemoteFetchError} If a resource cannot be fetched
   * @throws {DecodeError} If a resource cannot be decoded
   * @throws {ScanStateError} If the scan already failed
   */
  pull(): Promise<OutputRow[]> {
    const next = this.queue.then(() => this.advance());
    // The queue only orders pulls; each caller observes its own outcome through `next`.
    this.queue = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }

  /**
   * Stop the scan and release the open resource. Later pulls return empty
   * batches (or keep rejecting, if the scan had failed).
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.cursor.state === 'failed') {
      this.pipeline.close();
      return;
    }
    if (this.cursor.state !== 'finished') {
      this.finish('closed');
    }
  }

  /**
   * Rows one at a time. Leaving the loop early closes the scan.
   */
  async *rows(): AsyncGenerator<OutputRow, void, undefined> {
    try {
      for (;;) {
        const batch = await this.pull();
        if (batch.length === 0) {
          return;
        }
        yield* batch;
      }
    } finally {
      this.close();
    }
  }

  [Symbol.asyncIterator](): AsyncGenerator<OutputRow, void, undefined> {
    return this.rows();
  }

  // ===========================================================================
  // State machine
  // ===========================================================================

  private async advance(): Promise<OutputRow[]> {
    for (;;) {
      switch (this.cursor.state) {
        case 'finished':
          return [];

        case 'failed':
          throw new ScanStateError(
            `Scan already failed: ${this.failure?.message ?? 'unknown error'}`,
            ErrorCode.SCAN_FAILED,
            { operation: 'pull', cause: this.failure?.message }
          );

        case 'idle':
        case 'exhausted': {
          if (this.limitReached()) {
            this.finish('limit');
            return [];
          }
          const next = this.resources[this.cursor.resourceIndex];
          if (next === undefined) {
            this.finish('complete');
            return [];
          }
          await this.openResource(next);
          break;
        }

        case 'streaming': {
          const rows = this.readBatch();
          if (rows.length > 0) {
            return rows;
          }
          break;
        }

        case 'fetching':
          throw new ScanStateError('Pull issued while a resource is being fetched', ErrorCode.INTERNAL_ERROR);
      }
    }
  }

  private async openResource(resource: ResourceDescriptor): Promise<void> {
    this.transition('fetching', resource);
    this.cursor.samplesRead = 0;

    try {
      await this.pipeline.open(resource);
    } catch (error) {
      throw this.fail(error, resource);
    }

    if (this.closed) {
      this.pipeline.close();
      return;
    }
    this.transition('streaming', resource);
  }

  private readBatch(): OutputRow[] {
    const resource = this.pipeline.current;
    if (resource === null) {
      throw this.fail(new ScanStateError('Streaming without an open resource', ErrorCode.INTERNAL_ERROR));
    }

    let batch: SampleBatch;
    try {
      batch = this.pipeline.readBatch(this.batchSize);
    } catch (error) {
      throw this.fail(error, resource);
    }

    const rows = projectBatch(batch.samples, resource);
    this.cursor.samplesRead += batch.samples.length;

    const budget = this.remainingBudget();
    if (rows.length >= budget) {
      const emitted = rows.slice(0, budget);
      this.cursor.rowsEmitted += emitted.length;
      this.finish('limit');
      return emitted;
    }

    this.cursor.rowsEmitted += rows.length;

    // An empty batch ends the resource whatever the decoder claims.
    if (batch.hasMore && batch.samples.length > 0) {
      this.tracker.recordBatch(this.cursor.samplesRead, this.pipeline.totalSampleCount());
      return rows;
    }

    if (this.cursor.samplesRead === 0) {
      this.logger.info('resource empty', { forecastHour: resource.forecastHour, url: resource.url });
    }
    this.pipeline.close();
    this.tracker.completeResource();
    this.cursor.resourceIndex += 1;
    this.transition('exhausted', resource);
    return rows;
  }

  private remainingBudget(): number {
    const { limit } = this.binding;
    return limit === undefined ? Number.POSITIVE_INFINITY : Math.max(0, limit - this.cursor.rowsEmitted);
  }

  private limitReached(): boolean {
    return this.remainingBudget() === 0;
  }

  private transition(next: ScanState, resource?: ResourceDescriptor): void {
    const previous = this.cursor.state;
    this.cursor.state = next;
    this.logger.debug('scan state changed', {
      operation: 'transition',
      state: next,
      previous,
      ...(resource !== undefined && { forecastHour: resource.forecastHour }),
    });
  }

  private finish(reason: FinishReason): void {
    this.pipeline.close();
    this.tracker.finish();
    this.transition('finished');
    this.logger.info('scan finished', {
      operation: 'finish',
      reason,
      rowsProcessed: this.cursor.rowsEmitted,
      resourcesRead: this.cursor.resourceIndex,
      resourcesTotal: this.resources.length,
    });
  }

  /**
   * Move to `failed`, release the open resource, and hand back the error to throw.
   */
  private fail(error: unknown, resource?: ResourceDescriptor): Error {
    const failure = error instanceof Error ? error : new Error(String(error));
    this.failure = failure;
    this.pipeline.close();
    this.transition('failed', resource);
    this.logger.error('scan failed', failure, {
      ...(resource !== undefined && { forecastHour: resource.forecastHour, url: resource.url }),
      ...('code' in failure && typeof failure.code === 'string' && { errorCode: failure.code }),
      rowsProcessed: this.cursor.rowsEmitted,
    });
    return failure;
  }
}
