/**
 * GridFileScan - rows of one or more grid files, read in list order.
 *
 * Each source is a local path or an http(s) URL. Sources load whole, one
 * at a time; a source's decoder handle is closed before the next source
 * loads, and closing the scan releases whatever is open.
 *
 * @example
 * ```typescript
 * const scan = readGrid(['/data/gfs.t00z.f000.grib2', '/data/gfs.t00z.f006.grib2'], { decoder });
 *
 * for await (const row of scan) {
 *   console.log(row.file_index, row.parameter, row.surface, row.value);
 * }
 * ```
 */

import { readFile } from 'node:fs/promises';
import {
  ErrorCode,
  GridSourceError,
  ScanStateError,
  ValidationError,
  createNoopLogger,
  isErr,
  withContext,
  type Logger,
} from '@gridscan/core';
import { DEFAULT_CONFIG, type GridScanConfig } from '@gridscan/config';
import type { GridDecoder, GridHandle } from './decoder.js';
import type { FetchFunction } from './pipeline.js';
import { projectGridSample } from './projector.js';
import type { GridFileRow } from './types.js';

export type GridFileState = 'idle' | 'loading' | 'streaming' | 'exhausted' | 'finished' | 'failed';

/**
 * Reads a local source into memory.
 */
export type ReadFileFunction = (path: string) => Promise<Uint8Array>;

export interface GridReaderDependencies {
  decoder: GridDecoder;
  /** HTTP client for http(s) sources (default: globalThis.fetch) */
  fetch?: FetchFunction;
  /** Loader for local paths (default: node:fs/promises readFile) */
  readFile?: ReadFileFunction;
  /** Stop after this many rows */
  limit?: number;
  config?: GridScanConfig;
  logger?: Logger;
}

export function isHttpSource(source: string): boolean {
  return source.startsWith('http://') || source.startsWith('https://');
}

/**
 * Start a scan over `sources`.
 *
 * @throws {ValidationError} If the list is empty or holds an empty source
 */
export function readGrid(sources: string | readonly string[], deps: GridReaderDependencies): GridFileScan {
  const list = typeof sources === 'string' ? [sources] : [...sources];
  if (list.length === 0) {
    throw new ValidationError('Grid source list cannot be empty', ErrorCode.VALIDATION_ERROR, {
      field: 'sources',
    });
  }
  list.forEach((source, index) => {
    if (source.trim() === '') {
      throw ValidationError.invalidFormat(`sources[${index}]`, 'a file path or http(s) URL', source);
    }
  });
  return new GridFileScan(list, deps);
}

export class GridFileScan implements AsyncIterable<GridFileRow> {
  readonly sources: readonly string[];

  private readonly decoder: GridDecoder;
  private readonly fetchFn: FetchFunction;
  private readonly readFileFn: ReadFileFunction;
  private readonly limit: number | undefined;
  private readonly batchSize: number;
  private readonly requestTimeoutMs: number;
  private readonly userAgent: string;
  private readonly logger: Logger;

  private currentState: GridFileState = 'idle';
  private handle: GridHandle | null = null;
  private fileIndex = 0;
  private emitted = 0;
  private totalSamples = 0;
  private failure: Error | undefined;
  private closed = false;
  private queue: Promise<void> = Promise.resolve();

  constructor(sources: readonly string[], deps: GridReaderDependencies) {
    const config = deps.config ?? DEFAULT_CONFIG;

    this.sources = Object.freeze([...sources]);
    this.decoder = deps.decoder;
    this.fetchFn = deps.fetch ?? ((url, init) => globalThis.fetch(url, init));
    this.readFileFn = deps.readFile ?? (path => readFile(path));
    this.limit = deps.limit;
    this.batchSize = config.scan.batchSize;
    this.requestTimeoutMs = config.api.requestTimeoutMs;
    this.userAgent = config.api.userAgent;
    this.logger = withContext(deps.logger ?? createNoopLogger(), { service: 'grid-file-scan' });
  }

  get state(): GridFileState {
    return this.currentState;
  }

  get rowsEmitted(): number {
    return this.emitted;
  }

  get hasOpenSource(): boolean {
    return this.handle !== null;
  }

  get error(): Error | undefined {
    return this.failure;
  }

  /**
   * Share of sources fully read, as a percentage; -1 until a source reports
   * its sample total.
   */
  progress(): number {
    if (this.currentState === 'finished') {
      return 100;
    }
    if (this.totalSamples === 0) {
      return -1;
    }
    return (this.fileIndex * 100) / this.sources.length;
  }

  /**
   * Pull the next batch of rows. An empty batch means the scan is finished.
   * Concurrent pulls run one after another.
   *
   * @throws {GridSourceError} If a source cannot be loaded or decoded
   * @throws {ScanStateError} If the scan already failed
   */
  pull(): Promise<GridFileRow[]> {
    const next = this.queue.then(() => this.advance());
    this.queue = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.currentState === 'failed') {
      this.release();
      return;
    }
    if (this.currentState !== 'finished') {
      this.finish('closed');
    }
  }

  async *rows(): AsyncGenerator<GridFileRow, void, undefined> {
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

  [Symbol.asyncIterator](): AsyncGenerator<GridFileRow, void, undefined> {
    return this.rows();
  }

  private remainingBudget(): number {
    return this.limit === undefined ? Number.POSITIVE_INFINITY : Math.max(0, this.limit - this.emitted);
  }

  private async advance(): Promise<GridFileRow[]> {
    for (;;) {
      switch (this.currentState) {
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
          if (this.remainingBudget() === 0) {
            this.finish('limit');
            return [];
          }
          const source = this.sources[this.fileIndex];
          if (source === undefined) {
            this.finish('complete');
            return [];
          }
          await this.open(source);
          break;
        }

        case 'streaming': {
          const rows = this.readBatch();
          if (rows.length > 0) {
            return rows;
          }
          break;
        }

        case 'loading':
          throw new ScanStateError('Pull issued while a grid source is loading', ErrorCode.INTERNAL_ERROR);
      }
    }
  }

  private async open(source: string): Promise<void> {
    const fileIndex = this.fileIndex;
    this.currentState = 'loading';

    let handle: GridHandle;
    try {
      const bytes = await this.load(source, fileIndex);
      const opened = this.decoder.open(bytes);
      if (isErr(opened)) {
        throw GridSourceError.openFailed(opened.error.message, source, fileIndex);
      }
      handle = opened.value;
    } catch (error) {
      throw this.fail(error, source);
    }

    if (this.closed) {
      handle.close();
      return;
    }
    this.handle = handle;
    this.totalSamples += handle.totalSampleCount();
    this.currentState = 'streaming';
    this.logger.info('grid source opened', { operation: 'open', fileIndex, source });
  }

  private readBatch(): GridFileRow[] {
    const { handle } = this;
    const source = this.sources[this.fileIndex];
    if (handle === null || source === undefined) {
      throw this.fail(new ScanStateError('Streaming without an open grid source', ErrorCode.INTERNAL_ERROR));
    }

    const read = handle.readBatch(Math.min(this.batchSize, this.remainingBudget()));
    if (isErr(read)) {
      throw this.fail(GridSourceError.readFailed(read.error.message, source, this.fileIndex), source);
    }

    const batch = read.value;
    const rows = batch.samples.map(sample => projectGridSample(sample, this.fileIndex));
    this.emitted += rows.length;

    if (this.remainingBudget() === 0) {
      this.finish('limit');
      return rows;
    }
    if (!batch.hasMore || rows.length === 0) {
      this.release();
      this.fileIndex += 1;
      this.currentState = 'exhausted';
    }
    return rows;
  }

  private async load(source: string, fileIndex: number): Promise<Uint8Array> {
    if (!isHttpSource(source)) {
      try {
        return await this.readFileFn(source);
      } catch (cause) {
        throw GridSourceError.unreadable(source, fileIndex, cause);
      }
    }

    let response: Response;
    try {
      response = await this.fetchFn(source, {
        method: 'GET',
        headers: { 'User-Agent': this.userAgent },
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (cause) {
      throw GridSourceError.unreadable(source, fileIndex, cause);
    }
    if (!response.ok) {
      throw GridSourceError.badStatus(response.status, source, fileIndex);
    }
    try {
      return new Uint8Array(await response.arrayBuffer());
    } catch (cause) {
      throw GridSourceError.unreadable(source, fileIndex, cause);
    }
  }

  private release(): void {
    const { handle } = this;
    this.handle = null;
    handle?.close();
  }

  private finish(reason: 'complete' | 'limit' | 'closed'): void {
    this.release();
    this.currentState = 'finished';
    this.logger.info('scan finished', {
      operation: 'finish',
      reason,
      rowsProcessed: this.emitted,
      filesRead: this.fileIndex,
      filesTotal: this.sources.length,
    });
  }

  private fail(error: unknown, source?: string): Error {
    const failure = error instanceof Error ? error : new Error(String(error));
    this.failure = failure;
    this.release();
    this.currentState = 'failed';
    this.logger.error('scan failed', failure, { ...(source !== undefined && { source }) });
    return failure;
  }
}
