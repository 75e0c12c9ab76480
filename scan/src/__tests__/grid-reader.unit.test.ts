/**
 * @gridscan/scan - Grid file reader tests
 *
 * Local sources are real files in a temporary directory whose contents are
 * fake-decoder payload keys; http(s) sources go through the mock fetch.
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ErrorCode, GridSourceError, ScanStateError, ValidationError, createTestLogger } from '@gridscan/core';
import { createConfig } from '@gridscan/config';
import { readGrid, isHttpSource, type GridFileScan } from '../grid-reader.js';
import type { GridFileRow } from '../types.js';
import { FakeGridDecoder, samples } from './fixtures/fake-decoder.js';
import { createMockFetch } from './fixtures/mock-fetch.js';

const SEA_TEMPERATURE = { discipline: 10, parameterCategory: 3, parameterNumber: 0, surfaceType: 1, surfaceValue: 0 };
const REMOTE_F000 = 'https://example.test/grids?file=gfs.t00z.pgrb2.0p25.f000';

let dir = '';

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'gridscan-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function gridFile(name: string, payloadKey: string): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, payloadKey);
  return path;
}

async function drain(scan: GridFileScan): Promise<GridFileRow[]> {
  const rows: GridFileRow[] = [];
  for await (const row of scan) {
    rows.push(row);
  }
  return rows;
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected a rejection');
}

describe('readGrid', () => {
  it('should reject an empty source list or an empty source', () => {
    const decoder = new FakeGridDecoder({});

    expect(() => readGrid([], { decoder })).toThrow(ValidationError);
    expect(() => readGrid([], { decoder })).toThrow('Grid source list cannot be empty');
    expect(() => readGrid(['/data/a.grib2', ' '], { decoder })).toThrow('Invalid format for "sources[1]"');
  });

  it('should tell http(s) sources from local paths', () => {
    expect(isHttpSource(REMOTE_F000)).toBe(true);
    expect(isHttpSource('http://example.test/a.grib2')).toBe(true);
    expect(isHttpSource('/data/http-mirror/a.grib2')).toBe(false);
  });
});

describe('GridFileScan', () => {
  describe('streaming', () => {
    it('should read every file in list order, one handle at a time', async () => {
      const decoder = new FakeGridDecoder({
        f000: { samples: samples(3) },
        f006: { samples: samples(2, SEA_TEMPERATURE) },
      });
      const logger = createTestLogger();
      const scan = readGrid([await gridFile('a.grib2', 'f000'), await gridFile('b.grib2', 'f006')], {
        decoder,
        logger,
      });

      const rows = await drain(scan);

      expect(rows.map(r => r.file_index)).toEqual([0, 0, 0, 1, 1]);
      expect(rows[0]).toEqual({
        latitude: 40,
        longitude: 250,
        value: 270,
        discipline: 'Meteorological',
        surface: 'Height_Above_Ground',
        parameter: 'Temperature',
        forecast_time: 0,
        surface_value: 2,
        message_index: 0,
        file_index: 0,
      });
      expect(rows[3]).toMatchObject({ discipline: 'Oceanographic', surface: 'Ground_Water', parameter: 'Sea_Temp' });
      expect(decoder.closed).toEqual(['f000', 'f006']);
      expect(decoder.maxOpenHandles).toBe(1);
      expect(decoder.openHandles).toBe(0);
      expect(scan.state).toBe('finished');
      expect(scan.progress()).toBe(100);
      expect(logger.getLogsByLevel('info').filter(e => e.message === 'grid source opened')).toHaveLength(2);
    });

    it('should download http(s) sources', async () => {
      const decoder = new FakeGridDecoder({ f000: { samples: samples(2) } });
      const mock = createMockFetch();
      const scan = readGrid(REMOTE_F000, {
        decoder,
        fetch: mock.fetch,
        config: createConfig({ api: { userAgent: 'gridscan-test' } }),
      });

      expect(await drain(scan)).toHaveLength(2);
      expect(mock.calls.map(c => c.url)).toEqual([REMOTE_F000]);
      expect(mock.calls[0]?.init?.method).toBe('GET');
      expect(mock.calls[0]?.init?.headers).toEqual({ 'User-Agent': 'gridscan-test' });
    });

    it('should load local paths through the injected reader', async () => {
      const loaded: string[] = [];
      const decoder = new FakeGridDecoder({ f012: { samples: samples(1) } });
      const scan = readGrid('/data/c.grib2', {
        decoder,
        readFile: async path => {
          loaded.push(path);
          return new TextEncoder().encode('f012');
        },
      });

      expect(await drain(scan)).toHaveLength(1);
      expect(loaded).toEqual(['/data/c.grib2']);
    });

    it('should return batches no larger than the batch size', async () => {
      const decoder = new FakeGridDecoder({ f000: { samples: samples(5) } });
      const scan = readGrid(await gridFile('a.grib2', 'f000'), {
        decoder,
        config: createConfig({ scan: { batchSize: 2 } }),
      });

      const sizes: number[] = [];
      for (let batch = await scan.pull(); batch.length > 0; batch = await scan.pull()) {
        sizes.push(batch.length);
      }

      expect(sizes).toEqual([2, 2, 1]);
    });

    it('should treat an empty batch as the end of a file', async () => {
      const decoder = new FakeGridDecoder({ f000: { stall: true }, f006: { samples: samples(2) } });
      const scan = readGrid([await gridFile('a.grib2', 'f000'), await gridFile('b.grib2', 'f006')], { decoder });

      const first = await scan.pull();

      expect(first.map(r => r.file_index)).toEqual([1, 1]);
      expect(decoder.reads).toBe(2);
      expect(decoder.openHandles).toBe(0);
    });
  });

  describe('limit', () => {
    it('should stop at the limit without opening the next file', async () => {
      const decoder = new FakeGridDecoder({ f000: { samples: samples(3) }, f006: { samples: samples(3) } });
      const logger = createTestLogger();
      const scan = readGrid([await gridFile('a.grib2', 'f000'), await gridFile('b.grib2', 'f006')], {
        decoder,
        limit: 3,
        logger,
      });

      expect(await drain(scan)).toHaveLength(3);
      expect(decoder.opened).toEqual(['f000']);
      expect(decoder.openHandles).toBe(0);
      const finished = logger.getLogsByLevel('info').find(e => e.message === 'scan finished');
      expect(finished?.context?.reason).toBe('limit');
    });

    it('should cut the read that crosses the limit', async () => {
      const decoder = new FakeGridDecoder({ f000: { samples: samples(3) }, f006: { samples: samples(3) } });
      const scan = readGrid([await gridFile('a.grib2', 'f000'), await gridFile('b.grib2', 'f006')], {
        decoder,
        limit: 4,
      });

      const rows = await drain(scan);

      expect(rows.map(r => r.file_index)).toEqual([0, 0, 0, 1]);
      expect(decoder.opened).toEqual(['f000', 'f006']);
      expect(decoder.openHandles).toBe(0);
    });

    it('should load nothing with a zero limit', async () => {
      const decoder = new FakeGridDecoder({ f000: { samples: samples(3) } });
      const scan = readGrid(await gridFile('a.grib2', 'f000'), { decoder, limit: 0 });

      expect(await scan.pull()).toEqual([]);
      expect(decoder.opened).toEqual([]);
    });
  });

  describe('failure', () => {
    it('should fail on a missing local file', async () => {
      const missing = join(dir, 'missing.grib2');
      const scan = readGrid(missing, { decoder: new FakeGridDecoder({}) });

      const error = await captureError(scan.pull());

      expect(error).toBeInstanceOf(GridSourceError);
      if (error instanceof GridSourceError) {
        expect(error.code).toBe(ErrorCode.SOURCE_UNREADABLE);
        expect(error.source).toBe(missing);
        expect(error.fileIndex).toBe(0);
      }
      expect(scan.state).toBe('failed');
      await expect(scan.pull()).rejects.toBeInstanceOf(ScanStateError);
    });

    it('should fail on a non-success HTTP status', async () => {
      const mock = createMockFetch({ statusByKey: { f000: 404 } });
      const scan = readGrid(REMOTE_F000, { decoder: new FakeGridDecoder({}), fetch: mock.fetch });

      const error = await captureError(scan.pull());

      expect(error instanceof GridSourceError && error.status).toBe(404);
      expect(error instanceof GridSourceError && error.message).toBe(
        `HTTP request failed with status 404 for grid source 0: ${REMOTE_F000}`
      );
    });

    it('should name the source when the decoder rejects it', async () => {
      const decoder = new FakeGridDecoder({ f000: { samples: samples(1) }, f006: { openError: 'not a grid payload' } });
      const second = await gridFile('b.grib2', 'f006');
      const scan = readGrid([await gridFile('a.grib2', 'f000'), second], { decoder });

      expect(await scan.pull()).toHaveLength(1);
      const error = await captureError(scan.pull());

      expect(error instanceof GridSourceError && error.code).toBe(ErrorCode.DECODE_OPEN_FAILED);
      expect(error instanceof GridSourceError && error.message).toBe(
        `Failed to open grid source 1: not a grid payload: ${second}`
      );
      expect(decoder.openHandles).toBe(0);
    });

    it('should release the handle when a read fails', async () => {
      const decoder = new FakeGridDecoder({
        f000: { samples: samples(4), readError: { afterBatches: 1, message: 'bad section' } },
      });
      const scan = readGrid(await gridFile('a.grib2', 'f000'), {
        decoder,
        config: createConfig({ scan: { batchSize: 2 } }),
      });

      expect(await scan.pull()).toHaveLength(2);
      const error = await captureError(scan.pull());

      expect(error instanceof GridSourceError && error.code).toBe(ErrorCode.DECODE_READ_FAILED);
      expect(decoder.openHandles).toBe(0);
      expect(scan.hasOpenSource).toBe(false);
      expect(scan.error).toBe(error);
    });
  });

  describe('close', () => {
    it('should close when the consumer leaves the loop early', async () => {
      const decoder = new FakeGridDecoder({ f000: { samples: samples(4) } });
      const scan = readGrid(await gridFile('a.grib2', 'f000'), {
        decoder,
        config: createConfig({ scan: { batchSize: 2 } }),
      });

      for await (const row of scan) {
        expect(row.file_index).toBe(0);
        break;
      }

      expect(decoder.openHandles).toBe(0);
      expect(scan.state).toBe('finished');
      expect(await scan.pull()).toEqual([]);
    });

    it('should end the stream when closed while a file is loading', async () => {
      const decoder = new FakeGridDecoder({ f000: { samples: samples(3) } });
      let started: () => void = () => {};
      let release: () => void = () => {};
      const loadStarted = new Promise<void>(resolve => {
        started = resolve;
      });
      const released = new Promise<void>(resolve => {
        release = resolve;
      });
      const scan = readGrid('/data/a.grib2', {
        decoder,
        readFile: async () => {
          started();
          await released;
          return new TextEncoder().encode('f000');
        },
      });

      const pending = scan.pull();
      await loadStarted;
      expect(scan.state).toBe('loading');

      scan.close();
      release();

      expect(await pending).toEqual([]);
      expect(decoder.opened).toEqual(['f000']);
      expect(decoder.openHandles).toBe(0);
      expect(scan.state).toBe('finished');
    });
  });

  describe('progress', () => {
    it('should be unknown until a file reports its size, then count finished files', async () => {
      const decoder = new FakeGridDecoder({ f000: { samples: samples(3) }, f006: { samples: samples(3) } });
      const scan = readGrid([await gridFile('a.grib2', 'f000'), await gridFile('b.grib2', 'f006')], { decoder });

      expect(scan.progress()).toBe(-1);
      await scan.pull();
      expect(scan.progress()).toBe(50);
      await drain(scan);
      expect(scan.progress()).toBe(100);
    });
  });
});
