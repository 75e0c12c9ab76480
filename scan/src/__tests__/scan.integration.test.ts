/**
 * @gridscan/scan - End-to-end query tests
 *
 * Runs whole queries through planning, pushdown, URL rendering, the
 * fetch-decode pipeline and local re-checks, against in-process fakes.
 */

import { describe, it, expect } from 'vitest';
import { RemoteFetchError, createTestLogger } from '@gridscan/core';
import { createConfig } from '@gridscan/config';
import { eq, gte, isIn, lte } from '../filters.js';
import { runQuery } from '../executor.js';
import { parseResourceUrl } from '../resources.js';
import { FakeGridDecoder, sample } from './fixtures/fake-decoder.js';
import { createMockFetch } from './fixtures/mock-fetch.js';

const now = new Date(Date.UTC(2026, 0, 21, 3));

function westernEurope(forecastTime: number) {
  return [
    sample({ longitude: 349, latitude: 50, forecastTime }),
    sample({ longitude: 350.5, latitude: 50, forecastTime }),
    sample({ longitude: 355, latitude: 51, forecastTime, parameterCategory: 1, parameterNumber: 1, value: 82 }),
    sample({ longitude: 10, latitude: 52, forecastTime }),
    sample({ longitude: 10, latitude: 61, forecastTime }),
  ];
}

describe('runQuery (integration)', () => {
  it('should push selections into the requests and re-check the box locally', async () => {
    const decoder = new FakeGridDecoder({
      f000: { samples: westernEurope(0) },
      f006: { samples: westernEurope(6) },
    });
    const mock = createMockFetch();

    const result = await runQuery(
      {
        filters: [
          eq('run_date', '2026-01-20'),
          eq('run_hour', 6),
          isIn('forecast_hour', [0, 6]),
          isIn('variable', ['temperature', 'humidity']),
          eq('level', '2m'),
          gte('longitude', -10),
          lte('latitude', 60.5),
        ],
        columns: ['forecast_hour', 'longitude', 'variable', 'value'],
        now,
      },
      { decoder, fetch: mock.fetch }
    );

    expect(mock.calls).toHaveLength(2);
    const first = parseResourceUrl(mock.calls[0]?.url ?? '');
    expect(first).toEqual({
      baseUrl: 'https://nomads.ncep.noaa.gov/cgi-bin/filter_gfs_0p25.pl',
      runDate: '20260120',
      runHour: 6,
      forecastHour: 0,
      variables: ['TMP', 'RH'],
      levels: ['2_m_above_ground'],
      bbox: { latMin: -90, latMax: 61, lonMin: 350, lonMax: 360 },
    });

    expect(result.rows).toEqual([
      { forecast_hour: 0, longitude: -9.5, variable: 'temperature', value: 280.5 },
      { forecast_hour: 0, longitude: -5, variable: 'humidity', value: 82 },
      { forecast_hour: 0, longitude: 10, variable: 'temperature', value: 280.5 },
      { forecast_hour: 6, longitude: -9.5, variable: 'temperature', value: 280.5 },
      { forecast_hour: 6, longitude: -5, variable: 'humidity', value: 82 },
      { forecast_hour: 6, longitude: 10, variable: 'temperature', value: 280.5 },
    ]);
    expect(result.pushdown.residual).toEqual([gte('longitude', -10), lte('latitude', 60.5)]);
    expect(decoder.maxOpenHandles).toBe(1);
    expect(decoder.openHandles).toBe(0);
  });

  it('should push a limit into the scan and stop fetching', async () => {
    const decoder = new FakeGridDecoder({
      f000: { samples: westernEurope(0) },
      f003: { samples: westernEurope(3) },
      f006: { samples: westernEurope(6) },
    });
    const mock = createMockFetch();

    const result = await runQuery(
      { filters: [isIn('forecast_hour', [0, 3, 6])], limit: 7, now },
      { decoder, fetch: mock.fetch }
    );

    expect(result.limitPushdowns.map(p => p.limit)).toEqual([7]);
    expect(result.rows).toHaveLength(7);
    expect(result.rows.map(r => r.forecast_hour)).toEqual([0, 0, 0, 0, 0, 3, 3]);
    expect(decoder.opened).toEqual(['f000', 'f003']);
    expect(mock.calls).toHaveLength(2);
  });

  it('should use the configured endpoint and defaults', async () => {
    const decoder = new FakeGridDecoder({ f012: { samples: westernEurope(12) } });
    const mock = createMockFetch();
    const config = createConfig({
      api: { baseUrl: 'http://localhost:9000/filter', userAgent: 'gridscan-integration' },
      scan: { defaultRunHour: 18, defaultForecastHours: [12] },
    });

    const result = await runQuery({ now }, { decoder, fetch: mock.fetch, config });

    expect(result.rows).toHaveLength(5);
    const request = parseResourceUrl(mock.calls[0]?.url ?? '');
    expect(request.baseUrl).toBe('http://localhost:9000/filter');
    expect(request.runDate).toBe('20260121');
    expect(request.runHour).toBe(18);
    expect(request.forecastHour).toBe(12);
    expect(mock.calls[0]?.init?.headers).toEqual({ 'User-Agent': 'gridscan-integration' });
  });

  it('should fail the query on a missing resource and log the failure', async () => {
    const decoder = new FakeGridDecoder({ f000: { samples: westernEurope(0) } });
    const mock = createMockFetch({ statusByKey: { f006: 404 } });
    const logger = createTestLogger();

    await expect(
      runQuery({ filters: [isIn('forecast_hour', [0, 6, 12])], now }, { decoder, fetch: mock.fetch, logger })
    ).rejects.toBeInstanceOf(RemoteFetchError);

    expect(mock.calls.map(c => parseResourceUrl(c.url).forecastHour)).toEqual([0, 6]);
    expect(logger.getLogsByLevel('error').map(e => e.message)).toEqual(['scan failed']);
    expect(decoder.openHandles).toBe(0);
  });
});
