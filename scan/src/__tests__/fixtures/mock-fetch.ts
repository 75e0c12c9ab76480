/**
 * Mock HTTP client for the resource pipeline.
 *
 * Every request answers with the forecast-hour tag of its `file` parameter
 * (`f000`, `f006`, ...) as the body, unless a status or error is registered
 * for that tag.
 */

import type { FetchFunction } from '../../pipeline.js';

export interface RecordedRequest {
  url: string;
  init: RequestInit | undefined;
}

export interface MockFetchOptions {
  /** Non-200 status per forecast-hour tag */
  statusByKey?: Record<string, number>;
  /** Rejection per forecast-hour tag */
  errorByKey?: Record<string, Error>;
}

export interface MockFetch {
  fetch: FetchFunction;
  calls: RecordedRequest[];
}

/**
 * The `fFFF` suffix of a request's file parameter.
 */
export function resourceKey(url: string): string {
  const file = new URL(url).searchParams.get('file') ?? '';
  return /f\d{3,}$/.exec(file)?.[0] ?? '';
}

export function createMockFetch(options: MockFetchOptions = {}): MockFetch {
  const calls: RecordedRequest[] = [];

  const fetch: FetchFunction = async (url, init) => {
    calls.push({ url, init });
    const key = resourceKey(url);

    const error = options.errorByKey?.[key];
    if (error !== undefined) {
      throw error;
    }
    const status = options.statusByKey?.[key] ?? 200;
    return new Response(status === 200 ? key : 'error', { status });
  };

  return { fetch, calls };
}
