/**
 * @gridscan/core - Error hierarchy tests
 */

import { describe, it, expect } from 'vitest';
import {
  ErrorCode,
  GridScanError,
  QueryError,
  ScanStateError,
  ValidationError,
  ConfigurationError,
  NetworkError,
  RemoteFetchError,
  DecodeError,
  GridSourceError,
  isErrorCode,
  isGridScanError,
  isFatalScanError,
} from '../errors.js';

const URL_F006 = 'https://example.test/filter?file=gfs.t00z.pgrb2.0p25.f006';

describe('GridScanError', () => {
  it('should default to the UNKNOWN code', () => {
    const error = new GridScanError('boom');
    expect(error.code).toBe(ErrorCode.UNKNOWN);
    expect(error.name).toBe('GridScanError');
    expect(error).toBeInstanceOf(Error);
  });

  it('should render details and suggestion in toDetailedString', () => {
    const error = new GridScanError('boom', ErrorCode.INTERNAL_ERROR, { forecastHour: 3 }, 'try again');
    expect(error.toDetailedString()).toBe(
      '[INTERNAL_ERROR] boom\n  Details: forecastHour=3\n  Suggestion: try again'
    );
  });

  it('should omit absent fields from toLogContext', () => {
    const context = new GridScanError('boom').toLogContext();
    expect(context).not.toHaveProperty('details');
    expect(context).not.toHaveProperty('suggestion');
    expect(context.code).toBe('UNKNOWN');
  });
});

describe('RemoteFetchError', () => {
  it('should carry status, url and forecast hour for a bad status', () => {
    const error = RemoteFetchError.badStatus(404, URL_F006, 6);

    expect(error.message).toBe(`Remote API returned status 404 for forecast hour 6: ${URL_F006}`);
    expect(error.code).toBe(ErrorCode.REMOTE_STATUS);
    expect(error.status).toBe(404);
    expect(error.url).toBe(URL_F006);
    expect(error.forecastHour).toBe(6);
    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toBeInstanceOf(GridScanError);
  });

  it('should classify a timeout cause as REQUEST_TIMEOUT', () => {
    const cause = new Error('The operation was aborted due to timeout');
    cause.name = 'TimeoutError';

    const error = RemoteFetchError.unreachable(URL_F006, 6, cause);

    expect(error.code).toBe(ErrorCode.REQUEST_TIMEOUT);
    expect(error.status).toBeUndefined();
  });

  it('should classify other transport failures as REMOTE_UNREACHABLE', () => {
    const error = RemoteFetchError.unreachable(URL_F006, 6, new TypeError('fetch failed'));

    expect(error.code).toBe(ErrorCode.REMOTE_UNREACHABLE);
    expect(error.message).toBe(`Failed to fetch forecast hour 6 (fetch failed): ${URL_F006}`);
  });
});

describe('GridSourceError', () => {
  it('should name the source and its position in the list', () => {
    const error = GridSourceError.readFailed('truncated section 7', '/data/b.grib2', 1);

    expect(error.message).toBe('Grid read error in source 1: truncated section 7: /data/b.grib2');
    expect(error.code).toBe(ErrorCode.DECODE_READ_FAILED);
    expect(error.source).toBe('/data/b.grib2');
    expect(error.fileIndex).toBe(1);
    expect(error.details).toEqual({
      operation: 'read',
      source: '/data/b.grib2',
      fileIndex: 1,
      cause: 'truncated section 7',
    });
  });

  it('should keep the HTTP status of a failed download', () => {
    const error = GridSourceError.badStatus(404, 'https://example.test/a.grib2', 0);

    expect(error.status).toBe(404);
    expect(error.code).toBe(ErrorCode.REMOTE_STATUS);
    expect(error.message).toBe('HTTP request failed with status 404 for grid source 0: https://example.test/a.grib2');
  });

  it('should code a timed-out load as a timeout', () => {
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';

    expect(GridSourceError.unreadable('https://example.test/a.grib2', 0, timeout).code).toBe(ErrorCode.REQUEST_TIMEOUT);
    expect(GridSourceError.unreadable('/missing.grib2', 2, new Error('ENOENT')).code).toBe(ErrorCode.SOURCE_UNREADABLE);
  });
});

describe('DecodeError', () => {
  it('should wrap the decoder message with the forecast hour and URL', () => {
    const error = DecodeError.readFailed('truncated section 7', URL_F006, 6);

    expect(error.message).toBe(`Grid read error for forecast hour 6: truncated section 7: ${URL_F006}`);
    expect(error.code).toBe(ErrorCode.DECODE_READ_FAILED);
    expect(error.details).toEqual({
      operation: 'decode',
      url: URL_F006,
      forecastHour: 6,
      decoderMessage: 'truncated section 7',
    });
  });

  it('should use a distinct code when the payload cannot be opened', () => {
    expect(DecodeError.openFailed('bad magic', URL_F006, 0).code).toBe(ErrorCode.DECODE_OPEN_FAILED);
  });
});

describe('other error classes', () => {
  it('should keep QueryError subclasses in the hierarchy', () => {
    const error = new ScanStateError('scan already failed');
    expect(error).toBeInstanceOf(QueryError);
    expect(error.code).toBe(ErrorCode.SCAN_FAILED);
    expect(QueryError.invalidPlan('limit without child').message).toBe(
      'Invalid query plan: limit without child'
    );
  });

  it('should list config issues on ConfigurationError', () => {
    const error = new ConfigurationError('invalid config', [
      { path: 'scan.batchSize', message: 'must be positive' },
    ]);
    expect(error).toBeInstanceOf(ValidationError);
    expect(error.details).toEqual({ issues: ['scan.batchSize: must be positive'] });
  });

  it('should build typed validation errors', () => {
    const error = ValidationError.invalidFormat('run_date', 'YYYYMMDD', '2026-1-2');
    expect(error.code).toBe(ErrorCode.INVALID_FORMAT);
    expect(error.message).toBe('Invalid format for "run_date": expected YYYYMMDD');
  });
});

describe('type guards', () => {
  it('should recognize error codes', () => {
    expect(isErrorCode('DECODE_ERROR')).toBe(true);
    expect(isErrorCode('NOT_A_CODE')).toBe(false);
  });

  it('should only treat fetch, decode and source failures as fatal', () => {
    expect(isFatalScanError(RemoteFetchError.badStatus(500, URL_F006, 6))).toBe(true);
    expect(isFatalScanError(DecodeError.openFailed('bad', URL_F006, 6))).toBe(true);
    expect(isFatalScanError(GridSourceError.openFailed('bad', '/data/a.grib2', 0))).toBe(true);
    expect(isFatalScanError(new ScanStateError('already failed'))).toBe(false);
    expect(isFatalScanError(new Error('plain'))).toBe(false);
  });

  it('should recognize gridscan errors', () => {
    expect(isGridScanError(new ValidationError('x'))).toBe(true);
    expect(isGridScanError(new Error('x'))).toBe(false);
  });
});
