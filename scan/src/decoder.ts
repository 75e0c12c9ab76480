/**
 * Contract of the binary grid decoder.
 *
 * The decoder is an external collaborator: gridscan hands it the full body
 * of one response and pulls samples from the handle it returns. A handle is
 * single-use, reads forward only, and must be closed by whoever opened it.
 * Failures come back as `Result` errors; the pipeline turns them into
 * {@link DecodeError}s carrying the resource's identity.
 */

import type { Result } from '@gridscan/core';
import type { DecodedSample } from './types.js';

export interface DecoderFailure {
  message: string;
}

export interface SampleBatch {
  samples: readonly DecodedSample[];
  /** False once the handle has nothing left; the batch may still carry samples */
  hasMore: boolean;
}

export interface GridHandle {
  /** Read up to `maxCount` samples, in the decoder's internal order */
  readBatch(maxCount: number): Result<SampleBatch, DecoderFailure>;
  /** Total samples in the payload, or 0 when the decoder cannot tell up front */
  totalSampleCount(): number;
  close(): void;
}

export interface GridDecoder {
  open(bytes: Uint8Array): Result<GridHandle, DecoderFailure>;
}
