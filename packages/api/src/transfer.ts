/**
 * Byte transfer
 *
 * Streams a remote file to disk and probes remote sizes. Redirects are
 * followed; only a 2xx final response counts as success.
 */

import { createWriteStream } from 'node:fs';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { fetch as undiciFetch, type Dispatcher } from 'undici';
import { CancelledError, TransferError, errorMessage } from '@hiresdl/core';
import { createLogger } from '@hiresdl/utils';

const log = createLogger({ component: 'transfer' });

export interface TransferOptions {
  /** Carries connection timeouts; defaults to the global dispatcher */
  dispatcher?: Dispatcher;
  signal?: AbortSignal;
  headers?: Record<string, string>;
  /** Called with the size of every chunk written */
  onProgress?: (bytes: number) => void;
}

/**
 * Stream `url` into `destination`, returning the number of bytes written
 */
export async function downloadToFile(
  url: string,
  destination: string,
  options: TransferOptions = {}
): Promise<number> {
  const { dispatcher, signal, headers, onProgress } = options;
  let written = 0;

  try {
    const response = await undiciFetch(url, {
      method: 'GET',
      headers,
      dispatcher,
      signal,
      redirect: 'follow',
    });

    if (!response.ok) {
      await response.body?.cancel();
      throw new TransferError(url, `HTTP ${response.status}`);
    }
    if (!response.body) {
      throw new TransferError(url, 'Empty response body');
    }

    await pipeline(
      Readable.fromWeb(response.body),
      async function* (source: AsyncIterable<Uint8Array>) {
        for await (const chunk of source) {
          written += chunk.length;
          onProgress?.(chunk.length);
          yield chunk;
        }
      },
      createWriteStream(destination),
      { signal }
    );
  } catch (error) {
    if (signal?.aborted) {
      throw new CancelledError();
    }
    if (error instanceof TransferError) {
      throw error;
    }
    throw new TransferError(url, errorMessage(error));
  }

  return written;
}

/**
 * Content-Length of `url` from a HEAD request; 0 when unknown or on failure
 */
export async function probeSize(url: string, options: TransferOptions = {}): Promise<number> {
  const { dispatcher, signal, headers } = options;

  try {
    const response = await undiciFetch(url, {
      method: 'HEAD',
      headers,
      dispatcher,
      signal,
      redirect: 'follow',
    });
    await response.body?.cancel();

    const length = response.headers.get('content-length');
    const size = length !== null ? parseInt(length, 10) : NaN;
    return response.ok && Number.isFinite(size) ? size : 0;
  } catch (error) {
    if (signal?.aborted) {
      throw new CancelledError();
    }
    log.debug({ url, error: errorMessage(error) }, 'Size probe failed');
    return 0;
  }
}
