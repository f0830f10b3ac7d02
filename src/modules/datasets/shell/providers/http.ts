/**
 * HTTP access for provider clients. GETs are retried with linear back-off;
 * other methods are sent once.
 */

import { err, ok, type Result } from 'neverthrow';

import { withRetry } from '../../../../common/utils/retry.js';
import { readAll } from '../../../../common/utils/streams.js';
import {
  createNetworkError,
  createStorageError,
  isRetryableError,
  type DatasetError,
} from '../../core/errors.js';

import type { ExportFile, UrlReader } from '../../core/ports.js';
import type { ContentStream } from '../../core/types.js';
import type { Logger } from 'pino';

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  fetch?: FetchFn | undefined;
  retries: number;
  retryDelayMs: number;
  logger: Logger;
  sleep?: ((ms: number) => Promise<void>) | undefined;
}

export interface HttpClient extends UrlReader {
  getJson(url: string, headers?: Record<string, string>): Promise<Result<unknown, DatasetError>>;
  /** Sends any request once; non-2xx answers become NetworkErrors */
  send(url: string, init: RequestInit): Promise<Result<Response, DatasetError>>;
}

const isRetryableStatus = (status: number): boolean => status === 429 || status >= 500;

async function* iterateBody(body: NonNullable<Response['body']>): ContentStream {
  const reader = body.getReader();
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        return;
      }
      if (value instanceof Uint8Array) {
        yield value;
      }
    }
  } finally {
    reader.releaseLock();
  }
}

export const readJson = async (
  url: string,
  response: Response
): Promise<Result<unknown, DatasetError>> => {
  try {
    const body: unknown = await response.json();
    return ok(body);
  } catch (error) {
    return err(createNetworkError(url, 'Response is not valid JSON', { retryable: false, cause: error }));
  }
};

/**
 * Buffers an export file for upload.
 */
export const readExportFile = async (file: ExportFile): Promise<Result<Uint8Array, DatasetError>> => {
  const content = await file.open();
  if (content.isErr()) {
    return err(content.error);
  }
  try {
    return ok(await readAll(content.value));
  } catch (error) {
    return err(createStorageError(file.path, error));
  }
};

export const createHttpClient = (options: HttpClientOptions): HttpClient => {
  const fetchFn: FetchFn = options.fetch ?? ((url, init) => fetch(url, init));
  const log = options.logger.child({ component: 'HttpClient' });

  const send = async (url: string, init: RequestInit): Promise<Result<Response, DatasetError>> => {
    let response: Response;
    try {
      response = await fetchFn(url, init);
    } catch (error) {
      return err(
        createNetworkError(url, `Request failed: ${error instanceof Error ? error.message : String(error)}`, {
          retryable: true,
          cause: error,
        })
      );
    }

    if (!response.ok) {
      return err(
        createNetworkError(url, `HTTP ${String(response.status)} ${response.statusText}`, {
          retryable: isRetryableStatus(response.status),
          status: response.status,
        })
      );
    }

    return ok(response);
  };

  const get = (url: string, headers: Record<string, string>): Promise<Result<Response, DatasetError>> =>
    withRetry(() => send(url, { method: 'GET', headers }), {
      retries: options.retries,
      delayMs: options.retryDelayMs,
      isRetryable: isRetryableError,
      sleep: options.sleep,
      onRetry: (error, attempt) => {
        log.warn({ url, attempt, error: error.message }, 'Retrying request');
      },
    });

  return {
    send,

    async getJson(url, headers = {}) {
      const response = await get(url, { Accept: 'application/json', ...headers });
      if (response.isErr()) {
        return err(response.error);
      }
      return readJson(url, response.value);
    },

    async open(url) {
      const response = await get(url, {});
      if (response.isErr()) {
        return err(response.error);
      }
      const body = response.value.body;
      if (body === null) {
        return err(createNetworkError(url, 'Response has no body', { retryable: false }));
      }
      return ok(iterateBody(body));
    },
  };
};
