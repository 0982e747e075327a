import { createLogger, type Logger } from '@pushgate/core-logging';
import { textFormat, type MetricsSource } from '@pushgate/core-exposition';

import { DEFAULT_OPEN_TIMEOUT_MS, DEFAULT_READ_TIMEOUT_MS, parsePushClientConfig } from './config.js';
import { assertSuccessfulResponse, HttpError, InvalidArgumentError, PushgatewayError, PushTimeoutError, type TimeoutPhase } from './errors.js';
import { basicAuthHeader, buildPushPath, DEFAULT_GATEWAY, redactUrl, stripCredentials, SUPPORTED_PROTOCOLS } from './helpers.js';
import { Mutex } from './mutex.js';
import type { PushClient, PushClientConfig, PushMethod, PushResponse } from './types.js';
import { assertNoLabelClashes, validateGroupingKey } from './validation.js';

function headersToObject(headers: Headers): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of headers.entries()) {
    result[key.toLowerCase()] = value;
  }
  return result;
}

export function parseGatewayUrl(raw: string): URL {
  let url: URL;
  try {
    url = new URL(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidArgumentError(`${raw} is not a valid URL: ${reason}`, { cause: error });
  }

  if (!SUPPORTED_PROTOCOLS.includes(url.protocol)) {
    throw new InvalidArgumentError(`only HTTP gateway URLs are supported currently, got ${url.protocol}//`);
  }
  return url;
}

function assertPathPreserved(url: URL, path: string): void {
  if (!url.pathname.endsWith(path)) {
    throw new InvalidArgumentError(`gateway URL rewrote the push path ${path} to ${url.pathname}`);
  }
}

/**
 * Settle with `signal.reason` once the signal aborts, even if `promise` never does.
 */
function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

function buildLogger(config: PushClientConfig): Logger {
  return config.logger ?? createLogger({ service: 'core-pushgateway', component: 'push-client' });
}

/**
 * Create a client bound to one job, grouping key and gateway.
 *
 * Calls on the same client run one at a time; separate clients do not wait on each other.
 *
 * @example
 * ```typescript
 * const client = createPushClient({ job: 'nightly-backup', groupingKey: { instance: 'db-1' } });
 * await client.replace(registry);
 * ```
 */
export function createPushClient(config: PushClientConfig): PushClient {
  const options = parsePushClientConfig(config);
  const groupingKey = Object.freeze({ ...(options.groupingKey ?? {}) });
  validateGroupingKey(groupingKey);

  const job = options.job;
  const gateway = options.gateway ?? DEFAULT_GATEWAY;
  const path = buildPushPath(job, groupingKey);
  const url = parseGatewayUrl(`${gateway}${path}`);
  assertPathPreserved(url, path);

  const requestUrl = stripCredentials(url);
  const authorization = basicAuthHeader(url);
  const serializer = options.serializer ?? textFormat;
  const transport = options.transport ?? fetch;
  const openTimeoutMs = options.openTimeoutMs ?? DEFAULT_OPEN_TIMEOUT_MS;
  const readTimeoutMs = options.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS;
  const logger = buildLogger(config);
  const mutex = new Mutex();

  const baseContext = { job, path, url: redactUrl(url) };

  const exchange = async (method: PushMethod, headers: Record<string, string>, body?: string): Promise<PushResponse> => {
    const controller = new AbortController();
    const abortAfter = (phase: TimeoutPhase, timeoutMs: number) =>
      setTimeout(() => controller.abort(new PushTimeoutError(phase, timeoutMs)), timeoutMs);

    let timer = abortAfter('open', openTimeoutMs);
    try {
      const response = await abortable(
        transport(requestUrl, {
          method,
          headers,
          body,
          redirect: 'manual',
          signal: controller.signal
        }),
        controller.signal
      );
      clearTimeout(timer);

      timer = abortAfter('read', readTimeoutMs);
      const text = await abortable(response.text(), controller.signal);

      return {
        status: response.status,
        statusText: response.statusText,
        headers: headersToObject(response.headers),
        body: text
      };
    } catch (error) {
      // Transports are free to reject with their own AbortError; surface the timeout instead
      if (controller.signal.aborted && controller.signal.reason instanceof PushTimeoutError) {
        throw controller.signal.reason;
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  };

  const send = (method: PushMethod, source?: MetricsSource): Promise<PushResponse> =>
    mutex.runExclusive(async () => {
      if (source) {
        assertNoLabelClashes(groupingKey, source);
      }

      const body = source ? serializer.marshal(source) : undefined;
      const headers: Record<string, string> = {
        ...(body !== undefined ? { 'Content-Type': serializer.contentType() } : {}),
        ...(authorization ? { Authorization: authorization } : {})
      };

      logger.debug('pushgateway request started', { ...baseContext, method, hasBody: body !== undefined });

      const startedAt = Date.now();
      let response: PushResponse;
      try {
        response = await exchange(method, headers, body);
      } catch (error) {
        logger.error('pushgateway transport error', {
          ...baseContext,
          method,
          latencyMs: Date.now() - startedAt,
          errorCode: error instanceof PushgatewayError ? error.code : undefined,
          error
        });
        throw error;
      }

      const latencyMs = Date.now() - startedAt;
      try {
        assertSuccessfulResponse(response);
      } catch (error) {
        logger.warn('pushgateway request failed', {
          ...baseContext,
          method,
          status: response.status,
          latencyMs,
          errorCode: error instanceof HttpError ? error.code : undefined
        });
        throw error;
      }

      logger.info('pushgateway request succeeded', {
        ...baseContext,
        method,
        status: response.status,
        latencyMs
      });
      return response;
    });

  return {
    job,
    gateway,
    path,
    groupingKey,
    add: (source) => send('POST', source),
    replace: (source) => send('PUT', source),
    delete: () => send('DELETE')
  };
}
