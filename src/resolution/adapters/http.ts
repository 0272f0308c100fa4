/**
 * JSON over HTTP for upstream lookups
 * Every failure surfaces as UpstreamUnavailableError for the calling system
 */

import { z } from 'zod';
import { MatchSource, UpstreamUnavailableError, errorMessage, kindForStatus } from '../../lib/errors';
import { Throttle } from '../../lib/utils';

export interface RequestOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
  signal?: AbortSignal;
}

export async function fetchJson<T>(
  system: MatchSource,
  url: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: RequestOptions
): Promise<T> {
  // An abandoned lookup sends nothing further upstream
  if (options.signal?.aborted) {
    throw new UpstreamUnavailableError(system, 'timeout', 'request aborted');
  }

  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);

  const onAbort = (): void => controller.abort();
  options.signal?.addEventListener('abort', onAbort, { once: true });

  let response: Response;
  try {
    response = await fetch(url, {
      method: options.method ?? 'GET',
      signal: controller.signal,
      headers: {
        Accept: 'application/json',
        ...(options.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
        ...options.headers,
      },
      body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
    });
  } catch (error) {
    if (timedOut) {
      throw new UpstreamUnavailableError(system, 'timeout', `no response within ${options.timeoutMs}ms`);
    }
    if (controller.signal.aborted) {
      throw new UpstreamUnavailableError(system, 'timeout', 'request aborted');
    }
    throw new UpstreamUnavailableError(system, 'network', errorMessage(error));
  } finally {
    clearTimeout(timeout);
    options.signal?.removeEventListener('abort', onAbort);
  }

  if (!response.ok) {
    throw new UpstreamUnavailableError(
      system,
      kindForStatus(response.status),
      `HTTP ${response.status}`,
      response.status
    );
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (error) {
    throw new UpstreamUnavailableError(system, 'bad_response', `invalid JSON: ${errorMessage(error)}`);
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new UpstreamUnavailableError(system, 'bad_response', parsed.error.issues[0]?.message ?? 'unexpected payload');
  }
  return parsed.data;
}

// Wait for the system's next request slot, giving up when the caller aborts
export async function waitForSlot(system: MatchSource, throttle: Throttle, signal?: AbortSignal): Promise<void> {
  try {
    await throttle.acquire(signal);
  } catch (error) {
    throw new UpstreamUnavailableError(system, 'timeout', `request aborted while throttled: ${errorMessage(error)}`);
  }
}
