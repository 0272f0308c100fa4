/**
 * Canned HTTP responses for adapter tests
 */

import { vi } from 'vitest';
import { Throttle } from '../../lib/utils';
import { HubSpotClient, HubSpotObject } from './hubspot-client';

export interface CannedResponse {
  status?: number;
  body: unknown;
}

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: unknown;
  at: number;
}

// Replaces global fetch; unanswered requests get an empty HubSpot result set
export function stubFetch(...responses: CannedResponse[]): RecordedRequest[] {
  const requests: RecordedRequest[] = [];
  const queue = [...responses];

  vi.stubGlobal(
    'fetch',
    vi.fn(async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
      const headers: Record<string, string> = {};
      new Headers(init?.headers).forEach((value, key) => {
        headers[key] = value;
      });
      requests.push({
        url: String(input),
        method: init?.method ?? 'GET',
        headers,
        body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
        at: Date.now(),
      });

      const next = queue.shift() ?? { body: { results: [] } };
      return new Response(JSON.stringify(next.body), {
        status: next.status ?? 200,
        headers: { 'Content-Type': 'application/json' },
      });
    })
  );

  return requests;
}

export function hubspotResults(...objects: HubSpotObject[]): CannedResponse {
  return { body: { total: objects.length, results: objects } };
}

export function hubspotObject(id: string, properties: Record<string, string> = {}): HubSpotObject {
  return { id, properties };
}

export function testHubSpotClient(minIntervalMs = 0): HubSpotClient {
  return new HubSpotClient({
    accessToken: 'test-token',
    baseUrl: 'https://hubspot.test',
    timeoutMs: 1000,
    throttle: new Throttle(minIntervalMs),
  });
}
