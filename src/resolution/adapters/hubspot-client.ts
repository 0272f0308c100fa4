/**
 * HubSpot CRM v3 search client
 */

import { z } from 'zod';
import { MatchSource } from '../../lib/errors';
import { Throttle } from '../../lib/utils';
import { fetchJson, waitForSlot } from './http';

export type HubSpotObjectType = 'contacts' | 'deals';

export interface HubSpotFilter {
  propertyName: string;
  operator: 'EQ' | 'CONTAINS_TOKEN';
  value: string;
}

const hubspotObjectSchema = z.object({
  id: z.string(),
  properties: z.record(z.string().nullable().optional()).default({}),
});

const searchResponseSchema = z.object({
  total: z.number().optional(),
  results: z.array(hubspotObjectSchema),
});

export type HubSpotObject = z.infer<typeof hubspotObjectSchema>;

export const CONTACT_PROPERTIES = ['email', 'firstname', 'lastname', 'phone', 'company'];
export const DEAL_PROPERTIES = ['dealname', 'dealstage', 'amount', 'closedate'];

export interface HubSpotClientOptions {
  accessToken: string;
  baseUrl: string;
  timeoutMs: number;
  throttle: Throttle;
}

export class HubSpotClient {
  private readonly options: HubSpotClientOptions;

  constructor(options: HubSpotClientOptions) {
    this.options = options;
  }

  // One filter group; all filters must match
  async search(
    system: MatchSource,
    objectType: HubSpotObjectType,
    filters: HubSpotFilter[],
    properties: string[],
    limit: number,
    signal?: AbortSignal
  ): Promise<HubSpotObject[]> {
    await waitForSlot(system, this.options.throttle, signal);

    const response = await fetchJson(
      system,
      `${this.options.baseUrl}/crm/v3/objects/${objectType}/search`,
      searchResponseSchema,
      {
        method: 'POST',
        headers: { Authorization: `Bearer ${this.options.accessToken}` },
        body: { filterGroups: [{ filters }], properties, limit },
        timeoutMs: this.options.timeoutMs,
        signal,
      }
    );

    return response.results;
  }
}

export function propertyOf(object: HubSpotObject, name: string): string {
  return object.properties[name] ?? '';
}
