/**
 * Airtable property registry lookup
 * Optional signal: the resolver fails open when this system is unavailable.
 */

import { z } from 'zod';
import { LookupAdapter, LookupQuery, MatchCandidate, MATCH_TYPE_RANK } from '../types';
import { Throttle, tokenSetSimilarity } from '../../lib/utils';
import { fetchJson, waitForSlot } from './http';

export interface RegistryAdapterOptions {
  token: string;
  baseId: string;
  table: string;
  nameField: string;
  maxRecords: number;
  timeoutMs: number;
  propertyNameThreshold: number;
  throttle: Throttle;
  baseUrl?: string;
}

const recordsResponseSchema = z.object({
  records: z.array(
    z.object({
      id: z.string(),
      fields: z.record(z.unknown()).default({}),
    })
  ),
});

// Quote a value for an Airtable formula string literal
export function escapeFormulaString(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

export function registryFormula(name: string, nameField: string): string {
  return `SEARCH(LOWER('${escapeFormulaString(name)}'), LOWER({${nameField}}))`;
}

export class RegistryAdapter implements LookupAdapter {
  readonly source = 'registry' as const;
  readonly required = false;

  private readonly options: RegistryAdapterOptions;

  constructor(options: RegistryAdapterOptions) {
    this.options = options;
  }

  async findMatches(query: LookupQuery, signal?: AbortSignal): Promise<MatchCandidate[]> {
    const name = query.propertyName ?? query.company;
    if (!name) return [];

    await waitForSlot('registry', this.options.throttle, signal);

    const { baseId, table, nameField, maxRecords } = this.options;
    const params = new URLSearchParams({
      filterByFormula: registryFormula(name, nameField),
      maxRecords: String(maxRecords),
    });
    const baseUrl = this.options.baseUrl ?? 'https://api.airtable.com/v0';
    const url = `${baseUrl}/${encodeURIComponent(baseId)}/${encodeURIComponent(table)}?${params.toString()}`;

    const response = await fetchJson('registry', url, recordsResponseSchema, {
      headers: { Authorization: `Bearer ${this.options.token}` },
      timeoutMs: this.options.timeoutMs,
      signal,
    });

    const candidates: MatchCandidate[] = [];
    for (const record of response.records) {
      const recordName = record.fields[nameField];
      if (typeof recordName !== 'string') continue;
      if (tokenSetSimilarity(name, recordName) < this.options.propertyNameThreshold) continue;

      candidates.push({
        source: 'registry',
        entityId: record.id,
        matchType: 'name',
        rank: MATCH_TYPE_RANK.name,
        label: recordName,
      });
    }
    return candidates;
  }
}
