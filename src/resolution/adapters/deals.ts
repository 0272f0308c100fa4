/**
 * HubSpot deals lookup
 *
 * Deals carry no email or phone of their own, so the email and phone
 * dimensions go through the contacts they are associated with. The name
 * dimension compares the deal name against the lead's property name.
 */

import { LookupAdapter, LookupQuery, MatchCandidate, MatchType, MATCH_TYPE_RANK } from '../types';
import { tokenSetSimilarity } from '../../lib/utils';
import { HubSpotClient, HubSpotObject, CONTACT_PROPERTIES, DEAL_PROPERTIES, propertyOf } from './hubspot-client';

export interface DealsAdapterOptions {
  searchLimit: number;
  nameSearchLimit: number;
  propertyNameThreshold: number;
}

// Contacts per lead whose deals are looked up
const MAX_ASSOCIATED_CONTACTS = 3;

function toCandidate(deal: HubSpotObject, matchType: MatchType): MatchCandidate {
  return {
    source: 'deals',
    entityId: deal.id,
    matchType,
    rank: MATCH_TYPE_RANK[matchType],
    label: propertyOf(deal, 'dealname') || undefined,
  };
}

export function dealLookupName(query: LookupQuery): string | undefined {
  if (query.propertyName) return query.propertyName;
  if (query.company) return query.company;
  return undefined;
}

export class DealsAdapter implements LookupAdapter {
  readonly source = 'deals' as const;
  readonly required = true;

  private readonly client: HubSpotClient;
  private readonly options: DealsAdapterOptions;

  constructor(client: HubSpotClient, options: DealsAdapterOptions) {
    this.client = client;
    this.options = options;
  }

  async findMatches(query: LookupQuery, signal?: AbortSignal): Promise<MatchCandidate[]> {
    const byEmail = await this.dealsForContacts('email', query.email, signal);
    if (byEmail.length > 0) {
      return byEmail.map((deal) => toCandidate(deal, 'email'));
    }

    if (query.phone) {
      const byPhone = await this.dealsForContacts('phone', query.phone, signal);
      if (byPhone.length > 0) {
        return byPhone.map((deal) => toCandidate(deal, 'phone'));
      }
    }

    const name = dealLookupName(query);
    if (!name) return [];

    const byName = await this.client.search(
      'deals',
      'deals',
      [{ propertyName: 'dealname', operator: 'CONTAINS_TOKEN', value: name }],
      DEAL_PROPERTIES,
      this.options.nameSearchLimit,
      signal
    );

    return byName
      .filter((deal) => tokenSetSimilarity(name, propertyOf(deal, 'dealname')) >= this.options.propertyNameThreshold)
      .map((deal) => toCandidate(deal, 'name'));
  }

  private async dealsForContacts(
    property: 'email' | 'phone',
    value: string,
    signal?: AbortSignal
  ): Promise<HubSpotObject[]> {
    const contacts = await this.client.search(
      'deals',
      'contacts',
      [{ propertyName: property, operator: 'EQ', value }],
      CONTACT_PROPERTIES,
      MAX_ASSOCIATED_CONTACTS,
      signal
    );

    const deals = new Map<string, HubSpotObject>();
    for (const contact of contacts) {
      const associated = await this.client.search(
        'deals',
        'deals',
        [{ propertyName: 'associations.contact', operator: 'EQ', value: contact.id }],
        DEAL_PROPERTIES,
        this.options.searchLimit,
        signal
      );
      for (const deal of associated) {
        deals.set(deal.id, deal);
      }
    }

    return [...deals.values()];
  }
}
