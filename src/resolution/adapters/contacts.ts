/**
 * HubSpot contacts lookup
 * Email first, then phone, then first/last name; each step only runs when
 * the previous one found nothing.
 */

import { LookupAdapter, LookupQuery, MatchCandidate, MatchType, MATCH_TYPE_RANK } from '../types';
import { levenshteinSimilarity, normalizeText } from '../../lib/utils';
import { HubSpotClient, HubSpotFilter, HubSpotObject, CONTACT_PROPERTIES, propertyOf } from './hubspot-client';

export interface ContactsAdapterOptions {
  searchLimit: number;
  nameSearchLimit: number;
  personNameThreshold: number;
}

function toCandidate(contact: HubSpotObject, matchType: MatchType): MatchCandidate {
  const name = `${propertyOf(contact, 'firstname')} ${propertyOf(contact, 'lastname')}`.trim();
  return {
    source: 'contacts',
    entityId: contact.id,
    matchType,
    rank: MATCH_TYPE_RANK[matchType],
    label: name || propertyOf(contact, 'email') || undefined,
  };
}

// Either name part is close enough to count as the same person
export function isSamePerson(
  query: Pick<LookupQuery, 'firstName' | 'lastName'>,
  contact: HubSpotObject,
  threshold: number
): boolean {
  const score = (ours: string | undefined, theirs: string): number => {
    const a = normalizeText(ours);
    const b = normalizeText(theirs);
    return a && b ? levenshteinSimilarity(a, b) : 0;
  };

  return (
    score(query.firstName, propertyOf(contact, 'firstname')) >= threshold ||
    score(query.lastName, propertyOf(contact, 'lastname')) >= threshold
  );
}

export class ContactsAdapter implements LookupAdapter {
  readonly source = 'contacts' as const;
  readonly required = true;

  private readonly client: HubSpotClient;
  private readonly options: ContactsAdapterOptions;

  constructor(client: HubSpotClient, options: ContactsAdapterOptions) {
    this.client = client;
    this.options = options;
  }

  async findMatches(query: LookupQuery, signal?: AbortSignal): Promise<MatchCandidate[]> {
    const byEmail = await this.searchBy('email', query.email, signal);
    if (byEmail.length > 0) {
      return byEmail.map((contact) => toCandidate(contact, 'email'));
    }

    if (query.phone) {
      const byPhone = await this.searchBy('phone', query.phone, signal);
      if (byPhone.length > 0) {
        return byPhone.map((contact) => toCandidate(contact, 'phone'));
      }
    }

    if (query.firstName || query.lastName) {
      const byName = await this.searchByName(query, signal);
      return byName
        .filter((contact) => isSamePerson(query, contact, this.options.personNameThreshold))
        .map((contact) => toCandidate(contact, 'name'));
    }

    return [];
  }

  private searchBy(property: 'email' | 'phone', value: string, signal?: AbortSignal): Promise<HubSpotObject[]> {
    return this.client.search(
      'contacts',
      'contacts',
      [{ propertyName: property, operator: 'EQ', value }],
      CONTACT_PROPERTIES,
      this.options.searchLimit,
      signal
    );
  }

  private searchByName(query: LookupQuery, signal?: AbortSignal): Promise<HubSpotObject[]> {
    const filters: HubSpotFilter[] = [];
    if (query.firstName) {
      filters.push({ propertyName: 'firstname', operator: 'CONTAINS_TOKEN', value: query.firstName });
    }
    if (query.lastName) {
      filters.push({ propertyName: 'lastname', operator: 'CONTAINS_TOKEN', value: query.lastName });
    }

    return this.client.search(
      'contacts',
      'contacts',
      filters,
      CONTACT_PROPERTIES,
      this.options.nameSearchLimit,
      signal
    );
  }
}
