/**
 * Utility functions for Lead Resolver
 */

import { CountryCode, getCountries, parsePhoneNumberFromString } from 'libphonenumber-js';

// Sleep for specified milliseconds; rejects early if the signal aborts
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('aborted'));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new Error('aborted'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

// Reject with the error from onTimeout if the promise has not settled in time
export function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), ms);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

// Country names leads arrive with that are not ISO 3166 codes
const COUNTRY_ALIASES: Record<string, string> = {
  UK: 'GB',
};

function toCountryCode(country: string | undefined): CountryCode | undefined {
  if (!country || !country.trim()) return undefined;
  const upper = country.trim().toUpperCase();
  const code = COUNTRY_ALIASES[upper] ?? upper;
  return getCountries().find((candidate) => candidate === code);
}

/**
 * E.164 form of a phone number, read in the lead's country when it has no
 * international prefix. Numbers that do not parse to a valid number are null.
 */
export function normalizePhone(phone: string | undefined, country?: string): string | null {
  if (!phone || !phone.trim()) return null;

  const parsed = parsePhoneNumberFromString(phone.trim(), toCountryCode(country));
  if (!parsed || !parsed.isValid()) return null;
  return parsed.number;
}

// Normalize email
export function normalizeEmail(email: string): string {
  return email.toLowerCase().trim();
}

// Lowercase, strip accents and punctuation, collapse whitespace
export function normalizeText(value: string | null | undefined): string {
  if (!value) return '';
  return value
    .trim()
    .toLowerCase()
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^a-z0-9\s]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function levenshteinDistance(s1: string, s2: string): number {
  const m = s1.length;
  const n = s2.length;

  if (m === 0) return n;
  if (n === 0) return m;

  let previous = Array.from({ length: n + 1 }, (_, j) => j);

  for (let i = 1; i <= m; i++) {
    const current = [i];
    for (let j = 1; j <= n; j++) {
      const cost = s1[i - 1] === s2[j - 1] ? 0 : 1;
      current[j] = Math.min(
        previous[j] + 1, // deletion
        current[j - 1] + 1, // insertion
        previous[j - 1] + cost // substitution
      );
    }
    previous = current;
  }

  return previous[n];
}

// Normalized Levenshtein similarity (0-1)
export function levenshteinSimilarity(s1: string, s2: string): number {
  const maxLen = Math.max(s1.length, s2.length);
  if (maxLen === 0) return 1;
  return 1 - levenshteinDistance(s1, s2) / maxLen;
}

/**
 * Token-set similarity (0-1) between two names.
 * Shared tokens are compared against each side's remainder, so
 * "Casa Verde" and "Casa Verde Guesthouse Lisbon" score 1.
 */
export function tokenSetSimilarity(a: string, b: string): number {
  const tokensA = new Set(normalizeText(a).split(' ').filter(Boolean));
  const tokensB = new Set(normalizeText(b).split(' ').filter(Boolean));
  if (tokensA.size === 0 || tokensB.size === 0) return 0;

  const shared = [...tokensA].filter((t) => tokensB.has(t)).sort();
  const onlyA = [...tokensA].filter((t) => !tokensB.has(t)).sort();
  const onlyB = [...tokensB].filter((t) => !tokensA.has(t)).sort();

  const base = shared.join(' ');
  const withA = [base, ...onlyA].filter(Boolean).join(' ');
  const withB = [base, ...onlyB].filter(Boolean).join(' ');

  if (shared.length > 0 && (onlyA.length === 0 || onlyB.length === 0)) {
    return 1;
  }

  return Math.max(
    shared.length > 0 ? levenshteinSimilarity(base, withA) : 0,
    shared.length > 0 ? levenshteinSimilarity(base, withB) : 0,
    levenshteinSimilarity(withA, withB)
  );
}

// Mask all but the last four characters of a secret
export function maskSecret(value: string): string {
  if (value.length <= 4) return '****';
  return `****${value.slice(-4)}`;
}

/**
 * Minimum-interval throttle.
 * Slots are reserved synchronously, so concurrent callers queue up
 * one interval apart instead of firing together. An aborted caller
 * gives its slot back when nobody has queued behind it.
 */
export class Throttle {
  private nextSlot = 0;
  private readonly minIntervalMs: number;

  constructor(minIntervalMs: number) {
    this.minIntervalMs = minIntervalMs;
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new Error('aborted');
    }

    const now = Date.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.minIntervalMs;

    if (slot <= now) return;
    try {
      await sleep(slot - now, signal);
    } catch (error) {
      if (this.nextSlot === slot + this.minIntervalMs) {
        this.nextSlot = slot;
      }
      throw error;
    }
  }
}
