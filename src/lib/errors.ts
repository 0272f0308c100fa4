/**
 * Error taxonomy for the resolution engine
 */

export type MatchSource = 'contacts' | 'deals' | 'registry';

export type UnavailableKind =
  | 'timeout'
  | 'rate_limited'
  | 'auth'
  | 'server'
  | 'network'
  | 'bad_response';

// Transient upstream failure: "could not check", as opposed to "checked, no match"
export class UpstreamUnavailableError extends Error {
  readonly system: MatchSource;
  readonly kind: UnavailableKind;
  readonly status?: number;

  constructor(system: MatchSource, kind: UnavailableKind, message: string, status?: number) {
    super(`${system} unavailable (${kind}): ${message}`);
    this.name = 'UpstreamUnavailableError';
    this.system = system;
    this.kind = kind;
    this.status = status;
  }
}

export class PolicyViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PolicyViolationError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Map an HTTP status to the unavailable taxonomy
export function kindForStatus(status: number): UnavailableKind {
  if (status === 401 || status === 403) return 'auth';
  if (status === 429) return 'rate_limited';
  if (status >= 500) return 'server';
  return 'bad_response';
}
