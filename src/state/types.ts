/**
 * Core type definitions for Lead Resolver state
 */

import type { Classification, MatchedEntity, MatchType, RoutingReason } from '../resolution/types';

// Per-stage completion flag: pending -> complete, exactly once
export type StageState = 'pending' | 'complete';

// Email validation result as reported by the validation stage
export const EMAIL_STATUSES = [
  'valid',
  'invalid',
  'catch-all',
  'unknown',
  'spamtrap',
  'abuse',
  'do_not_mail',
] as const;

export type EmailStatus = (typeof EMAIL_STATUSES)[number];

export interface Lead {
  leadId: number;                    // Stable identifier, drains in ascending order
  email?: string;
  phone?: string;
  firstName?: string;
  lastName?: string;
  company?: string;
  propertyName?: string;
  city?: string;
  country?: string;

  // Validation stage (written by the validator only)
  emailStatus?: EmailStatus;
  validationState: StageState;

  // Resolution stage
  resolutionState: StageState;
  classification?: Classification;
  routingReason?: RoutingReason;
  needsDeal?: boolean;
  contactMatchType?: MatchType;
  matchedEntities: MatchedEntity[];
  resolvedAt?: string;

  // Record timestamps
  createdAt: number;
  updatedAt: number;
}

// Fields accepted on import
export type LeadInput = Pick<Lead, 'leadId'> &
  Partial<
    Pick<
      Lead,
      | 'email'
      | 'phone'
      | 'firstName'
      | 'lastName'
      | 'company'
      | 'propertyName'
      | 'city'
      | 'country'
      | 'emailStatus'
    >
  >;

// Run status
export type RunStatus = 'running' | 'completed' | 'failed' | 'cancelled';

// Pipeline stage names
export type StageName = 'import' | 'resolve';

// Run metadata
export interface RunMetadata {
  options?: Record<string, unknown>;
  summary?: Record<string, unknown>;
  errors?: string[];
}

// Pipeline run record
export interface Run {
  runId: string;
  stage: StageName;
  startedAt: number;
  completedAt?: number;
  status: RunStatus;
  leadsProcessed: number;
  leadsPassed: number;
  leadsFailed: number;
  errorMessage?: string;
  metadata?: RunMetadata;
}

// Funnel position derived from the stage flags
export type FunnelStage =
  | 'no_email'
  | 'awaiting_validation'
  | 'invalid_email'
  | 'awaiting_resolution'
  | 'resolved';
