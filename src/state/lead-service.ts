/**
 * Lead state service
 * Batch source and result committer for the resolution stage
 */

import { z } from 'zod';
import { getDatabase, DatabaseWrapper, Row, textColumn, numberColumn } from './database';
import { EMAIL_STATUSES, EmailStatus, FunnelStage, Lead, LeadInput, StageState } from './types';
import {
  Classification,
  CommitResult,
  MatchedEntity,
  MatchType,
  Outcome,
  ResultCommitter,
  RoutingReason,
  ROUTING_REASONS,
} from '../resolution/types';
import { logger } from '../lib/logger';
import { errorMessage } from '../lib/errors';
import { normalizeEmail } from '../lib/utils';

const matchedEntitiesSchema = z.array(
  z.object({
    source: z.enum(['contacts', 'deals', 'registry']),
    entityId: z.string(),
    matchType: z.enum(['email', 'phone', 'name']),
  })
);

function pick<T extends string>(allowed: readonly T[], value: string | undefined): T | undefined {
  return allowed.find((candidate) => candidate === value);
}

const STAGE_STATES: readonly StageState[] = ['pending', 'complete'];
const CLASSIFICATIONS: readonly Classification[] = ['unique', 'duplicate'];
const MATCH_TYPES: readonly MatchType[] = ['email', 'phone', 'name'];

function parseMatchedEntities(raw: string | undefined, leadId: number): MatchedEntity[] {
  if (!raw) return [];

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    logger.warn(`Ignoring malformed matched_entities for lead ${leadId}`, { error: errorMessage(error) });
    return [];
  }

  const parsed = matchedEntitiesSchema.safeParse(json);
  if (!parsed.success) {
    logger.warn(`Ignoring malformed matched_entities for lead ${leadId}`);
    return [];
  }
  return parsed.data;
}

// Convert DB row to Lead object
function rowToLead(row: Row): Lead {
  const leadId = numberColumn(row, 'lead_id') ?? 0;
  const needsDeal = numberColumn(row, 'needs_deal');

  return {
    leadId,
    email: textColumn(row, 'email'),
    phone: textColumn(row, 'phone'),
    firstName: textColumn(row, 'first_name'),
    lastName: textColumn(row, 'last_name'),
    company: textColumn(row, 'company'),
    propertyName: textColumn(row, 'property_name'),
    city: textColumn(row, 'city'),
    country: textColumn(row, 'country'),
    emailStatus: pick(EMAIL_STATUSES, textColumn(row, 'email_status')),
    validationState: pick(STAGE_STATES, textColumn(row, 'validation_state')) ?? 'pending',
    resolutionState: pick(STAGE_STATES, textColumn(row, 'resolution_state')) ?? 'pending',
    classification: pick(CLASSIFICATIONS, textColumn(row, 'classification')),
    routingReason: pick(ROUTING_REASONS, textColumn(row, 'routing_reason')),
    needsDeal: needsDeal === undefined ? undefined : needsDeal === 1,
    contactMatchType: pick(MATCH_TYPES, textColumn(row, 'contact_match_type')),
    matchedEntities: parseMatchedEntities(textColumn(row, 'matched_entities'), leadId),
    resolvedAt: textColumn(row, 'resolved_at'),
    createdAt: numberColumn(row, 'created_at') ?? 0,
    updatedAt: numberColumn(row, 'updated_at') ?? 0,
  };
}

export interface ImportResult {
  inserted: number;
  updated: number;
}

export interface LeadStats {
  total: number;
  byFunnelStage: Record<FunnelStage, number>;
  byClassification: Record<Classification, number>;
  byReason: Record<RoutingReason, number>;
  needsDeal: number;
}

export function funnelStageOf(lead: Pick<Lead, 'email' | 'emailStatus' | 'validationState' | 'resolutionState'>): FunnelStage {
  if (!lead.email) return 'no_email';
  if (lead.resolutionState === 'complete') return 'resolved';
  if (lead.validationState === 'pending') return 'awaiting_validation';
  if (lead.emailStatus !== 'valid') return 'invalid_email';
  return 'awaiting_resolution';
}

export class LeadService implements ResultCommitter {
  private getDb(): DatabaseWrapper {
    return new DatabaseWrapper(getDatabase());
  }

  /**
   * Insert or update leads by id.
   * A lead carrying an email status has finished validation; the
   * resolution flag is never touched here.
   */
  importLeads(leads: LeadInput[]): ImportResult {
    const db = this.getDb();
    const result: ImportResult = { inserted: 0, updated: 0 };

    const upsertAll = db.transaction<LeadInput>((items) => {
      for (const lead of items) {
        const now = Date.now();
        const existing = this.getById(lead.leadId);
        const emailStatus: EmailStatus | undefined = lead.emailStatus ?? existing?.emailStatus;
        const validationState: StageState = emailStatus ? 'complete' : 'pending';

        if (existing) {
          db.prepare(`
            UPDATE leads SET
              email = ?, phone = ?, first_name = ?, last_name = ?, company = ?,
              property_name = ?, city = ?, country = ?, email_status = ?,
              validation_state = ?, updated_at = ?
            WHERE lead_id = ?
          `).run(
            lead.email ? normalizeEmail(lead.email) : existing.email,
            lead.phone ?? existing.phone,
            lead.firstName ?? existing.firstName,
            lead.lastName ?? existing.lastName,
            lead.company ?? existing.company,
            lead.propertyName ?? existing.propertyName,
            lead.city ?? existing.city,
            lead.country ?? existing.country,
            emailStatus,
            validationState,
            now,
            lead.leadId
          );
          result.updated++;
        } else {
          db.prepare(`
            INSERT INTO leads (
              lead_id, email, phone, first_name, last_name, company,
              property_name, city, country, email_status, validation_state,
              resolution_state, matched_entities, created_at, updated_at
            ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 'pending', '[]', ?, ?)
          `).run(
            lead.leadId,
            lead.email ? normalizeEmail(lead.email) : undefined,
            lead.phone,
            lead.firstName,
            lead.lastName,
            lead.company,
            lead.propertyName,
            lead.city,
            lead.country,
            emailStatus,
            validationState,
            now,
            now
          );
          result.inserted++;
        }
      }
      return items.length;
    });

    upsertAll(leads);
    logger.info('Imported leads', { ...result });
    return result;
  }

  // Get lead by ID
  getById(leadId: number): Lead | null {
    const row = this.getDb().prepare('SELECT * FROM leads WHERE lead_id = ?').get(leadId);
    return row ? rowToLead(row) : null;
  }

  /**
   * Leads ready for duplicate resolution, lowest id first, so earlier
   * leads always drain before later ones.
   */
  getEligibleForResolution(limit: number): Lead[] {
    const rows = this.getDb()
      .prepare(`
        SELECT * FROM leads
        WHERE validation_state = 'complete'
          AND email_status = 'valid'
          AND resolution_state = 'pending'
          AND email IS NOT NULL AND email != ''
        ORDER BY lead_id ASC
        LIMIT ?
      `)
      .all(limit);
    return rows.map(rowToLead);
  }

  /**
   * pending -> complete transition for the resolution flag.
   * Zero changed rows means the lead was not pending, which is reported
   * as a failed commit rather than overwriting an earlier outcome.
   */
  commitResolution(leadId: number, outcome: Outcome): CommitResult {
    try {
      const { changes } = this.getDb()
        .prepare(`
          UPDATE leads SET
            resolution_state = 'complete',
            classification = ?,
            routing_reason = ?,
            needs_deal = ?,
            contact_match_type = ?,
            matched_entities = ?,
            resolved_at = ?,
            updated_at = ?
          WHERE lead_id = ? AND resolution_state = 'pending'
        `)
        .run(
          outcome.classification,
          outcome.reason,
          outcome.needsDeal,
          outcome.contactMatchType,
          JSON.stringify(outcome.matchedEntities),
          outcome.resolvedAt,
          Date.now(),
          leadId
        );

      if (changes === 0) {
        return { ok: false, error: `lead ${leadId} is not pending resolution` };
      }
      return { ok: true };
    } catch (error) {
      return { ok: false, error: errorMessage(error) };
    }
  }

  async commit(leadId: number, outcome: Outcome): Promise<CommitResult> {
    return this.commitResolution(leadId, outcome);
  }

  getAll(): Lead[] {
    return this.getDb().prepare('SELECT * FROM leads ORDER BY lead_id ASC').all().map(rowToLead);
  }

  // Get statistics
  getStats(): LeadStats {
    const stats: LeadStats = {
      total: 0,
      byFunnelStage: {
        no_email: 0,
        awaiting_validation: 0,
        invalid_email: 0,
        awaiting_resolution: 0,
        resolved: 0,
      },
      byClassification: { unique: 0, duplicate: 0 },
      byReason: { new_lead: 0, contact_duplicate: 0, deal_exists: 0, alohacamp_exists: 0 },
      needsDeal: 0,
    };

    const rows = this.getDb()
      .prepare(`
        SELECT email, email_status, validation_state, resolution_state,
               classification, routing_reason, needs_deal, COUNT(*) AS count
        FROM leads
        GROUP BY email IS NULL OR email = '', email_status, validation_state,
                 resolution_state, classification, routing_reason, needs_deal
      `)
      .all();

    for (const row of rows) {
      const count = numberColumn(row, 'count') ?? 0;
      const stage = funnelStageOf({
        email: textColumn(row, 'email'),
        emailStatus: pick(EMAIL_STATUSES, textColumn(row, 'email_status')),
        validationState: pick(STAGE_STATES, textColumn(row, 'validation_state')) ?? 'pending',
        resolutionState: pick(STAGE_STATES, textColumn(row, 'resolution_state')) ?? 'pending',
      });
      stats.total += count;
      stats.byFunnelStage[stage] += count;

      const classification = pick(CLASSIFICATIONS, textColumn(row, 'classification'));
      if (classification) stats.byClassification[classification] += count;

      const reason = pick(ROUTING_REASONS, textColumn(row, 'routing_reason'));
      if (reason) stats.byReason[reason] += count;

      if (numberColumn(row, 'needs_deal') === 1) stats.needsDeal += count;
    }

    return stats;
  }
}

export const leadService = new LeadService();
