/**
 * Lead file parsing (CSV with a header row, or a JSON array)
 */

import Papa from 'papaparse';
import { z } from 'zod';
import { EMAIL_STATUSES, LeadInput } from '../../state/types';

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());

const leadRowSchema = z.object({
  lead_id: z.preprocess(blankToUndefined, z.coerce.number().int().positive()),
  email: optionalText,
  phone: z.preprocess(
    (value) => (typeof value === 'number' ? String(value) : blankToUndefined(value)),
    z.string().trim().optional()
  ),
  first_name: optionalText,
  last_name: optionalText,
  company: optionalText,
  property_name: optionalText,
  city: optionalText,
  country: optionalText,
  email_status: z.preprocess(
    (value) => (typeof value === 'string' ? blankToUndefined(value.trim().toLowerCase()) : value),
    z.enum(EMAIL_STATUSES).optional()
  ),
});

export interface ParseResult {
  leads: LeadInput[];
  rejected: Array<{ row: number; reason: string }>;
}

function toLeadInput(row: z.infer<typeof leadRowSchema>): LeadInput {
  return {
    leadId: row.lead_id,
    email: row.email,
    phone: row.phone,
    firstName: row.first_name,
    lastName: row.last_name,
    company: row.company,
    propertyName: row.property_name,
    city: row.city,
    country: row.country,
    emailStatus: row.email_status,
  };
}

export function parseLeadRows(rows: unknown[]): ParseResult {
  const result: ParseResult = { leads: [], rejected: [] };

  rows.forEach((raw, index) => {
    const parsed = leadRowSchema.safeParse(raw);
    if (parsed.success) {
      result.leads.push(toLeadInput(parsed.data));
    } else {
      const issue = parsed.error.issues[0];
      result.rejected.push({
        row: index + 1,
        reason: issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid row',
      });
    }
  });

  return result;
}

export function parseLeadsCsv(content: string): ParseResult {
  const parsed = Papa.parse<Record<string, string>>(content, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => header.trim().toLowerCase(),
  });
  return parseLeadRows(parsed.data);
}

export function parseLeadsJson(content: string): ParseResult {
  const data: unknown = JSON.parse(content);
  if (!Array.isArray(data)) {
    throw new Error('Lead JSON must be an array of objects');
  }
  return parseLeadRows(data);
}
