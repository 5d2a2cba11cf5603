/**
 * Pre-supplied survey responses, keyed by candidate id and by email.
 *
 * CSV columns: candidate_id, email, availability, visa_status, training, interest.
 * Values are matched loosely ("Full Availability", "Stamp 1G", "HACCP",
 * "Irish", "UE") so that exports from a forms tool load as-is.
 */

import { z } from 'zod';
import {
  UNKNOWN,
  type AvailabilityTag,
  type Hint,
  type Interest,
  type SurveyResponse,
  type TrainingTag,
  type VisaTag,
} from '../../domain/entities/Candidate.js';
import { ConfigurationError } from '../../core/errors.js';
import { parseCsvRecords } from '../output/csv.js';

// =============================================================================
// VALUE NORMALIZATION
// =============================================================================

function normalizeKey(value: string): string {
  return value
    .trim()
    .toLowerCase()
    .replace(/[\s_-]+/g, ' ');
}

function isBlank(value: string): boolean {
  const key = normalizeKey(value);
  return key === '' || key === 'unknown' || key === 'n/a';
}

export function normalizeAvailability(value: string): Hint<AvailabilityTag> | null {
  if (isBlank(value)) return UNKNOWN;
  const key = normalizeKey(value);
  if (key === 'full' || key === 'full availability' || key === 'fully available') return 'full';
  if (key === 'morning' || key === 'mornings') return 'morning';
  if (key === 'night' || key === 'nights' || key === 'evening') return 'night';
  return null;
}

export function normalizeVisa(value: string): Hint<VisaTag> | null {
  if (isBlank(value)) return UNKNOWN;
  const key = normalizeKey(value).replace(/^stamp\s*/, 'stamp ');
  const table: Record<string, VisaTag> = {
    irish: 'irish',
    'irish citizen': 'irish',
    eu: 'eu',
    ue: 'eu',
    'eu citizen': 'eu',
    'stamp 4': 'stamp_4',
    'stamp 1g': 'stamp_1g',
    'stamp 2': 'stamp_2',
    'stamp 1': 'stamp_1',
  };
  return table[key] ?? null;
}

export function normalizeTraining(value: string): Hint<TrainingTag> {
  if (isBlank(value)) return UNKNOWN;
  const key = normalizeKey(value);
  if (key === 'none' || key === 'no') return 'none';
  if (key.includes('haccp') || key.includes('food handling')) return 'haccp';
  if (key.includes('food safety')) return 'food_safety';
  if (key.includes('customer service')) return 'customer_service';
  return 'other';
}

export function normalizeInterest(value: string): Interest | null {
  if (isBlank(value)) return UNKNOWN;
  const key = normalizeKey(value);
  if (key === 'yes' || key === 'interested') return 'interested';
  if (key === 'no' || key === 'not interested') return 'not_interested';
  return null;
}

// =============================================================================
// TABLE
// =============================================================================

const rowSchema = z.object({
  candidate_id: z.string().default(''),
  email: z.string().default(''),
  availability: z.string().default(''),
  visa_status: z.string().default(''),
  training: z.string().default(''),
  interest: z.string().default(''),
});

export class SurveyResponseTable {
  private byId = new Map<string, SurveyResponse>();
  private byEmail = new Map<string, SurveyResponse>();

  get size(): number {
    return new Set([...this.byId.values(), ...this.byEmail.values()]).size;
  }

  add(keys: { candidateId?: string; email?: string }, response: SurveyResponse): void {
    if (keys.candidateId) {
      this.byId.set(keys.candidateId.trim(), response);
    }
    if (keys.email) {
      this.byEmail.set(keys.email.trim().toLowerCase(), response);
    }
  }

  /**
   * Look up by candidate id first, then by email.
   */
  lookup(candidateId: string, email?: string): SurveyResponse | undefined {
    const byId = this.byId.get(candidateId);
    if (byId) {
      return byId;
    }
    if (email && email !== UNKNOWN) {
      return this.byEmail.get(email.trim().toLowerCase());
    }
    return undefined;
  }
}

export function parseSurveyResponseTable(text: string, source = 'survey responses'): SurveyResponseTable {
  const table = new SurveyResponseTable();
  const records = parseCsvRecords(text);
  const problems: string[] = [];

  records.forEach((record, index) => {
    const line = index + 2;
    const row = rowSchema.parse(record);

    if (!row.candidate_id.trim() && !row.email.trim()) {
      problems.push(`line ${line}: needs candidate_id or email`);
      return;
    }

    const availability = normalizeAvailability(row.availability);
    const visaStatus = normalizeVisa(row.visa_status);
    const training = normalizeTraining(row.training);
    const interest = normalizeInterest(row.interest);

    if (availability === null) problems.push(`line ${line}: unknown availability "${row.availability}"`);
    if (visaStatus === null) problems.push(`line ${line}: unknown visa_status "${row.visa_status}"`);
    if (interest === null) problems.push(`line ${line}: unknown interest "${row.interest}"`);

    if (availability === null || visaStatus === null || interest === null) {
      return;
    }

    table.add(
      { candidateId: row.candidate_id, email: row.email },
      { availability, visaStatus, training, interest, source: 'table' }
    );
  });

  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid ${source}`, { issues: problems });
  }

  return table;
}
