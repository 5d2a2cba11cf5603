/**
 * The two output tables and the mapping from candidate records to rows.
 */

import * as path from 'path';
import {
  UNKNOWN,
  lastNotification,
  type CandidateRecord,
  type NotificationKind,
} from '../../domain/entities/Candidate.js';
import { resolveSignals } from '../../domain/services/PriorityScorer.js';
import { CsvTable, type CsvRow } from './CsvTable.js';

// =============================================================================
// COLUMNS
// =============================================================================

export const EXTRACTED_FILE = 'extracted_resumes.csv';
export const CANDIDATES_FILE = 'output_candidates.csv';

export const EXTRACTED_COLUMNS = [
  'id',
  'source_file',
  'name',
  'email',
  'phone',
  'years_experience',
  'skills',
  'experience_summary',
  'availability_hint',
  'visa_hint',
  'training_hint',
  'stage',
  'error',
] as const;

export const CANDIDATE_COLUMNS = [
  'id',
  'source_file',
  'name',
  'email',
  'keyword_hits',
  'found_keywords',
  'screening_passed',
  'survey_source',
  'availability',
  'visa_status',
  'training',
  'interest',
  'score',
  'priority',
  'stage',
  'survey_notification',
  'interview_notification',
  'error',
] as const;

export type ExtractedColumn = (typeof EXTRACTED_COLUMNS)[number];
export type CandidateColumn = (typeof CANDIDATE_COLUMNS)[number];

export const LIST_SEPARATOR = '; ';

export interface CandidateTables {
  extracted: CsvTable<ExtractedColumn>;
  candidates: CsvTable<CandidateColumn>;
}

export function openCandidateTables(outputDir: string): CandidateTables {
  return {
    extracted: new CsvTable(path.join(outputDir, EXTRACTED_FILE), EXTRACTED_COLUMNS),
    candidates: new CsvTable(path.join(outputDir, CANDIDATES_FILE), CANDIDATE_COLUMNS),
  };
}

// =============================================================================
// ROW MAPPERS
// =============================================================================

function formatError(record: CandidateRecord): string {
  return record.error ? `${record.error.code}: ${record.error.message}` : '';
}

function notificationCell(record: CandidateRecord, kind: NotificationKind): string {
  return lastNotification(record, kind)?.outcome ?? '';
}

export function toExtractedRow(record: CandidateRecord): CsvRow<ExtractedColumn> {
  const fields = record.fields;
  return {
    id: record.id,
    source_file: record.sourceFile,
    name: fields?.name ?? '',
    email: fields?.email ?? '',
    phone: fields?.phone ?? '',
    years_experience: fields ? String(fields.yearsExperience) : '',
    skills: fields?.skills.join(LIST_SEPARATOR) ?? '',
    experience_summary: fields?.experienceSummary ?? '',
    availability_hint: fields?.availabilityHint ?? '',
    visa_hint: fields?.visaHint ?? '',
    training_hint: fields?.trainingHint ?? '',
    stage: record.stage,
    error: formatError(record),
  };
}

export function toCandidateRow(record: CandidateRecord): CsvRow<CandidateColumn> {
  const signals = resolveSignals({
    fields: record.fields,
    survey: record.survey,
    keywordHits: record.keywordHits ?? 0,
    screeningPassed: record.screeningPassed === true,
  });

  return {
    id: record.id,
    source_file: record.sourceFile,
    name: record.fields?.name ?? '',
    email: record.fields?.email ?? '',
    keyword_hits: record.keywordHits === undefined ? '' : String(record.keywordHits),
    found_keywords: record.foundKeywords.join(LIST_SEPARATOR),
    screening_passed:
      record.screeningPassed === undefined ? '' : String(record.screeningPassed),
    survey_source: record.survey?.source ?? '',
    availability: signals.availability,
    visa_status: signals.visa,
    training: signals.training,
    interest: record.survey?.interest ?? UNKNOWN,
    score: record.score === undefined ? '' : String(record.score),
    priority: record.priority,
    stage: record.stage,
    survey_notification: notificationCell(record, 'Survey'),
    interview_notification: notificationCell(record, 'Interview'),
    error: formatError(record),
  };
}
