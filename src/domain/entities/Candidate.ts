/**
 * Candidate - Core triage entity
 *
 * One record per source document. Created by the ingestor on first sight of
 * a file and mutated in place by each downstream stage; never deleted.
 */

// =============================================================================
// SENTINELS & TAGS
// =============================================================================

export const UNKNOWN = 'unknown' as const;
export type Unknown = typeof UNKNOWN;

export type Hint<T extends string> = T | Unknown;

export type AvailabilityTag = 'full' | 'morning' | 'night';

export type VisaTag = 'irish' | 'eu' | 'stamp_4' | 'stamp_1g' | 'stamp_2' | 'stamp_1';

export type TrainingTag = 'haccp' | 'food_safety' | 'customer_service' | 'other' | 'none';

export type Interest = 'interested' | 'not_interested' | Unknown;

export const AVAILABILITY_TAGS: readonly AvailabilityTag[] = ['full', 'morning', 'night'];
export const VISA_TAGS: readonly VisaTag[] = [
  'irish',
  'eu',
  'stamp_4',
  'stamp_1g',
  'stamp_2',
  'stamp_1',
];
export const TRAINING_TAGS: readonly TrainingTag[] = [
  'haccp',
  'food_safety',
  'customer_service',
  'other',
  'none',
];
export const INTEREST_VALUES: readonly Interest[] = ['interested', 'not_interested', UNKNOWN];

// =============================================================================
// PIPELINE STAGES
// =============================================================================

export type Stage = 'Ingested' | 'Extracted' | 'Screened' | 'Surveyed' | 'Classified' | 'Notified';

export const STAGE_ORDER: readonly Stage[] = [
  'Ingested',
  'Extracted',
  'Screened',
  'Surveyed',
  'Classified',
  'Notified',
];

export type Priority = 'High' | 'Medium' | 'Low' | 'Unscreened';

// =============================================================================
// EXTRACTED FIELDS
// =============================================================================

export interface CandidateFields {
  name: string;
  email: string;
  phone: string;
  yearsExperience: number | Unknown;
  skills: string[];
  experienceSummary: string;
  availabilityHint: Hint<AvailabilityTag>;
  visaHint: Hint<VisaTag>;
  trainingHint: Hint<TrainingTag>;
}

// =============================================================================
// SURVEY
// =============================================================================

export type SurveySource = 'table' | 'simulated';

export interface SurveyResponse {
  availability: Hint<AvailabilityTag>;
  visaStatus: Hint<VisaTag>;
  training: Hint<TrainingTag>;
  interest: Interest;
  source: SurveySource;
}

// =============================================================================
// SCORING
// =============================================================================

export interface ScoreBreakdown {
  availability: number;
  visa: number;
  training: number;
  keywordBonus: number;
  total: number;
}

// =============================================================================
// NOTIFICATIONS
// =============================================================================

export type NotificationKind = 'Survey' | 'Interview';

export type NotificationOutcome =
  | 'sent'
  | 'failed'
  | 'skipped_precondition'
  | 'skipped_no_email'
  | 'skipped_declined';

export interface NotificationAttempt {
  kind: NotificationKind;
  outcome: NotificationOutcome;
  attempts: number;
  messageId?: string;
  error?: string;
  at: Date;
}

// =============================================================================
// CANDIDATE RECORD
// =============================================================================

export interface RecordError {
  code: string;
  message: string;
}

export interface CandidateRecord {
  id: string;
  sourceFile: string;
  rawText?: string;
  fields?: CandidateFields;
  keywordHits?: number;
  foundKeywords: string[];
  screeningPassed?: boolean;
  survey?: SurveyResponse;
  score?: number;
  scoreBreakdown?: ScoreBreakdown;
  priority: Priority;
  stage: Stage;
  error?: RecordError;
  notifications: NotificationAttempt[];
}

export function createCandidateRecord(id: string, sourceFile: string): CandidateRecord {
  return {
    id,
    sourceFile,
    foundKeywords: [],
    priority: 'Unscreened',
    stage: 'Ingested',
    notifications: [],
  };
}

/**
 * Raw text is write-once. Returns false when the record already has text.
 */
export function setRawText(record: CandidateRecord, text: string): boolean {
  if (record.rawText !== undefined) {
    return false;
  }
  record.rawText = text;
  return true;
}

export function lastNotification(
  record: CandidateRecord,
  kind: NotificationKind
): NotificationAttempt | undefined {
  for (let i = record.notifications.length - 1; i >= 0; i--) {
    if (record.notifications[i].kind === kind) {
      return record.notifications[i];
    }
  }
  return undefined;
}
