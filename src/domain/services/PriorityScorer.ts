/**
 * Priority Scorer - Scoring & Classification
 *
 * Coarse additive model over four signals: availability, visa status,
 * training and keyword evidence. Survey answers take precedence over the
 * hints found in the resume; a missing signal scores 0.
 *
 * Tiers are strict: a score sitting exactly on a threshold falls to the
 * lower tier.
 */

import {
  UNKNOWN,
  type AvailabilityTag,
  type CandidateFields,
  type CandidateRecord,
  type Hint,
  type Priority,
  type ScoreBreakdown,
  type SurveyResponse,
  type TrainingTag,
  type VisaTag,
} from '../entities/Candidate.js';
import type { ScoringWeights } from '../../infrastructure/config/settingsSchema.js';

// =============================================================================
// TYPES
// =============================================================================

export interface ScoreInput {
  fields?: Pick<CandidateFields, 'availabilityHint' | 'visaHint' | 'trainingHint'>;
  survey?: Pick<SurveyResponse, 'availability' | 'visaStatus' | 'training'>;
  keywordHits: number;
  screeningPassed: boolean;
}

export interface ResolvedSignals {
  availability: Hint<AvailabilityTag>;
  visa: Hint<VisaTag>;
  training: Hint<TrainingTag>;
}

// =============================================================================
// SCORING
// =============================================================================

function prefer<T extends string>(surveyValue: Hint<T> | undefined, hint: Hint<T> | undefined): Hint<T> {
  if (surveyValue !== undefined && surveyValue !== UNKNOWN) {
    return surveyValue;
  }
  return hint ?? UNKNOWN;
}

export function resolveSignals(input: ScoreInput): ResolvedSignals {
  return {
    availability: prefer(input.survey?.availability, input.fields?.availabilityHint),
    visa: prefer(input.survey?.visaStatus, input.fields?.visaHint),
    training: prefer(input.survey?.training, input.fields?.trainingHint),
  };
}

export function score(input: ScoreInput, weights: ScoringWeights): ScoreBreakdown {
  const signals = resolveSignals(input);

  const availability = weights.availability[signals.availability];
  const visa = weights.visa[signals.visa];
  const training = weights.training[signals.training];
  const keywordBonus =
    (input.screeningPassed ? weights.screeningBonus : 0) +
    Math.min(Math.max(input.keywordHits, 0), weights.keywordBonusCap);

  return {
    availability,
    visa,
    training,
    keywordBonus,
    total: availability + visa + training + keywordBonus,
  };
}

// =============================================================================
// CLASSIFICATION
// =============================================================================

export function classify(
  total: number,
  screeningPassed: boolean,
  thresholds: ScoringWeights['thresholds']
): Priority {
  if (!screeningPassed) {
    return 'Unscreened';
  }
  if (total > thresholds.high) {
    return 'High';
  }
  if (total > thresholds.medium) {
    return 'Medium';
  }
  return 'Low';
}

/**
 * Score and classify a record in place. A record that has already been
 * notified keeps its priority. Returns the priority the record ends with.
 */
export function applyPriority(record: CandidateRecord, weights: ScoringWeights): Priority {
  if (record.stage === 'Notified') {
    return record.priority;
  }

  const screeningPassed = record.screeningPassed === true;
  const breakdown = score(
    {
      fields: record.fields,
      survey: record.survey,
      keywordHits: record.keywordHits ?? 0,
      screeningPassed,
    },
    weights
  );

  record.scoreBreakdown = breakdown;
  record.score = breakdown.total;
  record.priority = classify(breakdown.total, screeningPassed, weights.thresholds);
  return record.priority;
}
