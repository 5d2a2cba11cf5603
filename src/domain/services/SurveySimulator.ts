/**
 * Survey Simulator
 *
 * Produces the survey answers for a screened-in candidate. Real responses
 * come from the pre-supplied response table; everyone else gets a seeded
 * draw: first whether they respond at all, then one sample from each
 * configured distribution.
 */

import {
  AVAILABILITY_TAGS,
  TRAINING_TAGS,
  VISA_TAGS,
  type AvailabilityTag,
  type Interest,
  type SurveyResponse,
  type TrainingTag,
  type VisaTag,
} from '../entities/Candidate.js';
import type { BatchRunContext, RandomSource } from '../../core/pipeline/BatchRunContext.js';
import type { SurveySettings } from '../../infrastructure/config/settingsSchema.js';
import type { SurveyResponseTable } from '../../infrastructure/config/SurveyResponseTable.js';

const INTEREST_TAGS: ReadonlyArray<Exclude<Interest, 'unknown'>> = ['interested', 'not_interested'];

export type Distribution<T extends string> = Partial<Record<T, number>>;

/**
 * Draw one tag from a weighted distribution. Tags are visited in the fixed
 * order given, so the same random value always maps to the same tag.
 * Weights need not sum to 1.
 */
export function sampleCategorical<T extends string>(
  weights: Distribution<T>,
  order: readonly T[],
  random: RandomSource
): T {
  const positive = order.filter((tag) => (weights[tag] ?? 0) > 0);
  if (positive.length === 0) {
    throw new RangeError('Distribution has no positive weight');
  }

  const total = positive.reduce((sum, tag) => sum + (weights[tag] ?? 0), 0);
  const target = random() * total;

  let cumulative = 0;
  for (const tag of positive) {
    cumulative += weights[tag] ?? 0;
    if (target < cumulative) {
      return tag;
    }
  }
  return positive[positive.length - 1];
}

export class SurveySimulator {
  constructor(
    private settings: SurveySettings,
    private table: SurveyResponseTable
  ) {}

  /**
   * Returns the candidate's survey response, or undefined for a
   * non-responder. Updates the response counters on the context.
   */
  simulate(
    candidateId: string,
    context: BatchRunContext,
    email?: string
  ): SurveyResponse | undefined {
    const supplied = this.table.lookup(candidateId, email);
    if (supplied) {
      context.increment('responsesReceived');
      return { ...supplied };
    }

    const random = context.randomFor(candidateId);
    if (random() >= this.settings.responseRate) {
      context.increment('nonResponders');
      return undefined;
    }

    const { distributions } = this.settings;
    const response: SurveyResponse = {
      availability: sampleCategorical<AvailabilityTag>(
        distributions.availability,
        AVAILABILITY_TAGS,
        random
      ),
      visaStatus: sampleCategorical<VisaTag>(distributions.visa, VISA_TAGS, random),
      training: sampleCategorical<TrainingTag>(distributions.training, TRAINING_TAGS, random),
      interest: sampleCategorical(distributions.interest, INTEREST_TAGS, random),
      source: 'simulated',
    };

    context.increment('responsesReceived');
    return response;
  }
}
