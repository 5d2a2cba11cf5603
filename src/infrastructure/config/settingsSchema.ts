/**
 * Settings schema for config/triage.json. Every field has a default, so an
 * absent file or an empty object yields the stock scoring model.
 */

import { z } from 'zod';

// =============================================================================
// SCORING
// =============================================================================

const availabilityWeightsSchema = z
  .object({
    full: z.number().default(4),
    morning: z.number().default(3),
    night: z.number().default(1),
    unknown: z.number().default(0),
  })
  .default({});

const visaWeightsSchema = z
  .object({
    irish: z.number().default(4),
    stamp_4: z.number().default(3),
    eu: z.number().default(3),
    stamp_1g: z.number().default(2),
    stamp_2: z.number().default(1),
    stamp_1: z.number().default(0),
    unknown: z.number().default(0),
  })
  .default({});

const trainingWeightsSchema = z
  .object({
    haccp: z.number().default(3),
    food_safety: z.number().default(2),
    customer_service: z.number().default(2),
    other: z.number().default(1),
    none: z.number().default(0),
    unknown: z.number().default(0),
  })
  .default({});

const tierThresholdsSchema = z
  .object({
    high: z.number().default(9),
    medium: z.number().default(5),
  })
  .default({})
  .refine((t) => t.high > t.medium, {
    message: 'scoring.thresholds.high must be greater than scoring.thresholds.medium',
  });

const scoringSchema = z
  .object({
    availability: availabilityWeightsSchema,
    visa: visaWeightsSchema,
    training: trainingWeightsSchema,
    screeningBonus: z.number().min(0).default(2),
    keywordBonusCap: z.number().int().min(0).default(5),
    thresholds: tierThresholdsSchema,
  })
  .default({});

// =============================================================================
// SURVEY
// =============================================================================

const probability = z.number().min(0);

function hasPositiveWeight(weights: Record<string, number | undefined>): boolean {
  return Object.values(weights).some((p) => p !== undefined && p > 0);
}

const POSITIVE_WEIGHT = { message: 'distribution needs at least one positive weight' };

const availabilityDistributionSchema = z
  .record(z.enum(['full', 'morning', 'night']), probability)
  .default({ morning: 0.5, night: 0.3, full: 0.2 })
  .refine(hasPositiveWeight, POSITIVE_WEIGHT);

const visaDistributionSchema = z
  .record(z.enum(['irish', 'eu', 'stamp_4', 'stamp_1g', 'stamp_2', 'stamp_1']), probability)
  .default({ stamp_4: 0.7, stamp_2: 0.3 })
  .refine(hasPositiveWeight, POSITIVE_WEIGHT);

const trainingDistributionSchema = z
  .record(z.enum(['haccp', 'food_safety', 'customer_service', 'other', 'none']), probability)
  .default({ none: 0.4, customer_service: 0.3, food_safety: 0.2, haccp: 0.1 })
  .refine(hasPositiveWeight, POSITIVE_WEIGHT);

const interestDistributionSchema = z
  .record(z.enum(['interested', 'not_interested']), probability)
  .default({ interested: 0.9, not_interested: 0.1 })
  .refine(hasPositiveWeight, POSITIVE_WEIGHT);

const surveySchema = z
  .object({
    responseRate: z.number().min(0).max(1).default(0.8),
    seed: z.string().min(1).default('triage'),
    surveyUrl: z.string().url().default('https://forms.example.com/fast-food-survey'),
    distributions: z
      .object({
        availability: availabilityDistributionSchema,
        visa: visaDistributionSchema,
        training: trainingDistributionSchema,
        interest: interestDistributionSchema,
      })
      .default({}),
  })
  .default({});

// =============================================================================
// NOTIFICATIONS
// =============================================================================

const templateSchema = z.object({
  subject: z.string().min(1),
  body: z.string().min(1),
});

const DEFAULT_SURVEY_TEMPLATE = {
  subject: 'Fast Food Job Application - Next Steps',
  body: [
    'Hello {{name}},',
    '',
    'Thank you for your interest in joining our fast food team. Your resume has been reviewed and we would like to invite you to complete a short survey to help us better understand your availability and qualifications.',
    '',
    'Please complete the survey at the following link:',
    '{{surveyUrl}}',
    '',
    'We look forward to learning more about you.',
    '',
    'Best regards,',
    'Fast Food HR Team',
  ].join('\n'),
};

const DEFAULT_INTERVIEW_TEMPLATE = {
  subject: 'Fast Food Job Application - Interview Invitation',
  body: [
    'Hello {{name}},',
    '',
    'Thank you for completing our survey. We are pleased to invite you to an interview for the position.',
    '',
    'Interview Details:',
    'Date: {{interviewDate}}',
    'Time: {{interviewTime}}',
    'Location: {{interviewLocation}}',
    '',
    'Please confirm your attendance by replying to this email.',
    '',
    'Best regards,',
    'Fast Food HR Team',
  ].join('\n'),
};

const notificationsSchema = z
  .object({
    templates: z
      .object({
        survey: templateSchema.default(DEFAULT_SURVEY_TEMPLATE),
        interview: templateSchema.default(DEFAULT_INTERVIEW_TEMPLATE),
      })
      .default({}),
    interviewLeadDays: z.number().int().min(0).default(14),
    interviewTime: z.string().min(1).default('10:00 AM'),
    interviewLocation: z.string().min(1).default('Fast Food Restaurant, 123 Main Street'),
    retry: z
      .object({
        maxAttempts: z.number().int().min(1).max(10).default(3),
        baseDelayMs: z.number().int().min(0).default(500),
        timeoutMs: z.number().int().min(1).default(10_000),
      })
      .default({}),
  })
  .default({});

// =============================================================================
// ROOT
// =============================================================================

export const triageSettingsSchema = z
  .object({
    screening: z
      .object({
        threshold: z.number().int().min(0).default(2),
      })
      .default({}),
    scoring: scoringSchema,
    survey: surveySchema,
    notifications: notificationsSchema,
    ingestion: z
      .object({
        maxFileSizeBytes: z
          .number()
          .int()
          .positive()
          .default(10 * 1024 * 1024),
      })
      .default({}),
  })
  .strict();

export type TriageSettings = z.infer<typeof triageSettingsSchema>;
export type ScoringWeights = TriageSettings['scoring'];
export type SurveySettings = TriageSettings['survey'];
export type NotificationSettings = TriageSettings['notifications'];
export type NotificationTemplate = z.infer<typeof templateSchema>;

export function defaultTriageSettings(): TriageSettings {
  return triageSettingsSchema.parse({});
}
