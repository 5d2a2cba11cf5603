/**
 * Priority Scorer Tests
 */

import { describe, it, expect } from '@jest/globals';
import { createCandidateRecord } from '../../domain/entities/Candidate.js';
import { applyPriority, classify, score } from '../../domain/services/PriorityScorer.js';
import { defaultTriageSettings } from '../../infrastructure/config/settingsSchema.js';

const weights = defaultTriageSettings().scoring;

describe('PriorityScorer', () => {
  describe('score', () => {
    it('should rank full availability, stamp 4 and HACCP as High', () => {
      const breakdown = score(
        {
          survey: { availability: 'full', visaStatus: 'stamp_4', training: 'haccp' },
          keywordHits: 2,
          screeningPassed: true,
        },
        weights
      );

      expect(breakdown).toEqual({
        availability: 4,
        visa: 3,
        training: 3,
        keywordBonus: 4,
        total: 14,
      });
      expect(classify(breakdown.total, true, weights.thresholds)).toBe('High');
    });

    it('should prefer survey answers and fall back to resume hints', () => {
      const breakdown = score(
        {
          fields: { availabilityHint: 'night', visaHint: 'stamp_2', trainingHint: 'other' },
          survey: { availability: 'morning', visaStatus: 'unknown', training: 'none' },
          keywordHits: 7,
          screeningPassed: true,
        },
        weights
      );

      expect(breakdown).toEqual({
        availability: 3,
        visa: 1,
        training: 0,
        keywordBonus: 7,
        total: 11,
      });
    });

    it('should score a non-responder from resume hints only', () => {
      const breakdown = score(
        {
          fields: { availabilityHint: 'full', visaHint: 'irish', trainingHint: 'haccp' },
          keywordHits: 2,
          screeningPassed: true,
        },
        weights
      );

      expect(breakdown.total).toBe(15);
    });

    it('should give no screening bonus to a failed screen', () => {
      const breakdown = score({ keywordHits: 1, screeningPassed: false }, weights);

      expect(breakdown).toEqual({ availability: 0, visa: 0, training: 0, keywordBonus: 1, total: 1 });
    });
  });

  describe('classify', () => {
    it('should resolve a score on a threshold to the lower tier', () => {
      expect(classify(10, true, weights.thresholds)).toBe('High');
      expect(classify(9, true, weights.thresholds)).toBe('Medium');
      expect(classify(6, true, weights.thresholds)).toBe('Medium');
      expect(classify(5, true, weights.thresholds)).toBe('Low');
    });

    it('should keep unscreened candidates Unscreened whatever the score', () => {
      expect(classify(20, false, weights.thresholds)).toBe('Unscreened');
    });
  });

  describe('applyPriority', () => {
    it('should write score, breakdown and priority onto the record', () => {
      const record = createCandidateRecord('amy', 'amy.txt');
      record.stage = 'Surveyed';
      record.keywordHits = 3;
      record.screeningPassed = true;
      record.survey = {
        availability: 'morning',
        visaStatus: 'stamp_2',
        training: 'none',
        interest: 'interested',
        source: 'simulated',
      };

      expect(applyPriority(record, weights)).toBe('Medium');
      expect(record.score).toBe(9);
      expect(record.scoreBreakdown?.keywordBonus).toBe(5);
    });

    it('should leave a notified record untouched', () => {
      const record = createCandidateRecord('ben', 'ben.txt');
      record.stage = 'Notified';
      record.priority = 'High';
      record.screeningPassed = true;
      record.keywordHits = 0;

      expect(applyPriority(record, weights)).toBe('High');
      expect(record.score).toBeUndefined();
    });

    it('should be a pure function of the record', () => {
      const make = () => {
        const record = createCandidateRecord('cal', 'cal.txt');
        record.stage = 'Screened';
        record.keywordHits = 4;
        record.screeningPassed = true;
        return record;
      };

      const first = make();
      const second = make();
      applyPriority(first, weights);
      applyPriority(second, weights);
      applyPriority(second, weights);

      expect(second.score).toBe(first.score);
      expect(second.priority).toBe(first.priority);
    });
  });
});
