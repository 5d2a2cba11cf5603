/**
 * Stage Machine Tests
 */

import { describe, it, expect } from '@jest/globals';
import { createCandidateRecord } from '../../domain/entities/Candidate.js';
import { advanceStage, hasReached, stageIndex } from '../../core/pipeline/StageMachine.js';

describe('StageMachine', () => {
  it('should order stages from Ingested to Notified', () => {
    expect(stageIndex('Ingested')).toBe(0);
    expect(stageIndex('Notified')).toBe(5);
  });

  it('should move forward and skip stages', () => {
    const record = createCandidateRecord('a', 'a.txt');

    expect(advanceStage(record, 'Extracted')).toBe(true);
    expect(advanceStage(record, 'Classified')).toBe(true);
    expect(record.stage).toBe('Classified');
  });

  it('should ignore backward and repeated moves', () => {
    const record = createCandidateRecord('a', 'a.txt');
    advanceStage(record, 'Surveyed');

    expect(advanceStage(record, 'Screened')).toBe(false);
    expect(advanceStage(record, 'Surveyed')).toBe(false);
    expect(record.stage).toBe('Surveyed');
  });

  it('should report reached stages', () => {
    const record = createCandidateRecord('a', 'a.txt');
    advanceStage(record, 'Screened');

    expect(hasReached(record, 'Extracted')).toBe(true);
    expect(hasReached(record, 'Screened')).toBe(true);
    expect(hasReached(record, 'Classified')).toBe(false);
  });
});
