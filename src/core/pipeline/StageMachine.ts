/**
 * Stage Machine
 *
 * Stages only move forward. A request to move a record to an earlier (or
 * the same) stage is ignored, which keeps reprocessing idempotent.
 */

import { STAGE_ORDER, type CandidateRecord, type Stage } from '../../domain/entities/Candidate.js';

export function stageIndex(stage: Stage): number {
  return STAGE_ORDER.indexOf(stage);
}

export function hasReached(record: CandidateRecord, stage: Stage): boolean {
  return stageIndex(record.stage) >= stageIndex(stage);
}

/**
 * Move the record to `next` if that is a forward move. Returns true when
 * the stage changed.
 */
export function advanceStage(record: CandidateRecord, next: Stage): boolean {
  if (stageIndex(next) <= stageIndex(record.stage)) {
    return false;
  }
  record.stage = next;
  return true;
}
