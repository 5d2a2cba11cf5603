/**
 * Batch Run Context
 *
 * Per-invocation state: run id, start time, the random seed and the batch
 * counters. Passed explicitly to every stage instead of living in module
 * globals.
 */

import { v4 as uuid } from 'uuid';

// =============================================================================
// RANDOM STREAMS
// =============================================================================

export type RandomSource = () => number;

/**
 * 32-bit FNV-1a hash.
 */
export function hashSeed(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * mulberry32: small seeded PRNG returning floats in [0, 1).
 */
export function mulberry32(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

// =============================================================================
// CONTEXT
// =============================================================================

export interface BatchCounters {
  documentsSeen: number;
  extractionFailures: number;
  screenedIn: number;
  surveysSent: number;
  responsesReceived: number;
  nonResponders: number;
  interviewsSent: number;
  notificationFailures: number;
  archived: number;
}

export interface BatchRunContextOptions {
  seed: string;
  runId?: string;
  startedAt?: Date;
}

export class BatchRunContext {
  readonly runId: string;
  readonly startedAt: Date;
  readonly seed: string;
  readonly counters: BatchCounters = {
    documentsSeen: 0,
    extractionFailures: 0,
    screenedIn: 0,
    surveysSent: 0,
    responsesReceived: 0,
    nonResponders: 0,
    interviewsSent: 0,
    notificationFailures: 0,
    archived: 0,
  };

  constructor(options: BatchRunContextOptions) {
    this.runId = options.runId ?? uuid();
    this.startedAt = options.startedAt ?? new Date();
    this.seed = options.seed;
  }

  /**
   * Random stream for one candidate. Depends only on the seed and the
   * candidate id, never on processing order.
   */
  randomFor(candidateId: string): RandomSource {
    return mulberry32(hashSeed(`${this.seed}:${candidateId}`));
  }

  increment(counter: keyof BatchCounters, by = 1): void {
    this.counters[counter] += by;
  }
}
