/**
 * Keyword Screener Tests
 */

import { describe, it, expect } from '@jest/globals';
import { screen } from '../../domain/services/KeywordScreener.js';

const KEYWORDS = ['customer service', 'food safety', 'cashier'];

describe('KeywordScreener', () => {
  it('should count each keyword once regardless of repeats', () => {
    const text = 'Experienced in Customer Service. Food safety certified. FOOD SAFETY again.';

    expect(screen(text, KEYWORDS, 2)).toEqual({
      hitCount: 2,
      passed: true,
      foundKeywords: ['customer service', 'food safety'],
    });
  });

  it('should fail below the threshold', () => {
    const result = screen('Cashier at a corner shop', KEYWORDS, 2);

    expect(result.hitCount).toBe(1);
    expect(result.passed).toBe(false);
  });

  it('should pass exactly at the threshold', () => {
    expect(screen('cashier, customer service', KEYWORDS, 2).passed).toBe(true);
  });

  it('should default the threshold to 2', () => {
    expect(screen('cashier', KEYWORDS).passed).toBe(false);
    expect(screen('cashier and customer service', KEYWORDS).passed).toBe(true);
  });

  it('should be deterministic', () => {
    const text = 'customer service and food safety';
    expect(screen(text, KEYWORDS, 2)).toEqual(screen(text, KEYWORDS, 2));
  });

  it('should ignore empty keywords', () => {
    expect(screen('anything', ['', 'cook'], 1)).toEqual({
      hitCount: 0,
      passed: false,
      foundKeywords: [],
    });
  });
});
