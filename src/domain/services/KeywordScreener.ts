/**
 * Keyword Screener
 *
 * Pass/fail gate on raw resume text. Each configured keyword counts once
 * when it appears anywhere in the text (case-insensitive substring match).
 */

export const DEFAULT_SCREENING_THRESHOLD = 2;

export interface ScreeningOutcome {
  hitCount: number;
  passed: boolean;
  /** Keywords present in the text, in keyword-list order */
  foundKeywords: string[];
}

export function screen(
  rawText: string,
  keywords: readonly string[],
  threshold: number = DEFAULT_SCREENING_THRESHOLD
): ScreeningOutcome {
  const haystack = rawText.toLowerCase();
  const foundKeywords = keywords.filter(
    (keyword) => keyword.length > 0 && haystack.includes(keyword.toLowerCase())
  );

  return {
    hitCount: foundKeywords.length,
    passed: foundKeywords.length >= threshold,
    foundKeywords,
  };
}
