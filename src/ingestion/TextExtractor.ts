/**
 * Text extraction contract. Implementations turn document bytes into plain
 * text or reject with ExtractionError.
 */

import type { SourceHandle } from './DocumentIngestion.js';

export interface TextExtractor {
  extractText(bytes: Buffer, handle: SourceHandle): Promise<string>;
}

/**
 * Unify line endings, drop a BOM and trailing spaces, collapse runs of
 * blank lines.
 */
export function normalizeText(text: string): string {
  return text
    .replace(/^\uFEFF/, '')
    .replace(/\r\n?/g, '\n')
    .replace(/[ \t]+$/gm, '')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}
