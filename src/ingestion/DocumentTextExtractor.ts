/**
 * Default Text Extractor
 *
 * PDF goes through pdf-parse, DOCX through mammoth, text and markdown are
 * decoded as UTF-8. A document that yields no text is an EMPTY_DOCUMENT
 * error.
 */

import pdf from 'pdf-parse';
import * as mammoth from 'mammoth';
import { ExtractionError, describeError } from '../core/errors.js';
import type { DocumentFormat, SourceHandle } from './DocumentIngestion.js';
import { normalizeText, type TextExtractor } from './TextExtractor.js';

export class DocumentTextExtractor implements TextExtractor {
  async extractText(bytes: Buffer, handle: SourceHandle): Promise<string> {
    let text: string;
    try {
      text = await this.extractByFormat(bytes, handle.format);
    } catch (error) {
      throw new ExtractionError(
        `Could not extract text from ${handle.name}: ${describeError(error)}`,
        'EXTRACTION_FAILED',
        { file: handle.name, format: handle.format }
      );
    }

    const normalized = normalizeText(text);
    if (!normalized) {
      throw new ExtractionError(`No text found in ${handle.name}`, 'EMPTY_DOCUMENT', {
        file: handle.name,
      });
    }
    return normalized;
  }

  private async extractByFormat(bytes: Buffer, format: DocumentFormat): Promise<string> {
    switch (format) {
      case 'txt':
      case 'md':
        return bytes.toString('utf-8');
      case 'pdf': {
        const data = await pdf(bytes);
        return data.text;
      }
      case 'docx': {
        const result = await mammoth.extractRawText({ buffer: bytes });
        return result.value;
      }
    }
  }
}
