/**
 * Document Ingestion
 *
 * Owns the inbound folder. Lists files not yet consumed, reads their bytes
 * and moves them to the processed folder once the batch has persisted its
 * results. A file whose name is already taken in the processed folder is
 * skipped when its content matches the archived copy, and otherwise listed
 * with a digest-suffixed archive name.
 */

import { createHash } from 'crypto';
import { promises as fs, type Dirent } from 'fs';
import * as path from 'path';
import { ExtractionError, InputUnavailableError, describeError } from '../core/errors.js';
import { isNotFound } from '../infrastructure/output/CsvTable.js';

// =============================================================================
// TYPES
// =============================================================================

export type DocumentFormat = 'pdf' | 'docx' | 'txt' | 'md';

export const SUPPORTED_FORMATS: readonly DocumentFormat[] = ['pdf', 'docx', 'txt', 'md'];

export interface SourceHandle {
  /** File name inside the input folder */
  name: string;
  path: string;
  format: DocumentFormat;
  /** File name the document gets inside the processed folder */
  archiveName: string;
}

export interface DocumentIngestionConfig {
  inputDir: string;
  processedDir: string;
  maxFileSizeBytes: number;
}

// =============================================================================
// IDS
// =============================================================================

/**
 * Lower-case slug of the file name without its extension.
 */
export function slugForFile(fileName: string): string {
  const base = path.basename(fileName, path.extname(fileName));
  const slug = base
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug || 'resume';
}

export function contentDigest(bytes: Buffer): string {
  return createHash('sha256').update(bytes).digest('hex').slice(0, 8);
}

/**
 * `cv.pdf` -> `cv-1a2b3c4d.pdf`
 */
export function suffixedName(fileName: string, digest: string): string {
  const ext = path.extname(fileName);
  return `${path.basename(fileName, ext)}-${digest}${ext}`;
}

export function detectFormat(fileName: string): DocumentFormat | null {
  const ext = path.extname(fileName).slice(1).toLowerCase();
  return SUPPORTED_FORMATS.find((format) => format === ext) ?? null;
}

// =============================================================================
// INGESTION
// =============================================================================

export class DocumentIngestion {
  constructor(private config: DocumentIngestionConfig) {}

  /**
   * Pending documents in file name order. Each call re-reads the folder.
   */
  async *listPending(): AsyncGenerator<SourceHandle> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.config.inputDir, { withFileTypes: true });
    } catch (error) {
      throw new InputUnavailableError(this.config.inputDir, error);
    }

    const processed = await this.listProcessed();
    const names = entries
      .filter((entry) => entry.isFile() && !entry.name.startsWith('.'))
      .map((entry) => entry.name)
      .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

    for (const name of names) {
      const format = detectFormat(name);
      if (!format) {
        console.log(`[DocumentIngestion] Skipping unsupported file: ${name}`);
        continue;
      }

      const archiveName = processed.has(name)
        ? await this.resolveCollision(name, processed)
        : name;
      if (archiveName) {
        yield { name, path: path.join(this.config.inputDir, name), format, archiveName };
      }
    }
  }

  /**
   * Read the document's bytes.
   */
  async claim(handle: SourceHandle): Promise<Buffer> {
    let size: number;
    try {
      size = (await fs.stat(handle.path)).size;
    } catch (error) {
      throw new ExtractionError(`Document unavailable: ${handle.name}`, 'EXTRACTION_UNAVAILABLE', {
        file: handle.name,
        cause: describeError(error),
      });
    }

    if (size > this.config.maxFileSizeBytes) {
      throw new ExtractionError(
        `File too large: ${size} bytes (max: ${this.config.maxFileSizeBytes})`,
        'FILE_TOO_LARGE',
        { file: handle.name, size }
      );
    }

    try {
      return await fs.readFile(handle.path);
    } catch (error) {
      throw new ExtractionError(`Document unavailable: ${handle.name}`, 'EXTRACTION_UNAVAILABLE', {
        file: handle.name,
        cause: describeError(error),
      });
    }
  }

  /**
   * Move the document into the processed folder. Returns false when it
   * was already moved.
   */
  async archive(handle: SourceHandle): Promise<boolean> {
    const destination = path.join(this.config.processedDir, handle.archiveName);
    await fs.mkdir(this.config.processedDir, { recursive: true });

    try {
      await fs.rename(handle.path, destination);
      return true;
    } catch (error) {
      if (isNotFound(error) && (await exists(destination))) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Archive name for an inbound file whose name is already taken in the
   * processed folder, or null when the same content is already archived.
   */
  private async resolveCollision(name: string, processed: Set<string>): Promise<string | null> {
    const digest = await digestOf(path.join(this.config.inputDir, name));
    if (digest === undefined) {
      console.warn(
        `[DocumentIngestion] ${name} is unreadable and its name is already archived, skipping`
      );
      return null;
    }

    const archiveName = suffixedName(name, digest);
    const archivedDigest = await digestOf(path.join(this.config.processedDir, name));
    if (digest === archivedDigest || processed.has(archiveName)) {
      console.warn(`[DocumentIngestion] ${name} is already archived, skipping`);
      return null;
    }

    console.warn(
      `[DocumentIngestion] ${name} differs from the archived file of that name, archiving as ${archiveName}`
    );
    return archiveName;
  }

  private async listProcessed(): Promise<Set<string>> {
    try {
      return new Set(await fs.readdir(this.config.processedDir));
    } catch (error) {
      if (isNotFound(error)) {
        return new Set();
      }
      throw new InputUnavailableError(this.config.processedDir, error);
    }
  }
}

async function digestOf(file: string): Promise<string | undefined> {
  try {
    return contentDigest(await fs.readFile(file));
  } catch (error) {
    console.warn(`[DocumentIngestion] Cannot read ${file}: ${describeError(error)}`);
    return undefined;
  }
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}
