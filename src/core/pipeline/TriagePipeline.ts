/**
 * Triage Pipeline
 *
 * Drives one batch over the inbound folder:
 *
 *   1. Ingest + extract every pending document, persist extracted_resumes.csv
 *   2. Screen -> survey -> classify -> interview invite, persist output_candidates.csv
 *   3. Write the summary report
 *   4. Archive every consumed document
 *
 * Archival is last, so an interrupted batch leaves its documents in place
 * and the next run picks them up again; the tables are upserted by id, so
 * that rerun does not duplicate rows. An id already written for a different
 * source file is never handed out again.
 */

import {
  createCandidateRecord,
  setRawText,
  type CandidateRecord,
  type Priority,
} from '../../domain/entities/Candidate.js';
import { extract } from '../../domain/services/FieldExtractor.js';
import { screen } from '../../domain/services/KeywordScreener.js';
import { SurveySimulator } from '../../domain/services/SurveySimulator.js';
import { applyPriority } from '../../domain/services/PriorityScorer.js';
import { NotificationService, type Sleep } from '../../domain/services/NotificationService.js';
import {
  DocumentIngestion,
  contentDigest,
  slugForFile,
  type SourceHandle,
} from '../../ingestion/DocumentIngestion.js';
import type { TextExtractor } from '../../ingestion/TextExtractor.js';
import type { ITransactionalEmailClient } from '../../integrations/email/TransactionalTypes.js';
import type { TriageConfig } from '../../infrastructure/config/TriageConfig.js';
import {
  CANDIDATES_FILE,
  EXTRACTED_FILE,
  openCandidateTables,
  toCandidateRow,
  toExtractedRow,
  type CandidateTables,
} from '../../infrastructure/output/CandidateTables.js';
import { buildSummary, writeSummary } from '../../infrastructure/output/SummaryReport.js';
import { ExtractionError, describeError } from '../errors.js';
import { BatchRunContext, type BatchCounters } from './BatchRunContext.js';
import { advanceStage, hasReached } from './StageMachine.js';

// =============================================================================
// TYPES
// =============================================================================

export interface TriagePipelineOptions {
  config: Pick<TriageConfig, 'paths' | 'keywords' | 'settings' | 'surveyTable'>;
  extractor: TextExtractor;
  transport: ITransactionalEmailClient;
  sleep?: Sleep;
}

export interface BatchSummary {
  runId: string;
  startedAt: Date;
  finishedAt: Date;
  documents: number;
  failed: number;
  byPriority: Record<Priority, number>;
  counters: BatchCounters;
  files: {
    extracted: string;
    candidates: string;
    summary: string;
  };
}

interface IngestedDocument {
  handle: SourceHandle;
  record: CandidateRecord;
}

// =============================================================================
// PIPELINE
// =============================================================================

export class TriagePipeline {
  private config: TriagePipelineOptions['config'];
  private extractor: TextExtractor;
  private ingestion: DocumentIngestion;
  private simulator: SurveySimulator;
  private notifications: NotificationService;
  private tables: CandidateTables;

  constructor(options: TriagePipelineOptions) {
    this.config = options.config;
    this.extractor = options.extractor;

    const { paths, settings } = options.config;
    this.ingestion = new DocumentIngestion({
      inputDir: paths.inputDir,
      processedDir: paths.processedDir,
      maxFileSizeBytes: settings.ingestion.maxFileSizeBytes,
    });
    this.simulator = new SurveySimulator(settings.survey, options.config.surveyTable);
    this.notifications = new NotificationService({
      transport: options.transport,
      settings: settings.notifications,
      surveyUrl: settings.survey.surveyUrl,
      sleep: options.sleep,
    });
    this.tables = openCandidateTables(paths.outputDir);
  }

  /**
   * Run one batch. Throws only for fatal conditions (input folder
   * unreadable, output not writable); per-document problems are recorded
   * on the records.
   */
  async run(
    context: BatchRunContext = new BatchRunContext({ seed: this.config.settings.survey.seed })
  ): Promise<BatchSummary> {
    console.log(`[TriagePipeline] Batch ${context.runId} started`);

    // Phase 1: ingest and extract
    const documents: IngestedDocument[] = [];
    const idOwners = await this.loadIdOwners();
    for await (const handle of this.ingestion.listPending()) {
      documents.push(await this.ingest(handle, idOwners, context));
    }

    const records = documents.map((doc) => doc.record);
    const extracted = await this.tables.extracted.upsert(records.map(toExtractedRow));
    console.log(
      `[TriagePipeline] ${EXTRACTED_FILE}: ${extracted.inserted} new, ${extracted.updated} updated`
    );

    // Phase 2: screen, survey, classify, notify
    for (const record of records) {
      await this.processRecord(record, context);
    }

    const candidates = await this.tables.candidates.upsert(records.map(toCandidateRow));
    console.log(
      `[TriagePipeline] ${CANDIDATES_FILE}: ${candidates.inserted} new, ${candidates.updated} updated`
    );

    // Phase 3: report from the persisted table
    const summary = buildSummary(await this.tables.candidates.read(), context.runId);
    const summaryFile = await writeSummary(this.config.paths.outputDir, summary);

    // Phase 4: archive
    for (const { handle } of documents) {
      try {
        if (await this.ingestion.archive(handle)) {
          context.increment('archived');
        }
      } catch (error) {
        console.error(`[TriagePipeline] Could not archive ${handle.name}: ${describeError(error)}`);
      }
    }

    const byPriority: Record<Priority, number> = { High: 0, Medium: 0, Low: 0, Unscreened: 0 };
    for (const record of records) {
      byPriority[record.priority]++;
    }

    console.log(
      `[TriagePipeline] Batch ${context.runId} done: ${records.length} documents, ` +
        `High ${byPriority.High}, Medium ${byPriority.Medium}, Low ${byPriority.Low}, ` +
        `Unscreened ${byPriority.Unscreened}`
    );

    return {
      runId: context.runId,
      startedAt: context.startedAt,
      finishedAt: new Date(),
      documents: records.length,
      failed: context.counters.extractionFailures,
      byPriority,
      counters: { ...context.counters },
      files: {
        extracted: extracted.path,
        candidates: candidates.path,
        summary: summaryFile,
      },
    };
  }

  /**
   * Read and extract one document. Extraction failures are recorded on the
   * record, which then stays at Ingested.
   */
  async ingest(
    handle: SourceHandle,
    idOwners: Map<string, string>,
    context: BatchRunContext
  ): Promise<IngestedDocument> {
    context.increment('documentsSeen');

    let bytes: Buffer | undefined;
    let failure: unknown;
    try {
      bytes = await this.ingestion.claim(handle);
    } catch (error) {
      failure = error;
    }

    const record = createCandidateRecord(
      this.assignId(handle, bytes ?? Buffer.from(handle.name), idOwners),
      handle.archiveName
    );

    if (bytes) {
      try {
        const text = await this.extractor.extractText(bytes, handle);
        if (!text.trim()) {
          throw new ExtractionError(`No text found in ${handle.name}`, 'EMPTY_DOCUMENT', {
            file: handle.name,
          });
        }
        setRawText(record, text);
        record.fields = extract(text);
        advanceStage(record, 'Extracted');
      } catch (error) {
        failure = error;
      }
    }

    if (failure !== undefined) {
      context.increment('extractionFailures');
      record.error = {
        code: failure instanceof ExtractionError ? failure.extractionCode : 'EXTRACTION_FAILED',
        message: describeError(failure),
      };
      console.warn(`[TriagePipeline] ${handle.name}: ${record.error.message}`);
    }

    return { handle, record };
  }

  /**
   * Advance one record as far as it can go. Stages already reached are
   * not repeated.
   */
  async processRecord(record: CandidateRecord, context: BatchRunContext): Promise<void> {
    if (!hasReached(record, 'Extracted') || record.rawText === undefined) {
      return;
    }

    if (!hasReached(record, 'Screened')) {
      const { screening } = this.config.settings;
      const result = screen(record.rawText, this.config.keywords, screening.threshold);
      record.keywordHits = result.hitCount;
      record.foundKeywords = result.foundKeywords;
      record.screeningPassed = result.passed;
      advanceStage(record, 'Screened');
      if (result.passed) {
        context.increment('screenedIn');
      }
    }

    if (record.screeningPassed && !hasReached(record, 'Surveyed')) {
      await this.notifications.notify(record, 'Survey', context);
      const response = this.simulator.simulate(record.id, context, record.fields?.email);
      if (response) {
        record.survey = response;
      }
      advanceStage(record, 'Surveyed');
    }

    if (!hasReached(record, 'Classified')) {
      applyPriority(record, this.config.settings.scoring);
      advanceStage(record, 'Classified');
    }

    if (
      !hasReached(record, 'Notified') &&
      (record.priority === 'High' || record.priority === 'Medium')
    ) {
      const attempt = await this.notifications.notify(record, 'Interview', context);
      if (attempt.outcome === 'sent' || attempt.outcome === 'failed') {
        advanceStage(record, 'Notified');
      }
    }
  }

  /**
   * Ids already written by earlier runs, mapped to the source file that
   * owns them.
   */
  private async loadIdOwners(): Promise<Map<string, string>> {
    const owners = new Map<string, string>();
    for (const row of await this.tables.extracted.read()) {
      owners.set(row.id, row.source_file);
    }
    for (const row of await this.tables.candidates.read()) {
      owners.set(row.id, row.source_file);
    }
    return owners;
  }

  /**
   * The slug, unless another source file owns it; then the slug with the
   * content digest, then with a counter.
   */
  private assignId(handle: SourceHandle, bytes: Buffer, idOwners: Map<string, string>): string {
    const slug = slugForFile(handle.name);
    const digest = contentDigest(bytes);

    let id = slug;
    for (let n = 1; ; n++) {
      const owner = idOwners.get(id);
      if (owner === undefined || owner === handle.archiveName) {
        idOwners.set(id, handle.archiveName);
        return id;
      }
      id = n === 1 ? `${slug}-${digest}` : `${slug}-${digest}-${n}`;
    }
  }
}
