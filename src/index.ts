#!/usr/bin/env node
/**
 * Shiftline Triage - Main Entry Point
 *
 * Runs one triage batch over the inbound resume folder and exits.
 * Document-level failures end up as error rows and never change the exit
 * code.
 */

import 'dotenv/config';
import { isFatalError, describeError } from './core/errors.js';
import { TriagePipeline } from './core/pipeline/TriagePipeline.js';
import { loadTriageConfig, type DeliveryConfig } from './infrastructure/config/TriageConfig.js';
import { DocumentTextExtractor } from './ingestion/DocumentTextExtractor.js';
import {
  ResendClient,
  SimulatedEmailClient,
  type ITransactionalEmailClient,
} from './integrations/email/index.js';

// =============================================================================
// TRANSPORT
// =============================================================================

function createTransport(delivery: DeliveryConfig): ITransactionalEmailClient {
  if (delivery.mode === 'resend' && delivery.resend) {
    console.log('[Triage] Delivering notifications through Resend');
    return new ResendClient(delivery.resend);
  }
  console.log('[Triage] Delivering notifications in simulation mode');
  return new SimulatedEmailClient();
}

// =============================================================================
// STARTUP
// =============================================================================

async function start(): Promise<void> {
  console.log('[Triage] Loading configuration...');
  const config = await loadTriageConfig();

  console.log(`[Triage] Input:     ${config.paths.inputDir}`);
  console.log(`[Triage] Processed: ${config.paths.processedDir}`);
  console.log(`[Triage] Output:    ${config.paths.outputDir}`);

  const pipeline = new TriagePipeline({
    config,
    extractor: new DocumentTextExtractor(),
    transport: createTransport(config.delivery),
  });

  const summary = await pipeline.run();

  console.log(`\n[Triage] Documents processed: ${summary.documents} (${summary.failed} failed)`);
  console.log(
    `[Triage] Surveys sent: ${summary.counters.surveysSent}, ` +
      `responses: ${summary.counters.responsesReceived}, ` +
      `non-responders: ${summary.counters.nonResponders}`
  );
  console.log(`[Triage] Interview invitations sent: ${summary.counters.interviewsSent}`);
  console.log(`[Triage] Extracted data:  ${summary.files.extracted}`);
  console.log(`[Triage] Candidate table: ${summary.files.candidates}`);
  console.log(`[Triage] Summary report:  ${summary.files.summary}`);
}

// =============================================================================
// RUN
// =============================================================================

start().catch((error: unknown) => {
  if (isFatalError(error)) {
    console.error(`[Triage] ${error.message}`, error.details ?? '');
  } else {
    console.error('[Triage] Batch aborted:', describeError(error));
  }
  process.exitCode = 1;
});
