/**
 * Notification Service
 *
 * Sends the two candidate emails of a batch:
 * - Survey: to every candidate that passed keyword screening
 * - Interview: to High and Medium candidates
 *
 * Calls that fail a precondition never reach the transport. Transport
 * calls are bounded by a timeout and retried with exponential backoff; the
 * final outcome is appended to the record's notification log either way.
 */

import {
  UNKNOWN,
  type CandidateRecord,
  type NotificationAttempt,
  type NotificationKind,
  type NotificationOutcome,
} from '../entities/Candidate.js';
import { TransportError, describeError } from '../../core/errors.js';
import type { BatchRunContext } from '../../core/pipeline/BatchRunContext.js';
import type {
  ITransactionalEmailClient,
  SendEmailResult,
  SendTransactionalEmailParams,
} from '../../integrations/email/TransactionalTypes.js';
import type {
  NotificationSettings,
  NotificationTemplate,
} from '../../infrastructure/config/settingsSchema.js';

// =============================================================================
// TYPES
// =============================================================================

export type Sleep = (ms: number) => Promise<void>;

export interface NotificationServiceOptions {
  transport: ITransactionalEmailClient;
  settings: NotificationSettings;
  surveyUrl: string;
  sleep?: Sleep;
}

export interface RenderedMessage {
  subject: string;
  text: string;
}

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

// =============================================================================
// TEMPLATES
// =============================================================================

/**
 * Replace `{{name}}` style placeholders. Unknown placeholders are left as-is.
 */
export function renderTemplate(template: string, variables: Record<string, string>): string {
  return template.replace(/\{\{\s*(\w+)\s*\}\}/g, (placeholder: string, key: string) =>
    Object.prototype.hasOwnProperty.call(variables, key) ? variables[key] : placeholder
  );
}

/**
 * DD/MM/YYYY in UTC.
 */
export function formatInterviewDate(date: Date): string {
  const day = String(date.getUTCDate()).padStart(2, '0');
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  return `${day}/${month}/${date.getUTCFullYear()}`;
}

export function interviewDateFor(startedAt: Date, leadDays: number): Date {
  const date = new Date(startedAt.getTime());
  date.setUTCDate(date.getUTCDate() + leadDays);
  return date;
}

// =============================================================================
// SERVICE
// =============================================================================

export class NotificationService {
  private transport: ITransactionalEmailClient;
  private settings: NotificationSettings;
  private surveyUrl: string;
  private sleep: Sleep;

  constructor(options: NotificationServiceOptions) {
    this.transport = options.transport;
    this.settings = options.settings;
    this.surveyUrl = options.surveyUrl;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Attempt one notification and append the outcome to the record.
   */
  async notify(
    record: CandidateRecord,
    kind: NotificationKind,
    context: BatchRunContext
  ): Promise<NotificationAttempt> {
    const refusal = this.checkPreconditions(record, kind);
    if (refusal) {
      return this.log(record, { kind, outcome: refusal, attempts: 0, at: new Date() });
    }

    const email = record.fields?.email ?? UNKNOWN;
    const message = this.render(record, kind, context);
    const { maxAttempts, baseDelayMs } = this.settings.retry;

    let lastError: unknown;
    let attempts = 0;

    while (attempts < maxAttempts) {
      attempts++;
      try {
        const result = await this.sendWithTimeout({
          to: email,
          subject: message.subject,
          text: message.text,
          tags: [
            { name: 'kind', value: kind.toLowerCase() },
            { name: 'run', value: context.runId },
          ],
        });

        context.increment(kind === 'Survey' ? 'surveysSent' : 'interviewsSent');
        return this.log(record, {
          kind,
          outcome: 'sent',
          attempts,
          messageId: result.messageId,
          at: new Date(),
        });
      } catch (error) {
        lastError = error;
        console.warn(
          `[NotificationService] ${kind} to ${record.id} attempt ${attempts}/${maxAttempts} failed: ${describeError(error)}`
        );
        if (error instanceof TransportError && !error.retryable) {
          break;
        }
        if (attempts < maxAttempts) {
          await this.sleep(baseDelayMs * Math.pow(2, attempts - 1));
        }
      }
    }

    context.increment('notificationFailures');
    console.error(`[NotificationService] ${kind} to ${record.id} failed after ${attempts} attempt(s)`);
    return this.log(record, {
      kind,
      outcome: 'failed',
      attempts,
      error: describeError(lastError),
      at: new Date(),
    });
  }

  render(record: CandidateRecord, kind: NotificationKind, context: BatchRunContext): RenderedMessage {
    const template: NotificationTemplate =
      kind === 'Survey' ? this.settings.templates.survey : this.settings.templates.interview;

    const name = record.fields?.name;
    const variables: Record<string, string> = {
      name: name && name !== UNKNOWN ? name : 'Candidate',
      surveyUrl: this.surveyUrl,
      interviewDate: formatInterviewDate(
        interviewDateFor(context.startedAt, this.settings.interviewLeadDays)
      ),
      interviewTime: this.settings.interviewTime,
      interviewLocation: this.settings.interviewLocation,
      priority: record.priority,
    };

    return {
      subject: renderTemplate(template.subject, variables),
      text: renderTemplate(template.body, variables),
    };
  }

  private checkPreconditions(
    record: CandidateRecord,
    kind: NotificationKind
  ): NotificationOutcome | null {
    if (kind === 'Survey' && record.screeningPassed !== true) {
      return 'skipped_precondition';
    }
    if (kind === 'Interview' && record.priority !== 'High' && record.priority !== 'Medium') {
      return 'skipped_precondition';
    }

    const email = record.fields?.email;
    if (!email || email === UNKNOWN) {
      return 'skipped_no_email';
    }

    if (kind === 'Interview' && record.survey?.interest === 'not_interested') {
      return 'skipped_declined';
    }

    return null;
  }

  private async sendWithTimeout(params: SendTransactionalEmailParams): Promise<SendEmailResult> {
    const { timeoutMs } = this.settings.retry;
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new TransportError(`${this.transport.provider} send timed out after ${timeoutMs}ms`)),
        timeoutMs
      );
    });

    try {
      return await Promise.race([this.transport.send(params), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private log(record: CandidateRecord, attempt: NotificationAttempt): NotificationAttempt {
    record.notifications.push(attempt);
    if (attempt.outcome !== 'sent' && attempt.outcome !== 'failed') {
      console.log(`[NotificationService] ${attempt.kind} for ${record.id}: ${attempt.outcome}`);
    }
    return attempt;
  }
}
