/**
 * Resend Email Client
 *
 * Transactional email sending via the Resend API. Used when the batch runs
 * with TRIAGE_DELIVERY_MODE=resend.
 *
 * API Docs: https://resend.com/docs
 */

import { Resend } from 'resend';
import { TransportError } from '../../core/errors.js';
import type {
  TransactionalEmailConfig,
  SendTransactionalEmailParams,
  SendEmailResult,
  ITransactionalEmailClient,
} from './TransactionalTypes.js';

// =============================================================================
// RESEND CLIENT
// =============================================================================

export class ResendClient implements ITransactionalEmailClient {
  readonly provider = 'resend';
  private client: Resend;
  private config: TransactionalEmailConfig;

  constructor(config: TransactionalEmailConfig) {
    this.config = config;
    this.client = new Resend(config.apiKey);
  }

  /**
   * Send a transactional email via Resend
   */
  async send(params: SendTransactionalEmailParams): Promise<SendEmailResult> {
    const from = this.formatFromAddress(this.config.fromEmail, this.config.fromName);

    console.log(`[ResendClient] Sending email to ${params.to}: "${params.subject}"`);

    const response = await this.client.emails.send({
      from,
      to: [params.to],
      subject: params.subject,
      text: params.text,
      html: params.html ?? textToHtml(params.text),
      replyTo: params.replyTo || this.config.replyTo,
      tags: params.tags?.map((t) => ({ name: t.name, value: t.value })),
    });

    if (response.error) {
      console.error('[ResendClient] Send failed:', response.error.message);
      throw new TransportError(`Resend API error: ${response.error.message}`, true, {
        provider: this.provider,
        name: response.error.name,
      });
    }

    console.log(`[ResendClient] Email sent successfully, ID: ${response.data?.id}`);

    return {
      messageId: response.data?.id || '',
      status: 'queued',
      metadata: {
        provider: this.provider,
      },
    };
  }

  /**
   * Format from address as "Name <email>"
   */
  private formatFromAddress(email: string, name?: string): string {
    if (name) {
      return `${name} <${email}>`;
    }
    return email;
  }
}

function textToHtml(text: string): string {
  const escaped = text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
  return escaped
    .split(/\n{2,}/)
    .map((paragraph) => `<p>${paragraph.replace(/\n/g, '<br>')}</p>`)
    .join('\n');
}

// =============================================================================
// FACTORY
// =============================================================================

/**
 * Read Resend settings from environment variables. Returns null when the
 * API key or sender address is missing.
 */
export function resolveResendConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env
): TransactionalEmailConfig | null {
  const apiKey = env.RESEND_API_KEY;
  const fromEmail = env.EMAIL_FROM_ADDRESS;
  const fromName = env.EMAIL_FROM_NAME || 'Hiring Team';
  const replyTo = env.EMAIL_REPLY_TO;

  if (!apiKey || !fromEmail) {
    return null;
  }

  return { apiKey, fromEmail, fromName, replyTo };
}
