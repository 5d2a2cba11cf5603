/**
 * Transactional Email Types
 *
 * Types shared by the email transports used for candidate notifications.
 */

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface TransactionalEmailConfig {
  /** API key for the email provider */
  apiKey: string;
  /** Default from email address */
  fromEmail: string;
  /** Default from name */
  fromName: string;
  /** Reply-to email address */
  replyTo?: string;
}

// =============================================================================
// SEND TYPES
// =============================================================================

export interface SendTransactionalEmailParams {
  /** Recipient email address */
  to: string;
  /** Email subject line */
  subject: string;
  /** Plain text body */
  text: string;
  /** HTML body (derived from text when omitted) */
  html?: string;
  /** Override reply-to */
  replyTo?: string;
  /** Tags for categorization */
  tags?: EmailTag[];
}

export interface EmailTag {
  name: string;
  value: string;
}

export type TransactionalEmailStatus = 'queued' | 'sent' | 'simulated' | 'failed';

export interface SendEmailResult {
  /** Unique message ID from the provider */
  messageId: string;
  status: TransactionalEmailStatus;
  metadata?: Record<string, unknown>;
}

// =============================================================================
// INTERFACE
// =============================================================================

export interface ITransactionalEmailClient {
  /** Provider name, for logs and result metadata */
  readonly provider: string;

  /**
   * Send a transactional email. Rejects on delivery failure.
   */
  send(params: SendTransactionalEmailParams): Promise<SendEmailResult>;
}
