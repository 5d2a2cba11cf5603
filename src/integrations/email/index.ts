/**
 * Email Integration Module
 *
 * Two transports behind ITransactionalEmailClient:
 *
 * 1. SimulatedEmailClient (default)
 *    - Logs and records messages in memory
 *
 * 2. ResendClient (Transactional)
 *    - Resend API, enabled with TRIAGE_DELIVERY_MODE=resend
 */

export type {
  TransactionalEmailConfig,
  SendTransactionalEmailParams,
  SendEmailResult,
  TransactionalEmailStatus,
  EmailTag,
  ITransactionalEmailClient,
} from './TransactionalTypes.js';

export { SimulatedEmailClient, type SimulatedMessage } from './SimulatedEmailClient.js';

export { ResendClient, resolveResendConfigFromEnv } from './ResendClient.js';
