/**
 * Simulated Email Client
 *
 * Default notification transport. Logs what would be sent and keeps an
 * in-memory outbox; nothing leaves the process.
 */

import { v4 as uuid } from 'uuid';
import type {
  ITransactionalEmailClient,
  SendEmailResult,
  SendTransactionalEmailParams,
} from './TransactionalTypes.js';

export interface SimulatedMessage extends SendTransactionalEmailParams {
  messageId: string;
  sentAt: Date;
}

export class SimulatedEmailClient implements ITransactionalEmailClient {
  readonly provider = 'simulated';
  private outbox: SimulatedMessage[] = [];

  async send(params: SendTransactionalEmailParams): Promise<SendEmailResult> {
    const messageId = `sim_${uuid()}`;
    this.outbox.push({ ...params, messageId, sentAt: new Date() });

    console.log(`[SIMULATION] Email to ${params.to}: "${params.subject}"`);

    return {
      messageId,
      status: 'simulated',
      metadata: { provider: this.provider },
    };
  }

  getOutbox(): readonly SimulatedMessage[] {
    return this.outbox;
  }
}
