/**
 * Resend Client Tests
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { ResendClient, resolveResendConfigFromEnv } from '../../integrations/email/ResendClient.js';
import { SimulatedEmailClient } from '../../integrations/email/SimulatedEmailClient.js';
import { TransportError } from '../../core/errors.js';

interface ResendResponse {
  data: { id: string } | null;
  error: { message: string; name: string } | null;
}

const mockSend = jest.fn<(payload: Record<string, unknown>) => Promise<ResendResponse>>();

jest.mock('resend', () => ({
  Resend: jest.fn().mockImplementation(() => ({ emails: { send: mockSend } })),
}));

const config = {
  apiKey: 'test-secret',
  fromEmail: 'jobs@example.com',
  fromName: 'Hiring Team',
};

describe('ResendClient', () => {
  beforeEach(() => {
    mockSend.mockReset();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should send with a formatted sender and derived HTML', async () => {
    mockSend.mockResolvedValueOnce({ data: { id: 're_123' }, error: null });

    const result = await new ResendClient(config).send({
      to: 'ann@example.com',
      subject: 'Hello',
      text: 'Hello <there>\n\nLine',
    });

    expect(result).toEqual({ messageId: 're_123', status: 'queued', metadata: { provider: 'resend' } });
    expect(mockSend).toHaveBeenCalledWith({
      from: 'Hiring Team <jobs@example.com>',
      to: ['ann@example.com'],
      subject: 'Hello',
      text: 'Hello <there>\n\nLine',
      html: '<p>Hello &lt;there&gt;</p>\n<p>Line</p>',
      replyTo: undefined,
      tags: undefined,
    });
  });

  it('should raise a transport error when the API reports one', async () => {
    mockSend.mockResolvedValueOnce({ data: null, error: { message: 'bad key', name: 'validation_error' } });

    const sending = new ResendClient(config).send({ to: 'ann@example.com', subject: 'Hi', text: 'x' });

    await expect(sending).rejects.toBeInstanceOf(TransportError);
    await expect(sending).rejects.toThrow('Resend API error: bad key');
  });

  it('should read its settings from the environment', () => {
    expect(resolveResendConfigFromEnv({})).toBeNull();
    expect(
      resolveResendConfigFromEnv({
        RESEND_API_KEY: 'test-secret',
        EMAIL_FROM_ADDRESS: 'jobs@example.com',
        EMAIL_FROM_NAME: 'Crew Hiring',
        EMAIL_REPLY_TO: 'reply@example.com',
      })
    ).toEqual({
      apiKey: 'test-secret',
      fromEmail: 'jobs@example.com',
      fromName: 'Crew Hiring',
      replyTo: 'reply@example.com',
    });
  });
});

describe('SimulatedEmailClient', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should log and keep the message in its outbox', async () => {
    const client = new SimulatedEmailClient();

    const result = await client.send({ to: 'ann@example.com', subject: 'Survey', text: 'Hi' });

    expect(result.status).toBe('simulated');
    expect(result.messageId).toMatch(/^sim_/);
    expect(client.getOutbox()).toHaveLength(1);
    expect(console.log).toHaveBeenCalledWith('[SIMULATION] Email to ann@example.com: "Survey"');
  });
});
