// Mail relay client
// Posts outgoing messages as JSON to a webhook that owns actual delivery

import { z } from 'zod';
import { env } from '../env.js';

export interface MailMessage {
  to: string;
  subject: string;
  body: string;
  cc?: string;
}

export interface MailReceipt {
  messageId: string;
}

export interface Mailer {
  send(message: MailMessage, signal?: AbortSignal): Promise<MailReceipt>;
}

/**
 * status is the relay's HTTP status, or undefined when no response arrived.
 */
export class MailDeliveryError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'MailDeliveryError';
  }
}

const RelayResponseSchema = z.object({
  messageId: z.string().optional(),
  id: z.string().optional(),
});

export class WebhookMailer implements Mailer {
  constructor(
    private url: string,
    private from: string,
  ) {}

  async send(message: MailMessage, signal?: AbortSignal): Promise<MailReceipt> {
    let response: Response;
    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ from: this.from, ...message }),
        signal,
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new MailDeliveryError(`Mail relay unreachable: ${reason}`);
    }

    if (!response.ok) {
      const detail = await response.text();
      throw new MailDeliveryError(`Mail relay error: ${response.status} - ${detail}`, response.status);
    }

    const data = RelayResponseSchema.safeParse(await response.json());
    const messageId = data.success ? (data.data.messageId ?? data.data.id) : undefined;
    if (!messageId) {
      throw new MailDeliveryError('Mail relay accepted the message without returning an id', response.status);
    }
    return { messageId };
  }
}

export function createMailer(): Mailer | undefined {
  if (!env.MAIL_WEBHOOK_URL) {
    return undefined;
  }
  return new WebhookMailer(env.MAIL_WEBHOOK_URL, env.MAIL_FROM);
}
