import { Logger } from '@nestjs/common';
import { z } from 'zod';
import {
  errorMessage,
  fetchWithTimeout,
} from '../common/http/fetch-with-timeout';
import {
  EmailSender,
  OutgoingEmail,
  SendResult,
} from './interfaces/email-sender.interface';

export interface MailgunConfig {
  apiKey?: string;
  domain?: string;
  fromEmail?: string;
  fromName: string;
  timeoutMs?: number;
}

const MAILGUN_API = 'https://api.mailgun.net/v3';

const SendResponseSchema = z.object({ id: z.string().optional() });

/** Mailgun HTTP API sender (form-encoded POST, basic auth as `api:<key>`). */
export class MailgunSender implements EmailSender {
  readonly name = 'Mailgun';
  private readonly logger = new Logger(MailgunSender.name);

  constructor(private readonly config: MailgunConfig) {}

  isConfigured(): boolean {
    return Boolean(this.config.apiKey && this.config.domain);
  }

  async send(email: OutgoingEmail): Promise<SendResult> {
    const { apiKey, domain } = this.config;
    if (!apiKey || !domain) {
      return { success: false, error: 'Mailgun is not configured' };
    }

    const form = new URLSearchParams({
      from: `${this.config.fromName} <${this.config.fromEmail ?? `postmaster@${domain}`}>`,
      to: email.to,
      subject: email.subject,
      text: email.text,
    });
    if (email.cc) {
      form.set('cc', email.cc);
    }

    try {
      const { status, body } = await fetchWithTimeout(
        `${MAILGUN_API}/${domain}/messages`,
        {
          method: 'POST',
          headers: {
            Authorization: `Basic ${Buffer.from(`api:${apiKey}`).toString('base64')}`,
            'Content-Type': 'application/x-www-form-urlencoded',
          },
          body: form.toString(),
        },
        this.config.timeoutMs ?? 30_000,
      );

      if (status !== 200) {
        return { success: false, error: `HTTP ${status}: ${body}` };
      }

      const parsed = SendResponseSchema.safeParse(JSON.parse(body));
      return { success: true, id: parsed.success ? parsed.data.id : undefined };
    } catch (error: unknown) {
      this.logger.warn(`Mailgun request failed: ${errorMessage(error)}`);
      return { success: false, error: errorMessage(error) };
    }
  }
}
