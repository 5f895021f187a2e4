import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import { readFile } from 'fs/promises';
import type { Counter } from 'prom-client';
import { v4 as uuidv4 } from 'uuid';
import { EMAILS_SENT_TOTAL } from '../common/metrics.providers';
import * as timing from '../common/sleep';
import type { Env } from '../config/env.validation';
import type { ProspectRow } from '../prospects/prospect-export';
import { CampaignConfigurationError } from './campaign.errors';
import { EmailContent, buildEmailContext, composeEmail } from './email-composer';
import { EMAIL_SENDER, EmailSender } from './interfaces/email-sender.interface';

export interface EmailPreview {
  prospect: ProspectRow;
  subject: string;
  body: string;
  cc?: string;
}

export interface CampaignResult {
  runId: string;
  emailsSent: number;
  emailsFailed: number;
  errors: string[];
}

export const DEFAULT_PREVIEW_LIMIT = 5;

@Injectable()
export class CampaignService implements OnModuleInit {
  private readonly logger = new Logger(CampaignService.name);
  private template = '';

  constructor(
    @Inject(EMAIL_SENDER) private readonly sender: EmailSender,
    private readonly configService: ConfigService<Env, true>,
    @InjectMetric(EMAILS_SENT_TOTAL)
    private readonly emailsCounter: Counter<string>,
  ) {}

  async onModuleInit(): Promise<void> {
    const path = this.configService.get('EMAIL_TEMPLATE_PATH', { infer: true });
    this.template = await readFile(path, 'utf-8');
    this.logger.log(`Loaded email template from ${path}`);
  }

  /** Composes the message one prospect would receive. */
  compose(row: ProspectRow): EmailContent {
    const context = buildEmailContext(
      row,
      this.configService.get('SCHEDULING_LINK', { infer: true }),
      this.configService.get('FROM_NAME', { infer: true }),
    );
    return composeEmail(
      context,
      this.template,
      this.configService.get('CC_EMAIL', { infer: true }),
    );
  }

  /** Renders the first `limit` rows, skipping those without a company or website. */
  preview(
    rows: readonly ProspectRow[],
    limit: number = DEFAULT_PREVIEW_LIMIT,
  ): EmailPreview[] {
    return rows
      .slice(0, limit)
      .filter((row) => row.company.trim() && row.website.trim())
      .map((row) => ({ prospect: row, ...this.compose(row) }));
  }

  /** Sends one email per row in order, pausing between sends. */
  async send(rows: readonly ProspectRow[]): Promise<CampaignResult> {
    if (!this.sender.isConfigured()) {
      throw new CampaignConfigurationError();
    }

    const runId = uuidv4();
    const delayMs = this.configService.get('CAMPAIGN_SEND_DELAY_MS', {
      infer: true,
    });
    const result: CampaignResult = {
      runId,
      emailsSent: 0,
      emailsFailed: 0,
      errors: [],
    };

    this.logger.log(`Campaign ${runId}: sending to ${rows.length} prospects`);

    for (const [index, row] of rows.entries()) {
      await this.sendOne(row, result);

      if (index < rows.length - 1) {
        await timing.sleep(delayMs);
      }
    }

    this.logger.log(
      `Campaign ${runId} finished: ${result.emailsSent} sent, ${result.emailsFailed} failed`,
    );
    return result;
  }

  private async sendOne(row: ProspectRow, result: CampaignResult): Promise<void> {
    const to = row.email.trim();
    if (!to) {
      result.emailsFailed += 1;
      result.errors.push(`Missing email for ${row.company || row.name}`);
      this.emailsCounter.inc({ status: 'skipped' });
      return;
    }

    const content = this.compose(row);
    const outcome = await this.sender.send({
      to,
      subject: content.subject,
      text: content.body,
      cc: content.cc,
    });

    if (outcome.success) {
      result.emailsSent += 1;
      this.emailsCounter.inc({ status: 'sent' });
      this.logger.debug(`Sent to ${row.company} (${outcome.id ?? 'no id'})`);
    } else {
      result.emailsFailed += 1;
      result.errors.push(`Failed to send to ${to}: ${outcome.error ?? 'unknown error'}`);
      this.emailsCounter.inc({ status: 'failed' });
    }
  }
}
