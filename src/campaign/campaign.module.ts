import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { campaignMetricsProviders } from '../common/metrics.providers';
import type { Env } from '../config/env.validation';
import { ProspectsModule } from '../prospects/prospects.module';
import { CampaignController } from './campaign.controller';
import { CampaignService } from './campaign.service';
import { EMAIL_SENDER } from './interfaces/email-sender.interface';
import { MailgunSender } from './mailgun.sender';

@Module({
  imports: [ConfigModule, ProspectsModule],
  controllers: [CampaignController],
  providers: [
    CampaignService,
    ...campaignMetricsProviders,
    {
      provide: EMAIL_SENDER,
      useFactory: (configService: ConfigService<Env, true>) =>
        new MailgunSender({
          apiKey: configService.get('MAILGUN_API_KEY', { infer: true }),
          domain: configService.get('MAILGUN_DOMAIN', { infer: true }),
          fromEmail: configService.get('FROM_EMAIL', { infer: true }),
          fromName: configService.get('FROM_NAME', { infer: true }),
        }),
      inject: [ConfigService],
    },
  ],
  exports: [CampaignService],
})
export class CampaignModule {}
