import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { getToken } from '@willsoto/nestjs-prometheus';
import { EMAILS_SENT_TOTAL } from '../common/metrics.providers';
import * as timing from '../common/sleep';
import type { ProspectRow } from '../prospects/prospect-export';
import { CampaignConfigurationError } from './campaign.errors';
import { CampaignService } from './campaign.service';
import { EMAIL_SENDER } from './interfaces/email-sender.interface';

function row(company: string, email: string, website = `https://${company.toLowerCase()}.example`): ProspectRow {
  return {
    name: 'Jo Lee',
    title: 'CEO',
    company,
    website,
    email,
    country: 'US',
    industry: 'Technology',
    description: '',
  };
}

const CONFIG: Record<string, unknown> = {
  EMAIL_TEMPLATE_PATH: 'templates/outreach-email.txt',
  SCHEDULING_LINK: 'https://calendar.example.com/book',
  FROM_NAME: 'Sam',
  CC_EMAIL: undefined,
  CAMPAIGN_SEND_DELAY_MS: 3000,
};

describe('CampaignService', () => {
  let service: CampaignService;
  let mockSender: { name: string; isConfigured: jest.Mock; send: jest.Mock };
  let mockCounter: { inc: jest.Mock };
  let sleepSpy: jest.SpyInstance<Promise<void>, [number]>;

  beforeEach(async () => {
    mockSender = {
      name: 'Mock',
      isConfigured: jest.fn().mockReturnValue(true),
      send: jest.fn().mockResolvedValue({ success: true, id: 'id-1' }),
    };
    mockCounter = { inc: jest.fn() };
    sleepSpy = jest.spyOn(timing, 'sleep').mockResolvedValue(undefined);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CampaignService,
        { provide: EMAIL_SENDER, useValue: mockSender },
        {
          provide: ConfigService,
          useValue: { get: jest.fn((key: string) => CONFIG[key]) },
        },
        { provide: getToken(EMAILS_SENT_TOTAL), useValue: mockCounter },
      ],
    }).compile();

    service = module.get<CampaignService>(CampaignService);
    await service.onModuleInit();
  });

  afterEach(() => {
    sleepSpy.mockRestore();
  });

  describe('send', () => {
    it('sends in order and pauses only between sends', async () => {
      const result = await service.send([
        row('Acme', 'jo@acme.example'),
        row('Beta', 'jo@beta.example'),
        row('Gamma', 'jo@gamma.example'),
      ]);

      expect(result.emailsSent).toBe(3);
      expect(result.emailsFailed).toBe(0);
      expect(result.errors).toEqual([]);
      expect(result.runId).toMatch(/^[0-9a-f-]{36}$/);
      expect(mockSender.send.mock.calls.map(([email]) => email.to)).toEqual([
        'jo@acme.example',
        'jo@beta.example',
        'jo@gamma.example',
      ]);
      expect(sleepSpy).toHaveBeenCalledTimes(2);
      expect(sleepSpy).toHaveBeenCalledWith(3000);
      expect(mockCounter.inc).toHaveBeenCalledWith({ status: 'sent' });
    });

    it('sends the composed subject and body', async () => {
      await service.send([row('Acme', 'jo@acme.example')]);

      const [email] = mockSender.send.mock.calls[0];
      expect(email.subject).toBe('Quick intro: Acme x Sam');
      expect(email.text.startsWith('Hi Jo,\n')).toBe(true);
      expect(email.cc).toBeUndefined();
      expect(sleepSpy).not.toHaveBeenCalled();
    });

    it('counts missing addresses and rejected sends as failures', async () => {
      mockSender.send.mockResolvedValueOnce({ success: false, error: 'HTTP 400: bad address' });

      const result = await service.send([
        row('Acme', 'jo@acme'),
        row('Beta', ''),
        row('Gamma', 'jo@gamma.example'),
      ]);

      expect(result.emailsSent).toBe(1);
      expect(result.emailsFailed).toBe(2);
      expect(result.errors).toEqual([
        'Failed to send to jo@acme: HTTP 400: bad address',
        'Missing email for Beta',
      ]);
      expect(mockSender.send).toHaveBeenCalledTimes(2);
      expect(sleepSpy).toHaveBeenCalledTimes(2);
    });

    it('refuses to run without a configured sender', async () => {
      mockSender.isConfigured.mockReturnValue(false);

      await expect(service.send([row('Acme', 'jo@acme.example')])).rejects.toBeInstanceOf(
        CampaignConfigurationError,
      );
      expect(mockSender.send).not.toHaveBeenCalled();
    });
  });

  describe('preview', () => {
    it('renders the first rows and skips those without company or website', () => {
      const rows = [
        row('Acme', 'jo@acme.example'),
        row('NoSite', 'jo@nosite.example', ''),
        row('Beta', 'jo@beta.example'),
        row('Late', 'jo@late.example'),
      ];

      const previews = service.preview(rows, 3);

      expect(previews.map((p) => p.prospect.company)).toEqual(['Acme', 'Beta']);
      expect(previews[0].subject).toBe('Quick intro: Acme x Sam');
      expect(mockSender.send).not.toHaveBeenCalled();
    });

    it('defaults to five rows', () => {
      const rows = ['A', 'B', 'C', 'D', 'E', 'F'].map((c) => row(c, `x@${c}.example`));

      expect(service.preview(rows)).toHaveLength(5);
    });
  });
});
