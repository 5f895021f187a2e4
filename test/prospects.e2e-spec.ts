import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication, ValidationPipe } from '@nestjs/common';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import request from 'supertest';
import {
  CompletionResult,
  LLM_REGISTRY,
  LlmProvider,
  completionSuccess,
} from './../src/llm/interfaces/llm-provider.interface';
import { LlmRegistry } from './../src/llm/llm-registry';
import { EMAIL_SENDER } from './../src/campaign/interfaces/email-sender.interface';

const ACME_RESPONSE = JSON.stringify({
  companies: [
    {
      name: 'Acme',
      website: 'https://acme.example',
      country: 'US',
      industry: 'Gaming',
      contact_name: 'Jo Lee',
      contact_title: 'CEO',
      contact_email: 'jo@acme.example',
      description: 'Arcade cabinets',
    },
  ],
});

class FakeProvider implements LlmProvider {
  readonly name = 'Fake';
  readonly model = 'fake-model';
  readonly generate = jest.fn(
    (): Promise<CompletionResult> =>
      Promise.resolve(completionSuccess(this, ACME_RESPONSE)),
  );

  isAvailable(): Promise<boolean> {
    return Promise.resolve(true);
  }
}

describe('Prospects and campaigns (e2e)', () => {
  let app: INestApplication;
  let dir: string;
  const provider = new FakeProvider();
  const mockSender = {
    name: 'Mock',
    isConfigured: jest.fn().mockReturnValue(false),
    send: jest.fn().mockResolvedValue({ success: true, id: 'id-1' }),
  };

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'outreach-e2e-'));
    process.env.PROSPECTS_CSV_PATH = join(dir, 'prospects.csv');
    process.env.CAMPAIGN_SEND_DELAY_MS = '0';

    // Env is validated when the module is first loaded.
    const { AppModule } = await import('./../src/app.module');
    const registry = await LlmRegistry.create([provider]);

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(LLM_REGISTRY)
      .useValue(registry)
      .overrideProvider(EMAIL_SENDER)
      .useValue(mockSender)
      .compile();

    app = moduleFixture.createNestApplication();
    app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
    await app.init();
  });

  afterAll(async () => {
    if (app) {
      await app.close();
    }
    await rm(dir, { recursive: true, force: true });
  });

  it('/prospects/export (GET) - nothing exported yet', async () => {
    await request(app.getHttpServer()).get('/prospects/export').expect(404);
  });

  it('/campaigns (POST) - nothing exported yet', async () => {
    const preview = await request(app.getHttpServer())
      .post('/campaigns/preview')
      .send({})
      .expect(404);
    await request(app.getHttpServer()).post('/campaigns/send').send({}).expect(404);

    expect(preview.body.message).toBe(
      `No prospects exported yet (${join(dir, 'prospects.csv')})`,
    );
  });

  it('/prospects/providers (GET)', async () => {
    const response = await request(app.getHttpServer())
      .get('/prospects/providers')
      .expect(200);

    expect(response.body).toEqual({ providers: ['Fake'] });
  });

  it('/prospects/generate (POST) - companies from the model', async () => {
    const response = await request(app.getHttpServer())
      .post('/prospects/generate')
      .send({ icp: 'gaming companies in the US', count: 2 })
      .expect(200);

    expect(response.body.source).toBe('llm');
    expect(response.body.companies).toHaveLength(1);
    expect(response.body.companies[0].name).toBe('Acme');
  });

  it('/prospects/generate (POST) - Validation Error', async () => {
    await request(app.getHttpServer())
      .post('/prospects/generate')
      .send({ icp: '' })
      .expect(400);

    await request(app.getHttpServer())
      .post('/prospects/generate')
      .send({ icp: 'gaming', count: 100 })
      .expect(400);
  });

  it('/prospects/generate (POST) - rate limited', async () => {
    provider.generate.mockResolvedValueOnce({
      text: '',
      model: 'fake-model',
      provider: 'Fake',
      succeeded: false,
      error: 'HTTP 429: Too Many Requests',
    });

    const response = await request(app.getHttpServer())
      .post('/prospects/generate')
      .send({ icp: 'gaming companies in the US' })
      .expect(429);

    expect(response.body).toEqual({
      statusCode: 429,
      message: 'Rate limit exceeded. Please wait a moment and try again.',
    });
  });

  it('/prospects/generate (POST) - catalog only', async () => {
    const calls = provider.generate.mock.calls.length;

    const response = await request(app.getHttpServer())
      .post('/prospects/generate')
      .send({ icp: 'gaming companies in the US', count: 2, fallbackOnly: true })
      .expect(200);

    expect(response.body.source).toBe('fallback');
    expect(response.body.companies.map((c: { name: string }) => c.name)).toEqual([
      'Pixelhaven Games',
      'Riftwell Studios',
    ]);
    expect(provider.generate.mock.calls.length).toBe(calls);
  });

  it('/prospects/export (GET) - last generated prospects', async () => {
    const response = await request(app.getHttpServer())
      .get('/prospects/export')
      .expect('Content-Type', /text\/csv/)
      .expect(200);

    expect(response.text.split('\r\n')[0]).toBe(
      'name,title,company,website,email,country,industry,description',
    );
    expect(response.text.split('\r\n')[1]).toBe(
      'Caleb Stone,CEO,Pixelhaven Games,https://pixelhaven.example,caleb@pixelhaven.example,US,Gaming,Developer and publisher of cross-platform battle games',
    );
  });

  it('/campaigns/preview (POST) - from the exported file', async () => {
    const response = await request(app.getHttpServer())
      .post('/campaigns/preview')
      .send({})
      .expect(200);

    expect(response.body.total).toBe(2);
    expect(response.body.previews[0].subject).toBe(
      'Quick intro: Pixelhaven Games x Outreach',
    );
    expect(response.body.previews[0].body.startsWith('Hi Caleb,\n')).toBe(true);
  });

  it('/campaigns/send (POST) - sender not configured', async () => {
    const response = await request(app.getHttpServer())
      .post('/campaigns/send')
      .send({})
      .expect(400);

    expect(response.body.message).toBe(
      'Email delivery is not configured: set MAILGUN_API_KEY and MAILGUN_DOMAIN',
    );
    expect(mockSender.send).not.toHaveBeenCalled();
  });

  it('/campaigns/send (POST) - given prospects', async () => {
    mockSender.isConfigured.mockReturnValue(true);

    const response = await request(app.getHttpServer())
      .post('/campaigns/send')
      .send({
        prospects: [
          { name: 'Jo Lee', company: 'Acme', email: 'jo@acme.example' },
          { name: 'Ann Roe', company: 'Beta' },
        ],
      })
      .expect(200);

    expect(response.body).toMatchObject({
      emailsSent: 1,
      emailsFailed: 1,
      errors: ['Missing email for Beta'],
    });
    expect(mockSender.send).toHaveBeenCalledTimes(1);
  });

  it('/prospects/export (GET) - file without the required headers', async () => {
    await writeFile(join(dir, 'prospects.csv'), 'company,website\nAcme,https://acme.example\n');

    await request(app.getHttpServer()).get('/prospects/export').expect(422);
    const response = await request(app.getHttpServer())
      .post('/campaigns/preview')
      .send({})
      .expect(422);

    expect(response.body.message).toBe(
      'Missing required headers: name, title, email, country',
    );
  });

  it('/metrics (GET)', async () => {
    const response = await request(app.getHttpServer()).get('/metrics').expect(200);

    expect(response.text).toContain('prospects_generated_total{source="llm"} 1');
  });
});
