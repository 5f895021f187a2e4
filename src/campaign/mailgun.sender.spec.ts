import { MailgunSender } from './mailgun.sender';

describe('MailgunSender', () => {
  let fetchSpy: jest.SpyInstance<
    Promise<Response>,
    Parameters<typeof fetch>
  >;
  const sender = new MailgunSender({
    apiKey: 'test-key',
    domain: 'mg.outreach.example',
    fromEmail: 'hello@outreach.example',
    fromName: 'Sam',
  });

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('is configured only with a key and a domain', () => {
    expect(sender.isConfigured()).toBe(true);
    expect(new MailgunSender({ apiKey: 'test-key', fromName: 'Sam' }).isConfigured()).toBe(false);
  });

  it('posts a form-encoded message with basic auth', async () => {
    fetchSpy.mockResolvedValue(
      new Response(JSON.stringify({ id: '<msg-1@mg.outreach.example>', message: 'Queued' }), {
        status: 200,
      }),
    );

    const result = await sender.send({
      to: 'jo@acme.example',
      subject: 'Hello',
      text: 'Body',
      cc: 'team@outreach.example',
    });

    expect(result).toEqual({ success: true, id: '<msg-1@mg.outreach.example>' });
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe('https://api.mailgun.net/v3/mg.outreach.example/messages');
    expect(init?.headers).toEqual({
      Authorization: `Basic ${Buffer.from('api:test-key').toString('base64')}`,
      'Content-Type': 'application/x-www-form-urlencoded',
    });
    const form = new URLSearchParams(String(init?.body));
    expect(Object.fromEntries(form)).toEqual({
      from: 'Sam <hello@outreach.example>',
      to: 'jo@acme.example',
      subject: 'Hello',
      text: 'Body',
      cc: 'team@outreach.example',
    });
  });

  it('sends from the postmaster address when no sender email is set', async () => {
    fetchSpy.mockResolvedValue(new Response('{}', { status: 200 }));
    const plain = new MailgunSender({
      apiKey: 'test-key',
      domain: 'mg.outreach.example',
      fromName: 'Sam',
    });

    await plain.send({ to: 'jo@acme.example', subject: 'S', text: 'T' });

    const form = new URLSearchParams(String(fetchSpy.mock.calls[0][1]?.body));
    expect(form.get('from')).toBe('Sam <postmaster@mg.outreach.example>');
    expect(form.has('cc')).toBe(false);
  });

  it('reports a rejected request', async () => {
    fetchSpy.mockResolvedValue(new Response('Forbidden', { status: 401 }));

    const result = await sender.send({ to: 'jo@acme.example', subject: 'S', text: 'T' });

    expect(result).toEqual({ success: false, error: 'HTTP 401: Forbidden' });
  });

  it('reports transport errors', async () => {
    fetchSpy.mockRejectedValue(new Error('getaddrinfo ENOTFOUND'));

    const result = await sender.send({ to: 'jo@acme.example', subject: 'S', text: 'T' });

    expect(result).toEqual({ success: false, error: 'getaddrinfo ENOTFOUND' });
  });
});
