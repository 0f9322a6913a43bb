import { DiscordNotifier, DiscordNotifierOptions } from '../../services/DiscordNotifier';
import { HttpRequest, HttpResult } from '../../utils/http';
import { RateLimiter } from '../../utils/RateLimiter';

describe('DiscordNotifier', () => {
  let requests: HttpRequest[];
  let status: number;
  let now: number;
  let rateLimiter: RateLimiter;

  const transport = async (request: HttpRequest): Promise<HttpResult> => {
    requests.push(request);
    return { status, body: '' };
  };

  function notifier(overrides: Partial<DiscordNotifierOptions> = {}): DiscordNotifier {
    return new DiscordNotifier({
      webhookUrl: 'http://localhost/webhook/test-secret',
      dedupeTtlSecs: 600,
      dedupeMaxKeys: 100,
      timeoutMs: 1000,
      username: 'signals',
      transport,
      rateLimiter,
      clock: () => now,
      maxRetries: 0,
      ...overrides,
    });
  }

  beforeEach(() => {
    requests = [];
    status = 204;
    now = 1_000_000;
    rateLimiter = new RateLimiter({ maxRequests: 10, windowMs: 60000 });
  });

  afterEach(() => {
    rateLimiter.destroy();
  });

  test('should post the message to the webhook', async () => {
    expect(await notifier().send('hello', 'rule:mkt', 60)).toBe('sent');

    expect(requests).toEqual([
      {
        method: 'POST',
        url: 'http://localhost/webhook/test-secret',
        body: JSON.stringify({ content: 'hello', username: 'signals' }),
        timeoutMs: 1000,
      },
    ]);
  });

  test('should run dry without a webhook', async () => {
    const dry = notifier({ webhookUrl: null });

    expect(dry.enabled).toBe(false);
    expect(await dry.send('hello', 'rule:mkt', 60)).toBe('dry-run');
    expect(requests).toHaveLength(0);
  });

  test('should hold a key inside its cooldown and release it after', async () => {
    const discord = notifier();

    await discord.send('first', 'rule:mkt', 60);
    now += 59_999;
    expect(await discord.send('second', 'rule:mkt', 60)).toBe('cooldown');
    expect(await discord.send('other', 'rule:other', 60)).toBe('sent');
    now += 1;
    expect(await discord.send('third', 'rule:mkt', 60)).toBe('sent');
    expect(requests).toHaveLength(3);
  });

  test('should forget keys once the dedupe TTL passes', async () => {
    const discord = notifier({ dedupeTtlSecs: 10 });

    await discord.send('first', 'rule:mkt', 60);
    now += 10_000;

    expect(await discord.send('again', 'rule:mkt', 60)).toBe('sent');
  });

  test('should evict the oldest key beyond the size bound', async () => {
    const discord = notifier({ dedupeMaxKeys: 1 });

    await discord.send('a', 'key-a', 60);
    await discord.send('b', 'key-b', 60);

    expect(await discord.send('a again', 'key-a', 60)).toBe('sent');
  });

  test('should truncate content over the Discord limit', async () => {
    await notifier().send('x'.repeat(2500), 'rule:mkt', 60);

    const body: unknown = JSON.parse(requests[0].body ?? '{}');
    expect(body).toEqual({ content: `${'x'.repeat(1997)}...`, username: 'signals' });
  });

  test('should report a rejected webhook call as an error without retrying', async () => {
    status = 400;

    expect(await notifier({ maxRetries: 3 }).send('hello', 'rule:mkt', 60)).toBe('error');
    expect(requests).toHaveLength(1);
  });

  test('should report an exhausted rate limit as an error', async () => {
    const limited = new RateLimiter({ maxRequests: 1, windowMs: 60000 });
    const discord = notifier({ rateLimiter: limited });

    await discord.send('a', 'key-a', 60);
    const second = await discord.send('b', 'key-b', 60);
    limited.destroy();

    expect(second).toBe('error');
    expect(requests).toHaveLength(1);
  });
});
