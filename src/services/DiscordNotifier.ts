import { NotificationStatus } from '../types';
import { Notifier } from './interfaces';
import { HttpTransport, nodeFetchTransport, postJson } from '../utils/http';
import { RateLimiter, discordRateLimiter } from '../utils/RateLimiter';
import { errorHandler } from '../utils/ErrorHandler';
import { advancedLogger } from '../utils/AdvancedLogger';
import { logger } from '../utils/logger';

const DISCORD_CONTENT_LIMIT = 2000;

export interface DiscordNotifierOptions {
  webhookUrl: string | null;
  dedupeTtlSecs: number;
  dedupeMaxKeys: number;
  timeoutMs: number;
  username?: string;
  transport?: HttpTransport;
  rateLimiter?: RateLimiter;
  /** Milliseconds since epoch. */
  clock?: () => number;
  maxRetries?: number;
}

interface DiscordWebhookPayload {
  content: string;
  username?: string;
}

/**
 * Discord webhook notifier with per-key dedupe. Without a webhook it runs
 * dry: messages are logged and reported as `dry-run`.
 */
export class DiscordNotifier implements Notifier {
  private readonly transport: HttpTransport;
  private readonly rateLimiter: RateLimiter;
  private readonly clock: () => number;
  private dedupe: Map<string, number> = new Map();

  constructor(private readonly options: DiscordNotifierOptions) {
    this.transport = options.transport ?? nodeFetchTransport;
    this.rateLimiter = options.rateLimiter ?? discordRateLimiter;
    this.clock = options.clock ?? Date.now;
  }

  get enabled(): boolean {
    return Boolean(this.options.webhookUrl);
  }

  async send(text: string, dedupeKey: string, cooldownSecs: number): Promise<NotificationStatus> {
    const now = this.clock();
    this.evictExpired(now);

    const last = this.dedupe.get(dedupeKey);
    if (last !== undefined && now - last < cooldownSecs * 1000) {
      logger.debug(`Discord notification skipped (cooldown): ${dedupeKey}`);
      return 'cooldown';
    }
    this.remember(dedupeKey, now);

    const webhookUrl = this.options.webhookUrl;
    if (!webhookUrl) {
      logger.info(`Discord dry-run [${dedupeKey}]: ${text.slice(0, 200)}`);
      return 'dry-run';
    }

    const payload: DiscordWebhookPayload = {
      content: text.length > DISCORD_CONTENT_LIMIT ? `${text.slice(0, DISCORD_CONTENT_LIMIT - 3)}...` : text,
      username: this.options.username,
    };

    try {
      await this.rateLimiter.execute(
        () => errorHandler.executeWithRetry(
          () => postJson(this.transport, 'discord', webhookUrl, payload, this.options.timeoutMs),
          'discord_webhook',
          { maxRetries: this.options.maxRetries ?? 2, delayMs: 500, maxDelayMs: 4000 }
        ),
        'discord'
      );
      return 'sent';
    } catch (error) {
      advancedLogger.error('Discord notification failed', error, {
        component: 'discord_notifier',
        operation: 'send',
        metadata: { dedupeKey },
      });
      return 'error';
    }
  }

  async close(): Promise<void> {
    this.dedupe.clear();
  }

  private remember(key: string, now: number): void {
    this.dedupe.delete(key);
    this.dedupe.set(key, now);
    while (this.dedupe.size > this.options.dedupeMaxKeys) {
      const oldest = this.dedupe.keys().next();
      if (oldest.done) break;
      this.dedupe.delete(oldest.value);
    }
  }

  private evictExpired(now: number): void {
    const ttlMs = this.options.dedupeTtlSecs * 1000;
    for (const [key, storedAt] of this.dedupe) {
      if (now - storedAt >= ttlMs) this.dedupe.delete(key);
    }
  }
}
