import { logger } from './logger';
import { RateLimitError } from './ErrorHandler';

export interface RateLimitConfig {
  maxRequests: number;
  windowMs: number;
  keyGenerator?: (identifier: string) => string;
  onLimitReached?: (identifier: string, resetTime: number) => void;
}

export interface RateLimitInfo {
  limit: number;
  remaining: number;
  resetTime: number;
  retryAfter: number;
}

interface RateLimitEntry {
  count: number;
  resetTime: number;
}

/**
 * Fixed-window request counter keyed by caller identifier.
 */
export class RateLimiter {
  private limits = new Map<string, RateLimitEntry>();
  private config: RateLimitConfig;
  private keyOf: (identifier: string) => string;
  private cleanupInterval?: NodeJS.Timeout;

  constructor(config: RateLimitConfig) {
    this.config = config;
    this.keyOf = config.keyGenerator ?? ((id: string) => id);

    this.cleanupInterval = setInterval(() => {
      this.cleanup();
    }, 60000);
    this.cleanupInterval.unref();
  }

  isAllowed(identifier: string, increment: boolean = true): boolean {
    const key = this.keyOf(identifier);
    const now = Date.now();
    const entry = this.limits.get(key);

    if (!entry || now >= entry.resetTime) {
      if (increment) {
        this.limits.set(key, { count: 1, resetTime: now + this.config.windowMs });
      }
      return true;
    }

    if (entry.count >= this.config.maxRequests) {
      this.config.onLimitReached?.(identifier, entry.resetTime);
      return false;
    }

    if (increment) {
      entry.count++;
    }

    return true;
  }

  /**
   * Take one slot or throw RateLimitError.
   */
  consume(identifier: string): RateLimitInfo {
    if (!this.isAllowed(identifier, true)) {
      throw new RateLimitError(identifier, this.getInfo(identifier).resetTime);
    }
    return this.getInfo(identifier);
  }

  getInfo(identifier: string): RateLimitInfo {
    const now = Date.now();
    const entry = this.limits.get(this.keyOf(identifier));

    if (!entry || now >= entry.resetTime) {
      return {
        limit: this.config.maxRequests,
        remaining: this.config.maxRequests,
        resetTime: now + this.config.windowMs,
        retryAfter: 0
      };
    }

    return {
      limit: this.config.maxRequests,
      remaining: Math.max(0, this.config.maxRequests - entry.count),
      resetTime: entry.resetTime,
      retryAfter: Math.max(0, Math.ceil((entry.resetTime - now) / 1000))
    };
  }

  reset(identifier: string): void {
    this.limits.delete(this.keyOf(identifier));
  }

  private cleanup(): void {
    const now = Date.now();
    let cleaned = 0;

    for (const [key, entry] of this.limits.entries()) {
      if (now >= entry.resetTime) {
        this.limits.delete(key);
        cleaned++;
      }
    }

    if (cleaned > 0) {
      logger.debug(`Cleaned up ${cleaned} expired rate limit entries`);
    }
  }

  async execute<T>(fn: () => Promise<T>, identifier: string = 'default'): Promise<T> {
    if (!this.isAllowed(identifier, true)) {
      throw new RateLimitError(identifier, this.getInfo(identifier).resetTime);
    }
    return await fn();
  }

  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = undefined;
    }
    this.limits.clear();
  }
}

export const polymarketRateLimiter = new RateLimiter({
  maxRequests: 100,
  windowMs: 60000,
  onLimitReached: (identifier, resetTime) => {
    logger.warn(`Polymarket rate limit reached for ${identifier}, resets at ${new Date(resetTime).toISOString()}`);
  }
});

export const discordRateLimiter = new RateLimiter({
  maxRequests: 30,
  windowMs: 60000,
  onLimitReached: (identifier, resetTime) => {
    logger.warn(`Discord rate limit reached for ${identifier}, resets at ${new Date(resetTime).toISOString()}`);
  }
});
