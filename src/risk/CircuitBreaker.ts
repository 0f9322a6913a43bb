export interface CircuitBreakerOptions {
  threshold?: number;
  cooldownSecs?: number;
  /** Milliseconds since epoch. */
  clock?: () => number;
}

interface BreakerState {
  count: number;
  lastFailureMs: number;
}

/**
 * Per (rule, market) failure counter gating notification retries.
 *
 * CLOSED until `threshold` failures land within `cooldownSecs`, OPEN until
 * the cooldown has elapsed since the last failure or `reset` is called.
 */
export class CircuitBreaker {
  readonly threshold: number;
  readonly cooldownSecs: number;
  private readonly clock: () => number;
  private state: Map<string, BreakerState> = new Map();

  constructor(options: CircuitBreakerOptions = {}) {
    this.threshold = options.threshold ?? 3;
    this.cooldownSecs = options.cooldownSecs ?? 300;
    this.clock = options.clock ?? Date.now;
  }

  private key(rule: string, marketId: string): string {
    return `${rule}\u0000${marketId}`;
  }

  /** Returns true once the threshold is met. */
  recordFailure(rule: string, marketId: string): boolean {
    const key = this.key(rule, marketId);
    const now = this.clock();
    const previous = this.state.get(key);

    let count = previous ? previous.count : 0;
    if (!previous || now - previous.lastFailureMs > this.cooldownSecs * 1000) {
      count = 0;
    }
    count += 1;

    this.state.set(key, { count, lastFailureMs: now });
    return count >= this.threshold;
  }

  isOpen(rule: string, marketId: string): boolean {
    const key = this.key(rule, marketId);
    const entry = this.state.get(key);
    if (!entry) return false;

    const elapsedMs = this.clock() - entry.lastFailureMs;
    if (elapsedMs >= this.cooldownSecs * 1000) {
      this.state.delete(key);
      return false;
    }
    return entry.count >= this.threshold;
  }

  reset(rule: string, marketId: string): void {
    this.state.delete(this.key(rule, marketId));
  }

  /** Number of (rule, market) pairs currently tracked. */
  size(): number {
    return this.state.size;
  }
}
