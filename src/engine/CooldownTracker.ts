/**
 * Last-fire times per (rule id, market) pair. Rule id -1 stands for the ML
 * source.
 */
export class CooldownTracker {
  private lastFire: Map<string, number> = new Map();

  private key(ruleId: number, marketId: string): string {
    return `${ruleId}:${marketId}`;
  }

  /**
   * Claims the slot when the previous fire is at least `cooldownSecs` old
   * (or absent) and returns true; otherwise leaves it untouched.
   */
  tryAcquire(ruleId: number, marketId: string, cooldownSecs: number, nowMs: number): boolean {
    const key = this.key(ruleId, marketId);
    const previous = this.lastFire.get(key);
    if (previous !== undefined && (nowMs - previous) / 1000 < cooldownSecs) {
      return false;
    }
    this.lastFire.set(key, nowMs);
    return true;
  }

  lastFiredAt(ruleId: number, marketId: string): number | null {
    return this.lastFire.get(this.key(ruleId, marketId)) ?? null;
  }

  /** Forget entries older than `maxAgeSecs`. */
  prune(maxAgeSecs: number, nowMs: number): void {
    for (const [key, firedAt] of this.lastFire) {
      if ((nowMs - firedAt) / 1000 >= maxAgeSecs) {
        this.lastFire.delete(key);
      }
    }
  }

  size(): number {
    return this.lastFire.size;
  }
}
