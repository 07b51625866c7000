/**
 * Single-slot bearer token cell with expiry.
 *
 * Owned by exactly one provider instance and never persisted. The cache only
 * stores; deciding when a token is stale (an auth failure) and refreshing
 * it is the owning provider's job.
 */

/** Seconds shaved off every TTL so tokens are refreshed before the backend expires them */
export const TOKEN_EXPIRY_BUFFER_SECONDS = 5;

interface CachedToken {
  token: string;
  expiresAt: number;
}

export class TokenCache {
  private entry: CachedToken | undefined;

  constructor(private readonly now: () => number = Date.now) {}

  /** The token while `now < expiresAt`, otherwise undefined. */
  get(): string | undefined {
    if (!this.entry || this.now() >= this.entry.expiresAt) {
      return undefined;
    }
    return this.entry.token;
  }

  /**
   * Store a token valid for `ttlSeconds`. The safety buffer is skipped for
   * TTLs that are not longer than it.
   */
  set(token: string, ttlSeconds: number): void {
    const effective = ttlSeconds > TOKEN_EXPIRY_BUFFER_SECONDS ? ttlSeconds - TOKEN_EXPIRY_BUFFER_SECONDS : ttlSeconds;
    this.entry = { token, expiresAt: this.now() + effective * 1000 };
  }

  clear(): void {
    this.entry = undefined;
  }

  isExpired(): boolean {
    return this.get() === undefined;
  }

  /** Expiry as epoch milliseconds, or undefined when empty */
  expiresAt(): number | undefined {
    return this.entry?.expiresAt;
  }

  remainingSeconds(): number {
    if (!this.entry) return 0;
    return Math.max(0, (this.entry.expiresAt - this.now()) / 1000);
  }
}
