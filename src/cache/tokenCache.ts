/**
 * Token Cache Layer
 *
 * Holds portal tokens for the lifetime the portal granted them, minus a safety
 * margin, so one run authenticates once and only re-authenticates if a token
 * expires mid-run.
 */

import NodeCache from 'node-cache';

/**
 * Seconds subtracted from the portal's expiry so a token is never sent
 * in the last moments of its life
 */
const EXPIRY_MARGIN_SECONDS = 60;

export interface CachedToken {
  token: string;
  /** Epoch milliseconds, as reported by generateToken */
  expires: number;
}

/**
 * TokenCache - keyed by portal URL and username
 */
export class TokenCache {
  private readonly cache: NodeCache;

  constructor() {
    this.cache = new NodeCache({
      checkperiod: 0, // Expired keys are dropped on read; no background timer keeps the process alive
      useClones: true,
    });
  }

  static key(orgUrl: string, username: string): string {
    return `${orgUrl}|${username}`;
  }

  /**
   * @returns The token if cached and not within the expiry margin
   */
  get(key: string): CachedToken | undefined {
    return this.cache.get<CachedToken>(key);
  }

  /**
   * Store a token until just before it expires
   *
   * @param now - Epoch milliseconds to measure the remaining lifetime from
   * @returns false when the token is already too close to expiry to be worth caching
   */
  set(key: string, token: CachedToken, now: number = Date.now()): boolean {
    const ttlSeconds = Math.floor((token.expires - now) / 1000) - EXPIRY_MARGIN_SECONDS;
    // node-cache treats a TTL of 0 as "never expires"
    if (ttlSeconds <= 0) {
      return false;
    }
    return this.cache.set(key, token, ttlSeconds);
  }

  invalidate(key: string): void {
    this.cache.del(key);
  }
}
