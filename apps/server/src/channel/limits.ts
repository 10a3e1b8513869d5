/**
 * Rate limiting for the command channel.
 *
 * Sliding-window limits on receiver-initiated events, keyed by peer address
 * for handshakes (a session does not exist yet) and by link for the rest:
 * - HELLO: 10 per minute per address
 * - TIME_PING: 120 per minute per link
 * - DEVICE_STATUS: 60 per minute per link
 */

// ============================================================================
// Rate Limit Configuration
// ============================================================================

/** Rate limit configuration for each event type */
export interface RateLimitConfig {
  /** Maximum number of events allowed in the window */
  maxEvents: number;
  /** Time window in milliseconds */
  windowMs: number;
}

export type RateLimitedEvent = "HELLO" | "TIME_PING" | "DEVICE_STATUS";

export const RATE_LIMITS: Record<RateLimitedEvent, RateLimitConfig> = {
  HELLO: { maxEvents: 10, windowMs: 60_000 },
  TIME_PING: { maxEvents: 120, windowMs: 60_000 },
  DEVICE_STATUS: { maxEvents: 60, windowMs: 60_000 },
};

export type RateLimitResult = { allowed: true } | { allowed: false; error: string; retryAfterMs: number };

// ============================================================================
// Sliding Window Implementation
// ============================================================================

/**
 * Rate limiter using sliding window algorithm.
 * Tracks per-key event timestamps with periodic cleanup.
 */
export class RateLimiter {
  /** Map of key:eventType -> timestamps of recent events */
  private entries: Map<string, number[]> = new Map();

  /** Interval handle for cleanup task */
  private cleanupInterval: NodeJS.Timeout | null = null;

  constructor(private readonly limits: Record<RateLimitedEvent, RateLimitConfig> = RATE_LIMITS) {}

  /** Start periodic cleanup (every 30 seconds) */
  start(): void {
    if (this.cleanupInterval) return;
    this.cleanupInterval = setInterval(() => this.cleanup(), 30_000);
    this.cleanupInterval.unref();
  }

  stop(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.entries.clear();
  }

  /**
   * Check and record in one operation.
   * @param key Peer address or link id
   */
  checkAndRecord(key: string, eventType: RateLimitedEvent): RateLimitResult {
    const config = this.limits[eventType];
    const entryKey = `${key}:${eventType}`;
    const now = Date.now();
    const windowStart = now - config.windowMs;

    const timestamps = (this.entries.get(entryKey) ?? []).filter((ts) => ts > windowStart);

    const oldestInWindow = timestamps[0];
    if (timestamps.length >= config.maxEvents && oldestInWindow !== undefined) {
      this.entries.set(entryKey, timestamps);
      return {
        allowed: false,
        error: `Rate limit exceeded for ${eventType}. Max ${config.maxEvents} per ${config.windowMs / 1000}s.`,
        retryAfterMs: Math.max(0, oldestInWindow + config.windowMs - now),
      };
    }

    timestamps.push(now);
    this.entries.set(entryKey, timestamps);
    return { allowed: true };
  }

  /** Forget everything recorded for a key (a link that disconnected) */
  clearKey(key: string): void {
    for (const entryKey of [...this.entries.keys()]) {
      if (entryKey.startsWith(`${key}:`)) {
        this.entries.delete(entryKey);
      }
    }
  }

  /**
   * Cleanup old entries to prevent memory leaks.
   * Removes all timestamps older than the longest window.
   */
  private cleanup(): void {
    const maxWindowMs = Math.max(...Object.values(this.limits).map((c) => c.windowMs));
    const cutoff = Date.now() - maxWindowMs;

    for (const [key, timestamps] of this.entries) {
      const recent = timestamps.filter((ts) => ts > cutoff);
      if (recent.length === 0) {
        this.entries.delete(key);
      } else {
        this.entries.set(key, recent);
      }
    }
  }

  /** Get current stats for monitoring */
  getStats(): { entryCount: number; totalTimestamps: number } {
    let totalTimestamps = 0;
    for (const timestamps of this.entries.values()) {
      totalTimestamps += timestamps.length;
    }
    return { entryCount: this.entries.size, totalTimestamps };
  }
}
