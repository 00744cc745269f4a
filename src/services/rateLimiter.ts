import { RequestHandler } from 'express';
import { RateLimitError } from '../middleware/errorHandler';

export interface RateLimitConfig {
  maxRequests: number;
  perSeconds: number;
}

export interface RateLimitDecision {
  allowed: boolean;
  remaining: number;
  resetTime: number;
}

/** Sliding-window limiter keyed by client. Timestamps are in seconds. */
export class RateLimiter {
  private readonly log = new Map<string, number[]>();
  private readonly cleanupInterval: NodeJS.Timeout;

  constructor(
    private readonly config: RateLimitConfig,
    private readonly now: () => number = () => Date.now() / 1000
  ) {
    this.cleanupInterval = setInterval(() => this.cleanup(), 5 * 60 * 1000);
    this.cleanupInterval.unref();
  }

  private recent(timestamps: number[], now: number): number[] {
    return timestamps.filter((timestamp) => now - timestamp < this.config.perSeconds);
  }

  cleanup(): void {
    const now = this.now();
    for (const [key, timestamps] of this.log.entries()) {
      const filtered = this.recent(timestamps, now);
      if (filtered.length === 0) {
        this.log.delete(key);
      } else {
        this.log.set(key, filtered);
      }
    }
  }

  isAllowed(key: string): RateLimitDecision {
    const now = this.now();
    const timestamps = this.recent(this.log.get(key) ?? [], now);
    const resetTime = Math.ceil((timestamps[0] ?? now) + this.config.perSeconds);

    if (timestamps.length >= this.config.maxRequests) {
      this.log.set(key, timestamps);
      return { allowed: false, remaining: 0, resetTime };
    }

    timestamps.push(now);
    this.log.set(key, timestamps);
    return { allowed: true, remaining: this.config.maxRequests - timestamps.length, resetTime };
  }

  get trackedClients(): number {
    return this.log.size;
  }

  destroy(): void {
    clearInterval(this.cleanupInterval);
  }
}

export const createRateLimitMiddleware = (limiter: RateLimiter, config: RateLimitConfig): RequestHandler => {
  return (req, res, next) => {
    const ip = req.ip ?? req.socket.remoteAddress ?? 'unknown';
    const userAgent = req.get('User-Agent') ?? 'unknown';
    const result = limiter.isAllowed(`${ip}:${userAgent.substring(0, 50)}`);

    res.set({
      'X-RateLimit-Limit': config.maxRequests.toString(),
      'X-RateLimit-Remaining': result.remaining.toString(),
      'X-RateLimit-Reset': result.resetTime.toString(),
    });

    if (!result.allowed) {
      const retryAfter = Math.max(1, Math.ceil(result.resetTime - Date.now() / 1000));
      next(new RateLimitError('Too many requests. Please try again later.', retryAfter));
      return;
    }
    next();
  };
};
