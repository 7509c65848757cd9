/**
 * IP-based rate limiter for the processing endpoint.
 * Every accepted request costs a model run, so clients are capped per IP.
 *
 * In-memory fixed window - sufficient for a single process.
 * If horizontal scaling needed, replace with Redis-based limiter.
 */

import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { RateLimitRule } from "../config";

interface RateLimitEntry {
  count: number;
  windowStart: number;
}

export class IpRateLimiter {
  private readonly entries = new Map<string, RateLimitEntry>();
  private cleanupInterval: NodeJS.Timeout | null = null;

  constructor(
    private readonly rule: RateLimitRule,
    private readonly now: () => number = () => Math.floor(Date.now() / 1000),
  ) {}

  /**
   * Count a request from `ip`.
   * @returns true if allowed, false if the IP is over its limit for this window
   */
  check(ip: string): boolean {
    const now = this.now();
    const entry = this.entries.get(ip);

    // No entry or window expired - reset
    if (!entry || now - entry.windowStart >= this.rule.windowSeconds) {
      this.entries.set(ip, { count: 1, windowStart: now });
      return true;
    }

    if (entry.count >= this.rule.maxRequests) {
      return false;
    }

    entry.count++;
    return true;
  }

  /** Express middleware answering 429 once the client is over the limit. */
  middleware(): RequestHandler {
    const { maxRequests, windowSeconds } = this.rule;

    return (req: Request, res: Response, next: NextFunction): void => {
      const ip = req.ip ?? req.socket.remoteAddress ?? "unknown";

      if (!this.check(ip)) {
        res.setHeader("Retry-After", String(windowSeconds));
        res.status(429).json({
          error: "RateLimited",
          message: `Rate limit exceeded: ${maxRequests} requests per ${windowSeconds}s`,
        });
        return;
      }

      next();
    };
  }

  /**
   * Periodically drop entries whose window has closed.
   * Call once at server startup.
   */
  startCleanup(intervalMs = 60_000): void {
    if (this.cleanupInterval) return;

    this.cleanupInterval = setInterval(() => {
      const threshold = this.now() - this.rule.windowSeconds;
      for (const [ip, entry] of this.entries) {
        if (entry.windowStart <= threshold) {
          this.entries.delete(ip);
        }
      }
    }, intervalMs);

    // Don't keep process alive just for cleanup
    this.cleanupInterval.unref();
  }

  stopCleanup(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
  }
}
