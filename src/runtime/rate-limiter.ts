export interface RateLimiterOptions {
  maxRequests: number;
  windowSeconds?: number;
  now?: () => number;
}

/**
 * Sliding-window request counter for a single endpoint.
 *
 * Timestamps are kept in milliseconds and pruned lazily on every check. Not
 * synchronised on its own: the owning registry serialises access.
 */
export class RateLimiter {
  readonly maxRequests: number;
  readonly windowSeconds: number;

  private readonly now: () => number;
  private requests: number[] = [];

  constructor(options: RateLimiterOptions) {
    if (!Number.isInteger(options.maxRequests) || options.maxRequests <= 0) {
      throw new Error(`invalid maxRequests: ${options.maxRequests}`);
    }

    this.maxRequests = options.maxRequests;
    this.windowSeconds = options.windowSeconds ?? 60;
    this.now = options.now ?? Date.now;
  }

  canRequest(): boolean {
    this.prune(this.now());
    return this.requests.length < this.maxRequests;
  }

  recordRequest(): void {
    this.requests.push(this.now());
  }

  /** Seconds until the oldest in-window request leaves the window; 0 when a request is already allowed. */
  waitTime(): number {
    if (this.canRequest()) {
      return 0;
    }

    const now = this.now();
    const oldest = Math.min(...this.requests);
    return Math.max(0, (this.windowSeconds * 1000 - (now - oldest)) / 1000);
  }

  inWindow(): number {
    this.prune(this.now());
    return this.requests.length;
  }

  private prune(now: number): void {
    const windowMs = this.windowSeconds * 1000;
    this.requests = this.requests.filter((timestamp) => now - timestamp < windowMs);
  }
}
