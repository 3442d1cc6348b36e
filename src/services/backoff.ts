export type BackoffOptions = {
  initialMs: number;
  maxMs: number;
};

export const DEFAULT_BACKOFF: BackoffOptions = {
  initialMs: 1000,
  maxMs: 10 * 60 * 1000
};

/** Deterministic doubling backoff, no jitter. */
export class Backoff {
  private next: number;

  constructor(private readonly opts: BackoffOptions = DEFAULT_BACKOFF) {
    this.next = Math.min(opts.initialMs, opts.maxMs);
  }

  current(): number {
    return this.next;
  }

  /** Wait to use after a failed session; doubles the following one. */
  fail(): number {
    const wait = this.next;
    this.next = Math.min(this.next * 2, this.opts.maxMs);
    return wait;
  }

  /** Wait to use after a clean session. */
  succeed(): number {
    this.next = Math.min(this.opts.initialMs, this.opts.maxMs);
    return this.next;
  }
}
