/**
 * Timestamps of events inside a trailing time window.
 */
export class SlidingWindow {
  private events: number[] = [];

  constructor(private readonly windowMs: number) {}

  record(at: number): void {
    this.events.push(at);
  }

  /**
   * Events inside (now - windowMs, now].
   */
  count(now: number): number {
    this.prune(now);
    return this.events.length;
  }

  /**
   * When the oldest event in the window expires, or null if the window is empty.
   */
  nextExpiry(now: number): number | null {
    this.prune(now);
    const oldest = this.events[0];
    return oldest === undefined ? null : oldest + this.windowMs;
  }

  private prune(now: number): void {
    const cutoff = now - this.windowMs;
    let drop = 0;
    while (drop < this.events.length && (this.events[drop] ?? Infinity) <= cutoff) {
      drop++;
    }
    if (drop > 0) {
      this.events = this.events.slice(drop);
    }
  }
}
