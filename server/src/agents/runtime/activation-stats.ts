/**
 * Activation frequency and inbound keyword counters for one agent.
 */

export interface ActivationStatsSnapshot {
  totalActivations: number;
  /** 1 / interval between the last two activations, in Hz */
  instantFrequencyHz: number;
  /** Activations inside the time window divided by the window length, in Hz */
  movingAverageFrequencyHz: number;
  activationsInWindow: number;
  windowMs: number;
  keywordCounts: Record<string, number>;
  lastActivationAt: string | null;
}

export interface ActivationStatsOptions {
  windowMs?: number;
  now?: () => number;
}

const DEFAULT_WINDOW_MS = 60_000;

export class ActivationStats {
  private readonly windowMs: number;
  private readonly now: () => number;
  private times: number[] = [];
  private total = 0;
  private readonly keywordCounts = new Map<string, number>();

  constructor(options: ActivationStatsOptions = {}) {
    this.windowMs = options.windowMs ?? DEFAULT_WINDOW_MS;
    this.now = options.now ?? Date.now;
  }

  recordActivation(): void {
    const at = this.now();
    this.times.push(at);
    this.total++;
    this.trim(at);
  }

  recordMessage(keyword: string): void {
    this.keywordCounts.set(keyword, (this.keywordCounts.get(keyword) ?? 0) + 1);
  }

  /** Carry totals over from a stored snapshot; timing history starts fresh. */
  seed(totalActivations: number, keywordCounts: Record<string, number>): void {
    this.total = totalActivations;
    for (const [keyword, count] of Object.entries(keywordCounts)) {
      this.keywordCounts.set(keyword, count);
    }
  }

  snapshot(): ActivationStatsSnapshot {
    const now = this.now();
    this.trim(now);
    const n = this.times.length;
    const last = this.times[n - 1];
    const prev = this.times[n - 2];

    let instant = 0;
    if (last !== undefined && prev !== undefined) {
      // Two activations in the same millisecond count as 1ms apart.
      const interval = Math.max(1, last - prev);
      instant = 1000 / interval;
    }

    return {
      totalActivations: this.total,
      instantFrequencyHz: instant,
      movingAverageFrequencyHz: n >= 2 && this.windowMs > 0 ? n / (this.windowMs / 1000) : 0,
      activationsInWindow: n,
      windowMs: this.windowMs,
      keywordCounts: Object.fromEntries(this.keywordCounts),
      lastActivationAt: last !== undefined ? new Date(last).toISOString() : null,
    };
  }

  private trim(now: number): void {
    const cutoff = now - this.windowMs;
    let drop = 0;
    while (drop < this.times.length && (this.times[drop] ?? 0) < cutoff) drop++;
    if (drop > 0) this.times = this.times.slice(drop);
  }
}
