export type StatsEntry = {
  pattern: string;
  count: number;
  lastMatchedAt: string;
};

/**
 * Match counters per rule pattern. All updates run synchronously on the event loop, so each
 * `record()` is applied whole; `snapshot()` hands out copies.
 */
export class StatsRecorder {
  private readonly byPattern = new Map<string, { count: number; lastMatchedAt: string }>();

  record(pattern: string, at: Date = new Date()): void {
    const prev = this.byPattern.get(pattern);
    this.byPattern.set(pattern, { count: (prev?.count ?? 0) + 1, lastMatchedAt: at.toISOString() });
  }

  snapshot(): StatsEntry[] {
    return Array.from(this.byPattern, ([pattern, v]) => ({ pattern, count: v.count, lastMatchedAt: v.lastMatchedAt })).sort(
      (a, b) => b.count - a.count || a.pattern.localeCompare(b.pattern)
    );
  }

  reset(): void {
    this.byPattern.clear();
  }
}
