/**
 * Named monotonic counters for dropped, requeued and dead-lettered work.
 * Exposed through GET /api/stats.
 */
export class Counters {
  private values: Map<string, number> = new Map();

  increment(name: string, by: number = 1): number {
    const next = (this.values.get(name) ?? 0) + by;
    this.values.set(name, next);
    return next;
  }

  get(name: string): number {
    return this.values.get(name) ?? 0;
  }

  /**
   * All counters, sorted by name.
   */
  snapshot(): Record<string, number> {
    return Object.fromEntries(
      [...this.values.entries()].sort(([a], [b]) => a.localeCompare(b))
    );
  }
}
