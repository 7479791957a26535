/**
 * Metrics tracking for flushes and record lookups, per database
 */

export type LookupOutcome = "exact" | "partial" | "ambiguous" | "miss";

export interface DatabaseMetrics {
  flushCount: number;
  flushFailures: number;
  flushTimeMs: number[];
  lookups: Record<LookupOutcome, number>;
}

/** Number of flush samples kept per database */
const MAX_SAMPLES = 100;

class MetricsCollector {
  #metrics = new Map<string, DatabaseMetrics>();

  /**
   * Get or create metrics for a database
   */
  #getMetrics(database: string): DatabaseMetrics {
    let metrics = this.#metrics.get(database);
    if (!metrics) {
      metrics = {
        flushCount: 0,
        flushFailures: 0,
        flushTimeMs: [],
        lookups: { exact: 0, partial: 0, ambiguous: 0, miss: 0 },
      };
      this.#metrics.set(database, metrics);
    }
    return metrics;
  }

  /**
   * Record a successful flush and its duration
   */
  recordFlush(database: string, ms: number): void {
    const metrics = this.#getMetrics(database);
    metrics.flushCount++;
    metrics.flushTimeMs.push(ms);

    if (metrics.flushTimeMs.length > MAX_SAMPLES) {
      metrics.flushTimeMs.shift();
    }
  }

  recordFlushFailure(database: string): void {
    this.#getMetrics(database).flushFailures++;
  }

  recordLookup(database: string, outcome: LookupOutcome): void {
    this.#getMetrics(database).lookups[outcome]++;
  }

  /**
   * Get metrics for a database
   */
  getMetrics(database: string): DatabaseMetrics | undefined {
    return this.#metrics.get(database);
  }

  /**
   * Get all metrics
   */
  getAllMetrics(): Map<string, DatabaseMetrics> {
    return new Map(this.#metrics);
  }

  /**
   * Calculate p95 for a list of samples
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)] ?? 0;
  }

  /**
   * Get p95 flush time for a database
   */
  getP95FlushTime(database: string): number {
    return this.getP95(this.#metrics.get(database)?.flushTimeMs ?? []);
  }

  /**
   * Reset metrics for one database, or all of them
   */
  reset(database?: string): void {
    if (database) {
      this.#metrics.delete(database);
    } else {
      this.#metrics.clear();
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
