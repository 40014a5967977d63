/**
 * Metrics tracking for index operations
 */

export interface IndexMetrics {
  /** Selects answered from the index */
  hitCount: number;
  /** Selects that referenced the indexed column but had to scan */
  missCount: number;
  rebuildCount: number;
  rebuildTimeMs: number[];
  keys: number;
}

export interface IndexMetricsSnapshot {
  hitCount: number;
  missCount: number;
  hitRate: number;
  rebuildCount: number;
  p95RebuildTimeMs: number;
  keys: number;
}

const MAX_SAMPLES = 100;

/**
 * Per-database collector keyed by `table/column`
 */
export class MetricsCollector {
  #metrics = new Map<string, IndexMetrics>();

  /**
   * Get or create metrics for an index
   */
  #getMetrics(table: string, column: string): IndexMetrics {
    const key = `${table}/${column}`;
    let metrics = this.#metrics.get(key);
    if (!metrics) {
      metrics = {
        hitCount: 0,
        missCount: 0,
        rebuildCount: 0,
        rebuildTimeMs: [],
        keys: 0,
      };
      this.#metrics.set(key, metrics);
    }
    return metrics;
  }

  recordHit(table: string, column: string): void {
    this.#getMetrics(table, column).hitCount++;
  }

  recordMiss(table: string, column: string): void {
    this.#getMetrics(table, column).missCount++;
  }

  /**
   * Record a rebuild and the resulting number of distinct keys
   */
  recordRebuild(table: string, column: string, ms: number, keys: number): void {
    const metrics = this.#getMetrics(table, column);
    metrics.rebuildCount++;
    metrics.keys = keys;
    metrics.rebuildTimeMs.push(ms);

    if (metrics.rebuildTimeMs.length > MAX_SAMPLES) {
      metrics.rebuildTimeMs.shift();
    }
  }

  updateKeys(table: string, column: string, keys: number): void {
    this.#getMetrics(table, column).keys = keys;
  }

  /**
   * Calculate p95 for a metric
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)] ?? 0;
  }

  /**
   * Plain-object view of every tracked index
   */
  snapshot(): Record<string, IndexMetricsSnapshot> {
    const out: Record<string, IndexMetricsSnapshot> = {};
    for (const [key, m] of this.#metrics) {
      const total = m.hitCount + m.missCount;
      out[key] = {
        hitCount: m.hitCount,
        missCount: m.missCount,
        hitRate: total > 0 ? m.hitCount / total : 0,
        rebuildCount: m.rebuildCount,
        p95RebuildTimeMs: this.getP95(m.rebuildTimeMs),
        keys: m.keys,
      };
    }
    return out;
  }

  /**
   * Reset metrics for one table (all columns) or everything
   */
  reset(table?: string): void {
    if (table === undefined) {
      this.#metrics.clear();
      return;
    }
    for (const key of [...this.#metrics.keys()]) {
      if (key.startsWith(`${table}/`)) {
        this.#metrics.delete(key);
      }
    }
  }
}
