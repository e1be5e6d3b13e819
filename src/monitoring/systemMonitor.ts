export type RequestModule = 'sessions' | 'model' | 'health' | 'other';

export interface RequestMetric {
  timestamp: number;
  durationMs: number;
  status: number;
  module: RequestModule;
}

export interface RequestStats {
  total: number;
  errors: number;
  avgResponseTimeMs: number;
  p95ResponseTimeMs: number;
  errorRate: number;
}

const percentile = (sorted: number[], p: number): number => {
  if (sorted.length === 0) return 0;
  const idx = Math.min(sorted.length - 1, Math.max(0, Math.floor((p / 100) * sorted.length)));
  return sorted[idx] ?? 0;
};

export const moduleForUrl = (url: string): RequestModule => {
  if (url.startsWith("/api/sessions")) return 'sessions';
  if (url.startsWith("/api/model")) return 'model';
  if (url.startsWith("/health")) return 'health';
  return 'other';
};

export class SystemMonitor {
  private readonly start: number;
  private readonly metrics: RequestMetric[] = [];
  private readonly maxEntries: number;
  private readonly clock: () => number;

  constructor(opts?: { maxEntries?: number; clock?: () => number }) {
    this.maxEntries = opts?.maxEntries ?? 10_000;
    this.clock = opts?.clock ?? Date.now;
    this.start = this.clock();
  }

  recordRequest(metric: RequestMetric): void {
    this.metrics.push(metric);
    if (this.metrics.length > this.maxEntries) {
      this.metrics.splice(0, this.metrics.length - this.maxEntries);
    }
  }

  getUptimeSeconds(): number {
    return Math.floor((this.clock() - this.start) / 1000);
  }

  getStats(rangeMs: number): RequestStats {
    const cutoff = this.clock() - rangeMs;
    const recent = this.metrics.filter((m) => m.timestamp >= cutoff);

    const durations = recent.map((m) => m.durationMs).sort((a, b) => a - b);
    const total = recent.length;
    const errors = recent.filter((m) => m.status >= 500).length;

    return {
      total,
      errors,
      avgResponseTimeMs: total === 0 ? 0 : recent.reduce((acc, m) => acc + m.durationMs, 0) / total,
      p95ResponseTimeMs: percentile(durations, 95),
      errorRate: total === 0 ? 0 : errors / total
    };
  }
}
