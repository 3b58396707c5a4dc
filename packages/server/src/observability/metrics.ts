/**
 * In-process metrics for monitoring tool performance
 * Tracks call counts, errors, and latency histograms
 */

type Labels = Record<string, string>;

interface Counter {
  count: number;
}

interface Histogram {
  values: number[];
  sum: number;
  count: number;
}

export interface HistogramSummary {
  count: number;
  sum: number;
  p50: number;
  p95: number;
  p99: number;
}

/** Samples kept per histogram */
const HISTOGRAM_WINDOW = 1000;

export class MetricsRegistry {
  #counters: Map<string, Counter> = new Map();
  #histograms: Map<string, Histogram> = new Map();

  // Increment a counter
  inc(name: string, labels: Labels = {}): void {
    const key = this.makeKey(name, labels);
    const counter = this.#counters.get(key) ?? { count: 0 };
    counter.count++;
    this.#counters.set(key, counter);
  }

  // Observe a value in a histogram
  observe(name: string, value: number, labels: Labels = {}): void {
    const key = this.makeKey(name, labels);
    const histogram = this.#histograms.get(key) ?? { values: [], sum: 0, count: 0 };
    histogram.values.push(value);
    histogram.sum += value;
    histogram.count++;

    if (histogram.values.length > HISTOGRAM_WINDOW) {
      const removed = histogram.values.shift();
      if (removed !== undefined) {
        histogram.sum -= removed;
      }
      histogram.count = histogram.values.length;
    }

    this.#histograms.set(key, histogram);
  }

  getCounter(name: string, labels: Labels = {}): number {
    return this.#counters.get(this.makeKey(name, labels))?.count ?? 0;
  }

  // Histogram stats (p50, p95, p99)
  getHistogram(name: string, labels: Labels = {}): HistogramSummary | null {
    return this.summarize(this.#histograms.get(this.makeKey(name, labels)));
  }

  // All metrics, keyed by name and labels
  getAllMetrics(): {
    counters: Record<string, number>;
    histograms: Record<string, HistogramSummary>;
  } {
    const counters: Record<string, number> = {};
    for (const [key, counter] of this.#counters) {
      counters[key] = counter.count;
    }

    const histograms: Record<string, HistogramSummary> = {};
    for (const [key, histogram] of this.#histograms) {
      const summary = this.summarize(histogram);
      if (summary) histograms[key] = summary;
    }

    return { counters, histograms };
  }

  reset(): void {
    this.#counters.clear();
    this.#histograms.clear();
  }

  private summarize(histogram: Histogram | undefined): HistogramSummary | null {
    if (!histogram || histogram.values.length === 0) {
      return null;
    }

    const sorted = [...histogram.values].sort((a, b) => a - b);
    const percentile = (p: number): number => {
      const index = Math.ceil((p / 100) * sorted.length) - 1;
      return sorted[Math.max(0, index)] ?? 0;
    };

    return {
      count: histogram.count,
      sum: histogram.sum,
      p50: percentile(50),
      p95: percentile(95),
      p99: percentile(99),
    };
  }

  private makeKey(name: string, labels: Labels): string {
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}="${v}"`)
      .join(",");
    return labelStr ? `${name}{${labelStr}}` : name;
  }
}

export const metrics = new MetricsRegistry();

/**
 * Record one tool call. A call that reached the engine counts by the
 * status it returned; a call that threw counts as an error.
 */
export function recordToolExecution(
  tool: string,
  duration_ms: number,
  outcome: { status?: string; errCode?: string }
): void {
  metrics.inc("subdoc.tool.calls_total", { tool });

  if (outcome.errCode !== undefined) {
    metrics.inc("subdoc.tool.errors_total", { tool, err_code: outcome.errCode });
  } else if (outcome.status !== undefined) {
    metrics.inc("subdoc.tool.status_total", { tool, status: outcome.status });
  }

  metrics.observe("subdoc.tool.latency_ms", duration_ms, { tool });
}
