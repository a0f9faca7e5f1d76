/**
 * @covenant/event-store: Observability sink.
 *
 * The store reports counters and timings to an injected sink.
 * Reports are fire-and-forget: they never change a commit result.
 *
 * MetricsCollector is a hand-rolled Prometheus text exporter; no
 * prom-client dependency. Collects named counters and duration
 * histograms with arbitrary labels.
 */

export type MetricLabels = Readonly<Record<string, string>>;

export interface ObservabilitySink {
  increment(name: string, labels?: MetricLabels): void;
  timing(name: string, durationMs: number, labels?: MetricLabels): void;
}

/**
 * Sink that drops everything.
 */
export class NoopSink implements ObservabilitySink {
  increment(): void {}
  timing(): void {}
}

// =============================================================================
// Metrics Collector
// =============================================================================

interface CounterEntry {
  readonly labels: MetricLabels;
  count: number;
}

interface HistogramEntry {
  readonly labels: MetricLabels;
  sum: number;
  count: number;
  buckets: Map<number, number>; // le → count
}

/** Histogram bucket bounds in milliseconds */
const DEFAULT_BUCKETS_MS = [1, 5, 10, 25, 50, 100, 250, 500, 1000, 2500];

function labelsKey(labels: MetricLabels): string {
  return Object.entries(labels)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}=${v}`)
    .join(",");
}

function renderLabels(labels: MetricLabels, extra?: Record<string, string>): string {
  const all = { ...labels, ...extra };
  const body = Object.entries(all)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}="${v}"`)
    .join(",");
  return body.length > 0 ? `{${body}}` : "";
}

export class MetricsCollector implements ObservabilitySink {
  private readonly _counters = new Map<string, Map<string, CounterEntry>>();
  private readonly _histograms = new Map<string, Map<string, HistogramEntry>>();
  private readonly _buckets: readonly number[];

  constructor(buckets: readonly number[] = DEFAULT_BUCKETS_MS) {
    this._buckets = buckets;
  }

  increment(name: string, labels: MetricLabels = {}): void {
    let metric = this._counters.get(name);
    if (metric === undefined) {
      metric = new Map();
      this._counters.set(name, metric);
    }

    const key = labelsKey(labels);
    const entry = metric.get(key);
    if (entry !== undefined) {
      entry.count++;
    } else {
      metric.set(key, { labels: { ...labels }, count: 1 });
    }
  }

  timing(name: string, durationMs: number, labels: MetricLabels = {}): void {
    let metric = this._histograms.get(name);
    if (metric === undefined) {
      metric = new Map();
      this._histograms.set(name, metric);
    }

    const key = labelsKey(labels);
    let hist = metric.get(key);
    if (hist === undefined) {
      hist = {
        labels: { ...labels },
        sum: 0,
        count: 0,
        buckets: new Map(this._buckets.map((b) => [b, 0])),
      };
      metric.set(key, hist);
    }

    hist.sum += durationMs;
    hist.count++;
    for (const le of this._buckets) {
      if (durationMs <= le) {
        hist.buckets.set(le, (hist.buckets.get(le) ?? 0) + 1);
      }
    }
  }

  /**
   * Current value of a counter, 0 if never incremented.
   */
  counterValue(name: string, labels: MetricLabels = {}): number {
    return this._counters.get(name)?.get(labelsKey(labels))?.count ?? 0;
  }

  /**
   * Number of observations recorded for a timing.
   */
  timingCount(name: string, labels: MetricLabels = {}): number {
    return this._histograms.get(name)?.get(labelsKey(labels))?.count ?? 0;
  }

  /**
   * Render metrics in Prometheus text exposition format.
   */
  render(): string {
    const lines: string[] = [];

    for (const [name, entries] of this._counters) {
      lines.push(`# TYPE ${name} counter`);
      for (const { labels, count } of entries.values()) {
        lines.push(`${name}${renderLabels(labels)} ${count}`);
      }
    }

    for (const [name, entries] of this._histograms) {
      lines.push(`# TYPE ${name} histogram`);
      for (const hist of entries.values()) {
        for (const [le, count] of hist.buckets) {
          lines.push(`${name}_bucket${renderLabels(hist.labels, { le: String(le) })} ${count}`);
        }
        lines.push(`${name}_bucket${renderLabels(hist.labels, { le: "+Inf" })} ${hist.count}`);
        lines.push(`${name}_sum${renderLabels(hist.labels)} ${hist.sum}`);
        lines.push(`${name}_count${renderLabels(hist.labels)} ${hist.count}`);
      }
    }

    return lines.join("\n") + "\n";
  }

  clear(): void {
    this._counters.clear();
    this._histograms.clear();
  }
}
