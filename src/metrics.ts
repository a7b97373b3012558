import type { Logger } from "./logger.js";

export type MetricLabels = Record<string, string>;

/**
 * Counter sink the router and artifact store report to.
 * Implementations must be non-blocking; they are called inline.
 */
export interface MetricsSink {
  increment(name: string, value?: number, labels?: MetricLabels): void;
}

export const noopMetrics: MetricsSink = {
  increment() {},
};

/** Fire-and-forget: a failing sink is logged and otherwise ignored. */
export function emitMetric(
  sink: MetricsSink,
  log: Logger,
  name: string,
  value = 1,
  labels?: MetricLabels,
): void {
  try {
    sink.increment(name, value, labels);
  } catch (err) {
    log.debug({ err, metric: name }, "Metrics sink failed");
  }
}

function labelKey(name: string, labels?: MetricLabels): string {
  if (!labels) return name;
  const pairs = Object.keys(labels)
    .sort()
    .map((k) => `${k}=${labels[k]}`);
  return `${name}{${pairs.join(",")}}`;
}

/**
 * Counters kept in a Map. Labelled series are keyed as
 * `name{k=v,...}` with label keys sorted.
 */
export class InMemoryMetrics implements MetricsSink {
  private counters = new Map<string, number>();

  increment(name: string, value = 1, labels?: MetricLabels): void {
    const key = labelKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  get(name: string, labels?: MetricLabels): number {
    return this.counters.get(labelKey(name, labels)) ?? 0;
  }

  snapshot(): Record<string, number> {
    return Object.fromEntries(this.counters);
  }

  reset(): void {
    this.counters.clear();
  }
}
