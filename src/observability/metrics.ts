/**
 * Metrics collection for model operations
 */

export type MetricLabels = Record<string, string>;

export interface MetricsCollector {
  incrementCounter(name: string, value?: number, labels?: MetricLabels): void;
  recordHistogram(name: string, value: number, labels?: MetricLabels): void;
}

/**
 * Standard metric names
 */
export const MapperMetricNames = {
  OPERATIONS_TOTAL: 'dynamodb_mapper_operations_total',
  OPERATION_DURATION: 'dynamodb_mapper_operation_duration_ms',
  ERRORS: 'dynamodb_mapper_errors_total',
  ITEMS_RETURNED: 'dynamodb_mapper_items_returned',
  BATCH_UNPROCESSED: 'dynamodb_mapper_batch_unprocessed_items',
  CONDITIONAL_CHECK_FAILURES: 'dynamodb_mapper_conditional_check_failures',
} as const;

export interface HistogramSummary {
  count: number;
  sum: number;
  min: number;
  max: number;
}

/**
 * In-memory metrics collector for testing and development
 */
export class InMemoryMetricsCollector implements MetricsCollector {
  private readonly counters = new Map<string, number>();
  private readonly histograms = new Map<string, number[]>();

  incrementCounter(name: string, value: number = 1, labels?: MetricLabels): void {
    const key = this.makeKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  recordHistogram(name: string, value: number, labels?: MetricLabels): void {
    const key = this.makeKey(name, labels);
    const values = this.histograms.get(key) ?? [];
    values.push(value);
    this.histograms.set(key, values);
  }

  getCounter(name: string, labels?: MetricLabels): number {
    return this.counters.get(this.makeKey(name, labels)) ?? 0;
  }

  getHistogram(name: string, labels?: MetricLabels): number[] {
    return this.histograms.get(this.makeKey(name, labels)) ?? [];
  }

  summarize(name: string, labels?: MetricLabels): HistogramSummary | undefined {
    const values = this.getHistogram(name, labels);
    if (values.length === 0) {
      return undefined;
    }
    return {
      count: values.length,
      sum: values.reduce((a, b) => a + b, 0),
      min: Math.min(...values),
      max: Math.max(...values),
    };
  }

  reset(): void {
    this.counters.clear();
    this.histograms.clear();
  }

  private makeKey(name: string, labels?: MetricLabels): string {
    if (!labels || Object.keys(labels).length === 0) {
      return name;
    }
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${v}`)
      .join(',');
    return `${name}:${labelStr}`;
  }
}

export class NoopMetricsCollector implements MetricsCollector {
  incrementCounter(_name: string, _value?: number, _labels?: MetricLabels): void {
    // No-op
  }

  recordHistogram(_name: string, _value: number, _labels?: MetricLabels): void {
    // No-op
  }
}
