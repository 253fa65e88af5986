export {
  ConsoleLogger,
  NoopLogger,
  isLogLevel,
  logOperation,
  logError,
} from './logging.js';
export type { Logger, LogLevel, LogContext } from './logging.js';

export { InMemoryMetricsCollector, NoopMetricsCollector, MapperMetricNames } from './metrics.js';
export type { MetricsCollector, MetricLabels, HistogramSummary } from './metrics.js';
