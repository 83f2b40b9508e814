export { logger } from './logger.js';
export { LogLevel, isLogLevel, type LogEntry, type PerformanceMetrics, type LoggerConfig } from './types.js';
export type { MetricsSnapshot, AggregatedMetrics } from './metrics.js';
