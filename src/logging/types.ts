// RFC 5424 log levels
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  NOTICE = 'notice',
  WARNING = 'warning',
  ERROR = 'error',
  CRITICAL = 'critical',
  ALERT = 'alert',
  EMERGENCY = 'emergency'
}

export const LOG_LEVELS: readonly LogLevel[] = Object.values(LogLevel);

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// Log entry structure
export interface LogEntry {
  level: LogLevel;
  message: string;
  logger?: string;
  timestamp?: string;
  data?: Record<string, unknown>;
}

// Metrics structure
export interface PerformanceMetrics {
  tool: string;
  latency_ms: number;
  success: boolean;
  timestamp: string;
  attempts?: number;
  error?: string;
}

// Logger configuration
export interface LoggerConfig {
  enabled: boolean;
  level: LogLevel;
  mcpEnabled: boolean;
  stderrEnabled: boolean;
  fileEnabled: boolean;
  filePath: string;
  requestsEnabled: boolean;
  metricsEnabled: boolean;
}
