import { LogLevel, LOG_LEVELS, isLogLevel, type LogEntry, type LoggerConfig, type PerformanceMetrics } from './types.js';
import { MCPLogger } from './mcp-logger.js';
import { PinoSink, type Redactor } from './pino-sink.js';
import { MetricsCollector, type MetricsSnapshot } from './metrics.js';

const DEFAULT_LOG_FILE = './logs/trello-mcp.log';

class Logger {
  private config: LoggerConfig;
  private mcpLogger: MCPLogger;
  private stderrSink: PinoSink | null = null;
  private fileSink: PinoSink | null = null;
  private metricsCollector: MetricsCollector;
  private redactor: Redactor = (text) => text;

  constructor() {
    this.config = this.loadConfig();
    this.mcpLogger = new MCPLogger();
    this.metricsCollector = new MetricsCollector(this.config.metricsEnabled);
  }

  // Load config from environment
  private loadConfig(): LoggerConfig {
    const level = process.env.TRELLO_LOG_LEVEL;
    return {
      enabled: process.env.TRELLO_LOG_ENABLED !== 'false',
      level: isLogLevel(level) ? level : LogLevel.ERROR,
      mcpEnabled: process.env.TRELLO_LOG_MCP_ENABLED === 'true',
      stderrEnabled: process.env.TRELLO_LOG_STDERR_ENABLED !== 'false',
      fileEnabled: process.env.TRELLO_LOG_FILE_ENABLED === 'true',
      filePath: process.env.TRELLO_LOG_FILE_PATH || DEFAULT_LOG_FILE,
      requestsEnabled: process.env.TRELLO_LOG_REQUESTS === 'true',
      metricsEnabled: process.env.TRELLO_LOG_METRICS === 'true',
    };
  }

  /** Installs the credential redactor applied to every sink. */
  setRedactor(redactor: Redactor): void {
    this.redactor = redactor;
  }

  private shouldLog(level: LogLevel): boolean {
    if (!this.config.enabled) return false;
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.config.level);
  }

  // Sinks are created on first use so that a disabled logger opens nothing
  private sinks(): PinoSink[] {
    const sinks: PinoSink[] = [];
    if (this.config.stderrEnabled) {
      this.stderrSink ??= new PinoSink('stderr', () => this.redactor);
      sinks.push(this.stderrSink);
    }
    if (this.config.fileEnabled) {
      this.fileSink ??= new PinoSink({ file: this.config.filePath }, () => this.redactor);
      sinks.push(this.fileSink);
    }
    return sinks;
  }

  private log(entry: LogEntry): void {
    if (!this.shouldLog(entry.level)) return;

    const stamped = { ...entry, timestamp: entry.timestamp ?? new Date().toISOString() };

    if (this.config.mcpEnabled) {
      this.mcpLogger.log(stamped, this.redactor);
    }

    for (const sink of this.sinks()) {
      sink.log(stamped);
    }
  }

  debug(message: string, data?: Record<string, unknown>, logger?: string): void {
    this.log({ level: LogLevel.DEBUG, message, data, logger });
  }

  info(message: string, data?: Record<string, unknown>, logger?: string): void {
    this.log({ level: LogLevel.INFO, message, data, logger });
  }

  notice(message: string, data?: Record<string, unknown>, logger?: string): void {
    this.log({ level: LogLevel.NOTICE, message, data, logger });
  }

  warning(message: string, data?: Record<string, unknown>, logger?: string): void {
    this.log({ level: LogLevel.WARNING, message, data, logger });
  }

  error(message: string, data?: Record<string, unknown>, logger?: string): void {
    this.log({ level: LogLevel.ERROR, message, data, logger });
  }

  critical(message: string, data?: Record<string, unknown>, logger?: string): void {
    this.log({ level: LogLevel.CRITICAL, message, data, logger });
  }

  // Metrics API
  recordMetric(metric: PerformanceMetrics): void {
    if (this.config.metricsEnabled) {
      this.metricsCollector.record(metric);
    }
  }

  getMetrics(): MetricsSnapshot {
    return this.metricsCollector.getMetrics();
  }

  clearMetrics(): void {
    this.metricsCollector.clear();
  }

  getMCPLogger(): MCPLogger {
    return this.mcpLogger;
  }

  // Runtime config update (without restart)
  updateConfig(newConfig: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...newConfig };

    if (newConfig.fileEnabled === false && this.fileSink) {
      this.fileSink.close();
      this.fileSink = null;
    }
    if (newConfig.stderrEnabled === false && this.stderrSink) {
      this.stderrSink.close();
      this.stderrSink = null;
    }

    if (newConfig.metricsEnabled !== undefined) {
      this.metricsCollector = new MetricsCollector(newConfig.metricsEnabled);
    }

    this.info('Logging configuration updated', { config: { ...this.config } }, 'logger');
  }

  getConfig(): LoggerConfig {
    return { ...this.config };
  }
}

// Singleton instance
export const logger = new Logger();
