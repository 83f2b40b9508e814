import { ok } from '../errors.js';
import { describeConfig, type AppConfig } from '../config.js';
import { isLogLevel, logger, type LoggerConfig } from '../logging/index.js';
import { EmptySchema, SetLogLevelSchema } from '../schemas.js';
import { LOCAL, READ_ONLY, type ToolRegistry } from './registry.js';

export interface StatusContext {
  config: AppConfig;
  version: string;
  queueStatus: () => { size: number; pending: number; isPaused: boolean };
}

export function registerStatusOperations(registry: ToolRegistry, { config, version, queueStatus }: StatusContext): void {
  registry.register({
    name: 'trello_get_status',
    description: 'Get server status (config/queue/logging/metrics)',
    schema: EmptySchema,
    annotations: READ_ONLY,
    handler: async () =>
      ok({
        version,
        config: describeConfig(config),
        queue: queueStatus(),
        logging: logger.getConfig(),
        metrics: logger.getMetrics(),
      }),
  });

  registry.register({
    name: 'trello_set_log_level',
    description: 'Change logging config at runtime',
    schema: SetLogLevelSchema,
    annotations: LOCAL,
    handler: async (args) => {
      const update: Partial<LoggerConfig> = {};

      if (args.level === 'off') {
        update.enabled = false;
      } else if (isLogLevel(args.level)) {
        update.enabled = true;
        update.level = args.level;
      }

      if (args.enable_mcp_logs !== undefined) update.mcpEnabled = args.enable_mcp_logs;
      if (args.enable_stderr_logs !== undefined) update.stderrEnabled = args.enable_stderr_logs;
      if (args.enable_file_logs !== undefined) update.fileEnabled = args.enable_file_logs;
      if (args.enable_request_logs !== undefined) update.requestsEnabled = args.enable_request_logs;
      if (args.enable_metrics !== undefined) update.metricsEnabled = args.enable_metrics;

      logger.updateConfig(update);

      return ok({
        message: 'Logging configuration updated successfully',
        config: logger.getConfig(),
      });
    },
  });
}
