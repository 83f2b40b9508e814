import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import type { LoggingLevel } from '@modelcontextprotocol/sdk/types.js';
import { LogLevel, type LogEntry } from './types.js';

const MCP_LEVELS: Record<LogLevel, LoggingLevel> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.NOTICE]: 'notice',
  [LogLevel.WARNING]: 'warning',
  [LogLevel.ERROR]: 'error',
  [LogLevel.CRITICAL]: 'critical',
  [LogLevel.ALERT]: 'alert',
  [LogLevel.EMERGENCY]: 'emergency',
};

/** Forwards log entries to the MCP client as `notifications/message`. */
export class MCPLogger {
  private server: Server | null = null; // set once the server is created

  setServer(server: Server): void {
    this.server = server;
  }

  log(entry: LogEntry, redact: (text: string) => string): void {
    if (!this.server) {
      return;
    }

    const data: Record<string, unknown> = {
      message: redact(entry.message),
      timestamp: entry.timestamp || new Date().toISOString(),
      ...(entry.data ? JSON.parse(redact(JSON.stringify(entry.data))) : {}),
    };

    this.server
      .sendLoggingMessage({
        level: MCP_LEVELS[entry.level],
        logger: entry.logger || 'trello-mcp',
        data,
      })
      .catch((error: unknown) => {
        // The transport may be closed; logging must never crash the server
        console.error('[MCPLogger] Failed to send log:', error instanceof Error ? error.message : error);
      });
  }
}
