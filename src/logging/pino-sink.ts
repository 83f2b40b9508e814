import pino from 'pino';
import { LogLevel, type LogEntry } from './types.js';

export type Redactor = (text: string) => string;

type PinoLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
type Destination = ReturnType<typeof pino.destination>;

/** Structured JSON log output to a file or to stderr. */
export class PinoSink {
  private pino: pino.Logger;
  private readonly stream: Destination;
  // stderr belongs to the process; only a log file is ours to end
  private readonly ownsStream: boolean;

  constructor(
    destination: { file: string } | 'stderr',
    private readonly redact: () => Redactor
  ) {
    this.ownsStream = destination !== 'stderr';
    this.stream =
      destination === 'stderr'
        ? pino.destination({ dest: 2, sync: true })
        : pino.destination({ dest: destination.file, sync: false, mkdir: true });

    this.pino = pino(
      {
        level: 'debug', // filtering happens in logger.ts

        formatters: {
          level: (label) => ({ level: label }),
        },

        timestamp: pino.stdTimeFunctions.isoTime,

        redact: {
          paths: ['*.token', '*.apiKey', '*.api_key', '*.key', 'Authorization', '*.Authorization', '*.headers.Authorization'],
          censor: '***REDACTED***',
        },
      },
      this.stream
    );
  }

  log(entry: LogEntry): void {
    try {
      const redact = this.redact();
      const safeMessage = redact(entry.message);
      const safeData: Record<string, unknown> | undefined = entry.data
        ? JSON.parse(redact(JSON.stringify(entry.data)))
        : undefined;

      this.pino[this.mapToPinoLevel(entry.level)](
        {
          level: entry.level, // keep the RFC 5424 name
          logger: entry.logger,
          timestamp: entry.timestamp || new Date().toISOString(),
          ...safeData,
        },
        safeMessage
      );
    } catch (error: unknown) {
      // A broken sink must not fail the request that logged
      console.error('[PinoSink] Failed to write log:', error instanceof Error ? error.message : error);
    }
  }

  // Map RFC 5424 levels to pino's standard levels
  private mapToPinoLevel(level: LogLevel): PinoLevel {
    switch (level) {
      case LogLevel.DEBUG: return 'debug';
      case LogLevel.INFO: return 'info';
      case LogLevel.NOTICE: return 'info';
      case LogLevel.WARNING: return 'warn';
      case LogLevel.ERROR: return 'error';
      case LogLevel.CRITICAL: return 'error';
      case LogLevel.ALERT: return 'fatal';
      case LogLevel.EMERGENCY: return 'fatal';
      default: return 'info';
    }
  }

  close(): void {
    this.pino.flush();
    if (this.ownsStream) {
      this.stream.end();
    }
  }
}
