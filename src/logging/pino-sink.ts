import pino from 'pino';
import { LogEntry, LogLevel } from './types.js';
import { redactSecrets } from '../config.js';

type PinoLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export class PinoSink {
  private pino: pino.Logger;

  // Without a destination, writes to `filePath` when given, otherwise to stderr
  constructor(filePath?: string, destination?: pino.DestinationStream) {
    this.pino = pino({
      level: 'debug', // Pino level (we filter in logger.ts)

      // Structured JSON output
      formatters: {
        level: (label) => ({ level: label }),
      },

      timestamp: pino.stdTimeFunctions.isoTime,

      redact: {
        paths: ['*.token', '*.password', '*.Authorization', '*.authorization'],
        censor: '***REDACTED***',
      },
    },

    // Synchronous so lines are flushed before the process exits
    destination ?? pino.destination({
      dest: filePath ?? 2,
      sync: true,
      mkdir: filePath !== undefined,
    }));
  }

  write(entry: LogEntry, token?: string): void {
    const safeMessage = redactSecrets(entry.message, token);
    const safeData: Record<string, unknown> = entry.data
      ? JSON.parse(redactSecrets(JSON.stringify(entry.data), token))
      : {};

    this.pino[this.mapToPinoLevel(entry.level)]({
      ...safeData,
      severity: entry.level, // Keep original level in log entry
      logger: entry.logger,
    }, safeMessage);
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
}
