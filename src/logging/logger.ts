import { LogLevel, LogEntry, LoggerConfig } from './types.js';
import { PinoSink } from './pino-sink.js';

const LEVELS = Object.values(LogLevel);

export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.ERROR): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LEVELS.find((level) => level === normalized) ?? fallback;
}

export class Logger {
  private config: LoggerConfig;
  private sink: PinoSink | null;
  private secret?: string;

  constructor(config?: Partial<LoggerConfig>, sink?: PinoSink) {
    this.config = { ...this.loadConfig(), ...config };
    this.sink = sink ?? null;
  }

  // Load config from environment
  private loadConfig(): LoggerConfig {
    return {
      enabled: process.env.PLANKA_LOG_ENABLED !== 'false',
      level: parseLogLevel(process.env.PLANKA_LOG_LEVEL),
      filePath: process.env.PLANKA_LOG_FILE || undefined,
      requestsEnabled: process.env.PLANKA_LOG_REQUESTS === 'true',
    };
  }

  // Check if level should be logged
  isLevelEnabled(level: LogLevel): boolean {
    if (!this.config.enabled) return false;
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.config.level);
  }

  private log(entry: LogEntry): void {
    if (!this.isLevelEnabled(entry.level)) return;

    // Opened on first use so quiet runs never touch the log file
    if (!this.sink) {
      this.sink = new PinoSink(this.config.filePath);
    }
    this.sink.write(entry, this.secret);
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

  // The active bearer token is scrubbed from every message and payload
  setSecret(token: string | undefined): void {
    this.secret = token;
  }

  updateConfig(newConfig: Partial<LoggerConfig>): void {
    const fileChanged = newConfig.filePath !== undefined && newConfig.filePath !== this.config.filePath;
    this.config = { ...this.config, ...newConfig };
    if (fileChanged) {
      this.sink = null;
    }
  }

  getConfig(): LoggerConfig {
    return { ...this.config };
  }
}

// Singleton instance
export const logger = new Logger();
