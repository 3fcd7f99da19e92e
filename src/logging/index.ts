export { logger, Logger, parseLogLevel } from './logger.js';
export { LogLevel, type LogEntry, type LoggerConfig } from './types.js';
export { PinoSink } from './pino-sink.js';
