/**
 * Logging module barrel export
 *
 * The logging system includes:
 * - Logger coordinator (createLogger)
 * - Console sink with start-up buffering (createConsoleSink)
 * - Log file sink (createFileSink)
 * - Pure filter and format functions
 */

export { colorizeLogLine, formatLogMessage, shouldLog } from './helpers';
export { createConsoleSink } from './console';
export { createFileSink, createNodeFileApi } from './file';
export { createLogger } from './logger';

// Export types
export type {
  LogLevel,
  LogLevels,
  Logger,
  LoggerConfig,
  LoggerDependencies,
  SinkWithLevel,
  LogSink,
  ConsoleSink,
  ConsoleSinkConfig,
  ConsoleAPI,
  FileAPI,
  FileSink,
  FileSinkConfig,
  InitMessage
} from './types';
