/**
 * Logging type definitions
 *
 * Types for the logging system including:
 * - Logger interface and configuration
 * - Sink interfaces (console, file)
 * - Initialization messages
 */

// ═══════════════════════════════════════════════════════════════
// LOG LEVEL TYPES
// Core log level type definitions
// ═══════════════════════════════════════════════════════════════

/**
 * Log level (matches CONFIG.LOG_LEVELS values)
 */
export type LogLevel = 0 | 1 | 2 | 3; // DEBUG | INFO | WARNING | CRITICAL

/**
 * Log level constants structure
 * Passed to pure functions instead of importing CONFIG
 */
export interface LogLevels {
  DEBUG: 0;
  INFO: 1;
  WARNING: 2;
  CRITICAL: 3;
}

// ═══════════════════════════════════════════════════════════════
// LOGGER TYPES
// Core logger interface and configuration
// ═══════════════════════════════════════════════════════════════

/**
 * Main logger interface
 * Provides leveled logging methods and runtime configuration
 */
export interface Logger {
  /** Log at specified level */
  log(level: LogLevel, msg: string): void;
  /** Log DEBUG level message */
  debug(msg: string): void;
  /** Log INFO level message */
  info(msg: string): void;
  /** Log WARNING level message */
  warning(msg: string): void;
  /** Log CRITICAL level message */
  critical(msg: string): void;
  /** Update log level at runtime */
  setLevel(newLevel: LogLevel): void;
  /** Get current log level */
  getLevel(): LogLevel;
  /** Initialize all sinks */
  initialize(callback: (success: boolean, messages: InitMessage[]) => void): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Current log level (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL) */
  level: LogLevel;
}

/**
 * Sink with its minimum log level
 * Logger filters messages before sending to each sink
 */
export interface SinkWithLevel {
  /** The output sink */
  sink: LogSink;
  /** Minimum level this sink receives */
  minLevel: LogLevel;
}

/**
 * Logger external dependencies
 */
export interface LoggerDependencies {
  /** Array of sinks with their minimum levels */
  sinks: SinkWithLevel[];
  /** Where sink failures are reported */
  consoleApi: ConsoleAPI;
}

// ═══════════════════════════════════════════════════════════════
// SINK TYPES
// Output sink interfaces for console and log file
// ═══════════════════════════════════════════════════════════════

/**
 * Base sink interface
 * All sinks must implement write (message only - no level)
 * Level filtering happens in logger before write() is called
 */
export interface LogSink {
  /** Write formatted message to sink (already filtered by level) */
  write(formattedMessage: string): void;
  /** Optional initialization (e.g., create the log directory) */
  initialize?(callback: (success: boolean, message: string) => void): void;
}

/**
 * Console sink interface
 * Holds messages until initialized, then writes straight through
 */
export interface ConsoleSink extends LogSink {
  /** Flush held messages and switch to direct output */
  initialize(callback: (success: boolean, message: string) => void): void;
  /** Get number of held messages (for testing/monitoring) */
  getBufferSize(): number;
}

/**
 * Console sink configuration
 */
export interface ConsoleSinkConfig {
  /** Maximum messages held before initialization */
  bufferSize: number;
  /** Whether to colour lines by level tag */
  colors: boolean;
}

/**
 * Console API interface
 * Abstraction over global console for testability
 */
export interface ConsoleAPI {
  /** Log message to console */
  log(message: string): void;
  /** Log warning to console */
  warn(message: string): void;
}

/**
 * File sink interface
 * Appends one line per message to a log file
 */
export interface FileSink extends LogSink {
  /** Create the log directory and flush held messages */
  initialize(callback: (success: boolean, message: string) => void): void;
  /** Check if sink is initialized */
  isInitialized(): boolean;
  /** Get number of held messages (for testing/monitoring) */
  getBufferSize(): number;
}

/**
 * File sink configuration
 */
export interface FileSinkConfig {
  /** Log file path */
  path: string;
  /** Maximum messages held before initialization */
  bufferSize: number;
}

/**
 * File system API interface
 * Abstraction over fs for testability
 */
export interface FileAPI {
  /** Create a directory and its parents */
  ensureDir(path: string): void;
  /** Append text to a file, creating it when missing */
  append(path: string, text: string): void;
}

// ═══════════════════════════════════════════════════════════════
// INITIALIZATION TYPES
// Types for sink initialization feedback
// ═══════════════════════════════════════════════════════════════

/**
 * Initialization result message
 * Returned by sinks during initialization
 */
export interface InitMessage {
  /** Whether initialization succeeded */
  success: boolean;
  /** Human-readable status message */
  message: string;
}
