/**
 * Structured Logging
 *
 * JSON logging for production, prefixed lines for development, with an
 * in-memory ring buffer of recent entries so the API (and tests) can read
 * back what the monitors reported.
 *
 * Features:
 * - Log levels: DEBUG, INFO, WARN, ERROR, FATAL
 * - Per-trader tagging (the `traderId` field of `data` is lifted onto the entry)
 * - Ring buffer for recent logs
 * - Per-level counters
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR" | "FATAL";

export interface StructuredLogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  /** Service/module that generated the log */
  service: string;
  message: string;
  traderId?: string;
  data?: Record<string, unknown>;
  error?: {
    message: string;
    code?: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  /** Minimum log level to output (default: INFO in production, DEBUG otherwise) */
  minLevel: LogLevel;
  /** Whether to output as JSON lines */
  jsonOutput: boolean;
  includeStackTraces: boolean;
  /** Maximum number of logs to keep in memory ring buffer */
  ringBufferSize: number;
  /** Suppress console output entirely (entries still reach the ring buffer) */
  silent: boolean;
}

export interface LoggerStats {
  totalLogs: number;
  logsByLevel: Record<LogLevel, number>;
  errorsLogged: number;
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  FATAL: 4,
};

const isProduction = process.env.NODE_ENV === "production";

const config: LoggerConfig = {
  minLevel: isProduction ? "INFO" : "DEBUG",
  jsonOutput: isProduction,
  includeStackTraces: !isProduction,
  ringBufferSize: 500,
  silent: process.env.NODE_ENV === "test",
};

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

const ringBuffer: StructuredLogEntry[] = [];

let stats: LoggerStats = {
  totalLogs: 0,
  logsByLevel: { DEBUG: 0, INFO: 0, WARN: 0, ERROR: 0, FATAL: 0 },
  errorsLogged: 0,
};

// ---------------------------------------------------------------------------
// Core Logging
// ---------------------------------------------------------------------------

function errorCode(error: Error): string | undefined {
  return "code" in error && typeof error.code === "string"
    ? error.code
    : undefined;
}

function log(
  level: LogLevel,
  service: string,
  message: string,
  data?: Record<string, unknown>,
  error?: Error,
): void {
  if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[config.minLevel]) {
    return;
  }

  const traderId =
    typeof data?.traderId === "string" ? data.traderId : undefined;

  const entry: StructuredLogEntry = {
    timestamp: new Date().toISOString(),
    level,
    service,
    message,
    ...(traderId !== undefined && { traderId }),
    data,
  };

  if (error) {
    entry.error = {
      message: error.message,
      code: errorCode(error),
      stack: config.includeStackTraces ? error.stack : undefined,
    };
    stats.errorsLogged++;
  }

  stats.totalLogs++;
  stats.logsByLevel[level]++;

  ringBuffer.push(entry);
  if (ringBuffer.length > config.ringBufferSize) {
    ringBuffer.splice(0, ringBuffer.length - config.ringBufferSize);
  }

  if (config.silent) return;

  let line: string;
  if (config.jsonOutput) {
    line = JSON.stringify(entry);
  } else {
    const prefix = `[${level}][${service}]`;
    const traderStr = traderId ? ` (trader:${traderId})` : "";
    const dataStr = data ? ` ${JSON.stringify(data)}` : "";
    const errorStr = error ? ` ERROR: ${error.message}` : "";
    line = `${prefix}${traderStr} ${message}${dataStr}${errorStr}`;
  }

  if (level === "ERROR" || level === "FATAL") {
    console.error(line);
  } else if (level === "WARN") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

// ---------------------------------------------------------------------------
// Log Level Methods
// ---------------------------------------------------------------------------

export const logger = {
  debug(service: string, message: string, data?: Record<string, unknown>): void {
    log("DEBUG", service, message, data);
  },

  info(service: string, message: string, data?: Record<string, unknown>): void {
    log("INFO", service, message, data);
  },

  warn(service: string, message: string, data?: Record<string, unknown>, error?: Error): void {
    log("WARN", service, message, data, error);
  },

  error(service: string, message: string, error?: Error, data?: Record<string, unknown>): void {
    log("ERROR", service, message, data, error);
  },

  fatal(service: string, message: string, error?: Error, data?: Record<string, unknown>): void {
    log("FATAL", service, message, data, error);
  },
};

// ---------------------------------------------------------------------------
// Log Access & Querying
// ---------------------------------------------------------------------------

/**
 * Get recent logs from the ring buffer, oldest first.
 */
export function getRecentLogs(filters?: {
  level?: LogLevel;
  service?: string;
  traderId?: string;
  limit?: number;
}): StructuredLogEntry[] {
  let filtered = [...ringBuffer];

  if (filters?.level) {
    const minPriority = LOG_LEVEL_PRIORITY[filters.level];
    filtered = filtered.filter(
      (l) => LOG_LEVEL_PRIORITY[l.level] >= minPriority,
    );
  }
  if (filters?.service) {
    filtered = filtered.filter((l) => l.service === filters.service);
  }
  if (filters?.traderId) {
    filtered = filtered.filter((l) => l.traderId === filters.traderId);
  }

  const limit = filters?.limit ?? 50;
  return filtered.slice(-limit);
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export function configureLogger(updates: Partial<LoggerConfig>): LoggerConfig {
  Object.assign(config, updates);
  return { ...config };
}

export function getLoggerConfig(): LoggerConfig {
  return { ...config };
}

// ---------------------------------------------------------------------------
// Stats
// ---------------------------------------------------------------------------

export function getLoggerStats(): LoggerStats {
  return { ...stats, logsByLevel: { ...stats.logsByLevel } };
}

/**
 * Reset counters and clear the ring buffer.
 */
export function resetLoggerStats(): void {
  stats = {
    totalLogs: 0,
    logsByLevel: { DEBUG: 0, INFO: 0, WARN: 0, ERROR: 0, FATAL: 0 },
    errorsLogged: 0,
  };
  ringBuffer.length = 0;
}
