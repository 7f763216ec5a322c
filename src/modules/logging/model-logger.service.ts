import { Injectable } from '@nestjs/common';
import {
  LogLevel,
  LogCategory,
  LogConfig,
  buildDefaultLogConfig,
  logLevelName,
  parseLogLevel,
} from './log-levels';

/**
 * A single structured log entry.
 * In JSON format mode these are emitted as one JSON line per entry.
 */
export interface StructuredLogEntry {
  /** ISO-8601 timestamp */
  timestamp: string;
  level: string;
  category: string;
  message: string;
  error?: {
    message: string;
    name?: string;
    stack?: string;
  };
  /** Additional structured data (model table, resolved version, predicates, ...) */
  data?: Record<string, unknown>;
}

/**
 * ModelLogger — structured, leveled logger for the model and UUID layers.
 *
 * - TRACE → DEBUG → INFO → WARN → ERROR → FATAL levels
 * - Global and per-category level configuration, changeable at runtime
 * - JSON output for production, pretty output for development
 * - Ring buffer of recent entries for inspection
 *
 * Usage:
 *   this.logger.debug(LogCategory.UUID, 'Generated uuid', { table: 'posts', version: 'uuid4' });
 */
@Injectable()
export class ModelLogger {
  private config: LogConfig;

  private readonly ringBuffer: StructuredLogEntry[] = [];
  private readonly maxRingBufferSize = 500;

  constructor() {
    this.config = buildDefaultLogConfig();
  }

  // ─── Configuration ────────────────────────────────────────────────

  getConfig(): LogConfig {
    return { ...this.config, categoryLevels: { ...this.config.categoryLevels } };
  }

  updateConfig(partial: Partial<LogConfig>): void {
    Object.assign(this.config, partial);
  }

  setGlobalLevel(level: LogLevel | string): void {
    this.config.globalLevel = typeof level === 'string' ? parseLogLevel(level) : level;
  }

  setCategoryLevel(category: LogCategory, level: LogLevel | string): void {
    this.config.categoryLevels[category] = typeof level === 'string' ? parseLogLevel(level) : level;
  }

  // ─── Level-specific methods ───────────────────────────────────────

  trace(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.TRACE, category, message, data);
  }

  debug(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, category, message, data);
  }

  info(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, category, message, data);
  }

  warn(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, category, message, data);
  }

  error(category: LogCategory, message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, category, message, data, this.formatError(error));
  }

  fatal(category: LogCategory, message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log(LogLevel.FATAL, category, message, data, this.formatError(error));
  }

  // ─── Ring buffer access ───────────────────────────────────────────

  getRecentLogs(options?: { limit?: number; level?: LogLevel; category?: LogCategory }): StructuredLogEntry[] {
    let entries = [...this.ringBuffer];

    if (options?.level !== undefined) {
      const minLevel = options.level;
      entries = entries.filter((e) => parseLogLevel(e.level) >= minLevel);
    }
    if (options?.category) {
      const category: string = options.category;
      entries = entries.filter((e) => e.category === category);
    }

    const limit = options?.limit ?? 100;
    return entries.slice(-limit);
  }

  clearRecentLogs(): void {
    this.ringBuffer.length = 0;
  }

  // ─── Core logging logic ───────────────────────────────────────────

  /** Check if a log at the given level + category should be emitted. */
  isEnabled(level: LogLevel, category?: LogCategory): boolean {
    if (category) {
      const categoryLevel = this.config.categoryLevels[category];
      if (categoryLevel !== undefined) {
        return level >= categoryLevel;
      }
    }
    return level >= this.config.globalLevel;
  }

  private log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    data?: Record<string, unknown>,
    errorInfo?: StructuredLogEntry['error'],
  ): void {
    if (!this.isEnabled(level, category)) return;

    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level: logLevelName(level),
      category,
      message,
    };

    if (errorInfo) {
      entry.error = errorInfo;
      if (!this.config.includeStackTraces) {
        delete entry.error.stack;
      }
    }

    if (data) {
      entry.data = this.sanitizeData(data);
    }

    this.ringBuffer.push(entry);
    if (this.ringBuffer.length > this.maxRingBufferSize) {
      this.ringBuffer.shift();
    }

    this.emit(level, entry);
  }

  private formatError(error: unknown): StructuredLogEntry['error'] | undefined {
    if (!error) return undefined;
    if (error instanceof Error) {
      return {
        message: error.message,
        name: error.name,
        stack: error.stack,
      };
    }
    return { message: String(error) };
  }

  /** Truncate large values, redact secrets, render bytes as hex. */
  private sanitizeData(data: Record<string, unknown>): Record<string, unknown> {
    const max = this.config.maxPayloadSizeBytes;
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      if (/secret|password|token|authorization/i.test(key)) {
        result[key] = '[REDACTED]';
        continue;
      }

      if (Buffer.isBuffer(value)) {
        result[key] = `0x${value.toString('hex')}`;
      } else if (typeof value === 'string' && value.length > max) {
        result[key] = value.slice(0, max) + `...[truncated ${value.length - max}B]`;
      } else if (typeof value === 'object' && value !== null) {
        const serialized = JSON.stringify(value);
        result[key] = serialized.length > max ? serialized.slice(0, max) + '...[truncated]' : value;
      } else {
        result[key] = value;
      }
    }
    return result;
  }

  private emit(level: LogLevel, entry: StructuredLogEntry): void {
    const line = this.config.format === 'json' ? JSON.stringify(entry) : this.formatPretty(level, entry);
    if (this.config.format === 'json') {
      (level >= LogLevel.WARN ? process.stderr : process.stdout).write(line + '\n');
      return;
    }
    switch (level) {
      case LogLevel.TRACE:
      case LogLevel.DEBUG:
        // eslint-disable-next-line no-console
        console.debug(line);
        break;
      case LogLevel.INFO:
        // eslint-disable-next-line no-console
        console.log(line);
        break;
      case LogLevel.WARN:
        // eslint-disable-next-line no-console
        console.warn(line);
        break;
      default:
        // eslint-disable-next-line no-console
        console.error(line);
        break;
    }
  }

  private formatPretty(level: LogLevel, entry: StructuredLogEntry): string {
    const ts = entry.timestamp.slice(11, 23); // HH:mm:ss.SSS
    const lvl = this.colorize(level, entry.level.padEnd(5));
    let line = `${ts} ${lvl} ${entry.category.padEnd(9)} ${entry.message}`;

    if (entry.error) {
      line += ` | ERROR: ${entry.error.message}`;
      if (entry.error.stack && this.config.includeStackTraces) {
        line += `\n${entry.error.stack}`;
      }
    }

    if (entry.data && Object.keys(entry.data).length > 0) {
      if (level <= LogLevel.DEBUG) {
        line += `\n  ${JSON.stringify(entry.data, null, 2).replace(/\n/g, '\n  ')}`;
      } else {
        const compact = JSON.stringify(entry.data);
        if (compact.length <= 200) {
          line += ` | ${compact}`;
        }
      }
    }
    return line;
  }

  private colorize(level: LogLevel, text: string): string {
    if (!process.stdout.isTTY) return text;
    switch (level) {
      case LogLevel.TRACE: return `\x1b[90m${text}\x1b[0m`;  // gray
      case LogLevel.DEBUG: return `\x1b[36m${text}\x1b[0m`;  // cyan
      case LogLevel.INFO:  return `\x1b[32m${text}\x1b[0m`;  // green
      case LogLevel.WARN:  return `\x1b[33m${text}\x1b[0m`;  // yellow
      case LogLevel.ERROR: return `\x1b[31m${text}\x1b[0m`;  // red
      case LogLevel.FATAL: return `\x1b[35m${text}\x1b[0m`;  // magenta
      default: return text;
    }
  }
}
