/**
 * Structured Log Levels — RFC 5424 / OpenTelemetry severity ordering.
 *
 * Levels (ascending severity):
 *   TRACE → DEBUG → INFO → WARN → ERROR → FATAL → OFF
 *
 * Use cases:
 *   TRACE  — Per-query detail: predicates and row counts.
 *   DEBUG  — Operational detail: generated UUIDs, version fallback, hook registration.
 *   INFO   — Significant events.
 *   WARN   — Recoverable anomalies: records rejected by a creating hook.
 *   ERROR  — Failed operations requiring attention: repository reads or writes that threw.
 *   FATAL  — Unrecoverable failures.
 *   OFF    — Suppress all log output.
 */

export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
  FATAL = 5,
  OFF = 6,
}

/** String → enum mapping (case-insensitive). */
export function parseLogLevel(value: string | undefined): LogLevel {
  if (!value) return LogLevel.INFO;
  const upper = value.toUpperCase().trim();
  // Look up named key; typeof check avoids numeric enum reverse-mapping ('0' → 'TRACE')
  const mapped = LogLevel[upper as keyof typeof LogLevel];
  if (typeof mapped === 'number') return mapped;
  const num = Number(upper);
  if (upper !== '' && !isNaN(num) && num >= (LogLevel.TRACE as number) && num <= (LogLevel.OFF as number)) return num;
  return LogLevel.INFO;
}

export function logLevelName(level: LogLevel): string {
  return LogLevel[level] ?? 'UNKNOWN';
}

/** Functional areas a log entry can be filtered by. */
export enum LogCategory {
  /** UUID generation, parsing and encoding */
  UUID = 'uuid',
  /** Model lifecycle: hooks, casts, inserts */
  MODEL = 'model',
  /** Record repository reads and writes */
  REPOSITORY = 'repository',
  /** General / uncategorized */
  GENERAL = 'general',
}

export interface LogConfig {
  /** Global minimum log level (LOG_LEVEL, default INFO). */
  globalLevel: LogLevel;

  /**
   * Per-category level overrides.
   * Example: { 'uuid': LogLevel.TRACE, 'repository': LogLevel.WARN }
   */
  categoryLevels: Partial<Record<LogCategory, LogLevel>>;

  /** Include stack traces in ERROR/FATAL output (default: true). */
  includeStackTraces: boolean;

  /** Strings and serialized objects longer than this are truncated (default: 8KB). */
  maxPayloadSizeBytes: number;

  /** 'json' for one structured line per entry, 'pretty' for development. */
  format: 'json' | 'pretty';
}

/** Build default log configuration from environment variables. */
export function buildDefaultLogConfig(): LogConfig {
  const isProd = process.env.NODE_ENV === 'production';
  return {
    globalLevel: parseLogLevel(process.env.LOG_LEVEL),
    categoryLevels: parseCategoryLevels(process.env.LOG_CATEGORY_LEVELS),
    includeStackTraces: process.env.LOG_INCLUDE_STACKS !== 'false',
    maxPayloadSizeBytes: Number(process.env.LOG_MAX_PAYLOAD_SIZE) || 8192,
    format: isProd ? 'json' : parseLogFormat(process.env.LOG_FORMAT),
  };
}

function parseLogFormat(raw: string | undefined): LogConfig['format'] {
  return raw?.trim().toLowerCase() === 'json' ? 'json' : 'pretty';
}

function isLogCategory(value: string): value is LogCategory {
  return (Object.values(LogCategory) as string[]).includes(value);
}

/**
 * Parse LOG_CATEGORY_LEVELS env var.
 * Format: "uuid=TRACE,repository=WARN"
 */
export function parseCategoryLevels(raw: string | undefined): Partial<Record<LogCategory, LogLevel>> {
  if (!raw) return {};
  const result: Partial<Record<LogCategory, LogLevel>> = {};
  for (const pair of raw.split(',')) {
    const [cat, level] = pair.trim().split('=');
    if (cat && level) {
      const category = cat.trim();
      if (isLogCategory(category)) {
        result[category] = parseLogLevel(level.trim());
      }
    }
  }
  return result;
}
