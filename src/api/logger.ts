/**
 * Structured logging with secret redaction
 *
 * Repository tokens and webhook secrets pass through the same process as
 * the log output, so every message, context object and error is scrubbed
 * before it is written.
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Log levels in order of severity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Additional context data */
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

/**
 * Destination for formatted log lines
 */
export type LogSink = (level: LogLevel, line: string) => void;

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Output as JSON (default: false for human-readable) */
  json?: boolean;
  /** Include timestamps (default: true) */
  timestamps?: boolean;
  /** Replaces console output */
  sink?: LogSink;
}

// =============================================================================
// Constants
// =============================================================================

/**
 * Patterns to identify sensitive values for redaction
 */
const SENSITIVE_PATTERNS = [
  // GitHub personal access tokens, classic and fine-grained
  /gh[pousr]_[A-Za-z0-9]{20,}/g,
  /github_pat_[A-Za-z0-9_]{20,}/g,

  // Authorization header values
  /Bearer\s+[a-zA-Z0-9._-]+/gi,
  /token\s+[a-zA-Z0-9._-]{16,}/gi,

  // Webhook signatures
  /sha256=[a-f0-9]{64}/gi,

  // Generic secrets
  /secret[_-]?[a-zA-Z0-9]{10,}/gi,
];

/**
 * Header names that should have their values redacted
 */
const SENSITIVE_HEADERS = new Set([
  'authorization',
  'x-hub-signature-256',
  'cookie',
  'set-cookie',
  'proxy-authorization',
]);

/**
 * Object keys (lowercased) that should have their values redacted
 */
const SENSITIVE_KEYS = new Set([
  'password',
  'secret',
  'token',
  'accesstoken',
  'access_token',
  'authorization',
  'auth',
  'credentials',
  'signature',
  'webhooksecret',
]);

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// =============================================================================
// Redaction Functions
// =============================================================================

/**
 * Redact a potentially sensitive string value.
 * Shows first 4 and last 4 characters for debugging.
 *
 * @example
 * redactString('ghp_abcdefghijklmnop1234') // 'ghp_...1234'
 * redactString('short') // '[REDACTED]'
 */
export function redactString(value: string): string {
  if (!value || value.length < 10) {
    return '[REDACTED]';
  }
  return value.substring(0, 4) + '...' + value.substring(value.length - 4);
}

/**
 * Apply pattern-based redaction to a string
 */
export function redactPatterns(value: string): string {
  let result = value;
  for (const pattern of SENSITIVE_PATTERNS) {
    pattern.lastIndex = 0;
    result = result.replace(pattern, (match) => redactString(match));
  }
  return result;
}

/**
 * Deep copy of a value with sensitive keys and patterns redacted
 */
export function redactValue(value: unknown, depth = 0): unknown {
  if (depth > 10) {
    return '[MAX_DEPTH]';
  }
  if (typeof value === 'string') {
    return redactPatterns(value);
  }
  if (value === null || typeof value !== 'object') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, depth + 1));
  }

  const result: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    const lowerKey = key.toLowerCase();
    if (SENSITIVE_KEYS.has(lowerKey) || SENSITIVE_HEADERS.has(lowerKey)) {
      if (typeof inner === 'string' && inner.length > 0) {
        result[key] = redactString(inner);
      } else if (inner !== null && inner !== undefined) {
        result[key] = '[REDACTED]';
      } else {
        result[key] = inner;
      }
    } else {
      result[key] = redactValue(inner, depth + 1);
    }
  }
  return result;
}

/**
 * Redact a context object, keeping its record shape
 */
export function redactContext(
  context: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    const lowerKey = key.toLowerCase();
    if (SENSITIVE_KEYS.has(lowerKey) || SENSITIVE_HEADERS.has(lowerKey)) {
      result[key] =
        typeof value === 'string' && value.length > 0
          ? redactString(value)
          : value === undefined || value === null
            ? value
            : '[REDACTED]';
    } else {
      result[key] = redactValue(value, 1);
    }
  }
  return result;
}

/**
 * Redact sensitive headers from a Headers object or plain object
 */
export function redactHeaders(
  headers: Headers | Record<string, string>
): Record<string, string> {
  const result: Record<string, string> = {};
  const entries: [string, string][] =
    headers instanceof Headers
      ? Array.from(headers.entries())
      : Object.entries(headers);

  for (const [key, value] of entries) {
    if (SENSITIVE_HEADERS.has(key.toLowerCase())) {
      result[key] = redactString(value);
    } else {
      result[key] = redactPatterns(value);
    }
  }
  return result;
}

/**
 * Type guard for log level strings read from the environment
 */
export function isLogLevel(value: unknown): value is LogLevel {
  return (
    value === 'debug' || value === 'info' || value === 'warn' || value === 'error'
  );
}

// =============================================================================
// Logger Class
// =============================================================================

function consoleSink(level: LogLevel, line: string): void {
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    default:
      // stdout stays reserved for command output
      console.error(line);
  }
}

/**
 * Logger with JSON output and automatic secret redaction
 */
export class ApiLogger {
  private config: Required<LoggerConfig>;
  private readonly bindings: Record<string, unknown>;

  constructor(config: LoggerConfig = {}, bindings: Record<string, unknown> = {}) {
    this.config = {
      level: config.level ?? 'info',
      json: config.json ?? false,
      timestamps: config.timestamps ?? true,
      sink: config.sink ?? consoleSink,
    };
    this.bindings = bindings;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private createEntry(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: redactPatterns(message),
    };

    const merged = { ...this.bindings, ...context };
    if (Object.keys(merged).length > 0) {
      entry.context = redactContext(merged);
    }

    if (error) {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      entry.error = {
        name: error.name,
        message: redactPatterns(error.message),
        code,
        stack: error.stack ? redactPatterns(error.stack) : undefined,
      };
    }

    return entry;
  }

  private formatEntry(entry: LogEntry): string {
    if (this.config.json) {
      return JSON.stringify(entry);
    }

    const parts: string[] = [];
    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp}]`);
    }
    parts.push(`[${entry.level.toUpperCase()}]`);
    parts.push(entry.message);

    if (entry.context && Object.keys(entry.context).length > 0) {
      parts.push(JSON.stringify(entry.context));
    }
    if (entry.error) {
      const code = entry.error.code ? ` (${entry.error.code})` : '';
      parts.push(`\n  Error: ${entry.error.name}${code}: ${entry.error.message}`);
    }

    return parts.join(' ');
  }

  private write(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.shouldLog(level)) return;
    const entry = this.createEntry(level, message, context, error);
    this.config.sink(level, this.formatEntry(entry));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.write('error', message, context, error);
  }

  /**
   * Log an HTTP request (with redacted sensitive data)
   */
  request(method: string, url: string, headers?: Headers | Record<string, string>): void {
    this.debug('HTTP Request', {
      method,
      url: redactPatterns(url),
      headers: headers ? redactHeaders(headers) : undefined,
    });
  }

  /**
   * Log an HTTP response; 4xx/5xx are warnings
   */
  response(status: number, url: string, durationMs?: number): void {
    const level: LogLevel = status >= 400 ? 'warn' : 'debug';
    this.write(level, `HTTP Response ${status}: ${redactPatterns(url)}`, {
      status,
      durationMs,
    });
  }

  /**
   * Create a child logger with additional bound context
   */
  child(context: Record<string, unknown>): ApiLogger {
    return new ApiLogger(this.config, { ...this.bindings, ...context });
  }

  setConfig(config: Partial<LoggerConfig>): void {
    Object.assign(this.config, config);
  }

  getConfig(): Required<LoggerConfig> {
    return { ...this.config };
  }
}

// =============================================================================
// Default Logger Instance
// =============================================================================

const envLevel = process.env.COURSE_SYNC_LOG_LEVEL;

/**
 * Default process-wide logger
 */
export const logger = new ApiLogger({
  level: isLogLevel(envLevel) ? envLevel : undefined,
  json: process.env.COURSE_SYNC_LOG_JSON === 'true',
});
