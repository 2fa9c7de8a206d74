/**
 * JSON logging with secret redaction for the lifecycle controller
 *
 * Security requirements:
 * - Never log passwords, private keys or relation secrets in plaintext
 * - Redact PEM blocks wherever they appear in messages
 * - Support structured JSON logging for machine consumption
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
  /** Log level */
  level: LogLevel;
  /** Log message */
  message: string;
  /** Additional context data */
  context?: Record<string, unknown>;
  /** Error details (if applicable) */
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

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
  /** Pretty print JSON (default: false) */
  prettyPrint?: boolean;
  /** Line sink; defaults to the console stream matching the level */
  sink?: (level: LogLevel, line: string) => void;
}

// =============================================================================
// Constants
// =============================================================================

/**
 * Patterns to identify sensitive values for redaction
 */
const SENSITIVE_PATTERNS = [
  // PEM private keys and certificate requests
  /-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g,

  // SASL/SCRAM style inline credentials
  /password=[^\s&,;]+/gi,

  // Bearer tokens
  /Bearer\s+[a-zA-Z0-9._-]+/gi,
];

/**
 * Object keys that should have their values redacted
 */
const SENSITIVE_KEYS = new Set([
  'password',
  'secret',
  'secretvalue',
  'secret_value',
  'sasl_plain_password',
  'private_key',
  'private-key',
  'privatekey',
  'password_hash',
  'token',
  'credentials',
]);

/**
 * Log level numeric values for comparison
 */
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
 * Redact a potentially sensitive string value
 * Shows first 4 and last 4 characters for debugging
 *
 * @example
 * redactString('s3cr3tPassw0rdValue') // 's3cr...alue'
 * redactString('short') // '[REDACTED]'
 */
export function redactString(value: string): string {
  if (!value || value.length < 16) {
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
    // Reset lastIndex for global patterns
    pattern.lastIndex = 0;
    result = result.replace(pattern, '[REDACTED]');
  }
  return result;
}

/**
 * Whether a context key names a secret
 */
export function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_KEYS.has(lowerKey) || lowerKey.endsWith('-password');
}

/**
 * Redact sensitive values in a value tree (deep clone with redaction)
 */
export function redactValue(value: unknown, depth = 0): unknown {
  // Prevent infinite recursion
  if (depth > 10) {
    return '[MAX_DEPTH]';
  }

  if (value === null || value === undefined) {
    return value;
  }

  if (typeof value === 'string') {
    return redactPatterns(value);
  }

  if (typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, depth + 1));
  }

  if (value instanceof Set) {
    return [...value].map((item) => redactValue(item, depth + 1));
  }

  return redactObject(Object.fromEntries(Object.entries(value)), depth);
}

/**
 * Redact sensitive values in an object
 */
export function redactObject(
  obj: Record<string, unknown>,
  depth = 0
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isSensitiveKey(key)) {
      if (typeof value === 'string' && value.length > 0) {
        result[key] = redactString(value);
      } else if (value !== null && value !== undefined) {
        result[key] = '[REDACTED]';
      } else {
        result[key] = value;
      }
    } else {
      result[key] = redactValue(value, depth + 1);
    }
  }
  return result;
}

/**
 * Parse a log level from untrusted input
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.toLowerCase()) {
    case 'debug':
      return 'debug';
    case 'info':
      return 'info';
    case 'warn':
    case 'warning':
      return 'warn';
    case 'error':
      return 'error';
    default:
      return undefined;
  }
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
      // stdout carries command results; diagnostics go to stderr
      console.error(line);
  }
}

/**
 * Secure logger with JSON output and automatic secret redaction
 */
export class OperatorLogger {
  private config: Required<LoggerConfig>;
  private readonly baseContext: Record<string, unknown>;

  constructor(config: LoggerConfig = {}, baseContext: Record<string, unknown> = {}) {
    this.config = {
      level: config.level ?? 'info',
      json: config.json ?? false,
      timestamps: config.timestamps ?? true,
      prettyPrint: config.prettyPrint ?? false,
      sink: config.sink ?? consoleSink,
    };
    this.baseContext = redactObject(baseContext);
  }

  /**
   * Check if a log level should be output
   */
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

    const merged = { ...this.baseContext, ...(context ? redactObject(context) : {}) };
    if (Object.keys(merged).length > 0) {
      entry.context = merged;
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: redactPatterns(error.message),
        stack: error.stack ? redactPatterns(error.stack) : undefined,
      };
    }

    return entry;
  }

  private formatEntry(entry: LogEntry): string {
    if (this.config.json) {
      return this.config.prettyPrint
        ? JSON.stringify(entry, null, 2)
        : JSON.stringify(entry);
    }

    // Human-readable format
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
      parts.push(`\n  Error: ${entry.error.name}: ${entry.error.message}`);
    }

    return parts.join(' ');
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): void {
    if (!this.shouldLog(level)) return;
    const entry = this.createEntry(level, message, context, error);
    this.config.sink(level, this.formatEntry(entry));
  }

  /**
   * Log at debug level
   */
  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  /**
   * Log at info level
   */
  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  /**
   * Log at warn level
   */
  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  /**
   * Log at error level
   */
  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.write('error', message, context, error);
  }

  /**
   * Log at an arbitrary level
   */
  log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    this.write(level, message, context);
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): OperatorLogger {
    return new OperatorLogger(this.config, { ...this.baseContext, ...context });
  }

  /**
   * Update logger configuration
   */
  setConfig(config: Partial<LoggerConfig>): void {
    Object.assign(this.config, config);
  }

  /**
   * Get current configuration
   */
  getConfig(): Required<LoggerConfig> {
    return { ...this.config };
  }
}

// =============================================================================
// Default Logger Instance
// =============================================================================

/**
 * Default logger instance for the controller
 */
export const logger = new OperatorLogger({
  level: parseLogLevel(process.env.KARAPACE_OPERATOR_LOG_LEVEL),
  json: process.env.KARAPACE_OPERATOR_LOG_JSON === 'true',
});

/**
 * Create a new logger with custom configuration
 */
export function createLogger(config: LoggerConfig = {}): OperatorLogger {
  return new OperatorLogger(config);
}

/**
 * A logger that discards everything, for tests and embedding
 */
export function createSilentLogger(): OperatorLogger {
  return new OperatorLogger({ level: 'error', sink: () => undefined });
}
