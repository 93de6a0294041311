/**
 * Structured logging with secret redaction
 *
 * - Human-readable lines by default, JSON lines for CI/automation
 * - Bearer tokens, client keys and kubeconfig credentials are never
 *   written in plaintext
 * - Child loggers carry bound context (identity, tier, command)
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
}

/**
 * Where formatted entries go. Defaults to the console streams.
 */
export type LogSink = (level: LogLevel, line: string) => void;

// =============================================================================
// Constants
// =============================================================================

/**
 * Patterns to identify sensitive values for redaction
 */
const SENSITIVE_PATTERNS = [
  // Bearer tokens
  /Bearer\s+[a-zA-Z0-9._~+/-]+=*/gi,

  // JWT tokens (service account tokens)
  /eyJ[a-zA-Z0-9_-]*\.eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*/g,

  // PEM blocks (client keys inlined in kubeconfig)
  /-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g,

  // Generic secrets
  /secret[_-]?[a-zA-Z0-9]{10,}/gi,
  /token[_-]?[a-zA-Z0-9]{10,}/gi,
];

/**
 * Header names that should have their values redacted
 */
const SENSITIVE_HEADERS = new Set([
  'authorization',
  'x-auth-token',
  'cookie',
  'set-cookie',
  'proxy-authorization',
]);

/**
 * Object keys (lowercased) whose values are always redacted
 */
const SENSITIVE_KEYS = new Set([
  'password',
  'secret',
  'token',
  'access_token',
  'accesstoken',
  'authorization',
  'auth',
  'credentials',
  'client-key-data',
  'clientkeydata',
  'client-certificate-data',
  'private_key',
  'privatekey',
]);

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

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
 * Redact a potentially sensitive string value.
 * Shows the first and last 4 characters for debugging.
 *
 * @example
 * redactString('abcd1234wxyz9876') // 'abcd...9876'
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
 * Redact sensitive values in a JSON-like value (deep copy with redaction)
 */
export function redactValue(value: unknown, depth = 0): unknown {
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

  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    const lowerKey = key.toLowerCase();

    if (SENSITIVE_KEYS.has(lowerKey) || SENSITIVE_HEADERS.has(lowerKey)) {
      if (typeof entry === 'string' && entry.length > 0) {
        result[key] = redactString(entry);
      } else if (entry !== null && entry !== undefined) {
        result[key] = '[REDACTED]';
      } else {
        result[key] = entry;
      }
    } else {
      result[key] = redactValue(entry, depth + 1);
    }
  }

  return result;
}

/**
 * Redact a context record
 */
export function redactObject(obj: Record<string, unknown>): Record<string, unknown> {
  const redacted = redactValue(obj);
  return isRecord(redacted) ? redacted : {};
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// =============================================================================
// Logger Class
// =============================================================================

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    default:
      // stdout stays reserved for command output (JSON reports, YAML)
      console.error(line);
  }
};

/**
 * Logger with JSON output and automatic secret redaction
 */
export class ApiLogger {
  private config: Required<LoggerConfig>;
  private readonly boundContext: Record<string, unknown>;
  private readonly sink: LogSink;

  constructor(
    config: LoggerConfig = {},
    options: { context?: Record<string, unknown>; sink?: LogSink } = {}
  ) {
    this.config = {
      level: config.level ?? 'info',
      json: config.json ?? false,
      timestamps: config.timestamps ?? true,
      prettyPrint: config.prettyPrint ?? false,
    };
    this.boundContext = options.context ? redactObject(options.context) : {};
    this.sink = options.sink ?? consoleSink;
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

    const merged = { ...this.boundContext, ...(context ? redactObject(context) : {}) };
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

  /**
   * Format entry for output
   */
  formatEntry(entry: LogEntry): string {
    if (this.config.json) {
      return this.config.prettyPrint
        ? JSON.stringify(entry, null, 2)
        : JSON.stringify(entry);
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
      parts.push(`\n  Error: ${entry.error.name}: ${entry.error.message}`);
    }

    return parts.join(' ');
  }

  private write(level: LogLevel, entry: LogEntry): void {
    this.sink(level, this.formatEntry(entry));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    this.write('debug', this.createEntry('debug', message, context));
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;
    this.write('info', this.createEntry('info', message, context));
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;
    this.write('warn', this.createEntry('warn', message, context));
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    this.write('error', this.createEntry('error', message, context, error));
  }

  /**
   * Log an outgoing control-plane request
   */
  request(method: string, target: string, body?: unknown): void {
    this.debug('API request', {
      method,
      target: redactPatterns(target),
      body: body === undefined ? undefined : redactValue(body),
    });
  }

  /**
   * Log a control-plane response (warn level for 4xx/5xx)
   */
  response(status: number, target: string, durationMs?: number): void {
    const level: LogLevel = status >= 400 ? 'warn' : 'debug';
    if (!this.shouldLog(level)) return;
    this.write(
      level,
      this.createEntry(level, `API response ${status}: ${target}`, { status, durationMs })
    );
  }

  /**
   * Create a child logger with additional bound context
   */
  child(context: Record<string, unknown>): ApiLogger {
    return new ApiLogger(this.config, {
      context: { ...this.boundContext, ...context },
      sink: this.sink,
    });
  }

  /**
   * Update logger configuration
   */
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

/**
 * Parse a log level from an environment value
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const lower = value?.toLowerCase();
  return LOG_LEVELS.find((level) => level === lower);
}

/**
 * Default process-wide logger
 */
export const logger = new ApiLogger({
  level: parseLogLevel(process.env.KUBECONVERGE_LOG_LEVEL),
  json: process.env.KUBECONVERGE_LOG_JSON === 'true',
});

/**
 * Create a new logger with custom configuration
 */
export function createLogger(config: LoggerConfig = {}, sink?: LogSink): ApiLogger {
  return new ApiLogger(config, { sink });
}
