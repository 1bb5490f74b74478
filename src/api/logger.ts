/**
 * Diagnostic logging
 *
 * Entries go to stderr, either as `[time] [LEVEL] message {context}` or as
 * one JSON object per line (NAS_SYNC_LOG_JSON=true). Credentials are masked
 * before anything is written: middleware API keys and Authorization values
 * inside text, and the values of secret-named keys in the context.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: { name: string; message: string };
}

export interface LoggerConfig {
  /** Minimum level written (default: info) */
  level?: LogLevel;
  /** One JSON object per line */
  json?: boolean;
  /** Prefix human-readable lines with the time (default: true) */
  timestamps?: boolean;
}

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const MAX_DEPTH = 8;

const SECRET_PATTERNS: readonly RegExp[] = [
  // middleware API keys look like "<id>-<64 chars>"
  /\b\d+-[a-zA-Z0-9]{32,}\b/g,
  /Bearer\s+[a-zA-Z0-9._~+/=-]+/gi,
  /Basic\s+[a-zA-Z0-9+/=]+/gi,
];

/** Keys and header names whose values are always masked (lower-case) */
const SECRET_KEYS = new Set([
  'apikey',
  'api_key',
  'authorization',
  'proxy-authorization',
  'x-api-key',
  'cookie',
  'set-cookie',
  'password',
  'passphrase',
  'secret',
  'token',
  'credentials',
  'private_key',
]);

// =============================================================================
// Redaction
// =============================================================================

/**
 * Keep only the first and last four characters of a secret
 *
 * @example
 * redactString('test-secret') // 'test...cret'
 * redactString('short') // '[REDACTED]'
 */
export function redactString(value: string): string {
  if (value.length < 10) {
    return '[REDACTED]';
  }
  return `${value.slice(0, 4)}...${value.slice(-4)}`;
}

export function redactPatterns(value: string): string {
  return SECRET_PATTERNS.reduce((text, pattern) => text.replace(pattern, (match) => redactString(match)), value);
}

function maskSecret(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.length > 0 ? redactString(value) : value;
  }
  return value === null || value === undefined ? value : '[REDACTED]';
}

/**
 * Copy a context record, masking secret-named keys and secret-looking text
 */
export function redactObject(obj: Record<string, unknown>, depth = 0): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[key] = SECRET_KEYS.has(key.toLowerCase()) ? maskSecret(value) : redactValue(value, depth + 1);
  }
  return result;
}

export function redactValue(value: unknown, depth = 0): unknown {
  if (typeof value === 'string') {
    return redactPatterns(value);
  }
  if (typeof value !== 'object' || value === null) {
    return value;
  }
  if (depth > MAX_DEPTH) {
    return '[MAX_DEPTH]';
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => redactValue(item, depth + 1));
  }
  return redactObject(Object.fromEntries(Object.entries(value)), depth);
}

export function redactHeaders(headers: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    result[name] = SECRET_KEYS.has(name.toLowerCase()) ? redactString(value) : redactPatterns(value);
  }
  return result;
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const wanted = value?.trim().toLowerCase();
  return LEVELS.find((level) => level === wanted);
}

// =============================================================================
// Logger
// =============================================================================

export class ApiLogger {
  private readonly config: Required<LoggerConfig>;
  private readonly baseContext: Record<string, unknown>;

  constructor(config: LoggerConfig = {}, baseContext: Record<string, unknown> = {}) {
    this.config = {
      level: config.level ?? 'info',
      json: config.json ?? false,
      timestamps: config.timestamps ?? true,
    };
    this.baseContext = redactObject(baseContext);
  }

  /**
   * A logger with the same settings that adds `context` to every entry
   */
  child(context: Record<string, unknown>): ApiLogger {
    return new ApiLogger(this.config, { ...this.baseContext, ...context });
  }

  setConfig(config: Partial<LoggerConfig>): void {
    Object.assign(this.config, config);
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

  request(method: string, url: string, options: { headers?: Record<string, string>; body?: unknown } = {}): void {
    this.debug(`${method} ${url}`, {
      headers: options.headers ? redactHeaders(options.headers) : undefined,
      body: options.body !== undefined ? redactValue(options.body) : undefined,
    });
  }

  /**
   * Failed responses are logged at warn, the rest at debug
   */
  response(status: number, url: string, options: { durationMs?: number } = {}): void {
    this.write(status >= 400 ? 'warn' : 'debug', `HTTP ${status} ${url}`, { durationMs: options.durationMs });
  }

  formatEntry(entry: LogEntry): string {
    if (this.config.json) {
      return JSON.stringify(entry);
    }

    const parts: string[] = [];
    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp}]`);
    }
    parts.push(`[${entry.level.toUpperCase()}]`, entry.message);
    if (entry.context) {
      parts.push(JSON.stringify(entry.context));
    }
    if (entry.error) {
      parts.push(`\n  ${entry.error.name}: ${entry.error.message}`);
    }
    return parts.join(' ');
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): void {
    if (LEVELS.indexOf(level) < LEVELS.indexOf(this.config.level)) {
      return;
    }

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
      entry.error = { name: error.name, message: redactPatterns(error.message) };
    }

    // stdout is reserved for the report and --json
    console.error(this.formatEntry(entry));
  }
}

/**
 * Process-wide logger; the CLI raises it to debug under --verbose
 */
export const logger = new ApiLogger({
  level: parseLogLevel(process.env.NAS_SYNC_LOG_LEVEL),
  json: process.env.NAS_SYNC_LOG_JSON === 'true',
});
