/**
 * Logger interface
 * Structured logging with lifecycle event types, contextual metadata and
 * secret redaction.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured event types for the installation lifecycle
 */
export type LogEventType =
  // Run lifecycle
  | 'run_started'
  | 'run_completed'
  | 'run_failed'
  | 'run_cancelled'
  // Phase lifecycle
  | 'phase_started'
  | 'phase_succeeded'
  | 'phase_failed'
  | 'phase_skipped'
  // Retry engine
  | 'attempt_failed'
  | 'retry_scheduled'
  // Backups
  | 'backup_started'
  | 'backup_completed'
  | 'backup_failed'
  | 'backup_pruned'
  | 'restore_completed'
  | 'restore_failed'
  // Persistence
  | 'state_saved'
  | 'state_archived'
  | 'lock_acquired'
  | 'lock_released'
  // Gates
  | 'preflight_check'
  | 'config_drift'
  // General
  | 'debug'
  | 'info'
  | 'warn'
  | 'error';

/**
 * Metadata attached to every log event
 */
export interface LogMetadata {
  /** Installation run identifier */
  runId?: string;
  /** Phase name */
  phase?: string;
  /** Attempt number within the current phase invocation */
  attempt?: number;
  [key: string]: unknown;
}

export interface LogEvent {
  /** ISO 8601 */
  timestamp: string;
  level: LogLevel;
  eventType: LogEventType;
  message: string;
  metadata: LogMetadata;
}

export interface LoggerOptions {
  /** Minimum level to emit */
  minLevel?: LogLevel;
  /** Prefix console lines with the local time */
  includeTimestamp?: boolean;
  /** Emit one JSON object per line */
  jsonOutput?: boolean;
  /** Patterns whose matches are redacted from messages and string metadata */
  redactPatterns?: RegExp[];
}

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;

  /**
   * Log a structured lifecycle event; the level is derived from the type
   */
  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void;

  /**
   * Merge context (runId, phase...) into all subsequent events
   */
  setContext(context: Partial<LogMetadata>): void;
  clearContext(): void;

  /**
   * Events emitted so far by this logger
   */
  getEvents(): LogEvent[];

  setMinLevel(level: LogLevel): void;

  /**
   * Derive a logger that adds `additionalContext` to every event
   */
  child(additionalContext: Partial<LogMetadata>): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

/**
 * Level used for each structured event type
 */
export function getEventLevel(eventType: LogEventType): LogLevel {
  switch (eventType) {
    case 'error':
    case 'run_failed':
    case 'phase_failed':
    case 'backup_failed':
    case 'restore_failed':
      return 'error';
    case 'warn':
    case 'attempt_failed':
    case 'config_drift':
    case 'run_cancelled':
      return 'warn';
    case 'debug':
    case 'state_saved':
    case 'lock_acquired':
    case 'lock_released':
      return 'debug';
    default:
      return 'info';
  }
}

/**
 * Secret patterns redacted by default.
 * Installers handle database passwords, admin credentials and TLS keys, so
 * assignments to those names and PEM private key blocks are covered as well
 * as common token formats.
 */
export const DEFAULT_REDACT_PATTERNS: RegExp[] = [
  // PEM private keys
  /-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g,
  // Bearer tokens
  /Bearer\s+[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+/gi,
  // AWS access key ids
  /(?:AKIA|ABIA|ACCA|ASIA)[A-Z0-9]{16}/g,
  // GitHub tokens
  /gh[pousr]_[a-zA-Z0-9]{36}/g,
  // Generic api keys
  /(?:api[_-]?key|apikey)[=:\s]*['"]?([a-zA-Z0-9_-]{20,})['"]?/gi,
  // password=..., DB_PASSWORD: ..., secret ..., token=...
  /(?:passw(?:or)?d|secret|token|credential)[a-z_]*[=:\s]+['"]?([^\s'"]{4,})['"]?/gi,
];

/**
 * Redact secrets from `text`, keeping a short visible prefix of each match
 */
export function redactSecrets(text: string, patterns: RegExp[] = DEFAULT_REDACT_PATTERNS): string {
  let result = text;
  for (const pattern of patterns) {
    pattern.lastIndex = 0;
    result = result.replace(pattern, (match) => {
      const visible = Math.min(4, Math.floor(match.length / 4));
      return match.slice(0, visible) + '[REDACTED]';
    });
  }
  return result;
}
