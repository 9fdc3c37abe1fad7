/**
 * Payments Map CLI Structured Logging
 *
 * Human-readable colored lines for interactive use, JSON lines for machine
 * consumption.
 *
 * STREAMS:
 * - human mode: debug/info on stdout, warn/error on stderr
 * - JSON mode: every level on stderr, so stdout carries only the command's
 *   own JSON result
 *
 * @module cli/lib/logger
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Log levels in order of severity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

/**
 * Structured log entry, as written in JSON mode
 */
export interface StructuredLogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly message: string;
  readonly service: string;
  readonly command?: string;
  readonly [key: string]: unknown;
}

export interface CLILoggerConfig {
  /** Minimum log level to output */
  readonly level: LogLevel;
  /** Output as JSON lines on stderr */
  readonly json: boolean;
  readonly service: string;
}

type LineWriter = (line: string) => void;

// ============================================================================
// Constants
// ============================================================================

const LEVEL_ORDER: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';
const CYAN = '\x1b[36m';

const LEVEL_COLORS: Readonly<Record<LogLevel, string>> = {
  debug: '\x1b[90m',
  info: '\x1b[34m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

const HUMAN_WRITERS: Readonly<Record<LogLevel, LineWriter>> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

const JSON_WRITER: LineWriter = (line) => console.error(line);

// ============================================================================
// Formatting
// ============================================================================

function formatValue(value: unknown): string {
  return typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);
}

/**
 * `2026-01-01T00:00:00.000Z INFO  message (key=value ...)`
 */
function formatHuman(entry: StructuredLogEntry, metadata: LogMetadata): string {
  const label = entry.level.toUpperCase().padEnd(5);
  const pairs = Object.entries(metadata).map(
    ([key, value]) => `${CYAN}${key}${RESET}=${formatValue(value)}`
  );
  const suffix = pairs.length > 0 ? ` ${DIM}(${pairs.join(' ')})${RESET}` : '';

  return `${DIM}${entry.timestamp}${RESET} ${LEVEL_COLORS[entry.level]}${label}${RESET} ${entry.message}${suffix}`;
}

// ============================================================================
// CLI Logger Class
// ============================================================================

export class CLILogger {
  private readonly config: CLILoggerConfig;
  private startTime = Date.now();
  private command: string | undefined;

  constructor(config: CLILoggerConfig) {
    this.config = config;
  }

  /** Whether output is machine-readable; commands print their result as JSON then */
  get isJson(): boolean {
    return this.config.json;
  }

  private log(level: LogLevel, message: string, metadata: LogMetadata = {}): void {
    if (LEVEL_ORDER.indexOf(level) < LEVEL_ORDER.indexOf(this.config.level)) return;

    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: this.config.service,
      ...(this.command !== undefined ? { command: this.command } : {}),
      ...metadata,
    };

    if (this.config.json) {
      JSON_WRITER(JSON.stringify(entry));
    } else {
      HUMAN_WRITERS[level](formatHuman(entry, metadata));
    }
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', message, metadata);
  }

  /**
   * Tag later entries with the command name and restart the duration timer
   */
  commandStart(command: string, options?: LogMetadata): void {
    this.command = command;
    this.startTime = Date.now();
    this.info(`Starting ${command}`, options);
  }

  commandEnd(success: boolean, metadata?: LogMetadata): void {
    const summary = { duration_ms: Date.now() - this.startTime, ...metadata };

    if (success) {
      this.info('Command completed', summary);
    } else {
      this.error('Command failed', summary);
    }
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createCLILogger(config: Partial<CLILoggerConfig> = {}): CLILogger {
  return new CLILogger({
    level: config.level ?? 'info',
    json: config.json ?? false,
    service: config.service ?? 'payments-map',
  });
}
