import pino from 'pino';
import type { DestinationStream, Logger as PinoLogger } from 'pino';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

type ActiveLevel = Exclude<LogLevel, 'silent'>;

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug', 'trace'];

const LEVEL_RANK: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  silent: 5,
};

/** The more verbose of two levels. */
export function mostVerbose(a: LogLevel, b: LogLevel): LogLevel {
  return LEVEL_RANK[a] <= LEVEL_RANK[b] ? a : b;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Console destination. Defaults to stderr. */
  destination?: DestinationStream;
  /** Additionally append JSON lines to this file. */
  logFile?: string | null;
  fileLevel?: LogLevel;
}

function isActive(level: LogLevel): level is ActiveLevel {
  return level !== 'silent';
}

function formatError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

/**
 * Structured logger. Every line is one JSON object written by pino; child
 * loggers add bindings such as the peer address of a connection.
 */
export class Logger {
  private constructor(private readonly log: PinoLogger) {}

  static create(name: string, options: LoggerOptions = {}): Logger {
    const level = options.level ?? 'info';
    const consoleStream = options.destination ?? pino.destination({ dest: 2, sync: true });
    const base = { name, timestamp: pino.stdTimeFunctions.isoTime };

    if (!options.logFile) {
      return new Logger(pino({ ...base, level }, consoleStream));
    }

    const fileLevel = options.fileLevel ?? 'info';
    const streams: pino.StreamEntry<ActiveLevel>[] = [];
    if (isActive(level)) {
      streams.push({ level, stream: consoleStream });
    }
    if (isActive(fileLevel)) {
      streams.push({
        level: fileLevel,
        stream: pino.destination({ dest: options.logFile, sync: true, mkdir: true }),
      });
    }
    return new Logger(
      pino({ ...base, level: mostVerbose(level, fileLevel) }, pino.multistream(streams)),
    );
  }

  /** A logger that discards everything. */
  static silent(): Logger {
    return new Logger(pino({ level: 'silent' }));
  }

  get level(): LogLevel {
    const current = this.log.level;
    return LOG_LEVELS.find((l) => l === current) ?? 'info';
  }

  setLevel(level: LogLevel): void {
    this.log.level = level;
  }

  child(bindings: Record<string, string | number>): Logger {
    return new Logger(this.log.child(bindings));
  }

  // ─────────────────────────────────────────────────────────────────
  // Basic logging methods
  // ─────────────────────────────────────────────────────────────────

  info(msg: string): void {
    this.log.info(msg);
  }

  debug(msg: string): void {
    this.log.debug(msg);
  }

  trace(msg: string): void {
    this.log.trace(msg);
  }

  warn(msg: string, err?: unknown): void {
    if (err === undefined) {
      this.log.warn(msg);
    } else {
      this.log.warn({ err: formatError(err) }, msg);
    }
  }

  error(msg: string, err?: unknown): void {
    if (err === undefined) {
      this.log.error(msg);
    } else {
      this.log.error({ err: formatError(err) }, msg);
    }
  }

  // ─────────────────────────────────────────────────────────────────
  // Trace content blocks (trace level only)
  // ─────────────────────────────────────────────────────────────────

  /**
   * Log a labeled block of text, e.g. the body of a served quote.
   * Only emitted at trace level.
   */
  traceBlock(label: string, content: string): void {
    if (!this.log.isLevelEnabled('trace')) {
      return;
    }
    this.log.trace({ content }, label);
  }
}
