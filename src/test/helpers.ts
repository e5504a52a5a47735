import * as os from 'os';
import * as path from 'path';
import * as fs from 'fs';
import type { DestinationStream } from 'pino';
import { QuoteSource } from '../types';
import { Logger, LogLevel } from '../utils/logger';

/** No-op Logger for unit tests */
export function makeLogger(): Logger {
  return Logger.silent();
}

export interface LogLine {
  level: number;
  msg: string;
  [key: string]: unknown;
}

function isLogLine(value: unknown): value is LogLine {
  return (
    typeof value === 'object' &&
    value !== null &&
    'level' in value &&
    typeof value.level === 'number' &&
    'msg' in value &&
    typeof value.msg === 'string'
  );
}

/** Logger that keeps every JSON line it writes, for asserting on log output */
export function makeCapturingLogger(level: LogLevel = 'trace'): {
  logger: Logger;
  lines: LogLine[];
  messages: () => string[];
} {
  const lines: LogLine[] = [];
  const destination: DestinationStream = {
    write(msg: string) {
      const parsed: unknown = JSON.parse(msg);
      if (isLogLine(parsed)) {
        lines.push(parsed);
      }
    },
  };
  const logger = Logger.create('test', { level, destination });
  return { logger, lines, messages: () => lines.map((l) => l.msg) };
}

/**
 * Write `files` (relative path -> content) under a fresh temp directory.
 * Callers remove it with removeDir().
 */
export function makeQuoteDir(files: Record<string, string | Buffer>): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'qotd-test-'));
  for (const [name, content] of Object.entries(files)) {
    const filePath = path.join(dir, name);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
  }
  return dir;
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Build fortune-file text from quote bodies, with a delimiter line after each. */
export function fortuneFile(quotes: string[], header = ''): string {
  return header + quotes.map((q) => `%\n${q}`).join('') + '%\n';
}

/**
 * In-memory QuoteSource. Serves `quotes` round-robin and records how many
 * reads were made and how many overlapped.
 */
export class FakeQuoteSource implements QuoteSource {
  calls = 0;
  inFlight = 0;
  maxInFlight = 0;
  private next = 0;
  private failAt: number | null = null;

  constructor(
    private readonly quotes: (string | Buffer)[],
    private readonly delayMs = 0,
  ) {}

  /** Make the nth read (1-based) reject. */
  failOnCall(n: number): this {
    this.failAt = n;
    return this;
  }

  async randomQuote(): Promise<Buffer> {
    this.calls++;
    const call = this.calls;
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.delayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.delayMs));
      } else {
        await Promise.resolve();
      }
      if (call === this.failAt) {
        throw new Error('disk on fire');
      }
      const quote = this.quotes[this.next % this.quotes.length];
      this.next++;
      return Buffer.isBuffer(quote) ? quote : Buffer.from(quote);
    } finally {
      this.inFlight--;
    }
  }
}

/** Let pending promise callbacks and I/O callbacks run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
