import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { AllowedCategories, ALLOWED_CATEGORIES, DEFAULT_HOST, DEFAULT_PORT } from './types';
import { LogLevel, mostVerbose } from './utils/logger';
import { DEFAULT_USER } from './server/privileges';
import { DEFAULT_TIMEOUT_MS, QotdProtocol } from './client/qotd-client';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Package root, one level above src/ (or dist/ once built). */
const PACKAGE_ROOT = path.resolve(__dirname, '..');

export const DEFAULT_QUOTE_DIR = path.join(PACKAGE_ROOT, 'data');

export function readVersion(): string {
  try {
    const raw = fs.readFileSync(path.join(PACKAGE_ROOT, 'package.json'), 'utf-8');
    const parsed: unknown = JSON.parse(raw);
    const result = z.object({ version: z.string() }).safeParse(parsed);
    return result.success ? result.data.version : 'unknown';
  } catch {
    return 'unknown';
  }
}

// ─────────────────────────────────────────────────────────────────
// Argument tokenizer
// ─────────────────────────────────────────────────────────────────

interface OptionSpec {
  short?: string;
  long: string;
  takesValue: boolean;
}

type ParsedOptions = Map<string, string[]>;

interface ParsedArgs {
  options: ParsedOptions;
  positionals: string[];
}

function addOption(options: ParsedOptions, name: string, value: string): void {
  const values = options.get(name);
  if (values) {
    values.push(value);
  } else {
    options.set(name, [value]);
  }
}

/**
 * Split argv into options and positionals. Short boolean flags may be
 * clustered (`-vv`); values may be attached (`-p17`, `--port=17`) or given
 * as the next argument. `--` ends option parsing.
 */
export function tokenize(argv: readonly string[], specs: readonly OptionSpec[]): ParsedArgs {
  const options: ParsedOptions = new Map();
  const positionals: string[] = [];

  const byLong = new Map(specs.map((s) => [s.long, s]));
  const byShort = new Map(specs.flatMap((s) => (s.short ? [[s.short, s] as const] : [])));

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--') {
      positionals.push(...argv.slice(i + 1));
      break;
    }

    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
      const spec = byLong.get(name);
      if (!spec) {
        throw new ConfigError(`Unknown option: --${name}`);
      }
      if (!spec.takesValue) {
        if (eq !== -1) {
          throw new ConfigError(`Option --${name} does not take a value`);
        }
        addOption(options, spec.long, '');
      } else if (eq !== -1) {
        addOption(options, spec.long, arg.slice(eq + 1));
      } else {
        if (i + 1 >= argv.length) {
          throw new ConfigError(`Option --${name} requires a value`);
        }
        addOption(options, spec.long, argv[++i]);
      }
      continue;
    }

    if (arg.startsWith('-') && arg.length > 1) {
      for (let j = 1; j < arg.length; j++) {
        const spec = byShort.get(arg[j]);
        if (!spec) {
          throw new ConfigError(`Unknown option: -${arg[j]}`);
        }
        if (!spec.takesValue) {
          addOption(options, spec.long, '');
          continue;
        }
        const attached = arg.slice(j + 1);
        if (attached) {
          addOption(options, spec.long, attached);
        } else if (i + 1 < argv.length) {
          addOption(options, spec.long, argv[++i]);
        } else {
          throw new ConfigError(`Option -${arg[j]} requires a value`);
        }
        break;
      }
      continue;
    }

    positionals.push(arg);
  }

  return { options, positionals };
}

function last(options: ParsedOptions, name: string): string | undefined {
  const values = options.get(name);
  return values ? values[values.length - 1] : undefined;
}

function count(options: ParsedOptions, name: string): number {
  return options.get(name)?.length ?? 0;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

const integerString = z
  .string()
  .regex(/^\d+$/, 'must be a non-negative integer')
  .transform(Number);

const portSchema = integerString.pipe(z.number().max(65535, 'must be between 0 and 65535'));

const nameSchema = z.string().min(1, 'must not be empty');

// ─────────────────────────────────────────────────────────────────
// Server
// ─────────────────────────────────────────────────────────────────

export interface ServerConfig {
  dir: string;
  host: string;
  port: number;
  categories: AllowedCategories;
  logLevel: LogLevel;
  logFile: string | null;
  fileLogLevel: LogLevel;
  user: string;
  group: string | null;
}

export type ServerCommand =
  | { kind: 'run'; config: ServerConfig }
  | { kind: 'help' }
  | { kind: 'version' };

const SERVER_OPTIONS: readonly OptionSpec[] = [
  { short: 'a', long: 'all', takesValue: false },
  { short: 'o', long: 'offensive', takesValue: false },
  { short: 'c', long: 'categories', takesValue: true },
  { short: 'd', long: 'dir', takesValue: true },
  { short: 'i', long: 'host', takesValue: true },
  { short: 'p', long: 'port', takesValue: true },
  { short: 'l', long: 'log-file', takesValue: true },
  { short: 'u', long: 'user', takesValue: true },
  { short: 'g', long: 'group', takesValue: true },
  { short: 'q', long: 'quiet', takesValue: false },
  { short: 'v', long: 'verbose', takesValue: false },
  { short: 'h', long: 'help', takesValue: false },
  { short: 'V', long: 'version', takesValue: false },
];

const serverSchema = z.object({
  dir: nameSchema,
  host: nameSchema,
  port: portSchema,
  categories: z.enum(ALLOWED_CATEGORIES, {
    errorMap: () => ({ message: `must be one of: ${ALLOWED_CATEGORIES.join(', ')}` }),
  }),
  logFile: nameSchema.nullable(),
  user: nameSchema,
  group: nameSchema.nullable(),
});

export const SERVER_USAGE = `Usage: qotd-server [options]

Serve random quotes over TCP and UDP (RFC 865).

Options:
  -a, --all                 Serve quotes from every category
  -o, --offensive           Serve only offensive quotes
  -c, --categories <set>    decorous, offensive or all (overrides -a and -o)
  -d, --dir <path>          Quote directory (default: ${DEFAULT_QUOTE_DIR})
  -i, --host <address>      Address to bind (default: ${DEFAULT_HOST})
  -p, --port <n>            Port for both TCP and UDP (default: ${DEFAULT_PORT})
  -l, --log-file <path>     Also write logs to this file
  -u, --user <name>         User to switch to after binding (default: ${DEFAULT_USER})
  -g, --group <name>        Group to switch to (default: the user name)
  -q, --quiet               Only log errors
  -v, --verbose             More logging; repeat for debug and trace
  -h, --help                Show this help
  -V, --version             Show the version
`;

/** -v wins over -q; each extra -v is one level more verbose. */
export function verbosityToLevel(verbose: number, quiet: boolean): LogLevel {
  if (verbose >= 3) return 'trace';
  if (verbose === 2) return 'debug';
  if (verbose === 1) return 'info';
  return quiet ? 'error' : 'warn';
}

function resolveCategories(options: ParsedOptions): string {
  const explicit = last(options, 'categories');
  if (explicit !== undefined) return explicit;
  if (options.has('all')) return 'all';
  if (options.has('offensive')) return 'offensive';
  return 'decorous';
}

export function parseServerArgs(argv: readonly string[]): ServerCommand {
  const { options, positionals } = tokenize(argv, SERVER_OPTIONS);

  if (options.has('help')) return { kind: 'help' };
  if (options.has('version')) return { kind: 'version' };
  if (positionals.length > 0) {
    throw new ConfigError(`Unexpected argument: ${positionals[0]}`);
  }

  const result = serverSchema.safeParse({
    dir: last(options, 'dir') ?? DEFAULT_QUOTE_DIR,
    host: last(options, 'host') ?? DEFAULT_HOST,
    port: last(options, 'port') ?? String(DEFAULT_PORT),
    categories: resolveCategories(options),
    logFile: last(options, 'log-file') ?? null,
    user: last(options, 'user') ?? DEFAULT_USER,
    group: last(options, 'group') ?? null,
  });
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }

  const logLevel = verbosityToLevel(count(options, 'verbose'), options.has('quiet'));
  return {
    kind: 'run',
    config: {
      ...result.data,
      dir: path.resolve(result.data.dir),
      logLevel,
      fileLogLevel: mostVerbose(logLevel, 'info'),
    },
  };
}

// ─────────────────────────────────────────────────────────────────
// Client
// ─────────────────────────────────────────────────────────────────

export interface ClientConfig {
  host: string;
  port: number;
  protocol: QotdProtocol;
  timeoutMs: number;
}

export type ClientCommand =
  | { kind: 'run'; config: ClientConfig }
  | { kind: 'help' }
  | { kind: 'version' };

const CLIENT_OPTIONS: readonly OptionSpec[] = [
  { short: 't', long: 'tcp', takesValue: false },
  { long: 'timeout', takesValue: true },
  { short: 'h', long: 'help', takesValue: false },
  { short: 'V', long: 'version', takesValue: false },
];

const clientSchema = z.object({
  host: nameSchema,
  port: portSchema,
  timeoutMs: integerString.pipe(z.number().positive('must be positive')),
});

export const CLIENT_USAGE = `Usage: qotd <host> [port] [options]

Fetch one quote from a Quote of the Day server (UDP unless --tcp).

Options:
  -t, --tcp                 Use TCP instead of UDP
      --timeout <ms>        Give up after this long (default: ${DEFAULT_TIMEOUT_MS})
  -h, --help                Show this help
  -V, --version             Show the version
`;

export function parseClientArgs(argv: readonly string[]): ClientCommand {
  const { options, positionals } = tokenize(argv, CLIENT_OPTIONS);

  if (options.has('help')) return { kind: 'help' };
  if (options.has('version')) return { kind: 'version' };
  if (positionals.length === 0) {
    throw new ConfigError('Missing required argument: host');
  }
  if (positionals.length > 2) {
    throw new ConfigError(`Unexpected argument: ${positionals[2]}`);
  }

  const result = clientSchema.safeParse({
    host: positionals[0],
    port: positionals[1] ?? String(DEFAULT_PORT),
    timeoutMs: last(options, 'timeout') ?? String(DEFAULT_TIMEOUT_MS),
  });
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }

  return {
    kind: 'run',
    config: {
      ...result.data,
      protocol: options.has('tcp') ? 'tcp' : 'udp',
    },
  };
}
