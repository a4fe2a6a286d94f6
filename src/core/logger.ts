import pino from 'pino';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';

const LOG_DIR = join(homedir(), '.gatehouse', 'logs');

export interface LoggerOptions {
  /** Pretty-print to stdout instead of writing the log file */
  pretty?: boolean;
  level?: string;
}

function ensureLogDir(): void {
  if (!existsSync(LOG_DIR)) {
    mkdirSync(LOG_DIR, { recursive: true });
  }
}

function defaultLevel(): string {
  return process.env.GATEHOUSE_LOG_LEVEL || 'info';
}

export function createLogger(name: string = 'gatehouse', options: LoggerOptions = {}): pino.Logger {
  const level = options.level ?? defaultLevel();

  if (level === 'silent') {
    return pino({ name, level });
  }

  if (options.pretty) {
    return pino({
      name,
      level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true },
      },
    });
  }

  ensureLogDir();
  return pino({
    name,
    level,
    transport: {
      target: 'pino/file',
      options: { destination: join(LOG_DIR, 'gatehouse.log'), mkdir: true },
    },
  });
}

let _logger: pino.Logger | null = null;
let _pinned = false;

export function getLogger(): pino.Logger {
  if (!_logger) {
    _logger = createLogger();
  }
  return _logger;
}

/** A pinned logger (the CLI's --verbose) is kept by {@link configureLogger}. */
export function setLogger(logger: pino.Logger, options: { pin?: boolean } = {}): void {
  _logger = logger;
  _pinned = options.pin ?? false;
}

/**
 * Rebuild the shared logger from a config's `logging` section. Components
 * pick it up when they are constructed, so call this before building them.
 */
export function configureLogger(settings: LoggerOptions): pino.Logger {
  if (!_pinned || !_logger) {
    _logger = createLogger('gatehouse', settings);
  }
  return _logger;
}
