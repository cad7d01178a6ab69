import { Logger, LogLevel } from '../types/index.js';

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

const PREFIXES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '🐛 [DEBUG]',
  [LogLevel.INFO]: 'ℹ️  [INFO] ',
  [LogLevel.WARN]: '⚠️  [WARN] ',
  [LogLevel.ERROR]: '❌ [ERROR]'
};

/**
 * Diagnostic logger. Everything goes to stderr so that it never mixes
 * with command output on stdout.
 */
class ConsoleLogger implements Logger {
  constructor(private level: LogLevel = LogLevel.ERROR) {}

  private write(level: LogLevel, message: string, meta?: unknown): void {
    if (LEVEL_ORDER.indexOf(level) < LEVEL_ORDER.indexOf(this.level)) {
      return;
    }

    let line = `${new Date().toISOString()} ${PREFIXES[level]} ${message}`;
    if (meta && typeof meta === 'object') {
      line += `\n${JSON.stringify(meta, errorReplacer, 2)}`;
    } else if (meta !== undefined) {
      line += ` ${String(meta)}`;
    }
    process.stderr.write(`${line}\n`);
  }

  debug(message: string, meta?: unknown): void {
    this.write(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write(LogLevel.ERROR, message, meta);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }
}

// JSON.stringify(new Error()) is {}, so expand errors wherever they are nested
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return {
      ...value,
      name: value.name,
      message: value.message,
      stack: value.stack
    };
  }
  return value;
}

/**
 * `TENDRIL_LOG_LEVEL` names a level outright; `TENDRIL_VERBOSE=1` is shorthand for debug.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const named = env.TENDRIL_LOG_LEVEL?.trim().toLowerCase();
  const match = LEVEL_ORDER.find(level => level === named);
  if (match) {
    return match;
  }
  return env.TENDRIL_VERBOSE === '1' ? LogLevel.DEBUG : LogLevel.ERROR;
}

export const logger = new ConsoleLogger(resolveLogLevel());
