import { Logger, LogLevel, RefAsmError } from '../types/index.js';
import { ENV_VARS } from '../constants/index.js';

const LEVEL_RANK: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3
};

const LEVEL_LABEL: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '[DEBUG]',
  [LogLevel.INFO]: '[INFO] ',
  [LogLevel.WARN]: '[WARN] ',
  [LogLevel.ERROR]: '[ERROR]'
};

export type LogSink = (line: string) => void;

const LEVEL_NAMES: readonly string[] = Object.values(LogLevel);

function isLogLevel(value: string): value is LogLevel {
  return LEVEL_NAMES.includes(value);
}

/**
 * Level from the environment: `REFASM_LOG_LEVEL` names one outright,
 * `REFASM_VERBOSE=1` means debug, otherwise only warnings and errors.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const named = env[ENV_VARS.LOG_LEVEL]?.trim().toLowerCase();
  if (named && isLogLevel(named)) {
    return named;
  }
  return env[ENV_VARS.VERBOSE] === '1' ? LogLevel.DEBUG : LogLevel.WARN;
}

function describeError(error: Error): Record<string, unknown> {
  if (error instanceof RefAsmError) {
    return { name: error.name, code: error.code, message: error.message, details: error.details };
  }
  return { name: error.name, message: error.message, stack: error.stack };
}

// JSON.stringify(new Error()) is {}
function errorReplacer(_key: string, value: unknown): unknown {
  return value instanceof Error ? describeError(value) : value;
}

export function formatMeta(meta: unknown): string {
  if (meta === undefined) {
    return '';
  }
  if (meta instanceof Error) {
    return `\n${JSON.stringify(describeError(meta), errorReplacer, 2)}`;
  }
  if (meta && typeof meta === 'object') {
    return `\n${JSON.stringify(meta, errorReplacer, 2)}`;
  }
  return ` ${String(meta)}`;
}

/**
 * Console logger writing to stderr, so that resolved paths on stdout stay
 * machine readable. Scoped children share the parent's level.
 */
export class ConsoleLogger implements Logger {
  private level: LogLevel;

  constructor(
    level: LogLevel = LogLevel.WARN,
    private readonly sink: LogSink = line => process.stderr.write(`${line}\n`),
    private readonly scope?: string,
    private readonly parent?: ConsoleLogger
  ) {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.parent ? this.parent.getLevel() : this.level;
  }

  setLevel(level: LogLevel): void {
    if (this.parent) {
      this.parent.setLevel(level);
    } else {
      this.level = level;
    }
  }

  child(scope: string): ConsoleLogger {
    return new ConsoleLogger(this.level, this.sink, this.scope ? `${this.scope}:${scope}` : scope, this.parent ?? this);
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.getLevel()];
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

  private write(level: LogLevel, message: string, meta: unknown): void {
    if (!this.isEnabled(level)) {
      return;
    }
    const scope = this.scope ? ` [${this.scope}]` : '';
    this.sink(`${new Date().toISOString()} ${LEVEL_LABEL[level]}${scope} ${message}${formatMeta(meta)}`);
  }
}

export const logger = new ConsoleLogger(resolveLogLevel());
