/**
 * Leveled logger for MCP servers.
 *
 * Writes to stderr only: stdout carries the stdio JSON-RPC stream.
 */

export const LOG_LEVELS = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export interface Logger {
  trace: (obj: unknown, msg?: string) => void;
  debug: (obj: unknown, msg?: string) => void;
  info: (obj: unknown, msg?: string) => void;
  warn: (obj: unknown, msg?: string) => void;
  error: (obj: unknown, msg?: string) => void;
  fatal: (obj: unknown, msg?: string) => void;
  child: (component: string) => Logger;
  level: LogLevel;
}

export interface LoggerOptions {
  level?: LogLevel;
  component?: string;
  /** Sink for formatted lines; defaults to stderr */
  write?: (line: string) => void;
}

export function formatLogLine(
  level: LogLevel,
  obj: unknown,
  msg?: string,
  component?: string,
  now: Date = new Date(),
): string {
  const message = msg ?? (typeof obj === 'string' ? obj : '');
  const data = typeof obj === 'object' && obj !== null ? JSON.stringify(obj, null, 2) : '';
  const context = component ? `[${component}] ` : '';

  return `[${now.toISOString()}] [${level.toUpperCase()}] ${context}${message}${data ? `\n${data}` : ''}`;
}

function writeStderr(line: string): void {
  process.stderr.write(line + '\n');
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const write = options.write ?? writeStderr;
  const threshold = LOG_LEVELS[level];

  const at =
    (lvl: LogLevel) =>
    (obj: unknown, msg?: string): void => {
      if (LOG_LEVELS[lvl] >= threshold) {
        write(formatLogLine(lvl, obj, msg, options.component));
      }
    };

  return {
    trace: at('trace'),
    debug: at('debug'),
    info: at('info'),
    warn: at('warn'),
    error: at('error'),
    fatal: at('fatal'),
    child: (component: string) =>
      createLogger({
        level,
        write,
        component: options.component ? `${options.component}:${component}` : component,
      }),
    level,
  };
}

/** Logger that drops everything; handy in tests */
export const silentLogger: Logger = createLogger({ level: 'fatal', write: () => undefined });
