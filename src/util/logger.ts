/**
 * Structured logging collaborator handed to every component at construction.
 * The host owns the process-wide sink; the bridge only calls `log`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

export interface Logger {
  log(level: LogLevel, message: string, fields?: LogFields): void;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface ConsoleLoggerOptions {
  /** Entries below this level are discarded. Default 'info'. */
  minLevel?: LogLevel;
  /** Static fields merged into every entry, e.g. `{ component: 'profiling' }`. */
  base?: LogFields;
  write?: (line: string) => void;
}

function jsonReplacer(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Error) return { name: value.name, message: value.message };
  return value;
}

/** One JSON line per entry on stderr. */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const minRank = LEVEL_RANK[options.minLevel ?? 'info'];
  const base = options.base ?? {};
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));

  return {
    log(level, message, fields) {
      if (LEVEL_RANK[level] < minRank) return;
      write(
        JSON.stringify(
          { time: new Date().toISOString(), level, msg: message, ...base, ...fields },
          jsonReplacer
        )
      );
    },
  };
}

export const noopLogger: Logger = { log: () => undefined };
