import type { LoggerPort } from '../ports';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export type LogWriter = (level: LogLevel, line: string) => void;

function writeToConsole(level: LogLevel, line: string): void {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

/** One JSON line per entry: `{ level, event, ...payload }`, dropped below `minLevel`. */
export class ConsoleLogger implements LoggerPort {
  constructor(
    private readonly minLevel: LogLevel = 'info',
    private readonly write: LogWriter = writeToConsole,
  ) {}

  debug(event: string, payload?: Record<string, unknown>): void {
    this.emit('debug', event, payload);
  }

  info(event: string, payload?: Record<string, unknown>): void {
    this.emit('info', event, payload);
  }

  warn(event: string, payload?: Record<string, unknown>): void {
    this.emit('warn', event, payload);
  }

  error(event: string, payload?: Record<string, unknown>): void {
    this.emit('error', event, payload);
  }

  private emit(level: LogLevel, event: string, payload?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;
    this.write(level, JSON.stringify({ level, event, ...payload }));
  }
}
