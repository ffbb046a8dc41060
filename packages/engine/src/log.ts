// packages/engine/src/log.ts

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Receives fully formatted lines, e.g. `[cmsync:sync] home: 3 keys`. */
export type LogSink = (level: LogLevel, line: string) => void;

export const consoleSink: LogSink = (level, line) => {
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
};

export const silentSink: LogSink = () => {};

export type LoggerOptions = {
  sink?: LogSink;
  debug?: boolean;
  tag?: string;
};

export class Logger {
  readonly debugEnabled: boolean;
  private readonly sink: LogSink;
  private readonly prefix: string;

  constructor(opts: LoggerOptions = {}) {
    this.sink = opts.sink ?? consoleSink;
    this.debugEnabled = opts.debug ?? false;
    this.prefix = opts.tag ? `[cmsync:${opts.tag}]` : '[cmsync]';
  }

  /** Same sink and debug flag, different component tag. */
  child(tag: string): Logger {
    return new Logger({ sink: this.sink, debug: this.debugEnabled, tag });
  }

  debug(msg: string): void {
    if (this.debugEnabled) this.sink('debug', `${this.prefix} ${msg}`);
  }

  info(msg: string): void {
    this.sink('info', `${this.prefix} ${msg}`);
  }

  warn(msg: string): void {
    this.sink('warn', `${this.prefix} ${msg}`);
  }

  error(msg: string): void {
    this.sink('error', `${this.prefix} ${msg}`);
  }
}
