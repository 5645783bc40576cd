/**
 * Leveled console logging for the CLI.
 */
import chalk, { type ChalkInstance } from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type Channel = Exclude<LogLevel, 'silent'>;

const RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

interface Sink {
  tag: string;
  paint: ChalkInstance;
  write: (line: string) => void;
}

// Warnings and errors go to stderr so a JSON report on stdout stays parseable.
const SINKS: Record<Channel, Sink> = {
  debug: { tag: '[DEBUG]', paint: chalk.gray, write: (line) => console.log(line) },
  info: { tag: '✓', paint: chalk.green, write: (line) => console.log(line) },
  warn: { tag: '[WARN]', paint: chalk.yellow, write: (line) => console.warn(line) },
  error: { tag: '[ERROR]', paint: chalk.red, write: (line) => console.error(line) },
};

export class Logger {
  constructor(private level: LogLevel = 'info') {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(message: string): void {
    this.emit('debug', message);
  }

  /** Completion notice, shown at info level. */
  success(message: string): void {
    this.emit('info', message);
  }

  warn(message: string): void {
    this.emit('warn', message);
  }

  /**
   * The stack of an Error cause is only printed at debug level.
   */
  error(message: string, cause?: unknown): void {
    if (!this.emit('error', message)) return;
    if (cause instanceof Error && cause.stack && this.enabled('debug')) {
      SINKS.error.write(SINKS.error.paint(cause.stack));
    }
  }

  private enabled(channel: Channel): boolean {
    return RANK[channel] >= RANK[this.level];
  }

  private emit(channel: Channel, message: string): boolean {
    if (!this.enabled(channel)) return false;
    const sink = SINKS[channel];
    sink.write(sink.paint(`${sink.tag} ${message}`));
    return true;
  }
}

export const logger = new Logger();
