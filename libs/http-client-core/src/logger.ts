import type { Logger } from './types';

/**
 * Logs to console.debug, console.info, console.warn, and console.error,
 * prefixing each message with `[name]`.
 */
export class ConsoleLogger implements Logger {
  constructor(private readonly name: string) {}

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write('debug', message, meta);
  }
  info(message: string, meta?: Record<string, unknown>): void {
    this.write('info', message, meta);
  }
  warn(message: string, meta?: Record<string, unknown>): void {
    this.write('warn', message, meta);
  }
  error(message: string, meta?: Record<string, unknown>): void {
    this.write('error', message, meta);
  }

  private write(
    level: 'debug' | 'info' | 'warn' | 'error',
    message: string,
    meta?: Record<string, unknown>,
  ): void {
    const line = `[${this.name}] ${message}`;
    if (meta) {
      console[level](line, meta);
    } else {
      console[level](line);
    }
  }
}
