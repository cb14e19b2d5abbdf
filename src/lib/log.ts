// Run logging: timestamped console lines, optionally mirrored to a log file

import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

interface LoggerOptions {
  logPath?: string;
  quiet?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  let fileBroken = false;

  function toFile(line: string): void {
    if (!options.logPath || fileBroken) return;
    try {
      const dir = dirname(options.logPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
      appendFileSync(options.logPath, line + '\n', 'utf-8');
    } catch (err) {
      // Report once, then keep logging to the console only
      fileBroken = true;
      console.error(`[log] Cannot write ${options.logPath}: ${err instanceof Error ? err.message : err}`);
    }
  }

  function write(level: 'info' | 'warn' | 'error', message: string): void {
    const line = `[${new Date().toISOString()}] ${level === 'info' ? '' : level.toUpperCase() + ': '}${message}`;
    if (!options.quiet) {
      if (level === 'info') console.log(line);
      else console.error(line);
    }
    toFile(line);
  }

  return {
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message)
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {}
};
