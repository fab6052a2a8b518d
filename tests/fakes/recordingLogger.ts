import type { LogContext, Logger } from '../../src/shared/logging/logger';

export type LogEntry = {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  data?: LogContext;
};

export function createRecordingLogger(): { log: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const log: Logger = {
    debug: (message, data) => {
      entries.push({ level: 'debug', message, data });
    },
    info: (message, data) => {
      entries.push({ level: 'info', message, data });
    },
    warn: (message, data) => {
      entries.push({ level: 'warn', message, data });
    },
    error: (message, data) => {
      entries.push({ level: 'error', message, data });
    },
  };
  return { log, entries };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
