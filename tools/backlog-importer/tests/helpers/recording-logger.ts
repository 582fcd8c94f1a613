import type { LogContext, Logger } from '../../src/utils/logger.js';

export interface LogEntry {
  level: 'info' | 'warn' | 'error' | 'debug';
  message: string;
  context?: LogContext;
}

export interface RecordingLogger extends Logger {
  entries: LogEntry[];
  messages(level: LogEntry['level']): string[];
}

/** Logger that keeps every call in memory. */
export function createRecordingLogger(): RecordingLogger {
  const entries: LogEntry[] = [];
  const record = (level: LogEntry['level']) => (message: string, context?: LogContext) => {
    entries.push({ level, message, context });
  };
  return {
    entries,
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
    debug: record('debug'),
    messages(level) {
      return entries.filter((e) => e.level === level).map((e) => e.message);
    },
  };
}
