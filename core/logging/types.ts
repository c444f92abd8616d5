export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'none';

export type EntryLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = {
  runId?: string;
  [key: string]: unknown;
};

export interface LogEntry {
  timestamp: string;
  level: EntryLevel;
  source: string;
  message: string;
  data?: unknown;
  context?: LogContext;
}

export interface ILogAdapter {
  log(entry: LogEntry): Promise<void>;
}

export type AdapterName = 'console';

export type LoggingConfig = {
  logLevel: LogLevel;
  sourceFilters?: Record<string, LogLevel>;
  adapters?: AdapterName[];
  debugFlags?: string[];
};
