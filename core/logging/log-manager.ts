import { v4 as uuidv4 } from 'uuid';
import { createDebugFlags } from '@/utils/logging/debugFlags';
import { ILogger } from './ILogger';
import { LogLevelConfig } from './logLevelConfig';
import { AdapterName, EntryLevel, ILogAdapter, LogContext, LogEntry, LoggingConfig, LogLevel } from './types';

export const DEFAULT_LOGGING_CONFIG: LoggingConfig = {
  logLevel: 'info',
  adapters: ['console']
};

const MAX_DEPTH = 3;
const MAX_ARRAY_LENGTH = 10;
const TRUNCATE_LENGTH = 100;

/**
 * Safely stringify log data, handling circular references and large values
 */
export function safeStringify(obj: unknown, indent?: number): string {
  const seen = new WeakSet<object>();

  const sanitize = (value: unknown, depth: number): unknown => {
    if (value === null || value === undefined) return value ?? null;
    if (typeof value === 'string') {
      return value.length > TRUNCATE_LENGTH ? value.slice(0, TRUNCATE_LENGTH) + '...' : value;
    }
    if (typeof value === 'function') return '[Omitted]';
    if (typeof value !== 'object') return value;

    if (value instanceof Error) {
      return {
        name: value.name,
        message: value.message,
        stack: value.stack?.split('\n').slice(0, 3).join('\n')
      };
    }
    if (seen.has(value)) return '[Circular]';
    if (depth >= MAX_DEPTH) return Array.isArray(value) ? `[Array(${value.length})]` : '[Nested]';
    seen.add(value);

    if (Array.isArray(value)) {
      const items = value.slice(0, MAX_ARRAY_LENGTH).map(item => sanitize(item, depth + 1));
      if (value.length > MAX_ARRAY_LENGTH) {
        items.push(`...${value.length - MAX_ARRAY_LENGTH} more items`);
      }
      return items;
    }
    if (value instanceof Map) return `[Map(${value.size})]`;
    if (value instanceof Set) return `[Set(${value.size})]`;

    const simplified: Record<string, unknown> = {};
    for (const [key, prop] of Object.entries(value)) {
      if (!key.startsWith('_')) {
        simplified[key] = sanitize(prop, depth + 1);
      }
    }
    return simplified;
  };

  return JSON.stringify(sanitize(obj, 0), null, indent) ?? 'null';
}

export function formatLogEntry(entry: LogEntry): string {
  const dataStr = entry.data === undefined ? '' : ` ${safeStringify(entry.data)}`;
  return `[${entry.timestamp}] [${entry.level}] [${entry.source}] ${entry.message}${dataStr}`;
}

/**
 * Console adapter (default)
 */
export class ConsoleAdapter implements ILogAdapter {
  async log(entry: LogEntry): Promise<void> {
    const line = formatLogEntry(entry);
    switch (entry.level) {
      case 'debug':
        console.debug(line);
        break;
      case 'info':
        console.info(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'error':
        console.error(line);
        break;
    }
  }
}

const adapterRegistry: Record<AdapterName, () => ILogAdapter> = {
  console: () => new ConsoleAdapter()
};

export interface LogManagerOptions {
  /** Adapters used instead of the ones named in the config */
  adapters?: ILogAdapter[];
  /** Context merged into every entry */
  context?: LogContext;
}

/**
 * Logger scoped to one georeferencing run. Entries are kept in memory and
 * forwarded to every adapter.
 */
export class LogManager implements ILogger {
  private logs: LogEntry[] = [];
  private readonly MAX_LOGS = 10000;
  private readonly levels: LogLevelConfig;
  private readonly adapters: ILogAdapter[];
  private readonly baseContext: LogContext;
  public readonly instanceId: string;

  constructor(config: LoggingConfig = DEFAULT_LOGGING_CONFIG, options: LogManagerOptions = {}) {
    this.instanceId = uuidv4();
    this.levels = new LogLevelConfig(
      config.logLevel,
      config.sourceFilters,
      createDebugFlags(config.debugFlags ?? [])
    );
    this.adapters = options.adapters ?? (config.adapters ?? []).map(name => adapterRegistry[name]());
    this.baseContext = options.context ?? {};
  }

  public setLogLevel(level: LogLevel): void {
    this.levels.setLogLevel(level);
  }

  public getLogLevel(): LogLevel {
    return this.levels.getLogLevel();
  }

  public setComponentLogLevel(component: string, level: LogLevel): void {
    this.levels.setLogLevel(level, component);
  }

  public getComponentLogLevel(component: string): LogLevel {
    return this.levels.getLogLevel(component);
  }

  public clearFilters(): void {
    this.levels.clearModuleLevels();
  }

  private shouldLog(level: EntryLevel, source: string): boolean {
    return this.levels.isLogLevelEnabled(source, level);
  }

  private async addLog(entry: LogEntry): Promise<void> {
    this.logs.push(entry);
    if (this.logs.length > this.MAX_LOGS) {
      this.logs = this.logs.slice(-this.MAX_LOGS);
    }

    try {
      await Promise.all(this.adapters.map(adapter => adapter.log(entry)));
    } catch (error) {
      console.error('Error adding log entry:', { error, entry });
    }
  }

  private async write(
    level: EntryLevel,
    source: string,
    message: string,
    data?: unknown,
    context?: LogContext
  ): Promise<void> {
    if (!this.shouldLog(level, source)) return;
    await this.addLog({
      timestamp: new Date().toISOString(),
      level,
      source,
      message,
      data,
      context: { ...this.baseContext, ...context }
    });
  }

  public async debug(source: string, message: string, data?: unknown, context?: LogContext): Promise<void> {
    await this.write('debug', source, message, data, context);
  }

  public async info(source: string, message: string, data?: unknown, context?: LogContext): Promise<void> {
    await this.write('info', source, message, data, context);
  }

  public async warn(source: string, message: string, data?: unknown, context?: LogContext): Promise<void> {
    await this.write('warn', source, message, data, context);
  }

  public async error(source: string, message: string, data?: unknown, context?: LogContext): Promise<void> {
    await this.write('error', source, message, data, context);
  }

  /**
   * Get all logs
   */
  public getLogs(): LogEntry[] {
    return [...this.logs];
  }

  public clearLogs(): void {
    this.logs = [];
  }
}
