import { isDebugEnabled, DebugFlagMap } from '@/utils/logging/debugFlags';
import { LogLevel } from './types';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'none'];

const LOG_LEVEL_NUM: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  none: 5,
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Global level plus per-source overrides, owned by one LogManager
 */
export class LogLevelConfig {
  private global: LogLevel;
  private readonly modules: Record<string, LogLevel>;

  constructor(
    global: LogLevel,
    modules: Record<string, LogLevel> = {},
    private readonly debugFlags: DebugFlagMap = {}
  ) {
    this.global = global;
    this.modules = { ...modules };
  }

  getLogLevel(moduleName?: string): LogLevel {
    if (moduleName && this.modules[moduleName]) {
      return this.modules[moduleName];
    }
    return this.global;
  }

  setLogLevel(level: LogLevel, moduleName?: string): void {
    if (moduleName) {
      this.modules[moduleName] = level;
    } else {
      this.global = level;
    }
  }

  clearModuleLevels(): void {
    Object.keys(this.modules).forEach(name => delete this.modules[name]);
  }

  isLogLevelEnabled(moduleName: string, level: LogLevel): boolean {
    // A debug flag lowers the threshold for that module to 'debug'
    if (isDebugEnabled(this.debugFlags, moduleName)) {
      return LOG_LEVEL_NUM[level] >= LOG_LEVEL_NUM['debug'];
    }
    const configuredLevel = this.modules[moduleName] || this.global;
    return LOG_LEVEL_NUM[level] >= LOG_LEVEL_NUM[configuredLevel];
  }

  snapshot(): { global: LogLevel; modules: Record<string, LogLevel> } {
    return { global: this.global, modules: { ...this.modules } };
  }
}
