import { v4 as uuidv4 } from 'uuid';
import { loadConfig, GeoreferenceConfig } from '@/core/config';
import { LogManager } from '@/core/logging/log-manager';
import type { ILogAdapter } from '@/core/logging/types';

/**
 * Everything one georeferencing run needs besides its collaborators.
 * Each run gets its own logger so runs never share log state.
 */
export interface RunContext {
  runId: string;
  config: GeoreferenceConfig;
  logger: LogManager;
}

export interface RunContextOptions {
  /** Replace the adapters named in the config */
  adapters?: ILogAdapter[];
  runId?: string;
}

export function createRunContext(
  config: GeoreferenceConfig = loadConfig(),
  options: RunContextOptions = {}
): RunContext {
  const runId = options.runId ?? uuidv4();
  const logger = new LogManager(config.logging, {
    adapters: options.adapters,
    context: { runId }
  });
  return { runId, config, logger };
}
