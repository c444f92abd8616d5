import { z } from 'zod';
import { ConfigError } from '@/types/errors';
import { isLogLevel } from '@/core/logging/logLevelConfig';
import { parseDebugFlags } from '@/utils/logging/debugFlags';
import type { AdapterName, LoggingConfig, LogLevel } from '@/core/logging/types';
import { COORDINATE_SYSTEMS } from '@/core/coordinates/coordinates';

export interface GeoreferenceConfig {
  targetCrs: string;
  useMeridianConvergence: boolean;
  logging: LoggingConfig;
}

const logLevelSchema = z
  .string()
  .trim()
  .toLowerCase()
  .refine(isLogLevel, { message: 'Expected one of trace, debug, info, warn, error, none' });

const booleanSchema = z
  .string()
  .trim()
  .toLowerCase()
  .refine(value => ['true', 'false', '1', '0'].includes(value), { message: 'Expected true, false, 1 or 0' })
  .transform(value => value === 'true' || value === '1');

const sourceFiltersSchema = z.string().transform((raw, ctx) => {
  const filters: Record<string, LogLevel> = {};
  for (const pair of raw.split(',').map(p => p.trim()).filter(Boolean)) {
    const [source, level] = pair.split(':').map(part => part.trim());
    const normalized = level?.toLowerCase();
    if (!source || !normalized || !isLogLevel(normalized)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid source filter "${pair}"` });
      return z.NEVER;
    }
    filters[source] = normalized;
  }
  return filters;
});

const isAdapterName = (name: string): name is AdapterName => name === 'console';

const adaptersSchema = z.string().transform((raw, ctx) => {
  const names = raw.split(',').map(a => a.trim()).filter(Boolean);
  const adapters: AdapterName[] = [];
  for (const name of names) {
    if (!isAdapterName(name)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown log adapter "${name}"` });
      return z.NEVER;
    }
    adapters.push(name);
  }
  return adapters;
});

const envSchema = z.object({
  TARGET_CRS: z.string().trim().min(1).default(COORDINATE_SYSTEMS.PL_1992),
  USE_MERIDIAN_CONVERGENCE: booleanSchema.default('true'),
  LOG_LEVEL: logLevelSchema.default('info'),
  LOG_SOURCES: sourceFiltersSchema.optional(),
  LOG_ADAPTERS: adaptersSchema.default('console'),
  DEBUG_FLAGS: z.string().optional()
});

/**
 * Resolve configuration from environment variables
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): GeoreferenceConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }

  const values = parsed.data;
  return {
    targetCrs: values.TARGET_CRS,
    useMeridianConvergence: values.USE_MERIDIAN_CONVERGENCE,
    logging: {
      logLevel: values.LOG_LEVEL,
      sourceFilters: values.LOG_SOURCES,
      adapters: values.LOG_ADAPTERS,
      debugFlags: parseDebugFlags(values.DEBUG_FLAGS)
    }
  };
}
