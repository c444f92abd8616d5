// Module-specific verbose logging, e.g. DEBUG_FLAGS="MeasurementSession,AffineComposer".
// In production all debug flags are off.

/**
 * Type for debug flag map
 */
export type DebugFlagMap = Record<string, boolean>;

const isProd = (): boolean => process.env.NODE_ENV === 'production';

/**
 * Build a flag map from a list of module names
 */
export function createDebugFlags(modules: readonly string[]): DebugFlagMap {
  if (isProd()) return {};
  const map: DebugFlagMap = {};
  for (const module of modules) {
    const name = module.trim();
    if (name) map[name] = true;
  }
  return map;
}

/**
 * Parse a comma separated DEBUG_FLAGS value
 */
export function parseDebugFlags(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw.split(',').map(f => f.trim()).filter(Boolean);
}

/**
 * Check if debug is enabled for a given module
 */
export function isDebugEnabled(flags: DebugFlagMap, module: string): boolean {
  if (isProd()) return false;
  return flags[module] === true;
}
