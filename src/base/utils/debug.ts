/**
 * Debug configuration module
 * Controls debug output for the merger, the extractor and the CLI
 *
 * Debug Levels:
 * - SETTINGS_MERGE_DEBUG=0 or unset: No debug output (default)
 * - SETTINGS_MERGE_DEBUG=1: Standard debug output (resolved files, counts)
 * - SETTINGS_MERGE_DEBUG=2: Verbose debug output (every pattern kept or dropped)
 */

export type DebugLevel = 0 | 1 | 2;

export type DebugComponent = 'merger' | 'extractor' | 'cli';

export interface DebugConfig {
  level: DebugLevel;
  enabled: boolean; // level >= 1
  verbose: boolean; // level >= 2
  components: Record<DebugComponent, DebugLevel>;
}

const ENV_PREFIX = 'SETTINGS_MERGE_DEBUG';

let cachedConfig: DebugConfig | null = null;

/**
 * Parse debug level from environment variable
 */
function parseDebugLevel(value: string | undefined): DebugLevel {
  if (!value) return 0;
  const level = parseInt(value, 10);
  if (level === 2) return 2;
  if (level === 1) return 1;
  return 0;
}

/**
 * Get debug configuration based on environment variables
 *
 * - SETTINGS_MERGE_DEBUG=0|1|2: Global debug level
 * - SETTINGS_MERGE_DEBUG_<COMPONENT>=1|2: Component-specific debug level
 */
export function getDebugConfig(): DebugConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const globalLevel = parseDebugLevel(process.env[ENV_PREFIX]);

  cachedConfig = {
    level: globalLevel,
    enabled: globalLevel >= 1,
    verbose: globalLevel >= 2,
    components: {
      merger: parseDebugLevel(process.env[`${ENV_PREFIX}_MERGER`]) || globalLevel,
      extractor: parseDebugLevel(process.env[`${ENV_PREFIX}_EXTRACTOR`]) || globalLevel,
      cli: parseDebugLevel(process.env[`${ENV_PREFIX}_CLI`]) || globalLevel,
    },
  };

  return cachedConfig;
}

/**
 * Check if debug is enabled for a specific component (level >= 1)
 */
export function isDebugEnabled(component: DebugComponent): boolean {
  return getDebugConfig().components[component] >= 1;
}

/**
 * Check if verbose debug is enabled for a specific component (level >= 2)
 */
export function isVerboseDebugEnabled(component: DebugComponent): boolean {
  return getDebugConfig().components[component] >= 2;
}

/**
 * Reset cached config (useful for testing)
 */
export function resetDebugConfig(): void {
  cachedConfig = null;
}
