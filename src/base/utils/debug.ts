/**
 * Debug configuration module
 * Controls debug output for the skillroute components
 *
 * Debug Levels:
 * - SKILLROUTE_DEBUG=0 or unset: No debug output (default)
 * - SKILLROUTE_DEBUG=1: Standard debug output (documents loaded, tier decisions)
 * - SKILLROUTE_DEBUG=2: Verbose debug output (per-record scores, token sets)
 */

export type DebugLevel = 0 | 1 | 2;

export interface DebugConfig {
  level: DebugLevel;
  enabled: boolean; // level >= 1
  verbose: boolean; // level >= 2
  components: {
    registry: DebugLevel;
    resolver: DebugLevel;
    discovery: DebugLevel;
    config: DebugLevel;
  };
}

export type DebugComponent = keyof DebugConfig['components'];

const DEBUG_COMPONENTS: readonly DebugComponent[] = ['registry', 'resolver', 'discovery', 'config'];

function isDebugComponent(name: string): name is DebugComponent {
  return DEBUG_COMPONENTS.some((component) => component === name);
}

let cachedConfig: DebugConfig | null = null;

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
 * SKILLROUTE_DEBUG_<COMPONENT>=1|2 overrides the global level for one component.
 */
export function getDebugConfig(): DebugConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const globalLevel = parseDebugLevel(process.env.SKILLROUTE_DEBUG);

  cachedConfig = {
    level: globalLevel,
    enabled: globalLevel >= 1,
    verbose: globalLevel >= 2,
    components: {
      registry: parseDebugLevel(process.env.SKILLROUTE_DEBUG_REGISTRY) || globalLevel,
      resolver: parseDebugLevel(process.env.SKILLROUTE_DEBUG_RESOLVER) || globalLevel,
      discovery: parseDebugLevel(process.env.SKILLROUTE_DEBUG_DISCOVERY) || globalLevel,
      config: parseDebugLevel(process.env.SKILLROUTE_DEBUG_CONFIG) || globalLevel,
    },
  };

  return cachedConfig;
}

export function isDebugEnabled(component: DebugComponent): boolean {
  return getDebugConfig().components[component] >= 1;
}

export function isVerboseDebugEnabled(component: DebugComponent): boolean {
  return getDebugConfig().components[component] >= 2;
}

/**
 * Whether debug lines logged under a component name (e.g. 'Registry') should print
 */
export function isLogComponentDebugEnabled(component: string): boolean {
  const config = getDebugConfig();
  if (config.enabled) return true;
  const name = component.toLowerCase();
  return isDebugComponent(name) && config.components[name] >= 1;
}

/**
 * Reset cached config (useful for testing)
 */
export function resetDebugConfig(): void {
  cachedConfig = null;
}
