/**
 * Debug switches read from the environment
 *
 * RULESMITH_DEBUG sets the level of every component: 0 (off), 1 (loading and
 * selection) or 2 (segment-level expansion). RULESMITH_DEBUG_<COMPONENT>
 * overrides it for one component, e.g. RULESMITH_DEBUG_RESOLVER=2 or
 * RULESMITH_DEBUG_STORE=0.
 */

export type DebugLevel = 0 | 1 | 2;

export type DebugComponent = 'store' | 'resolver' | 'config' | 'cli';

export interface DebugConfig {
  level: DebugLevel;
  enabled: boolean;
  verbose: boolean;
  components: Record<DebugComponent, DebugLevel>;
}

let cachedConfig: DebugConfig | null = null;

/** Unset or unrecognized values yield undefined */
function parseDebugLevel(value: string | undefined): DebugLevel | undefined {
  switch (value?.trim().toLowerCase()) {
    case '0':
    case 'false':
      return 0;
    case '1':
    case 'true':
      return 1;
    case '2':
      return 2;
    default:
      return undefined;
  }
}

export function getDebugConfig(): DebugConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const level = parseDebugLevel(process.env.RULESMITH_DEBUG) ?? 0;
  const componentLevel = (component: DebugComponent): DebugLevel =>
    parseDebugLevel(process.env[`RULESMITH_DEBUG_${component.toUpperCase()}`]) ?? level;

  cachedConfig = {
    level,
    enabled: level >= 1,
    verbose: level >= 2,
    components: {
      store: componentLevel('store'),
      resolver: componentLevel('resolver'),
      config: componentLevel('config'),
      cli: componentLevel('cli'),
    },
  };
  return cachedConfig;
}

export function debugLevel(component: DebugComponent): DebugLevel {
  return getDebugConfig().components[component];
}

export function isDebugEnabled(component: DebugComponent): boolean {
  return debugLevel(component) >= 1;
}

/**
 * Forget the cached levels so the environment is read again
 */
export function resetDebugConfig(): void {
  cachedConfig = null;
}
