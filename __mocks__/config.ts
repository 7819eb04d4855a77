import type { Config } from '@/types';
import { DEFAULT_ALLOWED_PREFIXES } from '@/utils/constants';

/**
 * Configuration interface with added utility methods
 */
interface ConfigWithMethods extends Config {
  set: (overrides: Partial<Config>) => void;
  resetDefaults: () => void;
}

/**
 * Default configuration object, mirroring the action.yml defaults.
 */
const defaultConfig: Config = {
  ruleSet: 'conventional-commits',
  allowAbort: false,
  allowedPrefixes: [...DEFAULT_ALLOWED_PREFIXES],
  encoding: 'utf-8',
  messageLengthLimit: 0,
  schemaPattern: '',
  schemaExample: '',
  commitMsgFile: '',
  message: '',
  revRange: '',
};

// Store the actual configuration data
let currentConfig: Config = { ...defaultConfig };

/**
 * Config proxy handler.
 */
const configProxyHandler: ProxyHandler<ConfigWithMethods> = {
  get(_target: ConfigWithMethods, prop: string | symbol): unknown {
    if (prop === 'set') {
      return (overrides: Partial<Config> = {}) => {
        currentConfig = { ...currentConfig, ...overrides };
      };
    }
    if (prop === 'resetDefaults') {
      return () => {
        currentConfig = { ...defaultConfig };
      };
    }
    if (typeof prop === 'string' && prop in currentConfig) {
      return currentConfig[prop as keyof Config];
    }
    return undefined;
  },
};

/**
 * Returns the current configuration.
 */
export function getConfig(): Config {
  return currentConfig;
}

export function clearConfigForTesting(): void {}

/**
 * Create and export the config object directly with the proxy
 */
export const config: ConfigWithMethods = new Proxy({} as ConfigWithMethods, configProxyHandler);
