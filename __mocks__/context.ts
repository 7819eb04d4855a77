import type { Context } from '@/types';

/**
 * Context interface with added utility methods
 */
export interface ContextWithMethods extends Context {
  set: (overrides?: Partial<Context>) => void;
  reset: () => void;
}

/**
 * Default context values
 */
const defaultContext: Context = {
  eventName: 'pull_request',
  repository: 'octo-org/example-repo',
  workspaceDir: '/workspace',
  eventRevRange: 'base000..head111',
  eventMaxCount: null,
};

// Store the current context configuration
let currentContext: Context = { ...defaultContext };

/**
 * Context proxy handler
 */
const contextProxyHandler: ProxyHandler<ContextWithMethods> = {
  get(_target: ContextWithMethods, prop: string | symbol): unknown {
    if (prop === 'set') {
      return (overrides: Partial<Context> = {}) => {
        currentContext = { ...currentContext, ...overrides };
      };
    }
    if (prop === 'reset') {
      return () => {
        currentContext = { ...defaultContext };
      };
    }
    if (typeof prop === 'string' && prop in currentContext) {
      return currentContext[prop as keyof Context];
    }
    return undefined;
  },
};

/**
 * Returns the current context.
 */
export const getContext = (): Context => currentContext;

export function clearContextForTesting(): void {}

export const context: ContextWithMethods = new Proxy({} as ContextWithMethods, contextProxyHandler);
