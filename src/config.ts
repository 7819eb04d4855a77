import { InvalidConfigurationError } from '@/errors';
import { compileSchemaPattern } from '@/rules/customize';
import type { Config } from '@/types';
import { RULE_SET } from '@/utils/constants';
import { createConfigFromInputs } from '@/utils/metadata';
import { endGroup, info, startGroup } from '@actions/core';

// Keep configInstance private to this module
let configInstance: Config | null = null;

/**
 * Clears the cached config instance during testing.
 *
 * Only takes effect when NODE_ENV is 'test'. Call it in `beforeEach()` when a test suite exercises
 * several input combinations.
 */
export function clearConfigForTesting(): void {
  if (process.env.NODE_ENV === 'test') {
    configInstance = null;
  }
}

/**
 * Lazy-initialized configuration object, read from the action inputs and validated once.
 */
function initializeConfig(): Config {
  if (configInstance) {
    return configInstance;
  }

  try {
    startGroup('Initializing Config');

    const inputs = createConfigFromInputs();

    if (Number.isNaN(inputs.messageLengthLimit) || inputs.messageLengthLimit < 0) {
      throw new InvalidConfigurationError('Message length limit must be an integer greater than or equal to zero');
    }

    if (!Buffer.isEncoding(inputs.encoding)) {
      throw new InvalidConfigurationError(`Unsupported encoding '${String(inputs.encoding)}'`);
    }

    if (inputs.ruleSet === RULE_SET.CUSTOMIZE) {
      // Fail early on a pattern that does not compile
      compileSchemaPattern(inputs.schemaPattern);
    }

    info(`Rule Set: ${inputs.ruleSet}`);
    info(`Allow Abort: ${inputs.allowAbort}`);
    info(`Allowed Prefixes: ${inputs.allowedPrefixes.join(', ')}`);
    info(`Message Length Limit: ${inputs.messageLengthLimit}`);
    info(`Encoding: ${inputs.encoding}`);
    if (inputs.ruleSet === RULE_SET.CUSTOMIZE) {
      info(`Schema Pattern: ${inputs.schemaPattern}`);
    }

    configInstance = inputs;
    return configInstance;
  } finally {
    endGroup();
  }
}

// Create a getter for the config that initializes on first use
export function getConfig(): Config {
  return initializeConfig();
}
