import type { ActionInputMetadata, Config } from '@/types';
import { getBooleanInput, getInput } from '@actions/core';

/**
 * Factory functions for the common input shapes of the ACTION_INPUTS table.
 */
const requiredString = (configKey: keyof Config): ActionInputMetadata => ({
  configKey,
  required: true,
  type: 'string',
});

const optionalString = (configKey: keyof Config): ActionInputMetadata => ({
  configKey,
  required: false,
  type: 'string',
});

const requiredBoolean = (configKey: keyof Config): ActionInputMetadata => ({
  configKey,
  required: true,
  type: 'boolean',
});

const requiredNumber = (configKey: keyof Config): ActionInputMetadata => ({
  configKey,
  required: true,
  type: 'number',
});

const optionalArray = (configKey: keyof Config): ActionInputMetadata => ({
  configKey,
  required: false,
  type: 'array',
});

/**
 * Complete mapping of all GitHub Action inputs to their metadata.
 * Defaults live in action.yml and are applied by the runner.
 */
export const ACTION_INPUTS: Record<string, ActionInputMetadata> = {
  'rule-set': requiredString('ruleSet'),
  'allow-abort': requiredBoolean('allowAbort'),
  'allowed-prefixes': optionalArray('allowedPrefixes'),
  'message-length-limit': requiredNumber('messageLengthLimit'),
  encoding: requiredString('encoding'),
  'schema-pattern': optionalString('schemaPattern'),
  'schema-example': optionalString('schemaExample'),
  'commit-msg-file': optionalString('commitMsgFile'),
  message: optionalString('message'),
  'rev-range': optionalString('revRange'),
} as const;

/**
 * Splits a list input on commas and newlines, trimming entries and dropping empty and duplicate ones.
 *
 * @example
 * // Returns ['Merge', 'Revert', 'fixup!']
 * parseListInput('Merge, Revert\nfixup!,Merge')
 */
export function parseListInput(input: string): string[] {
  return Array.from(
    new Set(
      input
        .split(/[,\n]/)
        .map((item: string) => item.trim())
        .filter(Boolean),
    ),
  );
}

/**
 * Creates a config object by reading every input of ACTION_INPUTS through the GitHub Actions API and
 * converting it according to its metadata.
 */
export function createConfigFromInputs(): Config {
  const config = {} as Config;

  for (const [inputName, metadata] of Object.entries(ACTION_INPUTS)) {
    const { configKey, required, type } = metadata;

    try {
      let value: unknown;

      if (type === 'boolean') {
        value = getBooleanInput(inputName, { required });
      } else if (type === 'array') {
        value = parseListInput(getInput(inputName, { required }));
      } else if (type === 'number') {
        value = Number.parseInt(getInput(inputName, { required }), 10);
      } else {
        // Multi-line messages keep their line breaks and inner whitespace
        value = getInput(inputName, { required, trimWhitespace: configKey !== 'message' });
      }

      Object.assign(config, { [configKey]: value });
    } catch (error) {
      throw new Error(
        `Failed to process input '${inputName}': ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  return config;
}
