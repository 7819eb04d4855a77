import type { Config } from '@/types/config.types';

/**
 * Describes how one input declared in action.yml maps onto the {@link Config} object.
 *
 * The `ACTION_INPUTS` table in `@/utils/metadata` holds one entry per input and drives
 * `createConfigFromInputs()`, so adding an input only takes a new entry there and in action.yml.
 *
 * @see {@link https://docs.github.com/en/actions/reference/metadata-syntax-for-github-actions#inputs} GitHub Actions input reference
 */
export interface ActionInputMetadata {
  /**
   * The config property this input is written to.
   */
  configKey: keyof Config;

  /**
   * Whether `getInput` should fail when the input is absent. Inputs with a default in action.yml are
   * always present at runtime.
   */
  required: boolean;

  /**
   * How the raw input string is converted:
   * - 'string': used as-is
   * - 'boolean': parsed by `getBooleanInput` (YAML 1.2 core schema)
   * - 'number': parsed with `Number.parseInt`
   * - 'array': split on commas and newlines, trimmed and de-duplicated
   */
  type: 'string' | 'boolean' | 'number' | 'array';
}
