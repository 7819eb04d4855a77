import { InvalidConfigurationError } from '@/errors';
import { BaseRule } from '@/rules/base';
import type { Settings } from '@/types';
import { RULE_SET } from '@/utils/constants';

/**
 * Compiles the `schemaPattern` setting.
 *
 * The setting is either a bare pattern source (`^JIRA-\d+ .+`) or a regular expression literal
 * with flags (`/^jira-\d+ .+/i`). An empty setting yields `null`: no pattern is enforced.
 *
 * @param schemaPattern - The raw setting value
 * @returns The compiled pattern, or `null` for an empty setting
 * @throws {InvalidConfigurationError} If the pattern or its flags do not compile
 */
export function compileSchemaPattern(schemaPattern: string): RegExp | null {
  if (schemaPattern === '') {
    return null;
  }

  const literal = /^\/(.+)\/([a-z]*)$/s.exec(schemaPattern);
  const [source, flags] = literal ? [literal[1], literal[2]] : [schemaPattern, ''];

  try {
    return new RegExp(source, flags);
  } catch (error) {
    throw new InvalidConfigurationError(
      `Invalid schema pattern '${schemaPattern}': ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
}

/**
 * Rule set whose pattern and example come from the settings (`schemaPattern`, `schemaExample`).
 */
export class CustomizeRule extends BaseRule {
  readonly name = RULE_SET.CUSTOMIZE;

  protected readonly displayName = 'configured';

  private readonly pattern: RegExp | null;

  private readonly schemaExample: string;

  constructor(settings: Pick<Settings, 'schemaPattern' | 'schemaExample'>) {
    super();
    this.pattern = compileSchemaPattern(settings.schemaPattern);
    this.schemaExample = settings.schemaExample;
  }

  schemaPattern(): RegExp | null {
    return this.pattern;
  }

  example(): string {
    return this.schemaExample;
  }
}
