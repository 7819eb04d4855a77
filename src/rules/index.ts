import { UnknownRuleSetError } from '@/errors';
import { ConventionalCommitsRule } from '@/rules/conventional-commits';
import { CustomizeRule } from '@/rules/customize';
import { IssueKeyRule } from '@/rules/issue-key';
import type { RuleFactory, RulePlugin, Settings } from '@/types';
import { RULE_SET } from '@/utils/constants';

export { BaseRule } from '@/rules/base';
export { ConventionalCommitsRule } from '@/rules/conventional-commits';
export { CustomizeRule } from '@/rules/customize';
export { IssueKeyRule } from '@/rules/issue-key';

const registry = new Map<string, RuleFactory>([
  [RULE_SET.CONVENTIONAL_COMMITS, () => new ConventionalCommitsRule()],
  [RULE_SET.ISSUE_KEY, () => new IssueKeyRule()],
  [RULE_SET.CUSTOMIZE, (settings) => new CustomizeRule(settings)],
]);

/**
 * Registers a rule set under a name, replacing any rule set registered under the same name.
 */
export function registerRule(name: string, factory: RuleFactory): void {
  registry.set(name, factory);
}

/**
 * Names of every registered rule set, in registration order.
 */
export function getRuleSetNames(): string[] {
  return Array.from(registry.keys());
}

/**
 * Resolves the configured rule set and builds its plugin. The plugin is built once per check and
 * shared by every commit.
 *
 * @param settings - The active settings; `settings.ruleSet` selects the rule set
 * @returns The rule plugin
 * @throws {UnknownRuleSetError} If no rule set is registered under `settings.ruleSet`
 */
export function createRule(settings: Settings): RulePlugin {
  const factory = registry.get(settings.ruleSet);
  if (!factory) {
    throw new UnknownRuleSetError(
      `The rule set '${settings.ruleSet}' is not registered. Available rule sets: ${getRuleSetNames().join(', ')}`,
    );
  }

  return factory(settings);
}
