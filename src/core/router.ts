import type { ValidationError } from './types.js';
import { lintTree, type Rule } from './pipeline.js';
import { DEFAULT_CONFIG, type LintConfig } from './config.js';
import { RuleConfigError } from './errors.js';
import type { SyntaxTree } from '../tree/syntax-tree.js';
import { createRightCurlyRule } from '../rules/right-curly/rule.js';
import { RIGHT_CURLY_RULE_ID } from '../rules/right-curly/options.js';

type RuleFactory = (options: unknown) => Rule;

const RULE_FACTORIES: ReadonlyMap<string, RuleFactory> = new Map([
  [RIGHT_CURLY_RULE_ID, createRightCurlyRule],
]);

export function knownRuleIds(): string[] {
  return [...RULE_FACTORIES.keys()];
}

/**
 * Builds rule instances from configuration. A rule may be listed once, as an
 * array of option sets (one instance each), or as `false` to disable it.
 */
export function createRules(config: LintConfig): Rule[] {
  const rules: Rule[] = [];
  for (const [id, entry] of Object.entries(config.rules)) {
    const factory = RULE_FACTORIES.get(id);
    if (!factory) {
      throw new RuleConfigError(id, `unknown rule, expected one of ${knownRuleIds().join(', ')}`);
    }
    if (entry === false) continue;
    const optionSets = Array.isArray(entry) ? entry : [entry];
    for (const options of optionSets) rules.push(factory(options));
  }
  return rules;
}

export function validate(tree: SyntaxTree, config: LintConfig = DEFAULT_CONFIG): ValidationError[] {
  return lintTree(tree, createRules(config));
}
