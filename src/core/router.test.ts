import { describe, expect, it } from 'vitest';
import { createRules, knownRuleIds, validate } from './router.js';
import { DEFAULT_CONFIG, parseConfig } from './config.js';
import { RuleConfigError } from './errors.js';
import { classWithInitializers, ifElse } from '../__fixtures__/java-trees.js';

describe('createRules', () => {
  it('builds one instance per option set', () => {
    const rules = createRules({
      rules: {
        'right-curly': [
          { option: 'same' },
          { option: 'alone', tokens: ['CLASS_DEF', 'METHOD_DEF'] },
        ],
      },
    });
    expect(rules.map((r) => r.id)).toEqual(['right-curly', 'right-curly']);
    expect([...(rules[1]?.kinds ?? [])]).toEqual(['CLASS_DEF', 'METHOD_DEF']);
  });

  it('skips disabled rules', () => {
    expect(createRules({ rules: { 'right-curly': false } })).toEqual([]);
  });

  it('rejects unknown rule ids', () => {
    expect(() => createRules({ rules: { 'left-curly': {} } })).toThrow(
      'left-curly: unknown rule, expected one of right-curly'
    );
    expect(knownRuleIds()).toEqual(['right-curly']);
  });
});

describe('validate', () => {
  it('runs the default configuration', () => {
    expect(validate(ifElse(true)).map((e) => e.code)).toEqual(['RC-LINE-SAME']);
    expect(validate(ifElse(true), DEFAULT_CONFIG)).toHaveLength(1);
  });

  it('runs several instances side by side', () => {
    const config = parseConfig({
      rules: {
        'right-curly': [
          { option: 'same' },
          { option: 'alone', tokens: 'STATIC_INIT,METHOD_DEF', severity: 'warning' },
        ],
      },
    });
    const found = validate(classWithInitializers(), config);
    expect(found.map((e) => `${e.line}:${e.column} ${e.severity}`)).toEqual([
      '2:12 warning',
      '3:17 warning',
      '4:13 warning',
    ]);
  });
});

describe('parseConfig', () => {
  it('rejects a malformed configuration', () => {
    expect(() => parseConfig({ rules: { 'right-curly': 'alone' } }, 'brace-lint.config.json')).toThrow(RuleConfigError);
    expect(() => parseConfig({ rules: {}, extra: true })).toThrow(RuleConfigError);
  });
});
