// Public SDK surface for programmatic use
// Re-export core types
export type { ValidationError, Severity } from './core/types.js';

// Syntax trees
export { NODE_KINDS, isNodeKind } from './tree/kinds.js';
export type { NodeKind } from './tree/kinds.js';
export { ArenaTree } from './tree/syntax-tree.js';
export type { NodeId, SyntaxTree } from './tree/syntax-tree.js';
export { buildTree, node } from './tree/builder.js';
export type { NodeSpec } from './tree/builder.js';
export { firstNode, nextTokenAfter } from './tree/navigation.js';
export { loadTree, parseTreeJson, SerializedTreeSchema } from './tree/serialized.js';
export type { SerializedTree, LoadedTree } from './tree/serialized.js';

// Pipeline, configuration and rules
export { lintTree } from './core/pipeline.js';
export type { Rule } from './core/pipeline.js';
export { diagnosticAtNode, errorAt, warningAt, formatMessage } from './core/errorBuilder.js';
export { validate, createRules, knownRuleIds } from './core/router.js';
export { parseConfig, loadConfigFile, DEFAULT_CONFIG, DEFAULT_CONFIG_FILE, LintConfigSchema } from './core/config.js';
export type { LintConfig } from './core/config.js';
export { RuleConfigError, TreeFormatError } from './core/errors.js';
export * from './rules/right-curly/index.js';

// Formatting
export { textReport, toJsonResult } from './core/format.js';
export type { OutputFormat } from './core/format.js';
