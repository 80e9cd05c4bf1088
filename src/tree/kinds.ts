// Token and construct kinds of a Java-shaped syntax tree, named after the
// parser's token types. Trees are produced by an external parser.
export const NODE_KINDS = [
  'COMPILATION_UNIT',
  'PACKAGE_DEF',
  'IMPORT',
  'CLASS_DEF',
  'INTERFACE_DEF',
  'ENUM_DEF',
  'ANNOTATION_DEF',
  'OBJBLOCK',
  'LCURLY',
  'RCURLY',
  'MODIFIERS',
  'ANNOTATION',
  'TYPE',
  'TYPE_PARAMETERS',
  'EXTENDS_CLAUSE',
  'IMPLEMENTS_CLAUSE',
  'LITERAL_CLASS',
  'LITERAL_INTERFACE',
  'LITERAL_STATIC',
  'LITERAL_VOID',
  'LITERAL_INT',
  'METHOD_DEF',
  'CTOR_DEF',
  'PARAMETERS',
  'PARAMETER_DEF',
  'LITERAL_THROWS',
  'STATIC_INIT',
  'INSTANCE_INIT',
  'VARIABLE_DEF',
  'SLIST',
  'EMPTY_STAT',
  'LITERAL_TRY',
  'RESOURCE_SPECIFICATION',
  'LITERAL_CATCH',
  'LITERAL_FINALLY',
  'LITERAL_IF',
  'LITERAL_ELSE',
  'LITERAL_FOR',
  'FOR_INIT',
  'FOR_CONDITION',
  'FOR_ITERATOR',
  'LITERAL_WHILE',
  'LITERAL_DO',
  'DO_WHILE',
  'LITERAL_RETURN',
  'LITERAL_THROW',
  'LITERAL_BREAK',
  'LITERAL_NEW',
  'EXPR',
  'ELIST',
  'METHOD_CALL',
  'ASSIGN',
  'DOT',
  'IDENT',
  'NUM_INT',
  'STRING_LITERAL',
  'LPAREN',
  'RPAREN',
  'COMMA',
  'SEMI',
] as const;

export type NodeKind = (typeof NODE_KINDS)[number];

const KIND_SET: ReadonlySet<string> = new Set(NODE_KINDS);

export function isNodeKind(value: string): value is NodeKind {
  return KIND_SET.has(value);
}
