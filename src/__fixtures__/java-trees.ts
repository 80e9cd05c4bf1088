import { buildTree, node as n } from '../tree/builder.js';
import type { ArenaTree } from '../tree/syntax-tree.js';

// Hand-built trees shaped like the parser's output for small Java snippets.
// Columns are 0-based, as the parser reports them.

/** `if (x) { y(); }` followed by `z();` on the next line. */
export function singleLineIf(): ArenaTree {
  const source = ['if (x) { y(); }', 'z();'].join('\n');
  return buildTree(
    source,
    n('COMPILATION_UNIT', 1, 0,
      n('LITERAL_IF', 1, 0,
        n('LPAREN', 1, 3),
        n('EXPR', 1, 4, n('IDENT', 1, 4)),
        n('RPAREN', 1, 5),
        n('SLIST', 1, 7,
          n('EXPR', 1, 10, n('IDENT', 1, 9)),
          n('SEMI', 1, 12),
          n('RCURLY', 1, 14))),
      n('EXPR', 2, 1, n('IDENT', 2, 0)),
      n('SEMI', 2, 3))
  );
}

/** if/else where `else` either follows the brace (`} else {`) or starts the next line. */
export function ifElse(elseOnOwnLine: boolean): ArenaTree {
  if (elseOnOwnLine) {
    const source = ['if (x) {', '  y();', '}', 'else {', '  z();', '}'].join('\n');
    return buildTree(
      source,
      n('COMPILATION_UNIT', 1, 0,
        n('LITERAL_IF', 1, 0,
          n('LPAREN', 1, 3),
          n('EXPR', 1, 4, n('IDENT', 1, 4)),
          n('RPAREN', 1, 5),
          n('SLIST', 1, 7,
            n('EXPR', 2, 3, n('IDENT', 2, 2)),
            n('SEMI', 2, 5),
            n('RCURLY', 3, 0)),
          n('LITERAL_ELSE', 4, 0,
            n('SLIST', 4, 5,
              n('EXPR', 5, 3, n('IDENT', 5, 2)),
              n('SEMI', 5, 5),
              n('RCURLY', 6, 0)))))
    );
  }
  const source = ['if (x) {', '  y();', '} else {', '  z();', '}'].join('\n');
  return buildTree(
    source,
    n('COMPILATION_UNIT', 1, 0,
      n('LITERAL_IF', 1, 0,
        n('LPAREN', 1, 3),
        n('EXPR', 1, 4, n('IDENT', 1, 4)),
        n('RPAREN', 1, 5),
        n('SLIST', 1, 7,
          n('EXPR', 2, 3, n('IDENT', 2, 2)),
          n('SEMI', 2, 5),
          n('RCURLY', 3, 0)),
        n('LITERAL_ELSE', 3, 2,
          n('SLIST', 3, 7,
            n('EXPR', 4, 3, n('IDENT', 4, 2)),
            n('SEMI', 4, 5),
            n('RCURLY', 5, 0)))))
  );
}

/** `if (x) {` / `  y(); }`: the closing brace trails the last statement. */
export function braceAfterStatement(): ArenaTree {
  const source = ['if (x) {', '  y(); }'].join('\n');
  return buildTree(
    source,
    n('COMPILATION_UNIT', 1, 0,
      n('LITERAL_IF', 1, 0,
        n('LPAREN', 1, 3),
        n('EXPR', 1, 4, n('IDENT', 1, 4)),
        n('RPAREN', 1, 5),
        n('SLIST', 1, 7,
          n('EXPR', 2, 3, n('IDENT', 2, 2)),
          n('SEMI', 2, 5),
          n('RCURLY', 2, 7))))
  );
}

/** `if (a) { x(); } else if (b) { y(); } else { z(); }` then `w();`. */
export function elseIfChainOnOneLine(): ArenaTree {
  const source = ['if (a) { x(); } else if (b) { y(); } else { z(); }', 'w();'].join('\n');
  return buildTree(
    source,
    n('COMPILATION_UNIT', 1, 0,
      n('LITERAL_IF', 1, 0,
        n('LPAREN', 1, 3),
        n('EXPR', 1, 4, n('IDENT', 1, 4)),
        n('RPAREN', 1, 5),
        n('SLIST', 1, 7,
          n('EXPR', 1, 10, n('IDENT', 1, 9)),
          n('SEMI', 1, 12),
          n('RCURLY', 1, 14)),
        n('LITERAL_ELSE', 1, 16,
          n('LITERAL_IF', 1, 21,
            n('LPAREN', 1, 24),
            n('EXPR', 1, 25, n('IDENT', 1, 25)),
            n('RPAREN', 1, 26),
            n('SLIST', 1, 28,
              n('EXPR', 1, 31, n('IDENT', 1, 30)),
              n('SEMI', 1, 33),
              n('RCURLY', 1, 35)),
            n('LITERAL_ELSE', 1, 37,
              n('SLIST', 1, 42,
                n('EXPR', 1, 45, n('IDENT', 1, 44)),
                n('SEMI', 1, 47),
                n('RCURLY', 1, 49)))))),
      n('EXPR', 2, 1, n('IDENT', 2, 0)),
      n('SEMI', 2, 3))
  );
}

/** `if (x) y();` — a branch without braces. */
export function ifWithoutBraces(): ArenaTree {
  const source = 'if (x) y();';
  return buildTree(
    source,
    n('COMPILATION_UNIT', 1, 0,
      n('LITERAL_IF', 1, 0,
        n('LPAREN', 1, 3),
        n('EXPR', 1, 4, n('IDENT', 1, 4)),
        n('RPAREN', 1, 5),
        n('EXPR', 1, 8, n('IDENT', 1, 7)),
        n('SEMI', 1, 10)))
  );
}

/** try / catch on its own line / `} finally {`. */
export function tryCatchFinally(): ArenaTree {
  const source = ['try {', '  a();', '}', 'catch (E e) {', '  b();', '} finally {', '  c();', '}'].join('\n');
  return buildTree(
    source,
    n('COMPILATION_UNIT', 1, 0,
      n('LITERAL_TRY', 1, 0,
        n('SLIST', 1, 4,
          n('EXPR', 2, 3, n('IDENT', 2, 2)),
          n('SEMI', 2, 5),
          n('RCURLY', 3, 0)),
        n('LITERAL_CATCH', 4, 0,
          n('LPAREN', 4, 6),
          n('PARAMETER_DEF', 4, 7,
            n('MODIFIERS', 4, 7),
            n('TYPE', 4, 7, n('IDENT', 4, 7)),
            n('IDENT', 4, 9)),
          n('RPAREN', 4, 10),
          n('SLIST', 4, 12,
            n('EXPR', 5, 3, n('IDENT', 5, 2)),
            n('SEMI', 5, 5),
            n('RCURLY', 6, 0))),
        n('LITERAL_FINALLY', 6, 2,
          n('SLIST', 6, 10,
            n('EXPR', 7, 3, n('IDENT', 7, 2)),
            n('SEMI', 7, 5),
            n('RCURLY', 8, 0)))))
  );
}

/** `try (R r = open()) {` ... `}` with no catch or finally. */
export function tryWithResources(): ArenaTree {
  const source = ['try (R r = open()) {', '  a();', '}'].join('\n');
  return buildTree(
    source,
    n('COMPILATION_UNIT', 1, 0,
      n('LITERAL_TRY', 1, 0,
        n('RESOURCE_SPECIFICATION', 1, 4,
          n('LPAREN', 1, 4),
          n('IDENT', 1, 7),
          n('RPAREN', 1, 17)),
        n('SLIST', 1, 19,
          n('EXPR', 2, 3, n('IDENT', 2, 2)),
          n('SEMI', 2, 5),
          n('RCURLY', 3, 0))))
  );
}

/** do-while with `while (x);` either on the brace's line or the next one. */
export function doWhile(conditionOnOwnLine: boolean): ArenaTree {
  if (conditionOnOwnLine) {
    const source = ['do {', '  a();', '}', 'while (x);'].join('\n');
    return buildTree(
      source,
      n('COMPILATION_UNIT', 1, 0,
        n('LITERAL_DO', 1, 0,
          n('SLIST', 1, 3,
            n('EXPR', 2, 3, n('IDENT', 2, 2)),
            n('SEMI', 2, 5),
            n('RCURLY', 3, 0)),
          n('DO_WHILE', 4, 0),
          n('LPAREN', 4, 6),
          n('EXPR', 4, 7, n('IDENT', 4, 7)),
          n('RPAREN', 4, 8),
          n('SEMI', 4, 9)))
    );
  }
  const source = ['do { a(); } while (x);', 'b();'].join('\n');
  return buildTree(
    source,
    n('COMPILATION_UNIT', 1, 0,
      n('LITERAL_DO', 1, 0,
        n('SLIST', 1, 3,
          n('EXPR', 1, 6, n('IDENT', 1, 5)),
          n('SEMI', 1, 8),
          n('RCURLY', 1, 10)),
        n('DO_WHILE', 1, 12),
        n('LPAREN', 1, 18),
        n('EXPR', 1, 19, n('IDENT', 1, 19)),
        n('RPAREN', 1, 20),
        n('SEMI', 1, 21)),
      n('EXPR', 2, 1, n('IDENT', 2, 0)),
      n('SEMI', 2, 3))
  );
}

/** `for (;;) {` ... `} b();`: a statement follows the closing brace. */
export function forWithTrailingStatement(): ArenaTree {
  const source = ['for (;;) {', '  a();', '} b();'].join('\n');
  return buildTree(
    source,
    n('COMPILATION_UNIT', 1, 0,
      n('LITERAL_FOR', 1, 0,
        n('LPAREN', 1, 4),
        n('FOR_INIT', 1, 5),
        n('SEMI', 1, 5),
        n('FOR_CONDITION', 1, 6),
        n('SEMI', 1, 6),
        n('FOR_ITERATOR', 1, 7),
        n('RPAREN', 1, 7),
        n('SLIST', 1, 9,
          n('EXPR', 2, 3, n('IDENT', 2, 2)),
          n('SEMI', 2, 5),
          n('RCURLY', 3, 0))),
      n('EXPR', 3, 3, n('IDENT', 3, 2)),
      n('SEMI', 3, 5))
  );
}

/** `while (x);` — a loop without a body. */
export function bodylessWhile(): ArenaTree {
  const source = 'while (x);';
  return buildTree(
    source,
    n('COMPILATION_UNIT', 1, 0,
      n('LITERAL_WHILE', 1, 0,
        n('LPAREN', 1, 6),
        n('EXPR', 1, 7, n('IDENT', 1, 7)),
        n('RPAREN', 1, 8),
        n('EMPTY_STAT', 1, 9)))
  );
}

/**
 * class A {
 *   static { }
 *   static { x(); }
 *   void m() {}
 * }
 */
export function classWithInitializers(): ArenaTree {
  const source = ['class A {', '  static { }', '  static { x(); }', '  void m() {}', '}'].join('\n');
  return buildTree(
    source,
    n('COMPILATION_UNIT', 1, 0,
      n('CLASS_DEF', 1, 0,
        n('MODIFIERS', 1, 0),
        n('LITERAL_CLASS', 1, 0),
        n('IDENT', 1, 6),
        n('OBJBLOCK', 1, 8,
          n('LCURLY', 1, 8),
          n('STATIC_INIT', 2, 2,
            n('SLIST', 2, 9,
              n('RCURLY', 2, 11))),
          n('STATIC_INIT', 3, 2,
            n('SLIST', 3, 9,
              n('EXPR', 3, 12, n('IDENT', 3, 11)),
              n('SEMI', 3, 14),
              n('RCURLY', 3, 16))),
          n('METHOD_DEF', 4, 2,
            n('MODIFIERS', 4, 2),
            n('TYPE', 4, 2, n('LITERAL_VOID', 4, 2)),
            n('IDENT', 4, 7),
            n('LPAREN', 4, 8),
            n('PARAMETERS', 4, 9),
            n('RPAREN', 4, 9),
            n('SLIST', 4, 11,
              n('RCURLY', 4, 12))),
          n('RCURLY', 5, 0))))
  );
}

/** `class B {}` */
export function emptyClass(): ArenaTree {
  const source = 'class B {}';
  return buildTree(
    source,
    n('COMPILATION_UNIT', 1, 0,
      n('CLASS_DEF', 1, 0,
        n('MODIFIERS', 1, 0),
        n('LITERAL_CLASS', 1, 0),
        n('IDENT', 1, 6),
        n('OBJBLOCK', 1, 8,
          n('LCURLY', 1, 8),
          n('RCURLY', 1, 9))))
  );
}

/** `abstract class C {` / `  abstract void m();` / `}` */
export function abstractMethod(): ArenaTree {
  const source = ['abstract class C {', '  abstract void m();', '}'].join('\n');
  return buildTree(
    source,
    n('COMPILATION_UNIT', 1, 0,
      n('CLASS_DEF', 1, 0,
        n('MODIFIERS', 1, 0),
        n('LITERAL_CLASS', 1, 9),
        n('IDENT', 1, 15),
        n('OBJBLOCK', 1, 17,
          n('LCURLY', 1, 17),
          n('METHOD_DEF', 2, 2,
            n('MODIFIERS', 2, 2),
            n('TYPE', 2, 11, n('LITERAL_VOID', 2, 11)),
            n('IDENT', 2, 16),
            n('LPAREN', 2, 17),
            n('PARAMETERS', 2, 18),
            n('RPAREN', 2, 18),
            n('SEMI', 2, 19)),
          n('RCURLY', 3, 0))))
  );
}

/**
 * class A {
 *   Map m = new HashMap() {{
 *     put(1, 2);
 *   }};
 *   int z;          <- or `  }}; int z;` when nextOnSameLine
 * }
 */
export function doubleBraceInit(nextOnSameLine = false): ArenaTree {
  const source = nextOnSameLine
    ? ['class A {', '  Map m = new HashMap() {{', '    put(1, 2);', '  }}; int z;', '}'].join('\n')
    : ['class A {', '  Map m = new HashMap() {{', '    put(1, 2);', '  }};', '  int z;', '}'].join('\n');
  const zLine = nextOnSameLine ? 4 : 5;
  const zColumn = nextOnSameLine ? 6 : 2;
  const closeLine = nextOnSameLine ? 5 : 6;
  return buildTree(
    source,
    n('COMPILATION_UNIT', 1, 0,
      n('CLASS_DEF', 1, 0,
        n('MODIFIERS', 1, 0),
        n('LITERAL_CLASS', 1, 0),
        n('IDENT', 1, 6),
        n('OBJBLOCK', 1, 8,
          n('LCURLY', 1, 8),
          n('VARIABLE_DEF', 2, 2,
            n('MODIFIERS', 2, 2),
            n('TYPE', 2, 2, n('IDENT', 2, 2)),
            n('IDENT', 2, 6),
            n('ASSIGN', 2, 8,
              n('EXPR', 2, 10,
                n('LITERAL_NEW', 2, 10,
                  n('IDENT', 2, 14),
                  n('LPAREN', 2, 21),
                  n('ELIST', 2, 22),
                  n('RPAREN', 2, 22),
                  n('OBJBLOCK', 2, 24,
                    n('LCURLY', 2, 24),
                    n('INSTANCE_INIT', 2, 25,
                      n('SLIST', 2, 25,
                        n('EXPR', 3, 7, n('IDENT', 3, 4)),
                        n('SEMI', 3, 13),
                        n('RCURLY', 4, 2))),
                    n('RCURLY', 4, 3))))),
            n('SEMI', 4, 4)),
          n('VARIABLE_DEF', zLine, zColumn,
            n('MODIFIERS', zLine, zColumn),
            n('TYPE', zLine, zColumn, n('LITERAL_INT', zLine, zColumn)),
            n('IDENT', zLine, zColumn + 4),
            n('SEMI', zLine, zColumn + 5)),
          n('RCURLY', closeLine, 0))))
  );
}

/** `void m() { a(); }; int z;` or, without the stray semicolon, `void m() { a(); } int z;`. */
export function methodFollowedOnSameLine(withSemicolon: boolean): ArenaTree {
  const source = withSemicolon ? 'void m() { a(); }; int z;' : 'void m() { a(); } int z;';
  const z = withSemicolon ? 19 : 18;
  const members = [
    n('METHOD_DEF', 1, 0,
      n('MODIFIERS', 1, 0),
      n('TYPE', 1, 0, n('LITERAL_VOID', 1, 0)),
      n('IDENT', 1, 5),
      n('LPAREN', 1, 6),
      n('PARAMETERS', 1, 7),
      n('RPAREN', 1, 7),
      n('SLIST', 1, 9,
        n('EXPR', 1, 12, n('IDENT', 1, 11)),
        n('SEMI', 1, 14),
        n('RCURLY', 1, 16))),
    ...(withSemicolon ? [n('SEMI', 1, 17)] : []),
    n('VARIABLE_DEF', 1, z,
      n('MODIFIERS', 1, z),
      n('TYPE', 1, z, n('LITERAL_INT', 1, z)),
      n('IDENT', 1, z + 4),
      n('SEMI', 1, z + 5)),
  ];
  return buildTree(source, n('COMPILATION_UNIT', 1, 0, ...members));
}
