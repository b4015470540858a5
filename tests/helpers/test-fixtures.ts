/**
 * Shared test fixtures and factories for fix tests
 */

import ts from 'typescript';
import { parseSource, renderSource } from '../../src/ast/syntax.js';
import type { SourceUnit } from '../../src/ast/source-unit.js';
import type { Fix } from '../../src/migration/types.js';

/**
 * Printer-canonical form of `text`, for comparing whole files.
 */
export function canonical(text: string): string {
  return renderSource(parseSource(text, 'expected.ts'));
}

/**
 * Build a fix with defaults for everything but the transform.
 */
export function createFix(overrides: Partial<Fix> & Pick<Fix, 'name'>): Fix {
  return {
    date: '2020-01-01',
    description: `test fix ${overrides.name}`,
    precondition: () => true,
    transform: () => false,
    ...overrides,
  };
}

/**
 * Fix that renames every identifier `from` to `to`.
 */
export function createRenameFix(name: string, from: string, to: string, date = '2020-01-01'): Fix {
  return createFix({
    name,
    date,
    transform: (unit: SourceUnit) =>
      unit.rewrite((node) =>
        ts.isIdentifier(node) && node.text === from ? ts.factory.createIdentifier(to) : undefined
      ),
  });
}

/**
 * Fix that flips every boolean literal, so it never settles.
 */
export function createToggleFix(name = 'toggle'): Fix {
  return createFix({
    name,
    transform: (unit: SourceUnit) =>
      unit.rewrite((node) => {
        if (node.kind === ts.SyntaxKind.TrueKeyword) return ts.factory.createFalse();
        if (node.kind === ts.SyntaxKind.FalseKeyword) return ts.factory.createTrue();
        return undefined;
      }),
  });
}
