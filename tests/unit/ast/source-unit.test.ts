import { describe, it, expect } from 'vitest';
import ts from 'typescript';
import { SourceUnit } from '../../../src/ast/source-unit.js';
import { findAll } from '../../../src/ast/walk.js';

function renamer(from: string, to: string) {
  return (node: ts.Node): ts.Node | undefined =>
    ts.isIdentifier(node) && node.text === from ? ts.factory.createIdentifier(to) : undefined;
}

describe('SourceUnit', () => {
  it('prints a rewritten tree and parses it back on refresh', () => {
    const unit = SourceUnit.parse('a.ts', 'const x = 1;\n');

    expect(unit.rewrite(renamer('x', 'y'))).toBe(true);
    expect(unit.render()).toBe('const y = 1;\n');
    expect(unit.text).toBe('const x = 1;\n');

    unit.refresh();

    expect(unit.text).toBe('const y = 1;\n');
    expect(unit.root.text).toBe('const y = 1;\n');
    expect(unit.render()).toBe('const y = 1;\n');
  });

  it('rewrites a rewritten tree again before the next refresh', () => {
    const unit = SourceUnit.parse('a.ts', 'const x = 1;\n');

    unit.rewrite(renamer('x', 'y'));
    expect(unit.rewrite(renamer('y', 'z'))).toBe(true);
    expect(unit.render()).toBe('const z = 1;\n');

    unit.refresh();
    expect(unit.root.text).toBe('const z = 1;\n');
  });

  it('keeps the same tree when nothing is replaced', () => {
    const unit = SourceUnit.parse('a.ts', 'const x = 1;\n');
    const before = unit.root;

    expect(unit.rewrite(renamer('nope', 'y'))).toBe(false);
    expect(unit.root).toBe(before);
    expect(unit.render()).toBe('const x = 1;\n');
  });

  it('positions parsed nodes and not synthesized ones', () => {
    const unit = SourceUnit.parse('a.ts', 'let a;\nconst b = c;\n');
    const [c] = findAll(unit.root, (node): node is ts.Identifier => ts.isIdentifier(node) && node.text === 'c');

    expect(unit.positionOf(c)).toEqual({ line: 2, column: 11 });
    expect(unit.positionOf(ts.factory.createIdentifier('q'))).toBeUndefined();
  });

  it('records warnings under the active fix', () => {
    const unit = SourceUnit.parse('a.ts', 'let a;\nconst b = c;\n');
    const [c] = findAll(unit.root, (node): node is ts.Identifier => ts.isIdentifier(node) && node.text === 'c');

    unit.setActiveFix('checker');
    unit.warn(c, 'look here');

    expect(unit.warnings).toEqual([{ fix: 'checker', line: 2, column: 11, message: 'look here' }]);
    unit.clearWarnings();
    expect(unit.warnings).toEqual([]);
  });
});
