/**
 * One file under rewrite: its text, its current tree and the warnings fixes
 * raised against it.
 */

import type ts from 'typescript';
import { parseSource, renderSource } from './syntax.js';
import { rewrite, type NodeRewriter } from './walk.js';

/** 1-based line and column */
export interface SourcePosition {
  line: number;
  column: number;
}

export interface FixWarning extends SourcePosition {
  fix: string;
  message: string;
}

export class SourceUnit {
  readonly warnings: FixWarning[] = [];
  private currentRoot: ts.SourceFile;
  private currentText: string;
  private activeFix = '';
  /** Printed form of a rewritten tree, until the next refresh */
  private rewrittenText: string | undefined;

  constructor(
    readonly path: string,
    readonly originalText: string,
    root: ts.SourceFile
  ) {
    this.currentRoot = root;
    this.currentText = originalText;
  }

  /**
   * Parse `text` into a new unit.
   *
   * @throws ParseError
   */
  static parse(path: string, text: string): SourceUnit {
    return new SourceUnit(path, text, parseSource(text, path));
  }

  get root(): ts.SourceFile {
    return this.currentRoot;
  }

  /** Text the current tree was last parsed from */
  get text(): string {
    return this.currentText;
  }

  /**
   * Run the generic rewriter over the current tree and keep the result.
   * Returns true iff at least one node was replaced.
   *
   * The rewritten tree is printed before its transformation is released.
   */
  rewrite(visit: NodeRewriter): boolean {
    const result = rewrite(this.currentRoot, visit);
    try {
      if (result.replaced === 0) return false;
      this.rewrittenText = renderSource(result.root);
      this.currentRoot = result.root;
      return true;
    } finally {
      result.dispose();
    }
  }

  /**
   * Print the current tree and parse it back, so the next fix sees a tree
   * with real positions.
   *
   * @throws ParseError if the printed text does not parse
   */
  refresh(): void {
    const text = this.render();
    this.currentRoot = parseSource(text, this.path);
    this.currentText = text;
    this.rewrittenText = undefined;
  }

  /**
   * Print the current tree.
   */
  render(): string {
    return this.rewrittenText ?? renderSource(this.currentRoot);
  }

  /**
   * Position of a parsed node in the current text. Nodes created by a fix
   * have no position.
   */
  positionOf(node: ts.Node): SourcePosition | undefined {
    if (node.pos < 0 || node.getSourceFile() !== this.currentRoot) return undefined;
    const { line, character } = this.currentRoot.getLineAndCharacterOfPosition(node.getStart(this.currentRoot));
    return { line: line + 1, column: character + 1 };
  }

  /**
   * Record a warning against `node` for the fix that is currently running.
   */
  warn(node: ts.Node, message: string): void {
    const position = this.positionOf(node) ?? { line: 0, column: 0 };
    this.warnings.push({ fix: this.activeFix, ...position, message });
  }

  /** Drop warnings raised against an earlier version of the tree */
  clearWarnings(): void {
    this.warnings.length = 0;
  }

  /** Set by the driver around each precondition and transform call */
  setActiveFix(name: string): void {
    this.activeFix = name;
  }
}
