/**
 * Generic tree traversal.
 *
 * Children are enumerated by the compiler itself (`ts.forEachChild` and
 * `ts.visitEachChild`, implemented once per node kind), so neither the walker
 * nor any fix has to know the node catalog. Visitation is pre-order, root
 * first, children in the order their parent defines them.
 */

import ts from 'typescript';

export type NodeVisitor = (node: ts.Node) => void;

/**
 * Returns a replacement for `node`, or undefined to keep it.
 */
export type NodeRewriter = (node: ts.Node) => ts.Node | undefined;

export interface RewriteResult {
  root: ts.SourceFile;
  /** Number of nodes replaced */
  replaced: number;
  /** Release the transformation; print `root` first */
  dispose(): void;
}

/**
 * Call `visit` on `root` and every node reachable from it, in pre-order.
 * Iterative, so nesting depth is bounded by memory rather than the call stack.
 */
export function walk(root: ts.Node, visit: NodeVisitor): void {
  const stack: ts.Node[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) break;
    visit(node);

    const children: ts.Node[] = [];
    ts.forEachChild(node, (child) => {
      children.push(child);
    });
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }
}

/**
 * Collect every node under `root` (root included) that satisfies `test`,
 * in walk order.
 */
export function findAll<T extends ts.Node>(root: ts.Node, test: (node: ts.Node) => node is T): T[] {
  const found: T[] = [];
  walk(root, (node) => {
    if (test(node)) found.push(node);
  });
  return found;
}

/**
 * Pre-order rewrite of a source file. When `visit` returns a replacement the
 * walk continues into the replacement's children, not the replaced node's.
 * The input tree is left as it was; the result shares every unchanged node.
 */
export function rewrite(root: ts.SourceFile, visit: NodeRewriter): RewriteResult {
  let replaced = 0;

  const transformer: ts.TransformerFactory<ts.SourceFile> = (context) => {
    const visitor = (node: ts.Node): ts.Node => {
      const replacement = visit(node);
      if (replacement !== undefined && replacement !== node) {
        replaced++;
        return ts.visitEachChild(replacement, visitor, context);
      }
      return ts.visitEachChild(node, visitor, context);
    };
    return (sourceFile) => {
      const replacement = visit(sourceFile);
      if (replacement !== undefined && replacement !== sourceFile && ts.isSourceFile(replacement)) {
        replaced++;
        return ts.visitEachChild(replacement, visitor, context);
      }
      return ts.visitEachChild(sourceFile, visitor, context);
    };
  };

  const result = ts.transform(root, [transformer]);
  if (replaced === 0) {
    result.dispose();
    return { root, replaced, dispose: () => undefined };
  }
  const [transformed] = result.transformed;
  return { root: transformed, replaced, dispose: () => result.dispose() };
}
