import type { SymbolId } from '../grammar/id';
import type { ParseNode, ParseTree } from '../grammar/tree';

export type TreeVisitor<T, R = void> = (tree: ParseTree<T>, parent?: ParseNode<T>, path?: number[]) => R;

export interface TreeLabels<T> {
  symbolName?: (id: SymbolId) => string | undefined;
  tokenLabel?: (token: T) => string;
}

/**
 * Walks the tree in pre-order, visiting each node before its children.
 * `path` holds the child indexes leading from the root to the visited tree.
 */
export function traverseTree<T>(
  tree: ParseTree<T>,
  visit: TreeVisitor<T>,
  parent?: ParseNode<T>,
  path: number[] = []
): void {
  visit(tree, parent, path);
  if (tree.kind === 'node') {
    const self = tree;
    self.children.forEach((child, index) => traverseTree(child, visit, self, [...path, index]));
  }
}

export function findNodes<T>(tree: ParseTree<T>, symbol: SymbolId): ParseNode<T>[] {
  const results: ParseNode<T>[] = [];
  traverseTree(tree, (current) => {
    if (current.kind === 'node' && current.symbol.equals(symbol)) {
      results.push(current);
    }
  });
  return results;
}

// Tokens of every leaf, left to right
export function collectTokens<T>(tree: ParseTree<T>): T[] {
  const tokens: T[] = [];
  traverseTree(tree, (current) => {
    if (current.kind === 'leaf') tokens.push(current.token);
  });
  return tokens;
}

function labelOf<T>(tree: ParseTree<T>, labels: TreeLabels<T>): string {
  if (tree.kind === 'leaf') {
    return labels.tokenLabel ? labels.tokenLabel(tree.token) : JSON.stringify(tree.token);
  }
  return labels.symbolName?.(tree.symbol) ?? tree.symbol.toString();
}

// Pretty print a parse tree for debugging
export function printTree<T>(tree: ParseTree<T>, labels: TreeLabels<T> = {}, indent: string = '', isLast: boolean = true): string {
  const lines: string[] = [];
  const prefix = indent + (isLast ? '└── ' : '├── ');
  lines.push(`${prefix}${labelOf(tree, labels)}`);

  if (tree.kind === 'node') {
    const newIndent = indent + (isLast ? '    ' : '│   ');
    const children = tree.children;
    children.forEach((child, index) => {
      lines.push(printTree(child, labels, newIndent, index === children.length - 1));
    });
  }

  return lines.join('\n');
}

export type SerializedTree =
  | { leaf: unknown }
  | { symbol: string; children: SerializedTree[] };

export function serializeTree<T>(tree: ParseTree<T>, labels: Pick<TreeLabels<T>, 'symbolName'> = {}): SerializedTree {
  if (tree.kind === 'leaf') {
    return { leaf: tree.token };
  }
  return {
    symbol: labels.symbolName?.(tree.symbol) ?? tree.symbol.toString(),
    children: tree.children.map(child => serializeTree(child, labels)),
  };
}

export function getTreeStats<T>(tree: ParseTree<T>): {
  totalNodes: number;
  maxDepth: number;
  leafCount: number;
} {
  const stats = { totalNodes: 0, maxDepth: 0, leafCount: 0 };

  function collect(current: ParseTree<T>, depth: number) {
    stats.totalNodes++;
    stats.maxDepth = Math.max(stats.maxDepth, depth);
    if (current.kind === 'leaf') {
      stats.leafCount++;
    } else {
      current.children.forEach(child => collect(child, depth + 1));
    }
  }

  collect(tree, 0);
  return stats;
}
