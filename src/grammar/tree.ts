import type { SymbolId } from './id';

// Parse tree produced by the engine. Built bottom-up, so children are owned by
// exactly one parent.

export interface ParseLeaf<T> {
  kind: 'leaf';
  token: T;
}

export interface ParseNode<T> {
  kind: 'node';
  symbol: SymbolId;
  // In the order of the rule's right-hand side
  children: ParseTree<T>[];
}

export type ParseTree<T> = ParseLeaf<T> | ParseNode<T>;

export function leaf<T>(token: T): ParseLeaf<T> {
  return { kind: 'leaf', token };
}

export function node<T>(symbol: SymbolId, children: ParseTree<T>[] = []): ParseNode<T> {
  return { kind: 'node', symbol, children };
}

export function isLeaf<T>(tree: ParseTree<T>): tree is ParseLeaf<T> {
  return tree.kind === 'leaf';
}

export function isNode<T>(tree: ParseTree<T>): tree is ParseNode<T> {
  return tree.kind === 'node';
}
