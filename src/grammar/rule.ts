import type { SymbolId } from './id';
import type { ParseTree } from './tree';

export type TokenPredicate<T> = (token: T) => boolean;

export interface TerminalSchema<T> {
  kind: 'terminal';
  accepts: TokenPredicate<T>;
  label?: string;
}

export interface NonterminalSchema {
  kind: 'nonterminal';
  id: SymbolId;
}

export type SymbolSchema<T> = TerminalSchema<T> | NonterminalSchema;

/**
 * A substitution rule `input -> schema[0] schema[1] ...`.
 *
 * The right-hand side is frozen when the rule is built.
 */
export class Rule<T> {
  readonly input: SymbolId;
  readonly schema: readonly SymbolSchema<T>[];

  constructor(input: SymbolId, schema: readonly SymbolSchema<T>[]) {
    this.input = input;
    this.schema = Object.freeze([...schema]);
  }

  static builder<T>(input: SymbolId): RuleBuilder<T> {
    return new RuleBuilder<T>(input);
  }

  get length(): number {
    return this.schema.length;
  }

  matches(candidates: readonly ParseTree<T>[]): boolean {
    return this.matchesAt(candidates, 0);
  }

  /**
   * Matches the run of `stack` starting at `from` and reaching its top,
   * without copying it. The length is compared before any element is read.
   */
  matchesAt(stack: readonly ParseTree<T>[], from: number): boolean {
    if (from < 0 || stack.length - from !== this.schema.length) {
      return false;
    }
    for (let i = 0; i < this.schema.length; i++) {
      if (!schemaMatches(this.schema[i], stack[from + i])) {
        return false;
      }
    }
    return true;
  }

  describe(symbolName: (id: SymbolId) => string | undefined = () => undefined): string {
    const name = (id: SymbolId) => symbolName(id) ?? id.toString();
    const rhs = this.schema.map(s => (s.kind === 'terminal' ? s.label ?? '<token>' : name(s.id)));
    return `${name(this.input)} -> ${rhs.length > 0 ? rhs.join(' ') : 'ε'}`;
  }
}

// A terminal takes a leaf whose token it accepts; a nonterminal a node of its symbol.
function schemaMatches<T>(schema: SymbolSchema<T>, candidate: ParseTree<T>): boolean {
  switch (schema.kind) {
    case 'terminal':
      return candidate.kind === 'leaf' && schema.accepts(candidate.token);
    case 'nonterminal':
      return candidate.kind === 'node' && schema.id.equals(candidate.symbol);
  }
}

/**
 * Builds a rule one right-hand-side entry at a time. Entries are matched in
 * the order they are added.
 */
export class RuleBuilder<T> {
  private readonly input: SymbolId;
  private readonly schema: SymbolSchema<T>[] = [];

  constructor(input: SymbolId) {
    this.input = input;
  }

  withTerminal(accepts: TokenPredicate<T>, label?: string): this {
    this.schema.push(label === undefined ? { kind: 'terminal', accepts } : { kind: 'terminal', accepts, label });
    return this;
  }

  withNonterminal(id: SymbolId): this {
    this.schema.push({ kind: 'nonterminal', id });
    return this;
  }

  build(): Rule<T> {
    return new Rule(this.input, this.schema);
  }
}
