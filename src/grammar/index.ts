import { IdGenerator, SymbolId } from './id';
import { Rule, RuleBuilder } from './rule';

export { IdGenerator, SymbolId } from './id';
export {
  Rule,
  RuleBuilder,
  type SymbolSchema,
  type TerminalSchema,
  type NonterminalSchema,
  type TokenPredicate,
} from './rule';
export { leaf, node, isLeaf, isNode, type ParseTree, type ParseLeaf, type ParseNode } from './tree';

// --- Grammar ---

/**
 * A finished rule set. Rules are tried in a fixed order: the default rule
 * (the first one added), then the others in insertion order. That order breaks
 * ties when several rules match the same run of the working stack.
 */
export class Grammar<T> {
  readonly defaultRule: Rule<T>;
  readonly additionalRules: readonly Rule<T>[];
  readonly ids: IdGenerator;
  private readonly names: ReadonlyMap<string, string>;

  constructor(ids: IdGenerator, defaultRule: Rule<T>, additionalRules: readonly Rule<T>[], names: ReadonlyMap<string, string>) {
    this.ids = ids;
    this.defaultRule = defaultRule;
    this.additionalRules = Object.freeze([...additionalRules]);
    this.names = names;
  }

  *rules(): IterableIterator<Rule<T>> {
    yield this.defaultRule;
    yield* this.additionalRules;
  }

  get size(): number {
    return this.additionalRules.length + 1;
  }

  symbolName(id: SymbolId): string | undefined {
    return this.names.get(id.key);
  }

  describe(): string {
    return [...this.rules()].map(rule => rule.describe(id => this.symbolName(id))).join('\n');
  }
}

// --- Builder ---

export class GrammarBuilder<T> {
  private readonly ids = new IdGenerator();
  private readonly names = new Map<string, string>();
  private defaultRule?: Rule<T>;
  private readonly rules: Rule<T>[] = [];

  /**
   * Issue a new nonterminal symbol. The optional name is only used when
   * printing rules and trees.
   */
  issueSymbol(name?: string): SymbolId {
    const id = this.ids.next();
    if (name !== undefined) {
      this.names.set(id.key, name);
    }
    return id;
  }

  rule(input: SymbolId): RuleBuilder<T> {
    return Rule.builder<T>(input);
  }

  // The first rule added becomes the grammar's default rule
  addRule(rule: Rule<T> | RuleBuilder<T>): this {
    const built = rule instanceof RuleBuilder ? rule.build() : rule;
    if (this.defaultRule === undefined) {
      this.defaultRule = built;
    } else {
      this.rules.push(built);
    }
    return this;
  }

  // Returns undefined when no rule was ever added
  build(): Grammar<T> | undefined {
    if (this.defaultRule === undefined) {
      return undefined;
    }
    return new Grammar(this.ids, this.defaultRule, this.rules, new Map(this.names));
  }
}
