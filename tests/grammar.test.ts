import { GrammarBuilder, IdGenerator, Rule, leaf, node, isLeaf, isNode } from '../src/grammar/index';

const isA = (token: string) => token === 'a';
const isB = (token: string) => token === 'b';

describe('Rule', () => {
  const ids = new IdGenerator();
  const s = ids.next();
  const t = ids.next();

  it('should keep schema entries in call order', () => {
    const rule = Rule.builder<string>(s).withTerminal(isA, 'a').withNonterminal(t).withTerminal(isB, 'b').build();

    expect(rule.length).toBe(3);
    expect(rule.schema.map(entry => entry.kind)).toEqual(['terminal', 'nonterminal', 'terminal']);
    expect(Object.isFrozen(rule.schema)).toBe(true);
  });

  it('should reject candidates of a different length', () => {
    const rule = Rule.builder<string>(s).withTerminal(isA).withTerminal(isA).build();
    expect(rule.matches([leaf('a')])).toBe(false);
    expect(rule.matches([leaf('a'), leaf('a'), leaf('a')])).toBe(false);
    expect(rule.matches([leaf('a'), leaf('a')])).toBe(true);
  });

  it('should match terminals only against leaves satisfying the predicate', () => {
    const rule = Rule.builder<string>(s).withTerminal(isA).build();
    expect(rule.matches([leaf('a')])).toBe(true);
    expect(rule.matches([leaf('b')])).toBe(false);
    expect(rule.matches([node(t, [leaf('a')])])).toBe(false);
  });

  it('should match nonterminals only against nodes with an equal identifier', () => {
    const rule = Rule.builder<string>(s).withNonterminal(t).build();
    expect(rule.matches([node(t)])).toBe(true);
    expect(rule.matches([node(s)])).toBe(false);
    expect(rule.matches([leaf('a')])).toBe(false);
  });

  it('should match the run from an offset to the top of a stack', () => {
    const rule = Rule.builder<string>(s).withTerminal(isB).withTerminal(isA).build();
    const stack = [leaf('a'), leaf('b'), leaf('a')];
    expect(rule.matchesAt(stack, 1)).toBe(true);
    expect(rule.matchesAt(stack, 0)).toBe(false);
    expect(rule.matchesAt(stack, 2)).toBe(false);
    expect(rule.matchesAt(stack, -1)).toBe(false);
  });

  it('should stop comparing at the first mismatch', () => {
    const seen: string[] = [];
    const spy = (token: string) => {
      seen.push(token);
      return true;
    };
    const rule = Rule.builder<string>(s).withTerminal(isA).withTerminal(spy).build();

    expect(rule.matches([leaf('b'), leaf('c')])).toBe(false);
    expect(seen).toEqual([]);
  });

  it('should describe itself with symbol names and labels', () => {
    const rule = Rule.builder<string>(s).withTerminal(isA, 'a').withNonterminal(t).withTerminal(isB).build();
    const names = (id: typeof s) => (id.equals(s) ? 'S' : undefined);
    expect(rule.describe(names)).toBe(`S -> a ${t.toString()} <token>`);
    expect(Rule.builder<string>(s).build().describe(names)).toBe('S -> ε');
  });
});

describe('GrammarBuilder', () => {
  it('should return undefined when no rule was added', () => {
    const builder = new GrammarBuilder<string>();
    builder.issueSymbol('S');
    expect(builder.build()).toBeUndefined();
  });

  it('should make the first rule the default and keep insertion order', () => {
    const builder = new GrammarBuilder<string>();
    const s = builder.issueSymbol('S');
    const t = builder.issueSymbol('T');
    const first = builder.rule(s).withTerminal(isA, 'a').build();
    builder.addRule(first);
    builder.addRule(builder.rule(t).withTerminal(isB, 'b'));
    builder.addRule(builder.rule(s).withNonterminal(t));

    const grammar = builder.build();
    expect(grammar).toBeDefined();
    if (!grammar) return;

    expect(grammar.defaultRule).toBe(first);
    expect(grammar.size).toBe(3);
    expect(grammar.describe()).toBe('S -> a\nT -> b\nS -> T');
    expect([...grammar.rules()].map(rule => rule.input.equals(s))).toEqual([true, false, true]);
  });

  it('should name only the symbols it issued', () => {
    const builder = new GrammarBuilder<string>();
    const s = builder.issueSymbol('S');
    const unnamed = builder.issueSymbol();
    builder.addRule(builder.rule(s).withTerminal(isA));
    const grammar = builder.build();

    expect(grammar?.symbolName(s)).toBe('S');
    expect(grammar?.symbolName(unnamed)).toBeUndefined();
    expect(grammar?.symbolName(new IdGenerator().next())).toBeUndefined();
  });
});

describe('parse tree constructors', () => {
  it('should tag leaves and nodes', () => {
    const id = new IdGenerator().next();
    const tree = node(id, [leaf('x')]);
    expect(isNode(tree)).toBe(true);
    expect(isLeaf(tree.children[0])).toBe(true);
    expect(node(id).children).toEqual([]);
  });
});
