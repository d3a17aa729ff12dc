import { GrammarBuilder, type Grammar, type SymbolId, type TokenPredicate } from '../grammar/index';
import type { BasicSymbol, BasicToken, Keyword } from './tokens';

type Predicate = TokenPredicate<BasicToken>;

const SIMPLE_KEYWORDS: readonly Keyword[] = ['RETURN', 'CLEAR', 'LIST', 'RUN', 'END'];
const RELATIONAL_CHARS: readonly BasicSymbol[] = ['<', '>', '='];

export const isKeyword = (expected: Keyword): Predicate => token => token.kind === 'keyword' && token.keyword === expected;
export const isSymbol = (expected: BasicSymbol): Predicate => token => token.kind === 'symbol' && token.symbol === expected;
export const isNewline: Predicate = token => token.kind === 'newline';
export const isNumber: Predicate = token => token.kind === 'number';
export const isVariable: Predicate = token => token.kind === 'variable';
export const isExpression: Predicate = token => token.kind === 'variable' || token.kind === 'number';
export const isPrintable: Predicate = token => isExpression(token) || token.kind === 'string';
export const isSimpleKeyword: Predicate = token => token.kind === 'keyword' && SIMPLE_KEYWORDS.includes(token.keyword);
export const isRelationalChar: Predicate = token => token.kind === 'symbol' && RELATIONAL_CHARS.includes(token.symbol);

export interface BasicSymbols {
  line: SymbolId;
  statement: SymbolId;
  relop: SymbolId;
}

export interface BasicGrammar {
  grammar: Grammar<BasicToken>;
  symbols: BasicSymbols;
}

export interface RelOpGrammar {
  grammar: Grammar<BasicToken>;
  relop: SymbolId;
}

function finish(builder: GrammarBuilder<BasicToken>): Grammar<BasicToken> {
  const grammar = builder.build();
  if (grammar === undefined) {
    throw new Error('Grammar has no rules');
  }
  return grammar;
}

// Two-character operators only; a lone <, > or = stays a leaf so it cannot
// reduce before its second character arrives.
function addRelOpRules(builder: GrammarBuilder<BasicToken>, relop: SymbolId): void {
  const pairs: Array<[BasicSymbol, BasicSymbol]> = [['<', '='], ['>', '='], ['<', '>'], ['>', '<']];
  for (const [first, second] of pairs) {
    builder.addRule(
      builder.rule(relop)
        .withTerminal(isSymbol(first), `'${first}'`)
        .withTerminal(isSymbol(second), `'${second}'`)
    );
  }
}

export function createRelOpGrammar(): RelOpGrammar {
  const builder = new GrammarBuilder<BasicToken>();
  const relop = builder.issueSymbol('RELOP');
  addRelOpRules(builder, relop);
  return { grammar: finish(builder), relop };
}

/**
 * Tiny BASIC lines, one statement each:
 *
 * ```text
 * LINE      -> [number] STATEMENT NEWLINE
 *            | [number] IF expr (RELOP | < | > | =) expr THEN STATEMENT NEWLINE
 * STATEMENT -> RETURN | CLEAR | LIST | RUN | END
 *            | PRINT item | INPUT var | GOTO expr | GOSUB expr
 *            | LET var = expr
 *            | STATEMENT , item
 * ```
 *
 * `STATEMENT , item` grows PRINT and INPUT lists one element per reduction;
 * which statements may take a list is checked when the tree is converted.
 */
export function createBasicGrammar(): BasicGrammar {
  const builder = new GrammarBuilder<BasicToken>();
  const line = builder.issueSymbol('LINE');
  const statement = builder.issueSymbol('STATEMENT');
  const relop = builder.issueSymbol('RELOP');

  builder
    .addRule(builder.rule(line).withTerminal(isNumber, 'number').withNonterminal(statement).withTerminal(isNewline, 'NEWLINE'))
    .addRule(builder.rule(line).withNonterminal(statement).withTerminal(isNewline, 'NEWLINE'));

  for (const numbered of [true, false]) {
    for (const operator of ['node', 'char'] as const) {
      const rule = builder.rule(line);
      if (numbered) rule.withTerminal(isNumber, 'number');
      rule.withTerminal(isKeyword('IF'), 'IF').withTerminal(isExpression, 'expr');
      if (operator === 'node') {
        rule.withNonterminal(relop);
      } else {
        rule.withTerminal(isRelationalChar, 'relchar');
      }
      rule
        .withTerminal(isExpression, 'expr')
        .withTerminal(isKeyword('THEN'), 'THEN')
        .withNonterminal(statement)
        .withTerminal(isNewline, 'NEWLINE');
      builder.addRule(rule);
    }
  }

  builder
    .addRule(builder.rule(statement).withTerminal(isSimpleKeyword, 'RETURN|CLEAR|LIST|RUN|END'))
    .addRule(builder.rule(statement).withTerminal(isKeyword('PRINT'), 'PRINT').withTerminal(isPrintable, 'item'))
    .addRule(builder.rule(statement).withTerminal(isKeyword('INPUT'), 'INPUT').withTerminal(isVariable, 'var'))
    .addRule(builder.rule(statement).withTerminal(isKeyword('GOTO'), 'GOTO').withTerminal(isExpression, 'expr'))
    .addRule(builder.rule(statement).withTerminal(isKeyword('GOSUB'), 'GOSUB').withTerminal(isExpression, 'expr'))
    .addRule(
      builder.rule(statement)
        .withTerminal(isKeyword('LET'), 'LET')
        .withTerminal(isVariable, 'var')
        .withTerminal(isSymbol('='), "'='")
        .withTerminal(isExpression, 'expr')
    )
    .addRule(builder.rule(statement).withNonterminal(statement).withTerminal(isSymbol(','), "','").withTerminal(isPrintable, 'item'));

  addRelOpRules(builder, relop);

  return { grammar: finish(builder), symbols: { line, statement, relop } };
}
