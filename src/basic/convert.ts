import type { ParseNode, ParseTree, SymbolId } from '../grammar/index';
import { Program, type Expression, type Line, type PrintItem, type RelOp, type Statement, type Variable } from './ast';
import type { BasicSymbols } from './grammar';
import { describeToken, type BasicToken } from './tokens';

export class BasicSyntaxError extends Error {
  lineNumber?: number;

  constructor(message: string, lineNumber?: number) {
    super(message);
    this.name = 'BasicSyntaxError';
    this.lineNumber = lineNumber;
  }
}

type Tree = ParseTree<BasicToken>;

function describe(tree: Tree): string {
  return tree.kind === 'leaf' ? describeToken(tree.token) : 'a reduced phrase';
}

function expectNode(tree: Tree | undefined, symbol: SymbolId, what: string): ParseNode<BasicToken> {
  if (tree === undefined || tree.kind !== 'node' || !tree.symbol.equals(symbol)) {
    throw new BasicSyntaxError(`Expected ${what}, found ${tree === undefined ? 'nothing' : describe(tree)}`);
  }
  return tree;
}

function expectToken(tree: Tree | undefined, what: string): BasicToken {
  if (tree === undefined || tree.kind !== 'leaf') {
    throw new BasicSyntaxError(`Expected ${what}, found ${tree === undefined ? 'nothing' : describe(tree)}`);
  }
  return tree.token;
}

function toVariable(tree: Tree | undefined): Variable {
  const token = expectToken(tree, 'a variable');
  if (token.kind !== 'variable') {
    throw new BasicSyntaxError(`Expected a variable, found ${describeToken(token)}`);
  }
  return { kind: 'variable', index: token.index, name: token.name };
}

function toExpression(tree: Tree | undefined): Expression {
  const token = expectToken(tree, 'an expression');
  switch (token.kind) {
    case 'variable':
      return { kind: 'variable', index: token.index, name: token.name };
    case 'number':
      return { kind: 'number', value: token.value };
    default:
      throw new BasicSyntaxError(`Expected a variable or number, found ${describeToken(token)}`);
  }
}

function toPrintItem(tree: Tree | undefined): PrintItem {
  const token = expectToken(tree, 'a print item');
  if (token.kind === 'string') {
    return { kind: 'string', value: token.value };
  }
  return toExpression(tree);
}

const RELOPS: Record<string, RelOp> = {
  '<': '<',
  '>': '>',
  '=': '=',
  '<=': '<=',
  '>=': '>=',
  '<>': '<>',
  '><': '<>',
};

/**
 * A relational operator is either a RELOP node over two symbol leaves or a
 * single `<`, `>` or `=` leaf.
 */
export function relOpFromParseTree(tree: Tree, relop: SymbolId): RelOp {
  const leaves = tree.kind === 'leaf' ? [tree] : expectNode(tree, relop, 'a relational operator').children;
  let text = '';
  for (const child of leaves) {
    const token = expectToken(child, 'a relational symbol');
    if (token.kind !== 'symbol') {
      throw new BasicSyntaxError(`Expected a relational symbol, found ${describeToken(token)}`);
    }
    text += token.symbol;
  }
  const op = Object.prototype.hasOwnProperty.call(RELOPS, text) ? RELOPS[text] : undefined;
  if (op === undefined) {
    throw new BasicSyntaxError(`'${text}' is not one of <, <=, =, >, >=, <>`);
  }
  return op;
}

export function statementFromParseTree(tree: Tree, symbols: BasicSymbols): Statement {
  const [head, ...rest] = expectNode(tree, symbols.statement, 'a statement').children;

  // STATEMENT , item
  if (head !== undefined && head.kind === 'node') {
    const list = statementFromParseTree(head, symbols);
    const item = rest[1];
    switch (list.kind) {
      case 'print':
        return { kind: 'print', items: [...list.items, toPrintItem(item)] };
      case 'input':
        return { kind: 'input', variables: [...list.variables, toVariable(item)] };
      default:
        throw new BasicSyntaxError(`${list.kind.toUpperCase()} does not take a list`);
    }
  }

  const token = expectToken(head, 'a keyword');
  if (token.kind !== 'keyword') {
    throw new BasicSyntaxError(`Expected a keyword, found ${describeToken(token)}`);
  }
  switch (token.keyword) {
    case 'PRINT':
      return { kind: 'print', items: [toPrintItem(rest[0])] };
    case 'INPUT':
      return { kind: 'input', variables: [toVariable(rest[0])] };
    case 'GOTO':
      return { kind: 'goto', target: toExpression(rest[0]) };
    case 'GOSUB':
      return { kind: 'gosub', target: toExpression(rest[0]) };
    case 'LET':
      // rest[1] is the '='
      return { kind: 'let', variable: toVariable(rest[0]), value: toExpression(rest[2]) };
    case 'RETURN':
      return { kind: 'return' };
    case 'CLEAR':
      return { kind: 'clear' };
    case 'LIST':
      return { kind: 'list' };
    case 'RUN':
      return { kind: 'run' };
    case 'END':
      return { kind: 'end' };
    default:
      throw new BasicSyntaxError(`${token.keyword} cannot start a statement`);
  }
}

export function lineFromParseTree(tree: Tree, symbols: BasicSymbols): Line {
  const children = [...expectNode(tree, symbols.line, 'a line').children];

  let lineNumber: number | undefined;
  const first = children[0];
  if (first !== undefined && first.kind === 'leaf' && first.token.kind === 'number') {
    lineNumber = first.token.value;
    children.shift();
  }

  try {
    // IF expr relop expr THEN STATEMENT NEWLINE
    if (children.length === 7) {
      return {
        lineNumber,
        statement: {
          kind: 'if',
          left: toExpression(children[1]),
          relop: relOpFromParseTree(children[2], symbols.relop),
          right: toExpression(children[3]),
          then: statementFromParseTree(children[5], symbols),
        },
      };
    }
    return { lineNumber, statement: statementFromParseTree(children[0], symbols) };
  } catch (err) {
    if (err instanceof BasicSyntaxError && err.lineNumber === undefined) {
      err.lineNumber = lineNumber;
    }
    throw err;
  }
}

/**
 * Build a program from the engine's final stack. Bare newlines are blank
 * lines unless `allowBlankLines` is off; anything else that did not reduce to
 * a LINE is an error.
 */
export function programFromStack(stack: readonly Tree[], symbols: BasicSymbols, allowBlankLines: boolean = true): Program {
  const program = new Program();
  for (const [index, element] of stack.entries()) {
    if (allowBlankLines && element.kind === 'leaf' && element.token.kind === 'newline') {
      continue;
    }
    if (element.kind === 'node' && element.symbol.equals(symbols.line)) {
      program.addLine(lineFromParseTree(element, symbols));
      continue;
    }
    const lastLine = program.lines.length > 0 ? program.lines[program.lines.length - 1].lineNumber : undefined;
    const after = lastLine !== undefined ? ` after line ${lastLine}` : '';
    throw new BasicSyntaxError(`Unexpected ${describe(element)}${after} (stack element ${index + 1} of ${stack.length})`);
  }
  return program;
}
