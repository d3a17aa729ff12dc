import {
  BasicSyntaxError,
  createBasicGrammar,
  createRelOpGrammar,
  parseBasic,
  parseBasicOrThrow,
  relOpFromParseTree,
  symbol,
  type Statement,
} from '../src/basic/index';
import { leaf } from '../src/grammar/index';
import { ShiftReduceParser } from '../src/parser/index';

const helloWorld = '10 CLEAR\n20 PRINT "What is your name?"\n30 INPUT A\n40 PRINT "Hello, ", A';

function statements(source: string): Statement[] {
  return parseBasicOrThrow(source).lines.map(line => line.statement);
}

describe('parseBasic', () => {
  it('should parse the hello world program', () => {
    const program = parseBasicOrThrow(helloWorld);

    expect(program.size).toBe(4);
    expect(program.lineNumbers()).toEqual([10, 20, 30, 40]);
    expect(program.lines).toEqual([
      { lineNumber: 10, statement: { kind: 'clear' } },
      { lineNumber: 20, statement: { kind: 'print', items: [{ kind: 'string', value: 'What is your name?' }] } },
      { lineNumber: 30, statement: { kind: 'input', variables: [{ kind: 'variable', index: 0, name: 'A' }] } },
      {
        lineNumber: 40,
        statement: {
          kind: 'print',
          items: [
            { kind: 'string', value: 'Hello, ' },
            { kind: 'variable', index: 0, name: 'A' },
          ],
        },
      },
    ]);
  });

  it('should parse every simple statement', () => {
    expect(statements('RETURN\nCLEAR\nLIST\nRUN\nEND\n').map(s => s.kind)).toEqual(['return', 'clear', 'list', 'run', 'end']);
  });

  it('should parse LET, GOTO and GOSUB', () => {
    expect(statements('LET B = 5\nGOTO 100\nGOSUB C')).toEqual([
      { kind: 'let', variable: { kind: 'variable', index: 1, name: 'B' }, value: { kind: 'number', value: 5 } },
      { kind: 'goto', target: { kind: 'number', value: 100 } },
      { kind: 'gosub', target: { kind: 'variable', index: 2, name: 'C' } },
    ]);
  });

  it('should parse INPUT with several variables', () => {
    expect(statements('INPUT A, B, C')).toEqual([
      {
        kind: 'input',
        variables: [
          { kind: 'variable', index: 0, name: 'A' },
          { kind: 'variable', index: 1, name: 'B' },
          { kind: 'variable', index: 2, name: 'C' },
        ],
      },
    ]);
  });

  it('should parse IF with single and double character operators', () => {
    const program = parseBasicOrThrow('50 IF A < 10 THEN GOTO 20\nIF A <= B THEN END\nIF X <> 0 THEN PRINT "ne"\n');

    expect(program.lineAt(50)).toEqual({
      lineNumber: 50,
      statement: {
        kind: 'if',
        left: { kind: 'variable', index: 0, name: 'A' },
        relop: '<',
        right: { kind: 'number', value: 10 },
        then: { kind: 'goto', target: { kind: 'number', value: 20 } },
      },
    });
    const [, second, third] = program.lines;
    expect(second.statement.kind === 'if' && second.statement.relop).toBe('<=');
    expect(second.lineNumber).toBeUndefined();
    expect(third.statement).toEqual({
      kind: 'if',
      left: { kind: 'variable', index: 23, name: 'X' },
      relop: '<>',
      right: { kind: 'number', value: 0 },
      then: { kind: 'print', items: [{ kind: 'string', value: 'ne' }] },
    });
  });

  it('should parse IF with = and a LET branch', () => {
    expect(statements('IF A = 1 THEN LET B = A')).toEqual([
      {
        kind: 'if',
        left: { kind: 'variable', index: 0, name: 'A' },
        relop: '=',
        right: { kind: 'number', value: 1 },
        then: { kind: 'let', variable: { kind: 'variable', index: 1, name: 'B' }, value: { kind: 'variable', index: 0, name: 'A' } },
      },
    ]);
  });

  it('should let a repeated line number replace the indexed line', () => {
    const program = parseBasicOrThrow('10 PRINT A\n10 END\n');
    expect(program.size).toBe(2);
    expect(program.lineAt(10)?.statement).toEqual({ kind: 'end' });
  });

  it('should skip blank lines unless strict', () => {
    const source = '10 CLEAR\n\n20 END\n';
    const permissive = parseBasic(source);
    expect(permissive.success && permissive.program.size).toBe(2);

    const strict = parseBasic(source, { leftover: 'strict' });
    expect(strict.success).toBe(false);
    if (strict.success) return;
    expect(strict.error).toBe('Unexpected NEWLINE after line 10 (stack element 2 of 3)');
  });

  it('should report input that did not reduce to a line', () => {
    const result = parseBasic('10 CLEAR\n20 PRINT\n');
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBe('Unexpected 20 after line 10 (stack element 2 of 4)');
    expect(result.stack).toHaveLength(4);
  });

  it('should only allow lists after PRINT and INPUT', () => {
    const result = parseBasic('10 GOTO 20, 30\n');
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBe('GOTO does not take a list');
    expect(result.lineNumber).toBe(10);
  });

  it('should reject strings in an INPUT list', () => {
    const result = parseBasic('INPUT A, "x"\n');
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBe('Expected a variable, found "x"');
  });

  it('should surface lexer errors', () => {
    const result = parseBasic('10 PRINT "oops\n');
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBe('Unterminated string literal');
    expect(result.lexerError?.line).toBe(1);
  });

  it('should leave the last line unreduced without an appended newline', () => {
    const result = parseBasic('10 END', { appendNewline: false });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.stack).toHaveLength(2);
  });

  it('should throw a syntax error naming the line', () => {
    expect(() => parseBasicOrThrow('10 GOTO 20, 30')).toThrow(
      new BasicSyntaxError('[BASIC Syntax Error] GOTO does not take a list at line 10', 10)
    );
  });

  it('should report engine events to a tracer', () => {
    let shifts = 0;
    parseBasic('END', { tracer: { trace: event => { if (event.type === 'shift') shifts++; } } });
    expect(shifts).toBe(2);
  });

  it('should parse long programs in linear time', () => {
    const source = Array.from({ length: 3000 }, (_, i) => `${(i + 1) * 10} PRINT A`).join('\n');

    const started = Date.now();
    const program = parseBasicOrThrow(source);
    expect(Date.now() - started).toBeLessThan(3000);
    expect(program.size).toBe(3000);
    expect(program.lineAt(30000)?.statement).toEqual({ kind: 'print', items: [{ kind: 'variable', index: 0, name: 'A' }] });
  });

  it('should reuse a supplied grammar', () => {
    const basic = createBasicGrammar();
    const result = parseBasic('RUN', { grammar: basic });
    expect(result.success).toBe(true);
    if (!result.success) return;
    const root = result.stack[0];
    expect(root.kind === 'node' && basic.grammar.symbolName(root.symbol)).toBe('LINE');
  });
});

describe('relational operators', () => {
  it('should reduce two character operators', () => {
    const { grammar, relop } = createRelOpGrammar();
    const parser = new ShiftReduceParser(grammar);
    const toSymbol = (ch: string) => (ch === '<' ? symbol('<') : ch === '>' ? symbol('>') : symbol('='));
    const cases: Array<[string, string]> = [['<=', '<='], ['>=', '>='], ['<>', '<>'], ['><', '<>']];

    for (const [text, expected] of cases) {
      const stack = parser.parseAll([...text].map(toSymbol));
      expect(stack).toHaveLength(1);
      expect(relOpFromParseTree(stack[0], relop)).toBe(expected);
    }
  });

  it('should accept a single symbol leaf', () => {
    const { relop } = createRelOpGrammar();
    expect(relOpFromParseTree(leaf(symbol('=')), relop)).toBe('=');
    expect(relOpFromParseTree(leaf(symbol('>')), relop)).toBe('>');
  });

  it('should reject other symbols', () => {
    const { relop } = createRelOpGrammar();
    expect(() => relOpFromParseTree(leaf(symbol('+')), relop)).toThrow("'+' is not one of <, <=, =, >, >=, <>");
  });
});
