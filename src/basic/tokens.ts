export const KEYWORDS = [
  'PRINT',
  'IF',
  'THEN',
  'GOTO',
  'INPUT',
  'LET',
  'GOSUB',
  'RETURN',
  'CLEAR',
  'LIST',
  'RUN',
  'END',
] as const;

export type Keyword = typeof KEYWORDS[number];

export const SYMBOLS = ['<', '>', '=', '+', '-', '*', '/', ',', '(', ')'] as const;

export type BasicSymbol = typeof SYMBOLS[number];

export interface KeywordToken {
  kind: 'keyword';
  keyword: Keyword;
}

// Single letter A-Z, index 0-25
export interface VariableToken {
  kind: 'variable';
  index: number;
  name: string;
}

export interface NumberToken {
  kind: 'number';
  value: number;
}

export interface StringToken {
  kind: 'string';
  value: string;
}

export interface SymbolToken {
  kind: 'symbol';
  symbol: BasicSymbol;
}

export interface NewlineToken {
  kind: 'newline';
}

export type BasicToken =
  | KeywordToken
  | VariableToken
  | NumberToken
  | StringToken
  | SymbolToken
  | NewlineToken;

export function keyword(keyword: Keyword): KeywordToken {
  return { kind: 'keyword', keyword };
}

export function variable(name: string): VariableToken {
  const upper = name.toUpperCase();
  const index = upper.charCodeAt(0) - 'A'.charCodeAt(0);
  if (upper.length !== 1 || index < 0 || index > 25) {
    throw new RangeError(`Variable must be a single letter between A and Z, got '${name}'`);
  }
  return { kind: 'variable', index, name: upper };
}

export function number(value: number): NumberToken {
  return { kind: 'number', value };
}

export function string(value: string): StringToken {
  return { kind: 'string', value };
}

export function symbol(symbol: BasicSymbol): SymbolToken {
  return { kind: 'symbol', symbol };
}

export const NEWLINE: NewlineToken = Object.freeze({ kind: 'newline' });

export function describeToken(token: BasicToken): string {
  switch (token.kind) {
    case 'keyword':
      return token.keyword;
    case 'variable':
      return token.name;
    case 'number':
      return String(token.value);
    case 'string':
      return JSON.stringify(token.value);
    case 'symbol':
      return token.symbol;
    case 'newline':
      return 'NEWLINE';
  }
}
