import {
  LexerPipelineBuilder,
  failed,
  success,
  type LexerPipeline,
  type PipelineOptions,
  type TokenRecognizer,
} from '../lexer/index';
import { charRecognizer, keywordRecognizer, patternRecognizer, quotedRecognizer } from '../lexer/recognizers';
import { KEYWORDS, NEWLINE, SYMBOLS, keyword, string, symbol, variable, type BasicSymbol, type BasicToken, type SymbolToken } from './tokens';

export function stringRecognizer(): TokenRecognizer<BasicToken> {
  return quotedRecognizer<BasicToken>({ name: 'string', toToken: string });
}

export function basicKeywordRecognizer(): TokenRecognizer<BasicToken> {
  return keywordRecognizer<typeof KEYWORDS[number], BasicToken>({ name: 'keyword', keywords: KEYWORDS, toToken: keyword });
}

/**
 * Decimal digits. A literal too large to be held exactly is rejected rather
 * than rounded.
 */
export function numberRecognizer(): TokenRecognizer<BasicToken> {
  const digits = patternRecognizer<string>('number', { digits: /[0-9]+/ }, token => token.text);
  return {
    name: 'number',
    recognize(input: string) {
      const outcome = digits.recognize(input);
      if (outcome.kind !== 'success') {
        return outcome;
      }
      const value = Number(outcome.token);
      if (!Number.isSafeInteger(value)) {
        return failed<BasicToken>(
          `Number ${outcome.token} is out of range`,
          `Use a value no larger than ${Number.MAX_SAFE_INTEGER}`
        );
      }
      return success<BasicToken>({ kind: 'number', value }, outcome.remainder);
    },
  };
}

export function variableRecognizer(): TokenRecognizer<BasicToken> {
  return patternRecognizer<BasicToken>('variable', { letter: /[A-Za-z]/ }, token => variable(token.text));
}

export function symbolRecognizer(): TokenRecognizer<BasicToken> {
  const table: Record<string, SymbolToken> = {};
  SYMBOLS.forEach((s: BasicSymbol) => {
    table[s] = symbol(s);
  });
  return charRecognizer<BasicToken>('symbol', table);
}

export function newlineRecognizer(): TokenRecognizer<BasicToken> {
  return patternRecognizer<BasicToken>('newline', { newline: { match: /\r?\n/, lineBreaks: true } }, () => NEWLINE);
}

/**
 * The Tiny BASIC pipeline. Strings go first so their content is never read as
 * keywords, and keywords before variables so `PRINT` is not five variables.
 * Spaces are claimed by nobody and skipped.
 */
export function createBasicLexer(options: PipelineOptions = {}): LexerPipeline<BasicToken> {
  return new LexerPipelineBuilder<BasicToken>()
    .add(stringRecognizer())
    .add(basicKeywordRecognizer())
    .add(numberRecognizer())
    .add(variableRecognizer())
    .add(symbolRecognizer())
    .add(newlineRecognizer())
    .build(options);
}
