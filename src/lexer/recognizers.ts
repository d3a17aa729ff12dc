import moo from 'moo';
import type { Rules, Token as MooToken } from 'moo';
import { failed, ignored, success, type TokenRecognizer } from './index';

const UNMATCHED = '__unmatched';

/**
 * A recognizer backed by a compiled moo rule set.
 *
 * Only the first moo token at the start of the input is used; `toToken` may
 * return `undefined` to decline it. Rule patterns follow moo's restrictions (no
 * capture groups, no `i`/`g`/`y` flags, `lineBreaks` when a match can span a
 * newline).
 */
export function patternRecognizer<T>(
  name: string,
  rules: Rules,
  toToken: (token: MooToken) => T | undefined
): TokenRecognizer<T> {
  if (Object.prototype.hasOwnProperty.call(rules, UNMATCHED)) {
    throw new Error(`Rule name '${UNMATCHED}' is reserved`);
  }
  const lexer = moo.compile({ ...rules, [UNMATCHED]: moo.error });

  return {
    name,
    recognize(input: string) {
      lexer.reset(input);
      const token = lexer.next();
      if (!token || token.type === UNMATCHED) {
        return ignored();
      }
      const produced = toToken(token);
      if (produced === undefined) {
        return ignored();
      }
      return success(produced, input.slice(token.text.length));
    },
  };
}

export interface KeywordRecognizerOptions<K extends string, T> {
  name?: string;
  keywords: readonly K[];
  caseSensitive?: boolean;
  // What counts as one word. The whole word has to be a keyword.
  wordPattern?: RegExp;
  toToken: (keyword: K, text: string) => T;
}

/**
 * Claims a whole word when it belongs to a closed keyword set.
 *
 * Must run before any recognizer that would read the same characters as a
 * generic identifier.
 */
export function keywordRecognizer<K extends string, T>(options: KeywordRecognizerOptions<K, T>): TokenRecognizer<T> {
  const caseSensitive = options.caseSensitive ?? false;
  const normalize = (text: string) => (caseSensitive ? text : text.toUpperCase());
  const lookup = new Map<string, K>();
  for (const keyword of options.keywords) {
    lookup.set(normalize(keyword), keyword);
  }

  return patternRecognizer<T>(
    options.name ?? 'keyword',
    {
      word: {
        match: options.wordPattern ?? /[A-Za-z]+/,
        type: (text: string) => (lookup.has(normalize(text)) ? 'keyword' : 'word'),
      },
    },
    (token) => {
      const keyword = token.type === 'keyword' ? lookup.get(normalize(token.text)) : undefined;
      return keyword === undefined ? undefined : options.toToken(keyword, token.text);
    }
  );
}

// Single character lookup, e.g. operator and punctuation tables
export function charRecognizer<T>(name: string, table: Readonly<Record<string, T>>): TokenRecognizer<T> {
  return {
    name,
    recognize(input: string) {
      const ch = input[0];
      if (!Object.prototype.hasOwnProperty.call(table, ch)) {
        return ignored();
      }
      return success(table[ch], input.slice(1));
    },
  };
}

export interface QuotedRecognizerOptions<T> {
  name?: string;
  quote?: string;
  // Allow line breaks between the quotes
  multiline?: boolean;
  toToken: (content: string) => T;
}

/**
 * Claims input starting with the quote and yields the text up to the next
 * quote. A literal that is never closed is a failure, not a fallthrough.
 */
export function quotedRecognizer<T>(options: QuotedRecognizerOptions<T>): TokenRecognizer<T> {
  const quote = options.quote ?? '"';
  const multiline = options.multiline ?? false;
  if (quote.length === 0) {
    throw new Error('Quote must not be empty');
  }

  return {
    name: options.name ?? 'string',
    recognize(input: string) {
      if (!input.startsWith(quote)) {
        return ignored();
      }
      const close = input.indexOf(quote, quote.length);
      const lineBreak = multiline ? -1 : input.indexOf('\n', quote.length);
      if (close === -1 || (lineBreak !== -1 && lineBreak < close)) {
        return failed(
          'Unterminated string literal',
          multiline ? `Add a closing ${quote} before the end of the input` : `Add a closing ${quote} before the end of the line`
        );
      }
      return success(options.toToken(input.slice(quote.length, close)), input.slice(close + quote.length));
    },
  };
}
