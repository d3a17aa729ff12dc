import { getLine, getLocationFromOffset } from '../utils/highlight';
import type { Span } from '../utils/types';

// Core interfaces - completely language agnostic over the token type

export interface LexerSuccess<T> {
  kind: 'success';
  token: T;
  remainder: string;
}

export interface LexerIgnored {
  kind: 'ignored';
}

export interface LexerFailure {
  kind: 'failed';
  message: string;
  suggestion?: string;
}

/**
 * What a single recognizer reports for the current input position.
 *
 * - `success`: the recognizer produced a token and the input left after it.
 * - `ignored`: the recognizer does not claim this position.
 * - `failed`: the recognizer claims the position but the input is malformed.
 */
export type LexerOutcome<T> = LexerSuccess<T> | LexerIgnored | LexerFailure;

export interface TokenRecognizer<T> {
  name: string;
  /** Only ever called with non-empty input. */
  recognize(input: string): LexerOutcome<T>;
}

export function success<T>(token: T, remainder: string): LexerOutcome<T> {
  return { kind: 'success', token, remainder };
}

const IGNORED: LexerIgnored = { kind: 'ignored' };

export function ignored<T>(): LexerOutcome<T> {
  return IGNORED;
}

export function failed<T>(message: string, suggestion?: string): LexerOutcome<T> {
  return suggestion === undefined ? { kind: 'failed', message } : { kind: 'failed', message, suggestion };
}

export function isSuccess<T>(outcome: LexerOutcome<T>): outcome is LexerSuccess<T> {
  return outcome.kind === 'success';
}

export function isIgnored<T>(outcome: LexerOutcome<T>): outcome is LexerIgnored {
  return outcome.kind === 'ignored';
}

export function isFailure<T>(outcome: LexerOutcome<T>): outcome is LexerFailure {
  return outcome.kind === 'failed';
}

// Source location tracking
export interface SourceLocation {
  line: number;
  col: number;
  offset: number;
  endLine: number;
  endCol: number;
  endOffset: number;
  sourceFile?: string;
}

export class LexerError extends Error {
  public line: number;
  public col: number;
  public offset: number;
  public endOffset: number;
  public sourceFile?: string;
  public recognizer: string;
  public contextLine?: string;
  public suggestion?: string;

  constructor(message: string, loc: SourceLocation, recognizer: string, contextLine?: string, suggestion?: string) {
    super(message);
    this.name = 'LexerError';
    this.line = loc.line;
    this.col = loc.col;
    this.offset = loc.offset;
    this.endOffset = loc.endOffset;
    this.sourceFile = loc.sourceFile;
    this.recognizer = recognizer;
    this.contextLine = contextLine;
    this.suggestion = suggestion;
  }

  toString(): string {
    const location = this.sourceFile ? `${this.sourceFile}:${this.line}:${this.col}` : `${this.line}:${this.col}`;
    let output = `${this.name} at ${location}: ${this.message}`;

    if (this.contextLine !== undefined) {
      output += `\n\n  ${this.line} | ${this.contextLine}\n`;
      output += `    | ${' '.repeat(this.col - 1)}^`;
    }
    if (this.suggestion) {
      output += `\n\n  Suggestion: ${this.suggestion}`;
    }
    return output;
  }
}

// Performance Monitoring
export class LexerProfiler {
  private startTime: number = 0;
  private tokenCount: number = 0;
  private skippedCount: number = 0;
  private errorCount: number = 0;

  startProfiling(): void {
    this.startTime = performance.now();
    this.tokenCount = 0;
    this.skippedCount = 0;
    this.errorCount = 0;
  }

  recordToken(): void {
    this.tokenCount++;
  }

  recordSkip(): void {
    this.skippedCount++;
  }

  recordError(): void {
    this.errorCount++;
  }

  getReport(): ProfileReport {
    const duration = performance.now() - this.startTime;
    return {
      duration,
      tokenCount: this.tokenCount,
      skippedCount: this.skippedCount,
      tokensPerSecond: duration > 0 ? this.tokenCount / (duration / 1000) : 0,
      errorCount: this.errorCount,
    };
  }
}

export interface ProfileReport {
  duration: number;
  tokenCount: number;
  skippedCount: number;
  tokensPerSecond: number;
  errorCount: number;
}

// One item of the pipeline's token sequence
export type LexItem<T> =
  | { success: true; token: T; span: Span }
  | { success: false; error: LexerError };

export type CollectResult<T> =
  | { success: true; tokens: T[] }
  | { success: false; error: LexerError; tokens: T[] };

export interface PipelineOptions {
  sourceFile?: string;
  profiler?: LexerProfiler;
}

/**
 * An ordered chain of recognizers applied to a shrinking input.
 *
 * Recognizer order matters: the first recognizer that does not ignore the
 * current position decides the outcome, so a closed keyword set has to come
 * before anything that would read the same characters as a generic word.
 */
export class LexerPipeline<T> {
  private readonly recognizers: readonly TokenRecognizer<T>[];
  private readonly options: PipelineOptions;

  constructor(recognizers: readonly TokenRecognizer<T>[], options: PipelineOptions = {}) {
    this.recognizers = Object.freeze([...recognizers]);
    this.options = options;
  }

  get size(): number {
    return this.recognizers.length;
  }

  names(): string[] {
    return this.recognizers.map(r => r.name);
  }

  /**
   * Lazily lex `input`. The sequence ends when the input is exhausted or right
   * after the first failure item.
   */
  *tokenize(input: string): Generator<LexItem<T>, void, undefined> {
    const profiler = this.options.profiler;
    profiler?.startProfiling();

    let remaining = input;
    while (remaining.length > 0) {
      const offset = input.length - remaining.length;
      const decided = this.tryEach(remaining);

      if (decided === undefined) {
        // Nobody claimed this code unit: drop it and retry from the next one.
        profiler?.recordSkip();
        remaining = remaining.slice(1);
        continue;
      }

      const [recognizer, outcome] = decided;
      if (outcome.kind === 'failed') {
        profiler?.recordError();
        yield { success: false, error: this.errorAt(input, offset, recognizer.name, outcome.message, outcome.suggestion) };
        return;
      }
      if (outcome.kind === 'success') {
        if (outcome.remainder.length >= remaining.length) {
          profiler?.recordError();
          yield {
            success: false,
            error: this.errorAt(input, offset, recognizer.name, `Recognizer '${recognizer.name}' consumed no input`),
          };
          return;
        }
        remaining = outcome.remainder;
        profiler?.recordToken();
        yield { success: true, token: outcome.token, span: { start: offset, end: input.length - remaining.length } };
      }
    }
  }

  /**
   * Bare tokens; throws the LexerError when the pipeline fails.
   */
  *tokens(input: string): Generator<T, void, undefined> {
    for (const item of this.tokenize(input)) {
      if (!item.success) {
        throw item.error;
      }
      yield item.token;
    }
  }

  collect(input: string): CollectResult<T> {
    const tokens: T[] = [];
    for (const item of this.tokenize(input)) {
      if (!item.success) {
        return { success: false, error: item.error, tokens };
      }
      tokens.push(item.token);
    }
    return { success: true, tokens };
  }

  private tryEach(input: string): [TokenRecognizer<T>, LexerOutcome<T>] | undefined {
    for (const recognizer of this.recognizers) {
      const outcome = recognizer.recognize(input);
      if (outcome.kind !== 'ignored') {
        return [recognizer, outcome];
      }
    }
    return undefined;
  }

  private errorAt(input: string, offset: number, recognizer: string, message: string, suggestion?: string): LexerError {
    const start = getLocationFromOffset(input, offset);
    const loc: SourceLocation = {
      line: start.line,
      col: start.column,
      offset,
      endLine: start.line,
      endCol: start.column,
      endOffset: offset,
      sourceFile: this.options.sourceFile,
    };
    return new LexerError(message, loc, recognizer, getLine(input, start.line), suggestion);
  }
}

// Pipeline builder: append recognizers in priority order, then freeze
export class LexerPipelineBuilder<T> {
  private readonly recognizers: TokenRecognizer<T>[] = [];

  add(recognizer: TokenRecognizer<T>): this {
    this.recognizers.push(recognizer);
    return this;
  }

  addAll(recognizers: Iterable<TokenRecognizer<T>>): this {
    for (const recognizer of recognizers) {
      this.recognizers.push(recognizer);
    }
    return this;
  }

  build(options: PipelineOptions = {}): LexerPipeline<T> {
    return new LexerPipeline(this.recognizers, options);
  }
}
