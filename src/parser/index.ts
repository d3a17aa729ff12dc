import { leaf, node, type Grammar, type ParseTree, type Rule, type SymbolId } from '../grammar/index';
import type { LexerError, LexerPipeline } from '../lexer/index';

// What to do with nodes left beneath the top of the stack once input runs out
export type LeftoverPolicy = 'permissive' | 'strict';

export type EngineEvent<T> =
  | { type: 'shift'; token: T; depth: number }
  | { type: 'reduce'; rule: Rule<T>; symbol: SymbolId; width: number; depth: number };

export interface EngineTracer<T> {
  trace(event: EngineEvent<T>): void;
}

export interface EngineOptions<T> {
  leftover?: LeftoverPolicy;
  tracer?: EngineTracer<T>;
}

export interface ParseSuccess<T> {
  success: true;
  // Undefined only for empty input under the permissive policy
  tree: ParseTree<T> | undefined;
  // Unreduced nodes below `tree`, bottom first
  leftover: ParseTree<T>[];
}

export interface ParseFailure<T> {
  success: false;
  error: string;
  stack: ParseTree<T>[];
  lexerError?: LexerError;
}

export type ParseResult<T> = ParseSuccess<T> | ParseFailure<T>;

/**
 * Greedy shift-reduce engine.
 *
 * Every token is shifted as a leaf, then at most one reduction is attempted:
 * suffixes of the working stack are tried from the longest (the whole stack)
 * down to the top element alone, and for each suffix the grammar's rules in
 * order. The first match replaces the suffix with a node. There is no
 * lookahead and no backtracking.
 */
export class ShiftReduceParser<T> {
  readonly grammar: Grammar<T>;
  readonly leftover: LeftoverPolicy;
  private readonly tracer?: EngineTracer<T>;
  private readonly rules: readonly Rule<T>[];
  // No suffix longer than the widest rule can match
  private readonly widest: number;

  constructor(grammar: Grammar<T>, options: EngineOptions<T> = {}) {
    this.grammar = grammar;
    this.leftover = options.leftover ?? 'permissive';
    this.tracer = options.tracer;
    this.rules = [...grammar.rules()];
    this.widest = this.rules.reduce((max, rule) => Math.max(max, rule.length), 0);
  }

  /**
   * Returns the node on top of the stack after the last token, or undefined
   * for empty input. Anything beneath the top is dropped; use `parseAll` or
   * `parseResult` to see it.
   */
  parse(tokens: Iterable<T>): ParseTree<T> | undefined {
    const stack = this.parseAll(tokens);
    return stack.length > 0 ? stack[stack.length - 1] : undefined;
  }

  // The final working stack, bottom first
  parseAll(tokens: Iterable<T>): ParseTree<T>[] {
    const stack: ParseTree<T>[] = [];
    for (const token of tokens) {
      stack.push(leaf(token));
      this.tracer?.trace({ type: 'shift', token, depth: stack.length });
      this.reduce(stack);
    }
    return stack;
  }

  parseResult(tokens: Iterable<T>): ParseResult<T> {
    return this.settle(this.parseAll(tokens));
  }

  // Apply the leftover policy to a finished stack
  settle(stack: ParseTree<T>[]): ParseResult<T> {
    if (this.leftover === 'strict') {
      if (stack.length === 0) {
        return { success: false, error: 'Empty input: nothing to reduce', stack };
      }
      if (stack.length > 1) {
        return {
          success: false,
          error: `Input did not reduce to a single root: ${stack.length} nodes left on the stack`,
          stack,
        };
      }
      return { success: true, tree: stack[0], leftover: [] };
    }
    return {
      success: true,
      tree: stack.length > 0 ? stack[stack.length - 1] : undefined,
      leftover: stack.slice(0, -1),
    };
  }

  private reduce(stack: ParseTree<T>[]): void {
    for (let drop = Math.max(0, stack.length - this.widest); drop < stack.length; drop++) {
      const width = stack.length - drop;
      for (const rule of this.rules) {
        if (rule.length !== width || !rule.matchesAt(stack, drop)) continue;

        // splice keeps the popped run in stack order, which is the rule's order
        const children = stack.splice(drop);
        stack.push(node(rule.input, children));
        this.tracer?.trace({
          type: 'reduce',
          rule,
          symbol: rule.input,
          width: children.length,
          depth: stack.length,
        });
        return;
      }
    }
  }
}

/**
 * Feed the pipeline's tokens into the engine as they are produced. Lexing
 * stops at the first failure and so does parsing.
 */
export function parseSource<T>(pipeline: LexerPipeline<T>, parser: ShiftReduceParser<T>, input: string): ParseResult<T> {
  const failure: { error?: LexerError } = {};
  const tokens = function* (): Generator<T, void, undefined> {
    for (const item of pipeline.tokenize(input)) {
      if (!item.success) {
        failure.error = item.error;
        return;
      }
      yield item.token;
    }
  };

  const stack = parser.parseAll(tokens());
  if (failure.error !== undefined) {
    return { success: false, error: failure.error.message, lexerError: failure.error, stack };
  }
  return parser.settle(stack);
}
