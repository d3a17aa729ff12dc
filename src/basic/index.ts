import type { ParseTree } from '../grammar/index';
import type { LexerError, PipelineOptions } from '../lexer/index';
import { ShiftReduceParser, parseSource, type EngineTracer, type LeftoverPolicy } from '../parser/index';
import type { Program } from './ast';
import { BasicSyntaxError, programFromStack } from './convert';
import { createBasicGrammar, type BasicGrammar } from './grammar';
import { createBasicLexer } from './lexer';
import type { BasicToken } from './tokens';

export * from './ast';
export * from './tokens';
export * from './grammar';
export * from './convert';
export { createBasicLexer } from './lexer';

export interface BasicParseOptions extends PipelineOptions {
  // Add a final newline when the source lacks one (default true)
  appendNewline?: boolean;
  // Under 'strict' a blank line is an error too
  leftover?: LeftoverPolicy;
  tracer?: EngineTracer<BasicToken>;
  // Reuse a grammar, e.g. to name its symbols when printing trees
  grammar?: BasicGrammar;
}

export type BasicParseResult =
  | { success: true; program: Program; stack: ParseTree<BasicToken>[] }
  | { success: false; error: string; lexerError?: LexerError; lineNumber?: number; stack: ParseTree<BasicToken>[] };

export function parseBasic(source: string, options: BasicParseOptions = {}): BasicParseResult {
  const input = (options.appendNewline ?? true) && !source.endsWith('\n') ? `${source}\n` : source;
  const { grammar, symbols } = options.grammar ?? createBasicGrammar();
  const pipeline = createBasicLexer({ sourceFile: options.sourceFile, profiler: options.profiler });
  // Leftovers are checked line by line below, so the engine itself stays permissive.
  const parser = new ShiftReduceParser(grammar, { tracer: options.tracer });

  const result = parseSource(pipeline, parser, input);
  if (!result.success) {
    return { success: false, error: result.error, lexerError: result.lexerError, stack: result.stack };
  }

  const stack = result.tree === undefined ? [] : [...result.leftover, result.tree];
  try {
    const program = programFromStack(stack, symbols, options.leftover !== 'strict');
    return { success: true, program, stack };
  } catch (err) {
    if (err instanceof BasicSyntaxError) {
      return { success: false, error: err.message, lineNumber: err.lineNumber, stack };
    }
    throw err;
  }
}

export function parseBasicOrThrow(source: string, options: BasicParseOptions = {}): Program {
  const result = parseBasic(source, options);
  if (result.success) {
    return result.program;
  }
  if (result.lexerError) {
    throw result.lexerError;
  }
  const suffix = result.lineNumber !== undefined ? ` at line ${result.lineNumber}` : '';
  throw new BasicSyntaxError(`[BASIC Syntax Error] ${result.error}${suffix}`, result.lineNumber);
}
