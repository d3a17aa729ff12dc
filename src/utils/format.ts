import * as colors from 'colorette';
import type { LexerError } from '../lexer/index';
import type { ParseFailure } from '../parser/index';
import { highlightSnippet } from './highlight';
import type { Location } from './types';

export function formatLocation(location: Location): string {
  const { start, end } = location;
  return (start.line === end.line && start.column === end.column)
    ? `Line ${start.line}, Col ${start.column}`
    : `Line ${start.line}, Col ${start.column} → Line ${end.line}, Col ${end.column}`;
}

function lexerErrorLocation(error: LexerError): Location {
  return {
    start: { line: error.line, column: error.col, offset: error.offset },
    end: { line: error.line, column: error.col, offset: error.endOffset },
  };
}

/**
 * Render a lexer failure. The snippet is taken from `input` when given,
 * otherwise from the offending line kept on the error.
 */
export function formatLexerError(error: LexerError, input?: string, useColors: boolean = true): string {
  const location = lexerErrorLocation(error);
  const where = error.sourceFile ? `${error.sourceFile} ${formatLocation(location)}` : formatLocation(location);
  const parts: string[] = [
    useColors ? `${colors.red('❌ Lexer Error:')} ${error.message}` : `❌ Lexer Error: ${error.message}`,
    useColors ? `${colors.blue('↪ at')} ${where}` : `↪ at ${where}`,
    useColors ? `${colors.dim('Recognizer:')} ${error.recognizer}` : `Recognizer: ${error.recognizer}`,
  ];

  const snippet = input !== undefined
    ? highlightSnippet(input, location, useColors)
    : error.contextLine !== undefined
      ? highlightSnippet(error.contextLine, { start: { ...location.start, line: 1 }, end: { ...location.end, line: 1 } }, useColors)
      : '';
  if (snippet) {
    parts.push('\n' + (useColors ? colors.dim('--- Snippet ---') : '--- Snippet ---') + '\n' + snippet);
  }

  if (error.suggestion) {
    parts.push(useColors ? `${colors.cyan('💡 Suggestion:')} ${error.suggestion}` : `💡 Suggestion: ${error.suggestion}`);
  }

  return parts.join('\n');
}

export function formatParseFailure<T>(failure: ParseFailure<T>, input?: string, useColors: boolean = true): string {
  if (failure.lexerError) {
    return formatLexerError(failure.lexerError, input, useColors);
  }
  const header = useColors ? `${colors.red('❌ Parse Error:')} ${failure.error}` : `❌ Parse Error: ${failure.error}`;
  const count = `${failure.stack.length} element${failure.stack.length === 1 ? '' : 's'} on the stack`;
  return [header, useColors ? colors.dim(count) : count].join('\n');
}

export function formatSuccessMessage(message: string, useColors: boolean = true): string {
  return useColors ? colors.green(`✅ ${message}`) : `✅ ${message}`;
}

export function formatWarningMessage(message: string, useColors: boolean = true): string {
  return useColors ? colors.yellow(`⚠️  ${message}`) : `⚠️  ${message}`;
}

export function formatInfoMessage(message: string, useColors: boolean = true): string {
  return useColors ? colors.blue(`ℹ️  ${message}`) : `ℹ️  ${message}`;
}

// Plain `file:line:col` reference, e.g. for editors
export function formatErrorPosition(error: LexerError): string {
  const position = `${error.line}:${error.col}`;
  return error.sourceFile ? `${error.sourceFile}:${position}` : position;
}
