import type { Location, Position, Span } from './types';
import chalk from 'chalk';

/**
 * Highlight the source input with a caret (^) and optional colorization
 */
export function highlightSnippet(input: string, location: Location, useColor = true): string {
  const lines = input.split('\n');
  const lineNum = location.start.line;
  const colNum = location.start.column;

  if (lineNum < 1 || lineNum > lines.length) return '';

  const targetLine = lines[lineNum - 1];

  const prefix = `${lineNum}: `;
  const width = Math.max(1, location.end.line === lineNum ? location.end.column - colNum : 1);
  const pointerLine = ' '.repeat(prefix.length + colNum - 1) + '^'.repeat(width);

  const lineStr = useColor
    ? prefix + chalk.redBright(targetLine)
    : prefix + targetLine;

  const pointerStr = useColor
    ? chalk.yellow(pointerLine)
    : pointerLine;

  const resultLines: string[] = [];

  if (lineNum > 1) resultLines.push(`${lineNum - 1}: ${lines[lineNum - 2]}`);
  resultLines.push(lineStr);
  resultLines.push(pointerStr);
  if (lineNum < lines.length) resultLines.push(`${lineNum + 1}: ${lines[lineNum]}`);

  return resultLines.join('\n');
}

/**
 * Get line and column information for a given offset
 */
export function getLocationFromOffset(input: string, offset: number): Position {
  const lines = input.substring(0, offset).split('\n');
  const line = lines.length;
  const column = lines[lines.length - 1].length + 1;

  return { line, column, offset };
}

export function locationFromSpan(input: string, span: Span): Location {
  return {
    start: getLocationFromOffset(input, span.start),
    end: getLocationFromOffset(input, span.end),
  };
}

/**
 * The full text of the 1-based line, without its terminator
 */
export function getLine(input: string, line: number): string | undefined {
  const lines = input.split('\n');
  if (line < 1 || line > lines.length) return undefined;
  return lines[line - 1].replace(/\r$/, '');
}
