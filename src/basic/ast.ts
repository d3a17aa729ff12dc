export type RelOp = '<' | '<=' | '=' | '>' | '>=' | '<>';

export interface Variable {
  kind: 'variable';
  index: number;
  name: string;
}

export interface NumberLiteral {
  kind: 'number';
  value: number;
}

export interface StringLiteral {
  kind: 'string';
  value: string;
}

export type Expression = Variable | NumberLiteral;

// PRINT also takes string literals
export type PrintItem = Expression | StringLiteral;

export type Statement =
  | { kind: 'print'; items: PrintItem[] }
  | { kind: 'if'; left: Expression; relop: RelOp; right: Expression; then: Statement }
  | { kind: 'goto'; target: Expression }
  | { kind: 'input'; variables: Variable[] }
  | { kind: 'let'; variable: Variable; value: Expression }
  | { kind: 'gosub'; target: Expression }
  | { kind: 'return' }
  | { kind: 'clear' }
  | { kind: 'list' }
  | { kind: 'run' }
  | { kind: 'end' };

export interface Line {
  lineNumber: number | undefined;
  statement: Statement;
}

/**
 * Lines in source order plus an index of the numbered ones. A line number
 * that appears again replaces the earlier entry in the index; both lines stay
 * in `lines`.
 */
export class Program {
  private readonly entries: Line[] = [];
  private readonly numbered = new Map<number, Line>();

  addLine(line: Line): this {
    this.entries.push(line);
    if (line.lineNumber !== undefined) {
      this.numbered.set(line.lineNumber, line);
    }
    return this;
  }

  get lines(): readonly Line[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }

  lineAt(lineNumber: number): Line | undefined {
    return this.numbered.get(lineNumber);
  }

  // Ascending
  lineNumbers(): number[] {
    return [...this.numbered.keys()].sort((a, b) => a - b);
  }

  toJSON(): { lines: Line[] } {
    return { lines: [...this.entries] };
  }
}
