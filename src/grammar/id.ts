/**
 * Identifier of a grammar symbol.
 *
 * Only identifiers issued by the same {@link IdGenerator} can ever be equal;
 * the generator's scope is part of the value.
 */
export class SymbolId {
  constructor(
    readonly scope: number,
    readonly sequence: number
  ) {
    Object.freeze(this);
  }

  equals(other: SymbolId): boolean {
    return this.scope === other.scope && this.sequence === other.sequence;
  }

  // Stable string form, usable as a Map key
  get key(): string {
    return `${this.scope}:${this.sequence}`;
  }

  toString(): string {
    return `#${this.scope}.${this.sequence}`;
  }
}

export class IdGenerator {
  // Shared by every generator in the process; each construction takes the next value.
  private static scopes = 0;

  readonly scope: number;
  private sequence = 0;

  constructor() {
    this.scope = IdGenerator.scopes++;
  }

  next(): SymbolId {
    return new SymbolId(this.scope, this.sequence++);
  }

  // Number of identifiers issued so far
  get issued(): number {
    return this.sequence;
  }
}
