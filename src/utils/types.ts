export interface Position {
  line: number;
  column: number;
  offset: number;
}

export interface Location {
  start: Position;
  end: Position;
}

// Half-open range of UTF-16 offsets into the source text
export interface Span {
  start: number;
  end: number;
}
