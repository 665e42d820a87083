// Base interface for line-oriented lexers
// Conceptually a one-pass scanner through a string

// Substring indices into the raw input; user slices .substring(start, end)
export interface Span {
  start: number,
  end: number,
}

// Parametrized by tag type
export interface Token<T> extends Span {
  tag: T,
}

export type LexStream<T> = Iterable<Token<T>>
