// src/core/reader/span.ts
// Source spans: half-open UTF-16 offset ranges into the text that was parsed

export interface Span {
  /** Source name, when the text came from a registered file */
  source?: string;
  start: number;
  end: number;
}

export function spanContains(s: Span, offset: number): boolean {
  return s.start <= offset && offset < s.end;
}

export function spansOverlap(a: Span, b: Span): boolean {
  return a.start < b.end && b.start < a.end;
}
