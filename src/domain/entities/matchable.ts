/** Character offsets `[start, end)` into the parsed text. */
export type TextSpan = readonly [start: number, end: number];

/**
 * Anything produced from a span of the input text.
 */
export abstract class Matchable {
  matchedTextPos?: TextSpan;

  withSpan(span: TextSpan): this {
    this.matchedTextPos = span;
    return this;
  }
}
