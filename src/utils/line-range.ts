/**
 * Half-open interval of 1-based line numbers: `[start, end)`.
 *
 * Symbols, coverage gaps and patches all reason about line spans; keeping
 * them on one type keeps the inclusive/exclusive bookkeeping in one place.
 */
export class LineRange {
  readonly start: number;
  readonly end: number;

  constructor(start: number, end: number) {
    if (!Number.isInteger(start) || !Number.isInteger(end) || start < 1 || end < start) {
      throw new RangeError(`Invalid line range [${start}, ${end})`);
    }
    this.start = start;
    this.end = end;
  }

  /** Build from an inclusive `first..last` pair, as reported by parsers and coverage tools. */
  static fromInclusive(first: number, last: number): LineRange {
    return new LineRange(first, last + 1);
  }

  get length(): number {
    return this.end - this.start;
  }

  /** Last line inside the range (inclusive). */
  get lastLine(): number {
    return this.end - 1;
  }

  contains(line: number): boolean {
    return line >= this.start && line < this.end;
  }

  overlaps(other: LineRange): boolean {
    return this.start < other.end && other.start < this.end;
  }

  containsRange(other: LineRange): boolean {
    return this.start <= other.start && other.end <= this.end;
  }

  /** Lines of `lines` falling inside this range, ascending. */
  intersectLines(lines: Iterable<number>): number[] {
    const result: number[] = [];
    for (const line of lines) {
      if (this.contains(line)) result.push(line);
    }
    return result.sort((a, b) => a - b);
  }

  lines(): number[] {
    const result: number[] = [];
    for (let line = this.start; line < this.end; line++) {
      result.push(line);
    }
    return result;
  }

  toString(): string {
    return `${this.start}-${this.lastLine}`;
  }
}
