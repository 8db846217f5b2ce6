import { ParseError, type SourcePosition } from '../errors';

/**
 * Input text plus a line table for offset → position lookups.
 *
 * Every stage (scanner, parser, emitter) addresses the same instance by
 * absolute offsets, so positions reported from nested expression slots are
 * already positions in the original input.
 */
export class SourceText {
  readonly text: string;
  readonly filename: string | undefined;
  private readonly lineStarts: number[];

  constructor(text: string, filename?: string) {
    this.text = text;
    this.filename = filename;
    this.lineStarts = [0];
    for (let i = 0; i < text.length; i++) {
      if (text.charCodeAt(i) === 10) this.lineStarts.push(i + 1);
    }
  }

  get length(): number {
    return this.text.length;
  }

  /** 1-based line, 0-based column. */
  positionAt(offset: number): SourcePosition {
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if ((this.lineStarts[mid] ?? 0) <= offset) low = mid;
      else high = mid - 1;
    }
    return { line: low + 1, column: offset - (this.lineStarts[low] ?? 0) };
  }

  lineAt(offset: number): number {
    return this.positionAt(offset).line;
  }

  charAt(offset: number): string {
    return this.text.charAt(offset);
  }

  startsWith(token: string, offset: number): boolean {
    return this.text.startsWith(token, offset);
  }

  slice(start: number, end: number): string {
    return this.text.slice(start, end);
  }

  /** Builds a {@link ParseError} located at `offset`. */
  error(reason: string, offset: number): ParseError {
    return new ParseError(reason, this.positionAt(offset), this.filename);
  }
}
