/**
 * Position of a tag inside the template text it was scanned from.
 * `line` and `column` are 1-based, `offset` is a 0-based string index.
 */
export interface SourceLocation {
  offset: number;
  line: number;
  column: number;
  /** Set when the template came from a file (e.g. a partial) */
  filePath?: string;
}

/**
 * Maps string offsets to line/column positions for one piece of text.
 */
export class LineIndex {
  private readonly lineStarts: number[] = [0];

  constructor(text: string, private readonly filePath?: string) {
    for (let i = 0; i < text.length; i++) {
      if (text.charCodeAt(i) === 10) {
        this.lineStarts.push(i + 1);
      }
    }
  }

  locate(offset: number): SourceLocation {
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (this.lineStarts[mid] <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }

    const location: SourceLocation = {
      offset,
      line: low + 1,
      column: offset - this.lineStarts[low] + 1
    };
    if (this.filePath) {
      location.filePath = this.filePath;
    }
    return location;
  }
}
