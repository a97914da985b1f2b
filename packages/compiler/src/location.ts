// ---------------------------------------------------------------------------
// location.ts — Source positions
// ---------------------------------------------------------------------------

/** 1-based line and column plus the 0-based offset into the unit source. */
export interface SourceLocation {
  line: number;
  column: number;
  offset: number;
}

export const START: SourceLocation = { line: 1, column: 1, offset: 0 };

/**
 * Translate an offset into `text` to a location.  When `text` is a slice of
 * the unit source, `base` is the location of the slice's first character.
 */
export function positionAt(text: string, offset: number, base: SourceLocation = START): SourceLocation {
  let line = base.line;
  let column = base.column;
  const end = Math.min(offset, text.length);
  for (let i = 0; i < end; i++) {
    if (text[i] === '\n') {
      line++;
      column = 1;
    } else {
      column++;
    }
  }
  return { line, column, offset: base.offset + end };
}

export type Locator = (offset: number) => SourceLocation;

/** Like `positionAt`, with the line starts indexed once for repeated lookups. */
export function createLocator(text: string, base: SourceLocation = START): Locator {
  const lineStarts = [0];
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '\n') lineStarts.push(i + 1);
  }

  return (offset) => {
    const clamped = Math.max(0, Math.min(offset, text.length));
    let lo = 0;
    let hi = lineStarts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (lineStarts[mid] <= clamped) lo = mid;
      else hi = mid - 1;
    }
    const column = clamped - lineStarts[lo];
    return {
      line: base.line + lo,
      column: lo === 0 ? base.column + column : column + 1,
      offset: base.offset + clamped,
    };
  };
}

export function formatLocation(unitId: string, location?: SourceLocation): string {
  return location ? `${unitId}:${location.line}:${location.column}` : unitId;
}
