// ---------------------------------------------------------------------------
// style-lexer.ts — Tokenizer for the <style> section
// ---------------------------------------------------------------------------
// Splits CSS into block structure tokens.  A run of text is classified by
// what terminates it:
//
//   `{`  -> prelude (a selector list or an at-rule header) + block-open
//   `;`  -> declaration inside a block, statement at the top level
//   `}`  -> declaration (when non-blank) + block-close
//
// Strings, parentheses and brackets are skipped over so that `;` or `{` inside
// `url(...)`, `[attr="{"]` or `content: "}"` does not split a token.
// ---------------------------------------------------------------------------

import { InvalidSelectorError } from './errors';
import { createLocator, START, type SourceLocation } from './location';

export type StyleToken =
  | { type: 'prelude'; text: string; location: SourceLocation }
  | { type: 'block-open'; location: SourceLocation }
  | { type: 'block-close'; location: SourceLocation }
  | { type: 'declaration'; text: string; location: SourceLocation }
  | { type: 'statement'; text: string; location: SourceLocation }
  | { type: 'comment'; text: string; location: SourceLocation };

export function tokenizeStyle(
  source: string,
  unitId: string,
  base: SourceLocation = START,
): StyleToken[] {
  const locate = createLocator(source, base);
  const tokens: StyleToken[] = [];
  let depth = 0;
  let pos = 0;

  const error = (message: string, offset: number) =>
    new InvalidSelectorError(message, unitId, { location: locate(offset) });

  while (pos < source.length) {
    // Skip whitespace.
    if (/\s/.test(source[pos])) {
      pos++;
      continue;
    }

    // CSS comment: /* ... */
    if (source.startsWith('/*', pos)) {
      const endIdx = source.indexOf('*/', pos + 2);
      if (endIdx === -1) throw error('Unterminated comment', pos);
      tokens.push({ type: 'comment', text: source.slice(pos, endIdx + 2), location: locate(pos) });
      pos = endIdx + 2;
      continue;
    }

    if (source[pos] === '}') {
      tokens.push({ type: 'block-close', location: locate(pos) });
      depth--;
      pos++;
      continue;
    }

    const run = readRun(source, pos, error);
    const text = run.text.trim();
    const location = locate(pos);

    switch (run.terminator) {
      case '{':
        tokens.push({ type: 'prelude', text, location });
        tokens.push({ type: 'block-open', location: locate(run.end) });
        depth++;
        pos = run.end + 1;
        break;
      case ';':
        tokens.push({ type: depth > 0 ? 'declaration' : 'statement', text, location });
        pos = run.end + 1;
        break;
      case '}':
        // The closing brace itself is emitted on the next iteration.
        if (depth > 0) {
          tokens.push({ type: 'declaration', text, location });
        } else {
          tokens.push({ type: 'prelude', text, location });
        }
        pos = run.end;
        break;
      case 'eof':
        tokens.push({ type: depth > 0 ? 'declaration' : 'prelude', text, location });
        pos = run.end;
        break;
    }
  }

  return tokens;
}

interface Run {
  text: string;
  end: number;
  terminator: '{' | ';' | '}' | 'eof';
}

function readRun(
  source: string,
  start: number,
  error: (message: string, offset: number) => InvalidSelectorError,
): Run {
  let pos = start;
  let nesting = 0;

  while (pos < source.length) {
    const ch = source[pos];

    if (ch === '"' || ch === "'") {
      const close = findStringEnd(source, pos);
      if (close === -1) throw error('Unterminated string', pos);
      pos = close + 1;
      continue;
    }

    if (source.startsWith('/*', pos)) {
      const endIdx = source.indexOf('*/', pos + 2);
      if (endIdx === -1) throw error('Unterminated comment', pos);
      pos = endIdx + 2;
      continue;
    }

    if (ch === '(' || ch === '[') nesting++;
    else if (ch === ')' || ch === ']') nesting = Math.max(0, nesting - 1);
    else if (nesting === 0 && (ch === '{' || ch === ';' || ch === '}')) {
      return { text: source.slice(start, pos), end: pos, terminator: ch };
    }

    pos++;
  }

  return { text: source.slice(start), end: source.length, terminator: 'eof' };
}

function findStringEnd(source: string, start: number): number {
  const quote = source[start];
  for (let i = start + 1; i < source.length; i++) {
    if (source[i] === '\\') {
      i++;
      continue;
    }
    if (source[i] === quote) return i;
    if (source[i] === '\n') return -1;
  }
  return -1;
}
