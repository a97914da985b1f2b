// ---------------------------------------------------------------------------
// markup-lexer.ts — Tokenizer for the <template> section
// ---------------------------------------------------------------------------
// Produces a flat stream of tag, text, interpolation and comment tokens.
// Nesting is left to the template parser; this stage only fails on input it
// cannot split into tokens (unterminated comments, tags, attribute values or
// interpolations).
// ---------------------------------------------------------------------------

import { TemplateSyntaxError } from './errors';
import { createLocator, START, type Locator, type SourceLocation } from './location';

export interface MarkupAttribute {
  name: string;
  /** `null` for boolean attributes. */
  value: string | null;
  location: SourceLocation;
}

export interface TagOpenToken {
  type: 'tag-open';
  name: string;
  attrs: MarkupAttribute[];
  selfClosing: boolean;
  location: SourceLocation;
}

export interface TagCloseToken {
  type: 'tag-close';
  name: string;
  location: SourceLocation;
}

export interface TextToken {
  type: 'text';
  value: string;
  location: SourceLocation;
}

export interface InterpolationToken {
  type: 'interpolation';
  /** The trimmed source between `{{` and `}}`. */
  expression: string;
  location: SourceLocation;
}

export interface CommentToken {
  type: 'comment';
  value: string;
  location: SourceLocation;
}

export type MarkupToken = TagOpenToken | TagCloseToken | TextToken | InterpolationToken | CommentToken;

export function tokenizeMarkup(
  source: string,
  unitId: string,
  base: SourceLocation = START,
): MarkupToken[] {
  return new MarkupLexer(source, unitId, base).run();
}

class MarkupLexer {
  private pos = 0;
  private tokens: MarkupToken[] = [];
  private locate: Locator;

  constructor(
    private source: string,
    private unitId: string,
    base: SourceLocation,
  ) {
    this.locate = createLocator(source, base);
  }

  run(): MarkupToken[] {
    while (this.pos < this.source.length) {
      if (this.lookingAt('<!--')) {
        this.readComment();
      } else if (this.lookingAt('</') && this.isTagNameStart(this.pos + 2)) {
        this.readCloseTag();
      } else if (this.lookingAt('<') && this.isTagNameStart(this.pos + 1)) {
        this.readOpenTag();
      } else {
        this.readTextOrInterpolation();
      }
    }
    return this.tokens;
  }

  // ---- Comments -----------------------------------------------------------

  private readComment(): void {
    const start = this.pos;
    this.pos += 4;
    const endIdx = this.source.indexOf('-->', this.pos);
    if (endIdx === -1) {
      throw this.error('Unterminated comment', start);
    }
    this.tokens.push({
      type: 'comment',
      value: this.source.slice(this.pos, endIdx).trim(),
      location: this.locate(start),
    });
    this.pos = endIdx + 3;
  }

  // ---- Tags ---------------------------------------------------------------

  private readCloseTag(): void {
    const start = this.pos;
    this.pos += 2;
    const name = this.readTagName();
    this.skipWhitespace();
    if (!this.lookingAt('>')) {
      throw this.error(`Expected ">" to end </${name}`, this.pos);
    }
    this.pos++;
    this.tokens.push({ type: 'tag-close', name, location: this.locate(start) });
  }

  private readOpenTag(): void {
    const start = this.pos;
    this.pos++;
    const name = this.readTagName();
    const attrs: MarkupAttribute[] = [];

    while (true) {
      this.skipWhitespace();
      if (this.pos >= this.source.length) {
        throw this.error(`Unterminated start tag <${name}`, start);
      }
      if (this.lookingAt('/>')) {
        this.pos += 2;
        this.tokens.push({ type: 'tag-open', name, attrs, selfClosing: true, location: this.locate(start) });
        return;
      }
      if (this.lookingAt('>')) {
        this.pos++;
        this.tokens.push({ type: 'tag-open', name, attrs, selfClosing: false, location: this.locate(start) });
        return;
      }

      const attrStart = this.pos;
      const attrName = this.readAttributeName();
      if (!attrName) {
        throw this.error(`Unexpected "${this.source[this.pos]}" in <${name}>`, this.pos);
      }

      let value: string | null = null;
      this.skipWhitespace();
      if (this.lookingAt('=')) {
        this.pos++;
        this.skipWhitespace();
        value = this.readAttributeValue();
      }
      attrs.push({ name: attrName, value, location: this.locate(attrStart) });
    }
  }

  // ---- Text & Interpolation -----------------------------------------------

  private readTextOrInterpolation(): void {
    let textStart = this.pos;
    let text = '';

    const flush = () => {
      if (text) {
        this.tokens.push({ type: 'text', value: text, location: this.locate(textStart) });
        text = '';
      }
    };

    while (this.pos < this.source.length) {
      if (this.lookingAt('<')) {
        const next = this.pos + 1;
        const startsMarkup =
          this.lookingAt('<!--') ||
          this.isTagNameStart(next) ||
          (this.source[next] === '/' && this.isTagNameStart(next + 1));
        if (startsMarkup) break;
        // Stray `<` is text.
        text += this.source[this.pos++];
        continue;
      }

      if (this.lookingAt('{{')) {
        flush();
        const start = this.pos;
        this.pos += 2;
        const endIdx = this.findInterpolationEnd(this.pos);
        if (endIdx === -1) throw this.error('Unterminated interpolation {{ }}', start);
        this.tokens.push({
          type: 'interpolation',
          expression: this.source.slice(this.pos, endIdx).trim(),
          location: this.locate(start),
        });
        this.pos = endIdx + 2;
        textStart = this.pos;
        continue;
      }

      text += this.source[this.pos++];
    }

    flush();
  }

  /**
   * Find the closing `}}` of an interpolation, skipping over string literals
   * so that `}}` inside quotes does not end the expression.
   */
  private findInterpolationEnd(start: number): number {
    let pos = start;
    let quote: string | null = null;

    while (pos < this.source.length - 1) {
      const ch = this.source[pos];

      if (quote) {
        if (ch === '\\') {
          pos += 2;
          continue;
        }
        if (ch === quote) quote = null;
      } else if (ch === "'" || ch === '"' || ch === '`') {
        quote = ch;
      } else if (ch === '}' && this.source[pos + 1] === '}') {
        return pos;
      }

      pos++;
    }

    return -1;
  }

  // ---- Low-level helpers --------------------------------------------------

  private readTagName(): string {
    const start = this.pos;
    while (this.pos < this.source.length && /[a-zA-Z0-9\-_.]/.test(this.source[this.pos])) {
      this.pos++;
    }
    return this.source.slice(start, this.pos);
  }

  private readAttributeName(): string {
    const start = this.pos;
    // Allow: word chars, `-`, `:`, `@`, `.`, `#`
    while (this.pos < this.source.length && /[a-zA-Z0-9\-_:@.#]/.test(this.source[this.pos])) {
      this.pos++;
    }
    return this.source.slice(start, this.pos);
  }

  private readAttributeValue(): string {
    const quote = this.source[this.pos];
    if (quote === '"' || quote === "'") {
      const start = this.pos;
      const endIdx = this.source.indexOf(quote, this.pos + 1);
      if (endIdx === -1) throw this.error(`Unterminated attribute value (expected ${quote})`, start);
      const value = this.source.slice(this.pos + 1, endIdx);
      this.pos = endIdx + 1;
      return value;
    }
    // Unquoted value — read until whitespace or `>`.
    const start = this.pos;
    while (this.pos < this.source.length && !/[\s>]/.test(this.source[this.pos])) {
      if (this.lookingAt('/>')) break;
      this.pos++;
    }
    return this.source.slice(start, this.pos);
  }

  private skipWhitespace(): void {
    while (this.pos < this.source.length && /\s/.test(this.source[this.pos])) {
      this.pos++;
    }
  }

  private lookingAt(str: string): boolean {
    return this.source.startsWith(str, this.pos);
  }

  private isTagNameStart(index: number): boolean {
    const ch = this.source[index];
    return ch !== undefined && /[a-zA-Z]/.test(ch);
  }

  private error(message: string, offset: number): TemplateSyntaxError {
    return new TemplateSyntaxError(message, this.unitId, { location: this.locate(offset) });
  }
}
