// ---------------------------------------------------------------------------
// lexer.ts — Single-file component (.tess) lexer
// ---------------------------------------------------------------------------
// Locates the top-level <template>, <script> and <style> sections of a unit
// and turns each into its own token stream.  Each section keeps the raw inner
// content, the attributes declared on its opening tag (e.g. `global` on
// <style>) and the location of its first character, so that every token
// reports positions in the coordinates of the whole unit.
//
// Section boundaries are the only fatal failure: once they are known, a
// tokenization error in one section is recorded and the other sections are
// still tokenized.
// ---------------------------------------------------------------------------

import { CompileError, MalformedSectionError } from './errors';
import { createLocator, type SourceLocation } from './location';
import { tokenizeMarkup, type MarkupToken } from './markup-lexer';
import { tokenizeStyle, type StyleToken } from './style-lexer';

export type SectionKind = 'template' | 'script' | 'style';

/** A single top-level section extracted from the unit. */
export interface Section {
  kind: SectionKind;
  /** The raw content between the opening and closing tags. */
  content: string;
  /** Attributes on the opening tag.  Boolean attrs have value `true`. */
  attrs: Record<string, string | true>;
  /** Offset of the opening tag's `<` in the unit source. */
  start: number;
  /** Offset one past the closing tag's `>`. */
  end: number;
  /** Location of the first character of `content`. */
  contentStart: SourceLocation;
}

export interface SectionLayout {
  template: Section | null;
  script: Section | null;
  style: Section | null;
}

export interface LogicToken {
  type: 'code';
  text: string;
  location: SourceLocation;
}

export interface TokenStreams {
  sections: SectionLayout;
  markup: MarkupToken[];
  style: StyleToken[];
  logic: LogicToken[];
  /** Tokenization failures, at most one per section. */
  errors: CompileError[];
}

// ---- Regex Constants --------------------------------------------------------

/** Matches opening and closing tags of the three section kinds. */
export const SECTION_TAG_RE = /<(\/?)(template|script|style)(?=[\s>/])([^>]*)>/g;

/** Matches a single attribute in an opening tag (name, optional quoted/unquoted value). */
export const ATTR_RE = /([a-zA-Z_][\w-]*)\s*(?:=\s*(?:"([^"]*)"|'([^']*)'|(\S+)))?/g;

// ---- Section splitting ------------------------------------------------------

/**
 * Split a unit into its sections.  Anything at the top level other than the
 * three sections (comments, whitespace, stray text) is ignored.
 *
 * @throws MalformedSectionError when a section is unclosed, duplicated,
 *   nested inside another section, or closed without being opened.
 */
export function splitSections(source: string, unitId: string): SectionLayout {
  const layout: SectionLayout = { template: null, script: null, style: null };
  const locate = createLocator(source);
  let pos = 0;

  while (pos < source.length) {
    const tag = nextSectionTag(source, pos);
    if (!tag) break;

    if (tag.closing) {
      throw new MalformedSectionError(
        `Unexpected </${tag.kind}> — no <${tag.kind}> section is open`,
        unitId,
        { location: locate(tag.index) },
      );
    }

    if (layout[tag.kind] !== null) {
      throw new MalformedSectionError(
        `Duplicate <${tag.kind}> section — only one is allowed per unit`,
        unitId,
        { location: locate(tag.index) },
      );
    }

    const contentStart = tag.index + tag.length;
    const closeIndex = findSectionEnd(source, tag, unitId, locate);
    const closeTag = /<\/[a-z]+\s*>/y;
    closeTag.lastIndex = closeIndex;
    const closeMatch = closeTag.exec(source);
    const end = closeIndex + (closeMatch ? closeMatch[0].length : 0);

    layout[tag.kind] = {
      kind: tag.kind,
      content: source.slice(contentStart, closeIndex),
      attrs: parseAttributes(tag.attrs),
      start: tag.index,
      end,
      contentStart: locate(contentStart),
    };

    pos = end;
  }

  return layout;
}

interface SectionTag {
  kind: SectionKind;
  closing: boolean;
  attrs: string;
  index: number;
  length: number;
}

/** Find the next section tag at or after `pos`, skipping HTML comments. */
function nextSectionTag(source: string, pos: number): SectionTag | null {
  let from = pos;
  while (from < source.length) {
    SECTION_TAG_RE.lastIndex = from;
    const match = SECTION_TAG_RE.exec(source);
    const commentIdx = source.indexOf('<!--', from);

    if (commentIdx !== -1 && (!match || commentIdx < match.index)) {
      const commentEnd = source.indexOf('-->', commentIdx + 4);
      if (commentEnd === -1) return null;
      from = commentEnd + 3;
      continue;
    }

    if (!match) return null;
    return {
      kind: toSectionKind(match[2]),
      closing: match[1] === '/',
      attrs: match[3] ?? '',
      index: match.index,
      length: match[0].length,
    };
  }
  return null;
}

/**
 * Return the offset of the closing tag that ends the section opened by
 * `opener`.  <template> sections may nest <template> elements; no section
 * may contain the opener or closer of a different section kind.
 */
function findSectionEnd(
  source: string,
  opener: SectionTag,
  unitId: string,
  locate: (offset: number) => SourceLocation,
): number {
  const kind = opener.kind;
  let depth = 1;
  let pos = opener.index + opener.length;

  while (pos < source.length) {
    const tag = nextSectionTag(source, pos);
    if (!tag) break;
    pos = tag.index + tag.length;

    if (tag.kind !== kind) {
      // Script content is opaque: only its own closer ends it.
      if (kind === 'script') continue;
      throw new MalformedSectionError(
        `<${tag.closing ? '/' : ''}${tag.kind}> cannot appear inside the <${kind}> section`,
        unitId,
        { location: locate(tag.index) },
      );
    }

    if (tag.closing) {
      depth--;
      if (depth === 0) return tag.index;
    } else if (kind === 'template') {
      depth++;
    } else {
      throw new MalformedSectionError(
        `Nested <${kind}> inside the <${kind}> section`,
        unitId,
        { location: locate(tag.index) },
      );
    }
  }

  throw new MalformedSectionError(
    `Unclosed <${kind}> section — expected </${kind}>`,
    unitId,
    { location: locate(opener.index) },
  );
}

function toSectionKind(name: string | undefined): SectionKind {
  if (name === 'template' || name === 'script' || name === 'style') return name;
  throw new Error(`Unknown section tag: ${String(name)}`);
}

// ---- Attribute parsing -----------------------------------------------------

function parseAttributes(raw: string): Record<string, string | true> {
  const attrs: Record<string, string | true> = {};
  const text = raw.replace(/\/\s*$/, '');
  let m: RegExpExecArray | null;

  // Reset lastIndex in case the regex was previously used.
  ATTR_RE.lastIndex = 0;

  while ((m = ATTR_RE.exec(text)) !== null) {
    const name = m[1];
    const value = m[2] ?? m[3] ?? m[4] ?? true;
    attrs[name] = value;
  }

  return attrs;
}

// ---- Tokenization -----------------------------------------------------------

/**
 * Tokenize a unit into its three streams.  A unit without sections yields
 * three empty streams.
 *
 * @throws MalformedSectionError (see `splitSections`).
 */
export function tokenize(source: string, unitId: string): TokenStreams {
  const sections = splitSections(source, unitId);
  const streams: TokenStreams = { sections, markup: [], style: [], logic: [], errors: [] };

  if (sections.template) {
    const { content, contentStart } = sections.template;
    try {
      streams.markup = tokenizeMarkup(content, unitId, contentStart);
    } catch (err) {
      streams.errors.push(asCompileError(err));
    }
  }

  if (sections.style) {
    const { content, contentStart } = sections.style;
    try {
      streams.style = tokenizeStyle(content, unitId, contentStart);
    } catch (err) {
      streams.errors.push(asCompileError(err));
    }
  }

  if (sections.script && sections.script.content.trim()) {
    streams.logic = [
      { type: 'code', text: sections.script.content, location: sections.script.contentStart },
    ];
  }

  return streams;
}

export function asCompileError(err: unknown): CompileError {
  if (err instanceof CompileError) return err;
  throw err;
}
