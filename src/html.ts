import { TagSpan } from './types.js';

/**
 * Tolerant markup helpers. Nothing here builds a DOM: elements are located
 * with regular expressions and described by offsets into the source text.
 */

/**
 * An element located in markup, described by offsets.
 */
export interface ElementSpan {
  tag: TagSpan;
  contentStart: number;
  contentEnd: number;
  /** Offset of the closing tag's '<' (equals `end` for self-closing tags) */
  closeStart: number;
  /** Offset just past the closing tag */
  end: number;
  selfClosing: boolean;
}

export interface CommentSpan {
  start: number;
  end: number;
  body: string;
}

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' '
};

/**
 * Escape special regex characters in a string
 */
export function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Generate a URL-safe slug from text
 */
export function slugify(text: string): string {
  return text
    .normalize('NFD')
    .replace(/\p{M}/gu, '')   // Drop combining marks left by NFD
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s_-]/gu, '') // Keep letters and digits of any script
    .replace(/\s+/g, '-')     // Replace spaces with hyphens
    .replace(/-+/g, '-')      // Collapse multiple hyphens
    .replace(/^-|-$/g, '');
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, body: string) => {
    if (body[0] === '#') {
      const code = body[1] === 'x' || body[1] === 'X'
        ? parseInt(body.slice(2), 16)
        : parseInt(body.slice(1), 10);
      return Number.isFinite(code) && code <= 0x10ffff ? String.fromCodePoint(code) : match;
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? match;
  });
}

/**
 * Plain text of a markup fragment, whitespace collapsed
 */
export function stripTags(markup: string): string {
  return decodeEntities(markup.replace(/<[^>]*>/g, ''))
    .replace(/\s+/g, ' ')
    .trim();
}

function attributePattern(name: string): RegExp {
  return new RegExp(
    `(^|\\s)${escapeRegex(name)}\\s*=\\s*(?:"([^"]*)"|'([^']*)'|([^\\s"'>/]+))`,
    'i'
  );
}

/**
 * Read an attribute value from raw attribute text (entities decoded)
 */
export function getAttribute(attrs: string, name: string): string | undefined {
  const match = attrs.match(attributePattern(name));
  if (!match) return undefined;
  const raw = match[2] ?? match[3] ?? match[4] ?? '';
  return decodeEntities(raw);
}

export function hasAttribute(attrs: string, name: string): boolean {
  return new RegExp(`(^|\\s)${escapeRegex(name)}(?=[\\s=/]|$)`, 'i').test(attrs);
}

/**
 * Set (or replace) an attribute in raw attribute text.
 * A trailing '/' of a self-closing tag stays last.
 */
export function setAttribute(attrs: string, name: string, value: string): string {
  const rendered = `${name}="${escapeHtml(value)}"`;
  const pattern = attributePattern(name);
  if (pattern.test(attrs)) {
    return attrs.replace(pattern, (_match, lead: string) => `${lead}${rendered}`);
  }
  const selfClosing = attrs.match(/\s*\/\s*$/);
  if (selfClosing && selfClosing.index !== undefined) {
    return `${attrs.slice(0, selfClosing.index)} ${rendered}${selfClosing[0]}`;
  }
  return `${attrs} ${rendered}`;
}

export function classMatches(attrs: string, pattern: RegExp): boolean {
  const value = getAttribute(attrs, 'class');
  return value !== undefined && pattern.test(value);
}

export function addClass(attrs: string, className: string): string {
  const value = getAttribute(attrs, 'class');
  if (value === undefined) {
    return setAttribute(attrs, 'class', className);
  }
  const classes = value.split(/\s+/).filter(Boolean);
  if (classes.includes(className)) {
    return attrs;
  }
  return setAttribute(attrs, 'class', [...classes, className].join(' '));
}

function openTagPattern(name: string): string {
  return `<${escapeRegex(name)}(?=[\\s/>])([^>]*)>`;
}

/**
 * Find opening tags of one element name
 */
export function findOpenTags(markup: string, name: string): TagSpan[] {
  const tags: TagSpan[] = [];
  const regex = new RegExp(openTagPattern(name), 'gi');
  let match;
  while ((match = regex.exec(markup)) !== null) {
    tags.push({
      start: match.index,
      end: match.index + match[0].length,
      name: name.toLowerCase(),
      attrs: match[1]
    });
  }
  return tags;
}

/**
 * Find elements by name, balancing nested elements of the same name.
 * Unclosed elements are skipped; nested matches are reported too.
 */
export function findElements(markup: string, name: string): ElementSpan[] {
  const elements: ElementSpan[] = [];
  const boundary = new RegExp(`${openTagPattern(name)}|</${escapeRegex(name)}\\s*>`, 'gi');

  for (const tag of findOpenTags(markup, name)) {
    if (/\/\s*$/.test(tag.attrs)) {
      elements.push({
        tag,
        contentStart: tag.end,
        contentEnd: tag.end,
        closeStart: tag.end,
        end: tag.end,
        selfClosing: true
      });
      continue;
    }

    boundary.lastIndex = tag.end;
    let depth = 1;
    let match;
    while ((match = boundary.exec(markup)) !== null) {
      if (match[0].startsWith('</')) {
        depth--;
        if (depth === 0) {
          elements.push({
            tag,
            contentStart: tag.end,
            contentEnd: match.index,
            closeStart: match.index,
            end: match.index + match[0].length,
            selfClosing: false
          });
          break;
        }
      } else if (!/\/\s*$/.test(match[1] ?? '')) {
        depth++;
      }
    }
  }

  return elements;
}

export function findComments(markup: string): CommentSpan[] {
  const comments: CommentSpan[] = [];
  const regex = /<!--([\s\S]*?)-->/g;
  let match;
  while ((match = regex.exec(markup)) !== null) {
    comments.push({ start: match.index, end: match.index + match[0].length, body: match[1] });
  }
  return comments;
}

/**
 * True when [start, end) lies inside any of the ranges
 */
export function isInside(start: number, end: number, ranges: Array<{ start: number; end: number }>): boolean {
  return ranges.some(range => start >= range.start && end <= range.end);
}
