import {
  Diagnostic,
  IndexEntry,
  IndexOccurrence,
  KEY_SEPARATOR,
  UnresolvedCrossReference
} from './types.js';
import { escapeHtml } from './html.js';
import { AnchorRegistry } from './registry.js';
import { renderPage } from './rewriter.js';

/**
 * Index entry text after parsing: the term path plus its cross-references
 */
export interface ParsedIndexEntry {
  /** Main term followed by sub-terms */
  path: string[];
  seeRefs: string[];
  seeAlsoRefs: string[];
  emphasis: boolean;
  primary: boolean;
}

export interface IndexOptions {
  caseSensitive: boolean;
  ignoreArticles: string[];
  locale: string;
  maxIndexDepth: number;
}

export interface IndexSection {
  /** Uppercase letter, or '#' for digits and symbols */
  letter: string;
  entries: IndexEntry[];
}

export interface CrossReferenceSummary {
  resolved: number;
  unresolved: UnresolvedCrossReference[];
  warnings: Diagnostic[];
}

export interface IndexPageOptions {
  title: string;
  stylesheet: string;
  showLetterHeaders: boolean;
  maxTocDepth: number;
  maxEntriesPerLetter: number;
}

export interface IndexPage {
  markup: string;
  /** Main entries left out by maxEntriesPerLetter */
  truncated: number;
}

// "see also X" must be taken out before "see X" would swallow it.
// A clause runs to the next ';' or ':' and may list several targets.
const SEE_ALSO_CLAUSE = /\bsee\s+also\s+([^;:]+)/gi;
const SEE_CLAUSE = /\bsee\s+([^;:]+)/gi;

function clauseTargets(clause: string): string[] {
  return clause.split(',').map(collapse).filter(Boolean);
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function stripArticle(text: string, articles: string[]): string {
  const lower = text.toLowerCase();
  for (const article of articles) {
    const prefix = `${article.toLowerCase()} `;
    if (lower.startsWith(prefix)) {
      return text.slice(prefix.length).trim();
    }
  }
  return text;
}

/**
 * Parse index entry syntax: "Main:sub:subsub", "see X" / "see also X" clauses,
 * "**" for a primary occurrence, a leading or trailing "*" for emphasis.
 * Returns null when no term is left.
 */
export function parseEntryText(raw: string): ParsedIndexEntry | null {
  let text = raw;

  const primary = text.includes('**');
  text = text.replace(/\*\*/g, '');

  const emphasis = /^\s*\*|\*\s*$/.test(text);
  text = text.replace(/^\s*\*+|\*+\s*$/g, '');

  const seeAlsoRefs: string[] = [];
  text = text.replace(SEE_ALSO_CLAUSE, (_match, clause: string) => {
    seeAlsoRefs.push(...clauseTargets(clause));
    return '';
  });
  const seeRefs: string[] = [];
  text = text.replace(SEE_CLAUSE, (_match, clause: string) => {
    seeRefs.push(...clauseTargets(clause));
    return '';
  });

  const path = text
    .split(':')
    .map(segment => collapse(segment.replace(/^[\s;,]+|[\s;,]+$/g, '')))
    .filter(segment => segment.length > 0);

  if (path.length === 0) {
    return null;
  }

  return { path, seeRefs, seeAlsoRefs, emphasis, primary };
}

/**
 * Grouping key: entries with equal keys merge
 */
export function normalizeTerm(text: string, options: Pick<IndexOptions, 'caseSensitive' | 'ignoreArticles'>): string {
  let key = collapse(text);
  if (!options.caseSensitive) {
    key = key.toLowerCase();
  }
  return stripArticle(key, options.ignoreArticles);
}

/**
 * Ordering key: diacritics and leading articles removed, lower-cased.
 * Display text is never derived from it.
 */
export function makeSortKey(text: string, ignoreArticles: string[]): string {
  const folded = collapse(text.normalize('NFD').replace(/\p{M}/gu, '')).toLowerCase();
  return stripArticle(folded, ignoreArticles);
}

/**
 * Alphabetical section of a sort key: its first letter uppercased, or '#'
 */
export function groupOf(sortKey: string): string {
  const first = [...sortKey][0];
  if (first === undefined) return '#';
  const upper = [...first.toUpperCase()][0] ?? first;
  return /\p{L}/u.test(upper) ? upper : '#';
}

/**
 * Builds the index tree from parsed markers.
 *
 * Entries live in a flat arena keyed by their normalized path; parent and
 * child links are keys into it, so the tree holds no object cycles.
 */
export class IndexBuilder {
  private readonly arena = new Map<string, IndexEntry>();
  private readonly mainKeys: string[] = [];
  private readonly collator: Intl.Collator;
  private crossReferences?: CrossReferenceSummary;

  constructor(private readonly options: IndexOptions) {
    this.collator = new Intl.Collator(options.locale);
  }

  /**
   * Merge one marker into the tree, attaching the occurrence to every entry on its path.
   */
  add(parsed: ParsedIndexEntry, occurrence: Omit<IndexOccurrence, 'primary'>): Diagnostic[] {
    const warnings: Diagnostic[] = [];
    let path = parsed.path;
    if (path.length > this.options.maxIndexDepth) {
      warnings.push({
        kind: 'MalformedMarker',
        file: occurrence.file,
        message: `index entry "${path.join(':')}" is deeper than ${this.options.maxIndexDepth} levels; truncated`
      });
      path = path.slice(0, this.options.maxIndexDepth);
    }

    let parentKey: string | undefined;
    path.forEach((segment, depth) => {
      const normalized = normalizeTerm(segment, this.options);
      const key = parentKey === undefined ? normalized : `${parentKey}${KEY_SEPARATOR}${normalized}`;
      const entry = this.arena.get(key) ?? this.create(key, segment, depth, parentKey);
      entry.occurrences.push({ ...occurrence, primary: parsed.primary });
      if (depth === path.length - 1) {
        entry.emphasis = entry.emphasis || parsed.emphasis;
        for (const ref of parsed.seeRefs) {
          if (!entry.seeRefs.includes(ref)) entry.seeRefs.push(ref);
        }
        for (const ref of parsed.seeAlsoRefs) {
          if (!entry.seeAlsoRefs.includes(ref)) entry.seeAlsoRefs.push(ref);
        }
      }
      parentKey = key;
    });

    return warnings;
  }

  /**
   * Resolve "see" and "see also" targets against the main entries.
   * Runs once; later calls return the first result.
   */
  resolveCrossReferences(): CrossReferenceSummary {
    if (this.crossReferences) {
      return this.crossReferences;
    }

    const summary: CrossReferenceSummary = { resolved: 0, unresolved: [], warnings: [] };
    for (const entry of this.arena.values()) {
      const relations = [
        { relation: 'see' as const, refs: entry.seeRefs, out: entry.resolvedSee },
        { relation: 'see-also' as const, refs: entry.seeAlsoRefs, out: entry.resolvedSeeAlso }
      ];
      for (const { relation, refs, out } of relations) {
        for (const ref of refs) {
          const key = normalizeTerm(ref, this.options);
          const target = this.arena.get(key);
          if (target && target.key !== entry.key) {
            if (!out.includes(key)) out.push(key);
            summary.resolved++;
            continue;
          }
          if (target) {
            summary.warnings.push({
              kind: 'InconsistentHierarchy',
              message: `index entry "${entry.text}" refers to itself`
            });
          }
          summary.unresolved.push({ entry: entry.text, target: ref, relation });
        }
      }
    }

    this.crossReferences = summary;
    return summary;
  }

  get(key: string): IndexEntry | undefined {
    return this.arena.get(key);
  }

  get size(): number {
    return this.arena.size;
  }

  get occurrenceCount(): number {
    return this.mainKeys.reduce((sum, key) => sum + (this.arena.get(key)?.occurrences.length ?? 0), 0);
  }

  compare(a: IndexEntry, b: IndexEntry): number {
    return this.collator.compare(a.sortKey, b.sortKey)
      || this.collator.compare(a.text, b.text)
      || (a.text < b.text ? -1 : a.text > b.text ? 1 : 0);
  }

  /**
   * Main entries in sort order
   */
  entries(): IndexEntry[] {
    return this.mainKeys
      .map(key => this.arena.get(key))
      .filter((entry): entry is IndexEntry => entry !== undefined)
      .sort((a, b) => this.compare(a, b));
  }

  children(entry: IndexEntry): IndexEntry[] {
    return entry.childKeys
      .map(key => this.arena.get(key))
      .filter((child): child is IndexEntry => child !== undefined)
      .sort((a, b) => this.compare(a, b));
  }

  /**
   * Main entries grouped by section letter; letters in collation order, '#' last.
   */
  sections(): IndexSection[] {
    const byLetter = new Map<string, IndexEntry[]>();
    for (const entry of this.entries()) {
      const section = byLetter.get(entry.group);
      if (section) {
        section.push(entry);
      } else {
        byLetter.set(entry.group, [entry]);
      }
    }

    const letters = [...byLetter.keys()]
      .filter(letter => letter !== '#')
      .sort((a, b) => this.collator.compare(a, b));
    if (byLetter.has('#')) {
      letters.push('#');
    }
    return letters.map(letter => ({ letter, entries: byLetter.get(letter) ?? [] }));
  }

  /**
   * Display path of an entry, main term first
   */
  pathOf(entry: IndexEntry): string[] {
    const path: string[] = [];
    const seen = new Set<string>();
    let current: IndexEntry | undefined = entry;
    while (current && !seen.has(current.key)) {
      seen.add(current.key);
      path.unshift(current.text);
      current = current.parentKey === undefined ? undefined : this.arena.get(current.parentKey);
    }
    return path;
  }

  private create(key: string, text: string, depth: number, parentKey?: string): IndexEntry {
    const sortKey = makeSortKey(text, this.options.ignoreArticles);
    const entry: IndexEntry = {
      key,
      text,
      sortKey,
      group: groupOf(sortKey),
      depth,
      parentKey,
      childKeys: [],
      occurrences: [],
      emphasis: false,
      seeRefs: [],
      seeAlsoRefs: [],
      resolvedSee: [],
      resolvedSeeAlso: []
    };
    this.arena.set(key, entry);
    if (parentKey === undefined) {
      this.mainKeys.push(key);
    } else {
      this.arena.get(parentKey)?.childKeys.push(key);
    }
    return entry;
  }
}

function sectionId(letter: string): string {
  return letter === '#' ? 'index-symbols' : `index-${letter.toLowerCase()}`;
}

/**
 * Default index page: sections, then entries depth-first with their
 * occurrence links, see / see also links and indented sub-entries.
 */
export function renderIndexPage(builder: IndexBuilder, options: IndexPageOptions): IndexPage {
  // Entry anchors only need to be unique within the page
  const anchors = new AnchorRegistry({
    idPrefix: 'index',
    maxIdLength: 80,
    collisionSuffixLength: 6,
    maxCollisionAttempts: 1000
  });
  const anchorOf = new Map<string, string>();
  const anchorFor = (entry: IndexEntry): string => {
    const existing = anchorOf.get(entry.key);
    if (existing) return existing;
    const id = anchors.claim(undefined, 'entry', builder.pathOf(entry).join(' '));
    anchorOf.set(entry.key, id);
    return id;
  };

  // Assign anchors in page order so ids do not depend on cross-reference order
  const sections = builder.sections();
  for (const section of sections) {
    for (const entry of section.entries) anchorFor(entry);
  }

  const seeLinks = (keys: string[], className: string): string =>
    keys
      .map(key => builder.get(key))
      .filter((target): target is IndexEntry => target !== undefined)
      .map(target => `<a href="#${anchorFor(target)}" class="${className}">${escapeHtml(target.text)}</a>`)
      .join(', ');

  const lines: string[] = [`<div class="index-page">`, `  <h1 class="index-title">${escapeHtml(options.title)}</h1>`];
  let truncated = 0;

  for (const section of sections) {
    const shown = section.entries.slice(0, options.maxEntriesPerLetter);
    truncated += section.entries.length - shown.length;

    lines.push(`  <div class="index-section" id="${sectionId(section.letter)}">`);
    if (options.showLetterHeaders) {
      lines.push(`    <h2 class="index-letter-header">${escapeHtml(section.letter)}</h2>`);
    }
    lines.push('    <dl class="index-entries">');

    const stack: Array<{ entry: IndexEntry; level: number }> = shown
      .map(entry => ({ entry, level: 0 }))
      .reverse();
    const visited = new Set<string>();

    while (stack.length > 0) {
      const item = stack.pop();
      if (!item || visited.has(item.entry.key)) continue;
      visited.add(item.entry.key);
      const { entry, level } = item;
      const indent = '  '.repeat(level + 3);

      const text = escapeHtml(entry.text);
      lines.push(`${indent}<dt class="index-entry level-${level}" id="${anchorFor(entry)}">${entry.emphasis ? `<strong>${text}</strong>` : text}</dt>`);

      const parts: string[] = [];
      if (entry.occurrences.length > 0) {
        parts.push(entry.occurrences
          .map((occurrence, i) => {
            const className = occurrence.primary ? 'index-primary' : 'index-occurrence';
            return `<a href="${escapeHtml(occurrence.file)}#${occurrence.anchorId}" class="${className}">${i + 1}</a>`;
          })
          .join(', '));
      }
      if (entry.resolvedSee.length > 0) {
        parts.push(`<span class="see-refs">See ${seeLinks(entry.resolvedSee, 'index-see')}</span>`);
      }
      if (entry.resolvedSeeAlso.length > 0) {
        parts.push(`<span class="see-also-refs">See also ${seeLinks(entry.resolvedSeeAlso, 'index-see-also')}</span>`);
      }
      lines.push(`${indent}<dd class="index-content">${parts.join(' ')}</dd>`);

      if (level + 1 < options.maxTocDepth) {
        const children = builder.children(entry);
        for (let i = children.length - 1; i >= 0; i--) {
          stack.push({ entry: children[i], level: level + 1 });
        }
      }
    }

    lines.push('    </dl>');
    lines.push('  </div>');
  }
  lines.push('</div>');

  return {
    markup: renderPage(options.title, lines.join('\n'), options.stylesheet),
    truncated
  };
}
