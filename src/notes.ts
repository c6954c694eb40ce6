import { GeneratedPage, Note, NoteCall, NoteKind, NotePlacement, NumberingStyle } from './types.js';
import { escapeHtml, setAttribute } from './html.js';
import { hrefFor } from './resolver.js';
import { renderPage } from './rewriter.js';

export interface NotesOptions {
  placement: NotePlacement;
  generateBackRefs: boolean;
  backRefSymbol: string;
  backRefTitle: string;
  restartNumberingPerChapter: boolean;
  footnoteNumbering: NumberingStyle;
  endnoteNumbering: NumberingStyle;
  notesFileName: string;
  notesPageTitle: string;
  includeChapterHeadings: boolean;
  stylesheet: string;
}

export interface ChapterInfo {
  fileName: string;
  title: string;
}

export interface NotesRouting {
  /** Calls whose note does not exist; left unchanged in the output */
  brokenCalls: NoteCall[];
  backRefsGenerated: number;
  /** Markup appended to the end of a chapter (inline footnote sections) */
  appendix: Map<string, string>;
  /** Consolidated notes page */
  page?: GeneratedPage;
}

export const BACK_REFS_CLASS = 'note-back-refs';

const BACK_REFS_MARKER = new RegExp(`class\\s*=\\s*["'][^"']*\\b${BACK_REFS_CLASS}\\b`, 'i');

const LIST_TYPES: Record<NumberingStyle, string> = {
  numeric: '1',
  roman: 'i',
  alpha: 'a'
};

const ROMAN_NUMERALS: Array<[number, string]> = [
  [1000, 'm'], [900, 'cm'], [500, 'd'], [400, 'cd'],
  [100, 'c'], [90, 'xc'], [50, 'l'], [40, 'xl'],
  [10, 'x'], [9, 'ix'], [5, 'v'], [4, 'iv'], [1, 'i']
];

function toRoman(n: number): string {
  let rest = n;
  let out = '';
  for (const [value, numeral] of ROMAN_NUMERALS) {
    while (rest >= value) {
      out += numeral;
      rest -= value;
    }
  }
  return out;
}

function toAlpha(n: number): string {
  let rest = n;
  let out = '';
  while (rest > 0) {
    rest--;
    out = String.fromCharCode(97 + (rest % 26)) + out;
    rest = Math.floor(rest / 26);
  }
  return out;
}

/**
 * Render a note number in a numbering style: 4 -> "4", "iv" or "d"
 */
export function formatNoteNumber(n: number, style: NumberingStyle): string {
  if (n < 1) return String(n);
  switch (style) {
    case 'numeric':
      return String(n);
    case 'roman':
      return toRoman(n);
    case 'alpha':
      return toAlpha(n);
  }
}

export function numberingStyleOf(kind: NoteKind, options: Pick<NotesOptions, 'footnoteNumbering' | 'endnoteNumbering'>): NumberingStyle {
  return kind === 'footnote' ? options.footnoteNumbering : options.endnoteNumbering;
}

/**
 * True when the placement moves a note body out of its original spot
 */
export function isRelocated(kind: NoteKind, placement: NotePlacement): boolean {
  switch (placement) {
    case 'inline':
      return kind === 'footnote';
    case 'consolidated':
      return true;
    case 'linked':
      return false;
  }
}

/**
 * File a note body renders in under a placement
 */
export function noteTargetFile(originalFile: string, options: Pick<NotesOptions, 'placement' | 'notesFileName'>): string {
  return options.placement === 'consolidated' ? options.notesFileName : originalFile;
}

/**
 * Chapter a note belongs to: the first chapter that cites it, else the file
 * holding its body. Without `chapterFiles` any call counts.
 */
export function noteChapterOf(note: Pick<Note, 'calls' | 'originalFile'>, chapterFiles?: ReadonlySet<string>): string {
  const call = note.calls.find(c => !chapterFiles || chapterFiles.has(c.file));
  return call ? call.file : note.originalFile;
}

/**
 * Number notes per kind in document order, restarting per chapter when asked.
 * `notes` must already be in document order and linked to their calls.
 */
export function numberNotes(notes: Note[], restartPerChapter: boolean, chapterFiles?: ReadonlySet<string>): void {
  const counters = new Map<string, number>();
  for (const note of notes) {
    const counter = restartPerChapter ? `${note.kind}|${noteChapterOf(note, chapterFiles)}` : note.kind;
    const next = (counters.get(counter) ?? 0) + 1;
    counters.set(counter, next);
    note.number = next;
  }
}

/**
 * Link calls to notes by the note's authored id. Each note collects its
 * calls in document order; each linked call gets the note's final href.
 */
export function linkNotes(notes: Note[], calls: NoteCall[]): NoteCall[] {
  const byKey = new Map<string, Note>();
  for (const note of notes) {
    if (!byKey.has(note.originalId)) byKey.set(note.originalId, note);
    if (!byKey.has(note.id)) byKey.set(note.id, note);
  }

  const broken: NoteCall[] = [];
  for (const call of calls) {
    const note = byKey.get(call.noteKey);
    if (!note) {
      broken.push(call);
      continue;
    }
    call.noteId = note.id;
    call.resolvedHref = hrefFor(note.targetFile, note.id, call.file);
    if (!note.calls.includes(call)) note.calls.push(call);
  }
  return broken;
}

/**
 * Append one back-link per call to note content. Content that already
 * carries a back-reference block is returned as is.
 */
export function appendBackReferences(
  content: string,
  note: Pick<Note, 'targetFile' | 'calls'>,
  options: Pick<NotesOptions, 'backRefSymbol' | 'backRefTitle'>
): { content: string; added: number } {
  if (note.calls.length === 0 || BACK_REFS_MARKER.test(content)) {
    return { content, added: 0 };
  }

  const links = note.calls
    .map(call => {
      const href = hrefFor(call.file, call.id, note.targetFile);
      return `<a href="${escapeHtml(href)}" class="note-back-ref" title="${escapeHtml(options.backRefTitle)}">${escapeHtml(options.backRefSymbol)}</a>`;
    })
    .join(' ');
  const block = `<span class="${BACK_REFS_CLASS}">${links}</span>`;

  // Keep the links inside a trailing paragraph
  const lastParagraph = /<\/p\s*>\s*$/i.exec(content);
  if (lastParagraph) {
    const at = lastParagraph.index;
    return { content: `${content.slice(0, at)} ${block}${content.slice(at)}`, added: note.calls.length };
  }
  return { content: `${content.trimEnd()} ${block}`, added: note.calls.length };
}

function renderNoteItem(note: Note, style: NumberingStyle): string {
  const role = note.kind === 'footnote' ? 'doc-footnote' : 'doc-endnote';
  return `  <li id="${note.id}" class="${note.kind}" epub:type="${note.kind}" role="${role}" value="${note.number}" aria-label="Note ${formatNoteNumber(note.number, style)}">${note.content}</li>`;
}

/**
 * Ordered list of notes of one kind
 */
export function renderNoteList(notes: Note[], style: NumberingStyle): string {
  const items = notes.map(note => renderNoteItem(note, style));
  return [`<ol class="notes-list" type="${LIST_TYPES[style]}">`, ...items, '</ol>'].join('\n');
}

/**
 * Attributes of a note body left in place
 */
export function inPlaceAttributes(attrs: string, note: Note, options: Pick<NotesOptions, 'placement' | 'footnoteNumbering' | 'endnoteNumbering'>): string {
  let result = setAttribute(attrs, 'id', note.id);
  if (options.placement === 'linked') {
    result = setAttribute(result, 'epub:type', note.kind);
    result = setAttribute(result, 'role', note.kind === 'footnote' ? 'doc-footnote' : 'doc-endnote');
    result = setAttribute(result, 'aria-label', `Note ${formatNoteNumber(note.number, numberingStyleOf(note.kind, options))}`);
  }
  return result;
}

function renderKindLists(notes: Note[], options: NotesOptions): string[] {
  const blocks: string[] = [];
  for (const kind of ['footnote', 'endnote'] as const) {
    const ofKind = notes.filter(n => n.kind === kind);
    if (ofKind.length > 0) {
      blocks.push(renderNoteList(ofKind, numberingStyleOf(kind, options)));
    }
  }
  return blocks;
}

/**
 * Consolidated notes page: notes grouped by the chapter citing them,
 * chapters in input order.
 */
export function renderNotesPage(notes: Note[], chapters: ChapterInfo[], options: NotesOptions): GeneratedPage {
  const lines: string[] = [`<section class="notes-page" epub:type="endnotes">`, `<h1>${escapeHtml(options.notesPageTitle)}</h1>`];
  const chapterFiles = new Set(chapters.map(c => c.fileName));

  for (const chapter of chapters) {
    const chapterNotes = notes.filter(n => noteChapterOf(n, chapterFiles) === chapter.fileName);
    if (chapterNotes.length === 0) continue;
    lines.push('<section class="notes-chapter">');
    if (options.includeChapterHeadings) {
      lines.push(`<h2>${escapeHtml(chapter.title)}</h2>`);
    }
    lines.push(...renderKindLists(chapterNotes, options));
    lines.push('</section>');
  }
  lines.push('</section>');

  return {
    fileName: options.notesFileName,
    title: options.notesPageTitle,
    markup: renderPage(options.notesPageTitle, lines.join('\n'), options.stylesheet)
  };
}

/**
 * Section of footnotes appended to the end of one chapter
 */
export function renderFootnoteSection(notes: Note[], options: NotesOptions): string {
  return [
    '<section class="footnotes" epub:type="footnotes">',
    `<h2>${escapeHtml(options.notesPageTitle)}</h2>`,
    renderNoteList(notes, options.footnoteNumbering),
    '</section>'
  ].join('\n');
}

/**
 * Number, link and place notes. `rewriteContent` runs once per note after
 * linking, before back-references are appended, so that calls and
 * references inside note bodies can use the final hrefs.
 */
export function routeNotes(
  notes: Note[],
  calls: NoteCall[],
  chapters: ChapterInfo[],
  options: NotesOptions,
  rewriteContent?: (note: Note) => string
): NotesRouting {
  const brokenCalls = linkNotes(notes, calls);
  numberNotes(notes, options.restartNumberingPerChapter, new Set(chapters.map(c => c.fileName)));

  if (rewriteContent) {
    for (const note of notes) {
      note.content = rewriteContent(note);
    }
  }

  let backRefsGenerated = 0;
  if (options.generateBackRefs) {
    for (const note of notes) {
      const { content, added } = appendBackReferences(note.content, note, options);
      note.content = content;
      backRefsGenerated += added;
    }
  }

  const appendix = new Map<string, string>();
  let page: GeneratedPage | undefined;

  if (options.placement === 'inline') {
    for (const chapter of chapters) {
      const footnotes = notes.filter(n => n.kind === 'footnote' && n.originalFile === chapter.fileName);
      if (footnotes.length > 0) {
        appendix.set(chapter.fileName, renderFootnoteSection(footnotes, options));
      }
    }
  } else if (options.placement === 'consolidated' && notes.length > 0) {
    page = renderNotesPage(notes, chapters, options);
  }

  return { brokenCalls, backRefsGenerated, appendix, page };
}
