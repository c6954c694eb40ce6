import {
  Diagnostic,
  NoteKind,
  RawIndexMarker,
  RawNoteBody,
  RawNoteCall,
  RawNoteContainer,
  RawReference,
  RawTarget,
  ScanResult
} from './types.js';
import {
  classMatches,
  ElementSpan,
  findComments,
  findElements,
  findOpenTags,
  getAttribute,
  hasAttribute,
  isInside,
  stripTags
} from './html.js';

/**
 * Marker patterns
 */

// Class tokens of a note call (or of its <sup>/<span> wrapper)
const NOTE_CALL_CLASS = /(^|\s)(note-?call|noteref|footnote-?ref)(\s|$)/i;

// Class tokens of a note body
const NOTE_BODY_CLASS = /(^|\s)(footnote|endnote)(\s|$)/i;

// Class or epub:type of a section grouping notes
const NOTE_CONTAINER_TYPE = /(^|\s)(footnotes|endnotes|rearnotes)(\s|$)/i;

// Ids that mark a list item as a note body: footnote-3, endnote_2, fn3, en3
const NOTE_BODY_ID = /^(footnote|endnote|fn|en)[-_]?\d+$/i;

// Links the engine generates itself and must not treat as references
const GENERATED_LINK_CLASS = /(^|\s)(note-back-ref|index-see|index-see-also|index-occurrence|index-primary)(\s|$)/i;

const CROSS_REF_CLASS = /(^|\s)cross-?ref(\s|$)/i;

const INDEX_MARKER_CLASS = /(^|\s)index-marker(\s|$)/i;

const CAPTION_CLASS = /(^|\s)caption(\s|$)/i;

// <!-- XE "entry" --> with an optional ";..." tail inside the comment
const XE_COMMENT = /^\s*XE\s+"([^"]*)"/i;

// <!-- REF key --> ... <!-- /REF -->
const REF_OPEN_COMMENT = /^\s*REF\s+(.+?)\s*$/i;
const REF_CLOSE_COMMENT = /^\s*\/REF\s*$/i;

type Range = { start: number; end: number };

function malformed(file: string, message: string): Diagnostic {
  return { kind: 'MalformedMarker', file, message };
}

/**
 * Fragment of an href ("#fn1" -> "fn1", "ch2.xhtml#fn1" -> "fn1")
 */
function hrefFragment(href: string): string | undefined {
  const hash = href.indexOf('#');
  if (hash < 0) return undefined;
  return href.slice(hash + 1).trim();
}

function classifyNoteBody(element: ElementSpan): NoteKind | null {
  const { name, attrs } = element.tag;
  if (name === 'aside') {
    const epubType = getAttribute(attrs, 'epub:type') ?? '';
    if (/\b(endnote|rearnote)\b/i.test(epubType)) return 'endnote';
    if (/\bfootnote\b/i.test(epubType)) return 'footnote';
    return null;
  }
  const className = getAttribute(attrs, 'class') ?? '';
  const id = getAttribute(attrs, 'id') ?? '';
  if (name === 'div' && !NOTE_BODY_CLASS.test(className)) return null;
  if (name === 'li' && !NOTE_BODY_CLASS.test(className) && !NOTE_BODY_ID.test(id)) return null;
  return /endnote/i.test(className) || /^(endnote|en)[-_]?\d/i.test(id) ? 'endnote' : 'footnote';
}

function scanNoteBodies(markup: string, file: string, skip: Range[], warnings: Diagnostic[]): RawNoteBody[] {
  const bodies: RawNoteBody[] = [];
  const candidates = [
    ...findElements(markup, 'aside'),
    ...findElements(markup, 'div'),
    ...findElements(markup, 'li')
  ].sort((a, b) => a.tag.start - b.tag.start);

  for (const element of candidates) {
    if (element.selfClosing || isInside(element.tag.start, element.end, skip)) continue;
    const kind = classifyNoteBody(element);
    if (!kind) continue;
    // A note wrapped in another note body belongs to the outer one
    if (isInside(element.tag.start, element.end, bodies.map(b => ({ start: b.position, end: b.end })))) {
      continue;
    }
    const noteKey = getAttribute(element.tag.attrs, 'id')?.trim();
    if (!noteKey) {
      warnings.push(malformed(file, `${kind} body at offset ${element.tag.start} has no id`));
      continue;
    }
    bodies.push({
      kind,
      position: element.tag.start,
      end: element.end,
      tag: element.tag,
      contentStart: element.contentStart,
      contentEnd: element.contentEnd,
      noteKey
    });
  }

  return bodies;
}

function scanNoteContainers(markup: string, skip: Range[], bodies: RawNoteBody[]): RawNoteContainer[] {
  const containers: RawNoteContainer[] = [];
  const bodyRanges = bodies.map(b => ({ start: b.position, end: b.end }));
  const candidates = ['section', 'div', 'aside', 'nav', 'ol'].flatMap(name => findElements(markup, name));

  for (const element of candidates) {
    const { start } = element.tag;
    if (element.selfClosing || isInside(start, element.end, skip)) continue;
    // Lists and sections inside a note belong to its content
    if (isInside(start, element.end, bodyRanges)) continue;

    const { attrs } = element.tag;
    const marked = NOTE_CONTAINER_TYPE.test(getAttribute(attrs, 'class') ?? '')
      || NOTE_CONTAINER_TYPE.test(getAttribute(attrs, 'epub:type') ?? '');
    const holdsNote = bodies.some(b => b.position >= element.contentStart && b.end <= element.contentEnd);
    if (!marked && !(element.tag.name === 'ol' && holdsNote)) continue;

    containers.push({
      position: start,
      end: element.end,
      contentStart: element.contentStart,
      contentEnd: element.contentEnd,
      marked
    });
  }

  return containers.sort((a, b) => a.position - b.position);
}

function scanNoteCalls(
  markup: string,
  file: string,
  skip: Range[],
  warnings: Diagnostic[]
): { calls: RawNoteCall[]; wrappers: Range[] } {
  const calls: RawNoteCall[] = [];
  const wrappers: Range[] = [];
  const claimed = new Set<number>();
  const anchors = findElements(markup, 'a');

  function addCall(anchor: ElementSpan, wrapperId?: string): void {
    const href = getAttribute(anchor.tag.attrs, 'href') ?? '';
    const noteKey = hrefFragment(href);
    claimed.add(anchor.tag.start);
    if (!noteKey) {
      warnings.push(malformed(file, `note call at offset ${anchor.tag.start} has no target`));
      return;
    }
    calls.push({
      position: anchor.tag.start,
      anchor: anchor.tag,
      noteKey,
      callId: getAttribute(anchor.tag.attrs, 'id') ?? wrapperId,
      text: stripTags(markup.slice(anchor.contentStart, anchor.contentEnd))
    });
  }

  for (const wrapper of [...findElements(markup, 'sup'), ...findElements(markup, 'span')]) {
    if (!classMatches(wrapper.tag.attrs, NOTE_CALL_CLASS)) continue;
    if (isInside(wrapper.tag.start, wrapper.end, skip)) continue;
    const inner = anchors.find(a => a.tag.start >= wrapper.contentStart && a.end <= wrapper.contentEnd);
    if (!inner || claimed.has(inner.tag.start)) continue;
    wrappers.push({ start: wrapper.tag.start, end: wrapper.end });
    addCall(inner, getAttribute(wrapper.tag.attrs, 'id'));
  }

  for (const anchor of anchors) {
    if (claimed.has(anchor.tag.start) || isInside(anchor.tag.start, anchor.end, skip)) continue;
    const epubType = getAttribute(anchor.tag.attrs, 'epub:type') ?? '';
    if (classMatches(anchor.tag.attrs, NOTE_CALL_CLASS) || /\bnoteref\b/i.test(epubType)) {
      addCall(anchor);
    }
  }

  calls.sort((a, b) => a.position - b.position);
  return { calls, wrappers };
}

function scanIndexMarkers(markup: string, file: string, skip: Range[], warnings: Diagnostic[]): RawIndexMarker[] {
  const markers: RawIndexMarker[] = [];

  for (const comment of findComments(markup)) {
    const match = comment.body.match(XE_COMMENT);
    if (!match) continue;
    const entryText = match[1].trim();
    if (!entryText) {
      warnings.push(malformed(file, `empty XE index entry at offset ${comment.start}`));
      continue;
    }
    markers.push({
      form: 'comment',
      position: comment.start,
      open: { start: comment.start, end: comment.end, attrs: '' },
      entryText
    });
  }

  const elementMarkers: Array<{ element: ElementSpan; attr: string }> = [];
  for (const span of findElements(markup, 'span')) {
    if (hasAttribute(span.tag.attrs, 'data-index-entry')) {
      elementMarkers.push({ element: span, attr: 'data-index-entry' });
    } else if (classMatches(span.tag.attrs, INDEX_MARKER_CLASS)) {
      elementMarkers.push({ element: span, attr: 'data-entry' });
    }
  }
  for (const element of findElements(markup, 'index-entry')) {
    elementMarkers.push({ element, attr: 'entry' });
  }

  for (const { element, attr } of elementMarkers) {
    if (isInside(element.tag.start, element.end, skip)) continue;
    const entryText = getAttribute(element.tag.attrs, attr)?.trim();
    if (!entryText) {
      warnings.push(malformed(file, `index marker at offset ${element.tag.start} has no entry text`));
      continue;
    }
    const isCustom = element.tag.name === 'index-entry';
    markers.push({
      form: !isCustom ? 'span' : element.selfClosing ? 'empty-element' : 'element',
      position: element.tag.start,
      open: { start: element.tag.start, end: element.tag.end, attrs: element.tag.attrs },
      close: element.selfClosing ? undefined : { start: element.closeStart, end: element.end },
      entryText
    });
  }

  return markers.sort((a, b) => a.position - b.position);
}

function captionOf(markup: string, element: ElementSpan, captionTags: string[]): string | undefined {
  const content = markup.slice(element.contentStart, element.contentEnd);
  for (const tagName of captionTags) {
    for (const caption of findElements(content, tagName)) {
      const text = stripTags(content.slice(caption.contentStart, caption.contentEnd));
      if (text) return text;
    }
  }
  for (const tagName of ['p', 'div', 'span']) {
    for (const candidate of findElements(content, tagName)) {
      if (!classMatches(candidate.tag.attrs, CAPTION_CLASS)) continue;
      const text = stripTags(content.slice(candidate.contentStart, candidate.contentEnd));
      if (text) return text;
    }
  }
  return undefined;
}

function scanTargets(markup: string, skip: Range[]): RawTarget[] {
  const targets: RawTarget[] = [];

  for (let level = 1; level <= 6; level++) {
    for (const heading of findElements(markup, `h${level}`)) {
      if (isInside(heading.tag.start, heading.end, skip)) continue;
      const title = stripTags(markup.slice(heading.contentStart, heading.contentEnd));
      if (!title) continue;
      targets.push({
        kind: 'heading',
        position: heading.tag.start,
        tag: heading.tag,
        originalId: getAttribute(heading.tag.attrs, 'id'),
        title,
        plainText: title,
        level
      });
    }
  }

  const figures = findElements(markup, 'figure').filter(f => !isInside(f.tag.start, f.end, skip));
  for (const figure of figures) {
    targets.push({
      kind: 'figure',
      position: figure.tag.start,
      tag: figure.tag,
      originalId: getAttribute(figure.tag.attrs, 'id'),
      title: captionOf(markup, figure, ['figcaption']),
      plainText: stripTags(markup.slice(figure.contentStart, figure.contentEnd)),
      level: 0
    });
  }
  const figureRanges = figures.map(f => ({ start: f.tag.start, end: f.end }));
  for (const img of findOpenTags(markup, 'img')) {
    if (isInside(img.start, img.end, figureRanges) || isInside(img.start, img.end, skip)) continue;
    const alt = getAttribute(img.attrs, 'alt')?.trim();
    if (!alt) continue;
    targets.push({
      kind: 'figure',
      position: img.start,
      tag: img,
      originalId: getAttribute(img.attrs, 'id'),
      title: alt,
      plainText: alt,
      level: 0
    });
  }

  for (const table of findElements(markup, 'table')) {
    if (isInside(table.tag.start, table.end, skip)) continue;
    targets.push({
      kind: 'table',
      position: table.tag.start,
      tag: table.tag,
      originalId: getAttribute(table.tag.attrs, 'id'),
      title: captionOf(markup, table, ['caption']),
      plainText: stripTags(markup.slice(table.contentStart, table.contentEnd)),
      level: 0
    });
  }

  const bookmarks: Array<{ element: ElementSpan; name: string | undefined }> = [
    ...findElements(markup, 'a').map(a => ({ element: a, name: getAttribute(a.tag.attrs, 'name') })),
    ...findElements(markup, 'span')
      .filter(s => hasAttribute(s.tag.attrs, 'data-bookmark'))
      .map(s => ({ element: s, name: getAttribute(s.tag.attrs, 'id') }))
  ];
  for (const { element, name } of bookmarks) {
    if (!name || isInside(element.tag.start, element.end, skip)) continue;
    const text = stripTags(markup.slice(element.contentStart, element.contentEnd));
    targets.push({
      kind: 'bookmark',
      position: element.tag.start,
      tag: element.tag,
      originalId: name,
      title: text || name,
      plainText: text,
      level: 0
    });
  }

  return targets.sort((a, b) => a.position - b.position);
}

function scanReferences(
  markup: string,
  file: string,
  skip: Range[],
  noteCallAnchors: Set<number>,
  warnings: Diagnostic[]
): RawReference[] {
  const references: RawReference[] = [];
  const spanned: Range[] = [];

  const comments = findComments(markup);
  for (let i = 0; i < comments.length; i++) {
    const open = comments[i].body.match(REF_OPEN_COMMENT);
    if (!open) continue;
    const closeIndex = comments.findIndex((c, j) => j > i && REF_CLOSE_COMMENT.test(c.body));
    if (closeIndex < 0) {
      warnings.push(malformed(file, `REF comment at offset ${comments[i].start} is never closed`));
      continue;
    }
    const close = comments[closeIndex];
    references.push({
      form: 'comment',
      position: comments[i].start,
      open: { start: comments[i].start, end: comments[i].end, attrs: '' },
      close: { start: close.start, end: close.end },
      targetKey: open[1],
      displayText: stripTags(markup.slice(comments[i].end, close.start))
    });
    spanned.push({ start: comments[i].start, end: close.end });
  }

  for (const span of findElements(markup, 'span')) {
    if (!classMatches(span.tag.attrs, CROSS_REF_CLASS) || isInside(span.tag.start, span.end, skip)) continue;
    const displayText = stripTags(markup.slice(span.contentStart, span.contentEnd));
    const targetKey = (getAttribute(span.tag.attrs, 'data-ref') ?? displayText).trim();
    if (!targetKey) {
      warnings.push(malformed(file, `cross-reference span at offset ${span.tag.start} has no target`));
      continue;
    }
    references.push({
      form: 'span',
      position: span.tag.start,
      open: { start: span.tag.start, end: span.tag.end, attrs: span.tag.attrs },
      close: { start: span.closeStart, end: span.end },
      targetKey,
      displayText,
      callId: getAttribute(span.tag.attrs, 'id')
    });
    spanned.push({ start: span.tag.start, end: span.end });
  }

  for (const anchor of findElements(markup, 'a')) {
    const { attrs } = anchor.tag;
    if (noteCallAnchors.has(anchor.tag.start) || hasAttribute(attrs, 'name')) continue;
    if (classMatches(attrs, GENERATED_LINK_CLASS)) continue;
    if (isInside(anchor.tag.start, anchor.end, skip) || isInside(anchor.tag.start, anchor.end, spanned)) continue;
    const href = getAttribute(attrs, 'href');
    if (href === undefined || !href.startsWith('#')) continue;
    const targetKey = href.slice(1).trim();
    if (!targetKey) {
      warnings.push(malformed(file, `link at offset ${anchor.tag.start} has an empty fragment`));
      continue;
    }
    references.push({
      form: 'link',
      position: anchor.tag.start,
      open: { start: anchor.tag.start, end: anchor.tag.end, attrs },
      targetKey,
      displayText: stripTags(markup.slice(anchor.contentStart, anchor.contentEnd)),
      callId: getAttribute(attrs, 'id')
    });
  }

  return references.sort((a, b) => a.position - b.position);
}

/**
 * Extract typed markers from one chunk of markup. Pure: no state is shared
 * between chunks, so chunks may be scanned in any order or in parallel.
 */
export function scanChunk(markup: string, file: string): ScanResult {
  const warnings: Diagnostic[] = [];

  // Markup commented out by the author is not scanned for elements
  const commented: Range[] = findComments(markup).map(c => ({ start: c.start, end: c.end }));

  const noteBodies = scanNoteBodies(markup, file, commented, warnings);
  const noteContainers = scanNoteContainers(markup, commented, noteBodies);
  const { calls: noteCalls, wrappers } = scanNoteCalls(markup, file, commented, warnings);
  const noteCallAnchors = new Set(noteCalls.map(c => c.anchor.start));
  const indexMarkers = scanIndexMarkers(markup, file, commented, warnings);
  const targets = scanTargets(markup, commented);
  const references = scanReferences(markup, file, [...commented, ...wrappers], noteCallAnchors, warnings);

  return { file, targets, references, indexMarkers, noteCalls, noteBodies, noteContainers, warnings };
}
