import { RawIndexMarker, RawNoteCall, RawReference, RawTarget, ReferenceCall } from './types.js';
import { addClass, escapeHtml, setAttribute } from './html.js';

/**
 * Replace [start, end) of a chunk with `text`
 */
export interface Edit {
  start: number;
  end: number;
  text: string;
}

export interface ApplyResult {
  markup: string;
  /** Edits that overlapped an earlier edit and were not applied */
  dropped: Edit[];
}

/**
 * Apply position-based edits to markup. Offsets refer to the original text,
 * so edits never see each other's output. An edit overlapping one that
 * starts earlier is dropped and returned.
 */
export function applyEdits(markup: string, edits: Edit[], offset = 0): ApplyResult {
  const sorted = [...edits].sort((a, b) => a.start - b.start || a.end - b.end);
  const dropped: Edit[] = [];
  const parts: string[] = [];
  let cursor = 0;

  for (const edit of sorted) {
    const start = edit.start - offset;
    const end = edit.end - offset;
    if (start < cursor || end > markup.length || start > end) {
      dropped.push(edit);
      continue;
    }
    parts.push(markup.slice(cursor, start), edit.text);
    cursor = end;
  }
  parts.push(markup.slice(cursor));

  return { markup: parts.join(''), dropped };
}

/**
 * Split edits into those inside [start, end) and the rest
 */
export function partitionEdits(edits: Edit[], start: number, end: number): { inside: Edit[]; outside: Edit[] } {
  const inside: Edit[] = [];
  const outside: Edit[] = [];
  for (const edit of edits) {
    if (edit.start >= start && edit.end <= end) {
      inside.push(edit);
    } else {
      outside.push(edit);
    }
  }
  return { inside, outside };
}

function openTag(name: string, attrs: string): string {
  return `<${name}${attrs}>`;
}

/**
 * Give a target element its final id
 */
export function targetEdit(target: RawTarget, finalId: string): Edit {
  return {
    start: target.tag.start,
    end: target.tag.end,
    text: openTag(target.tag.name, setAttribute(target.tag.attrs, 'id', finalId))
  };
}

/**
 * Turn a resolved reference into a link. Broken references get no edit.
 */
export function referenceEdits(raw: RawReference, call: ReferenceCall): Edit[] {
  if (call.broken || call.resolvedHref === undefined) {
    return [];
  }

  if (raw.form === 'link') {
    let attrs = setAttribute(raw.open.attrs, 'href', call.resolvedHref);
    attrs = setAttribute(attrs, 'id', call.id);
    attrs = addClass(attrs, 'cross-ref');
    return [{ start: raw.open.start, end: raw.open.end, text: openTag('a', attrs) }];
  }

  const edits: Edit[] = [{
    start: raw.open.start,
    end: raw.open.end,
    text: `<a href="${escapeHtml(call.resolvedHref)}" id="${call.id}" class="cross-ref">`
  }];
  if (raw.close) {
    edits.push({ start: raw.close.start, end: raw.close.end, text: '</a>' });
  }
  return edits;
}

/**
 * Replace an index marker with an addressable anchor
 */
export function indexMarkerEdits(marker: RawIndexMarker, anchorId: string): Edit[] {
  const anchor = `<a id="${anchorId}" class="index-anchor"></a>`;
  switch (marker.form) {
    case 'comment':
    case 'empty-element':
      return [{ start: marker.open.start, end: marker.open.end, text: anchor }];
    case 'span':
      return [{
        start: marker.open.start,
        end: marker.open.end,
        text: openTag('span', setAttribute(marker.open.attrs, 'id', anchorId))
      }];
    case 'element': {
      const edits: Edit[] = [{
        start: marker.open.start,
        end: marker.open.end,
        text: `<span id="${anchorId}" class="index-term">`
      }];
      if (marker.close) {
        edits.push({ start: marker.close.start, end: marker.close.end, text: '</span>' });
      }
      return edits;
    }
  }
}

/**
 * Point a note call at the note's final location
 */
export function noteCallEdit(raw: RawNoteCall, callId: string, href: string): Edit {
  let attrs = setAttribute(raw.anchor.attrs, 'href', href);
  attrs = setAttribute(attrs, 'id', callId);
  return { start: raw.anchor.start, end: raw.anchor.end, text: openTag('a', attrs) };
}

/**
 * Insert markup at the end of a chapter: before </body> when there is one
 */
export function appendToChapter(markup: string, addition: string): Edit {
  const bodyClose = markup.search(/<\/body\s*>/i);
  const at = bodyClose >= 0 ? bodyClose : markup.length;
  return { start: at, end: at, text: `${addition}\n` };
}

/**
 * Wrap body markup in a standalone XHTML document
 */
export function renderPage(title: string, body: string, stylesheet: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<!DOCTYPE html>
<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops">
<head>
  <meta charset="UTF-8"/>
  <title>${escapeHtml(title)}</title>
  <link rel="stylesheet" type="text/css" href="${escapeHtml(stylesheet)}"/>
</head>
<body>
${body}
</body>
</html>
`;
}
