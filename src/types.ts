/**
 * Kinds of addressable elements.
 */
export type AnchorKind =
  | 'heading'
  | 'figure'
  | 'table'
  | 'bookmark'
  | 'footnote'
  | 'endnote'
  | 'indexterm';

export const ANCHOR_KINDS: readonly AnchorKind[] = [
  'heading',
  'figure',
  'table',
  'bookmark',
  'footnote',
  'endnote',
  'indexterm'
];

export type NoteKind = 'footnote' | 'endnote';

/**
 * An addressable element with its final identifier.
 */
export interface AnchorTarget {
  /** Final, globally unique id */
  id: string;

  /** Author-supplied id, if the markup carried one */
  originalId?: string;

  kind: AnchorKind;

  /** Display title (caption, heading text, note key) */
  title: string;

  /** Tag-stripped text of the element */
  plainText: string;

  /** Output file that owns the element */
  file: string;

  /** Offset within the original chunk; local disambiguation only */
  position: number;

  /** Heading depth (1-6), 0 for non-headings */
  level: number;

  /** Sequence label such as "Figure 3" */
  number?: string;
}

/**
 * A symbolic link from running text to a target.
 */
export interface ReferenceCall {
  /** Id of the call site itself */
  id: string;

  /** Raw key as authored */
  targetKey: string;

  /** File the call lives in */
  file: string;

  /** File the call renders in (differs when it sits in a relocated note) */
  effectiveFile: string;

  position: number;

  displayText: string;

  /** Set once by the resolver */
  resolvedHref?: string;

  /** Set once by the resolver */
  broken: boolean;

  /** Target id, when resolved */
  targetId?: string;
}

/**
 * Where an index term was marked in the text.
 */
export interface IndexOccurrence {
  file: string;
  anchorId: string;
  position: number;
  /** Marked with ** in the entry text */
  primary: boolean;
}

/**
 * One node of the index tree. Entries live in an arena keyed by `key`;
 * `parentKey` and `childKeys` are lookups into that arena.
 */
export interface IndexEntry {
  /** Arena key: normalized path segments joined by KEY_SEPARATOR */
  key: string;

  /** Display text, untouched by normalization */
  text: string;

  /** Normalized, diacritic- and article-stripped ordering key */
  sortKey: string;

  /** Alphabetical section: uppercase first letter of sortKey, or '#' */
  group: string;

  /** 0 for main entries */
  depth: number;

  parentKey?: string;

  childKeys: string[];

  occurrences: IndexOccurrence[];

  emphasis: boolean;

  /** Raw "see" targets as authored */
  seeRefs: string[];

  /** Raw "see also" targets as authored */
  seeAlsoRefs: string[];

  /** Keys of entries the "see" targets resolved to */
  resolvedSee: string[];

  /** Keys of entries the "see also" targets resolved to */
  resolvedSeeAlso: string[];
}

export const KEY_SEPARATOR = '\u001f';

export type NotePlacement = 'inline' | 'consolidated' | 'linked';

export type NumberingStyle = 'numeric' | 'roman' | 'alpha';

/**
 * A footnote or endnote call site.
 */
export interface NoteCall {
  /** Id of the call site (used by back-references) */
  id: string;

  /** Note id as authored in the href */
  noteKey: string;

  file: string;

  position: number;

  /** Superscript text of the call */
  text: string;

  /** Final note id, when the note exists */
  noteId?: string;

  /** Href to the note's final location */
  resolvedHref?: string;
}

/**
 * A footnote or endnote body.
 */
export interface Note {
  /** Final id (registered in the anchor registry) */
  id: string;

  /** Id as authored */
  originalId: string;

  kind: NoteKind;

  /** Sequence number within its kind (and chapter, when restarted) */
  number: number;

  /** Inner markup; back-references are appended during routing */
  content: string;

  plainText: string;

  /** Chapter file that held the body */
  originalFile: string;

  /** File the body renders in */
  targetFile: string;

  /** Call sites citing this note, in document order */
  calls: NoteCall[];
}

/**
 * An opening tag located in a chunk.
 */
export interface TagSpan {
  /** Offset of '<' */
  start: number;
  /** Offset just past '>' */
  end: number;
  /** Lower-cased tag name */
  name: string;
  /** Raw attribute text between the name and '>' */
  attrs: string;
}

export interface RawTarget {
  kind: Exclude<AnchorKind, 'footnote' | 'endnote' | 'indexterm'>;
  position: number;
  /** Tag that receives the final id */
  tag: TagSpan;
  originalId?: string;
  /** Caption or title text; undefined for uncaptioned figures and tables */
  title?: string;
  plainText: string;
  level: number;
}

export type ReferenceForm = 'link' | 'span' | 'comment';

export interface RawReference {
  form: ReferenceForm;
  position: number;
  /** Opening tag or comment */
  open: { start: number; end: number; attrs: string };
  /** Closing tag or comment; absent for 'link', whose closing tag is kept */
  close?: { start: number; end: number };
  targetKey: string;
  displayText: string;
  callId?: string;
}

export type IndexMarkerForm = 'comment' | 'span' | 'element' | 'empty-element';

export interface RawIndexMarker {
  form: IndexMarkerForm;
  position: number;
  open: { start: number; end: number; attrs: string };
  close?: { start: number; end: number };
  entryText: string;
}

export interface RawNoteCall {
  position: number;
  /** The <a> that receives id and href */
  anchor: TagSpan;
  noteKey: string;
  callId?: string;
  text: string;
}

export interface RawNoteBody {
  kind: NoteKind;
  position: number;
  /** Offset just past the closing tag */
  end: number;
  tag: TagSpan;
  contentStart: number;
  contentEnd: number;
  noteKey: string;
}

/**
 * Element that groups note bodies: a footnotes/endnotes section, or a bare
 * list holding note items.
 */
export interface RawNoteContainer {
  position: number;
  end: number;
  contentStart: number;
  contentEnd: number;
  /** Marked by class or epub:type; false for a bare list */
  marked: boolean;
}

export type DiagnosticKind =
  | 'MalformedMarker'
  | 'BrokenReference'
  | 'IdCollisionExhausted'
  | 'InconsistentHierarchy';

export interface Diagnostic {
  kind: DiagnosticKind;
  file?: string;
  message: string;
}

/**
 * Everything the scanner found in one chunk, each list in offset order.
 */
export interface ScanResult {
  file: string;
  targets: RawTarget[];
  references: RawReference[];
  indexMarkers: RawIndexMarker[];
  noteCalls: RawNoteCall[];
  noteBodies: RawNoteBody[];
  noteContainers: RawNoteContainer[];
  warnings: Diagnostic[];
}

/**
 * One input chunk produced by the content splitter.
 */
export interface Chunk {
  markup: string;
  fileName: string;
  chapterTitle?: string;
}

/**
 * A standalone page produced by the engine.
 */
export interface GeneratedPage {
  fileName: string;
  title: string;
  markup: string;
}

export interface ResolutionStats {
  targetsByKind: Record<AnchorKind, number>;
  referencesFound: number;
  referencesResolved: number;
  referencesBroken: number;
  collisionsResolved: number;
  crossReferencesResolved: number;
  crossReferencesUnresolved: number;
  indexEntries: number;
  indexOccurrences: number;
  indexEntriesTruncated: number;
  noteCallsFound: number;
  noteCallsBroken: number;
  backRefsGenerated: number;
  malformedMarkers: number;
}

export type RunStatus = 'completed' | 'completed-with-broken-refs';

export interface BrokenReferenceReport {
  id: string;
  file: string;
  targetKey: string;
  displayText: string;
}

export interface UnresolvedCrossReference {
  entry: string;
  target: string;
  relation: 'see' | 'see-also';
}

export interface ResolutionReport {
  status: RunStatus;
  stats: ResolutionStats;
  warnings: Diagnostic[];
  errors: Diagnostic[];
  brokenReferences: BrokenReferenceReport[];
  unresolvedCrossReferences: UnresolvedCrossReference[];
}

export interface ManifestEntry {
  title: string;
  kind: AnchorKind;
  file: string;
  number: string;
  level: number;
}

/**
 * Output of one resolution run.
 */
export interface ResolutionResult {
  /** Input files in input order, markup rewritten */
  chunks: Chunk[];
  pages: GeneratedPage[];
  report: ResolutionReport;
  /** Final id -> owning file */
  targetMapping: Record<string, string>;
  manifest: Record<string, ManifestEntry>;
  references: ReferenceCall[];
  notes: Note[];
}
