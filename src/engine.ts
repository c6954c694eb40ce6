import {
  AnchorKind,
  Chunk,
  Diagnostic,
  GeneratedPage,
  Note,
  NoteCall,
  NotePlacement,
  RawIndexMarker,
  RawNoteBody,
  RawNoteCall,
  RawReference,
  RawTarget,
  ReferenceCall,
  ResolutionReport,
  ResolutionResult,
  ResolutionStats,
  ScanResult
} from './types.js';
import { ConfigInput, EngineConfig, resolveConfig } from './config.js';
import { ConfigError, IdCollisionExhaustedError } from './errors.js';
import { isInside, stripTags } from './html.js';
import { scanChunk } from './scanner.js';
import { AnchorRegistry } from './registry.js';
import { resolveReferences } from './resolver.js';
import { IndexBuilder, parseEntryText, renderIndexPage } from './indexer.js';
import { ChapterInfo, inPlaceAttributes, isRelocated, noteTargetFile, routeNotes } from './notes.js';
import {
  appendToChapter,
  applyEdits,
  Edit,
  indexMarkerEdits,
  noteCallEdit,
  partitionEdits,
  referenceEdits,
  targetEdit
} from './rewriter.js';

type Range = { start: number; end: number };

type MergeItem =
  | { type: 'note-body'; position: number; raw: RawNoteBody }
  | { type: 'target'; position: number; raw: RawTarget }
  | { type: 'index-marker'; position: number; raw: RawIndexMarker }
  | { type: 'reference'; position: number; raw: RawReference }
  | { type: 'note-call'; position: number; raw: RawNoteCall };

// Tie-break for records starting at the same offset
const MERGE_ORDER: Record<MergeItem['type'], number> = {
  'note-body': 0,
  'target': 1,
  'index-marker': 2,
  'reference': 3,
  'note-call': 4
};

/**
 * Everything the run knows about one input file
 */
interface FileState {
  chunk: Chunk;
  chapter: ChapterInfo;
  scan: ScanResult;
  /** Note containers dropped from the chapter, with one trailing line break */
  vacated: Range[];
  /** Target and index marker edits; known once ids are assigned */
  fixedEdits: Edit[];
  references: Array<{ raw: RawReference; call: ReferenceCall }>;
  noteCalls: Array<{ raw: RawNoteCall; call: NoteCall }>;
  bodies: Array<{ raw: RawNoteBody; note: Note }>;
}

function mergeItems(scan: ScanResult): MergeItem[] {
  const items: MergeItem[] = [
    ...scan.noteBodies.map(raw => ({ type: 'note-body' as const, position: raw.position, raw })),
    ...scan.targets.map(raw => ({ type: 'target' as const, position: raw.position, raw })),
    ...scan.indexMarkers.map(raw => ({ type: 'index-marker' as const, position: raw.position, raw })),
    ...scan.references.map(raw => ({ type: 'reference' as const, position: raw.position, raw })),
    ...scan.noteCalls.map(raw => ({ type: 'note-call' as const, position: raw.position, raw }))
  ];
  return items.sort((a, b) => a.position - b.position || MERGE_ORDER[a.type] - MERGE_ORDER[b.type]);
}

/**
 * Note containers that are empty once their note bodies move: every body
 * inside is relocated, and a bare list holds nothing but those bodies.
 * Outermost containers only.
 */
function vacatedContainers(markup: string, scan: ScanResult, placement: NotePlacement): Range[] {
  const vacated = scan.noteContainers.filter(container => {
    const inside = scan.noteBodies.filter(b => b.position >= container.contentStart && b.end <= container.contentEnd);
    if (inside.length === 0 || !inside.every(b => isRelocated(b.kind, placement))) return false;
    if (container.marked) return true;

    let rest = '';
    let at = container.contentStart;
    for (const body of inside) {
      rest += markup.slice(at, body.position);
      at = body.end;
    }
    rest += markup.slice(at, container.contentEnd);
    return rest.trim() === '';
  });

  return vacated
    .filter(c => !vacated.some(other => other !== c && other.position <= c.position && other.end >= c.end))
    .map(c => {
      const lineBreak = /^\r?\n/.exec(markup.slice(c.end, c.end + 2));
      return { start: c.position, end: c.end + (lineBreak ? lineBreak[0].length : 0) };
    });
}

function emptyTargetCounts(): Record<AnchorKind, number> {
  return { heading: 0, figure: 0, table: 0, bookmark: 0, footnote: 0, endnote: 0, indexterm: 0 };
}

/**
 * One resolution run over an ordered set of chunks.
 *
 * Scan (per chunk) -> Merge into the registry (file order, then offset) ->
 * freeze -> Resolve references, index cross-references and notes ->
 * Rewrite each chunk and render generated pages.
 */
class ResolutionRun {
  private readonly registry: AnchorRegistry;
  private readonly index: IndexBuilder;
  private readonly files: FileState[];
  private readonly warnings: Diagnostic[] = [];
  private readonly errors: Diagnostic[] = [];
  private readonly figureCounter = { figure: 0, table: 0 };

  constructor(chunks: Chunk[], private readonly config: EngineConfig) {
    this.registry = new AnchorRegistry({
      idPrefix: config.idPrefix,
      maxIdLength: config.maxIdLength,
      collisionSuffixLength: config.collisionSuffixLength,
      maxCollisionAttempts: config.maxCollisionAttempts
    });
    this.index = new IndexBuilder({
      caseSensitive: config.caseSensitive,
      ignoreArticles: config.ignoreArticles,
      locale: config.locale,
      maxIndexDepth: config.maxIndexDepth
    });

    // Scans share nothing and could run in any order
    this.files = chunks.map((chunk, i) => {
      const scan = scanChunk(chunk.markup, chunk.fileName);
      return {
        chunk,
        chapter: { fileName: chunk.fileName, title: chunk.chapterTitle?.trim() || `Chapter ${i + 1}` },
        scan,
        vacated: vacatedContainers(chunk.markup, scan, config.notePlacement),
        fixedEdits: [],
      references: [],
        noteCalls: [],
        bodies: []
      };
    });
    for (const file of this.files) {
      this.warnings.push(...file.scan.warnings);
    }
  }

  run(): ResolutionResult {
    for (const file of this.files) {
      this.merge(file);
    }
    this.registry.freeze();

    const calls = this.files.flatMap(f => f.references.map(r => r.call));
    const { resolved, broken } = resolveReferences(calls, this.registry, {
      minFuzzyMatchLength: this.config.minFuzzyMatchLength
    });
    for (const call of broken) {
      this.warnings.push({
        kind: 'BrokenReference',
        file: call.file,
        message: `reference "${call.targetKey}" matches no target`
      });
    }

    const crossReferences = this.index.resolveCrossReferences();
    this.warnings.push(...crossReferences.warnings);
    for (const unresolved of crossReferences.unresolved) {
      this.warnings.push({
        kind: 'BrokenReference',
        message: `index entry "${unresolved.entry}" ${unresolved.relation} "${unresolved.target}" matches no entry`
      });
    }

    const notes = this.files.flatMap(f => f.bodies.map(b => b.note));
    const noteCalls = this.files.flatMap(f => f.noteCalls.map(c => c.call));
    const editCache = new Map<FileState, Edit[]>();
    const editsOf = (file: FileState): Edit[] => {
      const cached = editCache.get(file);
      if (cached) return cached;
      const edits = this.editsFor(file);
      editCache.set(file, edits);
      return edits;
    };

    const routing = routeNotes(
      notes,
      noteCalls,
      this.files.map(f => f.chapter),
      {
        placement: this.config.notePlacement,
        generateBackRefs: this.config.generateBackRefs,
        backRefSymbol: this.config.backRefSymbol,
        backRefTitle: this.config.backRefTitle,
        restartNumberingPerChapter: this.config.restartNumberingPerChapter,
        footnoteNumbering: this.config.footnoteNumbering,
        endnoteNumbering: this.config.endnoteNumbering,
        notesFileName: this.config.notesFileName,
        notesPageTitle: this.config.notesPageTitle,
        includeChapterHeadings: this.config.includeChapterHeadings,
        stylesheet: this.config.stylesheet
      },
      note => this.rewriteNoteContent(note, editsOf)
    );
    for (const call of routing.brokenCalls) {
      this.warnings.push({
        kind: 'BrokenReference',
        file: call.file,
        message: `note call "${call.noteKey}" matches no note`
      });
    }

    const chunks = this.files.map(file => ({
      markup: this.rewriteChunk(file, editsOf(file), routing.appendix.get(file.chunk.fileName)),
      fileName: file.chunk.fileName,
      chapterTitle: file.chapter.title
    }));

    const pages: GeneratedPage[] = [];
    if (routing.page) {
      pages.push(routing.page);
    }
    let indexEntriesTruncated = 0;
    if (this.config.generateIndex && this.index.size > 0) {
      const indexPage = renderIndexPage(this.index, {
        title: this.config.indexTitle,
        stylesheet: this.config.stylesheet,
        showLetterHeaders: this.config.showLetterHeaders,
        maxTocDepth: this.config.maxTocDepth,
        maxEntriesPerLetter: this.config.maxEntriesPerLetter
      });
      indexEntriesTruncated = indexPage.truncated;
      pages.push({ fileName: this.config.indexFileName, title: this.config.indexTitle, markup: indexPage.markup });
    }

    const targetsByKind = emptyTargetCounts();
    for (const target of this.registry.targets()) {
      targetsByKind[target.kind]++;
    }

    const stats: ResolutionStats = {
      targetsByKind,
      referencesFound: calls.length,
      referencesResolved: resolved,
      referencesBroken: broken.length,
      collisionsResolved: this.registry.collisionsResolved,
      crossReferencesResolved: crossReferences.resolved,
      crossReferencesUnresolved: crossReferences.unresolved.length,
      indexEntries: this.index.size,
      indexOccurrences: this.index.occurrenceCount,
      indexEntriesTruncated,
      noteCallsFound: noteCalls.length,
      noteCallsBroken: routing.brokenCalls.length,
      backRefsGenerated: routing.backRefsGenerated,
      malformedMarkers: this.warnings.filter(w => w.kind === 'MalformedMarker').length
    };

    const hasBroken = stats.referencesBroken + stats.noteCallsBroken + stats.crossReferencesUnresolved > 0;
    const report: ResolutionReport = {
      status: hasBroken ? 'completed-with-broken-refs' : 'completed',
      stats,
      warnings: this.warnings,
      errors: this.errors,
      brokenReferences: broken.map(call => ({
        id: call.id,
        file: call.file,
        targetKey: call.targetKey,
        displayText: call.displayText
      })),
      unresolvedCrossReferences: crossReferences.unresolved
    };

    return {
      chunks,
      pages,
      report,
      targetMapping: this.registry.targetMapping(),
      manifest: this.registry.manifest(),
      references: calls,
      notes
    };
  }

  /**
   * Run an id allocation; an exhausted collision loop fails only this record.
   */
  private allocate(file: string, allocation: () => string): string | undefined {
    try {
      return allocation();
    } catch (err) {
      if (err instanceof IdCollisionExhaustedError) {
        this.errors.push({ kind: 'IdCollisionExhausted', file, message: err.message });
        return undefined;
      }
      throw err;
    }
  }

  private merge(file: FileState): void {
    const fileName = file.chunk.fileName;
    const markup = file.chunk.markup;
    const { notePlacement, notesFileName } = this.config;

    const relocatedBodies = file.scan.noteBodies.filter(b => isRelocated(b.kind, notePlacement));
    // Records inside a body that moves to another file render in that file
    const effectiveFile = (position: number): string =>
      relocatedBodies.some(b => position > b.position && position < b.end)
        ? noteTargetFile(fileName, { placement: notePlacement, notesFileName })
        : fileName;

    // Everything in an emptied container but its notes is dropped
    const dropped = (position: number): boolean =>
      file.vacated.some(r => position >= r.start && position < r.end)
      && !file.scan.noteBodies.some(b => position > b.position && position < b.end);

    for (const item of mergeItems(file.scan)) {
      if (item.type !== 'note-body' && dropped(item.position)) continue;
      switch (item.type) {
        case 'note-body': {
          const raw = item.raw;
          const targetFile = isRelocated(raw.kind, notePlacement)
            ? noteTargetFile(fileName, { placement: notePlacement, notesFileName })
            : fileName;
          const content = markup.slice(raw.contentStart, raw.contentEnd);
          const plainText = stripTags(content);
          const id = this.allocate(fileName, () => this.registry.register(raw.noteKey, raw.kind, plainText || raw.noteKey, {
            title: raw.noteKey,
            plainText,
            file: targetFile,
            position: raw.position
          }));
          if (id === undefined) break;
          file.bodies.push({
            raw,
            note: {
              id,
              originalId: raw.noteKey,
              kind: raw.kind,
              number: 0,
              content,
              plainText,
              originalFile: fileName,
              targetFile,
              calls: []
            }
          });
          break;
        }

        case 'target': {
          const raw = item.raw;
          let number: string | undefined;
          if (raw.kind === 'figure' || raw.kind === 'table') {
            this.figureCounter[raw.kind]++;
            number = `${raw.kind === 'figure' ? 'Figure' : 'Table'} ${this.figureCounter[raw.kind]}`;
          }
          const title = raw.title ?? number ?? raw.plainText;
          const id = this.allocate(fileName, () => this.registry.register(raw.originalId, raw.kind, title, {
            title,
            plainText: raw.plainText,
            file: effectiveFile(raw.position),
            position: raw.position,
            level: raw.level,
            number
          }));
          if (id !== undefined) {
            file.fixedEdits.push(targetEdit(raw, id));
          }
          break;
        }

        case 'index-marker': {
          const raw = item.raw;
          const parsed = parseEntryText(raw.entryText);
          if (!parsed) {
            this.warnings.push({
              kind: 'MalformedMarker',
              file: fileName,
              message: `index entry "${raw.entryText}" has no term`
            });
            break;
          }
          const occurrenceFile = effectiveFile(raw.position);
          const anchorId = this.allocate(fileName, () => this.registry.register(undefined, 'indexterm', parsed.path.join(' '), {
            title: parsed.path.join(': '),
            plainText: parsed.path.join(' '),
            file: occurrenceFile,
            position: raw.position
          }));
          if (anchorId === undefined) break;
          file.fixedEdits.push(...indexMarkerEdits(raw, anchorId));
          this.warnings.push(...this.index.add(parsed, { file: occurrenceFile, anchorId, position: raw.position }));
          break;
        }

        case 'reference': {
          const raw = item.raw;
          const id = this.allocate(fileName, () =>
            this.registry.claim(raw.callId, 'xref', raw.displayText || raw.targetKey));
          if (id === undefined) break;
          file.references.push({
            raw,
            call: {
              id,
              targetKey: raw.targetKey,
              file: fileName,
              effectiveFile: effectiveFile(raw.position),
              position: raw.position,
              displayText: raw.displayText,
              broken: false
            }
          });
          break;
        }

        case 'note-call': {
          const raw = item.raw;
          const id = this.allocate(fileName, () => this.registry.claim(raw.callId, 'noteref', raw.noteKey));
          if (id === undefined) break;
          file.noteCalls.push({
            raw,
            call: {
              id,
              noteKey: raw.noteKey,
              file: effectiveFile(raw.position),
              position: raw.position,
              text: raw.text
            }
          });
          break;
        }
      }
    }
  }

  /**
   * All edits of a file's original markup; valid once references are
   * resolved and note calls linked.
   */
  private editsFor(file: FileState): Edit[] {
    const edits = [...file.fixedEdits];
    for (const { raw, call } of file.references) {
      edits.push(...referenceEdits(raw, call));
    }
    for (const { raw, call } of file.noteCalls) {
      if (call.resolvedHref !== undefined) {
        edits.push(noteCallEdit(raw, call.id, call.resolvedHref));
      }
    }
    return edits;
  }

  private reportDropped(fileName: string, dropped: Edit[]): void {
    for (const edit of dropped) {
      this.warnings.push({
        kind: 'MalformedMarker',
        file: fileName,
        message: `overlapping markers at offset ${edit.start}; edit skipped`
      });
    }
  }

  private rewriteNoteContent(note: Note, editsOf: (file: FileState) => Edit[]): string {
    for (const file of this.files) {
      const body = file.bodies.find(b => b.note === note);
      if (!body) continue;
      const { inside } = partitionEdits(editsOf(file), body.raw.contentStart, body.raw.contentEnd);
      const content = file.chunk.markup.slice(body.raw.contentStart, body.raw.contentEnd);
      const { markup, dropped } = applyEdits(content, inside, body.raw.contentStart);
      this.reportDropped(file.chunk.fileName, dropped);
      return markup;
    }
    return note.content;
  }

  private rewriteChunk(file: FileState, fileEdits: Edit[], appendix?: string): string {
    const markup = file.chunk.markup;
    let edits = [...fileEdits];

    for (const { raw, note } of file.bodies) {
      // Inner edits already went into note.content
      edits = partitionEdits(edits, raw.position, raw.end).outside;
      if (isInside(raw.position, raw.end, file.vacated)) continue;
      if (isRelocated(note.kind, this.config.notePlacement)) {
        edits.push({ start: raw.position, end: raw.end, text: '' });
      } else {
        const attrs = inPlaceAttributes(raw.tag.attrs, note, {
          placement: this.config.notePlacement,
          footnoteNumbering: this.config.footnoteNumbering,
          endnoteNumbering: this.config.endnoteNumbering
        });
        const close = markup.slice(raw.contentEnd, raw.end);
        edits.push({ start: raw.position, end: raw.end, text: `<${raw.tag.name}${attrs}>${note.content}${close}` });
      }
    }

    file.vacated.forEach((range, i) => {
      edits = partitionEdits(edits, range.start, range.end).outside;
      // The regenerated footnote section takes the place of the first one
      const text = i === 0 && appendix ? `${appendix}\n` : '';
      edits.push({ start: range.start, end: range.end, text });
    });

    if (appendix && file.vacated.length === 0) {
      edits.push(appendToChapter(markup, appendix));
    }

    const { markup: rewritten, dropped } = applyEdits(markup, edits);
    this.reportDropped(file.chunk.fileName, dropped);
    return rewritten;
  }
}

/**
 * Assign ids, resolve references, build the index and route notes for an
 * ordered set of chunks. Throws ConfigError for invalid configuration or
 * repeated file names; every other problem is reported in the result.
 */
export function resolveDocument(chunks: Chunk[], input: ConfigInput = {}): ResolutionResult {
  const config = resolveConfig(input);
  const seen = new Set<string>();
  for (const chunk of chunks) {
    if (seen.has(chunk.fileName)) {
      throw new ConfigError(`Chunk file name "${chunk.fileName}" is repeated`, 'fileName');
    }
    seen.add(chunk.fileName);
  }
  return new ResolutionRun(chunks, config).run();
}
