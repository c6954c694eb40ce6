export * from './types.js';
export { resolveDocument } from './engine.js';
export { scanChunk } from './scanner.js';
export { AnchorRegistry, isSafeId, preferFile } from './registry.js';
export type { RegistryOptions, TargetPlacement, FuzzyOptions } from './registry.js';
export { resolveReference, resolveReferences, hrefFor } from './resolver.js';
export type { Resolution, ResolveOptions, ResolveSummary } from './resolver.js';
export {
  IndexBuilder,
  parseEntryText,
  normalizeTerm,
  makeSortKey,
  groupOf,
  renderIndexPage
} from './indexer.js';
export type { ParsedIndexEntry, IndexOptions, IndexSection, IndexPage, IndexPageOptions } from './indexer.js';
export {
  routeNotes,
  linkNotes,
  noteChapterOf,
  numberNotes,
  appendBackReferences,
  formatNoteNumber,
  renderNoteList,
  renderNotesPage
} from './notes.js';
export type { NotesOptions, NotesRouting, ChapterInfo } from './notes.js';
export { applyEdits, renderPage } from './rewriter.js';
export type { Edit } from './rewriter.js';
export { DEFAULT_CONFIG, PRESETS, parseConfigObject, resolveConfig, loadConfig } from './config.js';
export type { EngineConfig, ConfigInput, PresetName } from './config.js';
export { ConfigError, IdCollisionExhaustedError, RegistryFrozenError } from './errors.js';
export { loadChunks, writeResult } from './loader.js';
