import fs from 'fs-extra';
import * as path from 'node:path';
import { marked } from 'marked';
import { Chunk, ResolutionResult } from './types.js';
import { findElements, stripTags } from './html.js';
import { renderPage } from './rewriter.js';

/**
 * Options for loading chapter files
 */
export interface LoadOptions {
  /** Directory to scan for chapter files */
  contentDir: string;
  /** Whether to include _* files (default: false) */
  includeMetadata?: boolean;
  /** Stylesheet linked from chapters converted from Markdown */
  stylesheet?: string;
}

/**
 * Result of loading all chapter files
 */
export interface LoadResult {
  /** Chapters in file name order */
  chunks: Chunk[];
  /** Chunk file name -> path it was read from */
  sources: Map<string, string>;
  /** Any errors encountered during loading */
  errors: string[];
}

const CHAPTER_EXTENSIONS = ['.xhtml', '.html', '.md'];

/**
 * Check if a filename is a metadata file (starts with _)
 */
function isMetadataFile(filename: string): boolean {
  return path.basename(filename).startsWith('_');
}

/**
 * Find all chapter files in a directory (non-recursive), sorted by name
 */
function findChapterFiles(dir: string, includeMetadata: boolean): string[] {
  const files: string[] = [];

  const entries = fs.readdirSync(dir, { withFileTypes: true });
  for (const entry of entries) {
    if (!entry.isFile() || !CHAPTER_EXTENSIONS.includes(path.extname(entry.name).toLowerCase())) {
      continue;
    }
    if (includeMetadata || !isMetadataFile(entry.name)) {
      files.push(entry.name);
    }
  }

  return files.sort().map(name => path.join(dir, name));
}

/**
 * Text of the first <h1>, if any
 */
export function chapterTitleOf(markup: string): string | undefined {
  for (const heading of findElements(markup, 'h1')) {
    const text = stripTags(markup.slice(heading.contentStart, heading.contentEnd));
    if (text) return text;
  }
  return undefined;
}

/**
 * Convert a Markdown chapter into a standalone XHTML document
 */
export function markdownToXhtml(markdown: string, stylesheet: string): string {
  marked.setOptions({
    gfm: true,
    breaks: false
  });
  const body = marked.parse(markdown) as string;
  return renderPage(chapterTitleOf(body) ?? '', body.trim(), stylesheet);
}

/**
 * Load chapter files from a directory as chunks. Markdown chapters are
 * converted to XHTML and renamed to .xhtml.
 */
export function loadChunks(options: LoadOptions): LoadResult {
  const { contentDir, includeMetadata = false, stylesheet = 'styles.css' } = options;

  const chunks: Chunk[] = [];
  const sources = new Map<string, string>();
  const errors: string[] = [];

  let files: string[];
  try {
    files = findChapterFiles(contentDir, includeMetadata);
  } catch (err) {
    errors.push(`Cannot read directory ${contentDir}: ${err instanceof Error ? err.message : String(err)}`);
    return { chunks, sources, errors };
  }

  for (const filePath of files) {
    const baseName = path.basename(filePath);
    const isMarkdown = path.extname(baseName).toLowerCase() === '.md';
    const fileName = isMarkdown ? baseName.replace(/\.md$/i, '.xhtml') : baseName;

    if (sources.has(fileName)) {
      errors.push(`${baseName}: output name ${fileName} is already taken by ${path.basename(sources.get(fileName) ?? '')}`);
      continue;
    }

    try {
      const content = fs.readFileSync(filePath, 'utf-8');
      const markup = isMarkdown ? markdownToXhtml(content, stylesheet) : content;
      chunks.push({ markup, fileName, chapterTitle: chapterTitleOf(markup) });
      sources.set(fileName, filePath);
    } catch (err) {
      errors.push(`Failed to read ${baseName}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  return { chunks, sources, errors };
}

/**
 * Write rewritten chapters, generated pages and report.json to a directory
 */
export async function writeResult(result: ResolutionResult, outDir: string): Promise<string[]> {
  await fs.ensureDir(outDir);
  const written: string[] = [];

  for (const file of [...result.chunks, ...result.pages]) {
    const target = path.join(outDir, file.fileName);
    await fs.outputFile(target, file.markup, 'utf8');
    written.push(target);
  }

  const reportPath = path.join(outDir, 'report.json');
  await fs.writeJson(reportPath, result.report, { spaces: 2 });
  written.push(reportPath);

  return written;
}
