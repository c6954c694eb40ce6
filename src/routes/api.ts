import { Router, Request, Response } from 'express';
import { ANCHOR_KINDS, AnchorKind, Chunk } from '../types.js';
import { ConfigInput, parseConfigObject } from '../config.js';
import { ConfigError, RequestError } from '../errors.js';
import { resolveDocument } from '../engine.js';
import type { ServedContent } from '../server.js';

function isAnchorKind(value: string): value is AnchorKind {
  return ANCHOR_KINDS.some(kind => kind === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Validate a POSTed chunk list
 */
export function parseChunks(raw: unknown): Chunk[] {
  if (!Array.isArray(raw) || raw.length === 0) {
    throw new RequestError('"chunks" must be a non-empty array');
  }
  const names = new Set<string>();
  return raw.map((item: unknown, i) => {
    if (!isRecord(item) || typeof item.markup !== 'string' || typeof item.fileName !== 'string' || !item.fileName) {
      throw new RequestError(`chunks[${i}] must have string "markup" and "fileName"`);
    }
    if (item.chapterTitle !== undefined && typeof item.chapterTitle !== 'string') {
      throw new RequestError(`chunks[${i}].chapterTitle must be a string`);
    }
    if (names.has(item.fileName)) {
      throw new RequestError(`chunks[${i}].fileName "${item.fileName}" is repeated`);
    }
    names.add(item.fileName);
    return { markup: item.markup, fileName: item.fileName, chapterTitle: item.chapterTitle };
  });
}

/**
 * Create API routes for resolved content
 */
export function createApiRoutes(data: ServedContent): Router {
  const router = Router();
  const { result } = data;

  /**
   * GET /api/documents
   * List rewritten chapters in input order
   */
  router.get('/documents', (_req: Request, res: Response) => {
    res.json(result.chunks.map(c => ({ fileName: c.fileName, chapterTitle: c.chapterTitle })));
  });

  /**
   * GET /api/document/:file
   * Rewritten markup of one chapter
   */
  router.get('/document/:file', (req: Request, res: Response) => {
    const { file } = req.params;
    const chunk = result.chunks.find(c => c.fileName === file);

    if (!chunk) {
      res.status(404).json({ error: `Document not found: ${file}` });
      return;
    }

    res.type('application/xhtml+xml').send(chunk.markup);
  });

  /**
   * GET /api/pages
   * List generated pages (index, consolidated notes)
   */
  router.get('/pages', (_req: Request, res: Response) => {
    res.json(result.pages.map(p => ({ fileName: p.fileName, title: p.title })));
  });

  /**
   * GET /api/page/:file
   */
  router.get('/page/:file', (req: Request, res: Response) => {
    const { file } = req.params;
    const page = result.pages.find(p => p.fileName === file);

    if (!page) {
      res.status(404).json({ error: `Page not found: ${file}` });
      return;
    }

    res.type('application/xhtml+xml').send(page.markup);
  });

  /**
   * GET /api/anchors
   * List registered targets, optionally filtered by kind
   * Query params: ?kind=heading&limit=10
   */
  router.get('/anchors', (req: Request, res: Response) => {
    const { kind, limit } = req.query;

    let anchors = Object.entries(result.manifest).map(([id, entry]) => ({ id, ...entry }));

    // Filter by kind if specified
    if (kind !== undefined) {
      if (typeof kind !== 'string' || !isAnchorKind(kind)) {
        res.status(400).json({ error: `Unknown anchor kind: ${String(kind)}` });
        return;
      }
      anchors = anchors.filter(a => a.kind === kind);
    }

    // Apply limit
    if (limit && typeof limit === 'string') {
      const n = parseInt(limit, 10);
      if (!isNaN(n) && n > 0) {
        anchors = anchors.slice(0, n);
      }
    }

    res.json(anchors);
  });

  /**
   * GET /api/anchor/:id
   * A single target by final id
   */
  router.get('/anchor/:id', (req: Request, res: Response) => {
    const { id } = req.params;
    const entry = Object.hasOwn(result.manifest, id) ? result.manifest[id] : undefined;

    if (!entry) {
      res.status(404).json({ error: `Anchor not found: ${id}` });
      return;
    }

    res.json({ id, ...entry });
  });

  /**
   * GET /api/report
   * Statistics, warnings and broken references of the run
   */
  router.get('/report', (_req: Request, res: Response) => {
    res.json(result.report);
  });

  /**
   * POST /api/resolve
   * Resolve posted chunks without touching the served content
   * Body: { chunks: [{ markup, fileName, chapterTitle? }], config? }
   */
  router.post('/resolve', (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (!isRecord(body)) {
      res.status(400).json({ error: 'Request body must be a JSON object' });
      return;
    }

    try {
      const chunks = parseChunks(body.chunks);
      const config: ConfigInput = body.config === undefined ? {} : parseConfigObject(body.config);
      res.json(resolveDocument(chunks, config));
    } catch (err) {
      if (err instanceof ConfigError || err instanceof RequestError) {
        res.status(400).json({ error: err.message });
        return;
      }
      throw err;
    }
  });

  return router;
}
