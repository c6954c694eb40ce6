import * as test from 'node:test';
import * as assert from 'node:assert';
import request from 'supertest';
import { createApp, ServedContent } from '../server.js';
import { resolveConfig } from '../config.js';
import { resolveDocument } from '../engine.js';
import { parseChunks } from '../routes/api.js';
import { RequestError } from '../errors.js';
import { Chunk } from '../types.js';

const { describe, it } = test;

function createTestApp() {
  const chunks: Chunk[] = [
    { markup: '<h1 id="intro">Intro</h1><p>A<!-- XE "Cats" --></p>', fileName: 'ch1.xhtml' },
    { markup: '<h2>Results</h2>', fileName: 'ch2.xhtml' }
  ];
  const config = resolveConfig();
  const data: ServedContent = {
    load: { chunks, sources: new Map(), errors: [] },
    result: resolveDocument(chunks, config),
    config
  };
  return createApp(data, { logRequests: false });
}

describe('parseChunks', () => {

  it('should accept well-formed chunks', () => {
    assert.deepStrictEqual(
      parseChunks([{ markup: '<p/>', fileName: 'a.xhtml', chapterTitle: 'A' }]),
      [{ markup: '<p/>', fileName: 'a.xhtml', chapterTitle: 'A' }]
    );
  });

  it('should reject malformed chunk lists', () => {
    assert.throws(() => parseChunks([]), RequestError);
    assert.throws(() => parseChunks({ markup: '' }), RequestError);
    assert.throws(() => parseChunks([{ markup: '<p/>' }]), RequestError);
    assert.throws(() => parseChunks([{ markup: '<p/>', fileName: 'a.xhtml', chapterTitle: 3 }]), RequestError);
    assert.throws(
      () => parseChunks([{ markup: '', fileName: 'a.xhtml' }, { markup: '', fileName: 'a.xhtml' }]),
      (err: unknown) => err instanceof RequestError && err.message === 'chunks[1].fileName "a.xhtml" is repeated'
    );
  });
});

describe('GET routes', () => {
  const app = createTestApp();

  it('should report health', async () => {
    const res = await request(app).get('/health');

    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(res.body, { status: 'ok', documents: 2, pages: 1, targets: 3, run: 'completed' });
  });

  it('should list documents and serve their markup', async () => {
    const list = await request(app).get('/api/documents');
    assert.deepStrictEqual(list.body, [
      { fileName: 'ch1.xhtml', chapterTitle: 'Chapter 1' },
      { fileName: 'ch2.xhtml', chapterTitle: 'Chapter 2' }
    ]);

    const doc = await request(app).get('/api/document/ch2.xhtml').buffer(true);
    assert.strictEqual(doc.status, 200);
    assert.match(doc.headers['content-type'], /^application\/xhtml\+xml/);
    assert.strictEqual(doc.text, '<h2 id="ref-heading-results">Results</h2>');
  });

  it('should return 404 for unknown documents and pages', async () => {
    assert.strictEqual((await request(app).get('/api/document/missing.xhtml')).status, 404);
    assert.strictEqual((await request(app).get('/api/page/missing.xhtml')).status, 404);
  });

  it('should list and serve generated pages', async () => {
    const list = await request(app).get('/api/pages');
    assert.deepStrictEqual(list.body, [{ fileName: 'index.xhtml', title: 'Index' }]);

    const page = await request(app).get('/api/page/index.xhtml').buffer(true);
    assert.strictEqual(page.status, 200);
    assert.ok(page.text.includes('<a href="ch1.xhtml#ref-index-cats" class="index-occurrence">1</a>'));
  });

  it('should filter anchors by kind', async () => {
    const res = await request(app).get('/api/anchors?kind=heading');

    assert.deepStrictEqual(res.body, [
      { id: 'intro', title: 'Intro', kind: 'heading', file: 'ch1.xhtml', number: '', level: 1 },
      { id: 'ref-heading-results', title: 'Results', kind: 'heading', file: 'ch2.xhtml', number: '', level: 2 }
    ]);
  });

  it('should limit anchors', async () => {
    const res = await request(app).get('/api/anchors?limit=1');

    assert.strictEqual(res.body.length, 1);
    assert.strictEqual(res.body[0].id, 'intro');
  });

  it('should reject unknown anchor kinds', async () => {
    const res = await request(app).get('/api/anchors?kind=chapter');

    assert.strictEqual(res.status, 400);
    assert.strictEqual(res.body.error, 'Unknown anchor kind: chapter');
  });

  it('should look up one anchor', async () => {
    const found = await request(app).get('/api/anchor/ref-index-cats');
    assert.strictEqual(found.status, 200);
    assert.strictEqual(found.body.kind, 'indexterm');

    assert.strictEqual((await request(app).get('/api/anchor/toString')).status, 404);
  });

  it('should serve the report', async () => {
    const res = await request(app).get('/api/report');

    assert.strictEqual(res.body.status, 'completed');
    assert.strictEqual(res.body.stats.targetsByKind.heading, 2);
    assert.strictEqual(res.body.stats.indexEntries, 1);
  });

  it('should answer unknown routes with JSON', async () => {
    const res = await request(app).get('/nowhere');

    assert.strictEqual(res.status, 404);
    assert.deepStrictEqual(res.body, { error: 'Not found' });
  });
});

describe('POST /api/resolve', () => {
  const app = createTestApp();

  it('should resolve posted chunks with posted options', async () => {
    const res = await request(app)
      .post('/api/resolve')
      .send({ chunks: [{ markup: '<h1>Hi</h1>', fileName: 'a.xhtml' }], config: { id_prefix: 'doc' } });

    assert.strictEqual(res.status, 200);
    assert.strictEqual(res.body.chunks[0].markup, '<h1 id="doc-heading-hi">Hi</h1>');
    assert.strictEqual(res.body.report.status, 'completed');
  });

  it('should not change the served content', async () => {
    await request(app).post('/api/resolve').send({ chunks: [{ markup: '<h1>Other</h1>', fileName: 'ch1.xhtml' }] });
    const res = await request(app).get('/api/documents');

    assert.strictEqual(res.body.length, 2);
  });

  it('should reject invalid chunks and options', async () => {
    const noChunks = await request(app).post('/api/resolve').send({ chunks: [] });
    assert.strictEqual(noChunks.status, 400);
    assert.strictEqual(noChunks.body.error, '"chunks" must be a non-empty array');

    const badConfig = await request(app)
      .post('/api/resolve')
      .send({ chunks: [{ markup: '', fileName: 'a.xhtml' }], config: { max_toc_depth: 'deep' } });
    assert.strictEqual(badConfig.status, 400);
    assert.strictEqual(badConfig.body.error, 'max_toc_depth must be a number');

    const outOfRange = await request(app)
      .post('/api/resolve')
      .send({ chunks: [{ markup: '', fileName: 'a.xhtml' }], config: { maxTocDepth: 0 } });
    assert.strictEqual(outOfRange.status, 400);
  });

  it('should reject a body that is not an object', async () => {
    const res = await request(app).post('/api/resolve').send([1, 2]);

    assert.strictEqual(res.status, 400);
    assert.strictEqual(res.body.error, 'Request body must be a JSON object');
  });
});
