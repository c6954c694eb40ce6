import * as test from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as url from 'node:url';
import { scanChunk } from '../scanner.js';

const { describe, it } = test;
const __dirname = path.dirname(url.fileURLToPath(import.meta.url));

const fixture = fs.readFileSync(path.join(__dirname, 'fixtures', 'chapter-one.xhtml'), 'utf-8');

describe('scanChunk', () => {
  const result = scanChunk(fixture, 'ch1.xhtml');

  it('should find targets in offset order', () => {
    assert.deepStrictEqual(
      result.targets.map(t => [t.kind, t.title, t.originalId]),
      [
        ['heading', 'Introduction', 'intro'],
        ['heading', 'Methods & Tools', undefined],
        ['figure', 'Growth chart', 'fig-a'],
        ['figure', 'Logo', undefined],
        ['table', 'Totals', undefined],
        ['bookmark', 'Marked', 'mark1']
      ]
    );
  });

  it('should record heading levels', () => {
    assert.deepStrictEqual(result.targets.filter(t => t.kind === 'heading').map(t => t.level), [1, 2]);
  });

  it('should skip markup inside comments', () => {
    assert.ok(!result.targets.some(t => t.title === 'Hidden'));
  });

  it('should find references in all three forms', () => {
    assert.deepStrictEqual(
      result.references.map(r => [r.form, r.targetKey, r.displayText]),
      [
        ['link', 'methods', 'the methods'],
        ['span', 'Results', 'results'],
        ['comment', 'Appendix', 'the appendix']
      ]
    );
  });

  it('should find index markers', () => {
    assert.deepStrictEqual(
      result.indexMarkers.map(m => [m.form, m.entryText]),
      [
        ['comment', 'Programming:syntax'],
        ['span', 'Cats; see Felines'],
        ['empty-element', 'Dogs']
      ]
    );
  });

  it('should find note calls and bodies', () => {
    assert.strictEqual(result.noteCalls.length, 1);
    assert.strictEqual(result.noteCalls[0].noteKey, 'fn1');
    assert.strictEqual(result.noteCalls[0].callId, 'c1');
    assert.strictEqual(result.noteCalls[0].text, '1');

    assert.strictEqual(result.noteBodies.length, 1);
    assert.strictEqual(result.noteBodies[0].kind, 'footnote');
    assert.strictEqual(result.noteBodies[0].noteKey, 'fn1');
    const body = result.noteBodies[0];
    assert.strictEqual(fixture.slice(body.contentStart, body.contentEnd), '<p>A note.</p>');
  });

  it('should not report warnings for well-formed markup', () => {
    assert.deepStrictEqual(result.warnings, []);
  });

  it('should classify endnotes by type, class and id', () => {
    const markup = [
      '<aside epub:type="rearnote" id="n1"><p>One</p></aside>',
      '<div class="endnote" id="n2">Two</div>',
      '<ol><li id="en3">Three</li><li id="footnote-4">Four</li><li id="other">x</li></ol>'
    ].join('\n');
    const { noteBodies } = scanChunk(markup, 'notes.xhtml');

    assert.deepStrictEqual(
      noteBodies.map(b => [b.noteKey, b.kind]),
      [['n1', 'endnote'], ['n2', 'endnote'], ['en3', 'endnote'], ['footnote-4', 'footnote']]
    );
  });

  it('should find note sections and lists holding notes', () => {
    const markup = [
      '<section class="footnotes"><ol><li id="fn1">A</li></ol></section>',
      '<ol><li>Plain</li></ol>',
      '<ol><li id="fn2">B</li></ol>',
      '<div epub:type="endnotes"></div>'
    ].join('\n');
    const { noteContainers } = scanChunk(markup, 'notes.xhtml');

    assert.deepStrictEqual(noteContainers.map(c => [markup.slice(c.position, c.end), c.marked]), [
      ['<section class="footnotes"><ol><li id="fn1">A</li></ol></section>', true],
      ['<ol><li id="fn1">A</li></ol>', false],
      ['<ol><li id="fn2">B</li></ol>', false],
      ['<div epub:type="endnotes"></div>', true]
    ]);
  });

  it('should read a note call marked by epub:type', () => {
    const { noteCalls, references } = scanChunk('<a epub:type="noteref" href="#n1">1</a>', 'a.xhtml');

    assert.strictEqual(noteCalls.length, 1);
    assert.strictEqual(noteCalls[0].callId, undefined);
    assert.deepStrictEqual(references, []);
  });

  it('should ignore links the engine generates', () => {
    const markup = '<a href="#c1" class="note-back-ref">↩</a> <a href="#x" class="index-see">X</a>';
    assert.deepStrictEqual(scanChunk(markup, 'a.xhtml').references, []);
  });

  it('should ignore external links and links inside cross-reference spans', () => {
    const markup = '<a href="http://example.com/#top">web</a> <span class="cross-ref"><a href="#inner">In</a></span>';
    const { references } = scanChunk(markup, 'a.xhtml');

    assert.deepStrictEqual(references.map(r => [r.form, r.targetKey]), [['span', 'In']]);
  });

  it('should report malformed markers and skip them', () => {
    const markup = [
      '<a href="#">empty</a>',
      '<!-- REF never-closed -->',
      '<div class="footnote">no id</div>',
      '<!-- XE "" -->',
      '<span class="cross-ref"></span>'
    ].join('\n');
    const result = scanChunk(markup, 'bad.xhtml');

    assert.strictEqual(result.warnings.length, 5);
    assert.ok(result.warnings.every(w => w.kind === 'MalformedMarker' && w.file === 'bad.xhtml'));
    assert.deepStrictEqual(result.references, []);
    assert.deepStrictEqual(result.noteBodies, []);
    assert.deepStrictEqual(result.indexMarkers, []);
  });
});
