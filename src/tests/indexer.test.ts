import * as test from 'node:test';
import * as assert from 'node:assert';
import {
  groupOf,
  IndexBuilder,
  IndexOptions,
  makeSortKey,
  normalizeTerm,
  parseEntryText,
  ParsedIndexEntry,
  renderIndexPage
} from '../indexer.js';

const { describe, it } = test;

const OPTIONS: IndexOptions = {
  caseSensitive: false,
  ignoreArticles: ['a', 'an', 'the'],
  locale: 'en-US',
  maxIndexDepth: 3
};

const PAGE = {
  title: 'Index',
  stylesheet: 'styles.css',
  showLetterHeaders: true,
  maxTocDepth: 3,
  maxEntriesPerLetter: 1000
};

function parsed(text: string): ParsedIndexEntry {
  const entry = parseEntryText(text);
  assert.ok(entry, `"${text}" should parse`);
  return entry;
}

function build(markers: Array<[string, string]>, options: IndexOptions = OPTIONS): IndexBuilder {
  const builder = new IndexBuilder(options);
  markers.forEach(([text, anchorId], i) => {
    builder.add(parsed(text), { file: 'ch1.xhtml', anchorId, position: i * 10 });
  });
  return builder;
}

describe('parseEntryText', () => {

  it('should split main term and sub-terms', () => {
    assert.deepStrictEqual(parseEntryText('Programming:syntax'), {
      path: ['Programming', 'syntax'],
      seeRefs: [],
      seeAlsoRefs: [],
      emphasis: false,
      primary: false
    });
  });

  it('should extract see clauses from the display text', () => {
    const entry = parsed('Cats; see Felines');
    assert.deepStrictEqual(entry.path, ['Cats']);
    assert.deepStrictEqual(entry.seeRefs, ['Felines']);
  });

  it('should extract see also clauses before see clauses', () => {
    const entry = parsed('Animals: see also Pets, Zoology');
    assert.deepStrictEqual(entry.path, ['Animals']);
    assert.deepStrictEqual(entry.seeAlsoRefs, ['Pets', 'Zoology']);
    assert.deepStrictEqual(entry.seeRefs, []);
  });

  it('should read primary and emphasis markers', () => {
    assert.ok(parsed('**Core**').primary);
    assert.ok(!parsed('**Core**').emphasis);
    assert.deepStrictEqual(parsed('**Core**').path, ['Core']);

    const emphasized = parsed('*Lambda*');
    assert.ok(emphasized.emphasis);
    assert.deepStrictEqual(emphasized.path, ['Lambda']);
  });

  it('should not take words starting with "see" for clauses', () => {
    assert.deepStrictEqual(parsed('Seeds of change').path, ['Seeds of change']);
  });

  it('should return null when no term is left', () => {
    assert.strictEqual(parseEntryText('see Felines'), null);
    assert.strictEqual(parseEntryText(' : '), null);
  });
});

describe('normalization', () => {

  it('should fold case and strip leading articles for grouping', () => {
    assert.strictEqual(normalizeTerm('The  Beatles', OPTIONS), 'beatles');
    assert.strictEqual(normalizeTerm('Theory', OPTIONS), 'theory');
    assert.strictEqual(normalizeTerm('The Beatles', { ...OPTIONS, caseSensitive: true }), 'Beatles');
  });

  it('should strip diacritics for sort keys only', () => {
    assert.strictEqual(makeSortKey('Émile Zola', ['the']), 'emile zola');
    assert.strictEqual(makeSortKey('The Éclair', ['the']), 'eclair');
  });

  it('should group by first letter, folding the rest to #', () => {
    assert.strictEqual(groupOf('emile'), 'E');
    assert.strictEqual(groupOf('3d printing'), '#');
    assert.strictEqual(groupOf('"quoted"'), '#');
    assert.strictEqual(groupOf(''), '#');
  });

  it('should derive the same group from a group letter', () => {
    for (const term of ['Émile', 'zebra', 'The Apple', '42', 'ørsted', 'straße']) {
      const group = groupOf(makeSortKey(term, OPTIONS.ignoreArticles));
      assert.strictEqual(groupOf(makeSortKey(group, OPTIONS.ignoreArticles)), group, term);
    }
  });
});

describe('IndexBuilder', () => {

  it('should nest sub-entries under one main entry', () => {
    const builder = build([
      ['Programming', 'a1'],
      ['Programming:syntax', 'a2'],
      ['Programming:semantics', 'a3']
    ]);

    const entries = builder.entries();
    assert.strictEqual(entries.length, 1);
    assert.strictEqual(entries[0].text, 'Programming');
    assert.deepStrictEqual(builder.children(entries[0]).map(e => e.text), ['semantics', 'syntax']);
    assert.strictEqual(builder.size, 3);
  });

  it('should attach occurrences to every entry on the path', () => {
    const builder = build([['Programming', 'a1'], ['Programming:syntax', 'a2']]);
    const main = builder.entries()[0];

    assert.deepStrictEqual(main.occurrences.map(o => o.anchorId), ['a1', 'a2']);
    assert.deepStrictEqual(builder.children(main)[0].occurrences.map(o => o.anchorId), ['a2']);
    assert.strictEqual(builder.occurrenceCount, 2);
  });

  it('should merge terms that normalize alike, keeping the first display text', () => {
    const builder = build([['Python', 'a1'], ['python', 'a2']]);

    assert.strictEqual(builder.entries().length, 1);
    assert.strictEqual(builder.entries()[0].text, 'Python');
    assert.strictEqual(builder.entries()[0].occurrences.length, 2);
  });

  it('should keep case variants apart when case sensitive', () => {
    const builder = build([['Python', 'a1'], ['python', 'a2']], { ...OPTIONS, caseSensitive: true });
    assert.strictEqual(builder.entries().length, 2);
  });

  it('should truncate paths deeper than the limit', () => {
    const builder = new IndexBuilder({ ...OPTIONS, maxIndexDepth: 2 });
    const warnings = builder.add(parsed('A:B:C'), { file: 'ch1.xhtml', anchorId: 'a1', position: 0 });

    assert.strictEqual(warnings.length, 1);
    assert.strictEqual(warnings[0].kind, 'MalformedMarker');
    assert.strictEqual(builder.size, 2);
  });

  it('should resolve see and see also references', () => {
    const builder = build([
      ['Cats; see Felines', 'a1'],
      ['Felines', 'a2'],
      ['Dogs; see also Wolves', 'a3']
    ]);
    const summary = builder.resolveCrossReferences();

    assert.strictEqual(summary.resolved, 1);
    assert.deepStrictEqual(summary.unresolved, [{ entry: 'Dogs', target: 'Wolves', relation: 'see-also' }]);
    assert.deepStrictEqual(builder.get('cats')?.resolvedSee, ['felines']);
    assert.deepStrictEqual(builder.get('dogs')?.resolvedSeeAlso, []);
  });

  it('should report an entry that refers to itself', () => {
    const builder = build([['Loop; see Loop', 'a1']]);
    const summary = builder.resolveCrossReferences();

    assert.strictEqual(summary.resolved, 0);
    assert.strictEqual(summary.unresolved.length, 1);
    assert.strictEqual(summary.warnings[0].kind, 'InconsistentHierarchy');
  });

  it('should section letters in collation order with symbols last', () => {
    const builder = build([
      ['Zebra', 'a1'],
      ['3D printing', 'a2'],
      ['apple', 'a3'],
      ['Éclair', 'a4'],
      ['The Almanac', 'a5']
    ]);

    const sections = builder.sections();
    assert.deepStrictEqual(sections.map(s => s.letter), ['A', 'E', 'Z', '#']);
    assert.deepStrictEqual(sections[0].entries.map(e => e.text), ['The Almanac', 'apple']);
  });
});

describe('renderIndexPage', () => {
  const builder = build([
    ['Programming', 'a1'],
    ['Programming:syntax', 'a2'],
    ['Cats; see Felines', 'a3'],
    ['Felines', 'a4']
  ]);
  builder.resolveCrossReferences();

  it('should render a standalone page with letter sections', () => {
    const { markup, truncated } = renderIndexPage(builder, PAGE);

    assert.ok(markup.startsWith('<?xml version="1.0" encoding="UTF-8"?>'));
    assert.strictEqual(truncated, 0);
    assert.ok(markup.includes('  <div class="index-section" id="index-c">\n    <h2 class="index-letter-header">C</h2>'));
  });

  it('should render occurrence and see links', () => {
    const { markup } = renderIndexPage(builder, PAGE);
    const lines = markup.split('\n');

    assert.ok(lines.includes('      <dt class="index-entry level-0" id="index-entry-cats">Cats</dt>'));
    assert.ok(lines.includes(
      '      <dd class="index-content"><a href="ch1.xhtml#a3" class="index-occurrence">1</a> ' +
      '<span class="see-refs">See <a href="#index-entry-felines" class="index-see">Felines</a></span></dd>'
    ));
    assert.ok(lines.includes(
      '      <dd class="index-content"><a href="ch1.xhtml#a1" class="index-occurrence">1</a>, ' +
      '<a href="ch1.xhtml#a2" class="index-occurrence">2</a></dd>'
    ));
  });

  it('should indent sub-entries one level deeper', () => {
    const lines = renderIndexPage(builder, PAGE).markup.split('\n');
    const main = lines.indexOf('      <dt class="index-entry level-0" id="index-entry-programming">Programming</dt>');

    assert.ok(main > 0);
    assert.strictEqual(lines[main + 2], '        <dt class="index-entry level-1" id="index-entry-programming-syntax">syntax</dt>');
  });

  it('should stop at the rendering depth', () => {
    const { markup } = renderIndexPage(builder, { ...PAGE, maxTocDepth: 1 });
    assert.ok(!markup.includes('level-1'));
  });

  it('should leave out entries beyond the per-letter limit', () => {
    const crowded = build([['Apple', 'a1'], ['Apricot', 'a2'], ['Banana', 'a3']]);
    const { markup, truncated } = renderIndexPage(crowded, { ...PAGE, maxEntriesPerLetter: 1 });

    assert.strictEqual(truncated, 1);
    assert.ok(markup.includes('>Apple</dt>'));
    assert.ok(!markup.includes('>Apricot</dt>'));
  });

  it('should mark primary occurrences and emphasized entries', () => {
    const marked = build([['*Lambda*', 'a1'], ['**Lambda**', 'a2']]);
    const { markup } = renderIndexPage(marked, PAGE);

    assert.ok(markup.includes('id="index-entry-lambda"><strong>Lambda</strong></dt>'));
    assert.ok(markup.includes('<a href="ch1.xhtml#a2" class="index-primary">2</a>'));
  });
});
