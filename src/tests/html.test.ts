import * as test from 'node:test';
import * as assert from 'node:assert';
import {
  addClass,
  decodeEntities,
  escapeHtml,
  findComments,
  findElements,
  getAttribute,
  hasAttribute,
  isInside,
  setAttribute,
  slugify,
  stripTags
} from '../html.js';

const { describe, it } = test;

describe('slugify', () => {

  it('should strip diacritics and punctuation', () => {
    assert.strictEqual(slugify('Café au Lait!'), 'cafe-au-lait');
  });

  it('should collapse and trim hyphens', () => {
    assert.strictEqual(slugify('  --Hello   World--  '), 'hello-world');
  });

  it('should keep letters of non-Latin scripts', () => {
    assert.strictEqual(slugify('Введение'), 'введение');
    assert.strictEqual(slugify('第一章 概要'), '第一章-概要');
  });

  it('should return an empty string for symbols only', () => {
    assert.strictEqual(slugify('?!*'), '');
  });
});

describe('entities and text', () => {

  it('should escape markup characters', () => {
    assert.strictEqual(
      escapeHtml(`<a href="x">'&'</a>`),
      '&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;'
    );
  });

  it('should decode named and numeric entities once', () => {
    assert.strictEqual(decodeEntities('&lt;b&gt; &amp;amp; &#233; &#x41; &bogus;'), '<b> &amp; é A &bogus;');
  });

  it('should strip tags and collapse whitespace', () => {
    assert.strictEqual(stripTags('<p>Hello <b>big</b>\n  world &amp; more</p>'), 'Hello big world & more');
  });
});

describe('attributes', () => {
  const attrs = ` id="a" class='x y' data-n=5`;

  it('should read quoted and unquoted values', () => {
    assert.strictEqual(getAttribute(attrs, 'id'), 'a');
    assert.strictEqual(getAttribute(attrs, 'class'), 'x y');
    assert.strictEqual(getAttribute(attrs, 'data-n'), '5');
    assert.strictEqual(getAttribute(attrs, 'href'), undefined);
  });

  it('should not match an attribute by suffix', () => {
    assert.strictEqual(getAttribute(' data-id="z"', 'id'), undefined);
    assert.ok(!hasAttribute(' data-id="z"', 'id'));
    assert.ok(hasAttribute(' data-bookmark id="z"', 'data-bookmark'));
  });

  it('should append a new attribute', () => {
    assert.strictEqual(setAttribute(' class="a"', 'id', 'x'), ' class="a" id="x"');
  });

  it('should replace an existing attribute in place', () => {
    assert.strictEqual(setAttribute(' id="old" class="a"', 'id', 'new'), ' id="new" class="a"');
  });

  it('should keep the self-closing slash last', () => {
    assert.strictEqual(setAttribute(' src="a.png" /', 'id', 'f1'), ' src="a.png" id="f1" /');
  });

  it('should escape attribute values', () => {
    assert.strictEqual(setAttribute('', 'title', 'a"b'), ' title="a&quot;b"');
  });

  it('should add a class once', () => {
    assert.strictEqual(addClass(' class="x"', 'cross-ref'), ' class="x cross-ref"');
    assert.strictEqual(addClass(' class="x cross-ref"', 'cross-ref'), ' class="x cross-ref"');
    assert.strictEqual(addClass('', 'y'), ' class="y"');
  });
});

describe('findElements', () => {

  it('should balance nested elements of the same name', () => {
    const markup = '<div id="a"><div id="b">x</div></div>';
    const elements = findElements(markup, 'div');

    assert.strictEqual(elements.length, 2);
    const [outer, inner] = elements;
    assert.strictEqual(outer.end, markup.length);
    assert.strictEqual(markup.slice(outer.contentStart, outer.contentEnd), '<div id="b">x</div>');
    assert.strictEqual(markup.slice(inner.contentStart, inner.contentEnd), 'x');
    assert.strictEqual(getAttribute(inner.tag.attrs, 'id'), 'b');
  });

  it('should report self-closing elements', () => {
    const elements = findElements('<p><index-entry entry="x"/></p>', 'index-entry');

    assert.strictEqual(elements.length, 1);
    assert.ok(elements[0].selfClosing);
    assert.strictEqual(getAttribute(elements[0].tag.attrs, 'entry'), 'x');
  });

  it('should skip unclosed elements', () => {
    assert.deepStrictEqual(findElements('<div>open', 'div'), []);
  });

  it('should not confuse tags sharing a prefix', () => {
    const elements = findElements('<aside>a</aside><a href="#x">b</a>', 'a');

    assert.strictEqual(elements.length, 1);
    assert.strictEqual(getAttribute(elements[0].tag.attrs, 'href'), '#x');
  });
});

describe('comments', () => {

  it('should locate comments and test containment', () => {
    const markup = 'a<!-- one -->b<!--two-->';
    const comments = findComments(markup);

    assert.deepStrictEqual(comments.map(c => c.body), [' one ', 'two']);
    assert.ok(isInside(2, 5, comments));
    assert.ok(!isInside(0, 1, comments));
  });
});
