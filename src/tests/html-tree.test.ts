import * as test from 'node:test';
import * as assert from 'node:assert';
import {
  decodeEntities,
  escapeAttribute,
  escapeText,
  findAll,
  getAttribute,
  hasClass,
  parseHtml,
  serializeHtml,
  textContent
} from '../html-tree.js';

const { describe, it } = test;

function roundTrip(html: string): string {
  return serializeHtml(parseHtml(html).children);
}

describe('parseHtml', () => {
  it('should build elements, attributes and decoded text', () => {
    const fragment = parseHtml('<p id="a">Hi &amp; <em>there</em></p>');
    const para = fragment.children[0];

    assert.strictEqual(para.type, 'element');
    if (para.type !== 'element') return;
    assert.strictEqual(para.tag, 'p');
    assert.deepStrictEqual(para.attributes, [{ name: 'id', value: 'a' }]);
    assert.strictEqual(textContent(para), 'Hi & there');
  });

  it('should serialize back to the same markup', () => {
    assert.strictEqual(roundTrip('<p id="a">Hi &amp; <em>there</em></p>'), '<p id="a">Hi &amp; <em>there</em></p>');
  });

  it('should handle void elements', () => {
    assert.strictEqual(roundTrip('<p>a<br>b<img src="x.png"></p>'), '<p>a<br>b<img src="x.png"></p>');
  });

  it('should drop unmatched end tags', () => {
    assert.strictEqual(roundTrip('<p>x</span></p>'), '<p>x</p>');
  });

  it('should close elements left open', () => {
    assert.strictEqual(roundTrip('<div><p>x'), '<div><p>x</p></div>');
  });

  it('should keep script bodies verbatim', () => {
    const html = '<script type="application/ld+json">{"a":"<b>"}</script>';
    const fragment = parseHtml(html);
    const script = fragment.children[0];

    assert.strictEqual(script.type, 'element');
    if (script.type !== 'element') return;
    assert.deepStrictEqual(script.children, [{ type: 'raw', html: '{"a":"<b>"}' }]);
    assert.strictEqual(serializeHtml(fragment.children), html);
  });

  it('should keep comments and decode named entities', () => {
    assert.strictEqual(roundTrip('<!-- note --><p>&hellip;</p>'), '<!-- note --><p>\u2026</p>');
  });

  it('should keep escaped entity text escaped', () => {
    const html = '<p>Type <code>&amp;lt;</code> for a less-than sign</p>';

    assert.strictEqual(textContent(parseHtml(html).children[0]), 'Type &lt; for a less-than sign');
    assert.strictEqual(roundTrip(html), html);
  });

  it('should read bare attributes as empty strings', () => {
    const [input] = findAll(parseHtml('<input disabled>').children, e => e.tag === 'input');
    assert.strictEqual(getAttribute(input, 'disabled'), '');
    assert.strictEqual(getAttribute(input, 'value'), undefined);
    assert.strictEqual(serializeHtml([input]), '<input disabled>');
  });

  it('should treat a stray < as text', () => {
    assert.strictEqual(textContent(parseHtml('<p>1 < 2</p>').children[0]), '1 < 2');
    assert.strictEqual(roundTrip('<p>1 < 2</p>'), '<p>1 &lt; 2</p>');
  });
});

describe('findAll', () => {
  it('should return matches in document order', () => {
    const fragment = parseHtml('<div><p>1</p><section><p>2</p></section></div><p>3</p>');
    const paras = findAll(fragment.children, e => e.tag === 'p');
    assert.deepStrictEqual(paras.map(textContent), ['1', '2', '3']);
  });
});

describe('hasClass', () => {
  it('should match one class of several', () => {
    const [span] = findAll(parseHtml('<span class="a lod-ignore">x</span>').children, e => e.tag === 'span');
    assert.strictEqual(hasClass(span, 'lod-ignore'), true);
    assert.strictEqual(hasClass(span, 'lod'), false);
  });
});

describe('escaping', () => {
  it('should escape attribute values', () => {
    assert.strictEqual(escapeAttribute('a "b" <c>'), 'a &quot;b&quot; &lt;c&gt;');
  });

  it('should escape every ampersand in decoded text', () => {
    assert.strictEqual(escapeText('Tom & Jerry &amp; &#38;'), 'Tom &amp; Jerry &amp;amp; &amp;#38;');
  });

  it('should decode numeric references', () => {
    assert.strictEqual(decodeEntities('&#65;&#x42;&lt;'), 'AB<');
  });

  it('should decode the full set of named references', () => {
    assert.strictEqual(decodeEntities('a&mdash;b &eacute; &rarr;'), 'a\u2014b \u00e9 \u2192');
  });
});
