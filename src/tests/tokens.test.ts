import * as test from 'node:test';
import * as assert from 'node:assert';
import { findWholeWords, firstWords, isWholeWordAt, lastWords, splitWords } from '../tokens.js';

const { describe, it } = test;

describe('findWholeWords', () => {
  it('should not match a label inside a longer word', () => {
    assert.deepStrictEqual(findWholeWords('Art and Article', 'Art'), [{ start: 0, end: 3 }]);
  });

  it('should not match a label at the end of a longer word', () => {
    assert.deepStrictEqual(findWholeWords('Smart art', 'art'), [{ start: 6, end: 9 }]);
  });

  it('should match every occurrence left to right', () => {
    assert.deepStrictEqual(findWholeWords('Bo, Bo and Bo.', 'Bo'), [
      { start: 0, end: 2 },
      { start: 4, end: 6 },
      { start: 11, end: 13 }
    ]);
  });

  it('should be case-sensitive', () => {
    assert.deepStrictEqual(findWholeWords('james James', 'James'), [{ start: 6, end: 11 }]);
  });

  it('should treat accented letters as word characters', () => {
    assert.deepStrictEqual(findWholeWords('Zoë Zoëlla', 'Zoë'), [{ start: 0, end: 3 }]);
    assert.deepStrictEqual(findWholeWords('éArt', 'Art'), []);
  });

  it('should match labels that end in punctuation', () => {
    assert.deepStrictEqual(findWholeWords('Ask Dr. Who', 'Dr.'), [{ start: 4, end: 7 }]);
  });

  it('should find nothing for an empty label', () => {
    assert.deepStrictEqual(findWholeWords('anything', ''), []);
  });
});

describe('isWholeWordAt', () => {
  it('should require a boundary on both sides', () => {
    assert.strictEqual(isWholeWordAt('the cat sat', 'cat', 4), true);
    assert.strictEqual(isWholeWordAt('concatenate', 'cat', 3), false);
  });

  it('should accept underscores and digits as word characters', () => {
    assert.strictEqual(isWholeWordAt('x_cat', 'cat', 2), false);
    assert.strictEqual(isWholeWordAt('cat9', 'cat', 0), false);
  });
});

describe('word windows', () => {
  it('should split on runs of whitespace', () => {
    assert.deepStrictEqual(splitWords(' a  bc\n'), [
      { text: 'a', start: 1, end: 2 },
      { text: 'bc', start: 4, end: 6 }
    ]);
  });

  it('should take the last words of a string', () => {
    assert.strictEqual(lastWords('a b  c d e f g', 5), 'c d e f g');
    assert.strictEqual(lastWords('only two', 5), 'only two');
    assert.strictEqual(lastWords('', 5), '');
  });

  it('should take the first words of a string', () => {
    assert.strictEqual(firstWords('  x y ', 5), 'x y');
    assert.strictEqual(firstWords('one two three four five six', 5), 'one two three four five');
  });
});
