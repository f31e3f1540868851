import { describe, expect, it } from 'vitest';

import {
  createLineMatcher,
  search,
  searchLines,
} from '../../../lib/search.js';

const RUST_POEM = 'Rust:\nsafe, fast, productive.\nPick three.\nDuct tape.';
const NOBODY_POEM =
  "I'm nobody. Who are you?\nAre you nobody, too?\nHow dreary to be somebody!";

describe('search (case-sensitive)', () => {
  it('returns the lines containing the query with exact case', () => {
    expect(search('duct', RUST_POEM, false)).toEqual([
      'safe, fast, productive.',
    ]);
  });

  it('does not match text that differs only by case', () => {
    expect(search('rUsT', RUST_POEM, false)).toEqual([]);
  });

  it('matches a query embedded inside longer words', () => {
    expect(search('body', NOBODY_POEM, false)).toEqual([
      "I'm nobody. Who are you?",
      'Are you nobody, too?',
      'How dreary to be somebody!',
    ]);
    expect(search('nobody', NOBODY_POEM, false)).toEqual([
      "I'm nobody. Who are you?",
      'Are you nobody, too?',
    ]);
  });

  it('keeps duplicate lines and document order', () => {
    expect(search('x', 'x1\ny\nx2\nx1', false)).toEqual(['x1', 'x2', 'x1']);
  });

  it('returns nothing when the query is longer than every line', () => {
    expect(search('a much longer query', 'short\nlines', false)).toEqual([]);
  });

  it('returns matched lines verbatim', () => {
    expect(search('pad', '  padded  \n\tpad\r\nnone', false)).toEqual([
      '  padded  ',
      '\tpad',
    ]);
  });
});

describe('search (case-insensitive)', () => {
  it('folds both query and lines before comparing', () => {
    const contents = 'Rust:\nsafe, fast, productive.\nPick three.\nTrust me.';

    expect(search('rUsT', contents, true)).toEqual(['Rust:', 'Trust me.']);
  });

  it('returns lines in their original case', () => {
    expect(search('duct', RUST_POEM, true)).toEqual([
      'safe, fast, productive.',
      'Duct tape.',
    ]);
  });

  it('is a superset of the case-sensitive result', () => {
    const contents = 'Alpha\nalpha\nALPHA\nbeta';
    const sensitive = search('alpha', contents, false);
    const insensitive = search('alpha', contents, true);

    expect(sensitive).toEqual(['alpha']);
    expect(insensitive).toEqual(['Alpha', 'alpha', 'ALPHA']);
    expect(insensitive).toEqual(expect.arrayContaining(sensitive));
  });

  it('folds non-ASCII letters', () => {
    expect(search('ÉTÉ', "l'été dernier\nhiver", true)).toEqual([
      "l'été dernier",
    ]);
  });
});

describe('search edge cases', () => {
  it('matches every line for an empty query', () => {
    expect(search('', 'one\n\nthree\n', false)).toEqual(['one', '', 'three']);
    expect(search('', 'one\n\nthree\n', true)).toEqual(['one', '', 'three']);
  });

  it('returns nothing for empty contents', () => {
    expect(search('anything', '', false)).toEqual([]);
    expect(search('anything', '', true)).toEqual([]);
    expect(search('', '', false)).toEqual([]);
  });

  it('does not treat regular expression syntax specially', () => {
    expect(search('a.c', 'abc\na.c', false)).toEqual(['a.c']);
    expect(search('(x)*', 'x\n(x)*', false)).toEqual(['(x)*']);
  });
});

describe('searchLines', () => {
  it('yields matches lazily', () => {
    const iterator = searchLines('b', 'a\nb1\nc\nb2', false);

    expect(iterator.next()).toEqual({ value: 'b1', done: false });
    expect(iterator.next()).toEqual({ value: 'b2', done: false });
    expect(iterator.next()).toEqual({ value: undefined, done: true });
  });

  it('is exhausted after one pass', () => {
    const iterator = searchLines('a', 'a\na', false);

    expect([...iterator]).toEqual(['a', 'a']);
    expect([...iterator]).toEqual([]);
  });
});

describe('createLineMatcher', () => {
  it('tests a single line', () => {
    const matches = createLineMatcher('Needle', true);

    expect(matches('haystack with a needle')).toBe(true);
    expect(matches('haystack')).toBe(false);
  });

  it('accepts blank lines for an empty query', () => {
    expect(createLineMatcher('', false)('')).toBe(true);
  });
});
