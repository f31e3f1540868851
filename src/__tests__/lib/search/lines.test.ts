import { expect, it } from 'vitest';

import { splitLines } from '../../../lib/search.js';

it('splitLines yields nothing for empty contents', () => {
  expect([...splitLines('')]).toEqual([]);
});

it('splitLines does not yield an empty line after a trailing newline', () => {
  expect([...splitLines('a\nb\n')]).toEqual(['a', 'b']);
  expect([...splitLines('a\nb')]).toEqual(['a', 'b']);
});

it('splitLines keeps blank lines between other lines', () => {
  expect([...splitLines('a\n\n\nb')]).toEqual(['a', '', '', 'b']);
});

it('splitLines yields one empty line for a lone newline', () => {
  expect([...splitLines('\n')]).toEqual(['']);
});

it('splitLines strips a carriage return only when it precedes a newline', () => {
  expect([...splitLines('one\r\ntwo\r\n')]).toEqual(['one', 'two']);
  expect([...splitLines('one\rtwo')]).toEqual(['one\rtwo']);
  expect([...splitLines('tail\r')]).toEqual(['tail\r']);
  expect([...splitLines('\r\n')]).toEqual(['']);
});

it('splitLines preserves surrounding whitespace', () => {
  expect([...splitLines('  indented\t\ntrailing  ')]).toEqual([
    '  indented\t',
    'trailing  ',
  ]);
});
