import { Headers } from 'undici';
import { describe, expect, test } from 'vitest';
import { mergeHeaderOptions } from './utils.js';

const toObject = (headers: Headers) => Object.fromEntries(headers.entries());

describe('mergeHeaderOptions', () => {
  test('merge two-dimensional arrays', () => {
    const merged = mergeHeaderOptions([['a', 'b']], [['c', 'd']]);

    expect(toObject(merged)).toStrictEqual({ a: 'b', c: 'd' });
  });

  test('last array takes precedence', () => {
    const merged = mergeHeaderOptions([['a', 'b']], [['a', 'd']]);

    expect(toObject(merged)).toStrictEqual({ a: 'd' });
  });

  test('merge objects', () => {
    const merged = mergeHeaderOptions({ a: 'b' }, { c: 'd' });

    expect(toObject(merged)).toStrictEqual({ a: 'b', c: 'd' });
  });

  test('later sources win case-insensitively', () => {
    const merged = mergeHeaderOptions({ 'Content-Type': 'application/json' }, { 'content-type': 'text/plain' });

    expect(toObject(merged)).toStrictEqual({ 'content-type': 'text/plain' });
  });

  test('merge headers', () => {
    const merged = mergeHeaderOptions(new Headers({ a: 'b' }), new Headers({ c: 'd' }));

    expect(toObject(merged)).toStrictEqual({ a: 'b', c: 'd' });
  });

  test('merges more than two sources in order', () => {
    const merged = mergeHeaderOptions({ a: '1' }, undefined, [['a', '2']], new Headers({ b: '3' }));

    expect(toObject(merged)).toStrictEqual({ a: '2', b: '3' });
  });

  test('drops headers explicitly set to undefined/null', () => {
    const merged = mergeHeaderOptions({ keep: '1', remove: 'x' }, { remove: null, added: '2', other: undefined });

    expect(toObject(merged)).toStrictEqual({ added: '2', keep: '1' });
    expect(merged.get('remove')).toBeNull();
  });
});
