import { describe, expect, it } from 'vitest';
import { constructUrl } from './constructUrl.js';

describe('constructUrl', () => {
  it('resolves a relative path against a bare host', () => {
    const [err, url] = constructUrl('https://api.example.com', 'users');

    expect(err).toBeNull();
    expect(url?.toString()).toBe('https://api.example.com/users');
  });

  it('keeps the base path when the base ends with a slash', () => {
    const [, url] = constructUrl('https://api.example.com/v1/', 'users/1');

    expect(url?.toString()).toBe('https://api.example.com/v1/users/1');
  });

  it('replaces the last base segment when the base has no trailing slash', () => {
    const [, url] = constructUrl('https://api.example.com/v1', 'users');

    expect(url?.toString()).toBe('https://api.example.com/users');
  });

  it('replaces the base path for absolute paths', () => {
    const [, url] = constructUrl('https://api.example.com/v1/', '/health');

    expect(url?.toString()).toBe('https://api.example.com/health');
  });

  it('appends query params, skipping empty values and repeating arrays', () => {
    const [, url] = constructUrl('https://api.example.com/', 'users', {
      page: 2,
      active: true,
      tag: ['a', 'b'],
      skipped: undefined,
      empty: null,
    });

    expect(url?.toString()).toBe('https://api.example.com/users?page=2&active=true&tag=a&tag=b');
  });

  it('encodes query values', () => {
    const [, url] = constructUrl('https://api.example.com/', 'search', { q: 'a b&c' });

    expect(url?.search).toBe('?q=a+b%26c');
  });

  it('returns an error for an invalid base', () => {
    const [err, url] = constructUrl('not a url', 'users');

    expect(url).toBeNull();
    expect(err?.message).toBe('error constructing URL from not a url and users');
    expect(err?.cause).toBeInstanceOf(TypeError);
  });
});
