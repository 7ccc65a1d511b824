import { describe, expect, it } from 'vitest';
import { formatData, renderTable } from './render.js';
import type { JsonValue } from '../types/json.js';

describe('renderTable', () => {
  it('pads every column to its widest cell', () => {
    const table = renderTable(
      ['Setting', 'Value'],
      [
        ['API Endpoint', 'https://api.example.com'],
        ['Timeout', '30s'],
      ],
    );

    expect(table.split('\n')).toStrictEqual([
      '+--------------+-------------------------+',
      '| Setting      | Value                   |',
      '+--------------+-------------------------+',
      '| API Endpoint | https://api.example.com |',
      '| Timeout      | 30s                     |',
      '+--------------+-------------------------+',
    ]);
  });

  it('prints the title above the table', () => {
    expect(renderTable(['a'], [], 'Title')).toBe(['Title', '+---+', '| a |', '+---+', '+---+'].join('\n'));
  });
});

describe('formatData', () => {
  const users: JsonValue[] = [
    { id: 1, name: 'Ada', tags: ['x'] },
    { id: 2, name: 'Grace' },
  ];

  it('renders JSON with two-space indentation', () => {
    expect(formatData({ id: 1 }, 'json')).toBe('{\n  "id": 1\n}');
  });

  it('renders YAML without a trailing newline', () => {
    expect(formatData({ id: 1, name: 'Ada' }, 'yaml')).toBe('id: 1\nname: Ada');
  });

  it('renders arrays of objects as a table keyed by the first item', () => {
    expect(formatData(users, 'table', 'Resource: users').split('\n')).toStrictEqual([
      'Resource: users',
      '+----+-------+-------+',
      '| id | name  | tags  |',
      '+----+-------+-------+',
      '| 1  | Ada   | ["x"] |',
      '| 2  | Grace |       |',
      '+----+-------+-------+',
    ]);
  });

  it('falls back to JSON when a table does not fit the data', () => {
    expect(formatData({ id: 1 }, 'table')).toBe('{\n  "id": 1\n}');
    expect(formatData([1, 2], 'table')).toBe('[\n  1,\n  2\n]');
    expect(formatData([], 'table')).toBe('[]');
  });
});
