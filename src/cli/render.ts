import yaml from 'js-yaml';
import type { JsonObject, JsonValue } from '../types/json.js';
import { isJsonObject } from '../utils/tryParse.js';

/** Output formats accepted by `fetch --format`. */
export const OUTPUT_FORMATS = ['json', 'table', 'yaml'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * Renders rows as an ASCII table with an optional title line.
 *
 * @example
 * renderTable(['Setting', 'Value'], [['Timeout', '30s']]);
 * // +---------+-------+
 * // | Setting | Value |
 * // +---------+-------+
 * // | Timeout | 30s   |
 * // +---------+-------+
 */
export function renderTable(columns: readonly string[], rows: ReadonlyArray<readonly string[]>, title?: string): string {
  const widths = columns.map((column, index) =>
    Math.max(column.length, ...rows.map((row) => (row[index] ?? '').length)),
  );

  const rule = `+${widths.map((width) => '-'.repeat(width + 2)).join('+')}+`;
  const line = (cells: readonly string[]) =>
    `| ${widths.map((width, index) => (cells[index] ?? '').padEnd(width)).join(' | ')} |`;

  const lines = [rule, line(columns), rule, ...rows.map(line), rule];
  return (title ? [title, ...lines] : lines).join('\n');
}

function cell(value: unknown): string {
  if (value === undefined) {
    return '';
  }

  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Formats response data for the terminal. `table` only applies to non-empty arrays of
 * objects, with the first object's keys as columns; anything else falls back to JSON.
 */
export function formatData(data: JsonValue, format: OutputFormat, title?: string): string {
  if (format === 'yaml') {
    return yaml.dump(data).trimEnd();
  }

  if (format === 'table' && Array.isArray(data) && data.length > 0) {
    const items = data.filter((item): item is JsonObject => isJsonObject(item));
    const [first] = items;
    if (first && items.length === data.length) {
      const columns = Object.keys(first);
      return renderTable(
        columns,
        items.map((item) => columns.map((column) => cell(item[column]))),
        title,
      );
    }
  }

  return JSON.stringify(data, null, 2);
}
