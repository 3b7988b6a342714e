/**
 * Unit tests for Output Formatter
 */

import { describe, it, expect } from 'vitest';
import { formatJSON, formatOutput, formatSummary, formatTable } from '../../../src/core/output-formatter.js';

describe('OutputFormatter', () => {
  describe('formatJSON', () => {
    it('should pretty-print with two-space indentation', () => {
      expect(formatJSON({ name: 'test', value: 123 })).toBe('{\n  "name": "test",\n  "value": 123\n}');
    });
  });

  describe('formatTable', () => {
    it('should pad columns and round numbers to six decimals', () => {
      const result = formatTable([
        { name: 'a', value: 1.23456789 },
        { name: 'bb', value: 2 },
      ]);

      expect(result.split('\n')).toEqual([
        'name | value   ',
        '-----|---------',
        'a    | 1.234568',
        'bb   | 2       ',
      ]);
    });

    it('should handle empty array', () => {
      expect(formatTable([])).toBe('No data to display');
    });

    it('should render null cells as blanks', () => {
      const result = formatTable([{ job: 'sweep-1', error: null }]);
      expect(result.split('\n')[2]).toBe('sweep-1 |      ');
    });
  });

  describe('formatSummary', () => {
    it('should list scalar fields and leave nested values out', () => {
      const result = formatSummary({ id: 'x', n: 3, nested: { a: 1 } });

      expect(result.split('\n')).toEqual(['field | value', '------|------', 'id    | x    ', 'n     | 3    ']);
    });
  });

  describe('formatOutput', () => {
    it('should format as JSON when format is json', () => {
      const data = { test: 'value' };
      expect(formatOutput(data, 'json')).toBe(JSON.stringify(data, null, 2));
    });

    it('should format arrays as a table', () => {
      expect(formatOutput([{ a: 1 }], 'table')).toBe('a\n-\n1');
    });

    it('should print scalars as they are', () => {
      expect(formatOutput('hello', 'table')).toBe('hello');
    });
  });
});
