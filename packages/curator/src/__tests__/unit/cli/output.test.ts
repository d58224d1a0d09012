/**
 * CLI Output Formatting Tests
 */

import { describe, it, expect } from 'vitest';
import { formatDuration } from '../../../cli/lib/logger.js';
import { formatTable, formatters } from '../../../cli/lib/output.js';

describe('formatTable', () => {
  const columns = [
    { key: 'name', header: 'Name' },
    { key: 'n', header: 'N', align: 'right' as const },
  ];

  it('should pad columns to the widest cell', () => {
    const table = formatTable(
      [
        { name: 'a', n: 1 },
        { name: 'long', n: null },
      ],
      columns
    );

    expect(table.split('\n')).toEqual(['Name | N', '-----+--', 'a    | 1', 'long | -']);
  });

  it('should truncate cells wider than a fixed width', () => {
    const table = formatTable([{ name: 'abcdefgh' }], [{ key: 'name', header: 'Name', width: 5 }]);
    expect(table.split('\n')[2]).toBe('abcd~');
  });

  it('should report an empty table', () => {
    expect(formatTable([], columns)).toBe('No entries found.');
  });
});

describe('formatters', () => {
  it('should format decimals and percentages', () => {
    expect(formatters.decimal(0.6)).toBe('0.60');
    expect(formatters.percent(0.06)).toBe('6.00%');
    expect(formatters.percent(undefined)).toBe('-');
  });
});

describe('formatDuration', () => {
  it('should scale the unit with the duration', () => {
    expect(formatDuration(250)).toBe('250ms');
    expect(formatDuration(1500)).toBe('1.50s');
    expect(formatDuration(90_000)).toBe('1m 30.0s');
  });
});
