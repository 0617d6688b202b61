import { describe, expect, test } from 'vitest';

import { escapeCsvField, formatAccountsCsv } from '../account-writer.js';

describe('formatAccountsCsv', () => {
  test('should write the header even without accounts', () => {
    expect(formatAccountsCsv([])).toBe('client,available,held,total,locked\n');
  });

  test('should write one line per account in the order given', () => {
    const csv = formatAccountsCsv([
      { client: 1, available: '1.5', held: '0', total: '1.5', locked: false },
      { client: 2, available: '-15', held: '20', total: '5', locked: true },
    ]);

    expect(csv).toBe('client,available,held,total,locked\n1,1.5,0,1.5,false\n2,-15,20,5,true\n');
  });
});

describe('escapeCsvField', () => {
  test('should leave plain values untouched', () => {
    expect(escapeCsvField('100.25')).toBe('100.25');
  });

  test('should quote values containing separators, quotes or line breaks', () => {
    expect(escapeCsvField('a,b')).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField('line\nbreak')).toBe('"line\nbreak"');
  });
});
