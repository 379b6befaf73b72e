import { describe, expect, test } from 'vitest';
import { toHeaderEntries } from './utils.js';

describe('toHeaderEntries', () => {
  test('returns no entries without groups', () => {
    expect(toHeaderEntries()).toEqual([]);
    expect(toHeaderEntries(undefined, [])).toEqual([]);
  });

  test('keeps the supplied order across groups', () => {
    const entries = toHeaderEntries(
      [{ name: 'User-Agent', value: 'weather-app/1.0' }],
      [
        { name: 'Authorization', value: 'Bearer test-token' },
        { name: 'Accept', value: 'application/json' },
      ],
    );

    expect(entries).toEqual([
      ['User-Agent', 'weather-app/1.0'],
      ['Authorization', 'Bearer test-token'],
      ['Accept', 'application/json'],
    ]);
  });

  test('keeps duplicated names as separate entries', () => {
    const entries = toHeaderEntries([
      { name: 'X-Tag', value: 'a' },
      { name: 'X-Tag', value: 'b' },
    ]);

    expect(entries).toEqual([
      ['X-Tag', 'a'],
      ['X-Tag', 'b'],
    ]);
  });
});
