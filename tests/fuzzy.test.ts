// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect } from 'vitest';
import { fuzzyFilter, fuzzyScore } from '../src/fuzzy.js';

describe('fuzzyScore', () => {
  it('matches everything with an empty query', () => {
    expect(fuzzyScore('', 'api')).toBe(1);
    expect(fuzzyScore('   ', 'api')).toBe(1);
  });

  it('scores an exact match highest, ignoring case', () => {
    expect(fuzzyScore('API', 'api')).toBe(1000);
  });

  it('scores a prefix by how much of the name it covers', () => {
    expect(fuzzyScore('we', 'website')).toBe(529);
    expect(fuzzyScore('web', 'website')).toBe(543);
  });

  it('scores a substring below any prefix', () => {
    expect(fuzzyScore('site', 'website')).toBe(257);
  });

  it('scores an ordered subsequence with a bonus for runs', () => {
    expect(fuzzyScore('wbs', 'website')).toBe(35);
    expect(fuzzyScore('wbt', 'website')).toBe(30);
  });

  it('returns 0 when characters are missing or out of order', () => {
    expect(fuzzyScore('xyz', 'website')).toBe(0);
    expect(fuzzyScore('bw', 'website')).toBe(0);
  });
});

describe('fuzzyFilter', () => {
  const identity = (text: string) => text;

  it('drops non-matches and sorts best first', () => {
    expect(fuzzyFilter(['website', 'web', 'webhooks', 'api'], 'web', identity)).toEqual([
      'web',
      'website',
      'webhooks',
    ]);
  });

  it('keeps input order for equal scores', () => {
    expect(fuzzyFilter(['ya1', 'xa1'], 'a1', identity)).toEqual(['ya1', 'xa1']);
  });

  it('returns everything in order for an empty query', () => {
    expect(fuzzyFilter(['b', 'a'], '', identity)).toEqual(['b', 'a']);
  });

  it('reads the text through the accessor', () => {
    const items = [{ name: 'docs' }, { name: 'api' }];
    expect(fuzzyFilter(items, 'api', (item) => item.name)).toEqual([{ name: 'api' }]);
  });
});
