import { describe, expect, it } from 'vitest';
import { applyQuery, createFilterIndex, createIdentityIndex, fuzzyMatch, setSource, viewItems } from './fuzzy-filter';

const asText = (value: string): string => value;

describe('fuzzyMatch', () => {
  it('matches an ordered subsequence case-insensitively', () => {
    expect(fuzzyMatch('BOB', 'bob jones <b@x.com>')?.positions).toEqual([0, 1, 2]);
    expect(fuzzyMatch('bjx', 'Bob Jones <b@x.com>')).toBeDefined();
  });

  it('rejects candidates missing a character or holding them out of order', () => {
    expect(fuzzyMatch('zq', 'Alice Smith <a@x.com>')).toBeUndefined();
    expect(fuzzyMatch('ba', 'ab')).toBeUndefined();
  });

  it('scores a prefix run with first-char and adjacency bonuses', () => {
    expect(fuzzyMatch('ali', 'Alice Smith <a@x.com>')).toEqual({ score: 106, positions: [0, 1, 2] });
  });

  it('picks the best alignment rather than the leftmost one', () => {
    expect(fuzzyMatch('ab', 'a_xab')).toEqual({ score: 53, positions: [3, 4] });
  });

  it('counts positions in code points', () => {
    expect(fuzzyMatch('zed', '😀 Zed')).toEqual({ score: 104, positions: [2, 3, 4] });
  });

  it('treats an empty query as matching everything', () => {
    expect(fuzzyMatch('   ', 'anything')).toEqual({ score: 0, positions: [] });
  });
});

describe('filter index', () => {
  const alice = { id: 1, name: 'Alice Smith', email: 'a@x.com' };
  const bob = { id: 2, name: 'Bob Jones', email: 'b@x.com' };

  it('narrows "ali" to Alice only', () => {
    const index = applyQuery(createIdentityIndex([alice, bob]), 'ali');
    expect(viewItems(index)).toEqual([alice]);
  });

  it('shows the whole corpus in source order for an empty or blank query', () => {
    const index = createIdentityIndex([bob, alice]);
    expect(viewItems(index)).toEqual([bob, alice]);
    expect(viewItems(applyQuery(index, '  '))).toEqual([bob, alice]);
  });

  it('ranks an exact substring above a scattered match of equal length', () => {
    const index = applyQuery(createFilterIndex(['axnxnx', 'xxannx'], asText), 'ann');
    expect(viewItems(index)).toEqual(['xxannx', 'axnxnx']);
  });

  it('ranks shorter gaps above longer gaps', () => {
    const index = applyQuery(createFilterIndex(['axxbyy', 'axbyyy'], asText), 'ab');
    expect(viewItems(index)).toEqual(['axbyyy', 'axxbyy']);
  });

  it('ranks a shorter gap above a longer one that lands on a word start', () => {
    const index = applyQuery(createFilterIndex(['ax b', 'axb'], asText), 'ab');
    expect(viewItems(index)).toEqual(['axb', 'ax b']);
    expect(fuzzyMatch('ab', 'axb')?.score).toBe(30);
    expect(fuzzyMatch('ab', 'ax b')?.score).toBe(28);
  });

  it('keeps corpus order between equal scores', () => {
    const index = applyQuery(createFilterIndex(['xab1', 'xab2', 'zzz'], asText), 'ab');
    expect(viewItems(index)).toEqual(['xab1', 'xab2']);
  });

  it('returns the same index when the query is applied twice', () => {
    const once = applyQuery(createIdentityIndex([alice, bob]), 'o');
    const twice = applyQuery(once, 'o');
    expect(twice).toBe(once);
    expect(viewItems(twice)).toEqual(viewItems(once));
  });

  it('recomputes the view against the current query when the source changes', () => {
    const index = applyQuery(createIdentityIndex([alice]), 'bob');
    expect(index.view).toEqual([]);

    const replaced = setSource(index, [alice, bob]);
    expect(replaced.query).toBe('bob');
    expect(viewItems(replaced)).toEqual([bob]);
    expect(replaced.view[0].positions).toEqual([0, 1, 2]);
  });
});
