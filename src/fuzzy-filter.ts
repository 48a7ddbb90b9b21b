import { formatIdentity } from './identity';
import type { Identity } from './types';

export type FuzzyMatch = {
  score: number;
  /** Code point indices into the candidate text, ascending. */
  positions: number[];
};

export type FilterHit<T> = {
  item: T;
  positions: readonly number[];
};

/**
 * Immutable snapshot of a corpus, the query applied to it and the resulting
 * view. `view` is only ever produced by {@link setSource} / {@link applyQuery}.
 */
export type FilterIndex<T> = {
  readonly source: readonly T[];
  readonly query: string;
  readonly view: readonly FilterHit<T>[];
  readonly toText: (item: T) => string;
};

const MATCH_SCORE = 16;
const FIRST_CHAR_BONUS = 10;
const WORD_START_BONUS = 10;
const ADJACENT_BONUS = 24;
// Must exceed every position bonus.
const GAP_PENALTY = 12;
const LEADING_PENALTY = 1;
const MAX_LEADING_PENALTY = 5;

const WORD_SEPARATORS = new Set([' ', '.', '_', '-', '@', '<', '>', '/', '+']);

const positionBonus = (chars: readonly string[], index: number): number => {
  if (index === 0) return FIRST_CHAR_BONUS;
  const previous = chars[index - 1];
  const current = chars[index];
  if (WORD_SEPARATORS.has(previous)) return WORD_START_BONUS;
  const isCamelHump = previous !== previous.toUpperCase() && current !== current.toLowerCase();
  return isCamelHump ? WORD_START_BONUS : 0;
};

/**
 * Ordered-subsequence match of `query` against `text`, case-insensitive.
 * Picks the best-scoring alignment: contiguous runs and word starts score up,
 * gaps and unmatched leading characters score down.
 */
export const fuzzyMatch = (query: string, text: string): FuzzyMatch | undefined => {
  const needle = Array.from(query.trim(), (char) => char.toLowerCase());
  if (needle.length === 0) {
    return { score: 0, positions: [] };
  }

  const chars = Array.from(text);
  const hay = chars.map((char) => char.toLowerCase());
  if (needle.length > hay.length) {
    return undefined;
  }

  // best[j][i]: best score with needle[j] matched at hay[i]; from[j][i]: previous match index.
  const best: Array<Array<number | undefined>> = needle.map(() => new Array<number | undefined>(hay.length));
  const from: number[][] = needle.map(() => new Array<number>(hay.length).fill(-1));

  for (let j = 0; j < needle.length; j++) {
    for (let i = j; i < hay.length; i++) {
      if (hay[i] !== needle[j]) continue;

      const own = MATCH_SCORE + positionBonus(chars, i);
      if (j === 0) {
        best[j][i] = own - Math.min(i * LEADING_PENALTY, MAX_LEADING_PENALTY);
        continue;
      }

      let bestPrevious: number | undefined;
      let bestIndex = -1;
      for (let k = j - 1; k < i; k++) {
        const previous = best[j - 1][k];
        if (previous === undefined) continue;
        const link = k === i - 1 ? ADJACENT_BONUS : -GAP_PENALTY * (i - k - 1);
        const candidate = previous + link;
        if (bestPrevious === undefined || candidate > bestPrevious) {
          bestPrevious = candidate;
          bestIndex = k;
        }
      }

      if (bestPrevious !== undefined) {
        best[j][i] = bestPrevious + own;
        from[j][i] = bestIndex;
      }
    }
  }

  const last = needle.length - 1;
  let score: number | undefined;
  let end = -1;
  for (let i = last; i < hay.length; i++) {
    const value = best[last][i];
    if (value !== undefined && (score === undefined || value > score)) {
      score = value;
      end = i;
    }
  }

  if (score === undefined) {
    return undefined;
  }

  const positions: number[] = [];
  for (let j = last, i = end; j >= 0; j--) {
    positions.unshift(i);
    i = from[j][i];
  }

  return { score, positions };
};

const computeView = <T>(source: readonly T[], query: string, toText: (item: T) => string): FilterHit<T>[] => {
  if (query.trim().length === 0) {
    return source.map((item) => ({ item, positions: [] }));
  }

  const ranked: Array<FilterHit<T> & { score: number; order: number }> = [];
  source.forEach((item, order) => {
    const match = fuzzyMatch(query, toText(item));
    if (match) {
      ranked.push({ item, positions: match.positions, score: match.score, order });
    }
  });

  ranked.sort((a, b) => b.score - a.score || a.order - b.order);
  return ranked.map(({ item, positions }) => ({ item, positions }));
};

export const createFilterIndex = <T>(source: readonly T[], toText: (item: T) => string, query = ''): FilterIndex<T> => {
  return { source, query, toText, view: computeView(source, query, toText) };
};

export const setSource = <T>(index: FilterIndex<T>, source: readonly T[]): FilterIndex<T> => {
  return createFilterIndex(source, index.toText, index.query);
};

export const applyQuery = <T>(index: FilterIndex<T>, query: string): FilterIndex<T> => {
  if (query === index.query) {
    return index;
  }
  return createFilterIndex(index.source, index.toText, query);
};

export const viewItems = <T>(index: FilterIndex<T>): T[] => {
  return index.view.map((hit) => hit.item);
};

/** Searchable text of an identity: `name <email>`. */
export const identitySearchText = (identity: Identity): string => formatIdentity(identity);

export const createIdentityIndex = <T extends Identity>(source: readonly T[], query = ''): FilterIndex<T> => {
  return createFilterIndex(source, identitySearchText, query);
};
