// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Fuzzy matching for the project search prompt.
 *
 * Scores, highest first: exact match, prefix, substring, then an ordered
 * subsequence with a bonus for consecutive characters. 0 means no match.
 */

const EXACT_SCORE = 1000;
const PREFIX_SCORE = 500;
const SUBSTRING_SCORE = 200;
const MAX_SUBSEQUENCE_SCORE = SUBSTRING_SCORE - 1;

export function fuzzyScore(query: string, text: string): number {
  const q = query.trim().toLowerCase();
  if (q === '') return 1;

  const t = text.toLowerCase();
  if (t === q) return EXACT_SCORE;

  const coverage = Math.round((q.length / t.length) * 100);
  if (t.startsWith(q)) return PREFIX_SCORE + coverage;
  if (t.includes(q)) return SUBSTRING_SCORE + coverage;

  let score = 0;
  let consecutiveBonus = 0;
  let queryIndex = 0;
  for (let i = 0; i < t.length && queryIndex < q.length; i++) {
    if (t[i] === q[queryIndex]) {
      score += 10 + consecutiveBonus;
      consecutiveBonus += 5;
      queryIndex++;
    } else {
      consecutiveBonus = 0;
    }
  }

  return queryIndex === q.length ? Math.min(score, MAX_SUBSEQUENCE_SCORE) : 0;
}

/**
 * Items matching the query, best first. Equal scores keep their input order.
 */
export function fuzzyFilter<T>(items: readonly T[], query: string, getText: (item: T) => string): T[] {
  return items
    .map((item, index) => ({ item, index, score: fuzzyScore(query, getText(item)) }))
    .filter((scored) => scored.score > 0)
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .map((scored) => scored.item);
}
