/**
 * @fileoverview Reciprocal Rank Fusion
 *
 * Each hit at 0-based rank `r` contributes `1 / (K + r + 1)`; contributions
 * for the same id add across lists. Raw scores are never compared across
 * sources, only positions.
 */

import type { FusedHit, SearchHit } from '../core/types.js';

export const DEFAULT_RRF_K = 60;

export function reciprocalRankFusion(lists: ReadonlyArray<readonly SearchHit[]>, rrfK: number = DEFAULT_RRF_K): FusedHit[] {
  const scores = new Map<number, number>();
  for (const list of lists) {
    for (const hit of list) {
      scores.set(hit.id, (scores.get(hit.id) ?? 0) + 1 / (rrfK + hit.rank + 1));
    }
  }

  return [...scores.entries()]
    .map(([id, fusedScore]) => ({ id, fusedScore }))
    .sort((a, b) => b.fusedScore - a.fusedScore || a.id - b.id);
}
