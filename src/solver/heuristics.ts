/**
 * Branching heuristics
 * Implements MRV (Minimum Remaining Values) with a row-major tie-break
 */

import { Digit } from '../model/types';
import { CandidateMask, countDigits, maskDigits } from './candidates';
import { SearchState } from './state';

export interface BranchCell {
  index: number;
  mask: CandidateMask;
  size: number;
}

/**
 * Choose the unknown cell with the fewest candidates.
 * Ties go to the smallest row-major index. A cell with no candidates is
 * returned at once so the caller can reject the node. Null when complete.
 */
export function selectNextCell(state: SearchState): BranchCell | null {
  let best: BranchCell | null = null;
  const cellCount = state.grid.topology.unitsOfCell.length;

  for (let index = 0; index < cellCount; index++) {
    if (!state.isUnknown(index)) continue;

    const mask = state.candidates(index);
    const size = countDigits(mask);
    if (size === 0) return { index, mask, size };

    // Strict < keeps the earliest cell on ties
    if (best === null || size < best.size) {
      best = { index, mask, size };
    }
  }

  return best;
}

/**
 * Digits to try for a branch cell, in increasing order
 */
export function orderCandidates(mask: CandidateMask): Digit[] {
  return maskDigits(mask);
}
