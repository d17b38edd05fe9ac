/**
 * Search state: the grid plus a candidate set for every unknown cell
 */

import { Grid } from '../model/grid';
import { CELL_COUNT, Digit, formatCell } from '../model/types';
import {
  ALL_DIGITS_MASK,
  CandidateMask,
  EMPTY_MASK,
  countDigits,
  digitBit,
  formatMask,
  hasDigit,
} from './candidates';

export type EliminationResult = 'unchanged' | 'reduced' | 'single' | 'empty';

export type AssignResult =
  | { ok: true; forced: number[] }
  | { ok: false; conflict: string };

/**
 * Owned by exactly one search frame. Branching copies it with `clone()`;
 * siblings never share masks or grid cells.
 */
export class SearchState {
  private constructor(
    readonly grid: Grid,
    private readonly masks: CandidateMask[]
  ) {}

  /**
   * Every unknown cell starts with {1..9} minus the digits fixed in its
   * row, column and box. Takes ownership of `grid`.
   */
  static initialize(grid: Grid): SearchState {
    const { unitsOfCell } = grid.topology;
    const masks: CandidateMask[] = [];
    for (let index = 0; index < CELL_COUNT; index++) {
      if (grid.valueAt(index) !== null) {
        masks.push(EMPTY_MASK);
        continue;
      }
      let used = EMPTY_MASK;
      for (const unitId of unitsOfCell[index]) used |= grid.usedInUnit(unitId);
      masks.push(ALL_DIGITS_MASK & ~used);
    }
    return new SearchState(grid, masks);
  }

  /** Candidate mask of a cell; empty for fixed cells */
  candidates(index: number): CandidateMask {
    return this.masks[index];
  }

  isUnknown(index: number): boolean {
    return this.grid.valueAt(index) === null;
  }

  isComplete(): boolean {
    return this.grid.isComplete();
  }

  unknownCount(): number {
    return CELL_COUNT - this.grid.fixedCount;
  }

  /** Total candidates over all unknown cells */
  candidateCount(): number {
    let total = 0;
    for (const mask of this.masks) total += countDigits(mask);
    return total;
  }

  /**
   * Remove a digit from an unknown cell's candidates.
   * Removing a digit that is already absent changes nothing.
   */
  eliminate(index: number, digit: Digit): EliminationResult {
    const mask = this.masks[index];
    if (!hasDigit(mask, digit)) return 'unchanged';

    const next = mask & ~digitBit(digit);
    this.masks[index] = next;
    if (next === EMPTY_MASK) return 'empty';
    if ((next & (next - 1)) === 0) return 'single';
    return 'reduced';
  }

  /**
   * Fix a digit in a cell and remove it from all of the cell's peers.
   * Reports the peers left with a single candidate.
   */
  assign(index: number, digit: Digit): AssignResult {
    const current = this.grid.valueAt(index);
    if (current !== null) {
      if (current === digit) return { ok: true, forced: [] };
      return { ok: false, conflict: `${formatCell(index)} is already ${current}, cannot place ${digit}` };
    }

    const mask = this.masks[index];
    if (!hasDigit(mask, digit)) {
      return {
        ok: false,
        conflict: `${digit} is not a candidate of ${formatCell(index)} ${formatMask(mask)}`,
      };
    }

    this.masks[index] = EMPTY_MASK;
    if (!this.grid.place(index, digit)) {
      return { ok: false, conflict: `${digit} repeats in a unit of ${formatCell(index)}` };
    }

    const forced: number[] = [];
    for (const peer of this.grid.topology.peers[index]) {
      const result = this.eliminate(peer, digit);
      if (result === 'empty') {
        return {
          ok: false,
          conflict: `${formatCell(peer)} has no candidates after placing ${digit} at ${formatCell(index)}`,
        };
      }
      if (result === 'single') forced.push(peer);
    }
    return { ok: true, forced };
  }

  clone(): SearchState {
    return new SearchState(this.grid.clone(), [...this.masks]);
  }
}

export function initializeCandidates(grid: Grid): SearchState {
  return SearchState.initialize(grid);
}
