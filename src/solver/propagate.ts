/**
 * Constraint propagation to a fixed point
 *
 * Naked and hidden singles always run. Locked candidates and naked pairs
 * only remove candidates; they are switched by config.
 */

import { Unit } from '../model/topology';
import { DIGITS, Digit, formatCell } from '../model/types';
import { countDigits, digitBit, formatMask, hasDigit, maskDigits, singleDigit } from './candidates';
import { SearchState } from './state';

export interface PropagationOptions {
  useLockedCandidates: boolean;
  useNakedPairs: boolean;
}

export interface PropagationResult {
  status: 'quiescent' | 'contradiction';
  conflict?: string;
  /** Cells fixed by naked or hidden singles */
  placements: number;
  /** Candidates removed by locked candidates or naked pairs */
  eliminations: number;
}

interface RuleResult {
  placements: number;
  eliminations: number;
  conflict?: string;
}

const DEFAULT_OPTIONS: PropagationOptions = {
  useLockedCandidates: true,
  useNakedPairs: true,
};

/**
 * Apply the rules until none fires or a contradiction shows up.
 * Mutates `state`; on contradiction the state is dead and must be dropped.
 */
export function propagateConstraints(
  state: SearchState,
  options: PropagationOptions = DEFAULT_OPTIONS
): PropagationResult {
  let placements = 0;
  let eliminations = 0;

  const rules: Array<(s: SearchState) => RuleResult> = [applyNakedSingles, applyHiddenSingles];
  if (options.useLockedCandidates) rules.push(applyLockedCandidates);
  if (options.useNakedPairs) rules.push(applyNakedPairs);

  for (;;) {
    const empty = findEmptyCell(state);
    if (empty !== null) {
      return { status: 'contradiction', conflict: `${formatCell(empty)} has no candidates`, placements, eliminations };
    }

    let progressed = false;
    for (const rule of rules) {
      const result = rule(state);
      placements += result.placements;
      eliminations += result.eliminations;
      if (result.conflict) {
        return { status: 'contradiction', conflict: result.conflict, placements, eliminations };
      }
      // Restart from the cheapest rule after any change
      if (result.placements > 0 || result.eliminations > 0) {
        progressed = true;
        break;
      }
    }

    if (!progressed) {
      return { status: 'quiescent', placements, eliminations };
    }
  }
}

function findEmptyCell(state: SearchState): number | null {
  for (let index = 0; index < state.grid.topology.unitsOfCell.length; index++) {
    if (state.isUnknown(index) && state.candidates(index) === 0) return index;
  }
  return null;
}

/**
 * Naked single: a cell with one candidate left takes it
 */
export function applyNakedSingles(state: SearchState): RuleResult {
  let placements = 0;
  const cellCount = state.grid.topology.unitsOfCell.length;

  for (let index = 0; index < cellCount; index++) {
    if (!state.isUnknown(index)) continue;
    const digit = singleDigit(state.candidates(index));
    if (digit === null) continue;

    const result = state.assign(index, digit);
    if (!result.ok) return { placements, eliminations: 0, conflict: result.conflict };
    placements++;
  }

  return { placements, eliminations: 0 };
}

/**
 * Hidden single: a digit with one possible cell in a unit goes there.
 * A digit with no possible cell in a unit is a contradiction.
 */
export function applyHiddenSingles(state: SearchState): RuleResult {
  let placements = 0;

  for (const unit of state.grid.topology.units) {
    for (const digit of DIGITS) {
      if (state.grid.usedInUnit(unit.id) & digitBit(digit)) continue;

      const holders = cellsWithDigit(state, unit, digit);
      if (holders.length === 0) {
        return { placements, eliminations: 0, conflict: `${digit} has no place in ${unit.kind} ${unit.index}` };
      }
      if (holders.length > 1) continue;

      const result = state.assign(holders[0], digit);
      if (!result.ok) return { placements, eliminations: 0, conflict: result.conflict };
      placements++;
    }
  }

  return { placements, eliminations: 0 };
}

/**
 * Locked candidates (pointing and claiming): when every cell of unit A that
 * can hold a digit also lies in unit B, no cell of B outside A can hold it.
 */
export function applyLockedCandidates(state: SearchState): RuleResult {
  const { units, unitsOfCell } = state.grid.topology;
  let eliminations = 0;

  for (const unit of units) {
    for (const digit of DIGITS) {
      const holders = cellsWithDigit(state, unit, digit);
      if (holders.length < 2) continue;

      const shared = unitsOfCell[holders[0]].filter(
        (id) => id !== unit.id && holders.every((cell) => unitsOfCell[cell].includes(id))
      );

      for (const otherId of shared) {
        for (const cell of units[otherId].cells) {
          if (unitsOfCell[cell].includes(unit.id)) continue;
          const result = state.eliminate(cell, digit);
          if (result === 'empty') {
            return {
              placements: 0,
              eliminations,
              conflict: `${formatCell(cell)} lost its last candidate ${digit} to a locked ${unit.kind}`,
            };
          }
          if (result !== 'unchanged') eliminations++;
        }
      }
    }
  }

  return { placements: 0, eliminations };
}

/**
 * Naked pair: two cells of a unit with the same two candidates own those
 * digits; every other cell of the unit loses them.
 */
export function applyNakedPairs(state: SearchState): RuleResult {
  let eliminations = 0;

  for (const unit of state.grid.topology.units) {
    const pairs = unit.cells.filter((cell) => state.isUnknown(cell) && countDigits(state.candidates(cell)) === 2);

    for (let i = 0; i < pairs.length; i++) {
      for (let j = i + 1; j < pairs.length; j++) {
        const mask = state.candidates(pairs[i]);
        if (countDigits(mask) !== 2 || mask !== state.candidates(pairs[j])) continue;

        for (const cell of unit.cells) {
          if (cell === pairs[i] || cell === pairs[j] || !state.isUnknown(cell)) continue;
          for (const digit of maskDigits(mask)) {
            const result = state.eliminate(cell, digit);
            if (result === 'empty') {
              return {
                placements: 0,
                eliminations,
                conflict: `${formatCell(cell)} emptied by pair ${formatMask(mask)} in ${unit.kind} ${unit.index}`,
              };
            }
            if (result !== 'unchanged') eliminations++;
          }
        }
      }
    }
  }

  return { placements: 0, eliminations };
}

function cellsWithDigit(state: SearchState, unit: Unit, digit: Digit): number[] {
  return unit.cells.filter((cell) => state.isUnknown(cell) && hasDigit(state.candidates(cell), digit));
}
