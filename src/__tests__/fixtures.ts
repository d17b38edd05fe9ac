/**
 * Shared puzzle fixtures for the test suites
 */

import { parsePuzzleString } from '../model/parser';
import { Digit, PuzzleInput, isDigit } from '../model/types';

export const CLASSIC = '53..7....6..195....98....6.8...6...34..8.3..17...2...6.6....28....419..5....8..79';
export const CLASSIC_SOLUTION = '534678912672195348198342567859761423426853791713924856961537284287419635345286179';

/** 22 clues, still decided by propagation alone */
export const SPARSE = '300080200090000000000000056004001003710000000000500090009060080800700001060005700';
export const SPARSE_SOLUTION = '345986217196257438287413956954621873712398645638574192579162384823749561461835729';

/** Needs search even with every propagation rule on */
export const HARD = '000050000010000300700801060023000008000007020400000900000304007670500030041002009';
export const HARD_SOLUTION = '264953871815476392739821465123695748986147523457238916592364187678519234341782659';

/** HARD with a wrong but non-conflicting clue at (0,2); only search can refute it */
export const HARD_BROKEN = '002050000010000300700801060023000008000007020400000900000304007670500030041002009';

/** CLASSIC_SOLUTION with a 6/7 rectangle blanked at (0,3) (0,4) (3,3) (3,4) */
export const TWO_SOLUTIONS = '534..8912672195348198342567859..1423426853791713924856961537284287419635345286179';
export const TWO_SOLUTIONS_SWAPPED = '534768912672195348198342567859671423426853791713924856961537284287419635345286179';

/** (0,8) is left with no candidate: row 0 holds 1-8 and column 8 holds 9 */
export const DEAD_CELL = '12345678.' + '........9' + '.'.repeat(63);

export const EMPTY = '.'.repeat(81);

export function toInput(text: string): PuzzleInput {
  const input = parsePuzzleString(text);
  if (input === null) {
    throw new Error(`Not a puzzle string: ${text}`);
  }
  return input;
}

export function toRows(text: string): Digit[][] {
  const rows: Digit[][] = [];
  for (let r = 0; r < 9; r++) {
    const row: Digit[] = [];
    for (let c = 0; c < 9; c++) {
      const value = Number(text[r * 9 + c]);
      if (!isDigit(value)) throw new Error(`Not a solved grid: ${text}`);
      row.push(value);
    }
    rows.push(row);
  }
  return rows;
}

/** Copy of a puzzle string with one cell replaced */
export function withCell(text: string, row: number, col: number, ch: string): string {
  const index = row * 9 + col;
  return text.slice(0, index) + ch + text.slice(index + 1);
}
