/**
 * Core type definitions for the Sudoku solver
 */

// ===== Puzzle Types =====

export type Digit = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

export const DIGITS: readonly Digit[] = [1, 2, 3, 4, 5, 6, 7, 8, 9];

export const GRID_SIZE = 9;
export const BOX_SIZE = 3;
export const CELL_COUNT = GRID_SIZE * GRID_SIZE;

/**
 * One entry of the input matrix: a digit, or `null` / `0` for a blank cell.
 */
export type CellInput = number | null;

/**
 * 9x9 matrix handed to the solver by its caller.
 */
export type PuzzleInput = ReadonlyArray<ReadonlyArray<CellInput>>;

/** A completed 9x9 grid, rows of digits */
export type SolvedGrid = Digit[][];

export interface Cell {
  row: number;
  col: number;
}

// ===== Validation Types =====

export interface ValidationIssue {
  level: 'info' | 'warning' | 'error';
  message: string;
  cell?: Cell;
}

export interface ValidationReport {
  ok: boolean;
  issues: ValidationIssue[];
}

// ===== Solver Types =====

export interface SolverStats {
  nodes: number;
  backtracks: number;
  prunes: number;
  /** Cells fixed by propagation (naked and hidden singles) */
  placements: number;
  /** Candidates removed by locked candidates and naked pairs */
  eliminations: number;
  solutions: number;
  timeMs: number;
}

export interface SolverProgress {
  nodes: number;
  backtracks: number;
  prunes: number;
  currentDepth: number;
  completed: boolean;
  cancelled: boolean;
}

export type Outcome =
  | { status: 'solved'; solution: SolvedGrid }
  | { status: 'unsolvable' }
  | { status: 'multiple'; solutions: [SolvedGrid, SolvedGrid] }
  | { status: 'invalid'; reason: string; issues: ValidationIssue[] }
  | { status: 'aborted'; reason: string };

export type OutcomeStatus = Outcome['status'];

export type SolveResult = Outcome & {
  stats: SolverStats;
  validationReport: ValidationReport;
};

// ===== Utility Types =====

export const cellIndex = (row: number, col: number): number => row * GRID_SIZE + col;

export const cellAt = (index: number): Cell => ({
  row: Math.floor(index / GRID_SIZE),
  col: index % GRID_SIZE,
});

export const formatCell = (index: number): string => {
  const { row, col } = cellAt(index);
  return `(${row},${col})`;
};

export const isDigit = (value: unknown): value is Digit =>
  typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= 9;

export const createEmptyStats = (): SolverStats => ({
  nodes: 0,
  backtracks: 0,
  prunes: 0,
  placements: 0,
  eliminations: 0,
  solutions: 0,
  timeMs: 0,
});
