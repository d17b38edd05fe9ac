/**
 * The 9x9 board of fixed and unknown cells
 */

import { InvalidInputError } from './errors';
import { CLASSIC_TOPOLOGY, Topology, UnitRefs, unitsOf } from './topology';
import { CELL_COUNT, Digit, GRID_SIZE, SolvedGrid, cellIndex } from './types';
import { validateInput } from '../validator/validateInput';

/**
 * Cells are stored row-major; `null` is an unknown cell.
 * Each unit keeps a mask of the digits fixed in it so validity is tracked
 * per placement instead of by rescanning the board.
 */
export class Grid {
  private constructor(
    public readonly topology: Topology,
    private readonly cells: (Digit | null)[],
    private readonly usedByUnit: number[],
    private fixed: number,
    private duplicates: number
  ) {}

  /**
   * Build a grid from the caller's 9x9 matrix.
   * @throws InvalidInputError on a bad shape, a digit outside 1-9, or duplicate givens
   */
  static fromInput(input: unknown, topology: Topology = CLASSIC_TOPOLOGY): Grid {
    const { report, cells } = validateInput(input, topology);
    if (!report.ok || cells === null) {
      const firstError = report.issues.find((i) => i.level === 'error');
      throw new InvalidInputError(firstError?.message ?? 'Invalid puzzle', report);
    }

    const grid = Grid.empty(topology);
    cells.forEach((digit, index) => {
      if (digit !== null) grid.place(index, digit);
    });
    return grid;
  }

  static empty(topology: Topology = CLASSIC_TOPOLOGY): Grid {
    return new Grid(
      topology,
      Array<Digit | null>(CELL_COUNT).fill(null),
      Array<number>(topology.units.length).fill(0),
      0,
      0
    );
  }

  get(row: number, col: number): Digit | null {
    return this.cells[cellIndex(row, col)];
  }

  valueAt(index: number): Digit | null {
    return this.cells[index];
  }

  unitsOf(row: number, col: number): UnitRefs {
    return unitsOf(row, col);
  }

  /** Mask of digits already fixed in a unit (bit d-1 for digit d) */
  usedInUnit(unitId: number): number {
    return this.usedByUnit[unitId];
  }

  get fixedCount(): number {
    return this.fixed;
  }

  isComplete(): boolean {
    return this.fixed === CELL_COUNT;
  }

  isValid(): boolean {
    return this.duplicates === 0;
  }

  /**
   * Fix a digit in an unknown cell.
   * Returns false when the digit already appears in one of the cell's units;
   * the placement is still recorded and the grid stops being valid.
   */
  place(index: number, digit: Digit): boolean {
    if (this.cells[index] !== null) {
      throw new Error(`Cell ${index} is already fixed`);
    }
    this.cells[index] = digit;
    this.fixed++;

    const bit = 1 << (digit - 1);
    let clean = true;
    for (const unitId of this.topology.unitsOfCell[index]) {
      if (this.usedByUnit[unitId] & bit) {
        this.duplicates++;
        clean = false;
      }
      this.usedByUnit[unitId] |= bit;
    }
    return clean;
  }

  clone(): Grid {
    return new Grid(this.topology, [...this.cells], [...this.usedByUnit], this.fixed, this.duplicates);
  }

  toRows(): (Digit | null)[][] {
    const rows: (Digit | null)[][] = [];
    for (let row = 0; row < GRID_SIZE; row++) {
      rows.push(this.cells.slice(row * GRID_SIZE, (row + 1) * GRID_SIZE));
    }
    return rows;
  }

  /**
   * Rows of a complete grid; null while any cell is unknown
   */
  toSolvedRows(): SolvedGrid | null {
    const rows: SolvedGrid = [];
    for (let row = 0; row < GRID_SIZE; row++) {
      const digits: Digit[] = [];
      for (let col = 0; col < GRID_SIZE; col++) {
        const digit = this.get(row, col);
        if (digit === null) return null;
        digits.push(digit);
      }
      rows.push(digits);
    }
    return rows;
  }
}
