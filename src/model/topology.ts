/**
 * Unit topology for the classic 9x9 board
 *
 * A unit is a set of 9 cells that must hold every digit exactly once.
 * Rows, columns and boxes are the only place that knows the board's shape,
 * so other rule sets can swap this table out.
 */

import { BOX_SIZE, CELL_COUNT, GRID_SIZE, cellIndex } from './types';

export type UnitKind = 'row' | 'column' | 'box';

export interface Unit {
  /** Position in `Topology.units` */
  id: number;
  kind: UnitKind;
  /** Index among units of the same kind (0..8) */
  index: number;
  cells: readonly number[];
}

export interface UnitRefs {
  row: number;
  column: number;
  box: number;
}

export interface Topology {
  units: readonly Unit[];
  /** cell index -> ids of the units containing it */
  unitsOfCell: readonly (readonly number[])[];
  /** cell index -> distinct cells sharing a unit with it */
  peers: readonly (readonly number[])[];
}

export const boxIndexOf = (row: number, col: number): number =>
  Math.floor(row / BOX_SIZE) * BOX_SIZE + Math.floor(col / BOX_SIZE);

export function unitsOf(row: number, col: number): UnitRefs {
  return { row, column: col, box: boxIndexOf(row, col) };
}

/**
 * Build rows, columns and boxes as 27 units (ids 0-8, 9-17, 18-26)
 */
export function buildClassicTopology(): Topology {
  const units: Unit[] = [];

  for (let row = 0; row < GRID_SIZE; row++) {
    const cells: number[] = [];
    for (let col = 0; col < GRID_SIZE; col++) cells.push(cellIndex(row, col));
    units.push({ id: units.length, kind: 'row', index: row, cells });
  }

  for (let col = 0; col < GRID_SIZE; col++) {
    const cells: number[] = [];
    for (let row = 0; row < GRID_SIZE; row++) cells.push(cellIndex(row, col));
    units.push({ id: units.length, kind: 'column', index: col, cells });
  }

  for (let box = 0; box < GRID_SIZE; box++) {
    const top = Math.floor(box / BOX_SIZE) * BOX_SIZE;
    const left = (box % BOX_SIZE) * BOX_SIZE;
    const cells: number[] = [];
    for (let row = top; row < top + BOX_SIZE; row++) {
      for (let col = left; col < left + BOX_SIZE; col++) {
        cells.push(cellIndex(row, col));
      }
    }
    units.push({ id: units.length, kind: 'box', index: box, cells });
  }

  const unitsOfCell: number[][] = Array.from({ length: CELL_COUNT }, () => []);
  for (const unit of units) {
    for (const cell of unit.cells) unitsOfCell[cell].push(unit.id);
  }

  const peers: number[][] = [];
  for (let cell = 0; cell < CELL_COUNT; cell++) {
    const seen = new Set<number>();
    for (const unitId of unitsOfCell[cell]) {
      for (const other of units[unitId].cells) {
        if (other !== cell) seen.add(other);
      }
    }
    peers.push([...seen].sort((a, b) => a - b));
  }

  return { units, unitsOfCell, peers };
}

export const CLASSIC_TOPOLOGY: Topology = buildClassicTopology();
