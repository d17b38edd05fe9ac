/**
 * Validate a starting grid before any solving work
 */

import { z } from 'zod';
import { CLASSIC_TOPOLOGY, Topology } from '../model/topology';
import {
  Digit,
  GRID_SIZE,
  ValidationIssue,
  ValidationReport,
  cellAt,
  isDigit,
} from '../model/types';

/** Fewest givens any uniquely solvable 9x9 puzzle can have */
export const MIN_UNIQUE_GIVENS = 17;

const RowSchema = z
  .array(z.number().nullable())
  .length(GRID_SIZE, `each row must have ${GRID_SIZE} cells`);

export const PuzzleInputSchema = z.array(RowSchema).length(GRID_SIZE, `grid must have ${GRID_SIZE} rows`);

export interface InputValidation {
  report: ValidationReport;
  /** Row-major digits, `null` for blanks; `null` when the shape itself is wrong */
  cells: (Digit | null)[] | null;
}

/**
 * Check shape, digit range and duplicate givens.
 * Blank cells may be given as `null` or `0`.
 */
export function validateInput(input: unknown, topology: Topology = CLASSIC_TOPOLOGY): InputValidation {
  const issues: ValidationIssue[] = [];

  const parsed = PuzzleInputSchema.safeParse(input);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      const [row, col] = issue.path;
      if (typeof row === 'number' && typeof col === 'number') {
        issues.push({ level: 'error', message: `Cell (${row},${col}): ${issue.message}`, cell: { row, col } });
      } else if (typeof row === 'number') {
        issues.push({ level: 'error', message: `Row ${row}: ${issue.message}` });
      } else {
        issues.push({ level: 'error', message: `Grid: ${issue.message}` });
      }
    }
    return { report: { ok: false, issues }, cells: null };
  }

  const cells: (Digit | null)[] = [];
  let givens = 0;
  parsed.data.forEach((rowValues, row) => {
    rowValues.forEach((value, col) => {
      if (value === null || value === 0) {
        cells.push(null);
      } else if (isDigit(value)) {
        cells.push(value);
        givens++;
      } else {
        cells.push(null);
        issues.push({
          level: 'error',
          message: `Digit out of range at (${row},${col}): ${value}`,
          cell: { row, col },
        });
      }
    });
  });

  for (const unit of topology.units) {
    const firstSeen = new Map<Digit, number>();
    for (const index of unit.cells) {
      const digit = cells[index];
      if (digit === null) continue;
      const previous = firstSeen.get(digit);
      if (previous === undefined) {
        firstSeen.set(digit, index);
        continue;
      }
      const a = cellAt(previous);
      const b = cellAt(index);
      issues.push({
        level: 'error',
        message: `Duplicate ${digit} in ${unit.kind} ${unit.index} at (${a.row},${a.col}) and (${b.row},${b.col})`,
        cell: b,
      });
    }
  }

  if (givens < MIN_UNIQUE_GIVENS) {
    issues.push({
      level: 'warning',
      message: `Only ${givens} givens; fewer than ${MIN_UNIQUE_GIVENS} cannot have a unique solution`,
    });
  }

  return { report: { ok: !issues.some((i) => i.level === 'error'), issues }, cells };
}
