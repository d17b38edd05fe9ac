import { CLASSIC_TOPOLOGY, Topology } from '../model/topology';
import {
  DIGITS,
  GRID_SIZE,
  PuzzleInput,
  SolvedGrid,
  ValidationIssue,
  ValidationReport,
  cellAt,
  isDigit,
} from '../model/types';

/**
 * Check that a completed grid is a legal solution of `puzzle`:
 * every unit holds 1-9 exactly once and every given keeps its value.
 */
export function validateSolution(
  puzzle: PuzzleInput,
  solution: SolvedGrid,
  topology: Topology = CLASSIC_TOPOLOGY
): ValidationReport {
  const issues: ValidationIssue[] = [];

  if (solution.length !== GRID_SIZE) {
    issues.push({ level: 'error', message: 'Solution rows mismatch' });
  }
  solution.forEach((row, r) => {
    if (row.length !== GRID_SIZE) {
      issues.push({ level: 'error', message: `Solution cols mismatch at row ${r}` });
    }
  });
  if (issues.length > 0) {
    return { ok: false, issues };
  }

  solution.forEach((row, r) =>
    row.forEach((value, c) => {
      if (!isDigit(value)) {
        issues.push({ level: 'error', message: `Cell (${r},${c}) is not a digit: ${value}`, cell: { row: r, col: c } });
      }
      const given = puzzle[r]?.[c];
      if (isDigit(given) && given !== value) {
        issues.push({
          level: 'error',
          message: `Given ${given} at (${r},${c}) changed to ${value}`,
          cell: { row: r, col: c },
        });
      }
    })
  );

  for (const unit of topology.units) {
    const values = unit.cells.map((index) => {
      const { row, col } = cellAt(index);
      return solution[row][col];
    });
    const missing = DIGITS.filter((d) => !values.includes(d));
    if (missing.length > 0) {
      issues.push({
        level: 'error',
        message: `${unit.kind} ${unit.index} is missing ${missing.join(',')}`,
      });
    }
  }

  return { ok: !issues.some((i) => i.level === 'error'), issues };
}
