/**
 * Parser for puzzle text: 81-character strings, 9-line grids and YAML/JSON documents
 */

import { parse as parseYAML, stringify as stringifyYAML } from 'yaml';
import { z } from 'zod';
import { CELL_COUNT, CellInput, GRID_SIZE, PuzzleInput, isDigit } from './types';

export interface ParseResult {
  success: boolean;
  input?: PuzzleInput;
  name?: string;
  error?: string;
}

const PUZZLE_STRING = new RegExp(`^[0-9.]{${CELL_COUNT}}$`);

const PuzzleDocumentSchema = z.object({
  name: z.string().optional(),
  grid: z.union([z.string(), z.array(z.array(z.number().nullable()))]),
});

/**
 * Read digits left-to-right, top-to-bottom; `0` and `.` are blanks and
 * whitespace is ignored. Null when the text is not such a grid.
 */
export function parsePuzzleString(text: string): PuzzleInput | null {
  const compact = text.replace(/\s+/g, '');
  if (!PUZZLE_STRING.test(compact)) return null;

  const rows: CellInput[][] = [];
  for (let r = 0; r < GRID_SIZE; r++) {
    const row: CellInput[] = [];
    for (let c = 0; c < GRID_SIZE; c++) {
      const ch = compact[r * GRID_SIZE + c];
      row.push(ch === '.' || ch === '0' ? null : Number(ch));
    }
    rows.push(row);
  }
  return rows;
}

/**
 * Parse a puzzle string, or a JSON/YAML document `{ name?, grid }` where
 * `grid` is a puzzle string or a 9x9 matrix. Shape and digit checks are left
 * to the solver's input validation.
 */
export function parsePuzzle(text: string): ParseResult {
  const direct = parsePuzzleString(text);
  if (direct !== null) {
    return { success: true, input: direct };
  }

  try {
    // Try parsing as JSON first
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch {
      // If JSON fails, try YAML
      data = parseYAML(text);
    }

    if (data === null || data === undefined) {
      return { success: false, error: 'Empty puzzle specification' };
    }

    const parsed = PuzzleDocumentSchema.safeParse(data);
    if (!parsed.success) {
      const details = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || 'document'}: ${issue.message}`)
        .join('; ');
      return { success: false, error: `Invalid puzzle document: ${details}` };
    }

    const { name, grid } = parsed.data;
    if (typeof grid === 'string') {
      const input = parsePuzzleString(grid);
      if (input === null) {
        return { success: false, error: `"grid" must hold ${CELL_COUNT} digits or dots` };
      }
      return { success: true, input, name };
    }
    return { success: true, input: grid, name };
  } catch (error) {
    return {
      success: false,
      error: `Parse error: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
}

/**
 * 81 characters, `.` for blanks
 */
export function formatGrid(rows: PuzzleInput): string {
  return rows.map((row) => row.map((value) => (isDigit(value) ? String(value) : '.')).join('')).join('');
}

/**
 * One line per row, cells separated by spaces, `.` for blanks
 */
export function formatRows(rows: PuzzleInput): string {
  return rows.map((row) => row.map((value) => (isDigit(value) ? String(value) : '.')).join(' ') + '\n').join('');
}

/**
 * Convert a puzzle to a YAML document with one grid line per row
 */
export function puzzleToYAML(input: PuzzleInput, name?: string): string {
  const flat = formatGrid(input);
  const lines: string[] = [];
  for (let r = 0; r < GRID_SIZE; r++) {
    lines.push(flat.slice(r * GRID_SIZE, (r + 1) * GRID_SIZE));
  }
  return stringifyYAML(name === undefined ? { grid: lines.join('\n') } : { name, grid: lines.join('\n') });
}
