import { CLASSIC, CLASSIC_SOLUTION, EMPTY, toInput, withCell } from '../../__tests__/fixtures';
import { InvalidInputError } from '../errors';
import { Grid } from '../grid';

describe('Grid', () => {
  describe('fromInput', () => {
    it('should load givens and leave blanks unknown', () => {
      const grid = Grid.fromInput(toInput(CLASSIC));
      expect(grid.get(0, 0)).toBe(5);
      expect(grid.get(0, 2)).toBeNull();
      expect(grid.get(8, 8)).toBe(9);
      expect(grid.fixedCount).toBe(30);
      expect(grid.isComplete()).toBe(false);
      expect(grid.isValid()).toBe(true);
    });

    it('should treat 0 as a blank', () => {
      const rows = toInput(EMPTY).map((row) => row.map(() => 0));
      expect(Grid.fromInput(rows).fixedCount).toBe(0);
    });

    it('should reject duplicate givens with the first conflict', () => {
      const input = toInput(withCell(withCell(EMPTY, 0, 0, '5'), 0, 1, '5'));
      expect(() => Grid.fromInput(input)).toThrow(InvalidInputError);
      expect(() => Grid.fromInput(input)).toThrow('Duplicate 5 in row 0 at (0,0) and (0,1)');
    });

    it('should carry the validation report on the error', () => {
      const rows = toInput(EMPTY).slice(0, 8);
      let caught: unknown;
      try {
        Grid.fromInput(rows);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(InvalidInputError);
      if (caught instanceof InvalidInputError) {
        expect(caught.report.ok).toBe(false);
        expect(caught.report.issues[0].message).toBe('Grid: grid must have 9 rows');
      }
    });

    it('should reject digits outside 1-9', () => {
      const rows = toInput(EMPTY).map((row) => [...row]);
      rows[2][3] = 10;
      expect(() => Grid.fromInput(rows)).toThrow('Digit out of range at (2,3): 10');
    });
  });

  describe('place', () => {
    it('should track duplicates incrementally', () => {
      const grid = Grid.empty();
      expect(grid.place(0, 5)).toBe(true);
      expect(grid.isValid()).toBe(true);
      expect(grid.place(1, 5)).toBe(false);
      expect(grid.isValid()).toBe(false);
      expect(grid.fixedCount).toBe(2);
    });

    it('should record used digits per unit', () => {
      const grid = Grid.empty();
      grid.place(40, 7);
      const { row, column, box } = grid.unitsOf(4, 4);
      expect(grid.usedInUnit(row)).toBe(1 << 6);
      expect(grid.usedInUnit(9 + column)).toBe(1 << 6);
      expect(grid.usedInUnit(18 + box)).toBe(1 << 6);
      expect(grid.usedInUnit(0)).toBe(0);
    });

    it('should refuse to overwrite a fixed cell', () => {
      const grid = Grid.fromInput(toInput(CLASSIC));
      expect(() => grid.place(0, 5)).toThrow('Cell 0 is already fixed');
    });
  });

  it('should clone independently', () => {
    const grid = Grid.fromInput(toInput(CLASSIC));
    const copy = grid.clone();
    copy.place(2, 4);
    expect(copy.get(0, 2)).toBe(4);
    expect(grid.get(0, 2)).toBeNull();
    expect(grid.fixedCount).toBe(30);
  });

  it('should only produce solved rows once complete', () => {
    expect(Grid.fromInput(toInput(CLASSIC)).toSolvedRows()).toBeNull();

    const solved = Grid.fromInput(toInput(CLASSIC_SOLUTION));
    expect(solved.isComplete()).toBe(true);
    expect(solved.toSolvedRows()?.[0]).toEqual([5, 3, 4, 6, 7, 8, 9, 1, 2]);
  });

  it('should expose rows with null blanks', () => {
    const rows = Grid.fromInput(toInput(CLASSIC)).toRows();
    expect(rows).toHaveLength(9);
    expect(rows[0]).toEqual([5, 3, null, null, 7, null, null, null, null]);
  });
});
