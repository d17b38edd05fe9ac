import { CLASSIC, EMPTY, toInput, withCell } from '../../__tests__/fixtures';
import { validateInput } from '../validateInput';

describe('validateInput', () => {
  it('should accept a well-formed puzzle', () => {
    const { report, cells } = validateInput(toInput(CLASSIC));
    expect(report).toEqual({ ok: true, issues: [] });
    expect(cells).toHaveLength(81);
    expect(cells?.[0]).toBe(5);
    expect(cells?.[2]).toBeNull();
  });

  it('should warn about too few givens without failing', () => {
    const { report } = validateInput(toInput(EMPTY));
    expect(report).toEqual({
      ok: true,
      issues: [{ level: 'warning', message: 'Only 0 givens; fewer than 17 cannot have a unique solution' }],
    });
  });

  it('should treat 0 as blank', () => {
    const rows = toInput(CLASSIC).map((row) => row.map((v) => v ?? 0));
    expect(validateInput(rows).cells).toEqual(validateInput(toInput(CLASSIC)).cells);
  });

  describe('shape', () => {
    it('should reject a grid with the wrong number of rows', () => {
      const { report, cells } = validateInput(toInput(CLASSIC).slice(1));
      expect(cells).toBeNull();
      expect(report.issues).toEqual([{ level: 'error', message: 'Grid: grid must have 9 rows' }]);
    });

    it('should reject a short row', () => {
      const rows = toInput(CLASSIC).map((row) => [...row]);
      rows[3] = rows[3].slice(0, 8);
      expect(validateInput(rows).report.issues).toEqual([
        { level: 'error', message: 'Row 3: each row must have 9 cells' },
      ]);
    });

    it('should point at a cell that is not a number', () => {
      const rows: unknown[][] = toInput(CLASSIC).map((row) => [...row]);
      rows[1][2] = 'x';
      const { report } = validateInput(rows);
      expect(report.ok).toBe(false);
      expect(report.issues[0].cell).toEqual({ row: 1, col: 2 });
      expect(report.issues[0].message).toBe('Cell (1,2): Expected number, received string');
    });

    it('should name NaN as the received value', () => {
      const rows = toInput(CLASSIC).map((row) => [...row]);
      rows[4][4] = NaN;
      expect(validateInput(rows).report.issues).toEqual([
        { level: 'error', message: 'Cell (4,4): Expected number, received nan', cell: { row: 4, col: 4 } },
      ]);
    });
  });

  describe('digits', () => {
    it.each([10, -1, 1.5])('should reject %p', (value) => {
      const rows = toInput(CLASSIC).map((row) => [...row]);
      rows[0][2] = value;
      const { report } = validateInput(rows);
      expect(report.ok).toBe(false);
      expect(report.issues[0]).toEqual({
        level: 'error',
        message: `Digit out of range at (0,2): ${value}`,
        cell: { row: 0, col: 2 },
      });
    });
  });

  describe('duplicates', () => {
    it('should report a repeated digit in a column', () => {
      const { report } = validateInput(toInput(withCell(withCell(EMPTY, 0, 0, '7'), 5, 0, '7')));
      expect(report.ok).toBe(false);
      expect(report.issues[0]).toEqual({
        level: 'error',
        message: 'Duplicate 7 in column 0 at (0,0) and (5,0)',
        cell: { row: 5, col: 0 },
      });
    });

    it('should report a repeated digit in a box', () => {
      const { report } = validateInput(toInput(withCell(withCell(EMPTY, 0, 0, '4'), 1, 1, '4')));
      expect(report.issues.filter((i) => i.level === 'error').map((i) => i.message)).toEqual([
        'Duplicate 4 in box 0 at (0,0) and (1,1)',
      ]);
    });
  });
});
