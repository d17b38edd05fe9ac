/**
 * Sample puzzles
 */

export interface SamplePuzzle {
  id: string;
  name: string;
  yaml: string;
  /** Expected completion as 81 digits; absent when the puzzle is not well-posed */
  solution?: string;
}

export const SAMPLE_PUZZLES: SamplePuzzle[] = [
  {
    id: 'classic',
    name: 'Classic newspaper puzzle',
    yaml: `# Solved by singles alone
name: Classic newspaper puzzle
grid: |
  53..7....
  6..195...
  .98....6.
  8...6...3
  4..8.3..1
  7...2...6
  .6....28.
  ...419..5
  ....8..79
`,
    solution: '534678912672195348198342567859761423426853791713924856961537284287419635345286179',
  },
  {
    id: 'sparse',
    name: 'Sparse',
    yaml: `# 22 clues, still no guessing needed
name: Sparse
grid: "300080200090000000000000056004001003710000000000500090009060080800700001060005700"
`,
    solution: '345986217196257438287413956954621873712398645638574192579162384823749561461835729',
  },
  {
    id: 'hard',
    name: 'Hard, needs search',
    yaml: `name: Hard, needs search
grid:
  - [0, 0, 0, 0, 5, 0, 0, 0, 0]
  - [0, 1, 0, 0, 0, 0, 3, 0, 0]
  - [7, 0, 0, 8, 0, 1, 0, 6, 0]
  - [0, 2, 3, 0, 0, 0, 0, 0, 8]
  - [0, 0, 0, 0, 0, 7, 0, 2, 0]
  - [4, 0, 0, 0, 0, 0, 9, 0, 0]
  - [0, 0, 0, 3, 0, 4, 0, 0, 7]
  - [6, 7, 0, 5, 0, 0, 0, 3, 0]
  - [0, 4, 1, 0, 0, 2, 0, 0, 9]
`,
    solution: '264953871815476392739821465123695748986147523457238916592364187678519234341782659',
  },
  {
    id: 'two-solutions',
    name: 'Two solutions',
    yaml: `# A 6/7 rectangle across two boxes can be swapped
name: Two solutions
grid: "534..8912672195348198342567859..1423426853791713924856961537284287419635345286179"
`,
  },
];
