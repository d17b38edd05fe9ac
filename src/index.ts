export { solveSudoku, solveSudokuAsync } from './solver/solver';
export type { AsyncSolveHooks } from './solver/solver';
export { SearchEngine } from './solver/search';
export type { SearchOptions, SearchStatus } from './solver/search';
export { propagateConstraints } from './solver/propagate';
export type { PropagationOptions, PropagationResult } from './solver/propagate';
export { SearchState, initializeCandidates } from './solver/state';
export type { AssignResult, EliminationResult } from './solver/state';
export { selectNextCell, orderCandidates } from './solver/heuristics';
export { Grid } from './model/grid';
export { InvalidInputError } from './model/errors';
export { CLASSIC_TOPOLOGY, buildClassicTopology, unitsOf } from './model/topology';
export type { Topology, Unit, UnitKind, UnitRefs } from './model/topology';
export { parsePuzzle, parsePuzzleString, formatGrid, formatRows, puzzleToYAML } from './model/parser';
export type { ParseResult } from './model/parser';
export { validateInput } from './validator/validateInput';
export { validateSolution } from './validator/validateSolution';
export { DEFAULT_SOLVER_CONFIG, SolverConfigSchema, resolveSolverConfig } from './config/solver';
export type { SolverConfig, SolverConfigInput } from './config/solver';
export { SAMPLE_PUZZLES } from './samples';
export * from './model/types';
