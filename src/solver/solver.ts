/**
 * Main solver: constraint propagation first, backtracking search for the rest
 */

import { SolverConfig, SolverConfigInput, resolveSolverConfig } from '../config/solver';
import { InvalidInputError } from '../model/errors';
import { Grid } from '../model/grid';
import {
  Outcome,
  PuzzleInput,
  SolveResult,
  SolverProgress,
  SolverStats,
  ValidationReport,
  createEmptyStats,
} from '../model/types';
import { validateSolution } from '../validator/validateSolution';
import { propagateConstraints } from './propagate';
import { SearchEngine } from './search';
import { initializeCandidates } from './state';

export interface AsyncSolveHooks {
  onProgress?: (progress: SolverProgress) => void;
  signal?: AbortSignal;
}

type Prepared =
  | { kind: 'done'; outcome: Outcome; report?: ValidationReport; givens: PuzzleInput }
  | { kind: 'search'; engine: SearchEngine; givens: PuzzleInput };

/**
 * Solve a 9x9 puzzle and certify whether its solution is unique.
 * Never throws for a bad grid: that is the `invalid` outcome.
 */
export function solveSudoku(input: unknown, options: SolverConfigInput = {}): SolveResult {
  const config = resolveSolverConfig(options);
  const startTime = Date.now();
  const stats = createEmptyStats();

  const prepared = prepare(input, config, stats);
  if (prepared.kind === 'done') {
    return finish(prepared.outcome, prepared.givens, stats, startTime, config, prepared.report);
  }

  prepared.engine.run();
  return finish(outcomeOfSearch(prepared.engine, config), prepared.givens, stats, startTime, config);
}

/**
 * Non-blocking solver that yields every `progressInterval` nodes.
 * An aborted signal ends the solve with an `aborted` outcome.
 */
export async function solveSudokuAsync(
  input: unknown,
  options: SolverConfigInput = {},
  hooks: AsyncSolveHooks = {}
): Promise<SolveResult> {
  const config = resolveSolverConfig(options);
  const startTime = Date.now();
  const stats = createEmptyStats();
  const { onProgress, signal } = hooks;

  const prepared = prepare(input, config, stats);
  if (prepared.kind === 'done') {
    return finish(prepared.outcome, prepared.givens, stats, startTime, config, prepared.report);
  }

  const { engine } = prepared;
  const report = (completed: boolean, cancelled: boolean) => {
    onProgress?.({
      nodes: stats.nodes,
      backtracks: stats.backtracks,
      prunes: stats.prunes,
      currentDepth: engine.depth,
      completed,
      cancelled,
    });
  };

  let steps = 0;
  while (!signal?.aborted && engine.step()) {
    steps++;
    if (steps % config.progressInterval === 0) {
      report(false, false);
      await new Promise<void>((resolve) => setTimeout(resolve, 0));
    }
  }

  if (signal?.aborted) {
    report(true, true);
    return finish({ status: 'aborted', reason: 'cancelled' }, prepared.givens, stats, startTime, config);
  }

  report(true, false);
  return finish(outcomeOfSearch(engine, config), prepared.givens, stats, startTime, config);
}

/**
 * Validate, build candidates and propagate at the root.
 * Only a stuck, consistent root is handed to search.
 */
function prepare(input: unknown, config: SolverConfig, stats: SolverStats): Prepared {
  let grid: Grid;
  try {
    grid = Grid.fromInput(input);
  } catch (error) {
    if (error instanceof InvalidInputError) {
      return {
        kind: 'done',
        outcome: { status: 'invalid', reason: error.message, issues: error.report.issues },
        report: error.report,
        givens: [],
      };
    }
    throw error;
  }

  const givens = grid.toRows();
  const state = initializeCandidates(grid);
  const propagation = propagateConstraints(state, config);
  stats.placements += propagation.placements;
  stats.eliminations += propagation.eliminations;

  if (propagation.status === 'contradiction') {
    return {
      kind: 'done',
      outcome: { status: 'unsolvable' },
      report: { ok: false, issues: [{ level: 'error', message: propagation.conflict ?? 'contradiction' }] },
      givens,
    };
  }

  // Every step so far was forced, so a complete grid here is the only solution
  if (state.isComplete()) {
    const solution = state.grid.toSolvedRows();
    if (solution !== null) {
      stats.solutions = 1;
      return { kind: 'done', outcome: { status: 'solved', solution }, givens };
    }
  }

  return { kind: 'search', engine: new SearchEngine(state, config, stats), givens };
}

function outcomeOfSearch(engine: SearchEngine, config: SolverConfig): Outcome {
  const [first, second] = engine.solutions;

  if (engine.status === 'aborted') {
    const found = engine.solutions.length;
    return {
      status: 'aborted',
      reason:
        found > 0
          ? `node budget of ${config.maxNodes} exhausted after ${found} solution(s)`
          : `node budget of ${config.maxNodes} exhausted`,
    };
  }
  if (engine.status === 'running') {
    throw new Error('Search has not finished');
  }

  if (first !== undefined && second !== undefined) {
    return { status: 'multiple', solutions: [first, second] };
  }
  if (first !== undefined) {
    return { status: 'solved', solution: first };
  }
  return { status: 'unsolvable' };
}

function finish(
  outcome: Outcome,
  givens: PuzzleInput,
  stats: SolverStats,
  startTime: number,
  config: SolverConfig,
  report?: ValidationReport
): SolveResult {
  stats.timeMs = Date.now() - startTime;

  let validationReport: ValidationReport;
  if (report) {
    validationReport = report;
  } else if (outcome.status === 'solved') {
    validationReport = validateSolution(givens, outcome.solution);
  } else if (outcome.status === 'multiple') {
    const reports = outcome.solutions.map((s) => validateSolution(givens, s));
    validationReport = {
      ok: reports.every((r) => r.ok),
      issues: reports.flatMap((r) => r.issues),
    };
  } else if (outcome.status === 'unsolvable') {
    validationReport = { ok: false, issues: [{ level: 'error', message: 'Search exhausted every branch' }] };
  } else if (outcome.status === 'aborted') {
    validationReport = { ok: false, issues: [{ level: 'error', message: outcome.reason }] };
  } else {
    validationReport = { ok: false, issues: outcome.issues };
  }

  if (config.debugLevel >= 1) {
    console.log(
      `[SOLVER] ${outcome.status}: nodes=${stats.nodes} backtracks=${stats.backtracks} prunes=${stats.prunes} time=${stats.timeMs}ms`
    );
  }

  return { ...outcome, stats, validationReport };
}
