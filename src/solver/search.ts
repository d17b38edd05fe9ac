/**
 * Backtracking search over propagated states
 *
 * Uses an explicit stack of frames instead of recursion so the same engine
 * can be stepped synchronously or interleaved with the event loop.
 */

import { Digit, SolvedGrid, SolverStats, formatCell } from '../model/types';
import { orderCandidates, selectNextCell } from './heuristics';
import { PropagationOptions, propagateConstraints } from './propagate';
import { SearchState } from './state';

export interface SearchOptions extends PropagationOptions {
  /** Stop once this many solutions are recorded */
  solutionLimit: number;
  /** Node budget, 0 = unlimited */
  maxNodes: number;
  debugLevel: 0 | 1 | 2;
}

export type SearchStatus = 'running' | 'exhausted' | 'limit' | 'aborted';

interface SearchFrame {
  state: SearchState;
  cell: number;
  digits: Digit[];
  next: number;
}

export class SearchEngine {
  private readonly stack: SearchFrame[] = [];
  private readonly found: SolvedGrid[] = [];
  private phase: SearchStatus = 'running';

  /**
   * @param root - a propagated, non-contradictory state; the engine takes ownership
   */
  constructor(
    root: SearchState,
    private readonly options: SearchOptions,
    private readonly stats: SolverStats
  ) {
    this.stats.nodes++;
    this.expand(root);
  }

  get status(): SearchStatus {
    return this.phase;
  }

  get solutions(): readonly SolvedGrid[] {
    return this.found;
  }

  get depth(): number {
    return this.stack.length;
  }

  /**
   * Try the next candidate of the deepest open frame.
   * Returns false once the search has stopped.
   */
  step(): boolean {
    if (this.phase !== 'running') return false;

    const frame = this.stack[this.stack.length - 1];
    if (frame === undefined) {
      this.phase = 'exhausted';
      return false;
    }

    if (this.options.maxNodes > 0 && this.stats.nodes >= this.options.maxNodes) {
      this.phase = 'aborted';
      if (this.options.debugLevel >= 1) {
        console.log(`[SOLVER] Node budget of ${this.options.maxNodes} exhausted`);
      }
      return false;
    }

    const digit = frame.digits[frame.next++];
    const depth = this.stack.length;

    // The last candidate inherits the frame's state instead of copying it
    let child: SearchState;
    if (frame.next === frame.digits.length) {
      this.stack.pop();
      this.stats.backtracks++;
      child = frame.state;
    } else {
      child = frame.state.clone();
    }
    this.stats.nodes++;

    if (this.options.debugLevel >= 2) {
      console.log(`[SOLVER] Depth ${depth}: trying ${digit} at ${formatCell(frame.cell)}`);
    }

    const assigned = child.assign(frame.cell, digit);
    if (!assigned.ok) {
      this.prune(assigned.conflict);
      return true;
    }

    const propagation = propagateConstraints(child, this.options);
    this.stats.placements += propagation.placements;
    this.stats.eliminations += propagation.eliminations;
    if (propagation.status === 'contradiction') {
      this.prune(propagation.conflict ?? 'contradiction');
      return true;
    }

    this.expand(child);
    return this.phase === 'running';
  }

  run(): SearchStatus {
    while (this.step()) {
      // keep stepping
    }
    return this.phase;
  }

  private expand(state: SearchState): void {
    const branch = selectNextCell(state);
    if (branch === null) {
      this.record(state);
      return;
    }
    if (branch.size === 0) {
      this.prune(`${formatCell(branch.index)} has no candidates`);
      return;
    }

    this.stack.push({ state, cell: branch.index, digits: orderCandidates(branch.mask), next: 0 });
  }

  private record(state: SearchState): void {
    const rows = state.grid.toSolvedRows();
    if (rows === null || !state.grid.isValid()) {
      this.prune('complete grid failed validation');
      return;
    }

    this.found.push(rows);
    this.stats.solutions = this.found.length;
    if (this.options.debugLevel >= 1) {
      console.log(`[SOLVER] Found solution ${this.found.length}`);
    }
    if (this.found.length >= this.options.solutionLimit) {
      this.phase = 'limit';
    }
  }

  private prune(reason: string): void {
    this.stats.prunes++;
    if (this.options.debugLevel >= 2) {
      console.log(`[SOLVER] Pruned: ${reason}`);
    }
  }
}
