/**
 * Solver Configuration
 * Defaults and validation for the options accepted by solveSudoku
 */

import { z } from 'zod';

// ════════════════════════════════════════════════════════════════════════════
// Schema
// ════════════════════════════════════════════════════════════════════════════

export const SolverConfigSchema = z.object({
  /** Solutions to collect before stopping; 2 certifies uniqueness */
  solutionLimit: z.number().int().min(1).default(2),
  /** Search node budget, 0 = unlimited */
  maxNodes: z.number().int().min(0).default(1000000),
  useLockedCandidates: z.boolean().default(true),
  useNakedPairs: z.boolean().default(true),
  /** Nodes between yields in the non-blocking solver */
  progressInterval: z.number().int().min(1).default(500),
  debugLevel: z.union([z.literal(0), z.literal(1), z.literal(2)]).default(0), // 0=off, 1=basic, 2=verbose
});

export type SolverConfig = z.infer<typeof SolverConfigSchema>;

export type SolverConfigInput = z.input<typeof SolverConfigSchema>;

// ════════════════════════════════════════════════════════════════════════════
// Defaults
// ════════════════════════════════════════════════════════════════════════════

export const DEFAULT_SOLVER_CONFIG: SolverConfig = SolverConfigSchema.parse({});

/**
 * Merge caller options over the defaults.
 * @throws ZodError when an option is out of range
 */
export function resolveSolverConfig(config: SolverConfigInput = {}): SolverConfig {
  return SolverConfigSchema.parse(config);
}
