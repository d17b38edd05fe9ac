import { ZodError } from 'zod';
import { DEFAULT_SOLVER_CONFIG, resolveSolverConfig } from '../solver';

describe('resolveSolverConfig', () => {
  it('should fill in every default', () => {
    expect(resolveSolverConfig()).toEqual({
      solutionLimit: 2,
      maxNodes: 1000000,
      useLockedCandidates: true,
      useNakedPairs: true,
      progressInterval: 500,
      debugLevel: 0,
    });
    expect(DEFAULT_SOLVER_CONFIG).toEqual(resolveSolverConfig({}));
  });

  it('should keep caller overrides', () => {
    const config = resolveSolverConfig({ maxNodes: 0, useNakedPairs: false, debugLevel: 2 });
    expect(config.maxNodes).toBe(0);
    expect(config.useNakedPairs).toBe(false);
    expect(config.debugLevel).toBe(2);
    expect(config.solutionLimit).toBe(2);
  });

  it.each([{ solutionLimit: 0 }, { solutionLimit: 1.5 }, { maxNodes: -1 }, { progressInterval: 0 }])(
    'should reject %p',
    (options) => {
      expect(() => resolveSolverConfig(options)).toThrow(ZodError);
    }
  );
});
