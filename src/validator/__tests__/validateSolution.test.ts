import { FourDominoes } from '../../puzzle/fourDominoes';
import { actionKey } from '../../puzzle/types';
import { GraphProblem, ONE_SWAP, SOLVED } from '../../solver/__tests__/fixtures';
import { validateSolution } from '../validateSolution';

describe('validateSolution', () => {
  const problem = new FourDominoes(2, { goal: SOLVED });

  it('accepts a plan that reaches a goal', () => {
    const plan = [{ cell1: { row: 0, col: 0 }, cell2: { row: 1, col: 1 } }];
    expect(validateSolution(problem, ONE_SWAP, plan, actionKey)).toEqual({
      valid: true,
      errors: [],
      warnings: [],
    });
  });

  it('rejects an action that is not among the successors', () => {
    const plan = [{ cell1: { row: 1, col: 1 }, cell2: { row: 0, col: 0 } }];
    expect(validateSolution(problem, ONE_SWAP, plan, actionKey).errors).toEqual([
      'Action 0 (1,1<->0,0) is not available from the preceding state',
    ]);
  });

  it('rejects a plan that stops short of a goal', () => {
    expect(validateSolution(problem, ONE_SWAP, [], actionKey)).toEqual({
      valid: false,
      errors: ['Final state after 0 action(s) is not a goal'],
      warnings: [],
    });
  });

  it('warns about plans that revisit a state', () => {
    const graph = new GraphProblem({
      edges: { S: [['A', 1]], A: [['S', 1], ['G', 1]] },
      goals: ['G'],
    });
    const result = validateSolution(graph, 'S', ['S>A', 'A>S', 'S>A', 'A>G'], action => action);

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      'Action 1 (A>S) revisits an earlier state',
      'Action 2 (S>A) revisits an earlier state',
    ]);
  });
});
