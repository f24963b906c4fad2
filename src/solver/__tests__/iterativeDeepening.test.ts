import { SearchInputError } from '../../model/errors';
import { FourDominoes } from '../../puzzle/fourDominoes';
import { generateInstance } from '../../puzzle/generator';
import { actionKey } from '../../puzzle/types';
import { validateSolution } from '../../validator/validateSolution';
import { iterativeDeepeningSearch } from '../iterativeDeepening';
import { DISTINCT_UNSOLVABLE, GraphProblem, IDENTICAL_UNSOLVABLE, ONE_SWAP, SOLVED } from './fixtures';

describe('iterativeDeepeningSearch', () => {
  it('solves an already solved board at limit 0', () => {
    const problem = new FourDominoes(2, { goal: SOLVED });
    expect(iterativeDeepeningSearch(problem, SOLVED)).toEqual({
      actions: [],
      expanded: 1,
      stopReason: 'solved',
      expansionsByLimit: [1],
    });
  });

  it('returns the cumulative expansion count with the solution', () => {
    const problem = new FourDominoes(2, { goal: SOLVED });
    expect(iterativeDeepeningSearch(problem, ONE_SWAP)).toEqual({
      actions: [{ cell1: { row: 0, col: 0 }, cell2: { row: 1, col: 1 } }],
      expanded: 6,
      stopReason: 'solved',
      expansionsByLimit: [1, 5],
    });
  });

  it('halts on a repeated expansion count when no move changes the board', () => {
    const problem = new FourDominoes(2);
    expect(iterativeDeepeningSearch(problem, IDENTICAL_UNSOLVABLE)).toEqual({
      actions: null,
      expanded: 1,
      stopReason: 'stagnated',
      expansionsByLimit: [1, 1],
    });
  });

  it('halts on a repeated expansion count once a finite graph is exhausted', () => {
    const graph = new GraphProblem({
      edges: { S: [['A', 1]], A: [['B', 1]] },
      goals: ['G'],
    });

    expect(iterativeDeepeningSearch(graph, 'S', { maxLimit: 10 })).toEqual({
      actions: null,
      expanded: 6,
      stopReason: 'stagnated',
      expansionsByLimit: [1, 2, 3, 3],
    });
  });

  it('stops after the maximum limit with non-decreasing totals', () => {
    const result = iterativeDeepeningSearch(new FourDominoes(2), DISTINCT_UNSOLVABLE);

    expect(result.actions).toBeNull();
    expect(result.stopReason).toBe('max-limit');
    expect(result.expansionsByLimit).toEqual([1, 7, 37, 187]);
    expect(result.expanded).toBe(232);

    let running = 0;
    for (const count of result.expansionsByLimit) {
      const next = running + count;
      expect(next).toBeGreaterThanOrEqual(running);
      running = next;
    }
  });

  it('honours a smaller maximum limit', () => {
    const result = iterativeDeepeningSearch(new FourDominoes(2), DISTINCT_UNSOLVABLE, { maxLimit: 1 });
    expect(result).toEqual({ actions: null, expanded: 8, stopReason: 'max-limit', expansionsByLimit: [1, 7] });
  });

  it('checks the expansion budget only between limits', () => {
    // 1 + 7 = 8 is below the budget, so limit 2 runs to completion
    const result = iterativeDeepeningSearch(new FourDominoes(2), DISTINCT_UNSOLVABLE, {
      maxTotalExpansions: 10,
    });
    expect(result).toEqual({
      actions: null,
      expanded: 45,
      stopReason: 'max-expansions',
      expansionsByLimit: [1, 7, 37],
    });
  });

  it('stops before the next limit once the budget is reached exactly', () => {
    const result = iterativeDeepeningSearch(new FourDominoes(2), DISTINCT_UNSOLVABLE, {
      maxTotalExpansions: 8,
    });
    expect(result).toEqual({
      actions: null,
      expanded: 8,
      stopReason: 'max-expansions',
      expansionsByLimit: [1, 7],
    });
  });

  it('returns a solution found by a limit that overruns the budget', () => {
    const graph = new GraphProblem({
      edges: { S: [['A', 1], ['B', 1]], A: [['G', 1]], B: [['C', 1]] },
      goals: ['G'],
    });

    // limits 0 and 1 expand 1 + 3 states; limit 2 expands S, B, C, A, G
    expect(iterativeDeepeningSearch(graph, 'S', { maxTotalExpansions: 5 })).toEqual({
      actions: ['S>A', 'A>G'],
      expanded: 9,
      stopReason: 'solved',
      expansionsByLimit: [1, 3, 5],
    });
  });

  it('starts every limit from a fresh path', () => {
    const problem = new FourDominoes(2, { goal: SOLVED });
    const depthsSeen: number[] = [];
    iterativeDeepeningSearch(problem, ONE_SWAP, { onExpand: (_state, depth) => depthsSeen.push(depth) });

    // limit 0 expands the root; limit 1 expands the root again, then four children
    expect(depthsSeen).toEqual([0, 0, 1, 1, 1, 1]);
  });

  it.each([1, 2, 3, 4, 5])('solves generated 2x2 instance %i within three moves', seed => {
    const instance = generateInstance(2, seed);
    const problem = new FourDominoes(2, { goal: instance.goal });
    const result = iterativeDeepeningSearch(problem, instance.start);

    expect(result.stopReason).toBe('solved');
    const actions = result.actions ?? [];
    expect(actions.length).toBeLessThanOrEqual(3);
    expect(validateSolution(problem, instance.start, actions, actionKey).valid).toBe(true);
  });

  it.each([
    [{ maxLimit: -1 }],
    [{ maxLimit: 2.5 }],
    [{ maxTotalExpansions: 0 }],
  ])('rejects configuration %p', config => {
    expect(() => iterativeDeepeningSearch(new FourDominoes(2), SOLVED, config)).toThrow(SearchInputError);
  });
});
