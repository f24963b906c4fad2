import { ProblemContractError } from '../../model/errors';
import {
  checkedEstimate,
  checkedStepCost,
  createMismatchHeuristic,
  resolveHeuristic,
  zeroHeuristic,
} from '../heuristics';
import { GraphProblem } from './fixtures';

describe('createMismatchHeuristic', () => {
  const chars = (s: string) => s.split('');
  const h = createMismatchHeuristic<string, string>('abcd', chars, c => c);

  it('is zero at the goal', () => {
    expect(h('abcd')).toBe(0);
  });

  it('counts positions that differ from the goal', () => {
    expect(h('abdc')).toBe(2);
    expect(h('dcba')).toBe(4);
  });

  it('counts missing or extra positions as mismatches', () => {
    expect(h('ab')).toBe(2);
    expect(h('abcdef')).toBe(2);
  });
});

describe('resolveHeuristic', () => {
  const problem = new GraphProblem({ edges: {}, goals: [], h: { X: 7 } });

  it('prefers an explicit override', () => {
    expect(resolveHeuristic(problem, () => 3)('X')).toBe(3);
  });

  it('falls back to the problem estimate', () => {
    expect(resolveHeuristic(problem)('X')).toBe(7);
  });

  it('falls back to zero for problems without an estimate', () => {
    const bare = { successor: () => [], goalTest: () => false, keyOf: (s: string) => s };
    expect(resolveHeuristic(bare)).toBe(zeroHeuristic);
  });
});

describe('contract checks', () => {
  it('passes non-negative estimates through', () => {
    expect(checkedEstimate(() => 0, 'X')).toBe(0);
    expect(checkedEstimate(() => 2.5, 'X')).toBe(2.5);
  });

  it.each([-1, NaN])('rejects estimate %p', value => {
    expect(() => checkedEstimate(() => value, 'X')).toThrow(ProblemContractError);
  });

  it('uses unit step cost when the problem defines none', () => {
    const bare = { successor: () => [], goalTest: () => false, keyOf: (s: string) => s };
    expect(checkedStepCost(bare, 'S', 'S>A', 'A')).toBe(1);
  });

  it('reads the problem step cost', () => {
    const problem = new GraphProblem({ edges: { S: [['A', 4]] }, goals: [] });
    expect(checkedStepCost(problem, 'S', 'S>A', 'A')).toBe(4);
  });

  it('names the hook in the error', () => {
    const problem = new GraphProblem({ edges: { S: [['A', -1]] }, goals: [] });
    expect(() => checkedStepCost(problem, 'S', 'S>A', 'A')).toThrow(
      'ProblemContractError: stepCost returned -1, expected a non-negative number'
    );
  });
});
