/**
 * Error types raised at the search API boundary
 */

/**
 * An argument given to a search or puzzle operation is malformed
 * (negative limit, bad tile value, out-of-range swap, ...).
 */
export class SearchInputError extends Error {
  constructor(
    public readonly argument: string,
    public readonly reason: string
  ) {
    super(`SearchInputError: invalid ${argument} (${reason})`);
    this.name = 'SearchInputError';
  }
}

/**
 * A problem answered outside its contract, such as a negative heuristic or
 * step cost.
 */
export class ProblemContractError extends Error {
  constructor(
    public readonly hook: 'heuristic' | 'stepCost',
    public readonly value: number
  ) {
    super(`ProblemContractError: ${hook} returned ${value}, expected a non-negative number`);
    this.name = 'ProblemContractError';
  }
}
