import { SearchInputError } from '../model/errors';

export type DominoSide = 'top' | 'right' | 'bottom' | 'left';

/**
 * A square tile with a value on each of its four edges.
 */
export class Domino {
  constructor(
    public readonly top: number,
    public readonly right: number,
    public readonly bottom: number,
    public readonly left: number
  ) {
    const sides: [DominoSide, number][] = [
      ['top', top],
      ['right', right],
      ['bottom', bottom],
      ['left', left],
    ];
    for (const [side, value] of sides) {
      if (!Number.isInteger(value)) {
        throw new SearchInputError(`domino ${side}`, `expected an integer, got ${value}`);
      }
    }
  }

  /** This tile sits directly above `other` */
  isAbove(other: Domino): boolean {
    return this.bottom === other.top;
  }

  /** This tile sits directly under `other` */
  isUnder(other: Domino): boolean {
    return this.top === other.bottom;
  }

  isOnTheLeftOf(other: Domino): boolean {
    return this.right === other.left;
  }

  isOnTheRightOf(other: Domino): boolean {
    return this.left === other.right;
  }

  equals(other: Domino): boolean {
    return this.key() === other.key();
  }

  key(): string {
    return `${this.top}.${this.right}.${this.bottom}.${this.left}`;
  }

  toTuple(): [number, number, number, number] {
    return [this.top, this.right, this.bottom, this.left];
  }
}
