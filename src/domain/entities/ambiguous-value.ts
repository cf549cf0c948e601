import { Matchable } from './matchable';

/**
 * A bare integer ("3" in "3-4 pm") whose meaning is decided by its neighbours.
 */
export class AmbiguousValue extends Matchable {
  constructor(readonly value: number) {
    super();
  }

  toString(): string {
    return `${this.value}?`;
  }
}
