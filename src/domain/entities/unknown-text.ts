import { Matchable } from './matchable';

export class UnknownText extends Matchable {
  constructor(readonly text: string) {
    super();
  }

  toString(): string {
    return JSON.stringify(this.text);
  }
}
