import { PIECES, type PieceKind } from './types';
import { XorShift32 } from './rng';
import type { PieceGenerator } from './generator';

/** Independent uniform draws; no bag, repeats are allowed. */
export class RandomGenerator implements PieceGenerator {
  private readonly rng: XorShift32;

  constructor(seed: number) {
    this.rng = new XorShift32(seed);
  }

  next(): PieceKind {
    return PIECES[this.rng.nextInt(PIECES.length)];
  }
}
