import type { PieceGenerator } from '../core/generator';
import { Game } from '../core/game';
import type { Board, ColorId, PieceKind } from '../core/types';

export class FixedGenerator implements PieceGenerator {
  constructor(private kind: PieceKind) {}

  next(): PieceKind {
    return this.kind;
  }
}

/** Plays the list in order, then repeats its last entry. */
export class SequenceGenerator implements PieceGenerator {
  private index = 0;

  constructor(private kinds: readonly PieceKind[]) {}

  next(): PieceKind {
    const i = Math.min(this.index, this.kinds.length - 1);
    this.index++;
    return this.kinds[i];
  }
}

export function fixedGame(kind: PieceKind, startLevel?: number): Game {
  const game = new Game({
    seed: 1,
    generatorFactory: () => new FixedGenerator(kind),
  });
  if (startLevel !== undefined) game.setStartingLevel(startLevel);
  return game;
}

export function sequenceGame(kinds: readonly PieceKind[]): Game {
  return new Game({
    seed: 1,
    generatorFactory: () => new SequenceGenerator(kinds),
  });
}

export function fillRow(
  board: Board,
  y: number,
  fromX: number,
  toX: number,
  color: ColorId = 7,
): void {
  for (let x = fromX; x <= toX; x++) board[y][x] = color;
}

export function repeat(times: number, fn: () => unknown): void {
  for (let i = 0; i < times; i++) fn();
}
