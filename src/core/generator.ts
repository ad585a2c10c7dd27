import type { PieceKind } from './types';

export interface PieceGenerator {
  next(): PieceKind;
}
