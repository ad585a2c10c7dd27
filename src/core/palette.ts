import type { ColorId } from './types';

/** ANSI SGR foreground parameters, keyed by board colour id. */
export type PiecePalette = Record<ColorId, string>;

// 256-colour: I cyan, O yellow, T purple, S green, Z red, J blue, L orange
export const PIECE_COLORS: PiecePalette = {
  1: '38;5;51',
  2: '38;5;226',
  3: '38;5;129',
  4: '38;5;46',
  5: '38;5;196',
  6: '38;5;27',
  7: '38;5;208',
};

// 8-colour terminals have no orange; L falls back to white.
export const PIECE_COLORS_BASIC: PiecePalette = {
  1: '36',
  2: '33',
  3: '35',
  4: '32',
  5: '31',
  6: '34',
  7: '37',
};

export const getPiecePalette = (options: {
  basicColors: boolean;
}): PiecePalette => {
  if (options.basicColors) return PIECE_COLORS_BASIC;
  return PIECE_COLORS;
};
