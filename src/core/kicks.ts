import type { Vec2 } from './types';

// Tried in order on every clockwise rotation; y is "down" as on the board,
// so [0, -1] nudges the piece up a row. The two-column shifts mostly help I.
export const KICK_TESTS: readonly Vec2[] = [
  [0, 0],
  [-1, 0],
  [1, 0],
  [0, -1],
  [-2, 0],
  [2, 0],
];
